/**
 * Serialization tag lookup for record fields.
 *
 * Accepts the bare tag value (`user_id,omitempty`) or a full struct-tag
 * string (`json:"user_id,omitempty" db:"user_id"`), from which only the
 * `json` entry is read.
 *
 * @module
 */
import type { FieldDecl } from './declarations.js';

/** Tag value that removes a field from the schema */
export const EXCLUDED_TAG = '-';

const OMIT_EMPTY = 'omitempty';
const JSON_ENTRY = /(?:^|\s)json:"([^"]*)"/;

export interface SerializationInfo {
    readonly excluded: boolean;
    /** Property name on the wire */
    readonly name: string;
    /** Tag says `omitempty`, or the field is declared optional */
    readonly omitEmpty: boolean;
}

export function readSerializationTag(field: FieldDecl): SerializationInfo {
    const value = tagValue(field.tag);
    const [rawName = '', ...options] = value.split(',');
    const tagName = rawName.trim();

    if (tagName === EXCLUDED_TAG && options.length === 0) {
        return { excluded: true, name: field.name, omitEmpty: true };
    }

    return {
        excluded: false,
        name: tagName.length > 0 ? tagName : field.name,
        omitEmpty: field.optional || options.some(o => o.trim() === OMIT_EMPTY),
    };
}

function tagValue(tag: string | undefined): string {
    if (tag === undefined) return '';
    const entry = JSON_ENTRY.exec(tag);
    if (entry) return entry[1] ?? '';
    return tag.includes(':"') ? '' : tag.trim();
}
