/**
 * OutputFormatter — Document Serialization
 *
 * @module
 */
import { stringify as stringifyYaml } from 'yaml';
import type { OpenApiDocument } from '../document/types.js';
import { OutputFormatError } from '../errors.js';

export type OutputFormat = 'json' | 'yaml';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'yaml'];

export interface FormatOptions {
    readonly format: OutputFormat;
    /** Spaces per level */
    readonly indent: number;
}

/**
 * Validate a user-supplied format name (case-insensitive, `yml` accepted).
 *
 * @throws {OutputFormatError} For anything other than json/yaml/yml
 */
export function parseFormat(value: string): OutputFormat {
    const lower = value.trim().toLowerCase();
    if (lower === 'yml') return 'yaml';
    const format = OUTPUT_FORMATS.find(f => f === lower);
    if (format === undefined) throw new OutputFormatError(value);
    return format;
}

/** Serialize a document; the result always ends with a newline. */
export function formatDocument(document: OpenApiDocument, options: FormatOptions): string {
    if (options.format === 'json') {
        return `${JSON.stringify(document, null, options.indent)}\n`;
    }

    // yaml takes no zero indent
    const yaml = stringifyYaml(document, { indent: Math.max(1, options.indent), lineWidth: 0 });
    return yaml.endsWith('\n') ? yaml : `${yaml}\n`;
}
