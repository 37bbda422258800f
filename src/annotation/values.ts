/**
 * Literal values inside annotations (`example=123`, `default=true`,
 * `enum=a,b,c`).
 *
 * @module
 */
import type { JsonValue } from '../document/types.js';

const INTEGER_PATTERN = /^-?\d+$/;
const DECIMAL_PATTERN = /^-?(\d+\.\d*|\.\d+|\d+)([eE][-+]?\d+)?$/;

/**
 * Convert an unquoted literal to its JSON value.
 *
 * @example
 * parseValue('10')     // 10
 * parseValue('1.5')    // 1.5
 * parseValue('true')   // true
 * parseValue('null')   // null
 * parseValue('abc')    // 'abc'
 */
export function parseValue(raw: string): JsonValue {
    switch (raw) {
        case 'true': return true;
        case 'false': return false;
        case 'null': return null;
    }

    if (INTEGER_PATTERN.test(raw)) {
        const n = Number(raw);
        return Number.isSafeInteger(n) ? n : raw;
    }

    if (DECIMAL_PATTERN.test(raw)) {
        const n = Number(raw);
        return Number.isFinite(n) ? n : raw;
    }

    return raw;
}

/**
 * Value of a flag token. A quoted value is always a string.
 */
export function flagValue(value: string, quoted: boolean): JsonValue {
    return quoted ? value : parseValue(value);
}

/**
 * Split an `enum=` value on commas. Empty members are dropped.
 *
 * @example
 * parseEnum('available,pending,sold', false) // ['available', 'pending', 'sold']
 * parseEnum('1,2,3', false)                  // [1, 2, 3]
 */
export function parseEnum(value: string, quoted: boolean): JsonValue[] {
    return value
        .split(',')
        .map(part => part.trim())
        .filter(part => part.length > 0)
        .map(part => flagValue(part, quoted));
}
