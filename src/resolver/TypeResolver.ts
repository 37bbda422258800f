/**
 * TypeResolver — Type Expressions → Schema Nodes
 *
 * Resolution rules:
 *   1. Primitive names map to exactly one `type` + `format` pair
 *   2. Well-known external types (`time.Time`, `Date`, `uuid.UUID`) map to formatted strings
 *   3. Any other name is a reference to `#/components/schemas/<name>`
 *   4. Pointers add `nullable: true` to inline nodes; references stay bare
 *   5. Arrays and maps resolve their element; complex elements are left open
 *   6. Everything else resolves to `{}` — no constraint, never an error
 *
 * @module
 */
import type { SchemaNode, SchemaType } from '../document/types.js';
import type { TypeExpr } from './TypeExpr.js';

// ── Tables ───────────────────────────────────────────────

interface TypeFormat {
    readonly type: SchemaType;
    readonly format?: string;
}

const INT32: TypeFormat = { type: 'integer', format: 'int32' };
const INT64: TypeFormat = { type: 'integer', format: 'int64' };
const FLOAT: TypeFormat = { type: 'number', format: 'float' };
const DOUBLE: TypeFormat = { type: 'number', format: 'double' };

/** Primitive name → OpenAPI base type + format */
export const PRIMITIVE_TYPES: ReadonlyMap<string, TypeFormat> = new Map<string, TypeFormat>([
    ['string', { type: 'string' }],
    ['int', INT32],
    ['int8', INT32],
    ['int16', INT32],
    ['int32', INT32],
    ['integer', INT32],
    ['int64', INT64],
    ['uint', INT32],
    ['uint8', INT32],
    ['uint16', INT32],
    ['uint32', INT32],
    ['uint64', INT64],
    ['bigint', INT64],
    ['float32', FLOAT],
    ['float', FLOAT],
    ['float64', DOUBLE],
    ['double', DOUBLE],
    ['number', DOUBLE],
    ['bool', { type: 'boolean' }],
    ['boolean', { type: 'boolean' }],
    ['byte', { type: 'string', format: 'byte' }],
    ['any', { type: 'object' }],
    ['unknown', { type: 'object' }],
    ['interface{}', { type: 'object' }],
    ['object', { type: 'object' }],
    ['array', { type: 'array' }],
]);

/** Named external types that are strings on the wire */
const WELL_KNOWN_TYPES: ReadonlyMap<string, TypeFormat> = new Map<string, TypeFormat>([
    ['time.Time', { type: 'string', format: 'date-time' }],
    ['Date', { type: 'string', format: 'date-time' }],
    ['uuid.UUID', { type: 'string', format: 'uuid' }],
]);

const SCHEMA_REF_PREFIX = '#/components/schemas/';

// ── Public API ───────────────────────────────────────────

/** `{ $ref: '#/components/schemas/<name>' }` */
export function refTo(name: string): SchemaNode {
    return { $ref: `${SCHEMA_REF_PREFIX}${name}` };
}

/** Whether a node is a reference node */
export function isRef(node: SchemaNode): boolean {
    return node.$ref !== undefined;
}

/** Whether a node carries no constraint at all */
export function isEmptySchema(node: SchemaNode): boolean {
    return Object.keys(node).length === 0;
}

/**
 * Resolve a bare type name.
 *
 * @example
 * resolveTypeName('int64')  // { type: 'integer', format: 'int64' }
 * resolveTypeName('User')   // { $ref: '#/components/schemas/User' }
 */
export function resolveTypeName(name: string): SchemaNode {
    const primitive = PRIMITIVE_TYPES.get(name) ?? WELL_KNOWN_TYPES.get(name);
    if (primitive) return fromTypeFormat(primitive);
    return refTo(name);
}

/**
 * Resolve a declared field or parameter type.
 *
 * Always returns a fresh node; callers may mutate it.
 */
export function resolveType(expr: TypeExpr): SchemaNode {
    switch (expr.kind) {
        case 'name':
            return resolveTypeName(expr.name);

        case 'qualified': {
            const known = WELL_KNOWN_TYPES.get(`${expr.qualifier}.${expr.name}`);
            return known ? fromTypeFormat(known) : {};
        }

        case 'pointer': {
            const inner = resolveType(expr.target);
            if (isRef(inner) || isEmptySchema(inner)) return inner;
            return { ...inner, nullable: true };
        }

        case 'array': {
            const items = resolveElement(expr.element);
            return items ? { type: 'array', items } : { type: 'array' };
        }

        case 'map': {
            const additionalProperties = resolveElement(expr.value);
            return additionalProperties ? { type: 'object', additionalProperties } : { type: 'object' };
        }

        case 'unknown':
            return {};
    }
}

/**
 * Resolve a body/response schema token.
 *
 * `[]Name` and `Name[]` give an array of references; any other token is
 * a reference. Names are never looked up in the primitive table.
 *
 * @example
 * resolveSchemaRef('User[]')  // { type: 'array', items: { $ref: '#/components/schemas/User' } }
 * resolveSchemaRef('[]Item')  // { type: 'array', items: { $ref: '#/components/schemas/Item' } }
 * resolveSchemaRef('Error')   // { $ref: '#/components/schemas/Error' }
 */
export function resolveSchemaRef(token: string): SchemaNode {
    if (token.startsWith('[]')) {
        return { type: 'array', items: refTo(token.slice(2)) };
    }
    if (token.endsWith('[]')) {
        return { type: 'array', items: refTo(token.slice(0, -2)) };
    }
    return refTo(token);
}

// ── Internal ─────────────────────────────────────────────

function fromTypeFormat(info: TypeFormat): SchemaNode {
    return info.format !== undefined
        ? { type: info.type, format: info.format }
        : { type: info.type };
}

/**
 * Array items / map values: only a name, a qualified name, or a
 * pointer to one of those resolves. Pointer elements drop `nullable`.
 */
function resolveElement(expr: TypeExpr): SchemaNode | undefined {
    switch (expr.kind) {
        case 'name':
            return resolveTypeName(expr.name);
        case 'qualified': {
            const node = resolveType(expr);
            return isEmptySchema(node) ? undefined : node;
        }
        case 'pointer':
            return expr.target.kind === 'name' || expr.target.kind === 'qualified'
                ? resolveElement(expr.target)
                : undefined;
        default:
            return undefined;
    }
}
