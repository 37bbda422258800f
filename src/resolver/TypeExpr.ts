/**
 * TypeExpr — Source-Neutral Type Expressions
 *
 * The walker never sees compiler AST nodes. The source scanner lowers
 * TypeScript type nodes to this union, and {@link parseTypeExpr} does the
 * same for the type part of annotation tokens (`limit:integer`,
 * `ids:[]string`, `meta:map[string]string`).
 *
 * @module
 */

/** `string`, `User`, `int64` */
export interface NameExpr {
    readonly kind: 'name';
    readonly name: string;
}

/** `uuid.UUID`, `time.Time` */
export interface QualifiedExpr {
    readonly kind: 'qualified';
    readonly qualifier: string;
    readonly name: string;
}

/** Optional/nullable wrapper: `*T`, `T?`, `T | null` */
export interface PointerExpr {
    readonly kind: 'pointer';
    readonly target: TypeExpr;
}

/** `[]T`, `T[]`, `Array<T>` */
export interface ArrayExpr {
    readonly kind: 'array';
    readonly element: TypeExpr;
}

/** `map[K]V`, `Record<K, V>`, `Map<K, V>` */
export interface MapExpr {
    readonly kind: 'map';
    readonly key: TypeExpr;
    readonly value: TypeExpr;
}

/** Anything the resolver has no rule for (unions, tuples, functions…) */
export interface UnknownExpr {
    readonly kind: 'unknown';
    readonly text: string;
}

export type TypeExpr =
    | NameExpr
    | QualifiedExpr
    | PointerExpr
    | ArrayExpr
    | MapExpr
    | UnknownExpr;

// ── Constructors ─────────────────────────────────────────

export const nameExpr = (name: string): NameExpr => ({ kind: 'name', name });
export const pointerExpr = (target: TypeExpr): PointerExpr => ({ kind: 'pointer', target });
export const arrayExpr = (element: TypeExpr): ArrayExpr => ({ kind: 'array', element });
export const mapExpr = (key: TypeExpr, value: TypeExpr): MapExpr => ({ kind: 'map', key, value });
export const unknownExpr = (text: string): UnknownExpr => ({ kind: 'unknown', text });

export function qualifiedExpr(qualifier: string, name: string): QualifiedExpr {
    return { kind: 'qualified', qualifier, name };
}

// ── Annotation Type Tokens ───────────────────────────────

const IDENT = /^[A-Za-z_$][\w$]*$/;
const QUALIFIED = /^([A-Za-z_$][\w$]*)\.([A-Za-z_$][\w$]*)$/;
const GENERIC = /^([A-Za-z_$][\w$]*)<(.+)>$/s;

/**
 * Parse the type written in an annotation token.
 *
 * @example
 * parseTypeExpr('[]string')            // array of name 'string'
 * parseTypeExpr('User[]')              // array of name 'User'
 * parseTypeExpr('*int64')              // pointer to name 'int64'
 * parseTypeExpr('map[string]Item')     // map string → Item
 * parseTypeExpr('Record<string, Item>')// map string → Item
 * parseTypeExpr('uuid.UUID')           // qualified
 */
export function parseTypeExpr(text: string): TypeExpr {
    const t = text.trim();
    if (t.length === 0) return unknownExpr(text);

    if (t.startsWith('[]')) return arrayExpr(parseTypeExpr(t.slice(2)));
    if (t.endsWith('[]')) return arrayExpr(parseTypeExpr(t.slice(0, -2)));
    if (t.startsWith('*')) return pointerExpr(parseTypeExpr(t.slice(1)));
    if (t.endsWith('?')) return pointerExpr(parseTypeExpr(t.slice(0, -1)));

    if (t.startsWith('map[')) {
        const close = findMatching(t, 3, '[', ']');
        if (close === -1) return unknownExpr(text);
        return mapExpr(parseTypeExpr(t.slice(4, close)), parseTypeExpr(t.slice(close + 1)));
    }

    const generic = GENERIC.exec(t);
    if (generic) {
        const base = generic[1] ?? '';
        const args = splitTopLevel(generic[2] ?? '');
        if ((base === 'Array' || base === 'ReadonlyArray') && args.length === 1) {
            return arrayExpr(parseTypeExpr(args[0] ?? ''));
        }
        if ((base === 'Record' || base === 'Map') && args.length === 2) {
            return mapExpr(parseTypeExpr(args[0] ?? ''), parseTypeExpr(args[1] ?? ''));
        }
        return unknownExpr(text);
    }

    const qualified = QUALIFIED.exec(t);
    if (qualified) return qualifiedExpr(qualified[1] ?? '', qualified[2] ?? '');

    if (t === 'interface{}' || IDENT.test(t)) return nameExpr(t);

    return unknownExpr(text);
}

/** Render an expression back to annotation syntax (diagnostics, tests) */
export function formatTypeExpr(expr: TypeExpr): string {
    switch (expr.kind) {
        case 'name': return expr.name;
        case 'qualified': return `${expr.qualifier}.${expr.name}`;
        case 'pointer': return `*${formatTypeExpr(expr.target)}`;
        case 'array': return `[]${formatTypeExpr(expr.element)}`;
        case 'map': return `map[${formatTypeExpr(expr.key)}]${formatTypeExpr(expr.value)}`;
        case 'unknown': return expr.text;
    }
}

// ── Internal ─────────────────────────────────────────────

function findMatching(text: string, openIndex: number, open: string, close: string): number {
    let depth = 0;
    for (let i = openIndex; i < text.length; i++) {
        const ch = text.charAt(i);
        if (ch === open) depth++;
        else if (ch === close) {
            depth--;
            if (depth === 0) return i;
        }
    }
    return -1;
}

/** Split generic arguments on commas that are not nested in `<>` or `[]` */
function splitTopLevel(text: string): string[] {
    const parts: string[] = [];
    let depth = 0;
    let start = 0;
    for (let i = 0; i < text.length; i++) {
        const ch = text.charAt(i);
        if (ch === '<' || ch === '[') depth++;
        else if (ch === '>' || ch === ']') depth--;
        else if (ch === ',' && depth === 0) {
            parts.push(text.slice(start, i).trim());
            start = i + 1;
        }
    }
    parts.push(text.slice(start).trim());
    return parts;
}
