/**
 * AnnotationParser — Comment Text → Annotation Records
 *
 * Reads a comment block line by line. A line whose trimmed text starts
 * with `!` followed by a letter is an annotation line; everything else
 * (prose, blank lines) is ignored. The word after the marker selects a
 * verb handler from a fixed table; unknown verbs and malformed lines are
 * reported in `skipped` and never throw.
 *
 * @example
 * ```typescript
 * const block = parseAnnotationBlock(`
 *     ListUsers returns every user.
 *
 *     !GET /users -> listUsers "List users" #users
 *     !query limit:integer "Max results" default=20
 *     !ok User[] "The users"
 * `);
 * block.annotations.length // 3
 * ```
 *
 * @module
 */
import { tokenizeLine, tokenText, type Token } from './Lexer.js';
import { flagValue, parseEnum } from './values.js';
import { produced, skipped, type Outcome } from '../outcome.js';
import type { HttpMethod, JsonValue, ParameterLocation } from '../document/types.js';
import type {
    Annotation, AnnotationBlock, ParamAnnotation, ResponseAnnotation,
    SecuritySchemeType, SkippedLine,
} from './types.js';

// ── Public API ───────────────────────────────────────────

/** Marker that opens every annotation line */
export const ANNOTATION_MARKER = '!';

const ANNOTATION_LINE = /^!([A-Za-z][\w-]*)(.*)$/s;

/**
 * Parse every annotation line of a comment block.
 *
 * @param text - Full comment text, comment markers already removed
 * @returns Records in line order plus the marker lines that were dropped
 */
export function parseAnnotationBlock(text: string): AnnotationBlock {
    const annotations: Annotation[] = [];
    const skippedLines: SkippedLine[] = [];

    for (const rawLine of text.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (!isAnnotationLine(line)) continue;

        const outcome = parseAnnotationLine(line);
        if (outcome.ok) {
            annotations.push(outcome.value);
        } else {
            skippedLines.push({ line, reason: outcome.reason });
        }
    }

    return { annotations, skipped: skippedLines };
}

/** Records only; dropped lines are discarded. */
export function parseAnnotations(text: string): Annotation[] {
    return [...parseAnnotationBlock(text).annotations];
}

/** Whether a trimmed line is a `!verb …` line */
export function isAnnotationLine(line: string): boolean {
    return ANNOTATION_LINE.test(line);
}

/**
 * Parse one trimmed annotation line.
 *
 * @returns The record, or a skipped outcome (unknown verb, malformed line)
 */
export function parseAnnotationLine(line: string): Outcome<Annotation> {
    const match = ANNOTATION_LINE.exec(line);
    if (!match) return skipped('not an annotation line');

    const verb = match[1] ?? '';
    const rest = match[2] ?? '';
    if (rest.length > 0 && !/^\s/.test(rest)) {
        return skipped(`malformed verb "${verb}${rest.split(/\s/)[0] ?? ''}"`);
    }

    const handler = VERB_HANDLERS.get(verb.toLowerCase());
    if (!handler) return skipped(`unknown verb "${verb}"`);

    const tokens = tokenizeLine(rest);
    if (!tokens.ok) return tokens;

    return handler(tokens.value);
}

/**
 * Remove annotation lines from a comment and trim the remaining prose.
 * Used for operation and field descriptions.
 */
export function stripAnnotations(text: string): string {
    return text
        .split(/\r?\n/)
        .filter(line => !line.trim().startsWith(ANNOTATION_MARKER))
        .join('\n')
        .trim();
}

// ── Line Parts ───────────────────────────────────────────

/** Tokens of one line sorted by role */
interface LineParts {
    /** Positional tokens in order (no tags, flags or switch words) */
    readonly values: readonly Token[];
    readonly tags: readonly string[];
    readonly flags: ReadonlyMap<string, { readonly value: string; readonly quoted: boolean }>;
    readonly switches: ReadonlySet<string>;
}

function splitTokens(tokens: readonly Token[], switchWords: readonly string[] = []): LineParts {
    const values: Token[] = [];
    const tags: string[] = [];
    const flags = new Map<string, { value: string; quoted: boolean }>();
    const switches = new Set<string>();

    for (const token of tokens) {
        switch (token.kind) {
            case 'tag':
                tags.push(token.value);
                break;
            case 'flag':
                flags.set(token.key.toLowerCase(), { value: token.value, quoted: token.quoted });
                break;
            case 'word': {
                const lower = token.value.toLowerCase();
                if (switchWords.includes(lower)) {
                    switches.add(lower);
                } else {
                    values.push(token);
                }
                break;
            }
            default:
                values.push(token);
        }
    }

    return { values, tags, flags, switches };
}

/** Text of `values[index]`, if present */
function valueAt(parts: LineParts, index: number): string | undefined {
    const token = parts.values[index];
    return token ? tokenText(token) : undefined;
}

/** Remaining positional values joined by spaces; `undefined` when none */
function restText(values: readonly Token[], from: number): string | undefined {
    const text = values.slice(from).map(tokenText).join(' ').trim();
    return text.length > 0 ? text : undefined;
}

function flagJson(parts: LineParts, key: string): JsonValue | undefined {
    const flag = parts.flags.get(key);
    return flag ? flagValue(flag.value, flag.quoted) : undefined;
}

function flagEnum(parts: LineParts): JsonValue[] | undefined {
    const flag = parts.flags.get('enum');
    if (!flag) return undefined;
    const values = parseEnum(flag.value, flag.quoted);
    return values.length > 0 ? values : undefined;
}

function isUrlLike(text: string): boolean {
    return /^[a-z][a-z0-9+.-]*:\/\//i.test(text) || text.startsWith('/');
}

/**
 * `name:type` or bare `name`. A quoted token is never a name.
 */
function nameAndType(token: Token | undefined): { name: string; type?: string } | undefined {
    if (!token) return undefined;
    if (token.kind === 'compound') return { name: token.name, type: token.type };
    if (token.kind === 'word') return { name: token.value };
    return undefined;
}

// ── Verb Handlers ────────────────────────────────────────

type VerbHandler = (tokens: readonly Token[]) => Outcome<Annotation>;

function parseApi(tokens: readonly Token[]): Outcome<Annotation> {
    const version = valueAt(splitTokens(tokens), 0);
    if (!version) return skipped('missing version');
    return produced({ kind: 'api', version });
}

function parseInfo(tokens: readonly Token[]): Outcome<Annotation> {
    const parts = splitTokens(tokens);
    const title = valueAt(parts, 0);
    if (!title) return skipped('missing title');

    const version = (valueAt(parts, 1) ?? '').replace(/^[vV](?=\d)/, '');
    const description = restText(parts.values, 2);
    return produced({
        kind: 'info',
        title,
        version,
        ...(description !== undefined ? { description } : {}),
    });
}

function parseContact(tokens: readonly Token[]): Outcome<Annotation> {
    const parts = splitTokens(tokens);
    const names: string[] = [];
    let email: string | undefined;
    let url: string | undefined;

    for (const token of parts.values) {
        const text = tokenText(token);
        if (token.kind === 'angle') {
            email = text;
        } else if (token.kind === 'paren' || (token.kind === 'word' && isUrlLike(text))) {
            url = text;
        } else if (token.kind === 'word' && email === undefined && text.includes('@')) {
            email = text;
        } else {
            names.push(text);
        }
    }

    const name = names.join(' ').trim();
    if (!name && !email && !url) return skipped('empty contact');

    return produced({
        kind: 'contact',
        ...(name ? { name } : {}),
        ...(email ? { email } : {}),
        ...(url ? { url } : {}),
    });
}

function parseLicense(tokens: readonly Token[]): Outcome<Annotation> {
    const parts = splitTokens(tokens);
    const name = valueAt(parts, 0);
    if (!name) return skipped('missing license name');
    const url = valueAt(parts, 1);
    return produced({ kind: 'license', name, ...(url !== undefined ? { url } : {}) });
}

function parseTos(tokens: readonly Token[]): Outcome<Annotation> {
    const url = valueAt(splitTokens(tokens), 0);
    if (!url) return skipped('missing terms-of-service URL');
    return produced({ kind: 'tos', url });
}

function parseServer(tokens: readonly Token[]): Outcome<Annotation> {
    const parts = splitTokens(tokens);
    const url = valueAt(parts, 0);
    if (!url) return skipped('missing server URL');
    const description = restText(parts.values, 1);
    return produced({ kind: 'server', url, ...(description !== undefined ? { description } : {}) });
}

function parseTag(tokens: readonly Token[]): Outcome<Annotation> {
    const parts = splitTokens(tokens);
    const hashName = parts.tags[0];
    const name = hashName ?? valueAt(parts, 0);
    if (!name) return skipped('missing tag name');
    const description = restText(parts.values, hashName !== undefined ? 0 : 1);
    return produced({ kind: 'tag', name, ...(description !== undefined ? { description } : {}) });
}

function parseExternalDocs(tokens: readonly Token[]): Outcome<Annotation> {
    const parts = splitTokens(tokens);
    const url = valueAt(parts, 0);
    if (!url) return skipped('missing external docs URL');
    const description = restText(parts.values, 1);
    return produced({ kind: 'externalDocs', url, ...(description !== undefined ? { description } : {}) });
}

function parseLink(tokens: readonly Token[]): Outcome<Annotation> {
    const { values } = splitTokens(tokens);
    const urlToken = values.find(t => t.kind === 'paren' || (t.kind === 'word' && isUrlLike(t.value)));
    const labelToken = values.find(t => t !== urlToken && (t.kind === 'string' || t.kind === 'word'));
    if (!urlToken || !labelToken) return skipped('link needs a label and a URL');
    return produced({ kind: 'link', label: tokenText(labelToken), url: tokenText(urlToken) });
}

const SECURITY_TYPES: ReadonlyMap<string, SecuritySchemeType> = new Map([
    ['apikey', 'apiKey'],
    ['http', 'http'],
    ['oauth2', 'oauth2'],
    ['openidconnect', 'openIdConnect'],
]);

function parseSecurity(tokens: readonly Token[]): Outcome<Annotation> {
    const parts = splitTokens(tokens);
    const name = valueAt(parts, 0);
    const rawType = valueAt(parts, 1);
    if (!name || !rawType) return skipped('security needs a name and a type');

    const schemeType = SECURITY_TYPES.get(rawType.toLowerCase());
    if (!schemeType) return skipped(`unknown security type "${rawType}"`);

    const rest = parts.values.slice(2);
    const args = rest.filter(t => t.kind !== 'string').map(tokenText);
    const description = rest.filter(t => t.kind === 'string').map(tokenText).join(' ');
    const format = parts.flags.get('format') ?? parts.flags.get('bearerformat');

    return produced({
        kind: 'security',
        name,
        schemeType,
        args,
        ...(description ? { description } : {}),
        ...(format ? { bearerFormat: format.value } : {}),
    });
}

function parseScope(tokens: readonly Token[]): Outcome<Annotation> {
    const parts = splitTokens(tokens);
    const scheme = valueAt(parts, 0);
    const name = valueAt(parts, 1);
    if (!scheme || !name) return skipped('scope needs a scheme and a name');
    return produced({ kind: 'scope', scheme, name, description: restText(parts.values, 2) ?? '' });
}

function routeHandler(method: HttpMethod): VerbHandler {
    return (tokens) => {
        const parts = splitTokens(tokens, ['deprecated']);
        const path = valueAt(parts, 0);
        if (!path || parts.values[0]?.kind === 'arrow') return skipped('missing route path');

        let operationId: string | undefined;
        let next = 1;
        if (parts.values[1]?.kind === 'arrow') {
            const idToken = parts.values[2];
            if (idToken && idToken.kind !== 'string') {
                operationId = tokenText(idToken);
                next = 3;
            } else {
                next = 2;
            }
        }

        const summary = restText(parts.values, next);
        return produced({
            kind: 'route',
            method,
            path,
            ...(operationId !== undefined ? { operationId } : {}),
            ...(summary !== undefined ? { summary } : {}),
            tags: parts.tags,
            deprecated: parts.switches.has('deprecated'),
        });
    };
}

function paramHandler(location: ParameterLocation): VerbHandler {
    return (tokens) => {
        const parts = splitTokens(tokens, ['required']);
        const target = nameAndType(parts.values[0]);
        if (!target) return skipped('missing parameter name');

        const description = restText(parts.values, 1);
        const defaultValue = flagJson(parts, 'default');
        const enumValues = flagEnum(parts);
        const param: ParamAnnotation = {
            kind: 'param',
            in: location,
            name: target.name,
            type: target.type ?? 'string',
            ...(description !== undefined ? { description } : {}),
            required: parts.switches.has('required'),
            ...(defaultValue !== undefined ? { default: defaultValue } : {}),
            ...(enumValues !== undefined ? { enum: enumValues } : {}),
        };
        return produced(param);
    };
}

function parseBody(tokens: readonly Token[]): Outcome<Annotation> {
    const parts = splitTokens(tokens, ['required']);
    const first = parts.values[0];
    if (!first || first.kind === 'string') return skipped('missing body schema');

    const description = restText(parts.values, 1);
    const mediaType = parts.flags.get('type')?.value ?? parts.flags.get('mediatype')?.value ?? 'application/json';
    return produced({
        kind: 'body',
        schema: tokenText(first),
        ...(description !== undefined ? { description } : {}),
        required: parts.switches.has('required'),
        mediaType,
    });
}

const STATUS_PATTERN = /^([1-5]\d\d|[1-5]XX|default)$/i;

function responseHandler(success: boolean): VerbHandler {
    return (tokens) => {
        const parts = splitTokens(tokens);
        let index = 0;
        let status = success ? '200' : undefined;

        const first = parts.values[0];
        if (first && first.kind === 'word' && STATUS_PATTERN.test(first.value)) {
            status = first.value.toUpperCase() === 'DEFAULT' ? 'default' : first.value.toUpperCase();
            index = 1;
        }
        if (status === undefined) return skipped('missing response status');

        let schema = '';
        const schemaToken = parts.values[index];
        if (schemaToken && schemaToken.kind !== 'string') {
            schema = tokenText(schemaToken);
            index++;
        }

        const description = restText(parts.values, index);
        const response: ResponseAnnotation = {
            kind: 'response',
            success,
            status,
            schema,
            ...(description !== undefined ? { description } : {}),
        };
        return produced(response);
    };
}

function parseSecure(tokens: readonly Token[]): Outcome<Annotation> {
    const schemes = splitTokens(tokens).values
        .flatMap(t => tokenText(t).split(','))
        .map(s => s.trim())
        .filter(s => s.length > 0);
    if (schemes.length === 0) return skipped('missing security scheme name');
    return produced({ kind: 'secure', schemes });
}

function parseModel(tokens: readonly Token[]): Outcome<Annotation> {
    const description = restText(splitTokens(tokens).values, 0);
    return produced({ kind: 'model', ...(description !== undefined ? { description } : {}) });
}

function parseField(tokens: readonly Token[]): Outcome<Annotation> {
    const parts = splitTokens(tokens, ['required']);
    const target = nameAndType(parts.values[0]);
    if (!target) return skipped('missing field name');

    const description = restText(parts.values, 1);
    const example = flagJson(parts, 'example');
    const enumValues = flagEnum(parts);
    return produced({
        kind: 'field',
        name: target.name,
        ...(target.type !== undefined ? { type: target.type } : {}),
        ...(description !== undefined ? { description } : {}),
        required: parts.switches.has('required'),
        ...(example !== undefined ? { example } : {}),
        ...(enumValues !== undefined ? { enum: enumValues } : {}),
    });
}

function parseSchema(tokens: readonly Token[]): Outcome<Annotation> {
    const parts = splitTokens(tokens);
    const first = parts.values[0];
    if (!first || first.kind !== 'word') return skipped('missing schema name');
    const description = restText(parts.values, 1);
    return produced({ kind: 'schema', name: first.value, ...(description !== undefined ? { description } : {}) });
}

function parseProp(tokens: readonly Token[]): Outcome<Annotation> {
    const parts = splitTokens(tokens, ['required']);
    const target = nameAndType(parts.values[0]);
    if (!target) return skipped('missing property name');

    const description = restText(parts.values, 1);
    const example = flagJson(parts, 'example');
    const enumValues = flagEnum(parts);
    return produced({
        kind: 'prop',
        name: target.name,
        type: target.type ?? 'string',
        ...(description !== undefined ? { description } : {}),
        required: parts.switches.has('required'),
        ...(example !== undefined ? { example } : {}),
        ...(enumValues !== undefined ? { enum: enumValues } : {}),
    });
}

// ── Verb Table ───────────────────────────────────────────

/** Lowercase verb → handler */
const VERB_HANDLERS: ReadonlyMap<string, VerbHandler> = new Map<string, VerbHandler>([
    ['api', parseApi],
    ['info', parseInfo],
    ['contact', parseContact],
    ['license', parseLicense],
    ['tos', parseTos],
    ['server', parseServer],
    ['tag', parseTag],
    ['externaldocs', parseExternalDocs],
    ['docs', parseExternalDocs],
    ['link', parseLink],
    ['security', parseSecurity],
    ['scope', parseScope],
    ['get', routeHandler('get')],
    ['put', routeHandler('put')],
    ['post', routeHandler('post')],
    ['delete', routeHandler('delete')],
    ['options', routeHandler('options')],
    ['head', routeHandler('head')],
    ['patch', routeHandler('patch')],
    ['trace', routeHandler('trace')],
    ['query', paramHandler('query')],
    ['path', paramHandler('path')],
    ['header', paramHandler('header')],
    ['cookie', paramHandler('cookie')],
    ['body', parseBody],
    ['ok', responseHandler(true)],
    ['success', responseHandler(true)],
    ['error', responseHandler(false)],
    ['fail', responseHandler(false)],
    ['secure', parseSecure],
    ['model', parseModel],
    ['field', parseField],
    ['schema', parseSchema],
    ['prop', parseProp],
]);
