/**
 * Lexer — One Annotation Line → Tokens
 *
 * Splits the text that follows an annotation verb into typed tokens:
 *
 * ```
 * /users/{id} -> getUser "Get a user" #users required limit=10 id:integer
 * └── word ──┘ └arrow┘ └word┘ └ string ┘ └tag─┘ └word──┘ └─flag─┘ └compound┘
 * ```
 *
 * A string, angle or paren token that is never closed makes the whole
 * line unusable; the lexer reports that as a skipped outcome instead
 * of throwing.
 *
 * @module
 */
import { produced, skipped, type Outcome } from '../outcome.js';

// ── Token Types ──────────────────────────────────────────

export interface WordToken {
    readonly kind: 'word';
    readonly raw: string;
    readonly value: string;
}

/** `"two words"`, with `\"` and `\\` unescaped */
export interface StringToken {
    readonly kind: 'string';
    readonly raw: string;
    readonly value: string;
}

/** `<support@example.com>` */
export interface AngleToken {
    readonly kind: 'angle';
    readonly raw: string;
    readonly value: string;
}

/** `(https://example.com)`, nesting allowed */
export interface ParenToken {
    readonly kind: 'paren';
    readonly raw: string;
    readonly value: string;
}

/** `#users` — value is the name without `#` */
export interface TagToken {
    readonly kind: 'tag';
    readonly raw: string;
    readonly value: string;
}

/** `->` */
export interface ArrowToken {
    readonly kind: 'arrow';
    readonly raw: string;
}

/** `key=value` or `key="quoted value"` */
export interface FlagToken {
    readonly kind: 'flag';
    readonly raw: string;
    readonly key: string;
    readonly value: string;
    readonly quoted: boolean;
}

/** `name:type` */
export interface CompoundToken {
    readonly kind: 'compound';
    readonly raw: string;
    readonly name: string;
    readonly type: string;
}

export type Token =
    | WordToken
    | StringToken
    | AngleToken
    | ParenToken
    | TagToken
    | ArrowToken
    | FlagToken
    | CompoundToken;

// ── Patterns ─────────────────────────────────────────────

const FLAG_PATTERN = /^([A-Za-z_][\w-]*)=(.*)$/s;
const FLAG_PREFIX_PATTERN = /^[A-Za-z_][\w-]*=$/;
// Type part may not start with `/` so URLs (`https://…`) stay words
const COMPOUND_PATTERN = /^([A-Za-z_][\w.-]*):(?!\/)(.+)$/s;

// ── Lexer ────────────────────────────────────────────────

/**
 * Tokenize the argument part of one annotation line.
 *
 * @param input - Everything after the verb
 * @returns The ordered tokens, or a skipped outcome for an unterminated token
 */
export function tokenizeLine(input: string): Outcome<Token[]> {
    const tokens: Token[] = [];
    let i = 0;

    while (i < input.length) {
        const ch = input.charAt(i);

        if (isSpace(ch)) {
            i++;
            continue;
        }

        if (ch === '"') {
            const str = readQuoted(input, i);
            if (!str) return skipped('unterminated string');
            tokens.push({ kind: 'string', raw: input.slice(i, str.end), value: str.value });
            i = str.end;
            continue;
        }

        if (ch === '<') {
            const close = input.indexOf('>', i + 1);
            if (close === -1) return skipped('unterminated <…>');
            tokens.push({ kind: 'angle', raw: input.slice(i, close + 1), value: input.slice(i + 1, close).trim() });
            i = close + 1;
            continue;
        }

        if (ch === '(') {
            const close = findClosingParen(input, i);
            if (close === -1) return skipped('unterminated (…)');
            tokens.push({ kind: 'paren', raw: input.slice(i, close + 1), value: input.slice(i + 1, close).trim() });
            i = close + 1;
            continue;
        }

        // Bare run: up to the next space, or a quoted flag value
        let j = i;
        while (j < input.length && !isSpace(input.charAt(j))) {
            if (input.charAt(j) === '"' && FLAG_PREFIX_PATTERN.test(input.slice(i, j))) break;
            j++;
        }

        const run = input.slice(i, j);

        if (j < input.length && input.charAt(j) === '"') {
            const str = readQuoted(input, j);
            if (!str) return skipped('unterminated string');
            tokens.push({
                kind: 'flag',
                raw: input.slice(i, str.end),
                key: run.slice(0, -1),
                value: str.value,
                quoted: true,
            });
            i = str.end;
            continue;
        }

        tokens.push(classifyRun(run));
        i = j;
    }

    return produced(tokens);
}

/**
 * Text a token stands for when used as a positional value.
 * Compound and flag tokens keep their raw form.
 */
export function tokenText(token: Token): string {
    switch (token.kind) {
        case 'word':
        case 'string':
        case 'angle':
        case 'paren':
            return token.value;
        case 'tag':
        case 'arrow':
        case 'flag':
        case 'compound':
            return token.raw;
    }
}

// ── Internal ─────────────────────────────────────────────

function isSpace(ch: string): boolean {
    return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n';
}

function classifyRun(run: string): Token {
    if (run === '->') return { kind: 'arrow', raw: run };

    if (run.length > 1 && run.startsWith('#')) {
        return { kind: 'tag', raw: run, value: run.slice(1) };
    }

    const flag = FLAG_PATTERN.exec(run);
    if (flag) {
        return { kind: 'flag', raw: run, key: flag[1] ?? '', value: flag[2] ?? '', quoted: false };
    }

    const compound = COMPOUND_PATTERN.exec(run);
    if (compound) {
        return { kind: 'compound', raw: run, name: compound[1] ?? '', type: compound[2] ?? '' };
    }

    return { kind: 'word', raw: run, value: run };
}

/** Read a `"…"` string starting at `start`. Returns `undefined` if unterminated. */
function readQuoted(input: string, start: number): { value: string; end: number } | undefined {
    let value = '';
    let i = start + 1;

    while (i < input.length) {
        const ch = input.charAt(i);
        if (ch === '\\' && i + 1 < input.length) {
            const next = input.charAt(i + 1);
            if (next === '"' || next === '\\') {
                value += next;
                i += 2;
                continue;
            }
        }
        if (ch === '"') {
            return { value, end: i + 1 };
        }
        value += ch;
        i++;
    }

    return undefined;
}

function findClosingParen(input: string, start: number): number {
    let depth = 0;
    for (let i = start; i < input.length; i++) {
        const ch = input.charAt(i);
        if (ch === '(') depth++;
        else if (ch === ')') {
            depth--;
            if (depth === 0) return i;
        }
    }
    return -1;
}
