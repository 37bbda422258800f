/**
 * Outcome\<T\> — "Produced a value" vs. "Produced nothing"
 *
 * Parse and resolve steps in the annotation core never throw for bad
 * input. Each step returns an `Outcome<T>`: either `Produced<T>` or
 * `Skipped` with a short reason, and the caller decides to continue.
 *
 * @example
 * ```typescript
 * const outcome = parseLine('!query limit:integer "Max results"');
 * if (!outcome.ok) return;       // skip this line
 * const annotation = outcome.value;
 * ```
 *
 * @module
 */

// ── Discriminated Union ──────────────────────────────────

/** Step produced a value. */
export interface Produced<T> {
    readonly ok: true;
    readonly value: T;
}

/** Step produced nothing; `reason` explains why. */
export interface Skipped {
    readonly ok: false;
    readonly reason: string;
}

/** Either `Produced<T>` or `Skipped`. Check `ok` to narrow. */
export type Outcome<T> = Produced<T> | Skipped;

// ── Constructors ─────────────────────────────────────────

export function produced<T>(value: T): Produced<T> {
    return { ok: true, value };
}

export function skipped(reason: string): Skipped {
    return { ok: false, reason };
}
