/**
 * Source Declarations — the Walker's Input Contract
 *
 * One value per source file, produced by a source scanner. The walker
 * depends on nothing else from the source language: comment text has
 * its comment markers removed, and field types are already lowered to
 * {@link TypeExpr}.
 *
 * @module
 */
import type { TypeExpr } from '../resolver/TypeExpr.js';

/** Parsed declarations of one source file */
export interface SourceDeclarations {
    readonly path: string;
    /** Every comment group in source order (doc comments included) */
    readonly comments: readonly string[];
    readonly routines: readonly RoutineDecl[];
    readonly records: readonly RecordDecl[];
}

/** A function, method, or function-valued variable */
export interface RoutineDecl {
    readonly name: string;
    readonly doc?: string;
}

/** A named type declaration */
export interface RecordDecl {
    readonly name: string;
    readonly doc?: string;
    /** `false` for declarations without fields (enums, aliases of non-object types) */
    readonly isStruct: boolean;
    readonly fields: readonly FieldDecl[];
}

/** One declared field of a record */
export interface FieldDecl {
    readonly name: string;
    readonly type: TypeExpr;
    /** Raw serialization tag: `name,omitempty`, `-`, or `json:"name,omitempty"` */
    readonly tag?: string;
    /** Declared optional in the source language (`name?: T`) */
    readonly optional: boolean;
    /** Comment above the field */
    readonly doc?: string;
    /** Comment on the same line, after the field */
    readonly comment?: string;
}
