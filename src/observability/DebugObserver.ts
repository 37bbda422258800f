/**
 * DebugObserver — Typed Debug Events for the Generation Pipeline
 *
 * Every silent drop in the pipeline (an unknown verb, a malformed line,
 * an operation without a route, a scope for an unknown scheme) is
 * reported as a structured event. When no observer is attached, the
 * pipeline does not build any event objects.
 *
 * @example
 * ```typescript
 * import { createDebugObserver, generateFromDirectory } from 'bangdoc';
 *
 * // Default: compact console.debug output
 * const debug = createDebugObserver();
 *
 * // Custom handler
 * const debug = createDebugObserver((event) => {
 *     if (event.type === 'operation-dropped') warnings.push(event);
 * });
 *
 * await generateFromDirectory('./src', { debug });
 * ```
 *
 * @module
 */

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/** Emitted when a source file is about to be walked. */
export interface FileEvent {
    readonly type: 'file';
    readonly path: string;
    readonly comments: number;
    readonly routines: number;
    readonly records: number;
    readonly timestamp: number;
}

/**
 * Emitted when an annotation line starts with the marker but cannot be
 * turned into a record: unknown verb, unterminated quote, missing token.
 */
export interface LineSkippedEvent {
    readonly type: 'line-skipped';
    readonly line: string;
    readonly reason: string;
    readonly timestamp: number;
}

/** Emitted when a routine carries annotations but no route. */
export interface OperationDroppedEvent {
    readonly type: 'operation-dropped';
    readonly path: string;
    readonly routine: string;
    readonly timestamp: number;
}

/** Emitted when a `!scope` names a scheme that is unknown or not OAuth2. */
export interface ScopeDroppedEvent {
    readonly type: 'scope-dropped';
    readonly scheme: string;
    readonly scope: string;
    readonly timestamp: number;
}

/** Emitted when a schema name is already taken in its collection. */
export interface SchemaDuplicateEvent {
    readonly type: 'schema-duplicate';
    readonly name: string;
    readonly collection: 'explicit' | 'global';
    readonly path: string;
    readonly timestamp: number;
}

/** Emitted when a file cannot be read and the run is configured to skip it. */
export interface FileErrorEvent {
    readonly type: 'file-error';
    readonly path: string;
    readonly error: string;
    readonly timestamp: number;
}

/** Emitted once after the document is assembled. */
export interface AssembleEvent {
    readonly type: 'assemble';
    readonly files: number;
    readonly operations: number;
    readonly schemas: number;
    readonly durationMs: number;
    readonly timestamp: number;
}

/**
 * Union of all debug event types.
 *
 * Use a `switch` on `event.type` for exhaustive handling.
 */
export type DebugEvent =
    | FileEvent
    | LineSkippedEvent
    | OperationDroppedEvent
    | ScopeDroppedEvent
    | SchemaDuplicateEvent
    | FileErrorEvent
    | AssembleEvent;

/** Observer function that receives debug events. */
export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer with compact console output.
 *
 * If a custom handler is provided, events are forwarded to it instead.
 *
 * ```
 * [bangdoc] file      src/users.ts (4 comments, 2 routines, 1 records)
 * [bangdoc] drop-op   src/users.ts listUsers (no route)
 * [bangdoc] assemble  3 files, 5 operations, 2 schemas 4.1ms
 * ```
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        console.debug(formatDebugEvent(event));
    };
}

/** Render one event as a compact log line. */
export function formatDebugEvent(event: DebugEvent): string {
    const prefix = '[bangdoc]';

    switch (event.type) {
        case 'file':
            return `${prefix} file      ${event.path} (${event.comments} comments, ${event.routines} routines, ${event.records} records)`;

        case 'line-skipped':
            return `${prefix} skip      ${event.line} [${event.reason}]`;

        case 'operation-dropped':
            return `${prefix} drop-op   ${event.path} ${event.routine} (no route)`;

        case 'scope-dropped':
            return `${prefix} drop-scp  ${event.scheme}/${event.scope}`;

        case 'schema-duplicate':
            return `${prefix} dup-schm  ${event.name} (${event.collection}) in ${event.path}`;

        case 'file-error':
            return `${prefix} ERROR     ${event.path} ${event.error}`;

        case 'assemble':
            return `${prefix} assemble  ${event.files} files, ${event.operations} operations, ${event.schemas} schemas ${event.durationMs.toFixed(1)}ms`;
    }
}
