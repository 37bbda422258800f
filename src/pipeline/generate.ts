/**
 * Generation Pipeline — Directory → OpenApiDocument
 *
 * Enumerate → read → scan → walk (one shared SpecState) → assemble.
 * Files are walked one at a time in enumeration order.
 *
 * @example
 * ```typescript
 * const { document, files } = await generateFromDirectory('./src', {
 *     debug: createDebugObserver(),
 *     onError: 'skip',
 * });
 * ```
 *
 * @module
 */
import { relative } from 'node:path';
import { assembleDocument } from '../assembler/SpecAssembler.js';
import type { OpenApiDocument } from '../document/types.js';
import { SourceReadError } from '../errors.js';
import type { DebugObserverFn } from '../observability/DebugObserver.js';
import { enumerateSourceFiles, readSourceFile } from '../source/FileEnumerator.js';
import { scanSource } from '../source/SourceScanner.js';
import { walkFile } from '../walker/DeclarationWalker.js';
import { createSpecState, type SpecState } from '../walker/SpecState.js';

/** What an unreadable source file does to the run */
export type ErrorPolicy = 'throw' | 'skip';

export interface GenerateOptions {
    readonly debug?: DebugObserverFn;
    /** @default 'throw' */
    readonly onError?: ErrorPolicy;
    readonly excludeDirs?: readonly string[];
}

export interface GenerateResult {
    readonly document: OpenApiDocument;
    /** Files walked, relative to the root */
    readonly files: readonly string[];
    readonly state: SpecState;
}

// ── Public API ───────────────────────────────────────────

/**
 * Generate a document from every source file under `root`.
 *
 * @throws {SourceReadError} When the root cannot be listed, or a file
 *         cannot be read and `onError` is `'throw'`
 */
export async function generateFromDirectory(root: string, options: GenerateOptions = {}): Promise<GenerateResult> {
    const { debug, onError = 'throw' } = options;
    const started = performance.now();

    const paths = await enumerateSourceFiles(root, {
        ...(options.excludeDirs !== undefined ? { excludeDirs: options.excludeDirs } : {}),
    });

    const state = createSpecState();
    const files: string[] = [];

    for (const filePath of paths) {
        const displayPath = relative(root, filePath) || filePath;

        let text: string;
        try {
            text = await readSourceFile(filePath);
        } catch (err) {
            if (onError === 'skip' && err instanceof SourceReadError) {
                debug?.({ type: 'file-error', path: displayPath, error: err.message, timestamp: Date.now() });
                continue;
            }
            throw err;
        }

        walkFile(state, scanSource(displayPath, text), debug);
        files.push(displayPath);
    }

    const document = generateFromState(state, files.length, started, debug);
    return { document, files, state };
}

/**
 * Generate a document from in-memory sources (path → text), walked in
 * the given order.
 */
export function generateFromSources(
    sources: ReadonlyArray<readonly [path: string, text: string]>,
    debug?: DebugObserverFn,
): OpenApiDocument {
    const started = performance.now();
    const state = createSpecState();
    for (const [path, text] of sources) {
        walkFile(state, scanSource(path, text), debug);
    }
    return generateFromState(state, sources.length, started, debug);
}

// ── Internal ─────────────────────────────────────────────

function generateFromState(state: SpecState, fileCount: number, started: number, debug?: DebugObserverFn): OpenApiDocument {
    const document = assembleDocument(state);

    debug?.({
        type: 'assemble',
        files: fileCount,
        operations: state.operations.length,
        schemas: Object.keys(document.components?.schemas ?? {}).length,
        durationMs: performance.now() - started,
        timestamp: Date.now(),
    });

    return document;
}
