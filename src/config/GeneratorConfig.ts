/**
 * GeneratorConfig — Run Configuration
 *
 * Can be loaded from `bangdoc.yaml` or passed programmatically. Every
 * field has a default; see {@link DEFAULT_CONFIG}.
 *
 * @module
 */
import { z } from 'zod';
import { DEFAULT_EXCLUDED_DIRS } from '../source/FileEnumerator.js';
import type { OutputFormat } from '../output/OutputFormatter.js';
import type { ErrorPolicy } from '../pipeline/generate.js';

// ── Full Config ──────────────────────────────────────────

export interface GeneratorConfig {
    /** Directory to scan */
    readonly source: string;
    /** Output file; stdout when absent */
    readonly output?: string;
    readonly format: OutputFormat;
    /** Spaces per indentation level */
    readonly indent: number;
    /** Directory names skipped during the walk */
    readonly excludeDirs: readonly string[];
    /** What an unreadable source file does to the run */
    readonly onError: ErrorPolicy;
    /** Print debug events to stderr */
    readonly debug: boolean;
}

// ── Defaults ─────────────────────────────────────────────

export const DEFAULT_CONFIG: GeneratorConfig = {
    source: '.',
    format: 'yaml',
    indent: 2,
    excludeDirs: DEFAULT_EXCLUDED_DIRS,
    onError: 'throw',
    debug: false,
};

// ── File Schema ──────────────────────────────────────────

/** Shape accepted in a config file; unknown keys are rejected. */
export const PartialConfigSchema = z.object({
    source: z.string().min(1).optional(),
    output: z.string().min(1).optional(),
    format: z.enum(['json', 'yaml']).optional(),
    indent: z.number().int().min(0).max(10).optional(),
    excludeDirs: z.array(z.string()).optional(),
    onError: z.enum(['throw', 'skip']).optional(),
    debug: z.boolean().optional(),
}).strict();

export type PartialConfig = z.infer<typeof PartialConfigSchema>;

// ── Merge Helper ─────────────────────────────────────────

/** Overlay a partial config on the defaults. */
export function mergeConfig(partial: PartialConfig): GeneratorConfig {
    return {
        source: partial.source ?? DEFAULT_CONFIG.source,
        ...(partial.output !== undefined ? { output: partial.output } : {}),
        format: partial.format ?? DEFAULT_CONFIG.format,
        indent: partial.indent ?? DEFAULT_CONFIG.indent,
        excludeDirs: partial.excludeDirs ?? DEFAULT_CONFIG.excludeDirs,
        onError: partial.onError ?? DEFAULT_CONFIG.onError,
        debug: partial.debug ?? DEFAULT_CONFIG.debug,
    };
}
