/**
 * FileEnumerator — Source File Discovery
 *
 * Recursive directory walk in a stable order (entries sorted by name),
 * so two runs over the same tree visit files in the same sequence.
 *
 * ```
 * src/
 * ├── .cache/          → skipped (hidden)
 * ├── node_modules/    → skipped (excluded)
 * ├── api.ts           → included
 * ├── api.test.ts      → skipped (test file)
 * ├── types.d.ts       → skipped (declarations)
 * └── users/
 *     └── handlers.tsx → included
 * ```
 *
 * @module
 */
import { promises as fs, type Dirent } from 'node:fs';
import { join, resolve } from 'node:path';
import { SourceReadError } from '../errors.js';

/** Directory names skipped unless the caller passes its own list */
export const DEFAULT_EXCLUDED_DIRS: readonly string[] = ['node_modules', 'vendor', 'testdata', 'dist'];

const SOURCE_PATTERN = /\.(ts|tsx|mts|cts)$/;
const EXCLUDED_PATTERN = /\.(test|spec|d)\./;

export interface EnumerateOptions {
    /** Directory names to skip at any depth below the root */
    readonly excludeDirs?: readonly string[];
}

// ── Public API ───────────────────────────────────────────

/**
 * List every source file under `root`.
 *
 * @returns Absolute paths in walk order
 * @throws {SourceReadError} When a directory cannot be listed
 */
export async function enumerateSourceFiles(root: string, options: EnumerateOptions = {}): Promise<string[]> {
    const excluded = new Set(options.excludeDirs ?? DEFAULT_EXCLUDED_DIRS);
    return walkDir(resolve(root), excluded);
}

/** Whether a file name is a scannable source file */
export function isSourceFile(name: string): boolean {
    return SOURCE_PATTERN.test(name) && !EXCLUDED_PATTERN.test(name);
}

/**
 * Read one source file as UTF-8.
 *
 * @throws {SourceReadError} Carrying the path and the underlying error
 */
export async function readSourceFile(filePath: string): Promise<string> {
    try {
        return await fs.readFile(filePath, 'utf-8');
    } catch (err) {
        throw new SourceReadError(filePath, err);
    }
}

// ── Internal ─────────────────────────────────────────────

async function walkDir(dir: string, excluded: ReadonlySet<string>): Promise<string[]> {
    let entries: Dirent[];
    try {
        entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
        throw new SourceReadError(dir, err);
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    const files: string[] = [];

    for (const entry of entries) {
        const fullPath = join(dir, entry.name);

        if (entry.isDirectory()) {
            if (entry.name.startsWith('.') || excluded.has(entry.name)) continue;
            files.push(...await walkDir(fullPath, excluded));
        } else if (entry.isFile() && isSourceFile(entry.name)) {
            files.push(fullPath);
        }
    }

    return files;
}
