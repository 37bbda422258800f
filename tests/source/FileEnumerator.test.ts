/**
 * Tests for enumerateSourceFiles() — stable recursive discovery
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
    enumerateSourceFiles,
    isSourceFile,
    readSourceFile,
} from '../../src/source/FileEnumerator.js';
import { SourceReadError } from '../../src/errors.js';

describe('enumerateSourceFiles', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = join(tmpdir(), `bangdoc-enum-${Date.now()}-${Math.random().toString(36).slice(2)}`);
        await fs.mkdir(tempDir, { recursive: true });
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    async function touch(...segments: string[]): Promise<void> {
        const filePath = join(tempDir, ...segments);
        await fs.mkdir(join(filePath, '..'), { recursive: true });
        await fs.writeFile(filePath, 'export {};\n');
    }

    it('should list source files recursively in name order', async () => {
        await touch('b.ts');
        await touch('a.ts');
        await touch('users', 'handlers.tsx');
        await touch('users', 'model.mts');
        await touch('c.cts');

        const files = await enumerateSourceFiles(tempDir);

        expect(files).toEqual([
            join(tempDir, 'a.ts'),
            join(tempDir, 'b.ts'),
            join(tempDir, 'c.cts'),
            join(tempDir, 'users', 'handlers.tsx'),
            join(tempDir, 'users', 'model.mts'),
        ]);
    });

    it('should skip test, spec, declaration and non-TypeScript files', async () => {
        await touch('api.test.ts');
        await touch('api.spec.ts');
        await touch('types.d.ts');
        await touch('readme.md');
        await touch('script.js');
        await touch('api.ts');

        expect(await enumerateSourceFiles(tempDir)).toEqual([join(tempDir, 'api.ts')]);
    });

    it('should skip hidden and default-excluded directories', async () => {
        await touch('.cache', 'x.ts');
        await touch('node_modules', 'pkg', 'index.ts');
        await touch('vendor', 'lib.ts');
        await touch('testdata', 'fixture.ts');
        await touch('dist', 'out.ts');
        await touch('src', 'api.ts');

        expect(await enumerateSourceFiles(tempDir)).toEqual([join(tempDir, 'src', 'api.ts')]);
    });

    it('should replace the default exclusions with a custom list', async () => {
        await touch('vendor', 'lib.ts');
        await touch('generated', 'client.ts');

        const files = await enumerateSourceFiles(tempDir, { excludeDirs: ['generated'] });

        expect(files).toEqual([join(tempDir, 'vendor', 'lib.ts')]);
    });

    it('should return an empty list for an empty directory', async () => {
        expect(await enumerateSourceFiles(tempDir)).toEqual([]);
    });

    it('should throw SourceReadError for a missing root', async () => {
        const missing = join(tempDir, 'nope');

        await expect(enumerateSourceFiles(missing)).rejects.toBeInstanceOf(SourceReadError);
        await expect(enumerateSourceFiles(missing)).rejects.toMatchObject({
            code: 'SOURCE_READ',
            filePath: missing,
        });
    });
});

describe('isSourceFile', () => {
    it('should accept TypeScript sources only', () => {
        expect(isSourceFile('api.ts')).toBe(true);
        expect(isSourceFile('view.tsx')).toBe(true);
        expect(isSourceFile('api.test.ts')).toBe(false);
        expect(isSourceFile('types.d.ts')).toBe(false);
        expect(isSourceFile('api.js')).toBe(false);
    });
});

describe('readSourceFile', () => {
    it('should wrap read failures in SourceReadError', async () => {
        const missing = join(tmpdir(), `bangdoc-missing-${Date.now()}.ts`);

        await expect(readSourceFile(missing)).rejects.toBeInstanceOf(SourceReadError);
    });
});
