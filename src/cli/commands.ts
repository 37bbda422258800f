/**
 * CLI Commands — Argument Parsing and `generate`
 *
 * Kept apart from the `bin` entry so the commands run in-process.
 *
 * @module
 */
import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { loadConfig, applyCliOverrides, type CliOverrides } from '../config/ConfigLoader.js';
import { PartialConfigSchema, type GeneratorConfig } from '../config/GeneratorConfig.js';
import { ConfigValidationError } from '../errors.js';
import { createDebugObserver, formatDebugEvent } from '../observability/DebugObserver.js';
import { formatDocument, parseFormat } from '../output/OutputFormatter.js';
import { generateFromDirectory, type GenerateResult } from '../pipeline/generate.js';

export const VERSION = '0.1.0';

// ── Arg Parsing ──────────────────────────────────────────

export interface RawCliArgs {
    readonly command: string;
    readonly source?: string;
    readonly output?: string;
    readonly format?: string;
    readonly indent?: string;
    readonly config?: string;
    readonly debug: boolean;
}

/** Parse `process.argv`-shaped input (node binary and script first). */
export function parseArgs(argv: readonly string[]): RawCliArgs {
    const args = argv.slice(2);
    const command = args[0] ?? '';

    const result: Record<string, string | undefined> = {};
    let debug = false;

    for (let i = 1; i < args.length; i++) {
        const arg = args[i];
        switch (arg) {
            case '-s':
            case '--source':
                result['source'] = args[++i];
                break;
            case '-o':
            case '--output':
                result['output'] = args[++i];
                break;
            case '-f':
            case '--format':
                result['format'] = args[++i];
                break;
            case '--indent':
                result['indent'] = args[++i];
                break;
            case '-c':
            case '--config':
                result['config'] = args[++i];
                break;
            case '--debug':
                debug = true;
                break;
        }
    }

    return {
        command,
        ...(result['source'] !== undefined ? { source: result['source'] } : {}),
        ...(result['output'] !== undefined ? { output: result['output'] } : {}),
        ...(result['format'] !== undefined ? { format: result['format'] } : {}),
        ...(result['indent'] !== undefined ? { indent: result['indent'] } : {}),
        ...(result['config'] !== undefined ? { config: result['config'] } : {}),
        debug,
    };
}

// ── Commands ─────────────────────────────────────────────

/** Where the CLI writes; swapped out in tests */
export interface CliIO {
    readonly out: (text: string) => void;
    readonly err: (text: string) => void;
    readonly cwd: string;
}

export const PROCESS_IO: CliIO = {
    out: text => process.stdout.write(text),
    err: text => process.stderr.write(text),
    get cwd() { return process.cwd(); },
};

/**
 * Run one CLI invocation.
 *
 * @returns Process exit code
 */
export async function runCli(argv: readonly string[], io: CliIO = PROCESS_IO): Promise<number> {
    const args = parseArgs(argv);

    switch (args.command) {
        case 'generate':
            return runGenerate(args, io);
        case 'version':
        case '--version':
            io.out(`bangdoc ${VERSION}\n`);
            return 0;
        case 'help':
        case '--help':
        case '':
            io.out(HELP_TEXT);
            return 0;
        default:
            io.err(`Unknown command: "${args.command}". Use --help for usage.\n`);
            return 1;
    }
}

async function runGenerate(args: RawCliArgs, io: CliIO): Promise<number> {
    let config: GeneratorConfig;
    try {
        config = applyCliOverrides(loadConfig(args.config, io.cwd), toOverrides(args));
    } catch (err) {
        io.err(`Error: ${errorMessage(err)}\n`);
        return 1;
    }

    const debug = config.debug
        ? createDebugObserver(event => io.err(`${formatDebugEvent(event)}\n`))
        : undefined;

    let result: GenerateResult;
    try {
        result = await generateFromDirectory(resolve(io.cwd, config.source), {
            ...(debug ? { debug } : {}),
            onError: config.onError,
            excludeDirs: config.excludeDirs,
        });
    } catch (err) {
        io.err(`Error: ${errorMessage(err)}\n`);
        return 1;
    }

    if (isEmptyResult(result)) {
        io.err(`Error: no annotations found in "${config.source}".\n`);
        return 1;
    }

    const text = formatDocument(result.document, { format: config.format, indent: config.indent });

    if (config.output === undefined) {
        io.out(text);
        return 0;
    }

    const outPath = resolve(io.cwd, config.output);
    try {
        mkdirSync(dirname(outPath), { recursive: true });
        writeFileSync(outPath, text, 'utf-8');
    } catch (err) {
        io.err(`Error: cannot write "${outPath}": ${errorMessage(err)}\n`);
        return 1;
    }
    io.err(`Wrote ${outPath} (${result.files.length} files, ${result.state.operations.length} operations)\n`);
    return 0;
}

// ── Internal ─────────────────────────────────────────────

/** @throws {ConfigValidationError} For an `--indent` the config schema rejects */
function toOverrides(args: RawCliArgs): CliOverrides {
    const indent = args.indent !== undefined ? parseIndent(args.indent) : undefined;
    return {
        ...(args.source !== undefined ? { source: args.source } : {}),
        ...(args.output !== undefined ? { output: args.output } : {}),
        ...(args.format !== undefined ? { format: parseFormat(args.format) } : {}),
        ...(indent !== undefined ? { indent } : {}),
        ...(args.debug ? { debug: true } : {}),
    };
}

function parseIndent(value: string): number | undefined {
    const text = value.trim();
    const parsed = PartialConfigSchema.pick({ indent: true }).safeParse({
        indent: text.length > 0 ? Number(text) : Number.NaN,
    });
    if (!parsed.success) throw new ConfigValidationError('--indent', parsed.error);
    return parsed.data.indent;
}

function isEmptyResult(result: GenerateResult): boolean {
    const { document } = result;
    return document.info.title === ''
        && Object.keys(document.paths).length === 0
        && Object.keys(document.components?.schemas ?? {}).length === 0;
}

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

const HELP_TEXT = `
bangdoc — OpenAPI documents from \`!\` comment annotations

USAGE:
  bangdoc generate [options]

COMMANDS:
  generate    Scan a source tree and print or write the OpenAPI document
  version     Print the version
  help        Show this help message

OPTIONS:
  -s, --source <dir>      Directory to scan (default: .)
  -o, --output <file>     Output file (default: stdout)
  -f, --format <fmt>      json | yaml (default: yaml)
  --indent <n>            Spaces per indentation level (default: 2)
  -c, --config <file>     Config file (default: auto-detect bangdoc.yaml)
  --debug                 Print debug events to stderr

CONFIG FILE (bangdoc.yaml):
  source: ./src
  output: ./openapi.yaml
  format: yaml
  indent: 2
  excludeDirs: [node_modules, vendor, testdata, dist]
  onError: throw          # throw | skip
  debug: false

EXAMPLES:
  bangdoc generate -s ./src -o openapi.yaml
  bangdoc generate -s ./api -f json --indent 4 > openapi.json
`;
