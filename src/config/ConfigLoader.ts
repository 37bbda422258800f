/**
 * ConfigLoader — YAML/JSON Configuration File Reader
 *
 * Loads `bangdoc.yaml` from cwd or a specified path, validates it, and
 * merges it with defaults. CLI args override file values.
 *
 * @module
 */
import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigNotFoundError, ConfigParseError, ConfigValidationError } from '../errors.js';
import type { OutputFormat } from '../output/OutputFormatter.js';
import { mergeConfig, PartialConfigSchema, type GeneratorConfig } from './GeneratorConfig.js';

// ── Filename Conventions ─────────────────────────────────

export const CONFIG_FILENAMES: readonly string[] = [
    'bangdoc.yaml',
    'bangdoc.yml',
    'bangdoc.json',
];

// ── Public API ───────────────────────────────────────────

/**
 * Load configuration from a YAML/JSON file.
 *
 * Priority:
 *   1. Explicit `configPath` argument
 *   2. Auto-detect `bangdoc.yaml` / `.yml` / `.json` in `cwd`
 *   3. Fall back to all defaults
 *
 * @throws {ConfigNotFoundError} When an explicit path does not exist
 * @throws {ConfigParseError} When the file is not well-formed JSON/YAML
 * @throws {ConfigValidationError} When the file content is not a valid config
 */
export function loadConfig(configPath?: string, cwd?: string): GeneratorConfig {
    const workDir = cwd ?? process.cwd();

    if (configPath) {
        const absPath = resolve(workDir, configPath);
        if (!existsSync(absPath)) {
            throw new ConfigNotFoundError(absPath);
        }
        return parseConfigFile(absPath);
    }

    for (const filename of CONFIG_FILENAMES) {
        const candidate = join(workDir, filename);
        if (existsSync(candidate)) {
            return parseConfigFile(candidate);
        }
    }

    return mergeConfig({});
}

/** CLI arguments that can override config file values */
export interface CliOverrides {
    readonly source?: string;
    readonly output?: string;
    readonly format?: OutputFormat;
    readonly indent?: number;
    readonly debug?: boolean;
}

/**
 * Merge a loaded config with CLI argument overrides.
 *
 * CLI args take precedence over file values.
 */
export function applyCliOverrides(config: GeneratorConfig, cli: CliOverrides): GeneratorConfig {
    return {
        ...config,
        ...(cli.source !== undefined ? { source: cli.source } : {}),
        ...(cli.output !== undefined ? { output: cli.output } : {}),
        ...(cli.format !== undefined ? { format: cli.format } : {}),
        ...(cli.indent !== undefined ? { indent: cli.indent } : {}),
        ...(cli.debug !== undefined ? { debug: cli.debug } : {}),
    };
}

// ── Internal ─────────────────────────────────────────────

function parseConfigFile(filePath: string): GeneratorConfig {
    const content = readFileSync(filePath, 'utf-8');
    let raw: unknown;
    try {
        raw = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
        throw new ConfigParseError(filePath, err);
    }

    // An empty YAML file parses to null
    const parsed = PartialConfigSchema.safeParse(raw ?? {});
    if (!parsed.success) {
        throw new ConfigValidationError(filePath, parsed.error);
    }
    return mergeConfig(parsed.data);
}
