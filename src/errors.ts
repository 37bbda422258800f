/**
 * Error Types — Hard Failures Outside the Annotation Core
 *
 * The annotation core never throws for malformed input; it drops the
 * offending line or declaration and continues. The errors below cover
 * the few places where the run cannot continue on its own: reading a
 * source file, loading a config file, and picking an output format.
 *
 * @example
 * ```typescript
 * try {
 *     await generateFromDirectory('./src');
 * } catch (e) {
 *     if (e instanceof SourceReadError) {
 *         console.error(e.filePath, e.cause);
 *     }
 * }
 * ```
 *
 * @module
 */
import type { ZodError } from 'zod';

/** Machine-readable error codes */
export type BangdocErrorCode =
    | 'SOURCE_READ'
    | 'CONFIG_NOT_FOUND'
    | 'CONFIG_PARSE'
    | 'CONFIG_INVALID'
    | 'OUTPUT_FORMAT';

/** Base class for every error raised by bangdoc. */
export class BangdocError extends Error {
    readonly code: BangdocErrorCode;

    constructor(message: string, code: BangdocErrorCode, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'BangdocError';
        this.code = code;
    }
}

/**
 * A source file could not be read or enumerated.
 *
 * The pipeline rethrows this by default; with `onError: 'skip'` the
 * file is reported through the debug observer and the run continues.
 */
export class SourceReadError extends BangdocError {
    readonly filePath: string;

    constructor(filePath: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Failed to read "${filePath}": ${reason}`, 'SOURCE_READ', { cause });
        this.name = 'SourceReadError';
        this.filePath = filePath;
    }
}

/** An explicitly requested config file does not exist. */
export class ConfigNotFoundError extends BangdocError {
    readonly configPath: string;

    constructor(configPath: string) {
        super(`Config file not found: "${configPath}"`, 'CONFIG_NOT_FOUND');
        this.name = 'ConfigNotFoundError';
        this.configPath = configPath;
    }
}

/** A config file exists but is not well-formed JSON or YAML. */
export class ConfigParseError extends BangdocError {
    readonly configPath: string;

    constructor(configPath: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Cannot parse config "${configPath}": ${reason}`, 'CONFIG_PARSE', { cause });
        this.name = 'ConfigParseError';
        this.configPath = configPath;
    }
}

/**
 * A config file was found but its content does not match the
 * configuration schema. The message lists every failing field.
 */
export class ConfigValidationError extends BangdocError {
    readonly configPath: string;

    constructor(configPath: string, zodError: ZodError) {
        const fieldErrors = zodError.issues
            .map(issue => {
                const path = issue.path.length > 0
                    ? `'${issue.path.join('.')}'`
                    : '(root)';
                return `  • ${path}: ${issue.message}`;
            })
            .join('\n');

        super(`Invalid config "${configPath}":\n${fieldErrors}`, 'CONFIG_INVALID', { cause: zodError });
        this.name = 'ConfigValidationError';
        this.configPath = configPath;
    }
}

/** The requested output format is not `json` or `yaml`. */
export class OutputFormatError extends BangdocError {
    readonly format: string;

    constructor(format: string) {
        super(`Unsupported output format: "${format}". Use "json" or "yaml".`, 'OUTPUT_FORMAT');
        this.name = 'OutputFormatError';
        this.format = format;
    }
}
