/**
 * bangdoc — Root Barrel Export
 *
 * Public API for programmatic usage.
 *
 * @example
 * ```typescript
 * import { generateFromDirectory, formatDocument } from 'bangdoc';
 *
 * const { document } = await generateFromDirectory('./src');
 * process.stdout.write(formatDocument(document, { format: 'yaml', indent: 2 }));
 * ```
 *
 * @module
 */

// ── Annotation Language ──────────────────────────────────
export { tokenizeLine, tokenText } from './annotation/Lexer.js';
export type { Token } from './annotation/Lexer.js';
export {
    parseAnnotationBlock, parseAnnotations, parseAnnotationLine,
    isAnnotationLine, stripAnnotations, ANNOTATION_MARKER,
} from './annotation/AnnotationParser.js';
export type * from './annotation/types.js';
export { parseValue, parseEnum } from './annotation/values.js';

// ── Type Resolver ────────────────────────────────────────
export { parseTypeExpr, formatTypeExpr } from './resolver/TypeExpr.js';
export type { TypeExpr } from './resolver/TypeExpr.js';
export { resolveType, resolveTypeName, resolveSchemaRef, refTo, PRIMITIVE_TYPES } from './resolver/TypeResolver.js';

// ── Walker & Assembler ───────────────────────────────────
export { walkFile, buildSecurityScheme, NO_BODY_TOKENS } from './walker/DeclarationWalker.js';
export { createSpecState, DEFAULT_OPENAPI_VERSION } from './walker/SpecState.js';
export type { SpecState, OperationRecord, SchemaRecord, LinkRecord } from './walker/SpecState.js';
export type { SourceDeclarations, RoutineDecl, RecordDecl, FieldDecl } from './walker/declarations.js';
export { readSerializationTag } from './walker/SerializationTag.js';
export { assembleDocument, appendLinks } from './assembler/SpecAssembler.js';

// ── Source ───────────────────────────────────────────────
export { scanSource, lowerType } from './source/SourceScanner.js';
export { enumerateSourceFiles, readSourceFile, DEFAULT_EXCLUDED_DIRS } from './source/FileEnumerator.js';

// ── Pipeline & Output ────────────────────────────────────
export { generateFromDirectory, generateFromSources } from './pipeline/generate.js';
export type { GenerateOptions, GenerateResult, ErrorPolicy } from './pipeline/generate.js';
export { formatDocument, parseFormat } from './output/OutputFormatter.js';
export type { OutputFormat, FormatOptions } from './output/OutputFormatter.js';

// ── Config ───────────────────────────────────────────────
export { mergeConfig, DEFAULT_CONFIG } from './config/GeneratorConfig.js';
export type { GeneratorConfig, PartialConfig } from './config/GeneratorConfig.js';
export { loadConfig, applyCliOverrides } from './config/ConfigLoader.js';
export type { CliOverrides } from './config/ConfigLoader.js';

// ── Observability & Errors ───────────────────────────────
export { createDebugObserver, formatDebugEvent } from './observability/DebugObserver.js';
export type { DebugEvent, DebugObserverFn } from './observability/DebugObserver.js';
export {
    BangdocError, SourceReadError, ConfigNotFoundError, ConfigParseError,
    ConfigValidationError, OutputFormatError,
} from './errors.js';
export type { BangdocErrorCode } from './errors.js';
export type * from './document/types.js';
