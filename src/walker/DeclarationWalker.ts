/**
 * DeclarationWalker — Fold One File's Declarations into SpecState
 *
 * Three passes per file:
 *   1. Every comment group: API-level annotations (info, servers, tags,
 *      security schemes, scopes, explicit `!schema` blocks)
 *   2. Every routine doc: one operation per routine, kept only when a
 *      route annotation set both method and path
 *   3. Every record doc carrying `!model`: one global schema
 *
 * Nothing here throws on bad input. Dropped lines, dropped operations,
 * dropped scopes and duplicate schema names are reported through the
 * optional debug observer.
 *
 * @module
 */
import { parseAnnotationBlock, stripAnnotations, ANNOTATION_MARKER } from '../annotation/AnnotationParser.js';
import type {
    Annotation, FieldAnnotation, ModelAnnotation, ParamAnnotation, PropAnnotation,
    ResponseAnnotation, ScopeAnnotation, SecurityAnnotation,
} from '../annotation/types.js';
import type {
    JsonValue, OAuthFlowObject, OAuthFlowsObject, ParameterObject, ResponseObject, SchemaNode,
    SecuritySchemeObject,
} from '../document/types.js';
import { getEntry, hasEntry, setEntry } from '../document/entries.js';
import type { DebugObserverFn } from '../observability/DebugObserver.js';
import { parseTypeExpr } from '../resolver/TypeExpr.js';
import { isRef, resolveSchemaRef, resolveType } from '../resolver/TypeResolver.js';
import type { FieldDecl, RecordDecl, RoutineDecl, SourceDeclarations } from './declarations.js';
import { readSerializationTag } from './SerializationTag.js';
import { createOperationRecord, type OperationRecord, type SchemaRecord, type SpecState } from './SpecState.js';

/** Response schema tokens that mean "no body" */
export const NO_BODY_TOKENS: ReadonlySet<string> = new Set(['', '-', 'nil', 'none', 'null']);

// ── Public API ───────────────────────────────────────────

/**
 * Walk one file's declarations and fold them into `state`.
 *
 * @param state - Run-scoped accumulator, mutated in place
 * @param file - Declarations produced by a source scanner
 * @param debug - Optional observer for dropped input
 */
export function walkFile(state: SpecState, file: SourceDeclarations, debug?: DebugObserverFn): void {
    debug?.({
        type: 'file',
        path: file.path,
        comments: file.comments.length,
        routines: file.routines.length,
        records: file.records.length,
        timestamp: Date.now(),
    });

    for (const comment of file.comments) {
        walkComment(state, comment, file.path, debug);
    }
    for (const routine of file.routines) {
        walkRoutine(state, routine, file.path, debug);
    }
    for (const record of file.records) {
        walkRecord(state, record, file.path, debug);
    }
}

// ── Pass 1: API-level ────────────────────────────────────

function walkComment(state: SpecState, comment: string, path: string, debug?: DebugObserverFn): void {
    if (!comment.includes(ANNOTATION_MARKER)) return;

    const block = parseAnnotationBlock(comment);
    // Doc comments are comment groups too, so dropped lines are reported here only
    for (const line of block.skipped) {
        debug?.({ type: 'line-skipped', line: line.line, reason: line.reason, timestamp: Date.now() });
    }

    let openSchema: SchemaRecord | undefined;

    for (const annotation of block.annotations) {
        switch (annotation.kind) {
            case 'api':
                state.version = annotation.version;
                break;

            case 'info':
                state.info.title = annotation.title;
                state.info.version = annotation.version;
                if (annotation.description !== undefined) state.info.description = annotation.description;
                else delete state.info.description;
                break;

            case 'contact':
                state.info.contact = {
                    ...(annotation.name !== undefined ? { name: annotation.name } : {}),
                    ...(annotation.email !== undefined ? { email: annotation.email } : {}),
                    ...(annotation.url !== undefined ? { url: annotation.url } : {}),
                };
                break;

            case 'license':
                state.info.license = {
                    name: annotation.name,
                    ...(annotation.url !== undefined ? { url: annotation.url } : {}),
                };
                break;

            case 'tos':
                state.info.termsOfService = annotation.url;
                break;

            case 'server':
                state.servers.push({
                    url: annotation.url,
                    ...(annotation.description !== undefined ? { description: annotation.description } : {}),
                });
                break;

            case 'tag':
                state.tags.push({
                    name: annotation.name,
                    ...(annotation.description !== undefined ? { description: annotation.description } : {}),
                });
                break;

            case 'externalDocs':
                state.externalDocs = {
                    url: annotation.url,
                    ...(annotation.description !== undefined ? { description: annotation.description } : {}),
                };
                break;

            case 'link':
                state.links.push({ label: annotation.label, url: annotation.url });
                break;

            case 'security':
                state.securitySchemes.set(annotation.name, buildSecurityScheme(annotation));
                break;

            case 'scope':
                addScope(state, annotation, debug);
                break;

            case 'schema':
                openSchema = openExplicitSchema(state, annotation.name, annotation.description, path, debug);
                break;

            case 'prop':
                if (openSchema) addProp(openSchema, annotation);
                break;

            // Operation- and model-level kinds belong to routine and record docs
            case 'route':
            case 'param':
            case 'body':
            case 'response':
            case 'secure':
            case 'model':
            case 'field':
                break;

            default: {
                const unreachable: never = annotation;
                return unreachable;
            }
        }
    }
}

// ── Security ─────────────────────────────────────────────

const API_KEY_LOCATIONS = ['header', 'query', 'cookie'] as const;
type ApiKeyLocation = typeof API_KEY_LOCATIONS[number];

const OAUTH_FLOWS = ['implicit', 'password', 'clientCredentials', 'authorizationCode'] as const;

/**
 * Build a scheme object from `!security` arguments.
 *
 * | type            | args                                   |
 * |-----------------|----------------------------------------|
 * | `apiKey`        | `<header/query/cookie> [paramName]`     |
 * | `http`          | `<scheme>` (`bearer`, `basic`, …)       |
 * | `oauth2`        | `<flow> <url> [tokenUrl]`              |
 * | `openIdConnect` | `<discoveryUrl>`                       |
 */
export function buildSecurityScheme(annotation: SecurityAnnotation): SecuritySchemeObject {
    const description = annotation.description !== undefined ? { description: annotation.description } : {};
    const [first, second, third] = annotation.args;

    switch (annotation.schemeType) {
        case 'apiKey':
            return {
                type: 'apiKey',
                in: toApiKeyLocation(first),
                name: second ?? annotation.name,
                ...description,
            };

        case 'http':
            return {
                type: 'http',
                scheme: first ?? 'bearer',
                ...(annotation.bearerFormat !== undefined ? { bearerFormat: annotation.bearerFormat } : {}),
                ...description,
            };

        case 'oauth2':
            return { type: 'oauth2', flows: buildFlows(first, second, third), ...description };

        case 'openIdConnect':
            return {
                type: 'openIdConnect',
                openIdConnectUrl: annotation.args.find(isUrl) ?? first ?? '',
                ...description,
            };
    }
}

function toApiKeyLocation(value: string | undefined): ApiKeyLocation {
    const lower = value?.toLowerCase();
    return API_KEY_LOCATIONS.find(l => l === lower) ?? 'header';
}

function buildFlows(flow: string | undefined, url: string | undefined, tokenUrl: string | undefined): OAuthFlowsObject {
    const known = OAUTH_FLOWS.find(f => f.toLowerCase() === flow?.toLowerCase());

    switch (known) {
        case 'implicit':
            return { implicit: { authorizationUrl: url ?? '', scopes: {} } };
        case 'password':
            return { password: { tokenUrl: url ?? '', scopes: {} } };
        case 'clientCredentials':
            return { clientCredentials: { tokenUrl: url ?? '', scopes: {} } };
        case 'authorizationCode':
            return { authorizationCode: { authorizationUrl: url ?? '', tokenUrl: tokenUrl ?? url ?? '', scopes: {} } };
        case undefined: {
            // Unknown flow name: a URL anywhere still gives an implicit flow
            const fallback = [flow, url].find(isUrl);
            return fallback !== undefined ? { implicit: { authorizationUrl: fallback, scopes: {} } } : {};
        }
    }
}

function isUrl(value: string | undefined): value is string {
    return value !== undefined && /^https?:\/\//i.test(value);
}

function addScope(state: SpecState, annotation: ScopeAnnotation, debug?: DebugObserverFn): void {
    const scheme = state.securitySchemes.get(annotation.scheme);
    const flows: OAuthFlowObject[] = scheme?.type === 'oauth2'
        ? OAUTH_FLOWS.flatMap(name => scheme.flows[name] ?? [])
        : [];

    if (flows.length === 0) {
        debug?.({ type: 'scope-dropped', scheme: annotation.scheme, scope: annotation.name, timestamp: Date.now() });
        return;
    }

    for (const flow of flows) {
        setEntry(flow.scopes, annotation.name, annotation.description);
    }
}

// ── Explicit Schemas ─────────────────────────────────────

function openExplicitSchema(
    state: SpecState,
    name: string,
    description: string | undefined,
    path: string,
    debug?: DebugObserverFn,
): SchemaRecord | undefined {
    if (state.explicitSchemas.has(name)) {
        debug?.({ type: 'schema-duplicate', name, collection: 'explicit', path, timestamp: Date.now() });
        return undefined;
    }

    const record: SchemaRecord = {
        name,
        schema: {
            type: 'object',
            ...(description !== undefined ? { description } : {}),
            properties: {},
        },
        examples: {},
    };
    state.explicitSchemas.set(name, record);
    return record;
}

function addProp(record: SchemaRecord, prop: PropAnnotation): void {
    const node = resolveType(parseTypeExpr(prop.type));
    const properties = record.schema.properties ?? (record.schema.properties = {});
    setEntry(properties, prop.name, node);
    applyPropertyDetails(record, prop.name, node, prop);
}

// ── Pass 2: Operations ───────────────────────────────────

function walkRoutine(state: SpecState, routine: RoutineDecl, path: string, debug?: DebugObserverFn): void {
    if (routine.doc === undefined || !routine.doc.includes(ANNOTATION_MARKER)) return;

    const { annotations } = parseAnnotationBlock(routine.doc);
    if (annotations.length === 0) return;

    const operation = createOperationRecord();
    let operationLevel = false;

    for (const annotation of annotations) {
        if (foldOperation(operation, annotation)) operationLevel = true;
    }

    if (operation.method === undefined || !operation.path) {
        if (operationLevel) {
            debug?.({ type: 'operation-dropped', path, routine: routine.name, timestamp: Date.now() });
        }
        return;
    }

    const description = stripAnnotations(routine.doc);
    if (description.length > 0) operation.description = description;

    state.operations.push(operation);
}

/**
 * Apply one annotation to an operation under construction.
 *
 * @returns `true` when the annotation is operation-level
 */
function foldOperation(operation: OperationRecord, annotation: Annotation): boolean {
    switch (annotation.kind) {
        case 'route':
            operation.method = annotation.method;
            operation.path = annotation.path;
            if (annotation.operationId !== undefined) operation.operationId = annotation.operationId;
            else delete operation.operationId;
            if (annotation.summary !== undefined) operation.summary = annotation.summary;
            else delete operation.summary;
            operation.tags = [...annotation.tags];
            operation.deprecated = annotation.deprecated;
            return true;

        case 'param':
            operation.parameters.push(buildParameter(annotation));
            return true;

        case 'body':
            operation.requestBody = {
                ...(annotation.description !== undefined ? { description: annotation.description } : {}),
                ...(annotation.required ? { required: true } : {}),
                content: { [annotation.mediaType]: { schema: resolveSchemaRef(annotation.schema) } },
            };
            return true;

        case 'response':
            operation.responses.set(annotation.status, buildResponse(annotation));
            return true;

        case 'secure':
            for (const scheme of annotation.schemes) {
                operation.security.push({ [scheme]: [] });
            }
            return true;

        default:
            return false;
    }
}

function buildParameter(annotation: ParamAnnotation): ParameterObject {
    const schema = resolveType(parseTypeExpr(annotation.type));
    if (annotation.enum !== undefined && !isRef(schema)) schema.enum = [...annotation.enum];

    return {
        name: annotation.name,
        in: annotation.in,
        ...(annotation.description !== undefined ? { description: annotation.description } : {}),
        required: annotation.required || annotation.in === 'path',
        schema,
        ...(annotation.default !== undefined ? { example: annotation.default } : {}),
    };
}

function buildResponse(annotation: ResponseAnnotation): ResponseObject {
    const description = annotation.description ?? '';
    if (NO_BODY_TOKENS.has(annotation.schema.toLowerCase())) return { description };
    return {
        description,
        content: { 'application/json': { schema: resolveSchemaRef(annotation.schema) } },
    };
}

// ── Pass 3: Models ───────────────────────────────────────

function walkRecord(state: SpecState, record: RecordDecl, path: string, debug?: DebugObserverFn): void {
    if (!record.isStruct || record.doc === undefined || !record.doc.includes(ANNOTATION_MARKER)) return;

    const { annotations } = parseAnnotationBlock(record.doc);
    const model = annotations.find((a): a is ModelAnnotation => a.kind === 'model');
    if (model === undefined) return;

    if (state.globalSchemas.has(record.name)) {
        debug?.({ type: 'schema-duplicate', name: record.name, collection: 'global', path, timestamp: Date.now() });
        return;
    }

    const schemaRecord = buildModel(record, model.description);

    // `!field` lines on the record itself apply by property name
    for (const annotation of annotations) {
        if (annotation.kind === 'field') applyFieldAnnotation(schemaRecord, annotation, undefined);
    }

    state.globalSchemas.set(record.name, schemaRecord);
}

function buildModel(record: RecordDecl, description: string | undefined): SchemaRecord {
    const properties: Record<string, SchemaNode> = {};
    const required: string[] = [];
    const schemaRecord: SchemaRecord = {
        name: record.name,
        schema: {
            type: 'object',
            ...(description !== undefined ? { description } : {}),
            properties,
        },
        examples: {},
    };

    const annotated: Array<{ readonly field: FieldDecl; readonly key: string }> = [];

    for (const field of record.fields) {
        const tag = readSerializationTag(field);
        if (tag.excluded) continue;

        const node = resolveType(field.type);
        const fieldDescription = describeField(field);
        if (fieldDescription.length > 0 && node.description === undefined) {
            node.description = fieldDescription;
        }

        setEntry(properties, tag.name, node);
        if (!tag.omitEmpty && !required.includes(tag.name)) required.push(tag.name);
        if (field.doc?.includes(ANNOTATION_MARKER)) annotated.push({ field, key: tag.name });
    }

    if (required.length > 0) schemaRecord.schema.required = required;

    for (const { field, key } of annotated) {
        for (const annotation of parseAnnotationBlock(field.doc ?? '').annotations) {
            if (annotation.kind === 'field') applyFieldAnnotation(schemaRecord, annotation, key);
        }
    }

    return schemaRecord;
}

/** Doc comment prose, else the trailing comment */
function describeField(field: FieldDecl): string {
    const fromDoc = stripAnnotations(field.doc ?? '');
    if (fromDoc.length > 0) return fromDoc;
    return stripAnnotations(field.comment ?? '');
}

/**
 * Apply a `!field` line. The target is the property named by the
 * annotation; inside a field's own doc it falls back to that field.
 */
function applyFieldAnnotation(record: SchemaRecord, annotation: FieldAnnotation, fallbackKey: string | undefined): void {
    const properties = record.schema.properties ?? {};
    const key = hasEntry(properties, annotation.name) ? annotation.name : fallbackKey;
    if (key === undefined) return;

    const node = getEntry(properties, key);
    if (node === undefined) return;

    applyPropertyDetails(record, key, node, annotation);
}

interface PropertyDetails {
    readonly description?: string;
    readonly required: boolean;
    readonly example?: JsonValue;
    readonly enum?: readonly JsonValue[];
}

function applyPropertyDetails(record: SchemaRecord, key: string, node: SchemaNode, details: PropertyDetails): void {
    if (details.description !== undefined) node.description = details.description;

    if (details.example !== undefined) {
        node.example = details.example;
        setEntry(record.examples, key, details.example);
    }

    if (details.enum !== undefined && !isRef(node)) node.enum = [...details.enum];

    if (details.required) {
        const required = record.schema.required ?? (record.schema.required = []);
        if (!required.includes(key)) required.push(key);
    }
}
