/**
 * SpecState — Accumulated Walk Results
 *
 * One mutable state per generation run. The walker folds every file into
 * it; the assembler reads it once at the end.
 *
 * @module
 */
import type {
    ExternalDocsObject,
    HttpMethod,
    InfoObject,
    JsonValue,
    ParameterObject,
    RequestBodyObject,
    ResponseObject,
    SchemaNode,
    SecurityRequirement,
    SecuritySchemeObject,
    ServerObject,
    TagObject,
} from '../document/types.js';

/** OpenAPI version used when no `!api` line overrides it */
export const DEFAULT_OPENAPI_VERSION = '3.0.3';

/** One `!link` line, rendered into the info description */
export interface LinkRecord {
    readonly label: string;
    readonly url: string;
}

/** Operation folded from one routine's doc comment */
export interface OperationRecord {
    method?: HttpMethod;
    path?: string;
    operationId?: string;
    summary?: string;
    description?: string;
    tags: string[];
    deprecated: boolean;
    parameters: ParameterObject[];
    requestBody?: RequestBodyObject;
    /** Status code → response, in first-declared order */
    responses: Map<string, ResponseObject>;
    security: SecurityRequirement[];
}

/** A named component schema */
export interface SchemaRecord {
    readonly name: string;
    readonly schema: SchemaNode;
    /** Property name → example, from `!field … example=` */
    readonly examples: Record<string, JsonValue>;
}

export interface SpecState {
    version: string;
    info: InfoObject;
    servers: ServerObject[];
    tags: TagObject[];
    operations: OperationRecord[];
    /** Declared with `!schema`; wins over models of the same name */
    explicitSchemas: Map<string, SchemaRecord>;
    /** Built from `!model` records */
    globalSchemas: Map<string, SchemaRecord>;
    securitySchemes: Map<string, SecuritySchemeObject>;
    externalDocs?: ExternalDocsObject;
    links: LinkRecord[];
}

export function createSpecState(): SpecState {
    return {
        version: DEFAULT_OPENAPI_VERSION,
        info: { title: '', version: '' },
        servers: [],
        tags: [],
        operations: [],
        explicitSchemas: new Map(),
        globalSchemas: new Map(),
        securitySchemes: new Map(),
        links: [],
    };
}

export function createOperationRecord(): OperationRecord {
    return {
        tags: [],
        deprecated: false,
        parameters: [],
        responses: new Map(),
        security: [],
    };
}
