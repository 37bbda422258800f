/**
 * OpenAPI Document Types
 *
 * The subset of the OpenAPI 3.0 object model that the generator
 * produces. These types are shared by the walker (which fills schema
 * nodes, parameters and security schemes into `SpecState`) and the
 * assembler (which emits the final {@link OpenApiDocument}).
 *
 * @module
 */

// ── JSON Values ──────────────────────────────────────────

/** Any value that survives a JSON round trip */
export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

// ── Schema Node ──────────────────────────────────────────

/** OpenAPI base types. Annotations never declare multi-type unions. */
export type SchemaType = 'string' | 'integer' | 'number' | 'boolean' | 'array' | 'object';

/**
 * Recursive schema node.
 *
 * A node with `$ref` carries nothing else except an optional
 * `description`; a node is either "this is schema X" or an inline shape.
 */
export interface SchemaNode {
    $ref?: string;
    type?: SchemaType;
    format?: string;
    description?: string;
    nullable?: boolean;
    items?: SchemaNode;
    additionalProperties?: SchemaNode;
    properties?: Record<string, SchemaNode>;
    /** Insertion-ordered, no duplicates */
    required?: string[];
    example?: JsonValue;
    enum?: JsonValue[];
}

// ── Info ─────────────────────────────────────────────────

export interface ContactObject {
    name?: string;
    email?: string;
    url?: string;
}

export interface LicenseObject {
    name: string;
    url?: string;
}

export interface InfoObject {
    title: string;
    version: string;
    description?: string;
    termsOfService?: string;
    contact?: ContactObject;
    license?: LicenseObject;
}

export interface ServerObject {
    url: string;
    description?: string;
}

export interface TagObject {
    name: string;
    description?: string;
}

export interface ExternalDocsObject {
    url: string;
    description?: string;
}

// ── Operations ───────────────────────────────────────────

/** HTTP methods in path-item slot order */
export const HTTP_METHODS = ['get', 'put', 'post', 'delete', 'options', 'head', 'patch', 'trace'] as const;

export type HttpMethod = typeof HTTP_METHODS[number];

export type ParameterLocation = 'query' | 'path' | 'header' | 'cookie';

export interface ParameterObject {
    name: string;
    in: ParameterLocation;
    description?: string;
    required: boolean;
    schema: SchemaNode;
    example?: JsonValue;
}

export interface MediaTypeObject {
    schema: SchemaNode;
}

export interface RequestBodyObject {
    description?: string;
    required?: boolean;
    content: Record<string, MediaTypeObject>;
}

export interface ResponseObject {
    description: string;
    content?: Record<string, MediaTypeObject>;
}

/** Scheme name → required scopes */
export type SecurityRequirement = Record<string, string[]>;

export interface OperationObject {
    operationId?: string;
    summary?: string;
    description?: string;
    tags?: string[];
    deprecated?: boolean;
    parameters?: ParameterObject[];
    requestBody?: RequestBodyObject;
    responses: Record<string, ResponseObject>;
    security?: SecurityRequirement[];
}

export type PathItemObject = Partial<Record<HttpMethod, OperationObject>>;

// ── Security Schemes ─────────────────────────────────────

export interface OAuthFlowObject {
    authorizationUrl?: string;
    tokenUrl?: string;
    scopes: Record<string, string>;
}

export interface OAuthFlowsObject {
    implicit?: OAuthFlowObject;
    password?: OAuthFlowObject;
    clientCredentials?: OAuthFlowObject;
    authorizationCode?: OAuthFlowObject;
}

export interface ApiKeySecurityScheme {
    type: 'apiKey';
    name: string;
    in: 'header' | 'query' | 'cookie';
    description?: string;
}

export interface HttpSecurityScheme {
    type: 'http';
    scheme: string;
    bearerFormat?: string;
    description?: string;
}

export interface OAuth2SecurityScheme {
    type: 'oauth2';
    flows: OAuthFlowsObject;
    description?: string;
}

export interface OpenIdConnectSecurityScheme {
    type: 'openIdConnect';
    openIdConnectUrl: string;
    description?: string;
}

export type SecuritySchemeObject =
    | ApiKeySecurityScheme
    | HttpSecurityScheme
    | OAuth2SecurityScheme
    | OpenIdConnectSecurityScheme;

// ── Document ─────────────────────────────────────────────

export interface ComponentsObject {
    schemas?: Record<string, SchemaNode>;
    securitySchemes?: Record<string, SecuritySchemeObject>;
}

/** The assembled document handed to the output formatter */
export interface OpenApiDocument {
    openapi: string;
    info: InfoObject;
    servers?: ServerObject[];
    tags?: TagObject[];
    paths: Record<string, PathItemObject>;
    components?: ComponentsObject;
    externalDocs?: ExternalDocsObject;
}
