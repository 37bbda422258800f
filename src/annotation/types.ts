/**
 * Annotation Records
 *
 * One record per recognized `!verb` line. The set of kinds is closed:
 * the walker dispatches on `kind` with an exhaustive switch.
 *
 * @module
 */
import type { HttpMethod, JsonValue, ParameterLocation } from '../document/types.js';

// ── API-level ────────────────────────────────────────────

/** `!api 3.0.3` */
export interface ApiAnnotation {
    readonly kind: 'api';
    readonly version: string;
}

/** `!info "Title" v1.0.0 "Description"` */
export interface InfoAnnotation {
    readonly kind: 'info';
    readonly title: string;
    readonly version: string;
    readonly description?: string;
}

/** `!contact "Support" <support@example.com> (https://example.com)` */
export interface ContactAnnotation {
    readonly kind: 'contact';
    readonly name?: string;
    readonly email?: string;
    readonly url?: string;
}

/** `!license MIT https://opensource.org/licenses/MIT` */
export interface LicenseAnnotation {
    readonly kind: 'license';
    readonly name: string;
    readonly url?: string;
}

/** `!tos https://example.com/terms` */
export interface TosAnnotation {
    readonly kind: 'tos';
    readonly url: string;
}

/** `!server https://api.example.com/v1 "Production"` */
export interface ServerAnnotation {
    readonly kind: 'server';
    readonly url: string;
    readonly description?: string;
}

/** `!tag users "User operations"` */
export interface TagAnnotation {
    readonly kind: 'tag';
    readonly name: string;
    readonly description?: string;
}

/** `!externalDocs https://docs.example.com "Guides"` */
export interface ExternalDocsAnnotation {
    readonly kind: 'externalDocs';
    readonly url: string;
    readonly description?: string;
}

/** `!link "Status page" https://status.example.com` */
export interface LinkAnnotation {
    readonly kind: 'link';
    readonly label: string;
    readonly url: string;
}

export type SecuritySchemeType = 'apiKey' | 'http' | 'oauth2' | 'openIdConnect';

/**
 * `!security <name> <type> [args…] ["description"] [format=JWT]`
 *
 * `args` are the bare words after the type; their meaning depends on
 * the scheme type (location + parameter name, HTTP scheme, OAuth2 flow
 * + URLs, discovery URL).
 */
export interface SecurityAnnotation {
    readonly kind: 'security';
    readonly name: string;
    readonly schemeType: SecuritySchemeType;
    readonly args: readonly string[];
    readonly description?: string;
    readonly bearerFormat?: string;
}

/** `!scope OAuth2 read:pets "Read pets"` */
export interface ScopeAnnotation {
    readonly kind: 'scope';
    readonly scheme: string;
    readonly name: string;
    readonly description: string;
}

// ── Operation-level ──────────────────────────────────────

/** `!GET /users -> listUsers "List users" #users` */
export interface RouteAnnotation {
    readonly kind: 'route';
    readonly method: HttpMethod;
    readonly path: string;
    readonly operationId?: string;
    readonly summary?: string;
    readonly tags: readonly string[];
    readonly deprecated: boolean;
}

/** `!query limit:integer "Max results" default=10` */
export interface ParamAnnotation {
    readonly kind: 'param';
    readonly in: ParameterLocation;
    readonly name: string;
    readonly type: string;
    readonly description?: string;
    readonly required: boolean;
    readonly default?: JsonValue;
    readonly enum?: readonly JsonValue[];
}

/** `!body CreateUser "User data" required` */
export interface BodyAnnotation {
    readonly kind: 'body';
    readonly schema: string;
    readonly description?: string;
    readonly required: boolean;
    readonly mediaType: string;
}

/** `!ok 201 User "Created"` / `!error 404 Error "Not found"` */
export interface ResponseAnnotation {
    readonly kind: 'response';
    readonly success: boolean;
    readonly status: string;
    /** Empty when the line names no schema */
    readonly schema: string;
    readonly description?: string;
}

/** `!secure BearerAuth ApiKeyAuth` */
export interface SecureAnnotation {
    readonly kind: 'secure';
    readonly schemes: readonly string[];
}

// ── Schema-level ─────────────────────────────────────────

/** `!model "A user in the system"` */
export interface ModelAnnotation {
    readonly kind: 'model';
    readonly description?: string;
}

/** `!field id:integer "User ID" required example=123` */
export interface FieldAnnotation {
    readonly kind: 'field';
    readonly name: string;
    readonly type?: string;
    readonly description?: string;
    readonly required: boolean;
    readonly example?: JsonValue;
    readonly enum?: readonly JsonValue[];
}

/** `!schema ErrorBody "Error payload"` — opens an explicit schema */
export interface SchemaAnnotation {
    readonly kind: 'schema';
    readonly name: string;
    readonly description?: string;
}

/** `!prop code:integer "Error code" required` — property of the open `!schema` */
export interface PropAnnotation {
    readonly kind: 'prop';
    readonly name: string;
    readonly type: string;
    readonly description?: string;
    readonly required: boolean;
    readonly example?: JsonValue;
    readonly enum?: readonly JsonValue[];
}

// ── Union ────────────────────────────────────────────────

export type Annotation =
    | ApiAnnotation
    | InfoAnnotation
    | ContactAnnotation
    | LicenseAnnotation
    | TosAnnotation
    | ServerAnnotation
    | TagAnnotation
    | ExternalDocsAnnotation
    | LinkAnnotation
    | SecurityAnnotation
    | ScopeAnnotation
    | RouteAnnotation
    | ParamAnnotation
    | BodyAnnotation
    | ResponseAnnotation
    | SecureAnnotation
    | ModelAnnotation
    | FieldAnnotation
    | SchemaAnnotation
    | PropAnnotation;

export type AnnotationKind = Annotation['kind'];

/** A marker line that did not become a record */
export interface SkippedLine {
    readonly line: string;
    readonly reason: string;
}

/** Result of parsing one comment block */
export interface AnnotationBlock {
    readonly annotations: readonly Annotation[];
    readonly skipped: readonly SkippedLine[];
}
