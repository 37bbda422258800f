/**
 * SpecAssembler — SpecState → OpenApiDocument
 *
 * Builds a fresh document from the accumulated state. Every nested
 * object is copied, so the state is never mutated and assembling twice
 * gives deep-equal documents.
 *
 * @module
 */
import type {
    ComponentsObject,
    InfoObject,
    OpenApiDocument,
    OperationObject,
    PathItemObject,
    SchemaNode,
    SecuritySchemeObject,
} from '../document/types.js';
import type { LinkRecord, OperationRecord, SpecState } from '../walker/SpecState.js';

const LINKS_HEADER = '\n\nSome useful links:\n';

// ── Public API ───────────────────────────────────────────

/**
 * Assemble the final document.
 *
 * @example
 * ```typescript
 * const state = createSpecState();
 * walkFile(state, scanSource('api.ts', text));
 * const doc = assembleDocument(state);
 * ```
 */
export function assembleDocument(state: SpecState): OpenApiDocument {
    const components = buildComponents(state);

    return {
        openapi: state.version,
        info: buildInfo(state.info, state.links),
        ...(state.servers.length > 0 ? { servers: structuredClone(state.servers) } : {}),
        ...(state.tags.length > 0 ? { tags: structuredClone(state.tags) } : {}),
        paths: buildPaths(state.operations),
        ...(components ? { components } : {}),
        ...(state.externalDocs ? { externalDocs: structuredClone(state.externalDocs) } : {}),
    };
}

/**
 * Render `!link` entries as a markdown list appended to a description.
 *
 * @example
 * appendLinks('My API', [{ label: 'Status', url: 'https://status.example.com' }])
 * // 'My API\n\nSome useful links:\n- [Status](https://status.example.com)\n'
 */
export function appendLinks(description: string, links: readonly LinkRecord[]): string {
    if (links.length === 0) return description;
    return description + LINKS_HEADER + links.map(l => `- [${l.label}](${l.url})\n`).join('');
}

// ── Info ─────────────────────────────────────────────────

function buildInfo(info: InfoObject, links: readonly LinkRecord[]): InfoObject {
    const copy = structuredClone(info);
    if (links.length > 0) copy.description = appendLinks(info.description ?? '', links);
    return copy;
}

// ── Paths ────────────────────────────────────────────────

function buildPaths(operations: readonly OperationRecord[]): Record<string, PathItemObject> {
    const paths = new Map<string, PathItemObject>();

    for (const record of operations) {
        if (record.method === undefined || !record.path) continue;
        const item = paths.get(record.path) ?? {};
        item[record.method] = buildOperation(record);
        paths.set(record.path, item);
    }

    return Object.fromEntries(paths);
}

function buildOperation(record: OperationRecord): OperationObject {
    return {
        ...(record.operationId ? { operationId: record.operationId } : {}),
        ...(record.summary ? { summary: record.summary } : {}),
        ...(record.description ? { description: record.description } : {}),
        ...(record.tags.length > 0 ? { tags: [...record.tags] } : {}),
        ...(record.deprecated ? { deprecated: true } : {}),
        ...(record.parameters.length > 0 ? { parameters: structuredClone(record.parameters) } : {}),
        ...(record.requestBody ? { requestBody: structuredClone(record.requestBody) } : {}),
        responses: structuredClone(Object.fromEntries(record.responses)),
        ...(record.security.length > 0 ? { security: structuredClone(record.security) } : {}),
    };
}

// ── Components ───────────────────────────────────────────

function buildComponents(state: SpecState): ComponentsObject | undefined {
    // Explicit schemas win; names are user-supplied, so merge in a Map
    const schemas = new Map<string, SchemaNode>();
    for (const [name, record] of state.explicitSchemas) {
        schemas.set(name, structuredClone(record.schema));
    }
    for (const [name, record] of state.globalSchemas) {
        if (!schemas.has(name)) schemas.set(name, structuredClone(record.schema));
    }

    const securitySchemes = new Map<string, SecuritySchemeObject>();
    for (const [name, scheme] of state.securitySchemes) {
        securitySchemes.set(name, structuredClone(scheme));
    }

    if (schemas.size === 0 && securitySchemes.size === 0) return undefined;

    return {
        ...(schemas.size > 0 ? { schemas: Object.fromEntries(schemas) } : {}),
        ...(securitySchemes.size > 0 ? { securitySchemes: Object.fromEntries(securitySchemes) } : {}),
    };
}
