/**
 * Tests for walkFile() — folding declarations into SpecState
 */
import { describe, it, expect } from 'vitest';
import { walkFile, buildSecurityScheme } from '../../src/walker/DeclarationWalker.js';
import { createSpecState } from '../../src/walker/SpecState.js';
import { arrayExpr, nameExpr, pointerExpr, qualifiedExpr } from '../../src/resolver/TypeExpr.js';
import type { SourceDeclarations } from '../../src/walker/declarations.js';
import type { DebugEvent } from '../../src/observability/DebugObserver.js';
import type { SecurityAnnotation } from '../../src/annotation/types.js';

function file(overrides: Partial<SourceDeclarations>): SourceDeclarations {
    return { path: 'api.ts', comments: [], routines: [], records: [], ...overrides };
}

function collect(): { events: DebugEvent[]; debug: (e: DebugEvent) => void } {
    const events: DebugEvent[] = [];
    return { events, debug: e => { events.push(e); } };
}

// ── API-level ────────────────────────────────────────────

describe('walkFile — API-level comments', () => {
    it('should fill info, servers, tags and links', () => {
        const state = createSpecState();
        walkFile(state, file({
            comments: [[
                '!api 3.1.0',
                '!info "Pet Store" v2.0.0 "Sells pets"',
                '!contact "Ops" <ops@example.com>',
                '!license MIT',
                '!tos https://example.com/terms',
                '!server https://api.example.com "Prod"',
                '!server https://staging.example.com',
                '!tag pets "Pets"',
                '!externalDocs https://docs.example.com',
                '!link "Status" https://status.example.com',
            ].join('\n')],
        }));

        expect(state.version).toBe('3.1.0');
        expect(state.info).toEqual({
            title: 'Pet Store',
            version: '2.0.0',
            description: 'Sells pets',
            contact: { name: 'Ops', email: 'ops@example.com' },
            license: { name: 'MIT' },
            termsOfService: 'https://example.com/terms',
        });
        expect(state.servers).toEqual([
            { url: 'https://api.example.com', description: 'Prod' },
            { url: 'https://staging.example.com' },
        ]);
        expect(state.tags).toEqual([{ name: 'pets', description: 'Pets' }]);
        expect(state.externalDocs).toEqual({ url: 'https://docs.example.com' });
        expect(state.links).toEqual([{ label: 'Status', url: 'https://status.example.com' }]);
    });

    it('should let a later !info overwrite an earlier one', () => {
        const state = createSpecState();
        walkFile(state, file({ comments: ['!info First 1.0 "Old"', '!info Second 2.0'] }));
        expect(state.info).toEqual({ title: 'Second', version: '2.0' });
    });

    it('should ignore operation-level lines in plain comments', () => {
        const state = createSpecState();
        walkFile(state, file({ comments: ['!GET /pets\n!ok Pet'] }));
        expect(state.operations).toEqual([]);
    });

    it('should report skipped lines', () => {
        const { events, debug } = collect();
        walkFile(createSpecState(), file({ comments: ['!server "unterminated'] }), debug);
        expect(events.filter(e => e.type === 'line-skipped')).toEqual([
            expect.objectContaining({ line: '!server "unterminated', reason: 'unterminated string' }),
        ]);
    });
});

// ── Security ─────────────────────────────────────────────

describe('walkFile — security schemes and scopes', () => {
    it('should inject a scope into the OAuth2 flow of a known scheme', () => {
        const state = createSpecState();
        walkFile(state, file({
            comments: [
                '!security PetAuth oauth2 implicit https://auth.example.com/authorize',
                '!scope PetAuth read:pets "Read pets"',
            ],
        }));

        expect(state.securitySchemes.get('PetAuth')).toEqual({
            type: 'oauth2',
            flows: {
                implicit: {
                    authorizationUrl: 'https://auth.example.com/authorize',
                    scopes: { 'read:pets': 'Read pets' },
                },
            },
        });
    });

    it('should drop a scope for an unknown scheme without creating one', () => {
        const state = createSpecState();
        const { events, debug } = collect();
        walkFile(state, file({ comments: ['!scope Missing read "Read"'] }), debug);

        expect(state.securitySchemes.size).toBe(0);
        expect(events).toContainEqual(expect.objectContaining({ type: 'scope-dropped', scheme: 'Missing', scope: 'read' }));
    });

    it('should drop a scope for a non-OAuth2 scheme', () => {
        const state = createSpecState();
        walkFile(state, file({ comments: ['!security Key apiKey header X-Key\n!scope Key read'] }));
        expect(state.securitySchemes.get('Key')).toEqual({ type: 'apiKey', in: 'header', name: 'X-Key' });
    });

    it('should drop a scope declared before its scheme', () => {
        const state = createSpecState();
        walkFile(state, file({
            comments: ['!scope Later read "Read"', '!security Later oauth2 password https://auth.example.com/token'],
        }));
        expect(state.securitySchemes.get('Later')).toEqual({
            type: 'oauth2',
            flows: { password: { tokenUrl: 'https://auth.example.com/token', scopes: {} } },
        });
    });
});

describe('buildSecurityScheme', () => {
    const security = (schemeType: SecurityAnnotation['schemeType'], args: string[]): SecurityAnnotation => ({
        kind: 'security', name: 'Auth', schemeType, args,
    });

    it('should default the apiKey parameter name to the scheme name', () => {
        expect(buildSecurityScheme(security('apiKey', ['query']))).toEqual({ type: 'apiKey', in: 'query', name: 'Auth' });
    });

    it('should build http schemes with a bearer format', () => {
        expect(buildSecurityScheme({ ...security('http', ['bearer']), bearerFormat: 'JWT' })).toEqual({
            type: 'http', scheme: 'bearer', bearerFormat: 'JWT',
        });
    });

    it('should build every OAuth2 flow kind', () => {
        expect(buildSecurityScheme(security('oauth2', ['clientCredentials', 'https://a.example.com/token']))).toEqual({
            type: 'oauth2',
            flows: { clientCredentials: { tokenUrl: 'https://a.example.com/token', scopes: {} } },
        });
        expect(buildSecurityScheme(security('oauth2', [
            'authorizationCode', 'https://a.example.com/authorize', 'https://a.example.com/token',
        ]))).toEqual({
            type: 'oauth2',
            flows: {
                authorizationCode: {
                    authorizationUrl: 'https://a.example.com/authorize',
                    tokenUrl: 'https://a.example.com/token',
                    scopes: {},
                },
            },
        });
    });

    it('should fall back to an implicit flow for an unknown flow with a URL', () => {
        expect(buildSecurityScheme(security('oauth2', ['https://a.example.com/authorize']))).toEqual({
            type: 'oauth2',
            flows: { implicit: { authorizationUrl: 'https://a.example.com/authorize', scopes: {} } },
        });
        expect(buildSecurityScheme(security('oauth2', ['device']))).toEqual({ type: 'oauth2', flows: {} });
    });

    it('should build openIdConnect schemes', () => {
        expect(buildSecurityScheme(security('openIdConnect', ['https://a.example.com/.well-known/openid-configuration']))).toEqual({
            type: 'openIdConnect',
            openIdConnectUrl: 'https://a.example.com/.well-known/openid-configuration',
        });
    });
});

// ── Operations ───────────────────────────────────────────

describe('walkFile — routines', () => {
    it('should build an operation from a routine doc', () => {
        const state = createSpecState();
        walkFile(state, file({
            routines: [{
                name: 'getPet',
                doc: [
                    'Returns a single pet.',
                    '!GET /pets/{id} -> getPet "Find pet" #pets',
                    '!path id:int64 "Pet ID"',
                    '!query fields:[]string enum=name,tag',
                    '!header X-Trace "Trace id" default=abc',
                    '!ok Pet "The pet"',
                    '!error 404 - "Not found"',
                    '!secure PetAuth ApiKey',
                ].join('\n'),
            }],
        }));

        expect(state.operations).toHaveLength(1);
        const op = state.operations[0]!;
        expect(op.method).toBe('get');
        expect(op.path).toBe('/pets/{id}');
        expect(op.operationId).toBe('getPet');
        expect(op.summary).toBe('Find pet');
        expect(op.description).toBe('Returns a single pet.');
        expect(op.tags).toEqual(['pets']);
        expect(op.parameters).toEqual([
            { name: 'id', in: 'path', description: 'Pet ID', required: true, schema: { type: 'integer', format: 'int64' } },
            { name: 'fields', in: 'query', required: false, schema: { type: 'array', items: { type: 'string' }, enum: ['name', 'tag'] } },
            { name: 'X-Trace', in: 'header', description: 'Trace id', required: false, schema: { type: 'string' }, example: 'abc' },
        ]);
        expect(Object.fromEntries(op.responses)).toEqual({
            200: { description: 'The pet', content: { 'application/json': { schema: { $ref: '#/components/schemas/Pet' } } } },
            404: { description: 'Not found' },
        });
        expect(op.security).toEqual([{ PetAuth: [] }, { ApiKey: [] }]);
    });

    it.each(['-', 'nil', 'none', 'null'])('should omit content for the "%s" schema token', token => {
        const state = createSpecState();
        walkFile(state, file({ routines: [{ name: 'del', doc: `!DELETE /pets/{id}\n!ok 204 ${token} "Deleted"` }] }));
        expect(state.operations[0]?.responses.get('204')).toEqual({ description: 'Deleted' });
    });

    it('should wrap the body schema in the requested media type', () => {
        const state = createSpecState();
        walkFile(state, file({
            routines: [{ name: 'create', doc: '!POST /pets\n!body NewPet[] "Pets" required type=application/xml' }],
        }));
        expect(state.operations[0]?.requestBody).toEqual({
            description: 'Pets',
            required: true,
            content: {
                'application/xml': {
                    schema: { type: 'array', items: { $ref: '#/components/schemas/NewPet' } },
                },
            },
        });
    });

    it('should drop an operation without a route and report it', () => {
        const state = createSpecState();
        const { events, debug } = collect();
        walkFile(state, file({ routines: [{ name: 'orphan', doc: '!query q\n!ok Pet' }] }), debug);

        expect(state.operations).toEqual([]);
        expect(events).toContainEqual(expect.objectContaining({ type: 'operation-dropped', routine: 'orphan', path: 'api.ts' }));
    });

    it('should not report routines that carry only API-level annotations', () => {
        const { events, debug } = collect();
        walkFile(createSpecState(), file({ routines: [{ name: 'main', doc: '!api 3.0.3' }] }), debug);
        expect(events.some(e => e.type === 'operation-dropped')).toBe(false);
    });

    it('should ignore routines without a doc or without annotations', () => {
        const state = createSpecState();
        walkFile(state, file({ routines: [{ name: 'a' }, { name: 'b', doc: 'Just prose.' }] }));
        expect(state.operations).toEqual([]);
    });
});

// ── Models ───────────────────────────────────────────────

describe('walkFile — records', () => {
    it('should build a model schema from fields', () => {
        const state = createSpecState();
        walkFile(state, file({
            records: [{
                name: 'Pet',
                doc: '!model "A pet"',
                isStruct: true,
                fields: [
                    { name: 'ID', type: nameExpr('int64'), tag: 'id', optional: false, doc: 'Unique id.' },
                    { name: 'Name', type: nameExpr('string'), tag: 'name', optional: false, comment: 'Display name' },
                    { name: 'Tags', type: arrayExpr(nameExpr('Tag')), tag: 'tags,omitempty', optional: false },
                    { name: 'Born', type: pointerExpr(qualifiedExpr('time', 'Time')), optional: true },
                    { name: 'Secret', type: nameExpr('string'), tag: '-', optional: false, doc: 'Never shown.' },
                ],
            }],
        }));

        expect(state.globalSchemas.get('Pet')?.schema).toEqual({
            type: 'object',
            description: 'A pet',
            properties: {
                id: { type: 'integer', format: 'int64', description: 'Unique id.' },
                name: { type: 'string', description: 'Display name' },
                tags: { type: 'array', items: { $ref: '#/components/schemas/Tag' } },
                Born: { type: 'string', format: 'date-time', nullable: true },
            },
            required: ['id', 'name'],
        });
    });

    it('should apply !field overrides from field docs', () => {
        const state = createSpecState();
        walkFile(state, file({
            records: [{
                name: 'Order',
                doc: '!model',
                isStruct: true,
                fields: [
                    {
                        name: 'Status',
                        type: nameExpr('string'),
                        tag: 'status,omitempty',
                        optional: false,
                        doc: 'Old text.\n!field status "Order status" required example=placed enum=placed,shipped',
                    },
                ],
            }],
        }));

        const record = state.globalSchemas.get('Order');
        expect(record?.schema).toEqual({
            type: 'object',
            properties: {
                status: {
                    type: 'string',
                    description: 'Order status',
                    example: 'placed',
                    enum: ['placed', 'shipped'],
                },
            },
            required: ['status'],
        });
        expect(record?.examples).toEqual({ status: 'placed' });
    });

    it('should apply !field lines on the record doc by property name', () => {
        const state = createSpecState();
        walkFile(state, file({
            records: [{
                name: 'Item',
                doc: '!model\n!field id example=7 required\n!field missing "ignored"',
                isStruct: true,
                fields: [{ name: 'id', type: nameExpr('int'), optional: true }],
            }],
        }));
        expect(state.globalSchemas.get('Item')?.schema).toEqual({
            type: 'object',
            properties: { id: { type: 'integer', format: 'int32', example: 7 } },
            required: ['id'],
        });
    });

    it('should ignore !field lines naming inherited object members', () => {
        const state = createSpecState();
        walkFile(state, file({
            records: [{
                name: 'Item',
                doc: '!model\n!field toString "leak" required',
                isStruct: true,
                fields: [{ name: 'id', type: nameExpr('int'), optional: false }],
            }],
        }));

        expect(state.globalSchemas.get('Item')?.schema).toEqual({
            type: 'object',
            properties: { id: { type: 'integer', format: 'int32' } },
            required: ['id'],
        });
        expect(Object.hasOwn(Object.prototype.toString, 'description')).toBe(false);
    });

    it('should store a field named __proto__ as an own property', () => {
        const state = createSpecState();
        walkFile(state, file({
            records: [{
                name: 'Odd',
                doc: '!model\n!field __proto__ example=x',
                isStruct: true,
                fields: [{ name: '__proto__', type: nameExpr('string'), optional: false }],
            }],
        }));

        const record = state.globalSchemas.get('Odd');
        const properties = record?.schema.properties ?? {};
        expect(Object.hasOwn(properties, '__proto__')).toBe(true);
        expect(Object.getPrototypeOf(properties)).toBe(Object.prototype);
        expect(Object.getOwnPropertyDescriptor(properties, '__proto__')?.value).toEqual({ type: 'string', example: 'x' });
        expect(record?.schema.required).toEqual(['__proto__']);
        expect(Object.hasOwn(record?.examples ?? {}, '__proto__')).toBe(true);
    });

    it('should skip non-struct records and records without !model', () => {
        const state = createSpecState();
        walkFile(state, file({
            records: [
                { name: 'Status', doc: '!model', isStruct: false, fields: [] },
                { name: 'Plain', doc: 'No marker here.', isStruct: true, fields: [] },
            ],
        }));
        expect(state.globalSchemas.size).toBe(0);
    });

    it('should keep the first model of a name', () => {
        const state = createSpecState();
        const { events, debug } = collect();
        const record = (description: string) => ({ name: 'Pet', doc: `!model "${description}"`, isStruct: true, fields: [] });

        walkFile(state, file({ path: 'a.ts', records: [record('first')] }), debug);
        walkFile(state, file({ path: 'b.ts', records: [record('second')] }), debug);

        expect(state.globalSchemas.get('Pet')?.schema.description).toBe('first');
        expect(events).toContainEqual(expect.objectContaining({ type: 'schema-duplicate', name: 'Pet', collection: 'global', path: 'b.ts' }));
    });
});

// ── Explicit schemas ─────────────────────────────────────

describe('walkFile — explicit schemas', () => {
    it('should build a schema from !schema and !prop lines', () => {
        const state = createSpecState();
        walkFile(state, file({
            comments: ['!schema Error "Error payload"\n!prop code:integer "Code" required\n!prop message:string example=oops'],
        }));

        expect(state.explicitSchemas.get('Error')?.schema).toEqual({
            type: 'object',
            description: 'Error payload',
            properties: {
                code: { type: 'integer', format: 'int32', description: 'Code' },
                message: { type: 'string', example: 'oops' },
            },
            required: ['code'],
        });
    });

    it('should ignore !prop without an open schema in the same comment', () => {
        const state = createSpecState();
        walkFile(state, file({ comments: ['!schema Empty', '!prop stray:string'] }));
        expect(state.explicitSchemas.get('Empty')?.schema).toEqual({ type: 'object', properties: {} });
    });
});
