/**
 * Tests for scanSource() — comments, routines, records and field lowering
 */
import { describe, it, expect } from 'vitest';
import ts from 'typescript';
import { scanSource, cleanComment, lowerType } from '../../src/source/SourceScanner.js';
import {
    arrayExpr, mapExpr, nameExpr, pointerExpr, qualifiedExpr, unknownExpr,
} from '../../src/resolver/TypeExpr.js';

const PETS = [
    '// !api 3.0.3',
    '// !info "Pets" v1.0.0',
    '',
    '/**',
    ' * !server https://api.example.com',
    ' */',
    '',
    '/**',
    ' * Lists pets.',
    ' * !GET /pets -> listPets',
    ' * @param req - request',
    ' */',
    'export async function listPets(req: Request): Promise<void> {}',
    '',
    '// !POST /pets',
    'export const createPet = async () => {};',
    '',
    'export class PetController {',
    '    /** !DELETE /pets/{id} */',
    '    remove(): void {}',
    '    private secret = 1;',
    '    static count = 0;',
    '    /** @json label */',
    '    name = "x";',
    '    handler = () => {};',
    '}',
    '',
    '/** !model "A pet" */',
    'export interface Pet {',
    '    /**',
    '     * Unique id.',
    '     * @json pet_id',
    '     */',
    '    id: number;',
    '    name?: string; // Display name',
    '    tags: readonly string[];',
    '    owner: Owner | null;',
    '    /** @json - */',
    '    password: string;',
    '    labels: Record<string, string>;',
    '    meta: { [key: string]: number };',
    '    kind: "cat" | "dog";',
    '    born: Date;',
    '    ref: uuid.UUID;',
    '}',
    '',
    'export type Alias = string;',
    'export enum Color { Red }',
].join('\n');

function typeOf(source: string) {
    const file = ts.createSourceFile('t.ts', `type T = ${source};`, ts.ScriptTarget.Latest, true);
    const [statement] = file.statements;
    if (!statement || !ts.isTypeAliasDeclaration(statement)) throw new Error('expected a type alias');
    return statement.type;
}

// ── Comments ─────────────────────────────────────────────

describe('scanSource — comments', () => {
    it('should list every comment group in source order', () => {
        const scanned = scanSource('pets.ts', PETS);

        expect(scanned.path).toBe('pets.ts');
        expect(scanned.comments).toEqual([
            '!api 3.0.3\n!info "Pets" v1.0.0',
            '!server https://api.example.com',
            'Lists pets.\n!GET /pets -> listPets\n@param req - request',
            '!POST /pets',
            '!DELETE /pets/{id}',
            '@json label',
            '!model "A pet"',
            'Unique id.\n@json pet_id',
            'Display name',
            '@json -',
        ]);
    });

    it('should keep line comments separated by a blank line apart', () => {
        const scanned = scanSource('a.ts', '// !api 3.0.3\n\n// !tag pets\nexport const x = 1;\n');
        expect(scanned.comments).toEqual(['!api 3.0.3', '!tag pets']);
    });

    it('should parse .tsx files', () => {
        const scanned = scanSource('view.tsx', '// !GET /view\nexport const View = () => <div>hi</div>;\n');
        expect(scanned.routines).toEqual([{ name: 'View', doc: '!GET /view' }]);
    });
});

// ── Routines ─────────────────────────────────────────────

describe('scanSource — routines', () => {
    it('should collect functions, arrow variables, methods and arrow properties', () => {
        const scanned = scanSource('pets.ts', PETS);

        expect(scanned.routines).toEqual([
            { name: 'listPets', doc: 'Lists pets.\n!GET /pets -> listPets' },
            { name: 'createPet', doc: '!POST /pets' },
            { name: 'remove', doc: '!DELETE /pets/{id}' },
            { name: 'handler' },
        ]);
    });

    it('should collect a call that registers a function literal', () => {
        const scanned = scanSource('routes.ts', [
            '/**',
            ' * !GET /users -> listUsers',
            ' */',
            "router.get('/users', async (req, res) => {});",
            '',
            '// !POST /users',
            "app.post('/users', auth, function create() {});",
            '',
            "router.use('/static');",
        ].join('\n'));

        expect(scanned.routines).toEqual([
            { name: 'router.get', doc: '!GET /users -> listUsers' },
            { name: 'app.post', doc: '!POST /users' },
        ]);
    });

    it('should not attach a comment separated by a blank line', () => {
        const scanned = scanSource('a.ts', '// !GET /x\n\nfunction f() {}\n');
        expect(scanned.routines).toEqual([{ name: 'f' }]);
        expect(scanned.comments).toEqual(['!GET /x']);
    });

    it('should attach the last of several line comment groups', () => {
        const scanned = scanSource('a.ts', '// header\n\n// !GET /x\n// -> getX\nfunction f() {}\n');
        expect(scanned.routines).toEqual([{ name: 'f', doc: '!GET /x\n-> getX' }]);
    });
});

// ── Records ──────────────────────────────────────────────

describe('scanSource — records', () => {
    it('should collect classes, interfaces, aliases and enums in order', () => {
        const scanned = scanSource('pets.ts', PETS);

        expect(scanned.records.map(r => [r.name, r.isStruct])).toEqual([
            ['PetController', true],
            ['Pet', true],
            ['Alias', false],
            ['Color', false],
        ]);
        expect(scanned.records[1]!.doc).toBe('!model "A pet"');
        expect(scanned.records[2]!.fields).toEqual([]);
    });

    it('should lower interface fields with tags, docs and trailing comments', () => {
        const pet = scanSource('pets.ts', PETS).records[1]!;

        expect(pet.fields).toEqual([
            { name: 'id', type: nameExpr('number'), tag: 'pet_id', optional: false, doc: 'Unique id.' },
            { name: 'name', type: nameExpr('string'), optional: true, comment: 'Display name' },
            { name: 'tags', type: arrayExpr(nameExpr('string')), optional: false },
            { name: 'owner', type: pointerExpr(nameExpr('Owner')), optional: false },
            { name: 'password', type: nameExpr('string'), tag: '-', optional: false },
            { name: 'labels', type: mapExpr(nameExpr('string'), nameExpr('string')), optional: false },
            { name: 'meta', type: mapExpr(nameExpr('string'), nameExpr('number')), optional: false },
            { name: 'kind', type: nameExpr('string'), optional: false },
            { name: 'born', type: nameExpr('Date'), optional: false },
            { name: 'ref', type: qualifiedExpr('uuid', 'UUID'), optional: false },
        ]);
    });

    it('should skip private, static and function-valued class members', () => {
        const controller = scanSource('pets.ts', PETS).records[0]!;

        expect(controller.fields).toEqual([
            { name: 'name', type: unknownExpr(''), tag: 'label', optional: false },
        ]);
    });

    it('should treat a type alias of an object literal as a struct', () => {
        const [record] = scanSource('a.ts', 'type Point = { x: number; y?: number };\n').records;

        expect(record).toEqual({
            name: 'Point',
            isStruct: true,
            fields: [
                { name: 'x', type: nameExpr('number'), optional: false },
                { name: 'y', type: nameExpr('number'), optional: true },
            ],
        });
    });
});

// ── cleanComment ─────────────────────────────────────────

describe('cleanComment', () => {
    it('should strip line comment markers', () => {
        expect(cleanComment('// !GET /users')).toBe('!GET /users');
        expect(cleanComment('/// !GET /users')).toBe('!GET /users');
    });

    it('should strip block comment markers and leading stars', () => {
        expect(cleanComment('/**\n * !model\n * A user\n */')).toBe('!model\nA user');
        expect(cleanComment('/* plain */')).toBe('plain');
    });
});

// ── lowerType ────────────────────────────────────────────

describe('lowerType', () => {
    it('should map keywords to names', () => {
        expect(lowerType(typeOf('string'))).toEqual(nameExpr('string'));
        expect(lowerType(typeOf('boolean'))).toEqual(nameExpr('boolean'));
        expect(lowerType(typeOf('unknown'))).toEqual(nameExpr('unknown'));
    });

    it('should lower generic arrays and maps', () => {
        expect(lowerType(typeOf('Array<User>'))).toEqual(arrayExpr(nameExpr('User')));
        expect(lowerType(typeOf('ReadonlyArray<number>'))).toEqual(arrayExpr(nameExpr('number')));
        expect(lowerType(typeOf('Map<string, User>'))).toEqual(mapExpr(nameExpr('string'), nameExpr('User')));
    });

    it('should unwrap parentheses and nullish unions', () => {
        expect(lowerType(typeOf('(string | undefined)[]'))).toEqual(arrayExpr(pointerExpr(nameExpr('string'))));
        expect(lowerType(typeOf('User | null | undefined'))).toEqual(pointerExpr(nameExpr('User')));
    });

    it('should lower single-kind literal unions to their primitive', () => {
        expect(lowerType(typeOf('1 | 2 | 3'))).toEqual(nameExpr('number'));
        expect(lowerType(typeOf('true | false'))).toEqual(nameExpr('boolean'));
    });

    it('should give unknown for anything without a rule', () => {
        expect(lowerType(typeOf('string | number'))).toEqual(unknownExpr('string | number'));
        expect(lowerType(typeOf('[string, number]'))).toEqual(unknownExpr('[string, number]'));
        expect(lowerType(typeOf('Promise<User>'))).toEqual(unknownExpr('Promise<User>'));
        expect(lowerType(undefined)).toEqual(unknownExpr(''));
    });
});
