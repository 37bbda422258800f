/**
 * SourceScanner — TypeScript Source → SourceDeclarations
 *
 * Parses one file with the TypeScript compiler API (syntax only, no
 * program or type checker) and lowers what the walker needs:
 *
 * - every comment group, in source order
 * - routines: function declarations, methods, and variables or class
 *   properties initialized with an arrow/function expression
 * - records: interfaces, classes, type aliases and enums, with their
 *   fields lowered to {@link TypeExpr}
 *
 * Serialization tags are read from a JSDoc `@json` line on the field:
 *
 * ```typescript
 * interface User {
 *     /** @json user_id *\/
 *     id: number;
 *     /** @json - *\/
 *     password: string;
 *     nickname?: string; // optional → omitempty
 * }
 * ```
 *
 * @module
 */
import ts from 'typescript';
import type { FieldDecl, RecordDecl, RoutineDecl, SourceDeclarations } from '../walker/declarations.js';
import {
    arrayExpr, mapExpr, nameExpr, pointerExpr, qualifiedExpr, unknownExpr, type TypeExpr,
} from '../resolver/TypeExpr.js';

const JSON_TAG_LINE = /^@json(?:\s+(.*))?$/;
const ADJACENT_LINE_GAP = /^[ \t]*\r?\n[ \t]*$/;

// ── Public API ───────────────────────────────────────────

/**
 * Scan one source file.
 *
 * @param path - File path, used for diagnostics and to pick TSX parsing
 * @param text - File contents
 */
export function scanSource(path: string, text: string): SourceDeclarations {
    const sourceFile = ts.createSourceFile(path, text, ts.ScriptTarget.Latest, true, scriptKindFor(path));
    const scanner = new DeclarationCollector(sourceFile);
    scanner.visit(sourceFile);

    return {
        path,
        comments: scanner.commentGroups().map(group => group.text),
        routines: scanner.routines,
        records: scanner.records,
    };
}

/**
 * Remove comment markers from raw comment text.
 *
 * @example
 * cleanComment('// !GET /users')               // '!GET /users'
 * cleanComment('/**\n * !model\n *\/')          // '!model'
 */
export function cleanComment(raw: string): string {
    if (raw.startsWith('//')) return raw.replace(/^\/\/\/?\s?/, '');

    const body = raw.replace(/^\/\*\*?/, '').replace(/\*\/$/, '');
    return body
        .split(/\r?\n/)
        .map(line => line.replace(/^\s*\*(?!\/)\s?/, ''))
        .join('\n')
        .trim();
}

// ── Collector ────────────────────────────────────────────

interface CommentGroup {
    readonly pos: number;
    readonly end: number;
    readonly text: string;
}

class DeclarationCollector {
    readonly routines: RoutineDecl[] = [];
    readonly records: RecordDecl[] = [];
    private readonly _ranges = new Map<number, ts.CommentRange>();
    private readonly _text: string;

    constructor(private readonly _sourceFile: ts.SourceFile) {
        this._text = _sourceFile.getFullText();
    }

    visit(node: ts.Node): void {
        if (node.kind >= ts.SyntaxKind.FirstJSDocNode && node.kind <= ts.SyntaxKind.LastJSDocNode) return;
        if (ts.isJsxText(node)) return;

        this._collectComments(node);
        this._collectDeclaration(node);

        for (const child of node.getChildren(this._sourceFile)) {
            this.visit(child);
        }
    }

    commentGroups(): CommentGroup[] {
        const ranges = [...this._ranges.values()].sort((a, b) => a.pos - b.pos);
        return groupComments(this._text, ranges);
    }

    // ── Comments ──

    private _collectComments(node: ts.Node): void {
        const leading = ts.getLeadingCommentRanges(this._text, node.getFullStart()) ?? [];
        const trailing = ts.getTrailingCommentRanges(this._text, node.getEnd()) ?? [];
        for (const range of [...leading, ...trailing]) {
            if (!this._ranges.has(range.pos)) this._ranges.set(range.pos, range);
        }
    }

    /** The comment group that ends on the line directly above the node */
    private _docOf(node: ts.Node): string | undefined {
        const ranges = ts.getLeadingCommentRanges(this._text, node.getFullStart()) ?? [];
        const last = groupComments(this._text, ranges).at(-1);
        if (last === undefined) return undefined;

        const gap = this._text.slice(last.end, node.getStart(this._sourceFile));
        if ((gap.match(/\n/g) ?? []).length > 1) return undefined;
        return last.text;
    }

    // ── Declarations ──

    private _collectDeclaration(node: ts.Node): void {
        if (ts.isFunctionDeclaration(node) && node.name) {
            this._addRoutine(node.name.text, node);
        } else if (ts.isMethodDeclaration(node)) {
            const name = propertyName(node.name);
            if (name !== undefined) this._addRoutine(name, node);
        } else if (ts.isVariableStatement(node)) {
            for (const declaration of node.declarationList.declarations) {
                if (ts.isIdentifier(declaration.name) && isFunctionInitializer(declaration.initializer)) {
                    this._addRoutine(declaration.name.text, node);
                }
            }
        } else if (ts.isPropertyDeclaration(node) && isFunctionInitializer(node.initializer)) {
            const name = propertyName(node.name);
            if (name !== undefined) this._addRoutine(name, node);
        } else if (isHandlerRegistration(node)) {
            this._addRoutine(node.expression.expression.getText(this._sourceFile), node);
        } else if (ts.isInterfaceDeclaration(node)) {
            this._addRecord(node.name.text, node, true, this._fieldsOf(node.members));
        } else if (ts.isClassDeclaration(node) && node.name) {
            this._addRecord(node.name.text, node, true, this._fieldsOf(node.members));
        } else if (ts.isTypeAliasDeclaration(node)) {
            const literal = ts.isTypeLiteralNode(node.type) ? node.type : undefined;
            this._addRecord(node.name.text, node, literal !== undefined, literal ? this._fieldsOf(literal.members) : []);
        } else if (ts.isEnumDeclaration(node)) {
            this._addRecord(node.name.text, node, false, []);
        }
    }

    private _addRoutine(name: string, node: ts.Node): void {
        const { doc } = splitDocTags(this._docOf(node));
        this.routines.push({ name, ...(doc !== undefined ? { doc } : {}) });
    }

    private _addRecord(name: string, node: ts.Node, isStruct: boolean, fields: FieldDecl[]): void {
        const doc = this._docOf(node);
        this.records.push({ name, ...(doc !== undefined ? { doc } : {}), isStruct, fields });
    }

    private _fieldsOf(members: readonly ts.Node[]): FieldDecl[] {
        const fields: FieldDecl[] = [];

        for (const member of members) {
            let type: ts.TypeNode | undefined;
            if (ts.isPropertySignature(member)) {
                type = member.type;
            } else if (ts.isPropertyDeclaration(member)) {
                if (isHidden(member) || isFunctionInitializer(member.initializer)) continue;
                type = member.type;
            } else {
                continue;
            }

            const name = propertyName(member.name);
            if (name === undefined) continue;

            const rawDoc = this._docOf(member);
            const { doc, tag } = splitDocTags(rawDoc);
            const trailing = (ts.getTrailingCommentRanges(this._text, member.getEnd()) ?? [])[0];
            const comment = trailing ? cleanComment(this._text.slice(trailing.pos, trailing.end)) : undefined;

            fields.push({
                name,
                type: lowerType(type),
                ...(tag !== undefined ? { tag } : {}),
                optional: member.questionToken !== undefined,
                ...(doc ? { doc } : {}),
                ...(comment ? { comment } : {}),
            });
        }

        return fields;
    }
}

// ── Comment Groups ───────────────────────────────────────

/**
 * Merge `//` lines that sit on consecutive lines into one group; block
 * comments are always their own group.
 */
function groupComments(text: string, ranges: readonly ts.CommentRange[]): CommentGroup[] {
    const groups: CommentGroup[] = [];
    let lines: string[] = [];
    let start = -1;
    let end = -1;

    const flush = (): void => {
        if (lines.length > 0) groups.push({ pos: start, end, text: lines.join('\n').trim() });
        lines = [];
    };

    for (const range of ranges) {
        const raw = text.slice(range.pos, range.end);

        if (range.kind === ts.SyntaxKind.MultiLineCommentTrivia) {
            flush();
            groups.push({ pos: range.pos, end: range.end, text: cleanComment(raw) });
            continue;
        }

        const adjacent = lines.length > 0 && ADJACENT_LINE_GAP.test(text.slice(end, range.pos));
        if (!adjacent) {
            flush();
            start = range.pos;
        }
        lines.push(cleanComment(raw));
        end = range.end;
    }
    flush();

    return groups;
}

/** Pull `@json …` out of a doc comment; other JSDoc tag lines are dropped from the prose */
function splitDocTags(doc: string | undefined): { doc?: string; tag?: string } {
    if (doc === undefined) return {};

    let tag: string | undefined;
    const prose: string[] = [];
    for (const line of doc.split('\n')) {
        const trimmed = line.trim();
        const match = JSON_TAG_LINE.exec(trimmed);
        if (match) {
            tag = (match[1] ?? '').trim();
        } else if (!trimmed.startsWith('@')) {
            prose.push(line);
        }
    }

    const text = prose.join('\n').trim();
    return {
        ...(text.length > 0 ? { doc: text } : {}),
        ...(tag !== undefined ? { tag } : {}),
    };
}

// ── Type Lowering ────────────────────────────────────────

const KEYWORD_NAMES: ReadonlyMap<ts.SyntaxKind, string> = new Map([
    [ts.SyntaxKind.StringKeyword, 'string'],
    [ts.SyntaxKind.NumberKeyword, 'number'],
    [ts.SyntaxKind.BooleanKeyword, 'boolean'],
    [ts.SyntaxKind.BigIntKeyword, 'bigint'],
    [ts.SyntaxKind.AnyKeyword, 'any'],
    [ts.SyntaxKind.UnknownKeyword, 'unknown'],
    [ts.SyntaxKind.ObjectKeyword, 'object'],
]);

/**
 * Lower a declared type to a {@link TypeExpr}.
 *
 * `T | null` and `T | undefined` become pointers; unions of literals of
 * one kind become that primitive; anything else without a rule is
 * `unknown`.
 */
export function lowerType(node: ts.TypeNode | undefined): TypeExpr {
    if (node === undefined) return unknownExpr('');

    const keyword = KEYWORD_NAMES.get(node.kind);
    if (keyword !== undefined) return nameExpr(keyword);

    if (ts.isParenthesizedTypeNode(node)) return lowerType(node.type);
    if (ts.isTypeOperatorNode(node) && node.operator === ts.SyntaxKind.ReadonlyKeyword) return lowerType(node.type);
    if (ts.isArrayTypeNode(node)) return arrayExpr(lowerType(node.elementType));
    if (ts.isLiteralTypeNode(node)) return lowerLiteral(node) ?? unknownExpr(node.getText());
    if (ts.isUnionTypeNode(node)) return lowerUnion(node);
    if (ts.isTypeReferenceNode(node)) return lowerReference(node);

    if (ts.isTypeLiteralNode(node)) {
        const [member] = node.members;
        if (node.members.length === 1 && member && ts.isIndexSignatureDeclaration(member)) {
            const key = member.parameters[0]?.type;
            return mapExpr(lowerType(key), lowerType(member.type));
        }
    }

    return unknownExpr(node.getText());
}

function lowerLiteral(node: ts.LiteralTypeNode): TypeExpr | undefined {
    switch (node.literal.kind) {
        case ts.SyntaxKind.StringLiteral:
        case ts.SyntaxKind.NoSubstitutionTemplateLiteral:
            return nameExpr('string');
        case ts.SyntaxKind.NumericLiteral:
        case ts.SyntaxKind.PrefixUnaryExpression:
            return nameExpr('number');
        case ts.SyntaxKind.TrueKeyword:
        case ts.SyntaxKind.FalseKeyword:
            return nameExpr('boolean');
        default:
            return undefined;
    }
}

function lowerUnion(node: ts.UnionTypeNode): TypeExpr {
    const members = node.types.filter(t => !isNullish(t));
    const nullable = members.length < node.types.length;

    let inner: TypeExpr;
    const [only] = members;
    if (members.length === 1 && only) {
        inner = lowerType(only);
    } else {
        const lowered = members.map(m => (ts.isLiteralTypeNode(m) ? lowerLiteral(m) : undefined));
        const names = new Set(lowered.map(l => (l?.kind === 'name' ? l.name : undefined)));
        const [name] = names;
        inner = names.size === 1 && name !== undefined ? nameExpr(name) : unknownExpr(node.getText());
    }

    return nullable && inner.kind !== 'unknown' ? pointerExpr(inner) : inner;
}

function lowerReference(node: ts.TypeReferenceNode): TypeExpr {
    const args = node.typeArguments ?? [];
    const typeName = node.typeName;

    if (ts.isQualifiedName(typeName)) {
        return args.length === 0
            ? qualifiedExpr(typeName.left.getText(), typeName.right.text)
            : unknownExpr(node.getText());
    }

    const name = typeName.text;
    const [first, second] = args;
    if (args.length === 0) return nameExpr(name);
    if ((name === 'Array' || name === 'ReadonlyArray') && args.length === 1 && first) {
        return arrayExpr(lowerType(first));
    }
    if ((name === 'Record' || name === 'Map') && args.length === 2 && first && second) {
        return mapExpr(lowerType(first), lowerType(second));
    }
    return unknownExpr(node.getText());
}

// ── Internal ─────────────────────────────────────────────

function scriptKindFor(path: string): ts.ScriptKind {
    return path.endsWith('.tsx') ? ts.ScriptKind.TSX : ts.ScriptKind.TS;
}

function propertyName(name: ts.PropertyName): string | undefined {
    if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) return name.text;
    return undefined;
}

function isFunctionInitializer(initializer: ts.Expression | undefined): boolean {
    return initializer !== undefined && (ts.isArrowFunction(initializer) || ts.isFunctionExpression(initializer));
}

/** A call statement that registers a function literal, as in `router.get('/x', (req, res) => {})` */
function isHandlerRegistration(node: ts.Node): node is ts.ExpressionStatement & { readonly expression: ts.CallExpression } {
    return ts.isExpressionStatement(node)
        && ts.isCallExpression(node.expression)
        && node.expression.arguments.some(arg => isFunctionInitializer(arg));
}

function isNullish(node: ts.TypeNode): boolean {
    if (node.kind === ts.SyntaxKind.UndefinedKeyword) return true;
    return ts.isLiteralTypeNode(node) && node.literal.kind === ts.SyntaxKind.NullKeyword;
}

/** Static, `private`, and `#private` members never serialize */
function isHidden(member: ts.PropertyDeclaration): boolean {
    if (ts.isPrivateIdentifier(member.name)) return true;
    const modifiers = ts.canHaveModifiers(member) ? ts.getModifiers(member) ?? [] : [];
    return modifiers.some(m => m.kind === ts.SyntaxKind.StaticKeyword || m.kind === ts.SyntaxKind.PrivateKeyword);
}
