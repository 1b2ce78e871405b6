/**
 * Go declaration parser built on tree-sitter.
 *
 * Extracts the package clause, imports, function and method declarations,
 * type specs (at any depth) and every comment group of a file.
 */

import {createRequire} from 'node:module';
import path from 'node:path';
import Parser from 'web-tree-sitter';
import {ParseError} from '../errors.js';
import {commentGroupText} from './comments.js';
import type {
	CommentGroup,
	DeclarationParser,
	FieldDeclaration,
	FunctionDeclaration,
	ParsedFile,
	TypeDeclaration,
	TypeExpr,
	TypeShape,
} from './types.js';

const require = createRequire(import.meta.url);

/** Grammar shipped in tree-sitter-wasms/out/ */
const GO_WASM_PATH = path.join(
	path.dirname(require.resolve('tree-sitter-wasms/package.json')),
	'out',
	'tree-sitter-go.wasm',
);

type Node = Parser.SyntaxNode;

interface CommentNodeGroup {
	/** Comment nodes in source order */
	nodes: Node[];
	/** First comment is the first token on its line */
	ownLine: boolean;
}

export class GoDeclarationParser implements DeclarationParser {
	private parser: Parser | null = null;
	private initializing: Promise<Parser> | null = null;

	/**
	 * Initialize tree-sitter and load the Go grammar.
	 */
	async initialize(): Promise<void> {
		await this.getParser();
	}

	async parse(filePath: string, source: string): Promise<ParsedFile> {
		const parser = await this.getParser();

		const tree = parser.parse(source);
		if (!tree) {
			throw new ParseError(filePath, 'parser returned no tree');
		}

		try {
			const root = tree.rootNode;
			if (root.hasError) {
				const errorNode = findSyntaxError(root);
				throw new ParseError(
					filePath,
					errorNode
						? `syntax error at line ${errorNode.startPosition.row + 1}`
						: 'syntax error',
				);
			}

			const comments: Node[] = [];
			const typeDecls: Node[] = [];
			collectNodes(root, comments, typeDecls);

			const groups = groupComments(comments, source);
			const groupByLastComment = new Map<number, CommentNodeGroup>();
			for (const group of groups) {
				const last = group.nodes.at(-1);
				if (last) groupByLastComment.set(last.startIndex, group);
			}
			const docFor = (node: Node): string => {
				const previous = node.previousSibling;
				if (previous?.type !== 'comment') return '';
				const group = groupByLastComment.get(previous.startIndex);
				if (
					!group?.ownLine ||
					previous.endPosition.row !== node.startPosition.row - 1
				) {
					return '';
				}
				return commentGroupText(group.nodes.map(n => n.text));
			};

			const parsed: ParsedFile = {
				packageName: '',
				imports: [],
				functions: [],
				types: [],
				comments: groups.map(toCommentGroup),
			};

			for (const child of namedChildren(root)) {
				switch (child.type) {
					case 'package_clause': {
						const name = namedChildren(child).find(
							n => n.type === 'package_identifier',
						);
						parsed.packageName = name?.text ?? '';
						break;
					}
					case 'import_declaration':
						parsed.imports.push(...extractImports(child));
						break;
					case 'function_declaration':
					case 'method_declaration':
						parsed.functions.push(extractFunction(child, docFor(child)));
						break;
				}
			}

			for (const decl of typeDecls) {
				parsed.types.push(...extractTypes(decl, docFor(decl)));
			}

			if (!parsed.packageName) {
				throw new ParseError(filePath, 'missing package clause');
			}

			return parsed;
		} finally {
			tree.delete();
		}
	}

	close(): void {
		this.parser?.delete();
		this.parser = null;
		this.initializing = null;
	}

	private async getParser(): Promise<Parser> {
		if (this.parser) return this.parser;
		this.initializing ??= (async () => {
			await Parser.init();
			const language = await Parser.Language.load(GO_WASM_PATH);
			const parser = new Parser();
			parser.setLanguage(language);
			this.parser = parser;
			return parser;
		})();
		return this.initializing;
	}
}

function namedChildren(node: Node): Node[] {
	const children: Node[] = [];
	for (let i = 0; i < node.namedChildCount; i++) {
		const child = node.namedChild(i);
		if (child) children.push(child);
	}
	return children;
}

/**
 * First ERROR or MISSING node, following only subtrees that contain one.
 */
function findSyntaxError(node: Node): Node | null {
	if (node.type === 'ERROR' || node.isMissing) {
		return node;
	}
	for (let i = 0; i < node.childCount; i++) {
		const child = node.child(i);
		if (child && (child.hasError || child.isMissing)) {
			const found = findSyntaxError(child);
			if (found) return found;
		}
	}
	return null;
}

/**
 * Depth-first walk collecting comments and type declarations in source
 * order.
 */
function collectNodes(root: Node, comments: Node[], typeDecls: Node[]): void {
	const stack: Node[] = [root];

	while (stack.length > 0) {
		const node = stack.pop();
		if (!node) break;

		if (node.type === 'comment') {
			comments.push(node);
		} else if (node.type === 'type_declaration') {
			typeDecls.push(node);
		}

		const children = namedChildren(node);
		for (let i = children.length - 1; i >= 0; i--) {
			const child = children[i];
			if (child) stack.push(child);
		}
	}

	comments.sort((a, b) => a.startIndex - b.startIndex);
}

/**
 * Adjacent comments separated by at most one line break and nothing else
 * form a group.
 */
function groupComments(comments: readonly Node[], source: string): CommentNodeGroup[] {
	const groups: CommentNodeGroup[] = [];
	let current: CommentNodeGroup | null = null;

	for (const comment of comments) {
		const previous = current?.nodes.at(-1);
		if (current && previous) {
			const between = source.slice(previous.endIndex, comment.startIndex);
			const newlines = between.split('\n').length - 1;
			if (between.trim() === '' && newlines <= 1) {
				current.nodes.push(comment);
				continue;
			}
		}

		const lineStart = source.lastIndexOf('\n', comment.startIndex - 1) + 1;
		current = {
			nodes: [comment],
			ownLine: source.slice(lineStart, comment.startIndex).trim() === '',
		};
		groups.push(current);
	}

	return groups;
}

function toCommentGroup(group: CommentNodeGroup): CommentGroup {
	const first = group.nodes[0];
	return {
		line: first ? first.startPosition.row + 1 : 0,
		text: commentGroupText(group.nodes.map(n => n.text)),
	};
}

function unquote(literal: string): string {
	return literal.replace(/^["`]/, '').replace(/["`]$/, '');
}

function extractImports(decl: Node): string[] {
	const specs: Node[] = [];
	for (const child of namedChildren(decl)) {
		if (child.type === 'import_spec') {
			specs.push(child);
		} else if (child.type === 'import_spec_list') {
			specs.push(...namedChildren(child).filter(n => n.type === 'import_spec'));
		}
	}

	return specs.flatMap(spec => {
		const pathNode = spec.childForFieldName('path');
		return pathNode ? [unquote(pathNode.text)] : [];
	});
}

function extractFunction(node: Node, doc: string): FunctionDeclaration {
	const result = node.childForFieldName('result');
	let results: FieldDeclaration[] = [];
	if (result?.type === 'parameter_list') {
		results = extractParameters(result);
	} else if (result) {
		results = [{names: [], type: toTypeExpr(result)}];
	}

	return {
		name: node.childForFieldName('name')?.text ?? '',
		line: node.startPosition.row + 1,
		receiver: extractReceiver(node.childForFieldName('receiver')),
		parameters: extractParameters(node.childForFieldName('parameters')),
		results,
		doc,
	};
}

/**
 * Owner type name of a method receiver, pointer and type arguments removed.
 */
function extractReceiver(receiver: Node | null): string | null {
	if (!receiver) return null;
	const param = namedChildren(receiver).find(
		n => n.type === 'parameter_declaration',
	);
	let typeNode = param?.childForFieldName('type') ?? null;

	while (typeNode) {
		switch (typeNode.type) {
			case 'pointer_type':
			case 'parenthesized_type':
				typeNode = namedChildren(typeNode)[0] ?? null;
				break;
			case 'generic_type':
				typeNode = typeNode.childForFieldName('type');
				break;
			default:
				return typeNode.text;
		}
	}
	return null;
}

function extractParameters(list: Node | null): FieldDeclaration[] {
	if (!list) return [];

	const fields: FieldDeclaration[] = [];
	for (const param of namedChildren(list)) {
		if (
			param.type !== 'parameter_declaration' &&
			param.type !== 'variadic_parameter_declaration'
		) {
			continue;
		}
		const typeNode = param.childForFieldName('type');
		const names = namedChildren(param)
			.filter(n => n.type === 'identifier')
			.map(n => n.text);
		const type: TypeExpr =
			param.type === 'variadic_parameter_declaration' || !typeNode
				? {kind: 'other', text: param.text}
				: toTypeExpr(typeNode);
		fields.push({names, type});
	}
	return fields;
}

function toTypeExpr(node: Node): TypeExpr {
	switch (node.type) {
		case 'type_identifier':
			return {kind: 'ident', name: node.text};
		case 'qualified_type':
			return {
				kind: 'qualified',
				package: node.childForFieldName('package')?.text ?? '',
				name: node.childForFieldName('name')?.text ?? '',
			};
		case 'pointer_type':
		case 'parenthesized_type': {
			const inner = namedChildren(node)[0];
			if (!inner) break;
			return node.type === 'pointer_type'
				? {kind: 'pointer', elem: toTypeExpr(inner)}
				: toTypeExpr(inner);
		}
		case 'slice_type':
		case 'array_type': {
			const element = node.childForFieldName('element');
			if (!element) break;
			return {kind: 'slice', elem: toTypeExpr(element)};
		}
		case 'map_type': {
			const key = node.childForFieldName('key');
			const value = node.childForFieldName('value');
			if (!key || !value) break;
			return {kind: 'map', key: toTypeExpr(key), value: toTypeExpr(value)};
		}
	}
	return {kind: 'other', text: node.text};
}

function extractTypes(decl: Node, doc: string): TypeDeclaration[] {
	return namedChildren(decl)
		.filter(n => n.type === 'type_spec' || n.type === 'type_alias')
		.map(spec => {
			const typeNode = spec.childForFieldName('type');
			return {
				name: spec.childForFieldName('name')?.text ?? '',
				line: spec.startPosition.row + 1,
				shape: toTypeShape(typeNode),
				doc,
			};
		});
}

function toTypeShape(typeNode: Node | null): TypeShape {
	if (typeNode?.type === 'struct_type') {
		const fieldList = namedChildren(typeNode).find(
			n => n.type === 'field_declaration_list',
		);
		const fields = fieldList
			? namedChildren(fieldList)
					.filter(n => n.type === 'field_declaration')
					.map(extractField)
			: [];
		return {kind: 'struct', fields};
	}

	if (typeNode?.type === 'interface_type') {
		const methods = namedChildren(typeNode)
			.filter(n => n.type === 'method_elem' || n.type === 'method_spec')
			.flatMap(n => {
				const name = n.childForFieldName('name');
				return name ? [name.text] : [];
			});
		return {kind: 'interface', methods};
	}

	return {kind: 'alias'};
}

function extractField(field: Node): FieldDeclaration {
	const names = namedChildren(field)
		.filter(n => n.type === 'field_identifier')
		.map(n => n.text);
	const typeNode = field.childForFieldName('type');
	if (!typeNode) {
		return {names, type: {kind: 'other', text: field.text}};
	}

	const type = toTypeExpr(typeNode);
	// Embedded `*T` keeps its star as a bare token beside the type field
	return names.length === 0 && hasStarToken(field)
		? {names, type: {kind: 'pointer', elem: type}}
		: {names, type};
}

function hasStarToken(node: Node): boolean {
	for (let i = 0; i < node.childCount; i++) {
		if (node.child(i)?.type === '*') return true;
	}
	return false;
}
