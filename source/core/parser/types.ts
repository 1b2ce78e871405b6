/**
 * Declaration values produced by a structural parser.
 *
 * The indexer only ever sees these shapes, never a syntax tree, so any
 * parser (tree-sitter, a test fake) can feed it.
 */

/**
 * A type expression as written in source. Shapes the printer does not know
 * are carried as `other` and print as a placeholder.
 */
export type TypeExpr =
	| {kind: 'ident'; name: string}
	| {kind: 'qualified'; package: string; name: string}
	| {kind: 'pointer'; elem: TypeExpr}
	| {kind: 'slice'; elem: TypeExpr}
	| {kind: 'map'; key: TypeExpr; value: TypeExpr}
	| {kind: 'other'; text: string};

/**
 * One entry of a parameter, result or field list.
 * `names` is empty for unnamed parameters and embedded fields.
 */
export interface FieldDeclaration {
	names: string[];
	type: TypeExpr;
}

export interface FunctionDeclaration {
	name: string;
	/** 1-indexed line of the declaration */
	line: number;
	/** Receiver type name for methods (pointer stripped), null for functions */
	receiver: string | null;
	parameters: FieldDeclaration[];
	results: FieldDeclaration[];
	/** Normalized doc comment text, '' when absent */
	doc: string;
}

export type TypeShape =
	| {kind: 'struct'; fields: FieldDeclaration[]}
	| {kind: 'interface'; methods: string[]}
	| {kind: 'alias'};

export interface TypeDeclaration {
	name: string;
	line: number;
	shape: TypeShape;
	doc: string;
}

export interface CommentGroup {
	/** Line of the first comment in the group */
	line: number;
	/** Text with comment markers removed */
	text: string;
}

export interface ParsedFile {
	packageName: string;
	/** Import paths, unquoted */
	imports: string[];
	functions: FunctionDeclaration[];
	types: TypeDeclaration[];
	comments: CommentGroup[];
}

/**
 * A structural parser for one source language.
 */
export interface DeclarationParser {
	/** Load grammars or other resources. Safe to call more than once. */
	initialize(): Promise<void>;
	/**
	 * Extract declarations from one file.
	 * Throws ParseError when the source cannot be parsed.
	 */
	parse(filePath: string, source: string): Promise<ParsedFile>;
	close(): void;
}
