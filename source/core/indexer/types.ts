/**
 * Records held by a CodeIndex.
 */

export type TypeKind = 'struct' | 'interface' | 'alias';

export type CommentType =
	| 'todo'
	| 'fixme'
	| 'note'
	| 'warning'
	| 'doc'
	| 'comment';

/** Origin of a keyword reference. Files are not reverse-indexed. */
export type ReferenceType = 'function' | 'type' | 'comment';

export interface FileRecord {
	/** Path relative to the project root, '/'-separated */
	path: string;
	package: string;
	imports: string[];
	/** Newline count + 1 */
	loc: number;
	purpose: string;
	keywords: string[];
	lastModified: Date;
}

export interface FunctionRecord {
	name: string;
	file: string;
	line: number;
	/** Owner type name for methods */
	receiver: string | null;
	/** "name type" or "type" descriptors */
	parameters: string[];
	returnTypes: string[];
	isExported: boolean;
	docComment: string;
	purpose: string;
	keywords: string[];
}

export interface TypeRecord {
	name: string;
	file: string;
	line: number;
	kind: TypeKind;
	fields: string[];
	/** Interface method names, or receiver methods for struct and alias types */
	methods: string[];
	isExported: boolean;
	docComment: string;
	purpose: string;
	keywords: string[];
}

export interface InterfaceRecord {
	name: string;
	package: string;
	file: string;
	methods: string[];
	/** "package.Type" of every type whose method set covers `methods` */
	implementers: string[];
}

export interface CommentRecord {
	file: string;
	line: number;
	text: string;
	type: CommentType;
	keywords: string[];
}

export interface Reference {
	file: string;
	line: number;
	/** Function or type name, or the comment classification */
	context: string;
	type: ReferenceType;
}

/**
 * A complete, published index. Never mutated once built or loaded.
 */
export interface CodeIndex {
	readonly generatedAt: Date;
	readonly files: readonly FileRecord[];
	readonly functions: readonly FunctionRecord[];
	readonly types: readonly TypeRecord[];
	readonly interfaces: readonly InterfaceRecord[];
	readonly comments: readonly CommentRecord[];
	readonly keywords: ReadonlyMap<string, readonly Reference[]>;
}

/**
 * Counts reported by a build.
 */
export interface IndexStats {
	/** Eligible files found by the walker */
	filesScanned: number;
	files: number;
	functions: number;
	types: number;
	interfaces: number;
	comments: number;
	keywords: number;
	/** Files skipped because they could not be read or parsed */
	failedFiles: number;
	durationMs: number;
}

/**
 * Progress callback for build operations.
 */
export type ProgressCallback = (
	current: number,
	total: number,
	stage: string,
) => void;

/**
 * Count the records of an index.
 */
export function countIndex(
	index: CodeIndex,
): Omit<IndexStats, 'filesScanned' | 'failedFiles' | 'durationMs'> {
	return {
		files: index.files.length,
		functions: index.functions.length,
		types: index.types.length,
		interfaces: index.interfaces.length,
		comments: index.comments.length,
		keywords: index.keywords.size,
	};
}
