/**
 * Persisted index format.
 *
 * The document uses snake_case keys; records in memory use camelCase.
 * Rows are validated with zod on load.
 */

import {z} from 'zod';
import type {
	CodeIndex,
	CommentRecord,
	FileRecord,
	FunctionRecord,
	InterfaceRecord,
	Reference,
	TypeRecord,
} from '../indexer/types.js';

const isoDate = z.string().datetime({offset: true});

const fileRowSchema = z.object({
	path: z.string(),
	package: z.string(),
	imports: z.array(z.string()),
	loc: z.number().int().nonnegative(),
	purpose: z.string(),
	keywords: z.array(z.string()),
	last_modified: isoDate,
});

const functionRowSchema = z.object({
	name: z.string(),
	file: z.string(),
	line: z.number().int(),
	receiver: z.string().optional(),
	parameters: z.array(z.string()),
	return_types: z.array(z.string()),
	is_exported: z.boolean(),
	doc_comment: z.string(),
	purpose: z.string(),
	keywords: z.array(z.string()),
});

const typeRowSchema = z.object({
	name: z.string(),
	file: z.string(),
	line: z.number().int(),
	kind: z.enum(['struct', 'interface', 'alias']),
	fields: z.array(z.string()),
	methods: z.array(z.string()),
	is_exported: z.boolean(),
	doc_comment: z.string(),
	purpose: z.string(),
	keywords: z.array(z.string()),
});

const interfaceRowSchema = z.object({
	name: z.string(),
	package: z.string(),
	file: z.string(),
	methods: z.array(z.string()),
	implementers: z.array(z.string()),
});

const commentRowSchema = z.object({
	file: z.string(),
	line: z.number().int(),
	text: z.string(),
	type: z.enum(['todo', 'fixme', 'note', 'warning', 'doc', 'comment']),
	keywords: z.array(z.string()),
});

const referenceRowSchema = z.object({
	file: z.string(),
	line: z.number().int(),
	context: z.string(),
	type: z.enum(['function', 'type', 'comment']),
});

export const indexDocumentSchema = z.object({
	generated_at: isoDate,
	files: z.array(fileRowSchema),
	functions: z.array(functionRowSchema),
	types: z.array(typeRowSchema),
	interfaces: z.array(interfaceRowSchema),
	comments: z.array(commentRowSchema),
	keywords: z.record(z.array(referenceRowSchema)),
});

export type FileRow = z.infer<typeof fileRowSchema>;
export type FunctionRow = z.infer<typeof functionRowSchema>;
export type TypeRow = z.infer<typeof typeRowSchema>;
export type InterfaceRow = z.infer<typeof interfaceRowSchema>;
export type CommentRow = z.infer<typeof commentRowSchema>;
export type IndexDocument = z.infer<typeof indexDocumentSchema>;

function fileToRow(file: FileRecord): FileRow {
	return {
		path: file.path,
		package: file.package,
		imports: file.imports,
		loc: file.loc,
		purpose: file.purpose,
		keywords: file.keywords,
		last_modified: file.lastModified.toISOString(),
	};
}

function rowToFile(row: FileRow): FileRecord {
	return {
		path: row.path,
		package: row.package,
		imports: row.imports,
		loc: row.loc,
		purpose: row.purpose,
		keywords: row.keywords,
		lastModified: new Date(row.last_modified),
	};
}

function functionToRow(fn: FunctionRecord): FunctionRow {
	return {
		name: fn.name,
		file: fn.file,
		line: fn.line,
		// Omitted for plain functions
		...(fn.receiver ? {receiver: fn.receiver} : {}),
		parameters: fn.parameters,
		return_types: fn.returnTypes,
		is_exported: fn.isExported,
		doc_comment: fn.docComment,
		purpose: fn.purpose,
		keywords: fn.keywords,
	};
}

function rowToFunction(row: FunctionRow): FunctionRecord {
	return {
		name: row.name,
		file: row.file,
		line: row.line,
		receiver: row.receiver ?? null,
		parameters: row.parameters,
		returnTypes: row.return_types,
		isExported: row.is_exported,
		docComment: row.doc_comment,
		purpose: row.purpose,
		keywords: row.keywords,
	};
}

function typeToRow(typ: TypeRecord): TypeRow {
	return {
		name: typ.name,
		file: typ.file,
		line: typ.line,
		kind: typ.kind,
		fields: typ.fields,
		methods: typ.methods,
		is_exported: typ.isExported,
		doc_comment: typ.docComment,
		purpose: typ.purpose,
		keywords: typ.keywords,
	};
}

function rowToType(row: TypeRow): TypeRecord {
	return {
		name: row.name,
		file: row.file,
		line: row.line,
		kind: row.kind,
		fields: row.fields,
		methods: row.methods,
		isExported: row.is_exported,
		docComment: row.doc_comment,
		purpose: row.purpose,
		keywords: row.keywords,
	};
}

/**
 * Convert an index to its persisted document.
 */
export function indexToDocument(index: CodeIndex): IndexDocument {
	const keywords: Record<string, Reference[]> = {};
	for (const [keyword, references] of index.keywords) {
		keywords[keyword] = [...references];
	}

	return {
		generated_at: index.generatedAt.toISOString(),
		files: index.files.map(fileToRow),
		functions: index.functions.map(functionToRow),
		types: index.types.map(typeToRow),
		interfaces: index.interfaces.map((iface): InterfaceRow => ({...iface})),
		comments: index.comments.map((comment): CommentRow => ({...comment})),
		keywords,
	};
}

/**
 * Convert a validated document back to an index.
 */
export function documentToIndex(doc: IndexDocument): CodeIndex {
	const interfaces: InterfaceRecord[] = doc.interfaces.map(row => ({...row}));
	const comments: CommentRecord[] = doc.comments.map(row => ({...row}));

	return Object.freeze({
		generatedAt: new Date(doc.generated_at),
		files: Object.freeze(doc.files.map(rowToFile)),
		functions: Object.freeze(doc.functions.map(rowToFunction)),
		types: Object.freeze(doc.types.map(rowToType)),
		interfaces: Object.freeze(interfaces),
		comments: Object.freeze(comments),
		keywords: new Map(Object.entries(doc.keywords)),
	});
}
