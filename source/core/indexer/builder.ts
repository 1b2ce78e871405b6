/**
 * IndexBuilder - folds parsed files into the flat record collections.
 *
 * One builder produces one CodeIndex. Files are added in walk order; build()
 * then resolves interface implementers and the keyword map in a single
 * post-pass and seals the builder.
 */

import path from 'node:path';
import {MIN_COMMENT_LENGTH} from '../constants.js';
import {
	extractCommentKeywords,
	extractFileKeywords,
	extractFunctionKeywords,
	extractTypeKeywords,
} from '../keywords/index.js';
import type {
	CommentGroup,
	FunctionDeclaration,
	ParsedFile,
	TypeDeclaration,
} from '../parser/types.js';
import {
	classifyComment,
	inferFilePurpose,
	inferFunctionPurpose,
	inferTypePurpose,
} from '../purpose/index.js';
import {describeFields, describeResults} from './descriptors.js';
import {buildKeywordIndex} from './keyword-index.js';
import type {
	CodeIndex,
	CommentRecord,
	FileRecord,
	FunctionRecord,
	InterfaceRecord,
	TypeRecord,
} from './types.js';

export interface FileMetadata {
	/** Raw file content, used for the line count */
	content: string;
	lastModified: Date;
}

/**
 * Go's export rule: the name starts with an upper-case letter.
 */
export function isExportedName(name: string): boolean {
	const first = name.codePointAt(0);
	if (first === undefined) return false;
	const char = String.fromCodePoint(first);
	return /\p{Lu}/u.test(char);
}

export class IndexBuilder {
	private readonly files: FileRecord[] = [];
	private readonly functions: FunctionRecord[] = [];
	private readonly types: TypeRecord[] = [];
	private readonly interfaces: InterfaceRecord[] = [];
	private readonly comments: CommentRecord[] = [];
	/** File path → package name, for package-scoped method sets */
	private readonly packages = new Map<string, string>();
	private sealed = false;

	/**
	 * Append one file's records.
	 */
	addFile(filePath: string, parsed: ParsedFile, meta: FileMetadata): void {
		this.assertOpen();

		this.packages.set(filePath, parsed.packageName);
		this.files.push({
			path: filePath,
			package: parsed.packageName,
			imports: [...parsed.imports],
			loc: countLines(meta.content),
			purpose: inferFilePurpose(filePath, parsed.packageName),
			keywords: extractFileKeywords(parsed.packageName, parsed.imports),
			lastModified: meta.lastModified,
		});

		for (const fn of parsed.functions) {
			this.functions.push(toFunctionRecord(filePath, fn));
		}

		for (const decl of parsed.types) {
			const record = toTypeRecord(filePath, decl);
			this.types.push(record);
			if (decl.shape.kind === 'interface') {
				this.interfaces.push({
					name: decl.name,
					package: parsed.packageName,
					file: filePath,
					methods: [...decl.shape.methods],
					implementers: [],
				});
			}
		}

		for (const group of parsed.comments) {
			const record = toCommentRecord(filePath, group);
			if (record) {
				this.comments.push(record);
			}
		}
	}

	/**
	 * Run the post-pass and return the finished index. The builder cannot be
	 * used afterwards.
	 */
	build(generatedAt: Date = new Date()): CodeIndex {
		this.assertOpen();
		this.sealed = true;

		const types = this.attachReceiverMethods();
		const interfaces = this.resolveImplementers(types);
		const keywords = buildKeywordIndex({
			functions: this.functions,
			types,
			comments: this.comments,
		});

		return Object.freeze({
			generatedAt,
			files: Object.freeze(this.files),
			functions: Object.freeze(this.functions),
			types: Object.freeze(types),
			interfaces: Object.freeze(interfaces),
			comments: Object.freeze(this.comments),
			keywords,
		});
	}

	/**
	 * Struct and alias types get the names of methods declared on them in the
	 * same package, possibly in another file. A package is its directory plus
	 * its name, so two directories both named `util` stay apart.
	 */
	private attachReceiverMethods(): TypeRecord[] {
		const methodSets = new Map<string, string[]>();
		for (const fn of this.functions) {
			if (!fn.receiver) continue;
			const key = this.typeKey(fn.file, fn.receiver);
			const methods = methodSets.get(key);
			if (methods) {
				methods.push(fn.name);
			} else {
				methodSets.set(key, [fn.name]);
			}
		}

		return this.types.map(typ =>
			typ.kind === 'interface'
				? typ
				: {...typ, methods: methodSets.get(this.typeKey(typ.file, typ.name)) ?? []},
		);
	}

	/**
	 * An implementer is a non-interface type whose method set contains every
	 * method name of the interface. Empty interfaces list no implementers.
	 */
	private resolveImplementers(types: readonly TypeRecord[]): InterfaceRecord[] {
		const candidates = types.filter(
			typ => typ.kind !== 'interface' && typ.methods.length > 0,
		);

		return this.interfaces.map(iface => {
			if (iface.methods.length === 0) {
				return iface;
			}
			const implementers = candidates
				.filter(typ => {
					const methodSet = new Set(typ.methods);
					return iface.methods.every(method => methodSet.has(method));
				})
				.map(typ => `${this.packages.get(typ.file) ?? ''}.${typ.name}`);
			return {...iface, implementers};
		});
	}

	private typeKey(filePath: string, typeName: string): string {
		const dir = path.posix.dirname(filePath);
		return `${dir}\u0000${this.packages.get(filePath) ?? ''}\u0000${typeName}`;
	}

	private assertOpen(): void {
		if (this.sealed) {
			throw new Error('IndexBuilder already built; create a new builder');
		}
	}
}

function countLines(content: string): number {
	let newlines = 0;
	for (const char of content) {
		if (char === '\n') newlines++;
	}
	return newlines + 1;
}

function toFunctionRecord(
	filePath: string,
	fn: FunctionDeclaration,
): FunctionRecord {
	const purpose = inferFunctionPurpose(fn.name);
	return {
		name: fn.name,
		file: filePath,
		line: fn.line,
		receiver: fn.receiver,
		parameters: describeFields(fn.parameters),
		returnTypes: describeResults(fn.results),
		isExported: isExportedName(fn.name),
		docComment: fn.doc,
		purpose,
		keywords: extractFunctionKeywords({
			name: fn.name,
			receiver: fn.receiver,
			purpose,
		}),
	};
}

function toTypeRecord(filePath: string, decl: TypeDeclaration): TypeRecord {
	const {shape} = decl;
	const purpose = inferTypePurpose(decl.name, shape.kind);
	return {
		name: decl.name,
		file: filePath,
		line: decl.line,
		kind: shape.kind,
		fields: shape.kind === 'struct' ? describeFields(shape.fields) : [],
		methods: shape.kind === 'interface' ? [...shape.methods] : [],
		isExported: isExportedName(decl.name),
		docComment: decl.doc,
		purpose,
		keywords: extractTypeKeywords({name: decl.name, kind: shape.kind, purpose}),
	};
}

/**
 * Returns null for comments too short to index.
 */
function toCommentRecord(
	filePath: string,
	group: CommentGroup,
): CommentRecord | null {
	if ([...group.text.trim()].length < MIN_COMMENT_LENGTH) {
		return null;
	}
	return {
		file: filePath,
		line: group.line,
		text: group.text,
		type: classifyComment(group.text),
		keywords: extractCommentKeywords(group.text),
	};
}
