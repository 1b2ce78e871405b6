/**
 * Test helpers: fixture copies and in-memory declaration builders.
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {ParseError} from '../errors.js';
import type {
	CommentGroup,
	DeclarationParser,
	FieldDeclaration,
	FunctionDeclaration,
	ParsedFile,
	TypeDeclaration,
	TypeExpr,
} from '../parser/types.js';

/** Path to the checked-in test fixtures */
export const FIXTURES_ROOT = path.join(process.cwd(), 'test-fixtures');

/** Test context with temp directory and cleanup */
export interface TestContext {
	projectRoot: string;
	cleanup: () => Promise<void>;
}

/**
 * Copy a fixture directory to a unique temp directory.
 */
export async function copyFixtureToTemp(
	fixtureName: string = 'gocode',
): Promise<TestContext> {
	const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'semindex-test-'));
	await fs.cp(path.join(FIXTURES_ROOT, fixtureName), tempDir, {
		recursive: true,
	});

	return {
		projectRoot: tempDir,
		cleanup: async () => {
			await fs.rm(tempDir, {recursive: true, force: true});
		},
	};
}

/**
 * Create an empty temp project and write the given files into it.
 */
export async function createTempProject(
	files: Record<string, string>,
): Promise<TestContext> {
	const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'semindex-test-'));
	for (const [relativePath, content] of Object.entries(files)) {
		const fullPath = path.join(tempDir, relativePath);
		await fs.mkdir(path.dirname(fullPath), {recursive: true});
		await fs.writeFile(fullPath, content);
	}

	return {
		projectRoot: tempDir,
		cleanup: async () => {
			await fs.rm(tempDir, {recursive: true, force: true});
		},
	};
}

export const ident = (name: string): TypeExpr => ({kind: 'ident', name});

export function field(names: string[], type: TypeExpr): FieldDeclaration {
	return {names, type};
}

export function fn(
	name: string,
	overrides: Partial<FunctionDeclaration> = {},
): FunctionDeclaration {
	return {
		name,
		line: 1,
		receiver: null,
		parameters: [],
		results: [],
		doc: '',
		...overrides,
	};
}

export function struct(
	name: string,
	fields: FieldDeclaration[],
	overrides: Partial<TypeDeclaration> = {},
): TypeDeclaration {
	return {name, line: 1, shape: {kind: 'struct', fields}, doc: '', ...overrides};
}

export function iface(
	name: string,
	methods: string[],
	overrides: Partial<TypeDeclaration> = {},
): TypeDeclaration {
	return {name, line: 1, shape: {kind: 'interface', methods}, doc: '', ...overrides};
}

export function comment(text: string, line: number = 1): CommentGroup {
	return {line, text};
}

export function parsedFile(
	packageName: string,
	overrides: Partial<ParsedFile> = {},
): ParsedFile {
	return {
		packageName,
		imports: [],
		functions: [],
		types: [],
		comments: [],
		...overrides,
	};
}

/**
 * A DeclarationParser that returns canned results by path. Paths mapped to
 * null fail with ParseError; unknown paths parse as an empty file.
 */
export class FakeParser implements DeclarationParser {
	readonly parsed: string[] = [];
	initialized = 0;
	closed = false;

	constructor(private readonly files: Record<string, ParsedFile | null>) {}

	async initialize(): Promise<void> {
		this.initialized++;
	}

	async parse(filePath: string): Promise<ParsedFile> {
		this.parsed.push(filePath);
		const result = this.files[filePath];
		if (result === null) {
			throw new ParseError(filePath, 'syntax error at line 1');
		}
		return result ?? parsedFile('empty');
	}

	close(): void {
		this.closed = true;
	}
}
