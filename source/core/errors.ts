/**
 * Error types raised by the indexer, search engine and index store.
 */

/**
 * Thrown by search (and save) when no index has been built or loaded.
 */
export class IndexNotBuiltError extends Error {
	constructor() {
		super('index not built - call buildIndex or loadIndex first');
		this.name = 'IndexNotBuiltError';
	}
}

/**
 * The project tree could not be enumerated. Fatal to a build.
 */
export class WalkError extends Error {
	readonly root: string;

	constructor(root: string, cause: unknown) {
		super(`failed to walk directory ${root}: ${describeCause(cause)}`, {
			cause,
		});
		this.name = 'WalkError';
		this.root = root;
	}
}

/**
 * One file could not be parsed. The indexer logs it and skips the file.
 */
export class ParseError extends Error {
	readonly file: string;

	constructor(file: string, message: string, cause?: unknown) {
		super(`failed to parse ${file}: ${message}`, {cause});
		this.name = 'ParseError';
		this.file = file;
	}
}

export type PersistenceOperation = 'save' | 'load';

/**
 * Reading or writing the persisted index failed.
 */
export class IndexPersistenceError extends Error {
	readonly operation: PersistenceOperation;
	readonly path: string;

	constructor(operation: PersistenceOperation, path: string, cause: unknown) {
		super(`failed to ${operation} index at ${path}: ${describeCause(cause)}`, {
			cause,
		});
		this.name = 'IndexPersistenceError';
		this.operation = operation;
		this.path = path;
	}
}

/**
 * The project config file exists but is not valid.
 */
export class ConfigError extends Error {
	readonly path: string;

	constructor(path: string, cause: unknown) {
		super(`invalid config at ${path}: ${describeCause(cause)}`, {cause});
		this.name = 'ConfigError';
		this.path = path;
	}
}

export function describeCause(cause: unknown): string {
	if (cause instanceof Error) {
		return cause.message;
	}
	return String(cause);
}
