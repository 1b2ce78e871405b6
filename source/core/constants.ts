import path from 'node:path';

/**
 * Directory name for per-project engine data (config, logs).
 * This directory should be added to .gitignore.
 */
export const SEMINDEX_DIR = '.semindex';

/**
 * Default location of the persisted index, relative to the project root.
 */
export const DEFAULT_INDEX_PATH = path.join('.ai-context', 'search-index.json');

/**
 * Get the absolute path to the engine data directory for a project.
 */
export function getSemindexDir(projectRoot: string): string {
	return path.join(projectRoot, SEMINDEX_DIR);
}

/**
 * Get the path to the config file.
 */
export function getConfigPath(projectRoot: string): string {
	return path.join(getSemindexDir(projectRoot), 'config.json');
}

/**
 * Get the path to the logs directory.
 */
export function getLogsDir(projectRoot: string): string {
	return path.join(getSemindexDir(projectRoot), 'logs');
}

/**
 * Resolve an index path against the project root.
 * Absolute paths are returned unchanged.
 */
export function resolveIndexPath(
	projectRoot: string,
	indexPath: string = DEFAULT_INDEX_PATH,
): string {
	return path.isAbsolute(indexPath)
		? indexPath
		: path.join(projectRoot, indexPath);
}

/**
 * Result type names, in the order the query engine visits them.
 */
export const RESULT_TYPES = ['function', 'type', 'interface', 'comment'] as const;

/**
 * Comments whose trimmed text is shorter than this are not indexed.
 */
export const MIN_COMMENT_LENGTH = 10;

/**
 * Maximum length of a comment excerpt in search results.
 */
export const COMMENT_CONTEXT_LENGTH = 100;
