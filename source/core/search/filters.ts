/**
 * Candidate filters applied before scoring.
 */

import {minimatch} from 'minimatch';
import type {CodeIndex} from '../indexer/types.js';
import type {SearchQuery} from './types.js';

/**
 * Matches a file path against a glob pattern, or treats a pattern without
 * glob characters as a path prefix.
 */
export function matchesFilePattern(file: string, pattern: string): boolean {
	if (/[*?[\]{}]/.test(pattern)) {
		return minimatch(file, pattern, {dot: true});
	}
	return file.startsWith(pattern.replace(/^\.\//, ''));
}

/**
 * Build a predicate over file paths from the query's files and packages
 * filters. Returns null when neither filter is set.
 */
export function buildFileFilter(
	index: CodeIndex,
	query: SearchQuery,
): ((file: string) => boolean) | null {
	const patterns = query.files ?? [];
	const packages = new Set(query.packages ?? []);
	if (patterns.length === 0 && packages.size === 0) {
		return null;
	}

	const packageOf = new Map(index.files.map(f => [f.path, f.package]));
	const cache = new Map<string, boolean>();

	return file => {
		const cached = cache.get(file);
		if (cached !== undefined) return cached;

		const pkg = packageOf.get(file);
		const included =
			(patterns.length === 0 ||
				patterns.some(pattern => matchesFilePattern(file, pattern))) &&
			(packages.size === 0 || (pkg !== undefined && packages.has(pkg)));

		cache.set(file, included);
		return included;
	};
}
