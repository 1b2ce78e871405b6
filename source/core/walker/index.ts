/**
 * Directory walker - enumerates the eligible source files of a project.
 */

import fs from 'node:fs/promises';
import fg from 'fast-glob';
import {WalkError} from '../errors.js';
import {excludeToGlob, loadGitignore} from './gitignore.js';

export {loadGitignore, type Ignore} from './gitignore.js';

export interface WalkOptions {
	/** Extensions to keep, with the leading dot */
	extensions: readonly string[];
	/** Directory names skipped at any depth */
	excludePatterns: readonly string[];
	respectGitignore: boolean;
}

/**
 * List eligible files under `projectRoot`.
 *
 * Returned paths are relative to the root, '/'-separated and sorted, so two
 * walks of the same tree yield the same order.
 * Throws WalkError when the root is missing, is not a directory or cannot
 * be read.
 */
export async function walkSourceFiles(
	projectRoot: string,
	options: WalkOptions,
): Promise<string[]> {
	try {
		const stats = await fs.stat(projectRoot);
		if (!stats.isDirectory()) {
			throw new Error('not a directory');
		}
	} catch (error) {
		throw new WalkError(projectRoot, error);
	}

	let files: string[];
	try {
		const gitignore = options.respectGitignore
			? await loadGitignore(projectRoot)
			: null;

		// Exclude globs prune whole directories; .gitignore rules filter after
		const found = await fg('**/*', {
			cwd: projectRoot,
			dot: true,
			onlyFiles: true,
			followSymbolicLinks: false,
			ignore: excludeToGlob(options.excludePatterns),
			suppressErrors: false,
		});
		files = gitignore ? found.filter(file => !gitignore.ignores(file)) : found;
	} catch (error) {
		throw new WalkError(projectRoot, error);
	}

	return files
		.filter(file => hasExtension(file, options.extensions))
		.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

function hasExtension(file: string, extensions: readonly string[]): boolean {
	return extensions.some(ext => file.endsWith(ext));
}
