/**
 * .gitignore handling for the walker.
 *
 * Matching is done by the `ignore` package, so negations, anchoring and
 * directory-only rules follow git's semantics.
 */

import fs from 'node:fs/promises';
import {createRequire} from 'node:module';
import path from 'node:path';

export interface Ignore {
	add(patterns: string | readonly string[]): this;
	ignores(pathname: string): boolean;
}

// ignore is a CJS module; its default export does not survive NodeNext interop
const require = createRequire(import.meta.url);
const ignore: () => Ignore = require('ignore');

/**
 * Build a matcher from the project's root .gitignore.
 * A missing .gitignore yields a matcher that ignores nothing.
 */
export async function loadGitignore(projectRoot: string): Promise<Ignore> {
	const ig = ignore();

	try {
		ig.add(await fs.readFile(path.join(projectRoot, '.gitignore'), 'utf-8'));
	} catch (error) {
		if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
			throw error;
		}
	}

	return ig;
}

/**
 * Glob patterns for configured exclude names (directory names matched at any
 * depth). These prune the walk itself.
 */
export function excludeToGlob(excludePatterns: readonly string[]): string[] {
	return excludePatterns.map(p => `**/${p}/**`);
}
