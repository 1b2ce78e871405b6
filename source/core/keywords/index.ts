/**
 * Keyword sets attached to each record.
 *
 * Function and type keywords feed the reverse index; file keywords are
 * kept on the record only.
 */

import {dedupe, tokenize} from '../tokenizer/index.js';
import type {TypeKind} from '../indexer/types.js';

const COMMENT_STOPWORDS: ReadonlySet<string> = new Set([
	'the',
	'and',
	'for',
	'this',
	'that',
	'with',
	'from',
	'are',
	'was',
	'will',
	'have',
	'has',
	'can',
	'could',
	'should',
]);

/** Comment keywords must be longer than this. */
const MIN_COMMENT_KEYWORD_EXCLUSIVE = 3;

export function extractFunctionKeywords(fn: {
	name: string;
	receiver: string | null;
	purpose: string;
}): string[] {
	return dedupe([
		...tokenize(fn.name),
		fn.receiver?.toLowerCase() ?? '',
		...tokenize(fn.purpose),
	]);
}

export function extractTypeKeywords(typ: {
	name: string;
	kind: TypeKind;
	purpose: string;
}): string[] {
	return dedupe([...tokenize(typ.name), typ.kind, ...tokenize(typ.purpose)]);
}

/**
 * Package name plus the last path segment of every import.
 */
export function extractFileKeywords(
	packageName: string,
	imports: readonly string[],
): string[] {
	const lastSegments = imports.map(
		importPath => importPath.split('/').at(-1) ?? '',
	);
	return dedupe([packageName, ...lastSegments].map(k => k.toLowerCase()));
}

export function extractCommentKeywords(text: string): string[] {
	return dedupe(
		tokenize(text).filter(
			token =>
				!COMMENT_STOPWORDS.has(token) &&
				[...token].length > MIN_COMMENT_KEYWORD_EXCLUSIVE,
		),
	);
}
