/**
 * Relevance scoring. Every function here is pure.
 */

import type {
	CommentRecord,
	FunctionRecord,
	InterfaceRecord,
	TypeRecord,
} from '../indexer/types.js';
import {tokenize, tokenizeSlice} from '../tokenizer/index.js';

const NAME_WEIGHT = 3.0;
const PURPOSE_WEIGHT = 2.0;
const DOC_WEIGHT = 1.5;
const KEYWORD_WEIGHT = 1.0;
const METHOD_WEIGHT = 1.0;

const EXPORTED_BOOST = 1.2;
const INTERFACE_KIND_BOOST = 1.3;
const STRUCT_KIND_BOOST = 1.2;
const URGENT_COMMENT_BOOST = 1.3;
const NOTE_COMMENT_BOOST = 1.1;

/**
 * Fraction of query terms found as a substring of at least one token.
 *
 * @example
 * termMatchScore(['newwidget'], ['widget', 'config']) // 0.5
 */
export function termMatchScore(
	tokens: readonly string[],
	queryTerms: readonly string[],
): number {
	if (tokens.length === 0 || queryTerms.length === 0) {
		return 0;
	}

	let matches = 0;
	for (const term of queryTerms) {
		if (tokens.some(token => token.includes(term))) {
			matches++;
		}
	}
	return matches / queryTerms.length;
}

/**
 * Weighted name, purpose, doc and keyword matches shared by functions and
 * types.
 */
function declarationScore(
	record: FunctionRecord | TypeRecord,
	queryTerms: readonly string[],
): number {
	return (
		termMatchScore(tokenize(record.name), queryTerms) * NAME_WEIGHT +
		termMatchScore(tokenize(record.purpose), queryTerms) * PURPOSE_WEIGHT +
		termMatchScore(tokenize(record.docComment), queryTerms) * DOC_WEIGHT +
		termMatchScore(tokenizeSlice(record.keywords), queryTerms) * KEYWORD_WEIGHT
	);
}

export function scoreFunction(
	fn: FunctionRecord,
	queryTerms: readonly string[],
): number {
	const score = declarationScore(fn, queryTerms);
	return fn.isExported ? score * EXPORTED_BOOST : score;
}

/**
 * Kind boost first, exported boost last.
 */
export function scoreType(typ: TypeRecord, queryTerms: readonly string[]): number {
	let score = declarationScore(typ, queryTerms);

	if (typ.kind === 'interface') {
		score *= INTERFACE_KIND_BOOST;
	} else if (typ.kind === 'struct') {
		score *= STRUCT_KIND_BOOST;
	}

	return typ.isExported ? score * EXPORTED_BOOST : score;
}

export function scoreInterface(
	iface: InterfaceRecord,
	queryTerms: readonly string[],
): number {
	let score = termMatchScore(tokenize(iface.name), queryTerms) * NAME_WEIGHT;
	for (const method of iface.methods) {
		score += termMatchScore(tokenize(method), queryTerms) * METHOD_WEIGHT;
	}
	return score;
}

export function scoreComment(
	comment: CommentRecord,
	queryTerms: readonly string[],
): number {
	const score = termMatchScore(tokenize(comment.text), queryTerms);

	switch (comment.type) {
		case 'todo':
		case 'fixme':
			return score * URGENT_COMMENT_BOOST;
		case 'note':
			return score * NOTE_COMMENT_BOOST;
		default:
			return score;
	}
}
