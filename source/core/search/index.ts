/**
 * Query engine - scores every enabled collection of a CodeIndex against a
 * free-text query and returns the merged, ranked results.
 */

import {RESULT_TYPES} from '../constants.js';
import type {CodeIndex} from '../indexer/types.js';
import {dedupe, tokenize} from '../tokenizer/index.js';
import {
	formatFunctionContext,
	formatInterfaceContext,
	formatTypeContext,
	truncateText,
} from './context.js';
import {buildFileFilter} from './filters.js';
import {scoreComment, scoreFunction, scoreInterface, scoreType} from './scorer.js';
import type {
	ResultType,
	SearchQuery,
	SearchResponse,
	SearchResult,
} from './types.js';

export type {
	ResultType,
	SearchQuery,
	SearchResponse,
	SearchResult,
} from './types.js';
export {termMatchScore} from './scorer.js';
export {truncateText} from './context.js';
export {matchesFilePattern} from './filters.js';

/**
 * Run a query against an index. Never mutates the index.
 */
export function searchIndex(index: CodeIndex, query: SearchQuery): SearchResponse {
	const queryTerms = dedupe(tokenize(query.query));
	const enabled: ReadonlySet<ResultType> = new Set(
		query.types && query.types.length > 0 ? query.types : RESULT_TYPES,
	);
	const fileFilter = buildFileFilter(index, query);
	const included = (file: string) => !fileFilter || fileFilter(file);
	const exportedOnly = query.exportedOnly ?? false;

	const results: SearchResult[] = [];

	if (enabled.has('function')) {
		for (const fn of index.functions) {
			if ((exportedOnly && !fn.isExported) || !included(fn.file)) continue;
			const relevance = scoreFunction(fn, queryTerms);
			if (relevance > 0) {
				results.push({
					file: fn.file,
					line: fn.line,
					type: 'function',
					name: fn.name,
					context: formatFunctionContext(fn),
					relevance,
					keywords: [...fn.keywords],
				});
			}
		}
	}

	if (enabled.has('type')) {
		for (const typ of index.types) {
			if ((exportedOnly && !typ.isExported) || !included(typ.file)) continue;
			const relevance = scoreType(typ, queryTerms);
			if (relevance > 0) {
				results.push({
					file: typ.file,
					line: typ.line,
					type: 'type',
					name: typ.name,
					context: formatTypeContext(typ),
					relevance,
					keywords: [...typ.keywords],
				});
			}
		}
	}

	if (enabled.has('interface')) {
		for (const iface of index.interfaces) {
			if (!included(iface.file)) continue;
			const relevance = scoreInterface(iface, queryTerms);
			if (relevance > 0) {
				results.push({
					file: iface.file,
					// Interface records carry no line of their own
					line: 0,
					type: 'interface',
					name: iface.name,
					context: formatInterfaceContext(iface),
					relevance,
					keywords: [],
				});
			}
		}
	}

	if (enabled.has('comment')) {
		for (const comment of index.comments) {
			if (!included(comment.file)) continue;
			const relevance = scoreComment(comment, queryTerms);
			if (relevance > 0) {
				results.push({
					file: comment.file,
					line: comment.line,
					type: 'comment',
					name: comment.type,
					context: truncateText(comment.text),
					relevance,
					keywords: [...comment.keywords],
				});
			}
		}
	}

	// Array.prototype.sort is stable: equal scores keep collection order
	results.sort((a, b) => b.relevance - a.relevance);

	const limit = query.limit ?? 0;
	const limited = limit > 0 ? results.slice(0, limit) : results;

	return {query: query.query, results: limited, count: limited.length};
}
