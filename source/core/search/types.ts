/**
 * Search query and result types.
 */

import type {RESULT_TYPES} from '../constants.js';

export type ResultType = (typeof RESULT_TYPES)[number];

export interface SearchQuery {
	/** Free text; tokenized with the same rules as indexed text */
	query: string;
	/** Result types to include; empty or absent means all */
	types?: readonly ResultType[];
	/** Glob patterns or path prefixes a result's file must match */
	files?: readonly string[];
	/** Package names a result's file must belong to */
	packages?: readonly string[];
	/** Only exported functions and types (interfaces and comments unaffected) */
	exportedOnly?: boolean;
	/** Maximum number of results; 0 or absent means no limit */
	limit?: number;
}

export interface SearchResult {
	file: string;
	line: number;
	type: ResultType;
	/** Declaration name, or the classification for comments */
	name: string;
	context: string;
	relevance: number;
	keywords: string[];
}

export interface SearchResponse {
	query: string;
	results: SearchResult[];
	count: number;
}
