import type {
	CommentRecord,
	FunctionRecord,
	Reference,
	TypeRecord,
} from './types.js';

/**
 * Build the reverse map keyword → references.
 *
 * Runs once, after every file has been folded into the collections.
 * Visit order is functions, then types, then comments.
 */
export function buildKeywordIndex(collections: {
	functions: readonly FunctionRecord[];
	types: readonly TypeRecord[];
	comments: readonly CommentRecord[];
}): Map<string, Reference[]> {
	const keywords = new Map<string, Reference[]>();

	const add = (keyword: string, reference: Reference) => {
		const bucket = keywords.get(keyword);
		if (bucket) {
			bucket.push(reference);
		} else {
			keywords.set(keyword, [reference]);
		}
	};

	for (const fn of collections.functions) {
		for (const keyword of fn.keywords) {
			add(keyword, {
				file: fn.file,
				line: fn.line,
				context: fn.name,
				type: 'function',
			});
		}
	}

	for (const typ of collections.types) {
		for (const keyword of typ.keywords) {
			add(keyword, {
				file: typ.file,
				line: typ.line,
				context: typ.name,
				type: 'type',
			});
		}
	}

	for (const comment of collections.comments) {
		for (const keyword of comment.keywords) {
			add(keyword, {
				file: comment.file,
				line: comment.line,
				context: comment.type,
				type: 'comment',
			});
		}
	}

	return keywords;
}
