/**
 * Tokenizer shared by indexing and query scoring.
 *
 * A token is a run of Unicode letters or decimal digits, lower-cased, and
 * longer than two code points. The same rule applies to names, purposes,
 * doc text, comments and queries.
 */

const WORD_CHAR = /[\p{L}\p{Nd}]/u;
const NON_WORD_CHARS = /[^\p{L}\p{Nd}]/gu;

/** Tokens must be longer than this many code points. */
const MIN_TOKEN_EXCLUSIVE = 2;

/**
 * Split text into lower-cased alphanumeric tokens.
 *
 * @example
 * tokenize('NewWidget(ctx, id)') // ['newwidget', 'ctx']
 */
export function tokenize(text: string): string[] {
	const tokens: string[] = [];
	let current = '';

	const flush = () => {
		if (current.length === 0) return;
		// Lower-casing can introduce combining marks (e.g. U+0130), drop them
		const token = current.toLowerCase().replace(NON_WORD_CHARS, '');
		if ([...token].length > MIN_TOKEN_EXCLUSIVE) {
			tokens.push(token);
		}
		current = '';
	};

	for (const char of text) {
		if (WORD_CHAR.test(char)) {
			current += char;
		} else {
			flush();
		}
	}
	flush();

	return tokens;
}

/**
 * Tokenize every label in a list and concatenate the results.
 */
export function tokenizeSlice(labels: readonly string[]): string[] {
	return labels.flatMap(label => tokenize(label));
}

/**
 * Remove duplicates and empty strings, keeping first-seen order.
 */
export function dedupe(values: readonly string[]): string[] {
	const seen = new Set<string>();
	const result: string[] = [];

	for (const value of values) {
		if (value !== '' && !seen.has(value)) {
			seen.add(value);
			result.push(value);
		}
	}

	return result;
}
