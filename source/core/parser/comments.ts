/**
 * Comment text normalization for Go comments.
 *
 * Produces the text a reader would see: markers removed, directive lines
 * dropped, surrounding blank lines trimmed, repeated blank lines collapsed,
 * and a final newline when anything remains.
 */

/** //go:generate, //nolint:errcheck and similar tool directives */
const DIRECTIVE = /^\/\/(?:line |extern |export |[a-z0-9]+:[a-z0-9])/;

/**
 * Lines of a single comment with the markers stripped.
 */
function commentLines(raw: string): string[] {
	if (raw.startsWith('//')) {
		if (DIRECTIVE.test(raw)) {
			return [];
		}
		const body = raw.slice(2);
		return [body.startsWith(' ') ? body.slice(1) : body];
	}

	// Block comment
	const body = raw.startsWith('/*') ? raw.slice(2) : raw;
	return (body.endsWith('*/') ? body.slice(0, -2) : body).split('\n');
}

/**
 * Join the raw comments of one group into readable text.
 *
 * @example
 * commentGroupText(['// Hello,', '//', '// world.']) // 'Hello,\n\nworld.\n'
 */
export function commentGroupText(rawComments: readonly string[]): string {
	const lines = rawComments
		.flatMap(raw => commentLines(raw.replace(/\r\n/g, '\n')))
		.map(line => line.replace(/[ \t\r]+$/, ''));

	const collapsed: string[] = [];
	for (const line of lines) {
		const previous = collapsed.at(-1);
		if (line === '' && (previous === undefined || previous === '')) {
			continue;
		}
		collapsed.push(line);
	}
	while (collapsed.at(-1) === '') {
		collapsed.pop();
	}

	return collapsed.length > 0 ? collapsed.join('\n') + '\n' : '';
}
