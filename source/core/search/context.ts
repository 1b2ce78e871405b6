/**
 * One-line descriptions shown with search results.
 */

import {COMMENT_CONTEXT_LENGTH} from '../constants.js';
import type {
	FunctionRecord,
	InterfaceRecord,
	TypeRecord,
} from '../indexer/types.js';

/**
 * `name(params) returns`, prefixed with `(Receiver) ` for methods.
 */
export function formatFunctionContext(fn: FunctionRecord): string {
	let context = `${fn.name}(${fn.parameters.join(', ')})`;
	if (fn.returnTypes.length > 0) {
		context += ` ${fn.returnTypes.join(', ')}`;
	}
	return fn.receiver ? `(${fn.receiver}) ${context}` : context;
}

export function formatTypeContext(typ: TypeRecord): string {
	const context = `${typ.kind} ${typ.name}`;
	if (typ.kind === 'struct' && typ.fields.length > 0) {
		return `${context} with ${typ.fields.length} fields`;
	}
	if (typ.kind === 'interface' && typ.methods.length > 0) {
		return `${context} with ${typ.methods.length} methods`;
	}
	return context;
}

export function formatInterfaceContext(iface: InterfaceRecord): string {
	return `${iface.name} interface with ${iface.methods.length} methods`;
}

/**
 * Shorten text to at most `maxLength` characters, preferring a word
 * boundary in the second half, and mark the cut with "...".
 */
export function truncateText(
	text: string,
	maxLength: number = COMMENT_CONTEXT_LENGTH,
): string {
	const chars = [...text];
	if (chars.length <= maxLength) {
		return text;
	}

	let truncated = chars.slice(0, maxLength - 3);
	const lastSpace = truncated.lastIndexOf(' ');
	if (lastSpace > Math.floor(maxLength / 2)) {
		truncated = truncated.slice(0, lastSpace);
	}
	return `${truncated.join('')}...`;
}
