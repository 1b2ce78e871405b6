/**
 * Naming-convention rules that attach a short purpose label to a record.
 *
 * Each table is checked top to bottom and the first matching rule wins.
 */

import path from 'node:path';
import type {CommentType, TypeKind} from '../indexer/types.js';

interface NameRule {
	test: (lowerName: string) => boolean;
	label: string;
}

const FUNCTION_RULES: readonly NameRule[] = [
	{test: n => n.startsWith('new'), label: 'constructor'},
	{test: n => n.startsWith('get'), label: 'getter'},
	{test: n => n.startsWith('set'), label: 'setter'},
	{test: n => n.startsWith('is') || n.startsWith('has'), label: 'predicate'},
	{test: n => n.startsWith('test'), label: 'test'},
	{test: n => n.includes('handler'), label: 'handler'},
	{test: n => n.includes('parse'), label: 'parser'},
	{test: n => n.includes('format'), label: 'formatter'},
];

const TYPE_SUFFIX_RULES: ReadonlyArray<[suffix: string, label: string]> = [
	['config', 'configuration'],
	['request', 'request data'],
	['response', 'response data'],
	['error', 'error type'],
	['service', 'service'],
	['client', 'client'],
];

const PACKAGE_PURPOSES: ReadonlyMap<string, string> = new Map([
	['main', 'executable program'],
	['cmd', 'command line interface'],
]);

export function inferFunctionPurpose(name: string): string {
	const lower = name.toLowerCase();
	return FUNCTION_RULES.find(rule => rule.test(lower))?.label ?? 'function';
}

/**
 * Types fall back to their kind when no suffix rule matches.
 */
export function inferTypePurpose(name: string, kind: TypeKind): string {
	const lower = name.toLowerCase();
	const rule = TYPE_SUFFIX_RULES.find(([suffix]) => lower.endsWith(suffix));
	return rule ? rule[1] : kind;
}

export function inferFilePurpose(filePath: string, packageName: string): string {
	const baseName = path.posix.basename(filePath);

	if (baseName.endsWith('_test.go')) {
		return 'testing';
	}
	if (baseName === 'main.go') {
		return 'application entry point';
	}
	if (baseName === 'doc.go') {
		return 'package documentation';
	}

	return (
		PACKAGE_PURPOSES.get(packageName) ??
		`${packageName} package implementation`
	);
}

/**
 * Classify a comment by marker words, falling back to length.
 */
export function classifyComment(text: string): CommentType {
	const lower = text.toLowerCase();

	if (lower.includes('todo')) return 'todo';
	if (lower.includes('fixme')) return 'fixme';
	if (lower.includes('note:')) return 'note';
	if (lower.includes('warning')) return 'warning';
	if ([...text].length > 50) return 'doc';

	return 'comment';
}
