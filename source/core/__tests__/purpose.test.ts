import {describe, it, expect} from 'vitest';
import {
	classifyComment,
	inferFilePurpose,
	inferFunctionPurpose,
	inferTypePurpose,
} from '../purpose/index.js';
import type {TypeKind} from '../indexer/types.js';

describe('inferFunctionPurpose', () => {
	it.each([
		['NewWidget', 'constructor'],
		['GetName', 'getter'],
		['SetName', 'setter'],
		['IsValid', 'predicate'],
		['HasChildren', 'predicate'],
		['TestParseConfig', 'test'],
		['serveHandler', 'handler'],
		['ParseUserConfig', 'parser'],
		['formatParts', 'formatter'],
		['Run', 'function'],
	])('%s → %s', (name, purpose) => {
		expect(inferFunctionPurpose(name)).toBe(purpose);
	});

	it('applies the first matching rule', () => {
		// Both a getter prefix and "parse" in the name
		expect(inferFunctionPurpose('GetParser')).toBe('getter');
		// "Newsletter" still starts with "new"
		expect(inferFunctionPurpose('NewsletterHandler')).toBe('constructor');
	});
});

describe('inferTypePurpose', () => {
	const cases: Array<[string, TypeKind, string]> = [
		['UserConfig', 'struct', 'configuration'],
		['LoginRequest', 'struct', 'request data'],
		['LoginResponse', 'struct', 'response data'],
		['NotFoundError', 'struct', 'error type'],
		['BillingService', 'interface', 'service'],
		['HTTPClient', 'struct', 'client'],
	];

	it.each(cases)('%s → %s', (name, kind, purpose) => {
		expect(inferTypePurpose(name, kind)).toBe(purpose);
	});

	it('falls back to the kind', () => {
		expect(inferTypePurpose('Widget', 'struct')).toBe('struct');
		expect(inferTypePurpose('Renderer', 'interface')).toBe('interface');
		expect(inferTypePurpose('settings', 'alias')).toBe('alias');
	});
});

describe('inferFilePurpose', () => {
	it('uses the file name first', () => {
		expect(inferFilePurpose('config/config_test.go', 'config')).toBe('testing');
		expect(inferFilePurpose('main.go', 'main')).toBe('application entry point');
		expect(inferFilePurpose('widget/doc.go', 'widget')).toBe(
			'package documentation',
		);
	});

	it('falls back to the package name', () => {
		expect(inferFilePurpose('tools/run.go', 'main')).toBe('executable program');
		expect(inferFilePurpose('cmd/root.go', 'cmd')).toBe('command line interface');
		expect(inferFilePurpose('widget/widget.go', 'widget')).toBe(
			'widget package implementation',
		);
	});

	it('does not treat object prototype keys as known packages', () => {
		expect(inferFilePurpose('x/x.go', 'constructor')).toBe(
			'constructor package implementation',
		);
	});
});

describe('classifyComment', () => {
	it('recognises marker words case-insensitively', () => {
		expect(classifyComment('TODO: cache the result')).toBe('todo');
		expect(classifyComment('FixMe: off by one')).toBe('fixme');
		expect(classifyComment('Note: callers hold the lock')).toBe('note');
		expect(classifyComment('Warning, not thread safe')).toBe('warning');
	});

	it('checks markers in order', () => {
		expect(classifyComment('fixme and todo')).toBe('todo');
	});

	it('requires the colon for notes', () => {
		expect(classifyComment('notes about layout')).toBe('comment');
	});

	it('classifies long comments as doc', () => {
		const long = 'Widget renders itself into a string using the parts list.';
		expect(long.length).toBeGreaterThan(50);
		expect(classifyComment(long)).toBe('doc');
		expect(classifyComment('short remark here')).toBe('comment');
	});
});
