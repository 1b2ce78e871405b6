import {describe, it, expect} from 'vitest';
import type {
	CommentRecord,
	FunctionRecord,
	InterfaceRecord,
	TypeRecord,
} from '../indexer/types.js';
import {
	formatFunctionContext,
	formatInterfaceContext,
	formatTypeContext,
	truncateText,
} from '../search/context.js';
import {
	scoreComment,
	scoreFunction,
	scoreInterface,
	scoreType,
	termMatchScore,
} from '../search/scorer.js';

function functionRecord(overrides: Partial<FunctionRecord> = {}): FunctionRecord {
	return {
		name: 'NewWidget',
		file: 'widget.go',
		line: 3,
		receiver: null,
		parameters: [],
		returnTypes: [],
		isExported: true,
		docComment: '',
		purpose: 'constructor',
		keywords: ['newwidget', 'constructor'],
		...overrides,
	};
}

function typeRecord(overrides: Partial<TypeRecord> = {}): TypeRecord {
	return {
		name: 'UserConfig',
		file: 'config.go',
		line: 5,
		kind: 'struct',
		fields: ['Name string', 'Email string'],
		methods: [],
		isExported: true,
		docComment: '',
		purpose: 'configuration',
		keywords: ['userconfig', 'struct', 'configuration'],
		...overrides,
	};
}

function commentRecord(overrides: Partial<CommentRecord> = {}): CommentRecord {
	return {
		file: 'widget.go',
		line: 10,
		text: 'TODO: refactor this whole subsystem before release\n',
		type: 'todo',
		keywords: [],
		...overrides,
	};
}

describe('termMatchScore', () => {
	it('is the fraction of query terms found as substrings', () => {
		expect(termMatchScore(['newwidget'], ['widget', 'config'])).toBe(0.5);
		expect(termMatchScore(['newwidget', 'config'], ['widget', 'config'])).toBe(1);
	});

	it('counts a query term once however many tokens contain it', () => {
		expect(termMatchScore(['widget', 'widgets', 'newwidget'], ['widget'])).toBe(1);
	});

	it('is zero when either side is empty', () => {
		expect(termMatchScore([], ['widget'])).toBe(0);
		expect(termMatchScore(['widget'], [])).toBe(0);
	});
});

describe('scoreFunction', () => {
	it('weights a name match by 3 and boosts exported functions', () => {
		// name 3.0 + keywords 1.0, ×1.2
		expect(scoreFunction(functionRecord(), ['widget'])).toBeCloseTo(4.8);
	});

	it('adds purpose and doc matches', () => {
		const fn = functionRecord({
			isExported: false,
			docComment: 'NewWidget creates a widget.',
		});
		// name 3.0 + doc 1.5 + keywords 1.0
		expect(scoreFunction(fn, ['widget'])).toBeCloseTo(5.5);
		// purpose 2.0 + keywords 1.0
		expect(scoreFunction(fn, ['constructor'])).toBeCloseTo(3);
	});

	it('increases when a matching name term is added to the query', () => {
		const fn = functionRecord();
		const without = scoreFunction(fn, ['zebra']);
		const withName = scoreFunction(fn, ['zebra', 'widget']);
		expect(without).toBe(0);
		expect(withName).toBeGreaterThan(without);
	});
});

describe('scoreType', () => {
	it('applies the struct boost then the exported boost', () => {
		// (3 + 2 + 0 + 1) × 1.2 × 1.2
		expect(scoreType(typeRecord(), ['config'])).toBeCloseTo(8.64);
	});

	it('boosts interfaces by 1.3 and leaves aliases unboosted', () => {
		const base = {
			name: 'Store',
			purpose: 'interface',
			keywords: ['store'],
			isExported: false,
		};
		// name 3 + keywords 1
		expect(
			scoreType(typeRecord({...base, kind: 'interface'}), ['store']),
		).toBeCloseTo(5.2);
		expect(scoreType(typeRecord({...base, kind: 'alias'}), ['store'])).toBeCloseTo(
			4,
		);
	});
});

describe('scoreInterface', () => {
	it('adds one point per matching method to the name score', () => {
		const iface: InterfaceRecord = {
			name: 'Renderer',
			package: 'widget',
			file: 'widget.go',
			methods: ['Render', 'RenderAll', 'Size'],
			implementers: [],
		};
		// name 3 + Render 1 + RenderAll 1
		expect(scoreInterface(iface, ['render'])).toBeCloseTo(5);
		expect(scoreInterface(iface, ['size'])).toBeCloseTo(1);
	});
});

describe('scoreComment', () => {
	it('boosts todo and fixme by 1.3 and notes by 1.1', () => {
		expect(scoreComment(commentRecord(), ['todo', 'refactor'])).toBeCloseTo(1.3);
		expect(
			scoreComment(commentRecord({type: 'fixme'}), ['refactor']),
		).toBeCloseTo(1.3);
		expect(
			scoreComment(commentRecord({type: 'note'}), ['refactor']),
		).toBeCloseTo(1.1);
		expect(
			scoreComment(commentRecord({type: 'doc'}), ['refactor', 'missing']),
		).toBeCloseTo(0.5);
	});
});

describe('contexts', () => {
	it('formats functions and methods', () => {
		expect(
			formatFunctionContext(
				functionRecord({
					parameters: ['name string', 'size int'],
					returnTypes: ['*Widget', 'error'],
				}),
			),
		).toBe('NewWidget(name string, size int) *Widget, error');
		expect(
			formatFunctionContext(
				functionRecord({name: 'Size', receiver: 'Widget', returnTypes: ['int']}),
			),
		).toBe('(Widget) Size() int');
	});

	it('formats types with field or method counts', () => {
		expect(formatTypeContext(typeRecord())).toBe(
			'struct UserConfig with 2 fields',
		);
		expect(formatTypeContext(typeRecord({fields: []}))).toBe('struct UserConfig');
		expect(
			formatTypeContext(
				typeRecord({name: 'Store', kind: 'interface', fields: [], methods: ['Get']}),
			),
		).toBe('interface Store with 1 methods');
		expect(formatTypeContext(typeRecord({name: 'ID', kind: 'alias'}))).toBe(
			'alias ID',
		);
	});

	it('formats interfaces', () => {
		expect(
			formatInterfaceContext({
				name: 'Store',
				package: 'db',
				file: 'db.go',
				methods: [],
				implementers: [],
			}),
		).toBe('Store interface with 0 methods');
	});
});

describe('truncateText', () => {
	it('returns short text unchanged', () => {
		expect(truncateText('short text', 100)).toBe('short text');
		expect(truncateText('x'.repeat(100), 100)).toBe('x'.repeat(100));
	});

	it('cuts at the last space past the midpoint', () => {
		const text = `${'word '.repeat(30)}end`;
		// First 17 characters: "word word word wo", last space at index 14
		expect(truncateText(text, 20)).toBe('word word word...');
	});

	it('cuts mid-word when no space lies past the midpoint', () => {
		const text = 'abcdefghijklmnopqrstuvwxyz';
		expect(truncateText(text, 10)).toBe('abcdefg...');
		expect(truncateText('ab cdefghijklmnopqrstuvwxyz', 10)).toBe('ab cdef...');
	});

	it('defaults to 100 characters', () => {
		const result = truncateText('a'.repeat(150));
		expect(result).toBe(`${'a'.repeat(97)}...`);
	});
});
