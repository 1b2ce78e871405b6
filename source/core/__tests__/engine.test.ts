import path from 'node:path';
import {describe, it, expect, beforeEach, afterEach} from 'vitest';
import {resolveConfig} from '../config/index.js';
import {CodeSearchEngine} from '../engine.js';
import {IndexNotBuiltError, WalkError} from '../errors.js';
import {createMemoryLogger} from '../logger/index.js';
import {
	comment,
	createTempProject,
	FakeParser,
	field,
	fn,
	ident,
	parsedFile,
	struct,
	type TestContext,
} from './helpers.js';

const WIDGET_SOURCE = `package widget

func NewWidget() {}

// TODO: refactor this whole subsystem before release
`;

function widgetParser(): FakeParser {
	return new FakeParser({
		'widget/widget.go': parsedFile('widget', {
			functions: [fn('NewWidget', {line: 3})],
			comments: [
				comment('TODO: refactor this whole subsystem before release\n', 5),
			],
		}),
		'config/config.go': parsedFile('config', {
			types: [
				struct(
					'UserConfig',
					[field(['Name'], ident('string')), field(['Email'], ident('string'))],
					{line: 3},
				),
			],
		}),
		'broken/broken.go': null,
	});
}

describe('CodeSearchEngine', () => {
	let ctx: TestContext;

	beforeEach(async () => {
		ctx = await createTempProject({
			'widget/widget.go': WIDGET_SOURCE,
			'config/config.go': 'package config\n',
			'broken/broken.go': 'package broken\n',
			'README.md': '# not indexed\n',
		});
	});

	afterEach(async () => {
		await ctx.cleanup();
	});

	it('refuses to search before an index is built or loaded', () => {
		const engine = new CodeSearchEngine(ctx.projectRoot, {parser: widgetParser()});

		for (const query of ['widget', '', 'todo refactor']) {
			expect(() => engine.search({query})).toThrow(IndexNotBuiltError);
		}
		expect(engine.getIndex()).toBeNull();
	});

	it('refuses to save before an index is built', async () => {
		const engine = new CodeSearchEngine(ctx.projectRoot, {parser: widgetParser()});

		await expect(engine.saveIndex()).rejects.toBeInstanceOf(IndexNotBuiltError);
	});

	it('builds an index and answers queries', async () => {
		const engine = new CodeSearchEngine(ctx.projectRoot, {parser: widgetParser()});

		const stats = await engine.buildIndex();

		expect(stats).toMatchObject({
			filesScanned: 3,
			files: 2,
			functions: 1,
			types: 1,
			interfaces: 0,
			comments: 1,
			failedFiles: 1,
		});

		const widget = engine.search({query: 'widget'});
		expect(widget.results[0]).toMatchObject({type: 'function', name: 'NewWidget'});
		expect(widget.results[0]?.relevance).toBeCloseTo(4.8);

		const todo = engine.search({query: 'todo refactor'});
		expect(todo.results).toHaveLength(1);
		expect(todo.results[0]).toMatchObject({type: 'comment', name: 'todo'});
		expect(todo.results[0]?.relevance).toBeCloseTo(1.3);

		const config = engine.search({query: 'config'});
		expect(config.results[0]?.context).toContain('2 fields');
	});

	it('counts lines from file content', async () => {
		const engine = new CodeSearchEngine(ctx.projectRoot, {parser: widgetParser()});
		await engine.buildIndex();

		const widgetFile = engine.getIndex()?.files.find(f => f.path === 'widget/widget.go');
		expect(widgetFile?.loc).toBe(6);
		expect(widgetFile?.purpose).toBe('widget package implementation');
	});

	it('logs and skips files that fail to parse', async () => {
		const logger = createMemoryLogger();
		const engine = new CodeSearchEngine(ctx.projectRoot, {
			parser: widgetParser(),
			logger,
		});

		await engine.buildIndex();

		const warning = logger.entries.find(e => e.level === 'warn');
		expect(warning).toMatchObject({
			component: 'Indexer',
			message: 'Skipping broken/broken.go',
		});
		expect(engine.getIndex()?.files.map(f => f.path)).toEqual([
			'config/config.go',
			'widget/widget.go',
		]);
	});

	it('folds files in walk order whatever the parse concurrency', async () => {
		const parser = widgetParser();
		const engine = new CodeSearchEngine(ctx.projectRoot, {
			parser,
			config: resolveConfig({concurrency: 4}),
		});

		await engine.buildIndex();

		expect(parser.initialized).toBe(1);
		expect([...parser.parsed].sort()).toEqual([
			'broken/broken.go',
			'config/config.go',
			'widget/widget.go',
		]);
		expect(engine.getIndex()?.files.map(f => f.path)).toEqual([
			'config/config.go',
			'widget/widget.go',
		]);
	});

	it('reports progress', async () => {
		const engine = new CodeSearchEngine(ctx.projectRoot, {parser: widgetParser()});
		const stages: string[] = [];

		await engine.buildIndex({
			progressCallback: (_current, _total, stage) => stages.push(stage),
		});

		expect(stages[0]).toBe('Scanning files');
		expect(stages.filter(s => s === 'Parsing files')).toHaveLength(3);
		expect(stages.at(-1)).toBe('Building keyword index');
	});

	it('keeps the previous index when a build is cancelled', async () => {
		const engine = new CodeSearchEngine(ctx.projectRoot, {parser: widgetParser()});
		await engine.buildIndex();
		const previous = engine.getIndex();

		const controller = new AbortController();
		controller.abort('stop');

		await expect(engine.buildIndex({signal: controller.signal})).rejects.toMatchObject(
			{name: 'AbortError', message: 'Index build cancelled: stop'},
		);
		expect(engine.getIndex()).toBe(previous);
	});

	it('replaces the index wholesale on rebuild', async () => {
		const engine = new CodeSearchEngine(ctx.projectRoot, {parser: widgetParser()});
		await engine.buildIndex();
		const first = engine.getIndex();

		await engine.buildIndex();

		expect(engine.getIndex()).not.toBe(first);
		expect(first?.keywords.get('newwidget')).toHaveLength(1);
		expect(engine.getIndex()?.keywords.get('newwidget')).toHaveLength(1);
	});

	it('fails the build when the root does not exist', async () => {
		const engine = new CodeSearchEngine(path.join(ctx.projectRoot, 'missing'), {
			parser: widgetParser(),
		});

		await expect(engine.buildIndex()).rejects.toBeInstanceOf(WalkError);
		expect(engine.getIndex()).toBeNull();
	});

	it('saves to and loads from the default index path', async () => {
		const engine = new CodeSearchEngine(ctx.projectRoot, {parser: widgetParser()});
		await engine.buildIndex();

		const saved = await engine.saveIndex();
		expect(saved).toBe(
			path.join(ctx.projectRoot, '.ai-context', 'search-index.json'),
		);

		const other = new CodeSearchEngine(ctx.projectRoot, {parser: widgetParser()});
		const loaded = await other.loadIndex();
		expect(loaded).toBe(saved);

		const original = engine.getIndex();
		const restored = other.getIndex();
		expect(restored?.functions.length).toBe(original?.functions.length);
		expect(restored?.comments.length).toBe(original?.comments.length);
		expect([...(restored?.keywords.keys() ?? [])].sort()).toEqual(
			[...(original?.keywords.keys() ?? [])].sort(),
		);
		expect(other.search({query: 'widget'}).results[0]?.name).toBe('NewWidget');
	});

	it('keeps the current index when loading fails', async () => {
		const engine = new CodeSearchEngine(ctx.projectRoot, {parser: widgetParser()});
		await engine.buildIndex();
		const current = engine.getIndex();

		await expect(engine.loadIndex('missing.json')).rejects.toMatchObject({
			name: 'IndexPersistenceError',
		});
		expect(engine.getIndex()).toBe(current);
	});

	it('leaves a parser it did not create open', async () => {
		const parser = widgetParser();
		const engine = new CodeSearchEngine(ctx.projectRoot, {parser});
		engine.close();

		expect(parser.closed).toBe(false);
	});
});
