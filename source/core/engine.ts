/**
 * CodeSearchEngine - owns the currently published CodeIndex.
 *
 * A build produces a complete index before it is published, and publishing
 * is a single reference swap, so a search always sees either the previous
 * index or the new one. Failed or cancelled builds publish nothing.
 */

import {resolveIndexPath} from './constants.js';
import {DEFAULT_CONFIG, type SemindexConfig} from './config/index.js';
import {IndexNotBuiltError} from './errors.js';
import {Indexer, type BuildOptions} from './indexer/indexer.js';
import type {CodeIndex, IndexStats} from './indexer/types.js';
import type {Logger} from './logger/index.js';
import {GoDeclarationParser} from './parser/go.js';
import type {DeclarationParser} from './parser/types.js';
import {searchIndex, type SearchQuery, type SearchResponse} from './search/index.js';
import {loadIndex, saveIndex} from './store/index.js';

export interface EngineOptions {
	config?: SemindexConfig;
	/** Defaults to the tree-sitter Go parser */
	parser?: DeclarationParser;
	logger?: Logger;
}

export class CodeSearchEngine {
	private readonly projectRoot: string;
	private readonly config: SemindexConfig;
	private readonly parser: DeclarationParser;
	private readonly ownsParser: boolean;
	private readonly logger: Logger | null;
	private index: CodeIndex | null = null;

	constructor(projectRoot: string, options: EngineOptions = {}) {
		this.projectRoot = projectRoot;
		this.config = options.config ?? DEFAULT_CONFIG;
		this.parser = options.parser ?? new GoDeclarationParser();
		this.ownsParser = !options.parser;
		this.logger = options.logger ?? null;
	}

	/**
	 * Build a fresh index of the project and publish it.
	 */
	async buildIndex(options: BuildOptions = {}): Promise<IndexStats> {
		const indexer = new Indexer(this.projectRoot, {
			config: this.config,
			parser: this.parser,
			logger: this.logger ?? undefined,
		});
		const {index, stats} = await indexer.build(options);
		this.index = index;
		return stats;
	}

	/**
	 * Query the published index.
	 * Throws IndexNotBuiltError if nothing has been built or loaded.
	 */
	search(query: SearchQuery): SearchResponse {
		const start = Date.now();
		const response = searchIndex(this.requireIndex(), query);
		this.log(
			'debug',
			`Search "${query.query}": ${response.count} results in ${Date.now() - start}ms`,
		);
		return response;
	}

	/**
	 * Persist the published index. Returns the absolute path written.
	 */
	async saveIndex(indexPath?: string): Promise<string> {
		const index = this.requireIndex();
		const target = this.resolvePath(indexPath);
		await saveIndex(index, target);
		this.log('info', `Index saved to ${target}`);
		return target;
	}

	/**
	 * Load a persisted index and publish it. The current index is kept if
	 * loading fails.
	 */
	async loadIndex(indexPath?: string): Promise<string> {
		const target = this.resolvePath(indexPath);
		this.index = await loadIndex(target);
		this.log('info', `Index loaded from ${target}`);
		return target;
	}

	getIndex(): CodeIndex | null {
		return this.index;
	}

	close(): void {
		if (this.ownsParser) {
			this.parser.close();
		}
	}

	private requireIndex(): CodeIndex {
		if (!this.index) {
			throw new IndexNotBuiltError();
		}
		return this.index;
	}

	private resolvePath(indexPath: string | undefined): string {
		return resolveIndexPath(this.projectRoot, indexPath ?? this.config.indexPath);
	}

	private log(level: 'debug' | 'info', message: string): void {
		this.logger?.[level]('Engine', message);
	}
}
