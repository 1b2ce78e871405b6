/**
 * Indexer - runs the full build pipeline.
 *
 * Pipeline:
 * 1. Enumerate eligible files (walker)
 * 2. Parse every file, up to `config.concurrency` at once
 * 3. Once all parses have settled, fold the results into a fresh
 *    IndexBuilder in walk order
 * 4. Resolve implementers and build the keyword map (IndexBuilder.build)
 *
 * A file that cannot be read or parsed is logged and skipped. Nothing is
 * published here: the caller receives the finished CodeIndex.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import pLimit from 'p-limit';
import {isAbortError, throwIfAborted} from '../abort.js';
import {DEFAULT_CONFIG, type SemindexConfig} from '../config/index.js';
import {describeCause} from '../errors.js';
import type {Logger} from '../logger/index.js';
import type {DeclarationParser, ParsedFile} from '../parser/types.js';
import {walkSourceFiles} from '../walker/index.js';
import {IndexBuilder} from './builder.js';
import {
	countIndex,
	type CodeIndex,
	type IndexStats,
	type ProgressCallback,
} from './types.js';

export interface IndexerOptions {
	config?: SemindexConfig;
	/** Owned by the caller; the indexer never closes it */
	parser: DeclarationParser;
	logger?: Logger;
}

export interface BuildOptions {
	/** Checked between files and before the final pass */
	signal?: AbortSignal;
	progressCallback?: ProgressCallback;
}

export interface BuildResult {
	index: CodeIndex;
	stats: IndexStats;
}

type ParseOutcome =
	| {ok: true; parsed: ParsedFile; content: string; lastModified: Date}
	| {ok: false};

export class Indexer {
	private readonly projectRoot: string;
	private readonly config: SemindexConfig;
	private readonly parser: DeclarationParser;
	private readonly logger: Logger | null;

	constructor(projectRoot: string, options: IndexerOptions) {
		this.projectRoot = projectRoot;
		this.config = options.config ?? DEFAULT_CONFIG;
		this.parser = options.parser;
		this.logger = options.logger ?? null;
	}

	/**
	 * Build a new index of the project.
	 */
	async build(options: BuildOptions = {}): Promise<BuildResult> {
		const {signal, progressCallback} = options;
		const startedAt = Date.now();

		try {
			throwIfAborted(signal, 'Index build cancelled');

			this.log('info', `Scanning ${this.projectRoot}`);
			progressCallback?.(0, 0, 'Scanning files');
			const files = await walkSourceFiles(this.projectRoot, this.config);
			this.log('info', `Found ${files.length} eligible files`);

			await this.parser.initialize();
			const outcomes = await this.parseAll(files, signal, progressCallback);

			// Fold strictly in walk order, after every parse has settled
			const builder = new IndexBuilder();
			let failedFiles = 0;
			files.forEach((file, i) => {
				throwIfAborted(signal, 'Index build cancelled');
				const outcome = outcomes[i];
				if (!outcome?.ok) {
					failedFiles++;
					return;
				}
				builder.addFile(file, outcome.parsed, {
					content: outcome.content,
					lastModified: outcome.lastModified,
				});
			});

			throwIfAborted(signal, 'Index build cancelled');
			progressCallback?.(files.length, files.length, 'Building keyword index');
			const index = builder.build();

			const stats: IndexStats = {
				filesScanned: files.length,
				...countIndex(index),
				failedFiles,
				durationMs: Date.now() - startedAt,
			};
			this.log(
				'info',
				`Index built: ${stats.files} files, ${stats.functions} functions, ${stats.types} types, ${stats.comments} comments, ${stats.keywords} keywords (${failedFiles} failed) in ${stats.durationMs}ms`,
			);

			return {index, stats};
		} catch (error) {
			if (isAbortError(error)) {
				this.log('info', 'Index build cancelled');
			} else {
				this.log(
					'error',
					'Index build failed',
					error instanceof Error ? error : new Error(describeCause(error)),
				);
			}
			throw error;
		}
	}

	/**
	 * Parse files with bounded concurrency. Outcomes are returned in the
	 * order of `files`, whatever order the parses finish in.
	 */
	private async parseAll(
		files: readonly string[],
		signal: AbortSignal | undefined,
		progressCallback: ProgressCallback | undefined,
	): Promise<ParseOutcome[]> {
		const limit = pLimit(this.config.concurrency);
		let completed = 0;

		return Promise.all(
			files.map(file =>
				limit(async (): Promise<ParseOutcome> => {
					throwIfAborted(signal, 'Index build cancelled');
					const outcome = await this.parseFile(file);
					completed++;
					progressCallback?.(completed, files.length, 'Parsing files');
					return outcome;
				}),
			),
		);
	}

	private async parseFile(file: string): Promise<ParseOutcome> {
		const absolutePath = path.join(this.projectRoot, file);
		try {
			const [content, fileStats] = await Promise.all([
				fs.readFile(absolutePath, 'utf-8'),
				fs.stat(absolutePath),
			]);
			const parsed = await this.parser.parse(file, content);
			this.log('debug', `Parsed ${file}`, {
				functions: parsed.functions.length,
				types: parsed.types.length,
				comments: parsed.comments.length,
			});
			return {ok: true, parsed, content, lastModified: fileStats.mtime};
		} catch (error) {
			this.log('warn', `Skipping ${file}`, {error: describeCause(error)});
			return {ok: false};
		}
	}

	/**
	 * Log a message.
	 */
	private log(
		level: 'debug' | 'info' | 'warn' | 'error',
		message: string,
		extra?: object,
	): void {
		if (!this.logger) return;
		if (level === 'error') {
			this.logger.error(
				'Indexer',
				message,
				extra instanceof Error ? extra : undefined,
			);
		} else {
			this.logger[level]('Indexer', message, extra);
		}
	}
}
