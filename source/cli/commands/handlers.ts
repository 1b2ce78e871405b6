/**
 * CLI commands: build and search from the terminal.
 */

import chalk from 'chalk';
import type {SemindexConfig} from '../../core/config/index.js';
import {CodeSearchEngine} from '../../core/engine.js';
import type {IndexStats} from '../../core/indexer/types.js';
import type {Logger, LogLevel} from '../../core/logger/index.js';
import type {ResultType, SearchResponse} from '../../core/search/index.js';
import {DEFAULT_SEARCH_LIMIT} from '../../tools/handlers.js';

export interface CommandContext {
	projectRoot: string;
	config: SemindexConfig;
	logger: Logger;
	signal?: AbortSignal;
}

export interface SearchCommandOptions {
	types?: ResultType[];
	files?: string[];
	packages?: string[];
	exportedOnly?: boolean;
	limit?: number;
	/** Index file; defaults to the configured indexPath */
	indexPath?: string;
	json?: boolean;
}

/**
 * `--verbose` forces debug; otherwise the configured level applies.
 */
export function resolveLogLevel(config: SemindexConfig, verbose: boolean): LogLevel {
	return verbose ? 'debug' : config.logLevel;
}

function createEngine(context: CommandContext): CodeSearchEngine {
	return new CodeSearchEngine(context.projectRoot, {
		config: context.config,
		logger: context.logger,
	});
}

/**
 * Build the index and save it.
 */
export async function runIndex(
	context: CommandContext,
	indexPath?: string,
): Promise<string> {
	const engine = createEngine(context);
	try {
		const stats = await engine.buildIndex({signal: context.signal});
		const savedTo = await engine.saveIndex(indexPath);
		return formatIndexSummary(stats, savedTo);
	} finally {
		engine.close();
	}
}

/**
 * Load a saved index and query it.
 */
export async function runSearch(
	context: CommandContext,
	query: string,
	options: SearchCommandOptions = {},
): Promise<string> {
	const engine = createEngine(context);
	try {
		await engine.loadIndex(options.indexPath);
		const response = engine.search({
			query,
			types: options.types,
			files: options.files,
			packages: options.packages,
			exportedOnly: options.exportedOnly,
			limit: options.limit ?? DEFAULT_SEARCH_LIMIT,
		});
		return options.json
			? JSON.stringify(response, null, 2)
			: formatSearchResults(response);
	} finally {
		engine.close();
	}
}

export function formatIndexSummary(stats: IndexStats, savedTo: string): string {
	const lines = [
		chalk.bold('Index built') + chalk.dim(` (${stats.durationMs}ms)`),
		`  Files:      ${stats.files}`,
		`  Functions:  ${stats.functions}`,
		`  Types:      ${stats.types}`,
		`  Interfaces: ${stats.interfaces}`,
		`  Comments:   ${stats.comments}`,
		`  Keywords:   ${stats.keywords}`,
	];
	if (stats.failedFiles > 0) {
		lines.push(
			chalk.yellow(`  Skipped ${stats.failedFiles} files that failed to parse`),
		);
	}
	lines.push(`Saved to ${chalk.green(savedTo)}`);
	return lines.join('\n');
}

/**
 * Color mapping for result types.
 */
const TYPE_COLORS: Record<ResultType, (s: string) => string> = {
	function: chalk.cyan,
	type: chalk.magenta,
	interface: chalk.blue,
	comment: chalk.dim,
};

/**
 * Format search results for display with colors.
 */
export function formatSearchResults(response: SearchResponse): string {
	if (response.count === 0) {
		return chalk.dim(`No results found for "${response.query}"`);
	}

	const lines = [
		chalk.bold(`Found ${response.count} results for `) +
			chalk.cyan(`"${response.query}"`) +
			':',
		'',
	];

	for (const result of response.results) {
		const typeColor = TYPE_COLORS[result.type];
		lines.push(`${typeColor(`[${result.type}]`)} ${chalk.white(result.name)}`);
		lines.push(
			`  ${chalk.green(result.file)}` +
				(result.line > 0 ? chalk.dim(`:${result.line}`) : ''),
		);
		lines.push(`  Score: ${result.relevance.toFixed(2)}`);
		lines.push(chalk.dim(`  ${result.context.replace(/\n/g, ' ').trim()}`));
		lines.push('');
	}

	return lines.join('\n');
}
