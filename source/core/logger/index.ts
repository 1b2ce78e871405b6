/**
 * Logger - component-tagged logging for the indexer and search engine.
 *
 * - createLogger: daily log files under .semindex/logs/
 * - createMemoryLogger: keeps entries in memory (tests, CLI summaries)
 * - createNullLogger: no-op
 */

import fs from 'node:fs';
import path from 'node:path';
import {getLogsDir} from '../constants.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
	debug(component: string, message: string, data?: object): void;
	info(component: string, message: string, data?: object): void;
	warn(component: string, message: string, data?: object): void;
	error(component: string, message: string, error?: Error): void;
}

export interface LogEntry {
	level: LogLevel;
	component: string;
	message: string;
	extra?: object | Error;
}

export interface MemoryLogger extends Logger {
	readonly entries: LogEntry[];
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/**
 * Get the path to today's log file.
 */
export function getLogPath(projectRoot: string): string {
	const date = new Date().toISOString().split('T')[0]; // YYYY-MM-DD
	return path.join(getLogsDir(projectRoot), `${date}.log`);
}

/**
 * Format a log entry as a single block of text.
 */
export function formatEntry(entry: LogEntry, now: Date = new Date()): string {
	const levelStr = entry.level.toUpperCase().padEnd(5);
	let text = `[${now.toISOString()}] [${levelStr}] ${entry.component}: ${entry.message}`;

	const {extra} = entry;
	if (extra instanceof Error) {
		text += `\n  Error: ${extra.message}`;
		if (extra.stack) {
			text += `\n  Stack: ${extra.stack}`;
		}
	} else if (extra) {
		text += `\n  ${JSON.stringify(extra)}`;
	}

	return text;
}

/**
 * Build a Logger that forwards every entry at or above `minLevel` to `sink`.
 */
function createSinkLogger(
	sink: (entry: LogEntry) => void,
	minLevel: LogLevel,
): Logger {
	const emit = (entry: LogEntry) => {
		if (LEVEL_ORDER[entry.level] >= LEVEL_ORDER[minLevel]) {
			sink(entry);
		}
	};

	return {
		debug(component, message, data) {
			emit({level: 'debug', component, message, extra: data});
		},
		info(component, message, data) {
			emit({level: 'info', component, message, extra: data});
		},
		warn(component, message, data) {
			emit({level: 'warn', component, message, extra: data});
		},
		error(component, message, error) {
			emit({level: 'error', component, message, extra: error});
		},
	};
}

/**
 * Create a logger that appends to daily log files in .semindex/logs/.
 */
export function createLogger(
	projectRoot: string,
	minLevel: LogLevel = 'info',
): Logger {
	const logsDir = getLogsDir(projectRoot);
	let initialized = false;

	return createSinkLogger(entry => {
		if (!initialized) {
			fs.mkdirSync(logsDir, {recursive: true});
			initialized = true;
		}
		fs.appendFileSync(getLogPath(projectRoot), formatEntry(entry) + '\n');
	}, minLevel);
}

/**
 * Create a logger that records entries in memory.
 */
export function createMemoryLogger(minLevel: LogLevel = 'debug'): MemoryLogger {
	const entries: LogEntry[] = [];
	const logger = createSinkLogger(entry => entries.push(entry), minLevel);
	return {...logger, entries};
}

/**
 * Create a no-op logger for testing or when logging is disabled.
 */
export function createNullLogger(): Logger {
	return {
		debug() {},
		info() {},
		warn() {},
		error() {},
	};
}
