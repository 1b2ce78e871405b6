/**
 * Action surface over a CodeSearchEngine.
 *
 * Actions: build_index, search, save_index, load_index. Parameters arrive as
 * snake_case bags, are validated with zod and answered with JSON envelopes.
 */

import {z} from 'zod';
import {RESULT_TYPES} from '../core/constants.js';
import type {CodeSearchEngine} from '../core/engine.js';
import type {SearchResponse} from '../core/search/index.js';
import {InvalidParamsError, UnknownActionError} from './errors.js';

export {InvalidParamsError, UnknownActionError} from './errors.js';

/** Result limit applied when a search request gives none */
export const DEFAULT_SEARCH_LIMIT = 20;

const buildIndexParams = z.object({}).strict();

const searchParams = z.object({
	query: z.string().min(1).describe('Free-text query'),
	types: z
		.array(z.enum(RESULT_TYPES))
		.optional()
		.describe('Result types to include (default: all)'),
	files: z
		.array(z.string().min(1))
		.optional()
		.describe('Glob patterns or path prefixes'),
	packages: z.array(z.string().min(1)).optional().describe('Package names'),
	exported_only: z
		.boolean()
		.optional()
		.default(false)
		.describe('Only exported functions and types'),
	limit: z
		.number()
		.int()
		.min(0)
		.optional()
		.default(DEFAULT_SEARCH_LIMIT)
		.describe(`Maximum number of results (0 = all, default: ${DEFAULT_SEARCH_LIMIT})`),
});

const indexPathParams = z.object({
	path: z
		.string()
		.min(1)
		.optional()
		.describe('Index file, relative to the project root'),
});

export interface BuildIndexResponse {
	status: 'index_built';
	files: number;
	functions: number;
	types: number;
	interfaces: number;
	comments: number;
	keywords: number;
	failed_files: number;
	duration_ms: number;
}

export interface IndexPathResponse {
	status: 'index_saved' | 'index_loaded';
	path: string;
}

export interface ActionContext {
	engine: CodeSearchEngine;
	signal?: AbortSignal;
}

export interface Action {
	name: string;
	description: string;
	run(context: ActionContext, params: unknown): Promise<object>;
}

/**
 * Bind a parameter schema to its handler; parameters are validated before
 * the handler runs.
 */
function defineAction<S extends z.ZodTypeAny>(definition: {
	name: string;
	description: string;
	parameters: S;
	execute: (context: ActionContext, args: z.infer<S>) => Promise<object>;
}): Action {
	return {
		name: definition.name,
		description: definition.description,
		async run(context, params) {
			const parsed = definition.parameters.safeParse(params ?? {});
			if (!parsed.success) {
				throw new InvalidParamsError(definition.name, parsed.error);
			}
			return definition.execute(context, parsed.data);
		},
	};
}

export const ACTIONS: readonly Action[] = [
	defineAction({
		name: 'build_index',
		description: 'Scan the project and build a fresh index',
		parameters: buildIndexParams,
		async execute({engine, signal}): Promise<BuildIndexResponse> {
			const stats = await engine.buildIndex({signal});
			return {
				status: 'index_built',
				files: stats.files,
				functions: stats.functions,
				types: stats.types,
				interfaces: stats.interfaces,
				comments: stats.comments,
				keywords: stats.keywords,
				failed_files: stats.failedFiles,
				duration_ms: stats.durationMs,
			};
		},
	}),
	defineAction({
		name: 'search',
		description: 'Ranked keyword search over functions, types, interfaces and comments',
		parameters: searchParams,
		async execute({engine}, args): Promise<SearchResponse> {
			return engine.search({
				query: args.query,
				types: args.types,
				files: args.files,
				packages: args.packages,
				exportedOnly: args.exported_only,
				limit: args.limit,
			});
		},
	}),
	defineAction({
		name: 'save_index',
		description: 'Write the current index to disk',
		parameters: indexPathParams,
		async execute({engine}, args): Promise<IndexPathResponse> {
			const path = await engine.saveIndex(args.path);
			return {status: 'index_saved', path};
		},
	}),
	defineAction({
		name: 'load_index',
		description: 'Replace the current index with one read from disk',
		parameters: indexPathParams,
		async execute({engine}, args): Promise<IndexPathResponse> {
			const path = await engine.loadIndex(args.path);
			return {status: 'index_loaded', path};
		},
	}),
];

const ACTION_NAMES = ACTIONS.map(action => action.name);

/**
 * Dispatch one action and return its response object.
 */
export async function handleAction(
	context: ActionContext,
	action: string,
	params?: unknown,
): Promise<object> {
	const handler = ACTIONS.find(a => a.name === action);
	if (!handler) {
		throw new UnknownActionError(action, ACTION_NAMES);
	}
	return handler.run(context, params);
}

/**
 * Like handleAction, serialized as JSON text.
 */
export async function handleActionJson(
	context: ActionContext,
	action: string,
	params?: unknown,
): Promise<string> {
	return JSON.stringify(await handleAction(context, action, params));
}
