import fs from 'node:fs/promises';
import {z} from 'zod';
import {DEFAULT_INDEX_PATH, getConfigPath, getSemindexDir} from '../constants.js';
import {ConfigError} from '../errors.js';

const configSchema = z.object({
	version: z.number().int().positive(),
	/** File extensions handed to the declaration parser */
	extensions: z.array(z.string().startsWith('.')),
	/** Directory names excluded anywhere in the tree */
	excludePatterns: z.array(z.string().min(1)),
	/** Apply the project's .gitignore on top of excludePatterns */
	respectGitignore: z.boolean(),
	/** Where save/load go when no path is given (relative to project root) */
	indexPath: z.string().min(1),
	/** Files parsed at once during a build (1 = sequential) */
	concurrency: z.number().int().min(1).max(64),
	logLevel: z.enum(['debug', 'info', 'warn', 'error']),
});

export type SemindexConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG: SemindexConfig = {
	version: 1,
	extensions: ['.go'],
	excludePatterns: [
		'vendor',
		'node_modules',
		'.git',
		'.semindex',
		'dist',
		'build',
	],
	respectGitignore: true,
	indexPath: DEFAULT_INDEX_PATH,
	concurrency: 1,
	logLevel: 'info',
};

/**
 * Merge a partial config over the defaults and validate the result.
 */
export function resolveConfig(
	overrides: Partial<SemindexConfig> = {},
): SemindexConfig {
	return configSchema.parse({...DEFAULT_CONFIG, ...overrides});
}

/**
 * Load config from disk, merging with defaults.
 * Returns DEFAULT_CONFIG if no config file exists; throws ConfigError if
 * the file is present but unreadable or invalid.
 */
export async function loadConfig(projectRoot: string): Promise<SemindexConfig> {
	const configPath = getConfigPath(projectRoot);

	let content: string;
	try {
		content = await fs.readFile(configPath, 'utf-8');
	} catch (error) {
		if (isNotFound(error)) {
			return {...DEFAULT_CONFIG};
		}
		throw new ConfigError(configPath, error);
	}

	try {
		const loaded = configSchema.partial().parse(JSON.parse(content));
		return resolveConfig(loaded);
	} catch (error) {
		throw new ConfigError(configPath, error);
	}
}

/**
 * Save config to disk.
 * Creates the .semindex directory if it doesn't exist.
 */
export async function saveConfig(
	projectRoot: string,
	config: SemindexConfig,
): Promise<void> {
	await fs.mkdir(getSemindexDir(projectRoot), {recursive: true});
	await fs.writeFile(
		getConfigPath(projectRoot),
		JSON.stringify(config, null, '\t') + '\n',
	);
}

function isNotFound(error: unknown): boolean {
	return (
		error instanceof Error && 'code' in error && error.code === 'ENOENT'
	);
}
