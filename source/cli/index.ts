#!/usr/bin/env node
import chalk from 'chalk';
import meow from 'meow';
import {RESULT_TYPES} from '../core/constants.js';
import {loadConfig} from '../core/config/index.js';
import {createLogger} from '../core/logger/index.js';
import type {ResultType} from '../core/search/index.js';
import {resolveLogLevel, runIndex, runSearch} from './commands/handlers.js';

const cli = meow(
	`
	Usage
	  $ semindex index [--out <file>]
	  $ semindex search <query> [options]

	Options
	  --root, -r       Project root (default: current directory)
	  --out, -o        Index file to write or read (default: .ai-context/search-index.json)
	  --type, -t       Result type to include, repeatable (function, type, interface, comment)
	  --file, -f       Glob or path prefix results must match, repeatable
	  --package, -p    Package results must belong to, repeatable
	  --exported       Only exported functions and types
	  --limit, -l      Maximum number of results (default: 20, 0 = all)
	  --json           Print the raw search response
	  --verbose        Write debug entries to the log file (overrides logLevel)

	Examples
	  $ semindex index
	  $ semindex search "parse config" --type function --exported
`,
	{
		importMeta: import.meta,
		flags: {
			root: {type: 'string', shortFlag: 'r'},
			out: {type: 'string', shortFlag: 'o'},
			type: {type: 'string', shortFlag: 't', isMultiple: true},
			file: {type: 'string', shortFlag: 'f', isMultiple: true},
			package: {type: 'string', shortFlag: 'p', isMultiple: true},
			exported: {type: 'boolean', default: false},
			limit: {type: 'number', shortFlag: 'l'},
			json: {type: 'boolean', default: false},
			verbose: {type: 'boolean', default: false},
		},
	},
);

function isResultType(value: string): value is ResultType {
	return RESULT_TYPES.some(type => type === value);
}

async function main(): Promise<void> {
	const [command, ...rest] = cli.input;
	const projectRoot = cli.flags.root ?? process.cwd();
	const config = await loadConfig(projectRoot);
	const logger = createLogger(
		projectRoot,
		resolveLogLevel(config, cli.flags.verbose),
	);

	const controller = new AbortController();
	process.once('SIGINT', () => controller.abort('Interrupted'));
	const context = {projectRoot, config, logger, signal: controller.signal};

	switch (command) {
		case 'index':
			console.log(await runIndex(context, cli.flags.out));
			return;
		case 'search': {
			const query = rest.join(' ').trim();
			if (!query) {
				cli.showHelp(2);
				return;
			}
			const types = cli.flags.type ?? [];
			const invalid = types.filter(type => !isResultType(type));
			if (invalid.length > 0) {
				throw new Error(`unknown result type: ${invalid.join(', ')}`);
			}
			console.log(
				await runSearch(context, query, {
					types: types.filter(isResultType),
					files: cli.flags.file,
					packages: cli.flags.package,
					exportedOnly: cli.flags.exported,
					limit: cli.flags.limit,
					indexPath: cli.flags.out,
					json: cli.flags.json,
				}),
			);
			return;
		}
		default:
			cli.showHelp(command ? 2 : 0);
	}
}

main().catch((error: unknown) => {
	console.error(chalk.red(error instanceof Error ? error.message : String(error)));
	process.exitCode = 1;
});
