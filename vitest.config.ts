import {defineConfig} from 'vitest/config';

export default defineConfig({
	test: {
		include: ['source/**/*.test.ts'],
		exclude: ['**/node_modules/**', '**/dist/**'],
		environment: 'node',
		globals: true,
		// Grammar loading is WASM-backed; parser tests share one process
		testTimeout: 30_000,
		pool: 'forks',
	},
});
