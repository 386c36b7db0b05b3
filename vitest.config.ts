import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

// Workspace packages resolve to their sources, so tests need no build
const source = (pkg: string, entry = 'index') =>
	fileURLToPath(new URL(`./packages/${pkg}/src/${entry}.ts`, import.meta.url));

export default defineConfig({
	resolve: {
		alias: [
			{ find: /^flakeprobe-runner$/, replacement: source('flakeprobe-runner') },
			{ find: /^flakeprobe-runner\/testing$/, replacement: source('flakeprobe-runner', 'testing') },
			{ find: /^flakeprobe-junit$/, replacement: source('flakeprobe-junit') },
		],
	},
	test: {
		include: ['packages/*/src/**/*.test.ts'],
		environment: 'node',
		testTimeout: 10_000,
	},
});
