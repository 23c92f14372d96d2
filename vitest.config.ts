import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const dir = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
	test: {
		environment: 'node',
		include: ['src/tests/**/*.test.ts'],
	},
	resolve: {
		alias: {
			'@cli': dir('./src/cli'),
			'@core': dir('./src/core'),
			'@ingest': dir('./src/ingest'),
			'@obs': dir('./src/obs'),
			'@rag': dir('./src/rag'),
			'@store': dir('./src/store'),
			'@util': dir('./src/util'),
		},
	},
});
