/** biome-ignore-all lint/suspicious/noConsole: build script output */

import { createHash } from 'node:crypto';
import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { basename, join } from 'node:path';
import { build } from 'esbuild';

const outPath = join('dist', 'docsift.mjs');

mkdirSync('dist', { recursive: true });

// Single-file ESM bundle; npm dependencies are bundled too so the bin runs
// without node_modules next to it.
await build({
	entryPoints: ['src/cli/main.ts'],
	outfile: outPath,
	bundle: true,
	platform: 'node',
	target: 'node20',
	format: 'esm',
	minify: true,
	banner: {
		js: [
			'#!/usr/bin/env node',
			"import { createRequire as __createRequire } from 'node:module';",
			'const require = __createRequire(import.meta.url);',
		].join('\n'),
	},
	define: {
		'process.env.BUILD_DATE': JSON.stringify(new Date().toISOString()),
	},
});

function sha256File(p: string) {
	const h = createHash('sha256');
	h.update(readFileSync(p));
	return h.digest('hex');
}

writeFileSync(`${outPath}.sha256`, `${sha256File(outPath)}  ${basename(outPath)}\n`);

console.log(`Built ${outPath}`);
