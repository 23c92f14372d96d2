import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { UnreadableSourceError } from '@core/errors';
import { buildIgnoreFilter } from '@ingest/ignore';
import { discoverSources, readSource } from '@ingest/sources';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

function write(root: string, rel: string, content: string) {
	const p = path.join(root, rel);
	fs.mkdirSync(path.dirname(p), { recursive: true });
	fs.writeFileSync(p, content, 'utf8');
}

describe('discoverSources', () => {
	let tmp: string;

	beforeEach(() => {
		tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'docsift-src-'));
		write(tmp, '.gitignore', '*.log\n');
		write(tmp, 'a.md', 'hello');
		write(tmp, 'b.txt', 'world');
		write(tmp, 'sub/c.ts', 'const c = 1;');
		write(tmp, 'node_modules/x.js', 'x');
		write(tmp, 'skip.log', 'noise');
	});

	afterEach(() => {
		vi.restoreAllMocks();
		fs.rmSync(tmp, { recursive: true, force: true });
	});

	const rel = (files: { absPath: string }[]) =>
		files.map((f) => path.relative(tmp, f.absPath).split(path.sep).join('/'));

	it('walks in name order honoring builtin ignores and .gitignore', () => {
		const r = discoverSources(tmp, { maxFileSize: 0 });
		expect(rel(r.files)).toEqual(['.gitignore', 'a.md', 'b.txt', 'sub/c.ts']);
		expect(r.skipped).toEqual([]);
		expect(r.files[1].bytes).toBe(5);
		expect(r.files[1].canonicalPath).toBe(
			path.join(tmp, 'a.md').split(path.sep).join('/')
		);
	});

	it('applies configured patterns and can skip .gitignore', () => {
		const r = discoverSources(tmp, {
			maxFileSize: 0,
			useGitIgnore: false,
			patterns: ['sub/'],
		});
		expect(rel(r.files)).toEqual(['.gitignore', 'a.md', 'b.txt', 'skip.log']);
	});

	it('reports files over maxFiles and maxFileSize as skipped', () => {
		const capped = discoverSources(tmp, { maxFileSize: 0, maxFiles: 2 });
		expect(rel(capped.files)).toEqual(['.gitignore', 'a.md']);
		expect(capped.skipped.map((s) => s.reason)).toEqual(['maxFiles', 'maxFiles']);

		const big = discoverSources('a.md', { maxFileSize: 3 }, tmp);
		expect(big.files).toEqual([]);
		expect(big.skipped).toEqual([
			{
				absPath: path.join(tmp, 'a.md'),
				reason: 'oversize',
				message: `Skipped ${path.join(tmp, 'a.md')}: 5 bytes exceeds maxFileSize (3)`,
			},
		]);
	});

	it('skips an unreadable directory and keeps walking', () => {
		const blocked = path.join(tmp, 'sub');
		const readdir = fs.readdirSync;
		vi.spyOn(fs, 'readdirSync').mockImplementation((dir, options) => {
			if (String(dir) === blocked) {
				throw new Error('EACCES: permission denied');
			}
			return readdir(dir, options);
		});

		const r = discoverSources(tmp, { maxFileSize: 0 });
		expect(rel(r.files)).toEqual(['.gitignore', 'a.md', 'b.txt']);
		expect(r.skipped).toEqual([
			{
				absPath: blocked,
				reason: 'io-error',
				message: `Cannot read ${blocked}: EACCES: permission denied`,
			},
		]);
	});

	it('reports a missing target', () => {
		const r = discoverSources('nope', { maxFileSize: 0 }, tmp);
		expect(r.files).toEqual([]);
		expect(r.skipped).toHaveLength(1);
		expect(r.skipped[0].reason).toBe('missing');
		expect(r.skipped[0].message.startsWith(`Cannot read ${path.join(tmp, 'nope')}:`)).toBe(true);
	});

	it('readSource wraps I/O failures', async () => {
		await expect(readSource(path.join(tmp, 'gone.txt'))).rejects.toBeInstanceOf(
			UnreadableSourceError
		);
		expect((await readSource(path.join(tmp, 'a.md'))).toString('utf8')).toBe('hello');
	});
});

describe('buildIgnoreFilter', () => {
	it('never filters the root or paths outside it', () => {
		const filter = buildIgnoreFilter({
			rootDir: '/repo',
			useGitIgnore: false,
			patterns: ['*.tmp'],
		});
		expect(filter('/repo', true)).toBe(true);
		expect(filter('/elsewhere/x.tmp')).toBe(true);
		expect(filter('/repo/x.tmp')).toBe(false);
		expect(filter('/repo/.docsift', true)).toBe(false);
		expect(filter('/repo/src/a.ts')).toBe(true);
	});
});
