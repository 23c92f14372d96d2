import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { joinCommandWords, runExec } from '@cli/commands/exec';
import { buildProgram } from '@cli/program';
import { VERSION } from '@util/build-info';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

describe('docsift exec', () => {
	let tmp: string;
	let user: string;

	beforeEach(() => {
		tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'docsift-exec-'));
		user = path.join(tmp, 'user-home');
	});

	afterEach(() => {
		fs.rmSync(tmp, { recursive: true, force: true });
		vi.restoreAllMocks();
	});

	it('persists between invocations', async () => {
		const opts = { cwd: tmp, userDir: user };
		const added = await runExec('add_text t1 :: hello world', opts);
		expect(added.ok).toBe(true);
		expect(fs.existsSync(path.join(tmp, '.docsift', 'index.v1.json'))).toBe(true);

		const listed = await runExec('list', opts);
		expect(listed.text.endsWith('  text:t1')).toBe(true);
	});

	it('keeps shell words with spaces together', async () => {
		expect(joinCommandWords(['add', '/dir with space'])).toBe('add "/dir with space"');
		expect(joinCommandWords(['add_text', 'n', '::', 'say "hi" now'])).toBe(
			'add_text n :: "say \\"hi\\" now"'
		);

		fs.mkdirSync(path.join(tmp, 'my docs'));
		fs.writeFileSync(path.join(tmp, 'my docs', 'a.md'), 'hello');
		const res = await runExec(joinCommandWords(['add', 'my docs']), {
			cwd: tmp,
			userDir: user,
		});
		expect(res.text).toBe(
			'Indexed 1 document from my docs (1 new, 0 updated, 0 unchanged, 0 unindexable, 0 failed)'
		);
	});

	it('returns a failed result for unknown verbs', async () => {
		const res = await runExec('bogus', { cwd: tmp, userDir: user });
		expect(res.ok).toBe(false);
		expect(res.error?.code).toBe('UnknownCommand');
	});
});

describe('docsift program', () => {
	it('prints build info for version', async () => {
		const program = buildProgram();
		program.exitOverride();
		const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
		await program.parseAsync(['version'], { from: 'user' });
		expect(logSpy).toHaveBeenCalledTimes(1);
		const [printed] = logSpy.mock.calls[0];
		expect(String(printed).split('\n').slice(0, 2)).toEqual([
			`docsift v${VERSION}`,
			`Runtime: Node.js v${process.versions.node}`,
		]);
		logSpy.mockRestore();
	});

	it('rejects an unknown log level', async () => {
		const program = buildProgram();
		program.exitOverride();
		program.configureOutput({ writeErr: () => {} });
		await expect(
			program.parseAsync(['--log-level', 'loud', 'version'], { from: 'user' })
		).rejects.toThrow();
	});
});
