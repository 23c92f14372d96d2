import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createCommandRegistry } from '@core/commands';
import { Engine } from '@core/engine';
import { documentIdFor } from '@rag/store';
import { resolveSettings } from '@store/config';
import { beforeEach, describe, expect, it } from 'vitest';

describe('engine commands', () => {
	const registry = createCommandRegistry();
	let engine: Engine;
	const run = (line: string) => registry.dispatch(line, engine);

	beforeEach(() => {
		engine = new Engine({
			settings: resolveSettings({}).settings,
			indexPath: null,
			now: () => 1000,
		});
	});

	it('adds text, finds it, then clears everything', async () => {
		const added = await run('add_text t1 :: the quick brown fox');
		expect(added).toEqual({
			ok: true,
			verb: 'add_text',
			text: `Added t1 as ${documentIdFor('text:t1')} (1 chunk, created)`,
		});

		const found = await run('search quick fox');
		expect(found.ok).toBe(true);
		const lines = found.text.split('\n');
		expect(lines).toHaveLength(2);
		expect(lines[0]).toMatch(/^1\. text:t1 #0 \(score 0\.\d{3}\)$/);
		expect(lines[1]).toBe('   the quick brown fox');
		const hits = engine.search('quick fox');
		expect(hits).toHaveLength(1);
		expect(hits[0].score).toBeGreaterThan(0);

		expect((await run('clear')).text).toBe('Cleared index and cache.');
		expect((await run('status')).text).toBe(
			[
				'Documents: 0',
				'Chunks: 0',
				'Generation: 2',
				'Cache: 0/100 entries, hit rate 0.0%',
				'Index: (memory only)',
			].join('\n')
		);
	});

	it('takes quoted names and content', async () => {
		const added = await run('add_text "t1" :: "the quick brown fox"');
		expect(added.text).toBe(
			`Added t1 as ${documentIdFor('text:t1')} (1 chunk, created)`
		);
		expect(Array.from(engine.list(), (d) => d.sourcePath)).toEqual(['text:t1']);

		const lines = (await run('search "quick fox"')).text.split('\n');
		expect(lines).toHaveLength(2);
		expect(lines[0]).toMatch(/^1\. text:t1 #0 \(score 0\.\d{3}\)$/);
		expect(lines[1]).toBe('   the quick brown fox');

		await run('add_text "my doc" :: spaced name');
		expect((await run('remove "my doc"')).text).toBe(
			`Removed text:my doc (${documentIdFor('text:my doc')})`
		);
	});

	it('accepts the rag prefix and a leading slash', async () => {
		await run('rag add_text t1 :: alpha beta');
		expect((await run('/list')).text).toBe(
			`${documentIdFor('text:t1')}  prose  indexed  1 chunk  text:t1`
		);
		const help = await run('rag help');
		expect(help.ok).toBe(true);
		expect(help.text.split('\n')).toContain(
			'  add_text <name> :: <content>  Index literal text under a name'
		);
	});

	it('answers with the best sentence and its source', async () => {
		await run('add_text zoo :: Cats sleep a lot. The quick fox jumps high. Dogs bark.');
		expect((await run('ask quick fox')).text).toBe(
			'The quick fox jumps high.\n\nSources: text:zoo'
		);
		expect((await run('summary quick fox')).text).toBe(
			'Summary for "quick fox":\n- [text:zoo] Cats sleep a lot. The quick fox jumps high. Dogs bark.'
		);
	});

	it('leaves the store alone on an unknown verb', async () => {
		await run('add_text t1 :: alpha');
		const res = await run('frobnicate now');
		expect(res.ok).toBe(false);
		expect(res.error?.code).toBe('UnknownCommand');
		expect(res.text.endsWith(
			'Valid commands: add, add_text, ask, search, summary, status, list, remove, export, import, clear, help'
		)).toBe(true);
		expect(engine.status()).toMatchObject({ documents: 1, generation: 1 });
	});

	it('reports bad arguments and empty queries', async () => {
		expect(await run('search')).toEqual({
			ok: false,
			verb: 'search',
			text: 'Invalid arguments for search. Usage: search <query>',
			error: {
				code: 'InvalidArguments',
				message: 'Invalid arguments for search. Usage: search <query>',
			},
		});
		expect((await run('add_text missing delimiter')).error?.code).toBe(
			'InvalidArguments'
		);
		expect(await run('search ?!')).toEqual({
			ok: true,
			verb: 'search',
			text: 'No results.',
			error: { code: 'EmptyQuery', message: 'Query has no searchable terms' },
		});
	});

	it('removes documents by name', async () => {
		await run('add_text t1 :: alpha');
		expect((await run('remove t1')).text).toBe(
			`Removed text:t1 (${documentIdFor('text:t1')})`
		);
		expect((await run('remove t1')).text).toBe('No document matches t1.');
	});

	it('summarizes an add run', async () => {
		const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'docsift-cmd-'));
		try {
			fs.writeFileSync(path.join(dir, 'a.md'), 'Alpha notes.');
			fs.writeFileSync(path.join(dir, 'b.md'), 'Beta notes.');
			expect((await run(`add "${dir}"`)).text).toBe(
				`Indexed 2 documents from ${dir} (2 new, 0 updated, 0 unchanged, 0 unindexable, 0 failed)`
			);
		} finally {
			fs.rmSync(dir, { recursive: true, force: true });
		}
	});
});
