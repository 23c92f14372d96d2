import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Engine } from '@core/engine';
import { documentIdFor } from '@rag/store';
import { resolveSettings } from '@store/config';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const settings = () => resolveSettings({}).settings;

function memoryEngine(cwd = process.cwd()) {
	return new Engine({ settings: settings(), indexPath: null, cwd, now: () => 1000 });
}

describe('Engine', () => {
	let tmp: string;

	beforeEach(() => {
		tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'docsift-engine-'));
	});

	afterEach(() => {
		vi.restoreAllMocks();
		fs.rmSync(tmp, { recursive: true, force: true });
	});

	function writeCorpus() {
		const dir = path.join(tmp, 'docs');
		fs.mkdirSync(dir);
		fs.writeFileSync(path.join(dir, 'a.md'), 'Rust ownership rules.');
		fs.writeFileSync(path.join(dir, 'b.txt'), 'Gardening tips for tomatoes.');
		fs.writeFileSync(path.join(dir, 'blob.bin'), Buffer.from([0, 1, 2]));
		return dir;
	}

	const canon = (p: string) => p.split(path.sep).join('/');

	it('indexes named text and finds it', async () => {
		const engine = memoryEngine();
		const r = await engine.addText('t1', 'the quick brown fox');
		expect(r).toEqual({
			id: documentIdFor('text:t1'),
			sourcePath: 'text:t1',
			outcome: 'created',
			chunks: 1,
		});
		const hits = engine.search('quick fox');
		expect(hits.map((h) => h.sourcePath)).toEqual(['text:t1']);
		expect(hits[0].score).toBeGreaterThan(0);
	});

	it('ingests a directory and is idempotent on re-add', async () => {
		const dir = writeCorpus();
		const engine = memoryEngine();
		const first = await engine.add(dir);
		expect(first.created).toEqual([
			canon(path.join(dir, 'a.md')),
			canon(path.join(dir, 'b.txt')),
		]);
		expect(first.unindexable).toEqual([canon(path.join(dir, 'blob.bin'))]);
		expect(first.failed).toEqual([]);
		const before = engine.status();
		expect(before).toMatchObject({ documents: 3, chunks: 2, generation: 3 });

		const again = await engine.add(dir);
		expect(again.created).toEqual([]);
		expect(again.unchanged).toHaveLength(3);
		expect(engine.status().generation).toBe(before.generation);

		fs.writeFileSync(path.join(dir, 'a.md'), 'Rust borrowing rules.');
		const changed = await engine.add(dir);
		expect(changed.updated).toEqual([canon(path.join(dir, 'a.md'))]);
		expect(Array.from(engine.list(), (d) => d.sourcePath)).toEqual([
			canon(path.join(dir, 'a.md')),
			canon(path.join(dir, 'b.txt')),
			canon(path.join(dir, 'blob.bin')),
		]);
	});

	it('reports a missing target without touching the store', async () => {
		const engine = memoryEngine(tmp);
		const r = await engine.add('missing');
		expect(r.failed).toHaveLength(1);
		expect(r.failed[0].code).toBe('UnreadableSource');
		expect(engine.status().generation).toBe(0);
	});

	it('indexes the readable files when one subdirectory cannot be listed', async () => {
		const dir = writeCorpus();
		const locked = path.join(dir, 'locked');
		fs.mkdirSync(locked);
		fs.writeFileSync(path.join(locked, 'c.md'), 'hidden');
		const readdir = fs.readdirSync;
		vi.spyOn(fs, 'readdirSync').mockImplementation((p, options) => {
			if (String(p) === locked) {
				throw new Error('EACCES: permission denied');
			}
			return readdir(p, options);
		});

		const r = await memoryEngine().add(dir);
		expect(r.created).toEqual([
			canon(path.join(dir, 'a.md')),
			canon(path.join(dir, 'b.txt')),
		]);
		expect(r.failed).toEqual([
			{
				sourcePath: canon(locked),
				code: 'UnreadableSource',
				message: `Cannot read ${locked}: EACCES: permission denied`,
			},
		]);
	});

	it('removes by name, id or path', async () => {
		const dir = writeCorpus();
		const engine = memoryEngine(dir);
		await engine.addText('t1', 'alpha');
		await engine.add('a.md');

		expect((await engine.remove('t1'))?.sourcePath).toBe('text:t1');
		expect(await engine.remove('t1')).toBeUndefined();
		expect((await engine.remove('a.md'))?.sourcePath).toBe(canon(path.join(dir, 'a.md')));
		expect(engine.status().documents).toBe(0);
	});

	it('clear empties the store and the cache', async () => {
		const engine = memoryEngine();
		await engine.addText('t1', 'the quick brown fox');
		engine.search('quick fox');
		engine.search('quick fox');
		await engine.clear();
		expect(engine.status()).toMatchObject({
			documents: 0,
			chunks: 0,
			cache: { size: 0, hits: 0, misses: 0 },
		});
		expect(engine.search('quick fox')).toEqual([]);
	});

	it('persists after each mutation and reloads on open', async () => {
		const first = await Engine.open({ settings: settings(), cwd: tmp });
		await first.addText('t1', 'the quick brown fox');
		const artifact = path.join(tmp, '.docsift', 'index.v1.json');
		expect(fs.existsSync(artifact)).toBe(true);

		const second = await Engine.open({ settings: settings(), cwd: tmp });
		expect(second.status()).toMatchObject({ documents: 1, chunks: 1 });
		expect(second.search('quick fox')[0].sourcePath).toBe('text:t1');
		expect(second.getLoadError()).toBeUndefined();
	});

	it('starts empty and reports a corrupted artifact', async () => {
		const artifact = path.join(tmp, '.docsift', 'index.v1.json');
		fs.mkdirSync(path.dirname(artifact), { recursive: true });
		fs.writeFileSync(artifact, '{"format":"docsift-index"');

		const engine = await Engine.open({ settings: settings(), cwd: tmp });
		const status = engine.status();
		expect(status.documents).toBe(0);
		expect(status.loadError?.startsWith(`Index at ${artifact} is corrupted: unparseable JSON`)).toBe(
			true
		);
		expect(engine.getLoadError()?.code).toBe('IndexCorrupted');
	});

	it('round-trips through export and import', async () => {
		const source = memoryEngine(tmp);
		await source.addText('t1', 'the quick brown fox');
		await source.addText('t2', 'lazy dogs sleep');
		const exported = await source.exportTo('out/index.json');
		expect(exported).toEqual({ path: path.join(tmp, 'out', 'index.json'), documents: 2 });

		const target = memoryEngine(tmp);
		await target.addText('other', 'something else');
		const imported = await target.importFrom('out/index.json');
		expect(imported).toEqual({ documents: 2, generation: 2 });
		expect(Array.from(target.list(), (d) => d.sourcePath)).toEqual(['text:t1', 'text:t2']);
		expect(target.search('quick fox')).toEqual(source.search('quick fox'));
	});
});
