import { CommandRegistry } from '@core/command/registry';
import { singleArgument, splitNamedText } from '@core/command/parser';
import type { CommandSpec } from '@core/command/types';
import type { AddReport, Engine } from '@core/engine';
import { EmptyQueryError, InvalidArgumentsError } from '@core/errors';
import { tokenize } from '@rag/embedder';
import { snippetOf } from '@rag/query';

const SEARCH_SNIPPET_CHARS = 120;

function requireQuery(verb: string, rest: string, usage: string): string {
	if (!rest) {
		throw new InvalidArgumentsError(verb, usage);
	}
	if (tokenize(rest).length === 0) {
		throw new EmptyQueryError();
	}
	return rest;
}

function requireNone(verb: string, rest: string) {
	if (rest) {
		throw new InvalidArgumentsError(verb, verb);
	}
}

function plural(n: number, word: string): string {
	return `${n} ${word}${n === 1 ? '' : 's'}`;
}

export function formatAddReport(target: string, r: AddReport): string {
	const indexed = r.created.length + r.updated.length;
	const lines = [
		`Indexed ${plural(indexed, 'document')} from ${target} (${r.created.length} new, ${r.updated.length} updated, ${r.unchanged.length} unchanged, ${r.unindexable.length} unindexable, ${r.failed.length} failed)`,
	];
	for (const p of r.unindexable) {
		lines.push(`  - unindexable: ${p}`);
	}
	for (const f of r.failed) {
		lines.push(`  ! ${f.code}: ${f.message}`);
	}
	return lines.join('\n');
}

const specs: CommandSpec<Engine>[] = [
	{
		id: 'add',
		synopsis: 'add <path>',
		summary: 'Index a file or directory',
		handler: async (rest, engine) => {
			const target = singleArgument('add', rest, 'add <path>');
			return formatAddReport(target, await engine.add(target));
		},
	},
	{
		id: 'add_text',
		synopsis: 'add_text <name> :: <content>',
		summary: 'Index literal text under a name',
		handler: async (rest, engine) => {
			const { name, content } = splitNamedText(
				'add_text',
				rest,
				'add_text <name> :: <content>'
			);
			const r = await engine.addText(name, content);
			return `Added ${name} as ${r.id} (${plural(r.chunks, 'chunk')}, ${r.outcome})`;
		},
	},
	{
		id: 'ask',
		synopsis: 'ask <query>',
		summary: 'Answer from the best matching passage',
		handler: (rest, engine) => {
			const query = requireQuery('ask', rest, 'ask <query>');
			const r = engine.ask(query);
			if (r.hits.length === 0) {
				return `No relevant documents found for "${query}".`;
			}
			return `${r.answer}\n\nSources: ${r.sources.join(', ')}`;
		},
	},
	{
		id: 'search',
		aliases: ['find'],
		synopsis: 'search <query>',
		summary: 'Ranked matching chunks',
		handler: (rest, engine) => {
			const query = requireQuery('search', rest, 'search <query>');
			const hits = engine.search(query);
			if (hits.length === 0) {
				return `No results for "${query}".`;
			}
			return hits
				.map(
					(h, i) =>
						`${i + 1}. ${h.sourcePath} #${h.chunkIndex} (score ${h.score.toFixed(3)})\n   ${snippetOf(h.text, SEARCH_SNIPPET_CHARS)}`
				)
				.join('\n');
		},
	},
	{
		id: 'summary',
		synopsis: 'summary <topic>',
		summary: 'Top snippets about a topic',
		handler: (rest, engine) => {
			const topic = requireQuery('summary', rest, 'summary <topic>');
			const r = engine.summary(topic);
			if (r.snippets.length === 0) {
				return `Nothing indexed about "${topic}".`;
			}
			return [
				`Summary for "${topic}":`,
				...r.snippets.map((s) => `- [${s.sourcePath}] ${s.snippet}`),
			].join('\n');
		},
	},
	{
		id: 'status',
		aliases: ['stats'],
		synopsis: 'status',
		summary: 'Index and cache statistics',
		handler: (rest, engine) => {
			requireNone('status', rest);
			const s = engine.status();
			const lines = [
				`Documents: ${s.documents}`,
				`Chunks: ${s.chunks}`,
				`Generation: ${s.generation}`,
				`Cache: ${s.cache.size}/${s.cache.capacity} entries, hit rate ${(s.cache.hitRate * 100).toFixed(1)}%`,
				`Index: ${s.indexPath ?? '(memory only)'}`,
			];
			if (s.loadError) {
				lines.push(`Last load error: ${s.loadError}`);
			}
			return lines.join('\n');
		},
	},
	{
		id: 'list',
		aliases: ['ls'],
		synopsis: 'list',
		summary: 'Indexed documents in insertion order',
		handler: (rest, engine) => {
			requireNone('list', rest);
			const lines: string[] = [];
			for (const d of engine.list()) {
				lines.push(
					`${d.id}  ${d.formatKind}  ${d.status}  ${plural(d.chunkCount, 'chunk')}  ${d.sourcePath}`
				);
			}
			return lines.length ? lines.join('\n') : 'No documents indexed.';
		},
	},
	{
		id: 'remove',
		aliases: ['rm'],
		synopsis: 'remove <id-or-path>',
		summary: 'Drop a document and its chunks',
		handler: async (rest, engine) => {
			const key = singleArgument('remove', rest, 'remove <id-or-path>');
			const removed = await engine.remove(key);
			return removed
				? `Removed ${removed.sourcePath} (${removed.id})`
				: `No document matches ${key}.`;
		},
	},
	{
		id: 'export',
		synopsis: 'export <path>',
		summary: 'Write the index to a file',
		handler: async (rest, engine) => {
			const dest = singleArgument('export', rest, 'export <path>');
			const r = await engine.exportTo(dest);
			return `Exported ${plural(r.documents, 'document')} to ${r.path}`;
		},
	},
	{
		id: 'import',
		synopsis: 'import <path>',
		summary: 'Replace the index from a file',
		handler: async (rest, engine) => {
			const src = singleArgument('import', rest, 'import <path>');
			const r = await engine.importFrom(src);
			return `Imported ${plural(r.documents, 'document')} from ${src} (generation ${r.generation})`;
		},
	},
	{
		id: 'clear',
		synopsis: 'clear',
		summary: 'Empty the index and the result cache',
		handler: async (rest, engine) => {
			requireNone('clear', rest);
			await engine.clear();
			return 'Cleared index and cache.';
		},
	},
];

export function createCommandRegistry(): CommandRegistry<Engine> {
	const registry = new CommandRegistry<Engine>();
	for (const spec of specs) {
		registry.register(spec);
	}
	registry.register({
		id: 'help',
		synopsis: 'help',
		summary: 'This list',
		handler: () => formatHelp(registry),
	});
	return registry;
}

export function formatHelp(registry: CommandRegistry<Engine>): string {
	const rows = registry.list();
	const width = Math.max(...rows.map((s) => s.synopsis.length));
	return [
		'Commands (optionally prefixed with "rag " or "/"):',
		...rows.map((s) => `  ${s.synopsis.padEnd(width)}  ${s.summary}`),
	].join('\n');
}
