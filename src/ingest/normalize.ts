import path from 'node:path';
import type { FormatKind } from '@rag/types';

export const DEFAULT_MAX_CHUNK_CHARS = 1200;

export type ContentClass =
	| { kind: 'code' }
	| { kind: 'prose' }
	| { kind: 'tabular'; delimiter: string }
	| { kind: 'markup'; json: boolean }
	| { kind: 'unknown'; reason: 'binary' };

export interface NormalizedContent {
	formatKind: FormatKind;
	chunks: string[];
}

export interface NormalizeOptions {
	maxChunkChars?: number;
}

const CODE_EXT = new Set([
	'.ts',
	'.tsx',
	'.js',
	'.jsx',
	'.mjs',
	'.cjs',
	'.rs',
	'.go',
	'.py',
	'.java',
	'.kt',
	'.rb',
	'.sh',
	'.bash',
	'.zsh',
	'.fish',
	'.sql',
	'.cs',
	'.cpp',
	'.c',
	'.h',
	'.hpp',
	'.swift',
	'.php',
	'.lua',
	'.scala',
]);
const PROSE_EXT = new Set(['.md', '.mdx', '.txt', '.rst', '.adoc', '.org']);
const TABULAR_EXT = new Map([
	['.csv', ','],
	['.tsv', '\t'],
	['.psv', '|'],
]);
const MARKUP_EXT = new Set([
	'.json',
	'.jsonc',
	'.xml',
	'.html',
	'.htm',
	'.svg',
	'.yaml',
	'.yml',
	'.toml',
	'.ini',
]);
const DELIMITERS = [',', '\t', ';', '|'];

export function isBinaryBuffer(buf: Uint8Array): boolean {
	// NUL bytes or a high ratio of non-printable bytes in the first 8 KiB
	const len = Math.min(buf.length, 8192);
	let nonPrintable = 0;
	for (let i = 0; i < len; i++) {
		const c = buf[i];
		if (c === 0) {
			return true;
		}
		const printable =
			c === 0x09 || c === 0x0a || c === 0x0d || c >= 0x20;
		if (!printable) {
			nonPrintable++;
		}
	}
	return len > 0 && nonPrintable / len > 0.3;
}

function displayName(sourcePath: string): string {
	const bare = sourcePath.startsWith('text:')
		? sourcePath.slice('text:'.length)
		: sourcePath;
	return path.posix.basename(bare.split(path.sep).join('/'));
}

function sniffDelimiter(text: string): string | undefined {
	const lines = text
		.split('\n')
		.filter((l) => l.trim() !== '')
		.slice(0, 5);
	if (lines.length < 2) {
		return;
	}
	for (const d of DELIMITERS) {
		const counts = lines.map((l) => l.split(d).length - 1);
		if (counts[0] > 0 && counts.every((c) => c === counts[0])) {
			return d;
		}
	}
	return;
}

function parsesAsJson(text: string): boolean {
	try {
		JSON.parse(text);
		return true;
	} catch {
		return false;
	}
}

function sniffContent(text: string): ContentClass {
	const head = text.trimStart();
	if (head.startsWith('#!')) {
		return { kind: 'code' };
	}
	if ((head.startsWith('{') || head.startsWith('[')) && parsesAsJson(text)) {
		return { kind: 'markup', json: true };
	}
	if (/^<[a-zA-Z!?]/.test(head)) {
		return { kind: 'markup', json: false };
	}
	const delimiter = sniffDelimiter(text);
	if (delimiter) {
		return { kind: 'tabular', delimiter };
	}
	return { kind: 'prose' };
}

/** Explicit classifier: extension first, content sniffing otherwise. */
export function classifyContent(
	sourcePath: string,
	bytes: Uint8Array
): ContentClass {
	if (isBinaryBuffer(bytes)) {
		return { kind: 'unknown', reason: 'binary' };
	}
	const ext = path.extname(displayName(sourcePath)).toLowerCase();
	if (CODE_EXT.has(ext)) {
		return { kind: 'code' };
	}
	if (PROSE_EXT.has(ext)) {
		return { kind: 'prose' };
	}
	const delimiter = TABULAR_EXT.get(ext);
	if (delimiter) {
		return { kind: 'tabular', delimiter };
	}
	if (MARKUP_EXT.has(ext)) {
		return {
			kind: 'markup',
			json: ext === '.json' && parsesAsJson(decodeText(bytes)),
		};
	}
	return sniffContent(decodeText(bytes));
}

export function classifyFormat(
	sourcePath: string,
	bytes: Uint8Array
): FormatKind {
	return classifyContent(sourcePath, bytes).kind;
}

/** UTF-8 decode, drop BOM, unify newlines, strip control chars and trailing blanks. */
export function decodeText(bytes: Uint8Array): string {
	return Buffer.from(bytes)
		.toString('utf8')
		.replace(/^\uFEFF/, '')
		.replace(/\r\n?/g, '\n')
		.replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g, '')
		.replace(/[ \t]+$/gm, '');
}

// ---------------------------------------------------------------------------
// Chunk packing

interface Segment {
	text: string;
	sep: string; // separator placed before this segment when appended
}

/** Split at whitespace into pieces of at most `max` chars; a longer token stands alone. */
export function splitAtWhitespace(text: string, max: number): string[] {
	const out: string[] = [];
	let cur = '';
	for (const word of text.split(/\s+/)) {
		if (!word) {
			continue;
		}
		if (!cur) {
			cur = word;
		} else if (cur.length + 1 + word.length <= max) {
			cur += ` ${word}`;
		} else {
			out.push(cur);
			cur = word;
		}
	}
	if (cur) {
		out.push(cur);
	}
	return out;
}

function packSegments(segments: Segment[], max: number): string[] {
	const out: string[] = [];
	let cur = '';
	for (const seg of segments) {
		if (!seg.text) {
			continue;
		}
		if (seg.text.length > max) {
			if (cur) {
				out.push(cur);
				cur = '';
			}
			out.push(...splitAtWhitespace(seg.text, max));
			continue;
		}
		if (!cur) {
			cur = seg.text;
		} else if (cur.length + seg.sep.length + seg.text.length <= max) {
			cur += seg.sep + seg.text;
		} else {
			out.push(cur);
			cur = seg.text;
		}
	}
	if (cur) {
		out.push(cur);
	}
	return out;
}

/** Group consecutive lines, closing a group after each line that matches `isBreak`. */
function groupLines(lines: string[], isBreak: (line: string) => boolean) {
	const groups: string[][] = [];
	let cur: string[] = [];
	for (const line of lines) {
		cur.push(line);
		if (isBreak(line)) {
			groups.push(cur);
			cur = [];
		}
	}
	if (cur.length) {
		groups.push(cur);
	}
	return groups;
}

/**
 * Blocks are separated by blank lines. A block that does not fit is broken
 * at statement-like line ends, then at single lines.
 */
function lineBlockSegments(
	text: string,
	max: number,
	isBreak: (line: string) => boolean
): Segment[] {
	const segments: Segment[] = [];
	const blocks = text
		.split(/\n\s*\n/)
		.map((b) => b.replace(/^\n+/, '').trimEnd())
		.filter((b) => b !== '');
	for (const block of blocks) {
		if (block.length <= max) {
			segments.push({ text: block, sep: '\n\n' });
			continue;
		}
		let first = true;
		for (const group of groupLines(block.split('\n'), isBreak)) {
			const joined = group.join('\n');
			const sep = first ? '\n\n' : '\n';
			first = false;
			if (joined.length <= max) {
				segments.push({ text: joined, sep });
				continue;
			}
			group.forEach((line, i) => {
				segments.push({ text: line, sep: i === 0 ? sep : '\n' });
			});
		}
	}
	return segments;
}

// ---------------------------------------------------------------------------
// Per-format handlers

function chunkCode(text: string, sourcePath: string, max: number): string[] {
	const withHeader = `# File: ${displayName(sourcePath)}\n${text}`;
	return packSegments(
		lineBlockSegments(withHeader, max, (l) => /[;{}]\s*$/.test(l)),
		max
	);
}

function chunkProse(text: string, max: number): string[] {
	const segments: Segment[] = [];
	for (const para of text.split(/\n\s*\n/)) {
		const flat = para.replace(/\s+/g, ' ').trim();
		if (!flat) {
			continue;
		}
		if (flat.length <= max) {
			segments.push({ text: flat, sep: '\n\n' });
			continue;
		}
		flat.split(/(?<=[.!?])\s+/).forEach((sentence, i) => {
			segments.push({ text: sentence, sep: i === 0 ? '\n\n' : ' ' });
		});
	}
	return packSegments(segments, max);
}

function chunkTabular(text: string, delimiter: string, max: number): string[] {
	// rows whose cells are all blank carry nothing to index
	const lines = text
		.split('\n')
		.filter((l) => l.split(delimiter).some((cell) => cell.trim() !== ''));
	const [header, ...rows] = lines;
	if (header === undefined) {
		return [];
	}
	if (rows.length === 0) {
		return packSegments([{ text: header, sep: '\n' }], max);
	}
	// every chunk repeats the header row
	const budget = Math.max(16, max - header.length - 1);
	const packed = packSegments(
		rows.map((r) => ({ text: r, sep: '\n' })),
		budget
	);
	return packed.map((body) => `${header}\n${body}`);
}

function chunkMarkup(text: string, json: boolean, max: number): string[] {
	let body = text;
	if (json) {
		body = JSON.stringify(JSON.parse(text), null, 2);
	}
	return packSegments(
		lineBlockSegments(body, max, (l) => /[>,\]}]\s*$/.test(l)),
		max
	);
}

/**
 * Turn raw bytes into ordered chunk texts. Binary content classifies as
 * `unknown` and yields no chunks.
 */
export function normalizeContent(
	sourcePath: string,
	bytes: Uint8Array,
	opts: NormalizeOptions = {}
): NormalizedContent {
	const max = Math.max(16, opts.maxChunkChars ?? DEFAULT_MAX_CHUNK_CHARS);
	const cls = classifyContent(sourcePath, bytes);
	switch (cls.kind) {
		case 'unknown':
			return { formatKind: 'unknown', chunks: [] };
		case 'code':
			return {
				formatKind: 'code',
				chunks: chunkCode(decodeText(bytes), sourcePath, max),
			};
		case 'prose':
			return { formatKind: 'prose', chunks: chunkProse(decodeText(bytes), max) };
		case 'tabular':
			return {
				formatKind: 'tabular',
				chunks: chunkTabular(decodeText(bytes), cls.delimiter, max),
			};
		case 'markup':
			return {
				formatKind: 'markup',
				chunks: chunkMarkup(decodeText(bytes), cls.json, max),
			};
		default: {
			const exhaustive: never = cls;
			return exhaustive;
		}
	}
}
