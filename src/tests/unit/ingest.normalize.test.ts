import {
	classifyContent,
	classifyFormat,
	decodeText,
	normalizeContent,
	splitAtWhitespace,
} from '@ingest/normalize';
import { describe, expect, it } from 'vitest';

const buf = (s: string) => Buffer.from(s, 'utf8');

describe('classifyContent', () => {
	it('uses the extension first', () => {
		expect(classifyContent('/p/a.ts', buf('x'))).toEqual({ kind: 'code' });
		expect(classifyContent('/p/README.md', buf('x'))).toEqual({ kind: 'prose' });
		expect(classifyContent('/p/t.tsv', buf('a\tb'))).toEqual({
			kind: 'tabular',
			delimiter: '\t',
		});
		expect(classifyContent('/p/c.json', buf('{"a":1}'))).toEqual({
			kind: 'markup',
			json: true,
		});
	});

	it('sniffs content without a known extension', () => {
		expect(classifyFormat('text:script', buf('#!/bin/sh\necho hi'))).toBe('code');
		expect(classifyFormat('text:doc', buf('<html><body/></html>'))).toBe('markup');
		expect(classifyContent('text:rows', buf('a;b\n1;2\n3;4'))).toEqual({
			kind: 'tabular',
			delimiter: ';',
		});
		expect(classifyFormat('text:note', buf('just words'))).toBe('prose');
	});

	it('marks binary content unknown', () => {
		expect(classifyContent('/p/blob.bin', Buffer.from([0, 1, 2]))).toEqual({
			kind: 'unknown',
			reason: 'binary',
		});
	});
});

describe('decodeText', () => {
	it('drops the BOM, unifies newlines and trims trailing blanks', () => {
		expect(decodeText(buf('\uFEFFa\r\nb  \r\n'))).toBe('a\nb\n');
	});
});

describe('normalizeContent', () => {
	it('packs prose paragraphs into one chunk when they fit', () => {
		const r = normalizeContent('text:notes', buf('First para.\n\nSecond para.'));
		expect(r).toEqual({
			formatKind: 'prose',
			chunks: ['First para.\n\nSecond para.'],
		});
	});

	it('splits oversize prose at sentences, then at whitespace', () => {
		const r = normalizeContent(
			'text:notes',
			buf('Alpha beta gamma. Delta epsilon.'),
			{ maxChunkChars: 16 }
		);
		expect(r.chunks).toEqual(['Alpha beta', 'gamma.', 'Delta epsilon.']);
	});

	it('prefixes code with a file header', () => {
		const r = normalizeContent('/src/app.ts', buf('const a = 1;\nconst b = 2;\n'));
		expect(r).toEqual({
			formatKind: 'code',
			chunks: ['# File: app.ts\nconst a = 1;\nconst b = 2;'],
		});
	});

	it('keeps code blocks whole when each fits', () => {
		const src = 'function f() {\n  return 1;\n}\n\nfunction g() {\n  return 2;\n}';
		const r = normalizeContent('/src/m.ts', buf(src), { maxChunkChars: 48 });
		expect(r.chunks).toEqual([
			'# File: m.ts\nfunction f() {\n  return 1;\n}',
			'function g() {\n  return 2;\n}',
		]);
	});

	it('repeats the header row in every tabular chunk and drops blank rows', () => {
		const csv = 'name,age\nann,31\nbob,42\n,\ncat,53\n';
		expect(normalizeContent('/d/people.csv', buf(csv)).chunks).toEqual([
			'name,age\nann,31\nbob,42\ncat,53',
		]);
		expect(
			normalizeContent('/d/people.csv', buf(csv), { maxChunkChars: 20 }).chunks
		).toEqual(['name,age\nann,31\nbob,42', 'name,age\ncat,53']);
	});

	it('pretty-prints JSON before chunking', () => {
		const r = normalizeContent('/d/data.json', buf('{"a":1,"b":[1,2]}'));
		expect(r).toEqual({
			formatKind: 'markup',
			chunks: ['{\n  "a": 1,\n  "b": [\n    1,\n    2\n  ]\n}'],
		});
	});

	it('yields no chunks for binary or blank content', () => {
		expect(normalizeContent('/d/blob.bin', Buffer.from([0, 159, 146]))).toEqual({
			formatKind: 'unknown',
			chunks: [],
		});
		expect(normalizeContent('text:empty', buf('  \n\n ')).chunks).toEqual([]);
	});
});

describe('splitAtWhitespace', () => {
	it('leaves an over-long token on its own', () => {
		expect(splitAtWhitespace('ab abcdefghij cd', 5)).toEqual([
			'ab',
			'abcdefghij',
			'cd',
		]);
	});
});
