import table from './weights.json';

export const DEFAULT_DIM = 256;

export interface Embedder {
	readonly dim: number;
	embed(text: string): Float32Array;
}

export interface WeightedTerm {
	term: string;
	weight: number;
}

type TermClass = 'keyword' | 'identifier' | 'stopword';

// Precedence: stop words over keywords over identifiers, so English
// connectives such as "for" or "with" never get boosted in prose.
const TERM_CLASS = new Map<string, TermClass>();
for (const t of table.identifiers) {
	TERM_CLASS.set(t, 'identifier');
}
for (const t of table.keywords) {
	TERM_CLASS.set(t, 'keyword');
}
for (const t of table.stopwords) {
	TERM_CLASS.set(t, 'stopword');
}

const RAW_TOKEN = /[A-Za-z0-9_]+/g;
const SUB_WORD = /[A-Z]+(?![a-z])|[A-Z]?[a-z]+|[0-9]+/g;

export function termWeight(term: string): number {
	const cls = TERM_CLASS.get(term);
	return cls ? table.weights[cls] : table.weights.default;
}

function splitIdentifier(raw: string): string[] {
	const parts: string[] = [];
	for (const piece of raw.split('_')) {
		for (const m of piece.matchAll(SUB_WORD)) {
			parts.push(m[0].toLowerCase());
		}
	}
	return parts;
}

/**
 * Lowercased terms with their weights, in text order. camelCase and
 * snake_case identifiers also contribute their sub-words at a reduced
 * weight. Single-character terms are dropped.
 */
export function tokenize(text: string): WeightedTerm[] {
	const out: WeightedTerm[] = [];
	for (const m of text.matchAll(RAW_TOKEN)) {
		const raw = m[0];
		const term = raw.toLowerCase();
		if (term.length < 2) {
			continue;
		}
		out.push({ term, weight: termWeight(term) });

		const parts = splitIdentifier(raw);
		if (parts.length > 1) {
			for (const part of parts) {
				if (part.length < 2) {
					continue;
				}
				out.push({
					term: part,
					weight: table.weights.subword * termWeight(part),
				});
			}
		}
	}
	return out;
}

// 32-bit FNV-1a over UTF-16 code units.
export function fnv1a(s: string): number {
	let h = 0x811c9dc5;
	for (let i = 0; i < s.length; i++) {
		h ^= s.charCodeAt(i);
		h = Math.imul(h, 0x01000193);
	}
	return h >>> 0;
}

export function l2Normalize(v: Float64Array): Float32Array {
	let sum = 0;
	for (let i = 0; i < v.length; i++) {
		sum += v[i] * v[i];
	}
	const out = new Float32Array(v.length);
	if (sum === 0) {
		return out;
	}
	const norm = Math.sqrt(sum);
	for (let i = 0; i < v.length; i++) {
		out[i] = v[i] / norm;
	}
	return out;
}

/**
 * Cosine similarity. Embeddings are unit length, so this is the dot product
 * up to float32 rounding; zero vectors score 0.
 */
export function cosine(a: Float32Array, b: Float32Array): number {
	let dot = 0;
	let na = 0;
	let nb = 0;
	const n = Math.min(a.length, b.length);
	for (let i = 0; i < n; i++) {
		const x = a[i];
		const y = b[i];
		dot += x * y;
		na += x * x;
		nb += y * y;
	}
	const den = Math.sqrt(na) * Math.sqrt(nb);
	return den > 0 ? dot / den : 0;
}

/** Feature-hashing embedder: weighted terms hashed into `dim` buckets. */
export class FeatureHashEmbedder implements Embedder {
	readonly dim: number;

	constructor(dim = DEFAULT_DIM) {
		if (!Number.isInteger(dim) || dim < 1) {
			throw new RangeError(`Embedding dimension must be a positive integer, got ${dim}`);
		}
		this.dim = dim;
	}

	embed(text: string): Float32Array {
		const acc = new Float64Array(this.dim);
		for (const { term, weight } of tokenize(text)) {
			acc[fnv1a(term) % this.dim] += weight;
		}
		return l2Normalize(acc);
	}
}
