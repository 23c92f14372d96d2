import { cosine, type Embedder, tokenize } from '@rag/embedder';
import type { ResultCache } from '@rag/cache';
import type { DocumentStore } from '@rag/store';
import type { ChunkSlot, SearchHit } from '@rag/types';

const MAX_ANSWER_SENTENCES = 3;

export interface AskAnswer {
	answer: string;
	sources: string[]; // distinct source paths of all hits, best first
	hits: SearchHit[];
}

export interface SummaryResult {
	snippets: Array<{ sourcePath: string; snippet: string }>;
	hits: SearchHit[];
}

interface Scored {
	slot: ChunkSlot;
	position: number; // arena position = insertion order, then chunk order
	score: number;
}

function compareScored(a: Scored, b: Scored): number {
	return (
		b.score - a.score ||
		a.slot.indexedAt - b.slot.indexedAt ||
		a.position - b.position
	);
}

export function snippetOf(text: string, maxChars: number): string {
	const flat = text.replace(/\s+/g, ' ').trim();
	if (flat.length <= maxChars) {
		return flat;
	}
	const cut = flat.slice(0, maxChars);
	const lastSpace = cut.lastIndexOf(' ');
	return `${lastSpace > maxChars / 2 ? cut.slice(0, lastSpace) : cut}…`;
}

export function splitSentences(text: string): string[] {
	return text
		.split(/(?<=[.!?])\s+|\n+/)
		.map((s) => s.trim())
		.filter(Boolean);
}

/**
 * Up to three sentences with the most query-term overlap, kept in their
 * original order. Falls back to the leading sentence.
 */
export function extractAnswer(query: string, text: string): string {
	const sentences = splitSentences(text);
	if (sentences.length === 0) {
		return '';
	}
	const terms = new Set(tokenize(query).map((t) => t.term));
	const scored = sentences.map((sentence, index) => {
		const seen = new Set(tokenize(sentence).map((t) => t.term));
		let overlap = 0;
		for (const t of terms) {
			if (seen.has(t)) {
				overlap++;
			}
		}
		return { sentence, index, overlap };
	});
	const picked = scored
		.filter((s) => s.overlap > 0)
		.sort((a, b) => b.overlap - a.overlap || a.index - b.index)
		.slice(0, MAX_ANSWER_SENTENCES)
		.sort((a, b) => a.index - b.index);
	if (picked.length === 0) {
		return sentences[0];
	}
	return picked.map((s) => s.sentence).join(' ');
}

/**
 * Linear similarity scan over a store snapshot. Scores are cosine; ties go
 * to the earlier-indexed document, then to insertion and chunk order.
 */
export class QueryEngine {
	constructor(
		private readonly store: DocumentStore,
		private readonly embedder: Embedder,
		private readonly cache?: ResultCache
	) {}

	query(text: string, k: number): SearchHit[] {
		const topK = Math.max(1, Math.floor(k));
		const snapshot = this.store.snapshot();
		if (!this.cache) {
			return this.rank(text, topK, snapshot.slots);
		}
		return this.cache.getOrCompute(text, topK, snapshot.generation, () =>
			this.rank(text, topK, snapshot.slots)
		);
	}

	ask(text: string, k: number): AskAnswer {
		const hits = this.query(text, k);
		const sources: string[] = [];
		for (const h of hits) {
			if (!sources.includes(h.sourcePath)) {
				sources.push(h.sourcePath);
			}
		}
		const answer = hits.length ? extractAnswer(text, hits[0].text) : '';
		return { answer, sources, hits };
	}

	summary(topic: string, k: number, snippetChars: number): SummaryResult {
		const hits = this.query(topic, k);
		return {
			snippets: hits.map((h) => ({
				sourcePath: h.sourcePath,
				snippet: snippetOf(h.text, snippetChars),
			})),
			hits,
		};
	}

	private rank(
		text: string,
		topK: number,
		slots: readonly ChunkSlot[]
	): SearchHit[] {
		if (tokenize(text).length === 0 || slots.length === 0) {
			return [];
		}
		const q = this.embedder.embed(text);
		const scored: Scored[] = [];
		slots.forEach((slot, position) => {
			const score = cosine(q, slot.embedding);
			if (score > 0) {
				scored.push({ slot, position, score });
			}
		});
		scored.sort(compareScored);
		return scored.slice(0, topK).map((s) => ({
			documentId: s.slot.documentId,
			sourcePath: s.slot.sourcePath,
			chunkIndex: s.slot.ordinal,
			score: s.score,
			text: s.slot.text,
		}));
	}
}
