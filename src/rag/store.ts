import crypto from 'node:crypto';
import type {
	Chunk,
	ChunkSlot,
	Document,
	DocumentSummary,
	StoreSnapshot,
	UpsertOutcome,
} from '@rag/types';

/** Document metadata plus its [start, start + count) range in the arena. */
interface StoredDocument {
	id: string;
	sourcePath: string;
	contentHash: string;
	formatKind: Document['formatKind'];
	status: Document['status'];
	bytes: number;
	indexedAt: number;
	start: number;
	count: number;
}

export function documentIdFor(canonicalSource: string): string {
	const h = crypto.createHash('sha256');
	h.update(canonicalSource, 'utf8');
	return `doc_${h.digest('hex').slice(0, 16)}`;
}

export function contentHashOf(bytes: Uint8Array | string): string {
	const h = crypto.createHash('sha256');
	h.update(bytes);
	return h.digest('hex');
}

function toSlots(doc: Document): ChunkSlot[] {
	return doc.chunks.map((c, ordinal) => ({
		documentId: doc.id,
		sourcePath: doc.sourcePath,
		ordinal,
		indexedAt: doc.indexedAt,
		text: c.text,
		embedding: c.embedding,
	}));
}

/**
 * In-memory index. Documents keep insertion order; all chunks live in one
 * flat arena that is replaced, never mutated, on each change. A snapshot is
 * therefore just the current arena reference and stays valid while writers
 * move on.
 */
export class DocumentStore {
	private docs = new Map<string, StoredDocument>();
	private arena: readonly ChunkSlot[] = [];
	private generation = 0;

	getGeneration(): number {
		return this.generation;
	}

	has(id: string): boolean {
		return this.docs.has(id);
	}

	get(id: string): Document | undefined {
		const d = this.docs.get(id);
		return d ? this.materialize(d, this.arena) : undefined;
	}

	findBySource(sourcePath: string): Document | undefined {
		for (const d of this.docs.values()) {
			if (d.sourcePath === sourcePath) {
				return this.materialize(d, this.arena);
			}
		}
		return;
	}

	/**
	 * Insert or fully replace a document. A replacement keeps the original
	 * position in insertion order. Same content hash means no change at all.
	 */
	upsert(doc: Document): UpsertOutcome {
		const prev = this.docs.get(doc.id);
		if (prev && prev.contentHash === doc.contentHash) {
			return 'unchanged';
		}
		const next = new Map<string, StoredDocument>();
		const arena: ChunkSlot[] = [];
		for (const d of this.docs.values()) {
			if (d.id === doc.id) {
				next.set(doc.id, this.place(doc, arena));
			} else {
				next.set(d.id, this.carry(d, arena));
			}
		}
		if (!prev) {
			next.set(doc.id, this.place(doc, arena));
		}
		this.commit(next, arena);
		return prev ? 'updated' : 'created';
	}

	remove(id: string): boolean {
		if (!this.docs.has(id)) {
			return false;
		}
		const next = new Map<string, StoredDocument>();
		const arena: ChunkSlot[] = [];
		for (const d of this.docs.values()) {
			if (d.id !== id) {
				next.set(d.id, this.carry(d, arena));
			}
		}
		this.commit(next, arena);
		return true;
	}

	clear(): void {
		this.commit(new Map(), []);
	}

	/**
	 * Replace the whole content, e.g. from an imported artifact. The
	 * generation never moves backwards, so results cached before the import
	 * cannot match afterwards.
	 */
	replaceAll(documents: Document[], generation: number): void {
		const next = new Map<string, StoredDocument>();
		const arena: ChunkSlot[] = [];
		for (const doc of documents) {
			next.set(doc.id, this.place(doc, arena));
		}
		const previous = this.generation;
		this.docs = next;
		this.arena = Object.freeze(arena);
		this.generation = Math.max(previous + 1, generation);
	}

	/** Lazy, restartable; each iteration reads the state current at that time. */
	list(): Iterable<DocumentSummary> {
		return { [Symbol.iterator]: () => this.summaries() };
	}

	/** Full documents in insertion order. */
	documents(): Document[] {
		const arena = this.arena;
		return Array.from(this.docs.values(), (d) => this.materialize(d, arena));
	}

	snapshot(): StoreSnapshot {
		return { generation: this.generation, slots: this.arena };
	}

	stats(): { documents: number; chunks: number; generation: number } {
		return {
			documents: this.docs.size,
			chunks: this.arena.length,
			generation: this.generation,
		};
	}

	private *summaries(): Generator<DocumentSummary> {
		for (const d of this.docs.values()) {
			yield {
				id: d.id,
				sourcePath: d.sourcePath,
				formatKind: d.formatKind,
				status: d.status,
				chunkCount: d.count,
				indexedAt: d.indexedAt,
			};
		}
	}

	private place(doc: Document, arena: ChunkSlot[]): StoredDocument {
		const start = arena.length;
		for (const slot of toSlots(doc)) {
			arena.push(slot);
		}
		return {
			id: doc.id,
			sourcePath: doc.sourcePath,
			contentHash: doc.contentHash,
			formatKind: doc.formatKind,
			status: doc.status,
			bytes: doc.bytes,
			indexedAt: doc.indexedAt,
			start,
			count: doc.chunks.length,
		};
	}

	private carry(d: StoredDocument, arena: ChunkSlot[]): StoredDocument {
		const start = arena.length;
		for (let i = d.start; i < d.start + d.count; i++) {
			arena.push(this.arena[i]);
		}
		return { ...d, start };
	}

	private commit(next: Map<string, StoredDocument>, arena: ChunkSlot[]) {
		this.docs = next;
		this.arena = Object.freeze(arena);
		this.generation++;
	}

	private materialize(
		d: StoredDocument,
		arena: readonly ChunkSlot[]
	): Document {
		const chunks: Chunk[] = arena
			.slice(d.start, d.start + d.count)
			.map((s) => ({
				ownerDocumentId: d.id,
				ordinal: s.ordinal,
				text: s.text,
				embedding: s.embedding,
			}));
		return {
			id: d.id,
			sourcePath: d.sourcePath,
			contentHash: d.contentHash,
			formatKind: d.formatKind,
			status: d.status,
			bytes: d.bytes,
			indexedAt: d.indexedAt,
			chunks,
		};
	}
}
