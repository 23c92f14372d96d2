export type FormatKind = 'code' | 'prose' | 'tabular' | 'markup' | 'unknown';

export type DocumentStatus = 'indexed' | 'unindexable';

export interface Chunk {
	ownerDocumentId: string; // back-reference only
	ordinal: number; // 0-based position within the owning document
	text: string;
	embedding: Float32Array;
}

export interface Document {
	id: string;
	sourcePath: string; // canonical absolute path, or text:<name>
	contentHash: string; // sha256 of the raw content
	formatKind: FormatKind;
	status: DocumentStatus;
	bytes: number;
	indexedAt: number; // epoch ms of the last (re-)embedding
	chunks: Chunk[];
}

export interface DocumentSummary {
	id: string;
	sourcePath: string;
	formatKind: FormatKind;
	status: DocumentStatus;
	chunkCount: number;
	indexedAt: number;
}

/** One chunk as seen through a store snapshot. */
export interface ChunkSlot {
	documentId: string;
	sourcePath: string;
	ordinal: number;
	indexedAt: number;
	text: string;
	embedding: Float32Array;
}

export interface StoreSnapshot {
	generation: number;
	slots: readonly ChunkSlot[];
}

export type UpsertOutcome = 'created' | 'updated' | 'unchanged';

export interface SearchHit {
	documentId: string;
	sourcePath: string;
	chunkIndex: number;
	score: number;
	text: string;
}
