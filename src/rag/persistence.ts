import crypto from 'node:crypto';
import { existsSync } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { IndexCorruptedError, PersistenceFailedError } from '@core/errors';
import type { Document } from '@rag/types';
import { z } from 'zod';

export const ARTIFACT_FORMAT = 'docsift-index';
export const ARTIFACT_VERSION = 1;

const FormatKindZ = z.enum(['code', 'prose', 'tabular', 'markup', 'unknown']);

const ArtifactChunkZ = z.object({
	text: z.string(),
	embedding: z.string(), // base64, little-endian float32
});

const ArtifactDocumentZ = z.object({
	id: z.string().min(1),
	sourcePath: z.string().min(1),
	contentHash: z.string().min(1),
	formatKind: FormatKindZ,
	status: z.enum(['indexed', 'unindexable']),
	bytes: z.number().int().nonnegative(),
	indexedAt: z.number().nonnegative(),
	chunks: z.array(ArtifactChunkZ),
});

const ArtifactV1Z = z.object({
	format: z.literal(ARTIFACT_FORMAT),
	version: z.literal(ARTIFACT_VERSION),
	dim: z.number().int().positive(),
	generation: z.number().int().nonnegative(),
	checksum: z.string(),
	documents: z.array(ArtifactDocumentZ),
});

// Values are passed through untouched so the checksum sees the file's own layout.
const EnvelopeZ = z.object({
	checksum: z.string(),
	dim: z.unknown(),
	generation: z.unknown(),
	documents: z.unknown(),
});

type ArtifactDocument = z.infer<typeof ArtifactDocumentZ>;

export interface LoadedArtifact {
	documents: Document[];
	generation: number;
	dim: number;
}

export function encodeEmbedding(v: Float32Array): string {
	return Buffer.from(v.buffer, v.byteOffset, v.byteLength).toString('base64');
}

export function decodeEmbedding(b64: string, dim: number): Float32Array | null {
	const buf = Buffer.from(b64, 'base64');
	if (buf.byteLength !== dim * 4) {
		return null;
	}
	// copy: the decoded Buffer may not be 4-byte aligned
	const aligned = buf.buffer.slice(buf.byteOffset, buf.byteOffset + buf.byteLength);
	return new Float32Array(aligned);
}

function checksumOf(dim: unknown, generation: unknown, documents: unknown): string {
	const h = crypto.createHash('sha256');
	h.update(JSON.stringify({ dim, generation, documents }), 'utf8');
	return h.digest('hex');
}

function toArtifactDocument(doc: Document): ArtifactDocument {
	return {
		id: doc.id,
		sourcePath: doc.sourcePath,
		contentHash: doc.contentHash,
		formatKind: doc.formatKind,
		status: doc.status,
		bytes: doc.bytes,
		indexedAt: doc.indexedAt,
		chunks: doc.chunks.map((c) => ({
			text: c.text,
			embedding: encodeEmbedding(c.embedding),
		})),
	};
}

/** Serialize documents (in order) with the generation counter and a checksum. */
export function encodeArtifact(
	documents: Document[],
	generation: number,
	dim: number
): string {
	const docs = documents.map(toArtifactDocument);
	const artifact = {
		format: ARTIFACT_FORMAT,
		version: ARTIFACT_VERSION,
		dim,
		generation,
		checksum: checksumOf(dim, generation, docs),
		documents: docs,
	};
	return JSON.stringify(artifact);
}

/**
 * Parse and verify an artifact. The checksum is computed over the document
 * list exactly as it appears in the file, before schema validation.
 */
export function decodeArtifact(
	raw: string,
	expectedDim: number,
	label: string
): LoadedArtifact {
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (e) {
		throw new IndexCorruptedError(
			label,
			`unparseable JSON (${e instanceof Error ? e.message : String(e)})`
		);
	}
	const envelope = EnvelopeZ.safeParse(parsed);
	if (!envelope.success) {
		throw new IndexCorruptedError(label, 'not an index artifact');
	}
	const { checksum, dim, generation, documents: rawDocuments } = envelope.data;
	if (checksumOf(dim, generation, rawDocuments) !== checksum) {
		throw new IndexCorruptedError(label, 'checksum mismatch');
	}

	const checked = ArtifactV1Z.safeParse(parsed);
	if (!checked.success) {
		const first = checked.error.issues[0];
		throw new IndexCorruptedError(
			label,
			`invalid layout at ${first?.path.join('.') || '(root)'}: ${first?.message ?? 'unknown'}`
		);
	}
	const artifact = checked.data;
	if (artifact.dim !== expectedDim) {
		throw new IndexCorruptedError(
			label,
			`embedding dimension ${artifact.dim} does not match configured ${expectedDim}`
		);
	}

	const seen = new Set<string>();
	for (const d of artifact.documents) {
		if (seen.has(d.id)) {
			throw new IndexCorruptedError(label, `duplicate document id ${d.id}`);
		}
		seen.add(d.id);
	}

	const documents: Document[] = artifact.documents.map((d) => ({
		id: d.id,
		sourcePath: d.sourcePath,
		contentHash: d.contentHash,
		formatKind: d.formatKind,
		status: d.status,
		bytes: d.bytes,
		indexedAt: d.indexedAt,
		chunks: d.chunks.map((c, ordinal) => {
			const embedding = decodeEmbedding(c.embedding, artifact.dim);
			if (!embedding) {
				throw new IndexCorruptedError(
					label,
					`bad embedding for ${d.id} chunk ${ordinal}`
				);
			}
			return { ownerDocumentId: d.id, ordinal, text: c.text, embedding };
		}),
	}));

	return { documents, generation: artifact.generation, dim: artifact.dim };
}

/** Written to a temp file next to the target, then renamed into place. */
export async function writeArtifact(file: string, content: string): Promise<void> {
	const tmp = `${file}.${process.pid}.tmp`;
	try {
		await fs.mkdir(path.dirname(file), { recursive: true });
		await fs.writeFile(tmp, content, 'utf8');
		await fs.rename(tmp, file);
	} catch (e) {
		if (existsSync(tmp)) {
			await fs.rm(tmp, { force: true });
		}
		throw new PersistenceFailedError(file, e);
	}
}

/** Read an artifact; `null` when the file does not exist. */
export async function readArtifact(
	file: string,
	expectedDim: number
): Promise<LoadedArtifact | null> {
	let raw: string;
	try {
		raw = await fs.readFile(file, 'utf8');
	} catch (e) {
		if (
			e instanceof Error &&
			'code' in e &&
			e.code === 'ENOENT'
		) {
			return null;
		}
		throw new IndexCorruptedError(
			file,
			`unreadable (${e instanceof Error ? e.message : String(e)})`
		);
	}
	return decodeArtifact(raw, expectedDim, file);
}
