import path from 'node:path';
import {
	EngineError,
	IndexCorruptedError,
	UnsupportedFormatError,
} from '@core/errors';
import { normalizeContent } from '@ingest/normalize';
import { discoverSources, readSource, type SourceFile } from '@ingest/sources';
import { childLogger } from '@obs/logger';
import { type CacheStats, ResultCache } from '@rag/cache';
import { type Embedder, FeatureHashEmbedder } from '@rag/embedder';
import {
	decodeArtifact,
	encodeArtifact,
	readArtifact,
	writeArtifact,
} from '@rag/persistence';
import {
	type AskAnswer,
	QueryEngine,
	type SummaryResult,
} from '@rag/query';
import { contentHashOf, DocumentStore, documentIdFor } from '@rag/store';
import type {
	Document,
	DocumentSummary,
	SearchHit,
	UpsertOutcome,
} from '@rag/types';
import type { EngineSettings } from '@store/schema';
import { canonicalSourcePath, defaultIndexPath } from '@util/paths';
import pLimit, { type LimitFunction } from 'p-limit';

export interface EngineOptions {
	settings: EngineSettings;
	/** Artifact location; `null` keeps the index in memory only. */
	indexPath?: string | null;
	cwd?: string;
	embedder?: Embedder;
	now?: () => number;
}

export interface IngestFailure {
	sourcePath: string;
	code: string;
	message: string;
}

export interface AddReport {
	created: string[];
	updated: string[];
	unchanged: string[];
	unindexable: string[];
	failed: IngestFailure[];
}

export interface AddTextResult {
	id: string;
	sourcePath: string;
	outcome: UpsertOutcome;
	chunks: number;
}

export interface EngineStatus {
	documents: number;
	chunks: number;
	generation: number;
	cache: CacheStats;
	indexPath: string | null;
	loadError?: string;
}

type Prepared =
	| { kind: 'ready'; doc: Document }
	| { kind: 'unchanged'; sourcePath: string }
	| { kind: 'failed'; failure: IngestFailure };

function failureOf(sourcePath: string, e: unknown): IngestFailure {
	if (e instanceof EngineError) {
		return { sourcePath, code: e.code, message: e.message };
	}
	return {
		sourcePath,
		code: 'EINTERNAL',
		message: e instanceof Error ? e.message : String(e),
	};
}

/**
 * Engine context: owns the store, cache and embedder and is passed
 * explicitly to the command router. Mutations run one at a time; queries
 * scan a snapshot and never wait for them.
 */
export class Engine {
	readonly store = new DocumentStore();
	readonly cache: ResultCache;
	readonly embedder: Embedder;
	readonly queries: QueryEngine;
	readonly settings: EngineSettings;
	readonly indexPath: string | null;

	private readonly cwd: string;
	private readonly now: () => number;
	private readonly exclusive: LimitFunction = pLimit(1);
	private readonly log = childLogger({ component: 'engine' });
	private loadError?: EngineError;

	constructor(opts: EngineOptions) {
		this.settings = opts.settings;
		this.cwd = opts.cwd ?? process.cwd();
		this.now = opts.now ?? Date.now;
		this.embedder =
			opts.embedder ?? new FeatureHashEmbedder(opts.settings.embedding.dim);
		this.cache = new ResultCache({
			capacity: opts.settings.cache.capacity,
			ttlMs: opts.settings.cache.ttlMs,
		});
		this.queries = new QueryEngine(this.store, this.embedder, this.cache);
		this.indexPath =
			opts.indexPath === undefined
				? path.resolve(
						this.cwd,
						opts.settings.index.path ?? defaultIndexPath(this.cwd)
					)
				: opts.indexPath;
	}

	/** Construct and load the persisted index, if any. */
	static async open(opts: EngineOptions): Promise<Engine> {
		const engine = new Engine(opts);
		await engine.load();
		return engine;
	}

	async load(): Promise<void> {
		if (!this.indexPath) {
			return;
		}
		try {
			const loaded = await readArtifact(this.indexPath, this.embedder.dim);
			if (loaded) {
				this.store.replaceAll(loaded.documents, loaded.generation);
				this.log.info({
					msg: 'index.loaded',
					path: this.indexPath,
					documents: loaded.documents.length,
					generation: this.store.getGeneration(),
				});
			}
		} catch (e) {
			if (!(e instanceof IndexCorruptedError)) {
				throw e;
			}
			// the store stays empty until a clear, import or successful reload
			this.store.clear();
			this.loadError = e;
			this.log.error({ msg: 'index.corrupted', path: this.indexPath, reason: e.reason });
		}
	}

	getLoadError(): EngineError | undefined {
		return this.loadError;
	}

	// -------------------------------------------------------------- ingestion

	async add(target: string): Promise<AddReport> {
		const ingestion = this.settings.ingestion;
		const discovery = discoverSources(
			target,
			{
				useGitIgnore: ingestion.ignore.useGitIgnore,
				patterns: ingestion.ignore.patterns,
				maxFileSize: ingestion.maxFileSize,
				maxFiles: ingestion.maxFiles,
			},
			this.cwd
		);
		const report: AddReport = {
			created: [],
			updated: [],
			unchanged: [],
			unindexable: [],
			failed: discovery.skipped.map((s) => ({
				sourcePath: canonicalSourcePath(s.absPath),
				code: s.reason === 'oversize' || s.reason === 'maxFiles' ? 'Skipped' : 'UnreadableSource',
				message: s.message,
			})),
		};

		// Reading, normalizing and embedding run concurrently; commits happen
		// afterwards in discovery order.
		const limit = pLimit(ingestion.concurrency);
		const prepared = await Promise.all(
			discovery.files.map((f) => limit(() => this.prepareFile(f)))
		);

		await this.exclusive(async () => {
			const before = this.store.getGeneration();
			for (const p of prepared) {
				if (p.kind === 'failed') {
					report.failed.push(p.failure);
					continue;
				}
				if (p.kind === 'unchanged') {
					report.unchanged.push(p.sourcePath);
					continue;
				}
				const outcome = this.store.upsert(p.doc);
				this.record(report, p.doc, outcome);
			}
			if (this.store.getGeneration() !== before) {
				await this.persist();
			}
		});

		this.log.info({
			msg: 'add.done',
			target,
			created: report.created.length,
			updated: report.updated.length,
			unchanged: report.unchanged.length,
			unindexable: report.unindexable.length,
			failed: report.failed.length,
		});
		return report;
	}

	async addText(name: string, content: string): Promise<AddTextResult> {
		const sourcePath = `text:${name}`;
		const doc = this.buildDocument(sourcePath, Buffer.from(content, 'utf8'));
		return await this.exclusive(async () => {
			const outcome = this.store.upsert(doc);
			if (outcome !== 'unchanged') {
				await this.persist();
			}
			return {
				id: doc.id,
				sourcePath,
				outcome,
				chunks: doc.chunks.length,
			};
		});
	}

	/** Remove by document id, source path or text name. */
	async remove(idOrSource: string): Promise<DocumentSummary | undefined> {
		return await this.exclusive(async () => {
			const doc =
				this.store.get(idOrSource) ??
				this.store.findBySource(idOrSource) ??
				this.store.findBySource(`text:${idOrSource}`) ??
				this.store.findBySource(canonicalSourcePath(idOrSource, this.cwd));
			if (!doc) {
				return;
			}
			this.store.remove(doc.id);
			await this.persist();
			return {
				id: doc.id,
				sourcePath: doc.sourcePath,
				formatKind: doc.formatKind,
				status: doc.status,
				chunkCount: doc.chunks.length,
				indexedAt: doc.indexedAt,
			};
		});
	}

	async clear(): Promise<void> {
		await this.exclusive(async () => {
			this.store.clear();
			this.cache.clear();
			this.loadError = undefined;
			await this.persist();
		});
	}

	// ----------------------------------------------------------------- queries

	search(query: string, k = this.settings.query.topK): SearchHit[] {
		return this.queries.query(query, k);
	}

	ask(query: string, k = this.settings.query.topK): AskAnswer {
		return this.queries.ask(query, k);
	}

	summary(topic: string, k = this.settings.query.topK): SummaryResult {
		return this.queries.summary(topic, k, this.settings.query.snippetChars);
	}

	list(): Iterable<DocumentSummary> {
		return this.store.list();
	}

	status(): EngineStatus {
		const s = this.store.stats();
		return {
			documents: s.documents,
			chunks: s.chunks,
			generation: s.generation,
			cache: this.cache.stats(),
			indexPath: this.indexPath,
			...(this.loadError ? { loadError: this.loadError.message } : {}),
		};
	}

	// ------------------------------------------------------------ portability

	async exportTo(dest: string): Promise<{ path: string; documents: number }> {
		const file = path.resolve(this.cwd, dest);
		// documents and generation are read in the same tick: a consistent view
		const documents = this.store.documents();
		const content = encodeArtifact(
			documents,
			this.store.getGeneration(),
			this.embedder.dim
		);
		await writeArtifact(file, content);
		this.log.info({ msg: 'index.exported', path: file, documents: documents.length });
		return { path: file, documents: documents.length };
	}

	async importFrom(src: string): Promise<{ documents: number; generation: number }> {
		const file = path.resolve(this.cwd, src);
		const raw = await readSource(file);
		const loaded = decodeArtifact(raw.toString('utf8'), this.embedder.dim, file);
		return await this.exclusive(async () => {
			this.store.replaceAll(loaded.documents, loaded.generation);
			this.loadError = undefined;
			await this.persist();
			this.log.info({ msg: 'index.imported', path: file, documents: loaded.documents.length });
			return {
				documents: loaded.documents.length,
				generation: this.store.getGeneration(),
			};
		});
	}

	// ---------------------------------------------------------------- helpers

	private async prepareFile(file: SourceFile): Promise<Prepared> {
		try {
			const bytes = await readSource(file.absPath);
			const existing = this.store.get(documentIdFor(file.canonicalPath));
			if (existing && existing.contentHash === contentHashOf(bytes)) {
				return { kind: 'unchanged', sourcePath: file.canonicalPath };
			}
			return { kind: 'ready', doc: this.buildDocument(file.canonicalPath, bytes) };
		} catch (e) {
			this.log.warn({ msg: 'add.failed', path: file.absPath, error: e });
			return { kind: 'failed', failure: failureOf(file.canonicalPath, e) };
		}
	}

	private buildDocument(sourcePath: string, bytes: Buffer): Document {
		const id = documentIdFor(sourcePath);
		const normalized = normalizeContent(sourcePath, bytes, {
			maxChunkChars: this.settings.chunking.maxChunkChars,
		});
		return {
			id,
			sourcePath,
			contentHash: contentHashOf(bytes),
			formatKind: normalized.formatKind,
			status: normalized.chunks.length ? 'indexed' : 'unindexable',
			bytes: bytes.byteLength,
			indexedAt: this.now(),
			chunks: normalized.chunks.map((text, ordinal) => ({
				ownerDocumentId: id,
				ordinal,
				text,
				embedding: this.embedder.embed(text),
			})),
		};
	}

	private record(report: AddReport, doc: Document, outcome: UpsertOutcome) {
		if (outcome === 'unchanged') {
			report.unchanged.push(doc.sourcePath);
			return;
		}
		if (doc.status === 'unindexable') {
			report.unindexable.push(doc.sourcePath);
			const err = new UnsupportedFormatError(doc.sourcePath);
			this.log.warn({ msg: 'add.unindexable', path: doc.sourcePath, code: err.code });
			return;
		}
		(outcome === 'created' ? report.created : report.updated).push(
			doc.sourcePath
		);
	}

	private async persist(): Promise<void> {
		if (!this.indexPath) {
			return;
		}
		const content = encodeArtifact(
			this.store.documents(),
			this.store.getGeneration(),
			this.embedder.dim
		);
		await writeArtifact(this.indexPath, content);
		this.log.debug({ msg: 'index.saved', path: this.indexPath });
	}
}
