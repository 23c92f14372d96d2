import { z } from 'zod';

export const LogLevelZ = z.enum(['debug', 'info', 'warn', 'error']);

export const IngestionConfigZ = z
	.object({
		ignore: z
			.object({
				useGitIgnore: z.boolean().default(true),
				patterns: z.array(z.string()).default([]),
			})
			.default({}),
		maxFileSize: z.number().int().positive().default(1_048_576),
		maxFiles: z.number().int().positive().optional(),
		concurrency: z.number().int().min(1).max(64).default(4),
	})
	.default({});

export const EmbeddingConfigZ = z
	.object({
		dim: z.number().int().min(16).max(4096).default(256),
	})
	.default({});

export const ChunkingConfigZ = z
	.object({
		maxChunkChars: z.number().int().min(64).max(64_000).default(1200),
	})
	.default({});

export const QueryConfigZ = z
	.object({
		topK: z.number().int().min(1).max(100).default(5),
		snippetChars: z.number().int().min(16).max(8000).default(200),
	})
	.default({});

export const CacheConfigZ = z
	.object({
		capacity: z.number().int().min(1).max(100_000).default(100),
		ttlMs: z.number().int().min(0).default(0),
	})
	.default({});

export const IndexConfigZ = z
	.object({
		path: z.string().min(1).optional(),
	})
	.default({});

export const DefaultsZ = z
	.object({
		logging: z.object({ level: LogLevelZ.optional() }).default({}),
		index: IndexConfigZ,
		embedding: EmbeddingConfigZ,
		chunking: ChunkingConfigZ,
		query: QueryConfigZ,
		cache: CacheConfigZ,
		ingestion: IngestionConfigZ,
	})
	.default({});

export const ConfigV1Z = z.object({
	version: z.literal('1').default('1'),
	defaults: DefaultsZ,
});

export type ConfigV1 = z.infer<typeof ConfigV1Z>;
export type EngineSettings = ConfigV1['defaults'];

export function explainZodError(e: unknown) {
	if (!(e instanceof z.ZodError)) {
		return [];
	}
	return e.issues.map((err) => ({
		path: err.path.join('.'),
		message: err.message,
		code: err.code,
	}));
}
