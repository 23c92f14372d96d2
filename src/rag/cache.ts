import type { SearchHit } from '@rag/types';
import { LRUCache } from 'lru-cache';

export const DEFAULT_CACHE_CAPACITY = 100;

export interface ResultCacheOptions {
	capacity?: number;
	ttlMs?: number; // 0 = entries only expire by eviction or generation
}

export interface CacheEntry {
	queryKey: string;
	results: SearchHit[];
	generation: number; // store generation the results were computed against
	createdAt: number;
}

export interface CacheStats {
	size: number;
	capacity: number;
	hits: number;
	misses: number;
	hitRate: number;
}

/** Case-folded, whitespace-collapsed query text. */
export function normalizeQueryKey(query: string): string {
	return query.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Memoized ranked results keyed by normalized query and k. An entry is only
 * served while the store generation it was built against is current.
 */
export class ResultCache {
	private readonly lru: LRUCache<string, CacheEntry>;
	private readonly capacity: number;
	private hits = 0;
	private misses = 0;

	constructor(opts: ResultCacheOptions = {}) {
		this.capacity = Math.max(1, opts.capacity ?? DEFAULT_CACHE_CAPACITY);
		const ttl = opts.ttlMs ?? 0;
		this.lru = new LRUCache<string, CacheEntry>({
			max: this.capacity,
			...(ttl > 0 ? { ttl } : {}),
		});
	}

	getOrCompute(
		queryText: string,
		k: number,
		generation: number,
		compute: () => SearchHit[]
	): SearchHit[] {
		const queryKey = normalizeQueryKey(queryText);
		const key = `${k}\u0000${queryKey}`;
		const entry = this.lru.get(key);
		if (entry && entry.generation === generation) {
			this.hits++;
			return entry.results.slice();
		}
		this.misses++;
		const results = compute();
		this.lru.set(key, {
			queryKey,
			results: results.slice(),
			generation,
			createdAt: Date.now(),
		});
		return results;
	}

	has(queryText: string, k: number): boolean {
		return this.lru.has(`${k}\u0000${normalizeQueryKey(queryText)}`);
	}

	clear(): void {
		this.lru.clear();
		this.hits = 0;
		this.misses = 0;
	}

	stats(): CacheStats {
		const lookups = this.hits + this.misses;
		return {
			size: this.lru.size,
			capacity: this.capacity,
			hits: this.hits,
			misses: this.misses,
			hitRate: lookups === 0 ? 0 : this.hits / lookups,
		};
	}
}
