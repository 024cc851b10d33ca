/**
 * Query Vector Cache
 *
 * LRU cache for query embeddings. Sub-questions produced by decomposition
 * repeat often across requests, and a cache hit skips a model forward pass.
 *
 * @example
 * ```typescript
 * const cache = new VectorCache({ maxSize: 500, ttlMs: 3600000 });
 * cache.set('What records must be retained?', vector);
 * cache.get('What records must be retained?'); // vector
 * cache.getStats().hitRate; // 1
 * ```
 */

import { z } from 'zod';

// =============================================================================
// Configuration
// =============================================================================

export const VectorCacheConfigSchema = z.object({
  /**
   * Maximum entries; the least recently used one is evicted past this
   * @default 1000
   */
  maxSize: z.number().int().positive().default(1000),

  /**
   * Entry lifetime in milliseconds; 0 disables expiry
   * @default 0
   */
  ttlMs: z.number().int().nonnegative().default(0),
});

export type VectorCacheConfig = z.infer<typeof VectorCacheConfigSchema>;

export interface CacheStats {
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  /** hits / (hits + misses); 0 before any lookup */
  hitRate: number;
  /** Entries dropped because the cache was full */
  evictions: number;
  /** Entries dropped because their TTL passed */
  expirations: number;
}

interface CacheEntry {
  vector: number[];
  expiresAt: number | null;
}

// =============================================================================
// VectorCache
// =============================================================================

/**
 * Map-backed LRU: insertion order is recency order, so the first key is the
 * eviction candidate and a hit re-inserts its entry at the end.
 */
export class VectorCache {
  private readonly config: VectorCacheConfig;
  private readonly entries = new Map<string, CacheEntry>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;

  constructor(config?: Partial<VectorCacheConfig>) {
    this.config = VectorCacheConfigSchema.parse(config ?? {});
  }

  get(key: string): number[] | undefined {
    const entry = this.entries.get(key);

    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.isExpired(entry)) {
      this.entries.delete(key);
      this.expirations++;
      this.misses++;
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;

    return entry.vector;
  }

  set(key: string, vector: number[]): void {
    this.entries.delete(key);

    while (this.entries.size >= this.config.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
      this.evictions++;
    }

    this.entries.set(key, {
      vector,
      expiresAt: this.config.ttlMs > 0 ? Date.now() + this.config.ttlMs : null,
    });
  }

  has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && !this.isExpired(entry);
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /**
   * Drop expired entries. Returns how many were removed.
   */
  prune(): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        removed++;
      }
    }
    this.expirations += removed;
    return removed;
  }

  /**
   * Remove every entry and reset the statistics
   */
  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
    this.expirations = 0;
  }

  get size(): number {
    return this.entries.size;
  }

  getStats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      size: this.entries.size,
      maxSize: this.config.maxSize,
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups > 0 ? this.hits / lookups : 0,
      evictions: this.evictions,
      expirations: this.expirations,
    };
  }

  private isExpired(entry: CacheEntry): boolean {
    return entry.expiresAt !== null && Date.now() > entry.expiresAt;
  }
}

export function createVectorCache(config?: Partial<VectorCacheConfig>): VectorCache {
  return new VectorCache(config);
}
