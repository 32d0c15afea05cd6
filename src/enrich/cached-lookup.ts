/**
 * Cache-first lookup of optional enrichment documents.
 *
 * A miss calls upstream once; the answer is cached as a value, or as a
 * tombstone when upstream has nothing or the lookup failed. Tombstoned
 * keys are never looked up again.
 */

import type { Logger } from "../logging/index.js";
import type { CacheStore } from "../storage/cache-store.js";

export interface CachedLookupOptions<T> {
  cache: CacheStore<T>;
  fetch: (key: string) => Promise<T | null>;
  logger: Logger;
}

export interface LookupOutcome<T> {
  readonly value: T | null;
  readonly cacheHit: boolean;
}

export class CachedLookup<T> {
  private readonly cache: CacheStore<T>;
  private readonly fetch: (key: string) => Promise<T | null>;
  private readonly logger: Logger;

  constructor(options: CachedLookupOptions<T>) {
    this.cache = options.cache;
    this.fetch = options.fetch;
    this.logger = options.logger;
  }

  async get(key: string): Promise<LookupOutcome<T>> {
    const cached = this.cache.lookup(key);
    if (cached.kind === "hit") {
      return { value: cached.value, cacheHit: true };
    }
    if (cached.kind === "tombstone") {
      return { value: null, cacheHit: true };
    }

    let value: T | null;
    try {
      value = await this.fetch(key);
    } catch (err) {
      this.logger.warn("Enrichment lookup failed; caching as not found", {
        namespace: this.cache.namespace,
        key,
        error: err,
      });
      value = null;
    }

    if (value === null) {
      this.cache.markNotFound(key);
    } else {
      this.cache.set(key, value);
    }
    return { value, cacheHit: false };
  }
}
