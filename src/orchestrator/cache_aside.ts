/**
 * @fileoverview Cache-aside read path
 *
 * Check the cache, compute on a miss, write the result back. A hit never
 * computes and never writes. Cache read and write failures are logged; a
 * failed read counts as a miss and a failed write never fails the lookup.
 *
 * @packageDocumentation
 */

import type { CacheStore, SearchFilters } from '../collaborators/types.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { hashCanonical } from '../utils/canonical.js';
import { getErrorMessage } from '../utils/errors.js';

export interface CacheAsideResult<T> {
  value: T;
  /** True when served from cache and `compute` was not called */
  hit: boolean;
}

export interface CacheAsideOptions {
  /** When false every lookup computes and nothing is written */
  enabled: boolean;
}

/**
 * Build the cache key for a knowledge query. Filters are hashed from their
 * canonical (key-sorted) form so equal filter sets collide.
 *
 * @example
 * ```typescript
 * buildQueryCacheKey('auth', { b: 2, a: 1 }, 10) === buildQueryCacheKey('auth', { a: 1, b: 2 }, 10);
 * ```
 */
export function buildQueryCacheKey(query: string, filters?: SearchFilters, limit?: number): string {
  return `query:${query}:${hashCanonical(filters ?? {})}:${limit ?? 'all'}`;
}

export function buildKnowledgeCacheKey(nodeId: string): string {
  return `knowledge:${nodeId}`;
}

export class CacheAsidePipeline<V> {
  constructor(
    private readonly cache: CacheStore<V>,
    private readonly options: CacheAsideOptions,
  ) {}

  /**
   * @param accept - narrows a cached value to the expected shape; a cached
   *   value it rejects is treated as a miss
   */
  async lookupOrCompute<T extends V>(
    key: string,
    compute: () => Promise<T>,
    accept: (value: V) => value is T,
  ): Promise<CacheAsideResult<T>> {
    if (!this.options.enabled) {
      return { value: await compute(), hit: false };
    }

    const cached = await this.read(key);
    if (cached !== undefined && accept(cached)) {
      logDebug('[cache] Hit', { key });
      return { value: cached, hit: true };
    }

    const value = await compute();
    await this.write(key, value);
    return { value, hit: false };
  }

  /**
   * Store one payload under several keys. Failures are logged per key.
   */
  async populate(keys: string[], value: V): Promise<void> {
    if (!this.options.enabled) return;
    for (const key of keys) {
      await this.write(key, value);
    }
  }

  // An unreadable cache is a miss.
  private async read(key: string): Promise<V | undefined> {
    try {
      return await this.cache.get(key);
    } catch (error) {
      logWarning('[cache] Read failed', { key, error: getErrorMessage(error) });
      return undefined;
    }
  }

  private async write(key: string, value: V): Promise<void> {
    try {
      await this.cache.set(key, value);
    } catch (error) {
      logWarning('[cache] Write failed', { key, error: getErrorMessage(error) });
    }
  }
}
