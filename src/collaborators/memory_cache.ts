/**
 * @fileoverview In-process cache collaborator
 *
 * LRU map with optional TTL and hit/miss accounting. Used as the default
 * cache when no external cache is supplied, and in tests.
 *
 * @packageDocumentation
 */

import type { CacheStore } from './types.js';

interface CacheEntry<V> {
  value: V;
  expiresAt: number | null;
}

export interface MemoryCacheOptions {
  /** Maximum entries before LRU eviction (default: 1000) */
  maxEntries?: number;
  /** Time-to-live in milliseconds. 0 = no TTL (default: 0) */
  ttlMs?: number;
  /** Clock, injectable for tests */
  now?: () => number;
}

export interface MemoryCacheStats {
  entries: number;
  hits: number;
  misses: number;
  evictions: number;
}

export class MemoryCacheStore<V = unknown> implements CacheStore<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: MemoryCacheOptions = {}) {
    this.maxEntries = options.maxEntries ?? 1000;
    this.ttlMs = options.ttlMs ?? 0;
    this.now = options.now ?? Date.now;
    if (this.maxEntries <= 0) {
      throw new Error('Cache size must be positive');
    }
  }

  async initialize(): Promise<void> {
    // Nothing to connect to.
  }

  async get(key: string): Promise<V | undefined> {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }
    // Refresh recency
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return entry.value;
  }

  async set(key: string, value: V): Promise<void> {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    }
    this.entries.set(key, {
      value,
      expiresAt: this.ttlMs > 0 ? this.now() + this.ttlMs : null,
    });
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next().value;
      if (oldest === undefined) break;
      this.entries.delete(oldest);
      this.evictions++;
    }
  }

  async hitRate(): Promise<number> {
    const total = this.hits + this.misses;
    return total > 0 ? this.hits / total : 0;
  }

  clear(): void {
    this.entries.clear();
  }

  getStats(): MemoryCacheStats {
    return {
      entries: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }
}
