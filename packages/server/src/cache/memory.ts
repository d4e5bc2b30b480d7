/**
 * In-memory cache store
 */

import type { CacheEntry, CacheLookup, CacheStore } from './provider.js';

/** Memory cache configuration */
export interface MemoryCacheConfig {
  /** How long past expiry an entry may still be served on origin failure */
  staleIfErrorMs: number;
  /** Oldest entries are evicted beyond this count */
  maxEntries?: number;
  clock?: () => number;
}

interface StoredEntry {
  entry: CacheEntry;
  expiresAt: number;
}

/**
 * Process-local cache store
 *
 * Suitable for a single edge node and for tests. Entries are kept in insertion
 * order so eviction drops the least recently stored key.
 */
export class MemoryCacheStore implements CacheStore {
  private entries = new Map<string, StoredEntry>();
  private staleIfErrorMs: number;
  private maxEntries: number;
  private clock: () => number;

  constructor(config: MemoryCacheConfig) {
    this.staleIfErrorMs = config.staleIfErrorMs;
    this.maxEntries = config.maxEntries ?? 1000;
    this.clock = config.clock ?? Date.now;
  }

  async lookup(key: string): Promise<CacheLookup | null> {
    const stored = this.entries.get(key);
    if (!stored) {
      return null;
    }

    const now = this.clock();
    if (now >= stored.expiresAt + this.staleIfErrorMs) {
      this.entries.delete(key);
      return null;
    }

    return { entry: stored.entry, expiresAt: stored.expiresAt, fresh: now < stored.expiresAt };
  }

  async store(key: string, entry: CacheEntry, ttlMs: number): Promise<void> {
    // re-inserting moves the key to the end of the eviction order
    this.entries.delete(key);
    this.entries.set(key, { entry, expiresAt: this.clock() + ttlMs });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  /** Number of stored entries */
  get size(): number {
    return this.entries.size;
  }
}
