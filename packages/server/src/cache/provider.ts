/**
 * Cache store interface for playlist snapshots and rendered responses
 */

/** Cached playlist bytes */
export interface CacheEntry {
  /** Bytes exactly as served */
  body: Uint8Array;
  contentType: string | null;
}

/** Result of a lookup */
export interface CacheLookup {
  entry: CacheEntry;
  /** Epoch milliseconds the entry stops being fresh */
  expiresAt: number;
  /** False when only usable as a stale-if-error fallback */
  fresh: boolean;
}

/** Cache store interface */
export interface CacheStore {
  /**
   * Look up an entry
   * @param key - Cache key
   * @returns The entry while fresh or within its stale window, else null
   */
  lookup(key: string): Promise<CacheLookup | null>;

  /**
   * Store an entry
   * @param key - Cache key
   * @param entry - Bytes and content type
   * @param ttlMs - Freshness lifetime
   */
  store(key: string, entry: CacheEntry, ttlMs: number): Promise<void>;
}
