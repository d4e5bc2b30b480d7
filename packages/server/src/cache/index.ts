/**
 * Cache stores for playlist snapshots and responses
 */

export type { CacheStore, CacheEntry, CacheLookup } from './provider.js';
export { MemoryCacheStore, type MemoryCacheConfig } from './memory.js';
