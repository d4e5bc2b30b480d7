/**
 * Origin access
 */

export type { PlaylistFetcher } from './provider.js';
export { HttpPlaylistFetcher, type HttpFetcherConfig } from './http.js';
export { CollapsingFetcher } from './collapsing.js';
export { getFreshness, parseCacheControl } from './freshness.js';
