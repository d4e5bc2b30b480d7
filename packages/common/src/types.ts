/**
 * Core types for the LL-HLS delta edge
 */

/** Value of the `_HLS_skip` delivery directive */
export type SkipMode = 'YES' | 'v2';

/** Client intent parsed from a playlist request's query */
export interface DeltaRequest {
  /** Requested delta mode, or null for a full playlist */
  skip: SkipMode | null;
  /** `_HLS_msn` or `_HLS_part` present */
  blockingReload: boolean;
}

/** How an incoming playlist request is handled */
export type HandlingMode = 'forward' | 'full' | 'delta';

/** Which response variant was served, exposed as `X-Playlist-Variant` */
export type PlaylistVariant = 'passthrough' | 'full' | 'delta' | 'delta-fallback' | 'error';

/** Query parameters as an ordered list of pairs */
export type QueryPairs = ReadonlyArray<readonly [string, string]>;

/** Freshness metadata attached to an origin response */
export interface Freshness {
  /** Epoch milliseconds the response was received */
  fetchedAt: number;
  /** Freshness lifetime from the origin's `max-age`, if any */
  maxAgeMs: number | null;
  /** Origin sent `no-store` or `private` */
  noStore: boolean;
}

/** Playlist bytes fetched from a backend */
export interface OriginResponse {
  status: number;
  /** Body exactly as received */
  body: Uint8Array;
  contentType: string | null;
  cacheControl: string | null;
  freshness: Freshness;
}

/** Incoming playlist request after routing */
export interface PlaylistRequest {
  /** Logical backend name (e.g. `video_backend`) */
  backend: string;
  /** Path on the backend, prefix already stripped */
  path: string;
  /** Query string as received, without the leading `?` */
  search: string;
}

/** Outgoing playlist response */
export interface PlaylistResponse {
  status: number;
  body: Uint8Array;
  headers: Record<string, string>;
  variant: PlaylistVariant;
}

/** Per-request origin fetch options */
export interface FetchOptions {
  /** The origin may hold the request until the asked-for segment or part exists */
  blockingReload?: boolean;
}

/** Console subset used for component logging */
export type Logger = Pick<Console, 'info' | 'warn' | 'error'>;
