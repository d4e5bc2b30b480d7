/**
 * Playlist request orchestration
 */

import {
  CACHE_STATUS_HEADER,
  DEFAULT_UPSTREAM_ERROR_STATUS,
  FetchError,
  HLS_SKIP_PARAM,
  PLAYLIST_CONTENT_TYPE,
  STALE_HEADER,
  VARIANT_HEADER,
  decodePlaylist,
  encodePlaylist,
  formatMaxAge,
  parseQueryString,
  withoutRawParam,
  type Logger,
  type OriginResponse,
  type PlaylistRequest,
  type PlaylistResponse,
  type PlaylistVariant,
  type SkipMode,
} from '@llhls-edge/common';
import { transformPlaylist, type TransformOutcome } from '@llhls-edge/playlist';
import type { CacheEntry, CacheStore } from '../cache/provider.js';
import type { PlaylistFetcher } from '../origin/provider.js';
import { classifyRequest, getResponseKey, getSnapshotKey, parseDeltaRequest } from './classifier.js';

/** Playlist handler configuration */
export interface PlaylistHandlerConfig {
  fetcher: PlaylistFetcher;
  cache: CacheStore;
  /** Snapshot freshness when the origin sends no max-age */
  defaultTtlMs: number;
  /** Rethrow renderer invariant violations instead of serving the original bytes */
  strictInvariants: boolean;
  logger?: Logger;
  clock?: () => number;
}

/** Playlist handler function type */
export type PlaylistHandler = (request: PlaylistRequest) => Promise<PlaylistResponse>;

/** Snapshot bytes plus how they were obtained */
interface Snapshot {
  entry: CacheEntry;
  expiresAt: number;
  /** Served without contacting the origin */
  cacheHit: boolean;
  /** Expired, standing in for a failed origin fetch */
  stale: boolean;
}

type SnapshotOutcome = ({ kind: 'ok' } & Snapshot) | { kind: 'error'; status: number };

const DELTA_VARIANTS = ['delta', 'delta-fallback'] as const;

/**
 * Create the playlist handler.
 *
 * Blocking reloads are forwarded untouched, origin error answers included.
 * Full and delta requests are served from a shared snapshot of the full
 * playlist; delta bodies are cached per skip mode and per resolved variant, so
 * a fallback never lands under the key of a true delta update.
 */
export function createPlaylistHandler(config: PlaylistHandlerConfig): PlaylistHandler {
  const logger = config.logger ?? console;
  const now = config.clock ?? Date.now;

  async function forward(request: PlaylistRequest): Promise<PlaylistResponse> {
    let origin: OriginResponse;
    try {
      origin = await config.fetcher.fetch(request.backend, request.path, request.search, { blockingReload: true });
    } catch (error) {
      if (!(error instanceof FetchError)) throw error;
      logger.error(`[PlaylistHandler] Forwarded request failed: ${error.message}`);
      return errorResponse(error.status ?? DEFAULT_UPSTREAM_ERROR_STATUS);
    }

    // error answers (e.g. 400 for an out-of-range _HLS_msn) pass through too
    return {
      status: origin.status,
      body: origin.body,
      variant: 'passthrough',
      headers: {
        'Content-Type': origin.contentType ?? PLAYLIST_CONTENT_TYPE,
        'Cache-Control': origin.cacheControl ?? 'no-cache',
        [VARIANT_HEADER]: 'passthrough',
      },
    };
  }

  async function loadSnapshot(request: PlaylistRequest, key: string): Promise<SnapshotOutcome> {
    const cached = await config.cache.lookup(key);
    if (cached?.fresh) {
      return { kind: 'ok', entry: cached.entry, expiresAt: cached.expiresAt, cacheHit: true, stale: false };
    }

    try {
      const origin = await config.fetcher.fetch(
        request.backend,
        request.path,
        withoutRawParam(request.search, HLS_SKIP_PARAM)
      );
      if (origin.status < 200 || origin.status >= 300) {
        throw new FetchError(`Origin responded ${origin.status}`, origin.status, request.backend, request.path);
      }
      const entry: CacheEntry = { body: origin.body, contentType: origin.contentType };
      const ttl = origin.freshness.noStore ? 0 : origin.freshness.maxAgeMs ?? config.defaultTtlMs;
      if (ttl > 0) {
        await config.cache.store(key, entry, ttl);
      }
      return { kind: 'ok', entry, expiresAt: now() + ttl, cacheHit: false, stale: false };
    } catch (error) {
      if (!(error instanceof FetchError)) throw error;
      logger.error(`[PlaylistHandler] Origin fetch failed for ${key}: ${error.message}`);

      // stale-if-error covers outages, not answers like 404
      if (cached && (error.status === null || error.status >= 500)) {
        logger.warn(`[PlaylistHandler] Serving stale snapshot for ${key}`);
        return { kind: 'ok', entry: cached.entry, expiresAt: cached.expiresAt, cacheHit: true, stale: true };
      }
      return { kind: 'error', status: error.status ?? DEFAULT_UPSTREAM_ERROR_STATUS };
    }
  }

  async function serveFull(request: PlaylistRequest): Promise<PlaylistResponse> {
    const snapshot = await loadSnapshot(request, getSnapshotKey(request));
    if (snapshot.kind === 'error') {
      return errorResponse(snapshot.status);
    }
    return playlistResponse(snapshot.entry, 'full', snapshot);
  }

  async function serveDelta(request: PlaylistRequest, skip: SkipMode): Promise<PlaylistResponse> {
    const snapshotKey = getSnapshotKey(request);

    for (const variant of DELTA_VARIANTS) {
      const cached = await config.cache.lookup(getResponseKey(snapshotKey, variant, skip));
      if (cached?.fresh) {
        return playlistResponse(cached.entry, variant, {
          expiresAt: cached.expiresAt,
          cacheHit: true,
          stale: false,
        });
      }
    }

    const snapshot = await loadSnapshot(request, snapshotKey);
    if (snapshot.kind === 'error') {
      return errorResponse(snapshot.status);
    }

    const text = decodePlaylist(snapshot.entry.body);
    let resolved: { body: Uint8Array; variant: 'delta' | 'delta-fallback' };
    if (text === null) {
      logger.warn(`[PlaylistHandler] Unparseable playlist ${snapshotKey} (NotUtf8): Body is not valid UTF-8`);
      resolved = { body: snapshot.entry.body, variant: 'delta-fallback' };
    } else {
      resolved = resolveOutcome(transformPlaylist(text, skip), snapshot.entry.body, snapshotKey);
    }
    const { body, variant } = resolved;
    const entry: CacheEntry = { body, contentType: snapshot.entry.contentType };

    const ttl = snapshot.expiresAt - now();
    if (!snapshot.stale && ttl > 0) {
      await config.cache.store(getResponseKey(snapshotKey, variant, skip), entry, ttl);
    }
    return playlistResponse(entry, variant, snapshot);
  }

  /** Fallbacks serve the snapshot bytes themselves, never re-encoded text */
  function resolveOutcome(
    outcome: TransformOutcome,
    original: Uint8Array,
    key: string
  ): { body: Uint8Array; variant: 'delta' | 'delta-fallback' } {
    switch (outcome.kind) {
      case 'delta':
        return { body: encodePlaylist(outcome.body), variant: 'delta' };
      case 'fallback':
        if (outcome.cause === 'parse') {
          logger.warn(`[PlaylistHandler] Unparseable playlist ${key} (${outcome.reason}): ${outcome.detail}`);
        } else {
          logger.info(`[PlaylistHandler] Delta update not possible for ${key}: ${outcome.reason}`);
        }
        return { body: original, variant: 'delta-fallback' };
      case 'error':
        if (config.strictInvariants) {
          throw outcome.error;
        }
        logger.error(`[PlaylistHandler] Render invariant violated for ${key}:`, outcome.error);
        return { body: original, variant: 'delta-fallback' };
    }
  }

  function playlistResponse(
    entry: CacheEntry,
    variant: PlaylistVariant,
    snapshot: Pick<Snapshot, 'expiresAt' | 'cacheHit' | 'stale'>
  ): PlaylistResponse {
    const headers: Record<string, string> = {
      'Content-Type': entry.contentType ?? PLAYLIST_CONTENT_TYPE,
      'Cache-Control': `public, max-age=${formatMaxAge(snapshot.expiresAt - now())}`,
      [VARIANT_HEADER]: variant,
      [CACHE_STATUS_HEADER]: snapshot.cacheHit ? 'HIT' : 'MISS',
    };
    if (snapshot.stale) {
      headers[STALE_HEADER] = '1';
    }
    return { status: 200, body: entry.body, headers, variant };
  }

  return async (request: PlaylistRequest): Promise<PlaylistResponse> => {
    const delta = parseDeltaRequest(parseQueryString(request.search));
    const mode = classifyRequest(delta);

    if (mode === 'forward') {
      return forward(request);
    }
    if (mode === 'delta' && delta.skip !== null) {
      return serveDelta(request, delta.skip);
    }
    return serveFull(request);
  };
}

/** Response for a request that produced no playlist bytes */
export function errorResponse(status: number): PlaylistResponse {
  return {
    status,
    body: encodePlaylist(`Upstream error (${status})\n`),
    variant: 'error',
    headers: {
      'Content-Type': 'text/plain; charset=utf-8',
      'Cache-Control': 'no-store',
      [VARIANT_HEADER]: 'error',
    },
  };
}
