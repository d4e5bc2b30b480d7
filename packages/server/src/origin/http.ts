/**
 * HTTP playlist fetcher backed by the global fetch API
 */

import { FetchError, type FetchOptions, type OriginResponse } from '@llhls-edge/common';
import { getFreshness } from './freshness.js';
import type { PlaylistFetcher } from './provider.js';

/** HTTP fetcher configuration */
export interface HttpFetcherConfig {
  /** Backend name → base URL */
  backends: Record<string, string>;
  timeoutMs: number;
  /** Timeout for blocking reloads, which the origin may hold */
  blockingTimeoutMs?: number;
  fetchImpl?: typeof fetch;
  clock?: () => number;
}

/**
 * Fetches playlists from origin servers over HTTP
 */
export class HttpPlaylistFetcher implements PlaylistFetcher {
  private backends: Record<string, string>;
  private timeoutMs: number;
  private blockingTimeoutMs: number;
  private fetchImpl: typeof fetch;
  private clock: () => number;

  constructor(config: HttpFetcherConfig) {
    this.backends = config.backends;
    this.timeoutMs = config.timeoutMs;
    this.blockingTimeoutMs = config.blockingTimeoutMs ?? config.timeoutMs;
    this.fetchImpl = config.fetchImpl ?? fetch;
    this.clock = config.clock ?? Date.now;
  }

  async fetch(backend: string, path: string, search: string, options: FetchOptions = {}): Promise<OriginResponse> {
    const url = this.getUrl(backend, path, search);
    if (url === null) {
      throw new FetchError(`Unknown backend: ${backend}`, null, backend, path);
    }

    let response: Response;
    let body: Uint8Array;
    try {
      response = await this.fetchImpl(url, {
        signal: AbortSignal.timeout(options.blockingReload ? this.blockingTimeoutMs : this.timeoutMs),
        // bodies may be rewritten, so ask for them uncompressed
        headers: { 'Accept-Encoding': 'identity' },
      });
      body = new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new FetchError(`Origin request failed: ${reason}`, null, backend, path);
    }

    const cacheControl = response.headers.get('cache-control');
    return {
      status: response.status,
      body,
      contentType: response.headers.get('content-type'),
      cacheControl,
      freshness: getFreshness(cacheControl, this.clock()),
    };
  }

  /** Origin URL for a request, or null for an unknown backend */
  getUrl(backend: string, path: string, search: string): string | null {
    const base = this.backends[backend];
    if (base === undefined) {
      return null;
    }
    return `${base.replace(/\/$/, '')}${path}${search ? `?${search}` : ''}`;
  }
}
