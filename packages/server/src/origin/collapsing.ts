/**
 * Request collapsing for concurrent identical origin fetches
 */

import type { FetchOptions, OriginResponse } from '@llhls-edge/common';
import type { PlaylistFetcher } from './provider.js';

/**
 * Shares one in-flight origin fetch among concurrent callers asking for the
 * same backend, path and query string. Settled fetches are forgotten
 * immediately; reuse after that is the cache store's job.
 */
export class CollapsingFetcher implements PlaylistFetcher {
  private inFlight = new Map<string, Promise<OriginResponse>>();

  constructor(private inner: PlaylistFetcher) {}

  fetch(backend: string, path: string, search: string, options?: FetchOptions): Promise<OriginResponse> {
    const key = `${backend}|${path}?${search}`;
    const existing = this.inFlight.get(key);
    if (existing) {
      return existing;
    }

    const request = this.inner.fetch(backend, path, search, options).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, request);
    return request;
  }

  /** Number of fetches currently in flight */
  get pending(): number {
    return this.inFlight.size;
  }
}
