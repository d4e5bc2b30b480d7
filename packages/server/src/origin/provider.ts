/**
 * Playlist fetch interface
 */

import type { FetchOptions, OriginResponse } from '@llhls-edge/common';

/** Fetches playlist bytes from a named backend */
export interface PlaylistFetcher {
  /**
   * Fetch a playlist. Any HTTP answer resolves, whatever its status.
   * @param backend - Logical backend name
   * @param path - Path on the backend
   * @param search - Raw query string to forward, without the leading `?`
   * @throws FetchError when the backend is unknown or unreachable
   */
  fetch(backend: string, path: string, search: string, options?: FetchOptions): Promise<OriginResponse>;
}
