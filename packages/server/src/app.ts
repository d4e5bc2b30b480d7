/**
 * Hono application for the LL-HLS delta edge
 */

import { Hono } from 'hono';
import { logger as requestLogger } from 'hono/logger';
import { BACKEND_ALT, isPlaylistPath, type Logger } from '@llhls-edge/common';
import { MemoryCacheStore, type CacheStore } from './cache/index.js';
import type { EdgeConfig } from './config.js';
import { CollapsingFetcher, HttpPlaylistFetcher, type PlaylistFetcher } from './origin/index.js';
import { createPlaylistHandler } from './server/handler.js';
import { createBackendRouter, createMethodFilter, type EdgeEnv } from './server/middleware.js';

/** Collaborators that can be swapped out, mainly for tests */
export interface EdgeAppOptions {
  config: EdgeConfig;
  /** Origin access; HTTP by default. Always wrapped for request collapsing. */
  fetcher?: PlaylistFetcher;
  cache?: CacheStore;
  logger?: Logger;
  clock?: () => number;
}

/** Create the edge app */
export function createEdgeApp(options: EdgeAppOptions): Hono<EdgeEnv> {
  const { config } = options;
  const clock = options.clock ?? Date.now;

  const origin = options.fetcher ?? new HttpPlaylistFetcher({
    backends: config.backends,
    timeoutMs: config.originTimeoutMs,
    blockingTimeoutMs: config.blockingReloadTimeoutMs,
    clock,
  });
  const handlePlaylist = createPlaylistHandler({
    fetcher: new CollapsingFetcher(origin),
    cache: options.cache ?? new MemoryCacheStore({ staleIfErrorMs: config.staleIfErrorMs, clock }),
    defaultTtlMs: config.playlistTtlMs,
    strictInvariants: config.strictInvariants,
    logger: options.logger,
    clock,
  });

  const app = new Hono<EdgeEnv>();

  if (config.logRequests) {
    app.use('*', requestLogger());
  }
  app.use('*', createMethodFilter());
  app.use('*', createBackendRouter({
    altPathPrefix: config.altPathPrefix,
    hasAltBackend: BACKEND_ALT in config.backends,
  }));

  app.get('*', async (c) => {
    const { backend, path } = c.get('route');

    // media is not proxied; send the player to the backend directly
    if (!isPlaylistPath(path)) {
      const base = config.backends[backend].replace(/\/$/, '');
      return c.redirect(`${base}${path}${new URL(c.req.url).search}`, 302);
    }

    const response = await handlePlaylist({
      backend,
      path,
      search: new URL(c.req.url).search.slice(1),
    });
    return new Response(response.body, { status: response.status, headers: response.headers });
  });

  return app;
}
