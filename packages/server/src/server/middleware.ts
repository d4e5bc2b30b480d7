/**
 * Request filtering and backend routing middleware for Hono
 */

import type { Context, Next } from 'hono';
import { BACKEND_ALT, BACKEND_NAME } from '@llhls-edge/common';

/** Backend chosen for a request */
export interface BackendRoute {
  backend: string;
  /** Path on the backend, routing prefix removed */
  path: string;
}

/** Hono environment shared by the edge app */
export type EdgeEnv = {
  Variables: {
    route: BackendRoute;
  };
};

/** Routing configuration */
export interface BackendRouterConfig {
  altPathPrefix: string;
  /** Whether an alternate backend is configured */
  hasAltBackend: boolean;
}

/** Reject anything but GET and HEAD */
export function createMethodFilter() {
  return async (c: Context<EdgeEnv>, next: Next) => {
    if (c.req.method !== 'GET' && c.req.method !== 'HEAD') {
      return c.text('This method is not allowed\n', 405, { Allow: 'GET, HEAD' });
    }
    return next();
  };
}

/** Pick the backend from the path prefix and store the route in context */
export function createBackendRouter(config: BackendRouterConfig) {
  return async (c: Context<EdgeEnv>, next: Next) => {
    c.set('route', resolveBackend(c.req.path, config));
    return next();
  };
}

/** Map a request path to a backend and the path to fetch there */
export function resolveBackend(path: string, config: BackendRouterConfig): BackendRoute {
  const prefix = config.altPathPrefix;
  if (config.hasAltBackend && (path === prefix || path.startsWith(`${prefix}/`))) {
    return { backend: BACKEND_ALT, path: path.slice(prefix.length) || '/' };
  }
  return { backend: BACKEND_NAME, path };
}
