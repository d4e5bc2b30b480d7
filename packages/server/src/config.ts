/**
 * Edge configuration from environment variables
 */

import {
  BACKEND_ALT,
  BACKEND_NAME,
  ConfigError,
  DEFAULT_ALT_PATH_PREFIX,
  DEFAULT_BLOCKING_RELOAD_TIMEOUT_MS,
  DEFAULT_ORIGIN_TIMEOUT_MS,
  DEFAULT_PLAYLIST_TTL_MS,
  DEFAULT_PORT,
  DEFAULT_STALE_IF_ERROR_MS,
  isPositiveInteger,
  isValidPathPrefix,
  isValidUri,
} from '@llhls-edge/common';

/** Resolved edge configuration */
export interface EdgeConfig {
  port: number;
  /** Backend name → origin base URL */
  backends: Record<string, string>;
  altPathPrefix: string;
  playlistTtlMs: number;
  staleIfErrorMs: number;
  originTimeoutMs: number;
  /** Origin timeout for forwarded `_HLS_msn`/`_HLS_part` requests */
  blockingReloadTimeoutMs: number;
  logRequests: boolean;
  strictInvariants: boolean;
}

type Env = Record<string, string | undefined>;

/**
 * Load configuration
 * @param env - Variables to read, `process.env` by default
 * @throws ConfigError when a variable is missing or malformed
 */
export function loadConfig(env: Env = process.env): EdgeConfig {
  const originUrl = env.ORIGIN_URL ?? '';
  if (!isValidUri(originUrl)) {
    throw new ConfigError('ORIGIN_URL', originUrl);
  }

  const backends: Record<string, string> = { [BACKEND_NAME]: originUrl };
  const altUrl = env.ORIGIN_ALT_URL;
  if (altUrl) {
    if (!isValidUri(altUrl)) {
      throw new ConfigError('ORIGIN_ALT_URL', altUrl);
    }
    backends[BACKEND_ALT] = altUrl;
  }

  const altPathPrefix = env.ALT_PATH_PREFIX || DEFAULT_ALT_PATH_PREFIX;
  if (!isValidPathPrefix(altPathPrefix)) {
    throw new ConfigError('ALT_PATH_PREFIX', altPathPrefix);
  }

  return {
    port: readInteger(env, 'PORT', DEFAULT_PORT),
    backends,
    altPathPrefix,
    playlistTtlMs: readInteger(env, 'PLAYLIST_TTL_MS', DEFAULT_PLAYLIST_TTL_MS),
    staleIfErrorMs: readInteger(env, 'STALE_IF_ERROR_MS', DEFAULT_STALE_IF_ERROR_MS),
    originTimeoutMs: readInteger(env, 'ORIGIN_TIMEOUT_MS', DEFAULT_ORIGIN_TIMEOUT_MS),
    blockingReloadTimeoutMs: readInteger(env, 'BLOCKING_RELOAD_TIMEOUT_MS', DEFAULT_BLOCKING_RELOAD_TIMEOUT_MS),
    logRequests: readBoolean(env, 'LOG_REQUESTS', true),
    strictInvariants: readBoolean(env, 'STRICT_INVARIANTS', env.NODE_ENV !== 'production'),
  };
}

function readInteger(env: Env, name: string, fallback: number): number {
  const value = env[name];
  if (value === undefined || value === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!isPositiveInteger(parsed)) {
    throw new ConfigError(name, value);
  }
  return parsed;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const value = env[name]?.toLowerCase();
  switch (value) {
    case undefined:
    case '':
      return fallback;
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new ConfigError(name, value);
  }
}
