/**
 * Input validation utilities
 */

import { SKIP_MODES } from '../constants.js';
import type { SkipMode } from '../types.js';

/** Validate URI format */
export function isValidUri(uri: string): boolean {
  try {
    new URL(uri);
    return true;
  } catch {
    return false;
  }
}

/** Validate a positive integer setting (ports, milliseconds) */
export function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/** Validate a routing prefix such as `/alt` */
export function isValidPathPrefix(prefix: string): boolean {
  return prefix.length > 1 && prefix.startsWith('/') && !prefix.endsWith('/');
}

/** Whether a request path names a playlist */
export function isPlaylistPath(path: string): boolean {
  return /\.m3u8$/i.test(path);
}

/** Narrow an `_HLS_skip` value to a supported mode */
export function isSkipMode(value: string | null): value is SkipMode {
  return SKIP_MODES.some((mode) => mode === value);
}
