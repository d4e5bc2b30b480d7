/**
 * Display formatting utilities
 */

const MICROS_PER_SECOND = 1_000_000;

/** Convert decimal seconds to whole microseconds */
export function secondsToMicros(seconds: number): number {
  return Math.round(seconds * MICROS_PER_SECOND);
}

/** Format a freshness lifetime for a Cache-Control max-age directive */
export function formatMaxAge(ms: number): string {
  return Math.max(0, Math.floor(ms / 1000)).toString();
}
