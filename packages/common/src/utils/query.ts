/**
 * Query string helpers
 *
 * Requests keep the query exactly as the client sent it. Pairs are only
 * decoded to read directives and to build cache keys.
 */

import type { QueryPairs } from '../types.js';

/** Parse a raw query string (with or without leading `?`) into ordered pairs */
export function parseQueryString(search: string): QueryPairs {
  return Array.from(new URLSearchParams(search));
}

/** First value of a parameter, or null */
export function getParam(query: QueryPairs, name: string): string | null {
  const pair = query.find(([key]) => key === name);
  return pair ? pair[1] : null;
}

/** Whether a parameter is present at all */
export function hasParam(query: QueryPairs, name: string): boolean {
  return query.some(([key]) => key === name);
}

/** Drop every occurrence of a parameter */
export function withoutParam(query: QueryPairs, name: string): QueryPairs {
  return query.filter(([key]) => key !== name);
}

/**
 * Drop every occurrence of a parameter from a raw query string, leaving the
 * other segments byte for byte as they were.
 */
export function withoutRawParam(search: string, name: string): string {
  const raw = search.startsWith('?') ? search.slice(1) : search;
  if (raw === '') {
    return '';
  }
  return raw
    .split('&')
    .filter((segment) => parseQueryString(segment)[0]?.[0] !== name)
    .join('&');
}

/** Serialize pairs in their given order */
export function toQueryString(query: QueryPairs): string {
  return new URLSearchParams(query.map(([key, value]): [string, string] => [key, value])).toString();
}

/** Order-independent form, for cache keys */
export function canonicalQueryString(query: QueryPairs): string {
  const sorted = [...query].sort(([a, av], [b, bv]) =>
    a === b ? compare(av, bv) : compare(a, b)
  );
  return toQueryString(sorted);
}

function compare(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}
