/**
 * Origin Cache-Control interpretation
 */

import type { Freshness } from '@llhls-edge/common';

/** Parse Cache-Control directives into a name → value map */
export function parseCacheControl(header: string | null): Map<string, string | null> {
  const directives = new Map<string, string | null>();
  if (!header) {
    return directives;
  }

  for (const part of header.split(',')) {
    const [name, value] = part.split('=', 2);
    const key = name.trim().toLowerCase();
    if (key) {
      directives.set(key, value === undefined ? null : value.trim().replace(/^"|"$/g, ''));
    }
  }
  return directives;
}

/** Freshness metadata for a response received at `fetchedAt` */
export function getFreshness(cacheControl: string | null, fetchedAt: number): Freshness {
  const directives = parseCacheControl(cacheControl);
  const maxAge = directives.get('s-maxage') ?? directives.get('max-age') ?? null;
  const seconds = maxAge === null ? NaN : Number(maxAge);

  return {
    fetchedAt,
    maxAgeMs: Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : null,
    noStore: directives.has('no-store') || directives.has('private'),
  };
}
