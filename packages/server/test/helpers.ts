import { vi } from 'vitest';
import { PLAYLIST_CONTENT_TYPE, type OriginResponse } from '@llhls-edge/common';
import type { PlaylistFetcher } from '../src/origin/provider.js';

export const T0 = 1_700_000_000_000;

/** Eight 2s segments advertising CAN-SKIP-UNTIL=12.0 */
export const LIVE_PLAYLIST = [
  '#EXTM3U',
  '#EXT-X-VERSION:9',
  '#EXT-X-TARGETDURATION:2',
  '#EXT-X-SERVER-CONTROL:CAN-BLOCK-RELOAD=YES,CAN-SKIP-UNTIL=12.0',
  '#EXT-X-MEDIA-SEQUENCE:100',
  ...Array.from({ length: 8 }, (_, i) => ['#EXTINF:2.000,', `seg${100 + i}.ts`]).flat(),
  '',
].join('\n');

export class ManualClock {
  constructor(public time: number = T0) {}

  now = (): number => this.time;

  advance(ms: number): void {
    this.time += ms;
  }
}

export function bytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function textOf(body: Uint8Array): string {
  return new TextDecoder().decode(body);
}

export function originResponse(body: string | Uint8Array, overrides: Partial<OriginResponse> = {}): OriginResponse {
  return {
    status: 200,
    body: typeof body === 'string' ? bytes(body) : body,
    contentType: PLAYLIST_CONTENT_TYPE,
    cacheControl: null,
    freshness: { fetchedAt: T0, maxAgeMs: null, noStore: false },
    ...overrides,
  };
}

export function createFakeFetcher() {
  const fetch = vi.fn<PlaylistFetcher['fetch']>();
  const fetcher: PlaylistFetcher = { fetch };
  return { fetch, fetcher };
}

export function createSilentLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
