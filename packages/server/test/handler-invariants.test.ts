import { beforeEach, describe, expect, it, vi } from 'vitest';
import { RenderInvariantError } from '@llhls-edge/common';
import { transformPlaylist } from '@llhls-edge/playlist';
import { MemoryCacheStore } from '../src/cache/memory.js';
import { createPlaylistHandler } from '../src/server/handler.js';
import {
  LIVE_PLAYLIST,
  ManualClock,
  createFakeFetcher,
  createSilentLogger,
  originResponse,
  textOf,
} from './helpers.js';

vi.mock('@llhls-edge/playlist', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@llhls-edge/playlist')>()),
  transformPlaylist: vi.fn(),
}));

function setup(strictInvariants: boolean) {
  const clock = new ManualClock();
  const { fetch, fetcher } = createFakeFetcher();
  fetch.mockResolvedValue(originResponse(LIVE_PLAYLIST));
  const logger = createSilentLogger();
  const handle = createPlaylistHandler({
    fetcher,
    cache: new MemoryCacheStore({ staleIfErrorMs: 10_000, clock: clock.now }),
    defaultTtlMs: 1000,
    strictInvariants,
    logger,
    clock: clock.now,
  });
  const request = () => handle({ backend: 'video_backend', path: '/live/index.m3u8', search: '_HLS_skip=YES' });
  return { logger, request };
}

describe('render invariant violations', () => {
  const error = new RenderInvariantError('Cannot skip 9 of 8 complete segments');

  beforeEach(() => {
    vi.mocked(transformPlaylist).mockReturnValue({ kind: 'error', body: LIVE_PLAYLIST, error });
  });

  it('are rethrown in strict mode', async () => {
    const { request } = setup(true);
    await expect(request()).rejects.toBe(error);
  });

  it('are logged and answered with the original playlist otherwise', async () => {
    const { logger, request } = setup(false);

    const response = await request();

    expect(textOf(response.body)).toBe(LIVE_PLAYLIST);
    expect(response.variant).toBe('delta-fallback');
    expect(logger.error).toHaveBeenCalledWith(
      '[PlaylistHandler] Render invariant violated for video_backend|/live/index.m3u8?:',
      error
    );
  });
});
