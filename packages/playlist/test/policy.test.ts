import { describe, expect, it } from 'vitest';
import { parsePlaylist } from '../src/parser.js';
import { computeSkipBoundary, totalDuration } from '../src/policy.js';
import { livePlaylist, playlistText, readFixture } from './helpers.js';

const live = readFixture('live.m3u8');

function decide(text: string, skip: 'YES' | 'v2' = 'YES') {
  return computeSkipBoundary(parsePlaylist(text), skip);
}

function withSkipUntil(seconds: string): string {
  return live.replace('CAN-SKIP-UNTIL=12.0', `CAN-SKIP-UNTIL=${seconds}`);
}

describe('computeSkipBoundary', () => {
  it('skips two of eight 2s segments with CAN-SKIP-UNTIL=12', () => {
    expect(decide(live)).toEqual({
      eligible: true,
      boundary: { skippedSegments: 2, skipDateranges: false },
    });
  });

  it('skips date ranges only for v2 requests the server allows', () => {
    const llHls = readFixture('ll-hls.m3u8');
    expect(decide(llHls, 'YES')).toEqual({
      eligible: true,
      boundary: { skippedSegments: 3, skipDateranges: false },
    });
    expect(decide(llHls, 'v2')).toEqual({
      eligible: true,
      boundary: { skippedSegments: 3, skipDateranges: true },
    });
    expect(decide(live, 'v2')).toEqual({
      eligible: true,
      boundary: { skippedSegments: 2, skipDateranges: false },
    });
  });

  it('rejects a skip boundary under six target durations', () => {
    expect(decide(withSkipUntil('10.0'))).toEqual({ eligible: false, reason: 'BoundaryTooSmall' });
    expect(decide(withSkipUntil('11.999999'))).toEqual({ eligible: false, reason: 'BoundaryTooSmall' });
  });

  it.each([
    ['multivariant playlists', readFixture('multivariant.m3u8'), 'NotMediaPlaylist'],
    [
      'delta updates',
      live.replace('#EXT-X-MEDIA-SEQUENCE:100\n', '#EXT-X-MEDIA-SEQUENCE:100\n#EXT-X-SKIP:SKIPPED-SEGMENTS=2\n'),
      'AlreadyDelta',
    ],
    ['finished playlists', `${live}#EXT-X-ENDLIST\n`, 'PlaylistEnded'],
    ['playlists without server control', live.replace('#EXT-X-SERVER-CONTROL:CAN-SKIP-UNTIL=12.0\n', ''), 'NoSkipBoundaryAdvertised'],
    [
      'server control without CAN-SKIP-UNTIL',
      live.replace('CAN-SKIP-UNTIL=12.0', 'CAN-BLOCK-RELOAD=YES'),
      'NoSkipBoundaryAdvertised',
    ],
    ['a window covering the whole playlist', withSkipUntil('16.0'), 'PlaylistTooShort'],
    [
      'a single segment',
      livePlaylist({ segments: 1, duration: '2', targetDuration: 2, canSkipUntil: '12' }),
      'PlaylistTooShort',
    ],
  ])('rejects %s', (_name, text, reason) => {
    expect(decide(text)).toEqual({ eligible: false, reason });
  });

  it('never grows the boundary as CAN-SKIP-UNTIL grows', () => {
    const counts = ['12.0', '13.0', '14.0', '15.0'].map((seconds) => {
      const decision = decide(withSkipUntil(seconds));
      return decision.eligible ? decision.boundary.skippedSegments : null;
    });
    expect(counts).toEqual([2, 1, 1, 0]);

    let previous = Infinity;
    for (let tenths = 120; tenths <= 400; tenths += 5) {
      const decision = decide(
        livePlaylist({ segments: 20, duration: '2.0', targetDuration: 2, canSkipUntil: (tenths / 10).toFixed(1) })
      );
      const skipped = decision.eligible ? decision.boundary.skippedSegments : 0;
      expect(skipped).toBeLessThanOrEqual(previous);
      previous = skipped;
    }
  });

  it('sums durations without floating point drift', () => {
    const text = livePlaylist({ segments: 30, duration: '0.3', targetDuration: 1, canSkipUntil: '6.0' });
    expect(decide(text)).toEqual({
      eligible: true,
      boundary: { skippedSegments: 10, skipDateranges: false },
    });
  });

  it('keeps the most recent complete segment', () => {
    const text = livePlaylist({ segments: 3, duration: '10', targetDuration: 1, canSkipUntil: '6' });
    expect(decide(text)).toEqual({
      eligible: true,
      boundary: { skippedSegments: 2, skipDateranges: false },
    });
  });

  it('counts the parts of the in-progress segment', () => {
    const text = playlistText(
      '#EXTM3U',
      '#EXT-X-TARGETDURATION:2',
      '#EXT-X-SERVER-CONTROL:CAN-SKIP-UNTIL=12.0',
      '#EXT-X-PART-INF:PART-TARGET=1.0',
      ...Array.from({ length: 7 }, (_, i) => [`#EXTINF:2.0,`, `s${i}.ts`]).flat(),
      '#EXT-X-PART:DURATION=1.0,URI="s7.0.ts"'
    );
    // 15s in total leaves 3s before the window
    expect(decide(text)).toEqual({
      eligible: true,
      boundary: { skippedSegments: 1, skipDateranges: false },
    });
  });
});

describe('totalDuration', () => {
  it('adds complete segments and in-progress parts in microseconds', () => {
    expect(totalDuration(parsePlaylist(live).segments)).toBe(16_000_000);
    expect(totalDuration(parsePlaylist(readFixture('ll-hls.m3u8')).segments)).toBe(19_000_000);
  });
});
