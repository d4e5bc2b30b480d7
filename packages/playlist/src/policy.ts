/**
 * Delta update eligibility and skip boundary
 */

import { MIN_SKIP_TARGET_DURATIONS, secondsToMicros, type SkipMode } from '@llhls-edge/common';
import type { Playlist, SegmentLine } from './model.js';

/** Why a delta update cannot be produced */
export type IneligibleReason =
  | 'NotMediaPlaylist'
  | 'AlreadyDelta'
  | 'PlaylistEnded'
  | 'NoSkipBoundaryAdvertised'
  | 'BoundaryTooSmall'
  | 'PlaylistTooShort';

/** How much of the playlist a delta update elides */
export interface SkipBoundary {
  /** Leading complete segments replaced by `#EXT-X-SKIP` */
  skippedSegments: number;
  /** Date ranges in the skipped span are dropped rather than kept */
  skipDateranges: boolean;
}

/** Result of the policy */
export type SkipDecision =
  | { eligible: true; boundary: SkipBoundary }
  | { eligible: false; reason: IneligibleReason };

/**
 * Compute the skip boundary for a delta request.
 *
 * Durations are summed in whole microseconds, so the result depends only on
 * the playlist text. A larger CAN-SKIP-UNTIL never yields a larger boundary.
 */
export function computeSkipBoundary(playlist: Playlist, skip: SkipMode): SkipDecision {
  const { targetDuration, serverControl } = playlist;

  if (playlist.isMultivariant || targetDuration === null) {
    return notEligible('NotMediaPlaylist');
  }
  if (playlist.isDelta) {
    return notEligible('AlreadyDelta');
  }
  if (playlist.endList) {
    return notEligible('PlaylistEnded');
  }
  if (!serverControl || serverControl.canSkipUntil === null) {
    return notEligible('NoSkipBoundaryAdvertised');
  }

  const skipWindow = secondsToMicros(serverControl.canSkipUntil);
  if (skipWindow < MIN_SKIP_TARGET_DURATIONS * secondsToMicros(targetDuration)) {
    return notEligible('BoundaryTooSmall');
  }

  const complete = playlist.segments.filter((segment) => segment.complete);
  const cutoff = totalDuration(playlist.segments) - skipWindow;
  if (complete.length < 2 || cutoff <= 0) {
    return notEligible('PlaylistTooShort');
  }

  // the most recent complete segment always stays
  const limit = complete.length - 1;
  let skippedSegments = 0;
  let elapsed = 0;
  while (skippedSegments < limit) {
    const next = elapsed + secondsToMicros(complete[skippedSegments].duration);
    if (next > cutoff) break;
    elapsed = next;
    skippedSegments++;
  }

  return {
    eligible: true,
    boundary: {
      skippedSegments,
      skipDateranges: skip === 'v2' && serverControl.canSkipDateranges,
    },
  };
}

/** Playlist duration in microseconds, parts of the in-progress segment included */
export function totalDuration(segments: readonly SegmentLine[]): number {
  let total = 0;
  for (const segment of segments) {
    if (segment.complete) {
      total += secondsToMicros(segment.duration);
    } else {
      for (const part of segment.parts) {
        total += secondsToMicros(part.duration);
      }
    }
  }
  return total;
}

function notEligible(reason: IneligibleReason): SkipDecision {
  return { eligible: false, reason };
}
