/**
 * Parser → Policy → Renderer pipeline
 */

import {
  PlaylistParseError,
  RenderInvariantError,
  type ParseErrorKind,
  type SkipMode,
} from '@llhls-edge/common';
import type { Playlist } from './model.js';
import { parsePlaylist } from './parser.js';
import { computeSkipBoundary, type IneligibleReason } from './policy.js';
import { renderDelta } from './renderer.js';

/** Outcome of transforming one playlist snapshot */
export type TransformOutcome =
  | { kind: 'delta'; body: string; skippedSegments: number }
  | {
      kind: 'fallback';
      body: string;
      cause: 'parse' | 'policy';
      reason: IneligibleReason | ParseErrorKind;
      detail: string;
    }
  | { kind: 'error'; body: string; error: RenderInvariantError };

/**
 * Produce a delta update for a playlist snapshot, or say why the original
 * bytes must be served instead. Never throws for bad input.
 */
export function transformPlaylist(text: string, skip: SkipMode): TransformOutcome {
  let playlist: Playlist;
  try {
    playlist = parsePlaylist(text);
  } catch (error) {
    if (error instanceof PlaylistParseError) {
      return { kind: 'fallback', body: text, cause: 'parse', reason: error.kind, detail: error.message };
    }
    throw error;
  }

  const decision = computeSkipBoundary(playlist, skip);
  if (!decision.eligible) {
    return { kind: 'fallback', body: text, cause: 'policy', reason: decision.reason, detail: decision.reason };
  }

  try {
    return {
      kind: 'delta',
      body: renderDelta(playlist, decision.boundary),
      skippedSegments: decision.boundary.skippedSegments,
    };
  } catch (error) {
    if (error instanceof RenderInvariantError) {
      return { kind: 'error', body: text, error };
    }
    throw error;
  }
}
