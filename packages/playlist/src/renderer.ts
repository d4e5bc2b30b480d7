/**
 * Playlist rendering: verbatim serialization and delta updates
 */

import { RenderInvariantError } from '@llhls-edge/common';
import { getAttribute } from './attributes.js';
import { countCompleteSegments, type Line, type Playlist, type RawLine, type SourceLine } from './model.js';
import type { SkipBoundary } from './policy.js';

/** Render the playlist exactly as parsed */
export function serializePlaylist(playlist: Playlist): string {
  return playlist.lines.map(renderLine).join('');
}

/**
 * `#EXT-X-SKIP` line for a boundary, without terminator.
 *
 * Skipping date ranges requires RECENTLY-REMOVED-DATERANGES. A single snapshot
 * carries no removal history, so the list is always empty.
 */
export function formatSkipTag(boundary: SkipBoundary): string {
  const tag = `#EXT-X-SKIP:SKIPPED-SEGMENTS=${boundary.skippedSegments}`;
  return boundary.skipDateranges ? `${tag},RECENTLY-REMOVED-DATERANGES=""` : tag;
}

/**
 * Render a Playlist Delta Update.
 *
 * Lines before the first segment are emitted unchanged, followed by the skip
 * tag, the tags hoisted out of the skipped span, and every remaining line
 * verbatim.
 * @throws RenderInvariantError when the boundary does not fit the playlist
 */
export function renderDelta(playlist: Playlist, boundary: SkipBoundary): string {
  const { skippedSegments } = boundary;
  const complete = countCompleteSegments(playlist);

  if (!Number.isInteger(skippedSegments) || skippedSegments < 0) {
    throw new RenderInvariantError(`Invalid skip count ${skippedSegments}`, { skippedSegments });
  }
  if (skippedSegments > 0 && skippedSegments > complete - 1) {
    throw new RenderInvariantError(
      `Cannot skip ${skippedSegments} of ${complete} complete segments`,
      { skippedSegments, complete }
    );
  }

  const firstSegment = playlist.lines.findIndex((line) => line.kind === 'segment');
  if (firstSegment === -1) {
    throw new RenderInvariantError('Playlist has no media segments');
  }

  // index of the first line after the last skipped segment
  let retainedFrom = firstSegment;
  for (let seen = 0; seen < skippedSegments; retainedFrom++) {
    if (playlist.lines[retainedFrom].kind === 'segment') seen++;
  }

  const header = playlist.lines.slice(0, firstSegment);
  const skipped = playlist.lines.slice(firstSegment, retainedFrom);
  const retained = playlist.lines.slice(retainedFrom);

  return [
    header.map(renderLine).join(''),
    formatSkipTag(boundary) + playlist.eol,
    collectHoisted(skipped, boundary.skipDateranges).map(renderSource).join(''),
    retained.map(renderLine).join(''),
  ].join('');
}

/**
 * Lines from the skipped span that must survive a skip: playlist-level tags,
 * the last EXT-X-KEY per KEYFORMAT, the last EXT-X-MAP and EXT-X-BITRATE, and
 * date ranges unless the client may skip them too.
 */
export function collectHoisted(skipped: readonly Line[], skipDateranges: boolean): RawLine[] {
  const kept: (RawLine | null)[] = [];
  const lastInEffect = new Map<string, number>();

  const keepLast = (slot: string, line: RawLine) => {
    const previous = lastInEffect.get(slot);
    if (previous !== undefined) kept[previous] = null;
    lastInEffect.set(slot, kept.length);
    kept.push(line);
  };

  for (const raw of skipped.flatMap(rawLinesOf)) {
    switch (raw.tag) {
      case 'EXT-X-KEY':
        keepLast(`KEY:${getAttribute(raw.attributes ?? [], 'KEYFORMAT') ?? 'identity'}`, raw);
        break;
      case 'EXT-X-MAP':
        keepLast('MAP', raw);
        break;
      case 'EXT-X-BITRATE':
        keepLast('BITRATE', raw);
        break;
      case 'EXT-X-DATERANGE':
        if (!skipDateranges) kept.push(raw);
        break;
      default:
        if (raw.scope === 'playlist') kept.push(raw);
    }
  }

  return kept.filter((line): line is RawLine => line !== null);
}

function rawLinesOf(line: Line): RawLine[] {
  if (line.kind === 'raw') {
    return [line];
  }
  return line.body.filter((body): body is RawLine => body.kind === 'raw');
}

function renderLine(line: Line): string {
  return line.kind === 'segment' ? line.body.map(renderSource).join('') : renderSource(line);
}

function renderSource(line: SourceLine): string {
  return line.text + line.eol;
}
