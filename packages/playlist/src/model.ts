/**
 * In-memory playlist model
 *
 * Every source line is kept exactly once, with its own line terminator, so
 * rendering the lines back in order reproduces the input byte for byte.
 * Content that the delta transform never interprets stays opaque.
 */

import type { AttributeList } from './attributes.js';

/** A line as it appeared in the source */
export interface SourceLine {
  text: string;
  /** `\n`, `\r\n`, or empty for a final unterminated line */
  eol: string;
  /** 1-based line number */
  number: number;
}

/** Scope of a raw line */
export type LineScope = 'playlist' | 'segment' | 'variant' | 'unknown' | 'none';

/** Verbatim line: tags the transform passes through, comments, blanks */
export interface RawLine extends SourceLine {
  kind: 'raw';
  tag: string | null;
  scope: LineScope;
  /** Parsed attributes for attribute-list tags */
  attributes: AttributeList | null;
}

/** `#EXTINF` line */
export interface InfLine extends SourceLine {
  kind: 'inf';
  duration: number;
  title: string;
}

/** Segment URI line */
export interface UriLine extends SourceLine {
  kind: 'uri';
}

/** One LL-HLS partial segment (`#EXT-X-PART`) */
export interface PartLine extends SourceLine {
  kind: 'part';
  duration: number;
  uri: string;
  independent: boolean;
  gap: boolean;
  attributes: AttributeList;
}

/** Lines composing one media segment */
export type BodyLine = RawLine | InfLine | UriLine | PartLine;

/** One media segment with its parts and the tags that precede it */
export interface SegmentLine {
  kind: 'segment';
  mediaSequence: number;
  /** `#EXTINF` duration, or the sum of parts for the in-progress segment */
  duration: number;
  title: string;
  /** Null while the segment is still being published part by part */
  uri: string | null;
  parts: PartLine[];
  /** Every source line of the segment, in order */
  body: BodyLine[];
  /** False for the trailing current segment that has parts but no URI yet */
  complete: boolean;
}

/** Top-level playlist entry */
export type Line = RawLine | SegmentLine;

/** `#EXT-X-SERVER-CONTROL` attributes */
export interface ServerControl {
  canSkipUntil: number | null;
  canSkipDateranges: boolean;
  canBlockReload: boolean;
  holdBack: number | null;
  partHoldBack: number | null;
  attributes: AttributeList;
}

/** Parsed playlist document */
export interface Playlist {
  version: number;
  /** Null for multivariant playlists */
  targetDuration: number | null;
  mediaSequence: number;
  discontinuitySequence: number;
  partTarget: number | null;
  serverControl: ServerControl | null;
  endList: boolean;
  /** Already a delta update (`#EXT-X-SKIP` present) */
  isDelta: boolean;
  isMultivariant: boolean;
  lines: Line[];
  /** Media segments in order, the in-progress one last */
  segments: SegmentLine[];
  /** Line terminator of the `#EXTM3U` line */
  eol: string;
}

/** Number of segments with a URI */
export function countCompleteSegments(playlist: Playlist): number {
  return playlist.segments.filter((segment) => segment.complete).length;
}
