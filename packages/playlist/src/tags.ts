/**
 * Tag names and their scope in a playlist
 */

/** Tags that describe the whole playlist rather than one segment */
const PLAYLIST_TAGS = new Set([
  'EXTM3U',
  'EXT-X-VERSION',
  'EXT-X-TARGETDURATION',
  'EXT-X-MEDIA-SEQUENCE',
  'EXT-X-DISCONTINUITY-SEQUENCE',
  'EXT-X-PLAYLIST-TYPE',
  'EXT-X-I-FRAMES-ONLY',
  'EXT-X-INDEPENDENT-SEGMENTS',
  'EXT-X-START',
  'EXT-X-DEFINE',
  'EXT-X-PART-INF',
  'EXT-X-SERVER-CONTROL',
  'EXT-X-ENDLIST',
  'EXT-X-PRELOAD-HINT',
  'EXT-X-RENDITION-REPORT',
  'EXT-X-SKIP',
]);

/** Tags that apply to the next media segment (or all following ones) */
const SEGMENT_TAGS = new Set([
  'EXTINF',
  'EXT-X-BYTERANGE',
  'EXT-X-DISCONTINUITY',
  'EXT-X-KEY',
  'EXT-X-MAP',
  'EXT-X-PROGRAM-DATE-TIME',
  'EXT-X-GAP',
  'EXT-X-BITRATE',
  'EXT-X-DATERANGE',
  'EXT-X-CUE-OUT',
  'EXT-X-CUE-OUT-CONT',
  'EXT-X-CUE-IN',
]);

/** Multivariant playlist tags */
const VARIANT_TAGS = new Set([
  'EXT-X-STREAM-INF',
  'EXT-X-I-FRAME-STREAM-INF',
  'EXT-X-MEDIA',
  'EXT-X-SESSION-DATA',
  'EXT-X-SESSION-KEY',
  'EXT-X-CONTENT-STEERING',
]);

/** Tags whose value is an attribute list */
const ATTRIBUTE_LIST_TAGS = new Set([
  'EXT-X-START',
  'EXT-X-DEFINE',
  'EXT-X-PART-INF',
  'EXT-X-SERVER-CONTROL',
  'EXT-X-PRELOAD-HINT',
  'EXT-X-RENDITION-REPORT',
  'EXT-X-SKIP',
  'EXT-X-KEY',
  'EXT-X-MAP',
  'EXT-X-DATERANGE',
  'EXT-X-PART',
  'EXT-X-STREAM-INF',
  'EXT-X-I-FRAME-STREAM-INF',
  'EXT-X-MEDIA',
  'EXT-X-SESSION-DATA',
  'EXT-X-SESSION-KEY',
  'EXT-X-CONTENT-STEERING',
]);

/** Where a tag belongs */
export type TagScope = 'playlist' | 'segment' | 'part' | 'variant' | 'unknown';

/** Tag name without the leading `#`, or null when the line is not a tag */
export function getTagName(text: string): string | null {
  if (!text.startsWith('#EXT')) {
    return null;
  }
  const colon = text.indexOf(':');
  return colon === -1 ? text.slice(1) : text.slice(1, colon);
}

/** Text after the tag's colon */
export function getTagValue(text: string, tag: string): string {
  return text.slice(tag.length + 2);
}

/** Classify a tag name */
export function getTagScope(tag: string): TagScope {
  if (tag === 'EXT-X-PART') return 'part';
  if (PLAYLIST_TAGS.has(tag)) return 'playlist';
  if (SEGMENT_TAGS.has(tag)) return 'segment';
  if (VARIANT_TAGS.has(tag)) return 'variant';
  return 'unknown';
}

/** Whether the tag's value should be parsed as an attribute list */
export function hasAttributeList(tag: string): boolean {
  return ATTRIBUTE_LIST_TAGS.has(tag);
}
