/**
 * Single-pass playlist parser
 */

import { PlaylistParseError } from '@llhls-edge/common';
import {
  getAttribute,
  getDecimal,
  getFlag,
  parseAttributeList,
  parseDecimal,
  parseInteger,
  type AttributeList,
} from './attributes.js';
import type {
  BodyLine,
  InfLine,
  Line,
  PartLine,
  Playlist,
  RawLine,
  SegmentLine,
  ServerControl,
  SourceLine,
} from './model.js';
import { getTagName, getTagScope, getTagValue, hasAttributeList } from './tags.js';

const BOM = '\uFEFF';

/**
 * Parse playlist text.
 * @throws PlaylistParseError when the text is not a usable playlist
 */
export function parsePlaylist(text: string): Playlist {
  const source = splitLines(text);
  const first = source[0];

  if (!first || stripBom(first.text) !== '#EXTM3U') {
    throw new PlaylistParseError('NotM3U8', 'Expected #EXTM3U as the first line', 1);
  }

  const parser = new PlaylistParser(first);
  for (let i = 1; i < source.length; i++) {
    parser.consume(source[i]);
  }
  return parser.finish(source[source.length - 1].number);
}

/** Split text into lines, keeping each terminator */
export function splitLines(text: string): SourceLine[] {
  const lines: SourceLine[] = [];
  let start = 0;
  let number = 1;

  while (start < text.length) {
    const newline = text.indexOf('\n', start);
    if (newline === -1) {
      lines.push({ text: text.slice(start), eol: '', number });
      break;
    }
    const crlf = newline > start && text[newline - 1] === '\r';
    lines.push({
      text: text.slice(start, crlf ? newline - 1 : newline),
      eol: crlf ? '\r\n' : '\n',
      number: number++,
    });
    start = newline + 1;
  }

  return lines;
}

function stripBom(text: string): string {
  return text.startsWith(BOM) ? text.slice(1) : text;
}

class PlaylistParser {
  private lines: Line[] = [];
  private segments: SegmentLine[] = [];
  private pending: BodyLine[] = [];
  private pendingInf: InfLine | null = null;
  private pendingParts: PartLine[] = [];
  private inBody = false;
  private expectVariantUri = false;

  private version = 1;
  private targetDuration: number | null = null;
  private mediaSequence = 0;
  private discontinuitySequence = 0;
  private partTarget: number | null = null;
  private serverControl: ServerControl | null = null;
  private endList = false;
  private isDelta = false;
  private isMultivariant = false;
  private eol: string;

  constructor(header: SourceLine) {
    this.eol = header.eol || '\n';
    this.lines.push(raw(header, 'EXTM3U', 'playlist', null));
  }

  consume(line: SourceLine): void {
    const tag = getTagName(line.text);

    if (tag === null) {
      if (line.text.length === 0 || line.text.startsWith('#')) {
        this.place(raw(line, null, 'none', null));
      } else {
        this.consumeUri(line);
      }
      return;
    }

    const scope = getTagScope(tag);
    const attributes = hasAttributeList(tag)
      ? parseAttributeList(getTagValue(line.text, tag), line.number)
      : null;

    switch (scope) {
      case 'part':
        this.consumePart(line, attributes ?? []);
        return;
      case 'segment':
        if (tag === 'EXTINF') {
          this.consumeInf(line);
        } else {
          this.pending.push(raw(line, tag, 'segment', attributes));
          this.inBody = true;
        }
        return;
      case 'playlist':
        this.consumePlaylistTag(line, tag, attributes);
        this.place(raw(line, tag, 'playlist', attributes));
        return;
      case 'variant':
        this.isMultivariant = true;
        this.expectVariantUri = tag === 'EXT-X-STREAM-INF';
        this.place(raw(line, tag, 'variant', attributes));
        return;
      case 'unknown':
        this.place(raw(line, tag, 'unknown', attributes));
        return;
    }
  }

  finish(lastLine: number): Playlist {
    if (this.pendingInf) {
      throw new PlaylistParseError('UnexpectedEOF', 'Playlist ends before the URI of the last #EXTINF', lastLine);
    }
    if (this.expectVariantUri) {
      throw new PlaylistParseError('UnexpectedEOF', 'Playlist ends before the URI of the last #EXT-X-STREAM-INF', lastLine);
    }

    if (this.pendingParts.length > 0) {
      this.pushSegment({
        kind: 'segment',
        mediaSequence: 0,
        duration: this.pendingParts.reduce((sum, part) => sum + part.duration, 0),
        title: '',
        uri: null,
        parts: this.pendingParts,
        body: this.pending,
        complete: false,
      });
    } else {
      for (const line of this.pending) {
        // only raw lines can be pending without a part or #EXTINF
        if (line.kind === 'raw') this.lines.push(line);
      }
    }

    this.segments.forEach((segment, index) => {
      segment.mediaSequence = this.mediaSequence + index;
    });

    return {
      version: this.version,
      targetDuration: this.isMultivariant ? null : this.targetDuration,
      mediaSequence: this.mediaSequence,
      discontinuitySequence: this.discontinuitySequence,
      partTarget: this.partTarget,
      serverControl: this.serverControl,
      endList: this.endList,
      isDelta: this.isDelta,
      isMultivariant: this.isMultivariant,
      lines: this.lines,
      segments: this.segments,
      eol: this.eol,
    };
  }

  /** Top-level while nothing is pending; otherwise part of the next segment */
  private place(line: RawLine): void {
    if (this.pending.length === 0 && (!this.inBody || line.scope === 'playlist' || line.scope === 'variant')) {
      this.lines.push(line);
    } else {
      this.pending.push(line);
    }
  }

  private consumeUri(line: SourceLine): void {
    if (this.expectVariantUri) {
      this.expectVariantUri = false;
      this.place(raw(line, null, 'variant', null));
      return;
    }

    const inf = this.pendingInf;
    if (!inf) {
      throw new PlaylistParseError('MalformedTag', 'URI line without a preceding #EXTINF', line.number);
    }

    this.pushSegment({
      kind: 'segment',
      mediaSequence: 0,
      duration: inf.duration,
      title: inf.title,
      uri: line.text,
      parts: this.pendingParts,
      body: [...this.pending, { ...line, kind: 'uri' }],
      complete: true,
    });
  }

  private consumeInf(line: SourceLine): void {
    if (this.pendingInf) {
      throw new PlaylistParseError('MalformedTag', 'Two #EXTINF tags without a URI between them', line.number);
    }

    const value = getTagValue(line.text, 'EXTINF');
    const comma = value.indexOf(',');
    const inf: InfLine = {
      ...line,
      kind: 'inf',
      duration: parseDecimal(comma === -1 ? value : value.slice(0, comma), 'EXTINF', line.number),
      title: comma === -1 ? '' : value.slice(comma + 1),
    };

    this.pendingInf = inf;
    this.pending.push(inf);
    this.inBody = true;
  }

  private consumePart(line: SourceLine, attributes: AttributeList): void {
    const duration = getDecimal(attributes, 'DURATION', line.number);
    const uri = getAttribute(attributes, 'URI');
    if (duration === null || uri === null) {
      throw new PlaylistParseError('MalformedTag', '#EXT-X-PART requires DURATION and URI', line.number);
    }

    const part: PartLine = {
      ...line,
      kind: 'part',
      duration,
      uri,
      independent: getFlag(attributes, 'INDEPENDENT'),
      gap: getFlag(attributes, 'GAP'),
      attributes,
    };

    this.pendingParts.push(part);
    this.pending.push(part);
    this.inBody = true;
  }

  private consumePlaylistTag(line: SourceLine, tag: string, attributes: AttributeList | null): void {
    const value = getTagValue(line.text, tag);

    switch (tag) {
      case 'EXT-X-VERSION':
        this.version = parseInteger(value, tag, line.number);
        break;
      case 'EXT-X-TARGETDURATION':
        this.targetDuration = parseDecimal(value, tag, line.number);
        break;
      case 'EXT-X-MEDIA-SEQUENCE':
        this.mediaSequence = parseInteger(value, tag, line.number);
        break;
      case 'EXT-X-DISCONTINUITY-SEQUENCE':
        this.discontinuitySequence = parseInteger(value, tag, line.number);
        break;
      case 'EXT-X-PART-INF': {
        const partTarget = getDecimal(attributes ?? [], 'PART-TARGET', line.number);
        if (partTarget === null) {
          throw new PlaylistParseError('MalformedTag', '#EXT-X-PART-INF requires PART-TARGET', line.number);
        }
        this.partTarget = partTarget;
        break;
      }
      case 'EXT-X-SERVER-CONTROL':
        this.serverControl = parseServerControl(attributes ?? [], line.number);
        break;
      case 'EXT-X-ENDLIST':
        this.endList = true;
        break;
      case 'EXT-X-SKIP':
        this.isDelta = true;
        break;
    }
  }

  private pushSegment(segment: SegmentLine): void {
    this.segments.push(segment);
    this.lines.push(segment);
    this.pending = [];
    this.pendingParts = [];
    this.pendingInf = null;
  }
}

function parseServerControl(attributes: AttributeList, line: number): ServerControl {
  return {
    canSkipUntil: getDecimal(attributes, 'CAN-SKIP-UNTIL', line),
    canSkipDateranges: getFlag(attributes, 'CAN-SKIP-DATERANGES'),
    canBlockReload: getFlag(attributes, 'CAN-BLOCK-RELOAD'),
    holdBack: getDecimal(attributes, 'HOLD-BACK', line),
    partHoldBack: getDecimal(attributes, 'PART-HOLD-BACK', line),
    attributes,
  };
}

function raw(
  line: SourceLine,
  tag: string | null,
  scope: RawLine['scope'],
  attributes: AttributeList | null
): RawLine {
  return { ...line, kind: 'raw', tag, scope, attributes };
}
