import { describe, expect, it } from 'vitest';
import {
  canonicalQueryString,
  decodePlaylist,
  encodePlaylist,
  formatMaxAge,
  getParam,
  hasParam,
  isPlaylistPath,
  isSkipMode,
  isValidPathPrefix,
  isValidUri,
  parseQueryString,
  secondsToMicros,
  toQueryString,
  withoutParam,
  withoutRawParam,
} from '../src/utils/index.js';

describe('query helpers', () => {
  const query = parseQueryString('?_HLS_skip=YES&token=abc&_HLS_skip=v2');

  it('parses pairs in order', () => {
    expect(query).toEqual([
      ['_HLS_skip', 'YES'],
      ['token', 'abc'],
      ['_HLS_skip', 'v2'],
    ]);
  });

  it('reads and removes parameters', () => {
    expect(getParam(query, '_HLS_skip')).toBe('YES');
    expect(getParam(query, '_HLS_msn')).toBeNull();
    expect(hasParam(query, 'token')).toBe(true);
    expect(withoutParam(query, '_HLS_skip')).toEqual([['token', 'abc']]);
  });

  it('serializes in order or canonically', () => {
    const pairs = parseQueryString('b=2&a=z&a=y');
    expect(toQueryString(pairs)).toBe('b=2&a=z&a=y');
    expect(canonicalQueryString(pairs)).toBe('a=y&a=z&b=2');
    expect(canonicalQueryString([])).toBe('');
  });

  it('removes a parameter from a raw query string without re-encoding the rest', () => {
    const signed = 'hdnts=exp=1~acl=/*~hmac=ab&_HLS_skip=v2&x=a%20b&_HLS_skip=YES';
    expect(withoutRawParam(signed, '_HLS_skip')).toBe('hdnts=exp=1~acl=/*~hmac=ab&x=a%20b');
    expect(withoutRawParam('?%5FHLS_skip=YES&y=1+2', '_HLS_skip')).toBe('y=1+2');
    expect(withoutRawParam('_HLS_skip=YES', '_HLS_skip')).toBe('');
    expect(withoutRawParam('', '_HLS_skip')).toBe('');
  });
});

describe('encoding', () => {
  it('decodes UTF-8 and keeps a byte order mark', () => {
    const text = '\uFEFF#EXTM3U\n#EXT-X-TITLE:café\n';
    expect(decodePlaylist(encodePlaylist(text))).toBe(text);
  });

  it('rejects bytes that are not UTF-8', () => {
    expect(decodePlaylist(Uint8Array.from([0x23, 0x63, 0x61, 0x66, 0xe9, 0x0a]))).toBeNull();
  });
});

describe('validation', () => {
  it('validates URIs', () => {
    expect(isValidUri('https://origin.test')).toBe(true);
    expect(isValidUri('origin.test')).toBe(false);
    expect(isValidUri('')).toBe(false);
  });

  it('validates path prefixes', () => {
    expect(isValidPathPrefix('/alt')).toBe(true);
    expect(isValidPathPrefix('/')).toBe(false);
    expect(isValidPathPrefix('alt')).toBe(false);
    expect(isValidPathPrefix('/alt/')).toBe(false);
  });

  it('recognizes playlist paths', () => {
    expect(isPlaylistPath('/live/index.m3u8')).toBe(true);
    expect(isPlaylistPath('/live/INDEX.M3U8')).toBe(true);
    expect(isPlaylistPath('/live/seg1.ts')).toBe(false);
  });

  it('accepts only supported skip modes', () => {
    expect(isSkipMode('YES')).toBe(true);
    expect(isSkipMode('v2')).toBe(true);
    expect(isSkipMode('yes')).toBe(false);
    expect(isSkipMode(null)).toBe(false);
  });
});

describe('formatting', () => {
  it('converts seconds to whole microseconds', () => {
    expect(secondsToMicros(2)).toBe(2_000_000);
    expect(secondsToMicros(0.3)).toBe(300_000);
    expect(secondsToMicros(4.004)).toBe(4_004_000);
  });

  it('formats max-age in whole seconds', () => {
    expect(formatMaxAge(1999)).toBe('1');
    expect(formatMaxAge(0)).toBe('0');
    expect(formatMaxAge(-50)).toBe('0');
  });
});
