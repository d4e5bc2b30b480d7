/**
 * Custom error classes for the LL-HLS delta edge
 */

/** Base error class for edge errors */
export class EdgeError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EdgeError';
  }
}

/** Kinds of playlist parse failure */
export type ParseErrorKind = 'NotM3U8' | 'MalformedTag' | 'UnexpectedEOF' | 'AttributeSyntax';

/** Playlist text could not be parsed */
export class PlaylistParseError extends EdgeError {
  constructor(
    public kind: ParseErrorKind,
    message: string,
    public line: number
  ) {
    super(`${message} (line ${line})`, 'PLAYLIST_PARSE_ERROR', { kind, line });
    this.name = 'PlaylistParseError';
  }
}

/** Origin fetch failed or returned a non-2xx status */
export class FetchError extends EdgeError {
  constructor(
    message: string,
    public status: number | null,
    public backend: string,
    public path: string
  ) {
    super(message, 'FETCH_ERROR', { status, backend, path });
    this.name = 'FetchError';
  }
}

/** Renderer was asked for an output it cannot produce */
export class RenderInvariantError extends EdgeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'RENDER_INVARIANT', details);
    this.name = 'RenderInvariantError';
  }
}

/** Invalid configuration value */
export class ConfigError extends EdgeError {
  constructor(variable: string, value: string) {
    super(`Invalid value for ${variable}: ${value}`, 'CONFIG_ERROR', { variable, value });
    this.name = 'ConfigError';
  }
}
