/**
 * Protocol constants
 */

/** Delta update directive */
export const HLS_SKIP_PARAM = '_HLS_skip';

/** Blocking reload directive: media sequence number */
export const HLS_MSN_PARAM = '_HLS_msn';

/** Blocking reload directive: part index */
export const HLS_PART_PARAM = '_HLS_part';

/** Accepted `_HLS_skip` values */
export const SKIP_MODES = ['YES', 'v2'] as const;

/** Skip boundary must be at least this many target durations */
export const MIN_SKIP_TARGET_DURATIONS = 6;

/** Default playlist MIME type */
export const PLAYLIST_CONTENT_TYPE = 'application/vnd.apple.mpegurl';

/** Response header naming the variant served */
export const VARIANT_HEADER = 'X-Playlist-Variant';

/** Response header reporting an edge cache hit or miss */
export const CACHE_STATUS_HEADER = 'X-Cache';

/** Response header set when a stale snapshot was served after an origin failure */
export const STALE_HEADER = 'X-Stale';

/** Status used when the origin gave no usable status */
export const DEFAULT_UPSTREAM_ERROR_STATUS = 502;

/** Name of the primary backend */
export const BACKEND_NAME = 'video_backend';

/** Name of the alternate backend */
export const BACKEND_ALT = 'video_backend_alt';

/** Path prefix routing requests to the alternate backend */
export const DEFAULT_ALT_PATH_PREFIX = '/alt';

/** Snapshot freshness when the origin sends no max-age (LL-HLS playlists change every part) */
export const DEFAULT_PLAYLIST_TTL_MS = 1000;

/** How long an expired snapshot may stand in for a failed origin fetch */
export const DEFAULT_STALE_IF_ERROR_MS = 10_000;

/** Origin fetch timeout */
export const DEFAULT_ORIGIN_TIMEOUT_MS = 5000;

/**
 * Origin timeout for forwarded blocking reloads. The origin may hold these for
 * up to three target durations before answering.
 */
export const DEFAULT_BLOCKING_RELOAD_TIMEOUT_MS = 30_000;

/** Default listen port */
export const DEFAULT_PORT = 8080;
