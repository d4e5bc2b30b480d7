/**
 * Playlist request classification and cache keys
 */

import {
  HLS_MSN_PARAM,
  HLS_PART_PARAM,
  HLS_SKIP_PARAM,
  canonicalQueryString,
  getParam,
  hasParam,
  isSkipMode,
  parseQueryString,
  withoutParam,
  type DeltaRequest,
  type HandlingMode,
  type PlaylistRequest,
  type PlaylistVariant,
  type QueryPairs,
  type SkipMode,
} from '@llhls-edge/common';

/** Read delivery directives from a query */
export function parseDeltaRequest(query: QueryPairs): DeltaRequest {
  const skip = getParam(query, HLS_SKIP_PARAM);
  return {
    skip: isSkipMode(skip) ? skip : null,
    blockingReload: hasParam(query, HLS_MSN_PARAM) || hasParam(query, HLS_PART_PARAM),
  };
}

/**
 * Decide how to handle a request. Blocking reloads always go to origin, since
 * only the origin knows about segments that are not yet published.
 */
export function classifyRequest(request: DeltaRequest): HandlingMode {
  if (request.blockingReload) return 'forward';
  if (request.skip === null) return 'full';
  return 'delta';
}

/**
 * Key of the full playlist snapshot behind a request. Full and delta requests
 * for the same playlist share it.
 */
export function getSnapshotKey(request: PlaylistRequest): string {
  const query = withoutParam(parseQueryString(request.search), HLS_SKIP_PARAM);
  return `${request.backend}|${request.path}?${canonicalQueryString(query)}`;
}

/** Key of a rendered response variant */
export function getResponseKey(snapshotKey: string, variant: PlaylistVariant, skip: SkipMode): string {
  return `${snapshotKey}#${variant}:${skip}`;
}
