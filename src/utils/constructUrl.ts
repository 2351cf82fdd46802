import { ConstructURLError } from '../error/constructUrlError.js';
import type { QueryParams } from '../types/request.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/** Path of the versioned client API below the server root. */
export const API_PREFIX = '/_matrix/client/api/v1';

/**
 * Resolves a home server URL to the versioned API root.
 *
 * A URL already ending in {@link API_PREFIX} is used verbatim. Otherwise the prefix
 * replaces whatever path the URL had (`https://host/some/path` becomes
 * `https://host/_matrix/client/api/v1`). Input that does not parse as an absolute URL
 * gets its trailing slashes stripped and the prefix appended.
 */
export function normalizeBaseUrl(baseUrl: string): string {
  if (baseUrl.endsWith(API_PREFIX)) {
    return baseUrl;
  }

  const [errUrl, url] = safeWrap(() => new URL(API_PREFIX, baseUrl));
  if (!errUrl) {
    return url.toString();
  }

  return `${baseUrl.replace(/\/+$/, '')}${API_PREFIX}`;
}

/**
 * Fills `{name}` placeholders in a path template with percent-encoded values.
 *
 * Each value is encoded on its own with `encodeURIComponent`, so room IDs such as
 * `!abc:example.org` or state keys containing `/` stay a single segment.
 *
 * @example
 * constructPath('/rooms/{roomId}/send/{eventType}/{txnId}', { roomId: '!a:b', eventType: 'm.room.message', txnId: 0 });
 * // [null, '/rooms/!a%3Ab/send/m.room.message/0']
 */
export function constructPath(template: string, params: Record<string, string | number> = {}): SafeWrap<Error, string> {
  let result = template;
  for (const [key, value] of Object.entries(params)) {
    result = result.split(`{${key}}`).join(encodeURIComponent(String(value)));
  }

  // Encoded values never contain braces, so any left over are unfilled placeholders
  if (result.includes('{') || result.includes('}')) {
    return [new ConstructURLError(`error constructing path, unfilled placeholders in ${result}`, result), null];
  }

  return [null, result];
}

/**
 * Renders query parameters as a search string (without the leading `?`), skipping
 * `undefined` and `null` values.
 */
export function constructQuery(params: QueryParams): string {
  const searchParams = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null) {
      continue;
    }
    searchParams.set(key, String(value));
  }

  return searchParams.toString();
}
