/**
 * Canonical request construction for Signature V4
 */

import { PreconditionError } from '../errors/index.js';
import type { CanonicalRequest, QueryParams } from './types.js';

/**
 * Payload hash announcing a chunk-signed streaming body
 */
export const STREAMING_PAYLOAD = 'STREAMING-AWS4-HMAC-SHA256-PAYLOAD';

/**
 * URI encode following RFC 3986: everything except A-Z a-z 0-9 - _ . ~ is
 * percent-encoded from its UTF-8 bytes.
 */
export function uriEncode(str: string, encodeSlash = true): string {
  const encoded = encodeURIComponent(str).replace(
    /[!'()*]/g,
    (char) => '%' + char.charCodeAt(0).toString(16).toUpperCase()
  );
  return encodeSlash ? encoded : encoded.replace(/%2F/g, '/');
}

/**
 * URI encode a path, keeping the slashes between segments
 */
export function uriEncodePath(path: string): string {
  return path
    .split('/')
    .map((segment) => uriEncode(segment))
    .join('/');
}

function isPairList(params: QueryParams): params is ReadonlyArray<readonly [string, string]> {
  return Array.isArray(params);
}

function comparePairs(a: readonly [string, string], b: readonly [string, string]): number {
  if (a[0] !== b[0]) return a[0] < b[0] ? -1 : 1;
  if (a[1] !== b[1]) return a[1] < b[1] ? -1 : 1;
  return 0;
}

/**
 * Builds the canonical request.
 *
 * The URI must already be an absolute path; it is not fixed up here so the
 * transport and the signer can never disagree about it. Header names are
 * lower-cased and values kept verbatim.
 *
 * @throws {PreconditionError} For a relative URI or header names that
 * collide after lower-casing
 */
export function buildCanonicalRequest(
  method: string,
  uri: string,
  queryParams: QueryParams,
  headers: Readonly<Record<string, string>>,
  payloadHash: string
): CanonicalRequest {
  if (!uri.startsWith('/')) {
    throw PreconditionError.relativeUri(uri);
  }

  const lowered = new Map<string, string>();
  for (const [name, value] of Object.entries(headers)) {
    const lowerName = name.toLowerCase();
    if (lowered.has(lowerName)) {
      throw PreconditionError.duplicateHeader(lowerName);
    }
    lowered.set(lowerName, value);
  }

  const pairs = isPairList(queryParams) ? queryParams : Object.entries(queryParams);

  return {
    method: method.toUpperCase(),
    uri,
    queryParams: pairs.map(([name, value]): readonly [string, string] => [name, value]),
    headers: Object.fromEntries(lowered),
    payloadHash,
  };
}

/**
 * Get canonical query string: names and values URI-encoded, sorted by name
 * then value, joined with '&'
 */
export function getCanonicalQueryString(
  queryParams: ReadonlyArray<readonly [string, string]>
): string {
  return queryParams
    .map(([name, value]): readonly [string, string] => [uriEncode(name), uriEncode(value)])
    .sort(comparePairs)
    .map(([name, value]) => `${name}=${value}`)
    .join('&');
}

/**
 * Sorted lowercase names of the headers a canonical request signs
 */
export function signedHeaderNames(request: CanonicalRequest): string[] {
  return Object.keys(request.headers).sort();
}

/**
 * Get canonical headers block: one `name:value` line per header, sorted by
 * name, each terminated by a newline
 */
export function getCanonicalHeaders(request: CanonicalRequest): string {
  return signedHeaderNames(request)
    .map((name) => `${name}:${request.headers[name]}\n`)
    .join('');
}

/**
 * Serialises the canonical request.
 * Format:
 * HTTP_METHOD\n
 * CANONICAL_URI\n
 * CANONICAL_QUERY_STRING\n
 * CANONICAL_HEADERS\n
 * SIGNED_HEADERS\n
 * PAYLOAD_HASH
 */
export function serializeCanonicalRequest(request: CanonicalRequest): string {
  return [
    request.method,
    request.uri,
    getCanonicalQueryString(request.queryParams),
    getCanonicalHeaders(request),
    signedHeaderNames(request).join(';'),
    request.payloadHash,
  ].join('\n');
}
