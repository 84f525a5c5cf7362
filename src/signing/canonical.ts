/**
 * Canonical request building for Signature Version 4.
 *
 * @see https://docs.aws.amazon.com/IAM/latest/UserGuide/create-signed-request.html
 */

import { SigningError } from './error.js';

/**
 * URI encode a string the way Signature V4 expects: every byte except the
 * unreserved characters (A-Z, a-z, 0-9, '-', '_', '.', '~') is
 * percent-encoded, and space becomes %20.
 *
 * @example
 * ```typescript
 * uriEncode('hello world');          // 'hello%20world'
 * uriEncode('path/to/file', false);  // 'path/to/file'
 * uriEncode('path/to/file');         // 'path%2Fto%2Ffile'
 * ```
 */
export function uriEncode(input: string, encodeSlash: boolean = true): string {
  const encoded = encodeURIComponent(input)
    .replace(/!/g, '%21')
    .replace(/'/g, '%27')
    .replace(/\(/g, '%28')
    .replace(/\)/g, '%29')
    .replace(/\*/g, '%2A');

  return encodeSlash ? encoded : encoded.replace(/%2F/g, '/');
}

/**
 * Normalize a URI path: drop empty and '.' segments, resolve '..', encode
 * each segment, keep a trailing slash.
 *
 * @example
 * ```typescript
 * normalizeUriPath('');                        // '/'
 * normalizeUriPath('/path//to///resource');    // '/path/to/resource'
 * normalizeUriPath('/path/./to/../resource');  // '/path/resource'
 * ```
 */
export function normalizeUriPath(path: string): string {
  if (!path || path === '/') {
    return '/';
  }

  const normalized: string[] = [];

  for (const segment of path.split('/')) {
    if (segment === '' || segment === '.') {
      continue;
    }
    if (segment === '..') {
      normalized.pop();
      continue;
    }
    // Segments arrive percent-encoded from URL.pathname
    normalized.push(uriEncode(safeDecode(segment), false));
  }

  let result = '/' + normalized.join('/');

  if (path.endsWith('/') && !result.endsWith('/')) {
    result += '/';
  }

  return result;
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Byte-order comparison (Signature V4 sorts by code point, not locale).
 */
function compareCodePoints(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Create the canonical query string: encoded pairs sorted by name, then
 * value, joined with '&'.
 *
 * @example
 * ```typescript
 * canonicalQueryString(new URLSearchParams('foo=bar&baz=qux')); // 'baz=qux&foo=bar'
 * ```
 */
export function canonicalQueryString(params: URLSearchParams): string {
  const pairs: Array<[string, string]> = [];

  for (const [key, value] of params.entries()) {
    pairs.push([uriEncode(key), uriEncode(value)]);
  }

  pairs.sort((a, b) => compareCodePoints(a[0], b[0]) || compareCodePoints(a[1], b[1]));

  return pairs.map(([key, value]) => `${key}=${value}`).join('&');
}

/**
 * Header names always included in the signature.
 */
const SIGNED_HEADERS = new Set(['host', 'content-type', 'content-md5']);

/**
 * Whether a header takes part in the signature: host, content-type,
 * content-md5 and every x-amz-* header. Authorization and user-agent never do.
 *
 * @example
 * ```typescript
 * shouldSignHeader('host');          // true
 * shouldSignHeader('X-Amz-Target');  // true
 * shouldSignHeader('user-agent');    // false
 * ```
 */
export function shouldSignHeader(name: string): boolean {
  const lowerName = name.toLowerCase();

  if (lowerName === 'authorization' || lowerName === 'user-agent') {
    return false;
  }

  return SIGNED_HEADERS.has(lowerName) || lowerName.startsWith('x-amz-');
}

/**
 * Build the canonical headers block and the signed headers list.
 *
 * @throws {SigningError} If the host header is missing
 *
 * @example
 * ```typescript
 * canonicalHeaders({
 *   'Host': 'dynamodb.us-east-1.amazonaws.com',
 *   'X-Amz-Date': '20240101T000000Z',
 * });
 * // canonical: 'host:dynamodb.us-east-1.amazonaws.com\nx-amz-date:20240101T000000Z\n'
 * // signed: 'host;x-amz-date'
 * ```
 */
export function canonicalHeaders(
  headers: Record<string, string>
): { canonical: string; signed: string } {
  const headerMap = new Map<string, string>();

  for (const [name, value] of Object.entries(headers)) {
    if (!shouldSignHeader(name)) {
      continue;
    }

    const lowerName = name.toLowerCase();
    const normalizedValue = value.trim().replace(/\s+/g, ' ');
    const existing = headerMap.get(lowerName);
    headerMap.set(lowerName, existing !== undefined ? `${existing},${normalizedValue}` : normalizedValue);
  }

  if (!headerMap.has('host')) {
    throw new SigningError('Missing required header: host', 'MISSING_HEADER');
  }

  const sortedHeaders = Array.from(headerMap.entries()).sort((a, b) => compareCodePoints(a[0], b[0]));

  return {
    canonical: sortedHeaders.map(([name, value]) => `${name}:${value}`).join('\n') + '\n',
    signed: sortedHeaders.map(([name]) => name).join(';'),
  };
}
