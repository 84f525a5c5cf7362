/**
 * AWS Signature Version 4 (SigV4) implementation.
 *
 * @see https://docs.aws.amazon.com/IAM/latest/UserGuide/reference_sigv.html
 */

import { createHash, createHmac } from 'crypto';
import { canonicalHeaders, canonicalQueryString, normalizeUriPath } from './canonical.js';
import { SigningKeyCache } from './cache.js';
import { SigningError } from './error.js';
import type { SigningParams } from './types.js';
import type { HttpRequest } from '../http/types.js';

/**
 * Signature V4 algorithm identifier.
 */
export const ALGORITHM = 'AWS4-HMAC-SHA256';

const AWS4_REQUEST = 'aws4_request';

const signingKeyCache = new SigningKeyCache();

function sha256Hex(data: string): string {
  return createHash('sha256').update(data, 'utf8').digest('hex');
}

function hmacSha256(key: Buffer | string, data: string): Buffer {
  return createHmac('sha256', key).update(data, 'utf8').digest();
}

/**
 * Format a date as YYYYMMDD.
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10).replace(/-/g, '');
}

/**
 * Format a date as YYYYMMDDTHHMMSSZ.
 */
export function formatDateTime(date: Date): string {
  return date.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}/, '');
}

/**
 * Create the canonical request string.
 *
 * ```
 * HTTPMethod \n CanonicalURI \n CanonicalQueryString \n
 * CanonicalHeaders \n SignedHeaders \n HashedPayload
 * ```
 */
export function createCanonicalRequest(
  method: string,
  path: string,
  query: string,
  headers: string,
  signedHeaders: string,
  payloadHash: string
): string {
  return [
    method.toUpperCase(),
    normalizeUriPath(path),
    query,
    headers,
    signedHeaders,
    payloadHash,
  ].join('\n');
}

/**
 * Create the string to sign.
 *
 * ```
 * Algorithm \n RequestDateTime \n CredentialScope \n HashedCanonicalRequest
 * ```
 */
export function createStringToSign(
  datetime: string,
  scope: string,
  canonicalRequestHash: string
): string {
  return [ALGORITHM, datetime, scope, canonicalRequestHash].join('\n');
}

/**
 * Derive the signing key:
 * 1. kDate = HMAC("AWS4" + secret, date)
 * 2. kRegion = HMAC(kDate, region)
 * 3. kService = HMAC(kRegion, service)
 * 4. kSigning = HMAC(kService, "aws4_request")
 */
export function deriveSigningKey(
  secret: string,
  date: string,
  region: string,
  service: string
): Buffer {
  const cached = signingKeyCache.get(secret, date, region, service);
  if (cached) {
    return cached;
  }

  const kDate = hmacSha256(`AWS4${secret}`, date);
  const kRegion = hmacSha256(kDate, region);
  const kService = hmacSha256(kRegion, service);
  const kSigning = hmacSha256(kService, AWS4_REQUEST);

  signingKeyCache.set(secret, date, region, service, kSigning);

  return kSigning;
}

/**
 * Calculate the hex-encoded signature.
 */
export function calculateSignature(signingKey: Buffer, stringToSign: string): string {
  return createHmac('sha256', signingKey).update(stringToSign, 'utf8').digest('hex');
}

/**
 * Build the Authorization header value.
 */
export function buildAuthorizationHeader(
  accessKeyId: string,
  credentialScope: string,
  signedHeaders: string,
  signature: string
): string {
  return [
    `${ALGORITHM} Credential=${accessKeyId}/${credentialScope}`,
    `SignedHeaders=${signedHeaders}`,
    `Signature=${signature}`,
  ].join(', ');
}

/**
 * Sign a serialized request with Signature Version 4.
 *
 * Adds `host`, `x-amz-date`, `x-amz-content-sha256`, `x-amz-security-token`
 * (for temporary credentials) and `authorization`. Previous signing headers
 * are replaced, so a request may be signed again on retry.
 *
 * @throws {SigningError} If the URL is invalid or signing fails
 *
 * @example
 * ```typescript
 * const signed = signRequest(request, {
 *   region: 'us-east-1',
 *   service: 'dynamodb',
 *   credentials: { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' },
 * });
 * signed.headers['authorization']; // 'AWS4-HMAC-SHA256 Credential=test-access-key/...'
 * ```
 */
export function signRequest(request: HttpRequest, params: SigningParams): HttpRequest {
  let url: URL;
  try {
    url = new URL(request.url);
  } catch (error) {
    throw new SigningError(
      `Invalid request URL: ${error instanceof Error ? error.message : String(error)}`,
      'INVALID_URL'
    );
  }

  try {
    const date = params.date ?? new Date();
    const dateStr = formatDate(date);
    const datetime = formatDateTime(date);

    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(request.headers)) {
      const lowerName = name.toLowerCase();
      if (lowerName !== 'authorization' && lowerName !== 'x-amz-security-token') {
        headers[lowerName] = value;
      }
    }

    headers['host'] = url.host;
    headers['x-amz-date'] = datetime;

    if (params.credentials.sessionToken) {
      headers['x-amz-security-token'] = params.credentials.sessionToken;
    }

    const payloadHash = sha256Hex(request.body ?? '');
    headers['x-amz-content-sha256'] = payloadHash;

    const { canonical, signed } = canonicalHeaders(headers);

    const canonicalRequest = createCanonicalRequest(
      request.method,
      url.pathname,
      canonicalQueryString(url.searchParams),
      canonical,
      signed,
      payloadHash
    );

    const credentialScope = `${dateStr}/${params.region}/${params.service}/${AWS4_REQUEST}`;
    const stringToSign = createStringToSign(datetime, credentialScope, sha256Hex(canonicalRequest));

    const signingKey = deriveSigningKey(
      params.credentials.secretAccessKey,
      dateStr,
      params.region,
      params.service
    );

    headers['authorization'] = buildAuthorizationHeader(
      params.credentials.accessKeyId,
      credentialScope,
      signed,
      calculateSignature(signingKey, stringToSign)
    );

    return { ...request, url: url.toString(), headers };
  } catch (error) {
    if (error instanceof SigningError) {
      throw error;
    }

    throw new SigningError(
      `Failed to sign request: ${error instanceof Error ? error.message : String(error)}`,
      'SIGNING_FAILED'
    );
  }
}

/**
 * Get the process-wide signing key cache.
 */
export function getSigningKeyCache(): SigningKeyCache {
  return signingKeyCache;
}
