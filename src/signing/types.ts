/**
 * Signing types.
 */

import type { HttpRequest } from '../http/types.js';
import type { AwsCredentials } from '../credentials/types.js';

/**
 * Parameters required for signing a request with Signature Version 4.
 */
export interface SigningParams {
  /** AWS region (e.g., "us-east-1") */
  region: string;
  /** Service signing name (e.g., "dynamodb") */
  service: string;
  /** Credentials snapshot used for this signature */
  credentials: AwsCredentials;
  /** Signing time (defaults to now) */
  date?: Date;
}

/**
 * Strategy that attaches authentication data to a serialized request.
 */
export interface Signer {
  /**
   * Return a signed copy of the request.
   */
  signRequest(request: HttpRequest, credentials: AwsCredentials): Promise<HttpRequest>;
}

/**
 * Resolves a signer for a (signature version, signing name, region) triple.
 * Returns null when the version is unknown.
 */
export type SignatureProvider = (
  signatureVersion: string,
  signingName: string,
  region: string
) => Signer | null;

/**
 * Signing key cache entry.
 */
export interface CacheEntry {
  /** Derived signing key */
  key: Buffer;
  /** Entry expiration time (epoch milliseconds) */
  expiresAt: number;
}
