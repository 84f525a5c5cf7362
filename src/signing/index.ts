/**
 * AWS Signature Version 4 signing.
 *
 * @example
 * ```typescript
 * import { signRequest } from './signing/index.js';
 *
 * const signed = signRequest(
 *   { method: 'POST', url: 'https://dynamodb.us-east-1.amazonaws.com/', headers: {}, body: '{}' },
 *   {
 *     region: 'us-east-1',
 *     service: 'dynamodb',
 *     credentials: { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' },
 *   }
 * );
 * ```
 *
 * @module signing
 */

export {
  signRequest,
  createCanonicalRequest,
  createStringToSign,
  calculateSignature,
  deriveSigningKey,
  buildAuthorizationHeader,
  getSigningKeyCache,
  formatDate,
  formatDateTime,
  ALGORITHM,
} from './v4.js';

export {
  uriEncode,
  normalizeUriPath,
  canonicalQueryString,
  canonicalHeaders,
  shouldSignHeader,
} from './canonical.js';

export { SigningKeyCache } from './cache.js';

export {
  SignatureV4,
  AnonymousSigner,
  createSignatureProvider,
  defaultSignatureProvider,
  createSigningInterceptor,
} from './provider.js';

export { SigningError, isSigningError } from './error.js';
export type { SigningErrorCode } from './error.js';

export type { SigningParams, Signer, SignatureProvider, CacheEntry } from './types.js';
