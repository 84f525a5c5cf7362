/**
 * Signer strategies and the signature provider that selects one per client.
 */

import type { HttpRequest, RequestInterceptor } from '../http/types.js';
import type { AwsCredentials, CredentialProvider } from '../credentials/types.js';
import type { SignatureProvider, Signer } from './types.js';
import { signRequest } from './v4.js';

/**
 * Signature Version 4 signer bound to one signing name and region.
 */
export class SignatureV4 implements Signer {
  constructor(
    public readonly service: string,
    public readonly region: string
  ) {}

  async signRequest(request: HttpRequest, credentials: AwsCredentials): Promise<HttpRequest> {
    return signRequest(request, {
      region: this.region,
      service: this.service,
      credentials,
    });
  }
}

/**
 * Signer for operations that accept unauthenticated requests.
 */
export class AnonymousSigner implements Signer {
  async signRequest(request: HttpRequest): Promise<HttpRequest> {
    return request;
  }
}

type SignerFactory = (signingName: string, region: string) => Signer;

const SIGNERS: Record<string, SignerFactory> = {
  v4: (signingName, region) => new SignatureV4(signingName, region),
  anonymous: () => new AnonymousSigner(),
};

/**
 * Create a signature provider that memoizes one signer per
 * (version, signing name, region).
 *
 * @example
 * ```typescript
 * const provider = createSignatureProvider();
 * provider('v4', 'dynamodb', 'us-east-1') === provider('v4', 'dynamodb', 'us-east-1'); // true
 * ```
 */
export function createSignatureProvider(
  factories: Record<string, SignerFactory> = SIGNERS
): SignatureProvider {
  const cache = new Map<string, Signer>();

  return (signatureVersion, signingName, region) => {
    const key = `${signatureVersion}:${signingName}:${region}`;
    const cached = cache.get(key);
    if (cached) {
      return cached;
    }

    const factory = factories[signatureVersion];
    if (!factory) {
      return null;
    }

    const signer = factory(signingName, region);
    cache.set(key, signer);
    return signer;
  };
}

/**
 * Shared default provider.
 */
export const defaultSignatureProvider: SignatureProvider = createSignatureProvider();

/**
 * Build the per-request signing hook.
 *
 * Credentials are read when the hook runs, immediately before transmission,
 * so a refreshing provider is honoured between calls and between retries.
 * With no credential provider (anonymous clients) the request is left as is.
 */
export function createSigningInterceptor(
  signer: Signer,
  credentials: CredentialProvider | null
): RequestInterceptor {
  return async (request) => {
    if (!credentials) {
      return request;
    }
    return signer.signRequest(request, await credentials.getCredentials());
  };
}
