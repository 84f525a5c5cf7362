/**
 * Static credential provider.
 *
 * @module credentials/static
 */

import type { AwsCredentials, CredentialProvider } from './types.js';
import { CredentialError } from './error.js';

/**
 * Provider that returns a fixed set of credentials.
 *
 * @example
 * ```typescript
 * const provider = new StaticCredentialProvider({
 *   accessKeyId: 'test-access-key',
 *   secretAccessKey: 'test-secret',
 * });
 * ```
 */
export class StaticCredentialProvider implements CredentialProvider {
  private readonly credentials: AwsCredentials;

  /**
   * @throws {CredentialError} If the key pair is empty
   */
  constructor(credentials: AwsCredentials) {
    if (!credentials.accessKeyId || credentials.accessKeyId.trim() === '') {
      throw new CredentialError('accessKeyId is required and cannot be empty', 'INVALID');
    }

    if (!credentials.secretAccessKey || credentials.secretAccessKey.trim() === '') {
      throw new CredentialError('secretAccessKey is required and cannot be empty', 'INVALID');
    }

    this.credentials = { ...credentials };
  }

  /**
   * @throws {CredentialError} If the credentials have expired
   */
  public async getCredentials(): Promise<AwsCredentials> {
    if (this.isExpired()) {
      throw new CredentialError('Credentials have expired', 'EXPIRED');
    }

    return { ...this.credentials };
  }

  public isExpired(): boolean {
    if (!this.credentials.expiration) {
      return false;
    }

    return this.credentials.expiration.getTime() <= Date.now();
  }
}
