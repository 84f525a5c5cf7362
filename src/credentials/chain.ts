/**
 * Chain credential provider.
 *
 * @module credentials/chain
 */

import type { AwsCredentials, CredentialProvider } from './types.js';
import { CredentialError } from './error.js';
import { EnvironmentCredentialProvider } from './environment.js';

/**
 * Provider that tries several providers in order and returns the first
 * credentials obtained. The provider that succeeded is remembered until its
 * credentials expire.
 *
 * @example
 * ```typescript
 * const provider = new ChainCredentialProvider([
 *   new EnvironmentCredentialProvider(),
 *   new StaticCredentialProvider({ accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' }),
 * ]);
 * ```
 */
export class ChainCredentialProvider implements CredentialProvider {
  private cachedProvider: CredentialProvider | null = null;

  /**
   * @throws {CredentialError} If the chain is empty
   */
  constructor(private readonly providers: readonly CredentialProvider[]) {
    if (providers.length === 0) {
      throw new CredentialError('ChainCredentialProvider requires at least one provider', 'INVALID');
    }
  }

  /**
   * @throws {CredentialError} With code `LOAD_FAILED` if every provider fails
   */
  public async getCredentials(): Promise<AwsCredentials> {
    if (this.cachedProvider && !this.cachedProvider.isExpired?.()) {
      try {
        return await this.cachedProvider.getCredentials();
      } catch {
        this.cachedProvider = null;
      }
    }

    const failures: string[] = [];

    for (const [index, provider] of this.providers.entries()) {
      try {
        const credentials = await provider.getCredentials();
        this.cachedProvider = provider;
        return credentials;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        failures.push(`  ${index + 1}. ${provider.constructor.name}: ${message}`);
      }
    }

    throw new CredentialError(
      `Could not load credentials from any provider in the chain:\n${failures.join('\n')}`,
      'LOAD_FAILED'
    );
  }

  public isExpired(): boolean {
    if (!this.cachedProvider) {
      return true;
    }

    return this.cachedProvider.isExpired?.() ?? false;
  }
}

/**
 * Default chain. Only the environment is consulted; callers needing other
 * sources compose their own chain.
 */
export function defaultProvider(): ChainCredentialProvider {
  return new ChainCredentialProvider([new EnvironmentCredentialProvider()]);
}
