/**
 * Cached credential provider.
 *
 * @module credentials/cache
 */

import type { AwsCredentials, CredentialProvider } from './types.js';

/**
 * Configuration for {@link CachedCredentialProvider}.
 */
export interface CacheConfig {
  /**
   * Lifetime of credentials that carry no expiration, in milliseconds.
   *
   * @default 3600000 (1 hour)
   */
  ttl?: number;

  /**
   * Refresh this many milliseconds before expiration.
   *
   * @default 300000 (5 minutes)
   */
  refreshBuffer?: number;
}

interface CachedCredential {
  credentials: AwsCredentials;
  expiresAt: number;
}

const DEFAULT_REFRESH_BUFFER = 5 * 60 * 1000;
const DEFAULT_TTL = 60 * 60 * 1000;

/**
 * Wraps a provider, caching its credentials and refreshing them shortly
 * before they expire. Concurrent callers share one in-flight refresh.
 *
 * @example
 * ```typescript
 * const provider = new CachedCredentialProvider(new EnvironmentCredentialProvider(), {
 *   refreshBuffer: 60_000,
 * });
 * ```
 */
export class CachedCredentialProvider implements CredentialProvider {
  private cache: CachedCredential | null = null;
  private refreshPromise: Promise<AwsCredentials> | null = null;
  private readonly ttl: number;
  private readonly refreshBuffer: number;

  constructor(
    private readonly provider: CredentialProvider,
    config: CacheConfig = {}
  ) {
    this.ttl = config.ttl ?? DEFAULT_TTL;
    this.refreshBuffer = config.refreshBuffer ?? DEFAULT_REFRESH_BUFFER;
  }

  public async getCredentials(): Promise<AwsCredentials> {
    if (this.cache && !this.isExpired()) {
      return { ...this.cache.credentials };
    }

    if (!this.refreshPromise) {
      this.refreshPromise = this.refresh().finally(() => {
        this.refreshPromise = null;
      });
    }

    return this.refreshPromise;
  }

  /**
   * True when the cache is empty, expired, or inside the refresh window.
   */
  public isExpired(): boolean {
    if (!this.cache) {
      return true;
    }

    return Date.now() >= this.cache.expiresAt - this.refreshBuffer;
  }

  /**
   * Drop cached credentials so the next call refreshes.
   */
  public clearCache(): void {
    this.cache = null;
  }

  private async refresh(): Promise<AwsCredentials> {
    try {
      const credentials = await this.provider.getCredentials();
      const expiresAt = credentials.expiration
        ? credentials.expiration.getTime()
        : Date.now() + this.ttl;

      this.cache = { credentials, expiresAt };
      return { ...credentials };
    } catch (error) {
      this.cache = null;
      throw error;
    }
  }
}
