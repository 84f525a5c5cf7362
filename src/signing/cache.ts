/**
 * Signing key cache.
 *
 * Deriving a signing key takes four chained HMAC operations, and a key stays
 * valid for one (secret, date, region, service) combination.
 */

import { createHash } from 'crypto';
import type { CacheEntry } from './types.js';

/**
 * Default TTL for cache entries (24 hours in milliseconds).
 */
const DEFAULT_TTL_MS = 24 * 60 * 60 * 1000;

/**
 * Cache for derived Signature V4 signing keys.
 *
 * @example
 * ```typescript
 * const cache = new SigningKeyCache();
 * cache.set('test-secret', '20240101', 'us-east-1', 'dynamodb', key);
 * cache.get('test-secret', '20240101', 'us-east-1', 'dynamodb');
 * ```
 */
export class SigningKeyCache {
  private readonly cache = new Map<string, CacheEntry>();

  /**
   * @param ttlMs - Time-to-live for cache entries in milliseconds
   */
  constructor(private readonly ttlMs: number = DEFAULT_TTL_MS) {}

  /**
   * The secret only takes part as a digest.
   */
  private getCacheKey(secret: string, date: string, region: string, service: string): string {
    const fingerprint = createHash('sha256').update(secret).digest('hex').slice(0, 16);
    return `${fingerprint}:${date}:${region}:${service}`;
  }

  /**
   * Expired entries are swept before each insert.
   */
  set(secret: string, date: string, region: string, service: string, key: Buffer): void {
    this.cleanup();
    this.cache.set(this.getCacheKey(secret, date, region, service), {
      key,
      expiresAt: Date.now() + this.ttlMs,
    });
  }

  /**
   * Returns null when the key is missing or expired.
   */
  get(secret: string, date: string, region: string, service: string): Buffer | null {
    const cacheKey = this.getCacheKey(secret, date, region, service);
    const entry = this.cache.get(cacheKey);

    if (!entry) {
      return null;
    }

    if (Date.now() >= entry.expiresAt) {
      this.cache.delete(cacheKey);
      return null;
    }

    return entry.key;
  }

  /**
   * Remove all expired entries.
   *
   * @returns Number of entries removed
   */
  cleanup(): number {
    const now = Date.now();
    let removed = 0;

    for (const [key, entry] of this.cache.entries()) {
      if (now >= entry.expiresAt) {
        this.cache.delete(key);
        removed++;
      }
    }

    return removed;
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}
