/**
 * Tests for credential providers
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { StaticCredentialProvider } from '../static.js';
import { EnvironmentCredentialProvider } from '../environment.js';
import { ChainCredentialProvider } from '../chain.js';
import { CachedCredentialProvider } from '../cache.js';
import { CredentialError } from '../error.js';
import type { CredentialProvider } from '../types.js';

const KEY_PAIR = { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' };

describe('StaticCredentialProvider', () => {
  it('should return a copy of its credentials', async () => {
    const provider = new StaticCredentialProvider(KEY_PAIR);

    const credentials = await provider.getCredentials();

    expect(credentials).toEqual(KEY_PAIR);
    expect(credentials).not.toBe(KEY_PAIR);
  });

  it('should reject an empty access key', () => {
    expect(() => new StaticCredentialProvider({ accessKeyId: ' ', secretAccessKey: 'test-secret' })).toThrow(
      'accessKeyId is required and cannot be empty'
    );
  });

  it('should refuse expired credentials', async () => {
    const provider = new StaticCredentialProvider({ ...KEY_PAIR, expiration: new Date(Date.now() - 1000) });

    expect(provider.isExpired()).toBe(true);
    await expect(provider.getCredentials()).rejects.toMatchObject({ code: 'EXPIRED' });
  });
});

describe('EnvironmentCredentialProvider', () => {
  it('should read and trim the standard variables', async () => {
    const provider = new EnvironmentCredentialProvider({
      AWS_ACCESS_KEY_ID: ' test-access-key ',
      AWS_SECRET_ACCESS_KEY: 'test-secret',
      AWS_SESSION_TOKEN: 'test-session-token',
    });

    expect(await provider.getCredentials()).toEqual({
      accessKeyId: 'test-access-key',
      secretAccessKey: 'test-secret',
      sessionToken: 'test-session-token',
    });
  });

  it('should report a missing access key', async () => {
    const provider = new EnvironmentCredentialProvider({});

    await expect(provider.getCredentials()).rejects.toThrow(
      'AWS_ACCESS_KEY_ID environment variable not set or empty'
    );
  });

  it('should reject an unparseable expiration', async () => {
    const provider = new EnvironmentCredentialProvider({
      AWS_ACCESS_KEY_ID: 'test-access-key',
      AWS_SECRET_ACCESS_KEY: 'test-secret',
      AWS_CREDENTIAL_EXPIRATION: 'soon',
    });

    await expect(provider.getCredentials()).rejects.toMatchObject({ code: 'INVALID' });
  });
});

describe('ChainCredentialProvider', () => {
  it('should return the first credentials obtained', async () => {
    const chain = new ChainCredentialProvider([
      new EnvironmentCredentialProvider({}),
      new StaticCredentialProvider(KEY_PAIR),
    ]);

    expect(await chain.getCredentials()).toEqual(KEY_PAIR);
  });

  it('should remember the provider that succeeded', async () => {
    const failing: CredentialProvider = {
      getCredentials: vi.fn().mockRejectedValue(new CredentialError('nothing here', 'MISSING')),
    };
    const chain = new ChainCredentialProvider([failing, new StaticCredentialProvider(KEY_PAIR)]);

    await chain.getCredentials();
    await chain.getCredentials();

    expect(failing.getCredentials).toHaveBeenCalledTimes(1);
  });

  it('should list every failure when all providers fail', async () => {
    const chain = new ChainCredentialProvider([new EnvironmentCredentialProvider({})]);

    await expect(chain.getCredentials()).rejects.toMatchObject({ code: 'LOAD_FAILED' });
    await expect(chain.getCredentials()).rejects.toThrow(
      'Could not load credentials from any provider in the chain:\n  1. EnvironmentCredentialProvider: AWS_ACCESS_KEY_ID environment variable not set or empty'
    );
  });

  it('should require at least one provider', () => {
    expect(() => new ChainCredentialProvider([])).toThrow(CredentialError);
  });
});

describe('CachedCredentialProvider', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should share one refresh between concurrent callers', async () => {
    const getCredentials = vi.fn().mockResolvedValue(KEY_PAIR);
    const provider = new CachedCredentialProvider({ getCredentials });

    await Promise.all([provider.getCredentials(), provider.getCredentials(), provider.getCredentials()]);

    expect(getCredentials).toHaveBeenCalledTimes(1);
  });

  it('should refresh inside the refresh window', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(Date.UTC(2024, 0, 15, 12, 0, 0)));
    const getCredentials = vi.fn().mockResolvedValue({
      ...KEY_PAIR,
      expiration: new Date(Date.UTC(2024, 0, 15, 12, 10, 0)),
    });
    const provider = new CachedCredentialProvider({ getCredentials }, { refreshBuffer: 5 * 60 * 1000 });

    await provider.getCredentials();
    await provider.getCredentials();
    expect(getCredentials).toHaveBeenCalledTimes(1);

    vi.setSystemTime(new Date(Date.UTC(2024, 0, 15, 12, 6, 0)));
    await provider.getCredentials();
    expect(getCredentials).toHaveBeenCalledTimes(2);
  });

  it('should refresh after the cache is cleared', async () => {
    const getCredentials = vi.fn().mockResolvedValue(KEY_PAIR);
    const provider = new CachedCredentialProvider({ getCredentials });

    await provider.getCredentials();
    provider.clearCache();
    await provider.getCredentials();

    expect(getCredentials).toHaveBeenCalledTimes(2);
  });
});
