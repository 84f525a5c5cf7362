/**
 * Tests for client option resolution
 */

import { describe, it, expect } from 'vitest';
import { resolveClientConfig } from '../validation.js';
import { ClientConfigBuilder } from '../config.js';
import { loadOptionsFromEnv } from '../environment.js';
import { defaultEndpoint } from '../defaults.js';
import { ApiDescription } from '../../api/description.js';
import { ChainCredentialProvider } from '../../credentials/chain.js';
import { StaticCredentialProvider } from '../../credentials/static.js';
import { PreconditionError, ServiceError } from '../../error/index.js';
import { FetchTransport } from '../../http/transport.js';
import type { RequestInterceptor } from '../../http/types.js';
import { ConsoleLogger } from '../../observability/logging.js';
import { parseJsonError, parseJsonResult } from '../../protocol/json.js';
import { THINGS_MODEL, TEST_CREDENTIALS, createThingsApi } from '../../testing/fixtures.js';

function expectInvalid(run: () => unknown, message: string): void {
  try {
    run();
  } catch (error) {
    expect(error).toBeInstanceOf(PreconditionError);
    expect(error).toMatchObject({ code: 'INVALID_CONFIG', message });
    return;
  }
  throw new Error('expected resolution to fail');
}

describe('resolveClientConfig', () => {
  it('should name a missing region', () => {
    expectInvalid(() => resolveClientConfig({ api: createThingsApi() }), 'Invalid client option "region": Required');
  });

  it('should name a missing service description', () => {
    expectInvalid(
      () => resolveClientConfig({ region: 'us-east-1' }),
      'Invalid client option "api": Expected a service description'
    );
  });

  it('should reject an invalid endpoint', () => {
    expectInvalid(
      () => resolveClientConfig({ region: 'us-east-1', api: createThingsApi(), endpoint: 'not a url' }),
      'Invalid client option "endpoint": Invalid url'
    );
  });

  it('should reject malformed static credentials', () => {
    expect(() =>
      resolveClientConfig({
        region: 'us-east-1',
        api: createThingsApi(),
        credentials: { accessKeyId: '', secretAccessKey: 'test-secret' },
      })
    ).toThrow(/^Invalid client option "credentials"/);
  });

  it('should fill in defaults', () => {
    const config = resolveClientConfig({ region: 'us-east-1', api: createThingsApi() });

    expect(config.endpoint).toBe('https://things.us-east-1.amazonaws.com');
    expect(config.signatureVersion).toBe('v4');
    expect(config.timeout).toBe(30000);
    expect(config.maxRetries).toBe(3);
    expect(config.userAgent).toBe('aws-service-client/0.1.0');
    expect(config.exceptionClass).toBe(ServiceError);
    expect(config.defaults).toEqual({});
    expect(config.interceptors).toEqual([]);
    expect(config.credentials).toBeInstanceOf(ChainCredentialProvider);
    expect(config.transport).toBeInstanceOf(FetchTransport);
    expect(config.logger).toBeInstanceOf(ConsoleLogger);
    expect(config.resultParser).toBe(parseJsonResult);
    expect(config.errorParser).toBe(parseJsonError);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should configure the default transport from timeout and maxRetries', () => {
    const config = resolveClientConfig({ region: 'us-east-1', api: createThingsApi(), timeout: 5000, maxRetries: 0 });

    expect(config.transport).toBeInstanceOf(FetchTransport);
    if (config.transport instanceof FetchTransport) {
      expect(config.transport.getConfig().timeout).toBe(5000);
    }
  });

  it('should strip a trailing slash from a custom endpoint', () => {
    const config = resolveClientConfig({
      region: 'us-east-1',
      api: createThingsApi(),
      endpoint: 'http://localhost:8000/',
    });

    expect(config.endpoint).toBe('http://localhost:8000');
  });

  it('should wrap static credentials in a provider', () => {
    const config = resolveClientConfig({ region: 'us-east-1', api: createThingsApi(), credentials: TEST_CREDENTIALS });

    expect(config.credentials).toBeInstanceOf(StaticCredentialProvider);
  });

  it('should resolve anonymous clients to no credential provider', () => {
    const config = resolveClientConfig({ region: 'us-east-1', api: createThingsApi(), credentials: false });

    expect(config.credentials).toBeNull();
  });

  it('should reject an unknown signature version', () => {
    expectInvalid(
      () => resolveClientConfig({ region: 'us-east-1', api: createThingsApi(), signatureVersion: 'v2' }),
      'Invalid client option "signatureVersion": Unsupported signature version "v2"'
    );
  });

  it('should require codecs for an unknown protocol', () => {
    const api = ApiDescription.fromDocument({
      ...THINGS_MODEL,
      metadata: { ...THINGS_MODEL.metadata, protocol: 'query' },
    });

    expectInvalid(
      () => resolveClientConfig({ region: 'us-east-1', api }),
      'Invalid client option "serializer": No codec available for protocol "query"'
    );
  });

  it('should accept supplied codecs for an unknown protocol', () => {
    const api = ApiDescription.fromDocument({
      ...THINGS_MODEL,
      metadata: { ...THINGS_MODEL.metadata, protocol: 'query' },
    });
    const serializer = () => ({ method: 'GET' as const, url: 'https://things.us-east-1.amazonaws.com/', headers: {} });

    const config = resolveClientConfig({
      region: 'us-east-1',
      api,
      serializer,
      resultParser: parseJsonResult,
      errorParser: parseJsonError,
    });

    expect(config.serializer).toBe(serializer);
  });
});

describe('defaultEndpoint', () => {
  it('should substitute prefix and region', () => {
    expect(defaultEndpoint('dynamodb', 'eu-west-1')).toBe('https://dynamodb.eu-west-1.amazonaws.com');
  });
});

describe('loadOptionsFromEnv', () => {
  it('should prefer AWS_REGION over AWS_DEFAULT_REGION', () => {
    expect(loadOptionsFromEnv({ AWS_REGION: 'us-west-2', AWS_DEFAULT_REGION: 'eu-west-1' })).toEqual({
      region: 'us-west-2',
    });
  });

  it('should read the endpoint override', () => {
    expect(loadOptionsFromEnv({ AWS_DEFAULT_REGION: 'eu-west-1', AWS_ENDPOINT_URL: 'http://localhost:8000' })).toEqual({
      region: 'eu-west-1',
      endpoint: 'http://localhost:8000',
    });
  });

  it('should return nothing for an empty environment', () => {
    expect(loadOptionsFromEnv({})).toEqual({});
  });
});

describe('ClientConfigBuilder', () => {
  it('should collect options fluently', () => {
    const api = createThingsApi();

    const options = new ClientConfigBuilder()
      .fromEnv({ AWS_REGION: 'us-west-2' })
      .withApi(api)
      .withStaticCredentials('test-access-key', 'test-secret')
      .withDefaults({ MaxResults: 10 })
      .withTimeout(1000)
      .build();

    expect(options).toEqual({
      region: 'us-west-2',
      api,
      credentials: { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret', sessionToken: undefined },
      defaults: { MaxResults: 10 },
      timeout: 1000,
    });
    expect(resolveClientConfig(options).region).toBe('us-west-2');
  });

  it('should append interceptors in order', () => {
    const a: RequestInterceptor = (request) => request;
    const b: RequestInterceptor = (request) => ({ ...request, body: '' });

    const options = new ClientConfigBuilder().withInterceptor(a).withInterceptor(b).build();

    expect(options.interceptors).toEqual([a, b]);
  });

  it('should start from existing options', () => {
    const options = ClientConfigBuilder.from({ region: 'us-east-1' }).withAnonymousCredentials().build();

    expect(options).toEqual({ region: 'us-east-1', credentials: false });
  });
});
