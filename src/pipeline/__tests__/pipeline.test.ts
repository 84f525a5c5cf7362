/**
 * Tests for the request pipeline and response translator
 */

import { describe, it, expect, vi, type Mock } from 'vitest';
import { RequestPipeline } from '../pipeline.js';
import { ServiceError } from '../../error/index.js';
import { RequestError } from '../../http/error.js';
import type { RequestInterceptor } from '../../http/types.js';
import type { Logger } from '../../observability/logging.js';
import { createTestClient } from '../../testing/fixtures.js';
import { MockTransport } from '../../testing/mock-transport.js';
import type { ClientOptions } from '../../config/config.js';

function setup(overrides: Partial<ClientOptions> = {}) {
  const { client, transport } = createTestClient(overrides);
  const pipeline = new RequestPipeline(client, client.getConfig());
  return { client, transport, pipeline };
}

function createRecordingLogger(): { [K in keyof Logger]: Mock } {
  return {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
  };
}

describe('RequestPipeline', () => {
  it('should resolve a successful call with a result', async () => {
    const transport = new MockTransport().enqueue({ status: 200, body: { Things: ['a', 'b'] } });
    const { client, pipeline } = setup({ transport });

    const transaction = await pipeline.execute(client.getCommand('ListThings'));

    expect(transaction.error).toBeUndefined();
    expect(transaction.exception).toBeUndefined();
    expect(transaction.response?.status).toBe(200);
    expect(transaction.request?.url).toBe('https://things.us-east-1.amazonaws.com/');
    expect(transaction.result?.data).toEqual({ Things: ['a', 'b'] });
    expect(transaction.result?.metadata.requestId).toBe('mock-request-id');
  });

  it('should translate an error response into a service error', async () => {
    const transport = new MockTransport().enqueue({
      status: 400,
      body: { __type: 'com.example#ThingNotFoundException', message: 'No such thing' },
    });
    const { client, pipeline } = setup({ transport });

    const transaction = await pipeline.execute(client.getCommand('GetThing', { Id: 'missing' }));

    expect(transaction.result).toBeUndefined();
    expect(transaction.exception).toBeInstanceOf(RequestError);
    expect(transaction.error).toBeInstanceOf(ServiceError);
    expect(transaction.error?.message).toBe(
      'Error executing GetThing on "https://things.us-east-1.amazonaws.com/"; ThingNotFoundException (client error): No such thing'
    );
    expect(transaction.error?.kind).toBe('SERVICE');
    expect(transaction.context.serviceError).toEqual({
      type: 'client',
      requestId: 'mock-request-id',
      code: 'ThingNotFoundException',
      message: 'No such thing',
    });
  });

  it('should keep the transport message when the error parser finds no type', async () => {
    const transport = new MockTransport().enqueue({ status: 400, body: 'bad' });
    const { client, pipeline } = setup({ transport, errorParser: () => ({}) });

    const transaction = await pipeline.execute(client.getCommand('GetThing'));

    expect(transaction.error?.message).toBe(
      'Error executing GetThing on "https://things.us-east-1.amazonaws.com/"; Client error response [url] https://things.us-east-1.amazonaws.com/ [status code] 400'
    );
    expect(transaction.error?.errorCode).toBeUndefined();
  });

  it('should keep the transport message for an unparsable error body', async () => {
    const transport = new MockTransport().enqueue({ status: 503, body: '<html>Service Unavailable</html>' });
    const { client, pipeline } = setup({ transport });

    const transaction = await pipeline.execute(client.getCommand('ListThings'));

    expect(transaction.error?.message).toBe(
      'Error executing ListThings on "https://things.us-east-1.amazonaws.com/"; Server error response [url] https://things.us-east-1.amazonaws.com/ [status code] 503'
    );
    expect(transaction.error?.kind).toBe('SERVICE');
    expect(transaction.error?.errorCode).toBeUndefined();
    expect(transaction.error?.errorType).toBeUndefined();
    expect(transaction.error?.statusCode).toBe(503);
    expect(transaction.error?.retryable).toBe(true);
  });

  it('should report transport failures', async () => {
    const transport = new MockTransport().enqueue({ error: new Error('socket hang up') });
    const { client, pipeline } = setup({ transport });

    const transaction = await pipeline.execute(client.getCommand('ListThings'));

    expect(transaction.response).toBeUndefined();
    expect(transaction.error?.message).toBe(
      'Error executing ListThings on "https://things.us-east-1.amazonaws.com/"; Network error: socket hang up'
    );
    expect(transaction.error?.kind).toBe('TRANSPORT');
    expect(transaction.error?.retryable).toBe(true);
  });

  it('should wrap result parsing failures as uncaught', async () => {
    const transport = new MockTransport().enqueue({ status: 200, body: '[]' });
    const { client, pipeline } = setup({ transport });

    const transaction = await pipeline.execute(client.getCommand('ListThings'));

    expect(transaction.result).toBeUndefined();
    expect(transaction.error?.kind).toBe('UNEXPECTED');
    expect(transaction.error?.message).toBe(
      'Uncaught exception while executing Example Things Service.ListThings - Expected a JSON object in the response body'
    );
  });

  it('should wrap interceptor failures as uncaught', async () => {
    const failing: RequestInterceptor = () => {
      throw new Error('boom');
    };
    const { client, transport, pipeline } = setup({ interceptors: [failing] });

    const transaction = await pipeline.execute(client.getCommand('ListThings'));

    expect(transaction.error?.message).toBe(
      'Uncaught exception while executing Example Things Service.ListThings - boom'
    );
    expect(transaction.exception).toBeInstanceOf(Error);
    expect(transport.getRecordedRequests()).toHaveLength(0);
  });

  it('should wrap credential failures as uncaught', async () => {
    const { client, pipeline } = setup({
      credentials: {
        getCredentials: async () => {
          throw new Error('No credentials available');
        },
      },
    });

    const transaction = await pipeline.execute(client.getCommand('ListThings'));

    expect(transaction.error?.kind).toBe('UNEXPECTED');
    expect(transaction.error?.message).toBe(
      'Uncaught exception while executing Example Things Service.ListThings - No credentials available'
    );
  });

  it('should run client hooks, then command hooks, then signing', async () => {
    const seen: string[] = [];
    const clientHook: RequestInterceptor = (request) => {
      seen.push('client');
      return { ...request, headers: { ...request.headers, 'x-amz-meta-stage': 'client' } };
    };
    const commandHook: RequestInterceptor = (request) => {
      seen.push(`command:${request.headers['x-amz-meta-stage'] ?? ''}`);
      expect(request.headers['authorization']).toBeUndefined();
      return { ...request, headers: { ...request.headers, 'x-amz-meta-stage': 'command' } };
    };
    const { client, transport, pipeline } = setup({ interceptors: [clientHook] });

    const transaction = await pipeline.execute(
      client.getCommand('ListThings', {}, { interceptors: [commandHook] })
    );

    expect(transaction.error).toBeUndefined();
    expect(transaction.interceptors).toHaveLength(3);
    expect(seen).toEqual(['client', 'command:client']);

    const sent = transport.lastRequest()?.request;
    expect(sent?.headers['x-amz-meta-stage']).toBe('command');
    expect(sent?.headers['authorization']).toContain(
      'SignedHeaders=content-type;host;x-amz-content-sha256;x-amz-date;x-amz-meta-stage;x-amz-target, '
    );
  });

  it('should hand each hook the owning transaction', async () => {
    const hook = vi.fn<Parameters<RequestInterceptor>, ReturnType<RequestInterceptor>>((request) => request);
    const { client, pipeline } = setup({ interceptors: [hook] });

    const transaction = await pipeline.execute(client.getCommand('ListThings'));

    expect(hook).toHaveBeenCalledTimes(1);
    expect(hook.mock.calls[0]?.[1]).toBe(transaction);
  });

  it('should log completed operations at debug level', async () => {
    const logger = createRecordingLogger();
    const { client, pipeline } = setup({ logger });

    await pipeline.execute(client.getCommand('ListThings'));

    expect(logger.debug).toHaveBeenCalledWith('Operation completed', {
      service: 'Example Things Service',
      operation: 'ListThings',
      statusCode: 200,
      durationMs: expect.any(Number),
    });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should log failed operations at warn level', async () => {
    const logger = createRecordingLogger();
    const transport = new MockTransport().enqueue({ error: new Error('socket hang up') });
    const { client, pipeline } = setup({ logger, transport });

    await pipeline.execute(client.getCommand('ListThings'));

    expect(logger.warn).toHaveBeenCalledWith('Operation failed', {
      service: 'Example Things Service',
      operation: 'ListThings',
      errorName: 'ServiceError',
      errorMessage:
        'Error executing ListThings on "https://things.us-east-1.amazonaws.com/"; Network error: socket hang up',
    });
  });
});

describe('ResponseTranslator', () => {
  it('should leave a resolved transaction untouched', async () => {
    const transport = new MockTransport().enqueue({ status: 500, body: { __type: 'InternalError' } });
    const { client, pipeline } = setup({ transport });
    const transaction = await pipeline.execute(client.getCommand('ListThings'));
    const error = transaction.error;

    await pipeline.getTranslator().resolve(transaction);

    expect(transaction.error).toBe(error);
    expect(error?.errorType).toBe('server');
    expect(error?.retryable).toBe(true);
  });

  it('should pass service errors through translate unchanged', async () => {
    const { client, pipeline } = setup();
    const transaction = pipeline.createTransaction(client.getCommand('ListThings'));
    const existing = new ServiceError('already translated', { kind: 'SERVICE', transaction });

    expect(pipeline.getTranslator().translate(transaction, existing)).toBe(existing);
    expect(pipeline.getTranslator().wrapUncaught(transaction, existing)).toBe(existing);
  });

  it('should fail resolution when no response was received', async () => {
    const { client, pipeline } = setup();
    const transaction = pipeline.createTransaction(client.getCommand('ListThings'));

    await expect(pipeline.getTranslator().resolve(transaction)).rejects.toThrow('No response was received.');
  });

  it('should translate non-request failures with an empty url', () => {
    const { client, pipeline } = setup();
    const transaction = pipeline.createTransaction(client.getCommand('ListThings'));

    const error = pipeline.getTranslator().translate(transaction, new Error('disk full'));

    expect(error.message).toBe('Error executing ListThings on ""; disk full');
    expect(error.kind).toBe('TRANSPORT');
  });
});
