/**
 * Test fixtures: a small service description and client factory.
 */

import { ApiDescription, type ApiDocument } from '../api/description.js';
import { ServiceClient } from '../client.js';
import type { ClientOptions } from '../config/config.js';
import { NoopLogger } from '../observability/logging.js';
import { MockTransport } from './mock-transport.js';

/**
 * Placeholder credentials for signing in tests.
 */
export const TEST_CREDENTIALS = Object.freeze({
  accessKeyId: 'test-access-key',
  secretAccessKey: 'test-secret',
});

/**
 * Model of a fictional "things" service exercising pagination and waiting.
 */
export const THINGS_MODEL: ApiDocument = {
  metadata: {
    serviceFullName: 'Example Things Service',
    endpointPrefix: 'things',
    apiVersion: '2024-01-01',
    protocol: 'json',
    jsonVersion: '1.1',
    targetPrefix: 'Things_20240101',
    signatureVersion: 'v4',
  },
  operations: {
    ListThings: { name: 'ListThings' },
    DescribeThing: { name: 'DescribeThing' },
    GetThing: { name: 'GetThing' },
    ListParts: { name: 'ListParts' },
  },
  paginators: {
    ListThings: {
      input_token: 'NextToken',
      output_token: 'NextToken',
      limit_key: 'MaxResults',
      result_key: 'Things',
    },
    ListParts: {
      result_key: 'Parts',
    },
  },
  waiters: {
    ThingReady: {
      operation: 'DescribeThing',
      delay: 0,
      maxAttempts: 3,
      acceptors: [
        { state: 'success', matcher: 'path', argument: 'Status', expected: 'DONE' },
        { state: 'failure', matcher: 'path', argument: 'Status', expected: 'ERROR' },
        { state: 'retry', matcher: 'error', expected: 'ThingNotFoundException' },
      ],
    },
  },
};

export function createThingsApi(): ApiDescription {
  return ApiDescription.fromDocument(THINGS_MODEL);
}

/**
 * Client wired to a mock transport, with quiet logging and placeholder
 * credentials.
 */
export function createTestClient(
  overrides: Partial<ClientOptions> = {}
): { client: ServiceClient; transport: MockTransport } {
  const transport = overrides.transport instanceof MockTransport ? overrides.transport : new MockTransport();
  const client = new ServiceClient({
    region: 'us-east-1',
    api: createThingsApi(),
    credentials: { ...TEST_CREDENTIALS },
    logger: new NoopLogger(),
    ...overrides,
    transport,
  });
  return { client, transport };
}
