/**
 * DynamoDB client family.
 *
 * @module services/dynamodb
 */

import { ApiDescription } from '../../api/description.js';
import { ServiceClient } from '../../client.js';
import type { ClientOptions } from '../../config/config.js';
import { DynamoDbError } from '../../error/index.js';
import type { RequestInterceptor } from '../../http/types.js';

/**
 * Location of the bundled DynamoDB model.
 */
export const DYNAMODB_MODEL_URL = new URL('../../../models/dynamodb-2012-08-10.json', import.meta.url);

let cachedApi: ApiDescription | undefined;

/**
 * The bundled DynamoDB description, read once.
 */
export function loadDynamoDbApi(): ApiDescription {
  if (!cachedApi) {
    cachedApi = ApiDescription.fromFile(DYNAMODB_MODEL_URL);
  }
  return cachedApi;
}

/**
 * Request uncompressed responses.
 */
export const identityEncoding: RequestInterceptor = (request) => ({
  ...request,
  headers: { ...request.headers, 'accept-encoding': 'identity' },
});

export type DynamoDbClientOptions = Omit<Partial<ClientOptions>, 'api' | 'exceptionClass'>;

/**
 * Create a DynamoDB client raising {@link DynamoDbError}.
 *
 * @example
 * ```typescript
 * const dynamodb = createDynamoDbClient({ region: 'us-east-1' });
 * const { data } = await dynamodb.execute('GetItem', {
 *   TableName: 'users',
 *   Key: { id: { S: 'user-1' } },
 * });
 * ```
 */
export function createDynamoDbClient(options: DynamoDbClientOptions): ServiceClient {
  return new ServiceClient({
    ...options,
    api: loadDynamoDbApi(),
    exceptionClass: DynamoDbError,
    interceptors: [identityEncoding, ...(options.interceptors ?? [])],
  });
}
