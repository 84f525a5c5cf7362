/**
 * Request-execution core for AWS-style service clients.
 *
 * @example
 * ```typescript
 * import { createDynamoDbClient, isServiceError } from 'aws-service-client';
 *
 * const dynamodb = createDynamoDbClient({ region: 'us-east-1' });
 *
 * try {
 *   const result = await dynamodb.execute('GetItem', {
 *     TableName: 'users',
 *     Key: { id: { S: 'user-1' } },
 *   });
 *   console.log(result.get('Item'));
 * } catch (error) {
 *   if (isServiceError(error)) {
 *     console.error(error.errorCode, error.errorMessage);
 *   }
 * }
 * ```
 *
 * @packageDocumentation
 */

export { ServiceClient } from './client.js';

export * from './api/index.js';
export * from './command/index.js';
export * from './config/index.js';
export * from './credentials/index.js';
export * from './error/index.js';
export { FutureResult } from './future/index.js';
export * from './http/index.js';
export * from './observability/index.js';
export * from './pagination/index.js';
export * from './pipeline/index.js';
export * from './protocol/index.js';
export * from './resilience/index.js';
export * from './signing/index.js';
export { searchPath, isTruthy } from './util/path.js';
export * from './waiter/index.js';

export {
  createDynamoDbClient,
  loadDynamoDbApi,
  identityEncoding,
  DYNAMODB_MODEL_URL,
} from './services/dynamodb/index.js';
export type { DynamoDbClientOptions } from './services/dynamodb/index.js';
