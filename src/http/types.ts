/**
 * HTTP types for AWS service API communication.
 *
 * @module http/types
 */

import type { Transaction } from '../command/transaction.js';

/**
 * HTTP methods used by AWS service protocols.
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH' | 'HEAD';

/**
 * HTTP request structure.
 *
 * @example
 * ```typescript
 * const request: HttpRequest = {
 *   method: 'POST',
 *   url: 'https://dynamodb.us-east-1.amazonaws.com/',
 *   headers: {
 *     'content-type': 'application/x-amz-json-1.0',
 *     'x-amz-target': 'DynamoDB_20120810.GetItem'
 *   },
 *   body: '{"TableName":"users"}'
 * };
 * ```
 */
export interface HttpRequest {
  /**
   * HTTP method.
   */
  method: HttpMethod;

  /**
   * Complete URL including protocol, host, path, and query string.
   */
  url: string;

  /**
   * HTTP headers as key-value pairs.
   * Header names are lowercase.
   */
  headers: Record<string, string>;

  /**
   * Request body as a string.
   */
  body?: string;
}

/**
 * HTTP response structure.
 */
export interface HttpResponse {
  /**
   * HTTP status code (e.g., 200, 400, 500).
   */
  status: number;

  /**
   * Response headers, names normalized to lowercase.
   */
  headers: Record<string, string>;

  /**
   * Response body as a string. Empty string if no body is present.
   */
  body: string;
}

/**
 * HTTP client configuration options.
 */
export interface HttpClientConfig {
  /**
   * Per-attempt request timeout in milliseconds.
   *
   * @default 30000 (30 seconds)
   */
  timeout?: number;

  /**
   * Enable HTTP keep-alive for connection reuse.
   *
   * @default true
   */
  keepAlive?: boolean;
}

/**
 * A function run by the transport immediately before each transmission.
 *
 * Interceptors receive the request produced by the previous interceptor and
 * return the request to send. Signing is registered as the last interceptor
 * of every Transaction.
 */
export type RequestInterceptor = (
  request: HttpRequest,
  transaction: Transaction
) => HttpRequest | Promise<HttpRequest>;

/**
 * A pre-send hook bound to one Transaction.
 */
export type BoundInterceptor = (request: HttpRequest) => HttpRequest | Promise<HttpRequest>;

/**
 * Per-send options handed to a transport.
 */
export interface SendOptions {
  /**
   * Hooks applied in order right before each transmission attempt.
   */
  beforeSend?: readonly BoundInterceptor[];

  /**
   * Signal used to cancel the in-flight operation.
   */
  signal?: AbortSignal;
}
