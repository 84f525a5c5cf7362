/**
 * Service description contracts.
 *
 * @module api/types
 */

import type { HttpMethod } from '../http/types.js';

/**
 * Service-wide metadata.
 */
export interface ServiceMetadata {
  /** Human-readable service name, e.g. "Amazon DynamoDB" */
  serviceFullName: string;
  /** Hostname prefix for the default endpoint */
  endpointPrefix: string;
  apiVersion: string;
  /** Wire protocol name, e.g. "json" */
  protocol: string;
  /** JSON protocol version, e.g. "1.0" */
  jsonVersion?: string;
  /** Prefix of the x-amz-target header value */
  targetPrefix?: string;
  /** Signature version, e.g. "v4" */
  signatureVersion?: string;
  /** Service name used in the credential scope, when it differs from the endpoint prefix */
  signingName?: string;
}

export interface OperationDescription {
  name: string;
  http: {
    method: HttpMethod;
    requestUri: string;
  };
  documentation?: string;
}

/**
 * Cursor pagination rules for one operation. Input and output tokens are
 * paired by position.
 */
export interface PaginationTemplate {
  inputToken: readonly string[];
  outputToken: readonly string[];
  resultKey: readonly string[];
  limitKey?: string;
  /** Path to a flag that must be truthy for another page to exist */
  moreResults?: string;
}

export type WaiterState = 'success' | 'failure' | 'retry';

export type AcceptorMatcher = 'path' | 'pathAll' | 'pathAny' | 'status' | 'error';

/**
 * One rule mapping an attempt's outcome to a waiter state.
 */
export interface Acceptor {
  state: WaiterState;
  matcher: AcceptorMatcher;
  /** Path expression, for the path matchers */
  argument?: string;
  expected?: unknown;
}

/**
 * Polling rules for one waiter.
 */
export interface WaiterTemplate {
  /** Operation polled on every attempt */
  operation: string;
  /** Seconds between attempts */
  delay: number;
  maxAttempts: number;
  acceptors: readonly Acceptor[];
}

/**
 * Read-only service model shared by every Transaction of a client.
 */
export interface ServiceDescription {
  readonly metadata: ServiceMetadata;

  hasOperation(name: string): boolean;

  getOperation(name: string): OperationDescription | undefined;

  operationNames(): string[];

  /**
   * Pagination rules for an operation, if it is paginated.
   */
  paginationTemplate(operation: string): PaginationTemplate | undefined;

  /**
   * Waiter rules by waiter name.
   */
  waitTemplate(name: string): WaiterTemplate | undefined;

  /**
   * Name used in the signing credential scope.
   */
  signingName(): string;
}
