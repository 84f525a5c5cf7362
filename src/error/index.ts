/**
 * Typed errors surfaced to callers.
 *
 * Every failure that leaves a client call is a {@link ServiceError} (or a
 * family subclass), a {@link PreconditionError} raised before any request is
 * sent, or a {@link WaiterError}.
 *
 * @module error
 */

import type { Transaction } from '../command/transaction.js';
import { isThrottlingCode } from '../resilience/retry.js';

/**
 * Normalized error fields extracted from a service error response.
 */
export interface ServiceErrorFields {
  /** Service error code, e.g. `ResourceNotFoundException` */
  code?: string;
  /** `client` for 4xx responses, `server` for 5xx */
  type?: string;
  message?: string;
  requestId?: string;
}

/**
 * How a {@link ServiceError} came about.
 *
 * - `SERVICE`: the service answered with an error response
 * - `TRANSPORT`: no response was obtained (network, timeout, cancellation)
 * - `UNEXPECTED`: an uncaught failure inside the pipeline
 */
export type ServiceErrorKind = 'SERVICE' | 'TRANSPORT' | 'UNEXPECTED';

/**
 * Options accepted by {@link ServiceError} and its subclasses.
 */
export interface ServiceErrorOptions {
  kind: ServiceErrorKind;
  transaction?: Transaction;
  cause?: unknown;
}

/**
 * Constructor signature for the service error class a client family raises.
 */
export type ServiceErrorConstructor = new (message: string, options: ServiceErrorOptions) => ServiceError;

/**
 * Typed error carrying the originating Transaction.
 *
 * @example
 * ```typescript
 * try {
 *   await client.execute('GetItem', { TableName: 'missing' });
 * } catch (error) {
 *   if (isServiceError(error)) {
 *     console.log(error.errorCode, error.statusCode, error.requestId);
 *   }
 * }
 * ```
 */
export class ServiceError extends Error {
  public readonly kind: ServiceErrorKind;
  public readonly transaction?: Transaction;
  public override readonly cause?: unknown;

  constructor(message: string, options: ServiceErrorOptions) {
    super(message);
    this.name = 'ServiceError';
    this.kind = options.kind;
    this.transaction = options.transaction;
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
    Object.setPrototypeOf(this, new.target.prototype);
  }

  private get fields(): ServiceErrorFields {
    return this.transaction?.context.serviceError ?? {};
  }

  /** Service error code, when the response carried one */
  get errorCode(): string | undefined {
    return this.fields.code;
  }

  /** `client` or `server`, when known */
  get errorType(): string | undefined {
    return this.fields.type;
  }

  /** Message reported by the service */
  get errorMessage(): string | undefined {
    return this.fields.message;
  }

  get requestId(): string | undefined {
    return this.fields.requestId ?? this.transaction?.response?.headers['x-amzn-requestid'];
  }

  get statusCode(): number | undefined {
    return this.transaction?.response?.status;
  }

  get url(): string | undefined {
    return this.transaction?.request?.url;
  }

  get operation(): string | undefined {
    return this.transaction?.command.name;
  }

  /**
   * Whether repeating the call might succeed.
   */
  get retryable(): boolean {
    if (this.kind === 'TRANSPORT') {
      return true;
    }
    const status = this.statusCode;
    if (status === undefined) {
      return false;
    }
    return status === 429 || status >= 500 || isThrottlingCode(this.errorCode);
  }

  override toString(): string {
    const code = this.errorCode ? ` [${this.errorCode}]` : '';
    return `${this.name}${code}: ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      kind: this.kind,
      operation: this.operation,
      errorCode: this.errorCode,
      errorType: this.errorType,
      errorMessage: this.errorMessage,
      requestId: this.requestId,
      statusCode: this.statusCode,
      url: this.url,
      retryable: this.retryable,
    };
  }
}

/**
 * Service error raised by DynamoDB clients.
 */
export class DynamoDbError extends ServiceError {
  constructor(message: string, options: ServiceErrorOptions) {
    super(message, options);
    this.name = 'DynamoDbError';
  }

  /**
   * Whether a conditional write was rejected.
   */
  get isConditionalCheckFailed(): boolean {
    return this.errorCode === 'ConditionalCheckFailedException';
  }
}

/**
 * Precondition error codes.
 */
export type PreconditionErrorCode =
  | 'OPERATION_NOT_FOUND'
  | 'PAGINATION_UNSUPPORTED'
  | 'WAITER_UNSUPPORTED'
  | 'PAGINATOR_CONSUMED'
  | 'INVALID_CONFIG';

/**
 * Raised before any request is sent when a call cannot be attempted.
 */
export class PreconditionError extends Error {
  constructor(
    message: string,
    public readonly code: PreconditionErrorCode
  ) {
    super(message);
    this.name = 'PreconditionError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
    Object.setPrototypeOf(this, new.target.prototype);
  }

  override toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

/**
 * Why a waiter stopped without reaching its success state.
 */
export type WaiterErrorReason = 'failure' | 'timeout';

/**
 * Raised when a waiter hits a failure acceptor or runs out of attempts.
 */
export class WaiterError extends Error {
  constructor(
    message: string,
    public readonly reason: WaiterErrorReason,
    public readonly waiter: string,
    public readonly attempts: number,
    public readonly lastResult?: unknown
  ) {
    super(message);
    this.name = 'WaiterError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
    Object.setPrototypeOf(this, new.target.prototype);
  }

  override toString(): string {
    return `${this.name} [${this.reason}]: ${this.message}`;
  }
}

export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}

export function isPreconditionError(error: unknown): error is PreconditionError {
  return error instanceof PreconditionError;
}

export function isWaiterError(error: unknown): error is WaiterError {
  return error instanceof WaiterError;
}
