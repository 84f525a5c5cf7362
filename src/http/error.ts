/**
 * Transport-level failure types.
 *
 * @module http/error
 */

import type { HttpRequest, HttpResponse } from './types.js';

/**
 * Error raised when a request could not be completed, either because the
 * transport failed (no response) or because the service answered with an
 * error status (response attached).
 *
 * @example
 * ```typescript
 * throw new RequestError('Connection reset', request);
 * ```
 */
export class RequestError extends Error {
  /**
   * The request that failed.
   */
  public readonly request: HttpRequest;

  /**
   * The error response, when the service answered.
   */
  public readonly response?: HttpResponse;

  /**
   * Whether the failure was caused by cancellation.
   */
  public readonly cancelled: boolean;

  constructor(
    message: string,
    request: HttpRequest,
    response?: HttpResponse,
    options: { cancelled?: boolean; cause?: unknown } = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'RequestError';
    this.request = request;
    this.response = response;
    this.cancelled = options.cancelled ?? false;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RequestError);
    }

    Object.setPrototypeOf(this, RequestError.prototype);
  }

  /**
   * Build the error for a response carrying an error status.
   */
  static fromResponse(request: HttpRequest, response: HttpResponse): RequestError {
    const kind = response.status >= 500 ? 'Server' : 'Client';
    return new RequestError(
      `${kind} error response [url] ${request.url} [status code] ${response.status}`,
      request,
      response
    );
  }
}

/**
 * Type guard for {@link RequestError}.
 */
export function isRequestError(error: unknown): error is RequestError {
  return error instanceof RequestError;
}
