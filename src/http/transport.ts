/**
 * Transport layer abstraction for HTTP communication.
 *
 * The default implementation uses the Fetch API available in Node.js 20. A
 * transport owns socket I/O, connection reuse and low-level retry; the request
 * pipeline only consumes its completion signal.
 *
 * @module http/transport
 */

import type { HttpRequest, HttpResponse, HttpClientConfig, SendOptions, BoundInterceptor } from './types.js';
import { RequestError } from './error.js';
import { ExponentialBackoffRetry, type RetryStrategy, type AttemptOutcome } from '../resilience/retry.js';
import { sleep } from '../util/sleep.js';

/**
 * Transport interface for HTTP communication.
 *
 * Implementations must run `options.beforeSend` in order immediately before
 * every transmission attempt and stop when `options.signal` aborts. Any HTTP
 * status resolves; only failures to obtain a response reject.
 *
 * @example
 * ```typescript
 * class CustomTransport implements Transport {
 *   async send(request: HttpRequest, options?: SendOptions): Promise<HttpResponse> {
 *     const prepared = await applyInterceptors(request, options?.beforeSend);
 *     return { status: 200, headers: {}, body: '' };
 *   }
 * }
 * ```
 */
export interface Transport {
  /**
   * Send an HTTP request and return the response.
   *
   * @throws {RequestError} If no response could be obtained
   */
  send(request: HttpRequest, options?: SendOptions): Promise<HttpResponse>;
}

/**
 * Fetch transport options.
 */
export interface FetchTransportConfig extends HttpClientConfig {
  /**
   * Retry strategy consulted between attempts.
   */
  retry?: RetryStrategy;
}

/**
 * Run pre-send hooks in order, feeding each the previous hook's output.
 */
export async function applyInterceptors(
  request: HttpRequest,
  interceptors: readonly BoundInterceptor[] = []
): Promise<HttpRequest> {
  let current: HttpRequest = { ...request, headers: { ...request.headers } };
  for (const interceptor of interceptors) {
    current = await interceptor(current);
  }
  return current;
}

/**
 * Fetch-based HTTP transport implementation.
 *
 * @example
 * ```typescript
 * const transport = new FetchTransport({
 *   timeout: 30000,
 *   retry: new ExponentialBackoffRetry({ maxAttempts: 5 }),
 * });
 * ```
 */
export class FetchTransport implements Transport {
  private readonly config: Required<HttpClientConfig>;
  private readonly retry: RetryStrategy;

  constructor(config?: FetchTransportConfig) {
    this.config = {
      timeout: config?.timeout ?? 30000,
      keepAlive: config?.keepAlive ?? true,
    };
    this.retry = config?.retry ?? new ExponentialBackoffRetry();
  }

  async send(request: HttpRequest, options: SendOptions = {}): Promise<HttpResponse> {
    for (let attempt = 1; ; attempt++) {
      const prepared = await applyInterceptors(request, options.beforeSend);

      let outcome: AttemptOutcome;
      try {
        outcome = { type: 'response', response: await this.attempt(prepared, options.signal) };
      } catch (error) {
        outcome = { type: 'error', error };
      }

      if (options.signal?.aborted || !this.retry.shouldRetry(attempt, outcome)) {
        if (outcome.type === 'response') {
          return outcome.response;
        }
        throw this.toRequestError(outcome.error, prepared, options.signal);
      }

      try {
        await sleep(this.retry.delayFor(attempt, outcome), options.signal);
      } catch (error) {
        throw this.toRequestError(error, prepared, options.signal);
      }
    }
  }

  /**
   * Get the current transport configuration.
   */
  getConfig(): Readonly<HttpClientConfig> {
    return { ...this.config };
  }

  /**
   * Perform one transmission with a per-attempt timeout.
   */
  private async attempt(request: HttpRequest, signal?: AbortSignal): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);
    const onAbort = (): void => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
        keepalive: this.config.keepAlive,
      });

      const body = await response.text();

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return {
        status: response.status,
        headers,
        body,
      };
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError' && !signal?.aborted) {
        throw new Error(`Request timeout after ${this.config.timeout}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private toRequestError(error: unknown, request: HttpRequest, signal?: AbortSignal): RequestError {
    if (error instanceof RequestError) {
      return error;
    }
    if (signal?.aborted) {
      return new RequestError('Request was cancelled', request, undefined, { cancelled: true, cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new RequestError(`Network error: ${message}`, request, undefined, { cause: error });
  }
}

/**
 * Create a default transport instance.
 */
export function createDefaultTransport(config?: FetchTransportConfig): Transport {
  return new FetchTransport(config);
}
