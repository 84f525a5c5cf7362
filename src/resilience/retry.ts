/**
 * Retry strategy used by the transport, with exponential backoff and jitter.
 *
 * The pipeline never retries on its own; a transport consults its strategy
 * between attempts, re-running the pre-send hooks (and so re-signing) on
 * every attempt.
 */

import type { HttpResponse } from '../http/types.js';

/**
 * Configuration for retry behavior.
 */
export interface RetryConfig {
  /** Maximum number of attempts, including the first one */
  maxAttempts: number;
  /** Base delay in milliseconds before the first retry */
  baseDelayMs: number;
  /** Maximum delay in milliseconds between retries */
  maxDelayMs: number;
  /** Jitter factor (0-1) adding randomness to delays */
  jitterFactor?: number;
}

/**
 * Outcome of one transmission attempt, as seen by a retry strategy.
 */
export type AttemptOutcome =
  | { readonly type: 'response'; readonly response: HttpResponse }
  | { readonly type: 'error'; readonly error: unknown };

/**
 * Pluggable retry policy.
 */
export interface RetryStrategy {
  /**
   * Whether another attempt should follow the given (1-indexed) attempt.
   */
  shouldRetry(attempt: number, outcome: AttemptOutcome): boolean;

  /**
   * Delay in milliseconds to wait before the next attempt.
   */
  delayFor(attempt: number, outcome: AttemptOutcome): number;
}

/**
 * Error codes that indicate throttling.
 */
const THROTTLING_CODES = new Set([
  'Throttling',
  'ThrottlingException',
  'ThrottledException',
  'RequestThrottledException',
  'TooManyRequestsException',
  'ProvisionedThroughputExceededException',
  'TransactionInProgressException',
  'RequestLimitExceeded',
  'BandwidthLimitExceeded',
  'LimitExceededException',
  'RequestThrottled',
  'SlowDown',
  'PriorRequestNotComplete',
  'EC2ThrottledException',
]);

/**
 * Whether an error code denotes throttling.
 */
export function isThrottlingCode(code: string | undefined): boolean {
  return code !== undefined && THROTTLING_CODES.has(code);
}

/**
 * Statuses treated as transient.
 */
const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

/**
 * Pull the error code out of a JSON error body, if any.
 */
function throttlingCode(response: HttpResponse): string | undefined {
  const header = response.headers['x-amzn-errortype'];
  let type = header;

  if (!type && response.body) {
    try {
      const parsed: unknown = JSON.parse(response.body);
      if (parsed && typeof parsed === 'object' && '__type' in parsed && typeof parsed.__type === 'string') {
        type = parsed.__type;
      }
    } catch {
      return undefined;
    }
  }

  if (!type) {
    return undefined;
  }

  const code = type.split('#').pop()?.split(':')[0];
  return isThrottlingCode(code) ? code : undefined;
}

/**
 * Exponential backoff retry strategy.
 *
 * - Retries network failures (except cancellations)
 * - Retries 429/5xx responses and throttling error codes
 * - Uses a shorter base delay for throttling responses
 * - Adds jitter to avoid synchronized retries
 */
export class ExponentialBackoffRetry implements RetryStrategy {
  private readonly config: RetryConfig;

  constructor(config: Partial<RetryConfig> = {}) {
    this.config = { ...createDefaultRetryConfig(), ...config };
  }

  shouldRetry(attempt: number, outcome: AttemptOutcome): boolean {
    if (attempt >= this.config.maxAttempts) {
      return false;
    }

    if (outcome.type === 'error') {
      return !(outcome.error instanceof Error && outcome.error.name === 'AbortError');
    }

    const { response } = outcome;
    return RETRYABLE_STATUSES.has(response.status) ||
      (response.status === 400 && throttlingCode(response) !== undefined);
  }

  delayFor(attempt: number, outcome: AttemptOutcome): number {
    const throttled = outcome.type === 'response' &&
      (outcome.response.status === 429 || throttlingCode(outcome.response) !== undefined);

    // Throttling uses half the configured base delay
    const baseDelay = throttled ? this.config.baseDelayMs / 2 : this.config.baseDelayMs;
    const exponentialDelay = baseDelay * Math.pow(2, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);

    const jitterFactor = this.config.jitterFactor ?? 0.5;
    const jitter = cappedDelay * Math.random() * jitterFactor;

    return Math.floor(cappedDelay + jitter);
  }

  /**
   * Get the active retry configuration.
   */
  getConfig(): Readonly<RetryConfig> {
    return { ...this.config };
  }
}

/**
 * Strategy that never retries.
 */
export const NO_RETRY: RetryStrategy = {
  shouldRetry: () => false,
  delayFor: () => 0,
};

/**
 * Default retry configuration.
 *
 * - maxAttempts: 3
 * - baseDelayMs: 100
 * - maxDelayMs: 20000
 * - jitterFactor: 0.5
 */
export function createDefaultRetryConfig(): RetryConfig {
  return {
    maxAttempts: 3,
    baseDelayMs: 100,
    maxDelayMs: 20000,
    jitterFactor: 0.5,
  };
}
