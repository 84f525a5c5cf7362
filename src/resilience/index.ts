export { ExponentialBackoffRetry, NO_RETRY, createDefaultRetryConfig, isThrottlingCode } from './retry.js';
export type { RetryConfig, RetryStrategy, AttemptOutcome } from './retry.js';
