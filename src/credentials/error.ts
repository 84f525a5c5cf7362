/**
 * Credential error types.
 *
 * @module credentials/error
 */

/**
 * Error codes for credential operations.
 */
export type CredentialErrorCode =
  | 'MISSING'         // Credentials not found
  | 'INVALID'         // Credentials are malformed
  | 'EXPIRED'         // Credentials have expired
  | 'LOAD_FAILED';    // Every source failed

/**
 * Error class for credential-related failures.
 *
 * @example
 * ```typescript
 * throw new CredentialError(
 *   'AWS_ACCESS_KEY_ID environment variable not set',
 *   'MISSING'
 * );
 * ```
 */
export class CredentialError extends Error {
  public override readonly name = 'CredentialError';

  constructor(
    message: string,
    public readonly code: CredentialErrorCode
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CredentialError);
    }

    Object.setPrototypeOf(this, CredentialError.prototype);
  }

  public override toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

/**
 * Type guard for {@link CredentialError}.
 */
export function isCredentialError(error: unknown): error is CredentialError {
  return error instanceof CredentialError;
}
