/**
 * Signing error types.
 */

/**
 * Error codes for signing operations.
 */
export type SigningErrorCode =
  | 'MISSING_HEADER'
  | 'INVALID_URL'
  | 'UNSUPPORTED_VERSION'
  | 'SIGNING_FAILED';

/**
 * Error thrown during request signing.
 *
 * @example
 * ```typescript
 * throw new SigningError('Missing required header: host', 'MISSING_HEADER');
 * ```
 */
export class SigningError extends Error {
  public readonly code: SigningErrorCode;

  constructor(message: string, code: SigningErrorCode) {
    super(message);
    this.name = 'SigningError';
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SigningError);
    }

    Object.setPrototypeOf(this, SigningError.prototype);
  }

  override toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

/**
 * Type guard for {@link SigningError}.
 */
export function isSigningError(error: unknown): error is SigningError {
  return error instanceof SigningError;
}
