/**
 * Environment variable credential provider.
 *
 * @module credentials/environment
 */

import type { AwsCredentials, CredentialProvider } from './types.js';
import { CredentialError } from './error.js';

/**
 * Standard AWS environment variable names for credentials.
 */
export const AWS_ENV_VARS = {
  ACCESS_KEY_ID: 'AWS_ACCESS_KEY_ID',
  SECRET_ACCESS_KEY: 'AWS_SECRET_ACCESS_KEY',
  SESSION_TOKEN: 'AWS_SESSION_TOKEN',
  EXPIRATION: 'AWS_CREDENTIAL_EXPIRATION',
} as const;

/**
 * Provider that reads credentials from `AWS_ACCESS_KEY_ID`,
 * `AWS_SECRET_ACCESS_KEY`, and optionally `AWS_SESSION_TOKEN` and
 * `AWS_CREDENTIAL_EXPIRATION`.
 *
 * Variables are read on every call, so rotated values are picked up.
 */
export class EnvironmentCredentialProvider implements CredentialProvider {
  /**
   * @param env - Environment to read instead of `process.env` (useful for testing)
   */
  constructor(private readonly env: Record<string, string | undefined> = process.env) {}

  /**
   * @throws {CredentialError} If a required variable is unset or empty
   */
  public async getCredentials(): Promise<AwsCredentials> {
    const accessKeyId = this.env[AWS_ENV_VARS.ACCESS_KEY_ID];
    const secretAccessKey = this.env[AWS_ENV_VARS.SECRET_ACCESS_KEY];
    const sessionToken = this.env[AWS_ENV_VARS.SESSION_TOKEN];
    const expiration = this.env[AWS_ENV_VARS.EXPIRATION];

    if (!accessKeyId || accessKeyId.trim() === '') {
      throw new CredentialError(
        `${AWS_ENV_VARS.ACCESS_KEY_ID} environment variable not set or empty`,
        'MISSING'
      );
    }

    if (!secretAccessKey || secretAccessKey.trim() === '') {
      throw new CredentialError(
        `${AWS_ENV_VARS.SECRET_ACCESS_KEY} environment variable not set or empty`,
        'MISSING'
      );
    }

    const credentials: AwsCredentials = {
      accessKeyId: accessKeyId.trim(),
      secretAccessKey: secretAccessKey.trim(),
    };

    if (sessionToken && sessionToken.trim() !== '') {
      credentials.sessionToken = sessionToken.trim();
    }

    if (expiration) {
      const parsed = new Date(expiration);
      if (Number.isNaN(parsed.getTime())) {
        throw new CredentialError(
          `${AWS_ENV_VARS.EXPIRATION} is not a valid date: ${expiration}`,
          'INVALID'
        );
      }
      credentials.expiration = parsed;
    }

    return credentials;
  }

  public isExpired(): boolean {
    const expiration = this.env[AWS_ENV_VARS.EXPIRATION];
    if (!expiration) {
      return false;
    }
    const parsed = new Date(expiration).getTime();
    return !Number.isNaN(parsed) && parsed <= Date.now();
  }
}
