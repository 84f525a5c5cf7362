/**
 * Credential types.
 *
 * @module credentials/types
 */

/**
 * AWS security credentials used to sign requests.
 *
 * Long-term credentials carry only the key pair; temporary credentials add
 * a session token and an expiration.
 */
export interface AwsCredentials {
  /** Access key ID */
  accessKeyId: string;
  /** Secret access key */
  secretAccessKey: string;
  /** Session token for temporary credentials */
  sessionToken?: string;
  /** When temporary credentials stop being valid */
  expiration?: Date;
}

/**
 * Source of credentials.
 *
 * The pipeline reads a provider at signing time and never mutates what it
 * returns, so a provider may hand out refreshed credentials between calls.
 */
export interface CredentialProvider {
  /**
   * Retrieve the current credentials.
   *
   * @throws {CredentialError} If credentials cannot be retrieved
   */
  getCredentials(): Promise<AwsCredentials>;

  /**
   * Whether the credentials held by the provider are expired.
   */
  isExpired?(): boolean;
}

/**
 * Type guard for credential providers.
 */
export function isCredentialProvider(value: unknown): value is CredentialProvider {
  return (
    typeof value === 'object' &&
    value !== null &&
    'getCredentials' in value &&
    typeof value.getCredentials === 'function'
  );
}
