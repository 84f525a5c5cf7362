/**
 * Default client option values.
 * @module config/defaults
 */

/**
 * Default per-attempt timeout in milliseconds.
 */
export const DEFAULT_TIMEOUT = 30000;

/**
 * Default number of retries after the first attempt.
 */
export const DEFAULT_MAX_RETRIES = 3;

export const DEFAULT_SIGNATURE_VERSION = 'v4';

export const DEFAULT_USER_AGENT = 'aws-service-client/0.1.0';

/**
 * Endpoint template; `{endpointPrefix}` and `{region}` are substituted.
 */
export const DEFAULT_ENDPOINT_TEMPLATE = 'https://{endpointPrefix}.{region}.amazonaws.com';

/**
 * Defaults applied by the resolver when an option is omitted.
 */
export const DEFAULT_CLIENT_OPTIONS = Object.freeze({
  timeout: DEFAULT_TIMEOUT,
  maxRetries: DEFAULT_MAX_RETRIES,
  signatureVersion: DEFAULT_SIGNATURE_VERSION,
  userAgent: DEFAULT_USER_AGENT,
  endpointTemplate: DEFAULT_ENDPOINT_TEMPLATE,
  logLevel: 'warn',
} as const);

/**
 * Build the default endpoint for a service and region.
 *
 * @example
 * ```typescript
 * defaultEndpoint('dynamodb', 'eu-west-1'); // 'https://dynamodb.eu-west-1.amazonaws.com'
 * ```
 */
export function defaultEndpoint(endpointPrefix: string, region: string): string {
  return DEFAULT_ENDPOINT_TEMPLATE
    .replace('{endpointPrefix}', endpointPrefix)
    .replace('{region}', region);
}
