/**
 * Environment variable loading for client options.
 * @module config/environment
 */

import type { ClientOptions } from './config.js';

/**
 * Load options from environment variables.
 *
 * Supported environment variables:
 * - AWS_REGION, falling back to AWS_DEFAULT_REGION
 * - AWS_ENDPOINT_URL: custom endpoint (e.g. a local emulator)
 *
 * Credentials are not read here; the default credential chain reads them
 * when a request is signed.
 */
export function loadOptionsFromEnv(
  env: Record<string, string | undefined> = process.env
): Partial<ClientOptions> {
  const options: Partial<ClientOptions> = {};

  const region = env['AWS_REGION'] || env['AWS_DEFAULT_REGION'];
  if (region) {
    options.region = region;
  }

  const endpoint = env['AWS_ENDPOINT_URL'];
  if (endpoint) {
    options.endpoint = endpoint;
  }

  return options;
}
