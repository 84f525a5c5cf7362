/**
 * Client configuration.
 * @module config
 */

export type { ClientOptions, ResolvedClientConfig, CredentialsOption } from './config.js';
export { ClientConfigBuilder } from './config.js';
export {
  DEFAULT_CLIENT_OPTIONS,
  DEFAULT_TIMEOUT,
  DEFAULT_MAX_RETRIES,
  DEFAULT_SIGNATURE_VERSION,
  DEFAULT_USER_AGENT,
  DEFAULT_ENDPOINT_TEMPLATE,
  defaultEndpoint,
} from './defaults.js';
export { loadOptionsFromEnv } from './environment.js';
export { resolveClientConfig } from './validation.js';
