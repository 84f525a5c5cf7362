/**
 * Credential providers.
 *
 * @module credentials
 */

export type { AwsCredentials, CredentialProvider } from './types.js';
export { isCredentialProvider } from './types.js';
export { CredentialError, isCredentialError } from './error.js';
export type { CredentialErrorCode } from './error.js';
export { StaticCredentialProvider } from './static.js';
export { EnvironmentCredentialProvider, AWS_ENV_VARS } from './environment.js';
export { ChainCredentialProvider, defaultProvider } from './chain.js';
export { CachedCredentialProvider } from './cache.js';
export type { CacheConfig } from './cache.js';
