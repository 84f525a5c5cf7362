/**
 * Client option validation and resolution.
 * @module config/validation
 */

import { z } from 'zod';
import type { ServiceDescription } from '../api/types.js';
import type { ClientOptions, CredentialsOption, ResolvedClientConfig } from './config.js';
import {
  DEFAULT_CLIENT_OPTIONS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_SIGNATURE_VERSION,
  DEFAULT_TIMEOUT,
  DEFAULT_USER_AGENT,
  defaultEndpoint,
} from './defaults.js';
import { defaultProvider } from '../credentials/chain.js';
import { StaticCredentialProvider } from '../credentials/static.js';
import { isCredentialProvider, type CredentialProvider } from '../credentials/types.js';
import { PreconditionError, ServiceError, type ServiceErrorConstructor } from '../error/index.js';
import type { RequestInterceptor } from '../http/types.js';
import { FetchTransport, type Transport } from '../http/transport.js';
import { ConsoleLogger, type Logger } from '../observability/logging.js';
import { getProtocol } from '../protocol/index.js';
import type { ErrorParser, ResultParser, Serializer } from '../protocol/types.js';
import { ExponentialBackoffRetry } from '../resilience/retry.js';
import { defaultSignatureProvider } from '../signing/provider.js';
import type { SignatureProvider } from '../signing/types.js';

function isFunction(value: unknown): boolean {
  return typeof value === 'function';
}

function hasMethods(value: unknown, ...names: string[]): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    names.every((name) => isFunction(Reflect.get(value, name)))
  );
}

const functionOf = <T>(what: string) => z.custom<T>(isFunction, { message: `Expected ${what} function` });

const staticCredentialsSchema = z.object({
  accessKeyId: z.string().min(1),
  secretAccessKey: z.string().min(1),
  sessionToken: z.string().optional(),
  expiration: z.date().optional(),
});

const clientOptionsSchema = z.object({
  region: z.string().min(1),
  api: z.custom<ServiceDescription>(
    (value) => hasMethods(value, 'hasOperation', 'getOperation', 'paginationTemplate', 'waitTemplate', 'signingName'),
    { message: 'Expected a service description' }
  ),
  credentials: z
    .union([
      z.literal(false),
      z.custom<CredentialProvider>(isCredentialProvider),
      staticCredentialsSchema,
    ])
    .optional(),
  endpoint: z.string().url().optional(),
  serializer: functionOf<Serializer>('a serializer').optional(),
  resultParser: functionOf<ResultParser>('a result parser').optional(),
  errorParser: functionOf<ErrorParser>('an error parser').optional(),
  signatureVersion: z.string().min(1).optional(),
  signatureProvider: functionOf<SignatureProvider>('a signature provider').optional(),
  defaults: z.record(z.unknown()).optional(),
  transport: z
    .custom<Transport>((value) => hasMethods(value, 'send'), { message: 'Expected a transport' })
    .optional(),
  interceptors: z.array(functionOf<RequestInterceptor>('an interceptor')).optional(),
  exceptionClass: functionOf<ServiceErrorConstructor>('an error constructor').optional(),
  logger: z
    .custom<Logger>((value) => hasMethods(value, 'error', 'warn', 'info', 'debug', 'trace'), {
      message: 'Expected a logger',
    })
    .optional(),
  timeout: z.number().int().positive().optional(),
  maxRetries: z.number().int().nonnegative().max(10).optional(),
  userAgent: z.string().min(1).optional(),
});

function invalidOption(name: string, message: string): PreconditionError {
  return new PreconditionError(`Invalid client option "${name}": ${message}`, 'INVALID_CONFIG');
}

function resolveCredentials(credentials: CredentialsOption | undefined): CredentialProvider | null {
  if (credentials === false) {
    return null;
  }
  if (credentials === undefined) {
    return defaultProvider();
  }
  if (isCredentialProvider(credentials)) {
    return credentials;
  }
  return new StaticCredentialProvider(credentials);
}

/**
 * Validate client options and fill in defaults.
 *
 * Runs before any transport is built, so a misconfigured client fails at
 * construction without touching the network.
 *
 * @throws {PreconditionError} `INVALID_CONFIG` naming the first missing or invalid option
 *
 * @example
 * ```typescript
 * resolveClientConfig({ api });
 * // PreconditionError: Invalid client option "region": Required
 * ```
 */
export function resolveClientConfig(options: Partial<ClientOptions>): ResolvedClientConfig {
  const parsed = clientOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    if (!issue || issue.path.length === 0) {
      throw new PreconditionError(
        `Invalid client options: ${issue?.message ?? 'unknown error'}`,
        'INVALID_CONFIG'
      );
    }
    throw invalidOption(String(issue.path[0]), issue.message);
  }

  const input = parsed.data;
  const { api, region } = input;
  const endpoint = (input.endpoint ?? defaultEndpoint(api.metadata.endpointPrefix, region)).replace(/\/+$/, '');
  const userAgent = input.userAgent ?? DEFAULT_USER_AGENT;

  const signatureVersion =
    input.signatureVersion ?? api.metadata.signatureVersion ?? DEFAULT_SIGNATURE_VERSION;
  const signatureProvider = input.signatureProvider ?? defaultSignatureProvider;
  const signer = signatureProvider(signatureVersion, api.signingName(), region);
  if (!signer) {
    throw invalidOption('signatureVersion', `Unsupported signature version "${signatureVersion}"`);
  }

  const protocol = getProtocol(api.metadata.protocol);
  const codecs = protocol?.({ api, endpoint, userAgent });
  const serializer = input.serializer ?? codecs?.serializer;
  const resultParser = input.resultParser ?? codecs?.resultParser;
  const errorParser = input.errorParser ?? codecs?.errorParser;
  if (!serializer || !resultParser || !errorParser) {
    const missing = !serializer ? 'serializer' : !resultParser ? 'resultParser' : 'errorParser';
    throw invalidOption(missing, `No codec available for protocol "${api.metadata.protocol}"`);
  }

  let credentials: CredentialProvider | null;
  try {
    credentials = resolveCredentials(input.credentials);
  } catch (error) {
    throw invalidOption('credentials', error instanceof Error ? error.message : String(error));
  }

  const timeout = input.timeout ?? DEFAULT_TIMEOUT;
  const maxRetries = input.maxRetries ?? DEFAULT_MAX_RETRIES;
  const transport =
    input.transport ??
    new FetchTransport({
      timeout,
      retry: new ExponentialBackoffRetry({ maxAttempts: maxRetries + 1 }),
    });

  return Object.freeze({
    region,
    api,
    endpoint,
    credentials,
    signatureVersion,
    signer,
    serializer,
    resultParser,
    errorParser,
    defaults: Object.freeze({ ...input.defaults }),
    transport,
    interceptors: Object.freeze([...(input.interceptors ?? [])]),
    exceptionClass: input.exceptionClass ?? ServiceError,
    logger: input.logger ?? new ConsoleLogger(DEFAULT_CLIENT_OPTIONS.logLevel),
    timeout,
    maxRetries,
    userAgent,
  });
}
