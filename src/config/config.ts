/**
 * Client configuration types and the fluent builder.
 * @module config
 */

import type { ServiceDescription } from '../api/types.js';
import type { Params } from '../command/command.js';
import type { AwsCredentials, CredentialProvider } from '../credentials/types.js';
import type { ServiceErrorConstructor } from '../error/index.js';
import type { RequestInterceptor } from '../http/types.js';
import type { Transport } from '../http/transport.js';
import type { Logger } from '../observability/logging.js';
import type { ErrorParser, ResultParser, Serializer } from '../protocol/types.js';
import type { SignatureProvider, Signer } from '../signing/types.js';
import { loadOptionsFromEnv } from './environment.js';

/**
 * Credentials accepted by a client: a provider, a static key pair, or
 * `false` for unsigned requests.
 */
export type CredentialsOption = CredentialProvider | AwsCredentials | false;

/**
 * Options accepted when constructing a client.
 */
export interface ClientOptions {
  /**
   * Region requests are sent to and signed for.
   * @example 'us-east-1'
   */
  region: string;

  /** Service description the client executes against */
  api: ServiceDescription;

  /**
   * Credentials source. Defaults to the environment chain.
   */
  credentials?: CredentialsOption;

  /**
   * Full endpoint URL. Defaults to `https://{endpointPrefix}.{region}.amazonaws.com`.
   * @example 'http://localhost:8000'
   */
  endpoint?: string;

  /** Overrides the protocol's request serializer */
  serializer?: Serializer;

  /** Overrides the protocol's result parser */
  resultParser?: ResultParser;

  /** Overrides the protocol's error parser */
  errorParser?: ErrorParser;

  /** Signature version; defaults to the description's, then `v4` */
  signatureVersion?: string;

  /** Resolves the signer for this client */
  signatureProvider?: SignatureProvider;

  /** Parameters merged under every call's explicit parameters */
  defaults?: Params;

  /** HTTP transport; defaults to a fetch transport with retries */
  transport?: Transport;

  /** Pre-send hooks run on every call, before call-scoped hooks and signing */
  interceptors?: readonly RequestInterceptor[];

  /** Error class raised for failed calls */
  exceptionClass?: ServiceErrorConstructor;

  logger?: Logger;

  /**
   * Per-attempt timeout of the default transport, in milliseconds.
   * @default 30000
   */
  timeout?: number;

  /**
   * Retries after the first attempt, for the default transport.
   * @default 3
   */
  maxRetries?: number;

  userAgent?: string;
}

/**
 * Frozen configuration shared by every Transaction of a client.
 */
export interface ResolvedClientConfig {
  readonly region: string;
  readonly api: ServiceDescription;
  readonly endpoint: string;
  /** Null for anonymous clients */
  readonly credentials: CredentialProvider | null;
  readonly signatureVersion: string;
  readonly signer: Signer;
  readonly serializer: Serializer;
  readonly resultParser: ResultParser;
  readonly errorParser: ErrorParser;
  readonly defaults: Readonly<Params>;
  readonly transport: Transport;
  readonly interceptors: readonly RequestInterceptor[];
  readonly exceptionClass: ServiceErrorConstructor;
  readonly logger: Logger;
  readonly timeout: number;
  readonly maxRetries: number;
  readonly userAgent: string;
}

/**
 * Fluent builder for client options.
 *
 * @example
 * ```typescript
 * const options = new ClientConfigBuilder()
 *   .fromEnv()
 *   .withApi(api)
 *   .withStaticCredentials('test-access-key', 'test-secret')
 *   .build();
 * ```
 */
export class ClientConfigBuilder {
  private options: Partial<ClientOptions> = {};

  withRegion(region: string): this {
    this.options.region = region;
    return this;
  }

  withApi(api: ServiceDescription): this {
    this.options.api = api;
    return this;
  }

  withEndpoint(endpoint: string): this {
    this.options.endpoint = endpoint;
    return this;
  }

  withCredentials(credentials: CredentialsOption): this {
    this.options.credentials = credentials;
    return this;
  }

  withStaticCredentials(accessKeyId: string, secretAccessKey: string, sessionToken?: string): this {
    this.options.credentials = { accessKeyId, secretAccessKey, sessionToken };
    return this;
  }

  /**
   * Send requests unsigned.
   */
  withAnonymousCredentials(): this {
    this.options.credentials = false;
    return this;
  }

  withDefaults(defaults: Params): this {
    this.options.defaults = { ...this.options.defaults, ...defaults };
    return this;
  }

  /**
   * Append a client-wide pre-send hook.
   */
  withInterceptor(interceptor: RequestInterceptor): this {
    this.options.interceptors = [...(this.options.interceptors ?? []), interceptor];
    return this;
  }

  withTransport(transport: Transport): this {
    this.options.transport = transport;
    return this;
  }

  withLogger(logger: Logger): this {
    this.options.logger = logger;
    return this;
  }

  withTimeout(timeout: number): this {
    this.options.timeout = timeout;
    return this;
  }

  withMaxRetries(maxRetries: number): this {
    this.options.maxRetries = maxRetries;
    return this;
  }

  withUserAgent(userAgent: string): this {
    this.options.userAgent = userAgent;
    return this;
  }

  withSignatureVersion(signatureVersion: string): this {
    this.options.signatureVersion = signatureVersion;
    return this;
  }

  withExceptionClass(exceptionClass: ServiceErrorConstructor): this {
    this.options.exceptionClass = exceptionClass;
    return this;
  }

  /**
   * Apply region and endpoint from environment variables.
   */
  fromEnv(env: Record<string, string | undefined> = process.env): this {
    this.options = { ...this.options, ...loadOptionsFromEnv(env) };
    return this;
  }

  /**
   * Options collected so far. Missing required options are reported when a
   * client resolves them.
   */
  build(): Partial<ClientOptions> {
    return { ...this.options };
  }

  static from(options: Partial<ClientOptions>): ClientConfigBuilder {
    const builder = new ClientConfigBuilder();
    builder.options = { ...options };
    return builder;
  }
}
