/**
 * Generic service client.
 *
 * One client serves any service whose description and codecs it is given;
 * every call flows through the same pipeline.
 *
 * @module client
 */

import type { ServiceDescription } from './api/types.js';
import { Command, type CommandOptions, type Params } from './command/command.js';
import type { Result } from './command/result.js';
import type { Transaction } from './command/transaction.js';
import type { ClientOptions, ResolvedClientConfig } from './config/config.js';
import { resolveClientConfig } from './config/validation.js';
import type { AwsCredentials } from './credentials/types.js';
import { PreconditionError } from './error/index.js';
import { FutureResult } from './future/index.js';
import { ResultPaginator } from './pagination/paginator.js';
import { RequestPipeline } from './pipeline/pipeline.js';
import { Waiter, type WaiterOverrides, type WaiterResult } from './waiter/waiter.js';

/**
 * Client for one service in one region.
 *
 * @example
 * ```typescript
 * const client = new ServiceClient({
 *   region: 'us-east-1',
 *   api: ApiDescription.fromFile('models/dynamodb-2012-08-10.json'),
 *   credentials: { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' },
 * });
 *
 * const result = await client.execute('DescribeTable', { TableName: 'users' });
 * const future = client.executeAsync('ListTables', {});
 * await client.waitUntil('TableExists', { TableName: 'users' });
 * ```
 */
export class ServiceClient {
  protected readonly config: ResolvedClientConfig;
  private readonly pipeline: RequestPipeline;

  /**
   * @throws {PreconditionError} `INVALID_CONFIG` when an option is missing or invalid
   */
  constructor(options: Partial<ClientOptions>) {
    this.config = resolveClientConfig(options);
    this.pipeline = new RequestPipeline(this, this.config);
  }

  /**
   * Build a command for an operation. Client defaults are merged under the
   * given parameters.
   *
   * @throws {PreconditionError} `OPERATION_NOT_FOUND` when the description has
   *         no such operation
   */
  getCommand(name: string, params: Params = {}, options: CommandOptions = {}): Command {
    return this.buildCommand(name, params, options, false);
  }

  /**
   * Execute an operation and wait for its result.
   *
   * @throws {ServiceError} The client's error family when the call fails
   * @throws {PreconditionError} When the operation does not exist
   */
  async execute(name: string, params: Params = {}, options: CommandOptions = {}): Promise<Result> {
    return this.executeCommand(this.buildCommand(name, params, options, false));
  }

  /**
   * Execute a prebuilt command and wait for its result.
   */
  async executeCommand(command: Command): Promise<Result> {
    return this.unwrap(await this.pipeline.execute(command));
  }

  /**
   * Start an operation and return a handle to its pending result.
   *
   * Operation lookup happens immediately, so an unknown operation throws
   * here rather than through the handle.
   */
  executeAsync(name: string, params: Params = {}, options: CommandOptions = {}): FutureResult<Result> {
    const command = this.buildCommand(name, params, options, true);
    const transaction = this.pipeline.createTransaction(command);
    const pending = this.pipeline.run(transaction).then((settled) => this.unwrap(settled));
    return new FutureResult(pending, () => transaction.abortController.abort());
  }

  /**
   * Paginate an operation.
   *
   * @throws {PreconditionError} `PAGINATION_UNSUPPORTED` when the operation
   *         declares no pagination or no result key
   */
  paginate(name: string, params: Params = {}): ResultPaginator {
    const operation = this.resolveOperationName(name);
    const template = this.config.api.paginationTemplate(operation);
    if (!template || template.resultKey.length === 0) {
      throw new PreconditionError(
        `Operation ${operation} of ${this.serviceName} does not support pagination`,
        'PAGINATION_UNSUPPORTED'
      );
    }
    return new ResultPaginator(this, operation, params, template, this.config.logger);
  }

  /**
   * Iterate the items of an operation's first result key, across pages when
   * the operation is paginated.
   *
   * @throws {PreconditionError} `PAGINATION_UNSUPPORTED` when the operation
   *         declares no result key
   */
  getIterator(name: string, params: Params = {}): AsyncIterable<unknown> {
    const operation = this.resolveOperationName(name);
    const template = this.config.api.paginationTemplate(operation);
    const key = template?.resultKey[0];
    if (!template || key === undefined) {
      throw new PreconditionError(
        `There are no resources to iterate for the ${operation} operation of ${this.serviceName}`,
        'PAGINATION_UNSUPPORTED'
      );
    }

    if (template.inputToken.length > 0 && template.outputToken.length > 0) {
      return this.paginate(operation, params).search(key);
    }

    return this.iterateSingle(operation, params, key);
  }

  /**
   * Poll until a waiter reaches its success state.
   *
   * @throws {PreconditionError} `WAITER_UNSUPPORTED` when no such waiter exists
   * @throws {WaiterError} On a failure state or when attempts run out
   */
  async waitUntil(name: string, params: Params = {}, overrides: WaiterOverrides = {}): Promise<WaiterResult> {
    return this.createWaiter(name, params, overrides).wait();
  }

  /**
   * Start waiting immediately and return a handle. Cancelling aborts the
   * poll in flight and stops further polling.
   */
  waitUntilAsync(name: string, params: Params = {}, overrides: WaiterOverrides = {}): FutureResult<WaiterResult> {
    const waiter = this.createWaiter(name, params, overrides);
    const controller = new AbortController();
    return new FutureResult(waiter.wait(controller.signal), () => controller.abort());
  }

  /**
   * Current credentials, or null for an anonymous client.
   */
  async getCredentials(): Promise<AwsCredentials | null> {
    return this.config.credentials ? this.config.credentials.getCredentials() : null;
  }

  getEndpoint(): string {
    return this.config.endpoint;
  }

  getRegion(): string {
    return this.config.region;
  }

  getApi(): ServiceDescription {
    return this.config.api;
  }

  /**
   * Resolved configuration, or one option of it.
   */
  getConfig(): ResolvedClientConfig;
  getConfig<K extends keyof ResolvedClientConfig>(key: K): ResolvedClientConfig[K];
  getConfig<K extends keyof ResolvedClientConfig>(key?: K): ResolvedClientConfig | ResolvedClientConfig[K] {
    return key === undefined ? this.config : this.config[key];
  }

  private get serviceName(): string {
    return this.config.api.metadata.serviceFullName;
  }

  private resolveOperationName(name: string): string {
    const { api } = this.config;
    if (api.hasOperation(name)) {
      return name;
    }
    const capitalized = name.charAt(0).toUpperCase() + name.slice(1);
    if (api.hasOperation(capitalized)) {
      return capitalized;
    }
    throw new PreconditionError(`Operation not found: ${name}`, 'OPERATION_NOT_FOUND');
  }

  private buildCommand(name: string, params: Params, options: CommandOptions, async: boolean): Command {
    const operation = this.resolveOperationName(name);
    return new Command(operation, { ...this.config.defaults, ...params }, { ...options, async });
  }

  private unwrap(transaction: Transaction): Result {
    if (transaction.error) {
      throw transaction.error;
    }
    if (!transaction.result) {
      throw this.pipeline.getTranslator().wrapUncaught(transaction, new Error('No result was produced.'));
    }
    return transaction.result;
  }

  private createWaiter(name: string, params: Params, overrides: WaiterOverrides): Waiter {
    const template = this.config.api.waitTemplate(name);
    if (!template) {
      throw new PreconditionError(
        `Waiter ${name} is not defined for ${this.serviceName}`,
        'WAITER_UNSUPPORTED'
      );
    }
    if (!this.config.api.hasOperation(template.operation)) {
      throw new PreconditionError(
        `Waiter ${name} polls unknown operation ${template.operation}`,
        'WAITER_UNSUPPORTED'
      );
    }
    return new Waiter(this, name, params, template, overrides, this.config.logger);
  }

  private async *iterateSingle(operation: string, params: Params, key: string): AsyncGenerator<unknown, void, undefined> {
    const value = (await this.execute(operation, params)).search(key);
    if (Array.isArray(value)) {
      yield* value;
    } else if (value !== undefined && value !== null) {
      yield value;
    }
  }
}
