/**
 * The operation-agnostic request pipeline.
 *
 * @module pipeline/pipeline
 */

import type { Command } from '../command/command.js';
import { Transaction } from '../command/transaction.js';
import type { ResolvedClientConfig } from '../config/config.js';
import { RequestError, isRequestError } from '../http/error.js';
import type { BoundInterceptor, RequestInterceptor } from '../http/types.js';
import { logError, logOperation } from '../observability/logging.js';
import { createSigningInterceptor } from '../signing/provider.js';
import type { ServiceClient } from '../client.js';
import { ResponseTranslator } from './translator.js';

/**
 * Runs one Transaction per call: serialize, attach the pre-send hooks
 * (signing last), send, then translate the outcome.
 */
export class RequestPipeline {
  private readonly translator: ResponseTranslator;
  private readonly signingInterceptor: RequestInterceptor;

  constructor(
    private readonly client: ServiceClient,
    private readonly config: ResolvedClientConfig
  ) {
    this.translator = new ResponseTranslator({
      resultParser: config.resultParser,
      errorParser: config.errorParser,
      exceptionClass: config.exceptionClass,
      serviceFullName: config.api.metadata.serviceFullName,
    });
    this.signingInterceptor = createSigningInterceptor(config.signer, config.credentials);
  }

  /**
   * Create the Transaction for a command with a fresh interceptor list:
   * client hooks, then the command's hooks, then signing.
   */
  createTransaction(command: Command): Transaction {
    return new Transaction(this.client, command, [
      ...this.config.interceptors,
      ...command.interceptors,
      this.signingInterceptor,
    ]);
  }

  /**
   * Run a command in a new Transaction.
   */
  execute(command: Command): Promise<Transaction> {
    return this.run(this.createTransaction(command));
  }

  /**
   * Drive a Transaction to resolution. Never rejects: the returned
   * Transaction carries either `result` or `error`.
   */
  async run(transaction: Transaction): Promise<Transaction> {
    const { command } = transaction;
    const { logger } = this.config;
    const service = this.config.api.metadata.serviceFullName;
    const started = Date.now();

    try {
      const request = await this.config.serializer(transaction);
      transaction.request = request;

      const beforeSend: BoundInterceptor[] = transaction.interceptors.map(
        (interceptor) => (pending) => interceptor(pending, transaction)
      );

      try {
        const response = await this.config.transport.send(request, {
          beforeSend,
          signal: transaction.abortController.signal,
        });
        transaction.response = response;
        if (response.status >= 400) {
          transaction.exception = RequestError.fromResponse(request, response);
        }
      } catch (error) {
        if (!isRequestError(error)) {
          throw error;
        }
        transaction.exception = error;
      }

      await this.translator.resolve(transaction);
    } catch (error) {
      if (transaction.exception === undefined) {
        transaction.exception = error;
      }
      transaction.result = undefined;
      transaction.error = this.translator.wrapUncaught(transaction, error);
    }

    if (transaction.error) {
      logError(logger, service, command.name, transaction.error);
    } else {
      logOperation(logger, service, command.name, Date.now() - started, transaction.response?.status);
    }

    return transaction;
  }

  getTranslator(): ResponseTranslator {
    return this.translator;
  }
}
