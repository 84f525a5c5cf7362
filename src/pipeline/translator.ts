/**
 * Turns a Transaction's raw outcome into a Result or a typed error.
 *
 * @module pipeline/translator
 */

import type { Transaction } from '../command/transaction.js';
import { ServiceError, type ServiceErrorConstructor } from '../error/index.js';
import { isRequestError } from '../http/error.js';
import type { ErrorParser, ResultParser } from '../protocol/types.js';

export interface TranslatorConfig {
  resultParser: ResultParser;
  errorParser: ErrorParser;
  exceptionClass: ServiceErrorConstructor;
  /** Used in messages for failures outside the request/response path */
  serviceFullName: string;
}

/**
 * Response/error translator.
 *
 * After {@link resolve} a Transaction carries exactly one of `result` or
 * `error`.
 */
export class ResponseTranslator {
  constructor(private readonly config: TranslatorConfig) {}

  /**
   * Resolve a Transaction whose transfer has finished.
   *
   * @throws {Error} When parsing fails or no response exists on a success
   *         path; the caller wraps these with {@link wrapUncaught}
   */
  async resolve(transaction: Transaction): Promise<void> {
    if (transaction.resolved) {
      return;
    }

    if (transaction.exception !== undefined) {
      transaction.error = this.translate(transaction, transaction.exception);
      return;
    }

    const { response } = transaction;
    if (!response) {
      throw new Error('No response was received.');
    }

    transaction.result = await this.config.resultParser(transaction.command, response);
  }

  /**
   * Convert a failure into the client's error family. A {@link ServiceError}
   * is returned unchanged.
   */
  translate(transaction: Transaction, exception: unknown): ServiceError {
    if (exception instanceof ServiceError) {
      return exception;
    }

    let url = '';
    let detail = exception instanceof Error ? exception.message : String(exception);
    let kind: 'SERVICE' | 'TRANSPORT' = 'TRANSPORT';
    transaction.context.serviceError = {};

    if (isRequestError(exception)) {
      url = exception.request.url;
      if (exception.response) {
        kind = 'SERVICE';
        const fields = this.config.errorParser(exception.response, transaction.command);
        transaction.context.serviceError = fields;
        // Only use the parsed code when the parser recognised the response
        if (fields.type) {
          detail = `${fields.code ?? ''} (${fields.type} error): ${fields.message ?? ''}`.trim();
        }
      }
    }

    const ExceptionClass = this.config.exceptionClass;
    return new ExceptionClass(
      `Error executing ${transaction.command.name} on "${url}"; ${detail}`,
      { kind, transaction, cause: exception }
    );
  }

  /**
   * Wrap a failure that escaped the request/response path.
   */
  wrapUncaught(transaction: Transaction, error: unknown): ServiceError {
    if (error instanceof ServiceError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const ExceptionClass = this.config.exceptionClass;
    return new ExceptionClass(
      `Uncaught exception while executing ${this.config.serviceFullName}.${transaction.command.name} - ${message}`,
      { kind: 'UNEXPECTED', transaction, cause: error }
    );
  }
}
