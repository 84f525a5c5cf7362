/**
 * Cursor-based pagination over an operation.
 *
 * @module pagination/paginator
 */

import type { PaginationTemplate } from '../api/types.js';
import type { Params } from '../command/command.js';
import type { Result } from '../command/result.js';
import { PreconditionError } from '../error/index.js';
import type { Logger } from '../observability/logging.js';
import { isTruthy } from '../util/path.js';

/**
 * The slice of a client a paginator needs.
 */
export interface PaginatedClient {
  execute(operation: string, params?: Params): Promise<Result>;
}

/**
 * Lazily issues one call per batch, feeding each response's output tokens
 * into the next request's input tokens.
 *
 * A paginator can be iterated once.
 *
 * @example
 * ```typescript
 * for await (const page of client.paginate('ListTables', {})) {
 *   console.log(page.get('TableNames'));
 * }
 *
 * for await (const item of client.paginate('Scan', { TableName: 'users' }).search('Items')) {
 *   console.log(item);
 * }
 * ```
 */
export class ResultPaginator implements AsyncIterable<Result> {
  private consumed = false;
  private requestCount = 0;
  private nextToken: Params | null = null;

  constructor(
    private readonly client: PaginatedClient,
    private readonly operation: string,
    private readonly params: Params,
    private readonly template: PaginationTemplate,
    private readonly logger?: Logger
  ) {}

  async *[Symbol.asyncIterator](): AsyncGenerator<Result, void, undefined> {
    if (this.consumed) {
      throw new PreconditionError(
        `Paginator for ${this.operation} has already been iterated`,
        'PAGINATOR_CONSUMED'
      );
    }
    this.consumed = true;

    let token: Params = {};
    for (;;) {
      const result = await this.client.execute(this.operation, { ...this.params, ...token });
      this.requestCount++;
      this.nextToken = this.extractNextToken(result);

      this.logger?.debug('Fetched page', {
        operation: this.operation,
        page: this.requestCount,
        hasMore: this.nextToken !== null,
      });

      yield result;

      if (this.nextToken === null) {
        return;
      }
      token = this.nextToken;
    }
  }

  /**
   * Yield every value an expression selects across all batches, flattening
   * arrays.
   */
  async *search(expression: string): AsyncGenerator<unknown, void, undefined> {
    for await (const result of this) {
      const value = result.search(expression);
      if (Array.isArray(value)) {
        yield* value;
      } else if (value !== undefined && value !== null) {
        yield value;
      }
    }
  }

  /**
   * Number of calls issued so far.
   */
  getRequestCount(): number {
    return this.requestCount;
  }

  /**
   * Input token parameters for the next call, or null when done.
   */
  getNextToken(): Params | null {
    return this.nextToken === null ? null : { ...this.nextToken };
  }

  private extractNextToken(result: Result): Params | null {
    const { inputToken, outputToken, moreResults } = this.template;

    if (moreResults !== undefined && !isTruthy(result.search(moreResults))) {
      return null;
    }

    const token: Params = {};
    outputToken.forEach((expression, index) => {
      const inputName = inputToken[index];
      const value = result.search(expression);
      if (inputName !== undefined && isTruthy(value)) {
        token[inputName] = value;
      }
    });

    return Object.keys(token).length > 0 ? token : null;
  }
}
