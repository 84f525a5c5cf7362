/**
 * Condition-based polling.
 *
 * @module waiter/waiter
 */

import type { WaiterTemplate } from '../api/types.js';
import type { Params } from '../command/command.js';
import type { Result } from '../command/result.js';
import { ServiceError, WaiterError } from '../error/index.js';
import type { FutureResult } from '../future/index.js';
import type { Logger } from '../observability/logging.js';
import { abortError, sleep } from '../util/sleep.js';
import { findAcceptor, type AttemptResult } from './acceptor.js';

/**
 * The slice of a client a waiter needs.
 */
export interface WaitingClient {
  executeAsync(operation: string, params?: Params): FutureResult<Result>;
}

/**
 * Caller overrides for a waiter's template.
 */
export interface WaiterOverrides {
  /** Seconds between attempts */
  delay?: number;
  maxAttempts?: number;
  /**
   * Called before every attempt with the parameters about to be sent; a
   * returned object replaces them for that attempt.
   */
  before?: (params: Params, attempt: number) => Params | void;
}

/**
 * Terminal success of a waiter.
 */
export interface WaiterResult {
  state: 'success';
  /** Attempts made, including the successful one */
  attempts: number;
  /** Output of the last attempt, absent when it ended in a matched error */
  result?: Result;
}

/**
 * Polls an operation until an acceptor declares success or failure, or
 * `maxAttempts` is reached. Acceptors are checked in order; the first match
 * decides. An error no acceptor matches ends the wait with that error.
 *
 * @example
 * ```typescript
 * const waiter = new Waiter(client, 'TableExists', { TableName: 'users' }, template);
 * const { attempts } = await waiter.wait();
 * ```
 */
export class Waiter {
  private readonly delay: number;
  private readonly maxAttempts: number;
  private attempts = 0;

  constructor(
    private readonly client: WaitingClient,
    private readonly name: string,
    private readonly params: Params,
    private readonly template: WaiterTemplate,
    private readonly overrides: WaiterOverrides = {},
    private readonly logger?: Logger
  ) {
    this.delay = overrides.delay ?? template.delay;
    this.maxAttempts = overrides.maxAttempts ?? template.maxAttempts;
  }

  /**
   * Poll until a terminal state.
   *
   * @throws {WaiterError} `failure` when a failure acceptor matches,
   *         `timeout` when attempts run out
   * @throws {ServiceError} When an attempt fails in a way no acceptor matches
   */
  async wait(signal?: AbortSignal): Promise<WaiterResult> {
    let last: AttemptResult | undefined;

    while (this.attempts < this.maxAttempts) {
      if (signal?.aborted) {
        throw abortError(`Waiter ${this.name} was cancelled`);
      }
      this.attempts++;
      const params = this.overrides.before?.({ ...this.params }, this.attempts) ?? this.params;
      last = await this.attempt(params, signal);

      const acceptor = findAcceptor(this.template.acceptors, last);
      const state = acceptor?.state ?? 'retry';

      this.logger?.debug('Waiter attempt', {
        waiter: this.name,
        attempt: this.attempts,
        state,
      });

      if (state === 'success') {
        return { state: 'success', attempts: this.attempts, result: last.result };
      }
      if (state === 'failure') {
        throw new WaiterError(
          `Waiter ${this.name} entered a failure state after ${this.attempts} attempt(s)`,
          'failure',
          this.name,
          this.attempts,
          last.result ?? last.error
        );
      }
      if (!acceptor && last.error) {
        throw last.error;
      }

      if (this.attempts < this.maxAttempts) {
        await sleep(this.delay * 1000, signal);
      }
    }

    throw new WaiterError(
      `Waiter ${this.name} timed out after ${this.attempts} attempt(s)`,
      'timeout',
      this.name,
      this.attempts,
      last?.result ?? last?.error
    );
  }

  getAttempts(): number {
    return this.attempts;
  }

  /**
   * Run one poll; an abort of `signal` cancels the request in flight.
   */
  private async attempt(params: Params, signal?: AbortSignal): Promise<AttemptResult> {
    const future = this.client.executeAsync(this.template.operation, params);
    const onAbort = (): void => {
      future.cancel();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    let outcome: AttemptResult;
    try {
      outcome = { result: await future };
    } catch (error) {
      if (signal?.aborted) {
        throw abortError(`Waiter ${this.name} was cancelled`);
      }
      if (!(error instanceof ServiceError)) {
        throw error;
      }
      outcome = { error };
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    if (signal?.aborted) {
      throw abortError(`Waiter ${this.name} was cancelled`);
    }
    return outcome;
  }
}
