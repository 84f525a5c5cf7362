/**
 * Acceptor matching for waiters.
 *
 * @module waiter/acceptor
 */

import type { Acceptor } from '../api/types.js';
import type { Result } from '../command/result.js';
import type { ServiceError } from '../error/index.js';

/**
 * Outcome of one waiter attempt: a result or a typed error.
 */
export type AttemptResult =
  | { readonly result: Result; readonly error?: undefined }
  | { readonly result?: undefined; readonly error: ServiceError };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Structural equality; object key order does not matter.
 */
function isEqual(actual: unknown, expected: unknown): boolean {
  if (actual === expected) {
    return true;
  }
  if (Array.isArray(actual) && Array.isArray(expected)) {
    return actual.length === expected.length && actual.every((value, index) => isEqual(value, expected[index]));
  }
  if (isRecord(actual) && isRecord(expected)) {
    const keys = Object.keys(actual);
    return (
      keys.length === Object.keys(expected).length &&
      keys.every((key) => Object.prototype.hasOwnProperty.call(expected, key) && isEqual(actual[key], expected[key]))
    );
  }
  return false;
}

function searchArgument(acceptor: Acceptor, result: Result): unknown {
  return acceptor.argument === undefined ? result.toJSON() : result.search(acceptor.argument);
}

/**
 * Whether an acceptor matches an attempt's outcome.
 *
 * - `path`: the expression's value equals `expected`
 * - `pathAll`: the expression yields a non-empty list whose every element equals `expected`
 * - `pathAny`: some element of the list equals `expected`
 * - `status`: the HTTP status equals `expected`
 * - `error`: the error code equals `expected` (`true`/`false` match any error / no error)
 */
export function matchAcceptor(acceptor: Acceptor, outcome: AttemptResult): boolean {
  switch (acceptor.matcher) {
    case 'path':
      return outcome.result !== undefined && isEqual(searchArgument(acceptor, outcome.result), acceptor.expected);

    case 'pathAll': {
      if (outcome.result === undefined) {
        return false;
      }
      const values = searchArgument(acceptor, outcome.result);
      return (
        Array.isArray(values) &&
        values.length > 0 &&
        values.every((value) => isEqual(value, acceptor.expected))
      );
    }

    case 'pathAny': {
      if (outcome.result === undefined) {
        return false;
      }
      const values = searchArgument(acceptor, outcome.result);
      return Array.isArray(values) && values.some((value) => isEqual(value, acceptor.expected));
    }

    case 'status': {
      const status = outcome.result?.metadata.statusCode ?? outcome.error?.statusCode;
      return status !== undefined && status === acceptor.expected;
    }

    case 'error':
      if (typeof acceptor.expected === 'boolean') {
        return (outcome.error !== undefined) === acceptor.expected;
      }
      return outcome.error !== undefined && outcome.error.errorCode === acceptor.expected;
  }
}

/**
 * First acceptor that matches, in declaration order.
 */
export function findAcceptor(acceptors: readonly Acceptor[], outcome: AttemptResult): Acceptor | undefined {
  return acceptors.find((acceptor) => matchAcceptor(acceptor, outcome));
}
