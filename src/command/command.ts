/**
 * Commands: one named operation invocation and its parameters.
 */

import type { RequestInterceptor } from '../http/types.js';

/**
 * Operation parameters.
 */
export type Params = Record<string, unknown>;

/**
 * Call-scoped options.
 */
export interface CommandOptions {
  /**
   * Pre-send hooks for this call only; they run after the client's hooks and
   * before signing.
   */
  interceptors?: readonly RequestInterceptor[];
}

/**
 * Immutable description of one operation call.
 */
export class Command {
  public readonly name: string;
  public readonly params: Readonly<Params>;
  /** Whether the call was issued through a future-returning entry point */
  public readonly async: boolean;
  public readonly interceptors: readonly RequestInterceptor[];

  constructor(
    name: string,
    params: Params,
    options: CommandOptions & { async?: boolean } = {}
  ) {
    this.name = name;
    this.params = Object.freeze({ ...params });
    this.async = options.async ?? false;
    this.interceptors = Object.freeze([...(options.interceptors ?? [])]);
    Object.freeze(this);
  }

  /**
   * Whether a parameter is set.
   */
  hasParam(name: string): boolean {
    return this.params[name] !== undefined;
  }

  /**
   * A new command with `overrides` merged over this command's parameters.
   */
  withParams(overrides: Params): Command {
    return new Command(this.name, { ...this.params, ...overrides }, {
      async: this.async,
      interceptors: this.interceptors,
    });
  }
}
