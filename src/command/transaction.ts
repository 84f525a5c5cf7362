/**
 * The per-call unit of work.
 */

import type { Command } from './command.js';
import type { Result } from './result.js';
import type { HttpRequest, HttpResponse, RequestInterceptor } from '../http/types.js';
import type { ServiceError, ServiceErrorFields } from '../error/index.js';
import type { ServiceClient } from '../client.js';

/**
 * Diagnostic data stashed while a Transaction resolves.
 */
export interface TransactionContext {
  /** Normalized fields extracted by the error parser */
  serviceError?: ServiceErrorFields;
  [key: string]: unknown;
}

/**
 * Mutable record binding one operation call's command, request, response,
 * result and error. Exactly one exists per call and it is never shared.
 */
export class Transaction {
  /** Serialized request, set by the pipeline */
  public request?: HttpRequest;
  /** Response received from the transport */
  public response?: HttpResponse;
  /** Parsed result */
  public result?: Result;
  /** Raw failure before translation */
  public exception?: unknown;
  /** Translated failure */
  public error?: ServiceError;
  /** Free-form diagnostic context */
  public readonly context: TransactionContext = {};
  /** Abort handle used by best-effort cancellation */
  public readonly abortController = new AbortController();
  /** Epoch milliseconds at creation */
  public readonly startedAt = Date.now();

  constructor(
    public readonly client: ServiceClient,
    public readonly command: Command,
    /** Pre-send hooks for this call, signing last */
    public readonly interceptors: readonly RequestInterceptor[]
  ) {}

  /**
   * True once a result or an error is attached.
   */
  get resolved(): boolean {
    return this.result !== undefined || this.error !== undefined;
  }
}
