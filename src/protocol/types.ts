/**
 * Service codec contracts.
 *
 * @module protocol/types
 */

import type { Command } from '../command/command.js';
import type { Result } from '../command/result.js';
import type { Transaction } from '../command/transaction.js';
import type { HttpRequest, HttpResponse } from '../http/types.js';
import type { ServiceErrorFields } from '../error/index.js';
import type { ServiceDescription } from '../api/types.js';

/**
 * Builds the wire request for a Transaction's command.
 */
export type Serializer = (transaction: Transaction) => HttpRequest | Promise<HttpRequest>;

/**
 * Turns a successful response into a Result.
 */
export type ResultParser = (command: Command, response: HttpResponse) => Result | Promise<Result>;

/**
 * Extracts normalized error fields from an error response.
 */
export type ErrorParser = (response: HttpResponse, command?: Command) => ServiceErrorFields;

/**
 * Codec set for one wire protocol.
 */
export interface ProtocolCodecs {
  serializer: Serializer;
  resultParser: ResultParser;
  errorParser: ErrorParser;
}

/**
 * Inputs a protocol needs to build its codecs.
 */
export interface ProtocolContext {
  api: ServiceDescription;
  endpoint: string;
  userAgent?: string;
}

export type ProtocolFactory = (context: ProtocolContext) => ProtocolCodecs;
