/**
 * Wire protocol codecs.
 *
 * @module protocol
 */

import { createJsonProtocol } from './json.js';
import type { ProtocolFactory } from './types.js';

export type {
  Serializer,
  ResultParser,
  ErrorParser,
  ProtocolCodecs,
  ProtocolContext,
  ProtocolFactory,
} from './types.js';
export {
  createJsonProtocol,
  createJsonSerializer,
  parseJsonResult,
  parseJsonError,
  parseJsonBody,
  normalizeErrorCode,
} from './json.js';

/**
 * Codec factories by protocol name.
 */
export const PROTOCOLS: Readonly<Record<string, ProtocolFactory>> = Object.freeze({
  json: createJsonProtocol,
});

/**
 * Look up the codec factory for a protocol.
 */
export function getProtocol(name: string): ProtocolFactory | undefined {
  return Object.prototype.hasOwnProperty.call(PROTOCOLS, name) ? PROTOCOLS[name] : undefined;
}
