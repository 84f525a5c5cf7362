/**
 * HTTP module: request/response types, the transport contract and its
 * fetch-based default.
 *
 * @module http
 */

export type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpClientConfig,
  RequestInterceptor,
  BoundInterceptor,
  SendOptions,
} from './types.js';

export { FetchTransport, createDefaultTransport, applyInterceptors } from './transport.js';
export type { Transport, FetchTransportConfig } from './transport.js';

export { RequestError, isRequestError } from './error.js';
