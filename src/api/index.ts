/**
 * Service descriptions.
 *
 * @module api
 */

export type {
  ServiceMetadata,
  OperationDescription,
  PaginationTemplate,
  WaiterState,
  AcceptorMatcher,
  Acceptor,
  WaiterTemplate,
  ServiceDescription,
} from './types.js';
export { ApiDescription } from './description.js';
export type { ApiDocument } from './description.js';
