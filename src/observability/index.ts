/**
 * Observability
 *
 * Structured logging for client operations.
 */

export type { Logger, LogLevel } from './logging.js';
export { ConsoleLogger, NoopLogger, logOperation, logError } from './logging.js';
