export { Command } from './command.js';
export type { Params, CommandOptions } from './command.js';
export { Transaction } from './transaction.js';
export type { TransactionContext } from './transaction.js';
export { Result } from './result.js';
export type { ResultMetadata } from './result.js';
