export { Waiter } from './waiter.js';
export type { WaiterOverrides, WaiterResult, WaitingClient } from './waiter.js';
export { matchAcceptor, findAcceptor } from './acceptor.js';
export type { AttemptResult } from './acceptor.js';
