/**
 * @tunnelbot/core — shared contracts, errors and async helpers.
 */

export * from './errors/index.js';

export type * from './interfaces/observer.js';
export type * from './interfaces/channel.js';
export type * from './interfaces/tunnel.js';
export type * from './types/config.js';

export { Mutex } from './utils/mutex.js';
export { sleep } from './utils/sleep.js';
