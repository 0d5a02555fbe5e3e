/**
 * @tunnelbot/observability — structured logging for tunnelbot.
 *
 * Re-exports every observer implementation and the factory registry.
 */

export { ConsoleObserver } from './console-observer.js';
export type { LogLevel } from '@tunnelbot/core';

export { MultiObserver } from './multi-observer.js';
export { NoopObserver } from './noop-observer.js';

export { createObserver } from './registry.js';
export type { ObservabilityConfig } from './registry.js';
