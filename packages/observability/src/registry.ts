/**
 * Observer registry — factory that builds observers from config.
 *
 * Reads the `observability` section of TunnelbotConfig and returns a
 * ready-to-use IObserver (potentially a MultiObserver wrapping several
 * children).
 */

import type { IObserver, LogLevel } from '@tunnelbot/core';

import { ConsoleObserver } from './console-observer.js';
import { MultiObserver } from './multi-observer.js';
import { NoopObserver } from './noop-observer.js';

export interface ObservabilityConfig {
  /** Observer names to activate (e.g. ["console"]). */
  observers: readonly string[];
  /** Minimum log level for console output. */
  logLevel?: LogLevel;
}

/**
 * Build an IObserver from configuration.
 *
 * - If `observers` is empty, returns a NoopObserver.
 * - If a single observer is listed, returns it directly.
 * - If multiple observers are listed, wraps them in a MultiObserver.
 */
export function createObserver(config: ObservabilityConfig): IObserver {
  const { observers, logLevel = 'info' } = config;

  const children: IObserver[] = [];

  for (const name of observers) {
    switch (name) {
      case 'console':
        children.push(new ConsoleObserver(logLevel));
        break;
      case 'noop':
        children.push(new NoopObserver());
        break;
      default:
        console.warn(`[observability] unknown observer "${name}", skipping`);
        break;
    }
  }

  const [only] = children;
  if (only === undefined) {
    return new NoopObserver();
  }

  if (children.length === 1) {
    return only;
  }

  return new MultiObserver(children);
}
