/**
 * NoopObserver — silent observer that discards all events.
 *
 * Used when observability is explicitly disabled and as the default for
 * components constructed without an observer.
 */

import type {
  IObserver,
  LifecycleEvent,
  ChannelMessageEvent,
  SecurityEvent,
} from '@tunnelbot/core';

export class NoopObserver implements IObserver {
  onLifecycle(_event: LifecycleEvent): void {
    // intentionally empty
  }

  onChannelMessage(_event: ChannelMessageEvent): void {
    // intentionally empty
  }

  onSecurityEvent(_event: SecurityEvent): void {
    // intentionally empty
  }

  onError(_error: Error, _context: Record<string, unknown>): void {
    // intentionally empty
  }

  async flush(): Promise<void> {
    // intentionally empty
  }
}
