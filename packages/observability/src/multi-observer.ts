/**
 * MultiObserver — fan-out observer that delegates to multiple child observers.
 *
 * Every IObserver method is forwarded to each child. Errors thrown by
 * individual children are caught and logged to stderr so that a single
 * broken observer never takes down the bot.
 */

import type {
  IObserver,
  LifecycleEvent,
  ChannelMessageEvent,
  SecurityEvent,
} from '@tunnelbot/core';

export class MultiObserver implements IObserver {
  private readonly children: IObserver[];

  constructor(children: IObserver[]) {
    this.children = [...children];
  }

  // ---- helpers ------------------------------------------------------------

  private safely(fn: (child: IObserver) => void): void {
    for (const child of this.children) {
      try {
        fn(child);
      } catch (err) {
        console.error('[MultiObserver] child observer threw:', err);
      }
    }
  }

  // ---- IObserver ----------------------------------------------------------

  onLifecycle(event: LifecycleEvent): void {
    this.safely((c) => c.onLifecycle(event));
  }

  onChannelMessage(event: ChannelMessageEvent): void {
    this.safely((c) => c.onChannelMessage(event));
  }

  onSecurityEvent(event: SecurityEvent): void {
    this.safely((c) => c.onSecurityEvent(event));
  }

  onError(error: Error, context: Record<string, unknown>): void {
    this.safely((c) => c.onError(error, context));
  }

  async flush(): Promise<void> {
    const results = this.children.map(async (child) => {
      try {
        await child.flush?.();
      } catch (err) {
        console.error('[MultiObserver] flush error in child observer:', err);
      }
    });
    await Promise.all(results);
  }
}
