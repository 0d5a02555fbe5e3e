/**
 * Mutex — FIFO async lock.
 *
 * Callers acquire in the order they call `runExclusive`; the next one
 * starts only after the previous operation settles, whether it resolved
 * or threw.
 */

export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  async runExclusive<T>(operation: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await operation();
    } finally {
      release();
    }
  }
}
