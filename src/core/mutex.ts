/**
 * Async mutex: serializes async critical sections in FIFO order.
 *
 * Not reentrant: a section that awaits `runExclusive` on the same mutex
 * deadlocks. Callers already inside a section use the `*Locked` variants of
 * the methods they need.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private held = false;

  get isLocked(): boolean {
    return this.held;
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    let release: () => void = () => {};
    const turn = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => turn);

    await previous;
    this.held = true;
    try {
      return await fn();
    } finally {
      this.held = false;
      release();
    }
  }
}
