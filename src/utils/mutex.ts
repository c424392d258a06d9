/**
 * Promise-based mutex. Waiters are resumed in arrival order without polling.
 */
export class Mutex {
  private readonly queue: Array<() => void> = [];
  private locked = false;

  get isLocked(): boolean {
    return this.locked;
  }

  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    if (this.locked) {
      await new Promise<void>((resolve) => this.queue.push(resolve));
    }
    this.locked = true;

    try {
      return await task();
    } finally {
      const next = this.queue.shift();
      if (next) {
        // Ownership passes straight to the next waiter; `locked` stays true
        next();
      } else {
        this.locked = false;
      }
    }
  }
}
