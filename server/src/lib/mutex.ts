/**
 * In-process async mutex. Callers queue in arrival order; each `fn` runs
 * only after every earlier holder has released.
 *
 * Not re-entrant: calling `runExclusive` from inside `fn` deadlocks.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => current);

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
