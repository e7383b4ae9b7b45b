/**
 * Promise chain used as a mutex: each caller waits for the previous holder
 * to release before running.
 */
export class Mutex {
  private chain: Promise<void> = Promise.resolve();

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const acquired = new Promise<void>(resolve => {
      release = resolve;
    });

    const previous = this.chain;
    this.chain = acquired;
    await previous;

    try {
      return await task();
    } finally {
      release();
    }
  }
}
