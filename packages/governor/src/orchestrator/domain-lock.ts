/**
 * One promise-chained mutex per key. Work for different keys never waits on
 * each other; work for the same key runs strictly in call order.
 */
export class DomainLock {
  private readonly tails: Map<string, Promise<void>>;

  constructor() {
    this.tails = new Map();
  }

  async run<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Keys with a task running or queued. */
  get activeKeys(): number {
    return this.tails.size;
  }
}
