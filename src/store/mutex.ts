/**
 * Per-key async mutual exclusion.
 *
 * Tasks sharing a key run one at a time in arrival order; tasks with
 * different keys run concurrently. Keys with nothing queued are dropped.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
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

  /** Keys with a running or queued task */
  get activeKeys(): number {
    return this.tails.size;
  }
}
