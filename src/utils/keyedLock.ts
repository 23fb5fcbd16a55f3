/**
 * Per-key mutual exclusion for async work.
 *
 * Callers holding different keys never wait on each other; callers on the
 * same key run strictly one after another in arrival order. Used to
 * serialise multi-step side effects on a single worker record.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  /**
   * Run `task` once every earlier task queued under `key` has settled.
   * The task's result (or rejection) is passed through unchanged.
   */
  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      // Drop the entry once nobody else queued behind us
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with queued or running work. */
  get size(): number {
    return this.tails.size;
  }
}
