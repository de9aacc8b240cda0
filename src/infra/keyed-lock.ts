/**
 * Per-key async mutual exclusion: calls sharing a key run one at a time in
 * arrival order, calls on different keys never wait on each other.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` once every earlier call for `key` has settled.
   * The slot is released whether `fn` resolves or throws.
   */
  async run<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Whether any call for `key` is running or queued. */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
