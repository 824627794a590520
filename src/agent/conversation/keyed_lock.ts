/**
 * Serializes async work per key with a promise chain. Different keys never wait
 * on each other; a key's entry is removed once its last holder finishes.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previousTail = this.tails.get(key) ?? Promise.resolve();

    let release = () => {};
    const currentGate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const currentTail = previousTail.then(() => currentGate);
    this.tails.set(key, currentTail);

    await previousTail;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === currentTail) {
        this.tails.delete(key);
      }
    }
  }

  get activeKeys(): number {
    return this.tails.size;
  }
}
