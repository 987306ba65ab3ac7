// engine/concurrency/keyed-mutex.ts — Per-key serialization of async critical sections

/**
 * Runs critical sections for the same key one after another, in call order.
 * Sections for different keys never wait on each other.
 *
 * Each key holds the tail of its promise chain; the entry is removed once the
 * last queued section settles so idle keys do not accumulate.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, section: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await section();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with a queued or running section. */
  get activeKeys(): number {
    return this.tails.size;
  }
}
