/**
 * Keyed Mutex
 *
 * Serializes async tasks that share a key while tasks on different keys run
 * independently. Each key holds the tail of a promise chain; the entry is
 * dropped once its last task settles.
 */

export class KeyedMutex {
  private tails: Map<string, Promise<void>> = new Map();

  /**
   * Run task after every earlier task for the same key has settled
   */
  async runExclusive<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Whether a task for key is queued or running
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /**
   * Number of keys with pending work
   */
  get size(): number {
    return this.tails.size;
  }
}
