/**
 * Per-key async mutex.
 * Tasks sharing a key run one at a time in arrival order; different keys
 * never wait on each other. A failing task releases the key like any other.
 */

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await result;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with a task queued or running. */
  get activeKeys(): number {
    return this.tails.size;
  }
}
