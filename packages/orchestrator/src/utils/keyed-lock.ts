/**
 * Per-key FIFO serialization
 *
 * Tasks sharing a key run one after another in submission order; tasks on
 * different keys run concurrently. A failing task does not block its
 * successors.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined
    );

    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  /**
   * Whether tasks are queued or running for the key
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  get size(): number {
    return this.tails.size;
  }
}
