/**
 * Run async tasks one at a time per key.
 *
 * Tasks sharing a key execute in submission order, each starting after
 * the previous one settled; tasks under different keys run independently.
 * A rejected task does not block the ones queued behind it.
 */
export class KeyedSerializer {
  private tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
    return result;
  }

  /** Number of keys with queued or running tasks. */
  get pending(): number {
    return this.tails.size;
  }
}
