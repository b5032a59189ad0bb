/**
 * Per-key async mutual exclusion.
 *
 * Each key holds a promise chain; a task runs once every earlier holder of
 * each of its keys has released. Keys are acquired in sorted order so two
 * multi-key tasks cannot deadlock. Not reentrant.
 */
export class PlatformLocks {
  private tails = new Map<string, Promise<void>>();

  async runExclusive<T>(keys: readonly string[], task: () => T | Promise<T>): Promise<T> {
    const ordered = [...new Set(keys)].sort();
    const releases: Array<() => void> = [];
    try {
      for (const key of ordered) {
        releases.push(await this.acquire(key));
      }
      return await task();
    } finally {
      for (const release of releases.reverse()) release();
    }
  }

  private async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const held = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);

    await previous;
    return () => {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    };
  }
}
