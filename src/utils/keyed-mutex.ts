// Per-key mutual exclusion.
//
// Each key owns a promise chain; tasks for the same key run strictly one after
// another in the order runExclusive() was called, tasks for different keys
// never wait on each other. There is no global lock.

import { createDeferred } from "./deferred.js";

export class KeyedMutex {
  private tails: Map<string, Promise<void>> = new Map();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const release = createDeferred<void>();
    const tail = previous.then(() => release.promise);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release.resolve();
      // Last holder for this key cleans up so idle keys do not accumulate
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  get activeKeys(): number {
    return this.tails.size;
  }
}
