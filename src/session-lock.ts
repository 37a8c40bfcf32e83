// Stream Courier - Per-session exclusion
// Tasks sharing a key run one at a time in arrival order; different keys never wait on each other.

import { createDeferred } from "./utils/deferred.js";

export class KeyedMutex {
  private readonly tails: Map<string, Promise<void>> = new Map();

  /** True while a task for `key` is running or queued. */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const released = createDeferred<void>();
    const tail = previous.then(() => released.promise);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      released.resolve();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Resolves once every task queued so far has finished. */
  async drain(): Promise<void> {
    await Promise.all([...this.tails.values()]);
  }
}
