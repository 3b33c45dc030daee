import { Mutex } from 'async-mutex';

interface Entry {
  mutex: Mutex;
  holders: number;
}

/**
 * One async-mutex per key, created on demand and discarded once nobody holds
 * or waits for it.
 */
export class KeyedMutex {
  private readonly entries = new Map<string, Entry>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const entry = this.acquireEntry(key);
    try {
      return await entry.mutex.runExclusive(fn);
    } finally {
      entry.holders--;
      if (entry.holders === 0) this.entries.delete(key);
    }
  }

  isLocked(key: string): boolean {
    return this.entries.get(key)?.mutex.isLocked() ?? false;
  }

  get size(): number {
    return this.entries.size;
  }

  private acquireEntry(key: string): Entry {
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { mutex: new Mutex(), holders: 0 };
      this.entries.set(key, entry);
    }
    entry.holders++;
    return entry;
  }
}
