/**
 * Per-key async locks
 *
 * Each key owns a FIFO mutex. `withLocks` takes several keys at once, always in
 * sorted order, so two callers locking overlapping key sets cannot deadlock.
 */

type Release = () => void;

class Mutex {
  private locked = false;
  private readonly queue: Array<() => void> = [];

  async acquire(): Promise<Release> {
    return new Promise((resolve) => {
      const release = () => {
        const next = this.queue.shift();
        if (next) {
          next();
          return;
        }
        this.locked = false;
      };

      if (!this.locked) {
        this.locked = true;
        resolve(release);
        return;
      }

      this.queue.push(() => {
        this.locked = true;
        resolve(release);
      });
    });
  }

  get idle(): boolean {
    return !this.locked && this.queue.length === 0;
  }
}

export class KeyedMutex {
  private readonly mutexes = new Map<string, Mutex>();

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    return this.withLocks([key], fn);
  }

  async withLocks<T>(keys: Iterable<string>, fn: () => Promise<T>): Promise<T> {
    const ordered = [...new Set(keys)].sort();
    const releases: Release[] = [];
    try {
      for (const key of ordered) {
        releases.push(await this.mutexFor(key).acquire());
      }
      return await fn();
    } finally {
      for (const release of releases.reverse()) {
        release();
      }
      for (const key of ordered) {
        if (this.mutexes.get(key)?.idle) {
          this.mutexes.delete(key);
        }
      }
    }
  }

  /** Number of keys currently held or awaited */
  get size(): number {
    return this.mutexes.size;
  }

  private mutexFor(key: string): Mutex {
    let mutex = this.mutexes.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.mutexes.set(key, mutex);
    }
    return mutex;
  }
}
