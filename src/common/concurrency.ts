// concurrency.ts - Locks and a bounded worker pool for action execution

export type Release = () => void;

/** Counting semaphore with FIFO waiters. */
export class Semaphore {
  private available: number;
  private waiters: Array<() => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Invalid semaphore capacity: ${capacity}`);
    }
    this.available = capacity;
  }

  async acquire(): Promise<Release> {
    if (this.available > 0) {
      this.available--;
    } else {
      await new Promise<void>(resolve => this.waiters.push(resolve));
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        next();
      } else {
        this.available++;
      }
    };
  }

  async use<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get pending(): number {
    return this.waiters.length;
  }

  get inUse(): boolean {
    return this.available < this.capacity;
  }
}

/**
 * One holder per key. Multi-key acquisition takes keys in sorted order so two
 * callers with overlapping key sets cannot deadlock.
 */
export class KeyedMutex {
  private locks: Map<string, Semaphore> = new Map();

  private lockFor(key: string): Semaphore {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new Semaphore(1);
      this.locks.set(key, lock);
    }
    return lock;
  }

  get size(): number {
    return this.locks.size;
  }

  async acquire(keys: Iterable<string>): Promise<Release> {
    const ordered = [...new Set(keys)].sort();
    const releases: Release[] = [];
    for (const key of ordered) {
      releases.push(await this.lockFor(key).acquire());
    }
    return () => {
      for (const release of releases.reverse()) {
        release();
      }
      for (const key of ordered) {
        const lock = this.locks.get(key);
        if (lock && lock.pending === 0 && !lock.inUse) {
          this.locks.delete(key);
        }
      }
    };
  }

  async use<T>(keys: Iterable<string>, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(keys);
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

/**
 * Run fn over every input with at most `limit` in flight. Results keep input
 * order. fn is expected to resolve; a rejection rejects the whole pool.
 */
export async function runPool<T, R>(inputs: readonly T[], limit: number, fn: (input: T, index: number) => Promise<R>): Promise<R[]> {
  const results: R[] = new Array<R>(inputs.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < inputs.length) {
      const index = next++;
      results[index] = await fn(inputs[index], index);
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(limit, inputs.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}
