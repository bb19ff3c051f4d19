type Mode = "read" | "write";

interface Waiter {
  mode: Mode;
  resolve: () => void;
}

/**
 * Async readers/writer lock. Readers share, writers are exclusive, and waiters
 * are granted in arrival order so a queued writer is not starved by readers
 * that arrive after it.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private readonly queue: Waiter[] = [];

  async read<T>(work: () => Promise<T>): Promise<T> {
    await this.acquire("read");
    try {
      return await work();
    } finally {
      this.release("read");
    }
  }

  async write<T>(work: () => Promise<T>): Promise<T> {
    await this.acquire("write");
    try {
      return await work();
    } finally {
      this.release("write");
    }
  }

  private acquire(mode: Mode): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(mode)) {
      this.grant(mode);
      return Promise.resolve();
    }
    return new Promise((resolve) => this.queue.push({ mode, resolve }));
  }

  private canGrant(mode: Mode): boolean {
    if (this.writing) return false;
    return mode === "read" || this.readers === 0;
  }

  private grant(mode: Mode) {
    if (mode === "read") {
      this.readers += 1;
    } else {
      this.writing = true;
    }
  }

  private release(mode: Mode) {
    if (mode === "read") {
      this.readers -= 1;
    } else {
      this.writing = false;
    }

    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (!next || !this.canGrant(next.mode)) break;
      this.queue.shift();
      this.grant(next.mode);
      next.resolve();
      if (next.mode === "write") break;
    }
  }
}

const sharedLocks = new Map<string, ReadWriteLock>();

/** One lock per key for the whole process, so every adapter on a path shares it. */
export const lockFor = (key: string): ReadWriteLock => {
  let lock = sharedLocks.get(key);
  if (!lock) {
    lock = new ReadWriteLock();
    sharedLocks.set(key, lock);
  }
  return lock;
};
