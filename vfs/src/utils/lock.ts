interface Waiter {
  write: boolean;
  wake: () => void;
}

/**
 * Writer-preferring async read/write lock.
 * Readers share the lock; a queued writer blocks new readers.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private queue: Waiter[] = [];

  async read<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire(false);
    try {
      return await fn();
    } finally {
      this.release(false);
    }
  }

  async write<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire(true);
    try {
      return await fn();
    } finally {
      this.release(true);
    }
  }

  get isWriteLocked(): boolean {
    return this.writing;
  }

  get activeReaders(): number {
    return this.readers;
  }

  private acquire(write: boolean): Promise<void> {
    const free = !this.writing && this.queue.length === 0 && (!write || this.readers === 0);
    if (free) {
      this.enter(write);
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.queue.push({
        write,
        wake: () => {
          this.enter(write);
          resolve();
        },
      });
    });
  }

  private enter(write: boolean): void {
    if (write) {
      this.writing = true;
    } else {
      this.readers++;
    }
  }

  private release(write: boolean): void {
    if (write) {
      this.writing = false;
    } else {
      this.readers--;
    }

    while (this.queue.length > 0 && !this.writing) {
      const next = this.queue[0];
      if (next.write) {
        if (this.readers === 0) {
          this.queue.shift();
          next.wake();
        }
        return;
      }
      this.queue.shift();
      next.wake();
    }
  }
}

/**
 * FIFO async mutex
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get isLocked(): boolean {
    return this.pending > 0;
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    this.tail = previous.then(() => current);
    this.pending++;

    await previous;
    try {
      return await fn();
    } finally {
      this.pending--;
      release();
    }
  }
}
