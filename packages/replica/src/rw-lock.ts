type LockMode = "read" | "write";

interface Waiter {
  mode: LockMode;
  grant: () => void;
}

/**
 * Async readers-writer lock. Any number of readers may hold it together; a
 * writer holds it alone. Waiters are granted strictly in arrival order, so a
 * queued writer is not starved by readers that arrive after it.
 */
export class ReadWriteLock {
  private readers = 0;
  private writer = false;
  private queue: Waiter[] = [];

  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire("read");
    try {
      return await fn();
    } finally {
      this.release("read");
    }
  }

  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire("write");
    try {
      return await fn();
    } finally {
      this.release("write");
    }
  }

  /** Snapshot of holders and waiters, for diagnostics. */
  getState(): { readers: number; writer: boolean; waiting: number } {
    return { readers: this.readers, writer: this.writer, waiting: this.queue.length };
  }

  private acquire(mode: LockMode): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(mode)) {
      this.take(mode);
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.queue.push({ mode, grant: resolve });
    });
  }

  private release(mode: LockMode): void {
    if (mode === "write") {
      this.writer = false;
    } else {
      this.readers--;
    }
    this.drain();
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const head = this.queue[0];
      if (!head || !this.canGrant(head.mode)) return;
      this.queue.shift();
      this.take(head.mode);
      head.grant();
      if (head.mode === "write") return;
    }
  }

  private canGrant(mode: LockMode): boolean {
    if (this.writer) return false;
    return mode === "read" || this.readers === 0;
  }

  private take(mode: LockMode): void {
    if (mode === "write") {
      this.writer = true;
    } else {
      this.readers++;
    }
  }
}
