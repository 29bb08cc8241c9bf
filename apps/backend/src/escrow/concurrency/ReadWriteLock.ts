/**
 * Read/Write Lock
 * One writer or many readers; waiters are granted strictly in arrival order
 * so a queued writer is never starved by later readers
 */

type LockMode = 'read' | 'write';

interface QueuedWaiter {
  mode: LockMode;
  resolve: () => void;
}

export class ReadWriteLock {
  private activeReaders = 0;
  private writerActive = false;
  private queue: QueuedWaiter[] = [];

  async withReadLock<T>(work: () => T | Promise<T>): Promise<T> {
    await this.acquire('read');
    try {
      return await work();
    } finally {
      this.release('read');
    }
  }

  async withWriteLock<T>(work: () => T | Promise<T>): Promise<T> {
    await this.acquire('write');
    try {
      return await work();
    } finally {
      this.release('write');
    }
  }

  getQueueDepth(): number {
    return this.queue.length;
  }

  getActiveReaders(): number {
    return this.activeReaders;
  }

  isWriteLocked(): boolean {
    return this.writerActive;
  }

  private acquire(mode: LockMode): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(mode)) {
      this.grant(mode);
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.queue.push({ mode, resolve });
    });
  }

  private release(mode: LockMode): void {
    if (mode === 'read') {
      this.activeReaders--;
    } else {
      this.writerActive = false;
    }

    this.processQueue();
  }

  private processQueue(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (!this.canGrant(next.mode)) {
        return;
      }

      this.queue.shift();
      this.grant(next.mode);
      next.resolve();
    }
  }

  private canGrant(mode: LockMode): boolean {
    if (mode === 'read') {
      return !this.writerActive;
    }
    return !this.writerActive && this.activeReaders === 0;
  }

  private grant(mode: LockMode): void {
    if (mode === 'read') {
      this.activeReaders++;
    } else {
      this.writerActive = true;
    }
  }
}
