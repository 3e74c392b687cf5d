/** Function returned by the lock; calling it more than once is a no-op. */
export type Release = () => void;

interface Waiter {
  mode: "read" | "write";
  enqueuedAt: number;
  grant: (release: Release) => void;
}

export interface ReadWriteLockOptions {
  /** Clock used to measure waiting time. Defaults to {@link Date.now}. */
  now?: () => number;
}

/** Counters exposed by {@link ReadWriteLock.getStats}. */
export interface ReadWriteLockStats {
  readAcquisitions: number;
  writeAcquisitions: number;
  contended: number;
  totalWaitMs: number;
  averageWaitMs: number;
  activeReaders: number;
  writerActive: boolean;
  queued: number;
}

/**
 * Asynchronous shared-reader/exclusive-writer lock.
 *
 * Any number of readers may hold the lock together while no writer holds it.
 * A writer excludes everybody. Waiters are served in FIFO order and a queued
 * writer blocks readers arriving after it, so a stream of readers cannot
 * starve writers.
 */
export class ReadWriteLock {
  private readers = 0;
  private writer = false;
  private readonly queue: Waiter[] = [];
  private readonly now: () => number;
  private readAcquisitions = 0;
  private writeAcquisitions = 0;
  private contended = 0;
  private totalWaitMs = 0;

  constructor(options: ReadWriteLockOptions = {}) {
    this.now = options.now ?? (() => Date.now());
  }

  acquireRead(): Promise<Release> {
    if (!this.writer && this.queue.length === 0) {
      return Promise.resolve(this.grantRead(0));
    }
    return this.enqueue("read");
  }

  acquireWrite(): Promise<Release> {
    if (!this.writer && this.readers === 0 && this.queue.length === 0) {
      return Promise.resolve(this.grantWrite(0));
    }
    return this.enqueue("write");
  }

  /** Whether a reader or a writer currently holds the lock. */
  get held(): boolean {
    return this.writer || this.readers > 0;
  }

  /** Runs `fn` under the shared lock, releasing it on every exit path. */
  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /** Runs `fn` under the exclusive lock, releasing it on every exit path. */
  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  getStats(): ReadWriteLockStats {
    const acquisitions = this.readAcquisitions + this.writeAcquisitions;
    return {
      readAcquisitions: this.readAcquisitions,
      writeAcquisitions: this.writeAcquisitions,
      contended: this.contended,
      totalWaitMs: this.totalWaitMs,
      averageWaitMs: acquisitions === 0 ? 0 : this.totalWaitMs / acquisitions,
      activeReaders: this.readers,
      writerActive: this.writer,
      queued: this.queue.length,
    };
  }

  resetStats(): void {
    this.readAcquisitions = 0;
    this.writeAcquisitions = 0;
    this.contended = 0;
    this.totalWaitMs = 0;
  }

  private enqueue(mode: "read" | "write"): Promise<Release> {
    this.contended += 1;
    return new Promise<Release>((resolve) => {
      this.queue.push({ mode, enqueuedAt: this.now(), grant: resolve });
    });
  }

  private grantRead(waitedMs: number): Release {
    this.readers += 1;
    this.readAcquisitions += 1;
    this.totalWaitMs += waitedMs;
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      this.readers -= 1;
      this.drain();
    };
  }

  private grantWrite(waitedMs: number): Release {
    this.writer = true;
    this.writeAcquisitions += 1;
    this.totalWaitMs += waitedMs;
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      this.writer = false;
      this.drain();
    };
  }

  /** Hands the lock to as many queued waiters as the current state allows. */
  private drain(): void {
    while (this.queue.length > 0 && !this.writer) {
      const head = this.queue[0];
      if (head.mode === "write") {
        if (this.readers > 0) {
          return;
        }
        this.queue.shift();
        head.grant(this.grantWrite(this.now() - head.enqueuedAt));
        return;
      }
      this.queue.shift();
      head.grant(this.grantRead(this.now() - head.enqueuedAt));
    }
  }
}
