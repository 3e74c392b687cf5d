import { LockBusyError } from "../core/errors.js";
import { AccessCache } from "./accessCache.js";
import { ReadWriteLock } from "./rwLock.js";

/** Options accepted by {@link Blackboard}. */
export interface BlackboardOptions {
  /** Capacity of the access cache. */
  cacheCapacity?: number;
  /** Validity window of cached values in milliseconds. */
  cacheTtlMs?: number;
  /** Clock used for cache expiry and lock wait accounting. */
  now?: () => number;
}

/**
 * Operations available inside {@link Blackboard.read} and
 * {@link Blackboard.transaction}. They run while the caller holds the lock,
 * so they never take it again.
 */
export interface BlackboardView {
  get(key: string, defaultValue?: unknown): unknown;
  has(key: string): boolean;
  keys(): string[];
  readonly size: number;
}

export interface BlackboardTransaction extends BlackboardView {
  set(key: string, value: unknown): void;
  remove(key: string): boolean;
}

/** Snapshot returned by {@link Blackboard.getStats}. */
export interface BlackboardStats {
  keyCount: number;
  reads: number;
  writes: number;
  removes: number;
  clears: number;
  hits: number;
  misses: number;
  hitRate: number;
  cacheSize: number;
  cacheEvictions: number;
  lockAcquisitions: number;
  lockContentions: number;
  averageWaitMs: number;
}

/**
 * Key/value store shared by the nodes of one tree, or by every tree of a
 * forest. Values are kept by reference: the blackboard never copies what it
 * is given.
 *
 * The synchronous methods form the fast path. They run to completion without
 * yielding, which the event loop makes atomic. The `*Async` methods,
 * {@link read} and {@link transaction} go through a {@link ReadWriteLock} so
 * multi-step work that suspends can exclude writers (or everybody). The
 * synchronous writers cannot wait for that lock: they throw a
 * {@link LockBusyError} while it is held. Tree nodes write through the
 * locked methods.
 */
export class Blackboard {
  private readonly store = new Map<string, unknown>();
  private readonly cache: AccessCache;
  private readonly lock: ReadWriteLock;
  private reads = 0;
  private writes = 0;
  private removes = 0;
  private clears = 0;
  private hits = 0;
  private misses = 0;

  constructor(options: BlackboardOptions = {}) {
    this.cache = new AccessCache({
      capacity: options.cacheCapacity,
      ttlMs: options.cacheTtlMs,
      now: options.now,
    });
    this.lock = new ReadWriteLock({ now: options.now });
  }

  /** Returns the stored value, or `defaultValue` when the key is absent. */
  get(key: string, defaultValue?: unknown): unknown {
    this.reads += 1;
    const cached = this.cache.lookup(key);
    if (cached.hit) {
      this.hits += 1;
      return cached.value;
    }
    this.misses += 1;
    if (!this.store.has(key)) {
      return defaultValue;
    }
    const value = this.store.get(key);
    this.cache.store(key, value);
    return value;
  }

  set(key: string, value: unknown): void {
    this.assertUnlocked("set", key);
    this.put(key, value);
  }

  has(key: string): boolean {
    this.reads += 1;
    return this.store.has(key);
  }

  /** Removes `key`; returns whether it was present. */
  remove(key: string): boolean {
    this.assertUnlocked("remove", key);
    return this.drop(key);
  }

  clear(): void {
    this.assertUnlocked("clear", null);
    this.wipe();
  }

  keys(): string[] {
    return [...this.store.keys()];
  }

  values(): unknown[] {
    return [...this.store.values()];
  }

  entries(): Array<[string, unknown]> {
    return [...this.store.entries()];
  }

  get size(): number {
    return this.store.size;
  }

  /** Number of keys currently held by the access cache. */
  get cacheSize(): number {
    return this.cache.size;
  }

  async getAsync(key: string, defaultValue?: unknown): Promise<unknown> {
    return this.lock.withRead(() => this.get(key, defaultValue));
  }

  async hasAsync(key: string): Promise<boolean> {
    return this.lock.withRead(() => this.has(key));
  }

  async setAsync(key: string, value: unknown): Promise<void> {
    await this.lock.withWrite(() => this.put(key, value));
  }

  async removeAsync(key: string): Promise<boolean> {
    return this.lock.withWrite(() => this.drop(key));
  }

  async clearAsync(): Promise<void> {
    await this.lock.withWrite(() => this.wipe());
  }

  /** Runs `fn` under the shared lock. Other readers may run concurrently. */
  async read<T>(fn: (view: BlackboardView) => T | Promise<T>): Promise<T> {
    return this.lock.withRead(() => fn(this.view()));
  }

  /** Stores every entry of `values` under one exclusive lock. */
  async write(values: Readonly<Record<string, unknown>>): Promise<void> {
    await this.lock.withWrite(() => {
      for (const [key, value] of Object.entries(values)) {
        this.put(key, value);
      }
    });
  }

  /**
   * Runs `fn` under the exclusive lock so a multi-key update is atomic with
   * respect to every other locked operation. The lock is released whether
   * `fn` resolves or throws; writes made before a throw are kept.
   */
  async transaction<T>(fn: (tx: BlackboardTransaction) => T | Promise<T>): Promise<T> {
    return this.lock.withWrite(() => fn(this.view()));
  }

  getStats(): BlackboardStats {
    const lookups = this.hits + this.misses;
    const lockStats = this.lock.getStats();
    return {
      keyCount: this.store.size,
      reads: this.reads,
      writes: this.writes,
      removes: this.removes,
      clears: this.clears,
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
      cacheSize: this.cache.size,
      cacheEvictions: this.cache.evictionCount,
      lockAcquisitions: lockStats.readAcquisitions + lockStats.writeAcquisitions,
      lockContentions: lockStats.contended,
      averageWaitMs: lockStats.averageWaitMs,
    };
  }

  resetStats(): void {
    this.reads = 0;
    this.writes = 0;
    this.removes = 0;
    this.clears = 0;
    this.hits = 0;
    this.misses = 0;
    this.lock.resetStats();
  }

  private put(key: string, value: unknown): void {
    this.writes += 1;
    this.store.set(key, value);
    this.cache.store(key, value);
  }

  private drop(key: string): boolean {
    this.removes += 1;
    this.cache.invalidate(key);
    return this.store.delete(key);
  }

  private wipe(): void {
    this.clears += 1;
    this.store.clear();
    this.cache.clear();
  }

  private assertUnlocked(operation: string, key: string | null): void {
    if (this.lock.held) {
      throw new LockBusyError(operation, { key });
    }
  }

  private view(): BlackboardTransaction {
    const store = this.store;
    return {
      get: (key, defaultValue) => this.get(key, defaultValue),
      has: (key) => this.has(key),
      keys: () => this.keys(),
      set: (key, value) => this.put(key, value),
      remove: (key) => this.drop(key),
      get size() {
        return store.size;
      },
    };
  }
}
