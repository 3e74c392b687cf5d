import { ENGINE_DEFAULTS } from "../config/engineConfig.js";

export interface AccessCacheOptions {
  /** Maximum number of cached keys. Defaults to 1000. */
  capacity?: number;
  /** Validity window of a cached value in milliseconds. Defaults to 300 000. */
  ttlMs?: number;
  now?: () => number;
}

interface CacheSlot {
  value: unknown;
  cachedAt: number;
  lastAccess: number;
  accessCount: number;
}

/** Result of a cache probe; `hit` distinguishes a cached `undefined` from a miss. */
export type CacheLookup = { hit: true; value: unknown } | { hit: false };

/**
 * Bounded cache placed in front of the blackboard store. When full, the slot
 * with the fewest accesses is evicted, the least recently touched one among
 * equals. Slots older than the validity window count as misses and are
 * dropped on access.
 */
export class AccessCache {
  private readonly slots = new Map<string, CacheSlot>();
  private readonly capacity: number;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private evictions = 0;

  constructor(options: AccessCacheOptions = {}) {
    this.capacity = Math.max(1, Math.floor(options.capacity ?? ENGINE_DEFAULTS.cacheCapacity));
    this.ttlMs = Math.max(1, options.ttlMs ?? ENGINE_DEFAULTS.cacheTtlMs);
    this.now = options.now ?? (() => Date.now());
  }

  get size(): number {
    return this.slots.size;
  }

  lookup(key: string): CacheLookup {
    const slot = this.slots.get(key);
    if (!slot) {
      return { hit: false };
    }
    const now = this.now();
    if (now - slot.cachedAt > this.ttlMs) {
      this.slots.delete(key);
      return { hit: false };
    }
    slot.accessCount += 1;
    slot.lastAccess = now;
    return { hit: true, value: slot.value };
  }

  store(key: string, value: unknown): void {
    const now = this.now();
    const existing = this.slots.get(key);
    if (existing) {
      existing.value = value;
      existing.cachedAt = now;
      existing.lastAccess = now;
      existing.accessCount += 1;
      return;
    }
    if (this.slots.size >= this.capacity) {
      this.evictOne();
    }
    this.slots.set(key, { value, cachedAt: now, lastAccess: now, accessCount: 1 });
  }

  invalidate(key: string): void {
    this.slots.delete(key);
  }

  clear(): void {
    this.slots.clear();
  }

  get evictionCount(): number {
    return this.evictions;
  }

  private evictOne(): void {
    let victim: string | null = null;
    let victimSlot: CacheSlot | null = null;
    for (const [key, slot] of this.slots) {
      if (
        victimSlot === null ||
        slot.accessCount < victimSlot.accessCount ||
        (slot.accessCount === victimSlot.accessCount && slot.lastAccess < victimSlot.lastAccess)
      ) {
        victim = key;
        victimSlot = slot;
      }
    }
    if (victim !== null) {
      this.slots.delete(victim);
      this.evictions += 1;
    }
  }
}
