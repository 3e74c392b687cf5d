import { EventEmitter } from "node:events";

import { withTimeout } from "../runtime/timers.js";

/** Latest occurrence of a named event. */
export interface EventInfo {
  name: string;
  source: string | null;
  data: unknown;
  timestamp: number;
  triggerCount: number;
}

/** Record appended to the dispatcher history on every emission. */
export interface DispatchedEvent {
  seq: number;
  name: string;
  source: string | null;
  data: unknown;
  timestamp: number;
}

export type EventListener = (event: DispatchedEvent) => void;

export interface EventDispatcherOptions {
  now?: () => number;
  /** Maximum number of events kept in history. Defaults to 1000. */
  historyLimit?: number;
}

export interface WaitOptions {
  /** Milliseconds before the wait gives up. Omit or pass null to wait forever. */
  timeoutMs?: number | null;
  signal?: AbortSignal;
}

export interface EventDispatcherStats {
  totalEvents: number;
  distinctEvents: number;
  waiting: number;
  latched: number;
  counts: Record<string, number>;
}

const ANY_EVENT = "*";

/** Emitter channel for `name`; the prefix keeps Node's special "error" event out of reach. */
function channel(name: string): string {
  return `event:${name}`;
}

function createWakeSignal(): { promise: Promise<true>; wake: () => void } {
  let resolveWake: (value: true) => void = () => undefined;
  const promise = new Promise<true>((resolve) => {
    resolveWake = resolve;
  });
  return { promise, wake: () => resolveWake(true) };
}

/**
 * Named-event notifier shared by the nodes of a tree (or the trees of a
 * forest). Waiting never throws: a timeout or an abort resolves to `false`.
 *
 * An event emitted while nobody waits for it stays latched; the next
 * {@link waitFor} on that name consumes it and returns immediately.
 */
export class EventDispatcher {
  private readonly emitter = new EventEmitter();
  private readonly info = new Map<string, EventInfo>();
  private readonly latched = new Set<string>();
  private readonly waiters = new Map<string, Set<() => void>>();
  private readonly history: DispatchedEvent[] = [];
  private readonly historyLimit: number;
  private readonly now: () => number;
  private seq = 0;

  constructor(options: EventDispatcherOptions = {}) {
    this.now = options.now ?? (() => Date.now());
    this.historyLimit = Math.max(1, options.historyLimit ?? 1_000);
    this.emitter.setMaxListeners(0);
  }

  emit(name: string, source: string | null = null, data: unknown = null): DispatchedEvent {
    const timestamp = this.now();
    const previous = this.info.get(name);
    this.info.set(name, {
      name,
      source,
      data,
      timestamp,
      triggerCount: (previous?.triggerCount ?? 0) + 1,
    });
    this.seq += 1;
    const event: DispatchedEvent = { seq: this.seq, name, source, data, timestamp };
    this.history.push(event);
    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }

    const pending = this.waiters.get(name);
    if (pending && pending.size > 0) {
      this.waiters.delete(name);
      for (const wake of pending) {
        wake();
      }
    } else {
      this.latched.add(name);
    }

    this.emitter.emit(channel(name), event);
    this.emitter.emit(channel(ANY_EVENT), event);
    return event;
  }

  /** Registers a listener for `name`, or for every event when `name` is "*". Returns a disposer. */
  on(name: string, listener: EventListener): () => void {
    this.emitter.on(channel(name), listener);
    return () => {
      this.emitter.off(channel(name), listener);
    };
  }

  off(name: string, listener: EventListener): void {
    this.emitter.off(channel(name), listener);
  }

  /** Resolves `true` when `name` fires, `false` on timeout or abort. */
  async waitFor(name: string, options: WaitOptions = {}): Promise<boolean> {
    if (this.latched.delete(name)) {
      return true;
    }
    const { promise: fired, wake: registered } = createWakeSignal();
    const set = this.waiters.get(name) ?? new Set<() => void>();
    set.add(registered);
    this.waiters.set(name, set);
    try {
      const result = await withTimeout(fired, options.timeoutMs ?? null, options.signal);
      return result === true;
    } finally {
      const current = this.waiters.get(name);
      current?.delete(registered);
      if (current && current.size === 0) {
        this.waiters.delete(name);
      }
    }
  }

  /** Resolves with the first of `names` to fire, or `null` on timeout or abort. */
  async waitForAny(names: readonly string[], options: WaitOptions = {}): Promise<string | null> {
    for (const name of names) {
      if (this.latched.delete(name)) {
        return name;
      }
    }
    const controller = new AbortController();
    const relay = (): void => controller.abort();
    options.signal?.addEventListener("abort", relay, { once: true });
    try {
      const winner = await withTimeout(
        Promise.race(
          names.map(async (name) => ((await this.waitFor(name, { signal: controller.signal })) ? name : null)),
        ),
        options.timeoutMs ?? null,
        options.signal,
      );
      return winner ?? null;
    } finally {
      options.signal?.removeEventListener("abort", relay);
      controller.abort();
    }
  }

  /** Resolves `true` once every name in `names` fired, `false` on timeout or abort. */
  async waitForAll(names: readonly string[], options: WaitOptions = {}): Promise<boolean> {
    const controller = new AbortController();
    const relay = (): void => controller.abort();
    options.signal?.addEventListener("abort", relay, { once: true });
    try {
      const outcome = await withTimeout(
        Promise.all(names.map((name) => this.waitFor(name, { signal: controller.signal }))),
        options.timeoutMs ?? null,
        options.signal,
      );
      return outcome !== null && outcome.every((fired) => fired);
    } finally {
      options.signal?.removeEventListener("abort", relay);
      controller.abort();
    }
  }

  getEventInfo(name: string): EventInfo | undefined {
    const entry = this.info.get(name);
    return entry ? { ...entry } : undefined;
  }

  /** Drops a latched occurrence so the next {@link waitFor} blocks again. */
  clearEvent(name: string): void {
    this.latched.delete(name);
  }

  /** Forgets everything known about `name`; pending waiters keep waiting. */
  removeEvent(name: string): boolean {
    this.latched.delete(name);
    return this.info.delete(name);
  }

  getHistory(name?: string): DispatchedEvent[] {
    const events = name === undefined ? this.history : this.history.filter((event) => event.name === name);
    return events.map((event) => ({ ...event }));
  }

  getStats(): EventDispatcherStats {
    const counts: Record<string, number> = {};
    let waiting = 0;
    for (const [name, entry] of this.info) {
      counts[name] = entry.triggerCount;
    }
    for (const set of this.waiters.values()) {
      waiting += set.size;
    }
    return {
      totalEvents: this.seq,
      distinctEvents: this.info.size,
      waiting,
      latched: this.latched.size,
      counts,
    };
  }

  /** Clears history, latches and event info. Waiters are left in place. */
  reset(): void {
    this.info.clear();
    this.latched.clear();
    this.history.length = 0;
  }
}
