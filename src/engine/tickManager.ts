import { ENGINE_DEFAULTS } from "../config/engineConfig.js";
import { ConfigurationError, describeError } from "../core/errors.js";
import type { Status } from "../core/status.js";
import { createDefaultLogger, type StructuredLogger } from "../logger.js";
import type { BehaviorNode } from "../nodes/base.js";
import { createTickRuntime, type TickRuntime } from "../nodes/runtime.js";
import { sleep } from "../runtime/timers.js";
import { Blackboard } from "./blackboard.js";

export type TickStartCallback = (tickNumber: number) => void;
export type TickCallback = (status: Status, tickCount: number) => void | Promise<void>;
export type StatusChangeCallback = (previous: Status, next: Status) => void | Promise<void>;

/** Options accepted by {@link TickManager}. */
export interface TickManagerOptions {
  root?: BehaviorNode | null;
  blackboard?: Blackboard;
  /** Ticks per second. Defaults to 60. */
  tickRate?: number;
  /** Invoked synchronously before the root is ticked, with the upcoming tick number. */
  onTickStart?: TickStartCallback;
  onTick?: TickCallback;
  onStatusChange?: StatusChangeCallback;
  logger?: StructuredLogger;
  now?: () => number;
  /**
   * Builds the runtime handed to the root on each tick. Defaults to a runtime
   * around {@link TickManager.blackboard}.
   */
  runtimeFactory?: (signal?: AbortSignal) => TickRuntime;
}

/** Snapshot returned by {@link TickManager.getStats}. */
export interface TickManagerStats {
  running: boolean;
  tickRate: number;
  intervalMs: number;
  tickCount: number;
  lastStatus: Status;
  lastTickTime: number;
  averageTickMs: number;
}

function assertTickRate(rate: number): void {
  if (!Number.isFinite(rate) || rate <= 0) {
    throw new ConfigurationError("tick rate must be a positive number", { tickRate: rate });
  }
}

/**
 * Drives one root node either on demand ({@link tickOnce}) or on a fixed
 * cadence ({@link start}). The loop sleeps for what remains of the period
 * after each tick, never a negative amount.
 *
 * A manager never ticks its root concurrently with itself: a `tickOnce`
 * issued while another tick is in flight joins that tick and resolves with
 * its status.
 */
export class TickManager {
  root: BehaviorNode | null;
  blackboard: Blackboard;
  onTickStart: TickStartCallback | null;
  onTick: TickCallback | null;
  onStatusChange: StatusChangeCallback | null;

  private rate: number;
  private readonly logger: StructuredLogger;
  private readonly now: () => number;
  private readonly runtimeFactory: (signal?: AbortSignal) => TickRuntime;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private inFlight: Promise<Status> | null = null;
  private ticks = 0;
  private totalTickMs = 0;
  private lastTick = 0;
  private last: Status = "failure";

  constructor(options: TickManagerOptions = {}) {
    const rate = options.tickRate ?? ENGINE_DEFAULTS.tickRate;
    assertTickRate(rate);
    this.rate = rate;
    this.root = options.root ?? null;
    this.blackboard = options.blackboard ?? new Blackboard();
    this.onTickStart = options.onTickStart ?? null;
    this.onTick = options.onTick ?? null;
    this.onStatusChange = options.onStatusChange ?? null;
    this.logger = options.logger ?? createDefaultLogger();
    this.now = options.now ?? (() => Date.now());
    this.runtimeFactory =
      options.runtimeFactory ??
      ((signal) =>
        createTickRuntime({ blackboard: this.blackboard, logger: this.logger, now: this.now, signal }));
  }

  get tickRate(): number {
    return this.rate;
  }

  get intervalMs(): number {
    return 1_000 / this.rate;
  }

  get running(): boolean {
    return this.controller !== null;
  }

  get tickCount(): number {
    return this.ticks;
  }

  get lastStatus(): Status {
    return this.last;
  }

  get lastTickTime(): number {
    return this.lastTick;
  }

  /** Changes the cadence; the running loop picks it up after its current sleep. */
  setTickRate(rate: number): void {
    assertTickRate(rate);
    this.rate = rate;
  }

  /**
   * Starts the tick loop. `root` replaces the current root when given. The
   * root is reset before the first tick. Calling `start` on a running manager
   * does nothing; calling it while a stop is pending starts the new loop once
   * the old one exited.
   */
  start(root?: BehaviorNode | null): void {
    if (root) {
      this.root = root;
    }
    const current = this.root;
    if (!current) {
      throw new ConfigurationError("cannot start a tick manager without a root node");
    }
    if (this.controller) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    const pending = this.stopping;
    this.loop = pending
      ? pending.then(() => this.launch(current, controller.signal))
      : this.launch(current, controller.signal);
    this.logger.debug("tick_manager_started", { root: current.name, tick_rate: this.rate });
  }

  /**
   * Stops the loop and waits until it exited, so no tick starts after this
   * promise resolves unless `start` was called again meanwhile. The in-flight
   * tick sees its signal aborted.
   */
  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) {
      await this.stopping;
      return;
    }
    controller.abort();
    const stopping = this.loop ?? Promise.resolve();
    this.controller = null;
    this.loop = null;
    this.stopping = stopping;
    try {
      await stopping;
    } finally {
      if (this.stopping === stopping) {
        this.stopping = null;
      }
    }
    this.logger.debug("tick_manager_stopped", { tick_count: this.ticks });
  }

  /**
   * Ticks the root once: records the status, then notifies
   * `onStatusChange` (only when the status changed) and `onTick`. Callback
   * errors propagate to the caller.
   */
  async tickOnce(signal?: AbortSignal): Promise<Status> {
    if (this.inFlight) {
      return this.inFlight;
    }
    const root = this.root;
    if (!root) {
      throw new ConfigurationError("cannot tick without a root node");
    }
    const run = this.performTick(root, signal);
    this.inFlight = run;
    try {
      return await run;
    } finally {
      if (this.inFlight === run) {
        this.inFlight = null;
      }
    }
  }

  getStats(): TickManagerStats {
    return {
      running: this.running,
      tickRate: this.rate,
      intervalMs: this.intervalMs,
      tickCount: this.ticks,
      lastStatus: this.last,
      lastTickTime: this.lastTick,
      averageTickMs: this.ticks === 0 ? 0 : this.totalTickMs / this.ticks,
    };
  }

  resetStats(): void {
    this.ticks = 0;
    this.totalTickMs = 0;
    this.lastTick = 0;
    this.last = "failure";
  }

  private async performTick(root: BehaviorNode, signal?: AbortSignal): Promise<Status> {
    const startedAt = this.now();
    this.onTickStart?.(this.ticks + 1);
    const status = await root.tick(this.runtimeFactory(signal));
    this.ticks += 1;
    this.lastTick = startedAt;
    this.totalTickMs += this.now() - startedAt;
    const previous = this.last;
    this.last = status;
    if (previous !== status && this.onStatusChange) {
      await this.onStatusChange(previous, status);
    }
    if (this.onTick) {
      await this.onTick(status, this.ticks);
    }
    return status;
  }

  private launch(root: BehaviorNode, signal: AbortSignal): Promise<void> {
    if (signal.aborted) {
      return Promise.resolve();
    }
    root.reset();
    return this.runLoop(signal);
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const startedAt = this.now();
      let delay: number;
      try {
        await this.tickOnce(signal);
        delay = Math.max(0, this.intervalMs - (this.now() - startedAt));
      } catch (error) {
        if (signal.aborted) {
          break;
        }
        this.logger.error("tick_loop_error", { root: this.root?.name ?? null, error: describeError(error) });
        delay = this.intervalMs;
      }
      if (!(await sleep(delay, signal))) {
        break;
      }
    }
  }
}
