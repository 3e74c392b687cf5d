import type { Status } from "../core/status.js";
import { ActionNode, type ParamBindings } from "./leaf.js";
import type { TickRuntime } from "./runtime.js";

/** Default wait applied by the waiting leaves. */
export const DEFAULT_LEAF_TIMEOUT_MS = 1000;

export interface WaitForEventOptions {
  event: string;
  /** `null` waits until the event fires or the tick is cancelled. */
  timeoutMs?: number | null;
  bindings?: ParamBindings;
}

/**
 * Waits for `event` on the tree's dispatcher. An occurrence latched before
 * the tick is consumed immediately. Timeout or cancellation yields `failure`.
 */
export class WaitForEventAction extends ActionNode {
  static readonly bindableParams: readonly string[] = ["event", "timeout"];

  readonly event: string;
  readonly timeoutMs: number | null;

  get kind(): string {
    return "WaitForEvent";
  }

  constructor(name: string, options: WaitForEventOptions) {
    super(name, WaitForEventAction.bindableParams, options.bindings);
    this.event = options.event;
    this.timeoutMs = options.timeoutMs === undefined ? DEFAULT_LEAF_TIMEOUT_MS : options.timeoutMs;
  }

  protected async execute(runtime: TickRuntime): Promise<Status> {
    const event = this.resolveString(runtime, "event", this.event);
    const timeout = this.resolveParam(runtime, "timeout", this.timeoutMs);
    const fired = await runtime.events.waitFor(event, {
      timeoutMs: typeof timeout === "number" ? timeout : null,
      signal: runtime.signal,
    });
    return fired ? "success" : "failure";
  }
}

export interface EmitEventOptions {
  event: string;
  data?: unknown;
  bindings?: ParamBindings;
}

/** Emits `event` on the tree's dispatcher with the runtime source, then succeeds. */
export class EmitEventAction extends ActionNode {
  static readonly bindableParams: readonly string[] = ["event", "data"];

  readonly event: string;
  readonly data: unknown;

  get kind(): string {
    return "EmitEvent";
  }

  constructor(name: string, options: EmitEventOptions) {
    super(name, EmitEventAction.bindableParams, options.bindings);
    this.event = options.event;
    this.data = options.data ?? null;
  }

  protected execute(runtime: TickRuntime): Status {
    const event = this.resolveString(runtime, "event", this.event);
    if (event.length === 0) {
      return "failure";
    }
    runtime.events.emit(event, runtime.source, this.resolveParam(runtime, "data", this.data));
    return "success";
  }
}
