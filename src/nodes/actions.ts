import type { Status } from "../core/status.js";
import { LOG_LEVELS, type LogLevel } from "../logger.js";
import { ActionNode, type ParamBindings } from "./leaf.js";
import type { TickRuntime } from "./runtime.js";

export type ActionCallback = (runtime: TickRuntime) => Status | Promise<Status>;

/** Action delegating to a function, the usual way to plug user logic in. */
export class CallbackAction extends ActionNode {
  static readonly bindableParams: readonly string[] = [];

  get kind(): string {
    return "Action";
  }

  constructor(
    name: string,
    private readonly callback: ActionCallback,
  ) {
    super(name, CallbackAction.bindableParams);
  }

  protected execute(runtime: TickRuntime): Status | Promise<Status> {
    return this.callback(runtime);
  }
}

export interface WaitActionOptions {
  durationMs: number;
  bindings?: ParamBindings;
}

/**
 * Reports `running` until `durationMs` elapsed on the runtime clock since its
 * first tick, then succeeds and re-arms.
 */
export class WaitAction extends ActionNode {
  static readonly bindableParams: readonly string[] = ["duration"];

  readonly durationMs: number;
  private startedAt: number | null = null;

  get kind(): string {
    return "Wait";
  }

  constructor(name: string, options: WaitActionOptions) {
    super(name, WaitAction.bindableParams, options.bindings);
    this.durationMs = options.durationMs;
  }

  /** Milliseconds spent waiting so far, 0 when idle. */
  elapsed(now: number): number {
    return this.startedAt === null ? 0 : now - this.startedAt;
  }

  protected execute(runtime: TickRuntime): Status {
    const now = runtime.now();
    if (this.startedAt === null) {
      this.startedAt = now;
    }
    const duration = this.resolveNumber(runtime, "duration", this.durationMs);
    if (now - this.startedAt >= duration) {
      this.startedAt = null;
      return "success";
    }
    return "running";
  }

  protected override onReset(): void {
    this.startedAt = null;
  }
}

export interface LogActionOptions {
  message: string;
  level?: LogLevel;
  bindings?: ParamBindings;
}

/** Writes a message through the runtime logger and succeeds. */
export class LogAction extends ActionNode {
  static readonly bindableParams: readonly string[] = ["message", "level"];

  readonly message: string;
  readonly level: LogLevel;

  get kind(): string {
    return "Log";
  }

  constructor(name: string, options: LogActionOptions) {
    super(name, LogAction.bindableParams, options.bindings);
    this.message = options.message;
    this.level = options.level ?? "info";
  }

  protected execute(runtime: TickRuntime): Status {
    const message = String(this.resolveParam(runtime, "message", this.message));
    const requested = this.resolveString(runtime, "level", this.level);
    const level = LOG_LEVELS.find((candidate) => candidate === requested) ?? this.level;
    runtime.logger[level]("tree_log", { node: this.name, source: runtime.source, message });
    return "success";
  }
}

export interface SetBlackboardOptions {
  key: string;
  value: unknown;
  bindings?: ParamBindings;
}

/** Stores a value on the blackboard. Fails when the key is empty. */
export class SetBlackboardAction extends ActionNode {
  static readonly bindableParams: readonly string[] = ["key", "value"];

  readonly key: string;
  readonly value: unknown;

  get kind(): string {
    return "SetBlackboard";
  }

  constructor(name: string, options: SetBlackboardOptions) {
    super(name, SetBlackboardAction.bindableParams, options.bindings);
    this.key = options.key;
    this.value = options.value;
  }

  protected async execute(runtime: TickRuntime): Promise<Status> {
    const key = this.resolveString(runtime, "key", this.key);
    if (key.length === 0) {
      return "failure";
    }
    await runtime.blackboard.setAsync(key, this.resolveParam(runtime, "value", this.value));
    return "success";
  }
}
