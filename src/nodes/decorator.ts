import { invertStatus, type Status } from "../core/status.js";
import { BehaviorNode } from "./base.js";
import type { TickRuntime } from "./runtime.js";

/**
 * Base of single-child nodes. Adding a child replaces the current one, and a
 * decorator without a child fails.
 */
export abstract class DecoratorNode extends BehaviorNode {
  protected constructor(name: string, child?: BehaviorNode) {
    super(name, 1);
    if (child) {
      this.addChild(child);
    }
  }

  get child(): BehaviorNode | null {
    return this.children[0] ?? null;
  }

  override addChild(child: BehaviorNode): void {
    const current = this.child;
    if (current === child) {
      return;
    }
    if (current) {
      this.removeChild(current);
    }
    super.addChild(child);
  }

  protected async onTick(runtime: TickRuntime): Promise<Status> {
    const child = this.child;
    if (!child) {
      runtime.logger.warn("decorator_without_child", { node: this.name, kind: this.kind });
      return "failure";
    }
    return this.decorate(await child.tick(runtime), child);
  }

  /** Maps the child's status to this node's status. */
  protected abstract decorate(status: Status, child: BehaviorNode): Status;
}

/** Swaps success and failure; running passes through. */
export class InverterNode extends DecoratorNode {
  get kind(): string {
    return "Inverter";
  }

  constructor(name: string, child?: BehaviorNode) {
    super(name, child);
  }

  protected decorate(status: Status): Status {
    return invertStatus(status);
  }
}

export interface RepeaterOptions {
  child?: BehaviorNode;
  /** Successful runs required before the repeater succeeds. Negative means forever. */
  repeatCount?: number;
}

/**
 * Re-runs its child after every success until `repeatCount` successes were
 * counted. Reports `running` in between. A child failure resets the counter
 * and fails the repeater.
 */
export class RepeaterNode extends DecoratorNode {
  readonly repeatCount: number;
  private completed = 0;

  get kind(): string {
    return "Repeater";
  }

  constructor(name: string, options: RepeaterOptions = {}) {
    super(name, options.child);
    this.repeatCount = options.repeatCount ?? -1;
  }

  /** Successful child runs counted since the last failure or reset. */
  get currentCount(): number {
    return this.completed;
  }

  private get unbounded(): boolean {
    return this.repeatCount < 0;
  }

  protected override async onTick(runtime: TickRuntime): Promise<Status> {
    if (this.repeatCount > 0 && this.completed >= this.repeatCount) {
      return "success";
    }
    return super.onTick(runtime);
  }

  protected decorate(status: Status, child: BehaviorNode): Status {
    if (status === "failure") {
      this.completed = 0;
      return "failure";
    }
    if (status === "running") {
      return "running";
    }
    this.completed += 1;
    if (this.unbounded || this.completed < this.repeatCount) {
      child.reset();
      return "running";
    }
    return "success";
  }

  protected override onReset(): void {
    this.completed = 0;
  }
}

/** Retries its child after every failure; succeeds once the child does. */
export class UntilSuccessNode extends DecoratorNode {
  get kind(): string {
    return "UntilSuccess";
  }

  constructor(name: string, child?: BehaviorNode) {
    super(name, child);
  }

  protected decorate(status: Status, child: BehaviorNode): Status {
    if (status === "failure") {
      child.reset();
      return "running";
    }
    return status;
  }
}

/** Re-runs its child after every success; succeeds once the child fails. */
export class UntilFailureNode extends DecoratorNode {
  get kind(): string {
    return "UntilFailure";
  }

  constructor(name: string, child?: BehaviorNode) {
    super(name, child);
  }

  protected decorate(status: Status, child: BehaviorNode): Status {
    if (status === "failure") {
      return "success";
    }
    if (status === "success") {
      child.reset();
      return "running";
    }
    return "running";
  }
}
