import { countStatuses, resolveParallel, type ParallelPolicy, type Status } from "../core/status.js";
import { BehaviorNode } from "./base.js";
import type { TickRuntime } from "./runtime.js";

/**
 * Base of nodes aggregating any number of children. Composites keep no
 * memory of which child was running: every tick restarts from the first
 * child.
 */
export abstract class CompositeNode extends BehaviorNode {
  protected constructor(name: string, children: readonly BehaviorNode[]) {
    super(name, Number.POSITIVE_INFINITY);
    for (const child of children) {
      this.addChild(child);
    }
  }
}

/**
 * Ticks children left to right. Stops at the first child that does not
 * succeed and reports its status; succeeds when every child succeeded.
 */
export class SequenceNode extends CompositeNode {
  get kind(): string {
    return "Sequence";
  }

  constructor(name: string, children: readonly BehaviorNode[] = []) {
    super(name, children);
  }

  protected async onTick(runtime: TickRuntime): Promise<Status> {
    for (const child of this.children) {
      const status = await child.tick(runtime);
      if (status !== "success") {
        return status;
      }
    }
    return "success";
  }
}

/**
 * Ticks children left to right. Stops at the first child that does not fail
 * and reports its status; fails when every child failed (or there is none).
 */
export class SelectorNode extends CompositeNode {
  get kind(): string {
    return "Selector";
  }

  constructor(name: string, children: readonly BehaviorNode[] = []) {
    super(name, children);
  }

  protected async onTick(runtime: TickRuntime): Promise<Status> {
    for (const child of this.children) {
      const status = await child.tick(runtime);
      if (status !== "failure") {
        return status;
      }
    }
    return "failure";
  }
}

/**
 * Ticks every child concurrently on each tick and folds the results with
 * its {@link ParallelPolicy}.
 */
export class ParallelNode extends CompositeNode {
  get kind(): string {
    return "Parallel";
  }

  constructor(
    name: string,
    children: readonly BehaviorNode[] = [],
    readonly policy: ParallelPolicy = "succeed_on_all",
  ) {
    super(name, children);
  }

  protected async onTick(runtime: TickRuntime): Promise<Status> {
    const statuses = await Promise.all(this.children.map((child) => child.tick(runtime)));
    return resolveParallel(this.policy, countStatuses(statuses));
  }
}
