import { describeError, StructuralError } from "../core/errors.js";
import type { Status } from "../core/status.js";
import type { TickRuntime } from "./runtime.js";

/** Read-only summary returned by {@link BehaviorNode.getStats}. */
export interface NodeStats {
  name: string;
  kind: string;
  path: string;
  status: Status;
  tickCount: number;
  lastTickTime: number;
  lastDurationMs: number;
  childCount: number;
  depth: number;
}

/**
 * Base class of every node.
 *
 * A node exclusively owns its children: adopting a child detaches it from
 * its previous parent, and a node can never become its own ancestor. The
 * public {@link tick} method is the fault boundary of the engine; anything
 * thrown by {@link onTick} is logged and reported as `failure`.
 */
export abstract class BehaviorNode {
  /** Registry type name of the node class. */
  abstract readonly kind: string;

  readonly name: string;
  private readonly childList: BehaviorNode[] = [];
  private parentNode: BehaviorNode | null = null;
  private currentStatus: Status = "failure";
  private ticks = 0;
  private lastTick = 0;
  private lastDuration = 0;

  /**
   * @param maxChildren Children allowed by the node kind: 0 for leaves, 1 for
   *   decorators, `Infinity` for composites.
   */
  protected constructor(
    name: string,
    protected readonly maxChildren: number,
  ) {
    if (name.trim().length === 0) {
      throw new StructuralError("node name must not be empty");
    }
    this.name = name;
  }

  get children(): readonly BehaviorNode[] {
    return this.childList;
  }

  get parent(): BehaviorNode | null {
    return this.parentNode;
  }

  get status(): Status {
    return this.currentStatus;
  }

  get tickCount(): number {
    return this.ticks;
  }

  /** Clock reading taken when the last tick started, 0 before the first tick. */
  get lastTickTime(): number {
    return this.lastTick;
  }

  get lastDurationMs(): number {
    return this.lastDuration;
  }

  /** Ticks the node. Never throws: faults become `failure`. */
  async tick(runtime: TickRuntime): Promise<Status> {
    const startedAt = runtime.now();
    let status: Status;
    try {
      status = await this.onTick(runtime);
    } catch (error) {
      runtime.logger.error("node_tick_failed", {
        node: this.name,
        kind: this.kind,
        path: this.getPath(),
        source: runtime.source,
        error: describeError(error),
      });
      status = "failure";
    }
    this.currentStatus = status;
    this.ticks += 1;
    this.lastTick = startedAt;
    this.lastDuration = runtime.now() - startedAt;
    return status;
  }

  /** Node logic. May throw; {@link tick} converts the fault into `failure`. */
  protected abstract onTick(runtime: TickRuntime): Promise<Status>;

  /**
   * Resets the subtree depth-first: children first, then this node's status
   * (back to `failure`), timing and per-kind state.
   */
  reset(): void {
    for (const child of this.childList) {
      child.reset();
    }
    this.currentStatus = "failure";
    this.lastTick = 0;
    this.lastDuration = 0;
    this.onReset();
  }

  /** Hook clearing per-kind state such as counters or wait timers. */
  protected onReset(): void {}

  addChild(child: BehaviorNode): void {
    if (this.maxChildren === 0) {
      throw new StructuralError(`${this.kind} "${this.name}" cannot have children`, {
        node: this.name,
        kind: this.kind,
        child: child.name,
      });
    }
    if (this.childList.length >= this.maxChildren) {
      throw new StructuralError(`${this.kind} "${this.name}" accepts at most ${this.maxChildren} child(ren)`, {
        node: this.name,
        kind: this.kind,
        child: child.name,
      });
    }
    this.assertNotAncestor(child);
    child.parentNode?.removeChild(child);
    child.parentNode = this;
    this.childList.push(child);
  }

  /** Detaches `child`; returns whether it was a child of this node. */
  removeChild(child: BehaviorNode): boolean {
    const index = this.childList.indexOf(child);
    if (index === -1) {
      return false;
    }
    this.childList.splice(index, 1);
    child.parentNode = null;
    return true;
  }

  getChild(index: number): BehaviorNode | undefined {
    return this.childList[index];
  }

  /** Depth-first search of the subtree (this node included) by name. */
  findNode(name: string): BehaviorNode | null {
    if (this.name === name) {
      return this;
    }
    for (const child of this.childList) {
      const found = child.findNode(name);
      if (found) {
        return found;
      }
    }
    return null;
  }

  /** Slash-separated names from the root down to this node. */
  getPath(): string {
    return this.parentNode ? `${this.parentNode.getPath()}/${this.name}` : this.name;
  }

  getDepth(): number {
    return this.parentNode ? this.parentNode.getDepth() + 1 : 0;
  }

  /** Every node below this one, depth-first pre-order. */
  getDescendants(): BehaviorNode[] {
    const result: BehaviorNode[] = [];
    for (const child of this.childList) {
      result.push(child, ...child.getDescendants());
    }
    return result;
  }

  getStats(): NodeStats {
    return {
      name: this.name,
      kind: this.kind,
      path: this.getPath(),
      status: this.currentStatus,
      tickCount: this.ticks,
      lastTickTime: this.lastTick,
      lastDurationMs: this.lastDuration,
      childCount: this.childList.length,
      depth: this.getDepth(),
    };
  }

  private assertNotAncestor(child: BehaviorNode): void {
    let cursor: BehaviorNode | null = this;
    while (cursor) {
      if (cursor === child) {
        throw new StructuralError(`adding "${child.name}" under "${this.name}" would create a cycle`, {
          node: this.name,
          child: child.name,
        });
      }
      cursor = cursor.parentNode;
    }
  }
}
