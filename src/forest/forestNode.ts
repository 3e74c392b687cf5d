import { describeError } from "../core/errors.js";
import type { Status } from "../core/status.js";
import type { BehaviorTree } from "../engine/behaviorTree.js";
import { createDefaultLogger, type StructuredLogger } from "../logger.js";

/** Role a participant plays in its forest. */
export type ForestNodeKind = "master" | "worker" | "monitor" | "coordinator";

export const FOREST_NODE_KINDS: readonly ForestNodeKind[] = ["master", "worker", "monitor", "coordinator"];

export interface ForestNodeOptions {
  name: string;
  tree: BehaviorTree;
  kind?: ForestNodeKind;
  /** Defaults to a single capability named after the kind. */
  capabilities?: Iterable<string>;
  /** Names of the forest nodes this one relies on. */
  dependencies?: Iterable<string>;
  metadata?: Record<string, unknown>;
  logger?: StructuredLogger;
}

export interface ForestNodeStats {
  name: string;
  kind: ForestNodeKind;
  status: Status;
  capabilities: string[];
  dependencies: string[];
  tickCount: number;
  running: boolean;
}

/** A behaviour tree taking part in a forest, with its role and capabilities. */
export class ForestNode {
  readonly name: string;
  readonly tree: BehaviorTree;
  readonly kind: ForestNodeKind;
  readonly metadata: Record<string, unknown>;

  private readonly capabilitySet: Set<string>;
  private readonly dependencySet: Set<string>;
  private currentStatus: Status = "failure";
  private readonly logger: StructuredLogger;

  constructor(options: ForestNodeOptions) {
    this.name = options.name;
    this.tree = options.tree;
    this.kind = options.kind ?? "worker";
    this.capabilitySet = new Set(options.capabilities ?? [this.kind]);
    this.dependencySet = new Set(options.dependencies ?? []);
    this.metadata = { ...(options.metadata ?? {}) };
    this.logger = options.logger ?? createDefaultLogger();
  }

  get status(): Status {
    return this.currentStatus;
  }

  /** Live view of the capabilities; the forest reads it on every tick. */
  get capabilities(): ReadonlySet<string> {
    return this.capabilitySet;
  }

  get dependencies(): ReadonlySet<string> {
    return this.dependencySet;
  }

  addCapability(capability: string): void {
    this.capabilitySet.add(capability);
  }

  removeCapability(capability: string): boolean {
    return this.capabilitySet.delete(capability);
  }

  hasCapability(capability: string): boolean {
    return this.capabilitySet.has(capability);
  }

  addDependency(name: string): void {
    this.dependencySet.add(name);
  }

  removeDependency(name: string): boolean {
    return this.dependencySet.delete(name);
  }

  hasDependency(name: string): boolean {
    return this.dependencySet.has(name);
  }

  /** Ticks the tree once. Any error (a missing root included) yields `failure`. */
  async tick(signal?: AbortSignal): Promise<Status> {
    try {
      this.currentStatus = await this.tree.tick(signal);
    } catch (error) {
      this.logger.error("forest_node_tick_failed", { node: this.name, error: describeError(error) });
      this.currentStatus = "failure";
    }
    return this.currentStatus;
  }

  /** Copies the last status reported by the tree's own tick loop. */
  syncStatus(): Status {
    if (this.tree.tickManager.tickCount > 0) {
      this.currentStatus = this.tree.tickManager.lastStatus;
    }
    return this.currentStatus;
  }

  reset(): void {
    this.tree.reset();
    this.currentStatus = "failure";
  }

  getStats(): ForestNodeStats {
    return {
      name: this.name,
      kind: this.kind,
      status: this.currentStatus,
      capabilities: [...this.capabilitySet].sort(),
      dependencies: [...this.dependencySet].sort(),
      tickCount: this.tree.tickManager.tickCount,
      running: this.tree.running,
    };
  }
}
