import { ConfigurationError, StructuralError } from "../core/errors.js";
import type { Status } from "../core/status.js";
import type { CommunicationMiddleware } from "../forest/communication.js";
import { createDefaultLogger, type StructuredLogger } from "../logger.js";
import type { BehaviorNode, NodeStats } from "../nodes/base.js";
import { createTickRuntime } from "../nodes/runtime.js";
import { Blackboard, type BlackboardStats } from "./blackboard.js";
import { EventDispatcher } from "./eventDispatcher.js";
import { TickManager, type TickCallback, type StatusChangeCallback, type TickManagerStats } from "./tickManager.js";
import { validateTree } from "./validation.js";

/** Event names emitted by a tree on its dispatcher. */
export const TREE_EVENTS = {
  tickStart: "tree_tick_start",
  tickEnd: "tree_tick_end",
  started: "tree_started",
  stopped: "tree_stopped",
  reset: "tree_reset",
  statusChanged: "tree_status_changed",
  rootChanged: "tree_root_changed",
} as const;

export interface BehaviorTreeOptions {
  name: string;
  description?: string;
  root?: BehaviorNode | null;
  blackboard?: Blackboard;
  events?: EventDispatcher;
  tickRate?: number;
  logger?: StructuredLogger;
  now?: () => number;
  onTick?: TickCallback;
  onStatusChange?: StatusChangeCallback;
}

/**
 * Context a forest hands to the trees it owns: the identity and capabilities
 * of the forest node, the forest dispatcher and its middleware.
 */
export interface ForestBinding {
  source: string;
  capabilities: ReadonlySet<string>;
  events: EventDispatcher;
  communication: CommunicationMiddleware | null;
}

export interface BehaviorTreeStats {
  name: string;
  description: string;
  hasRoot: boolean;
  nodeCount: number;
  maxDepth: number;
  nodesByKind: Record<string, number>;
  statusCounts: Record<Status, number>;
  tickManager: TickManagerStats;
  blackboard: BlackboardStats;
}

/**
 * A root node, its blackboard, its event dispatcher and the tick manager
 * driving it. The manager always points at the tree's current root and
 * blackboard.
 */
export class BehaviorTree {
  readonly name: string;
  description: string;
  readonly blackboard: Blackboard;
  readonly tickManager: TickManager;

  private rootNode: BehaviorNode | null = null;
  private readonly ownEvents: EventDispatcher;
  private binding: ForestBinding | null = null;
  private readonly logger: StructuredLogger;
  private readonly now: () => number;
  private readonly userOnTick: TickCallback | null;
  private readonly userOnStatusChange: StatusChangeCallback | null;

  constructor(options: BehaviorTreeOptions) {
    this.name = options.name;
    this.description = options.description ?? "";
    this.blackboard = options.blackboard ?? new Blackboard();
    this.ownEvents = options.events ?? new EventDispatcher({ now: options.now });
    this.logger = options.logger ?? createDefaultLogger();
    this.now = options.now ?? (() => Date.now());
    this.userOnTick = options.onTick ?? null;
    this.userOnStatusChange = options.onStatusChange ?? null;
    this.tickManager = new TickManager({
      blackboard: this.blackboard,
      tickRate: options.tickRate,
      logger: this.logger,
      now: this.now,
      runtimeFactory: (signal) =>
        createTickRuntime({
          blackboard: this.blackboard,
          events: this.events,
          communication: this.binding?.communication ?? null,
          logger: this.logger,
          source: this.binding?.source ?? this.name,
          capabilities: this.binding?.capabilities ?? new Set<string>(),
          now: this.now,
          signal,
        }),
      onTickStart: (tickNumber) => {
        this.events.emit(TREE_EVENTS.tickStart, this.name, { tick: tickNumber });
      },
      onTick: async (status, tickCount) => {
        this.events.emit(TREE_EVENTS.tickEnd, this.name, { status, tick: tickCount });
        await this.userOnTick?.(status, tickCount);
      },
      onStatusChange: async (previous, next) => {
        this.events.emit(TREE_EVENTS.statusChanged, this.name, { previous, next });
        await this.userOnStatusChange?.(previous, next);
      },
    });
    if (options.root) {
      this.loadFromRoot(options.root);
    }
  }

  get root(): BehaviorNode | null {
    return this.rootNode;
  }

  /** Dispatcher in use: the forest's once the tree joined one, its own otherwise. */
  get events(): EventDispatcher {
    return this.binding?.events ?? this.ownEvents;
  }

  get running(): boolean {
    return this.tickManager.running;
  }

  /** Validates `root` and installs it. Broken child-count invariants throw a {@link StructuralError}. */
  loadFromRoot(root: BehaviorNode): void {
    const report = validateTree(root);
    if (!report.valid) {
      throw new StructuralError(`tree "${this.name}" failed structural validation`, {
        tree: this.name,
        errors: report.errors,
      });
    }
    for (const warning of report.warnings) {
      this.logger.warn("tree_validation_warning", { tree: this.name, ...warning });
    }
    this.setRoot(root);
  }

  setRoot(root: BehaviorNode | null): void {
    this.rootNode = root;
    this.tickManager.root = root;
    this.events.emit(TREE_EVENTS.rootChanged, this.name, { root: root?.name ?? null });
  }

  /** Ticks the root once. Throws a {@link ConfigurationError} when no root is set. */
  async tick(signal?: AbortSignal): Promise<Status> {
    if (!this.rootNode) {
      throw new ConfigurationError(`tree "${this.name}" has no root node`);
    }
    return this.tickManager.tickOnce(signal);
  }

  start(tickRate?: number): void {
    if (tickRate !== undefined) {
      this.tickManager.setTickRate(tickRate);
    }
    if (this.tickManager.running) {
      return;
    }
    this.tickManager.start(this.rootNode);
    this.events.emit(TREE_EVENTS.started, this.name, { tick_rate: this.tickManager.tickRate });
    this.logger.info("tree_started", { tree: this.name, tick_rate: this.tickManager.tickRate });
  }

  /** Stops the tick loop. Resolves once any pending stop finished too. */
  async stop(): Promise<void> {
    const wasRunning = this.tickManager.running;
    await this.tickManager.stop();
    if (!wasRunning) {
      return;
    }
    this.events.emit(TREE_EVENTS.stopped, this.name, { tick_count: this.tickManager.tickCount });
    this.logger.info("tree_stopped", { tree: this.name, tick_count: this.tickManager.tickCount });
  }

  /** Resets every node, clears the blackboard and the tick statistics. The structure is kept. */
  reset(): void {
    this.rootNode?.reset();
    this.blackboard.clear();
    this.tickManager.resetStats();
    this.events.emit(TREE_EVENTS.reset, this.name, null);
  }

  /** Attaches the tree to a forest node. */
  joinForest(binding: ForestBinding): void {
    this.binding = binding;
  }

  leaveForest(): void {
    this.binding = null;
  }

  findNode(name: string): BehaviorNode | null {
    return this.rootNode?.findNode(name) ?? null;
  }

  getAllNodes(): BehaviorNode[] {
    return this.rootNode ? [this.rootNode, ...this.rootNode.getDescendants()] : [];
  }

  getNodeStats(name: string): NodeStats | null {
    return this.findNode(name)?.getStats() ?? null;
  }

  getStats(): BehaviorTreeStats {
    const nodes = this.getAllNodes();
    const nodesByKind: Record<string, number> = {};
    const statusCounts: Record<Status, number> = { success: 0, failure: 0, running: 0 };
    let maxDepth = 0;
    for (const node of nodes) {
      nodesByKind[node.kind] = (nodesByKind[node.kind] ?? 0) + 1;
      statusCounts[node.status] += 1;
      maxDepth = Math.max(maxDepth, node.getDepth());
    }
    return {
      name: this.name,
      description: this.description,
      hasRoot: this.rootNode !== null,
      nodeCount: nodes.length,
      maxDepth,
      nodesByKind,
      statusCounts,
      tickManager: this.tickManager.getStats(),
      blackboard: this.blackboard.getStats(),
    };
  }
}
