import { ENGINE_DEFAULTS } from "../config/engineConfig.js";
import { ConfigurationError, describeError } from "../core/errors.js";
import type { Status } from "../core/status.js";
import { Blackboard, type BlackboardStats } from "../engine/blackboard.js";
import type { ForestBinding } from "../engine/behaviorTree.js";
import { EventDispatcher } from "../engine/eventDispatcher.js";
import { createDefaultLogger, type StructuredLogger } from "../logger.js";
import { sleep } from "../runtime/timers.js";
import { CommunicationMiddleware, type CommunicationStats } from "./communication.js";
import type { ForestMiddleware } from "./middleware.js";
import type { ForestNode, ForestNodeKind, ForestNodeStats } from "./forestNode.js";

/** Event names emitted on the forest dispatcher. */
export const FOREST_EVENTS = {
  nodeAdded: "node_added",
  nodeRemoved: "node_removed",
  started: "forest_started",
  stopped: "forest_stopped",
  cycle: "forest_cycle",
  reset: "forest_reset",
} as const;

export interface BehaviorForestOptions {
  name: string;
  blackboard?: Blackboard;
  events?: EventDispatcher;
  logger?: StructuredLogger;
  now?: () => number;
  /** Period of the monitoring loop run while the forest is started. Defaults to 100 ms. */
  monitorIntervalMs?: number;
  /**
   * Middleware attached at construction. Defaults to a fresh
   * {@link CommunicationMiddleware} over the forest blackboard; pass `false`
   * for none.
   */
  communication?: CommunicationMiddleware | false;
}

export interface BehaviorForestStats {
  name: string;
  running: boolean;
  nodeCount: number;
  nodesByKind: Record<string, number>;
  statusCounts: Record<Status, number>;
  nodes: ForestNodeStats[];
  middleware: string[];
  blackboard: BlackboardStats;
  communication: CommunicationStats | null;
}

/**
 * A set of cooperating trees. Trees joined to a forest share its event
 * dispatcher and reach each other only through the forest middleware.
 *
 * {@link tick} runs one synchronous cycle over every node. {@link start}
 * instead lets each tree tick on its own cadence and runs a monitoring loop
 * that refreshes node statuses and runs the middleware hooks.
 */
export class BehaviorForest {
  readonly name: string;
  readonly blackboard: Blackboard;
  readonly events: EventDispatcher;

  private readonly nodes = new Map<string, ForestNode>();
  private readonly middlewareList: ForestMiddleware[] = [];
  private readonly inFlight = new Map<string, AbortController>();
  private readonly logger: StructuredLogger;
  readonly monitorIntervalMs: number;
  private monitor: { controller: AbortController; loop: Promise<void> } | null = null;
  private stopping: Promise<void> | null = null;

  constructor(options: BehaviorForestOptions) {
    this.name = options.name;
    this.blackboard = options.blackboard ?? new Blackboard({ now: options.now });
    this.events = options.events ?? new EventDispatcher({ now: options.now });
    this.logger = options.logger ?? createDefaultLogger();
    this.monitorIntervalMs = options.monitorIntervalMs ?? ENGINE_DEFAULTS.monitorIntervalMs;
    if (options.communication !== false) {
      this.addMiddleware(
        options.communication ??
          new CommunicationMiddleware({ sharedBlackboard: this.blackboard, logger: this.logger, now: options.now }),
      );
    }
  }

  get running(): boolean {
    return this.monitor !== null;
  }

  /** First communication middleware attached, used by the communication leaves. */
  get communication(): CommunicationMiddleware | null {
    for (const middleware of this.middlewareList) {
      if (middleware instanceof CommunicationMiddleware) {
        return middleware;
      }
    }
    return null;
  }

  get middleware(): readonly ForestMiddleware[] {
    return this.middlewareList;
  }

  get size(): number {
    return this.nodes.size;
  }

  // -- membership ----------------------------------------------------------

  /** Adds a node. Names are unique within a forest. Starts the tree when the forest runs. */
  addNode(node: ForestNode): void {
    if (this.nodes.has(node.name)) {
      throw new ConfigurationError(`forest "${this.name}" already has a node named "${node.name}"`, {
        forest: this.name,
        node: node.name,
      });
    }
    this.nodes.set(node.name, node);
    const forest = this;
    const binding: ForestBinding = {
      source: node.name,
      capabilities: node.capabilities,
      events: this.events,
      get communication() {
        return forest.communication;
      },
    };
    node.tree.joinForest(binding);
    if (this.running && node.tree.root) {
      node.tree.start();
    }
    this.events.emit(FOREST_EVENTS.nodeAdded, this.name, { node: node.name, kind: node.kind });
    this.logger.info("forest_node_added", { forest: this.name, node: node.name, kind: node.kind });
  }

  /**
   * Removes a node: cancels its in-flight tick, stops its tree and detaches
   * it from the forest. Returns whether the node existed.
   */
  async removeNode(name: string): Promise<boolean> {
    const node = this.nodes.get(name);
    if (!node) {
      return false;
    }
    this.nodes.delete(name);
    this.inFlight.get(name)?.abort();
    this.inFlight.delete(name);
    await node.tree.stop();
    node.tree.leaveForest();
    this.events.emit(FOREST_EVENTS.nodeRemoved, this.name, { node: name });
    this.logger.info("forest_node_removed", { forest: this.name, node: name });
    return true;
  }

  getNode(name: string): ForestNode | undefined {
    return this.nodes.get(name);
  }

  getNodes(): ForestNode[] {
    return [...this.nodes.values()];
  }

  getNodesByKind(kind: ForestNodeKind): ForestNode[] {
    return this.getNodes().filter((node) => node.kind === kind);
  }

  getNodesByCapability(capability: string): ForestNode[] {
    return this.getNodes().filter((node) => node.hasCapability(capability));
  }

  // -- middleware ----------------------------------------------------------

  addMiddleware(middleware: ForestMiddleware): void {
    this.middlewareList.push(middleware);
    middleware.initialize?.(this);
    this.logger.debug("forest_middleware_added", { forest: this.name, middleware: middleware.name });
  }

  /** Detaches `middleware` (or the first one with that name) and disposes it. */
  async removeMiddleware(middleware: ForestMiddleware | string): Promise<boolean> {
    const index = this.middlewareList.findIndex((candidate) =>
      typeof middleware === "string" ? candidate.name === middleware : candidate === middleware,
    );
    if (index === -1) {
      return false;
    }
    const [removed] = this.middlewareList.splice(index, 1);
    await removed.dispose?.(this);
    return true;
  }

  // -- ticking -------------------------------------------------------------

  /**
   * Runs one cycle: every middleware `preTick`, then one tick of every node
   * present at the start of the cycle (concurrently), then every middleware
   * `postTick` with the status map.
   */
  async tick(): Promise<Map<string, Status>> {
    await this.runHooks("preTick", (middleware) => middleware.preTick?.(this));
    const participants = this.getNodes();
    const statuses = await Promise.all(participants.map((node) => this.tickNode(node)));
    const results = new Map<string, Status>();
    participants.forEach((node, index) => {
      results.set(node.name, statuses[index]);
    });
    await this.runHooks("postTick", (middleware) => middleware.postTick?.(this, results));
    return results;
  }

  /**
   * Starts every tree that has a root, plus the monitoring loop. Called while
   * a stop is pending, it starts them once that stop finished.
   */
  start(): void {
    if (this.monitor) {
      return;
    }
    const controller = new AbortController();
    const pending = this.stopping;
    const loop = pending
      ? pending.then(() => this.launch(controller.signal))
      : this.launch(controller.signal);
    this.monitor = { controller, loop };
    this.events.emit(FOREST_EVENTS.started, this.name, { nodes: this.nodes.size });
    this.logger.info("forest_started", { forest: this.name, nodes: this.nodes.size });
  }

  /** Stops the monitoring loop and every tree, waiting for all of them to exit. */
  async stop(): Promise<void> {
    const monitor = this.monitor;
    if (!monitor) {
      await this.stopping;
      return;
    }
    monitor.controller.abort();
    this.monitor = null;
    const stopping = this.halt(monitor.loop);
    this.stopping = stopping;
    try {
      await stopping;
    } finally {
      if (this.stopping === stopping) {
        this.stopping = null;
      }
    }
    this.events.emit(FOREST_EVENTS.stopped, this.name, { nodes: this.nodes.size });
    this.logger.info("forest_stopped", { forest: this.name });
  }

  /** Resets every node and clears the forest blackboard. */
  reset(): void {
    for (const node of this.nodes.values()) {
      node.reset();
    }
    this.blackboard.clear();
    this.events.emit(FOREST_EVENTS.reset, this.name, null);
  }

  getStats(): BehaviorForestStats {
    const nodesByKind: Record<string, number> = {};
    const statusCounts: Record<Status, number> = { success: 0, failure: 0, running: 0 };
    for (const node of this.nodes.values()) {
      nodesByKind[node.kind] = (nodesByKind[node.kind] ?? 0) + 1;
      statusCounts[node.status] += 1;
    }
    return {
      name: this.name,
      running: this.running,
      nodeCount: this.nodes.size,
      nodesByKind,
      statusCounts,
      nodes: this.getNodes().map((node) => node.getStats()),
      middleware: this.middlewareList.map((middleware) => middleware.name),
      blackboard: this.blackboard.getStats(),
      communication: this.communication?.getStats() ?? null,
    };
  }

  private async tickNode(node: ForestNode): Promise<Status> {
    const controller = new AbortController();
    this.inFlight.set(node.name, controller);
    try {
      return await node.tick(controller.signal);
    } finally {
      if (this.inFlight.get(node.name) === controller) {
        this.inFlight.delete(node.name);
      }
    }
  }

  private launch(signal: AbortSignal): Promise<void> {
    if (signal.aborted) {
      return Promise.resolve();
    }
    for (const node of this.nodes.values()) {
      if (node.tree.root) {
        node.tree.start();
      } else {
        this.logger.warn("forest_node_without_root", { forest: this.name, node: node.name });
      }
    }
    return this.runMonitor(signal);
  }

  private async halt(loop: Promise<void>): Promise<void> {
    await loop;
    for (const controller of this.inFlight.values()) {
      controller.abort();
    }
    await Promise.all(this.getNodes().map((node) => node.tree.stop()));
  }

  private async runMonitor(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.monitorCycle();
      } catch (error) {
        this.logger.error("forest_monitor_failed", { forest: this.name, error: describeError(error) });
      }
      if (!(await sleep(this.monitorIntervalMs, signal))) {
        break;
      }
    }
  }

  private async monitorCycle(): Promise<void> {
    await this.runHooks("preTick", (middleware) => middleware.preTick?.(this));
    const results = new Map<string, Status>();
    for (const node of this.nodes.values()) {
      results.set(node.name, node.syncStatus());
    }
    await this.runHooks("postTick", (middleware) => middleware.postTick?.(this, results));
    this.events.emit(FOREST_EVENTS.cycle, this.name, Object.fromEntries(results));
  }

  /** Runs a hook on every middleware in order; a failing hook is logged and skipped. */
  private async runHooks(
    hook: "preTick" | "postTick",
    invoke: (middleware: ForestMiddleware) => void | Promise<void>,
  ): Promise<void> {
    for (const middleware of [...this.middlewareList]) {
      try {
        await invoke(middleware);
      } catch (error) {
        this.logger.error("middleware_hook_failed", {
          forest: this.name,
          middleware: middleware.name,
          hook,
          error: describeError(error),
        });
      }
    }
  }
}
