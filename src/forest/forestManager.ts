import { ConfigurationError } from "../core/errors.js";
import type { Status } from "../core/status.js";
import { createDefaultLogger, type StructuredLogger } from "../logger.js";
import { CommunicationMiddleware, type CommunicationStats } from "./communication.js";
import type { BehaviorForest, BehaviorForestStats } from "./forest.js";

export interface ForestManagerOptions {
  logger?: StructuredLogger;
  now?: () => number;
  /** Middleware bridging every managed forest. Defaults to a fresh one named `global_communication`. */
  globalCommunication?: CommunicationMiddleware;
}

export interface ForestManagerStats {
  forestCount: number;
  running: number;
  forests: Record<string, BehaviorForestStats>;
  globalCommunication: CommunicationStats;
}

/**
 * Owns several forests and bridges them through one extra communication
 * middleware. Each forest keeps its own default middleware for local
 * traffic; the global one only carries what is sent through it.
 */
export class ForestManager {
  readonly globalCommunication: CommunicationMiddleware;

  private readonly forests = new Map<string, BehaviorForest>();
  private readonly logger: StructuredLogger;

  constructor(options: ForestManagerOptions = {}) {
    this.logger = options.logger ?? createDefaultLogger();
    this.globalCommunication =
      options.globalCommunication ??
      new CommunicationMiddleware({ name: "global_communication", logger: this.logger, now: options.now });
  }

  get size(): number {
    return this.forests.size;
  }

  addForest(forest: BehaviorForest): void {
    if (this.forests.has(forest.name)) {
      throw new ConfigurationError(`a forest named "${forest.name}" is already managed`, { forest: forest.name });
    }
    this.forests.set(forest.name, forest);
    forest.addMiddleware(this.globalCommunication);
    this.logger.info("forest_managed", { forest: forest.name });
  }

  /** Stops the forest when it runs and detaches the global middleware from it. */
  async removeForest(name: string): Promise<boolean> {
    const forest = this.forests.get(name);
    if (!forest) {
      return false;
    }
    this.forests.delete(name);
    await forest.stop();
    await forest.removeMiddleware(this.globalCommunication);
    this.logger.info("forest_unmanaged", { forest: name });
    return true;
  }

  getForest(name: string): BehaviorForest | undefined {
    return this.forests.get(name);
  }

  getForests(): BehaviorForest[] {
    return [...this.forests.values()];
  }

  startAll(): void {
    for (const forest of this.forests.values()) {
      forest.start();
    }
  }

  async stopAll(): Promise<void> {
    await Promise.all(this.getForests().map((forest) => forest.stop()));
  }

  /** Runs one cycle of every forest concurrently, keyed by forest name. */
  async tickAll(): Promise<Map<string, Map<string, Status>>> {
    const forests = this.getForests();
    const results = await Promise.all(forests.map((forest) => forest.tick()));
    return new Map(forests.map((forest, index) => [forest.name, results[index]]));
  }

  getStats(): ForestManagerStats {
    const forests: Record<string, BehaviorForestStats> = {};
    let running = 0;
    for (const forest of this.forests.values()) {
      forests[forest.name] = forest.getStats();
      if (forest.running) {
        running += 1;
      }
    }
    return {
      forestCount: this.forests.size,
      running,
      forests,
      globalCommunication: this.globalCommunication.getStats(),
    };
  }
}
