import { Blackboard } from "../engine/blackboard.js";
import { BehaviorTree, type BehaviorTreeOptions } from "../engine/behaviorTree.js";
import { CommunicationMiddleware } from "../forest/communication.js";
import { BehaviorForest, type BehaviorForestOptions } from "../forest/forest.js";
import { createLoggerFromConfig, type EngineConfig } from "./engineConfig.js";

/** Blackboard sized by the `blackboard` section of the configuration. */
export function createBlackboardFromConfig(config: EngineConfig, now?: () => number): Blackboard {
  return new Blackboard({
    cacheCapacity: config.blackboard.cacheCapacity,
    cacheTtlMs: config.blackboard.cacheTtlMs,
    now,
  });
}

export type ConfiguredTreeOptions = Omit<BehaviorTreeOptions, "tickRate" | "blackboard">;

/**
 * Tree ticking at the configured rate over a configured blackboard. Without
 * a logger in `options` it logs through {@link createLoggerFromConfig}.
 */
export function createTreeFromConfig(config: EngineConfig, options: ConfiguredTreeOptions): BehaviorTree {
  return new BehaviorTree({
    ...options,
    logger: options.logger ?? createLoggerFromConfig(config),
    tickRate: config.tickRate,
    blackboard: createBlackboardFromConfig(config, options.now),
  });
}

export type ConfiguredForestOptions = Omit<
  BehaviorForestOptions,
  "blackboard" | "monitorIntervalMs" | "communication"
>;

/**
 * Forest monitored at the configured interval, whose communication
 * middleware keeps the configured history bounds.
 */
export function createForestFromConfig(config: EngineConfig, options: ConfiguredForestOptions): BehaviorForest {
  const logger = options.logger ?? createLoggerFromConfig(config);
  const blackboard = createBlackboardFromConfig(config, options.now);
  return new BehaviorForest({
    ...options,
    logger,
    blackboard,
    monitorIntervalMs: config.forest.monitorIntervalMs,
    communication: new CommunicationMiddleware({
      sharedBlackboard: blackboard,
      logger,
      now: options.now,
      historyLimit: config.communication.historyLimit,
      stateHistoryLimit: config.communication.stateHistoryLimit,
    }),
  });
}
