export * from "./core/errors.js";
export * from "./core/status.js";

export { StructuredLogger, createDefaultLogger, LOG_LEVELS } from "./logger.js";
export type { LogEntry, LogLevel, LoggerOptions } from "./logger.js";
export * from "./config/env.js";
export * from "./config/engineConfig.js";
export * from "./config/engineFactory.js";
export { sleep, withTimeout, runtimeTimers } from "./runtime/timers.js";

export * from "./engine/accessCache.js";
export * from "./engine/rwLock.js";
export * from "./engine/blackboard.js";
export * from "./engine/eventDispatcher.js";
export * from "./engine/tickManager.js";
export * from "./engine/validation.js";
export * from "./engine/behaviorTree.js";

export * from "./nodes/runtime.js";
export * from "./nodes/base.js";
export * from "./nodes/composite.js";
export * from "./nodes/decorator.js";
export * from "./nodes/leaf.js";
export * from "./nodes/actions.js";
export * from "./nodes/conditions.js";
export * from "./nodes/events.js";
export * from "./nodes/communication.js";

export * from "./coord/taskBoard.js";
export * from "./forest/middleware.js";
export * from "./forest/communication.js";
export * from "./forest/forestNode.js";
export * from "./forest/forest.js";
export * from "./forest/forestManager.js";

export * from "./registry/nodeRegistry.js";
export * from "./registry/builtins.js";
export * from "./builder/treeBuilder.js";
