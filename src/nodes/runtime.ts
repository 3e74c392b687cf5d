import { Blackboard } from "../engine/blackboard.js";
import { EventDispatcher } from "../engine/eventDispatcher.js";
import type { CommunicationMiddleware } from "../forest/communication.js";
import { createDefaultLogger, type StructuredLogger } from "../logger.js";

/**
 * Everything a node can reach while it is ticked. Nodes never hold direct
 * references to other trees: cross-tree work goes through the blackboard,
 * the event dispatcher or the communication middleware found here.
 */
export interface TickRuntime {
  /** Blackboard of the tree being ticked. */
  readonly blackboard: Blackboard;
  /** Event dispatcher of the tree, shared by the whole forest once joined. */
  readonly events: EventDispatcher;
  /** Middleware of the forest the tree belongs to, if any. */
  readonly communication: CommunicationMiddleware | null;
  readonly logger: StructuredLogger;
  /** Identity used as `source` in middleware calls: the tree or forest node name. */
  readonly source: string;
  /** Capabilities of the forest node owning the tree. */
  readonly capabilities: ReadonlySet<string>;
  readonly now: () => number;
  /** Aborted when the tick is cancelled (tree stopped or node removed). */
  readonly signal?: AbortSignal;
}

/** Builds a runtime with fresh collaborators for anything not supplied. */
export function createTickRuntime(overrides: Partial<TickRuntime> = {}): TickRuntime {
  return {
    blackboard: overrides.blackboard ?? new Blackboard(),
    events: overrides.events ?? new EventDispatcher(),
    communication: overrides.communication ?? null,
    logger: overrides.logger ?? createDefaultLogger(),
    source: overrides.source ?? "anonymous",
    capabilities: overrides.capabilities ?? new Set<string>(),
    now: overrides.now ?? (() => Date.now()),
    ...(overrides.signal ? { signal: overrides.signal } : {}),
  };
}
