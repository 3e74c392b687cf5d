import type { Status } from "../core/status.js";
import type { BehaviorForest } from "./forest.js";

/**
 * Extension point run by a {@link BehaviorForest} around every cycle.
 * `initialize` is called once when the middleware is attached and `dispose`
 * when it is removed.
 */
export interface ForestMiddleware {
  readonly name: string;
  initialize?(forest: BehaviorForest): void;
  preTick?(forest: BehaviorForest): void | Promise<void>;
  postTick?(forest: BehaviorForest, results: ReadonlyMap<string, Status>): void | Promise<void>;
  dispose?(forest: BehaviorForest): void | Promise<void>;
}
