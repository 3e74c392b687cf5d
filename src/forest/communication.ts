import { isDeepStrictEqual } from "node:util";

import { ENGINE_DEFAULTS } from "../config/engineConfig.js";
import { fanOut } from "../coord/fanOut.js";
import {
  TaskBoard,
  type TaskBoardEventListener,
  type TaskPublication,
  type TaskSnapshot,
  type TaskStats,
} from "../coord/taskBoard.js";
import { describeError, UnknownTargetError } from "../core/errors.js";
import { Blackboard } from "../engine/blackboard.js";
import { createDefaultLogger, type StructuredLogger } from "../logger.js";
import { withTimeout } from "../runtime/timers.js";
import type { BehaviorForest } from "./forest.js";
import type { ForestMiddleware } from "./middleware.js";

/** Message delivered to topic subscribers. */
export interface TopicMessage {
  seq: number;
  topic: string;
  data: unknown;
  source: string;
  timestamp: number;
}

export type TopicCallback = (message: TopicMessage) => unknown;

export type ServiceHandler = (params: unknown, source: string) => unknown;

export type BehaviorHandler = (params: unknown, source: string) => unknown;

export type StateWatcher = (key: string, previous: unknown, next: unknown, source: string) => unknown;

/** Entry of the shared blackboard audit log. */
export interface SharedAccessRecord {
  operation: "set" | "get" | "has" | "remove";
  key: string;
  source: string;
  timestamp: number;
}

export interface StateChange {
  key: string;
  previous: unknown;
  next: unknown;
  source: string;
  timestamp: number;
}

export interface BehaviorCallRecord {
  behavior: string;
  source: string;
  params: unknown;
  success: boolean;
  result: unknown;
  error: string | null;
  timestamp: number;
  durationMs: number;
}

/** Item queued on an external channel. Inputs come from outside, outputs from the trees. */
export interface ChannelEntry {
  channel: string;
  data: unknown;
  source: "external" | "internal";
  timestamp: number;
}

export type ChannelHandler = (entry: ChannelEntry) => unknown;

export interface WaitForMessageOptions {
  timeoutMs?: number | null;
  signal?: AbortSignal;
}

export interface CommunicationMiddlewareOptions {
  name?: string;
  /** Store behind the shared-blackboard pattern. Forests pass their own blackboard. */
  sharedBlackboard?: Blackboard;
  logger?: StructuredLogger;
  now?: () => number;
  /** Bound of the message history, the access log, the call log and each channel queue. */
  historyLimit?: number;
  /** Bound of the per-key state history. */
  stateHistoryLimit?: number;
}

export interface CommunicationStats {
  enabled: boolean;
  forests: number;
  /**
   * Forest cycles observed. A middleware shared by several forests counts
   * one per forest per cycle; `cyclesByForest` splits them by forest name.
   */
  cycles: number;
  cyclesByForest: Record<string, number>;
  pubsub: { topics: number; subscribers: number; published: number; delivered: number; failed: number; dropped: number };
  services: { registered: number; requests: number; failures: number };
  shared: { keys: number; accesses: number };
  state: { keys: number; watchers: number; updates: number; notifications: number };
  behaviors: { registered: number; calls: number; failures: number };
  tasks: TaskStats;
  external: { inputs: number; outputs: number; inputQueue: number; outputQueue: number };
}

/** Event name emitted on every attached forest when input arrives on `channel`. */
export function externalInputEvent(channel: string): string {
  return `external_input_${channel}`;
}

function pushBounded<T>(list: T[], item: T, limit: number): void {
  list.push(item);
  if (list.length > limit) {
    list.splice(0, list.length - limit);
  }
}

function addToRegistry<T>(registry: Map<string, T[]>, key: string, item: T): void {
  const list = registry.get(key) ?? [];
  list.push(item);
  registry.set(key, list);
}

function removeFromRegistry<T>(registry: Map<string, T[]>, key: string, item: T): boolean {
  const list = registry.get(key);
  if (!list) {
    return false;
  }
  const index = list.indexOf(item);
  if (index === -1) {
    return false;
  }
  list.splice(index, 1);
  if (list.length === 0) {
    registry.delete(key);
  }
  return true;
}

/**
 * Cross-tree interaction surface of a forest. It implements six patterns:
 *
 * - publish/subscribe on named topics, fanned out concurrently;
 * - request/response against named services;
 * - a shared blackboard with an audit log;
 * - state watching, notifying watchers only when a value changes;
 * - direct behaviour calls with a call log;
 * - a task board (see {@link TaskBoard}).
 *
 * It also bridges external I/O through named input and output channels.
 * Failing callbacks are logged and isolated; lookups of unknown services or
 * behaviours throw {@link UnknownTargetError} to the caller.
 */
export class CommunicationMiddleware implements ForestMiddleware {
  readonly name: string;
  /** While false, publications and state notifications are dropped. */
  enabled = true;
  readonly sharedBlackboard: Blackboard;
  readonly taskBoard: TaskBoard;

  private readonly logger: StructuredLogger;
  private readonly now: () => number;
  private readonly historyLimit: number;
  private readonly stateHistoryLimit: number;
  private readonly forests = new Set<BehaviorForest>();
  private cycles = 0;
  private readonly forestCycles = new Map<string, number>();

  private readonly subscribers = new Map<string, TopicCallback[]>();
  private readonly messages: TopicMessage[] = [];
  private messageSeq = 0;
  private published = 0;
  private delivered = 0;
  private deliveryFailures = 0;
  private dropped = 0;

  private readonly services = new Map<string, ServiceHandler>();
  private requests = 0;
  private requestFailures = 0;

  private readonly accessLog: SharedAccessRecord[] = [];
  private accesses = 0;

  private readonly watchers = new Map<string, StateWatcher[]>();
  private readonly stateCache = new Map<string, unknown>();
  private readonly stateHistory = new Map<string, StateChange[]>();
  private stateUpdates = 0;
  private stateNotifications = 0;

  private readonly behaviors = new Map<string, BehaviorHandler>();
  private readonly callLog: BehaviorCallRecord[] = [];
  private behaviorCalls = 0;
  private behaviorFailures = 0;

  private readonly inputHandlers = new Map<string, ChannelHandler[]>();
  private readonly outputHandlers = new Map<string, ChannelHandler[]>();
  private readonly inputQueue: ChannelEntry[] = [];
  private readonly outputQueue: ChannelEntry[] = [];
  private inputs = 0;
  private outputs = 0;

  constructor(options: CommunicationMiddlewareOptions = {}) {
    this.name = options.name ?? "communication";
    this.sharedBlackboard = options.sharedBlackboard ?? new Blackboard();
    this.logger = options.logger ?? createDefaultLogger();
    this.now = options.now ?? (() => Date.now());
    this.historyLimit = Math.max(1, options.historyLimit ?? ENGINE_DEFAULTS.historyLimit);
    this.stateHistoryLimit = Math.max(1, options.stateHistoryLimit ?? ENGINE_DEFAULTS.stateHistoryLimit);
    this.taskBoard = new TaskBoard({ now: this.now });
    this.taskBoard.observe((event) => {
      this.broadcast(event.kind, "task_board", event.task);
    });
  }

  // -- lifecycle -----------------------------------------------------------

  initialize(forest: BehaviorForest): void {
    this.forests.add(forest);
    this.logger.info("communication_attached", { middleware: this.name, forest: forest.name });
  }

  dispose(forest: BehaviorForest): void {
    this.forests.delete(forest);
    this.logger.info("communication_detached", { middleware: this.name, forest: forest.name });
  }

  postTick(forest: BehaviorForest): void {
    this.cycles += 1;
    this.forestCycles.set(forest.name, (this.forestCycles.get(forest.name) ?? 0) + 1);
  }

  // -- publish/subscribe ---------------------------------------------------

  /** Registers `callback` on `topic`. Returns a disposer. */
  subscribe(topic: string, callback: TopicCallback): () => void {
    addToRegistry(this.subscribers, topic, callback);
    return () => {
      this.unsubscribe(topic, callback);
    };
  }

  unsubscribe(topic: string, callback: TopicCallback): boolean {
    return removeFromRegistry(this.subscribers, topic, callback);
  }

  /**
   * Delivers `data` to every current subscriber of `topic`, concurrently.
   * Resolves once all of them settled, with the number that succeeded.
   */
  async publish(topic: string, data: unknown, source: string): Promise<number> {
    if (!this.enabled) {
      this.dropped += 1;
      return 0;
    }
    this.messageSeq += 1;
    const message: TopicMessage = { seq: this.messageSeq, topic, data, source, timestamp: this.now() };
    pushBounded(this.messages, message, this.historyLimit);
    this.published += 1;
    const callbacks = [...(this.subscribers.get(topic) ?? [])];
    const report = await fanOut(callbacks, [message], this.logger, "subscriber_failed", { topic, source });
    this.delivered += report.delivered;
    this.deliveryFailures += report.failed;
    return report.delivered;
  }

  /** Resolves with the next message published on `topic`, or `null` on timeout or abort. */
  async nextMessage(topic: string, options: WaitForMessageOptions = {}): Promise<TopicMessage | null> {
    let dispose: () => void = () => undefined;
    const received = new Promise<TopicMessage>((resolve) => {
      dispose = this.subscribe(topic, (message) => resolve(message));
    });
    try {
      return await withTimeout(received, options.timeoutMs ?? null, options.signal);
    } finally {
      dispose();
    }
  }

  getMessageHistory(topic?: string): TopicMessage[] {
    const messages = topic === undefined ? this.messages : this.messages.filter((message) => message.topic === topic);
    return messages.map((message) => ({ ...message }));
  }

  getSubscriberCount(topic: string): number {
    return this.subscribers.get(topic)?.length ?? 0;
  }

  // -- request/response ----------------------------------------------------

  registerService(name: string, handler: ServiceHandler): void {
    if (this.services.has(name)) {
      this.logger.warn("service_replaced", { service: name });
    }
    this.services.set(name, handler);
  }

  unregisterService(name: string): boolean {
    return this.services.delete(name);
  }

  hasService(name: string): boolean {
    return this.services.has(name);
  }

  /**
   * Invokes the handler of service `name`. Unknown services throw
   * {@link UnknownTargetError}; handler errors propagate unchanged.
   */
  async request(name: string, params: unknown, source: string): Promise<unknown> {
    const handler = this.services.get(name);
    if (!handler) {
      throw new UnknownTargetError("service", name);
    }
    this.requests += 1;
    try {
      return await handler(params, source);
    } catch (error) {
      this.requestFailures += 1;
      this.logger.warn("service_request_failed", { service: name, source, error: describeError(error) });
      throw error;
    }
  }

  // -- shared blackboard ---------------------------------------------------

  async setShared(key: string, value: unknown, source: string): Promise<void> {
    await this.sharedBlackboard.setAsync(key, value);
    this.recordAccess("set", key, source);
  }

  async getShared(key: string, defaultValue: unknown, source: string): Promise<unknown> {
    const value = await this.sharedBlackboard.getAsync(key, defaultValue);
    this.recordAccess("get", key, source);
    return value;
  }

  async hasShared(key: string, source: string): Promise<boolean> {
    const present = await this.sharedBlackboard.hasAsync(key);
    this.recordAccess("has", key, source);
    return present;
  }

  async removeShared(key: string, source: string): Promise<boolean> {
    const removed = await this.sharedBlackboard.removeAsync(key);
    this.recordAccess("remove", key, source);
    return removed;
  }

  /** Audit log of the shared blackboard, optionally restricted to one source. */
  getAccessLog(source?: string): SharedAccessRecord[] {
    const records = source === undefined ? this.accessLog : this.accessLog.filter((record) => record.source === source);
    return records.map((record) => ({ ...record }));
  }

  // -- state watching ------------------------------------------------------

  /** Registers `callback` for changes of `key`. Returns a disposer. */
  watchState(key: string, callback: StateWatcher): () => void {
    addToRegistry(this.watchers, key, callback);
    return () => {
      this.unwatchState(key, callback);
    };
  }

  unwatchState(key: string, callback: StateWatcher): boolean {
    return removeFromRegistry(this.watchers, key, callback);
  }

  /**
   * Records `value` under `key` and appends it to the key history, then
   * notifies the watchers when it differs (deeply) from the previous value.
   * Returns whether the value changed.
   */
  async updateState(key: string, value: unknown, source: string): Promise<boolean> {
    const known = this.stateCache.has(key);
    const previous = known ? this.stateCache.get(key) : null;
    this.stateCache.set(key, value);
    const change: StateChange = { key, previous, next: value, source, timestamp: this.now() };
    const history = this.stateHistory.get(key) ?? [];
    pushBounded(history, change, this.stateHistoryLimit);
    this.stateHistory.set(key, history);
    if (known && isDeepStrictEqual(previous, value)) {
      return false;
    }
    this.stateUpdates += 1;
    if (!this.enabled) {
      this.dropped += 1;
      return true;
    }
    const callbacks = [...(this.watchers.get(key) ?? [])];
    const report = await fanOut(callbacks, [key, previous, value, source], this.logger, "state_watcher_failed", {
      key,
      source,
    });
    this.stateNotifications += report.delivered;
    return true;
  }

  getState(key: string, defaultValue: unknown = null): unknown {
    return this.stateCache.has(key) ? this.stateCache.get(key) : defaultValue;
  }

  getStateHistory(key: string): StateChange[] {
    return (this.stateHistory.get(key) ?? []).map((change) => ({ ...change }));
  }

  // -- behaviour calls -----------------------------------------------------

  registerBehavior(name: string, handler: BehaviorHandler): void {
    if (this.behaviors.has(name)) {
      this.logger.warn("behavior_replaced", { behavior: name });
    }
    this.behaviors.set(name, handler);
  }

  unregisterBehavior(name: string): boolean {
    return this.behaviors.delete(name);
  }

  /**
   * Runs behaviour `name` and records the call. Unknown behaviours throw
   * {@link UnknownTargetError}; handler errors are recorded, then rethrown.
   */
  async callBehavior(name: string, params: unknown, source: string): Promise<unknown> {
    const handler = this.behaviors.get(name);
    if (!handler) {
      throw new UnknownTargetError("behavior", name);
    }
    this.behaviorCalls += 1;
    const startedAt = this.now();
    try {
      const result = await handler(params, source);
      this.recordCall({ behavior: name, source, params, success: true, result, error: null }, startedAt);
      return result;
    } catch (error) {
      this.behaviorFailures += 1;
      const described = describeError(error);
      this.recordCall({ behavior: name, source, params, success: false, result: null, error: described.message }, startedAt);
      this.logger.warn("behavior_call_failed", { behavior: name, source, error: described });
      throw error;
    }
  }

  getCallLog(behavior?: string): BehaviorCallRecord[] {
    const records = behavior === undefined ? this.callLog : this.callLog.filter((record) => record.behavior === behavior);
    return records.map((record) => ({ ...record }));
  }

  // -- task board ----------------------------------------------------------

  publishTask(publication: TaskPublication): string {
    return this.taskBoard.publishTask(publication);
  }

  /** Claims a task for `claimant`. Unknown ids throw {@link UnknownTargetError}. */
  claimTask(taskId: string, claimant: string, capabilities: Iterable<string>): boolean {
    return this.taskBoard.claimTask(taskId, claimant, capabilities);
  }

  completeTask(taskId: string, result: unknown = null, claimant?: string): boolean {
    return this.taskBoard.completeTask(taskId, result, claimant);
  }

  failTask(taskId: string, error: string): boolean {
    return this.taskBoard.failTask(taskId, error);
  }

  getTask(taskId: string): TaskSnapshot | null {
    return this.taskBoard.getTask(taskId);
  }

  getAvailableTasks(capabilities?: Iterable<string>): TaskSnapshot[] {
    return this.taskBoard.getAvailableTasks(capabilities);
  }

  getClaimedTasks(claimant?: string): TaskSnapshot[] {
    return this.taskBoard.getClaimedTasks(claimant);
  }

  getTaskStats(): TaskStats {
    return this.taskBoard.getTaskStats();
  }

  observeTasks(listener: TaskBoardEventListener): () => void {
    return this.taskBoard.observe(listener);
  }

  // -- external I/O --------------------------------------------------------

  registerInputHandler(channel: string, handler: ChannelHandler): () => void {
    addToRegistry(this.inputHandlers, channel, handler);
    return () => {
      this.unregisterInputHandler(channel, handler);
    };
  }

  unregisterInputHandler(channel: string, handler: ChannelHandler): boolean {
    return removeFromRegistry(this.inputHandlers, channel, handler);
  }

  registerOutputHandler(channel: string, handler: ChannelHandler): () => void {
    addToRegistry(this.outputHandlers, channel, handler);
    return () => {
      this.unregisterOutputHandler(channel, handler);
    };
  }

  unregisterOutputHandler(channel: string, handler: ChannelHandler): boolean {
    return removeFromRegistry(this.outputHandlers, channel, handler);
  }

  /**
   * Accepts data from outside the forest: queues it, runs the channel's
   * input handlers and emits {@link externalInputEvent} on every attached
   * forest.
   */
  async externalInput(channel: string, data: unknown): Promise<ChannelEntry> {
    const entry: ChannelEntry = { channel, data, source: "external", timestamp: this.now() };
    pushBounded(this.inputQueue, entry, this.historyLimit);
    this.inputs += 1;
    const handlers = [...(this.inputHandlers.get(channel) ?? [])];
    await fanOut(handlers, [entry], this.logger, "input_handler_failed", { channel });
    this.broadcast(externalInputEvent(channel), "external", data);
    return { ...entry };
  }

  /** Sends data out of the forest: queues it and runs the channel's output handlers. */
  async externalOutput(channel: string, data: unknown): Promise<ChannelEntry> {
    const entry: ChannelEntry = { channel, data, source: "internal", timestamp: this.now() };
    pushBounded(this.outputQueue, entry, this.historyLimit);
    this.outputs += 1;
    const handlers = [...(this.outputHandlers.get(channel) ?? [])];
    await fanOut(handlers, [entry], this.logger, "output_handler_failed", { channel });
    return { ...entry };
  }

  /** Resolves with the next input on `channel`, or `null` on timeout or abort. */
  async nextInput(channel: string, options: WaitForMessageOptions = {}): Promise<ChannelEntry | null> {
    let dispose: () => void = () => undefined;
    const received = new Promise<ChannelEntry>((resolve) => {
      dispose = this.registerInputHandler(channel, (entry) => resolve(entry));
    });
    try {
      return await withTimeout(received, options.timeoutMs ?? null, options.signal);
    } finally {
      dispose();
    }
  }

  getInputQueue(channel?: string): ChannelEntry[] {
    const entries = channel === undefined ? this.inputQueue : this.inputQueue.filter((entry) => entry.channel === channel);
    return entries.map((entry) => ({ ...entry }));
  }

  getOutputQueue(channel?: string): ChannelEntry[] {
    const entries =
      channel === undefined ? this.outputQueue : this.outputQueue.filter((entry) => entry.channel === channel);
    return entries.map((entry) => ({ ...entry }));
  }

  clearQueues(): void {
    this.inputQueue.length = 0;
    this.outputQueue.length = 0;
  }

  // -- observability -------------------------------------------------------

  getStats(): CommunicationStats {
    let subscriberCount = 0;
    for (const list of this.subscribers.values()) {
      subscriberCount += list.length;
    }
    let watcherCount = 0;
    for (const list of this.watchers.values()) {
      watcherCount += list.length;
    }
    return {
      enabled: this.enabled,
      forests: this.forests.size,
      cycles: this.cycles,
      cyclesByForest: Object.fromEntries(this.forestCycles),
      pubsub: {
        topics: this.subscribers.size,
        subscribers: subscriberCount,
        published: this.published,
        delivered: this.delivered,
        failed: this.deliveryFailures,
        dropped: this.dropped,
      },
      services: { registered: this.services.size, requests: this.requests, failures: this.requestFailures },
      shared: { keys: this.sharedBlackboard.size, accesses: this.accesses },
      state: {
        keys: this.stateCache.size,
        watchers: watcherCount,
        updates: this.stateUpdates,
        notifications: this.stateNotifications,
      },
      behaviors: { registered: this.behaviors.size, calls: this.behaviorCalls, failures: this.behaviorFailures },
      tasks: this.taskBoard.getTaskStats(),
      external: {
        inputs: this.inputs,
        outputs: this.outputs,
        inputQueue: this.inputQueue.length,
        outputQueue: this.outputQueue.length,
      },
    };
  }

  private recordAccess(operation: SharedAccessRecord["operation"], key: string, source: string): void {
    this.accesses += 1;
    pushBounded(this.accessLog, { operation, key, source, timestamp: this.now() }, this.historyLimit);
  }

  private recordCall(record: Omit<BehaviorCallRecord, "timestamp" | "durationMs">, startedAt: number): void {
    const finishedAt = this.now();
    pushBounded(this.callLog, { ...record, timestamp: startedAt, durationMs: finishedAt - startedAt }, this.historyLimit);
  }

  private broadcast(event: string, source: string, data: unknown): void {
    for (const forest of this.forests) {
      forest.events.emit(event, source, data);
    }
  }
}
