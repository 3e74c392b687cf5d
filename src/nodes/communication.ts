import type { Status } from "../core/status.js";
import type { CommunicationMiddleware } from "../forest/communication.js";
import { DEFAULT_LEAF_TIMEOUT_MS } from "./events.js";
import { ActionNode, type ParamBindings } from "./leaf.js";
import type { TickRuntime } from "./runtime.js";

/**
 * Base of the leaves talking to the forest middleware. Outside a forest (no
 * middleware in the runtime) they fail without doing anything.
 */
export abstract class CommunicationAction extends ActionNode {
  protected execute(runtime: TickRuntime): Status | Promise<Status> {
    const communication = runtime.communication;
    if (!communication) {
      runtime.logger.debug("communication_unavailable", { node: this.name, kind: this.kind, source: runtime.source });
      return "failure";
    }
    return this.communicate(runtime, communication);
  }

  protected abstract communicate(
    runtime: TickRuntime,
    communication: CommunicationMiddleware,
  ): Status | Promise<Status>;

  /** Blackboard timeout parameter; numbers win, anything else means "wait forever". */
  protected resolveTimeout(runtime: TickRuntime, literal: number | null): number | null {
    const value = this.resolveParam(runtime, "timeout", literal);
    return typeof value === "number" && Number.isFinite(value) ? value : null;
  }

  /** Stores `value` under `key` when a key was configured. */
  protected async storeResult(runtime: TickRuntime, key: string | null, value: unknown): Promise<void> {
    if (key) {
      await runtime.blackboard.setAsync(key, value);
    }
  }
}

function timeoutOrDefault(timeoutMs: number | null | undefined): number | null {
  return timeoutMs === undefined ? DEFAULT_LEAF_TIMEOUT_MS : timeoutMs;
}

// -- publish/subscribe -----------------------------------------------------

export interface PublishOptions {
  topic: string;
  data?: unknown;
  bindings?: ParamBindings;
}

/** Publishes on a topic. Succeeds even when nobody listens. */
export class PublishAction extends CommunicationAction {
  static readonly bindableParams: readonly string[] = ["topic", "data"];

  readonly topic: string;
  readonly data: unknown;

  get kind(): string {
    return "Publish";
  }

  constructor(name: string, options: PublishOptions) {
    super(name, PublishAction.bindableParams, options.bindings);
    this.topic = options.topic;
    this.data = options.data ?? null;
  }

  protected async communicate(runtime: TickRuntime, communication: CommunicationMiddleware): Promise<Status> {
    const topic = this.resolveString(runtime, "topic", this.topic);
    await communication.publish(topic, this.resolveParam(runtime, "data", this.data), runtime.source);
    return "success";
  }
}

export interface SubscribeOptions {
  topic: string;
  /** Blackboard key receiving the message payload. */
  targetKey: string;
  timeoutMs?: number | null;
  bindings?: ParamBindings;
}

/** Waits for the next message on a topic and stores its payload. Timeout yields `failure`. */
export class SubscribeAction extends CommunicationAction {
  static readonly bindableParams: readonly string[] = ["topic", "targetKey", "timeout"];

  readonly topic: string;
  readonly targetKey: string;
  readonly timeoutMs: number | null;

  get kind(): string {
    return "Subscribe";
  }

  constructor(name: string, options: SubscribeOptions) {
    super(name, SubscribeAction.bindableParams, options.bindings);
    this.topic = options.topic;
    this.targetKey = options.targetKey;
    this.timeoutMs = timeoutOrDefault(options.timeoutMs);
  }

  protected async communicate(runtime: TickRuntime, communication: CommunicationMiddleware): Promise<Status> {
    const message = await communication.nextMessage(this.resolveString(runtime, "topic", this.topic), {
      timeoutMs: this.resolveTimeout(runtime, this.timeoutMs),
      signal: runtime.signal,
    });
    if (!message) {
      return "failure";
    }
    await runtime.blackboard.setAsync(this.resolveString(runtime, "targetKey", this.targetKey), message.data);
    return "success";
  }
}

// -- request/response and behaviour calls ----------------------------------

export interface RequestOptions {
  service: string;
  params?: unknown;
  /** Blackboard key receiving the response. */
  resultKey?: string | null;
  bindings?: ParamBindings;
}

/** Calls a service. An unknown service or a failing handler yields `failure`. */
export class RequestAction extends CommunicationAction {
  static readonly bindableParams: readonly string[] = ["service", "params"];

  readonly service: string;
  readonly params: unknown;
  readonly resultKey: string | null;

  get kind(): string {
    return "Request";
  }

  constructor(name: string, options: RequestOptions) {
    super(name, RequestAction.bindableParams, options.bindings);
    this.service = options.service;
    this.params = options.params ?? null;
    this.resultKey = options.resultKey ?? null;
  }

  protected async communicate(runtime: TickRuntime, communication: CommunicationMiddleware): Promise<Status> {
    const response = await communication.request(
      this.resolveString(runtime, "service", this.service),
      this.resolveParam(runtime, "params", this.params),
      runtime.source,
    );
    await this.storeResult(runtime, this.resultKey, response);
    return "success";
  }
}

export interface CallBehaviorOptions {
  behavior: string;
  params?: unknown;
  resultKey?: string | null;
  bindings?: ParamBindings;
}

/** Invokes a behaviour registered by another tree. */
export class CallBehaviorAction extends CommunicationAction {
  static readonly bindableParams: readonly string[] = ["behavior", "params"];

  readonly behavior: string;
  readonly params: unknown;
  readonly resultKey: string | null;

  get kind(): string {
    return "CallBehavior";
  }

  constructor(name: string, options: CallBehaviorOptions) {
    super(name, CallBehaviorAction.bindableParams, options.bindings);
    this.behavior = options.behavior;
    this.params = options.params ?? null;
    this.resultKey = options.resultKey ?? null;
  }

  protected async communicate(runtime: TickRuntime, communication: CommunicationMiddleware): Promise<Status> {
    const result = await communication.callBehavior(
      this.resolveString(runtime, "behavior", this.behavior),
      this.resolveParam(runtime, "params", this.params),
      runtime.source,
    );
    await this.storeResult(runtime, this.resultKey, result);
    return "success";
  }
}

// -- shared blackboard and state -------------------------------------------

export interface SharedSetOptions {
  key: string;
  value: unknown;
  bindings?: ParamBindings;
}

/** Writes to the forest-wide shared blackboard. */
export class SharedSetAction extends CommunicationAction {
  static readonly bindableParams: readonly string[] = ["key", "value"];

  readonly key: string;
  readonly value: unknown;

  get kind(): string {
    return "SharedSet";
  }

  constructor(name: string, options: SharedSetOptions) {
    super(name, SharedSetAction.bindableParams, options.bindings);
    this.key = options.key;
    this.value = options.value;
  }

  protected async communicate(runtime: TickRuntime, communication: CommunicationMiddleware): Promise<Status> {
    const key = this.resolveString(runtime, "key", this.key);
    if (key.length === 0) {
      return "failure";
    }
    await communication.setShared(key, this.resolveParam(runtime, "value", this.value), runtime.source);
    return "success";
  }
}

export interface SharedGetOptions {
  key: string;
  /** Local blackboard key receiving the shared value. */
  targetKey: string;
  bindings?: ParamBindings;
}

/** Copies a shared value to the tree blackboard. A missing shared key yields `failure`. */
export class SharedGetAction extends CommunicationAction {
  static readonly bindableParams: readonly string[] = ["key", "targetKey"];

  readonly key: string;
  readonly targetKey: string;

  get kind(): string {
    return "SharedGet";
  }

  constructor(name: string, options: SharedGetOptions) {
    super(name, SharedGetAction.bindableParams, options.bindings);
    this.key = options.key;
    this.targetKey = options.targetKey;
  }

  protected async communicate(runtime: TickRuntime, communication: CommunicationMiddleware): Promise<Status> {
    const key = this.resolveString(runtime, "key", this.key);
    if (!(await communication.hasShared(key, runtime.source))) {
      return "failure";
    }
    const value = await communication.getShared(key, null, runtime.source);
    await runtime.blackboard.setAsync(this.resolveString(runtime, "targetKey", this.targetKey), value);
    return "success";
  }
}

export interface UpdateStateOptions {
  key: string;
  value: unknown;
  bindings?: ParamBindings;
}

/** Updates a watched state key. Succeeds whether or not the value changed. */
export class UpdateStateAction extends CommunicationAction {
  static readonly bindableParams: readonly string[] = ["key", "value"];

  readonly key: string;
  readonly value: unknown;

  get kind(): string {
    return "UpdateState";
  }

  constructor(name: string, options: UpdateStateOptions) {
    super(name, UpdateStateAction.bindableParams, options.bindings);
    this.key = options.key;
    this.value = options.value;
  }

  protected async communicate(runtime: TickRuntime, communication: CommunicationMiddleware): Promise<Status> {
    await communication.updateState(
      this.resolveString(runtime, "key", this.key),
      this.resolveParam(runtime, "value", this.value),
      runtime.source,
    );
    return "success";
  }
}

// -- task board ------------------------------------------------------------

export const DEFAULT_TASK_KEY = "claimed_task";

export interface ClaimTaskOptions {
  /** Blackboard key receiving the claimed task id. */
  targetKey?: string;
  /** Optional key receiving the task payload. */
  dataKey?: string | null;
  bindings?: ParamBindings;
}

/**
 * Claims the highest-priority task the runtime capabilities satisfy. Another
 * tree winning the race for a task just moves the claim on to the next one.
 */
export class ClaimTaskAction extends CommunicationAction {
  static readonly bindableParams: readonly string[] = ["targetKey"];

  readonly targetKey: string;
  readonly dataKey: string | null;

  get kind(): string {
    return "ClaimTask";
  }

  constructor(name: string, options: ClaimTaskOptions = {}) {
    super(name, ClaimTaskAction.bindableParams, options.bindings);
    this.targetKey = options.targetKey ?? DEFAULT_TASK_KEY;
    this.dataKey = options.dataKey ?? null;
  }

  protected async communicate(runtime: TickRuntime, communication: CommunicationMiddleware): Promise<Status> {
    for (const task of communication.getAvailableTasks(runtime.capabilities)) {
      if (communication.claimTask(task.id, runtime.source, runtime.capabilities)) {
        await runtime.blackboard.setAsync(this.resolveString(runtime, "targetKey", this.targetKey), task.id);
        await this.storeResult(runtime, this.dataKey, task.data);
        return "success";
      }
    }
    return "failure";
  }
}

export interface CompleteTaskOptions {
  /** Blackboard key holding the task id. */
  taskKey?: string;
  /** Blackboard key holding the result to report. */
  resultKey?: string | null;
  bindings?: ParamBindings;
}

/** Completes the task whose id sits under `taskKey`, then clears that key. */
export class CompleteTaskAction extends CommunicationAction {
  static readonly bindableParams: readonly string[] = ["taskKey"];

  readonly taskKey: string;
  readonly resultKey: string | null;

  get kind(): string {
    return "CompleteTask";
  }

  constructor(name: string, options: CompleteTaskOptions = {}) {
    super(name, CompleteTaskAction.bindableParams, options.bindings);
    this.taskKey = options.taskKey ?? DEFAULT_TASK_KEY;
    this.resultKey = options.resultKey ?? null;
  }

  protected async communicate(runtime: TickRuntime, communication: CommunicationMiddleware): Promise<Status> {
    const taskKey = this.resolveString(runtime, "taskKey", this.taskKey);
    const taskId = runtime.blackboard.get(taskKey);
    if (typeof taskId !== "string") {
      return "failure";
    }
    const result = this.resultKey ? runtime.blackboard.get(this.resultKey, null) : null;
    if (!communication.completeTask(taskId, result, runtime.source)) {
      return "failure";
    }
    await runtime.blackboard.removeAsync(taskKey);
    return "success";
  }
}

// -- external channels -----------------------------------------------------

export interface ExternalOutputOptions {
  channel: string;
  data?: unknown;
  bindings?: ParamBindings;
}

/** Sends data out on an external channel. */
export class ExternalOutputAction extends CommunicationAction {
  static readonly bindableParams: readonly string[] = ["channel", "data"];

  readonly channel: string;
  readonly data: unknown;

  get kind(): string {
    return "ExternalOutput";
  }

  constructor(name: string, options: ExternalOutputOptions) {
    super(name, ExternalOutputAction.bindableParams, options.bindings);
    this.channel = options.channel;
    this.data = options.data ?? null;
  }

  protected async communicate(runtime: TickRuntime, communication: CommunicationMiddleware): Promise<Status> {
    await communication.externalOutput(
      this.resolveString(runtime, "channel", this.channel),
      this.resolveParam(runtime, "data", this.data),
    );
    return "success";
  }
}

export interface ExternalInputOptions {
  channel: string;
  targetKey: string;
  timeoutMs?: number | null;
  bindings?: ParamBindings;
}

/** Waits for the next input on a channel and stores its data. Timeout yields `failure`. */
export class ExternalInputAction extends CommunicationAction {
  static readonly bindableParams: readonly string[] = ["channel", "targetKey", "timeout"];

  readonly channel: string;
  readonly targetKey: string;
  readonly timeoutMs: number | null;

  get kind(): string {
    return "ExternalInput";
  }

  constructor(name: string, options: ExternalInputOptions) {
    super(name, ExternalInputAction.bindableParams, options.bindings);
    this.channel = options.channel;
    this.targetKey = options.targetKey;
    this.timeoutMs = timeoutOrDefault(options.timeoutMs);
  }

  protected async communicate(runtime: TickRuntime, communication: CommunicationMiddleware): Promise<Status> {
    const entry = await communication.nextInput(this.resolveString(runtime, "channel", this.channel), {
      timeoutMs: this.resolveTimeout(runtime, this.timeoutMs),
      signal: runtime.signal,
    });
    if (!entry) {
      return "failure";
    }
    await runtime.blackboard.setAsync(this.resolveString(runtime, "targetKey", this.targetKey), entry.data);
    return "success";
  }
}
