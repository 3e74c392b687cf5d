import { z } from "zod";

import type { BehaviorNode } from "../nodes/base.js";
import {
  CallBehaviorAction,
  ClaimTaskAction,
  CompleteTaskAction,
  ExternalInputAction,
  ExternalOutputAction,
  PublishAction,
  RequestAction,
  SharedGetAction,
  SharedSetAction,
  SubscribeAction,
  UpdateStateAction,
} from "../nodes/communication.js";
import { ParallelNode, SelectorNode, SequenceNode } from "../nodes/composite.js";
import {
  AlwaysFalseCondition,
  AlwaysTrueCondition,
  CheckBlackboardCondition,
  CompareCondition,
  IsFalseCondition,
  IsTrueCondition,
} from "../nodes/conditions.js";
import { InverterNode, RepeaterNode, UntilFailureNode, UntilSuccessNode } from "../nodes/decorator.js";
import { EmitEventAction, WaitForEventAction } from "../nodes/events.js";
import { LogAction, SetBlackboardAction, WaitAction } from "../nodes/actions.js";
import { attachChildren, NodeRegistry, parseParams, type NodeCategory, type NodeSpec } from "./nodeRegistry.js";

interface BuiltinType<S extends z.AnyZodObject> {
  category: NodeCategory;
  description: string;
  maxChildren: number | null;
  schema: S;
  build: (spec: NodeSpec, params: z.infer<S>) => BehaviorNode;
}

function define<S extends z.AnyZodObject>(registry: NodeRegistry, type: string, definition: BuiltinType<S>): void {
  registry.register(
    type,
    (spec) => attachChildren(definition.build(spec, parseParams(spec, definition.schema)), spec, definition.maxChildren),
    {
      category: definition.category,
      description: definition.description,
      params: Object.keys(definition.schema.shape),
      maxChildren: definition.maxChildren,
    },
  );
}

const none = z.object({}).strict();
const key = z.string().min(1);
const timeoutMs = z.number().min(0).nullable().optional();
const optionalKey = key.optional();

function registerComposites(registry: NodeRegistry): void {
  define(registry, "Sequence", {
    category: "composite",
    description: "Ticks children in order until one does not succeed.",
    maxChildren: null,
    schema: none,
    build: (spec) => new SequenceNode(spec.name),
  });
  define(registry, "Selector", {
    category: "composite",
    description: "Ticks children in order until one does not fail.",
    maxChildren: null,
    schema: none,
    build: (spec) => new SelectorNode(spec.name),
  });
  define(registry, "Parallel", {
    category: "composite",
    description: "Ticks every child and folds the results with a policy.",
    maxChildren: null,
    schema: z
      .object({ policy: z.enum(["succeed_on_all", "succeed_on_one", "fail_on_all", "fail_on_one"]).default("succeed_on_all") })
      .strict(),
    build: (spec, params) => new ParallelNode(spec.name, [], params.policy),
  });
}

function registerDecorators(registry: NodeRegistry): void {
  define(registry, "Inverter", {
    category: "decorator",
    description: "Swaps success and failure.",
    maxChildren: 1,
    schema: none,
    build: (spec) => new InverterNode(spec.name),
  });
  define(registry, "Repeater", {
    category: "decorator",
    description: "Re-runs its child until it succeeded repeatCount times (-1 forever).",
    maxChildren: 1,
    schema: z.object({ repeatCount: z.number().int().default(-1) }).strict(),
    build: (spec, params) => new RepeaterNode(spec.name, { repeatCount: params.repeatCount }),
  });
  define(registry, "UntilSuccess", {
    category: "decorator",
    description: "Retries its child until it succeeds.",
    maxChildren: 1,
    schema: none,
    build: (spec) => new UntilSuccessNode(spec.name),
  });
  define(registry, "UntilFailure", {
    category: "decorator",
    description: "Re-runs its child until it fails.",
    maxChildren: 1,
    schema: none,
    build: (spec) => new UntilFailureNode(spec.name),
  });
}

function registerActions(registry: NodeRegistry): void {
  define(registry, "Wait", {
    category: "action",
    description: "Runs for durationMs on the runtime clock.",
    maxChildren: 0,
    schema: z.object({ durationMs: z.number().min(0) }).strict(),
    build: (spec, params) => new WaitAction(spec.name, { durationMs: params.durationMs, bindings: spec.bindings }),
  });
  define(registry, "Log", {
    category: "action",
    description: "Writes a message through the logger.",
    maxChildren: 0,
    schema: z.object({ message: z.string(), level: z.enum(["debug", "info", "warn", "error"]).default("info") }).strict(),
    build: (spec, params) =>
      new LogAction(spec.name, { message: params.message, level: params.level, bindings: spec.bindings }),
  });
  define(registry, "SetBlackboard", {
    category: "action",
    description: "Stores a value on the tree blackboard.",
    maxChildren: 0,
    schema: z.object({ key: z.string(), value: z.unknown() }).strict(),
    build: (spec, params) =>
      new SetBlackboardAction(spec.name, { key: params.key, value: params.value, bindings: spec.bindings }),
  });
}

function registerConditions(registry: NodeRegistry): void {
  define(registry, "CheckBlackboard", {
    category: "condition",
    description: "Checks that a key exists or holds an expected value.",
    maxChildren: 0,
    schema: z.object({ key, expectedValue: z.unknown(), checkExists: z.boolean().default(false) }).strict(),
    build: (spec, params) =>
      new CheckBlackboardCondition(spec.name, {
        key: params.key,
        expectedValue: params.expectedValue,
        checkExists: params.checkExists,
        bindings: spec.bindings,
      }),
  });
  define(registry, "IsTrue", {
    category: "condition",
    description: "Succeeds when a key holds a truthy value.",
    maxChildren: 0,
    schema: z.object({ key }).strict(),
    build: (spec, params) => new IsTrueCondition(spec.name, { key: params.key, bindings: spec.bindings }),
  });
  define(registry, "IsFalse", {
    category: "condition",
    description: "Succeeds when a key is missing or falsy.",
    maxChildren: 0,
    schema: z.object({ key }).strict(),
    build: (spec, params) => new IsFalseCondition(spec.name, { key: params.key, bindings: spec.bindings }),
  });
  define(registry, "Compare", {
    category: "condition",
    description: "Compares a key with a value.",
    maxChildren: 0,
    schema: z.object({ key, operator: z.enum(["==", "!=", ">", "<", ">=", "<="]), value: z.unknown() }).strict(),
    build: (spec, params) =>
      new CompareCondition(spec.name, {
        key: params.key,
        operator: params.operator,
        value: params.value,
        bindings: spec.bindings,
      }),
  });
  define(registry, "AlwaysTrue", {
    category: "condition",
    description: "Always succeeds.",
    maxChildren: 0,
    schema: none,
    build: (spec) => new AlwaysTrueCondition(spec.name),
  });
  define(registry, "AlwaysFalse", {
    category: "condition",
    description: "Always fails.",
    maxChildren: 0,
    schema: none,
    build: (spec) => new AlwaysFalseCondition(spec.name),
  });
}

function registerEvents(registry: NodeRegistry): void {
  define(registry, "WaitForEvent", {
    category: "event",
    description: "Waits for a named event on the tree dispatcher.",
    maxChildren: 0,
    schema: z.object({ event: key, timeoutMs }).strict(),
    build: (spec, params) =>
      new WaitForEventAction(spec.name, { event: params.event, timeoutMs: params.timeoutMs, bindings: spec.bindings }),
  });
  define(registry, "EmitEvent", {
    category: "event",
    description: "Emits a named event on the tree dispatcher.",
    maxChildren: 0,
    schema: z.object({ event: key, data: z.unknown() }).strict(),
    build: (spec, params) =>
      new EmitEventAction(spec.name, { event: params.event, data: params.data, bindings: spec.bindings }),
  });
}

function registerCommunication(registry: NodeRegistry): void {
  define(registry, "Publish", {
    category: "communication",
    description: "Publishes on a topic.",
    maxChildren: 0,
    schema: z.object({ topic: key, data: z.unknown() }).strict(),
    build: (spec, params) =>
      new PublishAction(spec.name, { topic: params.topic, data: params.data, bindings: spec.bindings }),
  });
  define(registry, "Subscribe", {
    category: "communication",
    description: "Waits for the next message on a topic.",
    maxChildren: 0,
    schema: z.object({ topic: key, targetKey: key, timeoutMs }).strict(),
    build: (spec, params) =>
      new SubscribeAction(spec.name, {
        topic: params.topic,
        targetKey: params.targetKey,
        timeoutMs: params.timeoutMs,
        bindings: spec.bindings,
      }),
  });
  define(registry, "Request", {
    category: "communication",
    description: "Calls a registered service.",
    maxChildren: 0,
    schema: z.object({ service: key, params: z.unknown(), resultKey: optionalKey }).strict(),
    build: (spec, params) =>
      new RequestAction(spec.name, {
        service: params.service,
        params: params.params,
        resultKey: params.resultKey,
        bindings: spec.bindings,
      }),
  });
  define(registry, "CallBehavior", {
    category: "communication",
    description: "Invokes a behaviour registered by another tree.",
    maxChildren: 0,
    schema: z.object({ behavior: key, params: z.unknown(), resultKey: optionalKey }).strict(),
    build: (spec, params) =>
      new CallBehaviorAction(spec.name, {
        behavior: params.behavior,
        params: params.params,
        resultKey: params.resultKey,
        bindings: spec.bindings,
      }),
  });
  define(registry, "SharedSet", {
    category: "communication",
    description: "Writes to the shared blackboard.",
    maxChildren: 0,
    schema: z.object({ key, value: z.unknown() }).strict(),
    build: (spec, params) =>
      new SharedSetAction(spec.name, { key: params.key, value: params.value, bindings: spec.bindings }),
  });
  define(registry, "SharedGet", {
    category: "communication",
    description: "Copies a shared value to the tree blackboard.",
    maxChildren: 0,
    schema: z.object({ key, targetKey: key }).strict(),
    build: (spec, params) =>
      new SharedGetAction(spec.name, { key: params.key, targetKey: params.targetKey, bindings: spec.bindings }),
  });
  define(registry, "UpdateState", {
    category: "communication",
    description: "Updates a watched state key.",
    maxChildren: 0,
    schema: z.object({ key, value: z.unknown() }).strict(),
    build: (spec, params) =>
      new UpdateStateAction(spec.name, { key: params.key, value: params.value, bindings: spec.bindings }),
  });
  define(registry, "ClaimTask", {
    category: "communication",
    description: "Claims the best available task.",
    maxChildren: 0,
    schema: z.object({ targetKey: optionalKey, dataKey: optionalKey }).strict(),
    build: (spec, params) =>
      new ClaimTaskAction(spec.name, { targetKey: params.targetKey, dataKey: params.dataKey, bindings: spec.bindings }),
  });
  define(registry, "CompleteTask", {
    category: "communication",
    description: "Completes the claimed task.",
    maxChildren: 0,
    schema: z.object({ taskKey: optionalKey, resultKey: optionalKey }).strict(),
    build: (spec, params) =>
      new CompleteTaskAction(spec.name, {
        taskKey: params.taskKey,
        resultKey: params.resultKey,
        bindings: spec.bindings,
      }),
  });
  define(registry, "ExternalOutput", {
    category: "communication",
    description: "Sends data on an external channel.",
    maxChildren: 0,
    schema: z.object({ channel: key, data: z.unknown() }).strict(),
    build: (spec, params) =>
      new ExternalOutputAction(spec.name, { channel: params.channel, data: params.data, bindings: spec.bindings }),
  });
  define(registry, "ExternalInput", {
    category: "communication",
    description: "Waits for the next input on an external channel.",
    maxChildren: 0,
    schema: z.object({ channel: key, targetKey: key, timeoutMs }).strict(),
    build: (spec, params) =>
      new ExternalInputAction(spec.name, {
        channel: params.channel,
        targetKey: params.targetKey,
        timeoutMs: params.timeoutMs,
        bindings: spec.bindings,
      }),
  });
}

/** Registers every built-in node type on `registry`. */
export function registerBuiltins(registry: NodeRegistry): NodeRegistry {
  registerComposites(registry);
  registerDecorators(registry);
  registerActions(registry);
  registerConditions(registry);
  registerEvents(registry);
  registerCommunication(registry);
  return registry;
}

/** A fresh registry holding the built-in node types. */
export function createDefaultRegistry(): NodeRegistry {
  return registerBuiltins(new NodeRegistry());
}
