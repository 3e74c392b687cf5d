import { isDeepStrictEqual } from "node:util";

import { ConditionNode, type ParamBindings } from "./leaf.js";
import type { TickRuntime } from "./runtime.js";

export type ConditionCallback = (runtime: TickRuntime) => boolean | Promise<boolean>;

/** Condition delegating to a predicate. */
export class CallbackCondition extends ConditionNode {
  static readonly bindableParams: readonly string[] = [];

  get kind(): string {
    return "Condition";
  }

  constructor(
    name: string,
    private readonly predicate: ConditionCallback,
  ) {
    super(name, CallbackCondition.bindableParams);
  }

  protected evaluate(runtime: TickRuntime): boolean | Promise<boolean> {
    return this.predicate(runtime);
  }
}

export interface CheckBlackboardOptions {
  key: string;
  expectedValue?: unknown;
  /** Only test that the key is present. */
  checkExists?: boolean;
  bindings?: ParamBindings;
}

/** Checks that a key exists, or that it holds a deeply equal value. */
export class CheckBlackboardCondition extends ConditionNode {
  static readonly bindableParams: readonly string[] = ["key", "expectedValue"];

  readonly key: string;
  readonly expectedValue: unknown;
  readonly checkExists: boolean;

  get kind(): string {
    return "CheckBlackboard";
  }

  constructor(name: string, options: CheckBlackboardOptions) {
    super(name, CheckBlackboardCondition.bindableParams, options.bindings);
    this.key = options.key;
    this.expectedValue = options.expectedValue;
    this.checkExists = options.checkExists ?? false;
  }

  protected evaluate(runtime: TickRuntime): boolean {
    const key = this.resolveString(runtime, "key", this.key);
    if (key.length === 0 || !runtime.blackboard.has(key)) {
      return false;
    }
    if (this.checkExists) {
      return true;
    }
    const expected = this.resolveParam(runtime, "expectedValue", this.expectedValue);
    return isDeepStrictEqual(runtime.blackboard.get(key), expected);
  }
}

export interface KeyConditionOptions {
  key: string;
  bindings?: ParamBindings;
}

/** Succeeds when the value under `key` is truthy. A missing key is falsy. */
export class IsTrueCondition extends ConditionNode {
  static readonly bindableParams: readonly string[] = ["key"];

  readonly key: string;

  get kind(): string {
    return "IsTrue";
  }

  constructor(name: string, options: KeyConditionOptions) {
    super(name, IsTrueCondition.bindableParams, options.bindings);
    this.key = options.key;
  }

  protected evaluate(runtime: TickRuntime): boolean {
    const key = this.resolveString(runtime, "key", this.key);
    return key.length > 0 && Boolean(runtime.blackboard.get(key, false));
  }
}

/** Succeeds when the value under `key` is falsy or missing. */
export class IsFalseCondition extends ConditionNode {
  static readonly bindableParams: readonly string[] = ["key"];

  readonly key: string;

  get kind(): string {
    return "IsFalse";
  }

  constructor(name: string, options: KeyConditionOptions) {
    super(name, IsFalseCondition.bindableParams, options.bindings);
    this.key = options.key;
  }

  protected evaluate(runtime: TickRuntime): boolean {
    const key = this.resolveString(runtime, "key", this.key);
    return key.length > 0 && !runtime.blackboard.get(key, false);
  }
}

export type CompareOperator = "==" | "!=" | ">" | "<" | ">=" | "<=";

export const COMPARE_OPERATORS: readonly CompareOperator[] = ["==", "!=", ">", "<", ">=", "<="];

/**
 * Compares two values. Equality is deep; ordering only applies to two
 * numbers or two strings and is false for any other pair.
 */
export function compareValues(actual: unknown, operator: CompareOperator, expected: unknown): boolean {
  switch (operator) {
    case "==":
      return isDeepStrictEqual(actual, expected);
    case "!=":
      return !isDeepStrictEqual(actual, expected);
    default:
      break;
  }
  let order: number;
  if (typeof actual === "number" && typeof expected === "number") {
    if (Number.isNaN(actual) || Number.isNaN(expected)) {
      return false;
    }
    order = actual === expected ? 0 : actual < expected ? -1 : 1;
  } else if (typeof actual === "string" && typeof expected === "string") {
    order = actual === expected ? 0 : actual < expected ? -1 : 1;
  } else {
    return false;
  }
  switch (operator) {
    case ">":
      return order > 0;
    case "<":
      return order < 0;
    case ">=":
      return order >= 0;
    case "<=":
      return order <= 0;
    default:
      return false;
  }
}

export interface CompareOptions {
  key: string;
  operator: CompareOperator;
  value: unknown;
  bindings?: ParamBindings;
}

/** Compares the value under `key` with a literal (or bound) value. */
export class CompareCondition extends ConditionNode {
  static readonly bindableParams: readonly string[] = ["key", "value"];

  readonly key: string;
  readonly operator: CompareOperator;
  readonly value: unknown;

  get kind(): string {
    return "Compare";
  }

  constructor(name: string, options: CompareOptions) {
    super(name, CompareCondition.bindableParams, options.bindings);
    this.key = options.key;
    this.operator = options.operator;
    this.value = options.value;
  }

  protected evaluate(runtime: TickRuntime): boolean {
    const key = this.resolveString(runtime, "key", this.key);
    if (key.length === 0) {
      return false;
    }
    return compareValues(runtime.blackboard.get(key), this.operator, this.resolveParam(runtime, "value", this.value));
  }
}

export class AlwaysTrueCondition extends ConditionNode {
  static readonly bindableParams: readonly string[] = [];

  get kind(): string {
    return "AlwaysTrue";
  }

  constructor(name: string) {
    super(name, AlwaysTrueCondition.bindableParams);
  }

  protected evaluate(): boolean {
    return true;
  }
}

export class AlwaysFalseCondition extends ConditionNode {
  static readonly bindableParams: readonly string[] = [];

  get kind(): string {
    return "AlwaysFalse";
  }

  constructor(name: string) {
    super(name, AlwaysFalseCondition.bindableParams);
  }

  protected evaluate(): boolean {
    return false;
  }
}
