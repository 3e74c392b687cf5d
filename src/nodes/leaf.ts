import { StructuralError } from "../core/errors.js";
import type { Status } from "../core/status.js";
import { BehaviorNode } from "./base.js";
import type { TickRuntime } from "./runtime.js";

/** Per-instance mapping from a bindable parameter to a blackboard key. */
export type ParamBindings = Readonly<Record<string, string>>;

/**
 * Base of childless nodes. Each leaf class declares the parameters that may
 * be rebound to blackboard keys in a static `bindableParams` list and passes
 * it to this constructor. Bindings are looked up at tick time, so the same
 * class can read different keys per instance.
 */
export abstract class LeafNode extends BehaviorNode {
  private readonly bindingTable = new Map<string, string>();

  protected constructor(
    name: string,
    private readonly declaredParams: readonly string[],
    bindings: ParamBindings = {},
  ) {
    super(name, 0);
    for (const [param, key] of Object.entries(bindings)) {
      this.bind(param, key);
    }
  }

  /** Parameters this leaf accepts bindings for. */
  get bindableParams(): readonly string[] {
    return this.declaredParams;
  }

  get bindings(): ParamBindings {
    return Object.fromEntries(this.bindingTable);
  }

  /** Binds `param` to `key`. Undeclared parameters are a structural error. */
  bind(param: string, key: string): void {
    if (!this.declaredParams.includes(param)) {
      throw new StructuralError(`${this.kind} "${this.name}" has no bindable parameter "${param}"`, {
        node: this.name,
        param,
        declared: [...this.declaredParams],
      });
    }
    if (key.length === 0) {
      throw new StructuralError(`binding for "${param}" on "${this.name}" needs a blackboard key`, {
        node: this.name,
        param,
      });
    }
    this.bindingTable.set(param, key);
  }

  unbind(param: string): boolean {
    return this.bindingTable.delete(param);
  }

  /**
   * Value of `param` for this tick: the blackboard entry under the bound key
   * when the key is present, otherwise `literal`.
   */
  protected resolveParam(runtime: TickRuntime, param: string, literal: unknown): unknown {
    const key = this.bindingTable.get(param);
    if (key !== undefined && runtime.blackboard.has(key)) {
      return runtime.blackboard.get(key);
    }
    return literal;
  }

  /** Like {@link resolveParam} but requires a string; anything else yields `literal`. */
  protected resolveString(runtime: TickRuntime, param: string, literal: string): string {
    const value = this.resolveParam(runtime, param, literal);
    return typeof value === "string" ? value : literal;
  }

  /** Like {@link resolveParam} but requires a finite number; anything else yields `literal`. */
  protected resolveNumber(runtime: TickRuntime, param: string, literal: number): number {
    const value = this.resolveParam(runtime, param, literal);
    return typeof value === "number" && Number.isFinite(value) ? value : literal;
  }
}

/**
 * Leaf running user-supplied work. Subclasses implement {@link execute};
 * whatever it throws is turned into `failure` by the node boundary.
 */
export abstract class ActionNode extends LeafNode {
  protected async onTick(runtime: TickRuntime): Promise<Status> {
    return this.execute(runtime);
  }

  protected abstract execute(runtime: TickRuntime): Status | Promise<Status>;
}

/** Leaf mapping a boolean check to success or failure. */
export abstract class ConditionNode extends LeafNode {
  protected async onTick(runtime: TickRuntime): Promise<Status> {
    return (await this.evaluate(runtime)) ? "success" : "failure";
  }

  protected abstract evaluate(runtime: TickRuntime): boolean | Promise<boolean>;
}
