import { z } from "zod";

import { ConfigurationError, DefinitionError, StructuralError, UnknownTargetError } from "../core/errors.js";
import type { BehaviorNode } from "../nodes/base.js";
import type { ParamBindings } from "../nodes/leaf.js";

/** Families used to group node types in registry listings. */
export type NodeCategory = "composite" | "decorator" | "action" | "condition" | "event" | "communication";

/** Everything a factory receives to build one node. */
export interface NodeSpec {
  type: string;
  name: string;
  params: Readonly<Record<string, unknown>>;
  bindings: ParamBindings;
  /** Already built children, attached by the factory. */
  children: readonly BehaviorNode[];
}

export type NodeFactory = (spec: NodeSpec) => BehaviorNode;

export interface NodeTypeMetadata {
  category: NodeCategory;
  description: string;
  /** Parameter names accepted in `params`. */
  params: readonly string[];
  /** Children accepted: 0 for leaves, 1 for decorators, `null` when unbounded. */
  maxChildren: number | null;
}

export interface NodeRegistryStats {
  registered: number;
  created: number;
  byCategory: Record<string, number>;
  createdByType: Record<string, number>;
}

interface RegistryEntry {
  factory: NodeFactory;
  metadata: NodeTypeMetadata;
}

const DEFAULT_METADATA: NodeTypeMetadata = {
  category: "action",
  description: "",
  params: [],
  maxChildren: 0,
};

/**
 * Table mapping node type names to factories. Registries are plain objects
 * passed by reference, so tests and embedders can build isolated ones.
 */
export class NodeRegistry {
  private readonly entries = new Map<string, RegistryEntry>();
  private readonly createdByType = new Map<string, number>();

  /** Registers `type`. Registering a name twice is a configuration error. */
  register(type: string, factory: NodeFactory, metadata: Partial<NodeTypeMetadata> = {}): void {
    if (type.trim().length === 0) {
      throw new ConfigurationError("node type names must not be empty");
    }
    if (this.entries.has(type)) {
      throw new ConfigurationError(`node type "${type}" is already registered`, { type });
    }
    this.entries.set(type, { factory, metadata: { ...DEFAULT_METADATA, ...metadata } });
  }

  unregister(type: string): boolean {
    this.createdByType.delete(type);
    return this.entries.delete(type);
  }

  /** Builds a node of `type`. Unknown types raise {@link UnknownTargetError}. */
  create(type: string, spec: Partial<Omit<NodeSpec, "type">> & { name: string }): BehaviorNode {
    const entry = this.entries.get(type);
    if (!entry) {
      throw new UnknownTargetError("node_type", type);
    }
    const node = entry.factory({
      type,
      name: spec.name,
      params: spec.params ?? {},
      bindings: spec.bindings ?? {},
      children: spec.children ?? [],
    });
    this.createdByType.set(type, (this.createdByType.get(type) ?? 0) + 1);
    return node;
  }

  isRegistered(type: string): boolean {
    return this.entries.has(type);
  }

  /** Registered type names, sorted. */
  getRegistered(): string[] {
    return [...this.entries.keys()].sort();
  }

  getMetadata(type: string): NodeTypeMetadata | null {
    const entry = this.entries.get(type);
    return entry ? { ...entry.metadata, params: [...entry.metadata.params] } : null;
  }

  getStats(): NodeRegistryStats {
    const byCategory: Record<string, number> = {};
    for (const { metadata } of this.entries.values()) {
      byCategory[metadata.category] = (byCategory[metadata.category] ?? 0) + 1;
    }
    let created = 0;
    for (const count of this.createdByType.values()) {
      created += count;
    }
    return {
      registered: this.entries.size,
      created,
      byCategory,
      createdByType: Object.fromEntries(this.createdByType),
    };
  }

  clear(): void {
    this.entries.clear();
    this.createdByType.clear();
  }
}

/**
 * Validates the `params` of a node spec against `schema`. Zod issues are
 * reported in the {@link DefinitionError} details.
 */
export function parseParams<S extends z.ZodTypeAny>(spec: NodeSpec, schema: S): z.infer<S> {
  const parsed = schema.safeParse(spec.params);
  if (!parsed.success) {
    throw new DefinitionError(`invalid params for ${spec.type} "${spec.name}"`, {
      type: spec.type,
      node: spec.name,
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

/** Attaches every child of `spec` to `node`, refusing more than `maxChildren`. */
export function attachChildren(node: BehaviorNode, spec: NodeSpec, maxChildren: number | null): BehaviorNode {
  if (maxChildren !== null && spec.children.length > maxChildren) {
    throw new StructuralError(`${spec.type} "${spec.name}" accepts at most ${maxChildren} child(ren)`, {
      type: spec.type,
      node: spec.name,
      children: spec.children.length,
    });
  }
  for (const child of spec.children) {
    node.addChild(child);
  }
  return node;
}
