import { z } from "zod";

import { DefinitionError, UnknownTargetError } from "../core/errors.js";
import { BehaviorTree, type BehaviorTreeOptions } from "../engine/behaviorTree.js";
import type { BehaviorNode } from "../nodes/base.js";
import type { NodeRegistry } from "../registry/nodeRegistry.js";

/** One record of the flat definition format. Children reference other records by id. */
export const NodeDefinitionSchema = z
  .object({
    id: z.string().min(1),
    type: z.string().min(1),
    name: z.string().min(1).optional(),
    params: z.record(z.unknown()).default({}),
    bindings: z.record(z.string().min(1)).default({}),
    children: z.array(z.string().min(1)).default([]),
  })
  .strict();

export const TreeDefinitionSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    root: z.string().min(1),
    nodes: z.array(NodeDefinitionSchema).min(1),
  })
  .strict();

/** Definition as authored; defaults are filled in by {@link parseTreeDefinition}. */
export type TreeDefinitionInput = z.input<typeof TreeDefinitionSchema>;
export type TreeDefinition = z.output<typeof TreeDefinitionSchema>;
export type NodeDefinition = z.output<typeof NodeDefinitionSchema>;

/** Parses and checks a definition without building anything. */
export function parseTreeDefinition(input: unknown, registry: NodeRegistry): TreeDefinition {
  const parsed = TreeDefinitionSchema.safeParse(input);
  if (!parsed.success) {
    throw new DefinitionError("invalid tree definition", { issues: parsed.error.issues });
  }
  checkReferences(parsed.data, registry);
  return parsed.data;
}

/**
 * Builds the node tree described by `input`. Every reference is checked
 * before the first node is constructed: registered types, existing child ids,
 * at most one parent per record, a root nobody owns, and no cycle. Records
 * unreachable from the root are rejected as well.
 */
export function buildTree(input: unknown, registry: NodeRegistry): BehaviorNode {
  const definition = parseTreeDefinition(input, registry);
  const byId = new Map(definition.nodes.map((node) => [node.id, node] as const));

  const build = (id: string): BehaviorNode => {
    const record = byId.get(id);
    if (!record) {
      throw new DefinitionError(`unknown node id "${id}"`, { id });
    }
    return registry.create(record.type, {
      name: record.name ?? record.id,
      params: record.params,
      bindings: record.bindings,
      children: record.children.map(build),
    });
  };

  return build(definition.root);
}

/** Builds a definition straight into a {@link BehaviorTree} named after it. */
export function buildBehaviorTree(
  input: unknown,
  registry: NodeRegistry,
  options: Omit<BehaviorTreeOptions, "name" | "root" | "description"> = {},
): BehaviorTree {
  const definition = parseTreeDefinition(input, registry);
  const root = buildTree(definition, registry);
  return new BehaviorTree({ ...options, name: definition.name, description: definition.description, root });
}

function checkReferences(definition: TreeDefinition, registry: NodeRegistry): void {
  const byId = new Map<string, NodeDefinition>();
  for (const node of definition.nodes) {
    if (byId.has(node.id)) {
      throw new DefinitionError(`duplicate node id "${node.id}"`, { id: node.id });
    }
    byId.set(node.id, node);
  }
  if (!byId.has(definition.root)) {
    throw new DefinitionError(`root "${definition.root}" is not defined`, { root: definition.root });
  }

  const parents = new Map<string, string>();
  for (const node of definition.nodes) {
    if (!registry.isRegistered(node.type)) {
      throw new UnknownTargetError("node_type", node.type);
    }
    for (const childId of node.children) {
      if (!byId.has(childId)) {
        throw new DefinitionError(`node "${node.id}" references unknown child "${childId}"`, {
          id: node.id,
          child: childId,
        });
      }
      const owner = parents.get(childId);
      if (owner !== undefined) {
        throw new DefinitionError(`node "${childId}" has more than one parent`, {
          id: childId,
          parents: [owner, node.id],
        });
      }
      parents.set(childId, node.id);
    }
  }
  const rootOwner = parents.get(definition.root);
  if (rootOwner !== undefined) {
    throw new DefinitionError(`root "${definition.root}" is a child of "${rootOwner}"`, {
      root: definition.root,
      parent: rootOwner,
    });
  }

  // Single parents and an ownerless root leave cycles only among records the
  // root cannot reach, so one walk finds both problems.
  const reached = new Set<string>();
  const pending = [definition.root];
  while (pending.length > 0) {
    const id = pending.pop();
    if (id === undefined || reached.has(id)) {
      continue;
    }
    reached.add(id);
    pending.push(...(byId.get(id)?.children ?? []));
  }
  const stray = definition.nodes.filter((node) => !reached.has(node.id)).map((node) => node.id);
  if (stray.length > 0) {
    const cyclic = stray.filter((id) => isOnCycle(id, byId));
    throw new DefinitionError(
      cyclic.length > 0 ? `definition contains a cycle through "${cyclic[0]}"` : "definition has unreachable nodes",
      { unreachable: stray, cyclic },
    );
  }
}

function isOnCycle(start: string, byId: ReadonlyMap<string, NodeDefinition>): boolean {
  const seen = new Set<string>();
  const pending = [...(byId.get(start)?.children ?? [])];
  while (pending.length > 0) {
    const id = pending.pop();
    if (id === undefined || seen.has(id)) {
      continue;
    }
    if (id === start) {
      return true;
    }
    seen.add(id);
    pending.push(...(byId.get(id)?.children ?? []));
  }
  return false;
}
