import type { BehaviorNode } from "../nodes/base.js";
import { CompositeNode } from "../nodes/composite.js";
import { DecoratorNode } from "../nodes/decorator.js";
import { LeafNode } from "../nodes/leaf.js";

export interface ValidationIssue {
  path: string;
  message: string;
}

export interface TreeValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

/**
 * Checks the child-count invariants of every node below `root`. Broken
 * invariants are errors; empty composites and names used twice are warnings.
 */
export function validateTree(root: BehaviorNode): TreeValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];
  const seen = new Map<string, string>();

  for (const node of [root, ...root.getDescendants()]) {
    const path = node.getPath();
    const firstPath = seen.get(node.name);
    if (firstPath !== undefined) {
      warnings.push({ path, message: `name "${node.name}" is also used at ${firstPath}` });
    } else {
      seen.set(node.name, path);
    }

    if (node instanceof LeafNode && node.children.length > 0) {
      errors.push({ path, message: `${node.kind} is a leaf and must not have children` });
    } else if (node instanceof DecoratorNode && node.children.length !== 1) {
      errors.push({ path, message: `${node.kind} needs exactly one child, found ${node.children.length}` });
    } else if (node instanceof CompositeNode && node.children.length === 0) {
      warnings.push({ path, message: `${node.kind} has no children` });
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}
