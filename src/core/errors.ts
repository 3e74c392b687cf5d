/**
 * Error hierarchy shared by the engine. Every error carries a stable `code`
 * so callers can branch without matching on messages, an optional `hint`
 * describing how to recover, and structured `details` that loggers can
 * serialise as-is.
 */
export class CanopyError extends Error {
  public readonly code: string;
  public readonly hint?: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    options: { hint?: string; details?: Record<string, unknown>; cause?: unknown } = {},
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "CanopyError";
    this.code = code;
    this.hint = options.hint;
    this.details = options.details;
  }
}

/**
 * Raised when the shape of a tree is invalid: children attached to a leaf,
 * a cycle in the ownership graph, or an undeclared parameter binding.
 */
export class StructuralError extends CanopyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("E-BT-STRUCTURE", message, {
      hint: "fix the tree definition before ticking it",
      details,
    });
    this.name = "StructuralError";
  }
}

/** Raised when an engine component is used with missing or invalid settings. */
export class ConfigurationError extends CanopyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("E-BT-CONFIG", message, { details });
    this.name = "ConfigurationError";
  }
}

/** Kinds of registries that can report an unknown target. */
export type UnknownTargetKind = "service" | "behavior" | "task" | "node_type" | "node";

/**
 * Raised when a caller addresses a service, behaviour, task or node type that
 * was never registered. The error is recoverable: retry with another target.
 */
export class UnknownTargetError extends CanopyError {
  public readonly kind: UnknownTargetKind;
  public readonly target: string;

  constructor(kind: UnknownTargetKind, target: string) {
    super("E-BT-UNKNOWN-TARGET", `unknown ${kind} "${target}"`, {
      hint: `register the ${kind} before addressing it`,
      details: { kind, target },
    });
    this.name = "UnknownTargetError";
    this.kind = kind;
    this.target = target;
  }
}

/** Raised by the tree builder when a definition fails validation. */
export class DefinitionError extends CanopyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("E-BT-DEFINITION", message, { details });
    this.name = "DefinitionError";
  }
}

/**
 * Raised when an unlocked blackboard write is attempted while a locked
 * operation holds the blackboard. Use the `*Async` methods from code that can
 * overlap with transactions.
 */
export class LockBusyError extends CanopyError {
  constructor(operation: string, details?: Record<string, unknown>) {
    super("E-BT-LOCK-BUSY", `cannot ${operation} while the blackboard lock is held`, {
      hint: "await the locked variant of the operation instead",
      details,
    });
    this.name = "LockBusyError";
  }
}

/** Normalises an unknown thrown value into a loggable payload. */
export function describeError(error: unknown): { name: string; message: string; code?: string } {
  if (error instanceof CanopyError) {
    return { name: error.name, message: error.message, code: error.code };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: "UnknownError", message: String(error) };
}
