import { EventEmitter } from "node:events";

import { UnknownTargetError } from "../core/errors.js";

export type TaskState = "pending" | "claimed" | "completed" | "failed";

/** Payload accepted by {@link TaskBoard.publishTask}. */
export interface TaskPublication {
  title: string;
  description?: string;
  /** Capabilities a claimant must present. */
  requirements?: Iterable<string>;
  /** Higher values are offered first. Defaults to 0. */
  priority?: number;
  data?: unknown;
  /** Identity of the publisher, recorded for audits. */
  source?: string | null;
}

/** Snapshot of a task exposed to callers. */
export interface TaskSnapshot {
  id: string;
  title: string;
  description: string;
  requirements: string[];
  priority: number;
  data: unknown;
  state: TaskState;
  publishedBy: string | null;
  claimant: string | null;
  createdAt: number;
  claimedAt: number | null;
  finishedAt: number | null;
  result: unknown;
  error: string | null;
}

export interface TaskStats {
  total: number;
  pending: number;
  claimed: number;
  completed: number;
  failed: number;
}

/** Lifecycle events published by the board. */
export type TaskBoardEvent =
  | { kind: "task_published"; task: TaskSnapshot }
  | { kind: "task_claimed"; task: TaskSnapshot }
  | { kind: "task_completed"; task: TaskSnapshot }
  | { kind: "task_failed"; task: TaskSnapshot };

export type TaskBoardEventListener = (event: TaskBoardEvent) => void;

export interface TaskBoardOptions {
  now?: () => number;
}

interface TaskInternal {
  id: string;
  seq: number;
  title: string;
  description: string;
  requirements: Set<string>;
  priority: number;
  data: unknown;
  state: TaskState;
  publishedBy: string | null;
  claimant: string | null;
  createdAt: number;
  claimedAt: number | null;
  finishedAt: number | null;
  result: unknown;
  error: string | null;
}

const TASK_EVENT = "task";

/**
 * Work queue shared by the trees of a forest. A task only moves forward:
 * pending, then claimed, then completed or failed (a pending task may also be
 * failed directly). Claims run synchronously, so two claims on one task are
 * always ordered and only the first can succeed.
 */
export class TaskBoard {
  private readonly tasks = new Map<string, TaskInternal>();
  private readonly emitter = new EventEmitter();
  private readonly now: () => number;
  private counter = 0;

  constructor(options: TaskBoardOptions = {}) {
    this.now = options.now ?? (() => Date.now());
  }

  /** Subscribes to lifecycle events. The disposer detaches the listener. */
  observe(listener: TaskBoardEventListener): () => void {
    this.emitter.on(TASK_EVENT, listener);
    return () => {
      this.emitter.off(TASK_EVENT, listener);
    };
  }

  /** Publishes a task and returns its identifier (`task_<n>`). */
  publishTask(publication: TaskPublication): string {
    this.counter += 1;
    const id = `task_${this.counter}`;
    const task: TaskInternal = {
      id,
      seq: this.counter,
      title: publication.title,
      description: publication.description ?? "",
      requirements: new Set(publication.requirements ?? []),
      priority: publication.priority ?? 0,
      data: publication.data ?? null,
      state: "pending",
      publishedBy: publication.source ?? null,
      claimant: null,
      createdAt: this.now(),
      claimedAt: null,
      finishedAt: null,
      result: null,
      error: null,
    };
    this.tasks.set(id, task);
    this.emit({ kind: "task_published", task: this.snapshot(task) });
    return id;
  }

  /**
   * Claims a pending task. Returns `false` when the task is no longer pending
   * or `capabilities` does not cover its requirements.
   */
  claimTask(taskId: string, claimant: string, capabilities: Iterable<string>): boolean {
    const task = this.require(taskId);
    if (task.state !== "pending") {
      return false;
    }
    const offered = new Set(capabilities);
    for (const requirement of task.requirements) {
      if (!offered.has(requirement)) {
        return false;
      }
    }
    task.state = "claimed";
    task.claimant = claimant;
    task.claimedAt = this.now();
    this.emit({ kind: "task_claimed", task: this.snapshot(task) });
    return true;
  }

  /**
   * Completes a claimed task. When `claimant` is given it must match the
   * recorded claimant.
   */
  completeTask(taskId: string, result: unknown = null, claimant?: string): boolean {
    const task = this.require(taskId);
    if (task.state !== "claimed" || (claimant !== undefined && task.claimant !== claimant)) {
      return false;
    }
    task.state = "completed";
    task.result = result;
    task.finishedAt = this.now();
    this.emit({ kind: "task_completed", task: this.snapshot(task) });
    return true;
  }

  /** Fails a pending or claimed task. */
  failTask(taskId: string, error: string): boolean {
    const task = this.require(taskId);
    if (task.state !== "pending" && task.state !== "claimed") {
      return false;
    }
    task.state = "failed";
    task.error = error;
    task.finishedAt = this.now();
    this.emit({ kind: "task_failed", task: this.snapshot(task) });
    return true;
  }

  getTask(taskId: string): TaskSnapshot | null {
    const task = this.tasks.get(taskId);
    return task ? this.snapshot(task) : null;
  }

  /**
   * Pending tasks, highest priority first (publication order among equals).
   * With `capabilities`, only tasks those capabilities can claim.
   */
  getAvailableTasks(capabilities?: Iterable<string>): TaskSnapshot[] {
    const offered = capabilities === undefined ? null : new Set(capabilities);
    return [...this.tasks.values()]
      .filter((task) => task.state === "pending")
      .filter((task) => offered === null || [...task.requirements].every((req) => offered.has(req)))
      .sort((left, right) => right.priority - left.priority || left.seq - right.seq)
      .map((task) => this.snapshot(task));
  }

  getClaimedTasks(claimant?: string): TaskSnapshot[] {
    return [...this.tasks.values()]
      .filter((task) => task.state === "claimed" && (claimant === undefined || task.claimant === claimant))
      .map((task) => this.snapshot(task));
  }

  getTaskStats(): TaskStats {
    const stats: TaskStats = { total: this.tasks.size, pending: 0, claimed: 0, completed: 0, failed: 0 };
    for (const task of this.tasks.values()) {
      stats[task.state] += 1;
    }
    return stats;
  }

  private require(taskId: string): TaskInternal {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new UnknownTargetError("task", taskId);
    }
    return task;
  }

  private emit(event: TaskBoardEvent): void {
    this.emitter.emit(TASK_EVENT, event);
  }

  private snapshot(task: TaskInternal): TaskSnapshot {
    return {
      id: task.id,
      title: task.title,
      description: task.description,
      requirements: [...task.requirements].sort(),
      priority: task.priority,
      data: task.data,
      state: task.state,
      publishedBy: task.publishedBy,
      claimant: task.claimant,
      createdAt: task.createdAt,
      claimedAt: task.claimedAt,
      finishedAt: task.finishedAt,
      result: task.result,
      error: task.error,
    };
  }
}
