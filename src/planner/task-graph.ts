import { InvalidTransitionError, ValidationError } from "../errors.js";
import type {
  GraphSnapshot,
  PhaseProgress,
  Task,
  TaskResult,
  TaskStatus,
  TransitionRecord,
} from "./types.js";

export const DEFAULT_PHASE = "construction";

export function emptyCounts(): Record<TaskStatus, number> {
  return {
    pending: 0,
    ready: 0,
    in_progress: 0,
    completed: 0,
    failed: 0,
    blocked: 0,
    cancelled: 0,
  };
}

/** Constructor input. Anything but the id and its edges may be left out. */
export type TaskInit = Pick<Task, "id" | "dependencies"> & Partial<Omit<Task, "id" | "dependencies">>;

/**
 * Tasks, their dependency edges and their status.
 *
 * The constructor enforces unique ids and referential integrity but not
 * acyclicity; use `buildTaskGraph` for untrusted input. The graph does no
 * locking: callers serialize mutations (the scheduler applies outcomes one at
 * a time between awaits).
 */
export class TaskGraph {
  private tasks = new Map<string, Task>();
  private dependents = new Map<string, string[]>();
  private history: TransitionRecord[] = [];
  private seq = 0;

  constructor(init: TaskInit[]) {
    for (const t of init) {
      if (this.tasks.has(t.id)) {
        throw new ValidationError("DUPLICATE_TASK_ID", `Duplicate task id "${t.id}"`);
      }
      this.tasks.set(t.id, {
        ...t,
        owner: t.owner ?? "default",
        description: t.description ?? t.id,
        phase: t.phase ?? DEFAULT_PHASE,
        dependencies: Object.freeze([...new Set(t.dependencies)]),
        status: t.status ?? "pending",
        retryCount: t.retryCount ?? 0,
      });
    }

    for (const task of this.tasks.values()) {
      for (const dep of task.dependencies) {
        if (!this.tasks.has(dep)) {
          throw new ValidationError("UNKNOWN_TASK", `Task "${task.id}" depends on unknown task "${dep}"`);
        }
        const list = this.dependents.get(dep) ?? [];
        list.push(task.id);
        this.dependents.set(dep, list);
      }
    }
  }

  get size(): number {
    return this.tasks.size;
  }

  has(id: string): boolean {
    return this.tasks.has(id);
  }

  get(id: string): Readonly<Task> | undefined {
    return this.tasks.get(id);
  }

  /** Like `get`, but an unknown id throws. */
  task(id: string): Readonly<Task> {
    return this.require(id);
  }

  /** All tasks in insertion order. */
  list(): ReadonlyArray<Readonly<Task>> {
    return [...this.tasks.values()];
  }

  idsWithStatus(status: TaskStatus): string[] {
    return this.list().filter((t) => t.status === status).map((t) => t.id);
  }

  /**
   * Promote every pending task whose dependencies are all completed to ready.
   * Returns only the ids promoted by this call.
   */
  readyTasks(): string[] {
    const promoted: string[] = [];
    for (const task of this.tasks.values()) {
      if (task.status !== "pending") continue;
      if (task.dependencies.every((d) => this.require(d).status === "completed")) {
        this.transition(task, "ready", ["pending"]);
        promoted.push(task.id);
      }
    }
    return promoted;
  }

  markInProgress(id: string): void {
    const task = this.require(id);
    this.transition(task, "in_progress", ["ready"]);
    task.startedAt = Date.now();
    task.result = undefined;
    task.error = undefined;
  }

  markCompleted(id: string, result?: TaskResult): void {
    const task = this.require(id);
    this.transition(task, "completed", ["in_progress"]);
    task.result = result;
    task.completedAt = Date.now();
  }

  markFailed(id: string, error: string, result?: TaskResult): void {
    const task = this.require(id);
    this.transition(task, "failed", ["in_progress"]);
    task.error = error;
    task.result = result;
  }

  canRetry(id: string, maxRetries: number): boolean {
    const task = this.require(id);
    return task.status === "failed" && task.retryCount < maxRetries;
  }

  /** failed → ready, spending one unit of the retry budget. */
  retry(id: string, maxRetries: number): void {
    const task = this.require(id);
    if (task.status === "failed" && task.retryCount >= maxRetries) {
      throw new InvalidTransitionError(id, task.status, "ready", `retry budget of ${maxRetries} exhausted`);
    }
    this.transition(task, "ready", ["failed"]);
    task.retryCount++;
    task.error = undefined;
  }

  /** pending → ready regardless of dependencies. Only the deadlock breaker uses this. */
  forceReady(id: string): void {
    this.transition(this.require(id), "ready", ["pending"]);
  }

  block(id: string, reason: string): void {
    const task = this.require(id);
    this.transition(task, "blocked", ["pending", "ready"]);
    task.error = reason;
  }

  /** Transitive dependents of `id`, breadth-first. */
  dependentsOf(id: string): string[] {
    this.require(id);
    const queue = [...(this.dependents.get(id) ?? [])];
    const visited = new Set<string>();
    const out: string[] = [];

    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined || visited.has(next)) continue;
      visited.add(next);
      out.push(next);
      queue.push(...(this.dependents.get(next) ?? []));
    }
    return out;
  }

  /** Block every not-yet-started transitive dependent of a permanently failed task. */
  cascadeFailure(id: string): string[] {
    const blocked: string[] = [];
    for (const depId of this.dependentsOf(id)) {
      const task = this.require(depId);
      if (task.status === "pending" || task.status === "ready") {
        this.block(depId, `blocked: dependency ${id} failed`);
        blocked.push(depId);
      }
    }
    return blocked;
  }

  cancelRemaining(): string[] {
    const cancelled: string[] = [];
    for (const task of this.tasks.values()) {
      if (task.status === "pending" || task.status === "ready") {
        this.transition(task, "cancelled", ["pending", "ready"]);
        cancelled.push(task.id);
      }
    }
    return cancelled;
  }

  unmetDependencies(id: string): string[] {
    return this.require(id).dependencies.filter((d) => this.require(d).status !== "completed");
  }

  /** True once nothing is pending, ready or in progress. */
  isDrained(): boolean {
    return this.list().every(
      (t) => t.status !== "pending" && t.status !== "ready" && t.status !== "in_progress",
    );
  }

  transitions(): ReadonlyArray<Readonly<TransitionRecord>> {
    return [...this.history];
  }

  snapshot(): GraphSnapshot {
    const counts = emptyCounts();
    const phases = new Map<string, PhaseProgress>();

    for (const task of this.tasks.values()) {
      counts[task.status]++;
      const phase = phases.get(task.phase) ?? { phase: task.phase, total: 0, completed: 0 };
      phase.total++;
      if (task.status === "completed") phase.completed++;
      phases.set(task.phase, phase);
    }

    const total = this.tasks.size;
    return {
      total,
      counts,
      completionPercentage: total > 0 ? (counts.completed / total) * 100 : 0,
      phases: [...phases.values()],
    };
  }

  private require(id: string): Task {
    const task = this.tasks.get(id);
    if (!task) {
      throw new ValidationError("UNKNOWN_TASK", `Unknown task "${id}"`);
    }
    return task;
  }

  private transition(task: Task, to: TaskStatus, allowedFrom: TaskStatus[]): void {
    if (!allowedFrom.includes(task.status)) {
      throw new InvalidTransitionError(task.id, task.status, to);
    }
    this.history.push({ seq: ++this.seq, taskId: task.id, from: task.status, to, at: Date.now() });
    task.status = to;
  }
}
