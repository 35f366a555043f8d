import { getConfig } from "../config.js";
import type { EngineWarning, GraphSnapshot, Task, TaskResult } from "../planner/types.js";
import type { RunCallbacks } from "../scheduler/types.js";
import { log } from "../utils/logger.js";

export type ActivityType =
  | "task_start"
  | "task_complete"
  | "task_retry"
  | "task_failed"
  | "task_blocked"
  | "task_cancelled"
  | "task_activity"
  | "warning"
  | "info";

export type ActivityEvent = {
  seq: number;
  at: number;
  type: ActivityType;
  taskId?: string;
  owner?: string;
  message: string;
};

export type ActivityListener = (event: ActivityEvent) => void;

const logger = log.child("activity");

/**
 * Bounded event log of what happened during a run. Pass it as the scheduler's
 * callbacks; once `maxEvents` is reached the oldest events are dropped.
 */
export class ActivityRecorder implements RunCallbacks {
  private events: ActivityEvent[] = [];
  private listeners = new Set<ActivityListener>();
  private seq = 0;
  private maxEvents: number;

  constructor(opts?: { maxEvents?: number }) {
    this.maxEvents = opts?.maxEvents ?? getConfig().activity.maxEvents;
  }

  /** Returns a function that removes the listener again. */
  subscribe(listener: ActivityListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** The last `count` events, oldest first. */
  recent(count = 50): ActivityEvent[] {
    if (count <= 0) return [];
    return this.events.slice(-count);
  }

  all(): ActivityEvent[] {
    return [...this.events];
  }

  get size(): number {
    return this.events.length;
  }

  clear(): void {
    this.events = [];
  }

  info(message: string): void {
    this.record("info", message);
  }

  onPassStart(iteration: number, taskIds: string[]): void {
    if (taskIds.length > 0) {
      this.record("info", `Pass ${iteration}: dispatching ${taskIds.join(", ")}`);
    }
  }

  onTaskStart(task: Readonly<Task>, attempt: number): void {
    const prefix = attempt > 1 ? `Starting (attempt ${attempt})` : "Starting";
    this.record("task_start", `${prefix}: ${task.description}`, task);
  }

  onTaskActivity(task: Readonly<Task>, message: string): void {
    this.record("task_activity", message, task);
  }

  onTaskEnd(task: Readonly<Task>, result: TaskResult): void {
    if (result.status === "ok") {
      this.record("task_complete", "Task completed successfully", task);
    }
  }

  onTaskRetry(task: Readonly<Task>, error: string): void {
    this.record("task_retry", `Retrying after failure: ${error}`, task);
  }

  onTaskFailed(task: Readonly<Task>, error: string): void {
    this.record("task_failed", `Task failed: ${error}`, task);
  }

  onTaskBlocked(task: Readonly<Task>, reason: string): void {
    this.record("task_blocked", reason, task);
  }

  onTaskCancelled(task: Readonly<Task>): void {
    this.record("task_cancelled", "Task cancelled", task);
  }

  onWarning(warning: EngineWarning): void {
    this.record("warning", warning.message);
  }

  onPassEnd(iteration: number, snapshot: GraphSnapshot): void {
    logger.debug(`Pass ${iteration} done`, { completion: snapshot.completionPercentage });
  }

  private record(type: ActivityType, message: string, task?: Readonly<Task>): void {
    const event: ActivityEvent = {
      seq: ++this.seq,
      at: Date.now(),
      type,
      taskId: task?.id,
      owner: task?.owner,
      message,
    };

    this.events.push(event);
    if (this.events.length > this.maxEvents) {
      this.events.splice(0, this.events.length - this.maxEvents);
    }

    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        logger.warn("Activity listener threw", { error: err instanceof Error ? err.message : String(err) });
      }
    }
  }
}
