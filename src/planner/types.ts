export const TASK_STATUSES = [
  "pending",
  "ready",
  "in_progress",
  "completed",
  "failed",
  "blocked",
  "cancelled",
] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export type TaskResult = {
  status: "ok" | "error" | "timeout";
  output: string;
  metadata?: Record<string, unknown>;
};

export type Task = {
  id: string;
  /** Worker tag. The engine never interprets it. */
  owner: string;
  description: string;
  /** Reporting label only; has no effect on scheduling. */
  phase: string;
  /** Frozen once the task is in a graph. */
  dependencies: readonly string[];
  status: TaskStatus;
  retryCount: number;
  result?: TaskResult;
  error?: string;
  requirements?: Record<string, unknown>;
  materials?: string[];
  startedAt?: number;
  completedAt?: number;
};

/** Unvalidated task record, as it comes from a template file or a planner. */
export type RawTask = {
  id: string | number;
  owner: string;
  description: string;
  phase?: string;
  dependencies?: Array<string | number>;
  requirements?: Record<string, unknown>;
  materials?: string[];
};

export type WarningKind =
  | "dangling_dependency"
  | "duplicate_dependency"
  | "cycle_edge"
  | "deadlock_break";

export type EngineWarning = {
  kind: WarningKind;
  taskId: string;
  dependencyId?: string;
  message: string;
};

export type TransitionRecord = {
  /** Per-graph logical clock; strictly increasing. */
  seq: number;
  taskId: string;
  from: TaskStatus;
  to: TaskStatus;
  at: number;
};

export type PhaseProgress = {
  phase: string;
  total: number;
  completed: number;
};

export type GraphSnapshot = {
  total: number;
  counts: Record<TaskStatus, number>;
  completionPercentage: number;
  phases: PhaseProgress[];
};
