import type { GraphSnapshot, EngineWarning, Task, TaskResult, TaskStatus } from "../planner/types.js";
import type { UsageSummary } from "./usage.js";

export type DelegateContext = {
  /** 1 for the first attempt, 2 for the first retry, and so on. */
  attempt: number;
  /**
   * Aborted when the per-task deadline expires. The scheduler stops waiting
   * either way; honouring the signal is up to the delegate.
   */
  signal: AbortSignal;
  /** Report progress while the task runs. */
  emit: (message: string) => void;
};

/**
 * The external worker capability. Resolving with a non-"ok" result and
 * rejecting are both treated as a failed attempt.
 */
export type Delegate = (task: Readonly<Task>, ctx: DelegateContext) => Promise<TaskResult>;

export type SchedulerConfig = {
  perTaskTimeoutMs: number;
  maxRetries: number;
  maxTotalIterations: number;
  maxConcurrency: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
};

export type RunCallbacks = {
  onPassStart?: (iteration: number, taskIds: string[]) => void;
  onTaskStart?: (task: Readonly<Task>, attempt: number) => void;
  onTaskActivity?: (task: Readonly<Task>, message: string) => void;
  onTaskEnd?: (task: Readonly<Task>, result: TaskResult) => void;
  onTaskRetry?: (task: Readonly<Task>, error: string) => void;
  onTaskFailed?: (task: Readonly<Task>, error: string) => void;
  onTaskBlocked?: (task: Readonly<Task>, reason: string) => void;
  onTaskCancelled?: (task: Readonly<Task>) => void;
  onWarning?: (warning: EngineWarning) => void;
  onPassEnd?: (iteration: number, snapshot: GraphSnapshot) => void;
};

export type RunOptions = Partial<SchedulerConfig> & {
  runId?: string;
  /** Stops the run after the current pass; unstarted tasks become cancelled. */
  signal?: AbortSignal;
  /** Build warnings to carry into the report. */
  warnings?: EngineWarning[];
  callbacks?: RunCallbacks;
};

/** Options for a single pass driven by the caller. */
export type StepOptions = Partial<SchedulerConfig> & {
  callbacks?: RunCallbacks;
};

export type PassResult = {
  /** Pass number for this graph, counted across every `step` call. 0 when nothing ran. */
  iteration: number;
  /** Ids moved from pending to ready at the start of the pass. */
  promoted: string[];
  dispatched: string[];
  /** Warnings raised during the pass, such as deadlock breaks. */
  warnings: EngineWarning[];
  /** Usage reported by the tasks dispatched in this pass. */
  usage: UsageSummary;
  /** Nothing pending, ready or in progress is left. */
  drained: boolean;
  snapshot: GraphSnapshot;
};

export type RunOutcome = "completed" | "partial" | "stalled" | "cancelled";

export type ReportTask = {
  taskId: string;
  owner: string;
  phase: string;
  status: TaskStatus;
  retryCount: number;
  error?: string;
  output?: string;
};

export type FinalReport = {
  runId: string;
  outcome: RunOutcome;
  /** The iteration ceiling was reached before the graph drained. */
  stalled: boolean;
  cancelled: boolean;
  totalTasks: number;
  counts: Record<TaskStatus, number>;
  completionPercentage: number;
  tasks: ReportTask[];
  warnings: EngineWarning[];
  /** Usage workers reported in `TaskResult.metadata.usage`, summed over every attempt. */
  usage: UsageSummary;
  iterations: number;
  startedAt: number;
  finishedAt: number;
  durationMs: number;
};
