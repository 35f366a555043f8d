import type { Task, TaskResult } from "../planner/types.js";
import type { DelegateContext } from "../scheduler/types.js";

/**
 * A worker that can carry out tasks. Adapters are looked up by `name`, which
 * is matched against a task's `owner`.
 */
export interface AgentAdapter {
  name: string;
  type: "function" | "simulated" | string;
  description?: string;
  capabilities?: string[];

  /**
   * Run one attempt of `task`. Returning a non-"ok" result and throwing both
   * count as a failed attempt.
   */
  execute(task: Readonly<Task>, ctx: DelegateContext): Promise<TaskResult>;
  healthCheck?(): Promise<boolean>;
}
