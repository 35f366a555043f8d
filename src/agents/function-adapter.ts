import type { Task, TaskResult } from "../planner/types.js";
import type { DelegateContext } from "../scheduler/types.js";
import { log } from "../utils/logger.js";
import { TimeoutExpired, withTimeout } from "../utils/timeout.js";
import type { AgentAdapter } from "./adapter.js";

export type AgentFunctionContext = {
  id: string;
  owner: string;
  phase: string;
  requirements?: Task["requirements"];
  materials?: string[];
  attempt: number;
  signal: AbortSignal;
  /** Report progress while the function runs. */
  emit: (message: string) => void;
};

export type AgentFunction = (description: string, context: AgentFunctionContext) => Promise<string>;

export type FunctionAdapterOptions = {
  name: string;
  fn: AgentFunction;
  description?: string;
  capabilities?: string[];
  /** Adapter-level deadline in ms. Unset means only the scheduler's deadline applies. */
  timeout?: number;
};

export class FunctionAdapter implements AgentAdapter {
  readonly name: string;
  readonly type = "function" as const;
  readonly description?: string;
  readonly capabilities?: string[];

  private fn: AgentFunction;
  private timeout?: number;

  constructor(opts: FunctionAdapterOptions) {
    this.name = opts.name;
    this.fn = opts.fn;
    this.description = opts.description;
    this.capabilities = opts.capabilities;
    this.timeout = opts.timeout;
  }

  async execute(task: Readonly<Task>, ctx: DelegateContext): Promise<TaskResult> {
    const start = Date.now();
    const context: AgentFunctionContext = {
      id: task.id,
      owner: task.owner,
      phase: task.phase,
      requirements: task.requirements,
      materials: task.materials,
      attempt: ctx.attempt,
      signal: ctx.signal,
      emit: ctx.emit,
    };

    try {
      log.info(`[${this.name}] Running function for task "${task.id}"`, { attempt: ctx.attempt });

      const call = this.fn(task.description, context);
      const output = this.timeout === undefined ? await call : await withTimeout(call, this.timeout);

      return {
        status: "ok",
        output,
        metadata: { durationMs: Date.now() - start },
      };
    } catch (err) {
      const isTimeout = err instanceof TimeoutExpired;
      const message = err instanceof Error ? err.message : String(err);
      log.error(`[${this.name}] Task "${task.id}" failed`, { error: message });
      return {
        status: isTimeout ? "timeout" : "error",
        output: isTimeout ? `Function ${message}` : message,
        metadata: { durationMs: Date.now() - start },
      };
    }
  }
}
