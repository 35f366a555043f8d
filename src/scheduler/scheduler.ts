import { randomUUID } from "node:crypto";
import { getConfig } from "../config.js";
import { ConfigError, DelegateError } from "../errors.js";
import type { TaskGraph } from "../planner/task-graph.js";
import type { EngineWarning, TaskResult } from "../planner/types.js";
import { log } from "../utils/logger.js";
import { backoffDelay, sleep } from "../utils/retry.js";
import { TimeoutExpired, withTimeout } from "../utils/timeout.js";
import type {
  Delegate,
  FinalReport,
  PassResult,
  RunCallbacks,
  RunOptions,
  RunOutcome,
  SchedulerConfig,
  StepOptions,
} from "./types.js";
import { UsageTracker } from "./usage.js";

const logger = log.child("scheduler");

function resolveConfig(...layers: Array<Partial<SchedulerConfig> | undefined>): SchedulerConfig {
  const defaults = getConfig().scheduler;
  const pick = <K extends keyof SchedulerConfig>(key: K): SchedulerConfig[K] => {
    for (const layer of layers) {
      const value = layer?.[key];
      if (value !== undefined) return value;
    }
    return defaults[key];
  };

  const cfg: SchedulerConfig = {
    perTaskTimeoutMs: pick("perTaskTimeoutMs"),
    maxRetries: pick("maxRetries"),
    maxTotalIterations: pick("maxTotalIterations"),
    maxConcurrency: pick("maxConcurrency"),
    retryBaseDelayMs: pick("retryBaseDelayMs"),
    retryMaxDelayMs: pick("retryMaxDelayMs"),
  };

  if (cfg.perTaskTimeoutMs <= 0) throw new ConfigError("perTaskTimeoutMs must be positive");
  if (cfg.maxRetries < 0) throw new ConfigError("maxRetries must not be negative");
  if (cfg.maxTotalIterations < 1) throw new ConfigError("maxTotalIterations must be at least 1");
  if (cfg.maxConcurrency < 1) throw new ConfigError("maxConcurrency must be at least 1");
  return cfg;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

type PassContext = {
  cfg: SchedulerConfig;
  cb?: RunCallbacks;
  /** Warnings raised so far; the deadlock breaker appends to it. */
  warnings: EngineWarning[];
  usage: UsageTracker;
};

/**
 * Drives a task graph to completion by dispatching ready tasks to a delegate.
 *
 * Each pass promotes newly ready tasks, dispatches up to `maxConcurrency` of
 * them concurrently, waits for all of them and then applies the outcomes one
 * by one. Graph mutations therefore never interleave.
 */
export class Scheduler {
  private delegate: Delegate;
  private config?: Partial<SchedulerConfig>;
  private passes = new WeakMap<TaskGraph, number>();

  constructor(delegate: Delegate, config?: Partial<SchedulerConfig>) {
    this.delegate = delegate;
    this.config = config;
  }

  async run(graph: TaskGraph, opts?: RunOptions): Promise<FinalReport> {
    const cfg = resolveConfig(opts, this.config);
    const runId = opts?.runId ?? randomUUID();
    const cb = opts?.callbacks;
    const ctx: PassContext = { cfg, cb, warnings: [...(opts?.warnings ?? [])], usage: new UsageTracker() };
    const startedAt = Date.now();

    let iterations = 0;
    let stalled = false;
    let cancelled = false;

    logger.info(`Run ${runId} starting`, { tasks: graph.size, ...cfg });

    while (!graph.isDrained()) {
      if (opts?.signal?.aborted) {
        cancelled = true;
        const ids = graph.cancelRemaining();
        logger.warn(`Run ${runId} cancelled`, { cancelled: ids.length });
        for (const id of ids) cb?.onTaskCancelled?.(graph.task(id));
        break;
      }

      if (iterations >= cfg.maxTotalIterations) {
        stalled = true;
        logger.warn(`Run ${runId} stalled after ${iterations} passes`, { ...graph.snapshot().counts });
        break;
      }
      iterations++;
      await this.pass(graph, iterations, ctx);
    }

    const snapshot = graph.snapshot();
    const outcome: RunOutcome = cancelled
      ? "cancelled"
      : stalled
        ? "stalled"
        : snapshot.counts.completed === snapshot.total
          ? "completed"
          : "partial";
    const finishedAt = Date.now();

    logger.info(`Run ${runId} finished: ${outcome}`, { iterations, ...snapshot.counts });

    return {
      runId,
      outcome,
      stalled,
      cancelled,
      totalTasks: snapshot.total,
      counts: snapshot.counts,
      completionPercentage: snapshot.completionPercentage,
      tasks: graph.list().map((t) => ({
        taskId: t.id,
        owner: t.owner,
        phase: t.phase,
        status: t.status,
        retryCount: t.retryCount,
        error: t.error,
        output: t.result?.output,
      })),
      warnings: ctx.warnings,
      usage: ctx.usage.summary(),
      iterations,
      startedAt,
      finishedAt,
      durationMs: finishedAt - startedAt,
    };
  }

  /**
   * Run a single pass over `graph`, for callers that drive the graph
   * themselves (for instance to continue a stalled run). The iteration
   * ceiling does not apply here. A drained graph is left alone.
   */
  async step(graph: TaskGraph, opts?: StepOptions): Promise<PassResult> {
    const cfg = resolveConfig(opts, this.config);
    const ctx: PassContext = { cfg, cb: opts?.callbacks, warnings: [], usage: new UsageTracker() };

    let iteration = 0;
    let promoted: string[] = [];
    let dispatched: string[] = [];
    if (!graph.isDrained()) {
      iteration = (this.passes.get(graph) ?? 0) + 1;
      this.passes.set(graph, iteration);
      ({ promoted, dispatched } = await this.pass(graph, iteration, ctx));
    }

    return {
      iteration,
      promoted,
      dispatched,
      warnings: ctx.warnings,
      usage: ctx.usage.summary(),
      drained: graph.isDrained(),
      snapshot: graph.snapshot(),
    };
  }

  private async pass(
    graph: TaskGraph,
    iteration: number,
    ctx: PassContext,
  ): Promise<{ promoted: string[]; dispatched: string[] }> {
    const { cfg, cb } = ctx;
    const promoted = graph.readyTasks();
    const batch = graph.idsWithStatus("ready").slice(0, cfg.maxConcurrency);
    cb?.onPassStart?.(iteration, batch);

    if (batch.length > 0) {
      for (const id of batch) graph.markInProgress(id);
      const settled = await Promise.allSettled(batch.map((id) => this.dispatch(graph, id, cfg, cb)));
      batch.forEach((id, i) => this.apply(graph, id, settled[i], ctx));
    } else if (promoted.length === 0 && graph.idsWithStatus("pending").length > 0) {
      this.resolveDeadlock(graph, ctx.warnings, cb);
    }

    cb?.onPassEnd?.(iteration, graph.snapshot());
    return { promoted, dispatched: batch };
  }

  private async dispatch(
    graph: TaskGraph,
    id: string,
    cfg: SchedulerConfig,
    cb?: RunCallbacks,
  ): Promise<TaskResult> {
    const task = graph.task(id);
    const attempt = task.retryCount + 1;
    if (attempt > 1) {
      const delay = backoffDelay(task.retryCount, cfg.retryBaseDelayMs, cfg.retryMaxDelayMs);
      if (delay > 0) await sleep(delay);
    }

    cb?.onTaskStart?.(task, attempt);
    logger.info(`Dispatching "${id}" to ${task.owner}`, { attempt });

    const controller = new AbortController();
    const ctx = {
      attempt,
      signal: controller.signal,
      emit: (message: string) => cb?.onTaskActivity?.(task, message),
    };

    // The delegate may keep running after a timeout; only the wait is abandoned.
    return withTimeout(
      Promise.resolve().then(() => this.delegate(task, ctx)),
      cfg.perTaskTimeoutMs,
      () => controller.abort(),
    );
  }

  private apply(
    graph: TaskGraph,
    id: string,
    settled: PromiseSettledResult<TaskResult>,
    ctx: PassContext,
  ): void {
    const { cfg, cb } = ctx;
    let result: TaskResult;
    if (settled.status === "fulfilled") {
      result = settled.value;
    } else if (settled.reason instanceof TimeoutExpired) {
      result = { status: "timeout", output: `Task "${id}" ${settled.reason.message}` };
    } else {
      result = { status: "error", output: errorMessage(settled.reason) };
    }

    const task = graph.task(id);
    ctx.usage.record(id, task.owner, result.metadata);
    if (result.status === "ok") {
      graph.markCompleted(id, result);
      logger.debug(`Task "${id}" completed`);
      cb?.onTaskEnd?.(task, result);
      return;
    }

    const failure = new DelegateError(id, result.output || `Task "${id}" ended with status ${result.status}`, {
      timedOut: result.status === "timeout",
      cause: settled.status === "rejected" ? settled.reason : undefined,
    });
    graph.markFailed(id, failure.message, result);
    cb?.onTaskEnd?.(task, result);

    if (graph.canRetry(id, cfg.maxRetries)) {
      graph.retry(id, cfg.maxRetries);
      logger.warn(`Task "${id}" failed, retrying (${task.retryCount}/${cfg.maxRetries})`, {
        code: failure.code,
        error: failure.message,
      });
      cb?.onTaskRetry?.(task, failure.message);
      return;
    }

    logger.error(`Task "${id}" failed permanently`, { code: failure.code, error: failure.message });
    cb?.onTaskFailed?.(task, failure.message);
    for (const blockedId of graph.cascadeFailure(id)) {
      const blocked = graph.task(blockedId);
      logger.warn(`Task "${blockedId}" blocked`, { dependency: id });
      cb?.onTaskBlocked?.(blocked, blocked.error ?? `blocked: dependency ${id} failed`);
    }
  }

  /**
   * Called after a pass that promoted and dispatched nothing while tasks are
   * still pending. Pending tasks sitting behind a failed or blocked dependency
   * are blocked. Any pending tasks still left are perpetually unready; those
   * on a dependency cycle (or, failing that, all of them) are forced to ready
   * with a warning.
   */
  private resolveDeadlock(graph: TaskGraph, warnings: EngineWarning[], cb?: RunCallbacks): void {
    let changed = true;
    while (changed) {
      changed = false;
      for (const id of graph.idsWithStatus("pending")) {
        const dead = graph.unmetDependencies(id).find((d) => {
          const status = graph.task(d).status;
          return status === "failed" || status === "blocked";
        });
        if (dead === undefined) continue;
        const reason = `blocked: dependency ${dead} ${graph.task(dead).status}`;
        graph.block(id, reason);
        logger.warn(`Task "${id}" blocked during deadlock repair`, { dependency: dead });
        cb?.onTaskBlocked?.(graph.task(id), reason);
        changed = true;
      }
    }

    const stuck = graph.idsWithStatus("pending");
    if (stuck.length === 0) return;

    const onCycle = stuck.filter((id) => reachesItself(graph, id));
    for (const id of onCycle.length > 0 ? onCycle : stuck) {
      const unmet = graph.unmetDependencies(id);
      graph.forceReady(id);
      const warning: EngineWarning = {
        kind: "deadlock_break",
        taskId: id,
        message: `Deadlock: forced "${id}" to ready; unmet dependencies: ${unmet.join(", ")}`,
      };
      warnings.push(warning);
      logger.warn(warning.message);
      cb?.onWarning?.(warning);
    }
  }
}

/** Whether `start` depends, through pending tasks only, on itself. */
function reachesItself(graph: TaskGraph, start: string): boolean {
  const pendingDeps = (id: string) =>
    graph.unmetDependencies(id).filter((d) => graph.task(d).status === "pending");
  const stack = pendingDeps(start);
  const seen = new Set<string>();

  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined) break;
    if (id === start) return true;
    if (seen.has(id)) continue;
    seen.add(id);
    stack.push(...pendingDeps(id));
  }
  return false;
}

/** Run `graph` to completion with `delegate`. */
export function runGraph(
  graph: TaskGraph,
  delegate: Delegate,
  config?: RunOptions,
): Promise<FinalReport> {
  return new Scheduler(delegate).run(graph, config);
}
