import type { AgentAdapter } from "./agents/adapter.js";
import { registryDelegate } from "./agents/delegate.js";
import { AgentRegistry } from "./agents/registry.js";
import { ValidationError } from "./errors.js";
import type { ReportStore } from "./persistence/store.js";
import { buildTaskGraph } from "./planner/builder.js";
import { Planner } from "./planner/planner.js";
import type { TaskGraph } from "./planner/task-graph.js";
import { projectTasks, taskBreakdown, type TaskBreakdown } from "./planner/templates.js";
import type { EngineWarning, RawTask } from "./planner/types.js";
import { Scheduler } from "./scheduler/scheduler.js";
import type {
  FinalReport,
  PassResult,
  RunCallbacks,
  RunOptions,
  SchedulerConfig,
  StepOptions,
} from "./scheduler/types.js";
import { parseOrThrow, ProjectRequestSchema, type ProjectRequest } from "./schemas.js";
import { log } from "./utils/logger.js";

export type ProjectSource = "tasks" | "template" | "planner";

export type PreparedProject = {
  description: string;
  source: ProjectSource;
  graph: TaskGraph;
  /** Corrections made while building the graph. */
  warnings: EngineWarning[];
  breakdown: TaskBreakdown;
};

export type OrchestratorOptions = {
  /** Used to plan requests that carry neither tasks nor a project type. */
  plannerAgent?: AgentAdapter;
  /** Finished reports are archived here when set. */
  store?: ReportStore;
  /** Scheduler settings for every run; per-run options still win. */
  scheduler?: Partial<SchedulerConfig>;
  /** Check every agent's health before a run so unhealthy agents are skipped. */
  checkHealthBeforeRun?: boolean;
};

/**
 * Entry point for embedding the engine: register workers, turn a project
 * request into a task graph, and run it.
 */
export class Orchestrator {
  readonly agents = new AgentRegistry();
  private plannerAgent?: AgentAdapter;
  private store?: ReportStore;
  private scheduler: Scheduler;
  private checkHealthBeforeRun: boolean;

  constructor(opts?: OrchestratorOptions) {
    this.plannerAgent = opts?.plannerAgent;
    this.store = opts?.store;
    this.scheduler = new Scheduler(registryDelegate(this.agents), opts?.scheduler);
    this.checkHealthBeforeRun = opts?.checkHealthBeforeRun ?? false;
  }

  addAgent(adapter: AgentAdapter): void {
    this.agents.add(adapter);
  }

  /**
   * Build the task graph for a request. Explicit tasks win over a project
   * type, which wins over the planner.
   */
  async prepare(request: ProjectRequest): Promise<PreparedProject> {
    const req = parseOrThrow(ProjectRequestSchema, request, "project request");

    let raw: RawTask[];
    let source: ProjectSource;
    if (req.tasks) {
      raw = req.tasks;
      source = "tasks";
    } else if (req.projectType) {
      raw = projectTasks(req.projectType, req.parameters);
      source = "template";
    } else if (this.plannerAgent) {
      const planner = new Planner({ plannerAgent: this.plannerAgent, availableOwners: this.agents.names() });
      raw = await planner.plan(req.description);
      source = "planner";
    } else {
      throw new ValidationError(
        "VALIDATION_FAILED",
        "Project request needs tasks, a projectType or a configured planner agent",
      );
    }

    const { graph, warnings } = buildTaskGraph(raw);
    log.info(`Prepared "${req.description}"`, { source, tasks: graph.size, warnings: warnings.length });

    return {
      description: req.description,
      source,
      graph,
      warnings,
      breakdown: taskBreakdown(graph.list()),
    };
  }

  /**
   * Run a prepared project to its final report. A project that was stepped
   * part of the way continues from where it is; a finished one is rejected.
   */
  async run(project: PreparedProject, opts?: RunOptions, callbacks?: RunCallbacks): Promise<FinalReport> {
    this.assertRunnable(project);
    if (this.checkHealthBeforeRun) await this.refreshHealth();

    const report = await this.scheduler.run(project.graph, {
      ...opts,
      warnings: [...project.warnings, ...(opts?.warnings ?? [])],
      callbacks: callbacks ?? opts?.callbacks,
    });

    if (this.store) {
      try {
        this.store.insert(report, project.description);
      } catch (err) {
        log.error("Failed to archive report", {
          runId: report.runId,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
    return report;
  }

  /** Run one scheduling pass over a prepared project. */
  async step(project: PreparedProject, opts?: StepOptions, callbacks?: RunCallbacks): Promise<PassResult> {
    this.assertRunnable(project);
    if (this.checkHealthBeforeRun) await this.refreshHealth();
    return this.scheduler.step(project.graph, { ...opts, callbacks: callbacks ?? opts?.callbacks });
  }

  private assertRunnable(project: PreparedProject): void {
    if (project.graph.size > 0 && project.graph.isDrained()) {
      throw new ValidationError("VALIDATION_FAILED", `Project "${project.description}" has already been run`);
    }
  }

  private async refreshHealth(): Promise<void> {
    const unhealthy = (await this.agents.checkAllHealth()).filter((h) => !h.healthy);
    if (unhealthy.length > 0) {
      log.warn("Unhealthy agents will be skipped", { agents: unhealthy.map((h) => h.name) });
    }
  }
}
