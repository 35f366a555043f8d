#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { readFileSync } from "node:fs";
import { z } from "zod";
import { ActivityRecorder } from "./activity/recorder.js";
import { createSimulatedCrew } from "./agents/simulated-crew.js";
import { configFromEnv, configure, getConfig } from "./config.js";
import { Orchestrator, type PreparedProject } from "./orchestrator.js";
import { ReportStore, type ArchivedReport } from "./persistence/store.js";
import { listTemplates } from "./planner/templates.js";
import type { RawTask } from "./planner/types.js";
import type { FinalReport } from "./scheduler/types.js";
import { parseJsonOrThrow, RawTaskListSchema, type ProjectRequest } from "./schemas.js";
import { setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason instanceof Error ? reason.message : reason);
});

const TaskFileSchema = z.union([RawTaskListSchema, z.object({ tasks: RawTaskListSchema })]);

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return n;
}

type SourceOptions = {
  tasks?: string;
  description?: string;
  foundation: boolean;
  electrical?: boolean;
  width?: number;
  length?: number;
};

type RunCliOptions = SourceOptions & {
  fail?: string[];
  delay?: number;
  timeout?: number;
  retries?: number;
  maxIterations?: number;
  concurrency?: number;
  db?: string;
  archive: boolean;
  json?: boolean;
  verbose?: boolean;
};

const program = new Command();

program
  .name("task-graph")
  .description("Run dependency-ordered task graphs against a crew of workers")
  .version("0.1.0")
  .option("--debug", "Enable debug logging")
  .option("--quiet", "Only log errors");

program.hook("preAction", (_cmd, actionCmd) => {
  configure(configFromEnv());
  setLogLevel(getConfig().logging.level);
  const opts = actionCmd.optsWithGlobals();
  if (opts.debug) setLogLevel("debug");
  else if (opts.quiet) setLogLevel("error");
});

function withSourceOptions(cmd: Command): Command {
  return cmd
    .argument("[projectType]", "Template name (see `templates`)")
    .option("--tasks <file>", "JSON file with a task list (or { tasks: [...] })")
    .option("--description <text>", "Project description")
    .option("--no-foundation", "Shed: skip the foundation slab")
    .option("--electrical", "Shed: add electrical work")
    .option("--width <ft>", "Shed width", parseInteger)
    .option("--length <ft>", "Shed length", parseInteger);
}

function toRequest(projectType: string | undefined, opts: SourceOptions): ProjectRequest {
  let tasks: RawTask[] | undefined;
  if (opts.tasks) {
    const parsed = parseJsonOrThrow(TaskFileSchema, readFileSync(opts.tasks, "utf8"), `task file ${opts.tasks}`);
    tasks = Array.isArray(parsed) ? parsed : parsed.tasks;
  }

  const dimensions =
    opts.width !== undefined || opts.length !== undefined
      ? { width: opts.width ?? 10, length: opts.length ?? 12 }
      : undefined;

  return {
    description: opts.description ?? projectType ?? opts.tasks ?? "",
    projectType,
    parameters: { hasFoundation: opts.foundation, hasElectrical: opts.electrical ?? false, dimensions },
    tasks,
  };
}

function printPlan(project: PreparedProject): void {
  console.log(`${project.description} (${project.source}): ${project.graph.size} tasks`);
  for (const group of project.breakdown.byPhase) {
    console.log(`\n  ${group.phase}`);
    for (const task of group.tasks) {
      const deps = task.dependencies.length > 0 ? task.dependencies.join(", ") : "none";
      console.log(`    ${task.id.padEnd(4)} ${task.owner.padEnd(12)} ${task.description}  (after: ${deps})`);
    }
  }
  console.log("\n  Owners:");
  for (const [owner, count] of Object.entries(project.breakdown.byOwner)) {
    console.log(`    ${owner}: ${count}`);
  }
  printWarnings(project.warnings);
}

function printWarnings(warnings: FinalReport["warnings"]): void {
  if (warnings.length === 0) return;
  console.log("\nWarnings:");
  for (const w of warnings) console.log(`  - ${w.message}`);
}

function printReport(report: FinalReport | ArchivedReport): void {
  const done = report.counts.completed;
  console.log(
    `Run ${report.runId}: ${report.outcome} (${done}/${report.totalTasks} tasks, ` +
      `${report.completionPercentage.toFixed(1)}%) in ${report.iterations} passes`,
  );
  for (const task of report.tasks) {
    const retries = task.retryCount > 0 ? ` retries=${task.retryCount}` : "";
    const error = task.error ? `  ${task.error}` : "";
    console.log(`  [${task.status}] ${task.taskId} ${task.owner} (${task.phase})${retries}${error}`);
  }
  if (report.usage && report.usage.totals.totalTokens > 0) {
    const { inputTokens, outputTokens, totalTokens } = report.usage.totals;
    console.log(`\nUsage: ${totalTokens} tokens (${inputTokens} in, ${outputTokens} out)`);
    for (const [owner, u] of Object.entries(report.usage.byOwner)) {
      console.log(`  ${owner}: ${u.totalTokens}`);
    }
  }
  printWarnings(report.warnings);
}

// --- templates ---
program
  .command("templates")
  .description("List the built-in project templates")
  .action(() => {
    for (const t of listTemplates()) {
      console.log(`${t.name.padEnd(20)} ${String(t.taskCount).padStart(3)} tasks  ${t.description}`);
    }
  });

// --- plan ---
withSourceOptions(program.command("plan"))
  .description("Build the task graph and show it without running anything")
  .action(async (projectType: string | undefined, opts: SourceOptions) => {
    const orch = new Orchestrator();
    const project = await orch.prepare(toRequest(projectType, opts));
    printPlan(project);
  });

// --- run ---
withSourceOptions(program.command("run"))
  .description("Build the task graph and run it with a simulated crew")
  .option("--fail <owners...>", "Owners whose tasks always fail")
  .option("--delay <ms>", "Simulated work time per task", parseInteger)
  .option("--timeout <ms>", "Per-task deadline", parseInteger)
  .option("--retries <n>", "Retries per task", parseInteger)
  .option("--max-iterations <n>", "Ceiling on scheduling passes", parseInteger)
  .option("--concurrency <n>", "Tasks dispatched per pass", parseInteger)
  .option("--db <path>", "Report archive location")
  .option("--no-archive", "Do not archive the report")
  .option("--json", "Print the report as JSON")
  .option("--verbose", "Print task activity as it happens")
  .action(async (projectType: string | undefined, opts: RunCliOptions) => {
    const store = opts.archive ? new ReportStore(opts.db) : undefined;
    try {
      const orch = new Orchestrator({ store });
      const project = await orch.prepare(toRequest(projectType, opts));

      const owners = project.graph.list().map((t) => t.owner);
      for (const worker of createSimulatedCrew(owners, { delayMs: opts.delay, failOwners: opts.fail })) {
        orch.addAgent(worker);
      }

      const activity = new ActivityRecorder();
      if (opts.verbose) {
        activity.subscribe((e) => {
          const who = e.taskId ? `[${e.taskId} ${e.owner ?? ""}] ` : "";
          console.error(`${e.type.padEnd(14)} ${who}${e.message}`);
        });
      }

      // Ctrl+C stops dispatching; the tasks already running finish first.
      const controller = new AbortController();
      const onSigint = () => controller.abort();
      process.once("SIGINT", onSigint);

      let report: FinalReport;
      try {
        report = await orch.run(project, {
          perTaskTimeoutMs: opts.timeout,
          maxRetries: opts.retries,
          maxTotalIterations: opts.maxIterations,
          maxConcurrency: opts.concurrency,
          signal: controller.signal,
          callbacks: activity,
        });
      } finally {
        process.removeListener("SIGINT", onSigint);
      }

      if (opts.json) console.log(JSON.stringify(report, null, 2));
      else printReport(report);
      if (report.outcome !== "completed") process.exitCode = 1;
    } finally {
      store?.close();
    }
  });

// --- history ---
const history = program
  .command("history")
  .description("List archived run reports")
  .option("--db <path>", "Report archive location")
  .option("--limit <n>", "How many reports to list", parseInteger, 20)
  .action((opts: { db?: string; limit: number }) => {
    const store = new ReportStore(opts.db);
    try {
      const reports = store.list(opts.limit);
      if (reports.length === 0) {
        console.log("No archived runs.");
        return;
      }
      for (const r of reports) {
        const when = new Date(r.startedAt).toISOString();
        console.log(`${r.runId}  ${when}  ${r.outcome.padEnd(9)}  ${r.counts.completed}/${r.totalTasks}  ${r.project}`);
      }
    } finally {
      store.close();
    }
  });

history
  .command("show")
  .description("Show one archived report")
  .argument("<runId>", "Run id")
  .option("--db <path>", "Report archive location")
  .option("--json", "Print as JSON")
  .action((runId: string, opts: { db?: string; json?: boolean }) => {
    const store = new ReportStore(opts.db);
    try {
      const report = store.get(runId);
      if (!report) {
        console.error(`No archived run "${runId}"`);
        process.exitCode = 1;
        return;
      }
      if (opts.json) console.log(JSON.stringify(report, null, 2));
      else printReport(report);
    } finally {
      store.close();
    }
  });

history
  .command("clear")
  .description("Delete archived reports")
  .option("--db <path>", "Report archive location")
  .option("--older-than <days>", "Only reports started more than this many days ago", parseInteger)
  .action((opts: { db?: string; olderThan?: number }) => {
    const store = new ReportStore(opts.db);
    try {
      const deleted =
        opts.olderThan === undefined
          ? store.deleteAll()
          : store.deleteOlderThan(Date.now() - opts.olderThan * 24 * 60 * 60 * 1000);
      console.log(`Deleted ${deleted} report(s).`);
    } finally {
      store.close();
    }
  });

void (async () => {
  try {
    await program.parseAsync();
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  }
})();
