import { ValidationError } from "../errors.js";
import { log } from "../utils/logger.js";
import { DEFAULT_PHASE, TaskGraph, type TaskInit } from "./task-graph.js";
import type { EngineWarning, RawTask } from "./types.js";

export type BuildResult = {
  graph: TaskGraph;
  /** Everything that was corrected on the way in. */
  warnings: EngineWarning[];
};

const logger = log.child("builder");

/** A task whose edges are still being cleaned. */
type DraftTask = Omit<TaskInit, "dependencies"> & { dependencies: string[] };

/**
 * Build a validated, acyclic task graph from an unvalidated task list.
 *
 * Dangling and duplicate dependency references are dropped and every back
 * edge found by a depth-first walk is removed, each with a warning. Tasks
 * themselves are never dropped; a duplicate task id is rejected outright.
 */
export function buildTaskGraph(rawTasks: RawTask[]): BuildResult {
  const warnings: EngineWarning[] = [];
  const index = new Map<string, DraftTask>();
  const pairs: Array<[RawTask, DraftTask]> = [];

  for (const raw of rawTasks) {
    const id = String(raw.id);
    if (index.has(id)) {
      throw new ValidationError("DUPLICATE_TASK_ID", `Duplicate task id "${id}"`);
    }
    const init: DraftTask = {
      id,
      owner: raw.owner,
      description: raw.description,
      phase: raw.phase ?? DEFAULT_PHASE,
      dependencies: [],
      requirements: raw.requirements,
      materials: raw.materials,
    };
    index.set(id, init);
    pairs.push([raw, init]);
  }

  for (const [raw, init] of pairs) {
    const seen = new Set<string>();
    for (const rawDep of raw.dependencies ?? []) {
      const dep = String(rawDep);
      if (seen.has(dep)) {
        warnings.push({
          kind: "duplicate_dependency",
          taskId: init.id,
          dependencyId: dep,
          message: `Task "${init.id}" lists dependency "${dep}" more than once; duplicate removed`,
        });
        continue;
      }
      seen.add(dep);
      if (!index.has(dep)) {
        warnings.push({
          kind: "dangling_dependency",
          taskId: init.id,
          dependencyId: dep,
          message: `Task "${init.id}" depends on unknown task "${dep}"; dependency removed`,
        });
        continue;
      }
      init.dependencies.push(dep);
    }
  }

  breakCycles(index, warnings);

  for (const w of warnings) {
    logger.warn(w.message, { kind: w.kind });
  }

  return { graph: new TaskGraph([...index.values()]), warnings };
}

/**
 * DFS with coloring over task → dependency edges, in input order. An edge into
 * a GRAY node (still on the stack, including the node itself) is a back edge
 * and is removed; what remains is acyclic.
 */
function breakCycles(tasks: Map<string, DraftTask>, warnings: EngineWarning[]): void {
  const WHITE = 0, GRAY = 1, BLACK = 2;
  const color = new Map<string, number>();

  function dfs(task: DraftTask): void {
    color.set(task.id, GRAY);
    const kept: string[] = [];
    for (const dep of task.dependencies) {
      const c = color.get(dep) ?? WHITE;
      if (c === GRAY) {
        warnings.push({
          kind: "cycle_edge",
          taskId: task.id,
          dependencyId: dep,
          message: `Removed dependency of "${task.id}" on "${dep}" to break a cycle`,
        });
        continue;
      }
      kept.push(dep);
      const next = tasks.get(dep);
      if (c === WHITE && next) dfs(next);
    }
    task.dependencies = kept;
    color.set(task.id, BLACK);
  }

  for (const task of tasks.values()) {
    if ((color.get(task.id) ?? WHITE) === WHITE) dfs(task);
  }
}

/** True when the graph's dependency relation has no cycle. */
export function isAcyclic(graph: TaskGraph): boolean {
  const WHITE = 0, GRAY = 1, BLACK = 2;
  const color = new Map<string, number>();

  function dfs(id: string): boolean {
    color.set(id, GRAY);
    for (const dep of graph.get(id)?.dependencies ?? []) {
      const c = color.get(dep) ?? WHITE;
      if (c === GRAY) return false;
      if (c === WHITE && !dfs(dep)) return false;
    }
    color.set(id, BLACK);
    return true;
  }

  return graph.list().every((t) => (color.get(t.id) ?? WHITE) !== WHITE || dfs(t.id));
}

/** Tasks in dependency order (dependencies first). Assumes an acyclic graph. */
export function topologicalOrder(graph: TaskGraph): string[] {
  const visited = new Set<string>();
  const sorted: string[] = [];

  function visit(id: string): void {
    if (visited.has(id)) return;
    visited.add(id);
    for (const dep of graph.get(id)?.dependencies ?? []) {
      visit(dep);
    }
    sorted.push(id);
  }

  for (const task of graph.list()) {
    visit(task.id);
  }
  return sorted;
}
