import { describe, expect, it } from "vitest";
import { ValidationError } from "../src/errors.js";
import { buildTaskGraph, isAcyclic, topologicalOrder } from "../src/planner/builder.js";
import { TaskGraph } from "../src/planner/task-graph.js";
import type { RawTask } from "../src/planner/types.js";
import { randomTasks, seeded } from "./helpers/random-graph.js";

const raw = (id: string | number, dependencies: Array<string | number> = []): RawTask => ({
  id,
  owner: "crew",
  description: `task ${id}`,
  dependencies,
});

describe("buildTaskGraph", () => {
  it("builds a clean graph without warnings", () => {
    const { graph, warnings } = buildTaskGraph([raw("a"), raw("b", ["a"]), raw("c", ["a", "b"])]);
    expect(warnings).toEqual([]);
    expect(graph.size).toBe(3);
    expect(graph.get("c")?.dependencies).toEqual(["a", "b"]);
    expect(graph.list().every((t) => t.status === "pending")).toBe(true);
  });

  it("normalises numeric ids to strings", () => {
    const { graph } = buildTaskGraph([raw(1), raw(2, [1])]);
    expect(graph.get("2")?.dependencies).toEqual(["1"]);
  });

  it("copies optional fields and defaults the phase", () => {
    const { graph } = buildTaskGraph([
      { ...raw("a"), phase: "framing", materials: ["nails"], requirements: { count: 4 } },
      raw("b"),
    ]);
    expect(graph.task("a")).toMatchObject({
      owner: "crew",
      description: "task a",
      phase: "framing",
      materials: ["nails"],
      requirements: { count: 4 },
    });
    expect(graph.task("b").phase).toBe("construction");
  });

  it("drops dangling dependencies with a warning", () => {
    const { graph, warnings } = buildTaskGraph([raw("a", ["ghost"])]);
    expect(graph.task("a").dependencies).toEqual([]);
    expect(warnings).toEqual([
      {
        kind: "dangling_dependency",
        taskId: "a",
        dependencyId: "ghost",
        message: 'Task "a" depends on unknown task "ghost"; dependency removed',
      },
    ]);
  });

  it("drops repeated dependencies with a warning", () => {
    const { graph, warnings } = buildTaskGraph([raw("a"), raw("b", ["a", "a"])]);
    expect(graph.task("b").dependencies).toEqual(["a"]);
    expect(warnings.map((w) => w.message)).toEqual([
      'Task "b" lists dependency "a" more than once; duplicate removed',
    ]);
  });

  it("treats 1 and \"1\" as the same dependency", () => {
    const { graph, warnings } = buildTaskGraph([raw("1"), raw("2", [1, "1"])]);
    expect(graph.task("2").dependencies).toEqual(["1"]);
    expect(warnings.map((w) => w.kind)).toEqual(["duplicate_dependency"]);
  });

  it("breaks a two-task cycle by removing the back edge", () => {
    const { graph, warnings } = buildTaskGraph([raw("A", ["B"]), raw("B", ["A"])]);

    expect(graph.task("A").dependencies).toEqual(["B"]);
    expect(graph.task("B").dependencies).toEqual([]);
    expect(warnings).toEqual([
      {
        kind: "cycle_edge",
        taskId: "B",
        dependencyId: "A",
        message: 'Removed dependency of "B" on "A" to break a cycle',
      },
    ]);
    expect(isAcyclic(graph)).toBe(true);
  });

  it("removes self-dependencies", () => {
    const { graph, warnings } = buildTaskGraph([raw("A", ["A"])]);
    expect(graph.task("A").dependencies).toEqual([]);
    expect(warnings.map((w) => w.message)).toEqual(['Removed dependency of "A" on "A" to break a cycle']);
  });

  it("breaks a longer cycle at the edge that closes it", () => {
    const { graph, warnings } = buildTaskGraph([raw("a", ["b"]), raw("b", ["c"]), raw("c", ["a"])]);
    expect(graph.task("a").dependencies).toEqual(["b"]);
    expect(graph.task("b").dependencies).toEqual(["c"]);
    expect(graph.task("c").dependencies).toEqual([]);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatchObject({ taskId: "c", dependencyId: "a" });
  });

  it("never drops tasks", () => {
    const input = [raw("a", ["b", "ghost"]), raw("b", ["a", "a"]), raw("c", ["c"])];
    expect(buildTaskGraph(input).graph.size).toBe(3);
  });

  it("rejects duplicate task ids", () => {
    expect(() => buildTaskGraph([raw("a"), raw("a")])).toThrow(ValidationError);
    expect(() => buildTaskGraph([raw(1), raw("1")])).toThrow('Duplicate task id "1"');
  });

  it("accepts an empty list", () => {
    const { graph, warnings } = buildTaskGraph([]);
    expect(graph.size).toBe(0);
    expect(warnings).toEqual([]);
  });
});

describe("isAcyclic", () => {
  it("detects a cycle in a hand-built graph", () => {
    const graph = new TaskGraph([
      { id: "a", dependencies: ["b"] },
      { id: "b", dependencies: ["a"] },
    ]);
    expect(isAcyclic(graph)).toBe(false);
  });

  it("accepts a diamond", () => {
    const { graph } = buildTaskGraph([raw("a"), raw("b", ["a"]), raw("c", ["a"]), raw("d", ["b", "c"])]);
    expect(isAcyclic(graph)).toBe(true);
  });
});

describe("topologicalOrder", () => {
  it("puts dependencies first", () => {
    const { graph } = buildTaskGraph([raw("c", ["a", "b"]), raw("a"), raw("b", ["a"])]);
    expect(topologicalOrder(graph)).toEqual(["a", "b", "c"]);
  });
});

describe("buildTaskGraph on generated task lists", () => {
  it("always returns an acyclic graph with only known edges", () => {
    const rand = seeded(20241018);
    for (let round = 0; round < 200; round++) {
      const tasks = randomTasks(rand);
      const { graph } = buildTaskGraph(tasks);

      expect(graph.size, `round ${round}`).toBe(tasks.length);
      expect(isAcyclic(graph), `round ${round}`).toBe(true);
      for (const task of graph.list()) {
        expect(task.dependencies.every((d) => graph.has(d) && d !== task.id), `round ${round}`).toBe(true);
        expect(new Set(task.dependencies).size, `round ${round}`).toBe(task.dependencies.length);
      }
      expect(topologicalOrder(graph)).toHaveLength(tasks.length);
    }
  });
});
