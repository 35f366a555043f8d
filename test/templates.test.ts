import { describe, expect, it } from "vitest";
import { ValidationError } from "../src/errors.js";
import { buildTaskGraph } from "../src/planner/builder.js";
import { TaskGraph } from "../src/planner/task-graph.js";
import { listTemplates, projectTasks, shedTasks, taskBreakdown } from "../src/planner/templates.js";

describe("listTemplates", () => {
  it("lists the fixed templates and the shed", () => {
    expect(listTemplates().map((t) => [t.name, t.taskCount])).toEqual([
      ["kitchen_remodel", 11],
      ["bathroom_remodel", 11],
      ["new_construction", 15],
      ["addition", 12],
      ["shed_construction", 9],
    ]);
  });
});

describe("projectTasks", () => {
  it("returns the kitchen remodel tasks", () => {
    const tasks = projectTasks("kitchen_remodel");
    expect(tasks).toHaveLength(11);
    expect(tasks[0]).toEqual({
      id: "1",
      owner: "Architect",
      description: "Design kitchen layout",
      dependencies: [],
      phase: "planning",
    });
    expect(tasks[10]).toMatchObject({ description: "Final inspection", dependencies: ["8", "9", "10"] });
  });

  it("returns fresh objects on every call", () => {
    const first = projectTasks("addition");
    first[0].description = "changed";
    expect(projectTasks("addition")[0].description).toBe("Design addition plans");
  });

  it("rejects unknown project types", () => {
    expect(() => projectTasks("igloo")).toThrow(ValidationError);
    expect(() => projectTasks("igloo")).toThrow('Unknown project type "igloo"');
  });

  it("builds every template into a clean graph", () => {
    for (const { name } of listTemplates()) {
      const { graph, warnings } = buildTaskGraph(projectTasks(name));
      expect(warnings, name).toEqual([]);
      expect(graph.size, name).toBeGreaterThan(0);
    }
  });

  it("passes parameters to the shed template", () => {
    expect(projectTasks("shed_construction", { hasElectrical: true })).toHaveLength(10);
  });

  it("validates shed parameters", () => {
    expect(() => projectTasks("shed_construction", { dimensions: { width: -1, length: 12 } })).toThrow(
      "Invalid shed parameters: dimensions.width",
    );
  });
});

describe("shedTasks", () => {
  it("uses a foundation and no electrical work by default", () => {
    const tasks = shedTasks({});
    expect(tasks.map((t) => t.id)).toEqual(["1", "2", "3", "4", "5", "6", "7", "8", "9"]);
    expect(tasks[0].description).toBe("Design shed plans (10x12 ft)");
    expect(tasks[1]).toMatchObject({ owner: "Mason", dependencies: ["1"], requirements: { area: 120 } });
    expect(tasks[2]).toMatchObject({ owner: "Carpenter", dependencies: ["2"] });
    expect(tasks[5]).toMatchObject({ description: "Install exterior siding", dependencies: ["5"] });
    expect(tasks.some((t) => t.owner === "Electrician")).toBe(false);
  });

  it("frames straight after design without a foundation", () => {
    const tasks = shedTasks({ hasFoundation: false });
    expect(tasks).toHaveLength(8);
    expect(tasks[1]).toMatchObject({ owner: "Carpenter", dependencies: ["1"] });
  });

  it("adds electrical work before the siding", () => {
    const tasks = shedTasks({ hasElectrical: true });
    expect(tasks[5]).toMatchObject({ id: "6", owner: "Electrician", dependencies: ["3"] });
    expect(tasks[6]).toMatchObject({ id: "7", description: "Install exterior siding", dependencies: ["5", "6"] });
  });

  it("sizes work from the dimensions", () => {
    const tasks = shedTasks({ dimensions: { width: 8, length: 10 } });
    expect(tasks[0].description).toBe("Design shed plans (8x10 ft)");
    expect(tasks[1].requirements).toEqual({ area: 80 });
    expect(tasks[4].requirements).toEqual({ area: 104 });
    expect(tasks[5].requirements).toEqual({ area: 288 });
  });
});

describe("taskBreakdown", () => {
  it("groups by phase in construction order and counts owners", () => {
    const { graph } = buildTaskGraph(projectTasks("kitchen_remodel"));
    const breakdown = taskBreakdown(graph.list());

    expect(breakdown.byPhase.map((g) => [g.phase, g.tasks.length])).toEqual([
      ["planning", 1],
      ["permitting", 1],
      ["demolition", 1],
      ["rough_in", 2],
      ["inspection", 1],
      ["finishing", 4],
      ["final_inspection", 1],
    ]);
    expect(breakdown.byOwner).toEqual({
      Architect: 1,
      Permitting: 3,
      Carpenter: 2,
      Plumber: 2,
      Electrician: 2,
      Painter: 1,
    });
  });

  it("puts unknown phases last in first-seen order", () => {
    const graph = new TaskGraph([
      { id: "a", dependencies: [], phase: "zeta" },
      { id: "b", dependencies: [], phase: "planning" },
      { id: "c", dependencies: [], phase: "alpha" },
    ]);
    expect(taskBreakdown(graph.list()).byPhase.map((g) => g.phase)).toEqual(["planning", "zeta", "alpha"]);
  });
});
