import { describe, expect, it } from "vitest";
import { FunctionAdapter } from "../src/agents/function-adapter.js";
import { DelegateError, ParseError } from "../src/errors.js";
import { parseResponse, Planner } from "../src/planner/planner.js";

const PLAN = JSON.stringify({
  tasks: [
    { id: "1", owner: "Architect", description: "Draw plans", phase: "planning", dependencies: [] },
    { id: "2", owner: "Carpenter", description: "Build deck", phase: "framing", dependencies: ["1"] },
  ],
});

function scripted(replies: string[], prompts: string[] = []): FunctionAdapter {
  let i = 0;
  return new FunctionAdapter({
    name: "planner",
    fn: async (prompt) => {
      prompts.push(prompt);
      return replies[Math.min(i++, replies.length - 1)];
    },
  });
}

describe("Planner", () => {
  it("returns the planned tasks", async () => {
    const planner = new Planner({ plannerAgent: scripted([PLAN]) });
    const tasks = await planner.plan("Build a deck");
    expect(tasks.map((t) => [t.id, t.owner, t.dependencies])).toEqual([
      ["1", "Architect", []],
      ["2", "Carpenter", ["1"]],
    ]);
  });

  it("includes the description and available owners in the prompt", async () => {
    const prompts: string[] = [];
    const planner = new Planner({
      plannerAgent: scripted([PLAN], prompts),
      availableOwners: ["Architect", "Carpenter"],
    });
    await planner.plan("Build a deck");

    expect(prompts).toHaveLength(1);
    expect(prompts[0]).toContain("Project: Build a deck");
    expect(prompts[0]).toContain('Available workers (use these as "owner"): Architect, Carpenter');
  });

  it("accepts output wrapped in Markdown fences", async () => {
    const planner = new Planner({ plannerAgent: scripted(["```json\n" + PLAN + "\n```"]) });
    expect(await planner.plan("Build a deck")).toHaveLength(2);
  });

  it("retries unparsable output with a stricter prompt", async () => {
    const prompts: string[] = [];
    const planner = new Planner({
      plannerAgent: scripted(["Sure! Here is the plan.", PLAN], prompts),
      maxAttempts: 2,
      baseDelayMs: 0,
    });

    expect(await planner.plan("Build a deck")).toHaveLength(2);
    expect(prompts).toHaveLength(2);
    expect(prompts[1]).toContain("IMPORTANT: Respond with ONLY a JSON object, no other text.");
  });

  it("gives up after maxAttempts", async () => {
    const prompts: string[] = [];
    const planner = new Planner({
      plannerAgent: scripted(["not json"], prompts),
      maxAttempts: 2,
      baseDelayMs: 0,
    });

    await expect(planner.plan("Build a deck")).rejects.toThrow(ParseError);
    expect(prompts).toHaveLength(2);
  });

  it("fails when the planner agent fails", async () => {
    const planner = new Planner({
      plannerAgent: new FunctionAdapter({
        name: "planner",
        fn: async () => {
          throw new Error("offline");
        },
      }),
      maxAttempts: 1,
    });

    const err = await planner.plan("Build a deck").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DelegateError);
    expect(err).toMatchObject({ message: "Planner agent failed: offline", code: "DELEGATE_FAILED" });
  });
});

describe("parseResponse", () => {
  it("reports invalid JSON", () => {
    expect(() => parseResponse("{oops")).toThrow("Invalid planner response: not valid JSON");
  });

  it("reports an empty task list", () => {
    expect(() => parseResponse('{"tasks": []}')).toThrow("Invalid planner response: tasks: planner returned no tasks");
  });

  it("reports malformed tasks", () => {
    expect(() => parseResponse('{"tasks": [{"id": "1", "owner": "", "description": "x"}]}')).toThrow(
      "Invalid planner response: tasks.0.owner: owner must not be empty",
    );
  });

  it("accepts numeric ids", () => {
    const { tasks } = parseResponse('{"tasks": [{"id": 1, "owner": "a", "description": "x", "dependencies": []}]}');
    expect(tasks[0].id).toBe(1);
  });
});
