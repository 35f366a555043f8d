import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ReportStore } from "../src/persistence/store.js";
import type { FinalReport } from "../src/scheduler/types.js";

function makeReport(runId: string, startedAt: number, extra?: Partial<FinalReport>): FinalReport {
  return {
    runId,
    outcome: "partial",
    stalled: false,
    cancelled: false,
    totalTasks: 2,
    counts: { pending: 0, ready: 0, in_progress: 0, completed: 1, failed: 1, blocked: 0, cancelled: 0 },
    completionPercentage: 50,
    tasks: [
      { taskId: "1", owner: "Mason", phase: "foundation", status: "completed", retryCount: 0, output: "poured" },
      { taskId: "2", owner: "Roofer", phase: "framing", status: "failed", retryCount: 2, error: "rain" },
    ],
    warnings: [
      { kind: "dangling_dependency", taskId: "2", dependencyId: "9", message: "dangling" },
    ],
    usage: {
      totals: { inputTokens: 30, outputTokens: 12, totalTokens: 42 },
      byTask: { "1": { inputTokens: 30, outputTokens: 12, totalTokens: 42 } },
      byOwner: { Mason: { inputTokens: 30, outputTokens: 12, totalTokens: 42 } },
    },
    iterations: 4,
    startedAt,
    finishedAt: startedAt + 100,
    durationMs: 100,
    ...extra,
  };
}

describe("ReportStore", () => {
  let store: ReportStore;

  beforeEach(() => {
    store = new ReportStore(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  it("stores and reads back a report", () => {
    store.insert(makeReport("run-1", 1_000), "Garden shed");

    expect(store.get("run-1")).toEqual({
      runId: "run-1",
      project: "Garden shed",
      outcome: "partial",
      totalTasks: 2,
      completionPercentage: 50,
      counts: { pending: 0, ready: 0, in_progress: 0, completed: 1, failed: 1, blocked: 0, cancelled: 0 },
      tasks: [
        { taskId: "1", owner: "Mason", phase: "foundation", status: "completed", retryCount: 0, output: "poured" },
        { taskId: "2", owner: "Roofer", phase: "framing", status: "failed", retryCount: 2, error: "rain" },
      ],
      warnings: [{ kind: "dangling_dependency", taskId: "2", dependencyId: "9", message: "dangling" }],
      usage: {
        totals: { inputTokens: 30, outputTokens: 12, totalTokens: 42 },
        byTask: { "1": { inputTokens: 30, outputTokens: 12, totalTokens: 42 } },
        byOwner: { Mason: { inputTokens: 30, outputTokens: 12, totalTokens: 42 } },
      },
      iterations: 4,
      startedAt: 1_000,
      finishedAt: 1_100,
    });
  });

  it("returns undefined for an unknown run", () => {
    expect(store.get("nope")).toBeUndefined();
  });

  it("lists newest first up to the limit", () => {
    store.insert(makeReport("old", 1_000), "a");
    store.insert(makeReport("new", 3_000), "b");
    store.insert(makeReport("mid", 2_000), "c");

    expect(store.list().map((r) => r.runId)).toEqual(["new", "mid", "old"]);
    expect(store.list(2).map((r) => r.runId)).toEqual(["new", "mid"]);
  });

  it("replaces a report with the same run id", () => {
    store.insert(makeReport("run-1", 1_000), "first");
    store.insert(makeReport("run-1", 1_000, { outcome: "completed" }), "second");

    expect(store.list()).toHaveLength(1);
    expect(store.get("run-1")).toMatchObject({ project: "second", outcome: "completed" });
  });

  it("deletes a single report", () => {
    store.insert(makeReport("run-1", 1_000), "a");
    expect(store.delete("run-1")).toBe(true);
    expect(store.delete("run-1")).toBe(false);
    expect(store.get("run-1")).toBeUndefined();
  });

  it("deletes everything", () => {
    store.insert(makeReport("a", 1_000), "a");
    store.insert(makeReport("b", 2_000), "b");
    expect(store.deleteAll()).toBe(2);
    expect(store.list()).toEqual([]);
  });

  it("deletes reports started before a timestamp", () => {
    store.insert(makeReport("a", 1_000), "a");
    store.insert(makeReport("b", 2_000), "b");
    store.insert(makeReport("c", 3_000), "c");

    expect(store.deleteOlderThan(2_500)).toBe(2);
    expect(store.list().map((r) => r.runId)).toEqual(["c"]);
  });
});
