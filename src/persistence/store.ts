import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { getConfig } from "../config.js";
import {
  parseJsonOrThrow,
  parseOrThrow,
  ReportRowSchema,
  ReportTaskSchema,
  StatusCountsSchema,
  UsageSummarySchema,
  WarningSchema,
} from "../schemas.js";
import type { FinalReport } from "../scheduler/types.js";

/** A finished run as kept in the archive. */
export type ArchivedReport = Pick<
  FinalReport,
  | "runId"
  | "outcome"
  | "totalTasks"
  | "completionPercentage"
  | "counts"
  | "tasks"
  | "warnings"
  | "iterations"
  | "startedAt"
  | "finishedAt"
> & {
  project: string;
  usage?: FinalReport["usage"];
};

/** Archive of finished run reports. Live run state is never written here. */
export class ReportStore {
  private db: Database.Database;

  /** `":memory:"` gives a throwaway database. */
  constructor(dbPath?: string) {
    const path = dbPath ?? getConfig().persistence.dbPath;
    if (path !== ":memory:") {
      mkdirSync(dirname(path), { recursive: true });
    }
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS reports (
        run_id                TEXT PRIMARY KEY,
        project               TEXT NOT NULL,
        outcome               TEXT NOT NULL,
        total_tasks           INTEGER NOT NULL,
        completion_percentage REAL NOT NULL,
        counts                TEXT NOT NULL,
        tasks                 TEXT NOT NULL DEFAULT '[]',
        warnings              TEXT NOT NULL DEFAULT '[]',
        usage                 TEXT,
        iterations            INTEGER NOT NULL,
        started_at            INTEGER NOT NULL,
        finished_at           INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_reports_started ON reports(started_at DESC);
    `);
  }

  insert(report: FinalReport, project: string): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO reports (
        run_id, project, outcome, total_tasks, completion_percentage,
        counts, tasks, warnings, usage, iterations, started_at, finished_at
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      report.runId,
      project,
      report.outcome,
      report.totalTasks,
      report.completionPercentage,
      JSON.stringify(report.counts),
      JSON.stringify(report.tasks),
      JSON.stringify(report.warnings),
      JSON.stringify(report.usage),
      report.iterations,
      report.startedAt,
      report.finishedAt,
    );
  }

  get(runId: string): ArchivedReport | undefined {
    const row = this.db.prepare("SELECT * FROM reports WHERE run_id = ?").get(runId);
    return row === undefined ? undefined : rowToReport(row);
  }

  /** Newest first. */
  list(limit = 50): ArchivedReport[] {
    const rows = this.db.prepare("SELECT * FROM reports ORDER BY started_at DESC LIMIT ?").all(limit);
    return rows.map(rowToReport);
  }

  /** Returns true if a report was deleted. */
  delete(runId: string): boolean {
    const result = this.db.prepare("DELETE FROM reports WHERE run_id = ?").run(runId);
    return result.changes > 0;
  }

  /** Returns the number of reports deleted. */
  deleteAll(): number {
    return this.db.prepare("DELETE FROM reports").run().changes;
  }

  deleteOlderThan(timestamp: number): number {
    return this.db.prepare("DELETE FROM reports WHERE started_at < ?").run(timestamp).changes;
  }

  close(): void {
    this.db.close();
  }
}

function rowToReport(raw: unknown): ArchivedReport {
  const row = parseOrThrow(ReportRowSchema, raw, "archived report");
  return {
    runId: row.run_id,
    project: row.project,
    outcome: row.outcome,
    totalTasks: row.total_tasks,
    completionPercentage: row.completion_percentage,
    counts: parseJsonOrThrow(StatusCountsSchema, row.counts, "archived counts"),
    tasks: parseJsonOrThrow(z.array(ReportTaskSchema), row.tasks, "archived tasks"),
    warnings: parseJsonOrThrow(z.array(WarningSchema), row.warnings, "archived warnings"),
    usage: row.usage === null ? undefined : parseJsonOrThrow(UsageSummarySchema, row.usage, "archived usage"),
    iterations: row.iterations,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
  };
}
