import { z } from "zod";
import { ValidationError } from "./errors.js";
import { TASK_STATUSES, type RawTask } from "./planner/types.js";

const TaskIdSchema = z.union([z.string().min(1, "task id must not be empty"), z.number().int()]);

export const RawTaskSchema: z.ZodType<RawTask> = z.object({
  id: TaskIdSchema,
  owner: z.string().min(1, "owner must not be empty"),
  description: z.string(),
  phase: z.string().min(1).optional(),
  dependencies: z.array(TaskIdSchema).optional(),
  requirements: z.record(z.unknown()).optional(),
  materials: z.array(z.string()).optional(),
});

export const RawTaskListSchema = z.array(RawTaskSchema);

export const PlannerResponseSchema = z.object({
  tasks: z.array(RawTaskSchema).min(1, "planner returned no tasks"),
});

export const ShedParamsSchema = z.object({
  hasFoundation: z.boolean().optional(),
  hasElectrical: z.boolean().optional(),
  dimensions: z
    .object({
      width: z.number().positive(),
      length: z.number().positive(),
      height: z.number().positive().optional(),
    })
    .optional(),
});

export type ShedParams = z.infer<typeof ShedParamsSchema>;

export const ProjectRequestSchema = z.object({
  description: z.string().min(1, "description is required"),
  projectType: z.string().min(1).optional(),
  parameters: z.record(z.unknown()).optional(),
  tasks: RawTaskListSchema.optional(),
});

export type ProjectRequest = z.infer<typeof ProjectRequestSchema>;

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

export const ConfigOverridesSchema = z.object({
  scheduler: z
    .object({
      perTaskTimeoutMs: z.number().int().positive(),
      maxRetries: z.number().int().nonnegative(),
      maxTotalIterations: z.number().int().positive(),
      maxConcurrency: z.number().int().positive(),
      retryBaseDelayMs: z.number().int().nonnegative(),
      retryMaxDelayMs: z.number().int().nonnegative(),
    })
    .partial()
    .optional(),
  planner: z
    .object({
      maxAttempts: z.number().int().positive(),
      baseDelayMs: z.number().int().nonnegative(),
    })
    .partial()
    .optional(),
  activity: z.object({ maxEvents: z.number().int().positive() }).partial().optional(),
  persistence: z.object({ dbPath: z.string().min(1) }).partial().optional(),
  logging: z.object({ level: LogLevelSchema }).partial().optional(),
});

export type ConfigOverrides = z.infer<typeof ConfigOverridesSchema>;

const StatusSchema = z.enum(TASK_STATUSES);

export const ReportTaskSchema = z.object({
  taskId: z.string(),
  owner: z.string(),
  phase: z.string(),
  status: StatusSchema,
  retryCount: z.number(),
  error: z.string().optional(),
  output: z.string().optional(),
});

export const StatusCountsSchema = z.object({
  pending: z.number(),
  ready: z.number(),
  in_progress: z.number(),
  completed: z.number(),
  failed: z.number(),
  blocked: z.number(),
  cancelled: z.number(),
});

export const WarningSchema = z.object({
  kind: z.enum(["dangling_dependency", "duplicate_dependency", "cycle_edge", "deadlock_break"]),
  taskId: z.string(),
  dependencyId: z.string().optional(),
  message: z.string(),
});

const TokenCountsSchema = z.object({
  inputTokens: z.number(),
  outputTokens: z.number(),
  totalTokens: z.number(),
});

export const UsageSummarySchema = z.object({
  totals: TokenCountsSchema,
  byTask: z.record(TokenCountsSchema),
  byOwner: z.record(TokenCountsSchema),
});

export const ReportRowSchema = z.object({
  run_id: z.string(),
  project: z.string(),
  outcome: z.enum(["completed", "partial", "stalled", "cancelled"]),
  total_tasks: z.number(),
  completion_percentage: z.number(),
  counts: z.string(),
  tasks: z.string(),
  warnings: z.string(),
  usage: z.string().nullable(),
  iterations: z.number(),
  started_at: z.number(),
  finished_at: z.number(),
});

/** Parse `value` with `schema`, mapping zod issues to a ValidationError. */
export function parseOrThrow<T>(schema: z.ZodType<T>, value: unknown, label = "input"): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const msg = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ValidationError("VALIDATION_FAILED", `Invalid ${label}: ${msg}`);
  }
  return result.data;
}

/** JSON.parse followed by schema validation. */
export function parseJsonOrThrow<T>(schema: z.ZodType<T>, raw: string, label = "input"): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ValidationError("VALIDATION_FAILED", `Invalid ${label}: not valid JSON`, { cause: err });
  }
  return parseOrThrow(schema, parsed, label);
}
