import type { AgentAdapter } from "../agents/adapter.js";
import { getConfig } from "../config.js";
import { DelegateError, ParseError } from "../errors.js";
import { parseJsonOrThrow, PlannerResponseSchema } from "../schemas.js";
import { log } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";
import { PHASE_ORDER } from "./templates.js";
import type { RawTask, Task } from "./types.js";

const PLANNER_SYSTEM_PROMPT = `You are a project planner. Break the project below into tasks that form a dependency graph.

Output ONLY valid JSON matching this schema:
{
  "tasks": [
    {
      "id": "1",
      "owner": "worker-name",
      "description": "what to do",
      "phase": "one of: ${PHASE_ORDER.join(", ")}",
      "dependencies": ["id-of-prerequisite"]
    }
  ]
}

Rules:
- Every task needs a unique "id"
- "dependencies" lists the ids that must be finished before the task starts
- Independent tasks get "dependencies": [] so they can run in parallel
- Output raw JSON only, no markdown fences`;

export type PlannerOptions = {
  /** The adapter that answers planning prompts. */
  plannerAgent: AgentAdapter;
  /** Owner names the plan may assign tasks to. */
  availableOwners?: string[];
  maxAttempts?: number;
  baseDelayMs?: number;
};

const logger = log.child("planner");

/**
 * Turns a free-text project description into a raw task list by asking a
 * planning agent. The result still has to go through `buildTaskGraph`.
 */
export class Planner {
  private plannerAgent: AgentAdapter;
  private availableOwners: string[];
  private maxAttempts: number;
  private baseDelayMs: number;

  constructor(opts: PlannerOptions) {
    const defaults = getConfig().planner;
    this.plannerAgent = opts.plannerAgent;
    this.availableOwners = opts.availableOwners ?? [];
    this.maxAttempts = opts.maxAttempts ?? defaults.maxAttempts;
    this.baseDelayMs = opts.baseDelayMs ?? defaults.baseDelayMs;
  }

  async plan(description: string): Promise<RawTask[]> {
    const prompt = this.buildPrompt(description);

    const response = await withRetry(
      async (attempt) => {
        const raw = await this.callPlanner(
          attempt === 1 ? prompt : `${prompt}\n\nIMPORTANT: Respond with ONLY a JSON object, no other text.`,
          attempt,
        );
        return parseResponse(raw);
      },
      {
        maxAttempts: this.maxAttempts,
        baseDelayMs: this.baseDelayMs,
        onRetry: (attempt, err) =>
          logger.warn(`Planning attempt ${attempt} failed, retrying`, {
            error: err instanceof Error ? err.message : String(err),
          }),
      },
    );

    logger.info(`Planned ${response.tasks.length} tasks`);
    return response.tasks;
  }

  private buildPrompt(description: string): string {
    let prompt = `${PLANNER_SYSTEM_PROMPT}\n\nProject: ${description}`;
    if (this.availableOwners.length > 0) {
      prompt += `\n\nAvailable workers (use these as "owner"): ${this.availableOwners.join(", ")}`;
    }
    return prompt;
  }

  private async callPlanner(prompt: string, attempt: number): Promise<string> {
    const task: Task = {
      id: "plan",
      owner: this.plannerAgent.name,
      description: prompt,
      phase: "planning",
      dependencies: [],
      status: "in_progress",
      retryCount: attempt - 1,
    };
    const result = await this.plannerAgent.execute(task, {
      attempt,
      signal: new AbortController().signal,
      emit: (message) => logger.debug(message),
    });
    if (result.status !== "ok") {
      throw new DelegateError("plan", `Planner agent failed: ${result.output}`, {
        timedOut: result.status === "timeout",
      });
    }
    return result.output;
  }
}

/** Strip Markdown fences and validate the planner's JSON. */
export function parseResponse(raw: string): { tasks: RawTask[] } {
  const cleaned = raw.replace(/^```(?:json)?\s*\n?/m, "").replace(/\n?```\s*$/m, "").trim();
  try {
    return parseJsonOrThrow(PlannerResponseSchema, cleaned, "planner response");
  } catch (err) {
    logger.error("Failed to parse planner response", { raw: raw.slice(0, 500) });
    throw new ParseError(err instanceof Error ? err.message : String(err), { cause: err });
  }
}
