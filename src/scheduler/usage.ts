import { z } from "zod";
import { log } from "../utils/logger.js";

export type TokenUsage = {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
};

export type UsageSummary = {
  totals: TokenUsage;
  byTask: Record<string, TokenUsage>;
  byOwner: Record<string, TokenUsage>;
};

/** What a worker may report under `TaskResult.metadata.usage`. */
export const TokenUsageSchema = z.object({
  inputTokens: z.number().nonnegative().optional(),
  outputTokens: z.number().nonnegative().optional(),
  totalTokens: z.number().nonnegative().optional(),
});

const logger = log.child("usage");

const zero = (): TokenUsage => ({ inputTokens: 0, outputTokens: 0, totalTokens: 0 });

function add(into: TokenUsage, u: TokenUsage): void {
  into.inputTokens += u.inputTokens;
  into.outputTokens += u.outputTokens;
  into.totalTokens += u.totalTokens;
}

/**
 * Sums the usage workers report, per task, per owner and overall. Every
 * attempt counts, failed ones included.
 */
export class UsageTracker {
  private totals = zero();
  private byTask = new Map<string, TokenUsage>();
  private byOwner = new Map<string, TokenUsage>();

  /** Record `metadata.usage` if present. Malformed usage is logged and skipped. */
  record(taskId: string, owner: string, metadata?: Record<string, unknown>): void {
    const raw = metadata?.usage;
    if (raw === undefined) return;

    const parsed = TokenUsageSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn(`Ignoring malformed usage from task "${taskId}"`, { owner });
      return;
    }

    const inputTokens = parsed.data.inputTokens ?? 0;
    const outputTokens = parsed.data.outputTokens ?? 0;
    const usage: TokenUsage = {
      inputTokens,
      outputTokens,
      totalTokens: parsed.data.totalTokens ?? inputTokens + outputTokens,
    };
    if (usage.totalTokens === 0 && inputTokens === 0 && outputTokens === 0) return;

    add(this.totals, usage);
    const task = this.byTask.get(taskId) ?? zero();
    add(task, usage);
    this.byTask.set(taskId, task);
    const perOwner = this.byOwner.get(owner) ?? zero();
    add(perOwner, usage);
    this.byOwner.set(owner, perOwner);

    logger.debug(`Usage recorded for task "${taskId}"`, { owner, ...usage });
  }

  summary(): UsageSummary {
    return {
      totals: { ...this.totals },
      byTask: Object.fromEntries([...this.byTask].map(([id, u]) => [id, { ...u }])),
      byOwner: Object.fromEntries([...this.byOwner].map(([owner, u]) => [owner, { ...u }])),
    };
  }
}
