export type RetryOptions = {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Called before each wait with the attempt that just failed. */
  onRetry?: (attempt: number, err: unknown) => void;
};

const DEFAULTS = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
};

/** Exponential backoff for the wait after `attempt` (1-based) failed. */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  if (baseDelayMs <= 0 || attempt < 1) return 0;
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts?: RetryOptions,
): Promise<T> {
  const maxAttempts = opts?.maxAttempts ?? DEFAULTS.maxAttempts;
  const baseDelayMs = opts?.baseDelayMs ?? DEFAULTS.baseDelayMs;
  const maxDelayMs = opts?.maxDelayMs ?? DEFAULTS.maxDelayMs;

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (attempt === maxAttempts) break;
      opts?.onRetry?.(attempt, err);
      const delay = backoffDelay(attempt, baseDelayMs, maxDelayMs);
      if (delay > 0) await sleep(delay);
    }
  }
  throw lastError;
}
