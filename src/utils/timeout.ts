export class TimeoutExpired extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`);
    this.name = "TimeoutExpired";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Race `promise` against a deadline. On expiry `onTimeout` runs and the
 * returned promise rejects with TimeoutExpired; `promise` itself is not
 * cancelled and may still settle later.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout?: () => void,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      onTimeout?.();
      reject(new TimeoutExpired(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
