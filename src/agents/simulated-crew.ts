import { FunctionAdapter } from "./function-adapter.js";

export type SimulatedCrewOptions = {
  /** Simulated working time per task. */
  delayMs?: number;
  /** Owners whose every task fails. */
  failOwners?: string[];
};

function pause(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new Error("aborted"));
      return;
    }
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error("aborted"));
    };
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * One stand-in worker per owner. Each reports a canned completion after
 * `delayMs`, or fails when its owner is listed in `failOwners`.
 */
export function createSimulatedCrew(owners: Iterable<string>, opts?: SimulatedCrewOptions): FunctionAdapter[] {
  const delayMs = opts?.delayMs ?? 0;
  const failing = new Set(opts?.failOwners ?? []);

  return [...new Set(owners)].map(
    (owner) =>
      new FunctionAdapter({
        name: owner,
        description: `Simulated ${owner}`,
        capabilities: [owner],
        fn: async (description, ctx) => {
          if (ctx.materials?.length) ctx.emit(`Gathering materials: ${ctx.materials.join(", ")}`);
          if (delayMs > 0) await pause(delayMs, ctx.signal);
          if (failing.has(owner)) {
            throw new Error(`${owner} could not complete task ${ctx.id}`);
          }
          return `${owner} completed task ${ctx.id}: ${description}`;
        },
      }),
  );
}
