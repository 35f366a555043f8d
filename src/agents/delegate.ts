import type { Delegate } from "../scheduler/types.js";
import type { AgentRegistry } from "./registry.js";

/**
 * A delegate that hands each task to the agent registered under its owner
 * (or, failing that, the first agent advertising the owner as a capability).
 * Agents that failed their last health check are skipped.
 */
export function registryDelegate(registry: AgentRegistry): Delegate {
  return async (task, ctx) => {
    const agent = registry.pick(task.owner);
    if (agent) return agent.execute(task, ctx);

    if (registry.pick(task.owner, { includeUnhealthy: true })) {
      return { status: "error", output: `No healthy agent for owner "${task.owner}"` };
    }
    return { status: "error", output: `No agent registered for owner "${task.owner}"` };
  };
}
