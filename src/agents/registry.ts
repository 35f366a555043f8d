import { ValidationError } from "../errors.js";
import { log } from "../utils/logger.js";
import type { AgentAdapter } from "./adapter.js";

export type AgentHealth = {
  name: string;
  healthy: boolean;
  checkedAt: number;
  responseTimeMs?: number;
  error?: string;
};

/** Workers by name. A task's `owner` is looked up here at dispatch time. */
export class AgentRegistry {
  private agents = new Map<string, AgentAdapter>();
  private healthCache = new Map<string, AgentHealth>();

  add(agent: AgentAdapter): void {
    if (this.agents.has(agent.name)) {
      throw new ValidationError("DUPLICATE_REGISTRATION", `Agent "${agent.name}" already registered`);
    }
    this.agents.set(agent.name, agent);
  }

  remove(name: string): boolean {
    this.healthCache.delete(name);
    return this.agents.delete(name);
  }

  get(name: string): AgentAdapter | undefined {
    return this.agents.get(name);
  }

  has(name: string): boolean {
    return this.agents.has(name);
  }

  list(): AgentAdapter[] {
    return [...this.agents.values()];
  }

  names(): string[] {
    return [...this.agents.keys()];
  }

  get size(): number {
    return this.agents.size;
  }

  /** Find agents that have a specific capability. */
  withCapability(cap: string): AgentAdapter[] {
    return this.list().filter((a) => a.capabilities?.includes(cap));
  }

  /**
   * Pick an agent by name, or else the first one with a matching capability.
   * Agents whose last health check failed are passed over unless
   * `includeUnhealthy` is set; agents never checked count as healthy.
   */
  pick(nameOrCapability: string, opts?: { includeUnhealthy?: boolean }): AgentAdapter | undefined {
    const named = this.get(nameOrCapability);
    const byCapability = this.withCapability(nameOrCapability);
    const candidates = named ? [named, ...byCapability] : byCapability;
    if (opts?.includeUnhealthy) return candidates[0];
    return candidates.find((a) => this.getCachedHealth(a.name)?.healthy !== false);
  }

  async checkHealth(name: string): Promise<AgentHealth> {
    const agent = this.get(name);
    if (!agent) {
      return { name, healthy: false, checkedAt: Date.now(), error: "Agent not found" };
    }

    let result: AgentHealth;
    const start = Date.now();
    try {
      // No health check method: assume healthy
      const healthy = agent.healthCheck ? await agent.healthCheck() : true;
      result = { name, healthy, checkedAt: Date.now(), responseTimeMs: Date.now() - start };
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      log.warn(`Health check failed for agent "${name}"`, { error });
      result = { name, healthy: false, checkedAt: Date.now(), responseTimeMs: Date.now() - start, error };
    }
    this.healthCache.set(name, result);
    return result;
  }

  async checkAllHealth(): Promise<AgentHealth[]> {
    return Promise.all(this.names().map((name) => this.checkHealth(name)));
  }

  /** Last health result for `name`, without a new check. */
  getCachedHealth(name: string): AgentHealth | undefined {
    return this.healthCache.get(name);
  }
}
