import type { TokenUsage } from "../core/budget-ledger.js";
import { padTaskId } from "../core/utils.js";
import type { AgentInvoker, AgentRequest, AgentResult } from "../app/orchestrator/ports.js";

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);

export const MOCK_AGENT_USAGE: TokenUsage = { input: 1200, output: 300, cache_read: 0, cache_write: 0 };

export function isMockAgentEnabled(): boolean {
  const flag = process.env.WAYPOINT_MOCK_AGENT;
  if (!flag) return false;

  return TRUE_VALUES.has(flag.trim().toLowerCase());
}

// Succeeds every phase without touching the project; for dry rehearsals of the pipeline.
export class MockAgentInvoker implements AgentInvoker {
  constructor(private readonly usage: TokenUsage = MOCK_AGENT_USAGE) {}

  async invoke(request: AgentRequest): Promise<AgentResult> {
    return {
      success: true,
      output: `mock ${request.phase} for task ${padTaskId(request.task.id)} (attempt ${request.attempt})`,
      usage: { ...this.usage },
    };
  }
}
