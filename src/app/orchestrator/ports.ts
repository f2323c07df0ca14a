/**
 * Orchestrator ports define the boundary between the run engine and adapters.
 * Purpose: make dependencies explicit and replaceable for testing.
 * Assumptions: ports stay small and map to stable runtime capabilities.
 * Usage: provide implementations in `run-context.ts` and inject into RunContext.
 */

import type { TokenUsage } from "../../core/budget-ledger.js";
import type { Phase } from "../../core/phases.js";
import type { NotifyEventName, RoadmapTask } from "../../core/roadmap-schema.js";
import type { GitPrimitives } from "../../git/git.js";

export type { GitPrimitives };

// =============================================================================
// AGENT
// =============================================================================

export type AgentContext = {
  projectDir: string;
  // Every task the invocation covers; the lead is first.
  tasks: RoadmapTask[];
  preamble?: string;
  ecosystem?: string;
  // Failure output fed to fix and static_fix invocations.
  fixLogs?: string;
};

export type AgentRequest = {
  phase: Phase;
  task: RoadmapTask;
  project: string;
  attempt: number;
  context: AgentContext;
};

export type AgentResult = {
  success: boolean;
  output: string;
  usage: TokenUsage;
};

export interface AgentInvoker {
  invoke(request: AgentRequest): Promise<AgentResult>;
}

// =============================================================================
// ECOSYSTEM COMMANDS
// =============================================================================

export type EcosystemCommandSet = {
  install?: string;
  test: string;
  lint?: string;
  coverage?: string;
};

export interface EcosystemCommands {
  // Null when the ecosystem is unknown and nothing overrides it: checks are skipped.
  resolve(ecosystem: string | undefined): Promise<EcosystemCommandSet | null>;
}

export type CommandResult = {
  exitCode: number;
  output: string;
};

export interface CommandRunner {
  run(command: string, cwd: string): Promise<CommandResult>;
}

// =============================================================================
// NOTIFY / REVIEW / DEPLOY
// =============================================================================

export type NotifyEvent = {
  event: NotifyEventName;
  project: string;
  status: string;
  task?: number;
  total_tokens: number;
  details?: Record<string, string | number | boolean | null>;
};

export interface Notifier {
  // A rejection is logged as notify.error by the caller and never fails the run.
  notify(event: NotifyEvent): Promise<void>;
}

export type ReviewRequest = {
  project: string;
  tasks: RoadmapTask[];
  diffStat: string;
};

export type ReviewDecision = {
  decision: "approve" | "reject";
  note?: string;
};

export interface ReviewGate {
  request(request: ReviewRequest): Promise<ReviewDecision>;
}

export type DeployRequest = {
  script: string;
  cwd: string;
  env: Record<string, string>;
};

export interface DeployRunner {
  run(request: DeployRequest): Promise<{ exitCode: number }>;
}

// =============================================================================
// CLOCK
// =============================================================================

export interface Clock {
  now(): Date;
  isoNow(): string;
}

export type OrchestratorPorts = {
  agent: AgentInvoker;
  commands: EcosystemCommands;
  runner: CommandRunner;
  git: GitPrimitives;
  notifier: Notifier;
  reviewGate: ReviewGate;
  deploy: DeployRunner;
  clock: Clock;
};
