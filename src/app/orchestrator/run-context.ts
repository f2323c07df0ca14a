/**
 * RunContext + default adapters for orchestrator runs.
 * Purpose: centralize run-scoped config, derived limits and injected ports to avoid globals.
 * Assumptions: ports are thin adapters and are overrideable for tests.
 * Usage: buildRunContext(...) from run-context-builder and call runEngine.
 */

import path from "node:path";

import { CommandAgentInvoker } from "../../agent/command-agent.js";
import { MockAgentInvoker } from "../../agent/mock-agent.js";
import { ShellCommandRunner } from "../../commands/shell-runner.js";
import { TableEcosystemCommands } from "../../commands/ecosystem-commands.js";
import type { BudgetLedger } from "../../core/budget-ledger.js";
import type { BudgetConfig, RunnerConfig } from "../../core/config.js";
import type { PathsContext } from "../../core/paths.js";
import { taskLogsDir } from "../../core/paths.js";
import type { Roadmap } from "../../core/roadmap.js";
import { isoNow } from "../../core/utils.js";
import { BashDeployRunner } from "../../deploy/deploy-hook.js";
import { createGitPrimitives } from "../../git/git.js";
import type { GitLifecycle } from "../../git/lifecycle.js";
import { NullNotifier, WebhookNotifier } from "../../notify/webhook-notifier.js";
import { ConsoleReviewGate } from "../../review/console-review-gate.js";

import type { OrchestratorPorts } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunOptions = {
  runId?: string;
  maxParallel?: number;
  // false turns review off for every task, whatever the roadmap says.
  review?: boolean;
  mock?: boolean;
  stopSignal?: AbortSignal;
  // Stack traces in log-write warnings.
  debug?: boolean;
};

export type RunContextResolved = {
  runId: string;
  maxParallel: number;
  staticFixLimit: number;
  fixCycleLimit: number | null;
  minCoverage: number | null;
  reviewDisabled: boolean;
  mockAgent: boolean;
};

export type RunContext = {
  projectDir: string;
  projectName: string;
  roadmap: Roadmap;
  budget: BudgetConfig;
  runner: RunnerConfig;
  paths: PathsContext;
  options: RunOptions;
  ports: OrchestratorPorts;
  ledger: BudgetLedger;
  // Null unless the roadmap has git.enabled.
  git: GitLifecycle | null;
  resolved: RunContextResolved;
};

// =============================================================================
// DEFAULT ADAPTERS
// =============================================================================

export function createDefaultPorts(input: {
  projectDir: string;
  projectName: string;
  roadmap: Roadmap;
  runner: RunnerConfig;
  paths: PathsContext;
  mockAgent: boolean;
}): OrchestratorPorts {
  const { projectDir, projectName, roadmap, runner, paths } = input;

  const agent = input.mockAgent
    ? new MockAgentInvoker()
    : new CommandAgentInvoker({
        config: runner.agent,
        logPathFor: (request) =>
          path.join(
            taskLogsDir(projectName, request.task.id, request.task.title, paths),
            `${request.phase}-${request.attempt}.log`,
          ),
      });

  const notify = roadmap.document.notify;

  return {
    agent,
    commands: new TableEcosystemCommands({ projectDir, overrides: runner.ecosystems }),
    runner: new ShellCommandRunner(),
    git: createGitPrimitives(projectDir),
    notifier: notify ? new WebhookNotifier(notify) : new NullNotifier(),
    reviewGate: new ConsoleReviewGate(),
    deploy: new BashDeployRunner(),
    clock: {
      now: () => new Date(),
      isoNow,
    },
  };
}
