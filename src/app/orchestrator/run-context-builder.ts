/**
 * RunContext builder for orchestrator runs.
 * Purpose: resolve run-scoped config and derived values in one place.
 * Assumptions: the roadmap and configs are already validated by the caller.
 * Usage: const ctx = await buildRunContext({ projectDir, roadmap, budget, runner, options }).
 */

import path from "node:path";

import { isMockAgentEnabled } from "../../agent/mock-agent.js";
import { BudgetLedger } from "../../core/budget-ledger.js";
import type { BudgetConfig, RunnerConfig } from "../../core/config.js";
import { DEFAULT_RUNNER_CONFIG } from "../../core/config.js";
import type { PathsContext } from "../../core/paths.js";
import { createPathsContext, defaultLedgerPath } from "../../core/paths.js";
import { isGitManaged, resolveProjectName, type Roadmap } from "../../core/roadmap.js";
import { defaultRunId } from "../../core/utils.js";
import { GitLifecycle } from "../../git/lifecycle.js";

import type { OrchestratorPorts } from "./ports.js";
import { createDefaultPorts, type RunContext, type RunContextResolved, type RunOptions } from "./run-context.js";

// =============================================================================
// TYPES
// =============================================================================

export type BuildRunContextInput = {
  projectDir: string;
  roadmap: Roadmap;
  budget: BudgetConfig;
  runner?: RunnerConfig;
  options?: RunOptions;
  ports?: Partial<OrchestratorPorts>;
  paths?: PathsContext;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function buildRunContext(input: BuildRunContextInput): Promise<RunContext> {
  const projectDir = path.resolve(input.projectDir);
  const runner = input.runner ?? DEFAULT_RUNNER_CONFIG;
  const options = input.options ?? {};
  const paths = input.paths ?? createPathsContext({ projectDir });
  const projectName = resolveProjectName(input.roadmap, projectDir);
  const mockAgent = options.mock ?? isMockAgentEnabled();

  const ports: OrchestratorPorts = {
    ...createDefaultPorts({ projectDir, projectName, roadmap: input.roadmap, runner, paths, mockAgent }),
    ...input.ports,
  };

  const ledger = await BudgetLedger.load({
    filePath: resolveLedgerPath(runner, projectDir, paths),
    project: projectName,
    config: input.budget,
    now: () => ports.clock.now(),
  });

  const resolved: RunContextResolved = {
    runId: options.runId ?? defaultRunId(),
    maxParallel: options.maxParallel ?? input.budget.max_parallel_agents,
    staticFixLimit: runner.static_fix_limit,
    fixCycleLimit: runner.fix_cycle_limit ?? null,
    minCoverage: input.roadmap.document.min_coverage ?? null,
    reviewDisabled: options.review === false,
    mockAgent,
  };

  return {
    projectDir,
    projectName,
    roadmap: input.roadmap,
    budget: input.budget,
    runner,
    paths,
    options,
    ports,
    ledger,
    git: isGitManaged(input.roadmap) ? new GitLifecycle(ports.git) : null,
    resolved,
  };
}

export function resolveLedgerPath(runner: RunnerConfig, projectDir: string, paths: PathsContext): string {
  if (runner.ledger_path) {
    return path.resolve(projectDir, runner.ledger_path);
  }
  return defaultLedgerPath(paths);
}
