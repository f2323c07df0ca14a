import { formatTokens, formatUsd } from "../app/orchestrator/helpers/format.js";
import { resolveLedgerPath } from "../app/orchestrator/run-context-builder.js";
import { BudgetLedger } from "../core/budget-ledger.js";
import type { BudgetConfig } from "../core/config.js";
import { estimateRun, type DryRunEstimate } from "../core/dry-run.js";
import { StateStore } from "../core/state-store.js";
import { padTaskId } from "../core/utils.js";

import type { CliProject } from "./config.js";

export async function dryRunCommand(
  project: CliProject,
  budget: BudgetConfig,
  opts: { maxParallel?: number } = {},
): Promise<DryRunEstimate> {
  const state = await new StateStore(project.projectName, project.paths).load();
  const ledger = await BudgetLedger.load({
    filePath: resolveLedgerPath(project.runner, project.projectDir, project.paths),
    project: project.projectName,
    config: budget,
  });

  const estimate = estimateRun({
    graph: project.roadmap.graph,
    state,
    maxParallel: opts.maxParallel ?? budget.max_parallel_agents,
    prices: budget.token_prices_usd_per_million,
    remainingMonthlyTokens: ledger.remainingMonthlyTokens(),
  });

  for (const line of formatDryRunLines(project.projectName, estimate)) {
    console.log(line);
  }
  return estimate;
}

export function formatDryRunLines(projectName: string, estimate: DryRunEstimate): string[] {
  if (estimate.tasksLeft.length === 0) {
    return [`Dry run ${projectName}: nothing left to run.`];
  }

  const lines = [`Dry run ${projectName}: ${estimate.tasksLeft.length} task(s) left in ${estimate.rounds} round(s).`];
  for (const layer of estimate.layers) {
    const ids = layer.tasks.map((id) => padTaskId(id)).join(", ");
    lines.push(`- Layer ${layer.index}: ${ids} (${layer.rounds} round(s))`);
  }
  lines.push(`Estimated tokens: ${formatTokens(estimate.estimatedTokens)} (${formatTokens(estimate.tokensPerTask)} per task)`);
  lines.push(`Estimated cost: ${formatUsd(estimate.estimatedCost)}`);
  lines.push(
    `Monthly budget left: ${formatTokens(estimate.remainingMonthlyTokens)}${estimate.fitsBudget ? "" : " (estimate exceeds it)"}`,
  );
  return lines;
}
