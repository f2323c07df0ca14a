import { formatDuration, formatTokens, formatUsd } from "../app/orchestrator/helpers/format.js";
import { BudgetLedger } from "../core/budget-ledger.js";
import type { BudgetConfig } from "../core/config.js";
import { padTaskId } from "../core/utils.js";
import {
  StateStore,
  summarizeRunState,
  type RunStatusSummary,
  type TaskStatusRow,
} from "../core/state-store.js";
import { resolveLedgerPath } from "../app/orchestrator/run-context-builder.js";

import type { CliProject } from "./config.js";

export async function statusCommand(project: CliProject, budget: BudgetConfig): Promise<void> {
  const store = new StateStore(project.projectName, project.paths);
  const state = await store.load();
  if (!state) {
    console.log(`No run state found for project ${project.projectName}.`);
    console.log(`Start a run with: waypoint run ${project.projectDir}`);
    return;
  }

  const ledger = await BudgetLedger.load({
    filePath: resolveLedgerPath(project.runner, project.projectDir, project.paths),
    project: project.projectName,
    config: budget,
  });
  const summary = summarizeRunState(state, { estimatedCost: ledger.estimatedCost() });

  for (const line of formatRunSummaryLines(summary)) {
    console.log(line);
  }
  console.log("");
  for (const line of formatTaskTable(summary.tasks)) {
    console.log(line);
  }
  console.log("");
  console.log(
    `Monthly budget: ${formatTokens(ledger.monthlyTokens())} used, ${formatTokens(ledger.remainingMonthlyTokens())} left`,
  );
}

// =============================================================================
// RENDERING
// =============================================================================

export function formatRunSummaryLines(summary: RunStatusSummary, opts: { elapsedMs?: number } = {}): string[] {
  const counts = summary.taskCounts;
  const lines = [
    `Run: ${summary.runId} (${summary.project})`,
    `Status: ${summary.status}`,
    `Tasks: ${counts.done} done, ${counts.failed} failed, ${counts.abandoned} abandoned (${counts.total} total)`,
    `Tokens: ${formatTokens(summary.totalTokens)}  Cost: ${formatUsd(summary.estimatedCost)}`,
  ];

  if (opts.elapsedMs !== undefined) {
    lines.push(`Elapsed: ${formatDuration(opts.elapsedMs / 1000)}`);
  }

  if (summary.abandoned.length > 0) {
    lines.push("Abandoned:");
    for (const row of summary.abandoned) {
      const check = row.failingCheck ? ` [${row.failingCheck}]` : "";
      lines.push(`  ${padTaskId(row.id)}${check}: ${row.lastError ?? "(no error recorded)"}`);
    }
  }

  if (summary.topSpenders.length > 0) {
    const spenders = summary.topSpenders.map((row) => `${padTaskId(row.id)} ${formatTokens(row.tokens)}`);
    lines.push(`Top spenders: ${spenders.join(", ")}`);
  }

  if (summary.orphaned.length > 0) {
    lines.push(`Orphaned (no longer in the roadmap): ${summary.orphaned.map(padTaskId).join(", ")}`);
  }

  return lines;
}

export function formatTaskTable(rows: TaskStatusRow[]): string[] {
  const header = ["ID", "Status", "Phase", "Attempt", "Tokens"];
  const body = rows.map((row) => [
    padTaskId(row.id),
    row.status,
    row.phase ?? "-",
    String(row.attempt),
    formatTokens(row.tokens),
  ]);

  const widths = header.map((title, column) =>
    Math.max(title.length, ...body.map((cells) => cells[column]?.length ?? 0)),
  );
  const render = (cells: string[]): string =>
    cells
      .map((cell, column) => cell.padEnd(widths[column] ?? cell.length))
      .join("  ")
      .trimEnd();

  return [render(header), ...body.map(render)];
}
