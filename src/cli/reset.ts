import { resolveLedgerPath } from "../app/orchestrator/run-context-builder.js";
import { BudgetLedger } from "../core/budget-ledger.js";
import type { BudgetConfig } from "../core/config.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { logTaskReset, openOrchestratorLog } from "../core/logger.js";
import { StateStore } from "../core/state-store.js";
import { reconcileRunState, resetTaskState } from "../core/state.js";
import { padTaskId } from "../core/utils.js";

import type { CliProject } from "./config.js";

export type ResetCommandOptions = {
  taskId?: number;
  all?: boolean;
};

// Puts tasks back to ready/blocked with fresh counters and a fresh attempt budget.
export async function resetCommand(
  project: CliProject,
  budget: BudgetConfig,
  opts: ResetCommandOptions,
): Promise<number[]> {
  const { graph } = project.roadmap;
  const ids = resolveResetIds(graph.ids, opts);

  const store = new StateStore(project.projectName, project.paths);
  const state = await store.load();
  if (!state) {
    console.log(`No run state found for project ${project.projectName}; nothing to reset.`);
    return [];
  }

  reconcileRunState(state, graph);
  const ledger = await BudgetLedger.load({
    filePath: resolveLedgerPath(project.runner, project.projectDir, project.paths),
    project: project.projectName,
    config: budget,
  });
  const logger = openOrchestratorLog(project.projectName, project.paths, state.run_id);

  try {
    const reason = opts.all ? "operator reset (all)" : "operator reset";
    for (const id of ids) {
      const fresh = resetTaskState(state, graph, id);
      await ledger.resetTask(id);
      logTaskReset(logger, id, reason);
      console.log(`Task ${padTaskId(id)} reset to ${fresh.status}.`);
    }

    await store.save(state);
    return ids;
  } finally {
    logger.close();
  }
}

function resolveResetIds(known: readonly number[], opts: ResetCommandOptions): number[] {
  if (opts.all) return [...known];

  const taskId = opts.taskId;
  if (taskId === undefined || !known.includes(taskId)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.task,
      title: "Unknown task.",
      message:
        taskId === undefined ? "Pass a task id or --all." : `Task ${taskId} is not in the roadmap.`,
      hint: "Run `waypoint layers` to list the task ids.",
    });
  }
  return [taskId];
}
