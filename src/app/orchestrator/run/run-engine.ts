/**
 * RunEngine orchestrates a run by dispatching batches to the task machine.
 * Purpose: centralize run control-flow behind RunContext.
 * Assumptions: run engine owns run state + store; the task machine mutates them by reference.
 * Usage: const result = await runEngine(await buildRunContext(...)).
 */

import { BudgetExceededError, EXIT_CODES, type ExitCode } from "../../../core/errors.js";
import {
  logOrchestratorEvent,
  logRunResume,
  openOrchestratorLog,
  type JsonObject,
  type JsonlLogger,
} from "../../../core/logger.js";
import { isReviewEnabled } from "../../../core/roadmap.js";
import { dispatch, readySet } from "../../../core/scheduler.js";
import { StateStore, summarizeRunState, type RunStatusSummary } from "../../../core/state-store.js";
import {
  completeBatch,
  isTerminalStatus,
  markTask,
  nextBatchId,
  requireTaskState,
  startBatch,
  tasksWithStatus,
  type RunState,
  type RunStatus,
} from "../../../core/state.js";
import { signalFromAbortReason } from "../helpers/stop-reason.js";
import type { RunContext } from "../run-context.js";

import { notifySafely, runBatch, type BatchRun, type TaskMachineEnv } from "./task-machine.js";

// =============================================================================
// PUBLIC TYPES
// =============================================================================

export type RunStopInfo = {
  reason: "signal";
  signal?: string;
};

export type RunResult = {
  runId: string;
  status: RunStatus;
  exitCode: ExitCode;
  state: RunState;
  summary: RunStatusSummary;
  elapsedMs: number;
  stopped?: RunStopInfo;
};

// Share of the monthly limit past which a single budget.warn is logged.
export const BUDGET_WARN_RATIO = 0.8;

// =============================================================================
// RUN ENGINE
// =============================================================================

export async function runEngine(ctx: RunContext): Promise<RunResult> {
  const stopController = buildStopController(ctx.options.stopSignal);
  const logger = openOrchestratorLog(ctx.projectName, ctx.paths, ctx.resolved.runId, ctx.options.debug);

  try {
    return await runEngineImpl(ctx, logger, stopController);
  } finally {
    stopController.cleanup();
    logger.close();
  }
}

async function runEngineImpl(
  ctx: RunContext,
  logger: JsonlLogger,
  stopController: StopController,
): Promise<RunResult> {
  const startedMs = ctx.ports.clock.now().getTime();
  const { graph } = ctx.roadmap;
  const store = new StateStore(ctx.projectName, ctx.paths);
  const opened = await store.open({ graph, runId: ctx.resolved.runId });
  const { state } = opened;
  const now = (): string => ctx.ports.clock.isoNow();

  state.status = "running";
  if (opened.resumed) {
    logRunResume(logger, {
      status: state.status,
      runningTasks: tasksWithStatus(state, "running").length,
      addedTasks: opened.reconcile.added,
      orphanedTasks: opened.reconcile.orphaned,
    });
  } else {
    logOrchestratorEvent(logger, "run.start", {
      project: ctx.projectName,
      tasks: graph.ids.length,
      max_parallel: ctx.resolved.maxParallel,
      mock_agent: ctx.resolved.mockAgent,
    });
  }

  if (ctx.git) {
    const repo = await ctx.git.ensureRepo();
    if (repo.initialized || repo.createdDevelop) {
      logOrchestratorEvent(logger, "git.init", {
        initialized: repo.initialized,
        created_develop: repo.createdDevelop,
      });
    }
  }

  settleDanglingFailures(ctx, state, now());
  await store.save(state);

  const env: TaskMachineEnv = {
    ctx,
    state,
    store,
    logger,
    shouldStop: () => stopController.reason !== null,
  };
  const budgetWarning = { logged: false };

  const finish = async (stopped?: RunStopInfo): Promise<RunResult> => {
    if (stopped) {
      // The next run picks up from here.
      state.status = "paused";
      const payload: JsonObject = { reason: stopped.reason };
      if (stopped.signal) payload.signal = stopped.signal;
      logOrchestratorEvent(logger, "run.stop", payload);
    } else {
      await notifySafely(ctx.ports.notifier, logger, {
        event: "pipeline_done",
        project: ctx.projectName,
        status: state.status,
        total_tokens: sumTaskTokens(state),
        details: {
          done: tasksWithStatus(state, "done").length,
          abandoned: tasksWithStatus(state, "abandoned").length,
        },
      });
      logOrchestratorEvent(logger, "run.complete", { status: state.status });
    }

    await store.save(state);
    await ctx.ledger.flush();

    const summary = summarizeRunState(state, { estimatedCost: ctx.ledger.estimatedCost() });
    return {
      runId: state.run_id,
      status: state.status,
      exitCode: resolveExitCode(state, stopped),
      state,
      summary,
      elapsedMs: ctx.ports.clock.now().getTime() - startedMs,
      stopped,
    };
  };

  const stopInfo = (): RunStopInfo | undefined => {
    const reason = stopController.reason;
    return reason ? { reason: "signal", signal: reason.signal } : undefined;
  };

  try {
    // Batches cut short by an interrupt or a budget halt pick up where they stopped.
    for (const batch of interruptedBatches(state)) {
      const stopped = stopInfo();
      if (stopped) return await finish(stopped);

      logOrchestratorEvent(logger, "batch.start", { batch_id: batch.batchId, tasks: batch.taskIds, resumed: true });
      const outcome = await runBatch(env, batch);
      if (outcome === "stopped") return await finish(stopInfo() ?? { reason: "signal" });
      settleBatch(state, batch, logger, now());
      await store.save(state);
    }

    for (;;) {
      const stopped = stopInfo();
      if (stopped) return await finish(stopped);

      const ready = readySet(graph, state);
      if (ready.length === 0) break;

      if (!ready.some((id) => ctx.ledger.reserve(id))) {
        haltForBudget(ctx, state, logger);
        return await finish();
      }

      const plan = dispatch(ready, ctx.resolved.maxParallel, graph, {
        isReviewGated: (task) => !ctx.resolved.reviewDisabled && isReviewEnabled(ctx.roadmap, task),
      })[0];
      if (!plan) break;

      const batch: BatchRun = { batchId: nextBatchId(state), taskIds: plan.tasks };
      for (const id of batch.taskIds) {
        if (requireTaskState(state, id).status === "blocked") {
          markTask(state, id, "ready", {}, now());
        }
      }
      startBatch(state, { ...batch, now: now() });
      logOrchestratorEvent(logger, "batch.start", {
        batch_id: batch.batchId,
        tasks: batch.taskIds,
        solo: plan.solo ?? null,
      });
      await store.save(state);

      const outcome = await runBatch(env, batch);
      if (outcome === "stopped") return await finish(stopInfo() ?? { reason: "signal" });

      settleBatch(state, batch, logger, now());
      warnOnBudget(ctx, logger, budgetWarning);
      await store.save(state);
    }
  } catch (err) {
    if (!(err instanceof BudgetExceededError)) throw err;
    // Tasks keep their phase; a later run continues them once budget is available.
    haltForBudget(ctx, state, logger);
    return await finish();
  }

  state.status = resolveFinalStatus(ctx, state);
  return finish();
}

// =============================================================================
// RUN HELPERS
// =============================================================================

export function resolveExitCode(state: RunState, stopped?: RunStopInfo): ExitCode {
  if (stopped) return EXIT_CODES.interrupted;
  if (state.status === "budget_exhausted") return EXIT_CODES.budgetExhausted;
  if (tasksWithStatus(state, "abandoned").length > 0) return EXIT_CODES.abandoned;
  return EXIT_CODES.ok;
}

// complete: every task done. failed: nothing left to run but some were abandoned.
// blocked: tasks remain that can never become ready (an abandoned dependency).
function resolveFinalStatus(ctx: RunContext, state: RunState): RunStatus {
  const statuses = ctx.roadmap.graph.ids.map((id) => requireTaskState(state, id).status);
  if (statuses.every((status) => status === "done")) return "complete";
  if (statuses.every(isTerminalStatus)) return "failed";
  return "blocked";
}

function haltForBudget(ctx: RunContext, state: RunState, logger: JsonlLogger): void {
  state.status = "budget_exhausted";
  logOrchestratorEvent(logger, "budget.block", {
    scope: "month",
    used: ctx.ledger.monthlyTokens(),
    limit: ctx.budget.monthly_limit_tokens,
  });
}

function warnOnBudget(ctx: RunContext, logger: JsonlLogger, warning: { logged: boolean }): void {
  if (warning.logged) return;
  const used = ctx.ledger.monthlyTokens();
  const limit = ctx.budget.monthly_limit_tokens;
  if (used < limit * BUDGET_WARN_RATIO) return;

  warning.logged = true;
  logOrchestratorEvent(logger, "budget.warn", { used, limit, remaining: ctx.ledger.remainingMonthlyTokens() });
}

function settleBatch(state: RunState, batch: BatchRun, logger: JsonlLogger, now: string): void {
  const known = state.batches.find((entry) => entry.batch_id === batch.batchId);
  const allDone = batch.taskIds.every((id) => requireTaskState(state, id).status === "done");
  const status = allDone ? "complete" : "failed";

  if (known && known.status === "running") {
    completeBatch(state, batch.batchId, status, now);
  }
  logOrchestratorEvent(logger, "batch.complete", { batch_id: batch.batchId, status });
}

// Groups running tasks by their batch; a running task without one becomes its own batch.
function interruptedBatches(state: RunState): BatchRun[] {
  const byBatch = new Map<number, number[]>();
  const loose: BatchRun[] = [];

  for (const id of tasksWithStatus(state, "running")) {
    const batchId = requireTaskState(state, id).batch_id;
    if (batchId === undefined) {
      loose.push({ batchId: nextBatchId(state) + loose.length, taskIds: [id] });
      continue;
    }
    byBatch.set(batchId, [...(byBatch.get(batchId) ?? []), id]);
  }

  const batches = [...byBatch.entries()].map(([batchId, taskIds]) => ({ batchId, taskIds }));
  return [...batches, ...loose].sort((a, b) => a.batchId - b.batchId);
}

// A crash between failed and its follow-up edge leaves a task in failed; finish the edge.
function settleDanglingFailures(ctx: RunContext, state: RunState, now: string): void {
  for (const id of tasksWithStatus(state, "failed")) {
    const next = ctx.ledger.attemptsRemaining(id) > 0 ? "ready" : "abandoned";
    markTask(state, id, next, {}, now);
  }
}

function sumTaskTokens(state: RunState): number {
  return Object.values(state.tasks).reduce((sum, task) => sum + task.tokens, 0);
}

// =============================================================================
// STOP CONTROLLER
// =============================================================================

type StopRequest = { kind: "signal"; signal?: string };

type StopController = { readonly reason: StopRequest | null; cleanup: () => void };

function buildStopController(signal?: AbortSignal): StopController {
  let reason: StopRequest | null = null;

  const onAbort = (): void => {
    if (reason) return;
    reason = { kind: "signal", signal: signalFromAbortReason(signal?.reason) };
  };

  if (signal) {
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort);
    }
  }

  return {
    get reason() {
      return reason;
    },
    cleanup() {
      if (signal) {
        signal.removeEventListener("abort", onAbort);
      }
    },
  };
}
