/**
 * TaskMachine drives one dispatched batch through the phase pipeline.
 * Purpose: run build concurrently, the checks and agent fixes once per batch, then commit,
 * notify and deploy each task in id order.
 * Assumptions: the run engine owns run state + store and passes them in by reference; the
 * machine and the engine are the only callers of markTask. Interrupts are honoured only
 * between phases.
 * Usage: const outcome = await runBatch(env, { batchId, taskIds });
 */

import { parseCoverageTotal } from "../../../commands/ecosystem-commands.js";
import { EMPTY_USAGE, totalTokens } from "../../../core/budget-ledger.js";
import { BudgetExceededError, DeployHookFailure, PhaseFailure, TaskAbandoned } from "../../../core/errors.js";
import { logOrchestratorEvent, type EventFields, type JsonlLogger, type RunEventType } from "../../../core/logger.js";
import { failureReportPath } from "../../../core/paths.js";
import type { AgentPhase, Phase } from "../../../core/phases.js";
import {
  isMilestone,
  isReviewEnabled,
  milestoneVersion,
  resolveTaskEcosystem,
  taskLabel,
} from "../../../core/roadmap.js";
import type { RoadmapTask } from "../../../core/roadmap-schema.js";
import type { StateStore } from "../../../core/state-store.js";
import {
  markTask,
  recordFailedTask,
  requireTaskState,
  type RunState,
  type TaskPatch,
  type TaskState,
} from "../../../core/state.js";
import { requireTask } from "../../../core/task-graph.js";
import { resolveDeployGate } from "../../../deploy/deploy-hook.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import type {
  AgentRequest,
  AgentResult,
  CommandResult,
  EcosystemCommandSet,
  NotifyEvent,
  Notifier,
} from "../ports.js";
import type { RunContext } from "../run-context.js";

import {
  PER_TASK_LIMIT_REASON,
  decideFix,
  resolveFailureDisposition,
} from "./failure-policy.js";
import { writeFailureReport } from "./failure-report.js";

// =============================================================================
// TYPES
// =============================================================================

export type TaskMachineEnv = {
  ctx: RunContext;
  state: RunState;
  store: StateStore;
  logger: JsonlLogger;
  shouldStop: () => boolean;
};

export type BatchRun = {
  batchId: number;
  taskIds: number[];
};

export type BatchOutcome = "settled" | "stopped";

type TailPhase = "commit" | "notify" | "deploy";
type BatchPhase = Exclude<Phase, TailPhase>;

type CheckFailure = {
  check: string;
  error: string;
  logs: string;
};

type TaskFailure = {
  reason: string;
  failingCheck?: string;
  forceAbandon?: boolean;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runBatch(env: TaskMachineEnv, batch: BatchRun): Promise<BatchOutcome> {
  return new BatchRunner(env, batch).run();
}

// Notifications are fire and forget: a failing webhook never fails the task or the run.
export async function notifySafely(
  notifier: Notifier,
  logger: JsonlLogger,
  event: NotifyEvent,
): Promise<void> {
  try {
    await notifier.notify(event);
  } catch (err) {
    const fields: EventFields = {
      event: event.event,
      message: formatErrorMessage(err),
    };
    if (event.task !== undefined) fields.taskId = String(event.task);
    logOrchestratorEvent(logger, "notify.error", fields);
  }
}

export function isTailPhase(phase: Phase): phase is TailPhase {
  return phase === "commit" || phase === "notify" || phase === "deploy";
}

// =============================================================================
// BATCH RUNNER
// =============================================================================

class BatchRunner {
  // Tasks still moving through the pipeline, lowest id (the lead) first.
  private active: RoadmapTask[];
  private branch: string | undefined;

  constructor(
    private readonly env: TaskMachineEnv,
    private readonly batch: BatchRun,
  ) {
    const graph = env.ctx.roadmap.graph;
    this.active = [...batch.taskIds].sort((a, b) => a - b).map((id) => requireTask(graph, id));
  }

  async run(): Promise<BatchOutcome> {
    const lead = this.lead;
    if (isMilestone(lead)) {
      return this.runMilestone(lead);
    }

    const resumed = this.resumePhase();
    const git = this.env.ctx.git;
    // Past commit the branch is already merged and deleted.
    const branchOpen = resumed === undefined || resumed === "commit" || !isTailPhase(resumed);
    if (git && this.isSolo && branchOpen && !this.anyBatchTaskDone()) {
      const branch = await git.startTask(lead);
      this.branch = branch;
      this.log("git.start", { taskId: String(lead.id), branch });
    }

    let phase: Phase = resumed ?? "build";
    while (!isTailPhase(phase)) {
      if (!(await this.enter(this.active, phase))) return "stopped";

      const next = await this.step(phase);
      if (next === null) return "settled";
      phase = next;
    }

    return this.runTail();
  }

  // ---------------------------------------------------------------------------
  // Batch-level phases
  // ---------------------------------------------------------------------------

  private async step(phase: BatchPhase): Promise<Phase | null> {
    switch (phase) {
      case "build":
        return this.build();
      case "deps":
        await this.installDependencies();
        return "test";
      case "test":
        return this.test();
      case "coverage":
        return this.coverage();
      case "fix":
        return this.fix();
      case "static":
        return this.staticCheck();
      case "static_fix":
        return (await this.invokeForBatch("static_fix")) ? "static" : null;
      case "review":
        return this.review();
      case "document":
        return this.document();
    }
  }

  private async build(): Promise<Phase | null> {
    // Gates run one task at a time; the survivors then build concurrently.
    for (const task of [...this.active]) {
      await this.checkBudget(task, [task]);
    }
    if (this.active.length === 0) return null;

    const builders = [...this.active];
    const results = await Promise.all(
      builders.map(async (task) => {
        const attempt = requireTaskState(this.env.state, task.id).attempt;
        const result = await this.callAgent(this.agentRequest("build", task, [task], attempt));
        return { task, result };
      }),
    );

    // Completions are applied to state and ledger one by one.
    const failures: string[] = [];
    for (const { task, result } of results) {
      await this.account(task, "build", result);
      if (!result.success) {
        failures.push(`${taskLabel(task)}:\n${result.output}`);
      }
    }

    if (failures.length > 0) {
      return this.routeToFix({ check: "build", error: "agent reported build failure", logs: failures.join("\n\n") });
    }
    return "deps";
  }

  // A failing install is logged; the test phase reports what is actually broken.
  private async installDependencies(): Promise<void> {
    const commands = await this.commands();
    if (!commands?.install) return;

    const res = await this.runCommand(commands.install);
    if (res.exitCode !== 0) {
      this.log("task.phase", {
        taskId: String(this.lead.id),
        phase: "deps",
        outcome: "failed",
        exit_code: res.exitCode,
      });
    }
  }

  private async test(): Promise<Phase | null> {
    const commands = await this.commands();
    if (commands) {
      const res = await this.runCommand(commands.test);
      if (res.exitCode !== 0) {
        return this.routeToFix({ check: "test", error: `tests failed (exit ${res.exitCode})`, logs: res.output });
      }
    }
    return this.env.ctx.resolved.minCoverage === null ? "static" : "coverage";
  }

  private async coverage(): Promise<Phase | null> {
    const min = this.env.ctx.resolved.minCoverage;
    const commands = await this.commands();
    if (min === null || !commands?.coverage) return "static";

    const res = await this.runCommand(commands.coverage);
    const total = parseCoverageTotal(res.output);
    if (res.exitCode === 0 && total !== null && total >= min) {
      return "static";
    }

    const measured = total === null ? "unknown" : `${total}%`;
    return this.routeToFix({
      check: "coverage",
      error: `coverage ${measured} is below ${min}%`,
      logs: `Coverage below threshold: ${measured} < ${min}%.\n${res.output}`,
    });
  }

  private async fix(): Promise<Phase | null> {
    const result = await this.invokeForBatch("fix");
    if (!result) return null;
    // The checks decide whether the fix worked.
    return "deps";
  }

  private async staticCheck(): Promise<Phase | null> {
    const commands = await this.commands();
    const lint = commands?.lint;
    if (!lint) return this.afterStatic();

    const res = await this.runCommand(lint);
    if (res.exitCode === 0) return this.afterStatic();

    this.patchActive({
      failing_check: "static",
      last_error: `static checks failed (exit ${res.exitCode})`,
      fix_logs: res.output,
    });
    await this.save();

    const limit = this.env.ctx.resolved.staticFixLimit;
    if (requireTaskState(this.env.state, this.lead.id).static_fix_count < limit) {
      return "static_fix";
    }

    await this.fail(this.active, {
      reason: `static checks still failing after ${limit} static fixes`,
      failingCheck: "static",
    });
    return null;
  }

  private afterStatic(): Phase {
    return this.reviewEnabled() ? "review" : "document";
  }

  private async review(): Promise<Phase | null> {
    const decision = await this.requestReview();
    if (decision.decision === "approve") return "document";

    const git = this.env.ctx.git;
    if (git) {
      await git.discardChanges();
    }
    const note = decision.note ?? "Rejected in review.";
    return this.routeToFix({ check: "review", error: `review rejected: ${note}`, logs: note });
  }

  private async document(): Promise<Phase | null> {
    const result = await this.invokeForBatch("document");
    if (!result) return null;
    if (!result.success) {
      this.log("task.phase", { taskId: String(this.lead.id), phase: "document", outcome: "failed" });
    }
    return "commit";
  }

  // ---------------------------------------------------------------------------
  // Milestones
  // ---------------------------------------------------------------------------

  private async runMilestone(task: RoadmapTask): Promise<BatchOutcome> {
    const phase = this.resumePhase() ?? "review";
    if (!isTailPhase(phase)) {
      if (!(await this.enter([task], "review"))) return "stopped";
      if (!(await this.milestoneReview(task))) return "settled";
    }
    return this.runTail();
  }

  private async milestoneReview(task: RoadmapTask): Promise<boolean> {
    const result = await this.invokeForBatch("review");
    if (!result) return false;

    if (!result.success) {
      this.patchActive({ failing_check: "review", last_error: "milestone review failed", fix_logs: result.output });
      await this.fail([task], { reason: "milestone review failed", failingCheck: "review" });
      return false;
    }

    if (this.reviewEnabled()) {
      const decision = await this.requestReview();
      if (decision.decision === "reject") {
        const note = decision.note ?? "Rejected in review.";
        this.patchActive({ failing_check: "review", last_error: `review rejected: ${note}` });
        await this.fail([task], { reason: `review rejected: ${note}`, failingCheck: "review" });
        return false;
      }
    }

    return true;
  }

  // ---------------------------------------------------------------------------
  // Per-task tail: commit, notify, deploy
  // ---------------------------------------------------------------------------

  private async runTail(): Promise<BatchOutcome> {
    const tail = [...this.active];
    for (const [index, task] of tail.entries()) {
      const outcome = await this.finishOne(task, index === tail.length - 1);
      if (outcome === "stopped") return "stopped";
    }
    return "settled";
  }

  private async finishOne(task: RoadmapTask, isLast: boolean): Promise<"done" | "stopped"> {
    let phase = requireTaskState(this.env.state, task.id).phase;

    if (!phase || !isTailPhase(phase)) {
      if (!(await this.enter([task], "commit"))) return "stopped";
      phase = "commit";
    }

    if (phase === "commit") {
      await this.commit(task, isLast);
      if (!(await this.enter([task], "notify"))) return "stopped";
      phase = "notify";
    }

    if (phase === "notify") {
      const current = requireTaskState(this.env.state, task.id);
      await notifySafely(this.env.ctx.ports.notifier, this.env.logger, {
        event: "task_complete",
        project: this.env.ctx.projectName,
        status: "done",
        task: task.id,
        total_tokens: current.tokens,
        details: { title: task.title },
      });

      const gate = this.deployGate(task);
      if (gate.deploy) {
        if (!(await this.enter([task], "deploy"))) return "stopped";
        phase = "deploy";
      } else {
        this.log("deploy.skip", { taskId: String(task.id), reason: gate.reason });
      }
    }

    if (phase === "deploy") {
      await this.deploy(task);
    }

    markTask(this.env.state, task.id, "done", {}, this.now());
    this.log("task.complete", { taskId: String(task.id), tokens: requireTaskState(this.env.state, task.id).tokens });
    this.active = this.active.filter((entry) => entry.id !== task.id);
    await this.save();
    return "done";
  }

  private async commit(task: RoadmapTask, isLast: boolean): Promise<void> {
    const git = this.env.ctx.git;
    if (!git) return;

    if (isMilestone(task)) {
      const res = await git.tagMilestone(milestoneVersion(task));
      this.log("git.tag", { taskId: String(task.id), tag: res.tag, pushed: res.pushed });
      return;
    }

    if (!this.isSolo) {
      const branch = await git.startTask(task);
      markTask(this.env.state, task.id, "running", { phase: "commit", branch }, this.now());
      this.log("git.start", { taskId: String(task.id), branch });
    }

    // Batch members share one working tree: each commits its own outputs, the last takes the rest.
    const res = await git.finishTask(task, { paths: isLast ? [] : task.outputs });
    this.log("git.finish", {
      taskId: String(task.id),
      branch: res.branch,
      tag: res.tag,
      pushed: res.pushed,
      skipped_paths: res.skippedPaths,
    });
  }

  private deployGate(task: RoadmapTask): ReturnType<typeof resolveDeployGate> {
    return resolveDeployGate({ deploy: this.env.ctx.roadmap.document.deploy, task });
  }

  private async deploy(task: RoadmapTask): Promise<void> {
    const gate = this.deployGate(task);
    if (!gate.deploy) {
      this.log("deploy.skip", { taskId: String(task.id), reason: gate.reason });
      return;
    }

    const res = await this.env.ctx.ports.deploy.run({
      script: gate.script,
      cwd: this.env.ctx.projectDir,
      env: gate.env,
    });
    if (res.exitCode === 0) {
      this.log("deploy.complete", { taskId: String(task.id), script: gate.script });
      return;
    }

    const failure = new DeployHookFailure(gate.script, res.exitCode);
    this.log("deploy.error", {
      taskId: String(task.id),
      error: failure.name,
      message: failure.message,
      exit_code: res.exitCode,
    });
  }

  // ---------------------------------------------------------------------------
  // Agent invocations
  // ---------------------------------------------------------------------------

  // Batch-level invocations run with the lead as context and are charged to it.
  private async invokeForBatch(phase: AgentPhase): Promise<AgentResult | null> {
    const lead = this.lead;
    if (!(await this.checkBudget(lead, this.active))) return null;

    const current = requireTaskState(this.env.state, lead.id);
    const fixLogs = phase === "fix" || phase === "static_fix" ? current.fix_logs : undefined;
    const result = await this.callAgent(this.agentRequest(phase, lead, this.active, current.attempt, fixLogs));
    await this.account(lead, phase, result);
    return result;
  }

  // An adapter that throws (bad template, missing binary) fails the phase like a failed run.
  private async callAgent(request: AgentRequest): Promise<AgentResult> {
    try {
      return await this.env.ctx.ports.agent.invoke(request);
    } catch (err) {
      const failure = new PhaseFailure(
        request.phase,
        `agent ${request.phase} invocation failed: ${formatErrorMessage(err)}`,
      );
      this.log("task.phase", {
        taskId: String(request.task.id),
        phase: request.phase,
        outcome: "error",
        message: failure.message,
      });
      return { success: false, output: failure.message, usage: EMPTY_USAGE };
    }
  }

  private agentRequest(
    phase: AgentPhase,
    task: RoadmapTask,
    tasks: RoadmapTask[],
    attempt: number,
    fixLogs?: string,
  ): AgentRequest {
    const { ctx } = this.env;
    return {
      phase,
      task,
      project: ctx.projectName,
      attempt,
      context: {
        projectDir: ctx.projectDir,
        tasks,
        preamble: ctx.roadmap.document.preamble,
        ecosystem: resolveTaskEcosystem(ctx.roadmap, task),
        fixLogs,
      },
    };
  }

  private async account(task: RoadmapTask, phase: AgentPhase, result: AgentResult): Promise<void> {
    const current = requireTaskState(this.env.state, task.id);
    await this.env.ctx.ledger.record(task.id, phase, result.usage, {
      attempt: current.attempt,
      parallelWith: this.active.map((entry) => entry.id),
    });
    markTask(
      this.env.state,
      task.id,
      "running",
      { phase: current.phase, tokens: current.tokens + totalTokens(result.usage) },
      this.now(),
    );
    await this.save();
  }

  // False when the charged task hit its own ceiling; the casualties are then abandoned.
  private async checkBudget(charged: RoadmapTask, casualties: RoadmapTask[]): Promise<boolean> {
    const { ledger, budget } = this.env.ctx;

    if (ledger.taskLimitReached(charged.id)) {
      this.log("budget.block", {
        taskId: String(charged.id),
        scope: "task",
        used: ledger.taskTokens(charged.id),
        limit: budget.per_task_limit_tokens,
      });
      this.patchTasks(casualties, { last_error: PER_TASK_LIMIT_REASON });
      await this.fail(casualties, { reason: PER_TASK_LIMIT_REASON, failingCheck: "budget", forceAbandon: true });
      return false;
    }

    if (!ledger.reserve(charged.id)) {
      const used = ledger.monthlyTokens();
      this.log("budget.block", {
        taskId: String(charged.id),
        scope: "month",
        used,
        limit: budget.monthly_limit_tokens,
      });
      throw new BudgetExceededError(
        `Monthly token budget exhausted (${used} of ${budget.monthly_limit_tokens} tokens used)`,
        used,
        budget.monthly_limit_tokens,
      );
    }

    return true;
  }

  // ---------------------------------------------------------------------------
  // Failure routing
  // ---------------------------------------------------------------------------

  private async routeToFix(failure: CheckFailure): Promise<Phase | null> {
    this.patchActive({ failing_check: failure.check, last_error: failure.error, fix_logs: failure.logs });
    await this.save();

    const lead = this.lead;
    const decision = decideFix({
      attemptsRemaining: this.env.ctx.ledger.attemptsRemaining(lead.id),
      fixCycles: requireTaskState(this.env.state, lead.id).fix_cycles,
      fixCycleLimit: this.env.ctx.resolved.fixCycleLimit,
    });
    if (decision.fix) return "fix";

    await this.fail(this.active, { reason: decision.reason, failingCheck: failure.check });
    return null;
  }

  private async fail(tasks: RoadmapTask[], failure: TaskFailure): Promise<void> {
    const first = tasks[0];
    if (!first) return;

    const { ctx, state } = this.env;
    const disposition = resolveFailureDisposition({
      attemptsRemaining: ctx.ledger.attemptsRemaining(first.id),
      forceAbandon: failure.forceAbandon,
    });

    for (const task of tasks) {
      const current = requireTaskState(state, task.id);
      markTask(
        state,
        task.id,
        "failed",
        { last_error: current.last_error ?? failure.reason, failing_check: failure.failingCheck },
        this.now(),
      );
      this.log("task.failed", {
        taskId: String(task.id),
        reason: failure.reason,
        failing_check: failure.failingCheck ?? null,
        retry: disposition === "retry",
      });

      if (disposition === "retry") {
        markTask(state, task.id, "ready", {}, this.now());
      } else {
        await this.abandon(task, failure);
      }
    }

    // A fresh attempt starts from a clean tree.
    if (disposition === "retry" && ctx.git) {
      await ctx.git.discardChanges();
    }

    const failedIds = new Set(tasks.map((task) => task.id));
    this.active = this.active.filter((task) => !failedIds.has(task.id));
    await this.save();
  }

  private async abandon(task: RoadmapTask, failure: TaskFailure): Promise<void> {
    const { ctx, state, logger } = this.env;
    markTask(state, task.id, "abandoned", {}, this.now());
    const current = requireTaskState(state, task.id);

    await writeFailureReport(failureReportPath(ctx.projectName, task.id, task.title, ctx.paths), {
      task: task.id,
      title: task.title,
      project: ctx.projectName,
      timestamp: this.now(),
      reason: failure.reason,
      failing_check: failure.failingCheck ?? null,
      attempts: current.attempt,
      tokens_spent: current.tokens,
      lastError: current.last_error,
      fixLogs: current.fix_logs,
    });
    recordFailedTask(state, {
      task: task.id,
      reason: failure.reason,
      failing_check: failure.failingCheck,
      attempts: current.attempt,
      tokens: current.tokens,
    });

    if (ctx.git) {
      const branch = await ctx.git.rollback(task);
      this.log("git.rollback", { taskId: String(task.id), branch });
    }

    await notifySafely(ctx.ports.notifier, logger, {
      event: "task_failed",
      project: ctx.projectName,
      status: "abandoned",
      task: task.id,
      total_tokens: current.tokens,
      details: { title: task.title, reason: failure.reason },
    });
    const abandoned = new TaskAbandoned(task.id, failure.reason, failure.failingCheck);
    this.log("task.abandoned", {
      taskId: String(task.id),
      reason: abandoned.reason,
      failing_check: abandoned.failingCheck ?? null,
      attempts: current.attempt,
      message: abandoned.message,
    });
  }

  // ---------------------------------------------------------------------------
  // State helpers
  // ---------------------------------------------------------------------------

  // Marks each task running at `phase` unless it is already there (a resumed run), saves,
  // then reports whether the run may proceed.
  private async enter(tasks: RoadmapTask[], phase: Phase): Promise<boolean> {
    const { state } = this.env;
    const now = this.now();

    for (const task of tasks) {
      const current = requireTaskState(state, task.id);
      if (current.status === "running" && current.phase === phase) continue;

      const patch = this.entryPatch(phase, task, current);
      const updated = markTask(state, task.id, "running", { ...patch, phase, batch_id: this.batch.batchId }, now);
      this.log("task.phase", { taskId: String(task.id), phase, attempt: updated.attempt });
      if (patch.attempt !== undefined) {
        this.log("task.attempt", { taskId: String(task.id), phase, attempt: patch.attempt });
      }
    }

    await this.save();
    return !this.env.shouldStop();
  }

  // Build, fix and a milestone's review each count as one attempt.
  private entryPatch(phase: Phase, task: RoadmapTask, current: TaskState): TaskPatch {
    switch (phase) {
      case "build":
        return this.branch ? { attempt: current.attempt + 1, branch: this.branch } : { attempt: current.attempt + 1 };
      case "fix":
        return { attempt: current.attempt + 1, fix_cycles: current.fix_cycles + 1 };
      case "static_fix":
        return { static_fix_count: current.static_fix_count + 1 };
      case "review":
        return isMilestone(task) ? { attempt: current.attempt + 1 } : {};
      default:
        return {};
    }
  }

  private patchActive(patch: TaskPatch): void {
    this.patchTasks(this.active, patch);
  }

  private patchTasks(tasks: RoadmapTask[], patch: TaskPatch): void {
    for (const task of tasks) {
      const current = requireTaskState(this.env.state, task.id);
      markTask(this.env.state, task.id, "running", { ...patch, phase: current.phase }, this.now());
    }
  }

  private resumePhase(): Phase | undefined {
    // Some members already committed: the rest pick up at their own tail phase.
    if (this.anyBatchTaskDone()) return "commit";

    for (const task of this.active) {
      const current = requireTaskState(this.env.state, task.id);
      if (current.status === "running" && current.phase) return current.phase;
    }
    return undefined;
  }

  private anyBatchTaskDone(): boolean {
    return this.batch.taskIds.some((id) => requireTaskState(this.env.state, id).status === "done");
  }

  private async requestReview(): Promise<{ decision: "approve" | "reject"; note?: string }> {
    const { ctx } = this.env;
    const diffStat = ctx.git ? await ctx.git.workingTreeStatus() : "";
    const decision = await ctx.ports.reviewGate.request({
      project: ctx.projectName,
      tasks: this.active,
      diffStat,
    });
    this.log("review.decision", {
      taskId: String(this.lead.id),
      decision: decision.decision,
      note: decision.note ?? null,
    });
    return decision;
  }

  private reviewEnabled(): boolean {
    const { ctx } = this.env;
    if (ctx.resolved.reviewDisabled) return false;
    return this.active.some((task) => isReviewEnabled(ctx.roadmap, task));
  }

  private async commands(): Promise<EcosystemCommandSet | null> {
    return this.env.ctx.ports.commands.resolve(resolveTaskEcosystem(this.env.ctx.roadmap, this.lead));
  }

  private async runCommand(command: string): Promise<CommandResult> {
    return this.env.ctx.ports.runner.run(command, this.env.ctx.projectDir);
  }

  private get lead(): RoadmapTask {
    const lead = this.active[0];
    if (!lead) {
      throw new Error(`Batch ${this.batch.batchId} has no active tasks`);
    }
    return lead;
  }

  private get isSolo(): boolean {
    return this.batch.taskIds.length === 1;
  }

  private now(): string {
    return this.env.ctx.ports.clock.isoNow();
  }

  private async save(): Promise<void> {
    await this.env.store.save(this.env.state);
  }

  private log(type: RunEventType, fields: EventFields): void {
    logOrchestratorEvent(this.env.logger, type, fields);
  }
}
