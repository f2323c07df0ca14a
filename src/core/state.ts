import { z } from "zod";

import { InvalidTransitionError } from "./errors.js";
import { PhaseSchema, assertPhaseTransition, ENTRY_PHASES } from "./phases.js";
import { dependencies, type TaskGraph } from "./task-graph.js";
import { isoNow, tail } from "./utils.js";

// =============================================================================
// SCHEMAS
// =============================================================================

export const TaskStatusSchema = z.enum(["blocked", "ready", "running", "done", "failed", "abandoned"]);
export type TaskStatus = z.infer<typeof TaskStatusSchema>;

export const BatchStatusSchema = z.enum(["running", "complete", "failed"]);
export type BatchStatus = z.infer<typeof BatchStatusSchema>;

export const RunStatusSchema = z.enum([
  "running",
  "paused",
  "complete",
  "budget_exhausted",
  "blocked",
  "failed",
]);
export type RunStatus = z.infer<typeof RunStatusSchema>;

export const TaskStateSchema = z.object({
  status: TaskStatusSchema,
  phase: PhaseSchema.optional(),
  attempt: z.number().int().nonnegative().default(0),
  tokens: z.number().int().nonnegative().default(0),
  last_error: z.string().optional(),
  failing_check: z.string().optional(),
  fix_logs: z.string().optional(),
  static_fix_count: z.number().int().nonnegative().default(0),
  fix_cycles: z.number().int().nonnegative().default(0),
  batch_id: z.number().int().optional(),
  branch: z.string().optional(),
  started_at: z.string().optional(),
  updated_at: z.string().optional(),
  completed_at: z.string().optional(),
});

export type TaskState = z.infer<typeof TaskStateSchema>;

export const BatchStateSchema = z.object({
  batch_id: z.number().int(),
  status: BatchStatusSchema,
  tasks: z.array(z.number().int()),
  started_at: z.string(),
  completed_at: z.string().optional(),
});

export type BatchState = z.infer<typeof BatchStateSchema>;

export const FailedTaskSchema = z.object({
  task: z.number().int(),
  reason: z.string(),
  failing_check: z.string().optional(),
  attempts: z.number().int().nonnegative(),
  tokens: z.number().int().nonnegative(),
});

export type FailedTask = z.infer<typeof FailedTaskSchema>;

export const TaskDurationSchema = z.object({
  task: z.number().int(),
  seconds: z.number().nonnegative(),
});

export const RunStateSchema = z.object({
  run_id: z.string(),
  project: z.string(),
  status: RunStatusSchema,
  current_task: z.number().int().nullable().default(null),
  attempt: z.number().int().nonnegative().default(0),
  completed: z.array(z.number().int()).default([]),
  total: z.number().int().nonnegative(),
  failed: z.array(FailedTaskSchema).default([]),
  batches: z.array(BatchStateSchema).default([]),
  task_durations: z.array(TaskDurationSchema).default([]),
  tasks: z.record(TaskStateSchema),
  // Records of tasks that have since been removed from the roadmap.
  orphaned: z.record(TaskStateSchema).default({}),
  started_at: z.string(),
  updated_at: z.string(),
});

export type RunState = z.infer<typeof RunStateSchema>;

export type TaskPatch = Partial<
  Pick<
    TaskState,
    | "phase"
    | "attempt"
    | "tokens"
    | "last_error"
    | "failing_check"
    | "fix_logs"
    | "static_fix_count"
    | "fix_cycles"
    | "batch_id"
    | "branch"
  >
>;

export const FIX_LOG_LIMIT = 3000;

// =============================================================================
// STATUS EDGES
// =============================================================================

const STATUS_TRANSITIONS: Readonly<Record<TaskStatus, readonly TaskStatus[]>> = {
  blocked: ["ready"],
  ready: ["running"],
  running: ["running", "done", "failed"],
  done: [],
  failed: ["abandoned", "ready"],
  abandoned: [],
};

export function canTransitionStatus(from: TaskStatus, to: TaskStatus): boolean {
  return STATUS_TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: TaskStatus): boolean {
  return status === "done" || status === "abandoned";
}

// =============================================================================
// CONSTRUCTION
// =============================================================================

export function createRunState(args: {
  runId: string;
  project: string;
  graph: TaskGraph;
  now?: string;
}): RunState {
  const now = args.now ?? isoNow();
  const state: RunState = {
    run_id: args.runId,
    project: args.project,
    status: "running",
    current_task: null,
    attempt: 0,
    completed: [],
    total: args.graph.ids.length,
    failed: [],
    batches: [],
    task_durations: [],
    tasks: {},
    orphaned: {},
    started_at: now,
    updated_at: now,
  };

  for (const id of args.graph.ids) {
    state.tasks[taskKey(id)] = {
      status: dependencies(args.graph, id).size === 0 ? "ready" : "blocked",
      attempt: 0,
      tokens: 0,
      static_fix_count: 0,
      fix_cycles: 0,
    };
  }

  return state;
}

// =============================================================================
// MUTATOR
// =============================================================================

export function markTask(
  state: RunState,
  taskId: number,
  status: TaskStatus,
  extra: TaskPatch = {},
  now: string = isoNow(),
): TaskState {
  const task = requireTaskState(state, taskId);
  const from = task.status;

  if (!canTransitionStatus(from, status)) {
    throw new InvalidTransitionError(taskId, describe(task), status);
  }

  if (status === "running") {
    const nextPhase = extra.phase;
    if (!nextPhase) {
      throw new InvalidTransitionError(taskId, describe(task), "running:<none>");
    }
    if (from === "ready" && !ENTRY_PHASES.includes(nextPhase)) {
      throw new InvalidTransitionError(taskId, from, `running:${nextPhase}`);
    }
    // Staying in the same phase only updates counters.
    if (from === "running" && task.phase && task.phase !== nextPhase) {
      assertPhaseTransition(taskId, task.phase, nextPhase);
    }
  }

  applyPatch(task, extra);
  task.status = status;
  task.updated_at = now;

  switch (status) {
    case "running":
      if (from === "ready") {
        task.started_at = task.started_at ?? now;
        task.completed_at = undefined;
      }
      state.current_task = taskId;
      state.attempt = task.attempt;
      break;
    case "done":
      task.phase = undefined;
      task.fix_logs = undefined;
      task.completed_at = now;
      if (!state.completed.includes(taskId)) {
        state.completed.push(taskId);
        state.completed.sort((a, b) => a - b);
      }
      recordDuration(state, taskId, task, now);
      clearCurrent(state, taskId);
      break;
    case "failed":
      task.phase = undefined;
      clearCurrent(state, taskId);
      break;
    case "abandoned":
      task.completed_at = now;
      break;
    case "ready":
      // A fresh attempt from build: the per-attempt counters start over.
      task.phase = undefined;
      task.static_fix_count = 0;
      task.fix_cycles = 0;
      task.batch_id = undefined;
      break;
    case "blocked":
      break;
  }

  state.updated_at = now;
  return task;
}

// Operator reset: any status back to ready (dependencies done) or blocked.
export function resetTaskState(
  state: RunState,
  graph: TaskGraph,
  taskId: number,
  now: string = isoNow(),
): TaskState {
  const fresh: TaskState = {
    status: dependenciesDone(state, graph, taskId) ? "ready" : "blocked",
    attempt: 0,
    tokens: 0,
    static_fix_count: 0,
    fix_cycles: 0,
    updated_at: now,
  };
  state.tasks[taskKey(taskId)] = fresh;
  state.completed = state.completed.filter((id) => id !== taskId);
  state.failed = state.failed.filter((entry) => entry.task !== taskId);
  state.task_durations = state.task_durations.filter((entry) => entry.task !== taskId);
  clearCurrent(state, taskId);
  state.updated_at = now;
  return fresh;
}

export function recordFailedTask(state: RunState, entry: FailedTask): void {
  state.failed = [...state.failed.filter((existing) => existing.task !== entry.task), entry];
}

// =============================================================================
// BATCHES
// =============================================================================

export function nextBatchId(state: RunState): number {
  return state.batches.reduce((max, batch) => Math.max(max, batch.batch_id), 0) + 1;
}

export function startBatch(
  state: RunState,
  params: { batchId: number; taskIds: number[]; now?: string },
): BatchState {
  const { batchId, taskIds, now = isoNow() } = params;

  if (taskIds.length === 0) {
    throw new Error("Cannot start an empty batch");
  }
  if (state.batches.some((b) => b.batch_id === batchId)) {
    throw new Error(`Batch ${batchId} already exists in state`);
  }

  const batch: BatchState = {
    batch_id: batchId,
    status: "running",
    tasks: [...taskIds],
    started_at: now,
  };
  state.batches.push(batch);
  return batch;
}

export function completeBatch(
  state: RunState,
  batchId: number,
  status: Exclude<BatchStatus, "running">,
  now: string = isoNow(),
): void {
  const batch = state.batches.find((b) => b.batch_id === batchId);
  if (!batch) {
    throw new Error(`Cannot complete unknown batch ${batchId}`);
  }

  batch.status = status;
  batch.completed_at = now;
}

// =============================================================================
// RECONCILIATION
// =============================================================================

export type ReconcileResult = {
  added: number[];
  orphaned: number[];
  promoted: number[];
  demoted: number[];
};

// Brings a loaded snapshot in line with the current roadmap without touching finished history.
export function reconcileRunState(
  state: RunState,
  graph: TaskGraph,
  now: string = isoNow(),
): ReconcileResult {
  const result: ReconcileResult = { added: [], orphaned: [], promoted: [], demoted: [] };
  const known = new Set(graph.ids);

  for (const [key, task] of Object.entries(state.tasks)) {
    const id = Number(key);
    if (known.has(id)) continue;
    state.orphaned[key] = task;
    delete state.tasks[key];
    result.orphaned.push(id);
  }

  for (const id of graph.ids) {
    if (state.tasks[taskKey(id)]) continue;
    const restored = state.orphaned[taskKey(id)];
    if (restored) {
      state.tasks[taskKey(id)] = restored;
      delete state.orphaned[taskKey(id)];
      continue;
    }
    state.tasks[taskKey(id)] = {
      status: "blocked",
      attempt: 0,
      tokens: 0,
      static_fix_count: 0,
      fix_cycles: 0,
      updated_at: now,
    };
    result.added.push(id);
  }

  // Readiness settles in one pass over the ids in order: dependencies always have lower ids.
  for (const id of graph.ids) {
    const task = requireTaskState(state, id);
    const depsDone = dependenciesDone(state, graph, id);
    if (task.status === "blocked" && depsDone) {
      task.status = "ready";
      task.updated_at = now;
      if (!result.added.includes(id)) result.promoted.push(id);
    } else if (task.status === "ready" && !depsDone) {
      task.status = "blocked";
      task.updated_at = now;
      result.demoted.push(id);
    }
  }

  state.total = graph.ids.length;
  state.completed = graph.ids.filter((id) => state.tasks[taskKey(id)]?.status === "done");
  state.failed = state.failed.filter((entry) => known.has(entry.task));
  if (state.current_task !== null && !known.has(state.current_task)) {
    state.current_task = null;
  }

  return result;
}

// =============================================================================
// QUERIES
// =============================================================================

export function taskKey(id: number): string {
  return String(id);
}

export function getTaskState(state: RunState, taskId: number): TaskState | undefined {
  return state.tasks[taskKey(taskId)];
}

export function requireTaskState(state: RunState, taskId: number): TaskState {
  const task = state.tasks[taskKey(taskId)];
  if (!task) {
    throw new Error(`Unknown task in state: ${taskId}`);
  }
  return task;
}

export function dependenciesDone(state: RunState, graph: TaskGraph, taskId: number): boolean {
  for (const dep of dependencies(graph, taskId)) {
    if (state.tasks[taskKey(dep)]?.status !== "done") return false;
  }
  return true;
}

export function tasksWithStatus(state: RunState, status: TaskStatus): number[] {
  return Object.entries(state.tasks)
    .filter(([, task]) => task.status === status)
    .map(([key]) => Number(key))
    .sort((a, b) => a - b);
}

export function trimFixLogs(output: string): string {
  return tail(output, FIX_LOG_LIMIT);
}

// =============================================================================
// INTERNALS
// =============================================================================

function applyPatch(task: TaskState, patch: TaskPatch): void {
  if (patch.phase !== undefined) task.phase = patch.phase;
  if (patch.attempt !== undefined) task.attempt = patch.attempt;
  if (patch.tokens !== undefined) task.tokens = patch.tokens;
  if (patch.last_error !== undefined) task.last_error = patch.last_error;
  if (patch.failing_check !== undefined) task.failing_check = patch.failing_check;
  if (patch.fix_logs !== undefined) task.fix_logs = trimFixLogs(patch.fix_logs);
  if (patch.static_fix_count !== undefined) task.static_fix_count = patch.static_fix_count;
  if (patch.fix_cycles !== undefined) task.fix_cycles = patch.fix_cycles;
  if (patch.batch_id !== undefined) task.batch_id = patch.batch_id;
  if (patch.branch !== undefined) task.branch = patch.branch;
}

function describe(task: TaskState): string {
  return task.status === "running" && task.phase ? `running:${task.phase}` : task.status;
}

function recordDuration(state: RunState, taskId: number, task: TaskState, now: string): void {
  if (!task.started_at) return;
  const elapsedMs = Date.parse(now) - Date.parse(task.started_at);
  if (!Number.isFinite(elapsedMs)) return;
  state.task_durations.push({ task: taskId, seconds: Math.max(0, Math.round(elapsedMs / 100) / 10) });
}

function clearCurrent(state: RunState, taskId: number): void {
  if (state.current_task === taskId) {
    state.current_task = null;
    state.attempt = 0;
  }
}
