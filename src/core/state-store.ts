import fse from "fs-extra";

import { PersistenceError } from "./errors.js";
import type { PathsContext } from "./paths.js";
import { runStatePath } from "./paths.js";
import {
  RunStateSchema,
  createRunState,
  reconcileRunState,
  type BatchState,
  type ReconcileResult,
  type RunState,
  type RunStatus,
  type TaskState,
  type TaskStatus,
} from "./state.js";
import type { TaskGraph } from "./task-graph.js";
import { isoNow, writeJsonFileAtomic } from "./utils.js";

export type TaskStatusCounts = Record<TaskStatus, number> & { total: number };

export type BatchStatusCounts = {
  total: number;
  running: number;
  complete: number;
  failed: number;
};

export type TaskStatusRow = {
  id: number;
  status: TaskStatus;
  phase: string | null;
  attempt: number;
  tokens: number;
  branch: string | null;
};

export type AbandonedRow = {
  id: number;
  lastError: string | null;
  failingCheck: string | null;
  attempts: number;
};

export type TaskSpendRow = {
  id: number;
  tokens: number;
};

export type RunStatusSummary = {
  runId: string;
  project: string;
  status: RunStatus;
  startedAt: string;
  updatedAt: string;
  currentTask: number | null;
  totalTokens: number;
  estimatedCost: number;
  taskCounts: TaskStatusCounts;
  batchCounts: BatchStatusCounts;
  tasks: TaskStatusRow[];
  abandoned: AbandonedRow[];
  topSpenders: TaskSpendRow[];
  orphaned: number[];
};

export type OpenedRunState = {
  state: RunState;
  resumed: boolean;
  reconcile: ReconcileResult;
};

export class StateStore {
  private readonly statePathValue: string;

  constructor(
    public readonly projectName: string,
    pathsOrStatePath: PathsContext | string,
  ) {
    this.statePathValue =
      typeof pathsOrStatePath === "string"
        ? pathsOrStatePath
        : runStatePath(projectName, pathsOrStatePath);
  }

  get statePath(): string {
    return this.statePathValue;
  }

  async exists(): Promise<boolean> {
    return fse.pathExists(this.statePathValue);
  }

  async load(): Promise<RunState | null> {
    if (!(await this.exists())) return null;
    return loadRunState(this.statePathValue);
  }

  // Resumes the persisted run when there is one, otherwise starts a fresh snapshot.
  async open(args: { graph: TaskGraph; runId: string }): Promise<OpenedRunState> {
    const existing = await this.load();
    if (existing) {
      const reconcile = reconcileRunState(existing, args.graph);
      return { state: existing, resumed: true, reconcile };
    }

    const state = createRunState({ runId: args.runId, project: this.projectName, graph: args.graph });
    return { state, resumed: false, reconcile: { added: [], orphaned: [], promoted: [], demoted: [] } };
  }

  async save(state: RunState): Promise<void> {
    await saveRunState(this.statePathValue, state);
  }
}

export async function loadRunState(statePath: string): Promise<RunState> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fse.readFile(statePath, "utf8"));
  } catch (err) {
    throw new PersistenceError(`Failed to read run state at ${statePath}`, statePath, err);
  }

  const parsed = RunStateSchema.safeParse(raw);
  if (!parsed.success) {
    throw new PersistenceError(
      `Invalid run state at ${statePath}: ${parsed.error.issues[0]?.message ?? "unknown issue"}`,
      statePath,
      parsed.error,
    );
  }

  return parsed.data;
}

export async function saveRunState(statePath: string, state: RunState): Promise<void> {
  const parsed = RunStateSchema.safeParse(state);
  if (!parsed.success) {
    throw new PersistenceError(
      `Cannot save run state: ${parsed.error.issues[0]?.message ?? "unknown issue"}`,
      statePath,
      parsed.error,
    );
  }

  const normalized: RunState = { ...parsed.data, updated_at: isoNow() };
  Object.assign(state, normalized);

  try {
    await writeJsonFileAtomic(statePath, normalized);
  } catch (err) {
    throw new PersistenceError(`Failed to write run state at ${statePath}`, statePath, err);
  }
}

// =============================================================================
// SUMMARY
// =============================================================================

export function summarizeRunState(
  state: RunState,
  opts: { estimatedCost?: number } = {},
): RunStatusSummary {
  const tasks = Object.entries(state.tasks).map(([key, task]) => ({ id: Number(key), task }));
  tasks.sort((a, b) => a.id - b.id);

  return {
    runId: state.run_id,
    project: state.project,
    status: state.status,
    startedAt: state.started_at,
    updatedAt: state.updated_at,
    currentTask: state.current_task,
    totalTokens: tasks.reduce((sum, row) => sum + row.task.tokens, 0),
    estimatedCost: opts.estimatedCost ?? 0,
    taskCounts: summarizeTaskStatuses(tasks.map((row) => row.task)),
    batchCounts: summarizeBatchStatuses(state.batches),
    tasks: tasks.map(({ id, task }) => ({
      id,
      status: task.status,
      phase: task.phase ?? null,
      attempt: task.attempt,
      tokens: task.tokens,
      branch: task.branch ?? null,
    })),
    abandoned: buildAbandonedRows(state, tasks),
    topSpenders: buildTopSpenders(tasks),
    orphaned: Object.keys(state.orphaned)
      .map(Number)
      .sort((a, b) => a - b),
  };
}

function summarizeTaskStatuses(tasks: TaskState[]): TaskStatusCounts {
  const counts: TaskStatusCounts = {
    total: tasks.length,
    blocked: 0,
    ready: 0,
    running: 0,
    done: 0,
    failed: 0,
    abandoned: 0,
  };

  for (const task of tasks) {
    counts[task.status] += 1;
  }

  return counts;
}

function summarizeBatchStatuses(batches: BatchState[]): BatchStatusCounts {
  const counts: BatchStatusCounts = { total: batches.length, running: 0, complete: 0, failed: 0 };
  for (const batch of batches) {
    counts[batch.status] += 1;
  }
  return counts;
}

function buildAbandonedRows(
  state: RunState,
  tasks: Array<{ id: number; task: TaskState }>,
): AbandonedRow[] {
  return tasks
    .filter(({ task }) => task.status === "abandoned")
    .map(({ id, task }) => {
      const failure = state.failed.find((entry) => entry.task === id);
      return {
        id,
        lastError: task.last_error ?? failure?.reason ?? null,
        failingCheck: failure?.failing_check ?? task.failing_check ?? null,
        attempts: failure?.attempts ?? task.attempt,
      };
    });
}

function buildTopSpenders(tasks: Array<{ id: number; task: TaskState }>, limit = 5): TaskSpendRow[] {
  return tasks
    .map(({ id, task }) => ({ id, tokens: task.tokens }))
    .filter((row) => row.tokens > 0)
    .sort((a, b) => b.tokens - a.tokens || a.id - b.id)
    .slice(0, limit);
}
