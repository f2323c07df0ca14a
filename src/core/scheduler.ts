import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import type { RoadmapTask } from "./roadmap-schema.js";
import { dependenciesDone, getTaskState, type RunState } from "./state.js";
import { dependencies, dependencyKey, requireTask, type TaskGraph } from "./task-graph.js";

export type BatchPlan = {
  tasks: number[];
  // Lowest id; batch-level phases run with this task as context.
  lead: number;
  // Why the batch holds a single task, when it was forced to.
  solo?: SoloReason;
};

export type SoloReason = "root" | "milestone" | "review";

export type DispatchOptions = {
  isReviewGated?: (task: RoadmapTask) => boolean;
};

const SCHEDULER_PLACEMENT_TITLE = "Scheduler placement failed.";
const SCHEDULER_PLACEMENT_HINT = "Set max_parallel_agents (or --max-parallel) to 1 or more.";

// =============================================================================
// READINESS
// =============================================================================

export function readySet(graph: TaskGraph, state: RunState): number[] {
  return graph.ids.filter((id) => {
    const status = getTaskState(state, id)?.status;
    if (status !== "blocked" && status !== "ready") return false;
    return dependenciesDone(state, graph, id);
  });
}

// =============================================================================
// DISPATCH
// =============================================================================

export function dispatch(
  ready: number[],
  maxParallel: number,
  graph: TaskGraph,
  opts: DispatchOptions = {},
): BatchPlan[] {
  assertMaxParallel(maxParallel);

  const batches: BatchPlan[] = [];
  const groups = new Map<string, number[]>();

  for (const id of sortByTaskId(ready)) {
    const solo = soloReason(graph, id, opts);
    if (solo || maxParallel <= 1) {
      batches.push({ tasks: [id], lead: id, ...(solo ? { solo } : {}) });
      continue;
    }

    const key = dependencyKey(graph, id);
    const group = groups.get(key) ?? [];
    group.push(id);
    groups.set(key, group);
  }

  for (const group of groups.values()) {
    for (let start = 0; start < group.length; start += maxParallel) {
      const chunk = group.slice(start, start + maxParallel);
      const lead = chunk[0];
      if (lead === undefined) continue;
      batches.push({ tasks: chunk, lead });
    }
  }

  return batches.sort((a, b) => a.lead - b.lead);
}

export function soloReason(
  graph: TaskGraph,
  id: number,
  opts: DispatchOptions = {},
): SoloReason | undefined {
  const task = requireTask(graph, id);
  if (task.agent === "milestone") return "milestone";
  if (dependencies(graph, id).size === 0) return "root";
  if (opts.isReviewGated?.(task)) return "review";
  return undefined;
}

// =============================================================================
// INTERNALS
// =============================================================================

function sortByTaskId(ids: number[]): number[] {
  return [...ids].sort((a, b) => a - b);
}

function assertMaxParallel(maxParallel: number): void {
  if (!Number.isInteger(maxParallel) || maxParallel < 1) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.task,
      title: SCHEDULER_PLACEMENT_TITLE,
      message: `maxParallel must be at least 1 (received ${maxParallel}).`,
      hint: SCHEDULER_PLACEMENT_HINT,
    });
  }
}
