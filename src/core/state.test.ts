import { describe, expect, it } from "vitest";

import { makeTask } from "../__tests__/helpers/roadmap-fixtures.js";

import { InvalidTransitionError } from "./errors.js";
import {
  completeBatch,
  createRunState,
  markTask,
  nextBatchId,
  reconcileRunState,
  recordFailedTask,
  requireTaskState,
  resetTaskState,
  startBatch,
  tasksWithStatus,
} from "./state.js";
import { buildTaskGraph } from "./task-graph.js";

const T0 = "2026-03-01T10:00:00.000Z";
const T1 = "2026-03-01T10:02:10.000Z";

// 1 -> {2, 3}; 3 -> 4
const graph = buildTaskGraph([
  makeTask(1, []),
  makeTask(2, [1]),
  makeTask(3, [1]),
  makeTask(4, [3]),
]);

function freshState() {
  return createRunState({ runId: "run-1", project: "demo", graph, now: T0 });
}

describe("createRunState", () => {
  it("marks the root ready and everything else blocked", () => {
    const state = freshState();

    expect(state.total).toBe(4);
    expect(state.status).toBe("running");
    expect(tasksWithStatus(state, "ready")).toEqual([1]);
    expect(tasksWithStatus(state, "blocked")).toEqual([2, 3, 4]);
  });
});

describe("markTask", () => {
  it("walks the happy path and records completion", () => {
    const state = freshState();

    markTask(state, 1, "running", { phase: "build", attempt: 1 }, T0);
    expect(state.current_task).toBe(1);
    expect(state.attempt).toBe(1);

    for (const phase of ["deps", "test", "static", "document", "commit", "notify"] as const) {
      markTask(state, 1, "running", { phase }, T0);
    }
    const task = markTask(state, 1, "done", {}, T1);

    expect(task.status).toBe("done");
    expect(task.phase).toBeUndefined();
    expect(task.completed_at).toBe(T1);
    expect(state.completed).toEqual([1]);
    expect(state.current_task).toBeNull();
    expect(state.task_durations).toEqual([{ task: 1, seconds: 130 }]);
  });

  it("rejects illegal status edges", () => {
    const state = freshState();

    expect(() => markTask(state, 2, "running", { phase: "build" })).toThrow(InvalidTransitionError);
    expect(() => markTask(state, 1, "done")).toThrow("Task 1: illegal transition ready -> done");
  });

  it("rejects phase edges outside the transition table", () => {
    const state = freshState();
    markTask(state, 1, "running", { phase: "build", attempt: 1 });

    expect(() => markTask(state, 1, "running", { phase: "commit" })).toThrow(
      "Task 1: illegal transition running:build -> running:commit",
    );
    expect(requireTaskState(state, 1).phase).toBe("build");
  });

  it("updates counters without leaving the current phase", () => {
    const state = freshState();
    markTask(state, 1, "running", { phase: "build", attempt: 1 });

    markTask(state, 1, "running", { phase: "build", tokens: 150 });

    expect(requireTaskState(state, 1)).toMatchObject({ phase: "build", attempt: 1, tokens: 150 });
  });

  it("only enters a run at build or review", () => {
    const state = freshState();
    expect(() => markTask(state, 1, "running", { phase: "test" })).toThrow(InvalidTransitionError);
    expect(() => markTask(state, 1, "running", {})).toThrow("running:<none>");
  });

  it("loops through fix and back to deps", () => {
    const state = freshState();
    markTask(state, 1, "running", { phase: "build", attempt: 1 });
    markTask(state, 1, "running", { phase: "deps" });
    markTask(state, 1, "running", { phase: "test" });
    markTask(state, 1, "running", { phase: "fix", attempt: 2, fix_logs: "x".repeat(5000) });
    markTask(state, 1, "running", { phase: "deps" });

    const task = requireTaskState(state, 1);
    expect(task.phase).toBe("deps");
    expect(task.attempt).toBe(2);
    expect(task.fix_logs).toHaveLength(3000);
  });

  it("resets per-attempt counters on failed -> ready", () => {
    const state = freshState();
    markTask(state, 1, "running", { phase: "build", attempt: 1, batch_id: 1 });
    markTask(state, 1, "running", { phase: "deps" });
    markTask(state, 1, "running", { phase: "test" });
    markTask(state, 1, "running", { phase: "static" });
    markTask(state, 1, "running", { phase: "static_fix", static_fix_count: 2 });
    markTask(state, 1, "failed", { last_error: "lint still failing", failing_check: "static" });

    const task = markTask(state, 1, "ready");

    expect(task.static_fix_count).toBe(0);
    expect(task.fix_cycles).toBe(0);
    expect(task.batch_id).toBeUndefined();
    expect(task.last_error).toBe("lint still failing");
    expect(task.attempt).toBe(1);
  });

  it("treats done and abandoned as terminal", () => {
    const state = freshState();
    markTask(state, 1, "running", { phase: "build", attempt: 1 });
    markTask(state, 1, "failed");
    markTask(state, 1, "abandoned");

    expect(() => markTask(state, 1, "ready")).toThrow(InvalidTransitionError);
  });
});

describe("resetTaskState", () => {
  it("returns an abandoned task to ready and clears its history", () => {
    const state = freshState();
    markTask(state, 1, "running", { phase: "build", attempt: 3, tokens: 900 });
    markTask(state, 1, "failed");
    markTask(state, 1, "abandoned");
    recordFailedTask(state, { task: 1, reason: "tests failing", attempts: 3, tokens: 900 });

    const task = resetTaskState(state, graph, 1);

    expect(task.status).toBe("ready");
    expect(task.attempt).toBe(0);
    expect(task.tokens).toBe(0);
    expect(state.failed).toEqual([]);
  });

  it("puts a task with unfinished dependencies back to blocked", () => {
    const state = freshState();
    expect(resetTaskState(state, graph, 4).status).toBe("blocked");
  });
});

describe("batches", () => {
  it("allocates increasing ids and completes batches", () => {
    const state = freshState();
    expect(nextBatchId(state)).toBe(1);

    startBatch(state, { batchId: 1, taskIds: [2, 3], now: T0 });
    expect(nextBatchId(state)).toBe(2);
    expect(() => startBatch(state, { batchId: 1, taskIds: [4] })).toThrow("Batch 1 already exists");

    completeBatch(state, 1, "complete", T1);
    expect(state.batches).toEqual([
      { batch_id: 1, status: "complete", tasks: [2, 3], started_at: T0, completed_at: T1 },
    ]);
  });
});

describe("reconcileRunState", () => {
  it("promotes blocked tasks whose dependencies are done", () => {
    const state = freshState();
    requireTaskState(state, 1).status = "done";

    const result = reconcileRunState(state, graph);

    expect(result.promoted).toEqual([2, 3]);
    expect(tasksWithStatus(state, "ready")).toEqual([2, 3]);
    expect(state.completed).toEqual([1]);
  });

  it("adds new tasks and keeps removed ones as orphaned", () => {
    const state = freshState();
    requireTaskState(state, 1).status = "done";
    requireTaskState(state, 4).status = "done";

    const edited = buildTaskGraph([makeTask(1, []), makeTask(2, [1]), makeTask(3, [1]), makeTask(5, [1])]);
    const result = reconcileRunState(state, edited);

    expect(result.added).toEqual([5]);
    expect(result.orphaned).toEqual([4]);
    expect(state.orphaned["4"]?.status).toBe("done");
    expect(requireTaskState(state, 5).status).toBe("ready");
    expect(requireTaskState(state, 1).status).toBe("done");
    expect(state.total).toBe(4);
  });

  it("keeps running tasks at their recorded phase", () => {
    const state = freshState();
    markTask(state, 1, "running", { phase: "build", attempt: 1 });
    markTask(state, 1, "running", { phase: "deps" });
    markTask(state, 1, "running", { phase: "test" });

    reconcileRunState(state, graph);

    expect(requireTaskState(state, 1)).toMatchObject({ status: "running", phase: "test" });
  });

  it("demotes ready tasks whose dependency was reset", () => {
    const state = freshState();
    requireTaskState(state, 1).status = "done";
    reconcileRunState(state, graph);
    requireTaskState(state, 1).status = "ready";

    const result = reconcileRunState(state, graph);

    expect(result.demoted).toEqual([2, 3]);
    expect(tasksWithStatus(state, "blocked")).toEqual([2, 3, 4]);
  });
});
