import { describe, expect, it } from "vitest";

import { makeTask } from "../__tests__/helpers/roadmap-fixtures.js";

import { UserFacingError } from "./errors.js";
import { dispatch, readySet, soloReason } from "./scheduler.js";
import { createRunState, requireTaskState } from "./state.js";
import { buildTaskGraph } from "./task-graph.js";

// A -> {B, C}; {B, C} -> D
const graph = buildTaskGraph([
  makeTask(1, []),
  makeTask(2, [1]),
  makeTask(3, [1]),
  makeTask(4, [2, 3]),
]);

function stateWithDone(done: number[]) {
  const state = createRunState({ runId: "run-1", project: "demo", graph });
  for (const id of done) {
    requireTaskState(state, id).status = "done";
  }
  return state;
}

describe("readySet", () => {
  it("starts with the root only", () => {
    expect(readySet(graph, stateWithDone([]))).toEqual([1]);
  });

  it("includes blocked tasks whose dependencies are all done", () => {
    expect(readySet(graph, stateWithDone([1]))).toEqual([2, 3]);
  });

  it("excludes tasks with an unfinished dependency", () => {
    expect(readySet(graph, stateWithDone([1, 2]))).toEqual([3]);
  });

  it("excludes running, failed and terminal tasks", () => {
    const state = stateWithDone([1]);
    requireTaskState(state, 2).status = "running";
    requireTaskState(state, 3).status = "abandoned";

    expect(readySet(graph, state)).toEqual([]);
  });
});

describe("dispatch", () => {
  it("batches siblings that share a dependency set", () => {
    expect(dispatch([2, 3], 2, graph)).toEqual([{ tasks: [2, 3], lead: 2 }]);
  });

  it("keeps the root alone", () => {
    expect(dispatch([1], 4, graph)).toEqual([{ tasks: [1], lead: 1, solo: "root" }]);
  });

  it("runs one task per batch when parallelism is 1", () => {
    expect(dispatch([3, 2], 1, graph)).toEqual([
      { tasks: [2], lead: 2 },
      { tasks: [3], lead: 3 },
    ]);
  });

  it("chunks a group by maxParallel", () => {
    const wide = buildTaskGraph([
      makeTask(1, []),
      makeTask(2, [1]),
      makeTask(3, [1]),
      makeTask(4, [1]),
    ]);

    expect(dispatch([2, 3, 4], 2, wide)).toEqual([
      { tasks: [2, 3], lead: 2 },
      { tasks: [4], lead: 4 },
    ]);
  });

  it("separates tasks with different dependency sets", () => {
    const mixed = buildTaskGraph([
      makeTask(1, []),
      makeTask(2, [1]),
      makeTask(3, [1, 2]),
      makeTask(4, [1]),
      makeTask(5, [1, 2]),
    ]);

    expect(dispatch([3, 4, 5], 3, mixed)).toEqual([
      { tasks: [3, 5], lead: 3 },
      { tasks: [4], lead: 4 },
    ]);
  });

  it("isolates milestones and review-gated tasks", () => {
    const gated = buildTaskGraph([
      makeTask(1, []),
      makeTask(2, [1], { agent: "milestone", outputs: [], acceptance: "" }),
      makeTask(3, [1], { review: true }),
      makeTask(4, [1]),
      makeTask(5, [1]),
    ]);

    const batches = dispatch([2, 3, 4, 5], 4, gated, {
      isReviewGated: (task) => task.review === true,
    });

    expect(batches).toEqual([
      { tasks: [2], lead: 2, solo: "milestone" },
      { tasks: [3], lead: 3, solo: "review" },
      { tasks: [4, 5], lead: 4 },
    ]);
  });

  it("rejects a parallelism below 1", () => {
    expect(() => dispatch([2], 0, graph)).toThrow(UserFacingError);
  });
});

describe("soloReason", () => {
  it("is undefined for ordinary tasks", () => {
    expect(soloReason(graph, 4)).toBeUndefined();
  });
});
