import { describe, expect, it } from "vitest";

import type { RunStatusSummary } from "../core/state-store.js";

import { formatRunSummaryLines, formatTaskTable } from "./status.js";

function buildSummary(overrides: Partial<RunStatusSummary> = {}): RunStatusSummary {
  return {
    runId: "run-1",
    project: "demo",
    status: "complete",
    startedAt: "2026-03-15T12:00:00.000Z",
    updatedAt: "2026-03-15T12:05:00.000Z",
    currentTask: null,
    totalTokens: 12_500,
    estimatedCost: 0.4,
    taskCounts: { total: 3, blocked: 0, ready: 0, running: 0, done: 2, failed: 0, abandoned: 1 },
    batchCounts: { total: 3, running: 0, complete: 2, failed: 1 },
    tasks: [],
    abandoned: [],
    topSpenders: [],
    orphaned: [],
    ...overrides,
  };
}

describe("formatRunSummaryLines", () => {
  it("prints counts, tokens, cost and elapsed time", () => {
    expect(formatRunSummaryLines(buildSummary(), { elapsedMs: 130_000 })).toEqual([
      "Run: run-1 (demo)",
      "Status: complete",
      "Tasks: 2 done, 0 failed, 1 abandoned (3 total)",
      "Tokens: 12.5K  Cost: $0.40",
      "Elapsed: 2m 10s",
    ]);
  });

  it("lists abandoned tasks with their failing check and last error", () => {
    const lines = formatRunSummaryLines(
      buildSummary({
        abandoned: [
          { id: 2, lastError: "tests failed (exit 1)", failingCheck: "test", attempts: 3 },
          { id: 7, lastError: null, failingCheck: null, attempts: 1 },
        ],
        topSpenders: [{ id: 2, tokens: 3_200_000 }],
        orphaned: [9],
      }),
    );

    expect(lines.slice(4)).toEqual([
      "Abandoned:",
      "  002 [test]: tests failed (exit 1)",
      "  007: (no error recorded)",
      "Top spenders: 002 3.2M",
      "Orphaned (no longer in the roadmap): 009",
    ]);
  });
});

describe("formatTaskTable", () => {
  it("pads columns to the widest cell", () => {
    const lines = formatTaskTable([
      { id: 1, status: "done", phase: null, attempt: 1, tokens: 950, branch: null },
      { id: 12, status: "running", phase: "static_fix", attempt: 2, tokens: 1500, branch: "feature/012-x" },
    ]);

    expect(lines).toEqual([
      "ID   Status   Phase       Attempt  Tokens",
      "001  done     -           1        950",
      "012  running  static_fix  2        1.5K",
    ]);
  });
});
