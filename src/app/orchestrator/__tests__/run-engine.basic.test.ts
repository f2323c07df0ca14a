import path from "node:path";

import fse from "fs-extra";
import { describe, expect, it } from "vitest";

import { getTaskState } from "../../../core/state.js";
import { taskEntry } from "../../../__tests__/helpers/roadmap-fixtures.js";

import { createRunHarness, eventsOfType, registerRunEngineTestHooks } from "./run-engine.test-kit.js";

registerRunEngineTestHooks();

describe("runEngine", () => {
  it("runs a single task through build, checks and document", async () => {
    const harness = await createRunHarness({ document: { tasks: [taskEntry(1, [])] } });

    const result = await harness.run();

    expect(result.exitCode).toBe(0);
    expect(result.status).toBe("complete");
    expect(harness.agent.phases()).toEqual(["build:1", "document:1"]);
    expect(harness.commands.commands()).toEqual(["fake-install", "fake-test", "fake-lint"]);
    expect(harness.commands.calls.every((call) => call.cwd === harness.projectDir)).toBe(true);
    expect(harness.notifier.names()).toEqual(["task_complete:1", "pipeline_done"]);

    const state = await harness.loadState();
    expect(getTaskState(state, 1)).toMatchObject({ status: "done", attempt: 1, tokens: 300 });
    expect(getTaskState(state, 1)?.phase).toBeUndefined();
    expect(state.batches).toEqual([
      expect.objectContaining({ batch_id: 1, status: "complete", tasks: [1] }),
    ]);

    const events = await harness.readLogEvents();
    expect(eventsOfType(events, "run.start")).toHaveLength(1);
    expect(eventsOfType(events, "task.complete")).toEqual([
      expect.objectContaining({ task_id: "1", tokens: 300 }),
    ]);
    expect(eventsOfType(events, "run.complete")).toEqual([expect.objectContaining({ status: "complete" })]);
  });

  it("passes project context and the preamble to the agent", async () => {
    const harness = await createRunHarness({
      document: { preamble: "Use strict mode.", tasks: [taskEntry(1, [])] },
    });

    await harness.run();

    const build = harness.agent.calls[0];
    expect(build?.phase).toBe("build");
    expect(build?.project).toBe("demo");
    expect(build?.attempt).toBe(1);
    expect(build?.context).toMatchObject({
      projectDir: harness.projectDir,
      preamble: "Use strict mode.",
      ecosystem: "node",
    });
    expect(build?.context.fixLogs).toBeUndefined();
  });

  it("builds siblings of one layer together and commits each on its own branch", async () => {
    const harness = await createRunHarness({
      document: {
        git: { enabled: true },
        tasks: [taskEntry(1, []), taskEntry(2, [1]), taskEntry(3, [1])],
      },
      budget: { max_parallel_agents: 2 },
    });

    const result = await harness.run();

    expect(result.exitCode).toBe(0);
    expect(harness.agent.phases()).toEqual(["build:1", "document:1", "build:2", "build:3", "document:2"]);
    expect(harness.git.tags).toEqual(["task-001", "task-002", "task-003"]);
    expect(harness.git.calls).toEqual([
      "init",
      "add .",
      "commit chore: initial project scaffold (allow-empty)",
      "branch -M main",
      "checkout -b develop",
      "checkout -b feature/001-task-1 develop",
      "add .",
      "commit feat: 001 - Task 1 (allow-empty)",
      "checkout develop",
      "merge --no-ff feature/001-task-1",
      "branch -d feature/001-task-1",
      "tag task-001",
      "checkout -b feature/002-task-2 develop",
      "add src/task-2.ts",
      "commit feat: 002 - Task 2 (allow-empty)",
      "checkout develop",
      "merge --no-ff feature/002-task-2",
      "branch -d feature/002-task-2",
      "tag task-002",
      "checkout -b feature/003-task-3 develop",
      "add .",
      "commit feat: 003 - Task 3 (allow-empty)",
      "checkout develop",
      "merge --no-ff feature/003-task-3",
      "branch -d feature/003-task-3",
      "tag task-003",
    ]);

    const state = await harness.loadState();
    expect(state.batches.map((batch) => batch.tasks)).toEqual([[1], [2, 3]]);
    expect(getTaskState(state, 2)).toMatchObject({ status: "done", tokens: 300 });
    expect(getTaskState(state, 3)).toMatchObject({ status: "done", tokens: 150 });

    const events = await harness.readLogEvents();
    expect(eventsOfType(events, "git.init")).toEqual([
      expect.objectContaining({ initialized: true, created_develop: true }),
    ]);
    expect(eventsOfType(events, "batch.start").map((event) => event["solo"])).toEqual(["root", null]);
  });

  it("writes the project .gitignore when it creates the repository", async () => {
    const harness = await createRunHarness({
      document: { git: { enabled: true }, tasks: [taskEntry(1, [])] },
    });

    await harness.run();

    const gitignore = await fse.readFile(path.join(harness.projectDir, ".gitignore"), "utf8");
    expect(gitignore.split("\n")).toContain(".waypoint/");
  });

  it("tags a milestone with its version after its review", async () => {
    const harness = await createRunHarness({
      document: {
        git: { enabled: true },
        tasks: [
          taskEntry(1, []),
          { id: 2, title: "Release", agent: "milestone", version: "1.0.0", depends_on: [1] },
        ],
      },
    });

    const result = await harness.run();

    expect(result.exitCode).toBe(0);
    expect(harness.agent.phases()).toEqual(["build:1", "document:1", "review:2"]);
    expect(harness.git.tags).toEqual(["task-001", "v1.0.0"]);
    expect(harness.git.calls.slice(-3)).toEqual(["add .", "commit milestone: v1.0.0 (allow-empty)", "tag v1.0.0"]);

    const state = await harness.loadState();
    expect(getTaskState(state, 2)).toMatchObject({ status: "done", attempt: 1 });
  });

  it("runs the coverage check when the roadmap sets a minimum", async () => {
    const harness = await createRunHarness({
      document: { min_coverage: 80, tasks: [taskEntry(1, [])] },
    });
    harness.commands.queueResult("fake-coverage", { output: "TOTAL    120     10    91.5%" });

    const result = await harness.run();

    expect(result.exitCode).toBe(0);
    expect(harness.commands.commands()).toEqual(["fake-install", "fake-test", "fake-coverage", "fake-lint"]);
  });
});
