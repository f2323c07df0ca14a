import path from "node:path";

import { describe, expect, it } from "vitest";

import { getTaskState } from "../../../core/state.js";
import { taskEntry } from "../../../__tests__/helpers/roadmap-fixtures.js";

import { createRunHarness, eventsOfType, registerRunEngineTestHooks } from "./run-engine.test-kit.js";

registerRunEngineTestHooks();

describe("runEngine deploy and notify", () => {
  it("deploys only tasks marked deploy, with the roadmap env", async () => {
    const harness = await createRunHarness({
      document: {
        deploy: { enabled: true, env: { region: "eu" } },
        tasks: [taskEntry(1, [], { deploy: true }), taskEntry(2, [1])],
      },
    });

    const result = await harness.run();

    expect(result.exitCode).toBe(0);
    expect(harness.deploy.calls).toEqual([
      { script: path.join("scripts", "deploy.sh"), cwd: harness.projectDir, env: { DEPLOY_REGION: "eu" } },
    ]);

    const events = await harness.readLogEvents();
    expect(eventsOfType(events, "deploy.complete")).toEqual([
      expect.objectContaining({ task_id: "1", script: path.join("scripts", "deploy.sh") }),
    ]);
    expect(eventsOfType(events, "deploy.skip")).toEqual([
      expect.objectContaining({ task_id: "2", reason: "task is not marked deploy" }),
    ]);
  });

  it("logs a failing deploy script and still completes the task", async () => {
    const harness = await createRunHarness({
      document: {
        deploy: { enabled: true, script: "bin/ship.sh" },
        tasks: [taskEntry(1, [], { deploy: true })],
      },
    });
    harness.deploy.exitCode = 3;

    const result = await harness.run();

    expect(result.exitCode).toBe(0);
    expect(getTaskState(await harness.loadState(), 1)?.status).toBe("done");

    const events = await harness.readLogEvents();
    expect(eventsOfType(events, "deploy.error")).toEqual([
      expect.objectContaining({
        task_id: "1",
        error: "DeployHookFailure",
        message: "Deploy script bin/ship.sh exited with code 3",
        exit_code: 3,
      }),
    ]);
  });

  it("keeps going when a notification fails", async () => {
    const harness = await createRunHarness({ document: { tasks: [taskEntry(1, [])] } });
    harness.notifier.failWith = new Error("webhook down");

    const result = await harness.run();

    expect(result.exitCode).toBe(0);
    expect(result.status).toBe("complete");

    const events = await harness.readLogEvents();
    expect(eventsOfType(events, "notify.error")).toEqual([
      expect.objectContaining({ task_id: "1", event: "task_complete", message: "webhook down" }),
      expect.objectContaining({ event: "pipeline_done", message: "webhook down" }),
    ]);
  });

  it("sends the task's total tokens with task_complete", async () => {
    const harness = await createRunHarness({ document: { tasks: [taskEntry(1, [])] } });

    await harness.run();

    expect(harness.notifier.events[0]).toEqual({
      event: "task_complete",
      project: "demo",
      status: "done",
      task: 1,
      total_tokens: 300,
      details: { title: "Task 1" },
    });
  });
});
