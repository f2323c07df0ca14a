import { describe, expect, it } from "vitest";

import type { NotifyEvent } from "../app/orchestrator/ports.js";

import { WebhookNotifier, buildWebhookPayload } from "./webhook-notifier.js";

type RecordedRequest = { url: string; init: RequestInit | undefined };

function recordingFetch(status: number, calls: RecordedRequest[]): typeof fetch {
  return async (input, init) => {
    calls.push({ url: String(input), init });
    return new Response(null, { status });
  };
}

const completeEvent: NotifyEvent = {
  event: "task_complete",
  project: "demo",
  status: "ok",
  task: 3,
  total_tokens: 4200,
  details: { title: "Task 3" },
};

describe("buildWebhookPayload", () => {
  it("flattens details into the envelope", () => {
    expect(buildWebhookPayload(completeEvent)).toEqual({
      event: "task_complete",
      project: "demo",
      status: "ok",
      task: 3,
      title: "Task 3",
      total_tokens: 4200,
    });
  });

  it("keeps the envelope fields when details reuse their names", () => {
    const payload = buildWebhookPayload({
      ...completeEvent,
      details: { title: "Task 3", status: "shadow", event: "other", project: "elsewhere", total_tokens: 1, task: 9 },
    });

    expect(payload).toEqual({
      event: "task_complete",
      project: "demo",
      status: "ok",
      task: 3,
      title: "Task 3",
      total_tokens: 4200,
    });
  });

  it("omits the task for run-level events", () => {
    expect(
      buildWebhookPayload({ event: "pipeline_done", project: "demo", status: "complete", total_tokens: 0 }),
    ).toEqual({ event: "pipeline_done", project: "demo", status: "complete", total_tokens: 0 });
  });

  it("drops a task id carried only in details", () => {
    expect(
      buildWebhookPayload({
        event: "pipeline_done",
        project: "demo",
        status: "complete",
        total_tokens: 0,
        details: { task: 9, done: 2 },
      }),
    ).toEqual({ event: "pipeline_done", project: "demo", status: "complete", total_tokens: 0, done: 2 });
  });
});

describe("WebhookNotifier", () => {
  it("posts JSON for subscribed events", async () => {
    const calls: RecordedRequest[] = [];
    const notifier = new WebhookNotifier(
      { url: "https://hooks.example.test/waypoint", events: ["task_complete"] },
      recordingFetch(204, calls),
    );

    await notifier.notify(completeEvent);

    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe("https://hooks.example.test/waypoint");
    expect(calls[0]?.init?.method).toBe("POST");
    expect(calls[0]?.init?.body).toBe(JSON.stringify(buildWebhookPayload(completeEvent)));
  });

  it("skips events that are not subscribed", async () => {
    const calls: RecordedRequest[] = [];
    const notifier = new WebhookNotifier(
      { url: "https://hooks.example.test/waypoint", events: ["pipeline_done"] },
      recordingFetch(204, calls),
    );

    await notifier.notify(completeEvent);

    expect(calls).toEqual([]);
  });

  it("rejects on a non-2xx response", async () => {
    const notifier = new WebhookNotifier(
      { url: "https://hooks.example.test/waypoint", events: ["task_complete"] },
      recordingFetch(500, []),
    );

    await expect(notifier.notify(completeEvent)).rejects.toThrow(
      "Webhook https://hooks.example.test/waypoint responded with HTTP 500",
    );
  });
});
