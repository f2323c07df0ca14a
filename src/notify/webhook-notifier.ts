import type { NotifyBlock } from "../core/roadmap-schema.js";
import type { NotifyEvent, Notifier } from "../app/orchestrator/ports.js";

const WEBHOOK_TIMEOUT_MS = 10_000;

export type WebhookPayload = Record<string, string | number | boolean | null>;

// POSTs pipeline events to the roadmap's notify.url, filtered by notify.events.
export class WebhookNotifier implements Notifier {
  constructor(
    private readonly config: NotifyBlock,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  async notify(event: NotifyEvent): Promise<void> {
    if (!this.config.events.includes(event.event)) return;

    const res = await this.fetchImpl(this.config.url, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(buildWebhookPayload(event)),
      signal: AbortSignal.timeout(WEBHOOK_TIMEOUT_MS),
    });

    if (!res.ok) {
      throw new Error(`Webhook ${this.config.url} responded with HTTP ${res.status}`);
    }
  }
}

// For roadmaps without a notify block.
export class NullNotifier implements Notifier {
  async notify(_event: NotifyEvent): Promise<void> {}
}

// Details never override the envelope fields.
export function buildWebhookPayload(event: NotifyEvent): WebhookPayload {
  const source: WebhookPayload = event.details ?? {};
  const { task: _task, ...details } = source;
  const payload: WebhookPayload = {
    ...details,
    event: event.event,
    project: event.project,
    status: event.status,
    total_tokens: event.total_tokens,
  };
  if (event.task !== undefined) {
    payload.task = event.task;
  }
  return payload;
}
