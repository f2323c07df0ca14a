import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";

import { taskLabel } from "../core/roadmap.js";
import type { ReviewDecision, ReviewGate, ReviewRequest } from "../app/orchestrator/ports.js";

export type ConsoleReviewGateOptions = {
  input?: Readable;
  output?: Writable;
};

// Blocks on stdin until the operator answers; there is no timeout.
export class ConsoleReviewGate implements ReviewGate {
  private readonly input: Readable;
  private readonly output: Writable;

  constructor(opts: ConsoleReviewGateOptions = {}) {
    this.input = opts.input ?? process.stdin;
    this.output = opts.output ?? process.stdout;
  }

  async request(request: ReviewRequest): Promise<ReviewDecision> {
    const rl = createInterface({ input: this.input, terminal: false });
    // The iterator buffers lines, so answers piped in ahead of the prompts are not lost.
    const lines = rl[Symbol.asyncIterator]();
    try {
      this.output.write(formatReviewPrompt(request));
      this.output.write("Approve? [y/N] ");
      if (isApproval(await nextLine(lines))) {
        return { decision: "approve" };
      }

      this.output.write("Reason for rejection: ");
      const note = (await nextLine(lines)).trim();
      return note ? { decision: "reject", note } : { decision: "reject" };
    } finally {
      rl.close();
    }
  }
}

// End of input reads as an empty answer.
async function nextLine(lines: AsyncIterator<string>): Promise<string> {
  const next = await lines.next();
  return next.done ? "" : next.value;
}

export function formatReviewPrompt(request: ReviewRequest): string {
  const lines = [`\nReview requested for ${request.project}:`];
  for (const task of request.tasks) {
    lines.push(`  ${taskLabel(task)}`);
  }
  lines.push("", request.diffStat.trim() || "(no uncommitted changes)", "");
  return `${lines.join("\n")}\n`;
}

export function isApproval(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === "y" || normalized === "yes";
}
