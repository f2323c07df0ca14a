/**
 * CommandAgentInvoker shells out to the configured coding agent CLI.
 * Purpose: turn one phase invocation into a prompt, a process run, and a usage report.
 * Assumptions: the agent edits files in the project dir and prints usage as JSON lines.
 * Usage: new CommandAgentInvoker({ config: runner.agent }).invoke(request)
 */

import { execa, ExecaError } from "execa";
import fse from "fs-extra";
import Handlebars from "handlebars";

import type { AgentConfig } from "../core/config.js";
import type { AgentInvoker, AgentRequest, AgentResult } from "../app/orchestrator/ports.js";

import { renderAgentPrompt } from "./agent-prompt.js";
import { parseAgentUsage } from "./usage.js";

// =============================================================================
// TYPES
// =============================================================================

export type CommandAgentOptions = {
  config: AgentConfig;
  // Where to keep the full transcript of one invocation.
  logPathFor?: (request: AgentRequest) => string;
};

export type AgentArgValues = {
  phase: string;
  project: string;
  attempt: number;
  prompt: string;
  task: AgentRequest["task"];
};

// =============================================================================
// INVOKER
// =============================================================================

export class CommandAgentInvoker implements AgentInvoker {
  constructor(private readonly options: CommandAgentOptions) {}

  async invoke(request: AgentRequest): Promise<AgentResult> {
    const { config } = this.options;
    const prompt = await renderAgentPrompt(request, config.prompt_template);
    const args = renderAgentArgs(config.args, {
      phase: request.phase,
      project: request.project,
      attempt: request.attempt,
      prompt,
      task: request.task,
    });

    const res = await execa(config.command, args, {
      cwd: request.context.projectDir,
      env: { ...process.env, ...config.env },
      reject: false,
      all: true,
      stdin: "ignore",
      timeout: config.timeout_ms,
    });

    const transcript = res.all ?? "";
    const failure = res instanceof ExecaError ? res.shortMessage : "";
    const output = failure && res.exitCode === undefined ? `${transcript}\n${failure}`.trim() : transcript;

    const logPath = this.options.logPathFor?.(request);
    if (logPath) {
      await fse.outputFile(logPath, `$ ${config.command} ${args.join(" ")}\n\n${output}\n`, "utf8");
    }

    return {
      success: res.exitCode === 0,
      output,
      usage: parseAgentUsage(transcript),
    };
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function renderAgentArgs(templates: string[], values: AgentArgValues): string[] {
  return templates.map((template) =>
    Handlebars.compile(template, { noEscape: true, strict: true })(values),
  );
}
