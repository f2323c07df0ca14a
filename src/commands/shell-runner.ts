import { execaCommand, ExecaError } from "execa";

import type { CommandResult, CommandRunner } from "../app/orchestrator/ports.js";

export type ShellCommandRunnerOptions = {
  timeoutMs?: number;
  env?: Record<string, string>;
};

// Runs check commands through the shell; stdout and stderr come back interleaved.
export class ShellCommandRunner implements CommandRunner {
  constructor(private readonly options: ShellCommandRunnerOptions = {}) {}

  async run(command: string, cwd: string): Promise<CommandResult> {
    const res = await execaCommand(command, {
      cwd,
      shell: true,
      reject: false,
      all: true,
      stdin: "ignore",
      env: { ...process.env, ...this.options.env },
      timeout: this.options.timeoutMs,
    });

    const output = res.all ?? "";
    if (res.exitCode === undefined) {
      const detail = res instanceof ExecaError ? res.shortMessage : "command did not exit";
      return { exitCode: -1, output: `${output}\n${detail}`.trim() };
    }

    return { exitCode: res.exitCode, output };
  }
}
