/*
Purpose: append-only JSONL event log for a project's runs (orchestrator.jsonl).
Assumptions: one writer per run; every line carries ts, type and run_id.
Usage: const log = openOrchestratorLog(project, paths, runId); log.event("run.start", {...}); log.close();
*/

import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { orchestratorLogPath, type PathsContext } from "./paths.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export const RUN_EVENT_TYPES = [
  "run.start",
  "run.resume",
  "run.stop",
  "run.complete",
  "batch.start",
  "batch.complete",
  "budget.warn",
  "budget.block",
  "git.init",
  "git.start",
  "git.finish",
  "git.rollback",
  "git.tag",
  "task.attempt",
  "task.phase",
  "task.failed",
  "task.abandoned",
  "task.complete",
  "task.reset",
  "review.decision",
  "deploy.skip",
  "deploy.complete",
  "deploy.error",
  "notify.error",
] as const;

export type RunEventType = (typeof RUN_EVENT_TYPES)[number];

export type LogLine = JsonObject & {
  ts: string;
  type: RunEventType;
  run_id: string;
  task_id?: string;
};

// Callers use camelCase taskId; the line carries task_id.
export type EventFields = JsonObject & { taskId?: string };

export type JsonlLoggerOptions = {
  runId: string;
  debug?: boolean;
};

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger {
  readonly runId: string;
  private readonly fileDescriptor: number;
  private readonly debug: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    options: JsonlLoggerOptions,
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
    this.runId = options.runId;
    this.debug = options.debug ?? false;
  }

  event(type: RunEventType, fields: EventFields = {}): void {
    this.append(buildLogLine(this.runId, type, fields));
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(this.failureWarning(`close log file ${this.filePath}`, err));
    }
  }

  private append(line: LogLine): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(line)}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      // A lost log line never stops the run.
      console.warn(this.failureWarning(`write ${line.type} to ${this.filePath}`, err));
    }
  }

  private failureWarning(action: string, error: unknown): string {
    const message = `Warning: failed to ${action}: ${formatErrorMessage(error)}`;
    if (!this.debug) return message;

    const stack = formatErrorLines(error, { mode: "debug" }).find((line) => line.kind === "stack");
    return stack ? `${message}\n${stack.text}` : message;
  }
}

export function openOrchestratorLog(
  projectName: string,
  paths: PathsContext,
  runId: string,
  debug = false,
): JsonlLogger {
  return new JsonlLogger(orchestratorLogPath(projectName, paths), { runId, debug });
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function buildLogLine(runId: string, type: RunEventType, fields: EventFields = {}): LogLine {
  const { taskId, ...rest } = fields;
  const line: LogLine = {
    ...rest,
    ts: isoNow(),
    type,
    run_id: runId,
  };
  if (taskId !== undefined) line.task_id = taskId;
  return line;
}

export function logOrchestratorEvent(logger: JsonlLogger, type: RunEventType, fields: EventFields = {}): void {
  logger.event(type, fields);
}

export function logRunResume(
  logger: JsonlLogger,
  details: { status: string; runningTasks: number; addedTasks?: number[]; orphanedTasks?: number[] },
): void {
  const fields: JsonObject = {
    status: details.status,
    running_tasks: details.runningTasks,
  };
  if (details.addedTasks && details.addedTasks.length > 0) {
    fields.added_tasks = details.addedTasks;
  }
  if (details.orphanedTasks && details.orphanedTasks.length > 0) {
    fields.orphaned_tasks = details.orphanedTasks;
  }

  logger.event("run.resume", fields);
}

export function logTaskReset(logger: JsonlLogger, taskId: number, reason: string): void {
  logger.event("task.reset", { taskId: String(taskId), reason });
}
