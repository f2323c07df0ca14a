import { buildRunContext } from "../app/orchestrator/run-context-builder.js";
import { runEngine, type RunResult } from "../app/orchestrator/run/run-engine.js";
import type { BudgetConfig } from "../core/config.js";
import { formatErrorMessage } from "../core/error-format.js";
import {
  BudgetExceededError,
  ConfigError,
  GitError,
  PersistenceError,
  TaskError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
  type UserFacingErrorCode,
} from "../core/errors.js";

import type { CliProject } from "./config.js";
import { createRunStopSignalHandler } from "./signal-handlers.js";
import { formatRunSummaryLines } from "./status.js";

export type RunCommandOptions = {
  mock?: boolean;
  maxParallel?: number;
  review?: boolean;
  runId?: string;
  debug?: boolean;
};

export async function runCommand(
  project: CliProject,
  budget: BudgetConfig,
  opts: RunCommandOptions,
): Promise<RunResult> {
  try {
    const stopHandler = createRunStopSignalHandler({
      onSignal: (signal) => {
        console.log(
          `Received ${signal}. Stopping after the current phase. Resume with: waypoint run ${project.projectDir}`,
        );
      },
    });

    let result: RunResult;
    try {
      const ctx = await buildRunContext({
        projectDir: project.projectDir,
        roadmap: project.roadmap,
        budget,
        runner: project.runner,
        paths: project.paths,
        options: {
          runId: opts.runId,
          maxParallel: opts.maxParallel,
          review: opts.review,
          mock: opts.mock,
          stopSignal: stopHandler.signal,
          debug: opts.debug,
        },
      });
      result = await runEngine(ctx);
    } finally {
      stopHandler.cleanup();
    }

    printRunResult(result, project);
    process.exitCode = result.exitCode;
    return result;
  } catch (error) {
    throw normalizeRunCommandError(error);
  }
}

function printRunResult(result: RunResult, project: CliProject): void {
  if (result.stopped) {
    const signalLabel = result.stopped.signal ? ` (${result.stopped.signal})` : "";
    console.log(`Run ${result.runId} stopped by signal${signalLabel}.`);
    console.log(`Resume with: waypoint run ${project.projectDir}`);
  } else {
    console.log(`Run ${result.runId} finished with status: ${result.status}`);
  }

  console.log("");
  for (const line of formatRunSummaryLines(result.summary, { elapsedMs: result.elapsedMs })) {
    console.log(line);
  }
}

// =============================================================================
// ERROR NORMALIZATION
// =============================================================================

const RUN_COMMAND_FAILURE_TITLE = "Run command failed.";
const RUN_COMMAND_STATE_HINT =
  "Check that the home directory is writable, or pass --home to use another one.";
const RUN_COMMAND_GIT_HINT = "Resolve the repository state (uncommitted changes, conflicts) and rerun.";
const RUN_COMMAND_BUDGET_HINT = "Raise monthly_limit_tokens in budget.json or wait for the next month.";

export function normalizeRunCommandError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) {
    return new UserFacingError({
      code: error.code,
      title: RUN_COMMAND_FAILURE_TITLE,
      message: error.message,
      hint: error.hint ?? resolveRunCommandHint(error),
      next: error.next,
      cause: error.cause ?? error,
      exitCode: error.exitCode,
    });
  }

  return new UserFacingError({
    code: resolveCommandErrorCode(error),
    title: RUN_COMMAND_FAILURE_TITLE,
    message: formatErrorMessage(error),
    hint: resolveRunCommandHint(error),
    cause: error,
  });
}

function resolveRunCommandHint(error: unknown): string | undefined {
  if (error instanceof PersistenceError) return RUN_COMMAND_STATE_HINT;
  if (error instanceof GitError) return RUN_COMMAND_GIT_HINT;
  if (error instanceof BudgetExceededError) return RUN_COMMAND_BUDGET_HINT;
  return undefined;
}

function resolveCommandErrorCode(error: unknown): UserFacingErrorCode {
  if (error instanceof ConfigError) return USER_FACING_ERROR_CODES.config;
  if (error instanceof TaskError) return USER_FACING_ERROR_CODES.task;
  if (error instanceof GitError) return USER_FACING_ERROR_CODES.git;
  if (error instanceof BudgetExceededError) return USER_FACING_ERROR_CODES.budget;
  if (error instanceof PersistenceError) return USER_FACING_ERROR_CODES.state;
  return USER_FACING_ERROR_CODES.unknown;
}
