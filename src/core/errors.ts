// =============================================================================
// EXIT CODES
// =============================================================================

export const EXIT_CODES = {
  ok: 0,
  error: 1,
  budgetExhausted: 2,
  validation: 3,
  abandoned: 4,
  persistence: 5,
  interrupted: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// =============================================================================
// BASE ERRORS
// =============================================================================

export class OrchestratorError extends Error {
  readonly exitCode: number = EXIT_CODES.error;

  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "OrchestratorError";
  }
}

export class ConfigError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class TaskError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "TaskError";
  }
}

export class GitError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GitError";
  }
}

// =============================================================================
// ROADMAP ERRORS
// =============================================================================

export type RoadmapIssueLevel = "error" | "warning";

export type RoadmapIssue = {
  level: RoadmapIssueLevel;
  message: string;
  taskId?: number;
  field?: string;
};

export class RoadmapValidationError extends ConfigError {
  override readonly exitCode: number = EXIT_CODES.validation;

  constructor(
    message: string,
    public readonly issues: RoadmapIssue[],
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "RoadmapValidationError";
  }
}

export class CycleError extends ConfigError {
  override readonly exitCode: number = EXIT_CODES.validation;

  constructor(public readonly taskIds: number[]) {
    super(`Dependency cycle detected among tasks: ${taskIds.join(", ")}`);
    this.name = "CycleError";
  }
}

// =============================================================================
// RUN ERRORS
// =============================================================================

export class InvalidTransitionError extends TaskError {
  constructor(
    public readonly taskId: number,
    public readonly from: string,
    public readonly to: string,
  ) {
    super(`Task ${taskId}: illegal transition ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export class BudgetExceededError extends OrchestratorError {
  override readonly exitCode: number = EXIT_CODES.budgetExhausted;

  constructor(
    message: string,
    public readonly usedTokens: number,
    public readonly limitTokens: number,
  ) {
    super(message);
    this.name = "BudgetExceededError";
  }
}

export class PersistenceError extends OrchestratorError {
  override readonly exitCode: number = EXIT_CODES.persistence;

  constructor(
    message: string,
    public readonly filePath: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "PersistenceError";
  }
}

export class PhaseFailure extends TaskError {
  constructor(
    public readonly phase: string,
    message: string,
    public readonly output?: string,
  ) {
    super(message);
    this.name = "PhaseFailure";
  }
}

export class TaskAbandoned extends TaskError {
  constructor(
    public readonly taskId: number,
    public readonly reason: string,
    public readonly failingCheck?: string,
  ) {
    super(`Task ${taskId} abandoned: ${reason}`);
    this.name = "TaskAbandoned";
  }
}

export class DeployHookFailure extends OrchestratorError {
  constructor(
    public readonly script: string,
    public readonly scriptExitCode: number,
  ) {
    super(`Deploy script ${script} exited with code ${scriptExitCode}`);
    this.name = "DeployHookFailure";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  task: "TASK_ERROR",
  git: "GIT_ERROR",
  budget: "BUDGET_ERROR",
  state: "STATE_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
  exitCode?: number;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;
  readonly exitCode: number;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
    this.exitCode = input.exitCode ?? resolveCauseExitCode(input.cause);
  }
}

function resolveCauseExitCode(cause: unknown): number {
  if (cause instanceof OrchestratorError || cause instanceof UserFacingError) {
    return cause.exitCode;
  }
  return EXIT_CODES.error;
}
