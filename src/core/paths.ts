import path from "node:path";

import { taskIdSlug } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type PathsContext = {
  home: string;
};

export type ResolveHomeOptions = {
  home?: string;
  projectDir?: string;
};

export const HOME_DIR_NAME = ".waypoint";
export const ROADMAP_FILENAME = "ROADMAP.json";
export const RUNNER_CONFIG_FILENAME = "waypoint.yaml";
export const BUDGET_CONFIG_FILENAME = "budget.json";

// =============================================================================
// CONTEXT
// =============================================================================

export function resolveWaypointHome(opts: ResolveHomeOptions = {}): string {
  if (opts.home) {
    return path.resolve(opts.home);
  }

  if (process.env.WAYPOINT_HOME) {
    return path.resolve(process.env.WAYPOINT_HOME);
  }

  return path.join(path.resolve(opts.projectDir ?? process.cwd()), HOME_DIR_NAME);
}

export function createPathsContext(opts: ResolveHomeOptions): PathsContext {
  return { home: resolveWaypointHome(opts) };
}

// =============================================================================
// PATH HELPERS
// =============================================================================

export function roadmapPath(projectDir: string): string {
  return path.join(projectDir, ROADMAP_FILENAME);
}

export function runnerConfigPath(projectDir: string): string {
  return path.join(projectDir, RUNNER_CONFIG_FILENAME);
}

export function stateBaseDir(projectName: string, paths: PathsContext): string {
  return path.join(paths.home, "state", projectName);
}

export function runStatePath(projectName: string, paths: PathsContext): string {
  return path.join(stateBaseDir(projectName, paths), "run-state.json");
}

export function defaultLedgerPath(paths: PathsContext): string {
  return path.join(paths.home, "ledger.json");
}

export function logsBaseDir(projectName: string, paths: PathsContext): string {
  return path.join(paths.home, "logs", projectName);
}

export function orchestratorLogPath(projectName: string, paths: PathsContext): string {
  return path.join(logsBaseDir(projectName, paths), "orchestrator.jsonl");
}

export function taskDirName(taskId: number, title: string): string {
  return taskIdSlug(taskId, title);
}

export function taskLogsDir(
  projectName: string,
  taskId: number,
  title: string,
  paths: PathsContext,
): string {
  return path.join(logsBaseDir(projectName, paths), "tasks", taskDirName(taskId, title));
}

export function failureReportPath(
  projectName: string,
  taskId: number,
  title: string,
  paths: PathsContext,
): string {
  return path.join(taskLogsDir(projectName, taskId, title, paths), "failure_report.json");
}
