import path from "node:path";

import type { BudgetConfig, RunnerConfig } from "../core/config.js";
import { loadBudgetConfig, loadRunnerConfig } from "../core/config-loader.js";
import {
  BUDGET_CONFIG_FILENAME,
  createPathsContext,
  roadmapPath,
  runnerConfigPath,
  type PathsContext,
} from "../core/paths.js";
import { loadRoadmap, resolveProjectName, type Roadmap } from "../core/roadmap.js";

// =============================================================================
// PROJECT DISCOVERY (CLI)
//
// - the project is a directory holding ROADMAP.json (default: cwd)
// - budget.json comes from --budget, else the working directory
// - waypoint.yaml beside the roadmap is optional
// =============================================================================

export type GlobalCliOptions = {
  budget?: string;
  home?: string;
  verbose?: boolean;
  debug?: boolean;
};

export type CliProject = {
  projectDir: string;
  projectName: string;
  roadmap: Roadmap;
  runner: RunnerConfig;
  paths: PathsContext;
};

export type LoadProjectForCliArgs = {
  project?: string;
  home?: string;
  cwd?: string;
};

export function resolveProjectDir(project: string | undefined, cwd: string = process.cwd()): string {
  return path.resolve(cwd, project ?? ".");
}

export function loadProjectForCli(args: LoadProjectForCliArgs): CliProject {
  const projectDir = resolveProjectDir(args.project, args.cwd);
  const roadmap = loadRoadmap(roadmapPath(projectDir));

  return {
    projectDir,
    projectName: resolveProjectName(roadmap, projectDir),
    roadmap,
    runner: loadRunnerConfig(runnerConfigPath(projectDir)),
    paths: createPathsContext({ home: args.home, projectDir }),
  };
}

export function loadBudgetForCli(explicitPath: string | undefined, cwd: string = process.cwd()): BudgetConfig {
  return loadBudgetConfig(path.resolve(cwd, explicitPath ?? BUDGET_CONFIG_FILENAME));
}
