/**
 * Deploy hook: the optional last phase of a task.
 * Purpose: decide whether a task deploys, build the script's environment, and run it with bash.
 * Assumptions: a failing script is reported, never rolled back.
 * Usage: const gate = resolveDeployGate({ deploy, task, env: process.env });
 */

import path from "node:path";

import { execa } from "execa";

import type { DeployBlock, RoadmapTask } from "../core/roadmap-schema.js";
import type { DeployRequest, DeployRunner } from "../app/orchestrator/ports.js";

export const DEFAULT_DEPLOY_SCRIPT = path.join("scripts", "deploy.sh");
export const NO_DEPLOY_ENV = "WAYPOINT_NO_DEPLOY";

// =============================================================================
// GATE
// =============================================================================

export type DeployGate =
  | { deploy: true; script: string; env: Record<string, string> }
  | { deploy: false; reason: string };

export function resolveDeployGate(input: {
  deploy: DeployBlock | undefined;
  task: RoadmapTask;
  env?: NodeJS.ProcessEnv;
}): DeployGate {
  const env = input.env ?? process.env;
  if (env[NO_DEPLOY_ENV]) {
    return { deploy: false, reason: `${NO_DEPLOY_ENV} is set` };
  }
  if (!input.deploy?.enabled) {
    return { deploy: false, reason: "deploy is not enabled for the project" };
  }
  if (!input.task.deploy) {
    return { deploy: false, reason: "task is not marked deploy" };
  }

  return {
    deploy: true,
    script: input.deploy.script ?? DEFAULT_DEPLOY_SCRIPT,
    env: buildDeployEnv(input.deploy.env),
  };
}

// `env: {region: "eu"}` reaches the script as DEPLOY_REGION=eu.
export function buildDeployEnv(values: DeployBlock["env"]): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    env[`DEPLOY_${key.toUpperCase()}`] = String(value);
  }
  return env;
}

// =============================================================================
// RUNNER
// =============================================================================

export class BashDeployRunner implements DeployRunner {
  async run(request: DeployRequest): Promise<{ exitCode: number }> {
    const res = await execa("bash", [request.script], {
      cwd: request.cwd,
      env: { ...process.env, ...request.env },
      reject: false,
      stdio: "inherit",
    });
    return { exitCode: res.exitCode ?? -1 };
  }
}
