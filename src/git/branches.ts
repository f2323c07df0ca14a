import { taskSlug } from "../core/roadmap.js";
import type { RoadmapTask } from "../core/roadmap-schema.js";
import { padTaskId } from "../core/utils.js";

export const MAIN_BRANCH = "main";
export const INTEGRATION_BRANCH = "develop";
export const FEATURE_BRANCH_PREFIX = "feature/";
export const DEFAULT_REMOTE = "origin";

export function buildTaskBranchName(task: RoadmapTask, prefix: string = FEATURE_BRANCH_PREFIX): string {
  const slug = taskSlug(task);
  const safeSlug = slug.length > 0 ? slug : `${padTaskId(task.id)}-task`;
  return `${prefix}${safeSlug}`;
}

export function buildTaskTagName(task: RoadmapTask): string {
  return `task-${padTaskId(task.id)}`;
}

export function buildMilestoneTagName(version: string): string {
  return `v${version.replace(/^v/, "")}`;
}
