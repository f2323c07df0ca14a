/*
Purpose: topology and convention checks run against a parsed roadmap.
Assumptions: tasks have already passed schema parsing; raw entries are kept for unknown-key checks.
Usage: const issues = runRoadmapChecks({ document, tasks, rawTasks });
*/

import { minimatch } from "minimatch";

import type { RoadmapIssue } from "./errors.js";
import {
  DEPLOY_BLOCK_FIELDS,
  GIT_BLOCK_FIELDS,
  TASK_FIELDS,
  isKnownAgent,
  isKnownEcosystem,
  type RoadmapDocument,
  type RoadmapTask,
} from "./roadmap-schema.js";
import { padTaskId } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type RoadmapCheckContext = {
  document: RoadmapDocument;
  tasks: RoadmapTask[];
  rawTasks: Map<number, Record<string, unknown>>;
};

export type RoadmapCheck = (ctx: RoadmapCheckContext) => RoadmapIssue[];

export const MAX_TITLE_WORDS = 6;

// Tasks writing into a protected namespace must not depend on tasks writing into a forbidden one.
export const ARCHITECTURE_RULES: Record<string, string[]> = {
  "src/core/": ["src/render/"],
  "src/content/": ["src/render/"],
};

const TITLE_SAFE_PATTERN = /^[a-zA-Z0-9 \-/+]*$/;
const PREAMBLE_TARGET_PATTERN = /[Tt]arget (?:task|point)[^`\n]*`(\d+)`/g;

// =============================================================================
// CHECKS
// =============================================================================

export function checkNumbering({ tasks }: RoadmapCheckContext): RoadmapIssue[] {
  const issues: RoadmapIssue[] = [];
  const seen = new Set<number>();

  for (const task of tasks) {
    if (seen.has(task.id)) {
      issues.push(error(`Duplicate task number ${padTaskId(task.id)}`, task.id, "id"));
    }
    seen.add(task.id);
  }

  const ids = [...seen].sort((a, b) => a - b);
  const first = ids[0];
  const last = ids[ids.length - 1];
  if (first === undefined || last === undefined) {
    return issues;
  }

  for (let expected = first; expected <= last; expected += 1) {
    if (!seen.has(expected)) {
      issues.push(error(`Gap: task ${padTaskId(expected)} is missing`, expected, "id"));
    }
  }

  return issues;
}

export function checkRequiredFields({ tasks, rawTasks }: RoadmapCheckContext): RoadmapIssue[] {
  const issues: RoadmapIssue[] = [];

  for (const task of tasks) {
    if (task.agent === "milestone") continue;

    if (task.outputs.length === 0) {
      issues.push(error("Missing required 'outputs' field", task.id, "outputs"));
    }
    if (task.acceptance.length === 0) {
      issues.push(error("Missing required 'acceptance' field", task.id, "acceptance"));
    }
    const raw = rawTasks.get(task.id);
    if (raw && !("depends_on" in raw)) {
      issues.push(
        error(
          "Missing required 'depends_on' field (use [] for tasks with no dependencies)",
          task.id,
          "depends_on",
        ),
      );
    }
  }

  return issues;
}

export function checkKnownValues({ document, tasks, rawTasks }: RoadmapCheckContext): RoadmapIssue[] {
  const issues: RoadmapIssue[] = [];

  if (document.ecosystem && !isKnownEcosystem(document.ecosystem)) {
    issues.push(warning(`Unknown ecosystem '${document.ecosystem}'`, undefined, "ecosystem"));
  }

  for (const task of tasks) {
    if (task.agent && !isKnownAgent(task.agent)) {
      issues.push(warning(`Unknown agent '${task.agent}'`, task.id, "agent"));
    }
    if (task.ecosystem && !isKnownEcosystem(task.ecosystem)) {
      issues.push(warning(`Unknown ecosystem override '${task.ecosystem}'`, task.id, "ecosystem"));
    }
    if (task.agent === "milestone" && !task.version) {
      issues.push(
        warning(`Milestone has no version; falling back to 0.0.${task.id}`, task.id, "version"),
      );
    }

    const raw = rawTasks.get(task.id) ?? {};
    for (const key of Object.keys(raw)) {
      if (!TASK_FIELDS.some((field) => field === key)) {
        issues.push(warning(`Unknown task field '${key}'`, task.id, key));
      }
    }
  }

  for (const key of Object.keys(document.deploy ?? {})) {
    if (!DEPLOY_BLOCK_FIELDS.some((field) => field === key)) {
      issues.push(warning(`Unknown deploy field '${key}'`, undefined, `deploy.${key}`));
    }
  }
  for (const key of Object.keys(document.git ?? {})) {
    if (!GIT_BLOCK_FIELDS.some((field) => field === key)) {
      issues.push(warning(`Unknown git field '${key}'`, undefined, `git.${key}`));
    }
  }

  return issues;
}

export function checkTitles({ tasks }: RoadmapCheckContext): RoadmapIssue[] {
  const issues: RoadmapIssue[] = [];

  for (const task of tasks) {
    const words = task.title.split(/\s+/).filter((word) => word.length > 0);
    if (words.length === 0) {
      issues.push(error("Title is empty", task.id, "title"));
      continue;
    }
    if (words.length > MAX_TITLE_WORDS) {
      issues.push(
        error(
          `Title is ${words.length} words (max ${MAX_TITLE_WORDS}): '${task.title}'`,
          task.id,
          "title",
        ),
      );
    }
    if (!TITLE_SAFE_PATTERN.test(task.title)) {
      issues.push(
        warning(
          `Title contains characters that may not survive branch-name slugs: '${task.title}'`,
          task.id,
          "title",
        ),
      );
    }
  }

  return issues;
}

export function checkDependencies({ tasks }: RoadmapCheckContext): RoadmapIssue[] {
  const issues: RoadmapIssue[] = [];
  const ids = new Set(tasks.map((task) => task.id));

  for (const task of tasks) {
    for (const ref of task.depends_on) {
      if (ref === task.id) {
        issues.push(error("Task depends on itself", task.id, "depends_on"));
      } else if (!ids.has(ref)) {
        issues.push(
          error(`depends_on ${padTaskId(ref)} references a non-existent task`, task.id, "depends_on"),
        );
      } else if (ref > task.id) {
        issues.push(
          error(
            `depends_on ${padTaskId(ref)} is a forward reference (later than ${padTaskId(task.id)})`,
            task.id,
            "depends_on",
          ),
        );
      }
    }
  }

  return issues;
}

export function checkSingleRoot({ tasks }: RoadmapCheckContext): RoadmapIssue[] {
  const rootIds = tasks.filter((task) => task.depends_on.length === 0).map((task) => task.id);

  if (rootIds.length === 0 && tasks.length > 0) {
    return [error("No root task found; exactly one task must have depends_on: []")];
  }
  if (rootIds.length > 1) {
    const list = rootIds.map(padTaskId).join(", ");
    return [error(`Multiple root tasks (depends_on: []): ${list}; exactly one is allowed`)];
  }

  return [];
}

export function checkDisjointOutputs({ tasks }: RoadmapCheckContext): RoadmapIssue[] {
  const issues: RoadmapIssue[] = [];
  const groups = new Map<string, RoadmapTask[]>();

  for (const task of tasks) {
    const key = [...task.depends_on].sort((a, b) => a - b).join(",");
    const group = groups.get(key) ?? [];
    group.push(task);
    groups.set(key, group);
  }

  for (const group of groups.values()) {
    for (let i = 0; i < group.length; i += 1) {
      for (let j = i + 1; j < group.length; j += 1) {
        const a = group[i];
        const b = group[j];
        if (!a || !b) continue;

        const overlap = findOverlappingOutputs(a.outputs, b.outputs);
        if (overlap.length > 0) {
          issues.push(
            error(
              `Outputs overlap with task ${padTaskId(a.id)} (same dependencies): ${overlap.join(", ")}`,
              b.id,
              "outputs",
            ),
          );
        }
      }
    }
  }

  return issues;
}

export function checkArchitecture({ tasks }: RoadmapCheckContext): RoadmapIssue[] {
  const issues: RoadmapIssue[] = [];
  const namespaces = new Map<number, Set<string>>();
  for (const task of tasks) {
    namespaces.set(task.id, outputNamespaces(task));
  }

  for (const task of tasks) {
    const own = namespaces.get(task.id) ?? new Set<string>();
    for (const [protectedPrefix, forbidden] of Object.entries(ARCHITECTURE_RULES)) {
      if (!own.has(protectedPrefix)) continue;

      for (const dep of task.depends_on) {
        const depNamespaces = namespaces.get(dep);
        if (!depNamespaces) continue;
        for (const forbiddenPrefix of forbidden) {
          if (depNamespaces.has(forbiddenPrefix)) {
            issues.push(
              error(
                `Architecture violation: '${protectedPrefix}' task depends on '${forbiddenPrefix}' task ${padTaskId(dep)}`,
                task.id,
                "depends_on",
              ),
            );
          }
        }
      }
    }
  }

  return issues;
}

export function checkPreambleReferences({ document, tasks }: RoadmapCheckContext): RoadmapIssue[] {
  const preamble = document.preamble ?? "";
  const ids = new Set(tasks.map((task) => task.id));
  const issues: RoadmapIssue[] = [];

  for (const match of preamble.matchAll(PREAMBLE_TARGET_PATTERN)) {
    const ref = Number(match[1]);
    if (!ids.has(ref)) {
      issues.push(
        warning(`Preamble references task ${padTaskId(ref)} which does not exist`, undefined, "preamble"),
      );
    }
  }

  return issues;
}

export const ROADMAP_CHECKS: readonly RoadmapCheck[] = [
  checkNumbering,
  checkRequiredFields,
  checkKnownValues,
  checkTitles,
  checkDependencies,
  checkSingleRoot,
  checkDisjointOutputs,
  checkArchitecture,
  checkPreambleReferences,
];

export function runRoadmapChecks(ctx: RoadmapCheckContext): RoadmapIssue[] {
  return ROADMAP_CHECKS.flatMap((check) => check(ctx));
}

// =============================================================================
// OUTPUT OVERLAP
// =============================================================================

export function outputsOverlap(a: string, b: string): boolean {
  const left = normalizeOutputPath(a);
  const right = normalizeOutputPath(b);

  if (left === right) return true;
  if (right.startsWith(`${left}/`) || left.startsWith(`${right}/`)) return true;

  return minimatch(right, left, { dot: true }) || minimatch(left, right, { dot: true });
}

export function findOverlappingOutputs(a: string[], b: string[]): string[] {
  const overlap: string[] = [];
  for (const left of a) {
    for (const right of b) {
      if (outputsOverlap(left, right)) {
        overlap.push(left === right ? left : `${left} ~ ${right}`);
      }
    }
  }
  return overlap;
}

function normalizeOutputPath(value: string): string {
  return value.trim().replace(/\\/g, "/").replace(/^\.\//, "").replace(/\/+$/, "");
}

function outputNamespaces(task: RoadmapTask): Set<string> {
  const prefixes = new Set<string>(Object.keys(ARCHITECTURE_RULES));
  for (const forbidden of Object.values(ARCHITECTURE_RULES)) {
    for (const prefix of forbidden) prefixes.add(prefix);
  }

  const found = new Set<string>();
  for (const output of task.outputs) {
    for (const prefix of prefixes) {
      if (normalizeOutputPath(output).startsWith(prefix)) {
        found.add(prefix);
      }
    }
  }
  return found;
}

// =============================================================================
// ISSUE BUILDERS
// =============================================================================

function error(message: string, taskId?: number, field?: string): RoadmapIssue {
  return buildIssue("error", message, taskId, field);
}

function warning(message: string, taskId?: number, field?: string): RoadmapIssue {
  return buildIssue("warning", message, taskId, field);
}

function buildIssue(
  level: RoadmapIssue["level"],
  message: string,
  taskId?: number,
  field?: string,
): RoadmapIssue {
  const issue: RoadmapIssue = { level, message };
  if (taskId !== undefined) issue.taskId = taskId;
  if (field !== undefined) issue.field = field;
  return issue;
}
