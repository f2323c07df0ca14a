/**
 * Roadmap loading: schema parse, convention checks, then the graph/cycle check.
 * Purpose: produce an immutable task graph or a RoadmapValidationError listing every issue.
 * Assumptions: the roadmap is JSON; warnings never block loading.
 * Usage: const roadmap = loadRoadmap("/path/to/ROADMAP.json");
 */

import fs from "node:fs";
import path from "node:path";

import { CycleError, RoadmapValidationError, type RoadmapIssue } from "./errors.js";
import { runRoadmapChecks } from "./roadmap-checks.js";
import {
  RoadmapDocumentSchema,
  RoadmapTaskSchema,
  formatSchemaIssue,
  normalizeRoadmapTask,
  type RoadmapDocument,
  type RoadmapTask,
} from "./roadmap-schema.js";
import { buildTaskGraph, layerIndex, type TaskGraph } from "./task-graph.js";
import { padTaskId, taskIdSlug } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type Roadmap = {
  source: string;
  document: RoadmapDocument;
  tasks: RoadmapTask[];
  graph: TaskGraph;
  warnings: RoadmapIssue[];
};

export type RoadmapSource = string | { document: unknown; label?: string };

export type RoadmapValidationResult =
  | { ok: true; roadmap: Roadmap; issues: RoadmapIssue[] }
  | { ok: false; issues: RoadmapIssue[]; cycle?: CycleError };

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadRoadmap(source: RoadmapSource): Roadmap {
  const result = validateRoadmap(source);
  if (!result.ok && result.cycle) {
    throw result.cycle;
  }
  if (!result.ok) {
    const label = typeof source === "string" ? source : source.label ?? "<inline>";
    const errors = result.issues.filter((issue) => issue.level === "error");
    throw new RoadmapValidationError(
      `Roadmap ${label} has ${errors.length} error(s):\n${errors.map(formatRoadmapIssue).join("\n")}`,
      result.issues,
    );
  }
  return result.roadmap;
}

export function validateRoadmap(source: RoadmapSource): RoadmapValidationResult {
  const label = typeof source === "string" ? path.resolve(source) : source.label ?? "<inline>";

  let raw: unknown;
  if (typeof source === "string") {
    const read = readRoadmapJson(label);
    if (!read.ok) {
      return { ok: false, issues: [read.issue] };
    }
    raw = read.value;
  } else {
    raw = source.document;
  }

  const parsed = RoadmapDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map(
        (issue): RoadmapIssue => ({ level: "error", ...formatSchemaIssue(issue) }),
      ),
    };
  }

  const document = parsed.data;
  const issues: RoadmapIssue[] = [];
  const tasks: RoadmapTask[] = [];
  const rawTasks = new Map<number, Record<string, unknown>>();

  document.tasks.forEach((entry, index) => {
    const taskResult = RoadmapTaskSchema.safeParse(entry);
    if (!taskResult.success) {
      const taskId = readEntryId(entry);
      for (const issue of taskResult.error.issues) {
        const formatted = formatSchemaIssue(issue);
        issues.push({
          level: "error",
          message: formatted.message,
          field: formatted.field ?? `tasks.${index}`,
          ...(taskId !== undefined ? { taskId } : {}),
        });
      }
      return;
    }

    tasks.push(normalizeRoadmapTask(taskResult.data));
    if (isRecord(entry)) {
      rawTasks.set(taskResult.data.id, entry);
    }
  });

  issues.push(...runRoadmapChecks({ document, tasks, rawTasks }));

  if (issues.some((issue) => issue.level === "error")) {
    return { ok: false, issues };
  }

  const graph = buildTaskGraph(tasks);
  try {
    layerIndex(graph);
  } catch (err) {
    if (err instanceof CycleError) {
      issues.push({
        level: "error",
        message: err.message,
        field: "depends_on",
      });
      return { ok: false, issues, cycle: err };
    }
    throw err;
  }

  return {
    ok: true,
    roadmap: {
      source: label,
      document,
      tasks: [...tasks].sort((a, b) => a.id - b.id),
      graph,
      warnings: issues,
    },
    issues,
  };
}

export function formatRoadmapIssue(issue: RoadmapIssue): string {
  const where = issue.taskId !== undefined ? padTaskId(issue.taskId) : "roadmap";
  const field = issue.field ? ` [${issue.field}]` : "";
  return `${issue.level.toUpperCase()} ${where}${field}: ${issue.message}`;
}

// =============================================================================
// TASK HELPERS
// =============================================================================

export function isMilestone(task: RoadmapTask): boolean {
  return task.agent === "milestone";
}

export function milestoneVersion(task: RoadmapTask): string {
  return task.version?.trim() || `0.0.${task.id}`;
}

export function taskLabel(task: RoadmapTask): string {
  return `${padTaskId(task.id)} - ${task.title}`;
}

export function taskSlug(task: RoadmapTask): string {
  return taskIdSlug(task.id, task.title);
}

export function isReviewEnabled(roadmap: Roadmap, task: RoadmapTask): boolean {
  return task.review ?? roadmap.document.review;
}

export function resolveTaskEcosystem(roadmap: Roadmap, task: RoadmapTask): string | undefined {
  return task.ecosystem ?? roadmap.document.ecosystem;
}

export function isGitManaged(roadmap: Roadmap): boolean {
  return roadmap.document.git?.enabled ?? false;
}

export function resolveProjectName(roadmap: Roadmap, projectDir: string): string {
  return roadmap.document.name ?? path.basename(path.resolve(projectDir));
}

// =============================================================================
// INTERNALS
// =============================================================================

function readRoadmapJson(
  filePath: string,
): { ok: true; value: unknown } | { ok: false; issue: RoadmapIssue } {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return { ok: false, issue: { level: "error", message: `Cannot read roadmap: ${detail}` } };
  }

  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return { ok: false, issue: { level: "error", message: `Invalid JSON: ${detail}` } };
  }
}

function readEntryId(entry: unknown): number | undefined {
  if (!isRecord(entry)) return undefined;
  const id = entry.id;
  return typeof id === "number" && Number.isInteger(id) ? id : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
