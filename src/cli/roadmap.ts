/*
Purpose: roadmap inspection commands (validate, layers).
Assumptions: validate reports every issue instead of stopping at the first one.
Usage: validateCommand(projectDir) / layersCommand(project).
*/

import { EXIT_CODES } from "../core/errors.js";
import { roadmapPath } from "../core/paths.js";
import { formatRoadmapIssue, taskLabel, validateRoadmap } from "../core/roadmap.js";
import { criticalPath, layers, requireTask, type TaskGraph } from "../core/task-graph.js";
import { padTaskId } from "../core/utils.js";

import type { CliProject } from "./config.js";

export function validateCommand(projectDir: string): boolean {
  const result = validateRoadmap(roadmapPath(projectDir));

  for (const issue of result.issues) {
    console.log(formatRoadmapIssue(issue));
  }

  if (!result.ok) {
    const errors = result.issues.filter((issue) => issue.level === "error").length;
    console.log(`Roadmap invalid: ${errors} error(s).`);
    process.exitCode = EXIT_CODES.validation;
    return false;
  }

  const { graph } = result.roadmap;
  console.log(`Roadmap OK: ${graph.ids.length} task(s) in ${layers(graph).length} layer(s).`);
  return true;
}

export function layersCommand(project: CliProject): void {
  for (const line of formatLayerLines(project.roadmap.graph)) {
    console.log(line);
  }
}

export function formatLayerLines(graph: TaskGraph): string[] {
  const lines: string[] = [];
  for (const [index, layer] of layers(graph).entries()) {
    lines.push(`Layer ${index}:`);
    for (const id of layer) {
      lines.push(`  ${taskLabel(requireTask(graph, id))}`);
    }
  }

  const path = criticalPath(graph);
  if (path.length > 0) {
    lines.push(`Critical path: ${path.map((id) => padTaskId(id)).join(" -> ")}`);
  }
  return lines;
}
