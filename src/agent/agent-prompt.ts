import fg from "fast-glob";

import { isAgentPhase } from "../core/phases.js";
import {
  renderInlinePromptTemplate,
  renderPromptTemplate,
  type PromptTemplateValues,
} from "../core/prompts.js";
import { milestoneVersion, taskLabel } from "../core/roadmap.js";
import type { AgentRequest } from "../app/orchestrator/ports.js";

const MAX_CONTEXT_FILES = 50;

// =============================================================================
// PUBLIC API
// =============================================================================

export async function renderAgentPrompt(
  request: AgentRequest,
  inlineTemplate?: string,
): Promise<string> {
  const values = await buildPromptValues(request);
  if (inlineTemplate) {
    return renderInlinePromptTemplate(inlineTemplate, values);
  }
  if (!isAgentPhase(request.phase)) {
    throw new Error(`Phase ${request.phase} does not invoke the agent`);
  }
  return renderPromptTemplate(request.phase, values);
}

export async function buildPromptValues(request: AgentRequest): Promise<PromptTemplateValues> {
  const { task, context } = request;
  const others = context.tasks.filter((entry) => entry.id !== task.id);

  return {
    project: request.project,
    phase: request.phase,
    attempt: String(request.attempt),
    task_id: String(task.id),
    task_label: taskLabel(task),
    task_title: task.title,
    description: task.description || task.title,
    acceptance: task.acceptance,
    outputs: bulletList(task.outputs),
    context_files: bulletList(await expandContextFiles(task.context, context.projectDir)),
    preamble: context.preamble ?? "",
    ecosystem: context.ecosystem ?? "unspecified",
    version: task.agent === "milestone" ? milestoneVersion(task) : "",
    fix_logs: context.fixLogs ?? "",
    batch_tasks: bulletList(others.map(taskLabel)),
  };
}

// Context entries may be globs; entries that match nothing are passed through as written.
export async function expandContextFiles(patterns: string[], cwd: string): Promise<string[]> {
  if (patterns.length === 0) return [];

  const files: string[] = [];
  for (const pattern of patterns) {
    const matches = await fg(pattern, { cwd, dot: false, onlyFiles: true, unique: true });
    if (matches.length === 0) {
      files.push(pattern);
    } else {
      files.push(...matches.sort());
    }
  }

  return [...new Set(files)].slice(0, MAX_CONTEXT_FILES);
}

function bulletList(items: string[]): string {
  return items.map((item) => `- ${item}`).join("\n");
}
