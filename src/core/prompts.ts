/*
Purpose: agent prompts from handlebars templates, one per agent phase (templates/prompts/<phase>.md).
Assumptions: templates are strict; a missing value is an error, not an empty string.
*/

import path from "node:path";
import { fileURLToPath } from "node:url";

import fse from "fs-extra";
import Handlebars from "handlebars";

import type { AgentPhase } from "./phases.js";

export type PromptTemplateValues = Record<string, string>;

const COMPILE_OPTIONS = { noEscape: true, strict: true } as const;
const LEFTOVER_PLACEHOLDER = /\{\{[^}]+\}\}/;

export class PromptTemplates {
  private readonly compiled = new Map<AgentPhase, Handlebars.TemplateDelegate>();

  constructor(readonly dir: string) {}

  async render(phase: AgentPhase, values: PromptTemplateValues): Promise<string> {
    const template = await this.load(phase);
    return finishPrompt(template(values), `${phase} prompt`);
  }

  private async load(phase: AgentPhase): Promise<Handlebars.TemplateDelegate> {
    const cached = this.compiled.get(phase);
    if (cached) return cached;

    const file = path.join(this.dir, `${phase}.md`);
    if (!(await fse.pathExists(file))) {
      throw new Error(`Prompt template not found: ${file}`);
    }
    const template = Handlebars.compile(await fse.readFile(file, "utf8"), COMPILE_OPTIONS);
    this.compiled.set(phase, template);
    return template;
  }
}

let builtin: PromptTemplates | undefined;

// Built-in templates ship at <package root>/templates/prompts, for src/ and dist/src/ alike.
export function builtinPromptTemplates(): PromptTemplates {
  builtin ??= new PromptTemplates(path.join(findPackageRoot(), "templates", "prompts"));
  return builtin;
}

export async function renderPromptTemplate(phase: AgentPhase, values: PromptTemplateValues): Promise<string> {
  return builtinPromptTemplates().render(phase, values);
}

// waypoint.yaml `agent.prompt_template`; same values as the built-ins.
export function renderInlinePromptTemplate(source: string, values: PromptTemplateValues): string {
  return finishPrompt(Handlebars.compile(source, COMPILE_OPTIONS)(values), "prompt_template");
}

function finishPrompt(rendered: string, label: string): string {
  const output = rendered.trim();
  if (LEFTOVER_PLACEHOLDER.test(output)) {
    throw new Error(`Unresolved placeholder in ${label}`);
  }
  return output;
}

function findPackageRoot(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (;;) {
    if (fse.pathExistsSync(path.join(dir, "package.json"))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) throw new Error("package.json not found above the prompts module");
    dir = parent;
  }
}
