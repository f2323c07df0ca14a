import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { PromptTemplates, renderInlinePromptTemplate, renderPromptTemplate } from "./prompts.js";

const milestoneValues = {
  project: "inventory",
  phase: "review",
  attempt: "1",
  task_id: "5",
  task_label: "005 - First Release",
  task_title: "First Release",
  description: "Cut the first release.",
  acceptance: "",
  outputs: "",
  context_files: "",
  preamble: "",
  ecosystem: "python",
  version: "1.0.0",
  fix_logs: "",
  batch_tasks: "",
};

describe("built-in prompt templates", () => {
  it("renders the milestone review prompt with its version", async () => {
    const prompt = await renderPromptTemplate("review", milestoneValues);

    expect(prompt).toContain("milestone 005 - First Release (version 1.0.0)");
    expect(prompt).not.toContain("Milestone criteria");
  });

  it("embeds the failing output in the static fix prompt", async () => {
    const prompt = await renderPromptTemplate("static_fix", {
      ...milestoneValues,
      fix_logs: "src/app.py:3:1: F401 unused import",
    });

    expect(prompt).toContain("src/app.py:3:1: F401 unused import");
  });

  it("rejects values missing a placeholder the template uses", async () => {
    const { fix_logs: _omitted, ...incomplete } = milestoneValues;

    await expect(renderPromptTemplate("fix", incomplete)).rejects.toThrow();
  });
});

describe("PromptTemplates", () => {
  it("reads templates from its own directory", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "prompts-"));
    fs.writeFileSync(path.join(dir, "build.md"), "Build {{task_label}} for {{project}}.\n");

    const prompt = await new PromptTemplates(dir).render("build", milestoneValues);

    expect(prompt).toBe("Build 005 - First Release for inventory.");
  });

  it("names the missing file", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "prompts-"));

    await expect(new PromptTemplates(dir).render("document", milestoneValues)).rejects.toThrow(
      `Prompt template not found: ${path.join(dir, "document.md")}`,
    );
  });
});

describe("renderInlinePromptTemplate", () => {
  it("trims the rendered output", () => {
    expect(renderInlinePromptTemplate("  {{task_label}}\n", milestoneValues)).toBe("005 - First Release");
  });

  it("refuses output that still holds a placeholder", () => {
    const values = { ...milestoneValues, task_label: "{{oops}}" };

    expect(() => renderInlinePromptTemplate("Task {{task_label}}", values)).toThrow(
      "Unresolved placeholder in prompt_template",
    );
  });
});
