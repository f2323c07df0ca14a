import fs from "node:fs";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { cleanupTempDirs, makeTask, makeTempDir } from "../__tests__/helpers/roadmap-fixtures.js";
import type { AgentRequest } from "../app/orchestrator/ports.js";

import { buildPromptValues, expandContextFiles, renderAgentPrompt } from "./agent-prompt.js";
import { renderAgentArgs } from "./command-agent.js";
import { MockAgentInvoker } from "./mock-agent.js";
import { parseAgentUsage } from "./usage.js";

const tempDirs: string[] = [];

afterEach(() => {
  cleanupTempDirs(tempDirs);
});

function request(overrides: Partial<AgentRequest> = {}): AgentRequest {
  const task = makeTask(2, [1], { title: "Parse Config", acceptance: "config loads" });
  return {
    phase: "build",
    task,
    project: "demo",
    attempt: 1,
    context: { projectDir: "/nonexistent", tasks: [task], ecosystem: "node" },
    ...overrides,
  };
}

describe("parseAgentUsage", () => {
  it("sums usage lines and skips everything else", () => {
    const output = [
      "starting",
      JSON.stringify({ type: "turn.completed", usage: { input_tokens: 100, output_tokens: 20 } }),
      "{not json",
      JSON.stringify({ payload: { event: { usage: { input_tokens: 5, cached_input_tokens: 7 } } } }),
      JSON.stringify({ tokens: { input: 1, output: 2, cache: { read: 3, write: 4 } } }),
    ].join("\n");

    expect(parseAgentUsage(output)).toEqual({ input: 106, output: 22, cache_read: 10, cache_write: 4 });
  });

  it("returns zero usage for plain text", () => {
    expect(parseAgentUsage("done\n")).toEqual({ input: 0, output: 0, cache_read: 0, cache_write: 0 });
  });
});

describe("renderAgentArgs", () => {
  it("fills phase, task and prompt placeholders", () => {
    const args = renderAgentArgs(["run", "--title", "{{task.id}}-{{phase}}", "{{prompt}}"], {
      phase: "fix",
      project: "demo",
      attempt: 2,
      prompt: "Fix it <now>",
      task: makeTask(4, [1]),
    });

    expect(args).toEqual(["run", "--title", "4-fix", "Fix it <now>"]);
  });

  it("rejects unknown placeholders", () => {
    expect(() =>
      renderAgentArgs(["{{model}}"], {
        phase: "build",
        project: "demo",
        attempt: 1,
        prompt: "",
        task: makeTask(1, []),
      }),
    ).toThrow();
  });
});

describe("buildPromptValues", () => {
  it("lists batch siblings but not the task itself", async () => {
    const lead = makeTask(2, [1], { title: "Parse Config" });
    const sibling = makeTask(3, [1], { title: "Write Docs" });

    const values = await buildPromptValues(
      request({ task: lead, context: { projectDir: "/nonexistent", tasks: [lead, sibling] } }),
    );

    expect(values.task_label).toBe("002 - Parse Config");
    expect(values.batch_tasks).toBe("- 003 - Write Docs");
    expect(values.outputs).toBe("- src/task-2.ts");
    expect(values.ecosystem).toBe("unspecified");
  });
});

describe("expandContextFiles", () => {
  it("expands globs and keeps unmatched entries verbatim", async () => {
    const dir = makeTempDir("waypoint-agent-", tempDirs);
    fs.mkdirSync(path.join(dir, "src"));
    fs.writeFileSync(path.join(dir, "src", "b.ts"), "");
    fs.writeFileSync(path.join(dir, "src", "a.ts"), "");

    const files = await expandContextFiles(["src/*.ts", "docs/missing.md"], dir);

    expect(files).toEqual(["src/a.ts", "src/b.ts", "docs/missing.md"]);
  });
});

describe("renderAgentPrompt", () => {
  it("renders the build template with the acceptance criteria", async () => {
    const prompt = await renderAgentPrompt(request());

    expect(prompt).toContain("Task 002 - Parse Config (attempt 1)");
    expect(prompt).toContain("config loads");
    expect(prompt).not.toMatch(/\{\{.+\}\}/);
  });

  it("prefers an inline template", async () => {
    const prompt = await renderAgentPrompt(request(), "{{phase}} {{task_label}} for {{project}}");

    expect(prompt).toBe("build 002 - Parse Config for demo");
  });

  it("refuses phases that never reach the agent", async () => {
    await expect(renderAgentPrompt(request({ phase: "commit" }))).rejects.toThrow(
      "Phase commit does not invoke the agent",
    );
  });
});

describe("MockAgentInvoker", () => {
  it("succeeds with fixed usage", async () => {
    const result = await new MockAgentInvoker().invoke(request());

    expect(result).toEqual({
      success: true,
      output: "mock build for task 002 (attempt 1)",
      usage: { input: 1200, output: 300, cache_read: 0, cache_write: 0 },
    });
  });
});
