import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { EXIT_CODES, RoadmapValidationError } from "./errors.js";
import {
  formatRoadmapIssue,
  isMilestone,
  loadRoadmap,
  milestoneVersion,
  taskLabel,
  taskSlug,
  validateRoadmap,
} from "./roadmap.js";
import { layers } from "./task-graph.js";

// =============================================================================
// HELPERS
// =============================================================================

type TaskEntry = Record<string, unknown>;

function entry(id: number, dependsOn: number[], outputs: string[], extra: TaskEntry = {}): TaskEntry {
  return {
    id,
    title: `Task ${id}`,
    depends_on: dependsOn,
    outputs,
    acceptance: "Tests pass",
    ...extra,
  };
}

function doc(tasks: TaskEntry[], extra: Record<string, unknown> = {}): { document: unknown } {
  return { document: { name: "demo", tasks, ...extra } };
}

function errorsOf(source: { document: unknown }) {
  return validateRoadmap(source).issues.filter((issue) => issue.level === "error");
}

// =============================================================================
// TESTS
// =============================================================================

describe("loadRoadmap", () => {
  it("loads a root with two parallel children into two layers", () => {
    const roadmap = loadRoadmap(
      doc([
        entry(1, [], ["package.json"]),
        entry(2, [1], ["src/a.ts"]),
        entry(3, [1], ["src/b.ts"]),
      ]),
    );

    expect(roadmap.tasks.map((task) => task.id)).toEqual([1, 2, 3]);
    expect(layers(roadmap.graph)).toEqual([[1], [2, 3]]);
    expect(roadmap.warnings).toEqual([]);
  });

  it("rejects two root tasks with a single-root violation", () => {
    const errors = errorsOf(doc([entry(1, [], ["a.ts"]), entry(2, [], ["b.ts"])]));

    expect(errors).toEqual([
      {
        level: "error",
        message: "Multiple root tasks (depends_on: []): 001, 002; exactly one is allowed",
      },
    ]);
  });

  it("rejects a dependency on a higher-numbered task", () => {
    const errors = errorsOf(
      doc([entry(1, [], ["a.ts"]), entry(2, [3], ["b.ts"]), entry(3, [1], ["c.ts"])]),
    );

    expect(errors).toEqual([
      {
        level: "error",
        message: "depends_on 003 is a forward reference (later than 002)",
        taskId: 2,
        field: "depends_on",
      },
    ]);
  });

  it("rejects overlapping outputs between tasks sharing a dependency set", () => {
    const errors = errorsOf(
      doc([entry(1, [], ["package.json"]), entry(2, [1], ["src/a.ts"]), entry(3, [1], ["src/a.ts"])]),
    );

    expect(errors).toEqual([
      {
        level: "error",
        message: "Outputs overlap with task 002 (same dependencies): src/a.ts",
        taskId: 3,
        field: "outputs",
      },
    ]);
  });

  it("treats directory prefixes and globs as overlapping", () => {
    const prefix = errorsOf(
      doc([entry(1, [], ["package.json"]), entry(2, [1], ["src/lib/"]), entry(3, [1], ["src/lib/x.ts"])]),
    );
    const glob = errorsOf(
      doc([entry(1, [], ["package.json"]), entry(2, [1], ["src/**/*.ts"]), entry(3, [1], ["src/a.ts"])]),
    );

    expect(prefix.map((issue) => issue.message)).toEqual([
      "Outputs overlap with task 002 (same dependencies): src/lib/ ~ src/lib/x.ts",
    ]);
    expect(glob.map((issue) => issue.message)).toEqual([
      "Outputs overlap with task 002 (same dependencies): src/**/*.ts ~ src/a.ts",
    ]);
  });

  it("allows the same outputs when dependency sets differ", () => {
    const result = validateRoadmap(
      doc([entry(1, [], ["package.json"]), entry(2, [1], ["src/a.ts"]), entry(3, [2], ["src/a.ts"])]),
    );

    expect(result.ok).toBe(true);
  });

  it("requires outputs, acceptance and depends_on on non-milestone tasks", () => {
    // Task 2 has no depends_on, so it also counts as a second root.
    const errors = errorsOf(
      doc([
        entry(1, [], ["package.json"]),
        { id: 2, title: "Missing bits" },
        { id: 3, title: "Release", agent: "milestone", depends_on: [1], version: "1.0.0" },
      ]),
    );

    expect(errors.map((issue) => [issue.taskId, issue.field])).toEqual([
      [2, "outputs"],
      [2, "acceptance"],
      [2, "depends_on"],
      [undefined, undefined],
    ]);
  });

  it("reports gaps, duplicates and self references", () => {
    const gap = errorsOf(doc([entry(1, [], ["a.ts"]), entry(3, [1], ["c.ts"])]));
    const self = errorsOf(doc([entry(1, [], ["a.ts"]), entry(2, [2], ["b.ts"])]));
    const duplicate = errorsOf(doc([entry(1, [], ["a.ts"]), entry(2, [1], ["b.ts"]), entry(2, [1], ["c.ts"])]));

    expect(gap.map((issue) => issue.message)).toEqual(["Gap: task 002 is missing"]);
    expect(self.map((issue) => issue.message)).toEqual(["Task depends on itself"]);
    expect(duplicate.map((issue) => issue.message)).toEqual(["Duplicate task number 002"]);
  });

  it("rejects titles longer than six words", () => {
    const errors = errorsOf(
      doc([entry(1, [], ["a.ts"], { title: "One two three four five six seven" })]),
    );

    expect(errors.map((issue) => issue.message)).toEqual([
      "Title is 7 words (max 6): 'One two three four five six seven'",
    ]);
  });

  it("enforces architecture namespaces across dependencies", () => {
    const errors = errorsOf(
      doc([
        entry(1, [], ["package.json"]),
        entry(2, [1], ["src/render/view.ts"]),
        entry(3, [2], ["src/core/model.ts"]),
      ]),
    );

    expect(errors).toEqual([
      {
        level: "error",
        message: "Architecture violation: 'src/core/' task depends on 'src/render/' task 002",
        taskId: 3,
        field: "depends_on",
      },
    ]);
  });

  it("reports schema errors with the task id and field", () => {
    const errors = errorsOf(doc([entry(1, [], ["a.ts"]), entry(2, [1], ["b.ts"], { deploy: "yes" })]));

    expect(errors).toEqual([
      { level: "error", message: "Expected boolean, received string", field: "deploy", taskId: 2 },
    ]);
  });

  it("keeps warnings without blocking the load", () => {
    const roadmap = loadRoadmap(
      doc(
        [
          entry(1, [], ["a.ts"], { agent: "wizard", owner: "me" }),
          { id: 2, title: "Release", agent: "milestone", depends_on: [1] },
        ],
        { ecosystem: "cobol", preamble: "Target task `7` ships the first cut." },
      ),
    );

    expect(roadmap.warnings.map(formatRoadmapIssue)).toEqual([
      "WARNING roadmap [ecosystem]: Unknown ecosystem 'cobol'",
      "WARNING 001 [agent]: Unknown agent 'wizard'",
      "WARNING 001 [owner]: Unknown task field 'owner'",
      "WARNING 002 [version]: Milestone has no version; falling back to 0.0.2",
      "WARNING roadmap [preamble]: Preamble references task 007 which does not exist",
    ]);
  });

  it("throws RoadmapValidationError carrying every issue", () => {
    const source = doc([entry(1, [], ["a.ts"]), entry(2, [], ["b.ts"])]);

    expect(() => loadRoadmap(source)).toThrow(RoadmapValidationError);
    try {
      loadRoadmap(source);
    } catch (err) {
      expect(err).toBeInstanceOf(RoadmapValidationError);
      if (err instanceof RoadmapValidationError) {
        expect(err.exitCode).toBe(EXIT_CODES.validation);
        expect(err.issues).toHaveLength(1);
      }
    }
  });

  it("reads roadmaps from disk and reports invalid JSON", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "roadmap-"));
    try {
      const good = path.join(tmpDir, "ROADMAP.json");
      fs.writeFileSync(good, JSON.stringify({ tasks: [entry(1, [], ["a.ts"])] }));
      const bad = path.join(tmpDir, "BROKEN.json");
      fs.writeFileSync(bad, "{ not json");

      expect(loadRoadmap(good).tasks).toHaveLength(1);

      const result = validateRoadmap(bad);
      expect(result.ok).toBe(false);
      expect(result.issues[0]?.message.startsWith("Invalid JSON:")).toBe(true);
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });
});

describe("task helpers", () => {
  it("derives labels, slugs and milestone versions", () => {
    const roadmap = loadRoadmap(
      doc([
        entry(1, [], ["a.ts"], { title: "Setup Project" }),
        { id: 2, title: "First Cut", agent: "milestone", depends_on: [1] },
      ]),
    );
    const [setup, release] = roadmap.tasks;
    if (!setup || !release) throw new Error("expected two tasks");

    expect(taskLabel(setup)).toBe("001 - Setup Project");
    expect(taskSlug(setup)).toBe("001-setup-project");
    expect(isMilestone(release)).toBe(true);
    expect(milestoneVersion(release)).toBe("0.0.2");
  });
});
