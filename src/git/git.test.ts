import { describe, expect, it } from "vitest";

import { GitError, TaskError } from "../core/errors.js";

import { extractGitErrorOutput, isUnmatchedPathspecError } from "./git.js";

describe("isUnmatchedPathspecError", () => {
  it("detects a pathspec that matched nothing", () => {
    const err = new GitError("git add failed", {
      stdout: "",
      stderr: "fatal: pathspec 'docs/guide.md' did not match any files\n",
    });

    expect(isUnmatchedPathspecError(err)).toBe(true);
  });

  it("ignores other git errors", () => {
    const err = new GitError("git add failed", {
      stdout: "",
      stderr: "fatal: not a git repository (or any of the parent directories): .git\n",
    });

    expect(isUnmatchedPathspecError(err)).toBe(false);
  });

  it("ignores errors that are not git errors", () => {
    expect(isUnmatchedPathspecError(new TaskError("did not match any files"))).toBe(false);
  });
});

describe("extractGitErrorOutput", () => {
  it("returns empty output when the cause carries none", () => {
    expect(extractGitErrorOutput(new GitError("boom"))).toEqual({ stdout: "", stderr: "" });
  });
});
