import path from "node:path";

import { execa, ExecaError, type Options } from "execa";
import fse from "fs-extra";

import { GitError } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type GitResult = { stdout: string; stderr: string; exitCode: number };

export type GitFailureOutput = { stdout: string; stderr: string };

// Repository-bound git operations. The lifecycle coordinator only talks to git through this.
export interface GitPrimitives {
  readonly cwd: string;
  isRepo(): Promise<boolean>;
  init(): Promise<void>;
  add(paths: string[]): Promise<void>;
  commit(message: string, opts?: { allowEmpty?: boolean }): Promise<void>;
  renameBranch(name: string): Promise<void>;
  currentBranch(): Promise<string>;
  branchExists(branch: string): Promise<boolean>;
  checkout(branch: string): Promise<void>;
  checkoutNewBranch(branch: string, startPoint?: string): Promise<void>;
  mergeNoFf(ref: string): Promise<void>;
  deleteBranch(branch: string, opts?: { force?: boolean }): Promise<void>;
  tag(name: string): Promise<void>;
  hasRemote(remote: string): Promise<boolean>;
  push(remote: string, ref: string): Promise<void>;
  resetHard(ref: string): Promise<void>;
  clean(): Promise<void>;
  restoreWorkingTree(): Promise<void>;
  status(): Promise<string>;
}

// =============================================================================
// COMMAND WRAPPER
// =============================================================================

export async function git(cwd: string, args: string[], opts: Options = {}): Promise<GitResult> {
  try {
    const res = await execa("git", args, {
      cwd,
      stdio: "pipe",
      env: process.env,
      ...opts,
    });
    return {
      stdout: outputText(res.stdout),
      stderr: outputText(res.stderr),
      exitCode: res.exitCode ?? -1,
    };
  } catch (err) {
    const output: GitFailureOutput =
      err instanceof ExecaError
        ? { stdout: outputText(err.stdout), stderr: outputText(err.stderr) || err.message }
        : { stdout: "", stderr: err instanceof Error ? err.message : String(err) };
    throw new GitError(`git ${args.join(" ")} failed (cwd=${cwd}): ${output.stderr}`, output);
  }
}

export function extractGitErrorOutput(err: GitError): GitFailureOutput {
  const cause = err.cause;
  if (cause && typeof cause === "object" && "stdout" in cause && "stderr" in cause) {
    return { stdout: outputText(cause.stdout), stderr: outputText(cause.stderr) };
  }
  return { stdout: "", stderr: "" };
}

export function isUnmatchedPathspecError(err: unknown): boolean {
  if (!(err instanceof GitError)) return false;
  const { stderr } = extractGitErrorOutput(err);
  return stderr.toLowerCase().includes("did not match any files");
}

// =============================================================================
// EXECA PRIMITIVES
// =============================================================================

export function createGitPrimitives(cwd: string): GitPrimitives {
  return {
    cwd,
    // The project must own its repository; a parent checkout does not count.
    async isRepo() {
      return fse.pathExists(path.join(cwd, ".git"));
    },
    async init() {
      await git(cwd, ["init"]);
    },
    async add(paths) {
      await git(cwd, ["add", "--", ...paths]);
    },
    async commit(message, opts = {}) {
      const args = ["commit", "-m", message];
      if (opts.allowEmpty) args.push("--allow-empty");
      await git(cwd, args);
    },
    async renameBranch(name) {
      await git(cwd, ["branch", "-M", name]);
    },
    async currentBranch() {
      const res = await git(cwd, ["rev-parse", "--abbrev-ref", "HEAD"]);
      return res.stdout.trim();
    },
    async branchExists(branch) {
      const res = await git(cwd, ["rev-parse", "--verify", "--quiet", `refs/heads/${branch}`], {
        reject: false,
      });
      return res.exitCode === 0;
    },
    async checkout(branch) {
      await git(cwd, ["checkout", branch]);
    },
    async checkoutNewBranch(branch, startPoint) {
      const args = ["checkout", "-b", branch];
      if (startPoint) args.push(startPoint);
      await git(cwd, args);
    },
    async mergeNoFf(ref) {
      await git(cwd, ["merge", "--no-ff", "--no-edit", ref]);
    },
    async deleteBranch(branch, opts = {}) {
      await git(cwd, ["branch", opts.force ? "-D" : "-d", branch]);
    },
    async tag(name) {
      // -f so a task re-run after an operator reset can move its tag.
      await git(cwd, ["tag", "-f", name]);
    },
    async hasRemote(remote) {
      const res = await git(cwd, ["remote", "get-url", remote], { reject: false });
      return res.exitCode === 0 && res.stdout.trim().length > 0;
    },
    async push(remote, ref) {
      await git(cwd, ["push", remote, ref]);
    },
    async resetHard(ref) {
      await git(cwd, ["reset", "--hard", ref]);
    },
    async clean() {
      await git(cwd, ["clean", "-fd"]);
    },
    async restoreWorkingTree() {
      await git(cwd, ["checkout", "--", "."]);
    },
    async status() {
      const res = await git(cwd, ["status", "--short"]);
      return res.stdout;
    },
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function outputText(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined || value === null) return "";
  if (Array.isArray(value)) return value.map(outputText).join("\n");
  if (value instanceof Uint8Array) return Buffer.from(value).toString("utf8");
  return String(value);
}
