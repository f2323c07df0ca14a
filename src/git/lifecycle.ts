/**
 * Git lifecycle coordinator: feature branch per task, merge into develop, tags, rollback.
 * Purpose: tie task outcomes to repository history without letting two git commands overlap.
 * Assumptions: only constructed when the roadmap has git.enabled; the project dir is the repo root.
 * Usage: const lifecycle = new GitLifecycle(createGitPrimitives(dir)); await lifecycle.ensureRepo();
 */

import path from "node:path";

import fse from "fs-extra";

import { HOME_DIR_NAME } from "../core/paths.js";
import { buildProjectGitignore, ensureGitignoreEntry } from "../core/project-gitignore.js";
import { taskLabel } from "../core/roadmap.js";
import type { RoadmapTask } from "../core/roadmap-schema.js";
import { SerialQueue } from "../core/serial-queue.js";

import {
  DEFAULT_REMOTE,
  INTEGRATION_BRANCH,
  MAIN_BRANCH,
  buildMilestoneTagName,
  buildTaskBranchName,
  buildTaskTagName,
} from "./branches.js";
import { isUnmatchedPathspecError, type GitPrimitives } from "./git.js";

// =============================================================================
// TYPES
// =============================================================================

export type EnsureRepoResult = {
  initialized: boolean;
  createdDevelop: boolean;
  gitignoreUpdated: boolean;
};

export type FinishTaskOptions = {
  // Empty means "stage everything".
  paths?: string[];
};

export type FinishTaskResult = {
  branch: string;
  tag: string;
  skippedPaths: string[];
  pushed: boolean;
};

export type TagMilestoneResult = {
  tag: string;
  pushed: boolean;
};

export const SCAFFOLD_COMMIT_MESSAGE = "chore: initial project scaffold";

// =============================================================================
// COORDINATOR
// =============================================================================

export class GitLifecycle {
  // One queue per process: every mutating call waits for the previous one.
  private readonly queue = new SerialQueue();

  constructor(private readonly git: GitPrimitives) {}

  get cwd(): string {
    return this.git.cwd;
  }

  ensureRepo(): Promise<EnsureRepoResult> {
    return this.queue.enqueue(async () => {
      if (!(await this.git.isRepo())) {
        const gitignoreUpdated = await this.writeInitialGitignore();
        await this.git.init();
        await this.git.add(["."]);
        await this.git.commit(SCAFFOLD_COMMIT_MESSAGE, { allowEmpty: true });
        await this.git.renameBranch(MAIN_BRANCH);
        await this.git.checkoutNewBranch(INTEGRATION_BRANCH);
        return { initialized: true, createdDevelop: true, gitignoreUpdated };
      }

      const gitignoreUpdated = await ensureGitignoreEntry(this.git.cwd, `${HOME_DIR_NAME}/`);
      let createdDevelop = false;
      if (!(await this.git.branchExists(INTEGRATION_BRANCH))) {
        await this.git.checkoutNewBranch(INTEGRATION_BRANCH);
        createdDevelop = true;
      }
      return { initialized: false, createdDevelop, gitignoreUpdated };
    });
  }

  // Uncommitted work stays in the tree, so batch outputs built earlier ride along.
  startTask(task: RoadmapTask): Promise<string> {
    const branch = buildTaskBranchName(task);
    return this.queue.enqueue(async () => {
      if (await this.git.branchExists(branch)) {
        await this.git.checkout(branch);
      } else {
        await this.git.checkoutNewBranch(branch, INTEGRATION_BRANCH);
      }
      return branch;
    });
  }

  finishTask(task: RoadmapTask, opts: FinishTaskOptions = {}): Promise<FinishTaskResult> {
    const branch = buildTaskBranchName(task);
    const tag = buildTaskTagName(task);
    const paths = opts.paths ?? [];

    return this.queue.enqueue(async () => {
      const skippedPaths = await this.stagePaths(paths);
      await this.git.commit(`feat: ${taskLabel(task)}`, { allowEmpty: true });
      await this.git.checkout(INTEGRATION_BRANCH);
      await this.git.mergeNoFf(branch);
      await this.git.deleteBranch(branch);

      const pushed = await this.git.hasRemote(DEFAULT_REMOTE);
      if (pushed) {
        await this.git.push(DEFAULT_REMOTE, INTEGRATION_BRANCH);
      }
      await this.git.tag(tag);

      return { branch, tag, skippedPaths, pushed };
    });
  }

  tagMilestone(version: string): Promise<TagMilestoneResult> {
    const tag = buildMilestoneTagName(version);
    return this.queue.enqueue(async () => {
      // Milestones tag develop, whatever a resumed run left checked out.
      await this.git.checkout(INTEGRATION_BRANCH);
      await this.git.add(["."]);
      await this.git.commit(`milestone: ${tag}`, { allowEmpty: true });
      await this.git.tag(tag);

      const pushed = await this.git.hasRemote(DEFAULT_REMOTE);
      if (pushed) {
        await this.git.push(DEFAULT_REMOTE, INTEGRATION_BRANCH);
        await this.git.push(DEFAULT_REMOTE, tag);
      }
      return { tag, pushed };
    });
  }

  rollback(task: RoadmapTask): Promise<string> {
    const branch = buildTaskBranchName(task);
    return this.queue.enqueue(async () => {
      await this.git.resetHard("HEAD");
      await this.git.clean();
      await this.git.checkout(INTEGRATION_BRANCH);
      if (await this.git.branchExists(branch)) {
        await this.git.deleteBranch(branch, { force: true });
      }
      return branch;
    });
  }

  discardChanges(): Promise<void> {
    return this.queue.enqueue(async () => {
      await this.git.restoreWorkingTree();
      await this.git.clean();
    });
  }

  workingTreeStatus(): Promise<string> {
    return this.queue.enqueue(() => this.git.status());
  }

  drain(): Promise<void> {
    return this.queue.drain();
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async stagePaths(paths: string[]): Promise<string[]> {
    if (paths.length === 0) {
      await this.git.add(["."]);
      return [];
    }

    const skipped: string[] = [];
    for (const entry of paths) {
      try {
        await this.git.add([entry]);
      } catch (err) {
        if (!isUnmatchedPathspecError(err)) throw err;
        skipped.push(entry);
      }
    }
    return skipped;
  }

  private async writeInitialGitignore(): Promise<boolean> {
    const gitignorePath = path.join(this.git.cwd, ".gitignore");
    if (await fse.pathExists(gitignorePath)) {
      return ensureGitignoreEntry(this.git.cwd, `${HOME_DIR_NAME}/`);
    }
    await fse.writeFile(gitignorePath, buildProjectGitignore(), "utf8");
    return true;
  }
}
