/**
 * Run-engine test kit.
 * Purpose: build a RunContext over a temp project with every port faked, run it, and read
 * back the persisted state and the orchestrator log.
 * Assumptions: fakes are shared across runs of one harness so resume tests see one history.
 * Usage: const harness = await createRunHarness({ document }); const result = await harness.run();
 */

import fse from "fs-extra";
import { afterEach } from "vitest";
import { z } from "zod";

import { BudgetLedger } from "../../../core/budget-ledger.js";
import {
  BudgetConfigSchema,
  RunnerConfigSchema,
  type BudgetConfig,
  type RunnerConfig,
} from "../../../core/config.js";
import { createPathsContext, orchestratorLogPath, type PathsContext } from "../../../core/paths.js";
import type { Roadmap } from "../../../core/roadmap.js";
import { StateStore } from "../../../core/state-store.js";
import type { RunState } from "../../../core/state.js";
import {
  buildRoadmap,
  cleanupTempDirs,
  makeTempDir,
  type RoadmapDocumentInput,
} from "../../../__tests__/helpers/roadmap-fixtures.js";
import { runEngine, type RunResult } from "../run/run-engine.js";
import { buildRunContext, resolveLedgerPath } from "../run-context-builder.js";
import type { RunOptions } from "../run-context.js";

import {
  FakeAgent,
  FakeClock,
  FakeCommandRunner,
  FakeDeployRunner,
  FakeEcosystemCommands,
  FakeGit,
  FakeNotifier,
  FakeReviewGate,
} from "./fakes.js";

// =============================================================================
// TYPES
// =============================================================================

export const PROJECT_NAME = "demo";

export type BudgetOverrides = Partial<Omit<BudgetConfig, "token_prices_usd_per_million">>;

export type RunHarness = {
  projectDir: string;
  paths: PathsContext;
  roadmap: Roadmap;
  budget: BudgetConfig;
  runner: RunnerConfig;
  agent: FakeAgent;
  commands: FakeCommandRunner;
  git: FakeGit;
  notifier: FakeNotifier;
  reviewGate: FakeReviewGate;
  deploy: FakeDeployRunner;
  clock: FakeClock;
  run(options?: RunOptions): Promise<RunResult>;
  loadState(): Promise<RunState>;
  readLogEvents(): Promise<LogLine[]>;
  recordUsage(taskId: number, tokens: number): Promise<void>;
};

const LogLineSchema = z
  .object({
    type: z.string(),
    run_id: z.string(),
    task_id: z.string().optional(),
  })
  .passthrough();

export type LogLine = z.infer<typeof LogLineSchema>;

// =============================================================================
// HOOKS
// =============================================================================

const tempDirs: string[] = [];

export function registerRunEngineTestHooks(): void {
  afterEach(() => {
    cleanupTempDirs(tempDirs);
  });
}

// =============================================================================
// HARNESS
// =============================================================================

export function buildBudget(overrides: BudgetOverrides = {}): BudgetConfig {
  return BudgetConfigSchema.parse({
    monthly_limit_tokens: 1_000_000,
    per_task_limit_tokens: 100_000,
    max_attempts_per_task: 3,
    max_parallel_agents: 1,
    token_prices_usd_per_million: { input: 3, output: 15, cache_read: 0.3, cache_write: 3.75 },
    ...overrides,
  });
}

export async function createRunHarness(input: {
  document: RoadmapDocumentInput;
  budget?: BudgetOverrides;
  runner?: Record<string, unknown>;
}): Promise<RunHarness> {
  const projectDir = makeTempDir("waypoint-run-", tempDirs);
  const paths = createPathsContext({ projectDir, home: makeTempDir("waypoint-home-", tempDirs) });
  const roadmap = buildRoadmap(input.document);
  const budget = buildBudget(input.budget);
  const runner = RunnerConfigSchema.parse(input.runner ?? {});

  const agent = new FakeAgent();
  const commands = new FakeCommandRunner();
  const git = new FakeGit(projectDir);
  const notifier = new FakeNotifier();
  const reviewGate = new FakeReviewGate();
  const deploy = new FakeDeployRunner();
  const clock = new FakeClock();

  let runCount = 0;
  const logPath = orchestratorLogPath(PROJECT_NAME, paths);

  return {
    projectDir,
    paths,
    roadmap,
    budget,
    runner,
    agent,
    commands,
    git,
    notifier,
    reviewGate,
    deploy,
    clock,

    async run(options: RunOptions = {}): Promise<RunResult> {
      runCount += 1;
      const ctx = await buildRunContext({
        projectDir,
        roadmap,
        budget,
        runner,
        paths,
        options: { runId: `run-${runCount}`, mock: false, ...options },
        ports: {
          agent,
          commands: new FakeEcosystemCommands(),
          runner: commands,
          git,
          notifier,
          reviewGate,
          deploy,
          clock,
        },
      });
      return runEngine(ctx);
    },

    async loadState(): Promise<RunState> {
      const state = await new StateStore(PROJECT_NAME, paths).load();
      if (!state) {
        throw new Error(`No run state persisted under ${paths.home}`);
      }
      return state;
    },

    async readLogEvents(): Promise<LogLine[]> {
      if (!(await fse.pathExists(logPath))) return [];
      const text = await fse.readFile(logPath, "utf8");
      return text
        .split("\n")
        .filter((line) => line.trim().length > 0)
        .map((line) => LogLineSchema.parse(JSON.parse(line)));
    },

    async recordUsage(taskId: number, tokens: number): Promise<void> {
      const ledger = await BudgetLedger.load({
        filePath: resolveLedgerPath(runner, projectDir, paths),
        project: PROJECT_NAME,
        config: budget,
        now: () => clock.now(),
      });
      await ledger.record(taskId, "build", { input: tokens, output: 0, cache_read: 0, cache_write: 0 }, { attempt: 0 });
      await ledger.flush();
    },
  };
}

export function eventsOfType(events: LogLine[], type: string): LogLine[] {
  return events.filter((event) => event.type === type);
}
