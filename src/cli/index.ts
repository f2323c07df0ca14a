import { Command, InvalidArgumentError } from "commander";

import { orchestratorLogPath, runStatePath } from "../core/paths.js";

import { loadBudgetForCli, loadProjectForCli, resolveProjectDir, type GlobalCliOptions } from "./config.js";
import { dryRunCommand } from "./dry-run.js";
import { layersCommand, validateCommand } from "./roadmap.js";
import { resetCommand } from "./reset.js";
import { runCommand } from "./run.js";
import { statusCommand } from "./status.js";

type RunCliOptions = {
  mock?: boolean;
  maxParallel?: number;
  review?: boolean;
  home?: string;
  runId?: string;
};

export function buildCli(): Command {
  const program = new Command();

  program
    .name("waypoint")
    .description("Roadmap-driven build orchestrator for coding agents")
    .version("0.1.0")
    .option("--budget <path>", "Budget config (default: ./budget.json)")
    .option("--home <dir>", "State/log home (default: $WAYPOINT_HOME or <project>/.waypoint)")
    .option("-v, --verbose", "Verbose output", false)
    .option("--debug", "Show error details and stack traces", false);

  const globals = (): GlobalCliOptions => program.opts<GlobalCliOptions>();

  program
    .command("run")
    .description("Run every ready task until the roadmap is done, blocked or out of budget")
    .argument("[project]", "Project directory holding ROADMAP.json", ".")
    .option("--mock", "Use the mock agent (no agent process is started)")
    .option("--max-parallel <n>", "Max tasks built concurrently", parsePositiveInteger)
    .option("--no-review", "Skip human review for every task")
    .option("--home <dir>", "State/log home for this run")
    .option("--run-id <id>", "Run ID for a fresh run (default: timestamp)")
    .action(async (projectArg: string, opts: RunCliOptions) => {
      const { budget: budgetPath, verbose, debug } = globals();
      const project = loadProjectForCli({ project: projectArg, home: opts.home ?? globals().home });
      const budget = loadBudgetForCli(budgetPath);

      if (verbose) {
        console.log(`State: ${runStatePath(project.projectName, project.paths)}`);
        console.log(`Log: ${orchestratorLogPath(project.projectName, project.paths)}`);
      }

      await runCommand(project, budget, {
        mock: opts.mock,
        maxParallel: opts.maxParallel,
        review: opts.review,
        runId: opts.runId,
        debug,
      });
    });

  program
    .command("validate")
    .description("Check ROADMAP.json and print every issue")
    .argument("[project]", "Project directory holding ROADMAP.json", ".")
    .action((projectArg: string) => {
      validateCommand(resolveProjectDir(projectArg));
    });

  program
    .command("layers")
    .description("Print the dependency layers and the critical path")
    .argument("[project]", "Project directory holding ROADMAP.json", ".")
    .action((projectArg: string) => {
      layersCommand(loadProjectForCli({ project: projectArg, home: globals().home }));
    });

  program
    .command("dry-run")
    .description("Estimate rounds, tokens and cost for the tasks left")
    .argument("[project]", "Project directory holding ROADMAP.json", ".")
    .option("--max-parallel <n>", "Max tasks built concurrently", parsePositiveInteger)
    .action(async (projectArg: string, opts: { maxParallel?: number }) => {
      const project = loadProjectForCli({ project: projectArg, home: globals().home });
      await dryRunCommand(project, loadBudgetForCli(globals().budget), { maxParallel: opts.maxParallel });
    });

  program
    .command("status")
    .description("Summarize the persisted run state")
    .argument("[project]", "Project directory holding ROADMAP.json", ".")
    .action(async (projectArg: string) => {
      const project = loadProjectForCli({ project: projectArg, home: globals().home });
      await statusCommand(project, loadBudgetForCli(globals().budget));
    });

  program
    .command("reset")
    .description("Reset a task (or every task) to a fresh attempt budget")
    .argument("[taskId]", "Task id to reset (omit with --all)")
    .argument("[project]", "Project directory holding ROADMAP.json")
    .option("--all", "Reset every task", false)
    .action(async (first: string | undefined, second: string | undefined, opts: { all: boolean }) => {
      // `reset --all [project]` leaves the task id out.
      const projectArg = opts.all && second === undefined ? first : second;
      const taskId = opts.all || first === undefined ? undefined : parsePositiveInteger(first);
      const project = loadProjectForCli({ project: projectArg, home: globals().home });
      await resetCommand(project, loadBudgetForCli(globals().budget), { taskId, all: opts.all });
    });

  return program;
}

export function parsePositiveInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}
