/**
 * Ecosystem command table: how to install, test, lint and measure coverage per ecosystem.
 * Purpose: resolve the check commands for a task from built-in defaults plus waypoint.yaml overrides.
 * Assumptions: commands run through a shell in the project dir; install follows the manifests present.
 * Usage: await new TableEcosystemCommands({ projectDir, overrides }).resolve("python")
 */

import fg from "fast-glob";

import type { EcosystemCommandOverrides } from "../core/config.js";
import type { EcosystemCommandSet, EcosystemCommands } from "../app/orchestrator/ports.js";

// =============================================================================
// DEFAULTS
// =============================================================================

type EcosystemDefaults = Omit<EcosystemCommandSet, "install">;

export const DEFAULT_ECOSYSTEM_COMMANDS: Readonly<Record<string, EcosystemDefaults>> = {
  python: {
    test: "pytest --tb=short",
    lint: "ruff check .",
    coverage: "pytest --cov --cov-report=term-missing --tb=short",
  },
  node: { test: "npm test", lint: "npx tsc --noEmit" },
  deno: { test: "deno test", lint: "deno lint" },
  go: { test: "go test ./...", lint: "go vet ./..." },
  rust: { test: "cargo test", lint: "cargo clippy -- -D warnings" },
};

// Every manifest present gets installed, in this order.
export const DEPENDENCY_INSTALLERS: ReadonlyArray<{ manifest: string; command: string }> = [
  { manifest: "requirements.txt", command: "python -m pip install --prefer-binary -r requirements.txt" },
  { manifest: "pyproject.toml", command: "python -m pip install --prefer-binary -e ." },
  { manifest: "package.json", command: "npm install" },
  { manifest: "Gemfile", command: "bundle install" },
  { manifest: "go.mod", command: "go mod download" },
  { manifest: "Cargo.toml", command: "cargo fetch" },
];

// =============================================================================
// RESOLVER
// =============================================================================

export type TableEcosystemCommandsOptions = {
  projectDir: string;
  overrides?: Record<string, EcosystemCommandOverrides>;
};

export class TableEcosystemCommands implements EcosystemCommands {
  constructor(private readonly options: TableEcosystemCommandsOptions) {}

  async resolve(ecosystem: string | undefined): Promise<EcosystemCommandSet | null> {
    const key = ecosystem ?? "";
    const defaults = DEFAULT_ECOSYSTEM_COMMANDS[key];
    const override = this.options.overrides?.[key] ?? {};

    const test = override.test ?? defaults?.test;
    if (!test) return null;

    const install = override.install ?? (await detectInstallCommand(this.options.projectDir));
    const lint = override.lint ?? defaults?.lint;
    const coverage = override.coverage ?? defaults?.coverage;

    return {
      test,
      ...(install ? { install } : {}),
      ...(lint ? { lint } : {}),
      ...(coverage ? { coverage } : {}),
    };
  }
}

// Manifests are looked up at resolve time: the build phase may have just written them.
export async function detectInstallCommand(projectDir: string): Promise<string | undefined> {
  const present = new Set(
    await fg(
      DEPENDENCY_INSTALLERS.map((entry) => entry.manifest),
      { cwd: projectDir, deep: 1, onlyFiles: true },
    ),
  );

  const commands = DEPENDENCY_INSTALLERS.filter((entry) => present.has(entry.manifest)).map(
    (entry) => entry.command,
  );
  return commands.length > 0 ? commands.join(" && ") : undefined;
}

// =============================================================================
// COVERAGE
// =============================================================================

// Reads the percentage off a coverage report's TOTAL line.
export function parseCoverageTotal(output: string): number | null {
  const strict = /^TOTAL\s+\d+\s+\d+\s+(\d+(?:\.\d+)?)%/m.exec(output);
  if (strict?.[1]) return Number(strict[1]);

  const loose = /TOTAL.*?(\d+(?:\.\d+)?)%/.exec(output);
  if (loose?.[1]) return Number(loose[1]);

  return null;
}
