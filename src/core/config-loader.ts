import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue, ZodType, ZodTypeDef } from "zod";

import {
  BudgetConfigSchema,
  DEFAULT_RUNNER_CONFIG,
  RunnerConfigSchema,
  type BudgetConfig,
  type RunnerConfig,
} from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

export function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

type ConfigKind = {
  label: string;
  missingHint?: string;
  invalidHint: string;
};

const BUDGET_CONFIG: ConfigKind = {
  label: "Budget config",
  missingHint: "Create budget.json in the working directory or pass --budget <path>.",
  invalidHint: "Fix the budget file and rerun. Token limits must be positive integers.",
};

const RUNNER_CONFIG: ConfigKind = {
  label: "Runner config",
  invalidHint: "Fix waypoint.yaml and rerun. Every key is optional.",
};

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!(error instanceof yaml.YAMLException)) {
    return null;
  }

  const { line, column } = error.mark;
  if (typeof line !== "number" || typeof column !== "number") {
    return null;
  }

  return { line: line + 1, column: column + 1 };
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "invalid_enum_value") {
        const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
        return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function createMissingConfigError(kind: ConfigKind, configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: `${kind.label} missing.`,
    message: `${kind.label} not found at ${configPath}.`,
    hint: kind.missingHint,
  });
}

function createInvalidConfigError(
  kind: ConfigKind,
  configPath: string,
  cause: ConfigError,
): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: `${kind.label} invalid.`,
    message: `${kind.label} at ${configPath} is invalid.`,
    hint: kind.invalidHint,
    cause,
  });
}

function throwNormalizedConfigError(error: unknown, kind: ConfigKind, configPath: string): never {
  if (error instanceof UserFacingError) {
    throw error;
  }

  if (error instanceof ConfigError) {
    throw createInvalidConfigError(kind, configPath, error);
  }

  throw error;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadBudgetConfig(configPath: string): BudgetConfig {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw createMissingConfigError(BUDGET_CONFIG, absolutePath);
  }

  return parseConfigFile(absolutePath, BUDGET_CONFIG, BudgetConfigSchema);
}

// waypoint.yaml is optional; a missing file means all defaults.
export function loadRunnerConfig(configPath: string): RunnerConfig {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    return DEFAULT_RUNNER_CONFIG;
  }

  return parseConfigFile(absolutePath, RUNNER_CONFIG, RunnerConfigSchema);
}

// =============================================================================
// INTERNALS
// =============================================================================

function parseConfigFile<T>(
  absolutePath: string,
  kind: ConfigKind,
  schema: ZodType<T, ZodTypeDef, unknown>,
): T {
  try {
    let raw: string;
    try {
      raw = fs.readFileSync(absolutePath, "utf8");
    } catch (err) {
      throw new ConfigError(`Failed to read ${kind.label.toLowerCase()} at ${absolutePath}`, err);
    }

    let doc: unknown;
    try {
      // JSON is a YAML subset, so budget.json parses here too.
      doc = yaml.load(raw);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      const location = resolveYamlErrorLocation(err);
      const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
      throw new ConfigError(
        `Failed to parse ${kind.label.toLowerCase()} at ${absolutePath}${locationDetail}: ${detail}`,
        err,
      );
    }

    // An empty YAML document is an empty config.
    const expanded = expandEnv(doc ?? {}, { file: absolutePath, trail: [] });

    const parsed = schema.safeParse(expanded);
    if (!parsed.success) {
      const details = formatIssues(parsed.error.issues);
      throw new ConfigError(
        `Invalid ${kind.label.toLowerCase()} at ${absolutePath}:\n${details}`,
        parsed.error,
      );
    }

    return parsed.data;
  } catch (err) {
    throwNormalizedConfigError(err, kind, absolutePath);
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
