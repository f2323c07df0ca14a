import { z } from "zod";

// =============================================================================
// BUDGET CONFIG
// =============================================================================

const TokenPricesSchema = z.object({
  input: z.number().nonnegative(),
  output: z.number().nonnegative(),
  cache_read: z.number().nonnegative().default(0),
  cache_write: z.number().nonnegative().default(0),
});

export const BudgetConfigSchema = z.object({
  monthly_limit_tokens: z.number().int().positive(),
  per_task_limit_tokens: z.number().int().positive(),
  max_attempts_per_task: z.number().int().positive(),
  max_parallel_agents: z.number().int().positive().default(1),
  token_prices_usd_per_million: TokenPricesSchema,
});

export type BudgetConfig = z.infer<typeof BudgetConfigSchema>;
export type TokenPrices = z.infer<typeof TokenPricesSchema>;

// =============================================================================
// RUNNER CONFIG
// =============================================================================

const AgentSchema = z.object({
  command: z.string().min(1).default("opencode"),
  // Handlebars templates; receive phase, task, project, attempt and prompt.
  args: z.array(z.string()).default(["run", "{{prompt}}"]),
  prompt_template: z.string().optional(),
  env: z.record(z.string()).default({}),
  timeout_ms: z.number().int().positive().optional(),
});

const EcosystemCommandsSchema = z.object({
  install: z.string().optional(),
  test: z.string().optional(),
  lint: z.string().optional(),
  coverage: z.string().optional(),
});

export const RunnerConfigSchema = z.object({
  agent: AgentSchema.default({}),
  ecosystems: z.record(EcosystemCommandsSchema).default({}),
  fix_cycle_limit: z.number().int().positive().optional(),
  static_fix_limit: z.number().int().positive().default(2),
  ledger_path: z.string().min(1).optional(),
});

export type RunnerConfig = z.infer<typeof RunnerConfigSchema>;
export type AgentConfig = z.infer<typeof AgentSchema>;
export type EcosystemCommandOverrides = z.infer<typeof EcosystemCommandsSchema>;

export const DEFAULT_RUNNER_CONFIG: RunnerConfig = RunnerConfigSchema.parse({});
