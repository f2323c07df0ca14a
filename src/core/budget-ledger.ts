/**
 * BudgetLedger is the durable log of agent token consumption.
 * Purpose: gate dispatch on the monthly ceiling, gate phases on the per-task ceiling, and price sessions.
 * Assumptions: one ledger file may be shared by several projects; totals are always derived from sessions.
 * Usage: const ledger = await BudgetLedger.load({ filePath, project, config });
 */

import fs from "node:fs";

import { z } from "zod";

import type { BudgetConfig, TokenPrices } from "./config.js";
import { PersistenceError } from "./errors.js";
import { PhaseSchema, type Phase } from "./phases.js";
import { SerialQueue } from "./serial-queue.js";
import { isoNow, readJsonFile, writeJsonFileAtomic } from "./utils.js";

// =============================================================================
// SCHEMAS
// =============================================================================

export const TokenUsageSchema = z.object({
  input: z.number().int().nonnegative().default(0),
  output: z.number().int().nonnegative().default(0),
  cache_read: z.number().int().nonnegative().default(0),
  cache_write: z.number().int().nonnegative().default(0),
});

export type TokenUsage = z.infer<typeof TokenUsageSchema>;

export const LedgerSessionSchema = z.object({
  project: z.string(),
  task: z.number().int(),
  phase: PhaseSchema,
  tokens: z.number().int().nonnegative(),
  tokens_in: z.number().int().nonnegative(),
  tokens_out: z.number().int().nonnegative(),
  tokens_cache_read: z.number().int().nonnegative(),
  tokens_cache_write: z.number().int().nonnegative(),
  attempt: z.number().int().nonnegative(),
  ts: z.string(),
  parallel_with: z.array(z.number().int()).optional(),
});

export type LedgerSession = z.infer<typeof LedgerSessionSchema>;

const TaskAccountSchema = z.object({
  attempts: z.number().int().nonnegative().default(0),
  // Sessions before this index predate the last reset and no longer count against the task.
  since: z.number().int().nonnegative().default(0),
});

type TaskAccount = z.infer<typeof TaskAccountSchema>;

const LedgerFileSchema = z.object({
  sessions: z.array(LedgerSessionSchema).default([]),
  tasks: z.record(TaskAccountSchema).default({}),
});

type LedgerFile = z.infer<typeof LedgerFileSchema>;

export type RecordOptions = {
  attempt: number;
  parallelWith?: number[];
};

export type LedgerTotals = {
  tokens: number;
  sessions: number;
  estimatedCost: number;
};

export const EMPTY_USAGE: TokenUsage = { input: 0, output: 0, cache_read: 0, cache_write: 0 };

// =============================================================================
// PRICING
// =============================================================================

export function totalTokens(usage: TokenUsage): number {
  return usage.input + usage.output + usage.cache_read + usage.cache_write;
}

export function estimatedCost(sessions: LedgerSession[], prices: TokenPrices): number {
  const micro = sessions.reduce(
    (sum, session) =>
      sum +
      session.tokens_in * prices.input +
      session.tokens_out * prices.output +
      session.tokens_cache_read * prices.cache_read +
      session.tokens_cache_write * prices.cache_write,
    0,
  );
  return Math.round((micro / 1_000_000) * 1_000_000) / 1_000_000;
}

export function monthKey(date: Date): string {
  return date.toISOString().slice(0, 7);
}

// =============================================================================
// LEDGER
// =============================================================================

export class BudgetLedger {
  private readonly queue = new SerialQueue();

  private constructor(
    readonly filePath: string,
    readonly project: string,
    readonly config: BudgetConfig,
    private data: LedgerFile,
    private readonly now: () => Date,
  ) {}

  static async load(opts: {
    filePath: string;
    project: string;
    config: BudgetConfig;
    now?: () => Date;
  }): Promise<BudgetLedger> {
    const data = await readLedgerFile(opts.filePath);
    return new BudgetLedger(opts.filePath, opts.project, opts.config, data, opts.now ?? (() => new Date()));
  }

  get sessions(): readonly LedgerSession[] {
    return this.data.sessions;
  }

  // ---------------------------------------------------------------------------
  // Gates
  // ---------------------------------------------------------------------------

  // Gate only: nothing is pre-allocated, so parallel reservations may overshoot by one phase each.
  reserve(_taskId: number): boolean {
    return this.monthlyTokens() < this.config.monthly_limit_tokens;
  }

  taskLimitReached(taskId: number): boolean {
    return this.taskTokens(taskId) >= this.config.per_task_limit_tokens;
  }

  attemptsRemaining(taskId: number): number {
    return Math.max(0, this.config.max_attempts_per_task - this.account(taskId).attempts);
  }

  // ---------------------------------------------------------------------------
  // Totals
  // ---------------------------------------------------------------------------

  monthlyTokens(): number {
    const month = monthKey(this.now());
    return this.data.sessions
      .filter((session) => session.ts.slice(0, 7) === month)
      .reduce((sum, session) => sum + session.tokens, 0);
  }

  remainingMonthlyTokens(): number {
    return Math.max(0, this.config.monthly_limit_tokens - this.monthlyTokens());
  }

  taskTokens(taskId: number): number {
    const since = this.account(taskId).since;
    return this.data.sessions
      .slice(since)
      .filter((session) => session.project === this.project && session.task === taskId)
      .reduce((sum, session) => sum + session.tokens, 0);
  }

  projectSessions(): LedgerSession[] {
    return this.data.sessions.filter((session) => session.project === this.project);
  }

  projectTotals(): LedgerTotals {
    const sessions = this.projectSessions();
    return {
      tokens: sessions.reduce((sum, session) => sum + session.tokens, 0),
      sessions: sessions.length,
      estimatedCost: estimatedCost(sessions, this.config.token_prices_usd_per_million),
    };
  }

  estimatedCost(sessions: LedgerSession[] = this.projectSessions()): number {
    return estimatedCost(sessions, this.config.token_prices_usd_per_million);
  }

  // ---------------------------------------------------------------------------
  // Mutations (serialized)
  // ---------------------------------------------------------------------------

  record(
    taskId: number,
    phase: Phase,
    usage: TokenUsage,
    opts: RecordOptions,
  ): Promise<LedgerSession> {
    return this.queue.enqueue(async () => {
      const session: LedgerSession = {
        project: this.project,
        task: taskId,
        phase,
        tokens: totalTokens(usage),
        tokens_in: usage.input,
        tokens_out: usage.output,
        tokens_cache_read: usage.cache_read,
        tokens_cache_write: usage.cache_write,
        attempt: opts.attempt,
        ts: this.now().toISOString(),
      };
      if (opts.parallelWith && opts.parallelWith.length > 1) {
        session.parallel_with = [...opts.parallelWith];
      }

      const account = this.account(taskId);
      const next: LedgerFile = {
        sessions: [...this.data.sessions, session],
        tasks: {
          ...this.data.tasks,
          [this.accountKey(taskId)]: {
            ...account,
            attempts: Math.max(account.attempts, opts.attempt),
          },
        },
      };

      await this.persist(next);
      return session;
    });
  }

  // Sessions are kept for cost history; only the task's attempt and token counters restart.
  resetTask(taskId: number): Promise<void> {
    return this.queue.enqueue(async () => {
      const next: LedgerFile = {
        sessions: this.data.sessions,
        tasks: {
          ...this.data.tasks,
          [this.accountKey(taskId)]: { attempts: 0, since: this.data.sessions.length },
        },
      };
      await this.persist(next);
    });
  }

  flush(): Promise<void> {
    return this.queue.drain();
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private accountKey(taskId: number): string {
    return `${this.project}/${taskId}`;
  }

  private account(taskId: number): TaskAccount {
    return this.data.tasks[this.accountKey(taskId)] ?? { attempts: 0, since: 0 };
  }

  // In-memory data only advances once the file is on disk.
  private async persist(next: LedgerFile): Promise<void> {
    try {
      await writeJsonFileAtomic(this.filePath, { ...next, updated_at: isoNow() });
    } catch (err) {
      throw new PersistenceError(`Failed to write budget ledger at ${this.filePath}`, this.filePath, err);
    }
    this.data = next;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function readLedgerFile(filePath: string): Promise<LedgerFile> {
  if (!fs.existsSync(filePath)) {
    return { sessions: [], tasks: {} };
  }

  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (err) {
    throw new PersistenceError(`Failed to read budget ledger at ${filePath}`, filePath, err);
  }

  const parsed = LedgerFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new PersistenceError(
      `Budget ledger at ${filePath} is malformed: ${parsed.error.issues[0]?.message ?? "unknown issue"}`,
      filePath,
      parsed.error,
    );
  }
  return parsed.data;
}
