import { EMPTY_USAGE, type TokenUsage } from "../core/budget-ledger.js";

// =============================================================================
// PUBLIC API
// =============================================================================

// Sums every usage report an agent printed as a JSON line. Non-JSON lines are ignored.
export function parseAgentUsage(output: string): TokenUsage {
  const total: TokenUsage = { ...EMPTY_USAGE };

  for (const line of output.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed.startsWith("{")) continue;

    const usage = extractUsage(safeParseJson(trimmed));
    if (!usage) continue;

    total.input += usage.input;
    total.output += usage.output;
    total.cache_read += usage.cache_read;
    total.cache_write += usage.cache_write;
  }

  return total;
}

// =============================================================================
// INTERNALS
// =============================================================================

// Accepts `{usage: {...}}`, `{tokens: {...}}` and the same shapes nested under `event`/`payload.event`.
function extractUsage(value: unknown): TokenUsage | null {
  if (!isRecord(value)) return null;

  const nested = isRecord(value.payload) ? value.payload.event : value.event;
  if (isRecord(nested)) {
    const inner = extractUsage(nested);
    if (inner) return inner;
  }

  const usage = isRecord(value.usage) ? value.usage : isRecord(value.tokens) ? value.tokens : null;
  if (!usage) return null;

  const cache = isRecord(usage.cache) ? usage.cache : {};
  return {
    input: firstNumber(usage, "input_tokens", "input"),
    output: firstNumber(usage, "output_tokens", "output"),
    cache_read:
      firstNumber(usage, "cached_input_tokens", "cache_read_input_tokens", "cache_read") ||
      firstNumber(cache, "read"),
    cache_write:
      firstNumber(usage, "cache_creation_input_tokens", "cache_write") || firstNumber(cache, "write"),
  };
}

function firstNumber(record: Record<string, unknown>, ...keys: string[]): number {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "number" && Number.isFinite(value) && value >= 0) {
      return Math.trunc(value);
    }
  }
  return 0;
}

function safeParseJson(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
