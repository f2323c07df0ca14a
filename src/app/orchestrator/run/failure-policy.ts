/**
 * Task failure policy helpers.
 * Purpose: centralize the fix-loop and abandonment decisions the task machine applies.
 * Assumptions: batch-level decisions read the lead task's ledger account.
 */

export const PER_TASK_LIMIT_REASON = "per-task token limit reached";
export const FIX_ATTEMPTS_EXHAUSTED_REASON = "attempts exhausted";
export const FIX_CYCLES_EXHAUSTED_REASON = "fix cycle limit reached";

export type FixDecision = { fix: true } | { fix: false; reason: string };

export type FailureDisposition = "retry" | "abandon";

// =============================================================================
// PUBLIC API
// =============================================================================

export function decideFix(input: {
  attemptsRemaining: number;
  fixCycles: number;
  fixCycleLimit: number | null;
}): FixDecision {
  if (input.attemptsRemaining <= 0) {
    return { fix: false, reason: FIX_ATTEMPTS_EXHAUSTED_REASON };
  }
  if (input.fixCycleLimit !== null && input.fixCycles >= input.fixCycleLimit) {
    return { fix: false, reason: FIX_CYCLES_EXHAUSTED_REASON };
  }
  return { fix: true };
}

// failed -> ready while attempts remain, failed -> abandoned otherwise.
export function resolveFailureDisposition(input: {
  attemptsRemaining: number;
  forceAbandon?: boolean;
}): FailureDisposition {
  if (input.forceAbandon) return "abandon";
  return input.attemptsRemaining > 0 ? "retry" : "abandon";
}
