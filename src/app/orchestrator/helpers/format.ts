/*
Pure formatting helpers shared by run summaries, dry-run estimates and the CLI.
Assumes token counts and durations are non-negative.
*/

// =============================================================================
// TOKENS & COST
// =============================================================================

export function formatTokens(count: number): string {
  if (count >= 1_000_000) return `${(count / 1_000_000).toFixed(1)}M`;
  if (count >= 1_000) return `${(count / 1_000).toFixed(1)}K`;
  return String(Math.trunc(count));
}

export function formatUsd(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

// =============================================================================
// DURATIONS
// =============================================================================

export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.trunc(seconds));
  if (total < 60) return `${total}s`;

  if (total < 3600) {
    const minutes = Math.floor(total / 60);
    const rest = total % 60;
    return rest > 0 ? `${minutes}m ${rest}s` : `${minutes}m`;
  }

  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  return minutes > 0 ? `${hours}h ${minutes}m` : `${hours}h`;
}
