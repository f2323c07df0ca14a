// Stop requests reach the engine as AbortSignal reasons: the CLI aborts with { signal },
// tests and embedders may pass a bare signal name.

export function signalFromAbortReason(reason: unknown): string | undefined {
  if (typeof reason === "string") return reason || undefined;
  if (reason instanceof Error) return undefined;
  if (reason && typeof reason === "object" && "signal" in reason && typeof reason.signal === "string") {
    return reason.signal;
  }
  return undefined;
}
