/*
Purpose: turn SIGINT/SIGTERM into an AbortSignal the run engine observes between phases.
Assumptions: a second signal is not special; the run still stops at the next phase boundary.
Usage: const stop = createRunStopSignalHandler({ onSignal }); ... finally { stop.cleanup(); }
*/

export type RunStopSignalHandler = {
  signal: AbortSignal;
  cleanup: () => void;
  isStopped: () => boolean;
};

const STOP_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export function createRunStopSignalHandler(
  opts: { onSignal?: (signal: NodeJS.Signals) => void } = {},
): RunStopSignalHandler {
  const controller = new AbortController();

  const handler = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) return;
    opts.onSignal?.(signal);
    controller.abort({ signal });
  };

  for (const signal of STOP_SIGNALS) {
    process.on(signal, handler);
  }

  return {
    signal: controller.signal,
    cleanup: () => {
      for (const signal of STOP_SIGNALS) {
        process.off(signal, handler);
      }
    },
    isStopped: () => controller.signal.aborted,
  };
}
