// Turns SIGINT/SIGTERM into an AbortSignal so a long-running service loop can stop between runs.

export type StopSignalHandler = {
  signal: AbortSignal;
  cleanup: () => void;
  isStopped: () => boolean;
};

const STOP_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export function createStopSignalHandler(
  opts: { onSignal?: (signal: NodeJS.Signals) => void } = {},
): StopSignalHandler {
  const controller = new AbortController();
  const listeners = new Map<NodeJS.Signals, () => void>();
  let cleaned = false;

  const cleanup = (): void => {
    if (cleaned) return;
    cleaned = true;
    for (const [signal, listener] of listeners) {
      process.off(signal, listener);
    }
    listeners.clear();
  };

  for (const signal of STOP_SIGNALS) {
    const listener = (): void => {
      try {
        opts.onSignal?.(signal);
      } finally {
        if (!controller.signal.aborted) controller.abort(signal);
        cleanup();
      }
    };
    listeners.set(signal, listener);
    process.once(signal, listener);
  }

  return {
    signal: controller.signal,
    cleanup,
    isStopped: () => controller.signal.aborted,
  };
}
