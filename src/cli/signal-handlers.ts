// SIGINT/SIGTERM become an abort signal for the running gate.

export type StopSignal = "SIGINT" | "SIGTERM";

export type StopSignalHandler = {
  signal: AbortSignal;
  cleanup(): void;
};

const STOP_SIGNALS: StopSignal[] = ["SIGINT", "SIGTERM"];

export function createStopSignalHandler(options: { onSignal?: (signal: StopSignal) => void } = {}): StopSignalHandler {
  const controller = new AbortController();
  const listeners = STOP_SIGNALS.map((name) => {
    const listener = (): void => {
      if (controller.signal.aborted) return;
      options.onSignal?.(name);
      controller.abort();
    };
    process.on(name, listener);
    return { name, listener };
  });

  return {
    signal: controller.signal,
    cleanup() {
      for (const { name, listener } of listeners) {
        process.off(name, listener);
      }
    },
  };
}
