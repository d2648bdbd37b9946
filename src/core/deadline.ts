import { GateError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type DeadlineOptions = {
  signal?: AbortSignal;
  timeoutMs?: number;
};

/**
 * One abort signal for a caller's cancellation plus an optional wall-clock limit.
 * Call `dispose()` once the guarded work settles.
 */
export type Deadline = {
  readonly signal: AbortSignal;
  readonly timedOut: boolean;
  readonly canceled: boolean;
  race<T>(work: Promise<T>): Promise<T>;
  dispose(): void;
};

export class DeadlineExceededError extends GateError {
  readonly reason: "timeout" | "canceled";

  constructor(reason: "timeout" | "canceled") {
    super(reason === "timeout" ? "Operation timed out." : "Operation was canceled.");
    this.name = "DeadlineExceededError";
    this.reason = reason;
  }
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function createDeadline(options: DeadlineOptions = {}): Deadline {
  const controller = new AbortController();
  let timedOut = false;
  let canceled = false;

  const onAbort = (): void => {
    if (controller.signal.aborted) return;
    canceled = true;
    controller.abort(new DeadlineExceededError("canceled"));
  };

  const parent = options.signal;
  if (parent) {
    if (parent.aborted) {
      onAbort();
    } else {
      parent.addEventListener("abort", onAbort, { once: true });
    }
  }

  const timer =
    options.timeoutMs !== undefined && !controller.signal.aborted
      ? setTimeout(() => {
          if (controller.signal.aborted) return;
          timedOut = true;
          controller.abort(new DeadlineExceededError("timeout"));
        }, options.timeoutMs)
      : undefined;

  return {
    signal: controller.signal,
    get timedOut() {
      return timedOut;
    },
    get canceled() {
      return canceled;
    },
    race<T>(work: Promise<T>): Promise<T> {
      return new Promise<T>((resolve, reject) => {
        const rejectWithReason = (): void => {
          reject(new DeadlineExceededError(timedOut ? "timeout" : "canceled"));
        };

        if (controller.signal.aborted) {
          rejectWithReason();
          return;
        }

        controller.signal.addEventListener("abort", rejectWithReason, { once: true });
        void work.then(
          (value) => {
            controller.signal.removeEventListener("abort", rejectWithReason);
            resolve(value);
          },
          (err: unknown) => {
            controller.signal.removeEventListener("abort", rejectWithReason);
            reject(err);
          },
        );
      });
    },
    dispose() {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener("abort", onAbort);
    },
  };
}
