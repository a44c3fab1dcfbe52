import { CancelledError, UpstreamTimeoutError } from "../errors/AppError.js";

export class DeadlineExceededError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Deadline of ${timeoutMs}ms exceeded`);
    this.name = "DeadlineExceededError";
  }
}

/** Converts an aborted signal's reason into the error the caller should see. */
export function abortReasonToError(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof DeadlineExceededError) {
    return new UpstreamTimeoutError(`Request exceeded ${reason.timeoutMs}ms`);
  }
  if (reason instanceof Error && reason.name !== "AbortError") {
    return reason;
  }
  return new CancelledError("Request was cancelled");
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw abortReasonToError(signal);
  }
}

export interface LinkedAbort {
  signal: AbortSignal;
  dispose: () => void;
}

/**
 * Builds a signal that aborts when any of `signals` aborts or when `timeoutMs`
 * elapses. `dispose` must be called once the guarded work settles.
 */
export function linkAbortSignals(
  signals: Array<AbortSignal | undefined>,
  timeoutMs?: number
): LinkedAbort {
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];

  for (const signal of signals) {
    if (!signal) {
      continue;
    }
    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }
    const onAbort = (): void => controller.abort(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    cleanups.push(() => signal.removeEventListener("abort", onAbort));
  }

  if (timeoutMs !== undefined && timeoutMs > 0 && !controller.signal.aborted) {
    const timer = setTimeout(() => controller.abort(new DeadlineExceededError(timeoutMs)), timeoutMs);
    cleanups.push(() => clearTimeout(timer));
  }

  return {
    signal: controller.signal,
    dispose: () => {
      for (const cleanup of cleanups.splice(0)) {
        cleanup();
      }
    }
  };
}

/** Settles with `promise`, or rejects as soon as `signal` aborts. */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    // abandoned: nobody awaits this promise any more
    promise.catch(() => undefined);
    return Promise.reject(abortReasonToError(signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(abortReasonToError(signal));
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}
