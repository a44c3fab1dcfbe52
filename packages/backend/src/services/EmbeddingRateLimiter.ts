import {
  AppError,
  UpstreamError,
  UpstreamTimeoutError
} from "../errors/AppError.js";
import { abortReasonToError, linkAbortSignals, raceAbort, throwIfAborted } from "../utils/abort.js";
import type { EmbeddingRateLimitConfig } from "./embeddingTypes.js";

interface QueuedTask {
  execute: () => Promise<void>;
}

export type AbortableTask<T> = (signal: AbortSignal) => Promise<T>;

export class EmbeddingRateLimiter {
  private readonly config: EmbeddingRateLimitConfig;
  private activeCount = 0;
  private readonly queue: QueuedTask[] = [];
  private readonly requestTimestamps: number[] = [];
  private waitTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(config: Partial<EmbeddingRateLimitConfig> = {}) {
    this.config = {
      maxConcurrent: config.maxConcurrent ?? 4,
      maxRetries: config.maxRetries ?? 3,
      retryDelayMs: config.retryDelayMs ?? 500,
      requestsPerMinute: config.requestsPerMinute ?? 300,
      timeoutMs: config.timeoutMs ?? 30_000
    };
  }

  get pending(): number {
    return this.queue.length;
  }

  get active(): number {
    return this.activeCount;
  }

  /**
   * Runs `task` once a slot frees up. Transient failures are retried with
   * exponential backoff; once the retry budget is spent the call rejects with
   * `UpstreamTimeoutError`. Aborting `signal` rejects at once, queued or not.
   */
  run<T>(task: AbortableTask<T>, signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(abortReasonToError(signal));
    }

    return new Promise<T>((resolve, reject) => {
      const onQueuedAbort = (): void => {
        const position = this.queue.indexOf(item);
        if (position >= 0 && signal) {
          this.queue.splice(position, 1);
          reject(abortReasonToError(signal));
        }
      };

      const item: QueuedTask = {
        execute: () => {
          signal?.removeEventListener("abort", onQueuedAbort);
          return this.executeTask(task, signal).then(resolve, reject);
        }
      };

      signal?.addEventListener("abort", onQueuedAbort, { once: true });
      this.queue.push(item);
      this.drainQueue();
    });
  }

  private drainQueue(): void {
    this.clearWaitTimer();
    this.pruneRequestWindow();

    while (this.activeCount < this.config.maxConcurrent && this.queue.length > 0) {
      const waitMs = this.getWaitMsForRateLimit();
      if (waitMs > 0) {
        this.waitTimer = setTimeout(() => {
          this.waitTimer = null;
          this.drainQueue();
        }, waitMs);
        return;
      }

      const item = this.queue.shift();
      if (!item) {
        return;
      }

      this.activeCount += 1;
      this.requestTimestamps.push(Date.now());
      void item.execute().finally(() => {
        this.activeCount -= 1;
        this.drainQueue();
      });
    }
  }

  private async executeTask<T>(task: AbortableTask<T>, signal: AbortSignal | undefined): Promise<T> {
    let attempt = 0;

    while (true) {
      throwIfAborted(signal);
      const attemptAbort = linkAbortSignals([signal], this.config.timeoutMs);

      try {
        return await raceAbort(task(attemptAbort.signal), attemptAbort.signal);
      } catch (error) {
        if (signal?.aborted) {
          throw abortReasonToError(signal);
        }
        if (!this.isRetryableError(error)) {
          throw error instanceof AppError
            ? error
            : new UpstreamError(`Embedding request failed: ${messageOf(error)}`, undefined, {
                cause: error
              });
        }
        if (attempt >= this.config.maxRetries) {
          throw new UpstreamTimeoutError(
            `Embedding request failed after ${attempt + 1} attempt(s): ${messageOf(error)}`,
            undefined,
            { cause: error }
          );
        }
      } finally {
        attemptAbort.dispose();
      }

      attempt += 1;
      const backoff = this.config.retryDelayMs * 2 ** (attempt - 1);
      await this.sleep(backoff, signal);
    }
  }

  private isRetryableError(error: unknown): boolean {
    if (error instanceof UpstreamTimeoutError) {
      return true;
    }
    if (error instanceof AppError || !(error instanceof Error)) {
      return false;
    }
    if ("status" in error && typeof error.status === "number") {
      return error.status === 429 || error.status >= 500;
    }
    if ("code" in error && typeof error.code === "string") {
      return ["ETIMEDOUT", "ECONNRESET", "ECONNABORTED", "ECONNREFUSED"].includes(error.code);
    }
    return /timeout|timed out|temporarily unavailable|connection error/i.test(error.message);
  }

  private pruneRequestWindow(): void {
    const cutoff = Date.now() - 60_000;
    while (this.requestTimestamps.length > 0) {
      const first = this.requestTimestamps[0];
      if (first === undefined || first >= cutoff) {
        break;
      }
      this.requestTimestamps.shift();
    }
  }

  private getWaitMsForRateLimit(): number {
    if (this.requestTimestamps.length < this.config.requestsPerMinute) {
      return 0;
    }

    const firstInWindow = this.requestTimestamps[0];
    if (!firstInWindow) {
      return 0;
    }

    const elapsed = Date.now() - firstInWindow;
    return Math.max(0, 60_000 - elapsed);
  }

  private clearWaitTimer(): void {
    if (this.waitTimer) {
      clearTimeout(this.waitTimer);
      this.waitTimer = null;
    }
  }

  private sleep(ms: number, signal: AbortSignal | undefined): Promise<void> {
    const delay = new Promise<void>((resolve) => {
      const onAbort = (): void => clearTimeout(timer);
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, ms);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
    return raceAbort(delay, signal);
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
