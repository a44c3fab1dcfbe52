import { getEventListeners } from "node:events";
import { describe, expect, it } from "vitest";
import { CancelledError, UpstreamError, UpstreamTimeoutError } from "../../../src/errors/AppError.js";
import { EmbeddingRateLimiter } from "../../../src/services/EmbeddingRateLimiter.js";
import type { EmbeddingRateLimitConfig } from "../../../src/services/embeddingTypes.js";

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
  }
}

function createLimiter(overrides: Partial<EmbeddingRateLimitConfig> = {}): EmbeddingRateLimiter {
  return new EmbeddingRateLimiter({
    maxConcurrent: 1,
    maxRetries: 3,
    retryDelayMs: 1,
    requestsPerMinute: 100,
    timeoutMs: 5000,
    ...overrides
  });
}

describe("EmbeddingRateLimiter", () => {
  it("retries retryable failures with exponential backoff", async () => {
    const limiter = createLimiter();

    let attempt = 0;
    const result = await limiter.run(async () => {
      attempt += 1;
      if (attempt < 3) {
        throw new HttpError(429, "rate limited");
      }
      return "ok";
    });

    expect(result).toBe("ok");
    expect(attempt).toBe(3);
  });

  it("leaves no abort listeners on the caller's signal after retrying", async () => {
    const limiter = createLimiter();
    const controller = new AbortController();

    let attempt = 0;
    const result = await limiter.run(async () => {
      attempt += 1;
      if (attempt < 3) {
        throw new HttpError(503, "unavailable");
      }
      return "ok";
    }, controller.signal);

    expect(result).toBe("ok");
    expect(attempt).toBe(3);
    expect(getEventListeners(controller.signal, "abort")).toHaveLength(0);
  });

  it("honors maxConcurrent", async () => {
    const limiter = createLimiter({ maxConcurrent: 2, maxRetries: 0 });

    let inFlight = 0;
    let peak = 0;

    const results = await Promise.all(
      Array.from({ length: 6 }).map((_, idx) =>
        limiter.run(async () => {
          inFlight += 1;
          peak = Math.max(peak, inFlight);
          await new Promise((resolve) => {
            setTimeout(resolve, 20 + idx * 2);
          });
          inFlight -= 1;
          return idx;
        })
      )
    );

    expect(peak).toBe(2);
    expect(results).toEqual([0, 1, 2, 3, 4, 5]);
  });

  it("fails with UpstreamTimeoutError once transient retries are exhausted", async () => {
    const limiter = createLimiter({ maxRetries: 2 });

    let attempt = 0;
    const outcome = limiter.run(async () => {
      attempt += 1;
      throw new HttpError(503, "unavailable");
    });

    await expect(outcome).rejects.toBeInstanceOf(UpstreamTimeoutError);
    await expect(outcome).rejects.toThrow("Embedding request failed after 3 attempt(s): unavailable");
    expect(attempt).toBe(3);
  });

  it("does not retry non-transient failures", async () => {
    const limiter = createLimiter();

    let attempt = 0;
    const outcome = limiter.run(async () => {
      attempt += 1;
      throw new HttpError(400, "bad request");
    });

    await expect(outcome).rejects.toBeInstanceOf(UpstreamError);
    await expect(outcome).rejects.toThrow("Embedding request failed: bad request");
    expect(attempt).toBe(1);
  });

  it("aborts an attempt that runs past the per-attempt timeout", async () => {
    const limiter = createLimiter({ maxRetries: 0, timeoutMs: 20 });

    const seen: { signal?: AbortSignal } = {};
    const outcome = limiter.run(
      (signal) =>
        new Promise<string>((_resolve, reject) => {
          seen.signal = signal;
          signal.addEventListener("abort", () => reject(new Error("aborted")));
        })
    );

    await expect(outcome).rejects.toBeInstanceOf(UpstreamTimeoutError);
    expect(seen.signal?.aborted).toBe(true);
  });

  it("rejects a queued task as soon as its signal aborts", async () => {
    const limiter = createLimiter({ maxConcurrent: 1 });

    let releaseFirst: () => void = () => undefined;
    const first = limiter.run(
      () =>
        new Promise<string>((resolve) => {
          releaseFirst = () => resolve("first");
        })
    );

    let secondStarted = false;
    const controller = new AbortController();
    const second = limiter.run(async () => {
      secondStarted = true;
      return "second";
    }, controller.signal);

    expect(limiter.pending).toBe(1);
    controller.abort();

    await expect(second).rejects.toBeInstanceOf(CancelledError);
    expect(limiter.pending).toBe(0);

    releaseFirst();
    await expect(first).resolves.toBe("first");
    expect(secondStarted).toBe(false);
  });

  it("stops waiting out a backoff when the caller aborts", async () => {
    const limiter = createLimiter({ retryDelayMs: 60_000 });
    const controller = new AbortController();

    let attempt = 0;
    const outcome = limiter.run(async () => {
      attempt += 1;
      setTimeout(() => controller.abort(), 10);
      throw new HttpError(429, "rate limited");
    }, controller.signal);

    await expect(outcome).rejects.toBeInstanceOf(CancelledError);
    expect(attempt).toBe(1);
  });

  it("rejects immediately when the signal is already aborted", async () => {
    const limiter = createLimiter();
    const controller = new AbortController();
    controller.abort();

    let called = false;
    await expect(
      limiter.run(async () => {
        called = true;
        return 1;
      }, controller.signal)
    ).rejects.toBeInstanceOf(CancelledError);
    expect(called).toBe(false);
  });
});
