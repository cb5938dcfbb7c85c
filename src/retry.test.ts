import { describe, it, expect, vi } from "vitest";
import { GitHubApiError, RateLimitExhaustedError } from "./errors.js";
import { createRateLimiter } from "./github-rate-limit.js";
import { withRateLimitRetry } from "./retry.js";
import { createMemoryLogger } from "./testing/fakes.js";

const now = Date.parse("2026-01-01T00:00:00Z");

function limiter() {
  const logger = createMemoryLogger();
  const sleeps: number[] = [];
  return {
    logger,
    sleeps,
    limiter: createRateLimiter({
      logger,
      now: () => now,
      sleep: async (ms) => {
        sleeps.push(ms);
      }
    })
  };
}

const exhausted = () =>
  new RateLimitExhaustedError("get renovate.json", {
    remaining: 0,
    limit: 5000,
    resetAt: new Date(now + 5_000)
  });

describe("withRateLimitRetry", () => {
  it("waits for the reset and runs the operation again", async () => {
    const { limiter: rateLimiter, sleeps, logger } = limiter();
    const fn = vi.fn().mockRejectedValueOnce(exhausted()).mockResolvedValueOnce("ok");

    const result = await withRateLimitRetry(fn, {
      retries: 1,
      limiter: rateLimiter,
      context: { repo: "Acme/a" }
    });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(sleeps).toEqual([5_000]);
    expect(logger.records.find((record) => record.msg === "rate_limit.wait")?.data).toEqual({
      repo: "Acme/a",
      attempt: 1,
      waitMs: 5_000,
      resetAt: "2026-01-01T00:00:05.000Z"
    });
  });

  it("rethrows once the retries are used up", async () => {
    const { limiter: rateLimiter } = limiter();
    const fn = vi.fn().mockRejectedValue(exhausted());

    await expect(
      withRateLimitRetry(fn, { retries: 1, limiter: rateLimiter, context: {} })
    ).rejects.toBeInstanceOf(RateLimitExhaustedError);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("does not retry other errors", async () => {
    const { limiter: rateLimiter, sleeps } = limiter();
    const fn = vi.fn().mockRejectedValue(new GitHubApiError("get renovate.json", "Forbidden", 403));

    await expect(
      withRateLimitRetry(fn, { retries: 3, limiter: rateLimiter, context: {} })
    ).rejects.toThrow("get renovate.json: 403 Forbidden");
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleeps).toEqual([]);
  });
});
