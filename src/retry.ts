import { RateLimitExhaustedError } from "./errors.js";
import type { RateLimiter } from "./github-rate-limit.js";

/** Rate limits always clear at the reset, so some callers never give up. */
export const UNLIMITED_RETRIES = Number.POSITIVE_INFINITY;

export type RateLimitRetryConfig = {
  retries: number;
  limiter: RateLimiter;
  context: Record<string, unknown>;
};

/**
 * Runs `fn`, and after each rate-limit-exhausted failure waits for the reset
 * and runs it again, up to `retries` extra attempts. Other errors and the
 * last rate-limit error are rethrown as is.
 */
export async function withRateLimitRetry<T>(
  fn: () => Promise<T>,
  config: RateLimitRetryConfig
): Promise<T> {
  let attempt = 0;

  while (true) {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof RateLimitExhaustedError) || attempt >= config.retries) {
        throw error;
      }
      await config.limiter.waitForReset(error.rateLimit, {
        ...config.context,
        attempt: attempt + 1
      });
      attempt += 1;
    }
  }
}
