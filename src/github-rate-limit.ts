import { setTimeout as delay } from "node:timers/promises";
import type { ContextLogger } from "./logger.js";
import type { RateLimitSnapshot } from "./types.js";

export const DEFAULT_LOW_WATER_MARK = 100;

export type RateLimitDecision =
  | { suspend: true; waitMs: number }
  | { suspend: false; low: boolean };

export type RateLimiter = {
  /**
   * Records the snapshot and, when the budget is exhausted and the reset is
   * still ahead, sleeps until the reset. Resolves `true` when it slept; the
   * caller then repeats the operation that produced the snapshot.
   */
  waitIfExhausted: (
    snapshot: RateLimitSnapshot | undefined,
    context: Record<string, unknown>
  ) => Promise<boolean>;
  /** Sleeps until the snapshot's reset after a rate-limited request. */
  waitForReset: (
    snapshot: RateLimitSnapshot | undefined,
    context: Record<string, unknown>
  ) => Promise<void>;
  latest: () => RateLimitSnapshot | undefined;
};

export type RateLimiterOptions = {
  logger: ContextLogger;
  lowWaterMark?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
};

export function readRateLimit(
  headers: Record<string, string | number | undefined>
): RateLimitSnapshot | undefined {
  const remaining = parseHeaderNumber(headers["x-ratelimit-remaining"]);
  const limit = parseHeaderNumber(headers["x-ratelimit-limit"]);
  const reset = parseHeaderNumber(headers["x-ratelimit-reset"]);

  if (remaining === undefined || limit === undefined || reset === undefined) {
    return undefined;
  }
  return {
    remaining: Math.max(0, remaining),
    limit,
    resetAt: new Date(reset * 1000)
  };
}

export function evaluateRateLimit(
  snapshot: RateLimitSnapshot,
  now = Date.now(),
  lowWaterMark = DEFAULT_LOW_WATER_MARK
): RateLimitDecision {
  if (snapshot.remaining === 0) {
    return {
      suspend: true,
      waitMs: Math.max(0, snapshot.resetAt.getTime() - now)
    };
  }
  return { suspend: false, low: snapshot.remaining < lowWaterMark };
}

export function createRateLimiter(options: RateLimiterOptions): RateLimiter {
  const lowWaterMark = options.lowWaterMark ?? DEFAULT_LOW_WATER_MARK;
  const sleep = options.sleep ?? ((ms: number) => delay(ms).then(() => undefined));
  const now = options.now ?? Date.now;
  let latest: RateLimitSnapshot | undefined;

  async function waitIfExhausted(
    snapshot: RateLimitSnapshot | undefined,
    context: Record<string, unknown>
  ) {
    if (!snapshot) return false;
    latest = snapshot;

    const decision = evaluateRateLimit(snapshot, now(), lowWaterMark);
    if (!decision.suspend) {
      if (decision.low) {
        options.logger.warn("rate_limit.low", {
          ...context,
          remaining: snapshot.remaining,
          limit: snapshot.limit
        });
      }
      return false;
    }
    // Reset already passed; the next request gets a fresh budget.
    if (decision.waitMs === 0) return false;

    options.logger.warn("rate_limit.wait", {
      ...context,
      waitMs: decision.waitMs,
      resetAt: snapshot.resetAt.toISOString()
    });
    await sleep(decision.waitMs);
    return true;
  }

  async function waitForReset(
    snapshot: RateLimitSnapshot | undefined,
    context: Record<string, unknown>
  ) {
    if (snapshot) latest = snapshot;
    const waitMs = snapshot ? Math.max(0, snapshot.resetAt.getTime() - now()) : 0;
    options.logger.warn("rate_limit.wait", {
      ...context,
      waitMs,
      resetAt: snapshot?.resetAt.toISOString() ?? null
    });
    if (waitMs > 0) {
      await sleep(waitMs);
    }
  }

  return { waitIfExhausted, waitForReset, latest: () => latest };
}

function parseHeaderNumber(value: string | number | undefined) {
  if (value === undefined) return undefined;
  if (typeof value === "number") return value;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}
