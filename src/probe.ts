import { NotFoundError, RateLimitExhaustedError, errorMessage } from "./errors.js";
import type { GitHubApi } from "./github.js";
import type { RateLimiter } from "./github-rate-limit.js";
import type { ContextLogger } from "./logger.js";
import { withRateLimitRetry } from "./retry.js";
import { CONFIG_PATHS } from "./templates.js";
import type { ProbeResult, RepoRef } from "./types.js";

export type ProbeDeps = {
  api: GitHubApi;
  limiter: RateLimiter;
  logger: ContextLogger;
};

/**
 * Returns the first candidate path holding the config file. A rate-limited
 * check is retried once at the same path after the reset; if that retry
 * fails for any reason but a 404, the whole repository is a transient failure.
 */
export async function probeConfigFile(
  repo: RepoRef,
  deps: ProbeDeps,
  paths: readonly string[] = CONFIG_PATHS
): Promise<ProbeResult> {
  const failures: string[] = [];
  let missing = 0;

  for (const path of paths) {
    const context = { repo: repo.fullName, path };
    let attempts = 0;
    try {
      const response = await withRateLimitRetry(() => {
        attempts += 1;
        return deps.api.getContent(repo, path);
      }, {
        retries: 1,
        limiter: deps.limiter,
        context
      });
      await deps.limiter.waitIfExhausted(response.rateLimit, context);
      deps.logger.info("probe.found", context);
      return { kind: "found", path };
    } catch (error) {
      if (error instanceof NotFoundError) {
        missing += 1;
        await deps.limiter.waitIfExhausted(error.rateLimit, context);
        continue;
      }
      if (error instanceof RateLimitExhaustedError || attempts > 1) {
        deps.logger.warn("probe.retry_failed", { ...context, error: errorMessage(error) });
        return { kind: "transient-error", reason: errorMessage(error) };
      }
      deps.logger.warn("probe.failed", { ...context, error: errorMessage(error) });
      failures.push(`${path}: ${errorMessage(error)}`);
    }
  }

  if (missing === 0 && failures.length > 0) {
    return { kind: "permanent-error", reasons: failures };
  }
  return { kind: "not-found" };
}
