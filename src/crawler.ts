import type { GitHubApi } from "./github.js";
import type { RateLimiter } from "./github-rate-limit.js";
import type { ContextLogger } from "./logger.js";
import { probeConfigFile } from "./probe.js";
import { UNLIMITED_RETRIES, withRateLimitRetry } from "./retry.js";
import type { CrawlMatch } from "./types.js";

export const ORG_PAGE_SIZE = 100;

export type CrawlDeps = {
  api: GitHubApi;
  limiter: RateLimiter;
  logger: ContextLogger;
  perPage?: number;
};

/**
 * Lists every repository of `org` page by page and keeps those holding the
 * config file. An exhausted budget repeats the same page after the wait.
 */
export async function findReposWithConfig(
  org: string,
  deps: CrawlDeps
): Promise<CrawlMatch[]> {
  const perPage = deps.perPage ?? ORG_PAGE_SIZE;
  const matches: CrawlMatch[] = [];
  const seen = new Set<string>();
  let page = 1;

  deps.logger.info("crawl.start", { org, perPage });

  while (true) {
    const context = { org, page };
    const response = await withRateLimitRetry(
      () => deps.api.listOrgRepos(org, { page, perPage }),
      { retries: UNLIMITED_RETRIES, limiter: deps.limiter, context }
    );

    deps.logger.info("crawl.page", {
      ...context,
      repoCount: response.data.length,
      remaining: response.rateLimit?.remaining ?? null,
      limit: response.rateLimit?.limit ?? null
    });

    if (await deps.limiter.waitIfExhausted(response.rateLimit, context)) {
      continue;
    }

    for (const repo of response.data) {
      if (seen.has(repo.fullName)) continue;
      seen.add(repo.fullName);

      const result = await probeConfigFile(repo, deps);
      switch (result.kind) {
        case "found":
          matches.push({ repo, path: result.path });
          break;
        case "transient-error":
          deps.logger.warn("crawl.repo.skipped", {
            repo: repo.fullName,
            reason: result.reason
          });
          break;
        case "permanent-error":
          deps.logger.warn("crawl.repo.skipped", {
            repo: repo.fullName,
            reason: result.reasons.join("; ")
          });
          break;
        case "not-found":
          deps.logger.debug("crawl.repo.no_config", { repo: repo.fullName });
          break;
      }
    }

    if (!response.nextPage) break;
    page = response.nextPage;
  }

  deps.logger.info("crawl.done", { org, matchCount: matches.length });
  return matches;
}
