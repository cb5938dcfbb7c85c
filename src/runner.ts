import { findReposWithConfig } from "./crawler.js";
import { WorkflowError } from "./errors.js";
import type { GitHubApi } from "./github.js";
import type { RateLimiter } from "./github-rate-limit.js";
import type { ContextLogger } from "./logger.js";
import { UNLIMITED_RETRIES, withRateLimitRetry } from "./retry.js";
import { runUpdateWorkflow } from "./workflow.js";
import type { CommitRequest, OutcomeStatus, RepoOutcome, RunSummary } from "./types.js";

export type RunOptions = {
  org: string;
  repo?: string;
  dryRun: boolean;
  signingKey?: string;
  perPage?: number;
};

export type RunDeps = {
  api: GitHubApi;
  limiter: RateLimiter;
  logger: ContextLogger;
  publish: (request: CommitRequest) => Promise<void>;
  /** Builds the per-repository logger; defaults to the run logger. */
  repoLogger?: (fullName: string) => ContextLogger;
};

/**
 * Runs the updater for one named repository, or for every repository of the
 * organization that has the config file. Organization runs keep going past
 * failed repositories; a single-repository failure throws `WorkflowError`.
 */
export async function runUpdater(options: RunOptions, deps: RunDeps): Promise<RunSummary> {
  const log = deps.logger;
  const repoLogger = deps.repoLogger ?? (() => log);
  const workflowOptions = { dryRun: options.dryRun, signingKey: options.signingKey };

  if (options.repo) {
    const target = `${options.org}/${options.repo}`;
    log.info("run.single.start", { repo: target, dryRun: options.dryRun });
    const name = options.repo;
    const { data: repo, rateLimit } = await withRateLimitRetry(
      () => deps.api.getRepository(options.org, name),
      { retries: UNLIMITED_RETRIES, limiter: deps.limiter, context: { repo: target } }
    );
    await deps.limiter.waitIfExhausted(rateLimit, { repo: target });

    const outcome = await runUpdateWorkflow(
      repo,
      { ...deps, logger: repoLogger(repo.fullName) },
      workflowOptions
    );
    if (outcome.status === "error") {
      throw new WorkflowError(outcome);
    }
    return summarize("repo", target, [outcome], deps.limiter);
  }

  log.info("run.org.start", { org: options.org, dryRun: options.dryRun });
  const matches = await findReposWithConfig(options.org, {
    api: deps.api,
    limiter: deps.limiter,
    logger: log,
    perPage: options.perPage
  });
  log.info("run.org.matches", { org: options.org, count: matches.length });

  const outcomes: RepoOutcome[] = [];
  for (const match of matches) {
    log.info("run.repo.start", { repo: match.repo.fullName, path: match.path });
    const outcome = await runUpdateWorkflow(
      match.repo,
      { ...deps, logger: repoLogger(match.repo.fullName) },
      { ...workflowOptions, path: match.path }
    );
    if (outcome.status === "error") {
      log.error("run.repo.failed", { repo: match.repo.fullName, reason: outcome.reason });
    }
    outcomes.push(outcome);
  }

  return summarize("org", options.org, outcomes, deps.limiter);
}

export function countOutcomes(outcomes: RepoOutcome[]) {
  const counts: Record<OutcomeStatus, number> = {
    updated: 0,
    "no-op": 0,
    "dry-run": 0,
    error: 0
  };
  for (const outcome of outcomes) {
    counts[outcome.status] += 1;
  }
  return counts;
}

export function describeOutcome(outcome: RepoOutcome) {
  const name = outcome.repository.fullName;
  switch (outcome.status) {
    case "updated":
      return `${name}: pull request #${outcome.pullRequest.number} opened (${outcome.pullRequest.url})`;
    case "no-op":
      return `${name}: no change needed in ${outcome.path}`;
    case "dry-run":
      return `${name}: [DRY RUN] would update ${outcome.path} (${outcome.occurrences} occurrence(s))`;
    case "error":
      return `${name}: error during ${outcome.failedAt}: ${outcome.reason}`;
  }
}

function summarize(
  mode: RunSummary["mode"],
  target: string,
  outcomes: RepoOutcome[],
  limiter: RateLimiter
): RunSummary {
  return {
    mode,
    target,
    outcomes,
    counts: countOutcomes(outcomes),
    rateLimit: limiter.latest()
  };
}
