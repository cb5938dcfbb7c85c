import {
  ContentDecodeError,
  GitHubApiError,
  NotFoundError,
  errorMessage
} from "./errors.js";
import type { GitHubApi } from "./github.js";
import type { RateLimiter } from "./github-rate-limit.js";
import type { ContextLogger } from "./logger.js";
import { UNLIMITED_RETRIES, withRateLimitRetry } from "./retry.js";
import {
  COMMIT_MESSAGE,
  CONFIG_PATHS,
  PRESET_MARKER,
  PRESET_REPLACEMENT,
  PULL_REQUEST_TITLE,
  UPDATE_BRANCH,
  pullRequestBody
} from "./templates.js";
import type {
  CommitRequest,
  ConfigContent,
  RepoOutcome,
  RepoRef,
  UpdateDecision,
  WorkflowState
} from "./types.js";

export type WorkflowDeps = {
  api: GitHubApi;
  limiter: RateLimiter;
  logger: ContextLogger;
  publish: (request: CommitRequest) => Promise<void>;
};

export type WorkflowOptions = {
  dryRun: boolean;
  signingKey?: string;
  /** Path the crawl found the file at; all candidates are tried when absent. */
  path?: string;
};

const base64Pattern = /^[A-Za-z0-9+/]*={0,2}$/;

export function decodeContent(file: ConfigContent): string {
  if (file.encoding !== "base64") {
    throw new ContentDecodeError(file.path, `unsupported encoding "${file.encoding}"`);
  }
  const compact = file.content.replace(/\s+/g, "");
  if (compact.length % 4 !== 0 || !base64Pattern.test(compact)) {
    throw new ContentDecodeError(file.path, "malformed base64 content");
  }
  return Buffer.from(compact, "base64").toString("utf8");
}

export function countOccurrences(text: string, needle: string) {
  return text.split(needle).length - 1;
}

export function decideUpdate(text: string, dryRun: boolean): UpdateDecision {
  if (!text.includes(PRESET_MARKER)) return "no-match";
  return dryRun ? "dry-run-match" : "match-and-publish";
}

export function rewriteConfig(text: string) {
  return text.replaceAll(PRESET_MARKER, PRESET_REPLACEMENT);
}

/**
 * Runs the update pipeline for one repository. Never throws: a failing step
 * ends in an `error` outcome naming the state it failed in.
 */
export async function runUpdateWorkflow(
  repo: RepoRef,
  deps: WorkflowDeps,
  options: WorkflowOptions
): Promise<RepoOutcome> {
  const log = deps.logger;
  const states: WorkflowState[] = [];
  let state: WorkflowState = "fetching";
  const enter = (next: WorkflowState) => {
    state = next;
    states.push(next);
  };

  try {
    enter("fetching");
    const file = await fetchConfig(repo, deps, options.path);
    log.info("workflow.fetched", { path: file.path, sha: file.sha });

    enter("decoding");
    const text = decodeContent(file);

    enter("deciding");
    const decision = decideUpdate(text, options.dryRun);
    if (decision === "no-match") {
      enter("no-op");
      log.info("workflow.no_change", { path: file.path, marker: PRESET_MARKER });
      return { status: "no-op", repository: repo, states, path: file.path };
    }

    const occurrences = countOccurrences(text, PRESET_MARKER);
    if (decision === "dry-run-match") {
      enter("dry-run-no-op");
      log.info("workflow.dry_run", { path: file.path, occurrences });
      return { status: "dry-run", repository: repo, states, path: file.path, occurrences };
    }

    enter("publishing");
    await deps.publish({
      repository: repo,
      branch: UPDATE_BRANCH,
      path: file.path,
      content: Buffer.from(rewriteConfig(text), "utf8"),
      signingKey: options.signingKey,
      message: COMMIT_MESSAGE
    });
    log.info("workflow.published", { branch: UPDATE_BRANCH, occurrences });

    enter("resolving-default-branch");
    const current = await retrying(deps, { repo: repo.fullName }, () =>
      deps.api.getRepository(repo.owner, repo.name)
    );
    await deps.limiter.waitIfExhausted(current.rateLimit, { repo: repo.fullName });
    const base = current.data.defaultBranch;
    log.info("workflow.default_branch", { base });

    enter("opening-pr");
    const pullRequest = await retrying(deps, { repo: repo.fullName }, () =>
      deps.api.createPullRequest({
        repository: repo,
        head: UPDATE_BRANCH,
        base,
        title: PULL_REQUEST_TITLE,
        body: pullRequestBody(file.path)
      })
    );
    await deps.limiter.waitIfExhausted(pullRequest.rateLimit, { repo: repo.fullName });

    enter("done");
    log.info("workflow.pull_request", {
      number: pullRequest.data.number,
      url: pullRequest.data.url
    });
    return {
      status: "updated",
      repository: repo,
      states,
      path: file.path,
      pullRequest: pullRequest.data
    };
  } catch (error) {
    const failedAt = state;
    states.push("aborted");
    log.error("workflow.aborted", { failedAt, error: errorMessage(error) });
    return {
      status: "error",
      repository: repo,
      states,
      failedAt,
      reason: errorMessage(error),
      error
    };
  }
}

async function fetchConfig(repo: RepoRef, deps: WorkflowDeps, hint?: string) {
  const paths = hint ? [hint] : CONFIG_PATHS;
  for (const path of paths) {
    const context = { repo: repo.fullName, path };
    try {
      const response = await retrying(deps, context, () => deps.api.getContent(repo, path));
      await deps.limiter.waitIfExhausted(response.rateLimit, context);
      return response.data;
    } catch (error) {
      if (!(error instanceof NotFoundError)) throw error;
      await deps.limiter.waitIfExhausted(error.rateLimit, context);
    }
  }
  throw new GitHubApiError(
    `get config in ${repo.fullName}`,
    `no config file at ${paths.join(", ")}`,
    404
  );
}

function retrying<T>(
  deps: Pick<WorkflowDeps, "limiter">,
  context: Record<string, unknown>,
  fn: () => Promise<T>
) {
  return withRateLimitRetry(fn, { retries: UNLIMITED_RETRIES, limiter: deps.limiter, context });
}
