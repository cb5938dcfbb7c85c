export type RepoRef = {
  owner: string;
  name: string;
  fullName: string;
  defaultBranch: string;
};

export type RateLimitSnapshot = {
  remaining: number;
  limit: number;
  resetAt: Date;
};

export type ApiResponse<T> = {
  data: T;
  rateLimit?: RateLimitSnapshot;
  nextPage?: number;
};

export type ConfigContent = {
  path: string;
  sha: string;
  encoding: string;
  content: string;
};

export type ProbeResult =
  | { kind: "found"; path: string }
  | { kind: "not-found" }
  | { kind: "transient-error"; reason: string }
  | { kind: "permanent-error"; reasons: string[] };

export type CrawlMatch = {
  repo: RepoRef;
  path: string;
};

export type UpdateDecision = "no-match" | "dry-run-match" | "match-and-publish";

export type CommitRequest = {
  repository: RepoRef;
  branch: string;
  path: string;
  content: Buffer;
  signingKey?: string;
  message: string;
};

export type PullRequestRequest = {
  repository: RepoRef;
  head: string;
  base: string;
  title: string;
  body: string;
};

export type PullRequestRef = {
  number: number;
  url: string;
};

export type WorkflowState =
  | "fetching"
  | "decoding"
  | "deciding"
  | "no-op"
  | "dry-run-no-op"
  | "publishing"
  | "resolving-default-branch"
  | "opening-pr"
  | "done"
  | "aborted";

type OutcomeBase = {
  repository: RepoRef;
  states: WorkflowState[];
};

export type RepoOutcome =
  | (OutcomeBase & {
      status: "updated";
      path: string;
      pullRequest: PullRequestRef;
    })
  | (OutcomeBase & { status: "no-op"; path: string })
  | (OutcomeBase & { status: "dry-run"; path: string; occurrences: number })
  | (OutcomeBase & {
      status: "error";
      failedAt: WorkflowState;
      reason: string;
      error: unknown;
    });

export type OutcomeStatus = RepoOutcome["status"];

export type RunSummary = {
  mode: "org" | "repo";
  target: string;
  outcomes: RepoOutcome[];
  counts: Record<OutcomeStatus, number>;
  rateLimit?: RateLimitSnapshot;
};
