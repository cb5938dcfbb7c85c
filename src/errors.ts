import type { RateLimitSnapshot, RepoOutcome } from "./types.js";

export class NotFoundError extends Error {
  readonly operation: string;
  /** Budget reported by the 404 response, when it carried the headers. */
  readonly rateLimit?: RateLimitSnapshot;

  constructor(
    operation: string,
    rateLimit?: RateLimitSnapshot,
    options?: { cause?: unknown }
  ) {
    super(`${operation}: not found`, options);
    this.name = "NotFoundError";
    this.operation = operation;
    this.rateLimit = rateLimit;
  }
}

export class RateLimitExhaustedError extends Error {
  readonly operation: string;
  readonly rateLimit?: RateLimitSnapshot;

  constructor(
    operation: string,
    rateLimit: RateLimitSnapshot | undefined,
    options?: { cause?: unknown }
  ) {
    const resetAt = rateLimit ? ` (resets at ${rateLimit.resetAt.toISOString()})` : "";
    super(`${operation}: rate limit exhausted${resetAt}`, options);
    this.name = "RateLimitExhaustedError";
    this.operation = operation;
    this.rateLimit = rateLimit;
  }
}

export class GitHubApiError extends Error {
  readonly operation: string;
  readonly status?: number;

  constructor(
    operation: string,
    message: string,
    status?: number,
    options?: { cause?: unknown }
  ) {
    super(
      status === undefined
        ? `${operation}: ${message}`
        : `${operation}: ${status} ${message}`,
      options
    );
    this.name = "GitHubApiError";
    this.operation = operation;
    this.status = status;
  }
}

export class ContentDecodeError extends Error {
  constructor(path: string, detail: string) {
    super(`Cannot decode ${path}: ${detail}`);
    this.name = "ContentDecodeError";
  }
}

export type PublishStep =
  | "workspace"
  | "clone"
  | "branch"
  | "write"
  | "stage"
  | "sign-config"
  | "commit"
  | "push";

const stepLabels: Record<PublishStep, string> = {
  workspace: "creating temp directory",
  clone: "cloning repository",
  branch: "creating branch",
  write: "writing file",
  stage: "adding file",
  "sign-config": "configuring signing key",
  commit: "creating commit",
  push: "pushing branch"
};

export class CommitStepError extends Error {
  readonly step: PublishStep;
  readonly output: string;

  constructor(step: PublishStep, detail: string, output = "", options?: { cause?: unknown }) {
    const suffix = output.trim() ? `, output: ${output.trim()}` : "";
    super(`Error ${stepLabels[step]}: ${detail}${suffix}`, options);
    this.name = "CommitStepError";
    this.step = step;
    this.output = output;
  }
}

export class WorkflowError extends Error {
  readonly outcome: Extract<RepoOutcome, { status: "error" }>;

  constructor(outcome: Extract<RepoOutcome, { status: "error" }>) {
    super(
      `Error processing repository ${outcome.repository.fullName}: ${outcome.reason}`,
      { cause: outcome.error }
    );
    this.name = "WorkflowError";
    this.outcome = outcome;
  }
}

export function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}
