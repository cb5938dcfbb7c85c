import type { Octokit } from "@octokit/rest";
import { RequestError } from "@octokit/request-error";
import { GitHubApiError, NotFoundError, RateLimitExhaustedError } from "./errors.js";
import { readRateLimit } from "./github-rate-limit.js";
import type {
  ApiResponse,
  ConfigContent,
  PullRequestRef,
  PullRequestRequest,
  RepoRef
} from "./types.js";

/**
 * The slice of the GitHub REST API the updater needs. Implementations
 * report failures as `NotFoundError`, `RateLimitExhaustedError` or
 * `GitHubApiError`.
 */
export type GitHubApi = {
  listOrgRepos: (
    org: string,
    page: { page: number; perPage: number }
  ) => Promise<ApiResponse<RepoRef[]>>;
  getContent: (repo: RepoRef, path: string) => Promise<ApiResponse<ConfigContent>>;
  getRepository: (owner: string, name: string) => Promise<ApiResponse<RepoRef>>;
  createPullRequest: (request: PullRequestRequest) => Promise<ApiResponse<PullRequestRef>>;
};

type Headers = Record<string, string | number | undefined>;

type RepoApi = {
  name: string;
  full_name: string;
  default_branch?: string;
  owner: { login: string };
};

export function createGitHubApi(octokit: Octokit): GitHubApi {
  return {
    async listOrgRepos(org, { page, perPage }) {
      const response = await call(`list repositories of ${org} (page ${page})`, () =>
        octokit.rest.repos.listForOrg({
          org,
          type: "all",
          per_page: perPage,
          page
        })
      );
      return {
        data: response.data.map(mapRepo),
        rateLimit: readRateLimit(response.headers),
        nextPage: parseNextPage(response.headers.link)
      };
    },

    async getContent(repo, path) {
      const operation = `get ${path} in ${repo.fullName}`;
      const response = await call(operation, () =>
        octokit.rest.repos.getContent({
          owner: repo.owner,
          repo: repo.name,
          path
        })
      );
      const data = response.data;
      if (Array.isArray(data) || !("content" in data)) {
        throw new GitHubApiError(operation, "path is not a file");
      }
      return {
        data: {
          path: data.path,
          sha: data.sha,
          encoding: data.encoding,
          content: data.content
        },
        rateLimit: readRateLimit(response.headers)
      };
    },

    async getRepository(owner, name) {
      const response = await call(`get repository ${owner}/${name}`, () =>
        octokit.rest.repos.get({ owner, repo: name })
      );
      return {
        data: mapRepo(response.data),
        rateLimit: readRateLimit(response.headers)
      };
    },

    async createPullRequest(request) {
      const response = await call(
        `create pull request in ${request.repository.fullName}`,
        () =>
          octokit.rest.pulls.create({
            owner: request.repository.owner,
            repo: request.repository.name,
            title: request.title,
            body: request.body,
            head: request.head,
            base: request.base
          })
      );
      return {
        data: { number: response.data.number, url: response.data.html_url },
        rateLimit: readRateLimit(response.headers)
      };
    }
  };
}

async function call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw toApiError(operation, error);
  }
}

export function toApiError(operation: string, error: unknown): Error {
  if (!(error instanceof RequestError)) {
    const message = error instanceof Error ? error.message : String(error);
    return new GitHubApiError(operation, message, undefined, { cause: error });
  }

  const headers: Headers = error.response?.headers ?? {};
  const rateLimit = readRateLimit(headers);
  if ((error.status === 403 || error.status === 429) && rateLimit?.remaining === 0) {
    return new RateLimitExhaustedError(operation, rateLimit, { cause: error });
  }
  if (error.status === 404) {
    return new NotFoundError(operation, rateLimit, { cause: error });
  }
  return new GitHubApiError(operation, error.message, error.status, { cause: error });
}

export function parseNextPage(link: string | undefined): number | undefined {
  if (!link) return undefined;
  for (const part of link.split(",")) {
    const match = part.match(/<([^>]+)>;\s*rel="([^"]+)"/);
    if (!match || match[2] !== "next") continue;
    const page = Number(new URL(match[1]).searchParams.get("page"));
    return Number.isInteger(page) && page > 0 ? page : undefined;
  }
  return undefined;
}

function mapRepo(repo: RepoApi): RepoRef {
  return {
    owner: repo.owner.login,
    name: repo.name,
    fullName: repo.full_name,
    defaultBranch: repo.default_branch ?? "main"
  };
}
