import { NotFoundError } from "../errors.js";
import type { GitHubApi } from "../github.js";
import type { ContextLogger, LogLevel } from "../logger.js";
import type { RateLimitSnapshot, RepoRef } from "../types.js";

export type LogRecord = {
  level: LogLevel;
  msg: string;
  data?: Record<string, unknown>;
};

export function createMemoryLogger(): ContextLogger & { records: LogRecord[] } {
  const records: LogRecord[] = [];
  const at = (level: LogLevel) => (msg: string, data?: Record<string, unknown>) => {
    records.push({ level, msg, data });
  };
  return {
    records,
    debug: at("debug"),
    info: at("info"),
    warn: at("warn"),
    error: at("error")
  };
}

export function repoRef(owner: string, name: string, defaultBranch = "main"): RepoRef {
  return { owner, name, fullName: `${owner}/${name}`, defaultBranch };
}

export const healthyRateLimit: RateLimitSnapshot = {
  remaining: 4999,
  limit: 5000,
  resetAt: new Date("2030-01-01T00:00:00Z")
};

export type FakeGitHubOptions = {
  /** Organization listing, one array per page. */
  pages: RepoRef[][];
  /** File text by repository full name, then path. */
  files?: Record<string, Record<string, string>>;
  /** Default branch returned by getRepository, by full name. */
  defaultBranches?: Record<string, string>;
};

/**
 * In-memory GitHub. Every call is appended to `calls` as
 * `list:<org>:<page>`, `content:<repo>:<path>`, `repo:<repo>` or `pr:<repo>`.
 */
export function createFakeGitHub(options: FakeGitHubOptions) {
  const calls: string[] = [];
  const pullRequests: Array<{ repo: string; head: string; base: string; title: string; body: string }> = [];
  const files = options.files ?? {};
  const allRepos = options.pages.flat();

  const api: GitHubApi = {
    async listOrgRepos(org, { page }) {
      calls.push(`list:${org}:${page}`);
      const data = options.pages[page - 1] ?? [];
      return {
        data,
        rateLimit: healthyRateLimit,
        nextPage: page < options.pages.length ? page + 1 : undefined
      };
    },
    async getContent(repo, path) {
      calls.push(`content:${repo.fullName}:${path}`);
      const text = files[repo.fullName]?.[path];
      if (text === undefined) {
        throw new NotFoundError(`get ${path} in ${repo.fullName}`);
      }
      return {
        data: {
          path,
          sha: `sha-${path}`,
          encoding: "base64",
          content: Buffer.from(text, "utf8").toString("base64")
        },
        rateLimit: healthyRateLimit
      };
    },
    async getRepository(owner, name) {
      const fullName = `${owner}/${name}`;
      calls.push(`repo:${fullName}`);
      const known = allRepos.find((repo) => repo.fullName === fullName);
      if (!known) {
        throw new NotFoundError(`get repository ${fullName}`);
      }
      return {
        data: { ...known, defaultBranch: options.defaultBranches?.[fullName] ?? known.defaultBranch },
        rateLimit: healthyRateLimit
      };
    },
    async createPullRequest(request) {
      calls.push(`pr:${request.repository.fullName}`);
      pullRequests.push({
        repo: request.repository.fullName,
        head: request.head,
        base: request.base,
        title: request.title,
        body: request.body
      });
      return {
        data: {
          number: pullRequests.length,
          url: `https://github.com/${request.repository.fullName}/pull/${pullRequests.length}`
        },
        rateLimit: healthyRateLimit
      };
    }
  };

  return { api, calls, pullRequests };
}
