import { RequestError } from "@octokit/request-error";
import { describe, it, expect } from "vitest";
import { GitHubApiError, NotFoundError, RateLimitExhaustedError } from "./errors.js";
import { parseNextPage, toApiError } from "./github.js";

function requestError(status: number, headers: Record<string, string>) {
  return new RequestError(`HTTP ${status}`, status, {
    request: { method: "GET", url: "https://api.github.com/repos/Acme/a/contents/renovate.json", headers: {} },
    response: {
      status,
      url: "https://api.github.com/repos/Acme/a/contents/renovate.json",
      headers,
      data: {}
    }
  });
}

describe("parseNextPage", () => {
  it("reads the next page from a Link header", () => {
    const link =
      '<https://api.github.com/organizations/1/repos?type=all&per_page=100&page=3>; rel="next", ' +
      '<https://api.github.com/organizations/1/repos?type=all&per_page=100&page=7>; rel="last"';
    expect(parseNextPage(link)).toBe(3);
  });

  it("returns undefined on the last page", () => {
    expect(parseNextPage(undefined)).toBeUndefined();
    expect(
      parseNextPage('<https://api.github.com/organizations/1/repos?page=6>; rel="prev"')
    ).toBeUndefined();
  });
});

describe("toApiError", () => {
  it("maps 404 to NotFoundError", () => {
    const error = toApiError("get renovate.json in Acme/a", requestError(404, {}));
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.message).toBe("get renovate.json in Acme/a: not found");
  });

  it("keeps the rate limit reported by a 404", () => {
    const error = toApiError(
      "get renovate.json in Acme/a",
      requestError(404, {
        "x-ratelimit-remaining": "0",
        "x-ratelimit-limit": "5000",
        "x-ratelimit-reset": "1767225600"
      })
    );
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({
      rateLimit: { remaining: 0, limit: 5000, resetAt: new Date("2026-01-01T00:00:00Z") }
    });
  });

  it("maps an exhausted 403 to RateLimitExhaustedError", () => {
    const error = toApiError(
      "list repositories",
      requestError(403, {
        "x-ratelimit-remaining": "0",
        "x-ratelimit-limit": "5000",
        "x-ratelimit-reset": "1767225600"
      })
    );
    expect(error).toBeInstanceOf(RateLimitExhaustedError);
    expect(error).toMatchObject({
      rateLimit: { remaining: 0, limit: 5000, resetAt: new Date("2026-01-01T00:00:00Z") }
    });
  });

  it("keeps a 403 with budget left as an API error", () => {
    const error = toApiError(
      "get renovate.json in Acme/a",
      requestError(403, {
        "x-ratelimit-remaining": "10",
        "x-ratelimit-limit": "5000",
        "x-ratelimit-reset": "1767225600"
      })
    );
    expect(error).toBeInstanceOf(GitHubApiError);
    expect(error).toMatchObject({ status: 403 });
  });

  it("wraps unknown failures", () => {
    const error = toApiError("get repository Acme/a", new Error("socket hang up"));
    expect(error).toBeInstanceOf(GitHubApiError);
    expect(error.message).toBe("get repository Acme/a: socket hang up");
  });
});
