import { GraphqlResponseError } from "@octokit/graphql";
import { RequestError } from "@octokit/request-error";
import { describe, expect, it, vi } from "vitest";

import { EmptyPageError, SourceError, TransportError } from "./errors";
import { createPageFetcher, extractPage } from "./fetch-page";
import { RateLimiter } from "./rate-limiter";
import type { GraphqlClient } from "./types";

function repoNode(name: string) {
  return {
    name,
    url: `https://github.com/acme/${name}`,
    owner: { login: "acme" },
    createdAt: "2019-05-01T00:00:00Z",
    updatedAt: "2025-01-01T00:00:00Z",
    stargazerCount: 2000,
    primaryLanguage: { name: "Go" },
    pullRequests: { totalCount: 10 },
    releases: { totalCount: 2 },
    issues: { totalCount: 4 },
    closedIssues: { totalCount: 3 },
  };
}

function searchResponse(names: string[], hasNextPage: boolean, endCursor: string | null) {
  return {
    search: {
      repositoryCount: 300,
      nodes: names.map(repoNode),
      pageInfo: { hasNextPage, endCursor },
    },
    rateLimit: { remaining: 4900, resetAt: "2030-01-01T00:00:00Z", cost: 1 },
  };
}

function graphqlError(data: unknown, type: string, message: string) {
  return new GraphqlResponseError({ method: "POST", url: "/graphql" }, {}, {
    data,
    errors: [{ type, message, path: ["search"], extensions: {}, locations: [{ line: 1, column: 1 }] }],
  });
}

describe("createPageFetcher", () => {
  it("requests one page with the cursor and returns the connection", async () => {
    const graphqlClient = vi.fn().mockResolvedValue(searchResponse(["alpha", "beta"], true, "cursor-2"));
    const limiter = new RateLimiter();
    const controller = new AbortController();
    const fetchPage = createPageFetcher({
      graphqlClient: graphqlClient as unknown as GraphqlClient,
      minStars: 1000,
      rateLimiter: limiter,
      signal: controller.signal,
    });

    const page = await fetchPage("cursor-1", 2);

    expect(graphqlClient).toHaveBeenCalledTimes(1);
    const [, parameters] = graphqlClient.mock.calls[0];
    expect(parameters).toMatchObject({
      searchQuery: "stars:>1000 sort:stars-desc",
      first: 2,
      cursor: "cursor-1",
      request: { signal: controller.signal },
    });
    expect(page.nodes.map((node) => node.name)).toEqual(["alpha", "beta"]);
    expect(page.nextCursor).toBe("cursor-2");
    expect(page.hasMore).toBe(true);
    expect(page.totalCount).toBe(300);
    expect(limiter.remainingPoints).toBe(4900);
  });

  it("treats a page without repositories as the end of the stream", async () => {
    const graphqlClient = vi.fn().mockResolvedValue(searchResponse([], true, "cursor-9"));
    const fetchPage = createPageFetcher({ graphqlClient: graphqlClient as unknown as GraphqlClient, minStars: 1 });

    await expect(fetchPage("cursor-8", 10)).rejects.toBeInstanceOf(EmptyPageError);
  });

  it("keeps partial data from responses that report errors", async () => {
    const graphqlClient = vi
      .fn()
      .mockRejectedValue(graphqlError(searchResponse(["gamma"], true, "cursor-3"), "SERVICE_UNAVAILABLE", "timeout"));
    const fetchPage = createPageFetcher({ graphqlClient: graphqlClient as unknown as GraphqlClient, minStars: 1 });

    const error = await fetchPage(null, 10).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SourceError);
    expect(error).toMatchObject({ rateLimited: false });
    const partial = error instanceof SourceError ? error.partial : null;
    expect(partial?.nodes.map((node) => node.name)).toEqual(["gamma"]);
    expect(partial?.nextCursor).toBe("cursor-3");
  });

  it("flags rate-limit rejections without data", async () => {
    const graphqlClient = vi.fn().mockRejectedValue(graphqlError(null, "RATE_LIMITED", "API rate limit exceeded"));
    const fetchPage = createPageFetcher({ graphqlClient: graphqlClient as unknown as GraphqlClient, minStars: 1 });

    const error = await fetchPage(null, 10).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SourceError);
    expect(error).toMatchObject({ rateLimited: true, partial: null });
  });

  it("maps non-success statuses to transport errors", async () => {
    const graphqlClient = vi.fn().mockRejectedValue(
      new RequestError("Bad Gateway", 502, {
        request: { method: "POST", url: "https://api.github.com/graphql", headers: {} },
      })
    );
    const fetchPage = createPageFetcher({ graphqlClient: graphqlClient as unknown as GraphqlClient, minStars: 1 });

    const error = await fetchPage(null, 10).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ status: 502 });
  });

  it("maps network failures to transport errors without a status", async () => {
    const graphqlClient = vi.fn().mockRejectedValue(new Error("getaddrinfo ENOTFOUND api.github.com"));
    const fetchPage = createPageFetcher({ graphqlClient: graphqlClient as unknown as GraphqlClient, minStars: 1 });

    const error = await fetchPage(null, 10).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ status: undefined, message: "getaddrinfo ENOTFOUND api.github.com" });
  });
});

describe("extractPage", () => {
  it("drops nodes that are not repositories", () => {
    const page = extractPage({
      search: { repositoryCount: 2, nodes: [repoNode("alpha"), {}, null], pageInfo: { hasNextPage: false, endCursor: "c" } },
    });
    expect(page?.nodes).toHaveLength(1);
    expect(page?.hasMore).toBe(false);
    expect(page?.rateLimit).toBeNull();
  });

  it("reports no more pages when the cursor is missing", () => {
    const page = extractPage({
      search: { repositoryCount: 1, nodes: [repoNode("alpha")], pageInfo: { hasNextPage: true, endCursor: null } },
    });
    expect(page?.hasMore).toBe(false);
  });

  it("returns null for bodies without a search connection", () => {
    expect(extractPage(null)).toBeNull();
    expect(extractPage({ search: null })).toBeNull();
  });
});
