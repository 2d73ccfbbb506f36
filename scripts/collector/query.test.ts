import { describe, expect, it } from "vitest";

import { buildSearchQuery, clampPageSize, MAX_PAGE_SIZE } from "./query";

describe("buildSearchQuery", () => {
  it("parameterizes the star filter, page size and cursor", () => {
    const { query, variables } = buildSearchQuery({ minStars: 1000, pageSize: 20, cursor: "Y3Vyc29yOjIw" });

    expect(variables).toEqual({
      searchQuery: "stars:>1000 sort:stars-desc",
      first: 20,
      cursor: "Y3Vyc29yOjIw",
    });
    expect(query).toContain("search(query: $searchQuery, type: REPOSITORY, first: $first, after: $cursor)");
    expect(query).toContain("closedIssues: issues(states: CLOSED)");
    expect(query).toContain("pullRequests(states: MERGED)");
  });

  it("starts from the beginning without a cursor", () => {
    expect(buildSearchQuery({ minStars: 500, pageSize: 10, cursor: null }).variables.cursor).toBeNull();
  });

  it("caps the page size at the source maximum", () => {
    expect(buildSearchQuery({ minStars: 1, pageSize: 250, cursor: null }).variables.first).toBe(MAX_PAGE_SIZE);
  });
});

describe("clampPageSize", () => {
  it("keeps sizes within 1..100", () => {
    expect(clampPageSize(0)).toBe(1);
    expect(clampPageSize(-5)).toBe(1);
    expect(clampPageSize(37.9)).toBe(37);
    expect(clampPageSize(101)).toBe(100);
    expect(clampPageSize(Number.NaN)).toBe(100);
  });
});
