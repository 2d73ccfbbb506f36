import type { graphql } from "@octokit/graphql";

export type GraphqlClient = typeof graphql;

export interface RawRepository {
  url: string;
  name: string;
  ownerLogin: string;
  createdAt: string;
  updatedAt: string;
  stars: number;
  primaryLanguage: string | null;
  mergedPullRequests: number;
  releases: number;
  totalIssues: number;
  closedIssues: number;
}

export interface DerivedMetricRecord {
  url: string;
  name: string;
  owner: string;
  stars: number;
  createdAt: string;
  updatedAt: string;
  ageDays: number;
  mergedPullRequests: number;
  totalReleases: number;
  daysSinceLastUpdate: number;
  primaryLanguage: string;
  totalIssues: number;
  closedIssues: number;
  closedIssuesPercentage: number;
}

/** Repository node as returned by the search connection. Fields may be missing on partial responses. */
export interface SearchRepositoryNode {
  name?: string | null;
  url?: string | null;
  owner?: { login?: string | null } | null;
  createdAt?: string | null;
  updatedAt?: string | null;
  stargazerCount?: number | null;
  primaryLanguage?: { name?: string | null } | null;
  pullRequests?: { totalCount?: number | null } | null;
  releases?: { totalCount?: number | null } | null;
  issues?: { totalCount?: number | null } | null;
  closedIssues?: { totalCount?: number | null } | null;
}

export interface RateLimitSnapshot {
  remaining: number;
  resetAt: string;
  cost: number;
}

export interface SearchQueryResponse {
  search: {
    repositoryCount: number;
    nodes: Array<SearchRepositoryNode | null> | null;
    pageInfo: { hasNextPage: boolean; endCursor: string | null };
  } | null;
  rateLimit?: RateLimitSnapshot | null;
}

export interface PageResult {
  nodes: SearchRepositoryNode[];
  nextCursor: string | null;
  hasMore: boolean;
  totalCount: number | null;
  rateLimit: RateLimitSnapshot | null;
}

export type FetchPage = (cursor: string | null, pageSize: number) => Promise<PageResult>;

export type CollectionMode = "resume" | "restart";

export type CollectionPhase = "idle" | "fetching" | "processing" | "done" | "aborted";

export type StopReason =
  | "target-reached"
  | "source-exhausted"
  | "empty-page"
  | "interrupted"
  | "too-many-failures"
  | "first-page-transport-failure";

export interface CollectionOutcome {
  status: "done" | "aborted";
  reason: StopReason;
  records: DerivedMetricRecord[];
  newRecords: number;
  pages: number;
  fetchCalls: number;
  failures: number;
  error?: Error;
}

export interface CollectorRuntimeConfig {
  token: string;
  target: number;
  pageSize: number;
  minStars: number;
  outputPath: string;
  mode: CollectionMode;
  pauseEveryPages: number;
  pauseMs: number;
  checkpointEveryPages: number;
  maxConsecutiveFailures: number;
  summaryJsonPath: string | null;
  debug: boolean;
}
