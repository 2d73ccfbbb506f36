import { RecordDerivationError } from "./errors";
import type { DerivedMetricRecord, RawRepository, SearchRepositoryNode } from "./types";

const MS_PER_DAY = 86_400_000;

export const UNKNOWN_LANGUAGE = "Unknown";

function parseTimestamp(value: string, field: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new RecordDerivationError(`Invalid ISO timestamp in ${field}: ${value}`, field);
  }
  return date;
}

function requireString(value: string | null | undefined, field: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new RecordDerivationError(`Missing required field '${field}'`, field);
  }
  return value;
}

function requireCount(value: number | null | undefined, field: string): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    throw new RecordDerivationError(`Missing or invalid count '${field}'`, field);
  }
  return value;
}

export function toRawRepository(node: SearchRepositoryNode): RawRepository {
  return {
    url: requireString(node.url, "url"),
    name: requireString(node.name, "name"),
    ownerLogin: requireString(node.owner?.login, "owner.login"),
    createdAt: requireString(node.createdAt, "createdAt"),
    updatedAt: requireString(node.updatedAt, "updatedAt"),
    stars: requireCount(node.stargazerCount, "stargazerCount"),
    primaryLanguage: node.primaryLanguage?.name ?? null,
    mergedPullRequests: requireCount(node.pullRequests?.totalCount, "pullRequests.totalCount"),
    releases: requireCount(node.releases?.totalCount, "releases.totalCount"),
    totalIssues: requireCount(node.issues?.totalCount, "issues.totalCount"),
    closedIssues: requireCount(node.closedIssues?.totalCount, "closedIssues.totalCount"),
  };
}

/** Whole days elapsed between `timestamp` and `now`, never negative. */
export function daysSince(timestamp: string, now: Date, field = "timestamp"): number {
  const then = parseTimestamp(timestamp, field);
  const elapsed = Math.floor((now.getTime() - then.getTime()) / MS_PER_DAY);
  return Math.max(0, elapsed);
}

export function closedIssuesPercentage(totalIssues: number, closedIssues: number): number {
  if (totalIssues <= 0) {
    return 0;
  }
  const percentage = Math.min(closedIssues / totalIssues, 1) * 100;
  return roundHalfEven(percentage, 2);
}

/** Rounds exact ties to the even neighbour. */
export function roundHalfEven(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const lower = Math.floor(scaled);
  if (scaled - lower === 0.5) {
    return (lower % 2 === 0 ? lower : lower + 1) / factor;
  }
  return Math.round(scaled) / factor;
}

export function deriveMetrics(raw: RawRepository, now: Date = new Date()): DerivedMetricRecord {
  return {
    url: raw.url,
    name: raw.name,
    owner: raw.ownerLogin,
    stars: raw.stars,
    createdAt: raw.createdAt,
    updatedAt: raw.updatedAt,
    ageDays: daysSince(raw.createdAt, now, "createdAt"),
    mergedPullRequests: raw.mergedPullRequests,
    totalReleases: raw.releases,
    daysSinceLastUpdate: daysSince(raw.updatedAt, now, "updatedAt"),
    primaryLanguage: raw.primaryLanguage ?? UNKNOWN_LANGUAGE,
    totalIssues: raw.totalIssues,
    closedIssues: raw.closedIssues,
    closedIssuesPercentage: closedIssuesPercentage(raw.totalIssues, raw.closedIssues),
  };
}
