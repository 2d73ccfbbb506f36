import Table from "cli-table3";
import fs from "fs-extra";

import type { DerivedMetricRecord } from "../collector/types";

export const RECENT_UPDATE_DAYS = 30;
export const TOP_LANGUAGES = 5;

export interface NumericStats {
  count: number;
  median: number | null;
  mean: number | null;
  /** null when there is no single most frequent value. */
  mode: number | null;
}

export interface LanguageCount {
  language: string;
  count: number;
}

export interface StudySummary {
  total: number;
  age: NumericStats;
  mergedPullRequests: NumericStats;
  releases: NumericStats & { zeroReleaseCount: number };
  daysSinceUpdate: NumericStats & { updatedWithinWindow: number; windowDays: number };
  languages: LanguageCount[];
  closedIssues: NumericStats & { fullyClosedCount: number };
}

/** Middle element of the sorted values; for even counts the lower of the two. */
export function median(values: number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  const sorted = [...values].sort((a, b) => a - b);
  return sorted[Math.floor((sorted.length - 1) / 2)];
}

export function mean(values: number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function uniqueMode(values: number[]): number | null {
  const counts = new Map<number, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  let best: number | null = null;
  let bestCount = 0;
  let tied = false;
  for (const [value, count] of counts) {
    if (count > bestCount) {
      best = value;
      bestCount = count;
      tied = false;
    } else if (count === bestCount) {
      tied = true;
    }
  }
  return tied ? null : best;
}

export function describeValues(values: number[]): NumericStats {
  return {
    count: values.length,
    median: median(values),
    mean: mean(values),
    mode: uniqueMode(values),
  };
}

export function languageCounts(records: DerivedMetricRecord[], limit = TOP_LANGUAGES): LanguageCount[] {
  const counts = new Map<string, number>();
  for (const record of records) {
    counts.set(record.primaryLanguage, (counts.get(record.primaryLanguage) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([language, count]) => ({ language, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);
}

export function summarize(records: DerivedMetricRecord[]): StudySummary {
  const ages = records.map((record) => record.ageDays);
  const merged = records.map((record) => record.mergedPullRequests);
  const releases = records.map((record) => record.totalReleases);
  const updates = records.map((record) => record.daysSinceLastUpdate);
  const closed = records.map((record) => record.closedIssuesPercentage);

  return {
    total: records.length,
    age: describeValues(ages),
    mergedPullRequests: describeValues(merged),
    releases: {
      ...describeValues(releases),
      zeroReleaseCount: releases.filter((count) => count === 0).length,
    },
    daysSinceUpdate: {
      ...describeValues(updates),
      updatedWithinWindow: updates.filter((days) => days <= RECENT_UPDATE_DAYS).length,
      windowDays: RECENT_UPDATE_DAYS,
    },
    languages: languageCounts(records),
    closedIssues: {
      ...describeValues(closed),
      fullyClosedCount: closed.filter((percentage) => percentage === 100).length,
    },
  };
}

function formatNumber(value: number | null, suffix = ""): string {
  if (value === null) {
    return "n/a";
  }
  return `${Number.isInteger(value) ? value.toString() : value.toFixed(2)}${suffix}`;
}

function formatMode(value: number | null, suffix = ""): string {
  return value === null ? "no unique mode" : formatNumber(value, suffix);
}

export function formatSummary(summary: StudySummary): string {
  const statsTable = new Table({
    head: ["Research question", "Median", "Mean", "Mode", "Notes"],
    style: { head: [], border: [] },
  });

  statsTable.push(
    [
      "RQ01 age (days)",
      formatNumber(summary.age.median),
      formatNumber(summary.age.mean),
      formatMode(summary.age.mode),
      "",
    ],
    [
      "RQ02 merged pull requests",
      formatNumber(summary.mergedPullRequests.median),
      formatNumber(summary.mergedPullRequests.mean),
      formatMode(summary.mergedPullRequests.mode),
      "",
    ],
    [
      "RQ03 releases",
      formatNumber(summary.releases.median),
      formatNumber(summary.releases.mean),
      formatMode(summary.releases.mode),
      `${summary.releases.zeroReleaseCount} without releases`,
    ],
    [
      "RQ04 days since update",
      formatNumber(summary.daysSinceUpdate.median),
      formatNumber(summary.daysSinceUpdate.mean),
      formatMode(summary.daysSinceUpdate.mode),
      `${summary.daysSinceUpdate.updatedWithinWindow} updated within ${summary.daysSinceUpdate.windowDays} days`,
    ],
    [
      "RQ06 closed issues (%)",
      formatNumber(summary.closedIssues.median, "%"),
      formatNumber(summary.closedIssues.mean, "%"),
      formatMode(summary.closedIssues.mode, "%"),
      `${summary.closedIssues.fullyClosedCount} with 100% closed`,
    ]
  );

  const languageTable = new Table({
    head: ["RQ05 primary language", "Repositories"],
    style: { head: [], border: [] },
  });
  for (const entry of summary.languages) {
    languageTable.push([entry.language, entry.count]);
  }

  return [
    `📊 Summary of ${summary.total} repositories`,
    statsTable.toString(),
    languageTable.toString(),
  ].join("\n");
}

export function printSummary(summary: StudySummary): void {
  console.log(`\n${formatSummary(summary)}`);
}

export async function writeSummaryJson(filePath: string, summary: StudySummary): Promise<void> {
  await fs.outputJson(filePath, { generatedAt: new Date().toISOString(), ...summary }, { spaces: 2 });
  await fs.appendFile(filePath, "\n");
}
