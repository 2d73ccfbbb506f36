import fs from "fs-extra";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";

import type { DerivedMetricRecord } from "../collector/types";
import { formatSummary, languageCounts, mean, median, summarize, uniqueMode, writeSummaryJson } from "./summary";

function record(name: string, overrides: Partial<DerivedMetricRecord>): DerivedMetricRecord {
  return {
    url: `https://github.com/acme/${name}`,
    name,
    owner: "acme",
    stars: 1000,
    createdAt: "2020-01-01T00:00:00Z",
    updatedAt: "2025-01-01T00:00:00Z",
    ageDays: 100,
    mergedPullRequests: 0,
    totalReleases: 0,
    daysSinceLastUpdate: 0,
    primaryLanguage: "Unknown",
    totalIssues: 0,
    closedIssues: 0,
    closedIssuesPercentage: 0,
    ...overrides,
  };
}

const records = [
  record("a", { ageDays: 400, mergedPullRequests: 10, totalReleases: 0, daysSinceLastUpdate: 1, primaryLanguage: "Go", closedIssuesPercentage: 100 }),
  record("b", { ageDays: 100, mergedPullRequests: 30, totalReleases: 5, daysSinceLastUpdate: 45, primaryLanguage: "Python", closedIssuesPercentage: 50 }),
  record("c", { ageDays: 300, mergedPullRequests: 10, totalReleases: 0, daysSinceLastUpdate: 30, primaryLanguage: "Go", closedIssuesPercentage: 100 }),
  record("d", { ageDays: 200, mergedPullRequests: 20, totalReleases: 2, daysSinceLastUpdate: 2, primaryLanguage: "Rust", closedIssuesPercentage: 80.5 }),
];

describe("median", () => {
  it("takes the middle element for odd counts", () => {
    expect(median([5, 1, 3])).toBe(3);
  });

  it("takes the lower central element for even counts", () => {
    expect(median([4, 1, 3, 2])).toBe(2);
  });

  it("returns null without values", () => {
    expect(median([])).toBeNull();
  });
});

describe("mean", () => {
  it("averages the values", () => {
    expect(mean([1, 2, 3, 4])).toBe(2.5);
    expect(mean([])).toBeNull();
  });
});

describe("uniqueMode", () => {
  it("returns the single most frequent value", () => {
    expect(uniqueMode([3, 1, 3, 2])).toBe(3);
    expect(uniqueMode([7])).toBe(7);
  });

  it("reports no mode when several values tie", () => {
    expect(uniqueMode([1, 1, 2, 2, 3])).toBeNull();
    expect(uniqueMode([1, 2, 3])).toBeNull();
    expect(uniqueMode([])).toBeNull();
  });
});

describe("languageCounts", () => {
  it("orders by frequency and keeps first-seen order for ties", () => {
    expect(languageCounts(records)).toEqual([
      { language: "Go", count: 2 },
      { language: "Python", count: 1 },
      { language: "Rust", count: 1 },
    ]);
  });

  it("limits the table", () => {
    expect(languageCounts(records, 1)).toEqual([{ language: "Go", count: 2 }]);
  });
});

describe("summarize", () => {
  it("computes the statistics for every research question", () => {
    const summary = summarize(records);

    expect(summary.total).toBe(4);
    expect(summary.age).toEqual({ count: 4, median: 200, mean: 250, mode: null });
    expect(summary.mergedPullRequests).toEqual({ count: 4, median: 10, mean: 17.5, mode: 10 });
    expect(summary.releases).toEqual({ count: 4, median: 0, mean: 1.75, mode: 0, zeroReleaseCount: 2 });
    expect(summary.daysSinceUpdate).toMatchObject({ median: 2, mode: null, updatedWithinWindow: 3, windowDays: 30 });
    expect(summary.closedIssues).toMatchObject({ median: 80.5, mode: 100, fullyClosedCount: 2 });
  });

  it("handles an empty record set", () => {
    const summary = summarize([]);
    expect(summary.total).toBe(0);
    expect(summary.age).toEqual({ count: 0, median: null, mean: null, mode: null });
    expect(summary.languages).toEqual([]);
  });
});

describe("formatSummary", () => {
  it("renders the report heading and the missing-mode label", () => {
    const output = formatSummary(summarize(records));
    const lines = output.split("\n");

    expect(lines[0]).toBe("📊 Summary of 4 repositories");
    expect(output).toContain("no unique mode");
    expect(output).toContain("2 without releases");
    expect(output).toContain("3 updated within 30 days");
    expect(output).toContain("2 with 100% closed");
  });
});

describe("writeSummaryJson", () => {
  it("writes the summary with a generation timestamp", async () => {
    const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "repo-study-summary-"));
    const filePath = path.join(tmpDir, "nested", "summary.json");

    await writeSummaryJson(filePath, summarize(records));

    const written = await fs.readJson(filePath);
    expect(written.total).toBe(4);
    expect(written.languages[0]).toEqual({ language: "Go", count: 2 });
    expect(typeof written.generatedAt).toBe("string");
    await fs.remove(tmpDir);
  });
});
