import { loadBaseline, persistRecords, writeCheckpoint, type PersistResult } from "../report/records-file";
import { printSummary, summarize, writeSummaryJson, type StudySummary } from "../report/summary";
import { collectRepositories } from "./controller";
import type { Sleep } from "./rate-limiter";
import type { CollectionOutcome, CollectorRuntimeConfig, DerivedMetricRecord, FetchPage } from "./types";

export interface RunDependencies {
  fetchPage: FetchPage;
  signal?: AbortSignal;
  sleep?: Sleep;
  now?: () => Date;
}

export interface RunReport {
  outcome: CollectionOutcome;
  persisted: PersistResult | null;
  summary: StudySummary | null;
  exitCode: number;
}

async function readBaseline(config: CollectorRuntimeConfig): Promise<DerivedMetricRecord[]> {
  if (config.mode === "restart") {
    return [];
  }
  const baseline = await loadBaseline(config.outputPath);
  if (baseline.status === "invalid") {
    console.warn(
      `⚠️  Could not load existing results from ${config.outputPath} (${baseline.error?.message ?? "unknown error"}); starting from scratch`
    );
  } else if (baseline.status === "loaded") {
    console.log(`ℹ️  Found ${baseline.records.length} existing repositories in ${config.outputPath}`);
  }
  return baseline.records;
}

/**
 * One collection run: load the baseline, drive the controller, persist what was
 * gathered and report on it. An aborted run writes nothing.
 */
export async function runCollection(config: CollectorRuntimeConfig, deps: RunDependencies): Promise<RunReport> {
  const baseline = await readBaseline(config);

  console.log(
    `⏳ Collecting up to ${config.target} repositories with more than ${config.minStars} stars (${config.pageSize} per page)`
  );

  const outcome = await collectRepositories({
    fetchPage: deps.fetchPage,
    target: config.target,
    pageSize: config.pageSize,
    baseline,
    mode: config.mode,
    pauseEveryPages: config.pauseEveryPages,
    pauseMs: config.pauseMs,
    checkpointEveryPages: config.checkpointEveryPages,
    maxConsecutiveFailures: config.maxConsecutiveFailures,
    onCheckpoint: async (records) => {
      await writeCheckpoint(records, config.outputPath);
      console.log(`💾 Checkpoint: ${records.length} repositories saved to ${config.outputPath}`);
    },
    signal: deps.signal,
    sleep: deps.sleep,
    now: deps.now,
    debug: config.debug,
  });

  if (outcome.status === "aborted") {
    console.error(`❌ Collection aborted: ${outcome.error?.message ?? outcome.reason}`);
    return { outcome, persisted: null, summary: null, exitCode: 1 };
  }

  console.log(
    `🏁 Collection finished (${outcome.reason}): ${outcome.records.length} repositories, ${outcome.newRecords} new, ${outcome.fetchCalls} requests, ${outcome.failures} failed`
  );

  if (outcome.records.length === 0) {
    console.warn("⚠️  No repositories collected; nothing to write");
    return { outcome, persisted: null, summary: null, exitCode: 0 };
  }

  const persisted = await persistRecords(outcome.records, { outputPath: config.outputPath, now: deps.now?.() });
  if (persisted.primaryWritten) {
    console.log(`💾 Saved ${outcome.records.length} repositories to ${persisted.primaryPath}`);
  }
  if (persisted.backupWritten) {
    console.log(`💾 Backup written to ${persisted.backupPath}`);
  }

  const summary = summarize(outcome.records);
  printSummary(summary);
  if (config.summaryJsonPath) {
    await writeSummaryJson(config.summaryJsonPath, summary);
    console.log(`📝 Summary JSON: ${config.summaryJsonPath}`);
  }

  return { outcome, persisted, summary, exitCode: persisted.primaryWritten ? 0 : 1 };
}
