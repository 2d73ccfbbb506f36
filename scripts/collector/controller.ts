import { EmptyPageError, RecordDerivationError, SourceError, TransportError, toError } from "./errors";
import { deriveMetrics, toRawRepository } from "./metrics";
import { clampPageSize } from "./query";
import { sleep as defaultSleep, type Sleep } from "./rate-limiter";
import type {
  CollectionMode,
  CollectionOutcome,
  CollectionPhase,
  DerivedMetricRecord,
  FetchPage,
  PageResult,
  StopReason,
} from "./types";

export const DEFAULT_PAUSE_EVERY_PAGES = 5;
export const DEFAULT_PAUSE_MS = 3_000;
export const DEFAULT_MAX_CONSECUTIVE_FAILURES = 3;

export type Transition =
  | { phase: "fetching" }
  | { phase: "done"; reason: StopReason }
  | { phase: "aborted"; reason: StopReason };

export interface CollectParams {
  fetchPage: FetchPage;
  target: number;
  pageSize: number;
  baseline?: DerivedMetricRecord[];
  mode?: CollectionMode;
  pauseEveryPages?: number;
  pauseMs?: number;
  checkpointEveryPages?: number;
  maxConsecutiveFailures?: number;
  onCheckpoint?: (records: DerivedMetricRecord[]) => Promise<void>;
  signal?: AbortSignal;
  sleep?: Sleep;
  now?: () => Date;
  debug?: boolean;
}

interface PageIngestResult {
  added: number;
  processed: number;
  duplicates: number;
  failed: number;
  beyondTarget: number;
}

export function decideAfterPage(state: { accumulated: number; target: number; hasMore: boolean }): Transition {
  if (state.accumulated >= state.target) {
    return { phase: "done", reason: "target-reached" };
  }
  if (!state.hasMore) {
    return { phase: "done", reason: "source-exhausted" };
  }
  return { phase: "fetching" };
}

export function decideAfterFailure(state: {
  error: Error;
  successfulPages: number;
  consecutiveFailures: number;
  maxConsecutiveFailures: number;
}): Transition {
  if (state.error instanceof EmptyPageError) {
    return { phase: "done", reason: "empty-page" };
  }
  // Without a successful page there is no cursor to fall back on.
  if (state.error instanceof TransportError && state.successfulPages === 0) {
    return { phase: "aborted", reason: "first-page-transport-failure" };
  }
  if (state.consecutiveFailures >= state.maxConsecutiveFailures) {
    return { phase: "done", reason: "too-many-failures" };
  }
  return { phase: "fetching" };
}

/**
 * Drives the paginated search until the target is reached or the source runs dry.
 * In resume mode the baseline counts towards the target and fetched records whose
 * url is already known are discarded.
 */
export async function collectRepositories({
  fetchPage,
  target,
  pageSize,
  baseline = [],
  mode = "resume",
  pauseEveryPages = DEFAULT_PAUSE_EVERY_PAGES,
  pauseMs = DEFAULT_PAUSE_MS,
  checkpointEveryPages = 0,
  maxConsecutiveFailures = DEFAULT_MAX_CONSECUTIVE_FAILURES,
  onCheckpoint,
  signal,
  sleep = defaultSleep,
  now = () => new Date(),
  debug = false,
}: CollectParams): Promise<CollectionOutcome> {
  const records: DerivedMetricRecord[] = [];
  const seenUrls = new Set<string>();

  if (mode === "resume") {
    for (const record of baseline) {
      if (seenUrls.has(record.url)) {
        continue;
      }
      seenUrls.add(record.url);
      records.push(record);
    }
    if (records.length > 0) {
      console.log(`ℹ️  Resuming with ${records.length} existing repositories (shortfall ${Math.max(0, target - records.length)})`);
    }
  } else if (baseline.length > 0) {
    console.log(`ℹ️  Restarting collection; discarding ${baseline.length} existing repositories`);
  }

  const baselineCount = records.length;
  const requestSize = clampPageSize(pageSize);

  let phase: CollectionPhase = "idle";
  let reason: StopReason = "target-reached";
  let cursor: string | null = null;
  let pages = 0;
  let fetchCalls = 0;
  let failures = 0;
  let consecutiveFailures = 0;
  let fatalError: Error | undefined;

  const ingest = (page: PageResult): PageIngestResult => {
    const result: PageIngestResult = { added: 0, processed: 0, duplicates: 0, failed: 0, beyondTarget: 0 };
    const derivedAt = now();
    for (const [index, node] of page.nodes.entries()) {
      if (records.length >= target) {
        result.beyondTarget = page.nodes.length - index;
        break;
      }
      let record: DerivedMetricRecord;
      try {
        record = deriveMetrics(toRawRepository(node), derivedAt);
      } catch (error) {
        if (!(error instanceof RecordDerivationError)) {
          throw error;
        }
        result.failed += 1;
        console.warn(`⚠️  Skipping ${node.url ?? node.name ?? "unknown repository"}: ${error.message}`);
        continue;
      }
      result.processed += 1;
      if (seenUrls.has(record.url)) {
        result.duplicates += 1;
        if (debug) {
          console.log(`[collect] ${record.url} ⏭️  already collected`);
        }
        continue;
      }
      seenUrls.add(record.url);
      records.push(record);
      result.added += 1;
    }
    return result;
  };

  phase = records.length >= target ? "done" : "fetching";

  while (phase === "fetching") {
    if (signal?.aborted) {
      phase = "done";
      reason = "interrupted";
      break;
    }

    const pageNumber = pages + 1;
    console.log(`📄 Page ${pageNumber}: requesting ${requestSize} repositories (have ${records.length}/${target})`);
    fetchCalls += 1;

    let page: PageResult;
    try {
      page = await fetchPage(cursor, requestSize);
    } catch (caught) {
      const error = toError(caught);
      if (signal?.aborted) {
        phase = "done";
        reason = "interrupted";
        break;
      }
      if (error instanceof SourceError && error.partial) {
        console.warn(`⚠️  Page ${pageNumber} reported errors; keeping ${error.partial.nodes.length} partial results: ${error.message}`);
        page = error.partial;
      } else {
        failures += 1;
        consecutiveFailures += 1;
        const transition = decideAfterFailure({
          error,
          successfulPages: pages,
          consecutiveFailures,
          maxConsecutiveFailures,
        });
        if (transition.phase === "fetching") {
          console.warn(
            `⚠️  Page ${pageNumber} failed (${error.name}: ${error.message}); retrying from ${cursor ? "last cursor" : "the start"} (${consecutiveFailures}/${maxConsecutiveFailures})`
          );
          if (error instanceof SourceError && error.rateLimited) {
            await sleep(pauseMs, signal);
          }
          continue;
        }
        phase = transition.phase;
        reason = transition.reason;
        if (transition.phase === "aborted") {
          fatalError = error;
          console.error(`❌ First page failed: ${error.message}`);
        } else if (transition.reason === "empty-page") {
          console.log(`🏁 Page ${pageNumber} was empty; treating as end of results`);
        } else {
          console.warn(`⚠️  Giving up after ${consecutiveFailures} consecutive failures`);
        }
        break;
      }
    }

    phase = "processing";
    consecutiveFailures = 0;
    pages += 1;
    cursor = page.nextCursor ?? cursor;

    const ingested = ingest(page);
    const beyondTarget = ingested.beyondTarget > 0 ? `, ${ingested.beyondTarget} beyond target` : "";
    console.log(
      `   ✅ processed ${ingested.processed} of ${page.nodes.length} fetched (+${ingested.added} new, ${ingested.duplicates} duplicate${ingested.duplicates === 1 ? "" : "s"}${beyondTarget}; total ${records.length})`
    );

    const transition = decideAfterPage({ accumulated: records.length, target, hasMore: page.hasMore });
    phase = transition.phase;
    if (transition.phase !== "fetching") {
      reason = transition.reason;
      break;
    }

    if (onCheckpoint && checkpointEveryPages > 0 && pages % checkpointEveryPages === 0) {
      try {
        await onCheckpoint([...records]);
      } catch (error) {
        console.warn(`⚠️  Checkpoint after page ${pages} failed: ${toError(error).message}`);
      }
    }

    if (pauseEveryPages > 0 && pages % pauseEveryPages === 0) {
      console.log(`⏸️  Pausing ${pauseMs}ms after ${pages} pages`);
      await sleep(pauseMs, signal);
    }
  }

  const outcome: CollectionOutcome = {
    status: phase === "aborted" ? "aborted" : "done",
    reason,
    records,
    newRecords: records.length - baselineCount,
    pages,
    fetchCalls,
    failures,
  };
  if (fatalError) {
    outcome.error = fatalError;
  }
  return outcome;
}
