#!/usr/bin/env node
import { Command } from "commander";
import "dotenv/config";
import { graphql } from "@octokit/graphql";

import {
  buildRuntimeConfig,
  DEFAULT_CHECKPOINT_EVERY_PAGES,
  DEFAULT_OUTPUT,
  PROJECT_ROOT,
  type CollectorCliOptions,
} from "./config";
import { DEFAULT_MAX_CONSECUTIVE_FAILURES, DEFAULT_PAUSE_EVERY_PAGES, DEFAULT_PAUSE_MS } from "./controller";
import { createPageFetcher } from "./fetch-page";
import { RateLimiter } from "./rate-limiter";
import { runCollection } from "./run-collection";

const program = new Command();

program
  .description("Collect metrics for the most-starred GitHub repositories")
  .option("-t, --target <number>", "Number of repositories to collect (default: 1000, env COLLECTOR_TARGET)")
  .option("-p, --page-size <number>", "Repositories requested per page, at most 100 (default: 20, env COLLECTOR_PAGE_SIZE)")
  .option("--min-stars <number>", "Only include repositories with more stars than this (default: 1000, env COLLECTOR_MIN_STARS)")
  .option("-o, --output <path>", "CSV file for collected repositories", DEFAULT_OUTPUT)
  .option("--restart", "Discard previously saved results instead of resuming")
  .option("--pause-every <pages>", `Pause after this many pages, 0 to disable (default: ${DEFAULT_PAUSE_EVERY_PAGES})`)
  .option("--pause-ms <ms>", `Length of each pause (default: ${DEFAULT_PAUSE_MS})`)
  .option(
    "--checkpoint-every <pages>",
    `Save progress after this many pages, 0 to disable (default: ${DEFAULT_CHECKPOINT_EVERY_PAGES})`
  )
  .option(
    "--max-failures <number>",
    `Consecutive failed requests before giving up (default: ${DEFAULT_MAX_CONSECUTIVE_FAILURES})`
  )
  .option("--summary-json <path>", "Also write the summary statistics as JSON")
  .option("--debug", "Enable verbose request logging")
  .parse(process.argv);

function listenForInterrupts(controller: AbortController) {
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      console.error(`\n❌ Received ${signal} again; exiting without saving`);
      process.exit(130);
    }
    console.warn(`\n⚠️  Received ${signal}; saving what has been collected so far (repeat to force exit)`);
    controller.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  return () => {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  };
}

async function run() {
  const options = program.opts<CollectorCliOptions>();
  const config = buildRuntimeConfig(options, process.env, PROJECT_ROOT);

  if (config.debug) {
    console.log("ℹ️  Debug mode enabled");
  }

  const controller = new AbortController();
  const stopListening = listenForInterrupts(controller);

  const graphqlClient = graphql.defaults({
    headers: {
      authorization: `token ${config.token}`,
    },
  });
  const fetchPage = createPageFetcher({
    graphqlClient,
    minStars: config.minStars,
    rateLimiter: new RateLimiter(),
    signal: controller.signal,
    debug: config.debug,
  });

  try {
    const report = await runCollection(config, { fetchPage, signal: controller.signal });
    if (report.exitCode === 0) {
      console.log("\n✅ Collection complete");
    }
    process.exitCode = report.exitCode;
  } finally {
    stopListening();
  }
}

run().catch((error) => {
  console.error("\n❌ Collector failed:", error instanceof Error ? error.message : error);
  process.exit(1);
});
