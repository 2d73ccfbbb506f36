#!/usr/bin/env node
import { Command } from "commander";
import fs from "fs-extra";

import { DEFAULT_OUTPUT, PROJECT_ROOT, resolveOutputPath } from "./collector/config";
import { parseRecordsCsv } from "./report/records-file";
import { printSummary, summarize, writeSummaryJson } from "./report/summary";

const program = new Command();

program
  .description("Summarize a collected repositories CSV for the research questions")
  .option("-i, --input <path>", "CSV produced by the collector", DEFAULT_OUTPUT)
  .option("-j, --json <path>", "Also write the summary statistics as JSON")
  .parse(process.argv);

async function run() {
  const options = program.opts<{ input: string; json?: string }>();
  const inputPath = resolveOutputPath(options.input, PROJECT_ROOT);

  if (!(await fs.pathExists(inputPath))) {
    throw new Error(`Input file not found: ${inputPath}`);
  }

  const records = parseRecordsCsv(await fs.readFile(inputPath, "utf8"));
  const summary = summarize(records);
  printSummary(summary);

  if (options.json) {
    const jsonPath = resolveOutputPath(options.json, PROJECT_ROOT);
    await writeSummaryJson(jsonPath, summary);
    console.log(`\n✅ Summary JSON: ${jsonPath}`);
  }
}

run().catch((error) => {
  console.error("\n❌ Summarize failed:", error instanceof Error ? error.message : error);
  process.exit(1);
});
