import path from "node:path";
import { fileURLToPath } from "node:url";

import {
  DEFAULT_MAX_CONSECUTIVE_FAILURES,
  DEFAULT_PAUSE_EVERY_PAGES,
  DEFAULT_PAUSE_MS,
} from "./controller";
import { ConfigurationError } from "./errors";
import { MAX_PAGE_SIZE } from "./query";
import type { CollectorRuntimeConfig } from "./types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
export const PROJECT_ROOT = path.resolve(__dirname, "..", "..");
export const DEFAULT_OUTPUT = path.join("data", "repositories.csv");

export const DEFAULT_TARGET = 1000;
export const DEFAULT_PAGE_SIZE = 20;
export const DEFAULT_MIN_STARS = 1000;
export const DEFAULT_CHECKPOINT_EVERY_PAGES = 5;

/** Raw option values as handed over by the command line parser. */
export interface CollectorCliOptions {
  target?: string;
  pageSize?: string;
  minStars?: string;
  output: string;
  restart?: boolean;
  pauseEvery?: string;
  pauseMs?: string;
  checkpointEvery?: string;
  maxFailures?: string;
  summaryJson?: string;
  debug?: boolean;
}

type Environment = Record<string, string | undefined>;

function parseInteger(
  value: string | undefined,
  fallback: number,
  label: string,
  { min }: { min: number }
): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  const trimmed = value.trim();
  const parsed = Number.parseInt(trimmed, 10);
  if (!/^-?\d+$/.test(trimmed) || Number.isNaN(parsed) || parsed < min) {
    throw new ConfigurationError(`${label} must be an integer >= ${min} (got '${value}')`);
  }
  return parsed;
}

export function resolveOutputPath(output: string, projectRoot: string): string {
  return path.isAbsolute(output) ? output : path.join(projectRoot, output);
}

/**
 * Builds the run configuration once at start-up. Throws before any network
 * activity when the token is missing or a numeric option is invalid.
 */
export function buildRuntimeConfig(
  options: CollectorCliOptions,
  env: Environment,
  projectRoot: string
): CollectorRuntimeConfig {
  const token = env.GITHUB_TOKEN?.trim();
  if (!token) {
    throw new ConfigurationError("GITHUB_TOKEN is required. Set it via environment variable or .env file.");
  }

  const pageSize = parseInteger(options.pageSize ?? env.COLLECTOR_PAGE_SIZE, DEFAULT_PAGE_SIZE, "--page-size", { min: 1 });
  if (pageSize > MAX_PAGE_SIZE) {
    throw new ConfigurationError(`--page-size cannot exceed ${MAX_PAGE_SIZE} (got ${pageSize})`);
  }

  return {
    token,
    target: parseInteger(options.target ?? env.COLLECTOR_TARGET, DEFAULT_TARGET, "--target", { min: 1 }),
    pageSize,
    minStars: parseInteger(options.minStars ?? env.COLLECTOR_MIN_STARS, DEFAULT_MIN_STARS, "--min-stars", { min: 0 }),
    outputPath: resolveOutputPath(options.output, projectRoot),
    mode: options.restart ? "restart" : "resume",
    pauseEveryPages: parseInteger(options.pauseEvery, DEFAULT_PAUSE_EVERY_PAGES, "--pause-every", { min: 0 }),
    pauseMs: parseInteger(options.pauseMs, DEFAULT_PAUSE_MS, "--pause-ms", { min: 0 }),
    checkpointEveryPages: parseInteger(
      options.checkpointEvery,
      DEFAULT_CHECKPOINT_EVERY_PAGES,
      "--checkpoint-every",
      { min: 0 }
    ),
    maxConsecutiveFailures: parseInteger(
      options.maxFailures,
      DEFAULT_MAX_CONSECUTIVE_FAILURES,
      "--max-failures",
      { min: 1 }
    ),
    summaryJsonPath: options.summaryJson ? resolveOutputPath(options.summaryJson, projectRoot) : null,
    debug: Boolean(options.debug),
  };
}
