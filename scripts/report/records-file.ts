import { parse } from "csv-parse/sync";
import fs from "fs-extra";
import path from "node:path";

import { BaselineFormatError, PersistenceError, toError } from "../collector/errors";
import type { DerivedMetricRecord } from "../collector/types";

export const CSV_COLUMNS = [
  "name",
  "owner",
  "url",
  "stars",
  "created_at",
  "updated_at",
  "age_days",
  "merged_pull_requests",
  "total_releases",
  "days_since_last_update",
  "primary_language",
  "total_issues",
  "closed_issues",
  "closed_issues_percentage",
] as const;

type CsvColumn = (typeof CSV_COLUMNS)[number];

const INTEGER_COLUMNS: ReadonlySet<CsvColumn> = new Set<CsvColumn>([
  "stars",
  "age_days",
  "merged_pull_requests",
  "total_releases",
  "days_since_last_update",
  "total_issues",
  "closed_issues",
]);

export interface PersistResult {
  primaryPath: string;
  backupPath: string;
  primaryWritten: boolean;
  backupWritten: boolean;
  errors: Error[];
}

export interface BaselineLoadResult {
  status: "missing" | "loaded" | "invalid";
  records: DerivedMetricRecord[];
  error?: Error;
}

function toRow(record: DerivedMetricRecord): Record<CsvColumn, string> {
  return {
    name: record.name,
    owner: record.owner,
    url: record.url,
    stars: record.stars.toString(),
    created_at: record.createdAt,
    updated_at: record.updatedAt,
    age_days: record.ageDays.toString(),
    merged_pull_requests: record.mergedPullRequests.toString(),
    total_releases: record.totalReleases.toString(),
    days_since_last_update: record.daysSinceLastUpdate.toString(),
    primary_language: record.primaryLanguage,
    total_issues: record.totalIssues.toString(),
    closed_issues: record.closedIssues.toString(),
    closed_issues_percentage: record.closedIssuesPercentage.toString(),
  };
}

export function recordsToCsv(records: DerivedMetricRecord[]): string {
  const lines = [CSV_COLUMNS.join(",")];
  for (const record of records) {
    const row = toRow(record);
    lines.push(CSV_COLUMNS.map((column) => `"${row[column].replace(/"/g, '""')}"`).join(","));
  }
  return `${lines.join("\n")}\n`;
}

function parseNumber(value: string, column: CsvColumn, line: number): number {
  const parsed = value.trim() === "" ? Number.NaN : Number(value);
  if (!Number.isFinite(parsed) || (INTEGER_COLUMNS.has(column) && !Number.isInteger(parsed))) {
    throw new BaselineFormatError(`Line ${line}: column '${column}' is not a valid number ('${value}')`, line);
  }
  return parsed;
}

function toRecord(cells: string[], line: number): DerivedMetricRecord {
  const row = new Map<CsvColumn, string>();
  CSV_COLUMNS.forEach((column, index) => row.set(column, cells[index] ?? ""));
  const text = (column: CsvColumn) => row.get(column) ?? "";
  const num = (column: CsvColumn) => parseNumber(text(column), column, line);

  if (!text("url")) {
    throw new BaselineFormatError(`Line ${line}: missing url`, line);
  }
  const closedIssuesPercentage = num("closed_issues_percentage");
  if (closedIssuesPercentage < 0 || closedIssuesPercentage > 100) {
    throw new BaselineFormatError(`Line ${line}: closed_issues_percentage out of range (${closedIssuesPercentage})`, line);
  }

  return {
    url: text("url"),
    name: text("name"),
    owner: text("owner"),
    stars: num("stars"),
    createdAt: text("created_at"),
    updatedAt: text("updated_at"),
    ageDays: num("age_days"),
    mergedPullRequests: num("merged_pull_requests"),
    totalReleases: num("total_releases"),
    daysSinceLastUpdate: num("days_since_last_update"),
    primaryLanguage: text("primary_language"),
    totalIssues: num("total_issues"),
    closedIssues: num("closed_issues"),
    closedIssuesPercentage,
  };
}

/** Parses a records file. Any malformed row rejects the whole file. */
export function parseRecordsCsv(content: string): DerivedMetricRecord[] {
  let rows: unknown;
  try {
    rows = parse(content, { skip_empty_lines: true });
  } catch (error) {
    throw new BaselineFormatError(`Unreadable CSV: ${toError(error).message}`);
  }
  if (!Array.isArray(rows) || rows.length === 0) {
    throw new BaselineFormatError("CSV has no header row");
  }

  const [header, ...body] = rows;
  const expectedHeader = CSV_COLUMNS.join(",");
  if (!Array.isArray(header) || header.join(",") !== expectedHeader) {
    throw new BaselineFormatError(`Unexpected header; expected ${expectedHeader}`, 1);
  }

  const records: DerivedMetricRecord[] = [];
  const seen = new Set<string>();
  body.forEach((cells: unknown, index) => {
    const line = index + 2;
    if (!Array.isArray(cells) || cells.length !== CSV_COLUMNS.length || !cells.every((cell) => typeof cell === "string")) {
      throw new BaselineFormatError(`Line ${line}: expected ${CSV_COLUMNS.length} columns`, line);
    }
    const record = toRecord(cells, line);
    if (seen.has(record.url)) {
      return;
    }
    seen.add(record.url);
    records.push(record);
  });
  return records;
}

export async function loadBaseline(filePath: string): Promise<BaselineLoadResult> {
  const resolved = path.resolve(filePath);
  if (!(await fs.pathExists(resolved))) {
    return { status: "missing", records: [] };
  }
  try {
    const content = await fs.readFile(resolved, "utf8");
    return { status: "loaded", records: parseRecordsCsv(content) };
  } catch (error) {
    return { status: "invalid", records: [], error: toError(error) };
  }
}

function formatStamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, "")}_${iso.slice(11, 19).replace(/:/g, "")}`;
}

export function backupPathFor(outputPath: string, now: Date): string {
  const parsed = path.parse(path.resolve(outputPath));
  return path.join(parsed.dir, `${parsed.name}_backup_${formatStamp(now)}${parsed.ext || ".csv"}`);
}

/** Writes through a sibling temp file so a failed write leaves the previous file as it was. */
async function writeFileReplacing(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.tmp`;
  try {
    await fs.outputFile(tempPath, content, "utf8");
    await fs.move(tempPath, filePath, { overwrite: true });
  } catch (error) {
    await fs.remove(tempPath).catch((cleanupError: unknown) => {
      console.warn(`⚠️  Could not remove ${tempPath}: ${toError(cleanupError).message}`);
    });
    throw error;
  }
}

/** Mid-run snapshot: replaces the primary file only, no backup. */
export async function writeCheckpoint(records: DerivedMetricRecord[], outputPath: string): Promise<void> {
  await writeFileReplacing(path.resolve(outputPath), recordsToCsv(records));
}

export async function persistRecords(
  records: DerivedMetricRecord[],
  options: { outputPath: string; now?: Date }
): Promise<PersistResult> {
  const primaryPath = path.resolve(options.outputPath);
  const backupPath = backupPathFor(primaryPath, options.now ?? new Date());
  const content = recordsToCsv(records);
  const result: PersistResult = {
    primaryPath,
    backupPath,
    primaryWritten: false,
    backupWritten: false,
    errors: [],
  };

  try {
    await writeFileReplacing(primaryPath, content);
    result.primaryWritten = true;
  } catch (error) {
    result.errors.push(toError(error));
    console.warn(`⚠️  Failed to write ${primaryPath}: ${toError(error).message}; writing backup only`);
  }

  try {
    await writeFileReplacing(backupPath, content);
    result.backupWritten = true;
  } catch (error) {
    result.errors.push(toError(error));
    console.warn(`⚠️  Failed to write backup ${backupPath}: ${toError(error).message}`);
  }

  if (!result.primaryWritten && !result.backupWritten) {
    throw new PersistenceError(
      `Could not write ${records.length} records to ${primaryPath} or ${backupPath}`,
      result.errors
    );
  }

  return result;
}
