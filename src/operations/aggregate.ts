/**
 * Summary aggregation and CSV output
 */

import { join } from "node:path";
import { SUMMARY_FILE_NAME } from "../config";
import { EmptySummaryError } from "../errors";
import { CSVWriter } from "../formats/dsv";
import { writeString } from "../io/file-writer";
import {
  type ExtractionOutcome,
  SUMMARY_COLUMNS,
  type SkippedFile,
  type SummaryRecord,
} from "./types";

export interface AggregatedRecords {
  readonly records: SummaryRecord[];
  readonly skipped: SkippedFile[];
}

/**
 * Split extraction outcomes into summary records and skipped files
 */
export function aggregateRecords(outcomes: readonly ExtractionOutcome[]): AggregatedRecords {
  const records: SummaryRecord[] = [];
  const skipped: SkippedFile[] = [];

  for (const outcome of outcomes) {
    if (outcome.status === "ok") {
      records.push(outcome.record);
    } else {
      skipped.push({
        filePath: outcome.filePath,
        sampleId: outcome.sampleId,
        reason: outcome.reason,
        message: outcome.error.message,
      });
    }
  }

  return { records, skipped };
}

/**
 * Order records by `Well`, keeping input order for equal keys
 *
 * Plain string comparison, so "A10" sorts before "A2".
 */
export function sortByWell(records: readonly SummaryRecord[]): SummaryRecord[] {
  return [...records].sort((a, b) => (a.Well < b.Well ? -1 : a.Well > b.Well ? 1 : 0));
}

/**
 * Render records as CSV with the summary header
 */
export function formatSummary(records: readonly SummaryRecord[]): string {
  const writer = new CSVWriter({ columns: SUMMARY_COLUMNS });
  return writer.formatRecords(records);
}

/**
 * Sort records and write them to `mixcr_summary.csv` in the directory
 *
 * @returns Path of the written file
 * @throws {EmptySummaryError} When there are no records; nothing is written
 * @throws {FileError} When the file cannot be written
 */
export async function writeSummary(
  directory: string,
  records: readonly SummaryRecord[],
  filesSeen: number = records.length
): Promise<string> {
  if (records.length === 0) {
    throw new EmptySummaryError(filesSeen);
  }

  const outputPath = join(directory, SUMMARY_FILE_NAME);
  await writeString(outputPath, formatSummary(sortByWell(records)));
  return outputPath;
}
