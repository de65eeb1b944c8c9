/**
 * Summary operations: discovery, top clone extraction, aggregation, and
 * the pipeline that runs them over a directory
 *
 * @example
 * ```typescript
 * const result = await runSummary({ outputDir: "plate-1/mixcr" });
 * if (result.exitCode === 0) {
 *   console.log(result.report.outputPath); // "plate-1/mixcr/mixcr_summary.csv"
 * }
 * ```
 */

export {
  type AggregatedRecords,
  aggregateRecords,
  formatSummary,
  sortByWell,
  writeSummary,
} from "./aggregate";
export { discoverCloneGroupFiles, isCloneGroupFileName, sampleIdFromPath } from "./discover";
export {
  buildSummaryRecord,
  extractTopClone,
  rankingValues,
  selectTopClone,
  summarizeTable,
} from "./extract";
export {
  processFile,
  runSummary,
  type SummaryFailure,
  type SummaryRunResult,
  summarizeDirectory,
} from "./summarize";
export {
  type ExtractionOutcome,
  type SkippedFile,
  type SkipReason,
  SUMMARY_COLUMNS,
  type SummaryColumn,
  type SummaryRecord,
  type SummaryReport,
  type SummaryValue,
  type TableShape,
} from "./types";
