/**
 * Types shared by the summary operations
 */

import type { ClonotypeTableError, SummaryError } from "../errors";

/**
 * Output columns in the order they are written
 *
 * TRA fields come first; the TRB fields reuse the same names with a `.1`
 * suffix.
 */
export const SUMMARY_COLUMNS = [
  "Well",
  "Num_Total_Reads",
  "Abundance",
  "CDR3_nt_sequence",
  "CDR3_aa_sequence",
  "V_Gene",
  "D_Gene",
  "J_Gene",
  "Abundance.1",
  "CDR3_nt_sequence.1",
  "CDR3_aa_sequence.1",
  "V_Gene.1",
  "D_Gene.1",
  "J_Gene.1",
] as const;

export type SummaryColumn = (typeof SUMMARY_COLUMNS)[number];

/** null marks a missing value */
export type SummaryValue = string | number | null;

/**
 * One output row: the dominant paired clonotype of one sample
 */
export type SummaryRecord = {
  readonly [K in SummaryColumn]: K extends "Well" ? string : SummaryValue;
};

/**
 * Row and column counts of a parsed table, for progress logging
 */
export interface TableShape {
  readonly rowCount: number;
  readonly columns: readonly string[];
}

export type SkipReason = "parse-error" | "empty-table" | "missing-columns";

interface OutcomeBase {
  readonly filePath: string;
  readonly sampleId: string;
}

/**
 * Result of extracting the top clone from one file
 */
export type ExtractionOutcome =
  | (OutcomeBase & {
      readonly status: "ok";
      readonly record: SummaryRecord;
      readonly shape: TableShape;
    })
  | (OutcomeBase & {
      readonly status: "skipped";
      readonly reason: "parse-error";
      readonly error: SummaryError;
    })
  | (OutcomeBase & {
      readonly status: "skipped";
      readonly reason: "empty-table" | "missing-columns";
      readonly error: ClonotypeTableError;
      readonly shape: TableShape;
    });

export interface SkippedFile {
  readonly filePath: string;
  readonly sampleId: string;
  readonly reason: SkipReason;
  readonly message: string;
}

/**
 * What a successful run produced
 */
export interface SummaryReport {
  readonly directory: string;
  readonly outputPath: string;
  readonly filesFound: number;
  readonly records: readonly SummaryRecord[];
  readonly skipped: readonly SkippedFile[];
}
