/**
 * Top clone extraction
 *
 * Each clone group table contributes one summary row: the group whose
 * primary TRA and TRB clonotypes together have the most reads.
 */

import { ClonotypeTableError, FileError, SummaryError } from "../errors";
import {
  type Chain,
  type ChainField,
  ClonotypeTable,
  chainColumn,
  GROUP_READ_COUNT_COLUMN,
  REQUIRED_COLUMNS,
  readClonotypeTable,
} from "../formats/clonotype";
import { sampleIdFromPath } from "./discover";
import type { ExtractionOutcome, SummaryRecord, SummaryValue, TableShape } from "./types";

/**
 * Combined TRA + TRB read count per row
 *
 * A missing or non-numeric operand makes that row's ranking null.
 */
export function rankingValues(table: ClonotypeTable): (number | null)[] {
  const tra = table.numericColumn(chainColumn("TRA", "readCount"));
  const trb = table.numericColumn(chainColumn("TRB", "readCount"));

  return tra.map((alpha, i) => {
    const beta = trb[i] ?? null;
    return alpha === null || beta === null ? null : alpha + beta;
  });
}

/**
 * Index of the row with the highest ranking
 *
 * Ties go to the earliest row. Rows with a null ranking only win when no
 * row has one, in which case the first row is returned.
 *
 * @returns -1 for an empty table
 */
export function selectTopClone(table: ClonotypeTable): number {
  const rankings = rankingValues(table);
  let best = -1;
  let bestValue: number | null = null;

  for (let i = 0; i < rankings.length; i++) {
    const value = rankings[i] ?? null;
    if (best === -1) {
      best = i;
      bestValue = value;
    } else if (value !== null && (bestValue === null || value > bestValue)) {
      best = i;
      bestValue = value;
    }
  }

  return best;
}

function chainValues(
  table: ClonotypeTable,
  rowIndex: number,
  chain: Chain
): Record<ChainField, SummaryValue> {
  const read = (field: ChainField): SummaryValue => table.cell(rowIndex, chainColumn(chain, field));
  const readCountColumn = chainColumn(chain, "readCount");

  return {
    readCount: table.numericCell(rowIndex, readCountColumn) ?? read("readCount"),
    nSeqCDR3: read("nSeqCDR3"),
    aaSeqCDR3: read("aaSeqCDR3"),
    bestVHit: read("bestVHit"),
    bestDHit: read("bestDHit"),
    bestJHit: read("bestJHit"),
  };
}

/**
 * Assemble the summary row for one selected clone
 */
export function buildSummaryRecord(
  sampleId: string,
  table: ClonotypeTable,
  rowIndex: number,
  totalReads: number | null
): SummaryRecord {
  const tra = chainValues(table, rowIndex, "TRA");
  const trb = chainValues(table, rowIndex, "TRB");

  return {
    Well: sampleId,
    Num_Total_Reads: totalReads,
    Abundance: tra.readCount,
    CDR3_nt_sequence: tra.nSeqCDR3,
    CDR3_aa_sequence: tra.aaSeqCDR3,
    V_Gene: tra.bestVHit,
    D_Gene: tra.bestDHit,
    J_Gene: tra.bestJHit,
    "Abundance.1": trb.readCount,
    "CDR3_nt_sequence.1": trb.nSeqCDR3,
    "CDR3_aa_sequence.1": trb.aaSeqCDR3,
    "V_Gene.1": trb.bestVHit,
    "D_Gene.1": trb.bestDHit,
    "J_Gene.1": trb.bestJHit,
  };
}

/**
 * Validate a parsed table and pick its summary row
 */
export function summarizeTable(
  table: ClonotypeTable,
  filePath: string,
  sampleId: string
): ExtractionOutcome {
  const shape: TableShape = { rowCount: table.rowCount, columns: table.columns };
  const totalReads = table.sum(GROUP_READ_COUNT_COLUMN);

  if (table.isEmpty()) {
    return {
      status: "skipped",
      reason: "empty-table",
      filePath,
      sampleId,
      shape,
      error: ClonotypeTableError.empty(filePath),
    };
  }

  const missing = table.missingColumns(REQUIRED_COLUMNS);
  if (missing.length > 0) {
    return {
      status: "skipped",
      reason: "missing-columns",
      filePath,
      sampleId,
      shape,
      error: ClonotypeTableError.missingColumns(filePath, REQUIRED_COLUMNS, missing),
    };
  }

  const top = selectTopClone(table);
  return {
    status: "ok",
    filePath,
    sampleId,
    shape,
    record: buildSummaryRecord(sampleId, table, top, totalReads),
  };
}

/**
 * Read one clone group table and extract its top clone
 *
 * Never rejects for a bad file: read and parse failures come back as a
 * "parse-error" outcome so the caller can log and move on.
 */
export async function extractTopClone(
  filePath: string,
  sampleId: string = sampleIdFromPath(filePath)
): Promise<ExtractionOutcome> {
  let table: ClonotypeTable;
  try {
    table = await readClonotypeTable(filePath);
  } catch (error) {
    return {
      status: "skipped",
      reason: "parse-error",
      filePath,
      sampleId,
      error: error instanceof SummaryError ? error : FileError.fromSystemError("read", filePath, error),
    };
  }

  return summarizeTable(table, filePath, sampleId);
}
