/**
 * Aggregation and summary CSV output tests
 */

import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ClonotypeTableError, EmptySummaryError, FileError } from "../../src/errors";
import {
  aggregateRecords,
  formatSummary,
  sortByWell,
  writeSummary,
} from "../../src/operations/aggregate";
import type { ExtractionOutcome, SummaryRecord } from "../../src/operations/types";

const HEADER_LINE =
  "Well,Num_Total_Reads,Abundance,CDR3_nt_sequence,CDR3_aa_sequence,V_Gene,D_Gene,J_Gene," +
  "Abundance.1,CDR3_nt_sequence.1,CDR3_aa_sequence.1,V_Gene.1,D_Gene.1,J_Gene.1";

function record(well: string, overrides: Partial<SummaryRecord> = {}): SummaryRecord {
  return {
    Num_Total_Reads: 15,
    Abundance: 10,
    CDR3_nt_sequence: "TGT1",
    CDR3_aa_sequence: "CA1",
    V_Gene: "TRAV1",
    D_Gene: null,
    J_Gene: "TRAJ1",
    "Abundance.1": 5,
    "CDR3_nt_sequence.1": "TGC1",
    "CDR3_aa_sequence.1": "CS1",
    "V_Gene.1": "TRBV1",
    "D_Gene.1": "TRBD1",
    "J_Gene.1": "TRBJ1",
    ...overrides,
    Well: well,
  };
}

describe("aggregateRecords", () => {
  test("separates records from skipped files", () => {
    const outcomes: ExtractionOutcome[] = [
      {
        status: "ok",
        filePath: "results.A1.clone.groups_TRAB.tsv",
        sampleId: "A1",
        shape: { rowCount: 2, columns: [] },
        record: record("A1"),
      },
      {
        status: "skipped",
        reason: "empty-table",
        filePath: "results.A2.clone.groups_TRAB.tsv",
        sampleId: "A2",
        shape: { rowCount: 0, columns: [] },
        error: ClonotypeTableError.empty("results.A2.clone.groups_TRAB.tsv"),
      },
    ];

    const { records, skipped } = aggregateRecords(outcomes);

    expect(records).toEqual([record("A1")]);
    expect(skipped).toEqual([
      {
        filePath: "results.A2.clone.groups_TRAB.tsv",
        sampleId: "A2",
        reason: "empty-table",
        message: "No clonotypes found in results.A2.clone.groups_TRAB.tsv",
      },
    ]);
  });
});

describe("sortByWell", () => {
  test("sorts by plain string order", () => {
    const sorted = sortByWell([record("B1"), record("A2"), record("A10")]);
    expect(sorted.map((r) => r.Well)).toEqual(["A10", "A2", "B1"]);
  });

  test("keeps input order for equal wells", () => {
    const sorted = sortByWell([
      record("B1"),
      record("A1", { Abundance: 1 }),
      record("A1", { Abundance: 2 }),
    ]);
    expect(sorted.map((r) => [r.Well, r.Abundance])).toEqual([
      ["A1", 1],
      ["A1", 2],
      ["B1", 10],
    ]);
  });

  test("does not modify its input", () => {
    const input = [record("B1"), record("A1")];
    sortByWell(input);
    expect(input.map((r) => r.Well)).toEqual(["B1", "A1"]);
  });
});

describe("formatSummary", () => {
  test("writes the header and one line per record", () => {
    expect(formatSummary([record("A1")])).toBe(
      `${HEADER_LINE}\nA1,15,10,TGT1,CA1,TRAV1,,TRAJ1,5,TGC1,CS1,TRBV1,TRBD1,TRBJ1\n`
    );
  });

  test("missing values are empty fields", () => {
    const line = formatSummary([
      record("A1", { Num_Total_Reads: null, Abundance: null, "J_Gene.1": null }),
    ]).split("\n")[1];

    expect(line).toBe("A1,,,TGT1,CA1,TRAV1,,TRAJ1,5,TGC1,CS1,TRBV1,TRBD1,");
  });

  test("quotes values containing commas or quotes", () => {
    const line = formatSummary([
      record("A1", { V_Gene: "TRAV1,TRAV2", CDR3_aa_sequence: 'CA"1' }),
    ]).split("\n")[1];

    expect(line).toBe('A1,15,10,TGT1,"CA""1","TRAV1,TRAV2",,TRAJ1,5,TGC1,CS1,TRBV1,TRBD1,TRBJ1');
  });

  test("non-integral counts keep their decimals", () => {
    const line = formatSummary([record("A1", { Num_Total_Reads: 12.5 })]).split("\n")[1];
    expect(line?.split(",")[1]).toBe("12.5");
  });
});

describe("writeSummary", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "aggregate-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("writes mixcr_summary.csv sorted by well", async () => {
    const outputPath = await writeSummary(dir, [record("B1"), record("A1")]);

    expect(outputPath).toBe(join(dir, "mixcr_summary.csv"));
    const lines = readFileSync(outputPath, "utf8").split("\n");
    expect(lines.map((line) => line.split(",")[0])).toEqual(["Well", "A1", "B1", ""]);
  });

  test("file content matches formatSummary of the sorted records", async () => {
    const outputPath = await writeSummary(dir, [record("B1"), record("A1")]);

    expect(readFileSync(outputPath, "utf8")).toBe(formatSummary([record("A1"), record("B1")]));
  });

  test("overwrites an earlier summary", async () => {
    await writeSummary(dir, [record("A1"), record("A2")]);
    const outputPath = await writeSummary(dir, [record("C3")]);

    expect(readFileSync(outputPath, "utf8")).toBe(
      `${HEADER_LINE}\nC3,15,10,TGT1,CA1,TRAV1,,TRAJ1,5,TGC1,CS1,TRBV1,TRBD1,TRBJ1\n`
    );
  });

  test("no records is an EmptySummaryError and writes nothing", async () => {
    await expect(writeSummary(dir, [], 3)).rejects.toThrow(EmptySummaryError);
    await expect(writeSummary(dir, [], 3)).rejects.toThrow(
      "No data processed. Check if files are empty or lack required columns."
    );
    expect(existsSync(join(dir, "mixcr_summary.csv"))).toBe(false);
  });

  test("missing directory is a FileError", async () => {
    await expect(writeSummary(join(dir, "missing"), [record("A1")])).rejects.toThrow(FileError);
  });
});
