/**
 * Top clone extraction tests
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { ClonotypeTableError, DSVParseError, FileError } from "../../src/errors";
import { ClonotypeTable, parseClonotypeTable } from "../../src/formats/clonotype";
import {
  extractTopClone,
  rankingValues,
  selectTopClone,
  summarizeTable,
} from "../../src/operations/extract";
import { CLONE_GROUP_HEADER, cloneRow, tableText, writeCloneGroups } from "./fixtures";

function readCounts(pairs: readonly (readonly [string, string])[]): ClonotypeTable {
  return new ClonotypeTable(
    ["TRA.primary.readCount", "TRB.primary.readCount"],
    pairs.map(([tra, trb]) => [tra === "" ? null : tra, trb === "" ? null : trb])
  );
}

describe("rankingValues", () => {
  test("adds TRA and TRB read counts", () => {
    expect(rankingValues(readCounts([["10", "5"], ["1", "1"]]))).toEqual([15, 2]);
  });

  test("a missing or non-numeric operand makes the ranking null", () => {
    expect(rankingValues(readCounts([["", "3"], ["5", "x"], ["2", "2"]]))).toEqual([null, null, 4]);
  });
});

describe("selectTopClone", () => {
  test("picks the highest combined read count", () => {
    expect(selectTopClone(readCounts([["1", "1"], ["10", "5"], ["3", "3"]]))).toBe(1);
  });

  test("ties go to the earliest row", () => {
    expect(selectTopClone(readCounts([["10", "10"], ["15", "5"]]))).toBe(0);
  });

  test("rows with a null ranking lose to any defined ranking", () => {
    expect(selectTopClone(readCounts([["", "100"], ["1", "0"]]))).toBe(1);
  });

  test("first row wins when every ranking is null", () => {
    expect(selectTopClone(readCounts([["", "1"], ["2", ""]]))).toBe(0);
  });

  test("empty table has no top clone", () => {
    expect(selectTopClone(readCounts([]))).toBe(-1);
  });
});

describe("summarizeTable", () => {
  test("builds the summary row from the top clone", async () => {
    const table = await parseClonotypeTable(
      tableText([cloneRow("10", "10", "5", "1"), cloneRow("5", "1", "1", "2")])
    );

    const outcome = summarizeTable(table, "results.A1.clone.groups_TRAB.tsv", "A1");

    expect(outcome).toEqual({
      status: "ok",
      filePath: "results.A1.clone.groups_TRAB.tsv",
      sampleId: "A1",
      shape: { rowCount: 2, columns: [...CLONE_GROUP_HEADER] },
      record: {
        Well: "A1",
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
      },
    });
  });

  test("total reads skip missing group counts", async () => {
    const table = await parseClonotypeTable(
      tableText([cloneRow("NA", "1", "1", "1"), cloneRow("7", "2", "2", "2")])
    );

    const outcome = summarizeTable(table, "t.tsv", "A1");

    expect(outcome.status === "ok" && outcome.record.Num_Total_Reads).toBe(7);
    expect(outcome.status === "ok" && outcome.record.V_Gene).toBe("TRAV2");
  });

  test("total reads are missing without a groupReadCount column", async () => {
    const header = CLONE_GROUP_HEADER.slice(1);
    const table = await parseClonotypeTable(
      tableText([cloneRow("9", "4", "4", "1").slice(1)], header)
    );

    const outcome = summarizeTable(table, "t.tsv", "A1");

    expect(outcome.status).toBe("ok");
    expect(outcome.status === "ok" && outcome.record.Num_Total_Reads).toBeNull();
  });

  test("non-numeric read counts are kept as text", async () => {
    const table = await parseClonotypeTable(tableText([cloneRow("1", "many", "3", "1")]));

    const outcome = summarizeTable(table, "t.tsv", "A1");

    expect(outcome.status === "ok" && outcome.record.Abundance).toBe("many");
    expect(outcome.status === "ok" && outcome.record["Abundance.1"]).toBe(3);
  });

  test("missing read counts stay missing", async () => {
    const table = await parseClonotypeTable(tableText([cloneRow("1", "", "3", "1")]));

    const outcome = summarizeTable(table, "t.tsv", "A1");

    expect(outcome.status === "ok" && outcome.record.Abundance).toBeNull();
  });

  test("header-only table is skipped as empty", async () => {
    const table = await parseClonotypeTable(tableText([]));

    const outcome = summarizeTable(table, "t.tsv", "A1");

    expect(outcome.status).toBe("skipped");
    if (outcome.status !== "skipped") return;
    expect(outcome.reason).toBe("empty-table");
    expect(outcome.error).toBeInstanceOf(ClonotypeTableError);
    expect(outcome.error.message).toBe("No clonotypes found in t.tsv");
  });

  test("table without TRB read counts is skipped", async () => {
    const header = CLONE_GROUP_HEADER.filter((column) => column !== "TRB.primary.readCount");
    const table = await parseClonotypeTable(
      tableText([cloneRow("3", "3", "3", "1").filter((_, i) => i !== 7)], header)
    );

    const outcome = summarizeTable(table, "t.tsv", "A2");

    expect(outcome).toMatchObject({
      status: "skipped",
      reason: "missing-columns",
      sampleId: "A2",
      shape: { rowCount: 1 },
    });
    if (outcome.status !== "skipped") return;
    expect(outcome.error.message).toBe(
      "Missing required columns in t.tsv: TRA.primary.readCount, TRB.primary.readCount (absent: TRB.primary.readCount)"
    );
  });
});

describe("extractTopClone", () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "extract-"));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("reads the file and derives the sample id from its name", async () => {
    const path = writeCloneGroups(dir, "plate.1.C3", [cloneRow("4", "2", "2", "1")]);

    const outcome = await extractTopClone(path);

    expect(outcome.status).toBe("ok");
    expect(outcome.sampleId).toBe("plate.1.C3");
    expect(outcome.status === "ok" && outcome.record.Well).toBe("plate.1.C3");
  });

  test("empty file is a parse error", async () => {
    const path = join(dir, "results.E1.clone.groups_TRAB.tsv");
    writeFileSync(path, "");

    const outcome = await extractTopClone(path);

    expect(outcome).toMatchObject({ status: "skipped", reason: "parse-error", sampleId: "E1" });
    expect(outcome.status === "skipped" && outcome.error).toBeInstanceOf(DSVParseError);
  });

  test("unclosed quote is a parse error", async () => {
    const path = join(dir, "results.Q1.clone.groups_TRAB.tsv");
    writeFileSync(path, 'TRA.primary.readCount\tTRB.primary.readCount\n"1\t2\n');

    const outcome = await extractTopClone(path);

    expect(outcome).toMatchObject({ status: "skipped", reason: "parse-error" });
  });

  test("a row longer than the header is a parse error", async () => {
    const path = join(dir, "results.L1.clone.groups_TRAB.tsv");
    writeFileSync(
      path,
      "groupReadCount\tTRA.primary.readCount\tTRB.primary.readCount\n15\t10\t5\n9\t4\t4\tEXTRA\tMORE\n"
    );

    const outcome = await extractTopClone(path);

    expect(outcome).toMatchObject({ status: "skipped", reason: "parse-error", sampleId: "L1" });
    expect(outcome.status === "skipped" && outcome.error).toBeInstanceOf(DSVParseError);
    expect(outcome.status === "skipped" && outcome.error.message).toBe(
      "Expected 3 fields, saw 5 (line 3)"
    );
  });

  test("unreadable file is a parse error carrying a FileError", async () => {
    const outcome = await extractTopClone(join(dir, "results.Z9.clone.groups_TRAB.tsv"));

    expect(outcome).toMatchObject({ status: "skipped", reason: "parse-error", sampleId: "Z9" });
    expect(outcome.status === "skipped" && outcome.error).toBeInstanceOf(FileError);
  });
});
