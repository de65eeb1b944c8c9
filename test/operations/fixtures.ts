/**
 * Clone group table fixtures shared by the operation tests
 */

import { writeFileSync } from "node:fs";
import { join } from "node:path";

export const CLONE_GROUP_HEADER = [
  "groupReadCount",
  "TRA.primary.readCount",
  "TRA.primary.nSeqCDR3",
  "TRA.primary.aaSeqCDR3",
  "TRA.primary.bestVHit",
  "TRA.primary.bestDHit",
  "TRA.primary.bestJHit",
  "TRB.primary.readCount",
  "TRB.primary.nSeqCDR3",
  "TRB.primary.aaSeqCDR3",
  "TRB.primary.bestVHit",
  "TRB.primary.bestDHit",
  "TRB.primary.bestJHit",
] as const;

/**
 * One clone group row in header order
 */
export function cloneRow(groupReads: string, traReads: string, trbReads: string, tag: string): string[] {
  return [
    groupReads,
    traReads,
    `TGT${tag}`,
    `CA${tag}`,
    `TRAV${tag}`,
    "",
    `TRAJ${tag}`,
    trbReads,
    `TGC${tag}`,
    `CS${tag}`,
    `TRBV${tag}`,
    `TRBD${tag}`,
    `TRBJ${tag}`,
  ];
}

export function tableText(
  rows: readonly (readonly string[])[],
  header: readonly string[] = CLONE_GROUP_HEADER
): string {
  return [header, ...rows].map((row) => row.join("\t")).join("\n") + "\n";
}

export function cloneGroupFileName(sampleId: string): string {
  return `results.${sampleId}.clone.groups_TRAB.tsv`;
}

/**
 * Write a clone group table for a sample and return its path
 */
export function writeCloneGroups(
  dir: string,
  sampleId: string,
  rows: readonly (readonly string[])[],
  header: readonly string[] = CLONE_GROUP_HEADER
): string {
  const path = join(dir, cloneGroupFileName(sampleId));
  writeFileSync(path, tableText(rows, header));
  return path;
}
