/**
 * Column names of MiXCR clone group exports
 */

export const CHAINS = ["TRA", "TRB"] as const;

export type Chain = (typeof CHAINS)[number];

/**
 * Per-chain fields read from the primary clonotype of a group, in output order
 */
export const CHAIN_FIELDS = [
  "readCount",
  "nSeqCDR3",
  "aaSeqCDR3",
  "bestVHit",
  "bestDHit",
  "bestJHit",
] as const;

export type ChainField = (typeof CHAIN_FIELDS)[number];

export const GROUP_READ_COUNT_COLUMN = "groupReadCount";

/**
 * Build the column name of a chain field, e.g. `TRA.primary.readCount`
 */
export function chainColumn(chain: Chain, field: ChainField): string {
  return `${chain}.primary.${field}`;
}

/**
 * Columns without which no top clone can be ranked
 */
export const REQUIRED_COLUMNS: readonly string[] = CHAINS.map((chain) =>
  chainColumn(chain, "readCount")
);

/**
 * Cell contents read as a missing value
 */
export const MISSING_VALUE_TOKENS: ReadonlySet<string> = new Set([
  "",
  "#N/A",
  "#N/A N/A",
  "#NA",
  "-1.#IND",
  "-1.#QNAN",
  "-NaN",
  "-nan",
  "1.#IND",
  "1.#QNAN",
  "<NA>",
  "N/A",
  "NA",
  "NULL",
  "NaN",
  "None",
  "n/a",
  "nan",
  "null",
]);
