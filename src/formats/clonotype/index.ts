/**
 * @module formats/clonotype
 * @description MiXCR clone group tables: column names, table model, reader
 */

export {
  CHAIN_FIELDS,
  CHAINS,
  type Chain,
  type ChainField,
  chainColumn,
  GROUP_READ_COUNT_COLUMN,
  MISSING_VALUE_TOKENS,
  REQUIRED_COLUMNS,
} from "./constants";
export { parseClonotypeTable, readClonotypeTable } from "./reader";
export { type Cell, ClonotypeTable, toCell, toNumber } from "./table";
