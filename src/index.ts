/**
 * mixcr-summary - Top paired TRA/TRB clonotype per sample from MiXCR
 * clone group exports
 */

// Configuration
export {
  CLONE_GROUP_FILE_PREFIX,
  CLONE_GROUP_FILE_SUFFIX,
  LOG_FILE_NAME,
  type ResolvedRunOptions,
  type RunOptions,
  RunOptionsSchema,
  resolveRunOptions,
  SUMMARY_FILE_NAME,
  VERSION,
} from "./config";
// Error types
export {
  ClonotypeTableError,
  DiscoveryError,
  DSVParseError,
  ERROR_SUGGESTIONS,
  EmptySummaryError,
  FileError,
  getErrorSuggestion,
  ParseError,
  SummaryError,
  ValidationError,
} from "./errors";
// Clonotype tables
export {
  type Cell,
  type Chain,
  type ChainField,
  CHAIN_FIELDS,
  CHAINS,
  ClonotypeTable,
  chainColumn,
  GROUP_READ_COUNT_COLUMN,
  MISSING_VALUE_TOKENS,
  parseClonotypeTable,
  REQUIRED_COLUMNS,
  readClonotypeTable,
} from "./formats/clonotype";
// DSV format
export {
  CSVWriter,
  DSVParser,
  DSVWriter,
  type DSVCell,
  type DSVParserOptions,
  type DSVRecord,
  type DSVWriterOptions,
  TSVParser,
} from "./formats/dsv";
// File I/O infrastructure
export { FileReader } from "./io/file-reader";
export { writeString } from "./io/file-writer";
// Logging
export { formatLogLine, makeLoggerLayer } from "./logging";
// Summary operations
export * from "./operations";
// Core types
export type {
  FileMetadata,
  FilePath,
  FileReaderOptions,
  ParserOptions,
  WriteOptions,
} from "./types";
