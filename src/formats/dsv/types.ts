/**
 * DSV Format Type Definitions
 *
 * CSV, TSV, and other delimiter-separated formats with RFC 4180 quoting.
 */

import type { ParserOptions } from "../../types";

/**
 * Supported delimiter types for DSV formats
 */
export type DelimiterType = "," | "\t" | "|" | ";";

/**
 * A single parsed data row
 */
export interface DSVRecord {
  /** Source line number where the row started (1-based) */
  lineNumber: number;
  /** Cell text keyed by column name, in header order */
  fields: Record<string, string>;
}

/**
 * Value accepted by the writer for a single cell; null and undefined render empty
 */
export type DSVCell = string | number | boolean | null | undefined;

/**
 * Parser state for CSV/TSV parsing state machine
 */
export enum CSVParseState {
  FIELD_START,
  UNQUOTED_FIELD,
  QUOTED_FIELD,
  QUOTE_IN_QUOTED,
}

/**
 * DSV parser options extending base parser options
 *
 * The first non-blank row is always the header. Repeated header names are
 * renamed `name.1`, `name.2`, ... and short rows are padded with empty
 * fields; a row longer than the header fails the parse.
 */
export interface DSVParserOptions extends ParserOptions {
  delimiter?: DelimiterType;

  /** Maximum lines a single quoted field can span (default: 100) */
  maxFieldLines?: number;
}

/**
 * DSV writer options for output formatting
 *
 * Output always starts with a header row and ends every row with `\n`.
 */
export interface DSVWriterOptions {
  delimiter?: DelimiterType;
  columns?: readonly string[];
}

/**
 * Parser state carried across lines while a row is assembled
 */
export interface DSVParserState {
  accumulatedRow: string; // Current row being built (may span lines)
  rowStartLine: number;
  inMultiLineField: boolean;
  linesInCurrentField: number;
  currentLineNumber: number;
  expectedColumns: number;
}
