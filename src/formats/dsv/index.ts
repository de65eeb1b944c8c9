/**
 * @module formats/dsv
 * @description DSV (Delimiter-Separated Values) format support
 *
 * Parsing and writing for CSV, TSV, and other delimiter-separated formats.
 *
 * @example Reading a TSV table
 * ```typescript
 * import { TSVParser } from './formats/dsv';
 *
 * const parser = new TSVParser();
 * for await (const record of parser.parseFile('results.A1.clone.groups_TRAB.tsv')) {
 *   console.log(record.fields['TRA.primary.readCount']);
 * }
 * ```
 *
 * @example Writing a CSV
 * ```typescript
 * import { CSVWriter } from './formats/dsv';
 *
 * const writer = new CSVWriter({ columns: ['Well', 'Abundance'] });
 * const csv = writer.formatRecords([{ Well: 'A1', Abundance: 10 }]);
 * ```
 */

// =============================================================================
// RE-EXPORTS - TYPES
// =============================================================================

export type {
  DelimiterType,
  DSVCell,
  DSVParserOptions,
  DSVParserState,
  DSVRecord,
  DSVWriterOptions,
} from "./types";

export { CSVParseState } from "./types";

// =============================================================================
// RE-EXPORTS - MAIN CLASSES
// =============================================================================

export { DSVParser, TSVParser } from "./parser";

export { CSVWriter, DSVWriter } from "./writer";

// =============================================================================
// RE-EXPORTS - VALIDATION
// =============================================================================

export { DSVParserOptionsSchema, DSVWriterOptionsSchema, validateFieldSize } from "./validation";

// =============================================================================
// RE-EXPORTS - UTILITIES
// =============================================================================

export { dedupeHeaders, handleRaggedRow, removeBOM } from "./utils";

export { countUnescapedQuotes, hasBalancedQuotes, parseCSVRow } from "./state-machine";

export {
  DEFAULT_DELIMITERS,
  DEFAULT_QUOTE,
  MAX_FIELD_SIZE,
  MAX_LINE_LENGTH,
} from "./constants";
