/**
 * DSV Format Constants
 */

/**
 * Default delimiter for different formats
 */
export const DEFAULT_DELIMITERS = {
  csv: ",",
  tsv: "\t",
  psv: "|",
  ssv: ";",
} as const;

/**
 * Default quote character (RFC 4180 compliant)
 */
export const DEFAULT_QUOTE = '"';

/**
 * Maximum field size for memory safety (100MB)
 */
export const MAX_FIELD_SIZE = 100_000_000;

/**
 * Default maximum physical line length (1MB)
 */
export const MAX_LINE_LENGTH = 1_000_000;
