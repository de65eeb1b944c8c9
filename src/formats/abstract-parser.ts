/**
 * Abstract base parser with shared option merging and error reporting
 *
 * Each format keeps its own parsing logic; the base class only merges
 * defaults with user options and raises parse failures in one place.
 */

import { ParseError } from "../errors";
import type { ParserOptions } from "../types";

/**
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: TOptions;

  constructor(options: TOptions) {
    // Merge in order: format-specific defaults -> user options
    this.options = { ...this.getDefaultOptions(), ...options };
  }

  /**
   * Format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<TOptions>;

  /**
   * Fail the parse at a line
   */
  protected reportError(message: string, lineNumber?: number): never {
    throw new ParseError(message, this.getFormatName(), lineNumber);
  }

  /**
   * Parse records from an in-memory string
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse records from a file on disk
   */
  abstract parseFile(filePath: string): AsyncIterable<T>;

  /**
   * Format name for error messages and logging (e.g. "TSV")
   */
  abstract getFormatName(): string;
}
