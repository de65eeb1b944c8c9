/**
 * @module formats/dsv/parser
 * @description Core DSV (Delimiter-Separated Values) parser implementation
 *
 * Provides CSV/TSV parsing with:
 * - RFC 4180 quoting, including fields that span lines
 * - A header row with duplicate-name disambiguation
 * - Short rows padded to the header width; long rows rejected
 */

import { type } from "arktype";
import { DSVParseError, FileError, SummaryError, ValidationError } from "../../errors";
import { readToString } from "../../io/file-reader";
import { AbstractParser } from "../abstract-parser";
import { DEFAULT_DELIMITERS, MAX_FIELD_SIZE, MAX_LINE_LENGTH } from "./constants";
import { hasBalancedQuotes, parseCSVRow } from "./state-machine";
import type { DSVParserOptions, DSVParserState, DSVRecord } from "./types";
import { dedupeHeaders, handleRaggedRow, removeBOM } from "./utils";
import { DSVParserOptionsSchema, validateFieldSize } from "./validation";

const DEFAULT_MAX_FIELD_LINES = 100;

/**
 * DSVParser - Core CSV/TSV parser implementation
 *
 * @example
 * ```typescript
 * const parser = new DSVParser({ delimiter: "\t" });
 * for await (const record of parser.parseString("a\tb\n1\t2\n")) {
 *   console.log(record.fields.a); // "1"
 * }
 * ```
 */
export class DSVParser extends AbstractParser<DSVRecord, DSVParserOptions> {
  private readonly delimiter: string;
  private headers: string[] | null = null;

  protected getDefaultOptions(): Partial<DSVParserOptions> {
    return {
      maxFieldLines: DEFAULT_MAX_FIELD_LINES,
      maxLineLength: MAX_LINE_LENGTH,
    };
  }

  constructor(options: DSVParserOptions = {}) {
    const validation = DSVParserOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid DSV parser options: ${validation.summary}`);
    }

    super(options);
    this.delimiter = this.options.delimiter ?? DEFAULT_DELIMITERS.tsv;
  }

  getFormatName(): string {
    switch (this.delimiter) {
      case ",":
        return "CSV";
      case "\t":
        return "TSV";
      default:
        return "DSV";
    }
  }

  /**
   * Column names of the most recent parse, after disambiguation
   *
   * Available once the header row has been consumed; null before that.
   */
  getHeaders(): readonly string[] | null {
    return this.headers;
  }

  protected override reportError(message: string, lineNumber?: number): never {
    throw new DSVParseError(message, lineNumber);
  }

  /**
   * Parse a DSV file from a path
   *
   * @throws {FileError} When the file cannot be read
   * @throws {DSVParseError} When the content is malformed
   */
  async *parseFile(path: string): AsyncIterable<DSVRecord> {
    let content: string;
    try {
      content = await readToString(path);
    } catch (error) {
      if (error instanceof SummaryError) throw error;
      throw FileError.fromSystemError("read", path, error);
    }
    yield* this.parseString(content);
  }

  /**
   * Parse DSV data from a string
   *
   * @throws {DSVParseError} When the content is malformed
   */
  async *parseString(data: string): AsyncIterable<DSVRecord> {
    const state = this.createInitialState();
    this.headers = null;

    const lines = removeBOM(data).replace(/\0/g, "").split(/\r?\n/);
    // A final line ending leaves one empty string behind
    if (lines[lines.length - 1] === "") {
      lines.pop();
    }

    yield* this.processLines(lines, state);

    if (state.inMultiLineField) {
      this.reportError("Unclosed quote in field", state.rowStartLine);
    }

    if (this.headers === null) {
      this.reportError("No columns to parse from file");
    }
  }

  private createInitialState(): DSVParserState {
    return {
      accumulatedRow: "",
      rowStartLine: 1,
      inMultiLineField: false,
      linesInCurrentField: 0,
      currentLineNumber: 0,
      expectedColumns: 0,
    };
  }

  private *processLines(lines: string[], state: DSVParserState): Generator<DSVRecord> {
    const maxLineLength = this.options.maxLineLength ?? MAX_LINE_LENGTH;
    const maxFieldLines = this.options.maxFieldLines ?? DEFAULT_MAX_FIELD_LINES;

    for (const line of lines) {
      state.currentLineNumber++;

      if (line.length > maxLineLength) {
        this.reportError(
          `Line length ${line.length} exceeds maximum ${maxLineLength}`,
          state.currentLineNumber
        );
      }

      if (!state.inMultiLineField) {
        // A line of bare delimiters is a row of empty cells, not a blank line
        if (line.trim() === "" && !line.includes(this.delimiter)) {
          continue;
        }
        state.accumulatedRow = line;
        state.rowStartLine = state.currentLineNumber;
        state.linesInCurrentField = 1;
      } else {
        state.linesInCurrentField++;
        if (state.linesInCurrentField > maxFieldLines) {
          this.reportError(
            `Quoted field spans more than ${maxFieldLines} lines`,
            state.rowStartLine
          );
        }
        state.accumulatedRow += `\n${line}`;
      }

      if (!hasBalancedQuotes(state.accumulatedRow)) {
        state.inMultiLineField = true;
        continue;
      }

      const record = this.completeRow(state);
      this.resetRow(state);
      if (record) {
        yield record;
      }
    }
  }

  /**
   * Turn the accumulated row into the header or a record
   */
  private completeRow(state: DSVParserState): DSVRecord | null {
    const fields = parseCSVRow(state.accumulatedRow, this.delimiter);
    for (const field of fields) {
      validateFieldSize(field, MAX_FIELD_SIZE, state.rowStartLine);
    }

    if (this.headers === null) {
      this.headers = dedupeHeaders(fields);
      state.expectedColumns = this.headers.length;
      return null;
    }

    const shaped = handleRaggedRow(fields, state.expectedColumns, state.rowStartLine);
    return this.createRecord(shaped, state.rowStartLine);
  }

  private resetRow(state: DSVParserState): void {
    state.accumulatedRow = "";
    state.inMultiLineField = false;
    state.linesInCurrentField = 0;
  }

  private createRecord(fields: string[], lineNumber: number): DSVRecord {
    const record: DSVRecord = { lineNumber, fields: {} };
    (this.headers ?? []).forEach((column, i) => {
      record.fields[column] = fields[i] ?? "";
    });
    return record;
  }
}

/**
 * TSVParser - Convenience class for TSV files
 */
export class TSVParser extends DSVParser {
  constructor(options: Omit<DSVParserOptions, "delimiter"> = {}) {
    super({ ...options, delimiter: "\t" });
  }
}
