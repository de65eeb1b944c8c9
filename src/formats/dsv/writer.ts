/**
 * @module formats/dsv/writer
 * @description DSV (Delimiter-Separated Values) writer implementation
 *
 * Fields are quoted only when they contain the delimiter, the quote
 * character, or a line break (RFC 4180 minimal quoting). Null and
 * undefined cells render as empty fields.
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import { DEFAULT_QUOTE } from "./constants";
import type { DSVCell, DSVWriterOptions } from "./types";
import { DSVWriterOptionsSchema } from "./validation";

/**
 * DSVWriter - Core CSV/TSV writer implementation
 *
 * @example
 * ```typescript
 * const writer = new DSVWriter({ delimiter: ",", columns: ["Well", "Abundance"] });
 * const csv = writer.formatRecords([{ Well: "A1", Abundance: 10 }]);
 * // "Well,Abundance\nA1,10\n"
 * ```
 */
export class DSVWriter {
  private readonly delimiter: string;
  private readonly columns: readonly string[];

  constructor(options: DSVWriterOptions = {}) {
    const validation = DSVWriterOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid DSV writer options: ${validation.summary}`);
    }

    this.delimiter = options.delimiter ?? "\t";
    this.columns = options.columns ?? [];
  }

  /**
   * Format a single field with proper escaping
   */
  formatField(value: DSVCell): string {
    if (value == null) return "";
    // NaN and Infinity have no CSV spelling; they render as missing
    if (typeof value === "number" && !Number.isFinite(value)) return "";

    const field = String(value);
    const needsQuoting =
      field.includes(this.delimiter) ||
      field.includes(DEFAULT_QUOTE) ||
      field.includes("\n") ||
      field.includes("\r");

    if (needsQuoting) {
      return DEFAULT_QUOTE + field.split(DEFAULT_QUOTE).join(DEFAULT_QUOTE + DEFAULT_QUOTE) + DEFAULT_QUOTE;
    }

    return field;
  }

  /**
   * Format a row of fields
   */
  formatRow(fields: readonly DSVCell[]): string {
    return fields.map((field) => this.formatField(field)).join(this.delimiter);
  }

  /**
   * Format a keyed record using the configured column order
   *
   * Columns absent from the record render as empty fields.
   */
  formatRecord(record: Readonly<Record<string, DSVCell>>): string {
    return this.formatRow(this.columns.map((column) => record[column]));
  }

  /**
   * Format a header row followed by one line per record, each ending in `\n`
   */
  formatRecords(records: readonly Readonly<Record<string, DSVCell>>[]): string {
    if (this.columns.length === 0) {
      throw new ValidationError("DSV writer needs at least one column to format records");
    }

    const lines = [this.formatRow(this.columns)];
    for (const record of records) {
      lines.push(this.formatRecord(record));
    }
    return `${lines.join("\n")}\n`;
  }
}

/**
 * CSVWriter - Convenience class for CSV files
 */
export class CSVWriter extends DSVWriter {
  constructor(options: Omit<DSVWriterOptions, "delimiter"> = {}) {
    super({ ...options, delimiter: "," });
  }
}
