/**
 * In-memory clonotype group table with typed missing values
 *
 * Cells are either text or null. Null marks a missing value and is kept
 * distinct from "" and 0 all the way to the output.
 */

import type { DSVRecord } from "../dsv";
import { MISSING_VALUE_TOKENS } from "./constants";

export type Cell = string | null;

const NUMERIC_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Convert raw cell text to a Cell, mapping missing-value tokens to null
 */
export function toCell(raw: string | undefined): Cell {
  if (raw === undefined || MISSING_VALUE_TOKENS.has(raw)) return null;
  return raw;
}

/**
 * Read a cell as a number; missing or non-numeric cells give null
 */
export function toNumber(cell: Cell): number | null {
  if (cell === null) return null;
  const trimmed = cell.trim();
  if (!NUMERIC_PATTERN.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

export class ClonotypeTable {
  private readonly columnIndex: ReadonlyMap<string, number>;

  constructor(
    readonly columns: readonly string[],
    private readonly rows: readonly (readonly Cell[])[]
  ) {
    this.columnIndex = new Map(columns.map((column, i) => [column, i]));
  }

  /**
   * Build a table from parsed DSV records sharing one header
   */
  static fromRecords(columns: readonly string[], records: readonly DSVRecord[]): ClonotypeTable {
    const rows = records.map((record) => columns.map((column) => toCell(record.fields[column])));
    return new ClonotypeTable(columns, rows);
  }

  get rowCount(): number {
    return this.rows.length;
  }

  isEmpty(): boolean {
    return this.rows.length === 0;
  }

  hasColumn(column: string): boolean {
    return this.columnIndex.has(column);
  }

  /**
   * Columns from `required` the table lacks, in the order given
   */
  missingColumns(required: readonly string[]): string[] {
    return required.filter((column) => !this.hasColumn(column));
  }

  /**
   * Cell at a row and column; null when missing or when the column is absent
   */
  cell(rowIndex: number, column: string): Cell {
    const columnIndex = this.columnIndex.get(column);
    if (columnIndex === undefined) return null;
    return this.rows[rowIndex]?.[columnIndex] ?? null;
  }

  numericCell(rowIndex: number, column: string): number | null {
    return toNumber(this.cell(rowIndex, column));
  }

  /**
   * Every cell of a column read as a number
   */
  numericColumn(column: string): (number | null)[] {
    return this.rows.map((_, i) => this.numericCell(i, column));
  }

  /**
   * Sum of the numeric cells of a column, skipping missing ones
   *
   * @returns null when the column does not exist; 0 when every cell is missing
   */
  sum(column: string): number | null {
    if (!this.hasColumn(column)) return null;
    return this.numericColumn(column).reduce<number>((total, value) => total + (value ?? 0), 0);
  }
}
