/**
 * DSV Utility Functions Module
 *
 * Text normalization and row shaping helpers shared by the parser.
 */

import { DSVParseError } from "../../errors";

/**
 * Remove a leading UTF-8 Byte Order Mark
 */
export function removeBOM(text: string): string {
  if (text.charCodeAt(0) === 0xfeff) {
    return text.slice(1);
  }
  return text;
}

/**
 * Fit a row to the header width
 *
 * Short rows are padded with empty fields; a row with more fields than
 * there are columns is an error.
 *
 * @throws {DSVParseError} When the row has more fields than expected
 */
export function handleRaggedRow(
  fields: string[],
  expectedColumns: number,
  lineNumber?: number
): string[] {
  if (fields.length > expectedColumns) {
    throw new DSVParseError(
      `Expected ${expectedColumns} fields, saw ${fields.length}`,
      lineNumber
    );
  }
  if (fields.length === expectedColumns) {
    return fields;
  }

  const padded = [...fields];
  while (padded.length < expectedColumns) {
    padded.push("");
  }
  return padded;
}

/**
 * Make repeated header names unique
 *
 * The second occurrence of `name` becomes `name.1`, the third `name.2`,
 * skipping any suffix that is already taken by another column.
 *
 * @example
 * ```typescript
 * dedupeHeaders(["V", "V", "J"]); // ["V", "V.1", "J"]
 * ```
 */
export function dedupeHeaders(headers: readonly string[]): string[] {
  const seen = new Set<string>();
  const counts = new Map<string, number>();
  const result: string[] = [];

  for (const header of headers) {
    let name = header;
    if (seen.has(name)) {
      let count = counts.get(header) ?? 0;
      do {
        count++;
        name = `${header}.${count}`;
      } while (seen.has(name));
      counts.set(header, count);
    }
    seen.add(name);
    result.push(name);
  }

  return result;
}
