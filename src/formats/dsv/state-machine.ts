/**
 * CSV State Machine Module
 *
 * RFC 4180 row splitting: quoted fields, doubled quotes, and fields that
 * span several physical lines.
 */

import { DSVParseError } from "../../errors";
import { DEFAULT_QUOTE } from "./constants";
import { CSVParseState } from "./types";

/**
 * Count quotes in a line, treating a doubled quote as an escaped one
 */
export function countUnescapedQuotes(line: string, quote: string = DEFAULT_QUOTE): number {
  let count = 0;
  for (let i = 0; i < line.length; i++) {
    if (line[i] === quote) {
      if (line[i + 1] === quote) {
        i++; // Skip the escaped quote
      } else {
        count++;
      }
    }
  }
  return count;
}

/**
 * Check if quotes are balanced, i.e. no quoted field is left open
 */
export function hasBalancedQuotes(line: string, quote: string = DEFAULT_QUOTE): boolean {
  return countUnescapedQuotes(line, quote) % 2 === 0;
}

/**
 * Split one logical row into fields
 *
 * @param line - Row text, possibly containing newlines inside quoted fields
 * @returns Array of parsed fields; an empty line yields no fields
 * @throws {DSVParseError} When a quoted field is never closed
 */
export function parseCSVRow(
  line: string,
  delimiter: string = ",",
  quote: string = DEFAULT_QUOTE
): string[] {
  const fields: string[] = [];
  let currentField = "";
  let state = CSVParseState.FIELD_START;

  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);
    const nextChar = line.charAt(i + 1);

    switch (state) {
      case CSVParseState.FIELD_START:
        if (char === quote) {
          state = CSVParseState.QUOTED_FIELD;
        } else if (char === delimiter) {
          fields.push("");
        } else {
          currentField = char;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        break;

      case CSVParseState.UNQUOTED_FIELD:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = CSVParseState.FIELD_START;
        } else {
          currentField += char;
        }
        break;

      case CSVParseState.QUOTED_FIELD:
        if (char === quote) {
          if (nextChar === quote) {
            currentField += quote;
            i++;
          } else {
            state = CSVParseState.QUOTE_IN_QUOTED;
          }
        } else {
          currentField += char;
        }
        break;

      case CSVParseState.QUOTE_IN_QUOTED:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = CSVParseState.FIELD_START;
        } else {
          // Text after a closing quote is kept as part of the field
          currentField += char;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        break;
    }
  }

  if (state === CSVParseState.QUOTED_FIELD) {
    throw new DSVParseError("Unclosed quote in field", undefined, fields.length + 1);
  } else if (state === CSVParseState.UNQUOTED_FIELD || state === CSVParseState.QUOTE_IN_QUOTED) {
    fields.push(currentField);
  } else if (line.length > 0 && line.endsWith(delimiter)) {
    // Trailing delimiter means empty final field
    fields.push("");
  }

  return fields;
}
