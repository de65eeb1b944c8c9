/**
 * @module formats/dsv/validation
 * @description ArkType schemas for parser and writer options, and field size checks
 */

import { type } from "arktype";
import { DSVParseError } from "../../errors";
import { MAX_FIELD_SIZE } from "./constants";

/**
 * Validate that a field doesn't exceed the maximum allowed size
 * @throws {DSVParseError} if field exceeds size limit
 */
export function validateFieldSize(
  field: string,
  maxSize: number = MAX_FIELD_SIZE,
  lineNumber?: number
): void {
  // UTF-8 never takes more than 3 bytes per UTF-16 code unit
  if (field.length * 3 <= maxSize) return;

  const sizeInBytes = new TextEncoder().encode(field).length;
  if (sizeInBytes > maxSize) {
    throw new DSVParseError(
      `Field size (${sizeInBytes} bytes) exceeds maximum allowed (${maxSize} bytes)`,
      lineNumber
    );
  }
}

const DelimiterSchema = type.enumerated(",", "\t", "|", ";");

/**
 * ArkType validation schema for DSV parser options
 */
export const DSVParserOptionsSchema = type({
  "delimiter?": DelimiterSchema,
  "maxFieldLines?": "number.integer>0",
  "maxLineLength?": "number.integer>0",
});

/**
 * ArkType validation schema for DSV writer options
 */
export const DSVWriterOptionsSchema = type({
  "delimiter?": DelimiterSchema,
  "columns?": "string[]",
});
