/**
 * Shared types for file I/O and parsing
 *
 * Branded types mark values that already passed validation, so the I/O
 * layer never has to re-check a path it produced itself.
 */

import { type } from "arktype";

// =============================================================================
// PARSER TYPES
// =============================================================================

/**
 * Base options shared by every parser
 */
export interface ParserOptions {
  /** Maximum physical line length before the parse fails */
  maxLineLength?: number;
}

// =============================================================================
// FILE I/O TYPES
// =============================================================================

/**
 * Branded type for validated file paths
 */
export type FilePath = string & {
  readonly __brand: "FilePath";
};

/**
 * File reading configuration options
 */
export interface FileReaderOptions {
  /** Maximum file size to prevent memory exhaustion (default: 512MB) */
  readonly maxFileSize?: number;
  /** Text encoding for file content (default: 'utf8') */
  readonly encoding?: "utf8";
}

/**
 * File writing configuration options
 */
export interface WriteOptions {
  /** Create missing parent directories before writing (default: false) */
  readonly createParents?: boolean;
}

/**
 * File metadata used for validation before reading
 */
export interface FileMetadata {
  readonly path: FilePath;
  /** File size in bytes */
  readonly size: number;
  readonly type: "File" | "Directory" | "Other";
  readonly lastModified: Date | null;
  /** File extension including the leading dot, or "" */
  readonly extension: string;
}

/**
 * File validation result with detailed feedback
 */
export interface FileValidationResult {
  readonly isValid: boolean;
  readonly metadata?: FileMetadata;
  readonly error?: string;
}

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

/**
 * File path validation schema
 * Rejects empty paths and null bytes, then collapses repeated separators
 */
export const FilePathSchema = type("string>0")
  .narrow((path, ctx) => {
    if (path.includes("\0")) {
      return ctx.reject({
        expected: "a path without null characters",
        actual: JSON.stringify(path),
      });
    }
    return true;
  })
  .pipe((path): FilePath => {
    const normalized = path.length > 1 ? path.replace(/\/+/g, "/").replace(/(.)\/$/, "$1") : path;
    return normalized as FilePath;
  });

/**
 * File reader options validation schema
 */
export const FileReaderOptionsSchema = type({
  "maxFileSize?": "number>0",
  "encoding?": '"utf8"',
});
