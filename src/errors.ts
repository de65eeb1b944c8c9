/**
 * Error handling for clonotype table summarization
 *
 * Every failure the pipeline can report derives from SummaryError so the
 * CLI can log a single, consistent line for it.
 */

/**
 * Base error class for all summary-related errors
 */
export class SummaryError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "SummaryError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed options or values
 */
export class ValidationError extends SummaryError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends SummaryError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * DSV-specific parsing error with column context
 */
export class DSVParseError extends ParseError {
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
    public readonly field?: string
  ) {
    const context = [
      line !== undefined && `line ${line}`,
      column !== undefined && `column ${column}`,
      field !== undefined && `field "${field}"`,
    ]
      .filter(Boolean)
      .join(", ");

    super(context ? `${message} (${context})` : message, "DSV", line);
    this.name = "DSVParseError";
  }
}

/**
 * File I/O errors with the path and operation that failed
 */
export class FileError extends SummaryError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "list",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed for ${filePath}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the path is correct and exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enotdir") || msg.includes("not a directory")) {
      return "Path points to a file, not a directory";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }

    return msg;
  }
}

/**
 * Setup failures raised before any table is read
 */
export class DiscoveryError extends SummaryError {
  constructor(
    message: string,
    public readonly directory: string,
    public readonly reason: "missing-directory" | "no-matching-files"
  ) {
    super(message, "DISCOVERY_ERROR", undefined, `directory: ${directory}`);
    this.name = "DiscoveryError";
  }

  static missingDirectory(directory: string): DiscoveryError {
    return new DiscoveryError(
      `Output directory does not exist: ${directory}`,
      directory,
      "missing-directory"
    );
  }

  static noMatchingFiles(directory: string): DiscoveryError {
    return new DiscoveryError(
      `No clone.groups_TRAB.tsv files found in ${directory}`,
      directory,
      "no-matching-files"
    );
  }
}

/**
 * A clonotype table that parsed but cannot yield a top clone
 */
export class ClonotypeTableError extends SummaryError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly reason: "empty-table" | "missing-columns",
    public readonly missingColumns: readonly string[] = []
  ) {
    super(message, "CLONOTYPE_TABLE_ERROR", undefined, filePath);
    this.name = "ClonotypeTableError";
  }

  static empty(filePath: string): ClonotypeTableError {
    return new ClonotypeTableError(`No clonotypes found in ${filePath}`, filePath, "empty-table");
  }

  static missingColumns(
    filePath: string,
    required: readonly string[],
    missing: readonly string[]
  ): ClonotypeTableError {
    return new ClonotypeTableError(
      `Missing required columns in ${filePath}: ${required.join(", ")} (absent: ${missing.join(", ")})`,
      filePath,
      "missing-columns",
      missing
    );
  }
}

/**
 * Every discovered file was skipped, so there is nothing to write
 */
export class EmptySummaryError extends SummaryError {
  constructor(public readonly filesSeen: number) {
    super(
      "No data processed. Check if files are empty or lack required columns.",
      "EMPTY_SUMMARY_ERROR",
      undefined,
      `files seen: ${filesSeen}`
    );
    this.name = "EmptySummaryError";
  }
}

/**
 * Error recovery suggestions for common issues
 */
export const ERROR_SUGGESTIONS = {
  MISSING_DIRECTORY: "Pass the MiXCR output directory with --output-dir",
  NO_MATCHING_FILES: "Files must be named results.<sample>.clone.groups_TRAB.tsv",
  MISSING_COLUMNS: "Export clone groups with TRA.primary.readCount and TRB.primary.readCount",
  EMPTY_SUMMARY: "Inspect the log for the reason each table was skipped",
  MALFORMED_LINE: "Check for unbalanced quotes, stray delimiters, or encoding issues",
} as const;

/**
 * Get helpful suggestion for common error patterns
 */
export function getErrorSuggestion(error: SummaryError): string | undefined {
  if (error instanceof DiscoveryError) {
    return error.reason === "missing-directory"
      ? ERROR_SUGGESTIONS.MISSING_DIRECTORY
      : ERROR_SUGGESTIONS.NO_MATCHING_FILES;
  }
  if (error instanceof ClonotypeTableError && error.reason === "missing-columns") {
    return ERROR_SUGGESTIONS.MISSING_COLUMNS;
  }
  if (error instanceof EmptySummaryError) {
    return ERROR_SUGGESTIONS.EMPTY_SUMMARY;
  }
  if (error instanceof ParseError) {
    return ERROR_SUGGESTIONS.MALFORMED_LINE;
  }

  return undefined;
}
