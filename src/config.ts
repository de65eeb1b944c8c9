/**
 * Run configuration
 *
 * The CLI takes a single directory; everything else is a fixed name.
 */

import { type } from "arktype";
import { ValidationError } from "./errors";

export const VERSION = "0.1.0";

/** Clone group exports are named `results.<sample>.clone.groups_TRAB.tsv` */
export const CLONE_GROUP_FILE_PREFIX = "results.";
export const CLONE_GROUP_FILE_SUFFIX = ".clone.groups_TRAB.tsv";

/** Written into the scanned directory */
export const SUMMARY_FILE_NAME = "mixcr_summary.csv";

/** Appended to in the current working directory */
export const LOG_FILE_NAME = "convert_mixcr_to_csv.log";

export const RunOptionsSchema = type({
  outputDir: "string",
  "logFile?": "string>0",
});

export type RunOptions = typeof RunOptionsSchema.infer;

export interface ResolvedRunOptions {
  /** Directory scanned for clone group tables and receiving the summary */
  readonly outputDir: string;
  readonly logFile: string;
}

/**
 * Validate run options and fill in defaults
 *
 * @throws {ValidationError} When an option is missing or malformed
 */
export function resolveRunOptions(input: unknown): ResolvedRunOptions {
  const options = RunOptionsSchema(input);
  if (options instanceof type.errors) {
    throw new ValidationError(`Invalid run options: ${options.summary}`);
  }

  return {
    outputDir: options.outputDir,
    logFile: options.logFile ?? LOG_FILE_NAME,
  };
}
