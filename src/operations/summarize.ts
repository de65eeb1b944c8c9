/**
 * End-to-end summary of a MiXCR output directory
 *
 * Discovery, per-file extraction and CSV output run as one Effect program.
 * Progress goes through Effect's logger; `runSummary` installs the console
 * and log file sinks.
 */

import { Effect } from "effect";
import { type RunOptions, resolveRunOptions } from "../config";
import {
  DiscoveryError,
  EmptySummaryError,
  FileError,
  getErrorSuggestion,
  type SummaryError,
} from "../errors";
import { makeLoggerLayer } from "../logging";
import { aggregateRecords, writeSummary } from "./aggregate";
import { discoverCloneGroupFiles, sampleIdFromPath } from "./discover";
import { extractTopClone } from "./extract";
import type { ExtractionOutcome, SummaryReport, TableShape } from "./types";

export type SummaryFailure = DiscoveryError | EmptySummaryError | FileError;

export type SummaryRunResult =
  | { readonly exitCode: 0; readonly report: SummaryReport }
  | { readonly exitCode: 1; readonly error: SummaryError };

const toFileError =
  (operation: FileError["operation"], path: string) =>
  (error: unknown): FileError =>
    error instanceof FileError ? error : FileError.fromSystemError(operation, path, error);

const logShape = (shape: TableShape) =>
  Effect.logInfo(`  Rows: ${shape.rowCount}, Columns: [${shape.columns.join(", ")}]`);

/**
 * Extract one file's top clone, logging what happened to it
 */
export const processFile = (filePath: string): Effect.Effect<ExtractionOutcome> =>
  Effect.gen(function* () {
    const sampleId = sampleIdFromPath(filePath);
    yield* Effect.logInfo(`Processing ${filePath} (Sample ID: ${sampleId})`);

    const outcome = yield* Effect.promise(() => extractTopClone(filePath, sampleId));

    if (outcome.status === "ok") {
      yield* logShape(outcome.shape);
      yield* Effect.logInfo(`Added data for ${sampleId}`);
    } else if (outcome.reason === "parse-error") {
      yield* Effect.logError(`Error processing ${filePath}: ${outcome.error.message}`);
    } else {
      yield* logShape(outcome.shape);
      yield* Effect.logWarning(outcome.error.message);
    }

    return outcome;
  });

/**
 * Summarize every clone group table in a directory into `mixcr_summary.csv`
 *
 * Files are processed one at a time in discovery order; a bad file is
 * logged and skipped, never fatal.
 */
export const summarizeDirectory = (
  directory: string
): Effect.Effect<SummaryReport, SummaryFailure> =>
  Effect.gen(function* () {
    const files = yield* Effect.tryPromise({
      try: () => discoverCloneGroupFiles(directory),
      catch: (error) =>
        error instanceof DiscoveryError ? error : toFileError("list", directory)(error),
    });
    yield* Effect.logInfo(`Found ${files.length} clone.groups_TRAB.tsv files`);

    const outcomes: ExtractionOutcome[] = [];
    for (const filePath of files) {
      outcomes.push(yield* processFile(filePath));
    }

    const { records, skipped } = aggregateRecords(outcomes);
    if (records.length === 0) {
      return yield* Effect.fail(new EmptySummaryError(files.length));
    }

    const outputPath = yield* Effect.tryPromise({
      try: () => writeSummary(directory, records, files.length),
      catch: toFileError("write", directory),
    });
    yield* Effect.logInfo(`Saved summary to ${outputPath}`);

    return {
      directory,
      outputPath,
      filesFound: files.length,
      records,
      skipped,
    };
  });

/**
 * Run a summary with console and log file output
 *
 * Fatal conditions are logged and reported as exit code 1 rather than
 * rejected.
 *
 * @throws {ValidationError} When the options are malformed
 * @throws {PlatformError} When the log file cannot be opened
 */
export async function runSummary(input: RunOptions): Promise<SummaryRunResult> {
  const options = resolveRunOptions(input);

  const program = summarizeDirectory(options.outputDir).pipe(
    Effect.matchEffect({
      onFailure: (error) =>
        Effect.gen(function* () {
          yield* Effect.logError(error.message);
          const suggestion = getErrorSuggestion(error);
          if (suggestion !== undefined) {
            yield* Effect.logInfo(`Hint: ${suggestion}`);
          }
          const result: SummaryRunResult = { exitCode: 1, error };
          return result;
        }),
      onSuccess: (report) => {
        const result: SummaryRunResult = { exitCode: 0, report };
        return Effect.succeed(result);
      },
    }),
    Effect.provide(makeLoggerLayer(options.logFile))
  );

  return Effect.runPromise(program);
}
