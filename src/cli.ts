#!/usr/bin/env tsx
/**
 * mixcr-summary command line
 *
 * Usage: mixcr-summary --output-dir <dir>
 */

import { Command } from "commander";
import { VERSION } from "./config";
import { runSummary } from "./operations";

interface CliOptions {
  outputDir: string;
}

function createProgram(): Command {
  return new Command()
    .name("mixcr-summary")
    .description(
      "Summarize the dominant paired TRA/TRB clonotype of each MiXCR clone group table into mixcr_summary.csv"
    )
    .version(VERSION)
    .requiredOption(
      "--output-dir <dir>",
      "MiXCR output directory holding results.<sample>.clone.groups_TRAB.tsv files"
    )
    .action(async (options: CliOptions) => {
      const result = await runSummary({ outputDir: options.outputDir });
      process.exitCode = result.exitCode;
    });
}

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error("Error:", error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
