/**
 * File writing operations using Effect Platform
 *
 * All Effect plumbing is hidden behind Promise-based APIs.
 *
 * @module file-writer
 */

import { FileSystem, Path } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";
import type { WriteOptions } from "../types";
import { validatePath } from "./file-reader";
import { getPlatform } from "./runtime";

/**
 * Write string to file (overwrites if exists, creates if not)
 *
 * @param path - File path to write to
 * @param content - String content to write, encoded as UTF-8
 * @param options - Write options
 * @throws {FileError} When write operation fails or path is invalid
 *
 * @example
 * ```typescript
 * await writeString("plate-1/mixcr_summary.csv", csv);
 * ```
 */
export async function writeString(
  path: string,
  content: string,
  options: WriteOptions = {}
): Promise<void> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    if (options.createParents === true) {
      const pathService = yield* Path.Path;
      const parentDir = pathService.dirname(validatedPath);
      if (!(yield* fs.exists(parentDir))) {
        yield* fs.makeDirectory(parentDir, { recursive: true });
      }
    }

    yield* fs.writeFileString(validatedPath, content);
  });

  try {
    await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("write", validatedPath, error);
  }
}
