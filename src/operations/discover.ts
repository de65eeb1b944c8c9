/**
 * Discovery of MiXCR clone group exports in a directory
 */

import { basename, join } from "node:path";
import { CLONE_GROUP_FILE_PREFIX, CLONE_GROUP_FILE_SUFFIX } from "../config";
import { DiscoveryError } from "../errors";
import { exists, isDirectory, listDirectory } from "../io/file-reader";

/**
 * Whether a file name follows `results.<sample>.clone.groups_TRAB.tsv`
 */
export function isCloneGroupFileName(name: string): boolean {
  return (
    name.length >= CLONE_GROUP_FILE_PREFIX.length + CLONE_GROUP_FILE_SUFFIX.length &&
    name.startsWith(CLONE_GROUP_FILE_PREFIX) &&
    name.endsWith(CLONE_GROUP_FILE_SUFFIX)
  );
}

/**
 * Sample identifier (the `Well`) encoded in a clone group file name
 *
 * Strips the fixed prefix and suffix; anything in between, dots included,
 * is the identifier.
 *
 * @example
 * ```typescript
 * sampleIdFromPath("out/results.A1.clone.groups_TRAB.tsv"); // "A1"
 * ```
 */
export function sampleIdFromPath(path: string): string {
  let name = basename(path);
  if (name.startsWith(CLONE_GROUP_FILE_PREFIX)) {
    name = name.slice(CLONE_GROUP_FILE_PREFIX.length);
  }
  if (name.endsWith(CLONE_GROUP_FILE_SUFFIX)) {
    name = name.slice(0, name.length - CLONE_GROUP_FILE_SUFFIX.length);
  }
  return name;
}

/**
 * Find the clone group tables in a directory (not recursive)
 *
 * Paths come back in directory listing order.
 *
 * @throws {DiscoveryError} When the directory is missing or holds no matching files
 * @throws {FileError} When the directory cannot be listed
 */
export async function discoverCloneGroupFiles(directory: string): Promise<string[]> {
  if (directory === "" || !(await isDirectory(directory))) {
    throw DiscoveryError.missingDirectory(directory);
  }

  const matches: string[] = [];
  for (const name of await listDirectory(directory)) {
    if (!isCloneGroupFileName(name)) continue;

    const filePath = join(directory, name);
    if (await exists(filePath)) {
      matches.push(filePath);
    }
  }

  if (matches.length === 0) {
    throw DiscoveryError.noMatchingFiles(directory);
  }

  return matches;
}
