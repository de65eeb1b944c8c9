/**
 * Effect platform layer selection
 *
 * All file system access goes through Effect's FileSystem service; this
 * module decides which implementation backs it.
 */

import { NodeContext } from "@effect/platform-node";

/**
 * Get the Effect platform layer for the current process
 *
 * Returns a Layer that provides FileSystem, Path, and the other platform
 * services the I/O helpers and the summary pipeline require.
 *
 * @returns Effect platform layer backed by Node.js
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}
