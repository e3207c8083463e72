/**
 * Effect platform layer selection
 *
 * Returns the Layer that provides FileSystem, Path, and the other platform
 * services to every I/O program in this package.
 */

import { NodeContext } from "@effect/platform-node";

/**
 * Get the Effect platform layer for Node.js
 *
 * @returns Effect platform layer providing the FileSystem service
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}
