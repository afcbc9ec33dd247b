/**
 * Effect platform layer selection
 *
 * File I/O goes through the @effect/platform FileSystem service; this
 * module decides which implementation backs it.
 */

import { NodeContext } from "@effect/platform-node";

/**
 * Get the Effect platform layer for the current runtime
 *
 * Returns a Layer that provides FileSystem, Path, and other platform services.
 *
 * @returns Effect platform layer for Node.js
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}
