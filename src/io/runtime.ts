/**
 * Effect platform layer selection
 *
 * Every file operation runs an Effect program against the platform's
 * FileSystem service; this module is the single place that decides which
 * implementation backs it.
 */

import { NodeContext } from "@effect/platform-node";

/**
 * Get the Effect platform layer providing FileSystem and Path
 *
 * @returns Node.js platform layer
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}
