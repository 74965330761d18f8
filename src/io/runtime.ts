/**
 * Effect platform layer selection
 *
 * File access goes through Effect's platform `FileSystem`; this module
 * supplies the Node.js implementation of it.
 */

import { NodeContext } from "@effect/platform-node";

/**
 * Layer providing FileSystem, Path and the other platform services
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}
