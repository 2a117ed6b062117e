/**
 * API manifest - registered classes as the host sees them
 */

import type { ApiManifest, ApiManifestEntry, ClassNode } from '@polybridge/types';

/**
 * Build the manifest from nodes in registration order.
 *
 * `overridable` lists only the methods introduced at each level; inherited
 * methods are reachable through `parent`.
 */
export function buildApiManifest(nodes: readonly ClassNode[]): ApiManifest {
  const manifest: ApiManifest = {};

  for (const node of nodes) {
    const entry: ApiManifestEntry = {};
    if (node.parent !== null) {
      entry.parent = nodes[node.parent].name;
    }
    if (node.methods.size > 0) {
      entry.overridable = [...node.methods.keys()];
    }
    manifest[node.name] = entry;
  }

  return manifest;
}
