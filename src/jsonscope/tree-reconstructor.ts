/**
 * Tree reconstructor - display (sub)tree back to a JsonValue
 *
 * Works from what the tree shows rather than from node kinds:
 * - a scalar leaf under an object key becomes `{key: value}`, other leaves
 *   stay bare
 * - a node is an array when every child label starts with "[", otherwise
 *   an object keyed by the label text before the first ":"
 * - an object child that comes back as `{sameKey: v}` is unwrapped to `v`
 *
 * Known limitation: an object whose keys all start with "[" reads as an
 * array, and a key containing ":" is cut at the colon.
 */

import { countOperation, debugLog, recordReconstructionFallback } from './debug.js';
import { serialize, type SerializeOptions } from './serializer.js';
import { displayText } from './tree-projector.js';
import { jsonArray, jsonObject } from './values.js';
import type { JsonEntry, JsonValue, TreeNode } from './types.js';

export function reconstruct(node: TreeNode): JsonValue {
  countOperation('reconstructions');
  return rebuild(node);
}

function rebuild(node: TreeNode): JsonValue {
  if (node.children.length === 0) {
    return rebuildLeaf(node);
  }

  const isArray = node.children.every((child) => labelOf(child).startsWith('['));
  if (isArray) {
    return jsonArray(node.children.map(rebuild));
  }

  const entries: JsonEntry[] = node.children.map((child) => {
    const label = labelOf(child);
    const colon = label.indexOf(':');
    const key = colon === -1 ? label : label.slice(0, colon);
    return { key, value: unwrap(rebuild(child), key) };
  });
  return jsonObject(entries);
}

function rebuildLeaf(node: TreeNode): JsonValue {
  switch (node.kind) {
    case 'object':
    case 'array':
      // Empty container
      return node.payload;
    case 'scalar': {
      const { key, value } = node.payload;
      if (typeof key === 'string') {
        return jsonObject([{ key, value }]);
      }
      return value;
    }
  }
}

function unwrap(value: JsonValue, key: string): JsonValue {
  if (value.kind === 'object' && value.entries.length === 1) {
    const [entry] = value.entries;
    if (entry.key === key) return entry.value;
  }
  return value;
}

function labelOf(node: TreeNode): string {
  return node.label ?? '';
}

export interface SelectionText {
  text: string;
  /** True when reconstruction failed and the row text is shown instead */
  fallback: boolean;
}

/**
 * Pretty JSON for a selected node. Reconstruction failures never escape:
 * the node's row text is returned verbatim instead.
 */
export function renderSelection(
  node: TreeNode,
  options: SerializeOptions = {}
): SelectionText {
  try {
    return { text: serialize(reconstruct(node), 'pretty', options), fallback: false };
  } catch (error) {
    recordReconstructionFallback(node.id, error);
    debugLog('reconstruct', `falling back to row text for ${node.id}`);
    return { text: displayText(node), fallback: true };
  }
}
