/**
 * Tree projector - JsonValue to display tree
 *
 * One node per value, children in key/index order. Object children are
 * labelled with their key, array children with "[i]", the root has no label.
 * The caller runs the expansion pass first when nested JSON strings should
 * appear as subtrees.
 */

import { scalarText } from './values.js';
import type { NodeKey, JsonValue, TreeNode } from './types.js';

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export const ROOT_ID = '$';

export function childId(parentId: string, key: NodeKey): string {
  if (typeof key === 'number') {
    return `${parentId}[${key}]`;
  }
  if (IDENTIFIER.test(key)) {
    return `${parentId}.${key}`;
  }
  return `${parentId}[${JSON.stringify(key)}]`;
}

export function indexLabel(index: number): string {
  return `[${index}]`;
}

export function project(value: JsonValue): TreeNode {
  return projectNode(value, ROOT_ID, [], undefined, undefined);
}

function projectNode(
  value: JsonValue,
  id: string,
  path: readonly NodeKey[],
  key: NodeKey | undefined,
  label: string | undefined
): TreeNode {
  const base = label === undefined ? { id, path } : { id, path, label };

  switch (value.kind) {
    case 'object':
      return {
        ...base,
        kind: 'object',
        expanded: true,
        payload: value,
        children: value.entries.map((entry) =>
          projectNode(
            entry.value,
            childId(id, entry.key),
            [...path, entry.key],
            entry.key,
            entry.key
          )
        ),
      };
    case 'array':
      return {
        ...base,
        kind: 'array',
        expanded: true,
        payload: value,
        children: value.items.map((item, index) =>
          projectNode(
            item,
            childId(id, index),
            [...path, index],
            index,
            indexLabel(index)
          )
        ),
      };
    case 'null':
    case 'boolean':
    case 'number':
    case 'string':
      return {
        ...base,
        kind: 'scalar',
        expanded: false,
        payload: key === undefined ? { value } : { key, value },
        children: [],
      };
  }
}

/**
 * Row text of a node: containers show their label, scalars `label: value`.
 * The unlabelled root container shows a `{n}` / `[n]` summary.
 */
export function displayText(node: TreeNode): string {
  switch (node.kind) {
    case 'object':
      return node.label ?? `{${node.children.length}}`;
    case 'array':
      return node.label ?? `[${node.children.length}]`;
    case 'scalar': {
      const text = scalarText(node.payload.value);
      return node.label === undefined ? text : `${node.label}: ${text}`;
    }
  }
}

export function findNode(root: TreeNode, id: string): TreeNode | undefined {
  if (root.id === id) return root;
  // Ids are path prefixes of their descendants, which prunes the walk
  for (const child of root.children) {
    if (id.startsWith(child.id)) {
      const found = findNode(child, id);
      if (found) return found;
    }
  }
  return undefined;
}

export function countNodes(root: TreeNode): number {
  let count = 1;
  for (const child of root.children) {
    count += countNodes(child);
  }
  return count;
}

export interface VisibleRow {
  node: TreeNode;
  depth: number;
  /** Connector drawing for this row, e.g. "│  ├─" */
  prefix: string;
  expanded: boolean;
}

/**
 * Flatten the tree into the rows currently on screen. A container is open
 * unless its id is in `collapsed`.
 */
export function visibleRows(
  root: TreeNode,
  collapsed: ReadonlySet<string> = new Set()
): VisibleRow[] {
  const rows: VisibleRow[] = [];

  const visit = (node: TreeNode, depth: number, prefix: string, childPrefix: string) => {
    const expanded = node.kind !== 'scalar' && !collapsed.has(node.id);
    rows.push({ node, depth, prefix, expanded });
    if (!expanded) return;

    node.children.forEach((child, index) => {
      const isLast = index === node.children.length - 1;
      const connector = isLast ? '└─' : '├─';
      visit(
        child,
        depth + 1,
        childPrefix + connector,
        childPrefix + (isLast ? '   ' : '│  ')
      );
    });
  };

  visit(root, 0, '', '');
  return rows;
}

/** Ids of every container, in depth-first order */
export function containerIds(root: TreeNode): string[] {
  const ids: string[] = [];
  const visit = (node: TreeNode) => {
    if (node.kind === 'scalar') return;
    ids.push(node.id);
    node.children.forEach(visit);
  };
  visit(root);
  return ids;
}
