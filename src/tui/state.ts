/**
 * TUI input handling and per-window panel state
 *
 * Pure functions so key handling can be tested without a terminal.
 */

import { containerIds, visibleRows, type VisibleRow } from '../jsonscope/tree-projector.js';
import type { TreeNode } from '../jsonscope/types.js';

export type Mode = 'browse' | 'search' | 'edit' | 'about';

/** The subset of ink's Key the app reads */
export interface KeyState {
  upArrow: boolean;
  downArrow: boolean;
  leftArrow: boolean;
  rightArrow: boolean;
  return: boolean;
  escape: boolean;
  tab: boolean;
  backspace: boolean;
  delete: boolean;
  ctrl: boolean;
}

export type Command =
  | { type: 'move'; delta: number }
  | { type: 'toggle' }
  | { type: 'collapse' }
  | { type: 'expand' }
  | { type: 'collapse-all' }
  | { type: 'expand-all' }
  | { type: 'select' }
  | { type: 'format' }
  | { type: 'compress' }
  | { type: 'search-start' }
  | { type: 'search-next' }
  | { type: 'search-prev' }
  | { type: 'search-close' }
  | { type: 'edit-start' }
  | { type: 'edit-end' }
  | { type: 'insert'; text: string }
  | { type: 'backspace' }
  | { type: 'copy' }
  | { type: 'save' }
  | { type: 'new-window' }
  | { type: 'close-window' }
  | { type: 'next-window' }
  | { type: 'about' }
  | { type: 'dismiss' }
  | { type: 'quit' };

const BROWSE_KEYS: Record<string, Command> = {
  k: { type: 'move', delta: -1 },
  j: { type: 'move', delta: 1 },
  ' ': { type: 'toggle' },
  C: { type: 'collapse-all' },
  E: { type: 'expand-all' },
  f: { type: 'format' },
  c: { type: 'compress' },
  '/': { type: 'search-start' },
  n: { type: 'search-next' },
  N: { type: 'search-prev' },
  e: { type: 'edit-start' },
  y: { type: 'copy' },
  s: { type: 'save' },
  w: { type: 'new-window' },
  x: { type: 'close-window' },
  '?': { type: 'about' },
  q: { type: 'quit' },
};

export function keyToCommand(input: string, key: KeyState, mode: Mode): Command | undefined {
  if (key.ctrl && input === 'c') return { type: 'quit' };

  switch (mode) {
    case 'about':
      return { type: 'dismiss' };

    case 'search':
      if (key.escape) return { type: 'search-close' };
      if (key.return || key.downArrow) return { type: 'search-next' };
      if (key.upArrow) return { type: 'search-prev' };
      if (key.backspace || key.delete) return { type: 'backspace' };
      if (input && !key.ctrl && !key.tab) return { type: 'insert', text: input };
      return undefined;

    case 'edit':
      if (key.escape) return { type: 'edit-end' };
      if (key.return) return { type: 'insert', text: '\n' };
      if (key.backspace || key.delete) return { type: 'backspace' };
      if (input && !key.ctrl && !key.tab) return { type: 'insert', text: input };
      return undefined;

    case 'browse':
      if (key.upArrow) return { type: 'move', delta: -1 };
      if (key.downArrow) return { type: 'move', delta: 1 };
      if (key.leftArrow) return { type: 'collapse' };
      if (key.rightArrow) return { type: 'expand' };
      if (key.return) return { type: 'select' };
      if (key.tab) return { type: 'next-window' };
      if (key.escape) return { type: 'search-close' };
      return Object.hasOwn(BROWSE_KEYS, input) ? BROWSE_KEYS[input] : undefined;
  }
}

export interface PanelState {
  cursorRow: number;
  collapsed: ReadonlySet<string>;
}

export function initialPanelState(): PanelState {
  return { cursorRow: 0, collapsed: new Set() };
}

export function rowsFor(tree: TreeNode | undefined, panel: PanelState): VisibleRow[] {
  return tree ? visibleRows(tree, panel.collapsed) : [];
}

export function moveCursor(panel: PanelState, delta: number, rowCount: number): PanelState {
  if (rowCount === 0) return { ...panel, cursorRow: 0 };
  const cursorRow = Math.max(0, Math.min(panel.cursorRow + delta, rowCount - 1));
  return { ...panel, cursorRow };
}

/**
 * Open or close the container under the cursor. `open` forces a direction;
 * without it the state flips. Scalars are left alone.
 */
export function setRowOpen(
  panel: PanelState,
  rows: readonly VisibleRow[],
  open?: boolean
): PanelState {
  const row = rows[panel.cursorRow];
  if (!row || row.node.kind === 'scalar') return panel;

  const nextOpen = open ?? !row.expanded;
  const collapsed = new Set(panel.collapsed);
  if (nextOpen) {
    collapsed.delete(row.node.id);
  } else {
    collapsed.add(row.node.id);
  }
  return { ...panel, collapsed };
}

/** Close every container; only the root row stays visible */
export function collapseAll(tree: TreeNode | undefined): PanelState {
  return { cursorRow: 0, collapsed: new Set(tree ? containerIds(tree) : []) };
}

export function expandAll(panel: PanelState): PanelState {
  return { ...panel, collapsed: new Set() };
}

/** Keep the cursor on a row after the tree changed shape */
export function clampPanel(panel: PanelState, rowCount: number): PanelState {
  return moveCursor(panel, 0, rowCount);
}

/** First index of a window of `size` rows that keeps `cursor` visible */
export function scrollOffset(cursor: number, total: number, size: number): number {
  if (total <= size) return 0;
  const half = Math.floor(size / 2);
  return Math.max(0, Math.min(cursor - half, total - size));
}
