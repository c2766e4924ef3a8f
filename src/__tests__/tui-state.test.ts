import { describe, it, expect } from 'vitest';
import {
  clampPanel,
  collapseAll,
  expandAll,
  initialPanelState,
  keyToCommand,
  moveCursor,
  rowsFor,
  scrollOffset,
  setRowOpen,
  type KeyState,
} from '../tui/state.js';
import { project } from '../jsonscope/tree-projector.js';
import { parse } from '../jsonscope/parser.js';

function key(overrides: Partial<KeyState> = {}): KeyState {
  return {
    upArrow: false,
    downArrow: false,
    leftArrow: false,
    rightArrow: false,
    return: false,
    escape: false,
    tab: false,
    backspace: false,
    delete: false,
    ctrl: false,
    ...overrides,
  };
}

describe('keyToCommand', () => {
  it('maps browse keys', () => {
    expect(keyToCommand('', key({ downArrow: true }), 'browse')).toEqual({ type: 'move', delta: 1 });
    expect(keyToCommand('k', key(), 'browse')).toEqual({ type: 'move', delta: -1 });
    expect(keyToCommand(' ', key(), 'browse')).toEqual({ type: 'toggle' });
    expect(keyToCommand('', key({ return: true }), 'browse')).toEqual({ type: 'select' });
    expect(keyToCommand('/', key(), 'browse')).toEqual({ type: 'search-start' });
    expect(keyToCommand('N', key(), 'browse')).toEqual({ type: 'search-prev' });
    expect(keyToCommand('', key({ tab: true }), 'browse')).toEqual({ type: 'next-window' });
    expect(keyToCommand('', key({ escape: true }), 'browse')).toEqual({ type: 'search-close' });
    expect(keyToCommand('C', key(), 'browse')).toEqual({ type: 'collapse-all' });
    expect(keyToCommand('E', key(), 'browse')).toEqual({ type: 'expand-all' });
    expect(keyToCommand('z', key(), 'browse')).toBeUndefined();
    expect(keyToCommand('constructor', key(), 'browse')).toBeUndefined();
  });

  it('types into the search pattern', () => {
    expect(keyToCommand('n', key(), 'search')).toEqual({ type: 'insert', text: 'n' });
    expect(keyToCommand('', key({ return: true }), 'search')).toEqual({ type: 'search-next' });
    expect(keyToCommand('', key({ upArrow: true }), 'search')).toEqual({ type: 'search-prev' });
    expect(keyToCommand('', key({ backspace: true }), 'search')).toEqual({ type: 'backspace' });
    expect(keyToCommand('', key({ escape: true }), 'search')).toEqual({ type: 'search-close' });
  });

  it('types into the buffer in edit mode', () => {
    expect(keyToCommand('{"a"', key(), 'edit')).toEqual({ type: 'insert', text: '{"a"' });
    expect(keyToCommand('', key({ return: true }), 'edit')).toEqual({ type: 'insert', text: '\n' });
    expect(keyToCommand('', key({ escape: true }), 'edit')).toEqual({ type: 'edit-end' });
  });

  it('closes the about panel on any key and quits on ctrl-c everywhere', () => {
    expect(keyToCommand('x', key(), 'about')).toEqual({ type: 'dismiss' });
    expect(keyToCommand('c', key({ ctrl: true }), 'edit')).toEqual({ type: 'quit' });
    expect(keyToCommand('q', key(), 'browse')).toEqual({ type: 'quit' });
    expect(keyToCommand('q', key(), 'search')).toEqual({ type: 'insert', text: 'q' });
  });
});

describe('panel state', () => {
  const tree = project(parse('{"a":[1,2],"b":{"c":true}}'));

  it('clamps the cursor to the rows', () => {
    const panel = initialPanelState();

    expect(moveCursor(panel, -1, 7).cursorRow).toBe(0);
    expect(moveCursor(panel, 10, 7).cursorRow).toBe(6);
    expect(moveCursor(panel, 1, 0).cursorRow).toBe(0);
    expect(clampPanel({ ...panel, cursorRow: 9 }, 3).cursorRow).toBe(2);
  });

  it('collapses and expands the container under the cursor', () => {
    const start = { ...initialPanelState(), cursorRow: 1 };
    const collapsed = setRowOpen(start, rowsFor(tree, start));

    expect([...collapsed.collapsed]).toEqual(['$.a']);
    expect(rowsFor(tree, collapsed).map((row) => row.node.id)).toEqual([
      '$',
      '$.a',
      '$.b',
      '$.b.c',
    ]);

    const reopened = setRowOpen(collapsed, rowsFor(tree, collapsed), true);
    expect(reopened.collapsed.size).toBe(0);
    expect(setRowOpen(reopened, rowsFor(tree, reopened), true)).toEqual(reopened);
  });

  it('leaves scalar rows alone', () => {
    const onLeaf = { ...initialPanelState(), cursorRow: 2 };

    expect(setRowOpen(onLeaf, rowsFor(tree, onLeaf))).toBe(onLeaf);
  });

  it('collapses every container and reopens them all', () => {
    const closed = collapseAll(tree);

    expect([...closed.collapsed]).toEqual(['$', '$.a', '$.b']);
    expect(rowsFor(tree, closed).map((row) => row.node.id)).toEqual(['$']);

    const opened = expandAll({ ...closed, cursorRow: 0 });
    expect(opened.collapsed.size).toBe(0);
    expect(rowsFor(tree, opened)).toHaveLength(6);
    expect(collapseAll(undefined).collapsed.size).toBe(0);
  });

  it('has no rows without a tree', () => {
    expect(rowsFor(undefined, initialPanelState())).toEqual([]);
  });
});

describe('scrollOffset', () => {
  it('keeps the cursor near the middle of the window', () => {
    expect(scrollOffset(3, 5, 10)).toBe(0);
    expect(scrollOffset(2, 100, 10)).toBe(0);
    expect(scrollOffset(50, 100, 10)).toBe(45);
    expect(scrollOffset(99, 100, 10)).toBe(90);
  });
});
