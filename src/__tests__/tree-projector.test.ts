import { describe, it, expect } from 'vitest';
import {
  childId,
  containerIds,
  countNodes,
  displayText,
  findNode,
  project,
  visibleRows,
} from '../jsonscope/tree-projector.js';
import { parse } from '../jsonscope/parser.js';
import type { TreeNode } from '../jsonscope/types.js';

const DOC = parse('{"name":"box","size":[2,3],"meta":{"a b":null}}');

function node(root: TreeNode, id: string): TreeNode {
  const found = findNode(root, id);
  if (!found) throw new Error(`no node ${id}`);
  return found;
}

describe('childId', () => {
  it('builds JSONPath ids', () => {
    expect(childId('$', 'name')).toBe('$.name');
    expect(childId('$', 'a b')).toBe('$["a b"]');
    expect(childId('$', '1st')).toBe('$["1st"]');
    expect(childId('$.list', 0)).toBe('$.list[0]');
  });
});

describe('project', () => {
  it('makes one node per value with labels', () => {
    const root = project(DOC);

    expect(root.id).toBe('$');
    expect(root.label).toBeUndefined();
    expect(root.kind).toBe('object');
    expect(root.expanded).toBe(true);
    expect(root.children.map((child) => child.label)).toEqual(['name', 'size', 'meta']);
    expect(node(root, '$.size').children.map((child) => child.label)).toEqual(['[0]', '[1]']);
    expect(countNodes(root)).toBe(7);
  });

  it('gives scalars their key or index as payload key', () => {
    const root = project(DOC);
    const name = node(root, '$.name');
    const second = node(root, '$.size[1]');

    expect(name.kind).toBe('scalar');
    expect(name.expanded).toBe(false);
    if (name.kind === 'scalar') expect(name.payload.key).toBe('name');
    if (second.kind === 'scalar') expect(second.payload.key).toBe(1);
    expect(second.path).toEqual(['size', 1]);
  });

  it('projects a root scalar without a key', () => {
    const root = project(parse('7'));

    expect(root.kind).toBe('scalar');
    if (root.kind === 'scalar') expect(root.payload.key).toBeUndefined();
    expect(displayText(root)).toBe('7');
  });

  it('keeps the source value on containers', () => {
    const root = project(DOC);

    expect(root.payload).toBe(DOC);
  });
});

describe('displayText', () => {
  it('renders labels and scalar text', () => {
    const root = project(DOC);

    expect(displayText(root)).toBe('{3}');
    expect(displayText(node(root, '$.name'))).toBe('name: box');
    expect(displayText(node(root, '$.size'))).toBe('size');
    expect(displayText(node(root, '$.size[0]'))).toBe('[0]: 2');
    expect(displayText(node(root, '$.meta["a b"]'))).toBe('a b: null');
    expect(displayText(project(parse('[1,2]')))).toBe('[2]');
  });
});

describe('findNode', () => {
  it('returns undefined for unknown ids', () => {
    expect(findNode(project(DOC), '$.missing')).toBeUndefined();
    expect(findNode(project(DOC), '$.size[5]')).toBeUndefined();
  });
});

describe('visibleRows', () => {
  it('flattens the tree with connectors', () => {
    const rows = visibleRows(project(DOC));

    expect(rows.map((row) => row.prefix + displayText(row.node))).toEqual([
      '{3}',
      '├─name: box',
      '├─size',
      '│  ├─[0]: 2',
      '│  └─[1]: 3',
      '└─meta',
      '   └─a b: null',
    ]);
    expect(rows.map((row) => row.depth)).toEqual([0, 1, 1, 2, 2, 1, 2]);
  });

  it('hides the children of collapsed containers', () => {
    const rows = visibleRows(project(DOC), new Set(['$.size']));

    expect(rows.map((row) => row.node.id)).toEqual([
      '$',
      '$.name',
      '$.size',
      '$.meta',
      '$.meta["a b"]',
    ]);
    expect(rows[2].expanded).toBe(false);
  });

  it('lists container ids', () => {
    expect(containerIds(project(DOC))).toEqual(['$', '$.size', '$.meta']);
  });
});
