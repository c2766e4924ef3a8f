import { describe, it, expect } from 'vitest';
import { paintLine } from '../tui/paint.js';
import type { HighlightRange } from '../jsonscope/types.js';

const PALETTE = {
  key: '#0000aa',
  string: '#00aa00',
  number: '#aa0000',
  boolean: '#aaaa00',
  null: '#aa00aa',
};

function range(
  layer: HighlightRange['layer'],
  start: number,
  length: number,
  style: HighlightRange['style']
): HighlightRange {
  return { layer, start, length, fullRow: layer === 'current-line', style };
}

describe('paintLine', () => {
  it('returns the plain line without ranges or palette', () => {
    expect(paintLine('"a": 1', 0, [])).toEqual({
      segments: [{ text: '"a": 1' }],
      rowBackground: undefined,
    });
  });

  it('paints syntax colours', () => {
    expect(paintLine('"a": 1', 0, [], PALETTE).segments).toEqual([
      { text: '"' },
      { text: 'a', color: PALETTE.key },
      { text: '": ' },
      { text: '1', color: PALETTE.number },
    ]);
  });

  it('layers ranges over syntax colours in order', () => {
    const painted = paintLine(
      '"a": 1',
      10,
      [
        range('current-line', 12, 0, { background: '#333333' }),
        range('match', 11, 1, { background: '#777700' }),
        range('match', 15, 1, { background: '#777700' }),
        range('current-match', 15, 1, { foreground: '#ffffff', background: '#0000ff', bold: true }),
      ],
      PALETTE
    );

    expect(painted.rowBackground).toBe('#333333');
    expect(painted.segments).toEqual([
      { text: '"', backgroundColor: '#333333' },
      { text: 'a', color: PALETTE.key, backgroundColor: '#777700' },
      { text: '": ', backgroundColor: '#333333' },
      { text: '1', color: '#ffffff', backgroundColor: '#0000ff', bold: true },
    ]);
  });

  it('clips ranges that start on an earlier line', () => {
    const painted = paintLine('abcd', 10, [range('match', 8, 4, { background: '#777700' })]);

    expect(painted.segments).toEqual([
      { text: 'ab', backgroundColor: '#777700' },
      { text: 'cd' },
    ]);
  });

  it('ignores a current-line marker on another row', () => {
    const painted = paintLine('abcd', 10, [range('current-line', 15, 0, { background: '#333333' })]);

    expect(painted.rowBackground).toBeUndefined();
    expect(painted.segments).toEqual([{ text: 'abcd' }]);
  });

  it('marks an empty row that holds the cursor', () => {
    const painted = paintLine('', 4, [range('current-line', 4, 0, { background: '#333333' })]);

    expect(painted).toEqual({ segments: [], rowBackground: '#333333' });
  });
});
