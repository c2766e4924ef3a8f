/**
 * Painter's-algorithm compositing of one result line
 *
 * Syntax colours go down first, then the highlight ranges in the order the
 * compositor returned them. Adjacent characters with the same style are
 * merged into one segment.
 */

import { highlightSyntax, type SyntaxPalette } from '../jsonscope/syntax-highlight.js';
import type { HighlightRange } from '../jsonscope/types.js';

export interface Segment {
  text: string;
  color?: string;
  backgroundColor?: string;
  bold?: boolean;
}

interface CellStyle {
  color?: string;
  backgroundColor?: string;
  bold?: boolean;
}

export interface PaintedLine {
  segments: Segment[];
  /** Background for the rest of the row, set by a full-row range */
  rowBackground?: string;
}

export function paintLine(
  line: string,
  lineStart: number,
  ranges: readonly HighlightRange[],
  palette?: SyntaxPalette
): PaintedLine {
  const cells: CellStyle[] = Array.from({ length: line.length }, () => ({}));
  const lineEnd = lineStart + line.length;
  let rowBackground: string | undefined;

  if (palette) {
    for (const token of highlightSyntax(line)) {
      for (let i = token.start; i < token.start + token.length; i++) {
        cells[i].color = palette[token.kind];
      }
    }
  }

  for (const range of ranges) {
    if (range.fullRow) {
      // Zero-length anchor: paints the row it sits on, end of line included
      if (range.start >= lineStart && range.start <= lineEnd) {
        rowBackground = range.style.background ?? rowBackground;
        for (const cell of cells) {
          if (range.style.background) cell.backgroundColor = range.style.background;
        }
      }
      continue;
    }

    const from = Math.max(range.start, lineStart) - lineStart;
    const to = Math.min(range.start + range.length, lineEnd) - lineStart;
    for (let i = from; i < to; i++) {
      const cell = cells[i];
      if (range.style.foreground) cell.color = range.style.foreground;
      if (range.style.background) cell.backgroundColor = range.style.background;
      if (range.style.bold) cell.bold = true;
    }
  }

  return { segments: mergeCells(line, cells), rowBackground };
}

function sameStyle(a: CellStyle, b: CellStyle): boolean {
  return a.color === b.color && a.backgroundColor === b.backgroundColor && a.bold === b.bold;
}

function mergeCells(line: string, cells: CellStyle[]): Segment[] {
  const segments: Segment[] = [];
  let runStart = 0;
  for (let i = 1; i <= line.length; i++) {
    if (i === line.length || !sameStyle(cells[i], cells[runStart])) {
      segments.push({ text: line.slice(runStart, i), ...cells[runStart] });
      runStart = i;
    }
  }
  return segments;
}
