/**
 * Highlight compositor - ordered overlay ranges for the result view
 *
 * Ranges are returned in paint order; later ranges win where they overlap:
 *   1. current-line marker (zero length, full row)
 *   2. every match
 *   3. the current match
 */

import { currentMatch } from './search-engine.js';
import type { HighlightRange, HighlightStyle, SearchSession } from './types.js';

export interface HighlightTheme {
  currentLine: HighlightStyle;
  match: HighlightStyle;
  currentMatch: HighlightStyle;
}

export const DEFAULT_HIGHLIGHT_THEME: HighlightTheme = {
  currentLine: { background: '#3c3c3c' },
  match: { background: '#7a6a1a' },
  currentMatch: { foreground: '#ffffff', background: '#4b5cc4', bold: true },
};

export interface ComposeInput {
  session?: SearchSession;
  /** Cursor offset in the searched text */
  cursor: number;
  theme?: HighlightTheme;
}

export function composeHighlights({
  session,
  cursor,
  theme = DEFAULT_HIGHLIGHT_THEME,
}: ComposeInput): HighlightRange[] {
  const current = session ? currentMatch(session) : undefined;

  const ranges: HighlightRange[] = [
    {
      layer: 'current-line',
      start: current ? current.start : cursor,
      length: 0,
      fullRow: true,
      style: theme.currentLine,
    },
  ];

  if (!session || session.pattern.length === 0) {
    return ranges;
  }

  for (const match of session.matches) {
    ranges.push({
      layer: 'match',
      start: match.start,
      length: match.length,
      fullRow: false,
      style: theme.match,
    });
  }

  if (current) {
    ranges.push({
      layer: 'current-match',
      start: current.start,
      length: current.length,
      fullRow: false,
      style: theme.currentMatch,
    });
  }

  return ranges;
}

/** Start (inclusive) and end (exclusive, before the newline) of the line holding `offset` */
export function lineBounds(text: string, offset: number): { start: number; end: number } {
  const clamped = Math.max(0, Math.min(offset, text.length));
  const start = clamped === 0 ? 0 : text.lastIndexOf('\n', clamped - 1) + 1;
  const newline = text.indexOf('\n', clamped);
  return { start, end: newline === -1 ? text.length : newline };
}

/** 0-based line index of an offset */
export function lineIndexAt(text: string, offset: number): number {
  let line = 0;
  const end = Math.max(0, Math.min(offset, text.length));
  for (let i = 0; i < end; i++) {
    if (text.charCodeAt(i) === 10) line++;
  }
  return line;
}
