/**
 * Result panel - formatted JSON with syntax colours, search highlights and a
 * line-number gutter matching the line numbers in parse errors
 */

import React, { useMemo } from 'react';
import { Box, Text } from 'ink';
import { lineIndexAt } from '../jsonscope/highlight.js';
import type { SyntaxPalette } from '../jsonscope/syntax-highlight.js';
import type { HighlightRange } from '../jsonscope/types.js';
import { paintLine } from './paint.js';
import { scrollOffset } from './state.js';

export interface ResultPanelProps {
  title: string;
  text: string;
  ranges: readonly HighlightRange[];
  cursor: number;
  height: number;
  /** Syntax colours; omitted for raw buffer text */
  palette?: SyntaxPalette;
  placeholder?: string;
}

export interface Line {
  text: string;
  start: number;
  /** 1-based line number, right-aligned to the widest one */
  gutter: string;
}

export function splitLines(text: string): Line[] {
  const parts = text.split('\n');
  const width = String(parts.length).length;
  const lines: Line[] = [];
  let start = 0;
  parts.forEach((line, index) => {
    lines.push({ text: line, start, gutter: String(index + 1).padStart(width) });
    start += line.length + 1;
  });
  return lines;
}

export const ResultPanel: React.FC<ResultPanelProps> = ({
  title,
  text,
  ranges,
  cursor,
  height,
  palette,
  placeholder = 'Nothing to show',
}) => {
  const lines = useMemo(() => splitLines(text), [text]);
  const offset = scrollOffset(lineIndexAt(text, cursor), lines.length, height);

  return (
    <Box flexDirection="column" borderStyle="single" borderColor="gray" flexGrow={1} paddingX={1}>
      <Text color="gray">{title}</Text>
      {text === '' ? (
        <Text color="gray">{placeholder}</Text>
      ) : (
        lines.slice(offset, offset + height).map((line) => {
          const painted = paintLine(line.text, line.start, ranges, palette);
          return (
            <Box key={line.start}>
              <Text color="gray" dimColor>
                {line.gutter}{' '}
              </Text>
              <Text backgroundColor={painted.rowBackground} wrap="truncate">
                {painted.segments.length === 0
                  ? ' '
                  : painted.segments.map((segment, index) => (
                      <Text
                        key={index}
                        color={segment.color}
                        backgroundColor={segment.backgroundColor}
                        bold={segment.bold}
                      >
                        {segment.text}
                      </Text>
                    ))}
              </Text>
            </Box>
          );
        })
      )}
    </Box>
  );
};
