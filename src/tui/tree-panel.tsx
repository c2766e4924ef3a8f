/**
 * Tree panel - the display tree with unicode connectors and a row cursor
 */

import React from 'react';
import { Box, Text } from 'ink';
import { displayText, type VisibleRow } from '../jsonscope/tree-projector.js';
import { scrollOffset } from './state.js';

export interface TreePanelProps {
  rows: readonly VisibleRow[];
  cursorRow: number;
  selectedId?: string;
  height: number;
  focused: boolean;
}

const Marker: React.FC<{ row: VisibleRow }> = ({ row }) => {
  if (row.node.kind === 'scalar') return null;
  return <Text color="yellow">{row.expanded ? '▼ ' : '▶ '}</Text>;
};

export const TreePanel: React.FC<TreePanelProps> = ({
  rows,
  cursorRow,
  selectedId,
  height,
  focused,
}) => {
  const offset = scrollOffset(cursorRow, rows.length, height);
  const visible = rows.slice(offset, offset + height);

  return (
    <Box
      flexDirection="column"
      borderStyle="single"
      borderColor={focused ? 'cyan' : 'gray'}
      width="40%"
      paddingX={1}
    >
      {rows.length === 0 ? (
        <Text color="gray">No JSON loaded</Text>
      ) : (
        visible.map((row, index) => {
          const isCursor = offset + index === cursorRow;
          const isSelected = row.node.id === selectedId;
          return (
            <Text key={row.node.id} inverse={isCursor && focused} wrap="truncate">
              <Text color="gray">{row.prefix}</Text>
              <Marker row={row} />
              <Text color={row.node.kind === 'scalar' ? undefined : 'cyan'} bold={isSelected}>
                {displayText(row.node)}
              </Text>
            </Text>
          );
        })
      )}
    </Box>
  );
};
