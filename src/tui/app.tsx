/**
 * Main TUI application
 *
 * Renders the open formatter windows as tabs, each with a tree panel on the
 * left and the result text on the right. Window state lives in the
 * FormatterWindow objects; React state only tracks the active window, the
 * input mode and each window's cursor/collapse state.
 */

import React, { useEffect, useState } from 'react';
import { Box, Text, useApp, useInput } from 'ink';
import { describePosition } from '../jsonscope/search-engine.js';
import { errorMessage } from '../jsonscope/errors.js';
import type { WindowManager } from '../jsonscope/window-manager.js';
import type { FormatterWindow } from '../jsonscope/formatter-window.js';
import type { StatusMessage, StatusNotifier } from './notifier.js';
import {
  clampPanel,
  collapseAll,
  expandAll,
  initialPanelState,
  keyToCommand,
  moveCursor,
  rowsFor,
  setRowOpen,
  type Command,
  type Mode,
  type PanelState,
} from './state.js';
import { TreePanel } from './tree-panel.js';
import { ResultPanel } from './result-panel.js';

export interface JsonScopeAppProps {
  manager: WindowManager;
  notifier: StatusNotifier;
  /** Target of the save action */
  savePath?: string;
  /** Rows available to the tree and result panels */
  height?: number;
  onExit?: () => void;
}

const HELP =
  '↑↓ move • space toggle • enter select • f format • c compress • / search • e edit • ? help • q quit';

const ABOUT_LINES = [
  'jsonscope - format, compact, browse and search JSON',
  '',
  '↑/k ↓/j   move          space   expand/collapse',
  '←/→       collapse/expand enter  show selected node',
  'C/E       collapse/expand all',
  'f         format        c       compress',
  '/         search        n/N     next/previous match',
  'esc       close search  e       edit input (esc to finish)',
  'y         copy result   s       save result',
  'w         new window    x       close window',
  'tab       next window   q       quit',
];

const AboutPanel: React.FC = () => (
  <Box flexDirection="column" borderStyle="round" borderColor="cyan" padding={1}>
    {ABOUT_LINES.map((line, index) => (
      <Text key={index}>{line || ' '}</Text>
    ))}
    <Text color="gray">Press any key to close</Text>
  </Box>
);

const WindowTabs: React.FC<{ windows: readonly FormatterWindow[]; activeId: number }> = ({
  windows,
  activeId,
}) => (
  <Box>
    {windows.map((window) => (
      <Box key={window.id} marginRight={2}>
        <Text color={window.id === activeId ? 'cyan' : 'gray'} bold={window.id === activeId}>
          {window.title}
        </Text>
      </Box>
    ))}
  </Box>
);

const StatusLine: React.FC<{ status?: StatusMessage; mode: Mode }> = ({ status, mode }) => {
  if (mode === 'edit') {
    return <Text color="yellow">-- EDIT -- type or paste JSON, esc to finish</Text>;
  }
  if (status) {
    return (
      <Text color={status.kind === 'error' ? 'red' : 'green'} wrap="truncate">
        {status.kind === 'error' ? '❌ ' : '✅ '}
        {status.text}
      </Text>
    );
  }
  return (
    <Text color="gray" wrap="truncate">
      {HELP}
    </Text>
  );
};

export const JsonScopeApp: React.FC<JsonScopeAppProps> = ({
  manager,
  notifier,
  savePath,
  height = 20,
  onExit,
}) => {
  const { exit } = useApp();
  const [activeId, setActiveId] = useState(() => (manager.list()[0] ?? manager.create()).id);
  const [mode, setMode] = useState<Mode>('browse');
  const [panels, setPanels] = useState<Record<number, PanelState>>({});
  const [status, setStatus] = useState<StatusMessage | undefined>(notifier.latest);
  const [, setRevision] = useState(0);

  useEffect(() => notifier.subscribe(setStatus), [notifier]);

  const refresh = () => setRevision((revision) => revision + 1);

  const active = manager.get(activeId) ?? manager.list()[0];
  const panel = (active && panels[active.id]) ?? initialPanelState();
  const rows = rowsFor(active?.tree, panel);
  const current = clampPanel(panel, rows.length);

  const quit = () => {
    exit();
    onExit?.();
  };

  const updatePanel = (next: PanelState) => {
    if (!active) return;
    setPanels((prev) => ({ ...prev, [active.id]: next }));
  };

  const runAsync = (task: Promise<boolean>) => {
    task.then(refresh, (error: unknown) => {
      notifier.error('Unexpected error', errorMessage(error));
    });
  };

  const execute = (command: Command, target: FormatterWindow) => {
    switch (command.type) {
      case 'move':
        updatePanel(moveCursor(current, command.delta, rows.length));
        return;
      case 'toggle':
        updatePanel(setRowOpen(current, rows));
        return;
      case 'collapse':
        updatePanel(setRowOpen(current, rows, false));
        return;
      case 'expand':
        updatePanel(setRowOpen(current, rows, true));
        return;
      case 'collapse-all':
        updatePanel(collapseAll(target.tree));
        return;
      case 'expand-all':
        updatePanel(expandAll(current));
        return;
      case 'select': {
        const row = rows[current.cursorRow];
        if (row) target.selectNode(row.node);
        return;
      }
      case 'format':
        target.format();
        return;
      case 'compress':
        target.compress();
        return;
      case 'search-start':
        setMode('search');
        return;
      case 'search-next':
        target.nextMatch();
        return;
      case 'search-prev':
        target.prevMatch();
        return;
      case 'search-close':
        target.closeSearch();
        setMode('browse');
        return;
      case 'edit-start':
        setStatus(undefined);
        setMode('edit');
        return;
      case 'edit-end':
        setMode('browse');
        return;
      case 'insert':
        if (mode === 'search') {
          target.setSearchPattern(target.session.pattern + command.text);
        } else {
          target.setBuffer(target.buffer + command.text);
        }
        return;
      case 'backspace':
        if (mode === 'search') {
          target.setSearchPattern(target.session.pattern.slice(0, -1));
        } else {
          target.setBuffer(target.buffer.slice(0, -1));
        }
        return;
      case 'copy':
        runAsync(target.copyResult());
        return;
      case 'save':
        if (savePath) {
          runAsync(target.saveResult(savePath));
        } else {
          notifier.error('Save failed', 'no output path, start with --output <file>');
        }
        return;
      case 'new-window':
        setActiveId(manager.create().id);
        setMode('browse');
        return;
      case 'close-window': {
        manager.destroy(target.id);
        const next = manager.list()[0];
        if (next) {
          setActiveId(next.id);
        } else {
          quit();
        }
        return;
      }
      case 'next-window': {
        const windows = manager.list();
        const index = windows.findIndex((candidate) => candidate.id === target.id);
        const next = windows[(index + 1) % windows.length];
        if (next) setActiveId(next.id);
        return;
      }
      case 'about':
        setMode('about');
        return;
      case 'dismiss':
        setMode('browse');
        return;
      case 'quit':
        quit();
        return;
    }
  };

  useInput((input, key) => {
    const command = keyToCommand(input, key, mode);
    if (!command) return;
    if (!active) {
      if (command.type === 'quit') quit();
      return;
    }
    execute(command, active);
    refresh();
  });

  if (!active) {
    return <Text color="gray">No open windows</Text>;
  }

  if (mode === 'about') {
    return <AboutPanel />;
  }

  const editing = mode === 'edit';
  const searchText = active.searchText();
  const text = editing ? active.buffer : searchText;
  const showsResult = !editing && active.config.search.target === 'result';
  const session = active.session;

  return (
    <Box flexDirection="column">
      <WindowTabs windows={manager.list()} activeId={active.id} />
      <Box>
        <TreePanel
          rows={rows}
          cursorRow={current.cursorRow}
          selectedId={active.selectedId}
          height={height}
          focused={mode === 'browse'}
        />
        <ResultPanel
          title={showsResult ? 'Result' : 'Input'}
          text={text}
          ranges={editing ? [] : active.highlights()}
          cursor={editing ? active.buffer.length : active.cursor}
          height={height}
          palette={showsResult ? active.config.theme.syntax : undefined}
          placeholder={editing ? 'Type or paste JSON' : 'Press e to enter JSON'}
        />
      </Box>
      {(mode === 'search' || session.pattern !== '') && (
        <Box>
          <Text color="cyan">/</Text>
          <Text>{session.pattern}</Text>
          {mode === 'search' && <Text inverse> </Text>}
          <Text color="gray"> {describePosition(session)}</Text>
        </Box>
      )}
      <StatusLine status={status} mode={mode} />
    </Box>
  );
};
