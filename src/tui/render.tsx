/**
 * Render the jsonscope TUI to the terminal
 */

import React from 'react';
import { render } from 'ink';
import type { JsonScopeConfig } from '../jsonscope/config.js';
import { NodeFileStore, Osc52Clipboard, type FileStore } from '../jsonscope/io.js';
import { WindowManager } from '../jsonscope/window-manager.js';
import { JsonScopeApp } from './app.js';
import { StatusNotifier } from './notifier.js';

export interface RenderOptions {
  config: JsonScopeConfig;
  /** File opened in the first window */
  file?: string;
  /** Initial buffer text, used when no file is given */
  text?: string;
  savePath?: string;
  files?: FileStore;
}

// Borders, tabs, search bar and status line
const CHROME_ROWS = 6;

export async function renderJsonScope(options: RenderOptions) {
  const notifier = new StatusNotifier();
  const manager = new WindowManager({
    config: options.config,
    files: options.files ?? new NodeFileStore(),
    clipboard: new Osc52Clipboard(),
    notifier,
  });

  const first = manager.create();
  if (options.file) {
    await first.openFile(options.file);
  } else if (options.text) {
    first.setBuffer(options.text);
  }

  const height = Math.max(5, (process.stdout.rows || 24) - CHROME_ROWS);
  const instance = render(
    <JsonScopeApp
      manager={manager}
      notifier={notifier}
      savePath={options.savePath}
      height={height}
    />
  );

  return { manager, waitUntilExit: instance.waitUntilExit, unmount: instance.unmount };
}
