/**
 * Formatter window - one independent display surface
 *
 * Owns an input buffer, the display tree projected from it, the result text
 * and a search session over the result (or the buffer, per config). Every
 * operation runs to completion synchronously except file and clipboard IO,
 * which only touch window state after the awaited call has finished.
 */

import { ParseError, errorMessage } from './errors.js';
import { debugLog } from './debug.js';
import { parse } from './parser.js';
import { serialize } from './serializer.js';
import { expand } from './expansion.js';
import { findNode, project } from './tree-projector.js';
import { renderSelection, type SelectionText } from './tree-reconstructor.js';
import {
  currentMatch,
  emptySession,
  nextMatch,
  prevMatch,
  search,
} from './search-engine.js';
import { composeHighlights } from './highlight.js';
import type { Clipboard, FileStore, Notifier } from './io.js';
import type { JsonScopeConfig } from './config.js';
import type { HighlightRange, SearchSession, TreeNode } from './types.js';

export const WINDOW_TITLE = 'JSON Formatter';

export interface WindowServices {
  config: JsonScopeConfig;
  files: FileStore;
  clipboard: Clipboard;
  notifier: Notifier;
}

export type ProcessOutcome =
  | { ok: true }
  | { ok: false; error: ParseError };

export function windowTitle(number: number): string {
  return number > 1 ? `${WINDOW_TITLE} ${number}` : WINDOW_TITLE;
}

export class FormatterWindow {
  readonly title: string;

  private _buffer = '';
  private _tree: TreeNode | undefined;
  private _result = '';
  private _selectedId: string | undefined;
  private _session: SearchSession = emptySession();
  private _cursor = 0;
  private searchVersion = 0;

  constructor(
    readonly id: number,
    readonly number: number,
    private readonly services: WindowServices
  ) {
    this.title = windowTitle(number);
  }

  get buffer(): string {
    return this._buffer;
  }

  get tree(): TreeNode | undefined {
    return this._tree;
  }

  get result(): string {
    return this._result;
  }

  get selectedId(): string | undefined {
    return this._selectedId;
  }

  get session(): SearchSession {
    return this._session;
  }

  get cursor(): number {
    return this._cursor;
  }

  get config(): JsonScopeConfig {
    return this.services.config;
  }

  /**
   * Replace the buffer (live editing). Parse errors clear the tree and
   * result without a notification.
   */
  setBuffer(text: string): void {
    this._buffer = text;
    if (this.config.autoFormat) {
      this.process(false);
    } else {
      this.refreshSearch();
    }
  }

  /** Explicit format action: parse errors are reported */
  format(): ProcessOutcome {
    return this.process(true);
  }

  /**
   * Compact the buffer. No nested-string expansion; the tree shows the
   * value exactly as parsed.
   */
  compress(): ProcessOutcome {
    const text = this._buffer.trim();
    if (!text) return { ok: true };

    try {
      const value = parse(text, { maxDepth: this.config.maxDepth });
      this.show(project(value), serialize(value, 'compact'));
      return { ok: true };
    } catch (error) {
      if (error instanceof ParseError) {
        this.reportParseError('Compress failed', error);
        return { ok: false, error };
      }
      throw error;
    }
  }

  /** Show the JSON for a tree node in the result view */
  selectNode(target: string | TreeNode): SelectionText | undefined {
    const node =
      typeof target === 'string'
        ? this._tree && findNode(this._tree, target)
        : target;
    if (!node) return undefined;

    const selection = renderSelection(node, { indent: this.config.indent });
    this._selectedId = node.id;
    this._result = selection.text;
    this.refreshSearch();
    return selection;
  }

  /**
   * Load a file into the buffer. On failure the buffer is left untouched.
   */
  async openFile(path: string): Promise<boolean> {
    let text: string;
    try {
      text = await this.services.files.read(path);
    } catch (error) {
      this.reportIOError('Open failed', path, error);
      return false;
    }
    debugLog('window', `opened ${path}`, { window: this.id, length: text.length });
    this.setBuffer(text);
    return true;
  }

  /** Write the result text; nothing happens when it is empty */
  async saveResult(path: string): Promise<boolean> {
    const text = this._result.trim();
    if (!text) return false;

    try {
      await this.services.files.write(path, text);
    } catch (error) {
      this.reportIOError('Save failed', path, error);
      return false;
    }
    this.services.notifier.success(`Saved ${path}`);
    return true;
  }

  async copyResult(): Promise<boolean> {
    if (!this._result) return false;

    try {
      await this.services.clipboard.writeText(this._result);
    } catch (error) {
      this.services.notifier.error('Copy failed', errorMessage(error));
      return false;
    }
    this.services.notifier.success('JSON result copied to clipboard');
    return true;
  }

  // Search

  /** Text the search runs over */
  searchText(): string {
    return this.config.search.target === 'buffer' ? this._buffer : this._result;
  }

  setSearchPattern(pattern: string): SearchSession {
    this.applySession(search(this.searchText(), pattern, ++this.searchVersion));
    return this._session;
  }

  nextMatch(): SearchSession {
    this.applySession(nextMatch(this._session));
    return this._session;
  }

  prevMatch(): SearchSession {
    this.applySession(prevMatch(this._session));
    return this._session;
  }

  /** Drop the session; only the current-line marker remains */
  closeSearch(): void {
    this.applySession(emptySession(++this.searchVersion));
  }

  setCursor(offset: number): void {
    this._cursor = Math.max(0, Math.min(offset, this.searchText().length));
  }

  highlights(): HighlightRange[] {
    return composeHighlights({
      session: this._session,
      cursor: this._cursor,
      theme: this.config.theme,
    });
  }

  /** Install a session unless a newer rebuild has already landed */
  applySession(session: SearchSession): boolean {
    if (session.version < this._session.version) {
      debugLog('search', 'dropping stale session', {
        stale: session.version,
        current: this._session.version,
      });
      return false;
    }
    this._session = session;
    const match = currentMatch(session);
    if (match) this._cursor = match.start;
    return true;
  }

  private refreshSearch(): void {
    const pattern = this._session.pattern;
    this.applySession(search(this.searchText(), pattern, ++this.searchVersion));
    this.setCursor(this._cursor);
  }

  private process(reportErrors: boolean): ProcessOutcome {
    const text = this._buffer.trim();
    if (!text) {
      this.clear();
      return { ok: true };
    }

    try {
      const parseOptions = { maxDepth: this.config.maxDepth };
      const parsed = parse(text, parseOptions);
      const value = this.config.expandNested ? expand(parsed, parseOptions) : parsed;
      this.show(project(value), serialize(value, 'pretty', { indent: this.config.indent }));
      return { ok: true };
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      if (reportErrors) {
        this.reportParseError('Format failed', error);
      } else {
        this.clear();
      }
      return { ok: false, error };
    }
  }

  private show(tree: TreeNode, result: string): void {
    this._tree = tree;
    this._result = result;
    this._selectedId = undefined;
    this.refreshSearch();
  }

  private clear(): void {
    this._tree = undefined;
    this._result = '';
    this._selectedId = undefined;
    this.refreshSearch();
  }

  private reportParseError(title: string, error: ParseError): void {
    this.services.notifier.error(
      title,
      `${error.message}\nline: ${error.line}, column: ${error.column}`
    );
  }

  private reportIOError(title: string, path: string, error: unknown): void {
    const message = errorMessage(error);
    debugLog('window', `${title}: ${path}`, { message });
    this.services.notifier.error(title, message);
  }
}
