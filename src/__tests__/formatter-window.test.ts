import { describe, it, expect } from 'vitest';
import { FormatterWindow, windowTitle, type WindowServices } from '../jsonscope/formatter-window.js';
import { defaultConfig, validateConfig, type ConfigInput } from '../jsonscope/config.js';
import { IOError } from '../jsonscope/errors.js';
import { MemoryClipboard, type Clipboard, type FileStore, type Notifier } from '../jsonscope/io.js';
import { search } from '../jsonscope/search-engine.js';

class MemoryFileStore implements FileStore {
  readonly files = new Map<string, string>();
  failWrites = false;

  async read(path: string): Promise<string> {
    const text = this.files.get(path);
    if (text === undefined) throw new IOError(`ENOENT: ${path}`, 'read', path);
    return text;
  }

  async write(path: string, text: string): Promise<void> {
    if (this.failWrites) throw new IOError(`EACCES: ${path}`, 'write', path);
    this.files.set(path, text);
  }
}

class RecordingNotifier implements Notifier {
  readonly errors: Array<[string, string]> = [];
  readonly successes: string[] = [];

  error(title: string, message: string): void {
    this.errors.push([title, message]);
  }

  success(message: string): void {
    this.successes.push(message);
  }
}

function setup(config: ConfigInput = {}, clipboard: Clipboard = new MemoryClipboard()) {
  const files = new MemoryFileStore();
  const notifier = new RecordingNotifier();
  const services: WindowServices = {
    config: validateConfig(config),
    files,
    clipboard,
    notifier,
  };
  return { window: new FormatterWindow(1, 1, services), files, notifier, clipboard };
}

const ITEMS = '{"id":1,"items":[{"id":2}]}';
const ITEMS_PRETTY = [
  '{',
  '    "id": 1,',
  '    "items": [',
  '        {',
  '            "id": 2',
  '        }',
  '    ]',
  '}',
].join('\n');

describe('windowTitle', () => {
  it('numbers every window after the first', () => {
    expect(windowTitle(1)).toBe('JSON Formatter');
    expect(windowTitle(2)).toBe('JSON Formatter 2');
    expect(windowTitle(12)).toBe('JSON Formatter 12');
  });
});

describe('FormatterWindow processing', () => {
  it('formats live edits with nested JSON expanded', () => {
    const { window, notifier } = setup();
    window.setBuffer('{"x":"{\\"y\\":2}"}');

    expect(window.result).toBe('{\n    "x": {\n        "y": 2\n    }\n}');
    expect(window.tree?.children[0].kind).toBe('object');
    expect(notifier.errors).toEqual([]);
  });

  it('clears silently on invalid live input', () => {
    const { window, notifier } = setup();
    window.setBuffer(ITEMS);
    window.setBuffer('{"a":');

    expect(window.tree).toBeUndefined();
    expect(window.result).toBe('');
    expect(window.buffer).toBe('{"a":');
    expect(notifier.errors).toEqual([]);
  });

  it('formats numbers outside double range without throwing', () => {
    const { window, notifier } = setup();
    window.setBuffer('{"a":1e400,"b":"1e999"}');

    expect(window.result).toBe('{\n    "a": 1e400,\n    "b": 1e999\n}');
    expect(notifier.errors).toEqual([]);
  });

  it('clears on blank input', () => {
    const { window } = setup();
    window.setBuffer(ITEMS);
    window.setBuffer('  \n ');

    expect(window.tree).toBeUndefined();
    expect(window.result).toBe('');
  });

  it('reports parse errors from an explicit format', () => {
    const { window, notifier } = setup();
    window.setBuffer('{"a":}');
    const outcome = window.format();

    expect(outcome.ok).toBe(false);
    expect(notifier.errors).toEqual([['Format failed', 'Expecting value\nline: 1, column: 6']]);
  });

  it('keeps nested JSON strings when expansion is off', () => {
    const { window } = setup({ expandNested: false, indent: 2 });
    window.setBuffer('{"x":"[1]"}');

    expect(window.result).toBe('{\n  "x": "[1]"\n}');
  });

  it('only formats on request when auto-format is off', () => {
    const { window } = setup({ autoFormat: false });
    window.setBuffer('[1]');

    expect(window.tree).toBeUndefined();
    expect(window.format()).toEqual({ ok: true });
    expect(window.result).toBe('[\n    1\n]');
  });

  it('compresses without expanding', () => {
    const { window } = setup();
    window.setBuffer('{ "x": "[1]", "y": [ 1, 2 ] }');
    const outcome = window.compress();

    expect(outcome).toEqual({ ok: true });
    expect(window.result).toBe('{"x":"[1]","y":[1,2]}');
    expect(window.tree?.children[0].kind).toBe('scalar');
  });

  it('reports compress failures and ignores empty input', () => {
    const { window, notifier } = setup();

    expect(window.compress()).toEqual({ ok: true });
    expect(notifier.errors).toEqual([]);

    window.setBuffer('[1,]');
    expect(window.compress().ok).toBe(false);
    expect(notifier.errors).toEqual([['Compress failed', 'Expecting value\nline: 1, column: 4']]);
  });
});

describe('FormatterWindow selection', () => {
  it('shows the selected node as pretty JSON', () => {
    const { window } = setup();
    window.setBuffer('{"a":1,"b":{"c":[true]}}');
    const selection = window.selectNode('$.b');

    expect(selection?.fallback).toBe(false);
    expect(window.selectedId).toBe('$.b');
    expect(window.result).toBe('{\n    "c": [\n        true\n    ]\n}');

    window.selectNode('$.a');
    expect(window.result).toBe('{\n    "a": 1\n}');
  });

  it('ignores unknown ids', () => {
    const { window } = setup();
    window.setBuffer(ITEMS);

    expect(window.selectNode('$.nope')).toBeUndefined();
    expect(window.result).toBe(ITEMS_PRETTY);
  });
});

describe('FormatterWindow files and clipboard', () => {
  it('opens a file into the buffer', async () => {
    const { window, files } = setup();
    files.files.set('in.json', ITEMS);

    expect(await window.openFile('in.json')).toBe(true);
    expect(window.buffer).toBe(ITEMS);
    expect(window.result).toBe(ITEMS_PRETTY);
  });

  it('leaves the buffer untouched when opening fails', async () => {
    const { window, notifier } = setup();
    window.setBuffer('[1]');

    expect(await window.openFile('missing.json')).toBe(false);
    expect(window.buffer).toBe('[1]');
    expect(notifier.errors).toEqual([['Open failed', 'ENOENT: missing.json']]);
  });

  it('saves the trimmed result', async () => {
    const { window, files, notifier } = setup();
    window.setBuffer('[1]');

    expect(await window.saveResult('out.json')).toBe(true);
    expect(files.files.get('out.json')).toBe('[\n    1\n]');
    expect(notifier.successes).toEqual(['Saved out.json']);
  });

  it('does nothing when saving an empty result', async () => {
    const { window, files, notifier } = setup();

    expect(await window.saveResult('out.json')).toBe(false);
    expect(files.files.size).toBe(0);
    expect(notifier.successes).toEqual([]);
  });

  it('reports save failures', async () => {
    const { window, files, notifier } = setup();
    files.failWrites = true;
    window.setBuffer('[1]');

    expect(await window.saveResult('out.json')).toBe(false);
    expect(notifier.errors).toEqual([['Save failed', 'EACCES: out.json']]);
  });

  it('copies the result', async () => {
    const clipboard = new MemoryClipboard();
    const { window, notifier } = setup({}, clipboard);
    window.setBuffer('{"a":1}');

    expect(await window.copyResult()).toBe(true);
    expect(clipboard.readText()).toBe('{\n    "a": 1\n}');
    expect(notifier.successes).toEqual(['JSON result copied to clipboard']);
  });

  it('reports clipboard failures', async () => {
    const failing: Clipboard = {
      writeText: async () => {
        throw new IOError('terminal closed', 'copy');
      },
    };
    const { window, notifier } = setup({}, failing);
    window.setBuffer('[1]');

    expect(await window.copyResult()).toBe(false);
    expect(notifier.errors).toEqual([['Copy failed', 'terminal closed']]);
  });
});

describe('FormatterWindow search', () => {
  it('searches the result and moves the cursor to the current match', () => {
    const { window } = setup();
    window.setBuffer(ITEMS);
    const session = window.setSearchPattern('"id"');

    expect(session.matches).toEqual([
      { start: 6, length: 4 },
      { start: 52, length: 4 },
    ]);
    expect(window.cursor).toBe(6);

    window.nextMatch();
    expect(window.cursor).toBe(52);
    expect(window.highlights().map((range) => [range.layer, range.start])).toEqual([
      ['current-line', 52],
      ['match', 6],
      ['match', 52],
      ['current-match', 52],
    ]);

    window.nextMatch();
    expect(window.cursor).toBe(6);
    window.prevMatch();
    expect(window.cursor).toBe(52);
  });

  it('keeps only the current-line marker after closing', () => {
    const { window } = setup();
    window.setBuffer(ITEMS);
    window.setSearchPattern('"id"');
    window.prevMatch();
    window.closeSearch();

    expect(window.session.pattern).toBe('');
    expect(window.highlights()).toEqual([
      {
        layer: 'current-line',
        start: 52,
        length: 0,
        fullRow: true,
        style: defaultConfig().theme.currentLine,
      },
    ]);
  });

  it('re-runs the search when the text changes', () => {
    const { window } = setup();
    window.setBuffer(ITEMS);
    window.setSearchPattern('"id"');
    window.setBuffer('{"id":5}');

    expect(window.session.pattern).toBe('"id"');
    expect(window.session.matches).toEqual([{ start: 6, length: 4 }]);
  });

  it('can search the input buffer instead', () => {
    const { window } = setup({ search: { target: 'buffer' } });
    window.setBuffer('{"a":"a"}');

    expect(window.searchText()).toBe('{"a":"a"}');
    expect(window.setSearchPattern('a').matches.map((match) => match.start)).toEqual([2, 6]);
  });

  it('drops sessions older than the current one', () => {
    const { window } = setup();
    window.setBuffer('[1]');
    const current = window.setSearchPattern('1');
    const stale = search(window.result, '[', current.version - 1);

    expect(window.applySession(stale)).toBe(false);
    expect(window.session).toBe(current);
  });

  it('clamps the cursor to the searched text', () => {
    const { window } = setup();
    window.setBuffer(ITEMS);
    window.setCursor(999);

    expect(window.cursor).toBe(ITEMS_PRETTY.length);
    window.setCursor(-3);
    expect(window.cursor).toBe(0);
  });
});
