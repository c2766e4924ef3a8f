#!/usr/bin/env node

/**
 * jsonscope CLI - format, compact, browse and search JSON
 *
 * Usage:
 *   cat data.json | jsonscope format
 *   jsonscope tree data.json --ids
 *   jsonscope select '$.items[0]' data.json
 *   jsonscope search "error" data.json --color
 *   jsonscope ui data.json -o formatted.json
 */

import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig, validateConfig, type JsonScopeConfig } from './jsonscope/config.js';
import { JsonScopeError, ParseError, errorMessage } from './jsonscope/errors.js';
import { printMetrics } from './jsonscope/debug.js';
import { parse } from './jsonscope/parser.js';
import { serialize } from './jsonscope/serializer.js';
import { expand } from './jsonscope/expansion.js';
import { displayText, findNode, project, visibleRows } from './jsonscope/tree-projector.js';
import { renderSelection } from './jsonscope/tree-reconstructor.js';
import { currentMatch, describePosition, nextMatch, search } from './jsonscope/search-engine.js';
import { composeHighlights, lineBounds, lineIndexAt } from './jsonscope/highlight.js';
import { NodeFileStore, readStream, type FileStore } from './jsonscope/io.js';
import type { JsonValue, SearchSession } from './jsonscope/types.js';
import { Theme, type TreeConnectors } from './tui/theme.js';
import { paintLine } from './tui/paint.js';

export interface CLIIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readStdin: () => Promise<string>;
  files: FileStore;
  env: NodeJS.ProcessEnv;
  cwd: string;
  setExitCode: (code: number) => void;
}

interface GlobalOptions {
  config?: string;
  stats?: boolean;
}

interface FormatOptions {
  expand: boolean;
  indent?: number;
  output?: string;
  color?: boolean;
}

interface CompactOptions {
  output?: string;
}

interface TreeOptions {
  expand: boolean;
  ids?: boolean;
  ascii?: boolean;
  color?: boolean;
}

interface SearchOptions {
  index?: number;
  color?: boolean;
}

interface UIOptions {
  output?: string;
}

async function readProcessStdin(): Promise<string> {
  if (process.stdin.isTTY) {
    throw new JsonScopeError('No input. Pass a file or pipe JSON via stdin.');
  }
  return readStream(process.stdin);
}

export function defaultIO(): CLIIO {
  return {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    readStdin: readProcessStdin,
    files: new NodeFileStore(),
    env: process.env,
    cwd: process.cwd(),
    setExitCode: (code) => {
      process.exitCode = code;
    },
  };
}

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function describeError(error: unknown): string {
  return error instanceof ParseError ? error.describe() : errorMessage(error);
}

/** ASCII or unicode connectors for a prefix built with the unicode set */
function translateConnectors(prefix: string, connectors: TreeConnectors): string {
  return prefix
    .replaceAll('├─', connectors.branch)
    .replaceAll('└─', connectors.last)
    .replaceAll('│  ', connectors.pipe);
}

export function createProgram(io: CLIIO = defaultIO()): Command {
  const program = new Command();

  program.configureOutput({
    writeOut: (text) => io.stdout(text),
    writeErr: (text) => io.stderr(text),
  });

  const configFor = (): JsonScopeConfig => {
    const { config } = program.opts<GlobalOptions>();
    return loadConfig({ file: config, cwd: io.cwd, env: io.env });
  };

  const readInput = (file: string | undefined): Promise<string> =>
    file ? io.files.read(file) : io.readStdin();

  const load = async (
    file: string | undefined,
    config: JsonScopeConfig,
    expandNested: boolean
  ): Promise<JsonValue> => {
    const text = await readInput(file);
    const options = { maxDepth: config.maxDepth };
    const value = parse(text, options);
    return expandNested ? expand(value, options) : value;
  };

  const emit = async (text: string, output: string | undefined) => {
    if (output) {
      await io.files.write(output, text);
      io.stderr(`✅ Saved ${output}\n`);
    } else {
      io.stdout(`${text}\n`);
    }
  };

  // Every action reports its failure the same way
  const run =
    <A extends unknown[]>(action: (...args: A) => Promise<void>) =>
    async (...args: A): Promise<void> => {
      try {
        await action(...args);
      } catch (error) {
        io.stderr(`❌ Error: ${describeError(error)}\n`);
        io.setExitCode(1);
      }
      if (program.opts<GlobalOptions>().stats) {
        printMetrics();
      }
    };

  program
    .name('jsonscope')
    .description('Format, compact, browse and search JSON')
    .version('0.1.0')
    .option('--config <path>', 'Read settings from this file instead of .jsonscoperc.json')
    .option('--stats', 'Print operation counters to stderr when done');

  program
    .command('format')
    .description('Pretty-print JSON, expanding string values that hold JSON')
    .argument('[file]', 'Input file (stdin when omitted)')
    .option('--no-expand', 'Keep JSON-in-string values as strings')
    .option('--indent <n>', 'Spaces per indentation level', parsePositiveInteger)
    .option('-o, --output <path>', 'Write to a file instead of stdout')
    .option('--color', 'Syntax-colour the output')
    .action(
      run(async (file: string | undefined, options: FormatOptions) => {
        const base = configFor();
        const config =
          options.indent === undefined ? base : validateConfig({ ...base, indent: options.indent });
        const value = await load(file, config, options.expand && config.expandNested);
        const text = serialize(value, 'pretty', { indent: config.indent });

        if (options.color && !options.output) {
          const theme = new Theme(config.theme, { color: true });
          io.stdout(`${text.split('\n').map((line) => theme.colorizeJsonLine(line)).join('\n')}\n`);
          return;
        }
        await emit(text, options.output);
      })
    );

  program
    .command('compact')
    .description('Print JSON on one line without whitespace')
    .argument('[file]', 'Input file (stdin when omitted)')
    .option('-o, --output <path>', 'Write to a file instead of stdout')
    .action(
      run(async (file: string | undefined, options: CompactOptions) => {
        const config = configFor();
        const value = await load(file, config, false);
        await emit(serialize(value, 'compact'), options.output);
      })
    );

  program
    .command('tree')
    .description('Print the display tree')
    .argument('[file]', 'Input file (stdin when omitted)')
    .option('--no-expand', 'Keep JSON-in-string values as strings')
    .option('--ids', 'Show the path id of every node')
    .option('--ascii', 'Draw the tree with ASCII characters')
    .option('--color', 'Colour container labels and ids')
    .action(
      run(async (file: string | undefined, options: TreeOptions) => {
        const config = configFor();
        const value = await load(file, config, options.expand && config.expandNested);
        const theme = new Theme(config.theme, {
          color: Boolean(options.color),
          unicode: !options.ascii,
        });
        const connectors = theme.treeConnectors();

        const lines = visibleRows(project(value)).map((row) => {
          const label =
            row.node.kind === 'scalar'
              ? displayText(row.node)
              : theme.colorize(displayText(row.node), 'primary');
          const id = options.ids ? ` ${theme.colorize(row.node.id, 'muted')}` : '';
          return `${translateConnectors(row.prefix, connectors)}${label}${id}`;
        });
        io.stdout(`${lines.join('\n')}\n`);
      })
    );

  program
    .command('select')
    .description('Print the JSON of one tree node, e.g. $.items[0]')
    .argument('<id>', 'Node id as shown by `tree --ids`')
    .argument('[file]', 'Input file (stdin when omitted)')
    .action(
      run(async (id: string, file: string | undefined) => {
        const config = configFor();
        const value = await load(file, config, config.expandNested);
        const node = findNode(project(value), id);
        if (!node) {
          throw new JsonScopeError(`No node with id ${id}`, { id });
        }

        const selection = renderSelection(node, { indent: config.indent });
        if (selection.fallback) {
          io.stderr('⚠️  Could not rebuild JSON for this node, showing its row text\n');
        }
        io.stdout(`${selection.text}\n`);
      })
    );

  program
    .command('search')
    .description('Find a literal pattern in the formatted JSON')
    .argument('<pattern>', 'Literal text to find (case-sensitive)')
    .argument('[file]', 'Input file (stdin when omitted)')
    .option('--index <n>', 'Make the n-th match current (wraps around)', parsePositiveInteger)
    .option('--color', 'Print the whole result with matches highlighted')
    .action(
      run(async (pattern: string, file: string | undefined, options: SearchOptions) => {
        const config = configFor();
        const value = await load(file, config, config.expandNested);
        const text = serialize(value, 'pretty', { indent: config.indent });

        let session: SearchSession = search(text, pattern);
        for (let i = 1; i < (options.index ?? 1); i++) {
          session = nextMatch(session);
        }

        if (options.color) {
          io.stdout(`${paintResult(text, session, config)}\n`);
        } else {
          const current = session.currentIndex;
          const lines = session.matches.map((match, index) => {
            const bounds = lineBounds(text, match.start);
            const line = lineIndexAt(text, match.start) + 1;
            const column = match.start - bounds.start + 1;
            const marker = index === current ? '>' : ' ';
            return `${marker} ${line}:${column}  ${text.slice(bounds.start, bounds.end)}`;
          });
          if (lines.length > 0) io.stdout(`${lines.join('\n')}\n`);
        }

        io.stderr(
          session.matches.length === 0
            ? `No matches for "${pattern}"\n`
            : `Match ${describePosition(session)}\n`
        );
      })
    );

  program
    .command('ui')
    .description('Open the interactive terminal UI')
    .argument('[file]', 'File to open in the first window')
    .option('-o, --output <path>', 'Where the save action writes the result')
    .action(
      run(async (file: string | undefined, options: UIOptions) => {
        const config = configFor();
        const { renderJsonScope } = await import('./tui/render.js');
        const app = await renderJsonScope({
          config,
          file,
          savePath: options.output,
          files: io.files,
        });
        await app.waitUntilExit();
      })
    );

  program.addHelpText(
    'after',
    `
Examples:
  # Pretty-print with nested JSON strings expanded
  cat response.json | jsonscope format

  # Find node ids, then print one node
  jsonscope tree data.json --ids
  jsonscope select '$.users[0].address' data.json

  # Highlight every match, the second one as current
  jsonscope search "id" data.json --index 2 --color

Environment Variables:
  JSONSCOPE_INDENT         Spaces per indentation level (1-8)
  JSONSCOPE_EXPAND         Expand JSON-in-string values (true/false)
  JSONSCOPE_SEARCH_TARGET  What the UI searches: result or buffer
  JSONSCOPE_MAX_DEPTH      Maximum nesting depth accepted by the parser
  JSONSCOPE_DEBUG          Log operations to stderr
`
  );

  return program;
}

/** Result text with the search highlights painted over syntax colours */
function paintResult(text: string, session: SearchSession, config: JsonScopeConfig): string {
  const theme = new Theme(config.theme, { color: true });
  const match = currentMatch(session);
  const ranges = composeHighlights({
    session,
    cursor: match ? match.start : 0,
    theme: config.theme,
  });

  let start = 0;
  return text
    .split('\n')
    .map((line) => {
      const painted = paintLine(line, start, ranges, config.theme.syntax);
      start += line.length + 1;
      return painted.segments
        .map((segment) =>
          theme.paint(segment.text, {
            foreground: segment.color,
            background: segment.backgroundColor,
            bold: segment.bold,
          })
        )
        .join('');
    })
    .join('\n');
}

function invokedDirectly(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(`❌ Error: ${describeError(error)}`);
      process.exit(1);
    });
}
