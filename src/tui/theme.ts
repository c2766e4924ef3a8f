/**
 * Theme system for terminal output
 * Colours and tree connectors, with terminal capability detection
 */

import { Chalk, type ChalkInstance } from 'chalk';
import { defaultConfig, type JsonScopeConfig } from '../jsonscope/config.js';
import { highlightSyntax, type SyntaxTokenKind } from '../jsonscope/syntax-highlight.js';
import type { HighlightStyle } from '../jsonscope/types.js';

export type ThemeColors = JsonScopeConfig['theme'];

export interface ThemeOptions {
  /** Force colour on/off instead of detecting it */
  color?: boolean;
  /** Force unicode tree characters on/off instead of detecting them */
  unicode?: boolean;
}

export interface TreeConnectors {
  branch: string;
  last: string;
  pipe: string;
}

const UNICODE_CONNECTORS: TreeConnectors = {
  branch: '├─',
  last: '└─',
  pipe: '│  ',
};

const ASCII_CONNECTORS: TreeConnectors = {
  branch: '+-',
  last: '`-',
  pipe: '|  ',
};

export type StatusColor = 'primary' | 'muted' | 'success' | 'error' | 'warning';

export class Theme {
  readonly supportsColor: boolean;
  readonly supportsUnicode: boolean;
  private readonly chalk: ChalkInstance;

  constructor(
    readonly colors: ThemeColors = defaultConfig().theme,
    options: ThemeOptions = {}
  ) {
    this.supportsColor = options.color ?? this.detectColorSupport();
    this.supportsUnicode = options.unicode ?? this.detectUnicodeSupport();
    this.chalk = new Chalk({ level: this.supportsColor ? 3 : 0 });
  }

  private detectColorSupport(): boolean {
    return (
      process.env.NO_COLOR === undefined &&
      process.env.TERM !== 'dumb' &&
      Boolean(process.stdout.isTTY)
    );
  }

  private detectUnicodeSupport(): boolean {
    const term = process.env.TERM || '';
    const lang = process.env.LANG || '';

    return !term.includes('ascii') && (lang.includes('UTF-8') || lang.includes('utf8'));
  }

  treeConnectors(): TreeConnectors {
    return this.supportsUnicode ? UNICODE_CONNECTORS : ASCII_CONNECTORS;
  }

  syntaxColor(kind: SyntaxTokenKind): string {
    return this.colors.syntax[kind];
  }

  colorize(text: string, color: StatusColor): string {
    switch (color) {
      case 'primary':
        return this.chalk.cyan(text);
      case 'muted':
        return this.chalk.dim(text);
      case 'success':
        return this.chalk.green(text);
      case 'error':
        return this.chalk.red(text);
      case 'warning':
        return this.chalk.yellow(text);
    }
  }

  /** Apply a highlight style (hex colours) to text */
  paint(text: string, style: HighlightStyle): string {
    let painter = this.chalk;
    if (style.foreground) painter = painter.hex(style.foreground);
    if (style.background) painter = painter.bgHex(style.background);
    if (style.bold) painter = painter.bold;
    return painter(text);
  }

  /** Syntax-coloured copy of one line of pretty JSON */
  colorizeJsonLine(line: string): string {
    if (!this.supportsColor) return line;

    const colors: Array<string | undefined> = new Array(line.length).fill(undefined);
    for (const token of highlightSyntax(line)) {
      for (let i = token.start; i < token.start + token.length; i++) {
        colors[i] = this.syntaxColor(token.kind);
      }
    }

    let output = '';
    let runStart = 0;
    for (let i = 1; i <= line.length; i++) {
      if (i === line.length || colors[i] !== colors[runStart]) {
        const run = line.slice(runStart, i);
        const color = colors[runStart];
        output += color ? this.chalk.hex(color)(run) : run;
        runStart = i;
      }
    }
    return output;
  }
}

