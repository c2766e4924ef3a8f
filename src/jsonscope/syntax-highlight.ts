/**
 * Line-based syntax colouring for pretty-printed JSON
 *
 * Token ranges are in line-relative offsets and in paint order; a later
 * token wins over an earlier one at the same offset.
 */

export type SyntaxTokenKind = 'key' | 'string' | 'number' | 'boolean' | 'null';

export interface SyntaxToken {
  kind: SyntaxTokenKind;
  start: number;
  length: number;
}

const KEY_PATTERN = /"(.*?)"\s*:/g;
const STRING_PATTERN = /:\s*"([^"]*)"/g;
const LITERAL_PATTERN = /:\s*(true|false|null)(?=\s*(?:[,}\]]|$))/g;
const NUMBER_PATTERN = /:\s*(-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?)(?=\s*(?:[,}\]]|$))/g;

export function highlightSyntax(line: string): SyntaxToken[] {
  const tokens: SyntaxToken[] = [];

  for (const match of line.matchAll(KEY_PATTERN)) {
    tokens.push({ kind: 'key', start: (match.index ?? 0) + 1, length: match[1].length });
  }

  for (const match of line.matchAll(STRING_PATTERN)) {
    const end = (match.index ?? 0) + match[0].length - 1; // before closing quote
    tokens.push({ kind: 'string', start: end - match[1].length, length: match[1].length });
  }

  for (const match of line.matchAll(LITERAL_PATTERN)) {
    const end = (match.index ?? 0) + match[0].length;
    tokens.push({
      kind: match[1] === 'null' ? 'null' : 'boolean',
      start: end - match[1].length,
      length: match[1].length,
    });
  }

  for (const match of line.matchAll(NUMBER_PATTERN)) {
    const end = (match.index ?? 0) + match[0].length;
    tokens.push({ kind: 'number', start: end - match[1].length, length: match[1].length });
  }

  return tokens;
}

export type SyntaxPalette = Record<SyntaxTokenKind, string>;

export const DEFAULT_SYNTAX_PALETTE: SyntaxPalette = {
  key: '#1E90FF',
  string: '#FFA500',
  number: '#56b6c2',
  boolean: '#e5c07b',
  null: '#FF1493',
};
