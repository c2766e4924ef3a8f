/**
 * JSON parser - text to JsonValue
 *
 * Recursive descent over RFC 8259 JSON. Object key order is kept exactly as
 * written; numbers keep their source lexeme. The first violation raises a
 * ParseError carrying the 1-based line/column of the offending offset.
 *
 * Grammar:
 * value  := object | array | string | number | 'true' | 'false' | 'null'
 * object := '{' [ string ':' value { ',' string ':' value } ] '}'
 * array  := '[' [ value { ',' value } ] ']'
 */

import { ParseError } from './errors.js';
import { countOperation, debugLog } from './debug.js';
import {
  jsonArray,
  jsonBoolean,
  jsonNull,
  jsonNumber,
  jsonObject,
  jsonString,
} from './values.js';
import type { JsonEntry, JsonValue } from './types.js';

export interface ParseOptions {
  /** Deepest allowed container nesting */
  maxDepth?: number;
}

export type ParseResult =
  | { ok: true; value: JsonValue }
  | { ok: false; error: ParseError };

export const DEFAULT_MAX_DEPTH = 512;

const NUMBER_PATTERN = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][-+]?\d+)?/y;

const SIMPLE_ESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  '/': '/',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
};

/**
 * 1-based line and column of an offset; lines are split on LF only, so a
 * CR before the LF counts as a column.
 */
export function positionToLineColumn(
  text: string,
  position: number
): { line: number; column: number } {
  let line = 1;
  let lineStart = 0;
  const end = Math.min(position, text.length);
  for (let i = 0; i < end; i++) {
    if (text.charCodeAt(i) === 10) {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: position - lineStart + 1 };
}

export class JsonScanner {
  private pos = 0;
  private depth = 0;
  private readonly maxDepth: number;

  constructor(
    private readonly input: string,
    options: ParseOptions = {}
  ) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  parseDocument(): JsonValue {
    const value = this.parseValue();
    this.skipWhitespace();
    if (this.pos < this.input.length) {
      this.fail('Extra data', this.pos);
    }
    return value;
  }

  private fail(message: string, position: number): never {
    const { line, column } = positionToLineColumn(this.input, position);
    throw new ParseError(message, line, column, position);
  }

  private skipWhitespace(): void {
    while (this.pos < this.input.length) {
      const char = this.input[this.pos];
      if (char === ' ' || char === '\t' || char === '\n' || char === '\r') {
        this.pos++;
      } else {
        break;
      }
    }
  }

  private parseValue(): JsonValue {
    this.skipWhitespace();
    const char = this.input[this.pos];

    switch (char) {
      case '{':
        return this.parseObject();
      case '[':
        return this.parseArray();
      case '"':
        return jsonString(this.parseString());
      case 't':
        return this.parseLiteral('true', jsonBoolean(true));
      case 'f':
        return this.parseLiteral('false', jsonBoolean(false));
      case 'n':
        return this.parseLiteral('null', jsonNull());
      default:
        return this.parseNumber();
    }
  }

  private parseLiteral(word: string, value: JsonValue): JsonValue {
    if (this.input.startsWith(word, this.pos)) {
      this.pos += word.length;
      return value;
    }
    return this.fail('Expecting value', this.pos);
  }

  private parseNumber(): JsonValue {
    NUMBER_PATTERN.lastIndex = this.pos;
    const match = NUMBER_PATTERN.exec(this.input);
    if (!match) {
      return this.fail('Expecting value', this.pos);
    }
    const text = match[0];
    this.pos += text.length;
    return jsonNumber(Number(text), text);
  }

  private enter(position: number): void {
    this.depth++;
    if (this.depth > this.maxDepth) {
      this.fail('Maximum nesting depth exceeded', position);
    }
  }

  private parseObject(): JsonValue {
    const start = this.pos;
    this.enter(start);
    this.pos++; // Skip '{'
    const entries: JsonEntry[] = [];

    this.skipWhitespace();
    if (this.input[this.pos] === '}') {
      this.pos++;
      this.depth--;
      return jsonObject(entries);
    }

    for (;;) {
      this.skipWhitespace();
      if (this.input[this.pos] !== '"') {
        this.fail('Expecting property name enclosed in double quotes', this.pos);
      }
      const key = this.parseString();

      this.skipWhitespace();
      if (this.input[this.pos] !== ':') {
        this.fail("Expecting ':' delimiter", this.pos);
      }
      this.pos++;

      entries.push({ key, value: this.parseValue() });

      this.skipWhitespace();
      const next = this.input[this.pos];
      if (next === '}') {
        this.pos++;
        break;
      }
      if (next !== ',') {
        this.fail("Expecting ',' delimiter", this.pos);
      }
      this.pos++;
    }

    this.depth--;
    return jsonObject(entries);
  }

  private parseArray(): JsonValue {
    this.enter(this.pos);
    this.pos++; // Skip '['
    const items: JsonValue[] = [];

    this.skipWhitespace();
    if (this.input[this.pos] === ']') {
      this.pos++;
      this.depth--;
      return jsonArray(items);
    }

    for (;;) {
      items.push(this.parseValue());

      this.skipWhitespace();
      const next = this.input[this.pos];
      if (next === ']') {
        this.pos++;
        break;
      }
      if (next !== ',') {
        this.fail("Expecting ',' delimiter", this.pos);
      }
      this.pos++;
    }

    this.depth--;
    return jsonArray(items);
  }

  private parseString(): string {
    const start = this.pos;
    this.pos++; // Skip opening quote
    let value = '';
    let chunkStart = this.pos;

    while (this.pos < this.input.length) {
      const code = this.input.charCodeAt(this.pos);

      if (code === 0x22) {
        value += this.input.slice(chunkStart, this.pos);
        this.pos++;
        return value;
      }

      if (code < 0x20) {
        this.fail('Invalid control character at', this.pos);
      }

      if (code === 0x5c) {
        value += this.input.slice(chunkStart, this.pos);
        value += this.parseEscape(start);
        chunkStart = this.pos;
        continue;
      }

      this.pos++;
    }

    return this.fail('Unterminated string starting at', start);
  }

  private parseEscape(stringStart: number): string {
    const escapeStart = this.pos;
    const char = this.input[this.pos + 1];

    if (char !== undefined && Object.hasOwn(SIMPLE_ESCAPES, char)) {
      this.pos += 2;
      return SIMPLE_ESCAPES[char];
    }

    if (char === 'u') {
      const hex = this.input.slice(this.pos + 2, this.pos + 6);
      if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
        this.fail('Invalid \\uXXXX escape', escapeStart);
      }
      this.pos += 6;
      // Surrogate pairs arrive as two escapes; concatenating the halves
      // rebuilds the code point.
      return String.fromCharCode(parseInt(hex, 16));
    }

    if (char === undefined) {
      // Backslash at end of input
      return this.fail('Unterminated string starting at', stringStart);
    }

    return this.fail('Invalid \\escape', escapeStart);
  }
}

/**
 * Parse JSON text into a JsonValue
 *
 * @throws ParseError on the first syntactic violation
 */
export function parse(text: string, options: ParseOptions = {}): JsonValue {
  countOperation('parses');
  try {
    return new JsonScanner(text, options).parseDocument();
  } catch (error) {
    if (error instanceof ParseError) {
      countOperation('parseFailures');
      debugLog('parse', error.describe(), { position: error.position });
    }
    throw error;
  }
}

export function tryParse(text: string, options: ParseOptions = {}): ParseResult {
  try {
    return { ok: true, value: parse(text, options) };
  } catch (error) {
    if (error instanceof ParseError) {
      return { ok: false, error };
    }
    throw error;
  }
}
