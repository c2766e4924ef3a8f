/**
 * JSON serializer - JsonValue to text
 *
 * pretty:  one key/element per line, `indent` spaces per depth, ": " after keys
 * compact: no insignificant whitespace, "," and ":" separators
 *
 * Non-ASCII characters are written literally in both modes.
 */

import type { JsonValue, SerializeMode } from './types.js';

export interface SerializeOptions {
  /** Spaces per depth in pretty mode */
  indent?: number;
}

export const DEFAULT_INDENT = 4;

/**
 * Quote a string the way JSON.stringify does: escapes `"`, `\` and control
 * characters, leaves everything else literal.
 */
export function quoteString(value: string): string {
  return JSON.stringify(value);
}

export function serialize(
  value: JsonValue,
  mode: SerializeMode,
  options: SerializeOptions = {}
): string {
  if (mode === 'compact') {
    return writeCompact(value);
  }
  const unit = ' '.repeat(options.indent ?? DEFAULT_INDENT);
  return writePretty(value, unit, '');
}

function writeCompact(value: JsonValue): string {
  switch (value.kind) {
    case 'null':
      return 'null';
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'number':
      return value.text;
    case 'string':
      return quoteString(value.value);
    case 'array':
      return `[${value.items.map(writeCompact).join(',')}]`;
    case 'object':
      return `{${value.entries
        .map((entry) => `${quoteString(entry.key)}:${writeCompact(entry.value)}`)
        .join(',')}}`;
  }
}

function writePretty(value: JsonValue, unit: string, current: string): string {
  switch (value.kind) {
    case 'null':
    case 'boolean':
    case 'number':
    case 'string':
      return writeCompact(value);
    case 'array': {
      if (value.items.length === 0) return '[]';
      const inner = current + unit;
      const lines = value.items.map(
        (item) => inner + writePretty(item, unit, inner)
      );
      return `[\n${lines.join(',\n')}\n${current}]`;
    }
    case 'object': {
      if (value.entries.length === 0) return '{}';
      const inner = current + unit;
      const lines = value.entries.map(
        (entry) =>
          `${inner}${quoteString(entry.key)}: ${writePretty(entry.value, unit, inner)}`
      );
      return `{\n${lines.join(',\n')}\n${current}}`;
    }
  }
}
