/**
 * Expansion pass - replace string leaves that hold JSON with the parsed value
 *
 * Pure: returns a new value and shares untouched subtrees with the input.
 * A replacement keeps expanding: a string that parses to another string is
 * tried again, a container is walked. Every successful parse yields a value
 * strictly shorter than its source text, so the loop ends.
 */

import { tryParse, type ParseOptions } from './parser.js';
import { countOperation } from './debug.js';
import { jsonArray, jsonObject } from './values.js';
import type { JsonEntry, JsonValue } from './types.js';

export function expand(value: JsonValue, options: ParseOptions = {}): JsonValue {
  switch (value.kind) {
    case 'null':
    case 'boolean':
    case 'number':
    case 'string':
      // A bare root scalar is left as it is; only leaves inside containers
      // are candidates for expansion.
      return value;
    case 'array':
    case 'object':
      return expandContainer(value, options);
  }
}

function expandContainer(value: JsonValue, options: ParseOptions): JsonValue {
  switch (value.kind) {
    case 'array': {
      let changed = false;
      const items = value.items.map((item) => {
        const next = expandChild(item, options);
        if (next !== item) changed = true;
        return next;
      });
      return changed ? jsonArray(items) : value;
    }
    case 'object': {
      let changed = false;
      const entries = value.entries.map((entry): JsonEntry => {
        const next = expandChild(entry.value, options);
        if (next === entry.value) return entry;
        changed = true;
        return { key: entry.key, value: next };
      });
      return changed ? jsonObject(entries) : value;
    }
    default:
      return value;
  }
}

function expandChild(value: JsonValue, options: ParseOptions): JsonValue {
  switch (value.kind) {
    case 'string':
      return expandString(value.value, options) ?? value;
    case 'array':
    case 'object':
      return expandContainer(value, options);
    default:
      return value;
  }
}

/**
 * Fully expanded replacement for a string leaf, or undefined when the text
 * is not JSON.
 */
function expandString(text: string, options: ParseOptions): JsonValue | undefined {
  const result = tryParse(text, options);
  if (!result.ok) return undefined;

  countOperation('expansions');
  const replacement = result.value;
  if (replacement.kind === 'string') {
    return expandString(replacement.value, options) ?? replacement;
  }
  return expandChild(replacement, options);
}

/** True when no string leaf inside a container parses as JSON */
export function isFullyExpanded(value: JsonValue, options: ParseOptions = {}): boolean {
  return expand(value, options) === value;
}
