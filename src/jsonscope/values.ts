/**
 * Constructors, equality and native conversion for JSON values
 */

import type {
  JsonArray,
  JsonBoolean,
  JsonContainer,
  JsonEntry,
  JsonNull,
  JsonNumber,
  JsonObject,
  JsonScalar,
  JsonString,
  JsonValue,
} from './types.js';

/** Plain JavaScript shape of a JSON value */
export type NativeJson =
  | null
  | boolean
  | number
  | string
  | NativeJson[]
  | { [key: string]: NativeJson };

const NULL: JsonNull = { kind: 'null' };

export function jsonNull(): JsonNull {
  return NULL;
}

export function jsonBoolean(value: boolean): JsonBoolean {
  return { kind: 'boolean', value };
}

/**
 * Numbers built from JS values use the shortest round-trip text and must be
 * finite. The parser passes the source lexeme instead, which may lie outside
 * double range (`1e400` keeps its text and reads as Infinity).
 */
export function jsonNumber(value: number, text?: string): JsonNumber {
  if (text !== undefined) {
    return { kind: 'number', value, text };
  }
  if (!Number.isFinite(value)) {
    throw new RangeError(`JSON numbers must be finite, got ${value}`);
  }
  return { kind: 'number', value, text: String(value) };
}

export function jsonString(value: string): JsonString {
  return { kind: 'string', value };
}

export function jsonArray(items: readonly JsonValue[]): JsonArray {
  return { kind: 'array', items };
}

/**
 * Build an object from entries; a repeated key replaces the earlier value
 * but keeps the earlier position.
 */
export function jsonObject(entries: readonly JsonEntry[]): JsonObject {
  const positions = new Map<string, number>();
  const unique: JsonEntry[] = [];
  for (const entry of entries) {
    const existing = positions.get(entry.key);
    if (existing === undefined) {
      positions.set(entry.key, unique.length);
      unique.push(entry);
    } else {
      unique[existing] = entry;
    }
  }
  return { kind: 'object', entries: unique };
}

export function isContainer(value: JsonValue): value is JsonContainer {
  return value.kind === 'object' || value.kind === 'array';
}

export function isScalar(value: JsonValue): value is JsonScalar {
  return !isContainer(value);
}

/** Order-sensitive structural equality */
export function jsonEquals(a: JsonValue, b: JsonValue): boolean {
  switch (a.kind) {
    case 'null':
      return b.kind === 'null';
    case 'boolean':
      return b.kind === 'boolean' && a.value === b.value;
    case 'number':
      return (
        b.kind === 'number' &&
        a.value === b.value &&
        (Number.isFinite(a.value) || a.text === b.text)
      );
    case 'string':
      return b.kind === 'string' && a.value === b.value;
    case 'array':
      return (
        b.kind === 'array' &&
        a.items.length === b.items.length &&
        a.items.every((item, index) => jsonEquals(item, b.items[index]))
      );
    case 'object':
      return (
        b.kind === 'object' &&
        a.entries.length === b.entries.length &&
        a.entries.every((entry, index) => {
          const other = b.entries[index];
          return entry.key === other.key && jsonEquals(entry.value, other.value);
        })
      );
  }
}

export function fromNative(value: NativeJson): JsonValue {
  if (value === null) return jsonNull();
  if (Array.isArray(value)) return jsonArray(value.map(fromNative));
  switch (typeof value) {
    case 'boolean':
      return jsonBoolean(value);
    case 'number':
      return jsonNumber(value);
    case 'string':
      return jsonString(value);
    default:
      return jsonObject(
        Object.entries(value).map(([key, item]) => ({
          key,
          value: fromNative(item),
        }))
      );
  }
}

/**
 * Convert to plain JavaScript. Integer-like object keys are reordered by the
 * JS engine, so this is lossy for key order.
 */
export function toNative(value: JsonValue): NativeJson {
  switch (value.kind) {
    case 'null':
      return null;
    case 'boolean':
    case 'number':
    case 'string':
      return value.value;
    case 'array':
      return value.items.map(toNative);
    case 'object': {
      const result: { [key: string]: NativeJson } = {};
      for (const entry of value.entries) {
        Object.defineProperty(result, entry.key, {
          value: toNative(entry.value),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return result;
    }
  }
}

/** Text of a scalar as the tree shows it: strings unquoted */
export function scalarText(value: JsonScalar): string {
  switch (value.kind) {
    case 'null':
      return 'null';
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'number':
      return value.text;
    case 'string':
      return value.value;
  }
}
