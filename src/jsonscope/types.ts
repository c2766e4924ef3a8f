/**
 * Core type definitions for jsonscope
 * JSON values, display tree nodes, search sessions and highlight ranges
 */

// JSON value model - a tagged union so every consumer can switch on `kind`
// exhaustively. Objects keep an entry list because plain JS objects reorder
// integer-like keys.

export interface JsonNull {
  readonly kind: 'null';
}

export interface JsonBoolean {
  readonly kind: 'boolean';
  readonly value: boolean;
}

export interface JsonNumber {
  readonly kind: 'number';
  readonly value: number;
  /** Source lexeme, reproduced verbatim on serialization */
  readonly text: string;
}

export interface JsonString {
  readonly kind: 'string';
  readonly value: string;
}

export interface JsonArray {
  readonly kind: 'array';
  readonly items: readonly JsonValue[];
}

export interface JsonEntry {
  readonly key: string;
  readonly value: JsonValue;
}

export interface JsonObject {
  readonly kind: 'object';
  readonly entries: readonly JsonEntry[];
}

export type JsonScalar = JsonNull | JsonBoolean | JsonNumber | JsonString;
export type JsonContainer = JsonArray | JsonObject;
export type JsonValue = JsonScalar | JsonContainer;
export type JsonKind = JsonValue['kind'];

export type SerializeMode = 'pretty' | 'compact';

// Display tree

export type TreeNodeKind = 'object' | 'array' | 'scalar';

/** Object key (string) or array index (number) */
export type NodeKey = string | number;

export interface ScalarPayload {
  readonly key?: NodeKey;
  readonly value: JsonScalar;
}

interface TreeNodeBase {
  /** JSONPath of the node: `$`, `$.a`, `$["a b"]`, `$[0]` */
  readonly id: string;
  readonly path: readonly NodeKey[];
  readonly label?: string;
  /** Initial display state */
  readonly expanded: boolean;
}

export interface ContainerNode extends TreeNodeBase {
  readonly kind: 'object' | 'array';
  readonly payload: JsonContainer;
  readonly children: readonly TreeNode[];
}

export interface ScalarNode extends TreeNodeBase {
  readonly kind: 'scalar';
  readonly payload: ScalarPayload;
  readonly children: readonly [];
}

export type TreeNode = ContainerNode | ScalarNode;

// Search

export interface Match {
  readonly start: number;
  readonly length: number;
}

export interface SearchSession {
  readonly pattern: string;
  readonly matches: readonly Match[];
  readonly currentIndex: number | undefined;
  /** Rebuild counter; a newer session always carries a larger version */
  readonly version: number;
}

// Highlighting

export type HighlightLayer = 'current-line' | 'match' | 'current-match';

export interface HighlightStyle {
  readonly foreground?: string;
  readonly background?: string;
  readonly bold?: boolean;
}

export interface HighlightRange {
  readonly layer: HighlightLayer;
  readonly start: number;
  readonly length: number;
  /** Paint the whole row the range starts on */
  readonly fullRow: boolean;
  readonly style: HighlightStyle;
}
