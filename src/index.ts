/**
 * jsonscope - parse, format, compact, browse and search JSON
 *
 * Library entry point. The CLI lives in ./cli and the terminal UI in ./tui.
 */

export type {
  JsonValue,
  JsonScalar,
  JsonContainer,
  JsonKind,
  JsonNull,
  JsonBoolean,
  JsonNumber,
  JsonString,
  JsonArray,
  JsonObject,
  JsonEntry,
  SerializeMode,
  TreeNode,
  TreeNodeKind,
  ContainerNode,
  ScalarNode,
  ScalarPayload,
  NodeKey,
  Match,
  SearchSession,
  HighlightLayer,
  HighlightRange,
  HighlightStyle,
} from './jsonscope/types.js';

// Re-export error classes for better error handling
export {
  JsonScopeError,
  ParseError,
  IOError,
  ValidationError,
} from './jsonscope/errors.js';

export {
  parse,
  tryParse,
  positionToLineColumn,
  DEFAULT_MAX_DEPTH,
  type ParseOptions,
  type ParseResult,
} from './jsonscope/parser.js';
export {
  serialize,
  quoteString,
  DEFAULT_INDENT,
  type SerializeOptions,
} from './jsonscope/serializer.js';
export {
  jsonNull,
  jsonBoolean,
  jsonNumber,
  jsonString,
  jsonArray,
  jsonObject,
  jsonEquals,
  fromNative,
  toNative,
  isContainer,
  isScalar,
  scalarText,
  type NativeJson,
} from './jsonscope/values.js';
export { expand, isFullyExpanded } from './jsonscope/expansion.js';
export {
  project,
  displayText,
  findNode,
  countNodes,
  visibleRows,
  containerIds,
  ROOT_ID,
  type VisibleRow,
} from './jsonscope/tree-projector.js';
export {
  reconstruct,
  renderSelection,
  type SelectionText,
} from './jsonscope/tree-reconstructor.js';
export {
  search,
  findMatches,
  nextMatch,
  prevMatch,
  currentMatch,
  emptySession,
  describePosition,
} from './jsonscope/search-engine.js';
export {
  composeHighlights,
  lineBounds,
  lineIndexAt,
  DEFAULT_HIGHLIGHT_THEME,
  type HighlightTheme,
  type ComposeInput,
} from './jsonscope/highlight.js';
export {
  highlightSyntax,
  DEFAULT_SYNTAX_PALETTE,
  type SyntaxToken,
  type SyntaxTokenKind,
  type SyntaxPalette,
} from './jsonscope/syntax-highlight.js';
export {
  FormatterWindow,
  windowTitle,
  WINDOW_TITLE,
  type WindowServices,
  type ProcessOutcome,
} from './jsonscope/formatter-window.js';
export { WindowManager } from './jsonscope/window-manager.js';
export {
  NodeFileStore,
  Osc52Clipboard,
  MemoryClipboard,
  type FileStore,
  type Clipboard,
  type Notifier,
} from './jsonscope/io.js';
export {
  loadConfig,
  validateConfig,
  defaultConfig,
  configFromEnv,
  ConfigSchema,
  RC_FILE_NAME,
  type JsonScopeConfig,
  type ConfigInput,
  type LoadConfigOptions,
} from './jsonscope/config.js';
export { getMetrics, resetMetrics, type OperationMetrics } from './jsonscope/debug.js';
