/**
 * Configuration - defaults, rc file and environment, validated with zod
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { ValidationError, errorMessage } from './errors.js';
import { DEFAULT_MAX_DEPTH } from './parser.js';
import { DEFAULT_INDENT } from './serializer.js';
import { DEFAULT_HIGHLIGHT_THEME } from './highlight.js';
import { DEFAULT_SYNTAX_PALETTE } from './syntax-highlight.js';

export const RC_FILE_NAME = '.jsonscoperc.json';

const Color = z.string().regex(/^#[0-9a-fA-F]{6}$/, 'expected a #rrggbb colour');

const HighlightStyleSchema = z.object({
  foreground: Color.optional(),
  background: Color.optional(),
  bold: z.boolean().optional(),
});

export const ConfigSchema = z.object({
  indent: z.number().int().min(1).max(8).default(DEFAULT_INDENT),
  expandNested: z.boolean().default(true),
  autoFormat: z.boolean().default(true),
  maxDepth: z.number().int().min(1).max(10_000).default(DEFAULT_MAX_DEPTH),
  search: z
    .object({
      target: z.enum(['result', 'buffer']).default('result'),
    })
    .default({}),
  theme: z
    .object({
      currentLine: HighlightStyleSchema.default(DEFAULT_HIGHLIGHT_THEME.currentLine),
      match: HighlightStyleSchema.default(DEFAULT_HIGHLIGHT_THEME.match),
      currentMatch: HighlightStyleSchema.default(DEFAULT_HIGHLIGHT_THEME.currentMatch),
      syntax: z
        .object({
          key: Color.default(DEFAULT_SYNTAX_PALETTE.key),
          string: Color.default(DEFAULT_SYNTAX_PALETTE.string),
          number: Color.default(DEFAULT_SYNTAX_PALETTE.number),
          boolean: Color.default(DEFAULT_SYNTAX_PALETTE.boolean),
          null: Color.default(DEFAULT_SYNTAX_PALETTE.null),
        })
        .default({}),
    })
    .default({}),
});

export type JsonScopeConfig = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

export function defaultConfig(): JsonScopeConfig {
  return ConfigSchema.parse({});
}

/**
 * Validate a partial configuration, filling defaults
 *
 * @throws ValidationError naming the first offending field
 */
export function validateConfig(input: unknown): JsonScopeConfig {
  const result = ConfigSchema.safeParse(input);
  if (!result.success) {
    const [issue] = result.error.issues;
    const field = issue ? issue.path.join('.') : undefined;
    const details = result.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ValidationError(`Invalid configuration: ${details}`, field, {
      issues: result.error.issues,
    });
  }
  return result.data;
}

/** Environment overrides, as a partial config */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};

  if (env.JSONSCOPE_INDENT !== undefined) {
    overrides.indent = Number(env.JSONSCOPE_INDENT);
  }
  if (env.JSONSCOPE_MAX_DEPTH !== undefined) {
    overrides.maxDepth = Number(env.JSONSCOPE_MAX_DEPTH);
  }
  if (env.JSONSCOPE_EXPAND !== undefined) {
    overrides.expandNested = !['0', 'false', 'no'].includes(
      env.JSONSCOPE_EXPAND.toLowerCase()
    );
  }
  if (env.JSONSCOPE_SEARCH_TARGET !== undefined) {
    overrides.search = { target: env.JSONSCOPE_SEARCH_TARGET };
  }

  return overrides;
}

export interface LoadConfigOptions {
  /** Explicit rc file; when absent `.jsonscoperc.json` in `cwd` is tried */
  file?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

function readRcFile(path: string, required: boolean): Record<string, unknown> {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (error) {
    if (!required && isNotFound(error)) return {};
    throw new ValidationError(
      `Cannot read config file ${path}: ${errorMessage(error)}`,
      'file'
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ValidationError(
      `Config file ${path} is not valid JSON: ${errorMessage(error)}`,
      'file'
    );
  }
  if (!isRecord(parsed)) {
    throw new ValidationError(`Config file ${path} must hold a JSON object`, 'file');
  }
  return parsed;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Merge defaults, rc file and environment (later wins)
 */
export function loadConfig(options: LoadConfigOptions = {}): JsonScopeConfig {
  const cwd = options.cwd ?? process.cwd();
  const fromFile = options.file
    ? readRcFile(resolve(cwd, options.file), true)
    : readRcFile(resolve(cwd, RC_FILE_NAME), false);
  const fromEnv = configFromEnv(options.env ?? process.env);

  const merged: Record<string, unknown> = { ...fromFile, ...fromEnv };
  if (isRecord(fromFile.search) || isRecord(fromEnv.search)) {
    merged.search = { ...asRecord(fromFile.search), ...asRecord(fromEnv.search) };
  }
  return validateConfig(merged);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function asRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}
