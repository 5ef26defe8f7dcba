import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import * as z from 'zod';
import { takeFlag, takeOption } from './args.js';
import {
  DEFAULT_CATEGORY_HEADING_PATTERN,
  DEFAULT_PRIORITY_TAG_FORMAT,
  DEFAULT_PRIORITY_TAG_PATTERN,
  DEFAULT_RESERVED_SHORTCUTS,
} from './todo/constants.js';
import { diagnosticError } from './todo/diagnostics.js';

/**
 * How todo lines are recognized and written.
 *
 * Passed explicitly into every operation; there is no shared settings object.
 */
export interface TodoFormatConfig {
  /** Template with `{marker}`, `{priority}` and `{content}` placeholders. */
  priorityTagFormat: string;
  /** Regex source for an existing priority tag; capture group 1 is the numeral. */
  priorityTagPattern: string;
  /** Regex source for a category heading; capture group 1 is the name. */
  categoryHeadingPattern: string;
  /** Characters never assigned as category shortcuts. */
  reservedShortcutChars: string[];
  /** Deliver `debug` notifications. */
  debug: boolean;
  /** Refuse to prioritize when the document has no categories. */
  requireCategories: boolean;
}

/**
 * Runtime configuration for locating and editing todo documents.
 *
 * `rootDir` is treated as a trust boundary: document paths must resolve within it.
 */
export interface TodoTriageConfig {
  rootDir: string;
  format: TodoFormatConfig;
}

export const DEFAULT_FORMAT_CONFIG: TodoFormatConfig = {
  priorityTagFormat: DEFAULT_PRIORITY_TAG_FORMAT,
  priorityTagPattern: DEFAULT_PRIORITY_TAG_PATTERN,
  categoryHeadingPattern: DEFAULT_CATEGORY_HEADING_PATTERN,
  reservedShortcutChars: [...DEFAULT_RESERVED_SHORTCUTS],
  debug: false,
  requireCategories: false,
};

const FormatConfigFileSchema = z
  .object({
    priorityTagFormat: z.string().min(1),
    priorityTagPattern: z.string().min(1),
    categoryHeadingPattern: z.string().min(1),
    reservedShortcutChars: z.array(z.string().length(1)),
    debug: z.boolean(),
    requireCategories: z.boolean(),
  })
  .partial()
  .strict();

/**
 * Validate a config file payload and merge it over `base`.
 *
 * Throws `INVALID_CONFIG` listing every offending field.
 */
export function parseFormatConfig(
  value: unknown,
  base: TodoFormatConfig = DEFAULT_FORMAT_CONFIG
): TodoFormatConfig {
  const result = FormatConfigFileSchema.safeParse(value);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw diagnosticError('INVALID_CONFIG', details);
  }
  return { ...base, ...result.data };
}

/**
 * Read a JSON config file (path relative to `cwd`).
 */
export function readFormatConfigFile(path: string, cwd: string): TodoFormatConfig {
  const absolute = resolve(cwd, path);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(absolute, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw diagnosticError('INVALID_CONFIG', `Cannot read config file ${absolute}: ${reason}`);
  }
  return parseFormatConfig(raw);
}

export interface ConfigOptions {
  root?: string;
  configFile?: string;
  debug?: boolean;
  requireCategories?: boolean;
}

/**
 * Build a config from already-extracted options. Flags win over the config file.
 */
export function resolveConfig(options: ConfigOptions, cwd: string): TodoTriageConfig {
  const rootDir = options.root ? resolve(cwd, options.root) : cwd;
  let format = options.configFile ? readFormatConfigFile(options.configFile, cwd) : DEFAULT_FORMAT_CONFIG;
  if (options.debug) format = { ...format, debug: true };
  if (options.requireCategories) format = { ...format, requireCategories: true };
  return { rootDir, format };
}

/**
 * Remove the global flags from `argv` and return them:
 * `--root <dir>`, `--config <file>`, `--debug` and `--require-categories`.
 */
export function takeConfigOptions(argv: string[]): ConfigOptions {
  return {
    root: takeOption(argv, '--root'),
    configFile: takeOption(argv, '--config'),
    debug: takeFlag(argv, '--debug'),
    requireCategories: takeFlag(argv, '--require-categories'),
  };
}

/**
 * Parse the server's argv into a `TodoTriageConfig`; anything besides the global flags is rejected.
 */
export function loadConfigFromArgs(argv: string[], cwd: string): TodoTriageConfig {
  const args = [...argv];
  const options = takeConfigOptions(args);
  const [unknown] = args;
  if (unknown !== undefined) throw new Error(`Unknown argument: ${unknown}`);
  return resolveConfig(options, cwd);
}
