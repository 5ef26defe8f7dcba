#!/usr/bin/env node

/**
 * `todo-triage` - local CLI for prioritizing, moving and sorting Markdown todo items.
 *
 * Shares the document API with the stdio server. The bottom-of-file "isMain" guard
 * keeps it from running when imported.
 */

import { resolve as resolvePath } from 'node:path';
import { fileURLToPath } from 'node:url';

import { assertNoUnknownFlags, takeFlag, takeOption } from './args.js';
import type { TodoTriageConfig } from './config.js';
import { resolveConfig, takeConfigOptions } from './config.js';
import type { LineRange } from './todo/api.js';
import {
  listCategories,
  moveItem,
  prioritizeDocument,
  sortDocument,
  toggleCheckboxes,
} from './todo/api.js';
import { createStreamNotifier } from './todo/notify.js';
import type { PrioritizeCollaborator } from './todo/prioritize.js';
import { scriptedCollaborator } from './todo/prioritize.js';
import { createReadlineCollaborator } from './todo/prompt.js';
import { formatCategoryTable } from './todo/view.js';

export interface TriageIo {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

/**
 * Render CLI help text.
 */
function helpText(defaultRoot: string): string {
  return [
    'todo-triage - prioritize, move and sort Markdown todo items',
    '',
    'Usage:',
    '  todo-triage [--root <dir>] [--config <file>] [--debug] [--require-categories] <cmd>',
    '',
    'Commands:',
    '  todo-triage categories <file>',
    '  todo-triage sort <file> [--lines a:b] [--if-match <etag>]',
    '  todo-triage prioritize <file> [--lines a:b] [--new] [--answers k1,k2,...] [--if-match <etag>]',
    '  todo-triage move <file> --line <n> --to <shortcut> [--if-match <etag>]',
    '  todo-triage toggle <file> --lines a:b [--if-match <etag>]',
    '',
    'Answers (prioritize): 1-9 set a priority, a category shortcut moves the item, s skips, q quits.',
    '',
    'Notes:',
    `  Defaults: --root=${defaultRoot}`,
    '  Line numbers are 1-based and inclusive.',
    '  Output: JSON to stdout; prompts, notifications and errors to stderr.',
    '',
  ].join('\n');
}

function writeHelp(io: TriageIo, defaultRoot: string): void {
  io.stdout.write(helpText(defaultRoot));
}

/**
 * Write a JSON value to stdout (pretty-printed).
 */
function writeJson(io: TriageIo, value: unknown): void {
  io.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

function parsePositiveInt(value: string, flagName: string): number {
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new Error(`Invalid ${flagName}: ${JSON.stringify(value)}`);
  }
  return Number(value);
}

/**
 * Parse `--lines a:b` (or a single `n`) into a 1-based inclusive range.
 */
export function parseLineRange(value: string | undefined): LineRange | undefined {
  if (value === undefined) return undefined;
  const [startRaw, endRaw, ...rest] = value.split(':');
  if (startRaw === undefined || rest.length > 0) throw new Error(`Invalid --lines: ${JSON.stringify(value)}`);
  const start = parsePositiveInt(startRaw, '--lines');
  const end = endRaw === undefined ? start : parsePositiveInt(endRaw, '--lines');
  return { start, end };
}

/**
 * Parse `--answers 1,w,s` into the scripted answer list.
 */
function parseAnswers(value: string): string[] {
  return value.split(',').map((answer) => answer.trim());
}

function requirePath(argv: string[]): string {
  const path = argv.shift();
  if (!path || path.startsWith('--')) throw new Error('Missing <file>');
  return path;
}

async function handlePrioritize(config: TodoTriageConfig, argv: string[], io: TriageIo): Promise<number> {
  const path = requirePath(argv);
  const range = parseLineRange(takeOption(argv, '--lines'));
  const skipPrioritized = takeFlag(argv, '--new');
  const answersRaw = takeOption(argv, '--answers');
  const ifMatch = takeOption(argv, '--if-match');
  assertNoUnknownFlags(argv);

  const notify = createStreamNotifier(io.stderr, { debug: config.format.debug });
  let collaborator: PrioritizeCollaborator;
  let close = (): void => {};
  if (answersRaw !== undefined) {
    collaborator = scriptedCollaborator(parseAnswers(answersRaw), notify);
  } else {
    const { categories } = await listCategories(config, { path });
    io.stderr.write(formatCategoryTable(categories));
    const interactive = createReadlineCollaborator(io.stdin, io.stderr, notify);
    collaborator = interactive;
    close = () => interactive.close();
  }

  try {
    const result = await prioritizeDocument(config, { path, range, skipPrioritized, collaborator, ifMatch });
    writeJson(io, result);
    return result.summary.outcome === 'no-categories' ? 1 : 0;
  } finally {
    close();
  }
}

/**
 * Execute one command.
 */
async function handleCommand(
  cmd: string,
  config: TodoTriageConfig,
  argv: string[],
  io: TriageIo
): Promise<number> {
  if (cmd === 'categories') {
    const path = requirePath(argv);
    assertNoUnknownFlags(argv);
    writeJson(io, await listCategories(config, { path }));
    return 0;
  }

  if (cmd === 'sort') {
    const path = requirePath(argv);
    const range = parseLineRange(takeOption(argv, '--lines'));
    const ifMatch = takeOption(argv, '--if-match');
    assertNoUnknownFlags(argv);
    writeJson(io, await sortDocument(config, { path, range, ifMatch }));
    return 0;
  }

  if (cmd === 'prioritize') {
    return await handlePrioritize(config, argv, io);
  }

  if (cmd === 'move') {
    const path = requirePath(argv);
    const lineRaw = takeOption(argv, '--line');
    const shortcut = takeOption(argv, '--to');
    const ifMatch = takeOption(argv, '--if-match');
    assertNoUnknownFlags(argv);
    if (!lineRaw) throw new Error('Missing --line');
    if (!shortcut) throw new Error('Missing --to');
    const line = parsePositiveInt(lineRaw, '--line');
    writeJson(io, await moveItem(config, { path, line, shortcut, ifMatch }));
    return 0;
  }

  if (cmd === 'toggle') {
    const path = requirePath(argv);
    const range = parseLineRange(takeOption(argv, '--lines'));
    const ifMatch = takeOption(argv, '--if-match');
    assertNoUnknownFlags(argv);
    if (!range) throw new Error('Missing --lines');
    writeJson(io, await toggleCheckboxes(config, { path, range, ifMatch }));
    return 0;
  }

  throw new Error(`Unknown command: ${cmd}`);
}

/**
 * Run the CLI with a provided argv array (excluding `node` and script path).
 *
 * Returns an exit code and never calls `process.exit()`.
 */
export async function runTriageCli(
  args: string[],
  io: TriageIo = { stdin: process.stdin, stdout: process.stdout, stderr: process.stderr },
  cwd: string = process.cwd()
): Promise<number> {
  const argv = [...args];

  try {
    if (takeFlag(argv, '--help', '-h') || argv.length === 0) {
      writeHelp(io, cwd);
      return 0;
    }

    const config = resolveConfig(takeConfigOptions(argv), cwd);
    const cmd = argv.shift();
    if (!cmd || cmd === 'help') {
      writeHelp(io, cwd);
      return 0;
    }

    return await handleCommand(cmd, config, argv, io);
  } catch (error) {
    io.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }
}

const isMain = resolvePath(process.argv[1] ?? '') === fileURLToPath(import.meta.url);
if (isMain) {
  const exitCode = await runTriageCli(process.argv.slice(2));
  if (exitCode !== 0) process.exitCode = exitCode;
}
