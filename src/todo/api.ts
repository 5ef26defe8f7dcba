import type { TodoTriageConfig } from '../config.js';
import { MemoryLineBuffer, assertSelection, commitLines, joinLines, splitLines, wholeDocument } from './buffer.js';
import type { Eol } from './buffer.js';
import { categoryAt, categoryByShortcut, scanCategories } from './categories.js';
import type { Diagnostic } from './diagnostics.js';
import { diagnosticError, warningDiagnostic } from './diagnostics.js';
import type { Selection } from './model.js';
import { compileGrammar, isBlankLine, isCategoryHeading, isSubItem } from './parse.js';
import type { PrioritizeCollaborator, PrioritizeSummary } from './prioritize.js';
import { prioritize } from './prioritize.js';
import { moveToCategory } from './relocate.js';
import type { SortedBlock } from './sort.js';
import { sortBuffer } from './sort.js';
import type { ToggleOutcome } from './status.js';
import { toggleRange } from './status.js';
import { readTodoFile, writeTodoFile } from './storage.js';
import type { CategoryRow } from './view.js';
import { toCategoryRow } from './view.js';

/**
 * Public API for todo document operations.
 *
 * This module is the boundary between:
 * - filesystem storage (`storage.ts`)
 * - the in-memory host buffer (`buffer.ts`)
 * - the structural algorithms (`sort.ts`, `relocate.ts`, `prioritize.ts`, `status.ts`)
 *
 * Line numbers here are 1-based and inclusive, matching editor UX.
 *
 * Concurrency model:
 * - Mutating operations accept `ifMatch` (etag) for optimistic concurrency.
 * - The etag is a SHA-256 of the full document content.
 */
export interface LineRange {
  start: number;
  end: number;
}

interface LoadedDocument {
  absolutePath: string;
  text: string;
  etag: string;
  eol: Eol;
  endsWithNewline: boolean;
  buffer: MemoryLineBuffer;
}

async function loadDocument(
  config: TodoTriageConfig,
  path: string,
  ifMatch?: string
): Promise<LoadedDocument> {
  const { absolutePath, text, etag } = await readTodoFile(config, path, ifMatch);
  const { lines, eol, endsWithNewline } = splitLines(text);
  return { absolutePath, text, etag, eol, endsWithNewline, buffer: new MemoryLineBuffer(lines) };
}

/**
 * Persist the buffer if it differs from what was read.
 */
async function saveDocument(doc: LoadedDocument): Promise<{ etag: string; changed: boolean }> {
  const newText = joinLines(doc.buffer.readLines(), doc.eol, doc.endsWithNewline);
  if (newText === doc.text) return { etag: doc.etag, changed: false };
  return { etag: await writeTodoFile(doc.absolutePath, newText), changed: true };
}

/**
 * Convert a 1-based inclusive range (or the whole document) into a checked selection.
 */
function toSelection(range: LineRange | undefined, lineCount: number): Selection {
  const selection = range ? { start: range.start - 1, end: range.end - 1 } : wholeDocument(lineCount);
  assertSelection(selection, lineCount);
  return selection;
}

/**
 * List categories with their shortcuts.
 */
export async function listCategories(
  config: TodoTriageConfig,
  options: { path: string }
): Promise<{ categories: CategoryRow[]; warnings: Diagnostic[]; etag: string }> {
  const doc = await loadDocument(config, options.path);
  const grammar = compileGrammar(config.format);
  const scan = scanCategories(doc.buffer.readLines(), grammar, config.format.reservedShortcutChars);
  return { categories: scan.categories.map(toCategoryRow), warnings: scan.diagnostics, etag: doc.etag };
}

export interface SortDocumentOptions {
  path: string;
  range?: LineRange;
  ifMatch?: string;
}

/**
 * Sort a range (default: the whole document) by priority within each category.
 */
export async function sortDocument(
  config: TodoTriageConfig,
  options: SortDocumentOptions
): Promise<{ etag: string; changed: boolean; blocks: SortedBlock[] }> {
  const doc = await loadDocument(config, options.path, options.ifMatch);
  const selection = toSelection(options.range, doc.buffer.lineCount);
  const { blocks } = sortBuffer(doc.buffer, selection, compileGrammar(config.format));
  const { etag, changed } = await saveDocument(doc);
  return { etag, changed, blocks };
}

export interface PrioritizeDocumentOptions {
  path: string;
  range?: LineRange;
  skipPrioritized?: boolean;
  collaborator: PrioritizeCollaborator;
  ifMatch?: string;
}

/**
 * Run an interactive (or scripted) prioritization pass and persist the result.
 *
 * Edits accepted before a `quit` are kept.
 */
export async function prioritizeDocument(
  config: TodoTriageConfig,
  options: PrioritizeDocumentOptions
): Promise<{ etag: string; changed: boolean; summary: PrioritizeSummary }> {
  const doc = await loadDocument(config, options.path, options.ifMatch);
  const selection = toSelection(options.range, doc.buffer.lineCount);
  let summary: PrioritizeSummary;
  try {
    summary = await prioritize(doc.buffer, options.collaborator, {
      selection,
      skipPrioritized: options.skipPrioritized ?? false,
      grammar: compileGrammar(config.format),
      reservedShortcuts: config.format.reservedShortcutChars,
      requireCategories: config.format.requireCategories,
    });
  } catch (error) {
    // Answers accepted before the failure stay on disk.
    await saveDocument(doc);
    throw error;
  }
  const { etag, changed } = await saveDocument(doc);
  return { etag, changed, summary };
}

export interface MoveItemOptions {
  path: string;
  /** 1-based line of the item to move. */
  line: number;
  shortcut: string;
  ifMatch?: string;
}

/**
 * Move one item (with its sub-items) to the end of the category behind `shortcut`.
 *
 * Returns the item's new 1-based line. Moving into the current category is a no-op.
 */
export async function moveItem(
  config: TodoTriageConfig,
  options: MoveItemOptions
): Promise<{ etag: string; changed: boolean; line: number; category: string }> {
  const doc = await loadDocument(config, options.path, options.ifMatch);
  const grammar = compileGrammar(config.format);
  const lines = doc.buffer.readLines();
  const position = options.line - 1;
  assertSelection({ start: position, end: position }, lines.length);

  const text = lines[position] ?? '';
  if (isCategoryHeading(text, grammar)) {
    throw diagnosticError('NOT_A_LIST_ITEM', 'Cannot move a category heading', position);
  }
  if (isSubItem(text)) {
    throw diagnosticError('NOT_A_LIST_ITEM', 'Cannot move a sub-item on its own', position);
  }
  if (isBlankLine(text)) {
    throw diagnosticError('NOT_A_LIST_ITEM', 'No list item on a blank line', position);
  }

  const { categories } = scanCategories(lines, grammar, config.format.reservedShortcutChars);
  if (categories.length === 0) throw diagnosticError('NO_CATEGORIES', 'No categories found in document');
  const target = categoryByShortcut(categories, options.shortcut);
  if (!target) {
    throw diagnosticError('UNKNOWN_SHORTCUT', `No category for shortcut ${JSON.stringify(options.shortcut)}`);
  }

  if (categoryAt(position, categories)?.startPosition === target.startPosition) {
    return { etag: doc.etag, changed: false, line: options.line, category: target.name };
  }

  const moved = moveToCategory(lines, position, target, grammar);
  commitLines(doc.buffer, lines, moved.lines);

  const { etag, changed } = await saveDocument(doc);
  return { etag, changed, line: moved.parentPosition + 1, category: target.name };
}

export interface ToggleCheckboxesOptions {
  path: string;
  range: LineRange;
  ifMatch?: string;
}

/**
 * Toggle checkboxes on every list item in a range.
 */
export async function toggleCheckboxes(
  config: TodoTriageConfig,
  options: ToggleCheckboxesOptions
): Promise<{ etag: string; toggled: { line: number; state: ToggleOutcome }[]; warnings: Diagnostic[] }> {
  const doc = await loadDocument(config, options.path, options.ifMatch);
  const selection = toSelection(options.range, doc.buffer.lineCount);
  const result = toggleRange(doc.buffer, selection);
  const { etag } = await saveDocument(doc);
  return {
    etag,
    toggled: result.toggled.map(({ position, state }) => ({ line: position + 1, state })),
    warnings: result.skipped.map((position) =>
      warningDiagnostic('NOT_A_LIST_ITEM', `No list item found on line ${position + 1}`, position)
    ),
  };
}
