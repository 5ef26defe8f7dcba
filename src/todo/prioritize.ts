import type { LineBuffer } from './buffer.js';
import { assertSelection, commitLines } from './buffer.js';
import { categoryAt, categoryByShortcut, scanCategories } from './categories.js';
import { errorDiagnostic, formatDiagnostic, warningDiagnostic } from './diagnostics.js';
import type { Category, Selection } from './model.js';
import type { Notifier } from './notify.js';
import type { LineGrammar } from './parse.js';
import {
  formatWithPriority,
  isBlankLine,
  isCategoryHeading,
  isChecked,
  isSubItem,
  priorityOf,
} from './parse.js';
import type { RelocationPlan } from './relocate.js';
import { applyRelocation, isNestedTarget, nestedTargetMessage, planRelocation } from './relocate.js';

/**
 * One-item-at-a-time prioritization over a selection.
 *
 * For every candidate item the collaborator is asked for an action: a priority digit, a
 * category shortcut to move the item, skip, or quit. Accepted edits hit the buffer
 * immediately, one atomic replace each; quitting keeps what was already applied.
 *
 * Lines are tracked by identity rather than position: the working copy is an arena of
 * `{ id, text }` entries and candidates/headings hold ids.
 */
export type PrioritizeAction =
  | { kind: 'priority'; priority: number }
  | { kind: 'move'; shortcut: string }
  | { kind: 'skip' }
  | { kind: 'quit' };

export interface PromptRequest {
  line: string;
  /** Current 0-based position of the line. */
  position: number;
  categoryName?: string;
}

export interface PrioritizeCollaborator {
  promptForAction(request: PromptRequest): Promise<PrioritizeAction>;
  notify: Notifier;
}

export interface PrioritizeOptions {
  selection: Selection;
  /** Pass over items that already carry a priority tag. */
  skipPrioritized: boolean;
  grammar: LineGrammar;
  reservedShortcuts: readonly string[];
  /** Refuse to run when the document has no categories. */
  requireCategories: boolean;
}

export type PrioritizeOutcome = 'completed' | 'quit' | 'no-categories';

export interface PrioritizeSummary {
  outcome: PrioritizeOutcome;
  candidates: number;
  prioritized: number;
  moved: number;
  skipped: number;
}

interface ArenaLine {
  id: number;
  text: string;
}

class LineArena {
  private entries: ArenaLine[];

  constructor(lines: readonly string[]) {
    this.entries = lines.map((text, id) => ({ id, text }));
  }

  texts(): string[] {
    return this.entries.map((entry) => entry.text);
  }

  positionOf(id: number): number {
    const position = this.entries.findIndex((entry) => entry.id === id);
    if (position === -1) throw new Error(`Line handle not found: ${id}`);
    return position;
  }

  textOf(id: number): string {
    return this.entries[this.positionOf(id)]?.text ?? '';
  }

  setText(id: number, text: string): void {
    this.entries = this.entries.map((entry) => (entry.id === id ? { id, text } : entry));
  }

  relocate(plan: RelocationPlan): void {
    this.entries = applyRelocation(this.entries, plan, (entry) => ({ ...entry, text: plan.parentText }));
  }
}

/**
 * Map a raw answer to an action: `1`-`9` set a priority, `s` skips, `q` or ESC quits,
 * anything else is a category shortcut.
 */
export function parseActionKey(key: string): PrioritizeAction {
  if (key === '\u001b') return { kind: 'quit' };
  const trimmed = key.trim();
  if (trimmed === 'q' || trimmed === 'quit') return { kind: 'quit' };
  if (trimmed === '' || trimmed === 's' || trimmed === 'skip') return { kind: 'skip' };
  if (/^[1-9]$/.test(trimmed)) return { kind: 'priority', priority: Number(trimmed) };
  return { kind: 'move', shortcut: trimmed };
}

/**
 * A collaborator answering from a fixed list of keys; quits once the list runs out.
 */
export function scriptedCollaborator(keys: readonly string[], notify: Notifier): PrioritizeCollaborator {
  let index = 0;
  return {
    notify,
    async promptForAction() {
      const key = keys[index];
      index += 1;
      return key === undefined ? { kind: 'quit' } : parseActionKey(key);
    },
  };
}

function selectCandidates(
  lines: readonly string[],
  selection: Selection,
  grammar: LineGrammar
): number[] {
  const ids: number[] = [];
  for (let position = selection.start; position <= selection.end; position += 1) {
    const line = lines[position] ?? '';
    if (isBlankLine(line)) continue;
    if (isCategoryHeading(line, grammar) || isSubItem(line) || isChecked(line, grammar)) continue;
    ids.push(position);
  }
  return ids;
}

/**
 * Run the prioritization loop against a buffer.
 *
 * Shortcuts come from a single scan at the start; heading positions follow the headings
 * through every relocation.
 */
export async function prioritize(
  buffer: LineBuffer,
  collaborator: PrioritizeCollaborator,
  options: PrioritizeOptions
): Promise<PrioritizeSummary> {
  const { grammar } = options;
  const notify = collaborator.notify;
  const lines = buffer.readLines();
  assertSelection(options.selection, lines.length);

  const scan = scanCategories(lines, grammar, options.reservedShortcuts);
  for (const diagnostic of scan.diagnostics) notify(formatDiagnostic(diagnostic), 'warning');

  const candidates = selectCandidates(lines, options.selection, grammar);
  const summary: PrioritizeSummary = {
    outcome: 'completed',
    candidates: candidates.length,
    prioritized: 0,
    moved: 0,
    skipped: 0,
  };

  if (scan.categories.length === 0) {
    if (options.requireCategories) {
      notify(formatDiagnostic(errorDiagnostic('NO_CATEGORIES', 'No categories found in document')), 'error');
      return { ...summary, outcome: 'no-categories' };
    }
    notify('No categories found. You can only set priorities.', 'warning');
  }

  const arena = new LineArena(lines);
  // Heading ids equal their scan-time positions.
  const liveCategories = (): Category[] =>
    scan.categories.map((category) => ({
      ...category,
      startPosition: arena.positionOf(category.startPosition),
    }));

  let cursor = 0;
  while (cursor < candidates.length) {
    const id = candidates[cursor];
    if (id === undefined) break;
    const line = arena.textOf(id);
    if (options.skipPrioritized && priorityOf(line, grammar) !== undefined) {
      cursor += 1;
      continue;
    }

    const position = arena.positionOf(id);
    const categories = liveCategories();
    const current = categoryAt(position, categories);
    const action = await collaborator.promptForAction({ line, position, categoryName: current?.name });
    notify(`Line ${position + 1}: ${JSON.stringify(action)}`, 'debug');

    if (action.kind === 'quit') {
      summary.outcome = 'quit';
      break;
    }

    if (action.kind === 'skip') {
      summary.skipped += 1;
      notify('Skipped', 'info');
      cursor += 1;
      continue;
    }

    if (action.kind === 'priority') {
      const before = arena.texts();
      arena.setText(id, formatWithPriority(line, action.priority, grammar));
      commitLines(buffer, before, arena.texts());
      summary.prioritized += 1;
      cursor += 1;
      continue;
    }

    const target = categoryByShortcut(categories, action.shortcut);
    if (!target) {
      notify(`UNKNOWN_SHORTCUT: No category for shortcut ${JSON.stringify(action.shortcut)}`, 'warning');
      cursor += 1;
      continue;
    }
    if (current && current.startPosition === target.startPosition) {
      notify(`Already in ${target.name}`, 'info');
      cursor += 1;
      continue;
    }

    const before = arena.texts();
    if (isNestedTarget(before, position, target.startPosition)) {
      notify(
        formatDiagnostic(warningDiagnostic('NESTED_TARGET', nestedTargetMessage(target.startPosition), position)),
        'warning'
      );
      cursor += 1;
      continue;
    }
    arena.relocate(planRelocation(before, position, target.startPosition, grammar));
    commitLines(buffer, before, arena.texts());
    summary.moved += 1;
    notify(`Moved to ${target.name}`, 'info');
    // The cursor stays put: the moved item is offered again at its new position.
  }

  notify('Prioritization complete', 'info');
  return summary;
}
