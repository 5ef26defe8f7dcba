import { CONTROL_KEYS, DEFAULT_RESERVED_SHORTCUTS, EXHAUSTED_SHORTCUT } from './constants.js';
import type { Diagnostic } from './diagnostics.js';
import { warningDiagnostic } from './diagnostics.js';
import type { Category } from './model.js';
import type { LineGrammar } from './parse.js';
import { categoryName, isCategoryHeading } from './parse.js';

/**
 * Category index: headings in document order with derived one-character shortcuts.
 *
 * Categories carry positions from the scan that produced them; any insert or delete
 * invalidates them, so callers rescan (or track heading identities) after mutating.
 */
export interface CategoryScanResult {
  categories: Category[];
  diagnostics: Diagnostic[];
}

const ALPHABET = 'abcdefghijklmnopqrstuvwxyz';

function firstCharacter(word: string): string | undefined {
  return Array.from(word)[0];
}

/**
 * Candidate shortcuts in precedence order:
 * first character of each word, the other letters of the name, `a`..`z`, then `0`.
 */
function* shortcutCandidates(name: string): Generator<string> {
  for (const word of name.split(/\s+/)) {
    const first = firstCharacter(word);
    if (first !== undefined) yield first.toLowerCase();
  }
  for (const char of name.toLowerCase()) {
    if (char >= 'a' && char <= 'z') yield char;
  }
  yield* ALPHABET;
  yield '0';
}

/**
 * Derive a shortcut for a category name.
 *
 * Reserved characters and the control keys are never returned. When every candidate is taken the sentinel
 * `?` comes back instead of an error, so a scan never aborts.
 */
export function assignShortcut(
  name: string,
  used: ReadonlySet<string>,
  reserved: readonly string[] = DEFAULT_RESERVED_SHORTCUTS
): string {
  const taken = new Set([...used, ...CONTROL_KEYS, ...reserved]);
  for (const candidate of shortcutCandidates(name)) {
    if (!taken.has(candidate)) return candidate;
  }
  return EXHAUSTED_SHORTCUT;
}

/**
 * Scan every line once and collect category headings in encountered order.
 */
export function scanCategories(
  lines: readonly string[],
  grammar: LineGrammar,
  reserved: readonly string[] = DEFAULT_RESERVED_SHORTCUTS
): CategoryScanResult {
  const categories: Category[] = [];
  const diagnostics: Diagnostic[] = [];
  const used = new Set<string>();

  lines.forEach((line, position) => {
    if (!isCategoryHeading(line, grammar)) return;
    const name = categoryName(line, grammar);
    const shortcut = assignShortcut(name, used, reserved);
    if (shortcut === EXHAUSTED_SHORTCUT) {
      diagnostics.push(
        warningDiagnostic('SHORTCUT_EXHAUSTED', `No shortcut left for category: ${name}`, position)
      );
    } else {
      used.add(shortcut);
    }
    categories.push({ name, shortcut, startPosition: position });
  });

  return { categories, diagnostics };
}

/**
 * The category containing `position`: the last one whose heading lies strictly before it.
 */
export function categoryAt(
  position: number,
  categories: readonly Category[]
): Category | undefined {
  for (let index = categories.length - 1; index >= 0; index -= 1) {
    const category = categories[index];
    if (category && category.startPosition < position) return category;
  }
  return undefined;
}

/**
 * Exclusive end of the section starting at `headingPosition`: the next heading or EOF.
 */
export function categoryEnd(
  lines: readonly string[],
  headingPosition: number,
  grammar: LineGrammar
): number {
  for (let index = headingPosition + 1; index < lines.length; index += 1) {
    if (isCategoryHeading(lines[index] ?? '', grammar)) return index;
  }
  return lines.length;
}

export function categoryByShortcut(
  categories: readonly Category[],
  shortcut: string
): Category | undefined {
  if (shortcut === EXHAUSTED_SHORTCUT) return undefined;
  return categories.find((category) => category.shortcut === shortcut);
}
