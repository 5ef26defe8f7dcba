import type { LineBuffer } from './buffer.js';
import { assertSelection, commitLines } from './buffer.js';
import type { CheckState, Selection } from './model.js';

/**
 * The set of checkbox symbols recognized in list items.
 *
 * In markdown:
 * - ` ` (space) or empty => unchecked
 * - `x`                  => checked
 */
type CheckboxSymbol = ' ' | '' | 'x';

export type ToggleOutcome = 'checked' | 'unchecked' | 'created';

export interface ToggleResult {
  line: string;
  state: ToggleOutcome;
}

const CHECKBOX_LINE_RE = /^(\s*[-*+]\s+)\[([ x]?)\](.*)$/;
const BULLET_LINE_RE = /^(\s*[-*+]\s+)(.*)$/;

/**
 * Convert a check state to its markdown symbol.
 */
function checkStateToSymbol(state: Exclude<CheckState, 'absent'>): CheckboxSymbol {
  return state === 'checked' ? 'x' : ' ';
}

/**
 * Convert a markdown checkbox symbol into a check state.
 */
function symbolToCheckState(symbol: CheckboxSymbol): Exclude<CheckState, 'absent'> {
  return symbol === 'x' ? 'checked' : 'unchecked';
}

function toCheckboxSymbol(raw: string | undefined): CheckboxSymbol {
  if (raw === 'x' || raw === ' ') return raw;
  return '';
}

/**
 * Toggle the checkbox of a bullet item.
 *
 * - `[ ]` / `[]` becomes `[x]` and `[x]` becomes `[ ]`.
 * - A bullet item without a checkbox gets a checked one (`- [x] ...`).
 * - Anything else is not a list item: returns `undefined`.
 */
export function toggleCheckbox(line: string): ToggleResult | undefined {
  const checkbox = CHECKBOX_LINE_RE.exec(line);
  if (checkbox) {
    const current = symbolToCheckState(toCheckboxSymbol(checkbox[2]));
    const next = current === 'checked' ? 'unchecked' : 'checked';
    return {
      line: `${checkbox[1] ?? ''}[${checkStateToSymbol(next)}]${checkbox[3] ?? ''}`,
      state: next,
    };
  }

  const bullet = BULLET_LINE_RE.exec(line);
  if (bullet) {
    return { line: `${bullet[1] ?? ''}[x] ${bullet[2] ?? ''}`, state: 'created' };
  }

  return undefined;
}

export interface ToggleRangeResult {
  toggled: { position: number; state: ToggleOutcome }[];
  /** 0-based positions of lines that are not list items. */
  skipped: number[];
}

/**
 * Toggle every list item in `selection` with one atomic replace.
 */
export function toggleRange(buffer: LineBuffer, selection: Selection): ToggleRangeResult {
  const before = buffer.readLines();
  assertSelection(selection, before.length);

  const after = [...before];
  const result: ToggleRangeResult = { toggled: [], skipped: [] };
  for (let position = selection.start; position <= selection.end; position += 1) {
    const toggled = toggleCheckbox(before[position] ?? '');
    if (!toggled) {
      result.skipped.push(position);
      continue;
    }
    after[position] = toggled.line;
    result.toggled.push({ position, state: toggled.state });
  }

  commitLines(buffer, before, after);
  return result;
}
