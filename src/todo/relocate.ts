import { categoryEnd } from './categories.js';
import { diagnosticError } from './diagnostics.js';
import { collectSubtree } from './group.js';
import type { Category } from './model.js';
import type { LineGrammar } from './parse.js';
import { stripPriority } from './parse.js';

/**
 * Relocation of an item group to the end of another category.
 *
 * The parent line is normalized (priority tag removed, marker spacing fixed); sub-item
 * lines travel byte-for-byte.
 */
export interface RelocationPlan {
  /** 0-based index of the parent line before the move. */
  start: number;
  /** Lines removed: the parent plus its subtree. */
  count: number;
  /** Insertion index in the document *after* the removal; also the parent's new index. */
  insertAt: number;
  /** Rewritten parent line. */
  parentText: string;
}

/**
 * True when the target heading sits inside the group rooted at `parentPosition`.
 */
export function isNestedTarget(
  lines: readonly string[],
  parentPosition: number,
  targetHeadingPosition: number
): boolean {
  const removedEnd = parentPosition + 1 + collectSubtree(lines, parentPosition).length;
  return targetHeadingPosition >= parentPosition && targetHeadingPosition < removedEnd;
}

export function nestedTargetMessage(targetHeadingPosition: number): string {
  return `Cannot move an item into a heading nested under it (line ${targetHeadingPosition + 1})`;
}

/**
 * Work out where a group moves without touching the document.
 *
 * The target section end is looked up after the removal, so a heading that sat below the
 * removed block is shifted up by the removed line count first.
 */
export function planRelocation(
  lines: readonly string[],
  parentPosition: number,
  targetHeadingPosition: number,
  grammar: LineGrammar
): RelocationPlan {
  const parent = lines[parentPosition];
  if (parent === undefined) {
    throw diagnosticError('INVALID_RANGE', `No line at index ${parentPosition}`, parentPosition);
  }
  const count = 1 + collectSubtree(lines, parentPosition).length;
  const removedEnd = parentPosition + count;

  if (isNestedTarget(lines, parentPosition, targetHeadingPosition)) {
    throw diagnosticError('NESTED_TARGET', nestedTargetMessage(targetHeadingPosition), parentPosition);
  }
  const headingAfterRemoval =
    targetHeadingPosition >= removedEnd ? targetHeadingPosition - count : targetHeadingPosition;

  const remaining = [...lines.slice(0, parentPosition), ...lines.slice(removedEnd)];
  return {
    start: parentPosition,
    count,
    insertAt: categoryEnd(remaining, headingAfterRemoval, grammar),
    parentText: stripPriority(parent, grammar),
  };
}

/**
 * Apply a plan to any parallel array (lines, or line handles that carry identity).
 *
 * `rewriteParent` maps the moved parent entry; the rest of the group is kept as is.
 */
export function applyRelocation<T>(
  items: readonly T[],
  plan: RelocationPlan,
  rewriteParent: (item: T) => T
): T[] {
  const next = [...items];
  const [parent, ...subtree] = next.splice(plan.start, plan.count);
  if (parent === undefined) throw new Error(`Invalid relocation start: ${plan.start}`);
  next.splice(plan.insertAt, 0, rewriteParent(parent), ...subtree);
  return next;
}

/**
 * Move the group at `parentPosition` to the end of `target`.
 *
 * Source and target being the same category is not special-cased here.
 */
export function moveToCategory(
  lines: readonly string[],
  parentPosition: number,
  target: Category,
  grammar: LineGrammar
): { lines: string[]; parentPosition: number } {
  const plan = planRelocation(lines, parentPosition, target.startPosition, grammar);
  return {
    lines: applyRelocation(lines, plan, () => plan.parentText),
    parentPosition: plan.insertAt,
  };
}
