import type { ItemGroup } from './model.js';
import { indentWidth, isSubItem } from './parse.js';

/**
 * Item grouping: a parent line plus the indented lines that belong to it.
 *
 * Sub-item lines are always returned verbatim; nothing here rewrites text.
 */

/**
 * Lines after `parentPosition` that are strictly more indented than the parent.
 *
 * Stops at the first line indented the same or less, or at end of document.
 */
export function collectSubtree(lines: readonly string[], parentPosition: number): string[] {
  const parent = lines[parentPosition];
  if (parent === undefined) return [];
  const parentIndent = indentWidth(parent);

  const subtree: string[] = [];
  for (let index = parentPosition + 1; index < lines.length; index += 1) {
    const line = lines[index] ?? '';
    if (indentWidth(line) <= parentIndent) break;
    subtree.push(line);
  }
  return subtree;
}

export function itemGroupAt(lines: readonly string[], parentPosition: number): ItemGroup {
  const parent = lines[parentPosition];
  if (parent === undefined) throw new Error(`Invalid line index: ${parentPosition}`);
  return { position: parentPosition, parent, subItems: collectSubtree(lines, parentPosition) };
}

export interface BlockGroups {
  /** Sub-item lines before the first parent (their parent lies outside the block). */
  leading: string[];
  groups: ItemGroup[];
}

/**
 * Group a block of lines for sorting.
 *
 * Every non-sub-item line starts a group and takes the sub-item lines right after it.
 * Positions are relative to the block.
 */
export function groupBlock(lines: readonly string[]): BlockGroups {
  const leading: string[] = [];
  const groups: ItemGroup[] = [];

  let index = 0;
  while (index < lines.length && isSubItem(lines[index] ?? '')) {
    leading.push(lines[index] ?? '');
    index += 1;
  }

  while (index < lines.length) {
    const group: ItemGroup = { position: index, parent: lines[index] ?? '', subItems: [] };
    index += 1;
    while (index < lines.length && isSubItem(lines[index] ?? '')) {
      group.subItems.push(lines[index] ?? '');
      index += 1;
    }
    groups.push(group);
  }

  return { leading, groups };
}

export function flattenGroup(group: ItemGroup): string[] {
  return [group.parent, ...group.subItems];
}
