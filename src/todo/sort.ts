import type { LineBuffer } from './buffer.js';
import { assertSelection, commitLines } from './buffer.js';
import { categoryAt, scanCategories } from './categories.js';
import { UNCATEGORIZED } from './constants.js';
import { flattenGroup, groupBlock } from './group.js';
import type { ItemGroup, Selection } from './model.js';
import type { LineGrammar } from './parse.js';
import { categoryName, isCategoryHeading, isChecked, priorityOf } from './parse.js';

/**
 * Category-aware stable sort of a line range.
 *
 * The range is cut into blocks at every heading. Inside a block the heading stays on top
 * and item groups are ordered by:
 * 1. unchecked before checked (parent line only)
 * 2. tagged priority ascending, untagged after tagged
 * 3. original order
 */
export interface SortedBlock {
  category: string;
  groups: number;
}

export interface SortRangeResult {
  lines: string[];
  blocks: SortedBlock[];
}

interface Block {
  category: string;
  heading?: string;
  body: string[];
}

interface SortKey {
  group: ItemGroup;
  checked: boolean;
  priority?: number;
}

function compareKeys(a: SortKey, b: SortKey): number {
  if (a.checked !== b.checked) return a.checked ? 1 : -1;
  if (a.priority !== undefined && b.priority !== undefined) {
    if (a.priority !== b.priority) return a.priority - b.priority;
  } else if (a.priority !== undefined) {
    return -1;
  } else if (b.priority !== undefined) {
    return 1;
  }
  return a.group.position - b.group.position;
}

function partitionBlocks(
  lines: readonly string[],
  selection: Selection,
  grammar: LineGrammar
): Block[] {
  const { categories } = scanCategories(lines, grammar);
  const blocks: Block[] = [];
  let current: Block | undefined;

  for (let position = selection.start; position <= selection.end; position += 1) {
    const line = lines[position] ?? '';
    if (isCategoryHeading(line, grammar)) {
      current = { category: categoryName(line, grammar), heading: line, body: [] };
      blocks.push(current);
    } else if (current) {
      current.body.push(line);
    } else {
      current = { category: categoryAt(position, categories)?.name ?? UNCATEGORIZED, body: [line] };
      blocks.push(current);
    }
  }
  return blocks;
}

function sortBlock(block: Block, grammar: LineGrammar): string[] {
  const { leading, groups } = groupBlock(block.body);
  const keys: SortKey[] = groups.map((group) => ({
    group,
    checked: isChecked(group.parent, grammar),
    priority: priorityOf(group.parent, grammar),
  }));
  keys.sort(compareKeys);

  const out = block.heading !== undefined ? [block.heading] : [];
  out.push(...leading);
  for (const key of keys) out.push(...flattenGroup(key.group));
  return out;
}

/**
 * Sort `selection` and return the whole document with that range replaced.
 */
export function sortRange(
  lines: readonly string[],
  selection: Selection,
  grammar: LineGrammar
): SortRangeResult {
  assertSelection(selection, lines.length);
  const blocks = partitionBlocks(lines, selection, grammar);

  const sorted: string[] = [];
  const summary: SortedBlock[] = [];
  for (const block of blocks) {
    sorted.push(...sortBlock(block, grammar));
    summary.push({ category: block.category, groups: groupBlock(block.body).groups.length });
  }

  return {
    lines: [...lines.slice(0, selection.start), ...sorted, ...lines.slice(selection.end + 1)],
    blocks: summary,
  };
}

/**
 * Sort a range of a host buffer in one atomic replace.
 */
export function sortBuffer(
  buffer: LineBuffer,
  selection: Selection,
  grammar: LineGrammar
): SortRangeResult & { changed: boolean } {
  const before = buffer.readLines();
  const result = sortRange(before, selection, grammar);
  const changed = commitLines(buffer, before, result.lines);
  return { ...result, changed };
}
