import type { Category } from './model.js';

/**
 * View/presentation helpers for categories.
 *
 * The scan model (`Category`) uses 0-based positions needed for edits. Tool/CLI output
 * should use 1-based line numbers, so these helpers translate categories into stable
 * JSON shapes and a printable shortcut table.
 */
export type CategoryRow = {
  name: string;
  shortcut: string;
  line: number;
};

export function toCategoryRow(category: Category): CategoryRow {
  return { name: category.name, shortcut: category.shortcut, line: category.startPosition + 1 };
}

/**
 * Shortcut table shown before an interactive run.
 */
export function formatCategoryTable(
  categories: readonly Pick<Category, 'name' | 'shortcut'>[]
): string {
  if (categories.length === 0) {
    return [
      'No categories found. You can only set priorities.',
      'Use 1-9 for priorities, s to skip, or q to quit.',
      '',
    ].join('\n');
  }

  const width = Math.max(...categories.map((category) => category.name.length));
  const rows = categories.map((category) => ` ${category.shortcut}  | ${category.name}`);
  return [
    'Category Shortcuts:',
    'Key | Category',
    '-'.repeat(15 + width),
    ...rows,
    '',
    'Use 1-9 for priorities, letter shortcuts to move between categories, s to skip, or q to quit.',
    '',
  ].join('\n');
}
