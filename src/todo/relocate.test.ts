import { describe, expect, it } from 'vitest';
import { DEFAULT_FORMAT_CONFIG } from '../config.js';
import { scanCategories } from './categories.js';
import type { Category } from './model.js';
import { compileGrammar } from './parse.js';
import { applyRelocation, moveToCategory, planRelocation } from './relocate.js';

const grammar = compileGrammar(DEFAULT_FORMAT_CONFIG);

const doc = [
  '## Personal',
  '- [p2] Buy groceries',
  '  - milk',
  '  - [x] eggs',
  '- Call mom',
  '## Work',
  '- Finish report',
  '## Later',
  '- Read book',
];

function category(name: string): Category {
  const found = scanCategories(doc, grammar).categories.find((c) => c.name === name);
  if (!found) throw new Error(`missing category ${name}`);
  return found;
}

describe('moveToCategory', () => {
  it('moves a group forward to the end of the target section', () => {
    const moved = moveToCategory(doc, 1, category('Work'), grammar);
    expect(moved.lines).toEqual([
      '## Personal',
      '- Call mom',
      '## Work',
      '- Finish report',
      '- Buy groceries',
      '  - milk',
      '  - [x] eggs',
      '## Later',
      '- Read book',
    ]);
    expect(moved.parentPosition).toBe(4);
    expect(moved.lines[moved.parentPosition]).toBe('- Buy groceries');
  });

  it('moves a group backward', () => {
    const moved = moveToCategory(doc, 8, category('Personal'), grammar);
    expect(moved.lines).toEqual([
      '## Personal',
      '- [p2] Buy groceries',
      '  - milk',
      '  - [x] eggs',
      '- Call mom',
      '- Read book',
      '## Work',
      '- Finish report',
      '## Later',
    ]);
    expect(moved.parentPosition).toBe(5);
  });

  it('appends at end of document for the last category', () => {
    const moved = moveToCategory(doc, 6, category('Later'), grammar);
    expect(moved.lines.slice(-3)).toEqual(['## Later', '- Read book', '- Finish report']);
    expect(moved.parentPosition).toBe(8);
  });

  it('keeps the line count', () => {
    expect(moveToCategory(doc, 1, category('Later'), grammar).lines).toHaveLength(doc.length);
  });
});

describe('planRelocation', () => {
  it('counts the parent with its subtree', () => {
    expect(planRelocation(doc, 1, 5, grammar)).toEqual({
      start: 1,
      count: 3,
      insertAt: 4,
      parentText: '- Buy groceries',
    });
  });

  it('rejects a missing line', () => {
    expect(() => planRelocation(doc, 20, 5, grammar)).toThrow(/^INVALID_RANGE@21: /);
  });

  it('rejects a heading nested under the moved item', () => {
    expect(() => planRelocation(['- a', '  ## Nested', '## B'], 0, 1, grammar)).toThrow(
      'NESTED_TARGET@1: Cannot move an item into a heading nested under it (line 2)'
    );
  });
});

describe('applyRelocation', () => {
  it('moves entries by identity and rewrites only the parent', () => {
    const items = [{ id: 0 }, { id: 1 }, { id: 2 }, { id: 3 }];
    const plan = { start: 0, count: 2, insertAt: 2, parentText: '' };
    const next = applyRelocation(items, plan, (item) => ({ id: item.id + 10 }));
    expect(next.map((item) => item.id)).toEqual([2, 3, 10, 1]);
    expect(next[3]).toBe(items[1]);
  });
});
