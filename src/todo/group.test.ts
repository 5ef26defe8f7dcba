import { describe, expect, it } from 'vitest';
import { collectSubtree, flattenGroup, groupBlock, itemGroupAt } from './group.js';

describe('collectSubtree', () => {
  const lines = ['- a', '  - b', '    - c', '  - d', '- e'];

  it('takes every following line that is more indented', () => {
    expect(collectSubtree(lines, 0)).toEqual(['  - b', '    - c', '  - d']);
    expect(collectSubtree(lines, 1)).toEqual(['    - c']);
    expect(collectSubtree(lines, 4)).toEqual([]);
  });

  it('stops at a blank line', () => {
    expect(collectSubtree(['- a', '  - b', '', '  - c'], 0)).toEqual(['  - b']);
  });

  it('returns nothing for a missing parent', () => {
    expect(collectSubtree(lines, 9)).toEqual([]);
  });
});

describe('itemGroupAt', () => {
  it('builds a group with verbatim sub-items', () => {
    expect(itemGroupAt(['- [p1] Prepare', '  - [x] Agenda\t'], 0)).toEqual({
      position: 0,
      parent: '- [p1] Prepare',
      subItems: ['  - [x] Agenda\t'],
    });
  });

  it('rejects an index outside the document', () => {
    expect(() => itemGroupAt(['- a'], 3)).toThrow('Invalid line index: 3');
  });
});

describe('groupBlock', () => {
  it('keeps orphan sub-items apart from the groups', () => {
    const { leading, groups } = groupBlock(['  - orphan', '- a', '  - a1', '- b']);
    expect(leading).toEqual(['  - orphan']);
    expect(groups).toEqual([
      { position: 1, parent: '- a', subItems: ['  - a1'] },
      { position: 3, parent: '- b', subItems: [] },
    ]);
  });

  it('flattens a group back to its lines', () => {
    const [group] = groupBlock(['- a', '  - a1', '  - a2']).groups;
    expect(group && flattenGroup(group)).toEqual(['- a', '  - a1', '  - a2']);
  });
});
