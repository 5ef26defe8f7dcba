import { describe, expect, it } from 'vitest';
import { DEFAULT_FORMAT_CONFIG } from '../config.js';
import { MemoryLineBuffer, wholeDocument } from './buffer.js';
import { compileGrammar, isChecked } from './parse.js';
import { sortBuffer, sortRange } from './sort.js';

const grammar = compileGrammar(DEFAULT_FORMAT_CONFIG);

describe('sortRange', () => {
  it('sinks checked items and keeps sub-items with their parent', () => {
    const lines = ['- [x] Fix bug', '- [p1] Prepare', '  - [p2] Slides', '  - [x] Agenda'];
    const result = sortRange(lines, wholeDocument(lines.length), grammar);
    expect(result.lines).toEqual(['- [p1] Prepare', '  - [p2] Slides', '  - [x] Agenda', '- [x] Fix bug']);
    expect(result.blocks).toEqual([{ category: 'Uncategorized', groups: 2 }]);
  });

  it('is stable for equal keys', () => {
    const lines = ['- [p2] a', '- [p2] b', '- c', '- d'];
    expect(sortRange(lines, wholeDocument(4), grammar).lines).toEqual(lines);
  });

  it('sorts each category independently with headings in place', () => {
    const lines = [
      '## Work',
      '- c',
      '- [x] [p1] done',
      '- [p3] b',
      '- [p1] a',
      '## Home',
      '- [p2] y',
      '- [p1] x',
    ];
    const result = sortRange(lines, wholeDocument(lines.length), grammar);
    expect(result.lines).toEqual([
      '## Work',
      '- [p1] a',
      '- [p3] b',
      '- c',
      '- [x] [p1] done',
      '## Home',
      '- [p1] x',
      '- [p2] y',
    ]);
    expect(result.blocks).toEqual([
      { category: 'Work', groups: 4 },
      { category: 'Home', groups: 2 },
    ]);
  });

  it('leaves lines outside the selection alone', () => {
    const lines = ['## Work', '- [p2] b', '- [p1] a', '## Home', '- [p2] y', '- [p1] x'];
    const result = sortRange(lines, { start: 4, end: 5 }, grammar);
    expect(result.lines).toEqual(['## Work', '- [p2] b', '- [p1] a', '## Home', '- [p1] x', '- [p2] y']);
    expect(result.blocks).toEqual([{ category: 'Home', groups: 2 }]);
  });

  it('pins sub-items whose parent lies before the selection', () => {
    const lines = ['- [p2] p', '  - sub', '- [p1] q'];
    expect(sortRange(lines, { start: 1, end: 2 }, grammar).lines).toEqual(lines);
  });

  it('places every checked group after every unchecked one', () => {
    const lines = ['- [x] a', '- b', '- [x] [p1] c', '- [p9] d', '- [ ] e', '- [x] f'];
    const sorted = sortRange(lines, wholeDocument(lines.length), grammar).lines;
    const firstChecked = sorted.findIndex((line) => isChecked(line, grammar));
    expect(sorted.slice(0, firstChecked).every((line) => !isChecked(line, grammar))).toBe(true);
    expect(sorted.slice(firstChecked).every((line) => isChecked(line, grammar))).toBe(true);
    expect(sorted).toEqual(['- [p9] d', '- b', '- [ ] e', '- [x] [p1] c', '- [x] a', '- [x] f']);
  });

  it('rejects bad selections before sorting', () => {
    const lines = ['- a', '- b'];
    expect(() => sortRange(lines, { start: 1, end: 0 }, grammar)).toThrow(/^EMPTY_SELECTION: /);
    expect(() => sortRange(lines, { start: 0, end: 5 }, grammar)).toThrow(/^INVALID_RANGE: /);
  });
});

describe('sortBuffer', () => {
  it('writes the sorted range once and reports no change on a second run', () => {
    const buffer = new MemoryLineBuffer(['- b', '- [p1] a']);
    expect(sortBuffer(buffer, wholeDocument(2), grammar).changed).toBe(true);
    expect(buffer.readLines()).toEqual(['- [p1] a', '- b']);
    expect(sortBuffer(buffer, wholeDocument(2), grammar).changed).toBe(false);
  });
});
