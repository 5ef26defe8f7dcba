import { describe, expect, it } from 'vitest';
import { DEFAULT_FORMAT_CONFIG } from '../config.js';
import { MemoryLineBuffer, wholeDocument } from './buffer.js';
import { DEFAULT_RESERVED_SHORTCUTS } from './constants.js';
import type { NotifySeverity } from './notify.js';
import { compileGrammar } from './parse.js';
import type { PrioritizeCollaborator, PrioritizeOptions, PromptRequest } from './prioritize.js';
import { parseActionKey, prioritize, scriptedCollaborator } from './prioritize.js';

const grammar = compileGrammar(DEFAULT_FORMAT_CONFIG);

function recorder(keys: readonly string[]) {
  const messages: { message: string; severity: NotifySeverity }[] = [];
  const prompts: PromptRequest[] = [];
  const scripted = scriptedCollaborator(keys, (message, severity) => {
    messages.push({ message, severity });
  });
  const collaborator: PrioritizeCollaborator = {
    notify: scripted.notify,
    promptForAction: (request) => {
      prompts.push(request);
      return scripted.promptForAction(request);
    },
  };
  return { collaborator, messages, prompts };
}

function options(lineCount: number, overrides: Partial<PrioritizeOptions> = {}): PrioritizeOptions {
  return {
    selection: wholeDocument(lineCount),
    skipPrioritized: false,
    grammar,
    reservedShortcuts: DEFAULT_RESERVED_SHORTCUTS,
    requireCategories: false,
    ...overrides,
  };
}

const doc = [
  '## Personal',
  '- Buy groceries',
  '  - milk',
  '- [x] Old thing',
  '- Call mom',
  '## Work',
  '- Finish report',
];

describe('parseActionKey', () => {
  it('maps keys to actions', () => {
    expect(parseActionKey('5')).toEqual({ kind: 'priority', priority: 5 });
    expect(parseActionKey('s')).toEqual({ kind: 'skip' });
    expect(parseActionKey('')).toEqual({ kind: 'skip' });
    expect(parseActionKey('q')).toEqual({ kind: 'quit' });
    expect(parseActionKey('\u001b')).toEqual({ kind: 'quit' });
    expect(parseActionKey(' w ')).toEqual({ kind: 'move', shortcut: 'w' });
    expect(parseActionKey('0')).toEqual({ kind: 'move', shortcut: '0' });
  });
});

describe('prioritize', () => {
  it('walks candidates, re-offering a moved item at its new position', async () => {
    const buffer = new MemoryLineBuffer(doc);
    const { collaborator, messages, prompts } = recorder(['2', 'w', '1', 's']);

    const summary = await prioritize(buffer, collaborator, options(doc.length));

    expect(summary).toEqual({ outcome: 'completed', candidates: 3, prioritized: 2, moved: 1, skipped: 1 });
    expect(buffer.readLines()).toEqual([
      '## Personal',
      '- [p2] Buy groceries',
      '  - milk',
      '- [x] Old thing',
      '## Work',
      '- Finish report',
      '- [p1] Call mom',
    ]);
    expect(prompts.map((p) => [p.position, p.categoryName, p.line])).toEqual([
      [1, 'Personal', '- Buy groceries'],
      [4, 'Personal', '- Call mom'],
      [6, 'Work', '- Call mom'],
      [5, 'Work', '- Finish report'],
    ]);
    expect(messages).toContainEqual({ message: 'Moved to Work', severity: 'info' });
    expect(messages.at(-1)).toEqual({ message: 'Prioritization complete', severity: 'info' });
  });

  it('keeps applied edits when quitting', async () => {
    const buffer = new MemoryLineBuffer(doc);
    const { collaborator } = recorder(['3', 'q']);

    const summary = await prioritize(buffer, collaborator, options(doc.length));

    expect(summary.outcome).toBe('quit');
    expect(summary.prioritized).toBe(1);
    expect(buffer.readLines()[1]).toBe('- [p3] Buy groceries');
    expect(buffer.readLines()[4]).toBe('- Call mom');
  });

  it('quits when the answers run out', async () => {
    const buffer = new MemoryLineBuffer(doc);
    const { collaborator, prompts } = recorder([]);
    expect((await prioritize(buffer, collaborator, options(doc.length))).outcome).toBe('quit');
    expect(prompts).toHaveLength(1);
    expect(buffer.readLines()).toEqual(doc);
  });

  it('strips the priority of a moved item', async () => {
    const lines = ['## Personal', '- [p3] Buy groceries', '## Work', '- Report'];
    const buffer = new MemoryLineBuffer(lines);
    const { collaborator } = recorder(['w', 'q']);

    const summary = await prioritize(buffer, collaborator, options(lines.length));

    expect(summary).toMatchObject({ outcome: 'quit', moved: 1 });
    expect(buffer.readLines()).toEqual(['## Personal', '## Work', '- Report', '- Buy groceries']);
  });

  it('moves an item that sits before every category', async () => {
    const lines = ['- loose', '## Work', '- a'];
    const buffer = new MemoryLineBuffer(lines);
    const { collaborator, prompts } = recorder(['w', 'q']);

    await prioritize(buffer, collaborator, options(lines.length));

    expect(prompts[0]?.categoryName).toBeUndefined();
    expect(buffer.readLines()).toEqual(['## Work', '- a', '- loose']);
  });

  it('passes over tagged items with skipPrioritized', async () => {
    const lines = ['## X', '- [p1] a', '- b'];
    const buffer = new MemoryLineBuffer(lines);
    const { collaborator, prompts } = recorder(['2']);

    const summary = await prioritize(buffer, collaborator, options(lines.length, { skipPrioritized: true }));

    expect(prompts.map((p) => p.line)).toEqual(['- b']);
    expect(summary).toMatchObject({ outcome: 'completed', prioritized: 1 });
    expect(buffer.readLines()).toEqual(['## X', '- [p1] a', '- [p2] b']);
  });

  it('only offers items inside the selection', async () => {
    const buffer = new MemoryLineBuffer(doc);
    const { collaborator, prompts } = recorder(['4']);

    await prioritize(buffer, collaborator, options(doc.length, { selection: { start: 4, end: 4 } }));

    expect(prompts.map((p) => p.position)).toEqual([4]);
    expect(buffer.readLines()[4]).toBe('- [p4] Call mom');
  });

  it('treats a move to the current category as a no-op', async () => {
    const buffer = new MemoryLineBuffer(doc);
    const { collaborator, messages } = recorder(['p', 'q']);

    const summary = await prioritize(buffer, collaborator, options(doc.length));

    expect(summary.moved).toBe(0);
    expect(buffer.readLines()).toEqual(doc);
    expect(messages).toContainEqual({ message: 'Already in Personal', severity: 'info' });
  });

  it('declines a move into a heading nested under the item', async () => {
    const lines = ['## A', '- first', '- item', '  ## B', '  - sub'];
    const buffer = new MemoryLineBuffer(lines);
    const { collaborator, messages, prompts } = recorder(['1', 'b']);

    const summary = await prioritize(buffer, collaborator, options(lines.length));

    expect(summary).toEqual({ outcome: 'completed', candidates: 2, prioritized: 1, moved: 0, skipped: 0 });
    expect(prompts.map((p) => p.position)).toEqual([1, 2]);
    expect(messages).toContainEqual({
      message: 'NESTED_TARGET@3: Cannot move an item into a heading nested under it (line 4)',
      severity: 'warning',
    });
    expect(buffer.readLines()).toEqual(['## A', '- [p1] first', '- item', '  ## B', '  - sub']);
  });

  it('counts a priority answer that leaves the tag as it was', async () => {
    const lines = ['## X', '- [p2] a'];
    const buffer = new MemoryLineBuffer(lines);
    const { collaborator } = recorder(['2']);

    const summary = await prioritize(buffer, collaborator, options(lines.length));

    expect(summary).toMatchObject({ outcome: 'completed', prioritized: 1 });
    expect(buffer.readLines()).toEqual(lines);
  });

  it('moves with s even when the configured reserved set is empty', async () => {
    const lines = ['## Home', '- a', '## Shopping', '- b'];
    const buffer = new MemoryLineBuffer(lines);
    const { collaborator } = recorder(['o', 'q']);

    const summary = await prioritize(buffer, collaborator, options(lines.length, { reservedShortcuts: [] }));

    expect(summary).toMatchObject({ outcome: 'quit', moved: 1, skipped: 0 });
    expect(buffer.readLines()).toEqual(['## Home', '## Shopping', '- b', '- a']);
  });

  it('warns about an unknown shortcut and moves on', async () => {
    const buffer = new MemoryLineBuffer(doc);
    const { collaborator, messages, prompts } = recorder(['z', 'q']);

    await prioritize(buffer, collaborator, options(doc.length));

    expect(messages).toContainEqual({
      message: 'UNKNOWN_SHORTCUT: No category for shortcut "z"',
      severity: 'warning',
    });
    expect(prompts.map((p) => p.position)).toEqual([1, 4]);
  });

  it('sets priorities only when there are no categories', async () => {
    const lines = ['- a', '- b'];
    const buffer = new MemoryLineBuffer(lines);
    const { collaborator, messages } = recorder(['1', 'w']);

    const summary = await prioritize(buffer, collaborator, options(lines.length));

    expect(messages[0]).toEqual({ message: 'No categories found. You can only set priorities.', severity: 'warning' });
    expect(summary).toMatchObject({ outcome: 'completed', prioritized: 1, moved: 0 });
    expect(buffer.readLines()).toEqual(['- [p1] a', '- b']);
  });

  it('refuses to run without categories when they are required', async () => {
    const lines = ['- a', '- b'];
    const buffer = new MemoryLineBuffer(lines);
    const { collaborator, messages, prompts } = recorder(['1']);

    const summary = await prioritize(buffer, collaborator, options(lines.length, { requireCategories: true }));

    expect(summary.outcome).toBe('no-categories');
    expect(prompts).toEqual([]);
    expect(messages).toEqual([{ message: 'NO_CATEGORIES: No categories found in document', severity: 'error' }]);
    expect(buffer.readLines()).toEqual(lines);
  });

  it('rejects a selection outside the document before prompting', async () => {
    const buffer = new MemoryLineBuffer(doc);
    const { collaborator, prompts } = recorder(['1']);
    await expect(
      prioritize(buffer, collaborator, options(doc.length, { selection: { start: 0, end: 40 } }))
    ).rejects.toThrow(/^INVALID_RANGE: /);
    expect(prompts).toEqual([]);
  });
});
