import { diagnosticError } from './diagnostics.js';
import type { Selection } from './model.js';

/**
 * Host document boundary: line-addressable text storage.
 *
 * Positions are 0-based. `replaceLines` is the only mutation and is applied atomically.
 */
export interface LineBuffer {
  readonly lineCount: number;
  readLines(): string[];
  replaceLines(start: number, endExclusive: number, lines: readonly string[]): void;
}

/**
 * Array-backed `LineBuffer`.
 */
export class MemoryLineBuffer implements LineBuffer {
  private lines: string[];

  constructor(lines: readonly string[]) {
    this.lines = [...lines];
  }

  get lineCount(): number {
    return this.lines.length;
  }

  readLines(): string[] {
    return [...this.lines];
  }

  replaceLines(start: number, endExclusive: number, lines: readonly string[]): void {
    if (start < 0 || endExclusive < start || endExclusive > this.lines.length) {
      throw diagnosticError('INVALID_RANGE', `Invalid replace range: ${start}-${endExclusive}`);
    }
    this.lines = [...this.lines.slice(0, start), ...lines, ...this.lines.slice(endExclusive)];
  }
}

export type Eol = '\n' | '\r\n';

export interface SplitText {
  lines: string[];
  eol: Eol;
  endsWithNewline: boolean;
}

function detectEol(text: string): Eol {
  return text.includes('\r\n') ? '\r\n' : '\n';
}

export function splitLines(text: string): SplitText {
  const eol = detectEol(text);
  const endsWithNewline = text.endsWith('\n');
  let lines = text.length === 0 ? [] : text.split(/\r?\n/);
  if (endsWithNewline && lines.length > 0 && lines[lines.length - 1] === '') {
    lines = lines.slice(0, -1);
  }
  return { lines, eol, endsWithNewline };
}

export function joinLines(lines: readonly string[], eol: Eol, endsWithNewline: boolean): string {
  const text = lines.join(eol);
  return endsWithNewline && lines.length > 0 ? `${text}${eol}` : text;
}

/**
 * Validate a selection against a document of `lineCount` lines.
 */
export function assertSelection(selection: Selection, lineCount: number): void {
  if (lineCount === 0) {
    throw diagnosticError('EMPTY_SELECTION', 'Document has no lines');
  }
  if (!Number.isInteger(selection.start) || !Number.isInteger(selection.end)) {
    throw diagnosticError('INVALID_RANGE', `Selection bounds must be integers: ${selection.start}-${selection.end}`);
  }
  if (selection.end < selection.start) {
    throw diagnosticError(
      'EMPTY_SELECTION',
      `Selection is inverted: ${selection.start + 1}-${selection.end + 1}`
    );
  }
  if (selection.start < 0 || selection.end >= lineCount) {
    throw diagnosticError(
      'INVALID_RANGE',
      `Selection ${selection.start + 1}-${selection.end + 1} is outside the document (1-${lineCount})`
    );
  }
}

export function wholeDocument(lineCount: number): Selection {
  return { start: 0, end: lineCount - 1 };
}

/**
 * Smallest span where `before` and `after` differ.
 *
 * Returns `undefined` when the sequences are equal.
 */
export function changedSpan(
  before: readonly string[],
  after: readonly string[]
): { start: number; endExclusive: number; lines: string[] } | undefined {
  let prefix = 0;
  while (prefix < before.length && prefix < after.length && before[prefix] === after[prefix]) {
    prefix += 1;
  }
  if (prefix === before.length && prefix === after.length) return undefined;

  let suffix = 0;
  while (
    suffix < before.length - prefix &&
    suffix < after.length - prefix &&
    before[before.length - 1 - suffix] === after[after.length - 1 - suffix]
  ) {
    suffix += 1;
  }

  return {
    start: prefix,
    endExclusive: before.length - suffix,
    lines: after.slice(prefix, after.length - suffix),
  };
}

/**
 * Write `after` into the buffer as one atomic replace of the span that changed.
 */
export function commitLines(buffer: LineBuffer, before: readonly string[], after: readonly string[]): boolean {
  const span = changedSpan(before, after);
  if (!span) return false;
  buffer.replaceLines(span.start, span.endExclusive, span.lines);
  return true;
}
