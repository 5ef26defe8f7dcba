import type { TodoFormatConfig } from '../config.js';
import { diagnosticError } from './diagnostics.js';
import type { BulletSymbol, CheckState, ListMarker, ParsedLine } from './model.js';

/**
 * Line classifier for todo documents.
 *
 * This is not a general Markdown parser. It only recognizes:
 * - category headings (configurable pattern, level-2 by default)
 * - list markers (`-`, `*`, `+`, `N.`)
 * - a checkbox directly after a bullet marker
 * - priority tags (configurable pattern, `[pN]` by default)
 *
 * Every function takes the compiled `LineGrammar` explicitly; nothing reads shared state.
 */
export interface LineGrammar {
  heading: RegExp;
  priority: RegExp;
  /** Global variant of the priority pattern, swallowing surrounding whitespace. */
  priorityStrip: RegExp;
  tagFormat: string;
}

const LEADING_WS_RE = /^\s*/;
const BULLET_RE = /^([-*+])\s+/;
const ORDINAL_RE = /^(\d+)\.\s+/;
const CHECKBOX_RE = /^\[([ x])\](?:\s+|$)/;

function captureGroupCount(source: string): number {
  const probe = new RegExp(`(?:${source})|`).exec('');
  return probe ? probe.length - 1 : 0;
}

function compilePattern(name: string, source: string, flags = ''): RegExp {
  let compiled: RegExp;
  try {
    compiled = new RegExp(source, flags);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw diagnosticError('INVALID_CONFIG', `Invalid ${name}: ${reason}`);
  }
  if (captureGroupCount(source) < 1) {
    throw diagnosticError('INVALID_CONFIG', `${name} must contain a capture group: ${source}`);
  }
  return compiled;
}

/**
 * Compile the configured patterns once per operation.
 *
 * Throws `INVALID_CONFIG` for patterns that do not compile or lack a capture group.
 */
export function compileGrammar(
  format: Pick<TodoFormatConfig, 'categoryHeadingPattern' | 'priorityTagPattern' | 'priorityTagFormat'>
): LineGrammar {
  const heading = compilePattern('categoryHeadingPattern', format.categoryHeadingPattern);
  const priority = compilePattern('priorityTagPattern', format.priorityTagPattern);
  const priorityStrip = new RegExp(`\\s*(?:${format.priorityTagPattern})\\s*`, 'g');
  if (!format.priorityTagFormat.includes('{priority}')) {
    throw diagnosticError('INVALID_CONFIG', 'priorityTagFormat must contain {priority}');
  }
  return { heading, priority, priorityStrip, tagFormat: format.priorityTagFormat };
}

function leadingWhitespace(line: string): string {
  return LEADING_WS_RE.exec(line)?.[0] ?? '';
}

/** Count of leading whitespace characters. */
export function indentWidth(line: string): number {
  return leadingWhitespace(line).length;
}

/**
 * True if the line is indented by two or more whitespace characters.
 *
 * One level of nesting is modeled: "indented" vs. "not indented".
 */
export function isSubItem(line: string): boolean {
  return indentWidth(line) >= 2;
}

export function isBlankLine(line: string): boolean {
  return line.trim().length === 0;
}

export function isCategoryHeading(line: string, grammar: LineGrammar): boolean {
  return grammar.heading.test(line);
}

/**
 * Heading text of a category line.
 *
 * Callers guard with `isCategoryHeading`; anything else is a programming error.
 */
export function categoryName(line: string, grammar: LineGrammar): string {
  const match = grammar.heading.exec(line);
  if (!match) throw diagnosticError('NOT_A_HEADING', `Not a category heading: ${JSON.stringify(line)}`);
  return (match[1] ?? '').trim();
}

/**
 * Priority numeral from the first priority tag, if any.
 */
export function priorityOf(line: string, grammar: LineGrammar): number | undefined {
  const raw = grammar.priority.exec(line)?.[1];
  if (raw === undefined) return undefined;
  const value = Number(raw);
  return Number.isInteger(value) ? value : undefined;
}

/**
 * Split a line into its indentation and raw list marker (trailing whitespace included).
 *
 * Returns an empty marker for plain text.
 */
export function listMarker(line: string): { indent: string; marker: string } {
  const indent = leadingWhitespace(line);
  const rest = line.slice(indent.length);
  const match = BULLET_RE.exec(rest) ?? ORDINAL_RE.exec(rest);
  return { indent, marker: match?.[0] ?? '' };
}

function markerFromText(markerText: string): ListMarker {
  const bullet = BULLET_RE.exec(markerText);
  if (bullet) return { kind: 'bullet', symbol: toBulletSymbol(bullet[1]) };
  const ordinal = ORDINAL_RE.exec(markerText);
  if (ordinal) return { kind: 'ordinal', value: Number(ordinal[1]) };
  return { kind: 'none' };
}

function toBulletSymbol(symbol: string | undefined): BulletSymbol {
  if (symbol === '*' || symbol === '+') return symbol;
  return '-';
}

function stripPriorityTags(text: string, grammar: LineGrammar): string {
  return text.replace(grammar.priorityStrip, ' ').trim();
}

/**
 * Parse a line into a structured record.
 *
 * The checkbox is only recognized directly after a bullet marker (`- [ ]`, `* [x]`).
 */
export function parseLine(line: string, grammar: LineGrammar): ParsedLine {
  const { indent, marker: markerText } = listMarker(line);
  const marker = markerFromText(markerText);
  let rest = line.slice(indent.length + markerText.length);

  let checkState: CheckState = 'absent';
  if (marker.kind === 'bullet') {
    const checkbox = CHECKBOX_RE.exec(rest);
    if (checkbox) {
      checkState = checkbox[1] === 'x' ? 'checked' : 'unchecked';
      rest = rest.slice(checkbox[0].length);
    }
  }

  return {
    indent,
    indentWidth: indent.length,
    marker,
    markerText,
    isHeading: isCategoryHeading(line, grammar),
    checkState,
    priority: priorityOf(line, grammar),
    content: stripPriorityTags(rest, grammar),
  };
}

export function checkState(line: string, grammar: LineGrammar): CheckState {
  return parseLine(line, grammar).checkState;
}

export function isChecked(line: string, grammar: LineGrammar): boolean {
  return checkState(line, grammar) === 'checked';
}

/**
 * Indentation + content with marker, checkbox and every priority tag removed.
 *
 * Spacing left behind by a removed tag collapses to one space; trailing whitespace goes.
 */
export function bareContent(line: string, grammar: LineGrammar): string {
  const parsed = parseLine(line, grammar);
  return `${parsed.indent}${parsed.content}`;
}

/**
 * Indentation + marker, with the checkbox kept attached to its bullet (`- [ ]`).
 */
function markerPrefix(parsed: ParsedLine): string {
  const base = `${parsed.indent}${parsed.markerText.trimEnd()}`;
  if (parsed.checkState === 'checked') return `${base} [x]`;
  if (parsed.checkState === 'unchecked') return `${base} [ ]`;
  return base;
}

/**
 * Write a priority tag onto a top-level list item.
 *
 * Sub-items and lines without a list marker come back unchanged. Any existing tag is
 * replaced, so re-applying is idempotent.
 */
export function formatWithPriority(line: string, priority: number, grammar: LineGrammar): string {
  if (isSubItem(line)) return line;
  const parsed = parseLine(line, grammar);
  if (parsed.marker.kind === 'none') return line;

  return grammar.tagFormat
    .replaceAll('{marker}', () => markerPrefix(parsed))
    .replaceAll('{priority}', () => String(priority))
    .replaceAll('{content}', () => parsed.content)
    .trimEnd();
}

/**
 * Normalize a line to its untagged form: `indent + marker + " " + content`.
 *
 * Used when an item changes category so it reads as freshly unprioritized.
 */
export function stripPriority(line: string, grammar: LineGrammar): string {
  const parsed = parseLine(line, grammar);
  if (parsed.marker.kind === 'none') return `${parsed.indent}${parsed.content}`;
  return `${markerPrefix(parsed)} ${parsed.content}`.trimEnd();
}
