/**
 * Parsed representation of todo list lines and the structures derived from them.
 *
 * Notes:
 * - Line numbers are 0-based to match typical array indexing in JS/TS.
 * - `indent` keeps the leading whitespace verbatim (tabs included).
 * - Nothing here is persisted: every structure is recomputed per operation.
 */
export type CheckState = 'unchecked' | 'checked' | 'absent';

export type BulletSymbol = '-' | '*' | '+';

export type ListMarker =
  | { kind: 'bullet'; symbol: BulletSymbol }
  | { kind: 'ordinal'; value: number }
  | { kind: 'none' };

export interface ParsedLine {
  /** Leading whitespace, verbatim. */
  indent: string;
  /** Count of leading whitespace characters. */
  indentWidth: number;
  marker: ListMarker;
  /** Raw marker text including trailing whitespace (`"- "`, `"3. "`), or `""`. */
  markerText: string;
  isHeading: boolean;
  checkState: CheckState;
  priority?: number;
  /** Text with marker, checkbox and priority tag stripped (trimmed). */
  content: string;
}

export interface Category {
  /** Heading text. */
  name: string;
  /** Single character, unique within one scan. */
  shortcut: string;
  /** 0-based line index of the heading. */
  startPosition: number;
}

export interface ItemGroup {
  /** 0-based line index of the parent line. */
  position: number;
  parent: string;
  /** Immediately following, more-indented lines (verbatim). */
  subItems: string[];
}

/**
 * Inclusive 0-based line range.
 */
export interface Selection {
  start: number;
  end: number;
}
