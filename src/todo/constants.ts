/**
 * Todo list format defaults.
 *
 * These values define the "wire format" of todo documents:
 * - Category headings are level-2 Markdown headings.
 * - Priority tags are bracketed `[pN]` markers embedded in the item text.
 */
export const DEFAULT_CATEGORY_HEADING_PATTERN = '^\\s*##\\s+(.+)$';

/**
 * Pattern recognizing an existing priority tag. The first capture group is the numeral.
 */
export const DEFAULT_PRIORITY_TAG_PATTERN = '\\[p(\\d+)\\]';

/**
 * Template used to write a priority tag onto a list item.
 *
 * Placeholders:
 * - `{marker}`: indentation + list marker (+ checkbox when present)
 * - `{priority}`: the numeral
 * - `{content}`: the bare item text
 */
export const DEFAULT_PRIORITY_TAG_FORMAT = '{marker} [p{priority}] {content}';

/**
 * Keys the prioritizer reads as answers rather than shortcuts: `s` (skip), `q` (quit) and
 * the priority digits. They stay reserved whatever the configured set says.
 */
export const CONTROL_KEYS: readonly string[] = ['s', 'q', '1', '2', '3', '4', '5', '6', '7', '8', '9'];

export const DEFAULT_RESERVED_SHORTCUTS: readonly string[] = [...CONTROL_KEYS];

/** Sentinel shortcut used when every candidate character is taken. */
export const EXHAUSTED_SHORTCUT = '?';

/** Label of the leading sort block when it sits before every category. */
export const UNCATEGORIZED = 'Uncategorized';
