/**
 * Structured feedback from scanning and editing todo documents.
 *
 * `line` is a 0-based index; rendering adds one.
 */
export type DiagnosticSeverity = 'error' | 'warning';

export type DiagnosticCode =
  | 'NOT_A_HEADING'
  | 'SHORTCUT_EXHAUSTED'
  | 'NO_CATEGORIES'
  | 'EMPTY_SELECTION'
  | 'INVALID_RANGE'
  | 'UNKNOWN_SHORTCUT'
  | 'NOT_A_LIST_ITEM'
  | 'NESTED_TARGET'
  | 'INVALID_CONFIG';

export interface Diagnostic {
  severity: DiagnosticSeverity;
  code: DiagnosticCode;
  message: string;
  line?: number;
}

export function errorDiagnostic(code: DiagnosticCode, message: string, line?: number): Diagnostic {
  return { severity: 'error', code, message, line };
}

export function warningDiagnostic(code: DiagnosticCode, message: string, line?: number): Diagnostic {
  return { severity: 'warning', code, message, line };
}

/**
 * `CODE@line: message`, or `CODE: message` without a line.
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const at = diagnostic.line !== undefined ? `@${diagnostic.line + 1}` : '';
  return `${diagnostic.code}${at}: ${diagnostic.message}`;
}

/**
 * An `Error` whose message starts with the code, so callers can match on it.
 */
export function diagnosticError(code: DiagnosticCode, message: string, line?: number): Error {
  return new Error(formatDiagnostic(errorDiagnostic(code, message, line)));
}
