/**
 * Diagnostic construction, ordering and formatting.
 */

import type {
  Diagnostic,
  DiagnosticCode,
  DiagnosticOrigin,
  LineDiagnosticCode,
  SyntaxDiagnosticCode,
} from './types.js';

/**
 * Build an immutable diagnostic. Codes 10-12 only come from the syntax
 * tree and codes 1-9 only from the line checkers.
 */
export function createDiagnostic(
  filePath: string,
  line: number,
  code: SyntaxDiagnosticCode,
  message: string,
  origin: 'syntax'
): Diagnostic;
export function createDiagnostic(
  filePath: string,
  line: number,
  code: LineDiagnosticCode,
  message: string,
  origin: 'line'
): Diagnostic;
export function createDiagnostic(
  filePath: string,
  line: number,
  code: DiagnosticCode,
  message: string,
  origin: DiagnosticOrigin
): Diagnostic {
  return Object.freeze({ line, code, message, filePath, origin });
}

/**
 * Render a code as its `S` identifier, e.g. `S007`.
 */
export function formatCode(code: DiagnosticCode): string {
  return `S${String(code).padStart(3, '0')}`;
}

/**
 * Render a diagnostic in the stable one-line format:
 * `{file}: Line {line}: S{code:03d} {message}`
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  return `${diagnostic.filePath}: Line ${diagnostic.line}: ${formatCode(diagnostic.code)} ${diagnostic.message}`;
}

/**
 * Stable sort by line number only. Diagnostics on the same line keep the
 * order they were produced in.
 */
export function sortDiagnostics(diagnostics: readonly Diagnostic[]): Diagnostic[] {
  return [...diagnostics].sort((a, b) => a.line - b.line);
}
