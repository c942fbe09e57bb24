/**
 * Diagnostic type definitions
 *
 * A diagnostic is one reported style violation. Codes 1-9 come from the
 * line checkers, codes 10-12 from the syntax fact extractor.
 */

// ============================================
// Diagnostic Codes
// ============================================

export const DiagnosticCode = {
  LINE_TOO_LONG: 1,
  INDENTATION: 2,
  SEMICOLON: 3,
  INLINE_COMMENT_SPACING: 4,
  TODO: 5,
  BLANK_LINES: 6,
  KEYWORD_SPACING: 7,
  CLASS_NAME: 8,
  FUNCTION_NAME: 9,
  ARGUMENT_NAME: 10,
  VARIABLE_NAME: 11,
  MUTABLE_DEFAULT: 12,
} as const;

export type DiagnosticCode = (typeof DiagnosticCode)[keyof typeof DiagnosticCode];

/** Codes a line checker may report */
export type LineDiagnosticCode = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

/** Codes reserved for facts extracted from the syntax tree */
export type SyntaxDiagnosticCode = 10 | 11 | 12;

/**
 * Where a diagnostic came from. Tree-derived diagnostics sort ahead of
 * line-derived ones on the same line.
 */
export type DiagnosticOrigin = 'syntax' | 'line';

// ============================================
// Diagnostic
// ============================================

export interface Diagnostic {
  /** 1-based line number */
  readonly line: number;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly filePath: string;
  readonly origin: DiagnosticOrigin;
}

/**
 * Result of analyzing one file: its diagnostics in line order.
 */
export interface AnalysisResult {
  readonly filePath: string;
  readonly diagnostics: readonly Diagnostic[];
}

/**
 * Static description of a diagnostic code, used by `stylelens rules`.
 */
export interface RuleInfo {
  code: DiagnosticCode;
  name: string;
  description: string;
  origin: DiagnosticOrigin;
}
