/**
 * Line checker type definitions
 */

import type { LineDiagnosticCode } from '../diagnostics/types.js';

/**
 * Per-line state handed to every checker by the pipeline.
 */
export interface LineContext {
  /** 1-based number of the line being checked */
  lineNumber: number;
  /** Consecutive blank lines immediately before this line */
  blankRun: number;
}

export type CheckResult =
  | { passed: true }
  | { passed: false; message: string };

/**
 * A single style rule evaluated against one raw line of text
 * (line terminator included).
 */
export interface LineChecker {
  readonly code: LineDiagnosticCode;
  readonly name: string;
  /** Message reported when the checker has no line-specific one */
  readonly message: string;
  check(line: string, context: LineContext): CheckResult;
}

/**
 * One failed check, as collected by the pipeline.
 */
export interface LineViolation {
  code: LineDiagnosticCode;
  message: string;
}
