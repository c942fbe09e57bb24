import { DEFAULT_LINE_CHECKERS } from './line-checkers.js';
import type { LineChecker, LineContext, LineViolation } from './types.js';

/**
 * Run every checker against one line and collect the failures in checker
 * order.
 */
export function runLineCheckers(
  line: string,
  context: LineContext,
  checkers: readonly LineChecker[] = DEFAULT_LINE_CHECKERS
): LineViolation[] {
  const violations: LineViolation[] = [];

  for (const checker of checkers) {
    const result = checker.check(line, context);
    if (!result.passed) {
      violations.push({ code: checker.code, message: result.message });
    }
  }

  return violations;
}

/**
 * True when a line holds nothing but whitespace.
 */
export function isBlankLine(line: string): boolean {
  return line.trim().length === 0;
}
