/**
 * Line Checkers
 *
 * Each checker looks at a single raw line. None of them knows about the
 * syntax tree, and the only cross-line state they see is the blank-run
 * count in the `LineContext`.
 *
 * The checks are textual: a `#` or `;` inside a string literal is treated
 * like code.
 */

import { DiagnosticCode } from '../diagnostics/types.js';
import { isFunctionName, isPascalCase } from '../naming/casing.js';
import type { CheckResult, LineChecker, LineContext } from './types.js';

export const MAX_LINE_LENGTH = 79;
export const INDENT_WIDTH = 4;
export const MAX_BLANK_LINES = 2;

const PASS: CheckResult = { passed: true };

function fail(message: string): CheckResult {
  return { passed: false, message };
}

/**
 * Text before the first `#`, or the whole line when there is none.
 */
function codePart(line: string): string {
  const hash = line.indexOf('#');
  return hash === -1 ? line : line.slice(0, hash);
}

// ============================================
// S001 - S006: layout and comments
// ============================================

export const lineLengthChecker: LineChecker = {
  code: DiagnosticCode.LINE_TOO_LONG,
  name: 'line-too-long',
  message: 'Too long',
  check(line) {
    // code points, so an emoji counts once
    return [...line].length > MAX_LINE_LENGTH ? fail(this.message) : PASS;
  },
};

export const indentationChecker: LineChecker = {
  code: DiagnosticCode.INDENTATION,
  name: 'indentation',
  message: 'Indentation is not a multiple of four',
  check(line) {
    const indent = line.length - line.trimStart().length;
    return indent % INDENT_WIDTH === 0 ? PASS : fail(this.message);
  },
};

export const semicolonChecker: LineChecker = {
  code: DiagnosticCode.SEMICOLON,
  name: 'semicolon',
  message: 'Unnecessary semicolon',
  check(line) {
    const code = codePart(line).trimEnd();
    if (code.length === 0) {
      return PASS;
    }
    const statement = code.trimStart();
    if (statement.startsWith("'''") || statement.startsWith('"""')) {
      return PASS;
    }
    return code.endsWith(';') ? fail(this.message) : PASS;
  },
};

export const inlineCommentSpacingChecker: LineChecker = {
  code: DiagnosticCode.INLINE_COMMENT_SPACING,
  name: 'inline-comment-spacing',
  message: 'At least two spaces required before inline comment',
  check(line) {
    const hash = line.indexOf('#');
    if (hash === -1) {
      return PASS;
    }
    const before = line.slice(0, hash);
    if (before.trim().length === 0) {
      return PASS;
    }
    const trailingSpace = before.length - before.trimEnd().length;
    return trailingSpace >= 2 ? PASS : fail(this.message);
  },
};

export const todoChecker: LineChecker = {
  code: DiagnosticCode.TODO,
  name: 'todo',
  message: 'TODO found',
  check(line) {
    const hash = line.indexOf('#');
    if (hash === -1) {
      return PASS;
    }
    return line.slice(hash).toLowerCase().includes('todo') ? fail(this.message) : PASS;
  },
};

export const blankLinesChecker: LineChecker = {
  code: DiagnosticCode.BLANK_LINES,
  name: 'blank-lines',
  message: 'More than two blank lines found before this line',
  check(line, context: LineContext) {
    if (line.trim().length === 0) {
      return PASS;
    }
    return context.blankRun > MAX_BLANK_LINES ? fail(this.message) : PASS;
  },
};

// ============================================
// S007 - S009: declarations
// ============================================

const KEYWORD_SPACING = /\b(def|class) {2,}[A-Za-z_]/;
const CLASS_DECLARATION = /\bclass\s+(\w+)\s*(?:\([^)]*\))?\s*:/;
const FUNCTION_DECLARATION = /\bdef\s+(\w+)/;

export const keywordSpacingChecker: LineChecker = {
  code: DiagnosticCode.KEYWORD_SPACING,
  name: 'keyword-spacing',
  message: "Too many spaces after 'def'",
  check(line) {
    const match = KEYWORD_SPACING.exec(line);
    if (!match) {
      return PASS;
    }
    return fail(`Too many spaces after '${match[1] ?? 'def'}'`);
  },
};

export const classNameChecker: LineChecker = {
  code: DiagnosticCode.CLASS_NAME,
  name: 'class-name',
  message: 'Class name should use CamelCase',
  check(line) {
    const name = CLASS_DECLARATION.exec(line)?.[1];
    if (name === undefined || isPascalCase(name)) {
      return PASS;
    }
    return fail(`Class name '${name}' should use CamelCase`);
  },
};

export const functionNameChecker: LineChecker = {
  code: DiagnosticCode.FUNCTION_NAME,
  name: 'function-name',
  message: 'Function name should use snake_case',
  check(line) {
    const name = FUNCTION_DECLARATION.exec(line)?.[1];
    if (name === undefined || isFunctionName(name)) {
      return PASS;
    }
    return fail(`Function name '${name}' should use snake_case`);
  },
};

/**
 * All line checkers in evaluation order.
 */
export const DEFAULT_LINE_CHECKERS: readonly LineChecker[] = [
  lineLengthChecker,
  indentationChecker,
  semicolonChecker,
  inlineCommentSpacingChecker,
  todoChecker,
  blankLinesChecker,
  keywordSpacingChecker,
  classNameChecker,
  functionNameChecker,
];
