/**
 * Tests for the line checkers
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_LINE_CHECKERS,
  lineLengthChecker,
  indentationChecker,
  semicolonChecker,
  inlineCommentSpacingChecker,
  todoChecker,
  blankLinesChecker,
  keywordSpacingChecker,
  classNameChecker,
  functionNameChecker,
} from './line-checkers.js';
import type { LineContext } from './types.js';

const ctx: LineContext = { lineNumber: 1, blankRun: 0 };

// ============================================================================
// S001 Line length
// ============================================================================

describe('lineLengthChecker', () => {
  it('should pass a 79 character line including its terminator', () => {
    const line = `${'x'.repeat(78)}\n`;
    expect(line.length).toBe(79);
    expect(lineLengthChecker.check(line, ctx)).toEqual({ passed: true });
  });

  it('should fail an 80 character line including its terminator', () => {
    const line = `${'x'.repeat(79)}\n`;
    expect(lineLengthChecker.check(line, ctx)).toEqual({ passed: false, message: 'Too long' });
  });

  it('should pass 79 characters on a last line without a terminator', () => {
    expect(lineLengthChecker.check('x'.repeat(79), ctx).passed).toBe(true);
  });

  it('should count characters outside the basic plane once', () => {
    const line = `x = "${'\u{1F600}'.repeat(72)}"\n`;
    expect(line.length).toBe(151);
    expect(lineLengthChecker.check(line, ctx)).toEqual({ passed: true });
  });

  it('should fail a long line of astral characters', () => {
    const line = `x = "${'\u{1F600}'.repeat(74)}"\n`;
    expect(lineLengthChecker.check(line, ctx)).toEqual({ passed: false, message: 'Too long' });
  });

  it('should fire for every length above 79 and never below', () => {
    for (let length = 1; length <= 120; length++) {
      const result = lineLengthChecker.check('a'.repeat(length), ctx);
      expect(result.passed).toBe(length <= 79);
    }
  });
});

// ============================================================================
// S002 Indentation
// ============================================================================

describe('indentationChecker', () => {
  it('should pass indentation in multiples of four', () => {
    expect(indentationChecker.check('x = 1\n', ctx).passed).toBe(true);
    expect(indentationChecker.check('    x = 1\n', ctx).passed).toBe(true);
    expect(indentationChecker.check('        x = 1\n', ctx).passed).toBe(true);
  });

  it('should fail indentation that is not a multiple of four', () => {
    for (const width of [1, 2, 3, 5, 6, 7, 9]) {
      const result = indentationChecker.check(`${' '.repeat(width)}x = 1\n`, ctx);
      expect(result).toEqual({ passed: false, message: 'Indentation is not a multiple of four' });
    }
  });

  it('should count a tab as one character', () => {
    expect(indentationChecker.check('\tx = 1\n', ctx).passed).toBe(false);
    expect(indentationChecker.check('\t\t\t\tx = 1\n', ctx).passed).toBe(true);
  });
});

// ============================================================================
// S003 Semicolon
// ============================================================================

describe('semicolonChecker', () => {
  it('should fail a statement ending in a semicolon', () => {
    expect(semicolonChecker.check('x = 1;\n', ctx)).toEqual({ passed: false, message: 'Unnecessary semicolon' });
  });

  it('should look only at code before the comment', () => {
    expect(semicolonChecker.check('x = 1;  # done\n', ctx).passed).toBe(false);
    expect(semicolonChecker.check('x = 1  # done;\n', ctx).passed).toBe(true);
  });

  it('should ignore trailing whitespace after the semicolon', () => {
    expect(semicolonChecker.check('x = 1;   \n', ctx).passed).toBe(false);
  });

  it('should pass comment-only lines', () => {
    expect(semicolonChecker.check('# a; b;\n', ctx).passed).toBe(true);
    expect(semicolonChecker.check('    # note;\n', ctx).passed).toBe(true);
  });

  it('should pass lines opening a triple-quoted string', () => {
    expect(semicolonChecker.check('"""Docstring;\n', ctx).passed).toBe(true);
    expect(semicolonChecker.check("    '''text;\n", ctx).passed).toBe(true);
  });

  it('should pass a semicolon in the middle of a line', () => {
    expect(semicolonChecker.check('a = 1; b = 2\n', ctx).passed).toBe(true);
  });
});

// ============================================================================
// S004 Inline comment spacing
// ============================================================================

describe('inlineCommentSpacingChecker', () => {
  it('should pass lines without comments', () => {
    expect(inlineCommentSpacingChecker.check('x = 1\n', ctx).passed).toBe(true);
  });

  it('should pass full-line comments', () => {
    expect(inlineCommentSpacingChecker.check('# comment\n', ctx).passed).toBe(true);
    expect(inlineCommentSpacingChecker.check('    # comment\n', ctx).passed).toBe(true);
  });

  it('should pass inline comments after two or more spaces', () => {
    expect(inlineCommentSpacingChecker.check('x = 1  # ok\n', ctx).passed).toBe(true);
    expect(inlineCommentSpacingChecker.check('x = 1 \t# ok\n', ctx).passed).toBe(true);
  });

  it('should fail inline comments after fewer than two spaces', () => {
    const expected = { passed: false, message: 'At least two spaces required before inline comment' };
    expect(inlineCommentSpacingChecker.check('x = 1 # no\n', ctx)).toEqual(expected);
    expect(inlineCommentSpacingChecker.check('x = 1# no\n', ctx)).toEqual(expected);
  });

  it('should only consider the first hash', () => {
    expect(inlineCommentSpacingChecker.check('x = 1  # a # b\n', ctx).passed).toBe(true);
  });
});

// ============================================================================
// S005 TODO
// ============================================================================

describe('todoChecker', () => {
  it('should fail on todo in a comment regardless of case', () => {
    expect(todoChecker.check('# TODO: fix\n', ctx)).toEqual({ passed: false, message: 'TODO found' });
    expect(todoChecker.check('x = 1  # todo later\n', ctx).passed).toBe(false);
    expect(todoChecker.check('x = 1  # ToDo\n', ctx).passed).toBe(false);
  });

  it('should ignore todo outside comments', () => {
    expect(todoChecker.check('todo = []\n', ctx).passed).toBe(true);
  });

  it('should pass comments without todo', () => {
    expect(todoChecker.check('# nothing to see\n', ctx).passed).toBe(true);
  });
});

// ============================================================================
// S006 Blank lines
// ============================================================================

describe('blankLinesChecker', () => {
  it('should never fail on a blank line', () => {
    expect(blankLinesChecker.check('\n', { lineNumber: 5, blankRun: 10 }).passed).toBe(true);
    expect(blankLinesChecker.check('   \n', { lineNumber: 5, blankRun: 10 }).passed).toBe(true);
  });

  it('should allow up to two preceding blank lines', () => {
    expect(blankLinesChecker.check('x = 1\n', { lineNumber: 3, blankRun: 2 }).passed).toBe(true);
  });

  it('should fail after three or more blank lines', () => {
    expect(blankLinesChecker.check('x = 1\n', { lineNumber: 4, blankRun: 3 })).toEqual({
      passed: false,
      message: 'More than two blank lines found before this line',
    });
  });
});

// ============================================================================
// S007 Keyword spacing
// ============================================================================

describe('keywordSpacingChecker', () => {
  it('should fail two spaces after def', () => {
    expect(keywordSpacingChecker.check('def  foo():\n', ctx)).toEqual({
      passed: false,
      message: "Too many spaces after 'def'",
    });
  });

  it('should fail two spaces after class', () => {
    expect(keywordSpacingChecker.check('class   Foo:\n', ctx)).toEqual({
      passed: false,
      message: "Too many spaces after 'class'",
    });
  });

  it('should pass a single space', () => {
    expect(keywordSpacingChecker.check('def foo():\n', ctx).passed).toBe(true);
    expect(keywordSpacingChecker.check('class Foo:\n', ctx).passed).toBe(true);
  });

  it('should not match the keyword inside another word', () => {
    expect(keywordSpacingChecker.check('undef  = 1\n', ctx).passed).toBe(true);
  });
});

// ============================================================================
// S008 Class name
// ============================================================================

describe('classNameChecker', () => {
  it('should fail a class name that is not CamelCase and name it', () => {
    expect(classNameChecker.check('class myClass:\n', ctx)).toEqual({
      passed: false,
      message: "Class name 'myClass' should use CamelCase",
    });
  });

  it('should check classes with base classes', () => {
    expect(classNameChecker.check('class user_model(Base):\n', ctx)).toEqual({
      passed: false,
      message: "Class name 'user_model' should use CamelCase",
    });
  });

  it('should pass CamelCase classes', () => {
    expect(classNameChecker.check('class MyClass:\n', ctx).passed).toBe(true);
    expect(classNameChecker.check('class HTTPServer(Base, Mixin):\n', ctx).passed).toBe(true);
  });

  it('should ignore lines that are not class declarations', () => {
    expect(classNameChecker.check('x = 1\n', ctx).passed).toBe(true);
  });
});

// ============================================================================
// S009 Function name
// ============================================================================

describe('functionNameChecker', () => {
  it('should fail a function name that is not snake_case and name it', () => {
    expect(functionNameChecker.check('def myFunction():\n', ctx)).toEqual({
      passed: false,
      message: "Function name 'myFunction' should use snake_case",
    });
  });

  it('should check async and indented definitions', () => {
    expect(functionNameChecker.check('    async def Fetch(self):\n', ctx)).toEqual({
      passed: false,
      message: "Function name 'Fetch' should use snake_case",
    });
  });

  it('should pass snake_case and dunder names', () => {
    expect(functionNameChecker.check('def parse_line(x):\n', ctx).passed).toBe(true);
    expect(functionNameChecker.check('    def __init__(self):\n', ctx).passed).toBe(true);
    expect(functionNameChecker.check('    def _helper(self):\n', ctx).passed).toBe(true);
  });
});

describe('DEFAULT_LINE_CHECKERS', () => {
  it('should list the line checkers in code order', () => {
    expect(DEFAULT_LINE_CHECKERS.map((checker) => checker.code)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });
});
