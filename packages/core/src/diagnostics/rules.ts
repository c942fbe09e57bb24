import { DiagnosticCode, type RuleInfo } from './types.js';

/**
 * Catalogue of every diagnostic the analyzer can report, in code order.
 */
export const RULES: readonly RuleInfo[] = [
  {
    code: DiagnosticCode.LINE_TOO_LONG,
    name: 'line-too-long',
    description: 'Line is longer than 79 characters',
    origin: 'line',
  },
  {
    code: DiagnosticCode.INDENTATION,
    name: 'indentation',
    description: 'Indentation is not a multiple of four',
    origin: 'line',
  },
  {
    code: DiagnosticCode.SEMICOLON,
    name: 'semicolon',
    description: 'Statement ends with an unnecessary semicolon',
    origin: 'line',
  },
  {
    code: DiagnosticCode.INLINE_COMMENT_SPACING,
    name: 'inline-comment-spacing',
    description: 'Fewer than two spaces before an inline comment',
    origin: 'line',
  },
  {
    code: DiagnosticCode.TODO,
    name: 'todo',
    description: 'Comment contains TODO',
    origin: 'line',
  },
  {
    code: DiagnosticCode.BLANK_LINES,
    name: 'blank-lines',
    description: 'More than two blank lines before this line',
    origin: 'line',
  },
  {
    code: DiagnosticCode.KEYWORD_SPACING,
    name: 'keyword-spacing',
    description: "Too many spaces after 'def' or 'class'",
    origin: 'line',
  },
  {
    code: DiagnosticCode.CLASS_NAME,
    name: 'class-name',
    description: 'Class name is not CamelCase',
    origin: 'line',
  },
  {
    code: DiagnosticCode.FUNCTION_NAME,
    name: 'function-name',
    description: 'Function name is not snake_case',
    origin: 'line',
  },
  {
    code: DiagnosticCode.ARGUMENT_NAME,
    name: 'argument-name',
    description: 'Argument name is not snake_case',
    origin: 'syntax',
  },
  {
    code: DiagnosticCode.VARIABLE_NAME,
    name: 'variable-name',
    description: 'Variable name is not snake_case',
    origin: 'syntax',
  },
  {
    code: DiagnosticCode.MUTABLE_DEFAULT,
    name: 'mutable-default',
    description: 'Default argument value is not a literal constant',
    origin: 'syntax',
  },
];
