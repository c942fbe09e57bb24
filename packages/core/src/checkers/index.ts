export type { CheckResult, LineChecker, LineContext, LineViolation } from './types.js';
export {
  DEFAULT_LINE_CHECKERS,
  MAX_LINE_LENGTH,
  INDENT_WIDTH,
  MAX_BLANK_LINES,
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
export { runLineCheckers, isBlankLine } from './pipeline.js';
