/**
 * Error types
 *
 * Everything the analyzer raises on purpose extends `StyleLensError` and
 * carries a stable `code`. Style violations are never errors: they are
 * diagnostics returned in the analysis result.
 */

export type StyleLensErrorCode =
  | 'INPUT_ERROR'
  | 'PARSE_ERROR'
  | 'PARSER_UNAVAILABLE'
  | 'CONFIG_ERROR';

export class StyleLensError extends Error {
  readonly code: StyleLensErrorCode;

  constructor(code: StyleLensErrorCode, message: string) {
    super(message);
    this.name = 'StyleLensError';
    this.code = code;
  }
}

// ============================================
// Input Errors
// ============================================

export type InputErrorReason = 'not-found' | 'not-a-file' | 'unsupported-file';

/**
 * The path handed to the analyzer cannot be analyzed at all.
 */
export class InputError extends StyleLensError {
  readonly path: string;
  readonly reason: InputErrorReason;

  constructor(path: string, reason: InputErrorReason) {
    super('INPUT_ERROR', describeInputError(path, reason));
    this.name = 'InputError';
    this.path = path;
    this.reason = reason;
  }
}

function describeInputError(path: string, reason: InputErrorReason): string {
  switch (reason) {
    case 'not-found':
      return `${path} does not exist`;
    case 'not-a-file':
      return `${path} is not a file`;
    case 'unsupported-file':
      return `${path} is not a Python source file`;
  }
}

// ============================================
// Parse Errors
// ============================================

/**
 * The source text could not be parsed into a syntax tree.
 * `line` and `column` are 1-based.
 */
export class SourceParseError extends StyleLensError {
  readonly filePath: string;
  readonly line: number;
  readonly column: number;

  constructor(filePath: string, line: number, column: number, detail = 'invalid syntax') {
    super('PARSE_ERROR', `${filePath}: Line ${line}: ${detail} (column ${column})`);
    this.name = 'SourceParseError';
    this.filePath = filePath;
    this.line = line;
    this.column = column;
  }
}

/**
 * tree-sitter or the Python grammar could not be loaded.
 */
export class ParserUnavailableError extends StyleLensError {
  constructor(reason: string) {
    super('PARSER_UNAVAILABLE', `Python parser is not available: ${reason}`);
    this.name = 'ParserUnavailableError';
  }
}

// ============================================
// Configuration Errors
// ============================================

export interface ConfigFieldError {
  /** Field that failed validation */
  field: string;
  /** Error message */
  message: string;
  /** The invalid value */
  value: unknown;
}

export class ConfigError extends StyleLensError {
  readonly source: string;
  readonly fieldErrors: readonly ConfigFieldError[];

  constructor(source: string, message: string, fieldErrors: readonly ConfigFieldError[] = []) {
    const details = fieldErrors.map((e) => `${e.field} ${e.message}`).join('; ');
    super('CONFIG_ERROR', details ? `${source}: ${message}: ${details}` : `${source}: ${message}`);
    this.name = 'ConfigError';
    this.source = source;
    this.fieldErrors = fieldErrors;
  }
}

/**
 * Narrow an unknown thrown value to a stylelens error.
 */
export function isStyleLensError(error: unknown): error is StyleLensError {
  return error instanceof StyleLensError;
}
