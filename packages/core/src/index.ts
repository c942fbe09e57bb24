/**
 * stylelens-core - Style analysis engine for Python sources
 *
 * - Checkers: per-line textual rules (S001-S009)
 * - Extractors: syntax-tree facts for naming and defaults (S010-S012)
 * - Analyzer: per-file orchestration and diagnostic ordering
 * - Scanner: source file discovery
 * - Config, errors and logging shared with the CLI
 */

export const VERSION = '0.1.0';

// Diagnostics
export * from './diagnostics/index.js';

// Errors
export * from './errors/index.js';

// Logging
export {
  Logger,
  createLogger,
  createSilentLogger,
  isDebugEnabled,
  type LogLevel,
  type LogSink,
  type LoggerOptions,
} from './logging/logger.js';

// Naming predicates
export { isFunctionName, isSnakeCase, isPascalCase } from './naming/casing.js';

// Line checkers
export * from './checkers/index.js';

// Syntax facts
export * from './extractors/index.js';

// Parsing
export * from './parsers/tree-sitter/index.js';

// Analysis
export * from './analyzer/index.js';

// Configuration
export * from './config/index.js';

// File discovery
export * from './scanner/index.js';
