/**
 * Tree-sitter Loader
 *
 * Loads tree-sitter and tree-sitter-python on first use and caches the
 * result. Both are native modules, so loading can fail on a machine where
 * the build did not succeed; callers ask `isTreeSitterAvailable()` or get a
 * `ParserUnavailableError` from `createPythonParser()`.
 */

import { createRequire } from 'node:module';
import { ParserUnavailableError } from '../../errors/index.js';
import { createLogger, type Logger } from '../../logging/logger.js';
import type { TreeSitterParser, TreeSitterLanguage } from './types.js';

// Create require function for ESM compatibility
const require = createRequire(import.meta.url);

// ============================================
// Module State
// ============================================

/** Whether tree-sitter is available */
let treeSitterAvailable: boolean | null = null;

/** Cached tree-sitter Parser constructor */
let cachedTreeSitter: (new () => TreeSitterParser) | null = null;

/** Cached Python language */
let cachedPythonLanguage: TreeSitterLanguage | null = null;

/** Loading error message if any */
let loadingError: string | null = null;

let logger: Logger | null = null;

// ============================================
// Public API
// ============================================

/**
 * Check if tree-sitter is available.
 *
 * Attempts to load tree-sitter and tree-sitter-python on first call and
 * caches the result.
 */
export function isTreeSitterAvailable(): boolean {
  if (treeSitterAvailable !== null) {
    return treeSitterAvailable;
  }

  try {
    loadTreeSitter();
    treeSitterAvailable = true;
  } catch (error) {
    treeSitterAvailable = false;
    loadingError = error instanceof Error ? error.message : 'Unknown error loading tree-sitter';
    getLogger().debug(`tree-sitter not available: ${loadingError}`);
  }

  return treeSitterAvailable;
}

/**
 * Create a new tree-sitter parser instance configured for Python.
 *
 * @throws ParserUnavailableError if tree-sitter is not available
 */
export function createPythonParser(): TreeSitterParser {
  if (!isTreeSitterAvailable() || !cachedTreeSitter || !cachedPythonLanguage) {
    throw new ParserUnavailableError(loadingError ?? 'unknown error');
  }

  const parser = new cachedTreeSitter();
  parser.setLanguage(cachedPythonLanguage);

  return parser;
}

/**
 * Get the loading error message if tree-sitter failed to load.
 */
export function getLoadingError(): string | null {
  // Ensure we've attempted to load
  isTreeSitterAvailable();
  return loadingError;
}

/**
 * Route loader debug output through the given logger.
 */
export function setLoaderLogger(next: Logger): void {
  logger = next;
}

// ============================================
// Internal Functions
// ============================================

function getLogger(): Logger {
  if (!logger) {
    logger = createLogger();
  }
  return logger;
}

/**
 * Attempt to load tree-sitter and tree-sitter-python.
 *
 * @throws Error if loading fails
 */
function loadTreeSitter(): void {
  if (cachedTreeSitter && cachedPythonLanguage) {
    return;
  }

  try {
    // tree-sitter exports the Parser constructor directly
    cachedTreeSitter = require('tree-sitter') as new () => TreeSitterParser;
  } catch (error) {
    throw new Error(
      `Failed to load tree-sitter: ${error instanceof Error ? error.message : 'unknown error'}. ` +
        'Install with: npm install tree-sitter tree-sitter-python'
    );
  }

  try {
    cachedPythonLanguage = require('tree-sitter-python') as TreeSitterLanguage;
  } catch (error) {
    // Clear tree-sitter cache since we can't use it without Python
    cachedTreeSitter = null;
    throw new Error(
      `Failed to load tree-sitter-python: ${error instanceof Error ? error.message : 'unknown error'}. ` +
        'Install with: npm install tree-sitter-python'
    );
  }

  getLogger().debug('tree-sitter and tree-sitter-python loaded successfully');
}
