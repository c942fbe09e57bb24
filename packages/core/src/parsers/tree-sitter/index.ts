/**
 * Tree-sitter Python parsing
 */

export {
  isTreeSitterAvailable,
  createPythonParser,
  getLoadingError,
  setLoaderLogger,
} from './loader.js';
export {
  PythonSourceParser,
  findFirstSyntaxError,
  countNodes,
  type SyntaxProblem,
} from './python-source-parser.js';
export type {
  TreeSitterNode,
  TreeSitterPoint,
  TreeSitterTree,
  TreeSitterParser,
  TreeSitterLanguage,
} from './types.js';
