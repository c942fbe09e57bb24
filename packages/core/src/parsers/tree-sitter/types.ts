/**
 * Tree-sitter Type Definitions
 *
 * The subset of the tree-sitter node API the analyzer relies on. tree-sitter
 * is loaded at run time, so these interfaces describe what it hands back.
 */

// ============================================
// Tree-sitter Core Types
// ============================================

/**
 * Represents a tree-sitter syntax node.
 */
export interface TreeSitterNode {
  /** The type of the node (e.g., 'function_definition', 'assignment') */
  type: string;
  /** The text content of the node */
  text: string;
  /** Start position in the source */
  startPosition: TreeSitterPoint;
  /** End position in the source */
  endPosition: TreeSitterPoint;
  /**
   * Whether this is a named node (vs anonymous).
   * Older bindings expose it as a method.
   */
  isNamed: boolean | (() => boolean);
  /**
   * Whether the parser inserted this node during error recovery.
   * Older bindings expose it as a method.
   */
  isMissing: boolean | (() => boolean);
  /** Child nodes */
  children: TreeSitterNode[];
  /** Named child nodes only */
  namedChildren: TreeSitterNode[];
  /** Parent node, if any */
  parent: TreeSitterNode | null;
  /** Get child by field name */
  childForFieldName(fieldName: string): TreeSitterNode | null;
}

/**
 * Represents a point (position) in tree-sitter.
 */
export interface TreeSitterPoint {
  /** Row (0-indexed line number) */
  row: number;
  /** Column (0-indexed character offset) */
  column: number;
}

/**
 * Represents a tree-sitter syntax tree.
 */
export interface TreeSitterTree {
  /** The root node of the tree */
  rootNode: TreeSitterNode;
}

/**
 * Represents a tree-sitter parser.
 */
export interface TreeSitterParser {
  /** Set the language for parsing */
  setLanguage(language: TreeSitterLanguage): void;
  /** Parse source code */
  parse(input: string): TreeSitterTree;
}

/**
 * Opaque handle to a compiled grammar, e.g. the export of `tree-sitter-python`.
 */
export interface TreeSitterLanguage {
  /** Grammar name reported by the binding */
  name?: string;
}
