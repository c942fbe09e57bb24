/**
 * Python Source Parser
 *
 * Thin wrapper over the tree-sitter Python grammar. tree-sitter recovers
 * from syntax errors by inserting ERROR and MISSING nodes, and it also
 * accepts a few things the Python compiler does not: Python 2 `print` and
 * `exec` statements, statements indented past their block, and parameters
 * without a default after one with a default. Any of these fails the parse.
 */

import { SourceParseError } from '../../errors/index.js';
import { createPythonParser, isTreeSitterAvailable } from './loader.js';
import type { TreeSitterNode, TreeSitterParser, TreeSitterTree } from './types.js';

export class PythonSourceParser {
  private parser: TreeSitterParser | null = null;

  /**
   * Check if tree-sitter is available for Python parsing.
   */
  static isAvailable(): boolean {
    return isTreeSitterAvailable();
  }

  /**
   * Parse Python source into a syntax tree.
   *
   * @throws SourceParseError when the source is malformed
   * @throws ParserUnavailableError when tree-sitter cannot be loaded
   */
  parse(source: string, filePath: string): TreeSitterTree {
    if (!this.parser) {
      this.parser = createPythonParser();
    }

    const tree = this.parser.parse(source);
    const problem = findFirstSyntaxError(tree.rootNode);

    if (problem) {
      throw new SourceParseError(
        filePath,
        problem.node.startPosition.row + 1,
        problem.node.startPosition.column + 1,
        problem.detail
      );
    }

    return tree;
  }
}

export interface SyntaxProblem {
  node: TreeSitterNode;
  detail: string;
}

interface PendingNode {
  node: TreeSitterNode;
  /** Problem found while looking at the parent, e.g. a misplaced statement */
  problem: string | undefined;
}

const STATEMENT_CONTAINERS = new Set(['module', 'block']);

const PARAMETER_LISTS = new Set(['parameters', 'lambda_parameters']);

const PYTHON2_STATEMENTS: Record<string, string> = {
  print_statement: 'print',
  exec_statement: 'exec',
};

/**
 * First node, in document order, that makes the source invalid Python.
 * Returns null for a clean tree.
 */
export function findFirstSyntaxError(root: TreeSitterNode): SyntaxProblem | null {
  const stack: PendingNode[] = [{ node: root, problem: undefined }];

  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;

    const { node } = entry;
    const detail = describeNode(node) ?? entry.problem;
    if (detail) {
      return { node, detail };
    }

    const childProblems = describeChildren(node);
    for (let i = node.children.length - 1; i >= 0; i--) {
      const child = node.children[i];
      if (child) stack.push({ node: child, problem: childProblems.get(i) });
    }
  }

  return null;
}

function describeNode(node: TreeSitterNode): string | undefined {
  if (node.type === 'ERROR') {
    return 'invalid syntax';
  }
  if (isMissingNode(node)) {
    return `missing ${node.type}`;
  }

  const keyword = PYTHON2_STATEMENTS[node.type];
  if (keyword) {
    return `Missing parentheses in call to '${keyword}'`;
  }

  return undefined;
}

/**
 * Problems attached to children by index.
 */
function describeChildren(node: TreeSitterNode): Map<number, string> {
  if (STATEMENT_CONTAINERS.has(node.type)) {
    return misalignedStatements(node);
  }
  if (PARAMETER_LISTS.has(node.type)) {
    return misorderedDefaults(node);
  }
  return new Map();
}

/**
 * Statements that start a new line must share the column of the first
 * statement in their block (column 0 in a module). Statements after `;` on
 * the same line are not compared.
 */
function misalignedStatements(container: TreeSitterNode): Map<number, string> {
  const problems = new Map<number, string>();
  let expectedColumn: number | null = container.type === 'module' ? 0 : null;
  let previousEndRow = -1;

  container.children.forEach((child, index) => {
    if (!isNamedNode(child) || child.type === 'comment') return;

    const start = child.startPosition;
    if (start.row > previousEndRow) {
      if (expectedColumn === null) {
        expectedColumn = start.column;
      } else if (start.column > expectedColumn) {
        problems.set(index, 'unexpected indent');
      } else if (start.column < expectedColumn) {
        problems.set(index, 'unindent does not match any outer indentation level');
      }
    }
    previousEndRow = child.endPosition.row;
  });

  return problems;
}

/**
 * Before `*`, `*args` or `**kwargs`, a parameter without a default may not
 * follow one with a default.
 */
function misorderedDefaults(parameters: TreeSitterNode): Map<number, string> {
  const problems = new Map<number, string>();
  let seenDefault = false;

  for (const [index, child] of parameters.children.entries()) {
    switch (child.type) {
      case 'default_parameter':
      case 'typed_default_parameter':
        seenDefault = true;
        break;

      case 'identifier':
        if (seenDefault) problems.set(index, 'non-default argument follows default argument');
        break;

      case 'typed_parameter':
        // `*args: T` and `**kw: T` are typed parameters around a splat
        if (child.namedChildren[0]?.type !== 'identifier') return problems;
        if (seenDefault) problems.set(index, 'non-default argument follows default argument');
        break;

      case 'list_splat_pattern':
      case 'dictionary_splat_pattern':
      case 'keyword_separator':
        return problems;
    }
  }

  return problems;
}

function isMissingNode(node: TreeSitterNode): boolean {
  return typeof node.isMissing === 'function' ? node.isMissing() : node.isMissing;
}

function isNamedNode(node: TreeSitterNode): boolean {
  return typeof node.isNamed === 'function' ? node.isNamed() : node.isNamed;
}

/**
 * Count every node in a tree, anonymous tokens included.
 */
export function countNodes(root: TreeSitterNode): number {
  let count = 1;
  for (const child of root.children) {
    count += countNodes(child);
  }
  return count;
}
