/**
 * Syntax Fact Extractor
 *
 * Walks a tree-sitter Python tree once and collects the facts the line
 * checkers cannot see:
 * - simple identifiers bound by assignments
 * - positional parameter names of functions and lambdas
 * - positional parameters whose default is not a literal constant
 *
 * Parameter facts and default lines use the declaration line of the
 * function (the `def` line, or the line the `lambda` keyword is on). A
 * function with several non-literal defaults contributes its line once.
 */

import type { TreeSitterNode } from '../parsers/tree-sitter/types.js';

// ============================================
// Types
// ============================================

export interface NameFact {
  name: string;
  /** 1-based line number */
  line: number;
}

export interface SyntaxFacts {
  storedVariables: NameFact[];
  parameters: NameFact[];
  /** Declaration lines, each at most once, in tree order */
  mutableDefaults: number[];
}

type NameFactKind = 'storedVariables' | 'parameters';

/**
 * `tree` records assignments anywhere in the file; `function` only those
 * inside a function body.
 */
export type VariableScope = 'tree' | 'function';

export interface SyntaxFactOptions {
  variableScope: VariableScope;
}

interface ParameterInfo {
  name: string;
  defaultValue: TreeSitterNode | null;
}

const FUNCTION_NODES = new Set(['function_definition', 'lambda']);

const ASSIGNMENT_NODES = new Set(['assignment', 'augmented_assignment']);

const LITERAL_NODES = new Set([
  'integer',
  'float',
  'true',
  'false',
  'none',
  'ellipsis',
]);

// ============================================
// Extractor
// ============================================

export class SyntaxFactExtractor {
  private readonly options: SyntaxFactOptions;
  private facts: SyntaxFacts = emptyFacts();
  private seen = new Set<string>();

  constructor(options: Partial<SyntaxFactOptions> = {}) {
    this.options = { variableScope: options.variableScope ?? 'tree' };
  }

  /**
   * Collect the facts of one tree. The extractor can be reused; each call
   * starts from empty fact lists.
   */
  extract(root: TreeSitterNode): SyntaxFacts {
    this.facts = emptyFacts();
    this.seen = new Set();

    this.visitNode(root, 0);

    return this.facts;
  }

  private visitNode(node: TreeSitterNode, functionDepth: number): void {
    let depth = functionDepth;

    if (FUNCTION_NODES.has(node.type)) {
      this.visitFunction(node);
      depth += 1;
    } else if (ASSIGNMENT_NODES.has(node.type)) {
      this.recordTarget(node.childForFieldName('left'), functionDepth);
    } else if (node.type === 'named_expression') {
      this.recordTarget(node.childForFieldName('name'), functionDepth);
    }

    for (const child of node.namedChildren) {
      this.visitNode(child, depth);
    }
  }

  private visitFunction(node: TreeSitterNode): void {
    const line = node.startPosition.row + 1;
    const parametersNode = node.childForFieldName('parameters');
    if (!parametersNode) return;

    let hasMutableDefault = false;
    for (const parameter of positionalParameters(parametersNode)) {
      this.add('parameters', parameter.name, line);
      if (parameter.defaultValue && !isLiteralConstant(parameter.defaultValue)) {
        hasMutableDefault = true;
      }
    }

    if (hasMutableDefault && !this.facts.mutableDefaults.includes(line)) {
      this.facts.mutableDefaults.push(line);
    }
  }

  private recordTarget(target: TreeSitterNode | null, functionDepth: number): void {
    if (!target || target.type !== 'identifier') return;
    if (this.options.variableScope === 'function' && functionDepth === 0) return;

    this.add('storedVariables', target.text, target.startPosition.row + 1);
  }

  private add(kind: NameFactKind, name: string, line: number): void {
    const key = `${kind}:${line}:${name}`;
    if (this.seen.has(key)) return;
    this.seen.add(key);
    this.facts[kind].push({ name, line });
  }
}

function emptyFacts(): SyntaxFacts {
  return { storedVariables: [], parameters: [], mutableDefaults: [] };
}

// ============================================
// Parameters
// ============================================

/**
 * Positional parameters of a `parameters` or `lambda_parameters` node:
 * everything before `*`, `*args` or `**kwargs`, with the `/` marker
 * skipped.
 */
export function positionalParameters(parametersNode: TreeSitterNode): ParameterInfo[] {
  const result: ParameterInfo[] = [];

  for (const child of parametersNode.namedChildren) {
    switch (child.type) {
      case 'identifier':
        result.push({ name: child.text, defaultValue: null });
        break;

      case 'typed_parameter': {
        // typed_parameter has no name field: the first named child is the
        // identifier, or a splat pattern for `*args: T` / `**kw: T`
        const first = child.namedChildren[0];
        if (!first || first.type !== 'identifier') return result;
        result.push({ name: first.text, defaultValue: null });
        break;
      }

      case 'default_parameter':
      case 'typed_default_parameter': {
        const name = child.childForFieldName('name');
        if (name && name.type === 'identifier') {
          result.push({ name: name.text, defaultValue: child.childForFieldName('value') });
        }
        break;
      }

      case 'positional_separator':
        break;

      case 'comment':
        break;

      default:
        // keyword_separator, list_splat_pattern, dictionary_splat_pattern
        return result;
    }
  }

  return result;
}

// ============================================
// Literals
// ============================================

/**
 * True when an expression is written directly as a constant: a number,
 * a string without an `f` prefix, True, False, None or `...`, optionally
 * signed (numbers) or parenthesized.
 */
export function isLiteralConstant(node: TreeSitterNode): boolean {
  if (LITERAL_NODES.has(node.type)) {
    return true;
  }

  switch (node.type) {
    case 'string':
      return !hasFormatPrefix(node.text);

    case 'concatenated_string':
      return node.namedChildren.every((part) => part.type === 'string' && !hasFormatPrefix(part.text));

    case 'unary_operator': {
      const operand = node.childForFieldName('argument');
      const operator = node.childForFieldName('operator');
      return (
        operand !== null &&
        (operand.type === 'integer' || operand.type === 'float') &&
        (operator === null || operator.type === '-' || operator.type === '+')
      );
    }

    case 'parenthesized_expression': {
      const inner = node.namedChildren.filter((child) => child.type !== 'comment');
      return inner.length === 1 && inner[0] !== undefined && isLiteralConstant(inner[0]);
    }

    default:
      return false;
  }
}

function hasFormatPrefix(stringText: string): boolean {
  const prefix = /^[A-Za-z]*/.exec(stringText)?.[0] ?? '';
  return prefix.toLowerCase().includes('f');
}
