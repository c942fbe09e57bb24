/**
 * Tests for the syntax fact extractor
 */

import { describe, it, expect } from 'vitest';
import { PythonSourceParser } from '../parsers/tree-sitter/python-source-parser.js';
import type { TreeSitterNode } from '../parsers/tree-sitter/types.js';
import { SyntaxFactExtractor, isLiteralConstant, type SyntaxFacts, type SyntaxFactOptions } from './syntax-facts.js';

const parser = new PythonSourceParser();

function extract(source: string, options: Partial<SyntaxFactOptions> = {}): SyntaxFacts {
  const tree = parser.parse(source, 'test.py');
  return new SyntaxFactExtractor(options).extract(tree.rootNode);
}

/**
 * Right-hand side of `value = <expression>`.
 */
function expression(code: string): TreeSitterNode {
  const tree = parser.parse(`value = ${code}\n`, 'test.py');
  const statement = tree.rootNode.namedChildren[0];
  const assignment = statement?.namedChildren[0];
  const right = assignment?.childForFieldName('right');
  if (!right) {
    throw new Error(`no expression parsed from ${code}`);
  }
  return right;
}

// ============================================================================
// Parameters
// ============================================================================

describe('parameters', () => {
  it('should record positional parameters at the declaration line', () => {
    const facts = extract('x = 1\n\ndef f(X, y):\n    return X\n');

    expect(facts.parameters).toEqual([
      { name: 'X', line: 3 },
      { name: 'y', line: 3 },
    ]);
  });

  it('should record parameters of async functions', () => {
    const facts = extract('async def fetch(Url):\n    return Url\n');

    expect(facts.parameters).toEqual([{ name: 'Url', line: 1 }]);
  });

  it('should record typed parameters', () => {
    const facts = extract('def f(Value: int, count: list = []) -> None:\n    pass\n');

    expect(facts.parameters).toEqual([
      { name: 'Value', line: 1 },
      { name: 'count', line: 1 },
    ]);
    expect(facts.mutableDefaults).toEqual([1]);
  });

  it('should include positional-only parameters', () => {
    const facts = extract('def f(a, /, b=1):\n    pass\n');

    expect(facts.parameters.map((p) => p.name)).toEqual(['a', 'b']);
  });

  it('should stop at *args, a bare star and **kwargs', () => {
    expect(extract('def f(a, *args, B=[], **kw):\n    pass\n').parameters.map((p) => p.name)).toEqual(['a']);
    expect(extract('def f(a, *, B=[]):\n    pass\n').parameters.map((p) => p.name)).toEqual(['a']);
    expect(extract('def f(a, **Options):\n    pass\n').parameters.map((p) => p.name)).toEqual(['a']);
  });

  it('should not report keyword-only defaults', () => {
    expect(extract('def f(a, *, b=[]):\n    pass\n').mutableDefaults).toEqual([]);
  });

  it('should record lambda parameters at the lambda line', () => {
    const facts = extract('import os\nhandler = lambda Event, n=[]: n\n');

    expect(facts.parameters).toEqual([
      { name: 'Event', line: 2 },
      { name: 'n', line: 2 },
    ]);
    expect(facts.mutableDefaults).toEqual([2]);
  });

  it('should use the def line of a decorated function', () => {
    const facts = extract('@cache\ndef f(x=[]):\n    pass\n');

    expect(facts.mutableDefaults).toEqual([2]);
  });

  it('should record methods and nested functions', () => {
    const source = [
      'class Service:',
      '    def run(self, Job):',
      '        def inner(Step):',
      '            return Step',
      '        return inner(Job)',
      '',
    ].join('\n');

    expect(extract(source).parameters).toEqual([
      { name: 'self', line: 2 },
      { name: 'Job', line: 2 },
      { name: 'Step', line: 3 },
    ]);
  });
});

// ============================================================================
// Mutable defaults
// ============================================================================

describe('mutableDefaults', () => {
  it('should record a list default', () => {
    expect(extract('def f(x=[]):\n    return x\n').mutableDefaults).toEqual([1]);
  });

  it('should not record literal defaults', () => {
    const source = 'def f(a=1, b=-2, c="s", d=None, e=True, g=(3), h=..., i=1.5, j=b"x"):\n    pass\n';

    expect(extract(source).mutableDefaults).toEqual([]);
  });

  it('should record the def line once however many defaults are not literals', () => {
    const source = 'def f(a={}, b=set(), c=f"{x}", d=x, e=-y):\n    pass\n';

    expect(extract(source).mutableDefaults).toEqual([1]);
  });

  it('should record one line per function', () => {
    const source = 'def f(a=[]):\n    pass\n\n\ndef g(b={}, c=[]):\n    pass\n';

    expect(extract(source).mutableDefaults).toEqual([1, 5]);
  });

  it('should record a non-literal default among literal ones', () => {
    expect(extract('def f(a=1, b=x):\n    pass\n').mutableDefaults).toEqual([1]);
  });
});

// ============================================================================
// Stored variables
// ============================================================================

describe('storedVariables', () => {
  it('should record simple assignment targets across the tree', () => {
    const source = ['A = B = 1', 'x += 1', 'Count: int = 0', 'first, Second = 1, 2', 'obj.Attr = 3', ''].join('\n');

    expect(extract(source).storedVariables).toEqual([
      { name: 'A', line: 1 },
      { name: 'B', line: 1 },
      { name: 'x', line: 2 },
      { name: 'Count', line: 3 },
    ]);
  });

  it('should record assignment expressions', () => {
    const facts = extract('if (Total := 10) > 5:\n    pass\n');

    expect(facts.storedVariables).toEqual([{ name: 'Total', line: 1 }]);
  });

  it('should keep one fact per name and line', () => {
    const facts = extract('x = 1\nx = 2\nx = 3\n');

    expect(facts.storedVariables).toEqual([
      { name: 'x', line: 1 },
      { name: 'x', line: 2 },
      { name: 'x', line: 3 },
    ]);
  });

  it('should record only function-body assignments in function scope', () => {
    const source = ['LIMIT = 10', '', '', 'def run():', '    Total = LIMIT', '    return Total', ''].join('\n');

    expect(extract(source, { variableScope: 'tree' }).storedVariables).toEqual([
      { name: 'LIMIT', line: 1 },
      { name: 'Total', line: 5 },
    ]);
    expect(extract(source, { variableScope: 'function' }).storedVariables).toEqual([
      { name: 'Total', line: 5 },
    ]);
  });

  it('should start from empty facts on every extraction', () => {
    const extractor = new SyntaxFactExtractor();
    extractor.extract(parser.parse('a = 1\n', 'a.py').rootNode);
    const second = extractor.extract(parser.parse('b = 2\n', 'b.py').rootNode);

    expect(second.storedVariables).toEqual([{ name: 'b', line: 1 }]);
  });
});

// ============================================================================
// Literal constants
// ============================================================================

describe('isLiteralConstant', () => {
  it('should accept numbers, strings and singletons', () => {
    for (const code of ['42', '3.14', '1j', '"text"', "'text'", 'r"raw"', 'True', 'False', 'None', '...']) {
      expect(isLiteralConstant(expression(code))).toBe(true);
    }
  });

  it('should accept signed numbers and parenthesized literals', () => {
    expect(isLiteralConstant(expression('-1'))).toBe(true);
    expect(isLiteralConstant(expression('+2.5'))).toBe(true);
    expect(isLiteralConstant(expression('("x")'))).toBe(true);
  });

  it('should accept implicit string concatenation', () => {
    expect(isLiteralConstant(expression('"a" "b"'))).toBe(true);
  });

  it('should reject containers, calls, names and f-strings', () => {
    for (const code of ['[]', '{}', '()', '(1, 2)', 'dict()', 'name', 'f"{name}"', '"a" f"{b}"', '~1', '1 + 2']) {
      expect(isLiteralConstant(expression(code))).toBe(false);
    }
  });
});
