/**
 * File Analyzer
 *
 * Runs both diagnostic sources over one file and merges them:
 *
 * 1. read the file and parse it once
 * 2. turn syntax facts into S010-S012 diagnostics
 * 3. run the line checkers over every non-blank line, tracking the blank run
 * 4. stable-sort everything by line, tree-derived diagnostics first on ties
 */

import { DEFAULT_LINE_CHECKERS } from '../checkers/line-checkers.js';
import { isBlankLine, runLineCheckers } from '../checkers/pipeline.js';
import type { LineChecker, LineContext } from '../checkers/types.js';
import type { AnalyzerConfig } from '../config/schema.js';
import { createDiagnostic, sortDiagnostics } from '../diagnostics/format.js';
import { DiagnosticCode, type AnalysisResult, type Diagnostic } from '../diagnostics/types.js';
import { SyntaxFactExtractor, type SyntaxFacts } from '../extractors/syntax-facts.js';
import { createSilentLogger, type Logger } from '../logging/logger.js';
import { isSnakeCase } from '../naming/casing.js';
import { PythonSourceParser } from '../parsers/tree-sitter/python-source-parser.js';
import { normalizeSource, readSourceFile, splitLines } from './source-lines.js';

export interface FileAnalyzerOptions extends Partial<AnalyzerConfig> {
  logger?: Logger;
  /** Parser instance to reuse across analyzers */
  parser?: PythonSourceParser;
}

export class FileAnalyzer {
  private readonly config: AnalyzerConfig;
  private readonly logger: Logger;
  private readonly parser: PythonSourceParser;
  private readonly extractor: SyntaxFactExtractor;
  private readonly checkers: readonly LineChecker[] = DEFAULT_LINE_CHECKERS;

  constructor(options: FileAnalyzerOptions = {}) {
    this.config = { variableScope: options.variableScope ?? 'tree' };
    this.logger = options.logger ?? createSilentLogger();
    this.parser = options.parser ?? new PythonSourceParser();
    this.extractor = new SyntaxFactExtractor({ variableScope: this.config.variableScope });
  }

  /**
   * Analyze a file on disk.
   *
   * @throws InputError when the path is missing or not a regular file
   * @throws SourceParseError when the file is not valid Python
   */
  analyze(filePath: string): AnalysisResult {
    const source = readSourceFile(filePath);
    return this.analyzeSource(source, filePath);
  }

  /**
   * Analyze source text that is already in memory. `filePath` is only used
   * in messages.
   *
   * @throws SourceParseError when the text is not valid Python
   */
  analyzeSource(source: string, filePath: string): AnalysisResult {
    const text = normalizeSource(source);
    const tree = this.parser.parse(text, filePath);

    const facts = this.extractor.extract(tree.rootNode);
    const syntaxDiagnostics = this.syntaxDiagnostics(facts, filePath);
    const lineDiagnostics = this.lineDiagnostics(splitLines(text), filePath);

    const diagnostics = sortDiagnostics([...syntaxDiagnostics, ...lineDiagnostics]);
    this.logger.debug(`${filePath}: ${diagnostics.length} diagnostic(s)`);

    return { filePath, diagnostics };
  }

  private syntaxDiagnostics(facts: SyntaxFacts, filePath: string): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];

    for (const { name, line } of facts.storedVariables) {
      if (!isSnakeCase(name)) {
        diagnostics.push(createDiagnostic(
          filePath, line, DiagnosticCode.VARIABLE_NAME,
          `Variable '${name}' should be snake_case`, 'syntax'
        ));
      }
    }

    for (const { name, line } of facts.parameters) {
      if (!isSnakeCase(name)) {
        diagnostics.push(createDiagnostic(
          filePath, line, DiagnosticCode.ARGUMENT_NAME,
          `Argument name '${name}' should be snake_case`, 'syntax'
        ));
      }
    }

    for (const line of facts.mutableDefaults) {
      diagnostics.push(createDiagnostic(
        filePath, line, DiagnosticCode.MUTABLE_DEFAULT,
        'Default argument value is mutable', 'syntax'
      ));
    }

    return diagnostics;
  }

  private lineDiagnostics(lines: readonly string[], filePath: string): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];
    let blankRun = 0;

    lines.forEach((line, index) => {
      if (isBlankLine(line)) {
        blankRun += 1;
        return;
      }

      const context: LineContext = { lineNumber: index + 1, blankRun };
      for (const violation of runLineCheckers(line, context, this.checkers)) {
        diagnostics.push(createDiagnostic(filePath, context.lineNumber, violation.code, violation.message, 'line'));
      }

      blankRun = 0;
    });

    return diagnostics;
  }
}

/**
 * Analyze one file with a fresh analyzer.
 */
export function analyzeFile(filePath: string, options: FileAnalyzerOptions = {}): AnalysisResult {
  return new FileAnalyzer(options).analyze(filePath);
}
