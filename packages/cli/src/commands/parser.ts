/**
 * Parser Command - stylelens parser
 *
 * Show whether the tree-sitter Python parser can be loaded, and optionally
 * try parsing one file with it.
 */

import { Command, Option } from 'commander';
import * as fs from 'node:fs/promises';
import chalk from 'chalk';
import {
  PythonSourceParser,
  SourceParseError,
  countNodes,
  getLoadingError,
  isTreeSitterAvailable,
  normalizeSource,
} from 'stylelens-core';

export interface ParserOptions {
  /** Test parsing a specific file */
  test?: string;
  /** Output format */
  format?: 'text' | 'json';
}

export interface PythonParserInfo {
  treeSitterAvailable: boolean;
  loadingError: string | undefined;
}

export interface TestResult {
  success: boolean;
  nodeCount: number | undefined;
  errors: string[] | undefined;
}

/**
 * Get Python parser information
 */
export function getPythonParserInfo(): PythonParserInfo {
  const available = isTreeSitterAvailable();
  return {
    treeSitterAvailable: available,
    loadingError: getLoadingError() ?? undefined,
  };
}

/**
 * Test parsing a specific file
 */
export async function testFileParsing(filePath: string): Promise<TestResult> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    return {
      success: false,
      nodeCount: undefined,
      errors: [`Failed to read file: ${err instanceof Error ? err.message : String(err)}`],
    };
  }

  try {
    const tree = new PythonSourceParser().parse(normalizeSource(content), filePath);
    return {
      success: true,
      nodeCount: countNodes(tree.rootNode),
      errors: undefined,
    };
  } catch (err) {
    if (err instanceof SourceParseError) {
      return { success: false, nodeCount: undefined, errors: [err.message] };
    }
    return {
      success: false,
      nodeCount: undefined,
      errors: [err instanceof Error ? err.message : String(err)],
    };
  }
}

/**
 * Parser command implementation
 */
async function parserAction(options: ParserOptions): Promise<void> {
  const format = options.format ?? 'text';
  const pythonInfo = getPythonParserInfo();

  // JSON output
  if (format === 'json') {
    const output: Record<string, unknown> = { python: pythonInfo };

    if (options.test) {
      output['testResult'] = await testFileParsing(options.test);
    }

    console.log(JSON.stringify(output, null, 2));
    return;
  }

  // Text output
  console.log();
  console.log(chalk.bold('🔧 stylelens Parser Status'));
  console.log(chalk.gray('─'.repeat(50)));

  console.log();
  console.log(chalk.bold('Python:'));
  console.log(`  Tree-sitter:       ${pythonInfo.treeSitterAvailable ? chalk.green('✓ available') : chalk.red('✗ not installed')}`);

  if (pythonInfo.loadingError) {
    console.log(chalk.gray(`  Loading error:     ${pythonInfo.loadingError}`));
    console.log();
    console.log(chalk.gray('  To enable Python parsing:'));
    console.log(chalk.cyan('    npm install tree-sitter tree-sitter-python'));
  }

  if (options.test) {
    const result = await testFileParsing(options.test);

    console.log();
    console.log(chalk.bold(`Test: ${options.test}`));
    if (result.success) {
      console.log(chalk.green(`  ✓ Parsed (${result.nodeCount ?? 0} nodes)`));
    } else {
      for (const error of result.errors ?? []) {
        console.log(chalk.red(`  ✗ ${error}`));
      }
      process.exitCode = 1;
    }
  }

  console.log();
}

export const parserCommand = new Command('parser')
  .description('Show Python parser status')
  .option('--test <file>', 'Test parsing a specific file')
  .addOption(new Option('-f, --format <format>', 'Output format').choices(['text', 'json']).default('text'))
  .action(parserAction);
