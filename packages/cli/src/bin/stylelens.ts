#!/usr/bin/env node
/**
 * stylelens CLI Entry Point
 *
 * Sets up Commander.js with all available commands. `check` is the default
 * command, so `stylelens <path>` checks a path.
 */

import { Command } from 'commander';
import { VERSION } from '../index.js';
import { checkCommand, rulesCommand, parserCommand } from '../commands/index.js';

/**
 * Create and configure the main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name('stylelens')
    .description('PEP8-style checks for Python sources')
    .version(VERSION, '-v, --version', 'Output the current version')
    .option('--verbose', 'Enable verbose output')
    .option('--no-color', 'Disable colored output');

  // Register all commands
  program.addCommand(checkCommand, { isDefault: true });
  program.addCommand(rulesCommand);
  program.addCommand(parserCommand);

  // Add help examples
  program.addHelpText(
    'after',
    `
Examples:
  $ stylelens app.py                      Check a single file
  $ stylelens src/                        Check every .py file below src/
  $ stylelens check src/ --format json    Emit diagnostics as JSON
  $ stylelens check src/ --ci             Exit 1 when violations are found
  $ stylelens check src/ --variable-scope function
                                          Only check assignments inside functions
  $ stylelens rules                       List diagnostic codes
  $ stylelens parser --test app.py        Test parsing a specific file
`
  );

  return program;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      if (process.env['DEBUG']) {
        console.error(error.stack);
      }
    } else {
      console.error('An unexpected error occurred');
    }
    process.exit(1);
  }
}

// Run the CLI
await main();
