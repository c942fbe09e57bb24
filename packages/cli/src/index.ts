/**
 * stylelens-cli - Command-line interface for stylelens
 */

export const VERSION = '0.1.0';

export { runCheck, checkCommand, type CheckCommandOptions, type CheckIO } from './commands/check.js';
export { rulesCommand, formatRulesTable } from './commands/rules.js';
export { parserCommand, getPythonParserInfo, testFileParsing } from './commands/parser.js';
export { renderResults, type OutputFormat } from './ui/output.js';
