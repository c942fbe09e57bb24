/**
 * Rules Command - stylelens rules
 *
 * List every diagnostic code the analyzer can report.
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { RULES, formatCode, type RuleInfo } from 'stylelens-core';

/**
 * One line per rule: code, name and description, columns aligned.
 */
export function formatRulesTable(rules: readonly RuleInfo[] = RULES): string[] {
  const nameWidth = Math.max(...rules.map((rule) => rule.name.length));

  return rules.map((rule) => {
    const source = rule.origin === 'syntax' ? chalk.gray(' (syntax tree)') : '';
    return `${chalk.bold(formatCode(rule.code))}  ${rule.name.padEnd(nameWidth)}  ${rule.description}${source}`;
  });
}

export const rulesCommand = new Command('rules')
  .description('List the diagnostics stylelens reports')
  .addOption(new Option('-f, --format <format>', 'Output format').choices(['text', 'json']).default('text'))
  .action((options: { format: string }) => {
    if (options.format === 'json') {
      const rules = RULES.map((rule) => ({ ...rule, code: formatCode(rule.code) }));
      console.log(JSON.stringify(rules, null, 2));
      return;
    }

    console.log();
    console.log(chalk.bold('📏 stylelens rules'));
    console.log();
    for (const line of formatRulesTable()) {
      console.log(`  ${line}`);
    }
    console.log();
  });
