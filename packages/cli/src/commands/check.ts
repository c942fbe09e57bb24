/**
 * Check Command - stylelens check <path>
 *
 * Analyze one Python file or every Python file below a directory and print
 * the diagnostics, file by file in sorted path order.
 */

import * as path from 'node:path';
import { Command, Option } from 'commander';
import {
  CONFIG_FILE_NAME,
  FileAnalyzer,
  ParserUnavailableError,
  PythonSourceParser,
  configFromEnv,
  createLogger,
  discoverSourceFiles,
  getLoadingError,
  isDebugEnabled,
  isStyleLensError,
  loadConfigFile,
  setLoaderLogger,
  type AnalysisResult,
  type LogSink,
  type StyleLensConfig,
  type VariableScope,
} from 'stylelens-core';
import { renderResults, type OutputFormat } from '../ui/output.js';

export interface CheckCommandOptions {
  /** Output format */
  format?: OutputFormat;
  /** Override the configured variable scope */
  variableScope?: VariableScope;
  /** Extra glob patterns to skip */
  exclude?: string[];
  /** `false` when --no-default-ignores was given */
  defaultIgnores?: boolean;
  /** Configuration file (default: .stylelens.json in cwd) */
  config?: string;
  /** Exit 1 when any diagnostic is reported */
  ci?: boolean;
  /** Enable debug output */
  verbose?: boolean;
}

export interface CheckIO {
  stdout: LogSink;
  stderr: LogSink;
  cwd: string;
  env: NodeJS.ProcessEnv;
}

const defaultIO: CheckIO = {
  stdout: process.stdout,
  stderr: process.stderr,
  cwd: process.cwd(),
  env: process.env,
};

/**
 * Run a check and return the process exit code.
 *
 * - 0: every file was analyzed (diagnostics do not change this unless `ci`)
 * - 1: bad path or configuration, parser unavailable, a file that could not
 *   be read or parsed, or diagnostics in CI mode
 */
export async function runCheck(
  target: string,
  options: CheckCommandOptions = {},
  io: CheckIO = defaultIO
): Promise<number> {
  const logger = createLogger({
    sink: io.stderr,
    level: options.verbose || isDebugEnabled(io.env) ? 'debug' : 'info',
  });
  setLoaderLogger(logger);

  let config: StyleLensConfig;
  let files: string[];
  try {
    config = await resolveConfig(options, io);
    files = await discoverSourceFiles(target, config);
  } catch (error) {
    if (isStyleLensError(error)) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }

  if (!PythonSourceParser.isAvailable()) {
    logger.error(new ParserUnavailableError(getLoadingError() ?? 'unknown error').message);
    return 1;
  }

  logger.debug(`Checking ${files.length} file(s) with variable scope '${config.variableScope}'`);

  const analyzer = new FileAnalyzer({ variableScope: config.variableScope, logger });
  const results: AnalysisResult[] = [];
  let failures = 0;

  for (const file of files) {
    try {
      results.push(analyzer.analyze(file));
    } catch (error) {
      if (!isStyleLensError(error)) {
        throw error;
      }
      failures += 1;
      logger.error(`Skipping ${file}: ${error.message}`);
    }
  }

  io.stdout.write(renderResults(results, options.format ?? 'text'));

  const diagnosticCount = results.reduce((sum, result) => sum + result.diagnostics.length, 0);
  logger.debug(`Checked ${results.length} file(s), found ${diagnosticCount} diagnostic(s)`);

  if (failures > 0) {
    return 1;
  }
  return options.ci && diagnosticCount > 0 ? 1 : 0;
}

/**
 * Combine the configuration file, the environment and the command-line
 * flags, in increasing precedence.
 */
async function resolveConfig(options: CheckCommandOptions, io: CheckIO): Promise<StyleLensConfig> {
  const configPath = options.config
    ? path.resolve(io.cwd, options.config)
    : path.join(io.cwd, CONFIG_FILE_NAME);

  const fileConfig = await loadConfigFile(configPath, { required: options.config !== undefined });
  const config: StyleLensConfig = { ...fileConfig, ...configFromEnv(io.env) };

  if (options.variableScope) {
    config.variableScope = options.variableScope;
  }
  if (options.exclude && options.exclude.length > 0) {
    config.exclude = [...config.exclude, ...options.exclude];
  }
  if (options.defaultIgnores === false) {
    config.useDefaultIgnores = false;
  }

  return config;
}

export const checkCommand = new Command('check')
  .description('Check a Python file or directory for style violations')
  .argument('<path>', 'File or directory to check')
  .addOption(new Option('-f, --format <format>', 'Output format').choices(['text', 'json']).default('text'))
  .addOption(
    new Option('--variable-scope <scope>', 'Check assignments everywhere or only inside functions')
      .choices(['tree', 'function'])
  )
  .option('--exclude <glob...>', 'Glob patterns to skip, relative to the checked directory')
  .option('--no-default-ignores', 'Also check virtualenv, cache and build directories')
  .option('-c, --config <file>', `Configuration file (default: ${CONFIG_FILE_NAME})`)
  .option('--ci', 'Exit with code 1 when any violation is found')
  .action(async (target: string, _options: unknown, command: Command) => {
    const options = command.optsWithGlobals<CheckCommandOptions>();
    process.exitCode = await runCheck(target, options);
  });
