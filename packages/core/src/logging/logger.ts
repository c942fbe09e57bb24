/**
 * Logger - Leveled logging to a text stream
 *
 * Log lines go to stderr by default so they never mix with the diagnostic
 * stream printed on stdout.
 */

import chalk from 'chalk';

/**
 * Log levels for filtering
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.cyan,
  debug: chalk.gray,
};

/**
 * Anything with a `write(text)` method, e.g. `process.stderr`.
 */
export interface LogSink {
  write(text: string): unknown;
}

export interface LoggerOptions {
  /** Minimum level that is written (default: info) */
  level?: LogLevel;
  /** Destination stream (default: process.stderr) */
  sink?: LogSink;
}

export class Logger {
  private readonly sink: LogSink;
  private readonly minLevel: LogLevel;

  constructor(options: LoggerOptions = {}) {
    this.sink = options.sink ?? process.stderr;
    this.minLevel = options.level ?? 'info';
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, args);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const tag = LEVEL_STYLE[level](`[${level.toUpperCase()}]`);

    let formattedMessage = `${tag} ${message}`;

    if (args.length > 0) {
      const argsStr = args
        .map((arg) => {
          if (arg instanceof Error) {
            return level === 'debug' && arg.stack ? arg.stack : arg.message;
          }
          if (typeof arg === 'object') {
            try {
              return JSON.stringify(arg);
            } catch {
              return String(arg);
            }
          }
          return String(arg);
        })
        .join(' ');
      formattedMessage += ` ${argsStr}`;
    }

    this.sink.write(`${formattedMessage}\n`);
  }
}

/**
 * Debug logging is switched on from the environment with `STYLELENS_DEBUG=true`.
 */
export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env['STYLELENS_DEBUG'] === 'true';
}

/**
 * Factory function for creating loggers
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger({
    ...options,
    level: options.level ?? (isDebugEnabled() ? 'debug' : 'info'),
  });
}

/**
 * A logger that writes nothing, used when the caller supplies none.
 */
export function createSilentLogger(): Logger {
  return new Logger({ level: 'error', sink: { write: () => true } });
}
