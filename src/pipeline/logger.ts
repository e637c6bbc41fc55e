/**
 * Pipeline Loggers
 *
 * Implementations of the `Logger` interface used by the core components.
 *
 * @module pipeline/logger
 */

import chalk from 'chalk';
import type { Logger } from './types.js';

export interface ConsoleLoggerOptions {
  /** Show debug messages */
  verbose?: boolean;
  /** Hide debug and info messages */
  quiet?: boolean;
  /** Prefix for every line (default "stagecraft") */
  prefix?: string;
}

/**
 * Logger writing level-tagged lines to stderr, so stdout stays free for
 * command output.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const prefix = chalk.dim(`[${options.prefix ?? 'stagecraft'}]`);

  return {
    debug(message, ...args) {
      if (options.verbose && !options.quiet) {
        console.error(prefix, chalk.dim(`[DEBUG] ${message}`), ...args);
      }
    },
    info(message, ...args) {
      if (!options.quiet) {
        console.error(prefix, chalk.cyan('[INFO]'), message, ...args);
      }
    },
    warn(message, ...args) {
      console.error(prefix, chalk.yellow(`[WARN] ${message}`), ...args);
    },
    error(message, ...args) {
      console.error(prefix, chalk.red(`[ERROR] ${message}`), ...args);
    },
  };
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
