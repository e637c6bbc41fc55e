/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color, data-dir)
 * - Mapping pipeline errors to exit codes
 * - Output utilities (info, warn, error, key/value lines)
 * - Lazy construction of the pipeline runtime
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import { ZodError } from 'zod';
import { isPipelineError } from '../pipeline/errors.js';
import { OpenAIApiError } from '../stages/llm-client.js';
import { getDataDir, resolveDataDir } from '../storage/paths.js';
import type { CliRuntime } from './runtime.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Suppress all non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  color?: boolean; // commander inverts --no-color to color: false
  /** Override default data directory */
  dataDir?: string;
}

/**
 * Builds the runtime a command works against.
 */
export type RuntimeFactory = (base: BaseCommand) => CliRuntime;

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Standard exit codes for the CLI.
 */
export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** General error */
  ERROR: 1,
  /** Invalid usage or arguments */
  USAGE_ERROR: 2,
  /** Resource not found (task, pipeline state, checkpoint) */
  NOT_FOUND: 3,
  /** API or network error */
  API_ERROR: 4,
  /** User cancelled operation */
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Invalid combination of arguments that commander cannot express.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Failure a command has already reported to the user.
 */
export class ReportedError extends Error {
  constructor(
    public readonly exitCode: ExitCode,
    message: string
  ) {
    super(message);
    this.name = 'ReportedError';
  }
}

/**
 * Exit code for an error thrown by a command.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ReportedError) {
    return error.exitCode;
  }
  if (error instanceof UsageError || error instanceof ZodError) {
    return EXIT_CODES.USAGE_ERROR;
  }
  if (error instanceof OpenAIApiError) {
    return EXIT_CODES.API_ERROR;
  }
  if (!isPipelineError(error)) {
    return EXIT_CODES.ERROR;
  }

  switch (error.kind) {
    case 'NotFound':
      return EXIT_CODES.NOT_FOUND;
    case 'InvalidStage':
    case 'InvalidFeedback':
    case 'IllegalTransition':
      return EXIT_CODES.USAGE_ERROR;
    case 'StageExecutionFailed':
      return error.cause instanceof OpenAIApiError ? EXIT_CODES.API_ERROR : EXIT_CODES.ERROR;
    default:
      return EXIT_CODES.ERROR;
  }
}

/**
 * One-line message for an error, listing zod issues individually.
 */
export function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ` : '') + issue.message)
      .join('; ');
  }
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * All command handlers receive a BaseCommand instance to access consistent
 * output, options and the pipeline runtime.
 *
 * @example
 * ```typescript
 * async function viewHandler(taskId: string, _options: unknown, cmd: Command) {
 *   const base = getBaseCommand(cmd);
 *   const task = await base.runtime().tasks.get(taskId);
 *   base.keyValue('Status', task.status);
 * }
 * ```
 */
export class BaseCommand {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  /** Whether colored output is enabled */
  private readonly useColor: boolean;

  /** Resolved data directory path */
  readonly dataDir: string;

  private readonly runtimeFactory?: RuntimeFactory;
  private cachedRuntime?: CliRuntime;

  constructor(options: GlobalOptions, runtimeFactory?: RuntimeFactory) {
    this.options = options;
    this.useColor = options.color !== false && process.stdout.isTTY === true;
    this.dataDir = options.dataDir ? resolveDataDir(options.dataDir) : getDataDir();
    this.runtimeFactory = runtimeFactory;

    // Configure chalk based on color preference
    if (!this.useColor) {
      chalk.level = 0;
    }
  }

  /**
   * The pipeline runtime, built on first use.
   *
   * @throws Error if the command was created without a runtime factory
   */
  runtime(): CliRuntime {
    if (!this.cachedRuntime) {
      if (!this.runtimeFactory) {
        throw new Error('No pipeline runtime is configured for this command');
      }
      this.cachedRuntime = this.runtimeFactory(this);
    }
    return this.cachedRuntime;
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  /**
   * Log a debug message (only visible in verbose mode).
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Log an informational message (hidden in quiet mode).
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.log(message, ...args);
    }
  }

  /**
   * Log a warning message (always visible).
   */
  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Log an error, with its stack in verbose mode.
   */
  error(message: string, error?: unknown): void {
    console.error(chalk.red(`Error: ${message}`));

    if (error instanceof Error && this.options.verbose) {
      console.error(chalk.dim(error.stack ?? error.message));
    }
  }

  /**
   * Log a success message with green checkmark.
   */
  success(message: string): void {
    if (!this.options.quiet) {
      console.log(chalk.green(`${this.useColor ? '✔' : '[OK]'} ${message}`));
    }
  }

  /**
   * Log a failure message with red X.
   */
  fail(message: string): void {
    console.log(chalk.red(`${this.useColor ? '✘' : '[FAIL]'} ${message}`));
  }

  /**
   * Print a blank line (hidden in quiet mode).
   */
  blank(): void {
    if (!this.options.quiet) {
      console.log();
    }
  }

  /**
   * Print a horizontal divider line.
   */
  divider(char = '-', width = 40): void {
    if (!this.options.quiet) {
      console.log(chalk.dim(char.repeat(width)));
    }
  }

  /**
   * Print a section header.
   */
  section(title: string): void {
    if (!this.options.quiet) {
      console.log();
      console.log(chalk.bold(title));
      this.divider('=', title.length);
    }
  }

  /**
   * Print data as formatted JSON, even in quiet mode.
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  /**
   * Print a value meant for scripts, such as a new id, even in quiet mode.
   */
  result(value: string): void {
    console.log(value);
  }

  /**
   * Print a key-value pair.
   */
  keyValue(key: string, value: string | number): void {
    if (!this.options.quiet) {
      console.log(`${chalk.dim(key + ':')} ${value}`);
    }
  }

  // ==========================================================================
  // Utility Methods
  // ==========================================================================

  isVerbose(): boolean {
    return this.options.verbose === true;
  }

  isQuiet(): boolean {
    return this.options.quiet === true;
  }

  hasColor(): boolean {
    return this.useColor;
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Get the base command stored on the program by the preAction hook.
 * Falls back to a runtime-less instance built from the command's options.
 */
export function getBaseCommand(cmd: { optsWithGlobals(): Record<string, unknown> }): BaseCommand {
  const opts = cmd.optsWithGlobals();
  const base = opts['_baseCommand'];
  if (base instanceof BaseCommand) {
    return base;
  }
  return new BaseCommand({
    verbose: opts['verbose'] === true,
    quiet: opts['quiet'] === true,
    color: opts['color'] !== false,
    dataDir: typeof opts['dataDir'] === 'string' ? opts['dataDir'] : undefined,
  });
}
