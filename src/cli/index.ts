#!/usr/bin/env node
/**
 * stagecraft CLI
 *
 * Main entry point for the stagecraft command.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   stagecraft --help
 *   stagecraft task create -d "Build a URL shortener" -r "Shorten URLs"
 *   stagecraft pipeline execute -t <taskId> --checkpoints
 *   stagecraft pipeline rollback -p <stateId> --latest
 *
 * @module cli
 */

import { Command, CommanderError } from 'commander';
import { createConsoleLogger } from '../pipeline/logger.js';
import { VERSION } from './version.js';
import {
  BaseCommand,
  EXIT_CODES,
  ReportedError,
  UsageError,
  describeError,
  exitCodeFor,
  type ExitCode,
  type GlobalOptions,
  type RuntimeFactory,
} from './base-command.js';
import { registerCommands } from './commands/index.js';
import { createRuntime } from './runtime.js';

// ============================================================================
// Main Program Setup
// ============================================================================

export interface ProgramOptions {
  /** Builds the runtime commands work against (default: file storage + LLM stages) */
  runtimeFactory?: RuntimeFactory;
}

const defaultRuntimeFactory: RuntimeFactory = (base) =>
  createRuntime({
    dataDir: base.dataDir,
    logger: createConsoleLogger({ verbose: base.isVerbose(), quiet: base.isQuiet() }),
  });

/**
 * Create and configure the main CLI program.
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command();

  // Program metadata
  program
    .name('stagecraft')
    .description('Run code-generation tasks through staged pipelines with checkpoints and feedback')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('--data-dir <path>', 'Override default data directory (~/.stagecraft)');

  // Create base command helper with global options
  program.hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();

    // Validate mutually exclusive flags
    if (opts.verbose && opts.quiet) {
      throw new UsageError('Cannot use both --verbose and --quiet flags');
    }

    const baseCommand = new BaseCommand(opts, options.runtimeFactory ?? defaultRuntimeFactory);

    // Store base command in program for subcommands to access
    thisCommand.setOptionValue('_baseCommand', baseCommand);
  });

  // Commander errors are thrown instead of exiting; inherited by subcommands
  program.exitOverride();

  // Register all subcommands
  registerCommands(program);

  return program;
}

/**
 * Parse arguments, execute the command and report failures.
 *
 * @returns Exit code for the process
 */
export async function main(
  argv: string[] = process.argv,
  options: ProgramOptions = {}
): Promise<ExitCode> {
  const program = createProgram(options);

  try {
    await program.parseAsync(argv);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander has already printed help, version or the usage problem
      return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE_ERROR;
    }

    if (!(error instanceof ReportedError)) {
      new BaseCommand(program.opts<GlobalOptions>()).error(describeError(error), error);
    }
    return exitCodeFor(error);
  }
}

// Run if executed directly
if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = EXIT_CODES.ERROR;
    }
  );
}
