/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 *
 * Available commands:
 * - task: Create and inspect tasks
 * - pipeline: Run stages, inspect progress, checkpoints and rollback
 * - feedback: Submit, list and incorporate feedback
 * - context: Manage context items
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerContextCommands } from './context.js';
import { registerFeedbackCommands } from './feedback.js';
import { registerPipelineCommands } from './pipeline.js';
import { registerTaskCommands } from './task.js';

export function registerCommands(program: Command): void {
  registerTaskCommands(program);
  registerPipelineCommands(program);
  registerFeedbackCommands(program);
  registerContextCommands(program);
}

