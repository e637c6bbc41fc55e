/**
 * Task Commands
 *
 * `task create`, `task list` and `task view`.
 *
 * @module cli/commands/task
 */

import { Command, Option } from 'commander';
import * as fs from 'node:fs/promises';
import { TaskStatusSchema, type TaskStatus } from '../../schemas/index.js';
import { createTask, parseTaskInput } from '../../tasks/task.js';
import { UsageError, getBaseCommand } from '../base-command.js';
import { formatStateSummary, formatTaskLine } from '../formatters/summary.js';
import { collect } from './shared.js';

// ============================================================================
// Types
// ============================================================================

export interface CreateTaskOptions {
  description?: string;
  requirement: string[];
  constraint: string[];
  context: string[];
  /** File with a description line and requirement/constraint sections */
  file?: string;
}

interface ListTasksOptions {
  status?: TaskStatus;
  json?: boolean;
}

interface ViewTaskOptions {
  json?: boolean;
}

// ============================================================================
// Handlers
// ============================================================================

/**
 * Create a task from flags, a task file, or both. Flags add to what the
 * file provides, and `--description` replaces the file's description.
 */
export async function createTaskHandler(options: CreateTaskOptions, cmd: Command): Promise<void> {
  const base = getBaseCommand(cmd);
  const { tasks } = base.runtime();

  const parsed = options.file
    ? parseTaskInput(await fs.readFile(options.file, 'utf-8'))
    : { description: '', requirements: [], constraints: [] };

  const description = options.description ?? parsed.description;
  if (!description) {
    throw new UsageError('A task needs a description (--description or --file)');
  }

  const task = createTask({
    description,
    requirements: [...parsed.requirements, ...options.requirement],
    constraints: [...parsed.constraints, ...options.constraint],
    contextIds: options.context,
  });
  if (task.contextIds.length > 0) {
    await base.runtime().context.resolve(task.contextIds);
  }
  await tasks.create(task);

  base.success(`Created task ${task.id}`);
  base.keyValue('Requirements', task.requirements.length);
  base.keyValue('Constraints', task.constraints.length);
  if (base.isQuiet()) {
    base.result(task.id);
  }
}

async function listTasksHandler(options: ListTasksOptions, cmd: Command): Promise<void> {
  const base = getBaseCommand(cmd);
  const tasks = await base.runtime().tasks.list(options.status);

  if (options.json) {
    base.json(tasks);
    return;
  }
  if (tasks.length === 0) {
    base.info('No tasks found.');
    return;
  }
  for (const task of tasks) {
    console.log(formatTaskLine(task));
  }
}

async function viewTaskHandler(taskId: string, options: ViewTaskOptions, cmd: Command): Promise<void> {
  const base = getBaseCommand(cmd);
  const runtime = base.runtime();
  const task = await runtime.tasks.get(taskId);
  const latest = await runtime.service.findLatestState(taskId);

  if (options.json) {
    base.json({ task, pipeline: latest });
    return;
  }

  base.section(task.description);
  base.keyValue('Id', task.id);
  base.keyValue('Status', task.status);
  base.keyValue('Created', task.createdAt);
  base.info('Requirements:');
  for (const requirement of task.requirements) {
    base.info(`  - ${requirement}`);
  }
  if (task.constraints.length > 0) {
    base.info('Constraints:');
    for (const constraint of task.constraints) {
      base.info(`  - ${constraint}`);
    }
  }
  if (task.contextIds.length > 0) {
    base.keyValue('Context', task.contextIds.join(', '));
  }

  base.blank();
  base.info(latest ? formatStateSummary(latest) : 'No pipeline has run for this task yet.');
}

// ============================================================================
// Registration
// ============================================================================

export function registerTaskCommands(program: Command): void {
  const task = program.command('task').description('Create and inspect tasks');

  task
    .command('create')
    .description('Create a task')
    .option('-d, --description <text>', 'What should be built')
    .option('-r, --requirement <text>', 'Requirement (repeatable)', collect, [])
    .option('-c, --constraint <text>', 'Constraint (repeatable)', collect, [])
    .option('-i, --context <id>', 'Context item id (repeatable)', collect, [])
    .option('-f, --file <path>', 'Read description, requirements and constraints from a file')
    .action(createTaskHandler);

  task
    .command('list')
    .description('List tasks, oldest first')
    .addOption(new Option('--status <status>', 'Only tasks in this status').choices(TaskStatusSchema.options))
    .option('--json', 'Output as JSON')
    .action(listTasksHandler);

  task
    .command('view <taskId>')
    .description('Show a task and its latest pipeline state')
    .option('--json', 'Output as JSON')
    .action(viewTaskHandler);
}
