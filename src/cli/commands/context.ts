/**
 * Context Commands
 *
 * Store reference material that tasks can point at with `--context`.
 *
 * @module cli/commands/context
 */

import { Option, type Command } from 'commander';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createContextItem } from '../../context/provider.js';
import { ContentTypeSchema, type ContentType } from '../../schemas/index.js';
import { UsageError, getBaseCommand } from '../base-command.js';

interface AddOptions {
  file?: string;
  content?: string;
  source?: string;
  contentType?: ContentType;
}

interface ListOptions {
  contentType?: ContentType;
  json?: boolean;
}

async function addHandler(options: AddOptions, cmd: Command): Promise<void> {
  const base = getBaseCommand(cmd);
  if (Boolean(options.file) === (options.content !== undefined)) {
    throw new UsageError('Specify exactly one of --file <path> or --content <text>');
  }

  const content = options.file ? await fs.readFile(options.file, 'utf-8') : (options.content ?? '');
  const source = options.source ?? (options.file ? path.basename(options.file) : 'inline');
  const item = createContextItem({ source, content, contentType: options.contentType });
  await base.runtime().context.save(item);

  base.success(`Added context item ${item.id}`);
  base.keyValue('Source', item.source);
  base.keyValue('Content type', item.contentType);
  if (base.isQuiet()) {
    base.result(item.id);
  }
}

async function listHandler(options: ListOptions, cmd: Command): Promise<void> {
  const base = getBaseCommand(cmd);
  const items = await base.runtime().context.list({ contentType: options.contentType });

  if (options.json) {
    base.json(items);
    return;
  }
  if (items.length === 0) {
    base.info('No context items.');
    return;
  }
  for (const item of items) {
    console.log(`${item.id}  ${item.source}  [${item.contentType}]  (${item.content.length} chars)`);
  }
}

async function removeHandler(contextId: string, _options: unknown, cmd: Command): Promise<void> {
  const base = getBaseCommand(cmd);
  await base.runtime().context.remove(contextId);
  base.success(`Removed context item ${contextId}`);
}

export function registerContextCommands(program: Command): void {
  const context = program.command('context').description('Manage context items');

  context
    .command('add')
    .description('Store a context item')
    .option('-f, --file <path>', 'Read the content from a file')
    .option('--content <text>', 'Inline content')
    .option('-s, --source <name>', 'Source label (default: file name, or "inline")')
    .addOption(
      new Option('-t, --content-type <type>', 'Content type (default: from the source extension)')
        .choices(ContentTypeSchema.options)
    )
    .action(addHandler);

  context
    .command('list')
    .description('List context items, oldest first')
    .addOption(
      new Option('-t, --content-type <type>', 'Only items of this type').choices(
        ContentTypeSchema.options
      )
    )
    .option('--json', 'Output as JSON')
    .action(listHandler);

  context
    .command('remove <contextId>')
    .description('Delete a context item')
    .action(removeHandler);
}
