/**
 * Feedback Commands
 *
 * `feedback submit`, `feedback list` and `feedback incorporate`.
 *
 * @module cli/commands/feedback
 */

import { Option, type Command } from 'commander';
import { FeedbackTypeSchema } from '../../schemas/index.js';
import { UsageError, getBaseCommand } from '../base-command.js';
import { formatFeedbackLine, formatStateSummary } from '../formatters/summary.js';

interface SubmitOptions {
  pipelineState: string;
  stage: string;
  content: string;
  type: string;
}

interface ListOptions {
  pipelineState: string;
  stage?: string;
  json?: boolean;
}

interface IncorporateOptions {
  pipelineState: string;
  feedback?: string[];
  all?: boolean;
}

async function submitHandler(options: SubmitOptions, cmd: Command): Promise<void> {
  const base = getBaseCommand(cmd);
  const feedbackId = await base
    .runtime()
    .service.submitFeedback(options.pipelineState, options.stage, options.content, options.type);

  base.success(`Recorded ${options.type} for ${options.stage}`);
  base.keyValue('Feedback id', feedbackId);
  if (base.isQuiet()) {
    base.result(feedbackId);
  }
}

async function listHandler(options: ListOptions, cmd: Command): Promise<void> {
  const base = getBaseCommand(cmd);
  const items = await base.runtime().service.listFeedback(options.pipelineState, options.stage);

  if (options.json) {
    base.json(items);
    return;
  }
  if (items.length === 0) {
    base.info('No feedback.');
    return;
  }
  for (const item of items) {
    console.log(formatFeedbackLine(item));
  }
}

async function incorporateHandler(options: IncorporateOptions, cmd: Command): Promise<void> {
  const base = getBaseCommand(cmd);
  const ids = options.feedback ?? [];
  if ((ids.length > 0) === Boolean(options.all)) {
    throw new UsageError('Specify either --feedback <ids...> or --all');
  }

  const summary = await base
    .runtime()
    .service.incorporateFeedback(
      options.pipelineState,
      options.all ? { all: true } : { feedbackIds: ids }
    );

  base.success('Feedback incorporated');
  base.info(formatStateSummary(summary));
}

export function registerFeedbackCommands(program: Command): void {
  const feedback = program.command('feedback').description('Review stage results');

  feedback
    .command('submit')
    .description('Submit feedback on a stage')
    .requiredOption('-p, --pipeline-state <id>', 'Pipeline state id')
    .requiredOption('-s, --stage <name>', 'Stage the feedback is about')
    .requiredOption('-c, --content <text>', 'Feedback text')
    .addOption(
      new Option('-t, --type <type>', 'Feedback type')
        .choices(FeedbackTypeSchema.options)
        .default('suggestion')
    )
    .action(submitHandler);

  feedback
    .command('list')
    .description('List feedback of a pipeline state')
    .requiredOption('-p, --pipeline-state <id>', 'Pipeline state id')
    .option('-s, --stage <name>', 'Only feedback on this stage')
    .option('--json', 'Output as JSON')
    .action(listHandler);

  feedback
    .command('incorporate')
    .description('Apply pending feedback to stage results')
    .requiredOption('-p, --pipeline-state <id>', 'Pipeline state id')
    .option('-f, --feedback <ids...>', 'Feedback ids, applied in the given order')
    .option('--all', 'Apply all pending feedback, most important last')
    .action(incorporateHandler);
}
