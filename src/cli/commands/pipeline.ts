/**
 * Pipeline Commands
 *
 * Create pipeline states, execute stages, inspect progress and checkpoints,
 * and roll back.
 *
 * @module cli/commands/pipeline
 */

import type { Command } from 'commander';
import type { RunOutcome } from '../../pipeline/types.js';
import { EXIT_CODES, ReportedError, UsageError, getBaseCommand } from '../base-command.js';
import { StageProgressDisplay, createSpinner } from '../formatters/progress.js';
import {
  formatCheckpointLine,
  formatRunOutcome,
  formatStateSummary,
} from '../formatters/summary.js';
import { parsePositiveInt } from './shared.js';

// ============================================================================
// Types
// ============================================================================

export interface ExecuteOptions {
  task: string;
  /** Continue the task's latest pipeline state */
  continue?: boolean;
  pipelineStateId?: string;
  /** Take a checkpoint before each stage */
  checkpoints?: boolean;
  /** Stop after each stage so feedback can be given */
  feedback?: boolean;
  transactions?: boolean;
  maxAttempts?: number;
}

interface ExecuteStageOptions {
  pipelineState: string;
  stage: string;
  /** commander turns --no-checkpoint into checkpoint: false */
  checkpoint: boolean;
}

interface StateOptions {
  pipelineState: string;
  json?: boolean;
}

interface RollbackOptions {
  pipelineState: string;
  checkpoint?: string;
  latest?: boolean;
}

// ============================================================================
// Handlers
// ============================================================================

async function createHandler(options: { task: string }, cmd: Command): Promise<void> {
  const base = getBaseCommand(cmd);
  const created = await base.runtime().service.createRun(options.task);

  base.success(`Created pipeline state ${created.pipelineStateId}`);
  base.keyValue('First stage', created.currentStage);
  if (base.isQuiet()) {
    base.result(created.pipelineStateId);
  }
}

/**
 * Run the remaining stages in the foreground. With `--feedback` the run is
 * ended at its first pause; the committed state is picked up again by
 * `--continue` once feedback has been incorporated.
 */
export async function executeHandler(options: ExecuteOptions, cmd: Command): Promise<void> {
  const base = getBaseCommand(cmd);
  const { service } = base.runtime();
  const display = new StageProgressDisplay(service.registry.names);

  let pausedAfter: string | undefined;
  service.setCallbacks({
    ...(base.isQuiet() ? {} : display.callbacks()),
    onPause: (pipelineStateId, state) => {
      pausedAfter = state.stagesCompleted[state.stagesCompleted.length - 1];
      service.cancelRun(pipelineStateId);
    },
  });

  const run = await service.orchestrator.startPipeline(options.task, {
    continueFromCurrent: options.continue,
    pipelineStateId: options.pipelineStateId,
    createCheckpoints: options.checkpoints,
    waitForFeedback: options.feedback,
    useTransactions: options.transactions,
    maxStageAttempts: options.maxAttempts,
  });
  base.debug(`Running pipeline state ${run.pipelineStateId}`);

  let interrupted = false;
  const onSigint = (): void => {
    interrupted = true;
    run.cancel();
  };
  process.once('SIGINT', onSigint);

  let outcome: RunOutcome;
  try {
    outcome = await run.done;
  } finally {
    process.removeListener('SIGINT', onSigint);
    display.stop();
  }

  base.blank();
  base.info(formatRunOutcome(outcome));

  if (outcome.status === 'failed') {
    throw new ReportedError(EXIT_CODES.ERROR, outcome.error?.message ?? 'Pipeline run failed');
  }
  if (outcome.status === 'cancelled') {
    if (interrupted) {
      throw new ReportedError(EXIT_CODES.CANCELLED, 'Pipeline run cancelled');
    }
    if (pausedAfter) {
      base.blank();
      base.info(
        `Paused after ${pausedAfter} for feedback. Submit and incorporate feedback, then run ` +
          `"stagecraft pipeline execute -t ${options.task} --continue".`
      );
    }
  }
  if (base.isQuiet()) {
    base.result(outcome.pipelineStateId);
  }
}

async function executeStageHandler(options: ExecuteStageOptions, cmd: Command): Promise<void> {
  const base = getBaseCommand(cmd);
  const { service } = base.runtime();

  const spinner = createSpinner(`Running ${options.stage}...`).start();
  try {
    const summary = await service.runOneStage(
      options.pipelineState,
      options.stage,
      options.checkpoint
    );
    spinner.succeed(`${options.stage} complete`);
    base.info(formatStateSummary(summary));
  } catch (error) {
    spinner.fail(`${options.stage} failed`);
    throw error;
  }
}

async function progressHandler(options: StateOptions, cmd: Command): Promise<void> {
  const base = getBaseCommand(cmd);
  const summary = await base.runtime().service.getState(options.pipelineState);

  if (options.json) {
    base.json(summary);
    return;
  }
  base.info(formatStateSummary(summary));
}

async function checkpointsHandler(options: StateOptions, cmd: Command): Promise<void> {
  const base = getBaseCommand(cmd);
  const checkpoints = await base.runtime().service.listCheckpoints(options.pipelineState);

  if (options.json) {
    base.json(
      checkpoints.map(({ snapshot, ...checkpoint }) => ({
        ...checkpoint,
        stagesCompleted: snapshot.stagesCompleted,
      }))
    );
    return;
  }
  if (checkpoints.length === 0) {
    base.info('No checkpoints.');
    return;
  }
  for (const checkpoint of checkpoints) {
    console.log(formatCheckpointLine(checkpoint));
  }
}

async function rollbackHandler(options: RollbackOptions, cmd: Command): Promise<void> {
  const base = getBaseCommand(cmd);
  if (Boolean(options.checkpoint) === Boolean(options.latest)) {
    throw new UsageError('Specify exactly one of --checkpoint <id> or --latest');
  }

  const { service } = base.runtime();
  const summary = options.checkpoint
    ? await service.rollback(options.pipelineState, options.checkpoint)
    : await service.rollbackToLatest(options.pipelineState);

  if (!summary) {
    throw new UsageError(`Pipeline state ${options.pipelineState} has no checkpoint to roll back to`);
  }

  base.success(`Rolled back to ${summary.currentStage}`);
  base.info(formatStateSummary(summary));
}

// ============================================================================
// Registration
// ============================================================================

export function registerPipelineCommands(program: Command): void {
  const pipeline = program.command('pipeline').description('Run and inspect pipelines');

  pipeline
    .command('create')
    .description('Create a new pipeline state for a task')
    .requiredOption('-t, --task <id>', 'Task id')
    .action(createHandler);

  pipeline
    .command('execute')
    .description('Run the remaining stages of a task')
    .requiredOption('-t, --task <id>', 'Task id')
    .option('--continue', "Continue the task's latest pipeline state")
    .option('-p, --pipeline-state-id <id>', 'Run this pipeline state')
    .option('--checkpoints', 'Take a checkpoint before each stage')
    .option('--feedback', 'Stop after each stage for feedback')
    .option('--transactions', 'Commit each stage and its checkpoint atomically')
    .option('--max-attempts <n>', 'Attempts per stage before failing', parsePositiveInt)
    .action(executeHandler);

  pipeline
    .command('execute-stage')
    .description('Run a single stage')
    .requiredOption('-p, --pipeline-state <id>', 'Pipeline state id')
    .requiredOption('-s, --stage <name>', 'Stage to run')
    .option('--no-checkpoint', 'Skip the checkpoint before the stage')
    .action(executeStageHandler);

  pipeline
    .command('progress')
    .description('Show the progress of a pipeline state')
    .requiredOption('-p, --pipeline-state <id>', 'Pipeline state id')
    .option('--json', 'Output as JSON')
    .action(progressHandler);

  pipeline
    .command('checkpoints')
    .description('List checkpoints, oldest first')
    .requiredOption('-p, --pipeline-state <id>', 'Pipeline state id')
    .option('--json', 'Output as JSON')
    .action(checkpointsHandler);

  pipeline
    .command('rollback')
    .description('Restore a pipeline state from a checkpoint')
    .requiredOption('-p, --pipeline-state <id>', 'Pipeline state id')
    .option('-c, --checkpoint <id>', 'Checkpoint to restore')
    .option('--latest', 'Restore the most recent checkpoint')
    .action(rollbackHandler);
}
