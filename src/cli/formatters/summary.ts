/**
 * Summary Formatters
 *
 * Plain-text renderings of run outcomes, pipeline states, tasks,
 * checkpoints and feedback for terminal output.
 *
 * @module cli/formatters/summary
 */

import chalk from 'chalk';
import type { Checkpoint, FeedbackItem, Task } from '../../schemas/index.js';
import { formatPercentage } from '../../pipeline/progress.js';
import type { StateSummary } from '../../pipeline/service.js';
import type { RunOutcome } from '../../pipeline/types.js';
import { formatDuration, renderProgressBar } from './progress.js';

// ============================================================================
// Runs
// ============================================================================

/**
 * Format the outcome of a pipeline run.
 *
 * @example
 * ```
 * === Run completed ===
 * Pipeline state: 6f1c...
 * Stages run:     requirements_gathering, knowledge_gathering
 * Duration:       1m 12s
 * ```
 */
export function formatRunOutcome(outcome: RunOutcome): string {
  const status =
    outcome.status === 'completed'
      ? chalk.green(outcome.status)
      : outcome.status === 'failed'
        ? chalk.red(outcome.status)
        : chalk.yellow(outcome.status);

  const lines = [
    chalk.bold(`=== Run ${status} ===`),
    `Pipeline state: ${chalk.cyan(outcome.pipelineStateId)}`,
    `Stages run:     ${outcome.stagesExecuted.length > 0 ? outcome.stagesExecuted.join(', ') : '(none)'}`,
    `Duration:       ${formatDuration(outcome.timing.durationMs)}`,
  ];

  if (outcome.status !== 'completed') {
    lines.push(`Next stage:     ${outcome.state.currentStage}`);
  }
  if (outcome.error) {
    lines.push(chalk.red(`Error:          ${outcome.error.message}`));
  }

  return lines.join('\n');
}

// ============================================================================
// States
// ============================================================================

export function formatStateSummary(summary: StateSummary): string {
  const { progress } = summary;
  return [
    `Pipeline state: ${chalk.cyan(summary.pipelineStateId)}`,
    `Task:           ${summary.taskId}`,
    `Status:         ${progress.status}`,
    `Current stage:  ${summary.currentStage}`,
    `Completed:      ${progress.completedStages.length}/${progress.totalStages} (${formatPercentage(progress.percentage)})`,
    `Progress:       ${renderProgressBar(progress.percentage, 20)}`,
    `Pending feedback: ${summary.pendingFeedback}`,
    `Updated:        ${summary.updatedAt}`,
  ].join('\n');
}

// ============================================================================
// Lists
// ============================================================================

export function formatTaskLine(task: Task): string {
  return `${chalk.cyan(task.id)}  ${task.status.padEnd(11)}  ${task.description}`;
}

export function formatCheckpointLine(checkpoint: Checkpoint): string {
  const completed = checkpoint.snapshot.stagesCompleted.length;
  return (
    `${chalk.cyan(checkpoint.id)}  ${checkpoint.createdAt}  ${checkpoint.label}` +
    chalk.dim(`  (at ${checkpoint.stage}, ${completed} completed)`)
  );
}

export function formatFeedbackLine(item: FeedbackItem): string {
  const state = item.incorporated ? chalk.green('incorporated') : chalk.yellow('pending');
  return `${chalk.cyan(item.id)}  ${item.stageName}  [${item.type}]  ${state}  ${item.content}`;
}
