/**
 * Progress Formatters
 *
 * CLI progress display utilities including:
 * - Spinner for long-running operations
 * - Stage progress display with checkmarks, fed by orchestrator callbacks
 * - Text progress bar for `pipeline progress`
 *
 * Uses the ora library for terminal spinners.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { OrchestratorCallbacks } from '../../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Stage display status for progress tracking.
 */
export type StageStatus = 'pending' | 'running' | 'completed' | 'failed';

/**
 * Stage display information.
 */
export interface StageDisplay {
  /** Stage name */
  name: string;
  /** Current status */
  status: StageStatus;
  /** Attempt currently or last running */
  attempt?: number;
  /** Duration in milliseconds (if completed) */
  durationMs?: number;
  /** Error message (if failed) */
  error?: string;
}

/**
 * Progress spinner options.
 */
export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
}

// ============================================================================
// Status Icons
// ============================================================================

const STATUS_ICONS: Record<StageStatus, string> = {
  pending: '○',
  running: '●',
  completed: '✔',
  failed: '✘',
};

/**
 * Plain text icons for non-TTY output.
 */
const STATUS_ICONS_PLAIN: Record<StageStatus, string> = {
  pending: '[ ]',
  running: '[*]',
  completed: '[+]',
  failed: '[X]',
};

const STATUS_COLORS: Record<StageStatus, (text: string) => string> = {
  pending: chalk.dim,
  running: chalk.cyan,
  completed: chalk.green,
  failed: chalk.red,
};

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('Running review...');
 * spinner.start();
 * await service.runOneStage(id, 'review');
 * spinner.succeed('review complete');
 * ```
 */
export class ProgressSpinner {
  private spinner: Ora;
  private startTime: number = 0;

  constructor(text: string, options: SpinnerOptions = {}) {
    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: process.stdout.isTTY === true,
      stream: process.stdout,
    });
  }

  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  update(text: string): this {
    this.spinner.text = text;
    return this;
  }

  /**
   * Stop spinner with success state, appending the elapsed time.
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

  warn(text?: string): this {
    this.spinner.warn(text);
    return this;
  }

  stop(): this {
    this.spinner.stop();
    return this;
  }

  isSpinning(): boolean {
    return this.spinner.isSpinning;
  }
}

// ============================================================================
// Stage Progress Display
// ============================================================================

/**
 * Display pipeline stage progress with checkmarks.
 *
 * @example
 * ```typescript
 * const display = new StageProgressDisplay(service.registry.names, state.stagesCompleted);
 * service.setCallbacks(display.callbacks());
 * const outcome = await run.done;
 * display.printSummary();
 * ```
 */
export class StageProgressDisplay {
  private readonly stages = new Map<string, StageDisplay>();
  private readonly startedAt = new Map<string, number>();
  private readonly isTTY: boolean;
  private currentSpinner: ProgressSpinner | null = null;

  /**
   * @param stageNames - Stages in execution order
   * @param completed - Stages already completed before this run
   */
  constructor(stageNames: readonly string[], completed: readonly string[] = []) {
    this.isTTY = process.stdout.isTTY === true;

    for (const name of stageNames) {
      this.stages.set(name, {
        name,
        status: completed.includes(name) ? 'completed' : 'pending',
      });
    }
  }

  startStage(name: string, attempt = 1): void {
    const stage = this.stages.get(name);
    if (!stage) {
      return;
    }
    stage.status = 'running';
    stage.attempt = attempt;
    stage.error = undefined;
    this.startedAt.set(name, Date.now());

    const label = attempt > 1 ? `${name} (attempt ${attempt})` : name;
    if (this.isTTY) {
      this.currentSpinner = new ProgressSpinner(`${label}...`);
      this.currentSpinner.start();
    } else {
      console.log(`[*] ${label}...`);
    }
  }

  completeStage(name: string, durationMs = this.elapsed(name)): void {
    const stage = this.stages.get(name);
    if (!stage) {
      return;
    }
    stage.status = 'completed';
    stage.durationMs = durationMs;

    if (this.currentSpinner) {
      this.currentSpinner.succeed(`${name} complete`);
      this.currentSpinner = null;
    } else {
      console.log(`[+] ${name} (${formatDuration(durationMs)})`);
    }
  }

  failStage(name: string, error: string): void {
    const stage = this.stages.get(name);
    if (!stage) {
      return;
    }
    stage.status = 'failed';
    stage.error = error;

    if (this.currentSpinner) {
      this.currentSpinner.fail(`${name} failed: ${error}`);
      this.currentSpinner = null;
    } else {
      console.log(`[X] ${name} - ${error}`);
    }
  }

  getStageDisplay(name: string): StageDisplay | undefined {
    return this.stages.get(name);
  }

  getAllStages(): StageDisplay[] {
    return Array.from(this.stages.values());
  }

  formatStageLine(stage: StageDisplay): string {
    const icon = this.isTTY
      ? STATUS_COLORS[stage.status](STATUS_ICONS[stage.status])
      : STATUS_ICONS_PLAIN[stage.status];

    let line = `${icon} ${stage.name}`;

    if (stage.durationMs !== undefined) {
      line += chalk.dim(` (${formatDuration(stage.durationMs)})`);
    }

    if (stage.error) {
      line += chalk.red(` - ${stage.error}`);
    }

    return line;
  }

  printSummary(): void {
    console.log();
    console.log(chalk.bold('Pipeline Progress'));
    console.log(chalk.dim('─'.repeat(40)));

    for (const stage of this.getAllStages()) {
      console.log(this.formatStageLine(stage));
    }

    console.log();
  }

  getCounts(): Record<StageStatus, number> {
    const counts: Record<StageStatus, number> = {
      pending: 0,
      running: 0,
      completed: 0,
      failed: 0,
    };

    for (const stage of this.stages.values()) {
      counts[stage.status]++;
    }

    return counts;
  }

  /**
   * Orchestrator callbacks that drive this display.
   */
  callbacks(): OrchestratorCallbacks {
    return {
      onStageStart: (_id, stageName, attempt) => this.startStage(stageName, attempt),
      onStageComplete: (_id, stageName) => this.completeStage(stageName),
      onStageError: (_id, stageName, error) => this.failStage(stageName, error.message),
    };
  }

  /**
   * Stop a spinner left running, e.g. when a run is cancelled mid-stage.
   */
  stop(): void {
    this.currentSpinner?.stop();
    this.currentSpinner = null;
  }

  private elapsed(name: string): number {
    const started = this.startedAt.get(name);
    return started === undefined ? 0 : Date.now() - started;
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Render a percentage as a fixed-width bar.
 *
 * @example
 * renderProgressBar(40, 10); // '████░░░░░░ 40%'
 */
export function renderProgressBar(percentage: number, width = 30): string {
  const clamped = Math.max(0, Math.min(100, percentage));
  const filled = Math.round((clamped / 100) * width);
  const bar = chalk.green('█'.repeat(filled)) + chalk.dim('░'.repeat(width - filled));
  return `${bar} ${Math.round(clamped)}%`;
}

/**
 * Format a duration in milliseconds to human-readable string.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

export function createSpinner(text: string, options?: SpinnerOptions): ProgressSpinner {
  return new ProgressSpinner(text, options);
}
