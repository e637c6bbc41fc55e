/**
 * Pipeline Run Handle
 *
 * A `PipelineRun` is returned as soon as a background run starts. It exposes
 * the run's status, a `done` promise for the final outcome, and the controls
 * a human uses between stages (`resume`, `cancel`).
 *
 * @module pipeline/run
 */

import type { RunOutcome, RunStatus } from './types.js';

const TERMINAL_STATUSES: readonly RunStatus[] = ['completed', 'failed', 'cancelled'];

/**
 * Handle on one detached pipeline run.
 *
 * @example
 * ```typescript
 * const run = await orchestrator.startPipeline(taskId, { waitForFeedback: true });
 * // ... later, after reviewing the paused stage
 * run.resume();
 * const outcome = await run.done;
 * ```
 */
export class PipelineRun {
  /** Resolves with the final outcome; never rejects */
  readonly done: Promise<RunOutcome>;

  private currentStatus: RunStatus = 'idle';
  private cancelRequested = false;
  private readonly abortController = new AbortController();
  private releasePause: ((resumed: boolean) => void) | null = null;
  private settle: (outcome: RunOutcome) => void = () => undefined;

  constructor(
    readonly pipelineStateId: string,
    readonly taskId: string
  ) {
    this.done = new Promise<RunOutcome>((resolve) => {
      this.settle = resolve;
    });
  }

  get status(): RunStatus {
    return this.currentStatus;
  }

  /** True once `cancel()` has been called */
  get isCancellationRequested(): boolean {
    return this.cancelRequested;
  }

  /** Aborted when the run is cancelled */
  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  get isTerminal(): boolean {
    return TERMINAL_STATUSES.includes(this.currentStatus);
  }

  /**
   * Request cancellation. Takes effect at the next stage boundary; a stage
   * already in flight is signalled and its result discarded.
   *
   * @returns false if the run had already finished
   */
  cancel(): boolean {
    if (this.isTerminal) {
      return false;
    }
    this.cancelRequested = true;
    this.abortController.abort();
    this.release(false);
    return true;
  }

  /**
   * Continue a run paused for feedback.
   *
   * @returns false if the run was not paused
   */
  resume(): boolean {
    if (this.currentStatus !== 'paused') {
      return false;
    }
    this.currentStatus = 'running';
    this.release(true);
    return true;
  }

  // ==========================================================================
  // Driven by the orchestrator
  // ==========================================================================

  /** @internal */
  markRunning(): void {
    this.currentStatus = 'running';
  }

  /**
   * Pause until `resume()` or `cancel()` is called.
   *
   * @internal
   * @returns true when resumed, false when cancelled
   */
  pause(): Promise<boolean> {
    if (this.cancelRequested) {
      return Promise.resolve(false);
    }
    this.currentStatus = 'paused';
    return new Promise<boolean>((resolve) => {
      this.releasePause = resolve;
    });
  }

  /** @internal */
  finish(outcome: RunOutcome): void {
    this.currentStatus = outcome.status;
    this.releasePause = null;
    this.settle(outcome);
  }

  private release(resumed: boolean): void {
    const release = this.releasePause;
    this.releasePause = null;
    release?.(resumed);
  }
}
