/**
 * Pipeline Orchestrator
 *
 * Sequences stage execution over a pipeline state:
 * - `runStage` executes one stage and commits it
 * - `startPipeline` runs every remaining stage as a detached background run
 *   and returns a `PipelineRun` handle immediately
 * - `runPipeline` is `startPipeline` followed by awaiting the outcome
 *
 * Each loop iteration reloads the latest committed state, so feedback
 * incorporated or a rollback committed while a run is paused is picked up
 * when it resumes. At most one run per pipeline state is active in a process.
 *
 * @module pipeline/orchestrator
 */

import type { Checkpoint, PipelineState, TaskStatus } from '../schemas/index.js';
import type { StateStore, TaskRepository } from '../storage/store.js';
import { CheckpointManager, beforeStageLabel } from './checkpoint.js';
import {
  NotFoundError,
  RunInProgressError,
  isPipelineError,
} from './errors.js';
import { StageExecutor, type ExecutionResult } from './executor.js';
import type { StageRegistry } from './registry.js';
import { PipelineRun } from './run.js';
import { assertCanAdvance, createInitialState, isComplete } from './state.js';
import type {
  ContextProvider,
  Logger,
  OrchestratorCallbacks,
  RunOutcome,
  RunOutcomeStatus,
  RunPipelineOptions,
  RunStageOptions,
} from './types.js';

export interface PipelineOrchestratorOptions {
  registry: StageRegistry;
  store: StateStore;
  tasks: TaskRepository;
  context: ContextProvider;
  /** Shared with the service so checkpoint settings stay consistent */
  checkpoints?: CheckpointManager;
  /** Default attempts per stage for runs that do not set their own */
  maxStageAttempts?: number;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Mutable bookkeeping of one background run.
 */
interface RunProgress {
  startedAt: Date;
  stagesExecuted: string[];
  perStage: Record<string, number>;
  lastState: PipelineState;
}

export class PipelineOrchestrator {
  private readonly registry: StageRegistry;
  private readonly store: StateStore;
  private readonly tasks: TaskRepository;
  private readonly executor: StageExecutor;
  private readonly checkpoints: CheckpointManager;
  private readonly defaultMaxStageAttempts: number;
  private readonly logger?: Logger;
  private readonly now: () => Date;
  private readonly activeRuns = new Map<string, PipelineRun>();
  private callbacks: OrchestratorCallbacks = {};

  constructor(options: PipelineOrchestratorOptions) {
    this.registry = options.registry;
    this.store = options.store;
    this.tasks = options.tasks;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
    this.defaultMaxStageAttempts = normalizeAttempts(options.maxStageAttempts);
    this.checkpoints =
      options.checkpoints ??
      new CheckpointManager({ store: options.store, logger: options.logger, now: this.now });
    this.executor = new StageExecutor({
      registry: options.registry,
      tasks: options.tasks,
      context: options.context,
      logger: options.logger,
      now: this.now,
    });
  }

  /**
   * Set event callbacks for the run lifecycle.
   */
  setCallbacks(callbacks: OrchestratorCallbacks): void {
    this.callbacks = callbacks;
  }

  // ==========================================================================
  // Single Steps
  // ==========================================================================

  /**
   * Create and persist a fresh pipeline state for a task.
   *
   * @throws NotFoundError if the task does not exist
   */
  async createRun(taskId: string): Promise<PipelineState> {
    const task = await this.tasks.get(taskId);
    const state = createInitialState(task, this.registry, { now: this.now() });
    await this.store.save(state, null);
    this.logger?.info(`Created pipeline state ${state.id} for task ${task.id}`);
    return state;
  }

  /**
   * Execute one stage and commit the result.
   *
   * @returns The committed state
   * @throws RunInProgressError if a background run owns the state
   * @throws IllegalTransitionError if the stage may not run next
   * @throws StageExecutionFailedError if the stage fails (nothing is committed
   *   except, in non-transactional mode, the checkpoint taken before it)
   */
  async runStage(
    pipelineStateId: string,
    stageName: string,
    options: RunStageOptions = {}
  ): Promise<PipelineState> {
    const { createCheckpoint = true, useTransaction = false } = options;

    if (this.activeRuns.has(pipelineStateId)) {
      throw new RunInProgressError(pipelineStateId);
    }

    const state = await this.store.load(pipelineStateId);
    assertCanAdvance(state, this.registry, stageName);
    await this.setTaskStatus(state.taskId, 'in_progress');

    const checkpoint = createCheckpoint
      ? await this.prepareCheckpoint(state, stageName, useTransaction)
      : undefined;

    this.callbacks.onStageStart?.(pipelineStateId, stageName, 1);

    let result: ExecutionResult;
    try {
      result = await this.executor.execute(state, stageName);
    } catch (error) {
      const failure = toError(error);
      this.callbacks.onStageError?.(pipelineStateId, stageName, failure);
      if (isPipelineError(error, 'StageExecutionFailed')) {
        await this.setTaskStatus(state.taskId, 'failed');
      }
      throw error;
    }

    await this.commitStage(state, result, useTransaction ? checkpoint : undefined);

    if (isComplete(result.state, this.registry)) {
      await this.setTaskStatus(state.taskId, 'completed');
    }

    return result.state;
  }

  // ==========================================================================
  // Background Runs
  // ==========================================================================

  /**
   * Start running the remaining stages in the background.
   *
   * The pipeline state is resolved before this returns: an explicit
   * `pipelineStateId`, else the task's latest state when
   * `continueFromCurrent` is set, else a new state.
   *
   * @throws NotFoundError if the task or explicit state does not exist, or
   *   the state belongs to another task
   * @throws RunInProgressError if a run is already active for the state
   */
  async startPipeline(taskId: string, options: RunPipelineOptions = {}): Promise<PipelineRun> {
    const state = await this.resolveState(taskId, options);

    if (this.activeRuns.has(state.id)) {
      throw new RunInProgressError(state.id);
    }

    const run = new PipelineRun(state.id, taskId);
    this.activeRuns.set(state.id, run);

    this.logger?.info(`Starting pipeline run for state ${state.id} at ${state.currentStage}`);

    // The loop reports stage and storage failures through the run outcome;
    // this only sees errors thrown by callbacks while finishing.
    this.executeRun(run, state, options).catch((error: unknown) => {
      this.activeRuns.delete(state.id);
      this.logger?.error(`Pipeline run for ${state.id} ended abnormally`, error);
    });

    return run;
  }

  /**
   * Run the remaining stages and wait for the outcome.
   */
  async runPipeline(taskId: string, options: RunPipelineOptions = {}): Promise<RunOutcome> {
    const run = await this.startPipeline(taskId, options);
    return run.done;
  }

  /**
   * Resume a run paused for feedback.
   *
   * @returns false if no paused run exists for the state
   */
  resume(pipelineStateId: string): boolean {
    return this.activeRuns.get(pipelineStateId)?.resume() ?? false;
  }

  /**
   * Cancel an active run.
   *
   * @returns false if no active run exists for the state
   */
  cancel(pipelineStateId: string): boolean {
    return this.activeRuns.get(pipelineStateId)?.cancel() ?? false;
  }

  /**
   * Active run of a pipeline state, if any.
   */
  getRun(pipelineStateId: string): PipelineRun | undefined {
    return this.activeRuns.get(pipelineStateId);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async resolveState(taskId: string, options: RunPipelineOptions): Promise<PipelineState> {
    if (options.pipelineStateId !== undefined) {
      const state = await this.store.load(options.pipelineStateId);
      if (state.taskId !== taskId) {
        throw new NotFoundError(
          'pipeline_state',
          options.pipelineStateId,
          `Pipeline state ${options.pipelineStateId} does not belong to task ${taskId}`
        );
      }
      return state;
    }

    if (options.continueFromCurrent) {
      await this.tasks.get(taskId);
      const latest = await this.store.findLatestByTask(taskId);
      if (latest) {
        return latest;
      }
      this.logger?.info(`Task ${taskId} has no pipeline state yet; creating one`);
    }

    return this.createRun(taskId);
  }

  /**
   * The run loop. Every failure ends the run as `failed`.
   */
  private async executeRun(
    run: PipelineRun,
    initial: PipelineState,
    options: RunPipelineOptions
  ): Promise<void> {
    const {
      createCheckpoints = false,
      waitForFeedback = false,
      useTransactions = false,
    } = options;
    const maxAttempts = normalizeAttempts(options.maxStageAttempts, this.defaultMaxStageAttempts);

    const progress: RunProgress = {
      startedAt: this.now(),
      stagesExecuted: [],
      perStage: {},
      lastState: initial,
    };

    run.markRunning();

    try {
      await this.setTaskStatus(run.taskId, 'in_progress');

      for (;;) {
        if (run.isCancellationRequested) {
          await this.finishRun(run, progress, 'cancelled');
          return;
        }

        const state = await this.store.load(run.pipelineStateId);
        progress.lastState = state;

        if (isComplete(state, this.registry)) {
          await this.finishRun(run, progress, 'completed');
          return;
        }

        const stageName = state.currentStage;
        const checkpoint = createCheckpoints
          ? await this.prepareCheckpoint(state, stageName, useTransactions)
          : undefined;

        const result = await this.executeWithRetry(run, state, stageName, maxAttempts);

        if (run.isCancellationRequested) {
          this.logger?.info(`Discarding result of ${stageName}: run was cancelled`);
          await this.finishRun(run, progress, 'cancelled');
          return;
        }

        await this.commitStage(state, result, useTransactions ? checkpoint : undefined);

        progress.lastState = result.state;
        progress.stagesExecuted.push(stageName);
        progress.perStage[stageName] = result.durationMs;

        if (isComplete(result.state, this.registry)) {
          await this.finishRun(run, progress, 'completed');
          return;
        }

        if (waitForFeedback) {
          this.logger?.info(`Paused after ${stageName}; waiting for feedback`);
          const paused = run.pause();
          this.callbacks.onPause?.(run.pipelineStateId, result.state);
          if (!(await paused)) {
            await this.finishRun(run, progress, 'cancelled');
            return;
          }
        }
      }
    } catch (error) {
      await this.finishRun(run, progress, 'failed', toError(error));
    }
  }

  /**
   * Execute a stage, retrying stage failures up to `maxAttempts` times.
   */
  private async executeWithRetry(
    run: PipelineRun,
    state: PipelineState,
    stageName: string,
    maxAttempts: number
  ): Promise<ExecutionResult> {
    for (let attempt = 1; ; attempt++) {
      this.callbacks.onStageStart?.(run.pipelineStateId, stageName, attempt);

      try {
        return await this.executor.execute(state, stageName, { signal: run.signal });
      } catch (error) {
        this.callbacks.onStageError?.(run.pipelineStateId, stageName, toError(error));

        const retryable = isPipelineError(error, 'StageExecutionFailed');
        if (!retryable || attempt >= maxAttempts || run.isCancellationRequested) {
          throw error;
        }
        this.logger?.warn(
          `Stage ${stageName} failed (attempt ${attempt}/${maxAttempts}), retrying`
        );
      }
    }
  }

  /**
   * Build the checkpoint taken before a stage. Outside a transaction it is
   * persisted right away; inside one it is committed with the stage result.
   */
  private async prepareCheckpoint(
    state: PipelineState,
    stageName: string,
    transactional: boolean
  ): Promise<Checkpoint> {
    const checkpoint = this.checkpoints.snapshot(state, beforeStageLabel(stageName));
    if (!transactional) {
      await this.store.saveCheckpoint(checkpoint);
      this.callbacks.onCheckpoint?.(state.id, checkpoint.id, stageName);
    }
    return checkpoint;
  }

  private async commitStage(
    previous: PipelineState,
    result: ExecutionResult,
    transactionalCheckpoint: Checkpoint | undefined
  ): Promise<void> {
    await this.store.commit({
      state: result.state,
      expectedUpdatedAt: previous.updatedAt,
      checkpoints: transactionalCheckpoint ? [transactionalCheckpoint] : [],
    });

    if (transactionalCheckpoint) {
      this.callbacks.onCheckpoint?.(
        previous.id,
        transactionalCheckpoint.id,
        transactionalCheckpoint.stage
      );
    }

    const completed = result.state.stagesCompleted[result.state.stagesCompleted.length - 1];
    this.logger?.info(`Committed ${completed ?? previous.currentStage} for ${previous.id}`);
    this.callbacks.onStageComplete?.(previous.id, previous.currentStage, result.state);
  }

  private async finishRun(
    run: PipelineRun,
    progress: RunProgress,
    status: RunOutcomeStatus,
    error?: Error
  ): Promise<void> {
    if (run.isTerminal) {
      return;
    }

    let finalStatus = status;
    let finalError = error;

    const taskStatus: TaskStatus | undefined =
      status === 'completed' ? 'completed' : status === 'failed' ? 'failed' : undefined;

    if (taskStatus) {
      try {
        await this.setTaskStatus(run.taskId, taskStatus);
      } catch (statusError) {
        this.logger?.error(`Could not mark task ${run.taskId} ${taskStatus}`, statusError);
        if (finalStatus === 'completed') {
          finalStatus = 'failed';
          finalError = toError(statusError);
        }
      }
    }

    const completedAt = this.now();
    const outcome: RunOutcome = {
      pipelineStateId: run.pipelineStateId,
      status: finalStatus,
      state: progress.lastState,
      stagesExecuted: progress.stagesExecuted,
      ...(finalError ? { error: finalError } : {}),
      timing: {
        startedAt: progress.startedAt.toISOString(),
        completedAt: completedAt.toISOString(),
        durationMs: completedAt.getTime() - progress.startedAt.getTime(),
        perStage: progress.perStage,
      },
    };

    if (finalError) {
      this.logger?.error(`Pipeline run for ${run.pipelineStateId} failed: ${finalError.message}`);
    } else {
      this.logger?.info(`Pipeline run for ${run.pipelineStateId} ${finalStatus}`);
    }

    this.activeRuns.delete(run.pipelineStateId);
    run.finish(outcome);
    this.callbacks.onRunEnd?.(outcome);
  }

  /**
   * Move the task to `status` unless it is already there.
   */
  private async setTaskStatus(taskId: string, status: TaskStatus): Promise<void> {
    const task = await this.tasks.get(taskId);
    if (task.status !== status) {
      await this.tasks.updateStatus(taskId, status);
    }
  }
}

function normalizeAttempts(value: number | undefined, fallback = 1): number {
  if (value === undefined || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.max(1, Math.floor(value));
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
