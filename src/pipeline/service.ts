/**
 * Pipeline Service
 *
 * The operations the core exposes to its callers (CLI, embedding
 * applications). Wires the managers and orchestrator over one store and
 * registry, and returns plain summaries rather than internal objects.
 *
 * @module pipeline/service
 */

import type { Checkpoint, FeedbackItem, PipelineState } from '../schemas/index.js';
import type { StateStore, TaskRepository } from '../storage/store.js';
import { CheckpointManager } from './checkpoint.js';
import { FeedbackManager, type ReincorporationPolicy } from './feedback.js';
import { PipelineOrchestrator } from './orchestrator.js';
import { calculateProgress } from './progress.js';
import type { StageRegistry } from './registry.js';
import type { PipelineRun } from './run.js';
import type {
  ContextProvider,
  Logger,
  OrchestratorCallbacks,
  PipelineProgress,
  RunPipelineOptions,
  RunStatus,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface PipelineServiceOptions {
  registry: StageRegistry;
  store: StateStore;
  tasks: TaskRepository;
  context: ContextProvider;
  reincorporation?: ReincorporationPolicy;
  safetyCheckpoints?: boolean;
  maxStageAttempts?: number;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Caller-facing view of a pipeline state.
 */
export interface StateSummary {
  pipelineStateId: string;
  taskId: string;
  currentStage: string;
  stagesCompleted: string[];
  progress: PipelineProgress;
  pendingFeedback: number;
  /** Status of the active run in this process, or "idle" */
  runStatus: RunStatus;
  updatedAt: string;
}

export interface CreateRunResult {
  pipelineStateId: string;
  currentStage: string;
}

export interface RunToCompletionResult {
  pipelineStateId: string;
  status: 'executing';
}

export type IncorporateRequest = { feedbackIds: readonly string[] } | { all: true };

// ============================================================================
// Service
// ============================================================================

export class PipelineService {
  readonly registry: StageRegistry;
  readonly orchestrator: PipelineOrchestrator;
  readonly checkpoints: CheckpointManager;
  readonly feedback: FeedbackManager;
  private readonly store: StateStore;
  private readonly logger?: Logger;

  constructor(options: PipelineServiceOptions) {
    this.registry = options.registry;
    this.store = options.store;
    this.logger = options.logger;

    this.checkpoints = new CheckpointManager({
      store: options.store,
      safetyCheckpoints: options.safetyCheckpoints,
      logger: options.logger,
      now: options.now,
    });
    this.feedback = new FeedbackManager({
      store: options.store,
      registry: options.registry,
      reincorporation: options.reincorporation,
      logger: options.logger,
      now: options.now,
    });
    this.orchestrator = new PipelineOrchestrator({
      registry: options.registry,
      store: options.store,
      tasks: options.tasks,
      context: options.context,
      checkpoints: this.checkpoints,
      maxStageAttempts: options.maxStageAttempts,
      logger: options.logger,
      now: options.now,
    });
  }

  setCallbacks(callbacks: OrchestratorCallbacks): void {
    this.orchestrator.setCallbacks(callbacks);
  }

  // ==========================================================================
  // Runs
  // ==========================================================================

  async createRun(taskId: string): Promise<CreateRunResult> {
    const state = await this.orchestrator.createRun(taskId);
    return { pipelineStateId: state.id, currentStage: state.currentStage };
  }

  /**
   * Start a detached run. Poll `getProgress` or use `getRun` to follow it.
   */
  async runToCompletion(
    taskId: string,
    options: RunPipelineOptions = {}
  ): Promise<RunToCompletionResult> {
    const run = await this.orchestrator.startPipeline(taskId, options);
    return { pipelineStateId: run.pipelineStateId, status: 'executing' };
  }

  /**
   * @throws InvalidStageError if the stage is not registered
   * @throws IllegalTransitionError if the stage may not run next
   */
  async runOneStage(
    pipelineStateId: string,
    stageName: string,
    createCheckpoint = true
  ): Promise<StateSummary> {
    this.registry.assertStage(stageName);
    const state = await this.orchestrator.runStage(pipelineStateId, stageName, {
      createCheckpoint,
    });
    return this.summarize(state);
  }

  getRun(pipelineStateId: string): PipelineRun | undefined {
    return this.orchestrator.getRun(pipelineStateId);
  }

  cancelRun(pipelineStateId: string): boolean {
    return this.orchestrator.cancel(pipelineStateId);
  }

  resumeRun(pipelineStateId: string): boolean {
    return this.orchestrator.resume(pipelineStateId);
  }

  // ==========================================================================
  // Inspection
  // ==========================================================================

  async getState(pipelineStateId: string): Promise<StateSummary> {
    return this.summarize(await this.store.load(pipelineStateId));
  }

  async getProgress(pipelineStateId: string): Promise<PipelineProgress> {
    return calculateProgress(await this.store.load(pipelineStateId), this.registry);
  }

  async listCheckpoints(pipelineStateId: string): Promise<Checkpoint[]> {
    return this.checkpoints.list(pipelineStateId);
  }

  /**
   * Most recently updated pipeline state of a task, or null.
   */
  async findLatestState(taskId: string): Promise<StateSummary | null> {
    const state = await this.store.findLatestByTask(taskId);
    return state ? this.summarize(state) : null;
  }

  // ==========================================================================
  // Rollback
  // ==========================================================================

  async rollback(pipelineStateId: string, checkpointId: string): Promise<StateSummary> {
    return this.summarize(await this.checkpoints.restore(pipelineStateId, checkpointId));
  }

  /**
   * @returns null when the state has no checkpoint to restore
   */
  async rollbackToLatest(pipelineStateId: string): Promise<StateSummary | null> {
    const state = await this.checkpoints.restoreLatest(pipelineStateId);
    return state ? this.summarize(state) : null;
  }

  // ==========================================================================
  // Feedback
  // ==========================================================================

  /**
   * @returns The new feedback item's id
   */
  async submitFeedback(
    pipelineStateId: string,
    stageName: string,
    content: string,
    type?: string
  ): Promise<string> {
    const item = await this.feedback.submit(pipelineStateId, stageName, content, type);
    return item.id;
  }

  async listFeedback(pipelineStateId: string, stageName?: string): Promise<FeedbackItem[]> {
    return this.feedback.list(pipelineStateId, stageName);
  }

  /**
   * Incorporate feedback, then resume the state's run if it is paused.
   */
  async incorporateFeedback(
    pipelineStateId: string,
    request: IncorporateRequest
  ): Promise<StateSummary> {
    const state =
      'all' in request
        ? await this.feedback.incorporatePrioritized(pipelineStateId)
        : await this.feedback.incorporate(pipelineStateId, request.feedbackIds);

    if (this.orchestrator.resume(pipelineStateId)) {
      this.logger?.info(`Resumed paused run of ${pipelineStateId} after feedback`);
    }

    return this.summarize(state);
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  summarize(state: PipelineState): StateSummary {
    return {
      pipelineStateId: state.id,
      taskId: state.taskId,
      currentStage: state.currentStage,
      stagesCompleted: [...state.stagesCompleted],
      progress: calculateProgress(state, this.registry),
      pendingFeedback: state.feedback.filter((item) => !item.incorporated).length,
      runStatus: this.orchestrator.getRun(state.id)?.status ?? 'idle',
      updatedAt: state.updatedAt,
    };
  }
}
