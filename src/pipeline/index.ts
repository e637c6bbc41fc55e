/**
 * Pipeline Core
 *
 * Stage registry, state model, checkpoints, feedback and the orchestrator
 * that sequences stage execution.
 *
 * @module pipeline
 */

// Type definitions and constants
export {
  DEFAULT_STAGE_NAMES,
  type DefaultStageName,
  type Logger,
  type StageInput,
  type StageCapability,
  type TaskSource,
  type ContextProvider,
  type ProgressStatus,
  type PipelineProgress,
  type RunStatus,
  type RunOutcomeStatus,
  type RunOutcome,
  type RunPipelineOptions,
  type RunStageOptions,
  type OrchestratorCallbacks,
} from './types.js';

// Errors
export {
  PipelineError,
  NotFoundError,
  IllegalTransitionError,
  InvalidStageError,
  InvalidFeedbackError,
  StageExecutionFailedError,
  ConcurrentModificationError,
  RunInProgressError,
  StorageError,
  isPipelineError,
  describeCause,
  type AnyPipelineError,
  type PipelineErrorKind,
  type NotFoundEntity,
} from './errors.js';

// Registry
export { StageRegistry } from './registry.js';

// State model
export {
  createInitialState,
  advance,
  assertCanAdvance,
  applyCheckpoint,
  takeSnapshot,
  isComplete,
  firstPendingStage,
  nextTimestamp,
  validatePipelineState,
} from './state.js';

// Progress
export { calculateProgress, formatPercentage } from './progress.js';

// Checkpoints
export {
  CheckpointManager,
  MANUAL_CHECKPOINT_LABEL,
  PRE_ROLLBACK_LABEL,
  beforeStageLabel,
  type CheckpointManagerOptions,
} from './checkpoint.js';

// Feedback
export {
  FeedbackManager,
  FEEDBACK_PRIORITY,
  prioritizeFeedback,
  applicationOrder,
  applyFeedback,
  readAnnotations,
  type ReincorporationPolicy,
  type FeedbackManagerOptions,
} from './feedback.js';

// Execution
export {
  StageExecutor,
  type StageExecutorOptions,
  type ExecuteOptions,
  type ExecutionResult,
} from './executor.js';
export { PipelineRun } from './run.js';
export { PipelineOrchestrator, type PipelineOrchestratorOptions } from './orchestrator.js';

// Service
export {
  PipelineService,
  type PipelineServiceOptions,
  type StateSummary,
  type CreateRunResult,
  type RunToCompletionResult,
  type IncorporateRequest,
} from './service.js';

// Logging
export { createConsoleLogger, silentLogger, type ConsoleLoggerOptions } from './logger.js';
