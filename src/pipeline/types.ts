/**
 * Pipeline Type Definitions
 *
 * Contracts between the orchestrator, the stages it runs and the
 * collaborators it depends on.
 *
 * @module pipeline/types
 */

import type {
  ContextItem,
  FeedbackItem,
  JsonObject,
  PipelineState,
  Task,
} from '../schemas/index.js';

// ============================================================================
// Default Stage Names
// ============================================================================

/**
 * Stages of the default code-generation pipeline, in execution order.
 */
export const DEFAULT_STAGE_NAMES = [
  'requirements_gathering',
  'knowledge_gathering',
  'implementation_planning',
  'implementation_writing',
  'review',
] as const;

export type DefaultStageName = (typeof DEFAULT_STAGE_NAMES)[number];

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface for pipeline components.
 * Allows components to log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden in production) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

// ============================================================================
// Stage Capability
// ============================================================================

/**
 * Everything a stage receives when it runs.
 */
export interface StageInput {
  /** Task being worked on */
  task: Task;

  /** Artifacts of the stages completed so far, keyed by stage name */
  artifacts: Readonly<Record<string, JsonObject>>;

  /** Resolved context items of the task */
  contextItems: readonly ContextItem[];

  /** Feedback submitted against this stage that is still pending */
  feedback: readonly FeedbackItem[];

  /** Aborted when the run is cancelled while the stage is in flight */
  signal?: AbortSignal;
}

/**
 * Executable unit of a pipeline.
 *
 * A stage returns new data and never mutates its input. It must be safe to
 * call again with the same input, since transient failures are retried.
 */
export interface StageCapability {
  /** Name the stage is registered under */
  readonly name: string;

  /** Short human-readable description */
  readonly description?: string;

  run(input: StageInput): Promise<JsonObject>;
}

// ============================================================================
// Collaborator Ports
// ============================================================================

/**
 * Read access to tasks.
 */
export interface TaskSource {
  /**
   * @throws NotFoundError if the task does not exist
   */
  get(taskId: string): Promise<Task>;
}

/**
 * Resolves a task's context ids into content usable by a stage.
 */
export interface ContextProvider {
  resolve(contextIds: readonly string[]): Promise<ContextItem[]>;
}

// ============================================================================
// Progress
// ============================================================================

export type ProgressStatus = 'executing' | 'completed';

export interface PipelineProgress {
  currentStage: string;
  completedStages: string[];
  totalStages: number;
  /** 0-100, unrounded */
  percentage: number;
  status: ProgressStatus;
}

// ============================================================================
// Run Status
// ============================================================================

/**
 * Lifecycle of a pipeline run.
 *
 * idle -> running -> paused | completed | failed | cancelled
 * paused -> running | cancelled
 */
export type RunStatus = 'idle' | 'running' | 'paused' | 'completed' | 'failed' | 'cancelled';

/**
 * Terminal statuses of a run.
 */
export type RunOutcomeStatus = Extract<RunStatus, 'completed' | 'failed' | 'cancelled'>;

/**
 * Final report of a pipeline run.
 */
export interface RunOutcome {
  pipelineStateId: string;
  status: RunOutcomeStatus;
  /** Last committed state */
  state: PipelineState;
  /** Stages executed and committed by this run, in order */
  stagesExecuted: string[];
  /** Error that ended the run, when status is "failed" */
  error?: Error;
  timing: {
    startedAt: string;
    completedAt: string;
    durationMs: number;
    /** Duration per stage in milliseconds */
    perStage: Record<string, number>;
  };
}

// ============================================================================
// Execution Options
// ============================================================================

/**
 * Options for a full pipeline run.
 */
export interface RunPipelineOptions {
  /**
   * Continue the task's latest pipeline state instead of creating a new one.
   * A new state is created when the task has none.
   * @default false
   */
  continueFromCurrent?: boolean;

  /**
   * Run this pipeline state. Takes precedence over `continueFromCurrent`.
   * The state must belong to the task.
   */
  pipelineStateId?: string;

  /**
   * Take a checkpoint before each stage.
   * @default false
   */
  createCheckpoints?: boolean;

  /**
   * Pause after each stage (except the last) until `resume()` is called.
   * @default false
   */
  waitForFeedback?: boolean;

  /**
   * Commit each stage's state change and its checkpoint in one atomic
   * store operation.
   * @default false
   */
  useTransactions?: boolean;

  /**
   * Attempts per stage before the run fails. Only stage failures are
   * retried; illegal transitions and commit conflicts are not.
   * @default 1
   */
  maxStageAttempts?: number;
}

/**
 * Options for running a single stage.
 */
export interface RunStageOptions {
  /**
   * Take a checkpoint before the stage runs.
   * @default true
   */
  createCheckpoint?: boolean;

  /**
   * Commit the state change and checkpoint atomically.
   * @default false
   */
  useTransaction?: boolean;
}

// ============================================================================
// Lifecycle Callbacks
// ============================================================================

/**
 * Callbacks for run lifecycle events
 */
export interface OrchestratorCallbacks {
  /** Called when a stage starts */
  onStageStart?: (pipelineStateId: string, stageName: string, attempt: number) => void;
  /** Called after a stage's result has been committed */
  onStageComplete?: (pipelineStateId: string, stageName: string, state: PipelineState) => void;
  /** Called when a stage attempt fails */
  onStageError?: (pipelineStateId: string, stageName: string, error: Error) => void;
  /** Called after a checkpoint has been persisted */
  onCheckpoint?: (pipelineStateId: string, checkpointId: string, stageName: string) => void;
  /** Called when a run pauses for feedback */
  onPause?: (pipelineStateId: string, state: PipelineState) => void;
  /** Called once a run reaches a terminal status */
  onRunEnd?: (outcome: RunOutcome) => void;
}
