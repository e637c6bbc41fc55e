/**
 * Pipeline Error Taxonomy
 *
 * Every failure the core reports is a `PipelineError` subclass carrying a
 * `kind` discriminant, so callers can branch on the kind instead of parsing
 * messages.
 *
 * @module pipeline/errors
 */

// ============================================================================
// Kinds
// ============================================================================

export type PipelineErrorKind =
  | 'NotFound'
  | 'IllegalTransition'
  | 'InvalidStage'
  | 'InvalidFeedback'
  | 'StageExecutionFailed'
  | 'ConcurrentModification'
  | 'RunInProgress'
  | 'StorageError';

/**
 * Entity types that can be missing.
 */
export type NotFoundEntity = 'task' | 'pipeline_state' | 'checkpoint' | 'feedback' | 'context_item';

// ============================================================================
// Base Class
// ============================================================================

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ============================================================================
// Concrete Errors
// ============================================================================

export class NotFoundError extends PipelineError {
  readonly kind = 'NotFound' as const;

  constructor(
    public readonly entity: NotFoundEntity,
    public readonly id: string,
    message?: string
  ) {
    super(message ?? `${formatEntity(entity)} not found: ${id}`);
  }
}

export class IllegalTransitionError extends PipelineError {
  readonly kind = 'IllegalTransition' as const;

  constructor(
    public readonly from: string,
    public readonly to: string,
    reason: string
  ) {
    super(`Illegal transition from ${from} to ${to}: ${reason}`);
  }
}

export class InvalidStageError extends PipelineError {
  readonly kind = 'InvalidStage' as const;

  constructor(
    public readonly stageName: string,
    validStages: readonly string[]
  ) {
    super(`Invalid stage name: ${stageName}. Must be one of: ${validStages.join(', ')}`);
  }
}

export class InvalidFeedbackError extends PipelineError {
  readonly kind = 'InvalidFeedback' as const;

  constructor(
    message: string,
    public readonly feedbackIds: readonly string[] = []
  ) {
    super(message);
  }
}

export class StageExecutionFailedError extends PipelineError {
  readonly kind = 'StageExecutionFailed' as const;

  constructor(
    public readonly stage: string,
    cause: unknown
  ) {
    super(`Stage ${stage} failed: ${describeCause(cause)}`, { cause });
  }
}

export class ConcurrentModificationError extends PipelineError {
  readonly kind = 'ConcurrentModification' as const;

  constructor(
    public readonly pipelineStateId: string,
    public readonly expectedUpdatedAt: string | null,
    public readonly actualUpdatedAt: string | null
  ) {
    super(
      `Pipeline state ${pipelineStateId} was modified concurrently ` +
        `(expected updatedAt ${expectedUpdatedAt ?? 'none'}, found ${actualUpdatedAt ?? 'none'}). ` +
        'Reload and retry.'
    );
  }
}

export class RunInProgressError extends PipelineError {
  readonly kind = 'RunInProgress' as const;

  constructor(public readonly pipelineStateId: string) {
    super(`A pipeline run is already active for pipeline state ${pipelineStateId}`);
  }
}

export class StorageError extends PipelineError {
  readonly kind = 'StorageError' as const;

  constructor(
    message: string,
    public readonly filePath?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Narrow an unknown error to a pipeline error, optionally of one kind.
 *
 * @example
 * if (isPipelineError(err, 'NotFound')) {
 *   console.log(err.entity);
 * }
 */
export function isPipelineError<K extends PipelineErrorKind>(
  error: unknown,
  kind?: K
): error is Extract<AnyPipelineError, { kind: K }> {
  return error instanceof PipelineError && (kind === undefined || error.kind === kind);
}

export type AnyPipelineError =
  | NotFoundError
  | IllegalTransitionError
  | InvalidStageError
  | InvalidFeedbackError
  | StageExecutionFailedError
  | ConcurrentModificationError
  | RunInProgressError
  | StorageError;

/**
 * Render an unknown thrown value as a message.
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}

function formatEntity(entity: NotFoundEntity): string {
  const label = entity.replace(/_/g, ' ');
  return label.charAt(0).toUpperCase() + label.slice(1);
}
