/**
 * Pipeline State Model
 *
 * Pure functions over `PipelineState`. Every function returns a new state
 * object; inputs are never mutated. `advance` is the only way
 * `stagesCompleted` grows.
 *
 * Invariants (checked by `validatePipelineState`):
 * - `stagesCompleted` is a duplicate-free prefix of the registry order
 * - `currentStage` is the first stage not yet completed, or the last stage
 *   once every stage is completed
 * - artifacts exist only for completed stages
 *
 * @module pipeline/state
 */

import { randomUUID } from 'node:crypto';
import type {
  Checkpoint,
  JsonObject,
  PipelineState,
  StateSnapshot,
  Task,
} from '../schemas/index.js';
import { SCHEMA_VERSIONS } from '../schemas/index.js';
import { IllegalTransitionError, NotFoundError } from './errors.js';
import type { StageRegistry } from './registry.js';

// ============================================================================
// Timestamps
// ============================================================================

/**
 * Produce an `updatedAt` value strictly later than `previous`.
 *
 * `updatedAt` is the compare-and-swap token for commits, so two commits in
 * the same millisecond must still yield different values.
 */
export function nextTimestamp(previous: string | undefined, now: Date = new Date()): string {
  if (previous === undefined) {
    return now.toISOString();
  }
  const previousMs = Date.parse(previous);
  const nowMs = now.getTime();
  return new Date(nowMs > previousMs ? nowMs : previousMs + 1).toISOString();
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Create the initial state for a task: positioned on the first stage with
 * no progress, artifacts or feedback.
 */
export function createInitialState(
  task: Pick<Task, 'id'>,
  registry: StageRegistry,
  options: { id?: string; now?: Date } = {}
): PipelineState {
  const timestamp = (options.now ?? new Date()).toISOString();

  return {
    schemaVersion: SCHEMA_VERSIONS.pipelineState,
    id: options.id ?? randomUUID(),
    taskId: task.id,
    currentStage: registry.first(),
    stagesCompleted: [],
    artifacts: {},
    feedback: [],
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

// ============================================================================
// Queries
// ============================================================================

/**
 * True once the last registry stage has been completed.
 */
export function isComplete(state: PipelineState, registry: StageRegistry): boolean {
  return (
    state.stagesCompleted.length === registry.size &&
    state.currentStage === registry.last()
  );
}

/**
 * Name of the first stage not yet completed, or undefined if none remain.
 */
export function firstPendingStage(
  state: PipelineState,
  registry: StageRegistry
): string | undefined {
  return registry.names[state.stagesCompleted.length];
}

// ============================================================================
// Transitions
// ============================================================================

/**
 * Record the artifact of the current stage and move to the next stage.
 *
 * @throws IllegalTransitionError unless `stageName` is the current stage and
 *   the first stage not yet completed
 */
export function advance(
  state: PipelineState,
  registry: StageRegistry,
  stageName: string,
  artifact: JsonObject,
  now: Date = new Date()
): PipelineState {
  assertCanAdvance(state, registry, stageName);

  const next = registry.next(stageName);

  return {
    ...state,
    currentStage: next ?? stageName,
    stagesCompleted: [...state.stagesCompleted, stageName],
    artifacts: { ...state.artifacts, [stageName]: structuredClone(artifact) },
    updatedAt: nextTimestamp(state.updatedAt, now),
  };
}

/**
 * Validate that `stageName` may run next on `state`, without changing it.
 *
 * @throws IllegalTransitionError when it may not
 */
export function assertCanAdvance(
  state: PipelineState,
  registry: StageRegistry,
  stageName: string
): void {
  const from = state.stagesCompleted[state.stagesCompleted.length - 1] ?? 'initial state';

  if (!registry.has(stageName)) {
    throw new IllegalTransitionError(from, stageName, 'stage is not registered');
  }
  if (isComplete(state, registry)) {
    throw new IllegalTransitionError(from, stageName, 'pipeline is already complete');
  }
  if (stageName !== state.currentStage) {
    throw new IllegalTransitionError(
      from,
      stageName,
      `current stage is ${state.currentStage}`
    );
  }
  if (firstPendingStage(state, registry) !== stageName) {
    throw new IllegalTransitionError(
      from,
      stageName,
      'stage is not the first stage still to be completed'
    );
  }
}

/**
 * Replace progress, artifacts and feedback with a checkpoint's snapshot.
 * Anything completed after the checkpoint is forgotten.
 *
 * @throws NotFoundError if the checkpoint belongs to another pipeline state
 */
export function applyCheckpoint(
  state: PipelineState,
  checkpoint: Checkpoint,
  now: Date = new Date()
): PipelineState {
  if (checkpoint.pipelineStateId !== state.id) {
    throw new NotFoundError(
      'checkpoint',
      checkpoint.id,
      `Checkpoint ${checkpoint.id} not found in pipeline state ${state.id}`
    );
  }

  const snapshot = structuredClone(checkpoint.snapshot);

  return {
    ...state,
    currentStage: snapshot.currentStage,
    stagesCompleted: snapshot.stagesCompleted,
    artifacts: snapshot.artifacts,
    feedback: snapshot.feedback,
    updatedAt: nextTimestamp(state.updatedAt, now),
  };
}

/**
 * Deep copy of the parts of a state a checkpoint captures.
 */
export function takeSnapshot(state: PipelineState): StateSnapshot {
  return structuredClone({
    currentStage: state.currentStage,
    stagesCompleted: state.stagesCompleted,
    artifacts: state.artifacts,
    feedback: state.feedback,
  });
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Check a state against the registry invariants.
 *
 * @returns Violation messages, empty if the state is valid
 */
export function validatePipelineState(state: PipelineState, registry: StageRegistry): string[] {
  const errors: string[] = [];

  if (!registry.has(state.currentStage)) {
    errors.push(`currentStage ${state.currentStage} is not a registered stage`);
  }

  if (state.stagesCompleted.length > registry.size) {
    errors.push('stagesCompleted has more entries than the registry');
  }

  state.stagesCompleted.forEach((stage, index) => {
    if (registry.names[index] !== stage) {
      errors.push(
        `stagesCompleted[${index}] is ${stage}, expected ${registry.names[index] ?? 'nothing'}`
      );
    }
  });

  const expectedCurrent = firstPendingStage(state, registry) ?? registry.last();
  if (state.currentStage !== expectedCurrent) {
    errors.push(`currentStage is ${state.currentStage}, expected ${expectedCurrent}`);
  }

  for (const stage of Object.keys(state.artifacts)) {
    if (!state.stagesCompleted.includes(stage)) {
      errors.push(`artifact for ${stage} exists but the stage is not completed`);
    }
  }

  for (const item of state.feedback) {
    if (!registry.has(item.stageName)) {
      errors.push(`feedback ${item.id} refers to unknown stage ${item.stageName}`);
    }
  }

  return errors;
}
