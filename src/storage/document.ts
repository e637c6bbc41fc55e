/**
 * Pipeline Document Operations
 *
 * Compare-and-swap logic shared by every `StateStore` implementation. A
 * pipeline document holds the current state of one pipeline plus its
 * checkpoints, so one commit can change both.
 *
 * @module storage/document
 */

import type { Checkpoint, PipelineDocument } from '../schemas/index.js';
import { SCHEMA_VERSIONS } from '../schemas/index.js';
import {
  ConcurrentModificationError,
  NotFoundError,
  StorageError,
} from '../pipeline/errors.js';
import type { StageRegistry } from '../pipeline/registry.js';
import { validatePipelineState } from '../pipeline/state.js';
import type { CommitRequest } from './store.js';

/**
 * Apply a commit to the stored document (undefined when none exists yet).
 *
 * When a registry is given, states that break its invariants are rejected.
 *
 * @returns The new document; the input is not modified
 * @throws ConcurrentModificationError when `expectedUpdatedAt` does not match
 * @throws StorageError when the commit would break the document
 */
export function applyCommit(
  current: PipelineDocument | undefined,
  request: CommitRequest,
  registry?: StageRegistry
): PipelineDocument {
  const { state, expectedUpdatedAt } = request;

  if (registry) {
    const violations = validatePipelineState(state, registry);
    if (violations.length > 0) {
      throw new StorageError(
        `Refusing to store invalid pipeline state ${state.id}: ${violations.join('; ')}`
      );
    }
  }

  const actualUpdatedAt = current ? current.state.updatedAt : null;

  if (actualUpdatedAt !== expectedUpdatedAt) {
    throw new ConcurrentModificationError(state.id, expectedUpdatedAt, actualUpdatedAt);
  }

  if (current && state.updatedAt <= current.state.updatedAt) {
    throw new StorageError(
      `Pipeline state ${state.id} must have a newer updatedAt than the stored ${current.state.updatedAt}`
    );
  }

  const existing = current ? current.checkpoints : [];
  const checkpoints = appendCheckpoints(state.id, existing, request.checkpoints ?? []);

  return {
    schemaVersion: SCHEMA_VERSIONS.pipelineDocument,
    state: structuredClone(state),
    checkpoints,
  };
}

/**
 * Append a checkpoint to an existing document without touching the state.
 *
 * @throws NotFoundError when the document does not exist
 */
export function appendCheckpoint(
  current: PipelineDocument | undefined,
  checkpoint: Checkpoint
): PipelineDocument {
  if (!current) {
    throw new NotFoundError('pipeline_state', checkpoint.pipelineStateId);
  }

  return {
    ...current,
    checkpoints: appendCheckpoints(current.state.id, current.checkpoints, [checkpoint]),
  };
}

/**
 * Order checkpoints oldest first. `Array.prototype.sort` is stable, so
 * checkpoints with equal timestamps keep their insertion order.
 */
export function sortCheckpoints(checkpoints: readonly Checkpoint[]): Checkpoint[] {
  return [...checkpoints].sort((a, b) => a.createdAt.localeCompare(b.createdAt));
}

function appendCheckpoints(
  pipelineStateId: string,
  existing: readonly Checkpoint[],
  added: readonly Checkpoint[]
): Checkpoint[] {
  const ids = new Set(existing.map((checkpoint) => checkpoint.id));

  for (const checkpoint of added) {
    if (checkpoint.pipelineStateId !== pipelineStateId) {
      throw new StorageError(
        `Checkpoint ${checkpoint.id} belongs to pipeline state ${checkpoint.pipelineStateId}, not ${pipelineStateId}`
      );
    }
    if (ids.has(checkpoint.id)) {
      throw new StorageError(`Checkpoint ${checkpoint.id} already exists`);
    }
    ids.add(checkpoint.id);
  }

  return [...existing, ...added.map((checkpoint) => structuredClone(checkpoint))];
}
