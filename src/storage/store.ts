/**
 * Storage Ports
 *
 * Persistence contracts the pipeline core depends on. Implementations:
 * - `FileStateStore` / `FileTaskRepository` (data directory on disk)
 * - `InMemoryStateStore` / `InMemoryTaskRepository` (tests, embedding)
 *
 * @module storage/store
 */

import type { Checkpoint, PipelineState, Task, TaskStatus } from '../schemas/index.js';
import type { StageRegistry } from '../pipeline/registry.js';
import type { TaskSource } from '../pipeline/types.js';

// ============================================================================
// State Store
// ============================================================================

/**
 * A state change and the checkpoints that must land with it.
 */
export interface CommitRequest {
  state: PipelineState;

  /**
   * `updatedAt` of the stored state the change was derived from, or null
   * when the state is being created.
   */
  expectedUpdatedAt: string | null;

  /** Checkpoints appended in the same atomic operation */
  checkpoints?: readonly Checkpoint[];
}

/**
 * Durable storage of pipeline states and their checkpoints.
 *
 * Commits for one pipeline state are serialized by compare-and-swap on
 * `updatedAt`: a commit whose `expectedUpdatedAt` does not match the stored
 * value fails with `ConcurrentModificationError`.
 */
export interface StateStore {
  /**
   * @throws NotFoundError if the state does not exist
   */
  load(pipelineStateId: string): Promise<PipelineState>;

  /**
   * Most recently updated state of a task, or null if it has none.
   */
  findLatestByTask(taskId: string): Promise<PipelineState | null>;

  /**
   * @throws ConcurrentModificationError on a stale `expectedUpdatedAt`
   */
  save(state: PipelineState, expectedUpdatedAt: string | null): Promise<void>;

  /**
   * Checkpoints of a state, oldest first.
   *
   * @throws NotFoundError if the state does not exist
   */
  loadCheckpoints(pipelineStateId: string): Promise<Checkpoint[]>;

  /**
   * Append a checkpoint without touching the state.
   *
   * @throws NotFoundError if the state does not exist
   */
  saveCheckpoint(checkpoint: Checkpoint): Promise<void>;

  /**
   * Apply a state change and append checkpoints atomically.
   *
   * @throws ConcurrentModificationError on a stale `expectedUpdatedAt`
   */
  commit(request: CommitRequest): Promise<void>;
}

export interface StateStoreOptions {
  /** Reject states that break this registry's invariants */
  registry?: StageRegistry;
}

// ============================================================================
// Task Repository
// ============================================================================

/**
 * Durable storage of tasks.
 */
export interface TaskRepository extends TaskSource {
  /**
   * @throws StorageError if a task with the same id exists
   */
  create(task: Task): Promise<void>;

  /** Tasks ordered by creation time, optionally filtered by status */
  list(status?: TaskStatus): Promise<Task[]>;

  /**
   * @throws NotFoundError if the task does not exist
   * @throws IllegalTransitionError if the status change is not allowed
   */
  updateStatus(taskId: string, status: TaskStatus): Promise<Task>;
}
