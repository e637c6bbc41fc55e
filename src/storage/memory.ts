/**
 * In-Memory Storage
 *
 * `StateStore` and `TaskRepository` implementations that keep everything in
 * process memory. Values are deep-copied on the way in and out, so callers
 * can never mutate stored data by reference.
 *
 * @module storage/memory
 */

import type {
  Checkpoint,
  PipelineDocument,
  PipelineState,
  Task,
  TaskStatus,
} from '../schemas/index.js';
import { NotFoundError, StorageError } from '../pipeline/errors.js';
import { withStatus } from '../tasks/task.js';
import { appendCheckpoint, applyCommit, sortCheckpoints } from './document.js';
import type { CommitRequest, StateStore, StateStoreOptions, TaskRepository } from './store.js';

export class InMemoryStateStore implements StateStore {
  private readonly documents = new Map<string, PipelineDocument>();

  constructor(private readonly options: StateStoreOptions = {}) {}

  async load(pipelineStateId: string): Promise<PipelineState> {
    return structuredClone(this.requireDocument(pipelineStateId).state);
  }

  async findLatestByTask(taskId: string): Promise<PipelineState | null> {
    let latest: PipelineState | null = null;

    for (const { state } of this.documents.values()) {
      if (state.taskId === taskId && (!latest || state.updatedAt > latest.updatedAt)) {
        latest = state;
      }
    }

    return latest ? structuredClone(latest) : null;
  }

  async save(state: PipelineState, expectedUpdatedAt: string | null): Promise<void> {
    await this.commit({ state, expectedUpdatedAt });
  }

  async loadCheckpoints(pipelineStateId: string): Promise<Checkpoint[]> {
    return structuredClone(sortCheckpoints(this.requireDocument(pipelineStateId).checkpoints));
  }

  async saveCheckpoint(checkpoint: Checkpoint): Promise<void> {
    const current = this.documents.get(checkpoint.pipelineStateId);
    this.documents.set(checkpoint.pipelineStateId, appendCheckpoint(current, checkpoint));
  }

  async commit(request: CommitRequest): Promise<void> {
    // Read, compare and write happen in one synchronous section, so commits
    // are serialized by the event loop.
    const current = this.documents.get(request.state.id);
    this.documents.set(request.state.id, applyCommit(current, request, this.options.registry));
  }

  private requireDocument(pipelineStateId: string): PipelineDocument {
    const document = this.documents.get(pipelineStateId);
    if (!document) {
      throw new NotFoundError('pipeline_state', pipelineStateId);
    }
    return document;
  }
}

export class InMemoryTaskRepository implements TaskRepository {
  private readonly tasks = new Map<string, Task>();

  async get(taskId: string): Promise<Task> {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new NotFoundError('task', taskId);
    }
    return structuredClone(task);
  }

  async create(task: Task): Promise<void> {
    if (this.tasks.has(task.id)) {
      throw new StorageError(`Task ${task.id} already exists`);
    }
    this.tasks.set(task.id, structuredClone(task));
  }

  async list(status?: TaskStatus): Promise<Task[]> {
    return [...this.tasks.values()]
      .filter((task) => status === undefined || task.status === status)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .map((task) => structuredClone(task));
  }

  async updateStatus(taskId: string, status: TaskStatus): Promise<Task> {
    const updated = withStatus(await this.get(taskId), status);
    this.tasks.set(taskId, updated);
    return structuredClone(updated);
  }
}
