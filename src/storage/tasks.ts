/**
 * File-backed Task Repository
 *
 * Tasks are stored one per file as `tasks/<taskId>.json`.
 *
 * @module storage/tasks
 */

import { TaskSchema, type Task, type TaskStatus } from '../schemas/index.js';
import { NotFoundError, StorageError } from '../pipeline/errors.js';
import { withStatus } from '../tasks/task.js';
import { atomicWriteJson, fileExists, listJsonIds, readDocument } from './atomic.js';
import { getDataDir, getTaskPath, getTasksDir } from './paths.js';
import type { TaskRepository } from './store.js';

export class FileTaskRepository implements TaskRepository {
  private readonly dataDir: string;

  constructor(options: { dataDir?: string } = {}) {
    this.dataDir = options.dataDir ?? getDataDir();
  }

  async get(taskId: string): Promise<Task> {
    const task = await readDocument(getTaskPath(taskId, this.dataDir), TaskSchema, 'task');
    if (!task) {
      throw new NotFoundError('task', taskId);
    }
    return task;
  }

  async create(task: Task): Promise<void> {
    const taskPath = getTaskPath(task.id, this.dataDir);
    if (await fileExists(taskPath)) {
      throw new StorageError(`Task ${task.id} already exists`, taskPath);
    }
    await atomicWriteJson(taskPath, TaskSchema.parse(task));
  }

  /**
   * List tasks, oldest first.
   */
  async list(status?: TaskStatus): Promise<Task[]> {
    const ids = await listJsonIds(getTasksDir(this.dataDir));
    const tasks = await Promise.all(ids.map((id) => this.get(id)));

    return tasks
      .filter((task) => status === undefined || task.status === status)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  async updateStatus(taskId: string, status: TaskStatus): Promise<Task> {
    const updated = withStatus(await this.get(taskId), status);
    await atomicWriteJson(getTaskPath(taskId, this.dataDir), updated);
    return updated;
  }
}
