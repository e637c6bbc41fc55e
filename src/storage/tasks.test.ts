import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { IllegalTransitionError, NotFoundError, StorageError } from '../pipeline/errors.js';
import { createTask } from '../tasks/task.js';
import { InMemoryTaskRepository } from './memory.js';
import { getTaskPath } from './paths.js';
import type { TaskRepository } from './store.js';
import { FileTaskRepository } from './tasks.js';

const repositories: Array<[string, (dataDir: string) => TaskRepository]> = [
  ['FileTaskRepository', (dataDir) => new FileTaskRepository({ dataDir })],
  ['InMemoryTaskRepository', () => new InMemoryTaskRepository()],
];

describe.each(repositories)('%s', (_name, makeRepository) => {
  let dataDir: string;
  let repository: TaskRepository;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tasks-test-'));
    repository = makeRepository(dataDir);
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  function task(description: string, createdAt: string) {
    return createTask({ description, requirements: ['works'] }, new Date(createdAt));
  }

  it('stores and returns a task', async () => {
    const created = task('Build a parser', '2026-01-01T00:00:00.000Z');
    await repository.create(created);

    expect(await repository.get(created.id)).toEqual(created);
  });

  it('refuses to overwrite an existing task', async () => {
    const created = task('Build a parser', '2026-01-01T00:00:00.000Z');
    await repository.create(created);

    await expect(repository.create(created)).rejects.toThrow(StorageError);
  });

  it('reports a missing task as not found', async () => {
    await expect(repository.get('missing')).rejects.toThrow(NotFoundError);
  });

  it('lists tasks oldest first, optionally by status', async () => {
    const newer = task('Newer', '2026-01-02T00:00:00.000Z');
    const older = task('Older', '2026-01-01T00:00:00.000Z');
    await repository.create(newer);
    await repository.create(older);
    await repository.updateStatus(newer.id, 'in_progress');

    expect((await repository.list()).map((t) => t.description)).toEqual(['Older', 'Newer']);
    expect((await repository.list('in_progress')).map((t) => t.description)).toEqual(['Newer']);
    expect(await repository.list('failed')).toEqual([]);
  });

  it('updates the status through allowed transitions only', async () => {
    const created = task('Build a parser', '2026-01-01T00:00:00.000Z');
    await repository.create(created);

    await expect(repository.updateStatus(created.id, 'completed')).rejects.toThrow(
      IllegalTransitionError
    );

    const started = await repository.updateStatus(created.id, 'in_progress');
    expect(started.status).toBe('in_progress');
    expect((await repository.get(created.id)).status).toBe('in_progress');
  });
});

describe('FileTaskRepository storage', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tasks-file-test-'));
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it('writes one json file per task', async () => {
    const repository = new FileTaskRepository({ dataDir });
    const created = createTask({ description: 'Build a parser', requirements: ['works'] });
    await repository.create(created);

    const raw = JSON.parse(await fs.readFile(getTaskPath(created.id, dataDir), 'utf-8'));
    expect(raw.description).toBe('Build a parser');
  });

  it('rejects ids that would escape the data directory', async () => {
    const repository = new FileTaskRepository({ dataDir });
    await expect(repository.get('../outside')).rejects.toThrow(/path traversal/);
  });
});
