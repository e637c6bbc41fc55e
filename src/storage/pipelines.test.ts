import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { Checkpoint, PipelineState } from '../schemas/index.js';
import { ConcurrentModificationError, NotFoundError, StorageError } from '../pipeline/errors.js';
import { StageRegistry } from '../pipeline/registry.js';
import { advance, createInitialState, takeSnapshot } from '../pipeline/state.js';
import { RecordingStage } from '../testing/fixtures.js';
import { getPipelineDocumentPath } from './paths.js';
import { FileStateStore } from './pipelines.js';

describe('FileStateStore', () => {
  const registry = new StageRegistry([
    new RecordingStage('design'),
    new RecordingStage('implement'),
  ]);
  const t0 = new Date('2026-01-01T00:00:00.000Z');

  let dataDir: string;
  let store: FileStateStore;
  let state: PipelineState;

  function checkpointOf(s: PipelineState, id: string, createdAt: string): Checkpoint {
    return {
      id,
      pipelineStateId: s.id,
      stage: s.currentStage,
      label: 'manual',
      createdAt,
      snapshot: takeSnapshot(s),
    };
  }

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pipelines-test-'));
    store = new FileStateStore({ dataDir, registry });
    state = createInitialState({ id: 'task-1' }, registry, { id: 'state-1', now: t0 });
    await store.save(state, null);
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it('stores the state in one versioned document', async () => {
    const raw = JSON.parse(
      await fs.readFile(getPipelineDocumentPath('state-1', dataDir), 'utf-8')
    );

    expect(raw.schemaVersion).toBe(1);
    expect(raw.state).toEqual(state);
    expect(raw.checkpoints).toEqual([]);
    expect(await store.load('state-1')).toEqual(state);
  });

  it('reports a missing state as not found', async () => {
    await expect(store.load('missing')).rejects.toThrow(NotFoundError);
    await expect(store.loadCheckpoints('missing')).rejects.toThrow(NotFoundError);
  });

  it('refuses to create a state twice', async () => {
    await expect(store.save(state, null)).rejects.toThrow(ConcurrentModificationError);
  });

  it('commits a change derived from the stored state', async () => {
    const next = advance(state, registry, 'design', { outline: 'v1' });

    await store.commit({ state: next, expectedUpdatedAt: state.updatedAt });

    expect(await store.load('state-1')).toEqual(next);
  });

  it('rejects a commit based on a stale state', async () => {
    const first = advance(state, registry, 'design', { by: 'first' });
    const second = advance(state, registry, 'design', { by: 'second' });
    await store.commit({ state: first, expectedUpdatedAt: state.updatedAt });

    await expect(
      store.commit({ state: second, expectedUpdatedAt: state.updatedAt })
    ).rejects.toThrow(ConcurrentModificationError);
    expect((await store.load('state-1')).artifacts.design).toEqual({ by: 'first' });
  });

  it('lets exactly one of two concurrent commits win', async () => {
    const a = advance(state, registry, 'design', { by: 'a' });
    const b = advance(state, registry, 'design', { by: 'b' });

    const results = await Promise.allSettled([
      store.commit({ state: a, expectedUpdatedAt: state.updatedAt }),
      new FileStateStore({ dataDir, registry }).commit({
        state: b,
        expectedUpdatedAt: state.updatedAt,
      }),
    ]);

    const reasons = results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []));
    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
    expect(reasons).toHaveLength(1);
    expect(reasons[0]).toBeInstanceOf(ConcurrentModificationError);
  });

  it('rejects states that break the registry invariants', async () => {
    const broken: PipelineState = {
      ...state,
      stagesCompleted: ['implement'],
      updatedAt: '2026-01-01T00:00:01.000Z',
    };

    await expect(
      store.commit({ state: broken, expectedUpdatedAt: state.updatedAt })
    ).rejects.toThrow(StorageError);
  });

  it('rejects a commit that does not move updatedAt forward', async () => {
    const same: PipelineState = { ...state, feedback: [] };
    await expect(store.commit({ state: same, expectedUpdatedAt: state.updatedAt })).rejects.toThrow(
      /must have a newer updatedAt/
    );
  });

  it('appends checkpoints committed with a state change', async () => {
    const checkpoint = checkpointOf(state, 'cp-1', '2026-01-01T00:00:00.500Z');
    const next = advance(state, registry, 'design', {});

    await store.commit({ state: next, expectedUpdatedAt: state.updatedAt, checkpoints: [checkpoint] });

    expect(await store.loadCheckpoints('state-1')).toEqual([checkpoint]);
  });

  it('drops the checkpoints of a failed commit', async () => {
    const checkpoint = checkpointOf(state, 'cp-1', '2026-01-01T00:00:00.500Z');
    const next = advance(state, registry, 'design', {});

    await expect(
      store.commit({ state: next, expectedUpdatedAt: 'stale', checkpoints: [checkpoint] })
    ).rejects.toThrow(ConcurrentModificationError);

    expect(await store.loadCheckpoints('state-1')).toEqual([]);
  });

  it('saves checkpoints on their own and lists them oldest first', async () => {
    await store.saveCheckpoint(checkpointOf(state, 'late', '2026-01-01T00:00:09.000Z'));
    await store.saveCheckpoint(checkpointOf(state, 'early', '2026-01-01T00:00:01.000Z'));

    expect((await store.loadCheckpoints('state-1')).map((c) => c.id)).toEqual(['early', 'late']);
    expect(await store.load('state-1')).toEqual(state);
  });

  it('rejects duplicate checkpoint ids', async () => {
    const checkpoint = checkpointOf(state, 'cp-1', '2026-01-01T00:00:01.000Z');
    await store.saveCheckpoint(checkpoint);

    await expect(store.saveCheckpoint(checkpoint)).rejects.toThrow('Checkpoint cp-1 already exists');
  });

  it('rejects a checkpoint for a missing state', async () => {
    const orphan = createInitialState({ id: 'task-1' }, registry, { id: 'orphan', now: t0 });
    await expect(store.saveCheckpoint(checkpointOf(orphan, 'cp', t0.toISOString()))).rejects.toThrow(
      NotFoundError
    );
  });

  it('finds the most recently updated state of a task', async () => {
    const other = createInitialState({ id: 'task-1' }, registry, {
      id: 'state-2',
      now: new Date('2026-01-02T00:00:00.000Z'),
    });
    await store.save(other, null);
    const unrelated = createInitialState({ id: 'task-2' }, registry, {
      id: 'state-3',
      now: new Date('2026-01-03T00:00:00.000Z'),
    });
    await store.save(unrelated, null);

    expect((await store.findLatestByTask('task-1'))?.id).toBe('state-2');
    expect(await store.findLatestByTask('task-9')).toBeNull();
  });

  it('returns null when no pipeline has been stored yet', async () => {
    const empty = new FileStateStore({ dataDir: path.join(dataDir, 'empty') });
    expect(await empty.findLatestByTask('task-1')).toBeNull();
  });

  it('reports a corrupt document as a storage error', async () => {
    await fs.writeFile(
      getPipelineDocumentPath('state-1', dataDir),
      JSON.stringify({ schemaVersion: 1, state: { id: 'state-1' }, checkpoints: [] })
    );

    await expect(store.load('state-1')).rejects.toThrow(/Corrupt document/);
  });
});
