import { describe, it, expect, beforeEach } from '@jest/globals';
import type { FeedbackItem, PipelineState } from '../schemas/index.js';
import { InMemoryStateStore } from '../storage/memory.js';
import { RecordingStage, steppingClock } from '../testing/fixtures.js';
import { InvalidFeedbackError, InvalidStageError, NotFoundError } from './errors.js';
import {
  FeedbackManager,
  applicationOrder,
  applyFeedback,
  prioritizeFeedback,
  readAnnotations,
} from './feedback.js';
import { StageRegistry } from './registry.js';
import { advance, createInitialState } from './state.js';

function item(
  id: string,
  type: FeedbackItem['type'],
  createdAt: string,
  stageName = 'design'
): FeedbackItem {
  return { id, stageName, content: `${type} ${id}`, type, createdAt, incorporated: false };
}

describe('prioritizeFeedback', () => {
  it('orders corrections, then enhancements, then suggestions', () => {
    const items = [
      item('s1', 'suggestion', '2026-01-01T00:00:01.000Z'),
      item('e1', 'enhancement', '2026-01-01T00:00:02.000Z'),
      item('c1', 'correction', '2026-01-01T00:00:03.000Z'),
    ];

    expect(prioritizeFeedback(items).map((i) => i.id)).toEqual(['c1', 'e1', 's1']);
  });

  it('keeps submission order within a type', () => {
    const items = [
      item('c2', 'correction', '2026-01-01T00:00:05.000Z'),
      item('s1', 'suggestion', '2026-01-01T00:00:01.000Z'),
      item('c1', 'correction', '2026-01-01T00:00:02.000Z'),
    ];

    expect(prioritizeFeedback(items).map((i) => i.id)).toEqual(['c1', 'c2', 's1']);
  });

  it('does not reorder its input', () => {
    const items = [
      item('s1', 'suggestion', '2026-01-01T00:00:01.000Z'),
      item('c1', 'correction', '2026-01-01T00:00:02.000Z'),
    ];
    prioritizeFeedback(items);
    expect(items.map((i) => i.id)).toEqual(['s1', 'c1']);
  });
});

describe('applicationOrder', () => {
  it('puts the lowest priority first and keeps ties oldest first', () => {
    const items = [
      item('c2', 'correction', '2026-01-01T00:00:04.000Z'),
      item('s1', 'suggestion', '2026-01-01T00:00:01.000Z'),
      item('c1', 'correction', '2026-01-01T00:00:03.000Z'),
      item('s2', 'suggestion', '2026-01-01T00:00:02.000Z'),
      item('e1', 'enhancement', '2026-01-01T00:00:05.000Z'),
    ];

    expect(applicationOrder(items).map((i) => i.id)).toEqual(['s1', 's2', 'e1', 'c1', 'c2']);
  });
});

describe('applyFeedback', () => {
  const registry = new StageRegistry([new RecordingStage('design'), new RecordingStage('build')]);
  const now = new Date('2026-01-02T00:00:00.000Z');

  it('appends annotations in the order given and marks items incorporated', () => {
    const base = advance(
      createInitialState({ id: 'task-1' }, registry, { now: new Date('2026-01-01T00:00:00.000Z') }),
      registry,
      'design',
      { outline: 'v1' }
    );
    const a = item('a', 'suggestion', '2026-01-01T00:00:01.000Z');
    const b = item('b', 'correction', '2026-01-01T00:00:02.000Z');
    const state: PipelineState = { ...base, feedback: [a, b] };

    const updated = applyFeedback(state, [a, b], now);

    expect(updated.artifacts.design).toEqual({
      outline: 'v1',
      _feedback: [
        {
          feedbackId: 'a',
          type: 'suggestion',
          content: 'suggestion a',
          incorporatedAt: '2026-01-02T00:00:00.000Z',
        },
        {
          feedbackId: 'b',
          type: 'correction',
          content: 'correction b',
          incorporatedAt: '2026-01-02T00:00:00.000Z',
        },
      ],
    });
    expect(updated.feedback.every((f) => f.incorporated)).toBe(true);
    expect(state.feedback.every((f) => !f.incorporated)).toBe(true);
    expect(state.artifacts.design).toEqual({ outline: 'v1' });
  });

  it('leaves items on stages without an artifact pending', () => {
    const base = createInitialState({ id: 'task-1' }, registry, {
      now: new Date('2026-01-01T00:00:00.000Z'),
    });
    const pending = item('p', 'correction', '2026-01-01T00:00:01.000Z', 'build');
    const updated = applyFeedback({ ...base, feedback: [pending] }, [pending], now);

    expect(updated.feedback[0]?.incorporated).toBe(false);
    expect(updated.artifacts).toEqual({});
  });
});

describe('readAnnotations', () => {
  it('returns an empty list when the artifact has none', () => {
    expect(readAnnotations({ outline: 'v1' })).toEqual([]);
    expect(readAnnotations({ _feedback: 'not a list' })).toEqual([]);
  });
});

describe('FeedbackManager', () => {
  const registry = new StageRegistry([
    new RecordingStage('design'),
    new RecordingStage('implement'),
    new RecordingStage('test'),
  ]);

  let store: InMemoryStateStore;
  let manager: FeedbackManager;
  let state: PipelineState;
  let now: () => Date;

  beforeEach(async () => {
    now = steppingClock();
    store = new InMemoryStateStore({ registry });
    manager = new FeedbackManager({ store, registry, now });
    const initial = createInitialState({ id: 'task-1' }, registry, { now: now() });
    state = advance(initial, registry, 'design', { outline: 'v1' }, now());
    await store.save(initial, null);
    await store.commit({ state, expectedUpdatedAt: initial.updatedAt });
  });

  describe('submit', () => {
    it('stores a pending item with a generated id', async () => {
      const submitted = await manager.submit(state.id, 'design', '  Use a queue  ', 'correction');

      expect(submitted).toMatchObject({
        stageName: 'design',
        content: 'Use a queue',
        type: 'correction',
        incorporated: false,
      });
      expect((await store.load(state.id)).feedback).toEqual([submitted]);
    });

    it('defaults the type to suggestion', async () => {
      const submitted = await manager.submit(state.id, 'implement', 'Prefer small functions');
      expect(submitted.type).toBe('suggestion');
    });

    it('accepts feedback on a stage that has not run yet', async () => {
      await manager.submit(state.id, 'test', 'Cover edge cases');
      expect(await manager.listPending(state.id, 'test')).toHaveLength(1);
    });

    it('rejects an unknown stage without changing the state', async () => {
      await expect(manager.submit(state.id, 'deploy', 'Ship it')).rejects.toThrow(
        InvalidStageError
      );
      expect((await store.load(state.id)).feedback).toHaveLength(0);
    });

    it('rejects empty content and unknown types', async () => {
      await expect(manager.submit(state.id, 'design', '   ')).rejects.toThrow(
        'Feedback content cannot be empty'
      );
      await expect(manager.submit(state.id, 'design', 'Hmm', 'praise')).rejects.toThrow(
        'Invalid feedback type: praise. Must be one of: suggestion, correction, enhancement'
      );
      expect((await store.load(state.id)).feedback).toHaveLength(0);
    });

    it('fails for an unknown state', async () => {
      await expect(manager.submit('missing', 'design', 'x')).rejects.toThrow(NotFoundError);
    });
  });

  describe('incorporate', () => {
    it('annotates the artifact and marks the item incorporated', async () => {
      const submitted = await manager.submit(state.id, 'design', 'Add caching', 'enhancement');

      const updated = await manager.incorporate(state.id, [submitted.id]);

      const annotations = readAnnotations(updated.artifacts.design ?? {});
      expect(annotations).toEqual([
        expect.objectContaining({ feedbackId: submitted.id, content: 'Add caching' }),
      ]);
      expect(updated.feedback[0]?.incorporated).toBe(true);
      expect(updated.feedback[0]?.incorporatedAt).toBeDefined();
      expect(await store.load(state.id)).toEqual(updated);
    });

    it('never applies an item twice', async () => {
      const submitted = await manager.submit(state.id, 'design', 'Add caching');
      await manager.incorporate(state.id, [submitted.id]);

      await expect(manager.incorporate(state.id, [submitted.id])).rejects.toThrow(
        `Feedback already incorporated: ${submitted.id}`
      );
      const stored = await store.load(state.id);
      expect(readAnnotations(stored.artifacts.design ?? {})).toHaveLength(1);
    });

    it('skips already incorporated items under the skip policy', async () => {
      manager = new FeedbackManager({ store, registry, now, reincorporation: 'skip' });
      const first = await manager.submit(state.id, 'design', 'Add caching');
      const second = await manager.submit(state.id, 'design', 'Add logging');
      await manager.incorporate(state.id, [first.id]);

      const updated = await manager.incorporate(state.id, [first.id, second.id]);

      expect(readAnnotations(updated.artifacts.design ?? {})).toHaveLength(2);
      expect(updated.feedback.map((f) => f.incorporated)).toEqual([true, true]);
    });

    it('rejects the whole request when an id is unknown', async () => {
      const submitted = await manager.submit(state.id, 'design', 'Add caching');

      const attempt = manager.incorporate(state.id, [submitted.id, 'nope']);
      await expect(attempt).rejects.toThrow(InvalidFeedbackError);
      await expect(attempt).rejects.toThrow('Unknown feedback ids: nope');
      expect((await store.load(state.id)).feedback[0]?.incorporated).toBe(false);
    });

    it('rejects items whose stage has no artifact yet', async () => {
      const submitted = await manager.submit(state.id, 'implement', 'Use streams');

      await expect(manager.incorporate(state.id, [submitted.id])).rejects.toThrow(
        `Feedback refers to stages without an artifact yet: ${submitted.id} (implement)`
      );
    });

    it('does nothing for an empty id list', async () => {
      const before = await store.load(state.id);
      const after = await manager.incorporate(state.id, []);
      expect(after).toEqual(before);
      expect(await store.load(state.id)).toEqual(before);
    });
  });

  describe('incorporatePrioritized', () => {
    it('applies the correction last, after enhancements and suggestions', async () => {
      const correction = await manager.submit(state.id, 'design', 'Fix the schema', 'correction');
      const suggestion = await manager.submit(state.id, 'design', 'Rename things', 'suggestion');
      const enhancement = await manager.submit(state.id, 'design', 'Add an index', 'enhancement');

      const updated = await manager.incorporatePrioritized(state.id);

      const ids = readAnnotations(updated.artifacts.design ?? {}).map((annotation) =>
        typeof annotation === 'object' && annotation !== null && 'feedbackId' in annotation
          ? annotation.feedbackId
          : undefined
      );
      expect(ids).toEqual([suggestion.id, enhancement.id, correction.id]);
    });

    it('applies items of the same type oldest first', async () => {
      const s0 = await manager.submit(state.id, 'design', 'Rename things', 'suggestion');
      const s1 = await manager.submit(state.id, 'design', 'Split the module', 'suggestion');
      const c0 = await manager.submit(state.id, 'design', 'Fix the schema', 'correction');
      const c1 = await manager.submit(state.id, 'design', 'Fix the index', 'correction');

      const updated = await manager.incorporatePrioritized(state.id);

      const ids = readAnnotations(updated.artifacts.design ?? {}).map((annotation) =>
        typeof annotation === 'object' && annotation !== null && 'feedbackId' in annotation
          ? annotation.feedbackId
          : undefined
      );
      expect(ids).toEqual([s0.id, s1.id, c0.id, c1.id]);
    });

    it('leaves feedback on stages without an artifact pending', async () => {
      await manager.submit(state.id, 'design', 'Fix the schema', 'correction');
      const later = await manager.submit(state.id, 'test', 'Add property tests');

      const updated = await manager.incorporatePrioritized(state.id);

      expect(updated.feedback.find((f) => f.id === later.id)?.incorporated).toBe(false);
      expect(await manager.listPending(state.id)).toEqual([
        expect.objectContaining({ id: later.id }),
      ]);
    });

    it('returns the state unchanged when nothing is pending', async () => {
      const before = await store.load(state.id);
      expect(await manager.incorporatePrioritized(state.id)).toEqual(before);
    });
  });

  describe('list', () => {
    it('filters by stage', async () => {
      await manager.submit(state.id, 'design', 'One');
      await manager.submit(state.id, 'implement', 'Two');

      expect((await manager.list(state.id)).map((f) => f.content)).toEqual(['One', 'Two']);
      expect((await manager.list(state.id, 'implement')).map((f) => f.content)).toEqual(['Two']);
    });

    it('rejects an unknown stage filter', async () => {
      await expect(manager.list(state.id, 'deploy')).rejects.toThrow(InvalidStageError);
    });
  });
});
