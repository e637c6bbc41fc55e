import { describe, it, expect, beforeEach } from '@jest/globals';
import type { PipelineState } from '../schemas/index.js';
import { createContextItem } from '../context/provider.js';
import { RecordingStage, createHarness, steppingClock, type Harness } from '../testing/fixtures.js';
import {
  IllegalTransitionError,
  NotFoundError,
  StageExecutionFailedError,
} from './errors.js';
import { StageExecutor } from './executor.js';
import { advance, createInitialState } from './state.js';

describe('StageExecutor', () => {
  let harness: Harness;
  let executor: StageExecutor;
  let state: PipelineState;

  async function build(stages?: RecordingStage[], withContext = false): Promise<void> {
    const contextItems = withContext
      ? [createContextItem({ source: 'docs/api.md', content: 'GET /links' })]
      : [];
    harness = await createHarness({ stages, contextItems });
    const now = steppingClock();
    executor = new StageExecutor({
      registry: harness.registry,
      tasks: harness.tasks,
      context: harness.context,
      now,
    });
    state = createInitialState(harness.task, harness.registry, { now: now() });
  }

  beforeEach(async () => {
    await build();
  });

  it('runs the stage and returns the advanced state', async () => {
    const result = await executor.execute(state, 'design');

    expect(result.artifact).toEqual({ stage: 'design', output: 'design done' });
    expect(result.state.currentStage).toBe('implement');
    expect(result.state.stagesCompleted).toEqual(['design']);
    expect(result.state.artifacts.design).toEqual(result.artifact);
    expect(result.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('leaves the input state untouched', async () => {
    const before = structuredClone(state);
    await executor.execute(state, 'design');
    expect(state).toEqual(before);
  });

  it('passes the task, earlier artifacts and pending stage feedback to the stage', async () => {
    const afterDesign = advance(state, harness.registry, 'design', { outline: 'v1' });
    const withFeedback: PipelineState = {
      ...afterDesign,
      feedback: [
        {
          id: 'f1',
          stageName: 'implement',
          content: 'Use a map',
          type: 'suggestion',
          createdAt: '2026-01-01T00:00:00.000Z',
          incorporated: false,
        },
        {
          id: 'f2',
          stageName: 'implement',
          content: 'Old note',
          type: 'suggestion',
          createdAt: '2026-01-01T00:00:00.000Z',
          incorporated: true,
        },
        {
          id: 'f3',
          stageName: 'design',
          content: 'Other stage',
          type: 'correction',
          createdAt: '2026-01-01T00:00:00.000Z',
          incorporated: false,
        },
      ],
    };

    await executor.execute(withFeedback, 'implement');

    const input = harness.stages[1]?.inputs[0];
    expect(input?.task.id).toBe(harness.task.id);
    expect(input?.artifacts).toEqual({ design: { outline: 'v1' } });
    expect(input?.feedback.map((f) => f.id)).toEqual(['f1']);
  });

  it('hands the stage a copy of the artifacts', async () => {
    const mutating = new RecordingStage('design');
    const implement = new RecordingStage('implement', async (input) => {
      const design = input.artifacts.design;
      if (design) {
        design.outline = 'changed';
      }
      return { ok: true };
    });
    await build([mutating, implement, new RecordingStage('test')]);
    const afterDesign = advance(state, harness.registry, 'design', { outline: 'v1' });

    const result = await executor.execute(afterDesign, 'implement');

    expect(afterDesign.artifacts.design).toEqual({ outline: 'v1' });
    expect(result.state.artifacts.design).toEqual({ outline: 'v1' });
  });

  it('resolves the task context items', async () => {
    await build(undefined, true);

    await executor.execute(state, 'design');

    expect(harness.stages[0]?.inputs[0]?.contextItems.map((item) => item.source)).toEqual([
      'docs/api.md',
    ]);
  });

  it('rejects a stage that is not next without running it', async () => {
    await expect(executor.execute(state, 'implement')).rejects.toThrow(IllegalTransitionError);
    expect(harness.stages[1]?.calls).toBe(0);
  });

  it('checks the requested next stage against the registry', async () => {
    await expect(executor.execute(state, 'design', { requestedNext: 'test' })).rejects.toThrow(
      'Illegal transition from design to test: implement follows design'
    );
    await expect(
      executor.execute(state, 'design', { requestedNext: 'implement' })
    ).resolves.toBeDefined();
    expect(harness.stages[0]?.calls).toBe(1);
  });

  it('wraps stage errors in StageExecutionFailedError', async () => {
    const cause = new Error('model unavailable');
    await build([
      new RecordingStage('design', async () => {
        throw cause;
      }),
    ]);

    const attempt = executor.execute(state, 'design');
    await expect(attempt).rejects.toThrow(StageExecutionFailedError);
    await expect(attempt).rejects.toThrow('Stage design failed: model unavailable');
    await attempt.catch((error: unknown) => {
      expect(error instanceof StageExecutionFailedError && error.cause).toBe(cause);
    });
  });

  it('fails when a stage returns something other than a JSON object', async () => {
    await build([new RecordingStage('design', async () => JSON.parse('[1, 2]'))]);

    await expect(executor.execute(state, 'design')).rejects.toThrow(
      'Stage design failed: Stage design returned an array instead of a JSON object'
    );
  });

  it('fails with NotFoundError when the task is missing', async () => {
    const orphan = createInitialState({ id: 'missing-task' }, harness.registry);
    await expect(executor.execute(orphan, 'design')).rejects.toThrow(NotFoundError);
  });
});
