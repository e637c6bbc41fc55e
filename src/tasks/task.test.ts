import { describe, it, expect } from '@jest/globals';
import { ZodError } from 'zod';
import { IllegalTransitionError } from '../pipeline/errors.js';
import { createTask, parseTaskInput, withStatus } from './task.js';

describe('createTask', () => {
  const now = new Date('2026-01-01T00:00:00.000Z');

  it('creates a task in the created status', () => {
    const task = createTask(
      {
        description: '  Build a rate limiter ',
        requirements: ['Token bucket', 'Per-user limits'],
        constraints: ['In memory only'],
        contextIds: ['ctx-1'],
      },
      now
    );

    expect(task).toEqual({
      schemaVersion: 1,
      id: task.id,
      description: 'Build a rate limiter',
      requirements: ['Token bucket', 'Per-user limits'],
      constraints: ['In memory only'],
      contextIds: ['ctx-1'],
      status: 'created',
      createdAt: '2026-01-01T00:00:00.000Z',
      updatedAt: '2026-01-01T00:00:00.000Z',
    });
    expect(task.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('drops duplicate context ids', () => {
    const task = createTask({
      description: 'x',
      requirements: ['y'],
      contextIds: ['a', 'b', 'a'],
    });
    expect(task.contextIds).toEqual(['a', 'b']);
  });

  it('requires a description and at least one requirement', () => {
    expect(() => createTask({ description: '  ', requirements: ['y'] })).toThrow(ZodError);
    expect(() => createTask({ description: 'x', requirements: [] })).toThrow(
      'At least one requirement must be specified'
    );
  });
});

describe('withStatus', () => {
  const task = createTask(
    { description: 'x', requirements: ['y'] },
    new Date('2026-01-01T00:00:00.000Z')
  );

  it('moves through the allowed transitions', () => {
    const later = new Date('2026-01-02T00:00:00.000Z');
    const started = withStatus(task, 'in_progress', later);
    expect(started.status).toBe('in_progress');
    expect(started.updatedAt).toBe('2026-01-02T00:00:00.000Z');
    expect(withStatus(started, 'completed').status).toBe('completed');
    expect(withStatus(withStatus(started, 'failed'), 'in_progress').status).toBe('in_progress');
  });

  it('rejects disallowed transitions', () => {
    expect(() => withStatus(task, 'completed')).toThrow(IllegalTransitionError);
    expect(() => withStatus(task, 'created')).toThrow(
      `task ${task.id} cannot move from created to created`
    );
  });
});

describe('parseTaskInput', () => {
  it('reads requirement and constraint sections', () => {
    const text = [
      'Build a CLI for notes',
      '',
      'Requirements:',
      '- add a note',
      '* list notes',
      'Constraints:',
      '- no network',
    ].join('\n');

    expect(parseTaskInput(text)).toEqual({
      description: 'Build a CLI for notes',
      requirements: ['add a note', 'list notes'],
      constraints: ['no network'],
    });
  });

  it('accepts header variants and ignores unrelated sections', () => {
    const text = [
      'Build a cache',
      'Functional requirements:',
      '- evict least recently used',
      'Notes:',
      '- this is ignored',
      'Hard constraints:',
      '- bounded memory',
    ].join('\n');

    expect(parseTaskInput(text)).toEqual({
      description: 'Build a cache',
      requirements: ['evict least recently used'],
      constraints: ['bounded memory'],
    });
  });

  it('treats remaining lines as requirements when there are no sections', () => {
    expect(parseTaskInput('Build a queue\n- push\n- pop\r\nsize')).toEqual({
      description: 'Build a queue',
      requirements: ['push', 'pop', 'size'],
      constraints: [],
    });
  });

  it('falls back to the description as the only requirement', () => {
    expect(parseTaskInput('\n  Build a linter  \n')).toEqual({
      description: 'Build a linter',
      requirements: ['Build a linter'],
      constraints: [],
    });
  });

  it('returns an empty description for blank input', () => {
    expect(parseTaskInput('   \n')).toEqual({
      description: '',
      requirements: [],
      constraints: [],
    });
  });
});
