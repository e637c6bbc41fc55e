/**
 * Shared test fixtures: simple stages, in-memory collaborators and a
 * deterministic clock.
 */

import type { ContextItem, JsonObject, Task } from '../schemas/index.js';
import { StageRegistry } from '../pipeline/registry.js';
import type { StageCapability, StageInput } from '../pipeline/types.js';
import { InMemoryContextProvider } from '../context/provider.js';
import { InMemoryStateStore, InMemoryTaskRepository } from '../storage/memory.js';
import { createTask } from '../tasks/task.js';

export const TEST_STAGES = ['design', 'implement', 'test'] as const;

/**
 * Stage that records its inputs and returns `{ stage, output }`, or the
 * result of `run` when given.
 */
export class RecordingStage implements StageCapability {
  readonly inputs: StageInput[] = [];

  constructor(
    readonly name: string,
    private readonly handler?: (input: StageInput) => Promise<JsonObject>
  ) {}

  get calls(): number {
    return this.inputs.length;
  }

  async run(input: StageInput): Promise<JsonObject> {
    this.inputs.push(input);
    if (this.handler) {
      return this.handler(input);
    }
    return { stage: this.name, output: `${this.name} done` };
  }
}

/**
 * Clock that starts at `start` and moves one second per call.
 */
export function steppingClock(start = '2026-01-01T00:00:00.000Z'): () => Date {
  let current = Date.parse(start);
  return () => {
    const value = new Date(current);
    current += 1000;
    return value;
  };
}

/**
 * Promise whose settlement the test controls.
 */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export interface Harness {
  registry: StageRegistry;
  stages: RecordingStage[];
  store: InMemoryStateStore;
  tasks: InMemoryTaskRepository;
  context: InMemoryContextProvider;
  task: Task;
}

/**
 * In-memory collaborators with one stored task.
 */
export async function createHarness(
  options: {
    stages?: RecordingStage[];
    contextItems?: ContextItem[];
  } = {}
): Promise<Harness> {
  const stages = options.stages ?? TEST_STAGES.map((name) => new RecordingStage(name));
  const registry = new StageRegistry(stages);
  const store = new InMemoryStateStore({ registry });
  const tasks = new InMemoryTaskRepository();
  const context = new InMemoryContextProvider(options.contextItems ?? []);

  const task = createTask(
    {
      description: 'Build a URL shortener',
      requirements: ['Shorten URLs', 'Redirect short URLs'],
      constraints: ['No external services'],
      contextIds: (options.contextItems ?? []).map((item) => item.id),
    },
    new Date('2025-12-31T00:00:00.000Z')
  );
  await tasks.create(task);

  return { registry, stages, store, tasks, context, task };
}
