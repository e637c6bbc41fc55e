/**
 * Stage Executor
 *
 * Runs one stage against a pipeline state and returns the advanced state.
 * The executor never commits; committing is the orchestrator's job, so a
 * result can still be discarded (for example after cancellation).
 *
 * @module pipeline/executor
 */

import { isJsonObject, type JsonObject, type PipelineState } from '../schemas/index.js';
import { IllegalTransitionError, StageExecutionFailedError } from './errors.js';
import type { StageRegistry } from './registry.js';
import { advance, assertCanAdvance } from './state.js';
import type { ContextProvider, Logger, TaskSource } from './types.js';

export interface StageExecutorOptions {
  registry: StageRegistry;
  tasks: TaskSource;
  context: ContextProvider;
  logger?: Logger;
  now?: () => Date;
}

export interface ExecuteOptions {
  /**
   * Stage the caller expects to follow. Must match the registry order, or
   * be omitted after the last stage.
   */
  requestedNext?: string;

  /** Forwarded to the stage so in-flight work can be abandoned */
  signal?: AbortSignal;
}

/**
 * Result of a successful stage execution.
 */
export interface ExecutionResult {
  /** Advanced state, not yet committed */
  state: PipelineState;
  artifact: JsonObject;
  durationMs: number;
}

export class StageExecutor {
  private readonly registry: StageRegistry;
  private readonly tasks: TaskSource;
  private readonly context: ContextProvider;
  private readonly logger?: Logger;
  private readonly now: () => Date;

  constructor(options: StageExecutorOptions) {
    this.registry = options.registry;
    this.tasks = options.tasks;
    this.context = options.context;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Execute `stageName` on `state`.
   *
   * The input state is left untouched whether the stage succeeds or fails.
   *
   * @throws IllegalTransitionError before invoking anything if the stage may
   *   not run next or `requestedNext` disagrees with the registry
   * @throws NotFoundError if the task or a context item is missing
   * @throws StageExecutionFailedError if the stage throws or returns
   *   something other than a JSON object
   */
  async execute(
    state: PipelineState,
    stageName: string,
    options: ExecuteOptions = {}
  ): Promise<ExecutionResult> {
    assertCanAdvance(state, this.registry, stageName);

    if (options.requestedNext !== undefined) {
      const expected = this.registry.next(stageName);
      if (options.requestedNext !== expected) {
        throw new IllegalTransitionError(
          stageName,
          options.requestedNext,
          expected === undefined
            ? `${stageName} is the last stage`
            : `${expected} follows ${stageName}`
        );
      }
    }

    const task = await this.tasks.get(state.taskId);
    const contextItems = await this.context.resolve(task.contextIds);
    const capability = this.registry.get(stageName);

    this.logger?.info(`Executing stage ${stageName} for task ${task.id}`);
    const startedAt = Date.now();

    let artifact: unknown;
    try {
      artifact = await capability.run({
        task,
        artifacts: structuredClone(state.artifacts),
        contextItems,
        feedback: state.feedback.filter(
          (item) => item.stageName === stageName && !item.incorporated
        ),
        signal: options.signal,
      });
    } catch (error) {
      this.logger?.error(`Stage ${stageName} failed`, error);
      throw new StageExecutionFailedError(stageName, error);
    }

    if (!isJsonObject(artifact)) {
      throw new StageExecutionFailedError(
        stageName,
        new Error(`Stage ${stageName} returned ${describeValue(artifact)} instead of a JSON object`)
      );
    }

    const durationMs = Date.now() - startedAt;
    this.logger?.debug(`Stage ${stageName} finished in ${durationMs}ms`);

    return {
      state: advance(state, this.registry, stageName, artifact, this.now()),
      artifact,
      durationMs,
    };
  }
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return `a ${typeof value}`;
}
