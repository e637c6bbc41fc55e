/**
 * Stage Registry
 *
 * Immutable, ordered mapping of stage names to stage capabilities. The
 * registry is built once and injected into the executor and orchestrator.
 *
 * @module pipeline/registry
 */

import { InvalidStageError } from './errors.js';
import type { StageCapability } from './types.js';

/**
 * Ordered set of stages a pipeline runs through.
 *
 * @example
 * ```typescript
 * const registry = new StageRegistry([designStage, implementStage, testStage]);
 *
 * registry.first();                 // 'design'
 * registry.next('design');          // 'implement'
 * registry.next('test');            // undefined
 * registry.get('implement').run(input);
 * ```
 */
export class StageRegistry {
  private readonly order: readonly string[];
  private readonly stages: ReadonlyMap<string, StageCapability>;

  /**
   * @throws Error if the list is empty or contains duplicate names
   */
  constructor(stages: readonly StageCapability[]) {
    if (stages.length === 0) {
      throw new Error('A stage registry needs at least one stage');
    }

    const map = new Map<string, StageCapability>();
    for (const stage of stages) {
      if (map.has(stage.name)) {
        throw new Error(`Stage ${stage.name} is already registered`);
      }
      map.set(stage.name, stage);
    }

    this.order = Object.freeze(stages.map((stage) => stage.name));
    this.stages = map;
  }

  /** Stage names in execution order */
  get names(): readonly string[] {
    return this.order;
  }

  get size(): number {
    return this.order.length;
  }

  has(name: string): boolean {
    return this.stages.has(name);
  }

  /**
   * Get a stage capability by name.
   *
   * @throws InvalidStageError if the stage is not registered
   */
  get(name: string): StageCapability {
    const stage = this.stages.get(name);
    if (!stage) {
      throw new InvalidStageError(name, this.order);
    }
    return stage;
  }

  /**
   * Position of a stage in execution order, or -1 if unknown.
   */
  indexOf(name: string): number {
    return this.order.indexOf(name);
  }

  first(): string {
    return this.order[0];
  }

  last(): string {
    return this.order[this.order.length - 1];
  }

  /**
   * Stage that follows `name`, or undefined for the last stage.
   *
   * @throws InvalidStageError if the stage is not registered
   */
  next(name: string): string | undefined {
    const index = this.indexOf(name);
    if (index === -1) {
      throw new InvalidStageError(name, this.order);
    }
    return this.order[index + 1];
  }

  isLast(name: string): boolean {
    return name === this.last();
  }

  /**
   * @throws InvalidStageError if the stage is not registered
   */
  assertStage(name: string): void {
    if (!this.has(name)) {
      throw new InvalidStageError(name, this.order);
    }
  }
}
