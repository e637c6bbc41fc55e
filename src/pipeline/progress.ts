/**
 * Progress Calculator
 *
 * @module pipeline/progress
 */

import type { PipelineState } from '../schemas/index.js';
import type { StageRegistry } from './registry.js';
import { isComplete } from './state.js';
import type { PipelineProgress } from './types.js';

/**
 * Derive progress from a pipeline state.
 *
 * The percentage is left unrounded; display code rounds it.
 */
export function calculateProgress(
  state: PipelineState,
  registry: StageRegistry
): PipelineProgress {
  const totalStages = registry.size;
  const completedStages = [...state.stagesCompleted];

  return {
    currentStage: state.currentStage,
    completedStages,
    totalStages,
    percentage: (completedStages.length / totalStages) * 100,
    status: isComplete(state, registry) ? 'completed' : 'executing',
  };
}

/**
 * Format a progress percentage for display, e.g. "66.7%".
 */
export function formatPercentage(percentage: number): string {
  return `${(Math.round(percentage * 10) / 10).toFixed(1)}%`;
}
