/**
 * Checkpoint Manager
 *
 * Snapshots pipeline states and restores them. Checkpoints are append-only:
 * once persisted they are never changed.
 *
 * A restore that would discard completed stages first records a
 * `pre_rollback` checkpoint of the current state, committed together with
 * the restore, so the discarded work can be restored again.
 *
 * @module pipeline/checkpoint
 */

import { randomUUID } from 'node:crypto';
import type { Checkpoint, PipelineState } from '../schemas/index.js';
import type { StateStore } from '../storage/store.js';
import { NotFoundError } from './errors.js';
import { applyCheckpoint, takeSnapshot } from './state.js';
import type { Logger } from './types.js';

/** Label of checkpoints taken on explicit request */
export const MANUAL_CHECKPOINT_LABEL = 'manual';

/** Label of the checkpoint taken before a destructive restore */
export const PRE_ROLLBACK_LABEL = 'pre_rollback';

/**
 * Label of the checkpoint taken before a stage runs.
 */
export function beforeStageLabel(stageName: string): string {
  return `before_${stageName}`;
}

export interface CheckpointManagerOptions {
  store: StateStore;
  /**
   * Record a `pre_rollback` checkpoint when a restore discards completed
   * stages.
   * @default true
   */
  safetyCheckpoints?: boolean;
  logger?: Logger;
  /** Clock, replaceable in tests */
  now?: () => Date;
}

export class CheckpointManager {
  private readonly store: StateStore;
  private readonly safetyCheckpoints: boolean;
  private readonly logger?: Logger;
  private readonly now: () => Date;

  constructor(options: CheckpointManagerOptions) {
    this.store = options.store;
    this.safetyCheckpoints = options.safetyCheckpoints ?? true;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Build a checkpoint of `state` without persisting it.
   */
  snapshot(state: PipelineState, label: string = MANUAL_CHECKPOINT_LABEL): Checkpoint {
    return {
      id: randomUUID(),
      pipelineStateId: state.id,
      stage: state.currentStage,
      label,
      createdAt: this.now().toISOString(),
      snapshot: takeSnapshot(state),
    };
  }

  /**
   * Persist a checkpoint of `state`. The state itself is not changed.
   *
   * @throws NotFoundError if the state has never been stored
   */
  async create(state: PipelineState, label?: string): Promise<Checkpoint> {
    const checkpoint = this.snapshot(state, label);
    await this.store.saveCheckpoint(checkpoint);
    this.logger?.debug(`Checkpoint ${checkpoint.id} (${checkpoint.label}) at ${checkpoint.stage}`);
    return checkpoint;
  }

  /**
   * Checkpoints of a state, oldest first.
   *
   * @throws NotFoundError if the state does not exist
   */
  async list(pipelineStateId: string): Promise<Checkpoint[]> {
    return this.store.loadCheckpoints(pipelineStateId);
  }

  /**
   * Make a checkpoint's snapshot the current state.
   *
   * Restoring the same checkpoint twice yields the same progress, artifacts
   * and feedback; only `updatedAt` moves.
   *
   * @throws NotFoundError if the state or checkpoint is unknown
   * @throws ConcurrentModificationError if the state changed while restoring
   */
  async restore(pipelineStateId: string, checkpointId: string): Promise<PipelineState> {
    const state = await this.store.load(pipelineStateId);
    const checkpoints = await this.store.loadCheckpoints(pipelineStateId);
    const checkpoint = checkpoints.find((candidate) => candidate.id === checkpointId);

    if (!checkpoint) {
      throw new NotFoundError(
        'checkpoint',
        checkpointId,
        `Checkpoint ${checkpointId} not found in pipeline state ${pipelineStateId}`
      );
    }

    return this.commitRestore(state, checkpoint);
  }

  /**
   * Restore the newest checkpoint. `pre_rollback` checkpoints are skipped,
   * so calling this repeatedly does not undo itself.
   *
   * @returns The restored state, or null when there is no checkpoint to restore
   * @throws NotFoundError if the state does not exist
   */
  async restoreLatest(pipelineStateId: string): Promise<PipelineState | null> {
    const state = await this.store.load(pipelineStateId);
    const checkpoints = await this.store.loadCheckpoints(pipelineStateId);
    const latest = checkpoints.filter((checkpoint) => checkpoint.label !== PRE_ROLLBACK_LABEL).pop();

    if (!latest) {
      this.logger?.info(`No checkpoints to restore for pipeline state ${pipelineStateId}`);
      return null;
    }

    return this.commitRestore(state, latest);
  }

  private async commitRestore(
    state: PipelineState,
    checkpoint: Checkpoint
  ): Promise<PipelineState> {
    const restored = applyCheckpoint(state, checkpoint, this.now());
    const discarded = state.stagesCompleted.filter(
      (stage) => !checkpoint.snapshot.stagesCompleted.includes(stage)
    );

    const checkpoints: Checkpoint[] = [];
    if (this.safetyCheckpoints && discarded.length > 0) {
      checkpoints.push(this.snapshot(state, PRE_ROLLBACK_LABEL));
      this.logger?.info(
        `Rollback discards ${discarded.join(', ')}; saved ${PRE_ROLLBACK_LABEL} checkpoint`
      );
    }

    await this.store.commit({
      state: restored,
      expectedUpdatedAt: state.updatedAt,
      checkpoints,
    });

    this.logger?.info(
      `Restored pipeline state ${state.id} to checkpoint ${checkpoint.id} at ${checkpoint.stage}`
    );

    return restored;
  }
}
