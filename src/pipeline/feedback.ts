/**
 * Feedback Manager
 *
 * Collects human feedback on pipeline stages and incorporates it into the
 * stage artifacts. Feedback items are append-only; incorporation marks an
 * item and appends its content as an annotation under the artifact's
 * `_feedback` key. An item is never applied twice.
 *
 * @module pipeline/feedback
 */

import { randomUUID } from 'node:crypto';
import {
  FEEDBACK_ANNOTATIONS_KEY,
  FeedbackTypeSchema,
  type FeedbackAnnotation,
  type FeedbackItem,
  type FeedbackType,
  type JsonObject,
  type PipelineState,
} from '../schemas/index.js';
import type { StateStore } from '../storage/store.js';
import { InvalidFeedbackError } from './errors.js';
import type { StageRegistry } from './registry.js';
import { nextTimestamp } from './state.js';
import type { Logger } from './types.js';

// ============================================================================
// Priority
// ============================================================================

/**
 * Priority of each feedback type; higher wins.
 */
export const FEEDBACK_PRIORITY: Readonly<Record<FeedbackType, number>> = {
  correction: 3,
  enhancement: 2,
  suggestion: 1,
};

/**
 * Order feedback from highest to lowest priority. Items of equal priority
 * keep submission order (oldest first).
 */
export function prioritizeFeedback(items: readonly FeedbackItem[]): FeedbackItem[] {
  return [...items].sort(
    (a, b) =>
      FEEDBACK_PRIORITY[b.type] - FEEDBACK_PRIORITY[a.type] ||
      a.createdAt.localeCompare(b.createdAt)
  );
}

/**
 * Order feedback for application: lowest priority first so a correction's
 * annotation lands last. Items of equal priority stay oldest first.
 */
export function applicationOrder(items: readonly FeedbackItem[]): FeedbackItem[] {
  return [...items].sort(
    (a, b) =>
      FEEDBACK_PRIORITY[a.type] - FEEDBACK_PRIORITY[b.type] ||
      a.createdAt.localeCompare(b.createdAt)
  );
}

// ============================================================================
// Manager
// ============================================================================

/**
 * What to do when asked to incorporate an item that already was.
 * - reject: fail the whole request with `InvalidFeedbackError`
 * - skip: leave the item out and apply the rest
 */
export type ReincorporationPolicy = 'reject' | 'skip';

export interface FeedbackManagerOptions {
  store: StateStore;
  registry: StageRegistry;
  /** @default 'reject' */
  reincorporation?: ReincorporationPolicy;
  logger?: Logger;
  now?: () => Date;
}

export class FeedbackManager {
  private readonly store: StateStore;
  private readonly registry: StageRegistry;
  private readonly reincorporation: ReincorporationPolicy;
  private readonly logger?: Logger;
  private readonly now: () => Date;

  constructor(options: FeedbackManagerOptions) {
    this.store = options.store;
    this.registry = options.registry;
    this.reincorporation = options.reincorporation ?? 'reject';
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Record feedback on a stage.
   *
   * @throws NotFoundError if the state does not exist
   * @throws InvalidStageError if the stage is not registered
   * @throws InvalidFeedbackError for empty content or an unknown type
   */
  async submit(
    pipelineStateId: string,
    stageName: string,
    content: string,
    type: string = 'suggestion'
  ): Promise<FeedbackItem> {
    const state = await this.store.load(pipelineStateId);
    this.registry.assertStage(stageName);

    const trimmed = content.trim();
    if (!trimmed) {
      throw new InvalidFeedbackError('Feedback content cannot be empty');
    }

    const parsedType = FeedbackTypeSchema.safeParse(type);
    if (!parsedType.success) {
      throw new InvalidFeedbackError(
        `Invalid feedback type: ${type}. Must be one of: ${FeedbackTypeSchema.options.join(', ')}`
      );
    }

    const now = this.now();
    const item: FeedbackItem = {
      id: randomUUID(),
      stageName,
      content: trimmed,
      type: parsedType.data,
      createdAt: now.toISOString(),
      incorporated: false,
    };

    await this.store.commit({
      state: {
        ...state,
        feedback: [...state.feedback, item],
        updatedAt: nextTimestamp(state.updatedAt, now),
      },
      expectedUpdatedAt: state.updatedAt,
    });

    this.logger?.info(`Feedback ${item.id} (${item.type}) submitted for ${stageName}`);
    return item;
  }

  /**
   * Incorporate specific feedback items, in the order given.
   *
   * Every id is validated before anything changes; one bad id fails the
   * whole request.
   *
   * @throws NotFoundError if the state does not exist
   * @throws InvalidFeedbackError for unknown ids, items whose stage has no
   *   artifact yet, or already incorporated items under the `reject` policy
   */
  async incorporate(
    pipelineStateId: string,
    feedbackIds: readonly string[]
  ): Promise<PipelineState> {
    const state = await this.store.load(pipelineStateId);
    const byId = new Map(state.feedback.map((item) => [item.id, item]));
    const ids = [...new Set(feedbackIds)];

    const unknown = ids.filter((id) => !byId.has(id));
    if (unknown.length > 0) {
      throw new InvalidFeedbackError(`Unknown feedback ids: ${unknown.join(', ')}`, unknown);
    }

    const requested = ids.flatMap((id) => {
      const item = byId.get(id);
      return item ? [item] : [];
    });

    const withoutArtifact = requested.filter((item) => !(item.stageName in state.artifacts));
    if (withoutArtifact.length > 0) {
      throw new InvalidFeedbackError(
        'Feedback refers to stages without an artifact yet: ' +
          withoutArtifact.map((item) => `${item.id} (${item.stageName})`).join(', '),
        withoutArtifact.map((item) => item.id)
      );
    }

    const already = requested.filter((item) => item.incorporated);
    if (already.length > 0 && this.reincorporation === 'reject') {
      throw new InvalidFeedbackError(
        `Feedback already incorporated: ${already.map((item) => item.id).join(', ')}`,
        already.map((item) => item.id)
      );
    }

    const pending = requested.filter((item) => !item.incorporated);
    return this.commitIncorporation(state, pending);
  }

  /**
   * Incorporate every pending item whose stage has an artifact.
   *
   * Items are applied from lowest to highest priority, so a correction's
   * annotation is the last one on its artifact. Items on stages without an
   * artifact stay pending.
   *
   * @throws NotFoundError if the state does not exist
   */
  async incorporatePrioritized(pipelineStateId: string): Promise<PipelineState> {
    const state = await this.store.load(pipelineStateId);
    const eligible = state.feedback.filter(
      (item) => !item.incorporated && item.stageName in state.artifacts
    );

    return this.commitIncorporation(state, applicationOrder(eligible));
  }

  /**
   * Feedback of a state, optionally for one stage only.
   *
   * @throws NotFoundError if the state does not exist
   * @throws InvalidStageError if `stageName` is not registered
   */
  async list(pipelineStateId: string, stageName?: string): Promise<FeedbackItem[]> {
    const state = await this.store.load(pipelineStateId);
    if (stageName === undefined) {
      return state.feedback;
    }
    this.registry.assertStage(stageName);
    return state.feedback.filter((item) => item.stageName === stageName);
  }

  /**
   * Feedback not yet incorporated, optionally for one stage only.
   */
  async listPending(pipelineStateId: string, stageName?: string): Promise<FeedbackItem[]> {
    return (await this.list(pipelineStateId, stageName)).filter((item) => !item.incorporated);
  }

  private async commitIncorporation(
    state: PipelineState,
    items: readonly FeedbackItem[]
  ): Promise<PipelineState> {
    if (items.length === 0) {
      this.logger?.debug(`No feedback to incorporate for pipeline state ${state.id}`);
      return state;
    }

    const now = this.now();
    const updated = applyFeedback(state, items, now);
    await this.store.commit({ state: updated, expectedUpdatedAt: state.updatedAt });

    this.logger?.info(
      `Incorporated ${items.length} feedback item(s) into pipeline state ${state.id}`
    );
    return updated;
  }
}

// ============================================================================
// Application
// ============================================================================

/**
 * Mark items incorporated and append their annotations to the artifacts,
 * in the order given. Returns a new state.
 */
export function applyFeedback(
  state: PipelineState,
  items: readonly FeedbackItem[],
  now: Date = new Date()
): PipelineState {
  const incorporatedAt = now.toISOString();
  const artifacts: Record<string, JsonObject> = { ...state.artifacts };
  const applied = new Set<string>();

  for (const item of items) {
    const artifact = artifacts[item.stageName];
    if (!artifact) {
      continue;
    }

    const annotation: FeedbackAnnotation = {
      feedbackId: item.id,
      type: item.type,
      content: item.content,
      incorporatedAt,
    };
    artifacts[item.stageName] = {
      ...artifact,
      [FEEDBACK_ANNOTATIONS_KEY]: [...readAnnotations(artifact), annotation],
    };
    applied.add(item.id);
  }

  return {
    ...state,
    artifacts,
    feedback: state.feedback.map((item) =>
      applied.has(item.id) ? { ...item, incorporated: true, incorporatedAt } : item
    ),
    updatedAt: nextTimestamp(state.updatedAt, now),
  };
}

/**
 * Annotations already recorded on an artifact, oldest first.
 */
export function readAnnotations(artifact: JsonObject): unknown[] {
  const existing = artifact[FEEDBACK_ANNOTATIONS_KEY];
  return Array.isArray(existing) ? existing : [];
}
