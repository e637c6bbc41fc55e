/**
 * Pipeline State Schemas
 *
 * Persisted shapes for a pipeline run: the state itself, the feedback items
 * it owns and the checkpoints taken of it.
 *
 * `updatedAt` doubles as the compare-and-swap token for commits, so every
 * committed mutation must move it strictly forward.
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import {
  IdentifierSchema,
  ISO8601TimestampSchema,
  JsonObjectSchema,
  StageNameSchema,
} from './common.js';

// ============================================================================
// Feedback
// ============================================================================

/**
 * Kinds of human feedback. Corrections carry the highest priority.
 */
export const FeedbackTypeSchema = z.enum(['suggestion', 'correction', 'enhancement']);

export type FeedbackType = z.infer<typeof FeedbackTypeSchema>;

export const FeedbackItemSchema = z.object({
  id: IdentifierSchema,
  stageName: StageNameSchema,
  content: z.string().trim().min(1, 'Feedback content cannot be empty'),
  type: FeedbackTypeSchema,
  createdAt: ISO8601TimestampSchema,
  incorporated: z.boolean().default(false),
  incorporatedAt: ISO8601TimestampSchema.optional(),
});

export type FeedbackItem = z.infer<typeof FeedbackItemSchema>;

/**
 * Annotation appended to a stage artifact when feedback is incorporated.
 * Stored under the artifact's `_feedback` key, in application order.
 */
export const FeedbackAnnotationSchema = z.object({
  feedbackId: IdentifierSchema,
  type: FeedbackTypeSchema,
  content: z.string(),
  incorporatedAt: ISO8601TimestampSchema,
});

export type FeedbackAnnotation = z.infer<typeof FeedbackAnnotationSchema>;

/** Artifact key that holds incorporated feedback annotations. */
export const FEEDBACK_ANNOTATIONS_KEY = '_feedback';

// ============================================================================
// Pipeline State
// ============================================================================

export const PipelineStateSchema = z.object({
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.pipelineState),

  id: IdentifierSchema,

  /** Task this run operates on (owned by the task repository) */
  taskId: IdentifierSchema,

  /** Stage to execute next, or the last stage once the run is complete */
  currentStage: StageNameSchema,

  /** Completed stages, always a prefix of the registry order */
  stagesCompleted: z.array(StageNameSchema),

  /** Stage name -> structured output of that stage */
  artifacts: z.record(StageNameSchema, JsonObjectSchema),

  feedback: z.array(FeedbackItemSchema),

  createdAt: ISO8601TimestampSchema,

  updatedAt: ISO8601TimestampSchema,
});

export type PipelineState = z.infer<typeof PipelineStateSchema>;

// ============================================================================
// Checkpoint
// ============================================================================

/**
 * The parts of a pipeline state captured by a checkpoint.
 */
export const StateSnapshotSchema = PipelineStateSchema.pick({
  currentStage: true,
  stagesCompleted: true,
  artifacts: true,
  feedback: true,
});

export type StateSnapshot = z.infer<typeof StateSnapshotSchema>;

export const CheckpointSchema = z.object({
  id: IdentifierSchema,
  pipelineStateId: IdentifierSchema,
  /** `currentStage` of the state when the snapshot was taken */
  stage: StageNameSchema,
  /** Why the checkpoint exists, e.g. "before_review", "manual", "pre_rollback" */
  label: z.string().min(1),
  createdAt: ISO8601TimestampSchema,
  snapshot: StateSnapshotSchema,
});

export type Checkpoint = z.infer<typeof CheckpointSchema>;

// ============================================================================
// Pipeline Document (on-disk)
// ============================================================================

/**
 * Everything stored for one pipeline: the current state plus its checkpoints.
 * Written as a single file so a state change and its checkpoint land together.
 */
export const PipelineDocumentSchema = z.object({
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.pipelineDocument),
  state: PipelineStateSchema,
  checkpoints: z.array(CheckpointSchema),
});

export type PipelineDocument = z.infer<typeof PipelineDocumentSchema>;
