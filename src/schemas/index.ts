/**
 * Zod Schemas for All Data Types
 *
 * Central export point for all schema definitions used by the pipeline.
 */

// ============================================================================
// Version Registry
// ============================================================================

export { SCHEMA_VERSIONS, getCurrentVersion, isCurrentVersion, type SchemaType } from './versions.js';

// ============================================================================
// Common Types
// ============================================================================

export {
  ISO8601TimestampSchema,
  IdentifierSchema,
  StageNameSchema,
  JsonObjectSchema,
  isJsonObject,
  type ISO8601Timestamp,
  type Identifier,
  type JsonObject,
} from './common.js';

// ============================================================================
// Task
// ============================================================================

export {
  TaskSchema,
  TaskStatusSchema,
  CreateTaskInputSchema,
  TASK_STATUS_TRANSITIONS,
  canTransitionTask,
  type Task,
  type TaskStatus,
  type CreateTaskInput,
} from './task.js';

// ============================================================================
// Pipeline State, Feedback, Checkpoints
// ============================================================================

export {
  FeedbackTypeSchema,
  FeedbackItemSchema,
  FeedbackAnnotationSchema,
  FEEDBACK_ANNOTATIONS_KEY,
  PipelineStateSchema,
  StateSnapshotSchema,
  CheckpointSchema,
  PipelineDocumentSchema,
  type FeedbackType,
  type FeedbackItem,
  type FeedbackAnnotation,
  type PipelineState,
  type StateSnapshot,
  type Checkpoint,
  type PipelineDocument,
} from './pipeline-state.js';

// ============================================================================
// Context Items
// ============================================================================

export {
  ContentTypeSchema,
  ContextItemSchema,
  type ContentType,
  type ContextItem,
} from './context.js';

// ============================================================================
// Migrations
// ============================================================================

export {
  migrateSchema,
  registerMigration,
  hasMigration,
  needsMigration,
  extractSchemaVersion,
  loadAndMigrate,
  type Migration,
} from './migrations/index.js';
