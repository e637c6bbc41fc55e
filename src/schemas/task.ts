/**
 * Task Schema - The unit of work a pipeline operates on
 *
 * A task carries the description, requirements and constraints for the code
 * to be generated, plus the ids of context items relevant to it.
 */

import { z } from 'zod';
import { IdentifierSchema, ISO8601TimestampSchema } from './common.js';

// ============================================
// Task Status
// ============================================

export const TaskStatusSchema = z.enum(['created', 'in_progress', 'completed', 'failed']);

export type TaskStatus = z.infer<typeof TaskStatusSchema>;

/**
 * Allowed task status transitions. A completed task may be picked up again
 * after a rollback re-opens its pipeline.
 */
export const TASK_STATUS_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  created: ['in_progress'],
  in_progress: ['in_progress', 'completed', 'failed'],
  completed: ['in_progress'],
  failed: ['in_progress'],
};

/**
 * Check whether a task may move from one status to another.
 */
export function canTransitionTask(from: TaskStatus, to: TaskStatus): boolean {
  return TASK_STATUS_TRANSITIONS[from].includes(to);
}

// ============================================
// Task Schema
// ============================================

export const TaskSchema = z.object({
  schemaVersion: z.number().int().min(1).default(1),

  /** Unique task identifier (UUID) */
  id: IdentifierSchema,

  /** What should be built */
  description: z.string().trim().min(1, 'Task description cannot be empty'),

  /** Ordered requirement statements (at least 1 required) */
  requirements: z.array(z.string().min(1)).min(1, 'At least one requirement must be specified'),

  /** Ordered constraint statements */
  constraints: z.array(z.string().min(1)).default([]),

  /** Context items associated with the task */
  contextIds: z.array(IdentifierSchema).default([]),

  status: TaskStatusSchema.default('created'),

  createdAt: ISO8601TimestampSchema,

  updatedAt: ISO8601TimestampSchema,
});

export type Task = z.infer<typeof TaskSchema>;

// ============================================
// Task Creation Input
// ============================================

/**
 * Input schema for creating a new task (without generated fields)
 */
export const CreateTaskInputSchema = z.object({
  description: z.string().trim().min(1, 'Task description cannot be empty'),
  requirements: z.array(z.string().trim().min(1)).min(1, 'At least one requirement must be specified'),
  constraints: z.array(z.string().trim().min(1)).default([]),
  contextIds: z.array(IdentifierSchema).default([]),
});

export type CreateTaskInput = z.input<typeof CreateTaskInputSchema>;
