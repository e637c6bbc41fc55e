/**
 * Task Creation and Parsing
 *
 * Builds validated `Task` objects from structured input or from free text
 * typed by a user.
 *
 * @module tasks/task
 */

import { randomUUID } from 'node:crypto';
import {
  CreateTaskInputSchema,
  SCHEMA_VERSIONS,
  TaskSchema,
  canTransitionTask,
  type CreateTaskInput,
  type Task,
  type TaskStatus,
} from '../schemas/index.js';
import { IllegalTransitionError } from '../pipeline/errors.js';

// ============================================
// Creation
// ============================================

/**
 * Create a new task with a generated id and `created` status.
 *
 * Duplicate context ids are dropped, keeping first occurrence order.
 *
 * @throws ZodError if the description is empty or no requirement is given
 */
export function createTask(input: CreateTaskInput, now: Date = new Date()): Task {
  const parsed = CreateTaskInputSchema.parse(input);
  const timestamp = now.toISOString();

  return TaskSchema.parse({
    schemaVersion: SCHEMA_VERSIONS.task,
    id: randomUUID(),
    description: parsed.description,
    requirements: parsed.requirements,
    constraints: parsed.constraints,
    contextIds: [...new Set(parsed.contextIds)],
    status: 'created',
    createdAt: timestamp,
    updatedAt: timestamp,
  });
}

/**
 * Return a copy of the task with a new status.
 *
 * @throws IllegalTransitionError if the task may not move to `status`
 */
export function withStatus(task: Task, status: TaskStatus, now: Date = new Date()): Task {
  if (!canTransitionTask(task.status, status)) {
    throw new IllegalTransitionError(
      task.status,
      status,
      `task ${task.id} cannot move from ${task.status} to ${status}`
    );
  }

  return { ...task, status, updatedAt: now.toISOString() };
}

// ============================================
// Free-text Parsing
// ============================================

/**
 * Structured task input parsed from free text.
 */
export interface ParsedTaskInput {
  description: string;
  requirements: string[];
  constraints: string[];
}

/**
 * Parse free text into a task description, requirements and constraints.
 *
 * The first non-empty line is the description. Lines ending with ":" open a
 * section; sections whose header mentions "requirement" or "constraint"
 * collect the lines that follow, with leading "-" or "*" bullets removed.
 * Without any such section, every remaining line is a requirement. When
 * nothing else is found, the description is the only requirement.
 *
 * @example
 * ```typescript
 * parseTaskInput('Build a CLI\nRequirements:\n- parse flags\nConstraints:\n* no deps');
 * // { description: 'Build a CLI', requirements: ['parse flags'], constraints: ['no deps'] }
 * ```
 */
export function parseTaskInput(text: string): ParsedTaskInput {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const description = lines[0] ?? '';
  const rest = lines.slice(1);

  const requirements: string[] = [];
  const constraints: string[] = [];
  let section: string[] | null = null;
  let sawSection = false;

  for (const line of rest) {
    if (line.endsWith(':')) {
      const header = line.slice(0, -1).trim().toLowerCase();
      if (header.includes('requirement')) {
        section = requirements;
        sawSection = true;
      } else if (header.includes('constraint')) {
        section = constraints;
        sawSection = true;
      } else {
        section = null;
      }
      continue;
    }

    if (section) {
      pushItem(section, line);
    }
  }

  if (!sawSection) {
    for (const line of rest) {
      if (!line.endsWith(':')) {
        pushItem(requirements, line);
      }
    }
  }

  if (requirements.length === 0 && description) {
    requirements.push(description);
  }

  return { description, requirements, constraints };
}

function pushItem(target: string[], line: string): void {
  const item = line.startsWith('-') || line.startsWith('*') ? line.slice(1).trim() : line;
  if (item) {
    target.push(item);
  }
}
