/**
 * Common Zod Schemas - Shared types used across the pipeline
 */

import { z } from 'zod';

// ============================================
// ISO8601 Timestamp Schema
// ============================================

/**
 * ISO8601 timestamp string (e.g., "2024-01-15T10:30:00.000Z")
 */
export const ISO8601TimestampSchema = z.string().datetime({ message: 'Must be a valid ISO8601 timestamp' });

export type ISO8601Timestamp = z.infer<typeof ISO8601TimestampSchema>;

// ============================================
// Identifier Schema
// ============================================

/**
 * Identifiers are used as file names, so path separators and parent
 * directory references are rejected.
 */
export const IdentifierSchema = z
  .string()
  .min(1, 'Identifier is required')
  .max(128)
  .regex(/^[A-Za-z0-9_-]+$/, 'Identifier may only contain letters, digits, "-" and "_"');

export type Identifier = z.infer<typeof IdentifierSchema>;

// ============================================
// Stage Name Schema
// ============================================

/**
 * Stage names are snake_case words (e.g. "implementation_planning").
 * Membership in a concrete registry is checked by the registry itself.
 */
export const StageNameSchema = z
  .string()
  .regex(/^[a-z][a-z0-9_]*$/, 'Stage name must be snake_case (e.g., "implementation_planning")');

// ============================================
// JSON Object Schema
// ============================================

/**
 * Structured content produced by a stage. Always a JSON object so feedback
 * annotations can be attached to it.
 */
export const JsonObjectSchema = z.record(z.string(), z.unknown());

export type JsonObject = z.infer<typeof JsonObjectSchema>;

/**
 * Check whether a value is a plain JSON object (not null, not an array).
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
