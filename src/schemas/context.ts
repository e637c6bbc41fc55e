/**
 * Context Item Schema
 *
 * Context items are reference material (documentation, source excerpts)
 * associated with a task and handed to stages as input.
 */

import { z } from 'zod';
import { IdentifierSchema, ISO8601TimestampSchema } from './common.js';

export const ContentTypeSchema = z.enum([
  'markdown',
  'text',
  'json',
  'yaml',
  'html',
  'css',
  'javascript',
  'typescript',
  'python',
  'unknown',
]);

export type ContentType = z.infer<typeof ContentTypeSchema>;

export const ContextItemSchema = z.object({
  schemaVersion: z.number().int().min(1).default(1),
  id: IdentifierSchema,
  /** Where the content came from (file path, URL, "manual") */
  source: z.string().min(1),
  content: z.string(),
  contentType: ContentTypeSchema.default('unknown'),
  metadata: z.record(z.string(), z.unknown()).default({}),
  createdAt: ISO8601TimestampSchema,
});

export type ContextItem = z.infer<typeof ContextItemSchema>;
