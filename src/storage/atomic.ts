/**
 * Atomic File Operations for Storage Layer
 *
 * Provides atomic write operations using temp file + rename pattern,
 * plus complementary read operations.
 *
 * @module storage/atomic
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { ZodType, ZodTypeDef } from 'zod';
import { migrateSchema, type SchemaType } from '../schemas/index.js';
import { StorageError } from '../pipeline/errors.js';

/**
 * Write JSON to a file atomically.
 *
 * The data is written to a temp file beside the target and renamed over it,
 * so readers see either the old or the new content.
 *
 * @throws StorageError if the write fails
 */
export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  const tempPath = `${filePath}.tmp.${process.pid}.${Date.now()}`;
  const json = JSON.stringify(data, null, 2);

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, json, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    const message = error instanceof Error ? error.message : String(error);
    throw new StorageError(`Atomic write failed for ${filePath}: ${message}`, filePath, {
      cause: error,
    });
  }
}

/**
 * Read and parse a JSON file
 *
 * @throws StorageError if the file doesn't exist or the JSON is invalid
 */
export async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new StorageError(`File not found: ${filePath}`, filePath, { cause: error });
    }
    throw new StorageError(`Cannot read ${filePath}`, filePath, { cause: error });
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new StorageError(`Invalid JSON in file: ${filePath}`, filePath, { cause: error });
  }
}

/**
 * Read a versioned JSON document, migrate it and validate it with a schema.
 *
 * @returns The parsed document, or null if the file does not exist
 * @throws StorageError if the file is unreadable or fails validation
 */
export async function readDocument<T>(
  filePath: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  schemaType: SchemaType
): Promise<T | null> {
  if (!(await fileExists(filePath))) {
    return null;
  }

  const raw = await readJson(filePath);
  const result = schema.safeParse(migrateSchema(raw, schemaType));

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new StorageError(`Corrupt document ${filePath}: ${issues}`, filePath, {
      cause: result.error,
    });
  }

  return result.data;
}

/**
 * Check if a file exists (not a directory)
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * List the ids of `<id>.json` files in a directory (empty if it is missing).
 */
export async function listJsonIds(dirPath: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(dirPath);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  return entries.filter((entry) => entry.endsWith('.json')).map((entry) => entry.slice(0, -5));
}

/**
 * Checked by shape: fs errors fail `instanceof Error` across realms (Jest).
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  );
}
