/**
 * Context Providers
 *
 * Resolve a task's context ids into the items handed to stages. The file
 * provider reads `context/<contextId>.json` from the data directory.
 *
 * @module context/provider
 */

import { randomUUID } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import {
  ContextItemSchema,
  SCHEMA_VERSIONS,
  type ContentType,
  type ContextItem,
} from '../schemas/index.js';
import { NotFoundError, StorageError } from '../pipeline/errors.js';
import type { ContextProvider } from '../pipeline/types.js';
import { atomicWriteJson, fileExists, listJsonIds, readDocument } from '../storage/atomic.js';
import { getContextDir, getContextItemPath, getDataDir } from '../storage/paths.js';

const CONTENT_TYPES_BY_EXTENSION: Record<string, ContentType> = {
  '.md': 'markdown',
  '.txt': 'text',
  '.json': 'json',
  '.yaml': 'yaml',
  '.yml': 'yaml',
  '.html': 'html',
  '.css': 'css',
  '.js': 'javascript',
  '.ts': 'typescript',
  '.py': 'python',
};

/**
 * Content type from a file name's extension; "unknown" when unrecognised.
 */
export function contentTypeFromPath(filePath: string): ContentType {
  return CONTENT_TYPES_BY_EXTENSION[path.extname(filePath).toLowerCase()] ?? 'unknown';
}

/**
 * Build a new context item with a generated id. Without an explicit
 * `contentType` the type is taken from the source's extension.
 */
export function createContextItem(
  input: {
    source: string;
    content: string;
    contentType?: ContentType;
    metadata?: Record<string, unknown>;
  },
  now: Date = new Date()
): ContextItem {
  return ContextItemSchema.parse({
    schemaVersion: SCHEMA_VERSIONS.contextItem,
    id: randomUUID(),
    source: input.source,
    content: input.content,
    contentType: input.contentType ?? contentTypeFromPath(input.source),
    metadata: input.metadata ?? {},
    createdAt: now.toISOString(),
  });
}

// ============================================================================
// File Provider
// ============================================================================

export class FileContextProvider implements ContextProvider {
  private readonly dataDir: string;

  constructor(options: { dataDir?: string } = {}) {
    this.dataDir = options.dataDir ?? getDataDir();
  }

  /**
   * @throws NotFoundError for the first id with no stored item
   */
  async resolve(contextIds: readonly string[]): Promise<ContextItem[]> {
    const items: ContextItem[] = [];
    for (const contextId of contextIds) {
      items.push(await this.get(contextId));
    }
    return items;
  }

  async get(contextId: string): Promise<ContextItem> {
    const item = await readDocument(
      getContextItemPath(contextId, this.dataDir),
      ContextItemSchema,
      'contextItem'
    );
    if (!item) {
      throw new NotFoundError('context_item', contextId);
    }
    return item;
  }

  async save(item: ContextItem): Promise<void> {
    const itemPath = getContextItemPath(item.id, this.dataDir);
    if (await fileExists(itemPath)) {
      throw new StorageError(`Context item ${item.id} already exists`, itemPath);
    }
    await atomicWriteJson(itemPath, item);
  }

  /**
   * Stored context items, oldest first, optionally of one content type.
   */
  async list(filter: { contentType?: ContentType } = {}): Promise<ContextItem[]> {
    const ids = await listJsonIds(getContextDir(this.dataDir));
    const items = await Promise.all(ids.map((id) => this.get(id)));
    return items
      .filter((item) => !filter.contentType || item.contentType === filter.contentType)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  /**
   * Delete a stored item. Tasks that still reference it fail to resolve it.
   *
   * @throws NotFoundError if no item has this id
   */
  async remove(contextId: string): Promise<void> {
    const itemPath = getContextItemPath(contextId, this.dataDir);
    if (!(await fileExists(itemPath))) {
      throw new NotFoundError('context_item', contextId);
    }
    await fs.rm(itemPath);
  }
}

// ============================================================================
// In-Memory Provider
// ============================================================================

export class InMemoryContextProvider implements ContextProvider {
  private readonly items = new Map<string, ContextItem>();

  constructor(items: readonly ContextItem[] = []) {
    for (const item of items) {
      this.items.set(item.id, item);
    }
  }

  async resolve(contextIds: readonly string[]): Promise<ContextItem[]> {
    return contextIds.map((contextId) => {
      const item = this.items.get(contextId);
      if (!item) {
        throw new NotFoundError('context_item', contextId);
      }
      return structuredClone(item);
    });
  }
}
