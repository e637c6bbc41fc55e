/**
 * Path Resolution Utilities
 *
 * Provides consistent path generation for the storage layer.
 *
 * Directory Structure:
 * ```
 * ~/.stagecraft/                         # Default data directory
 * ├── tasks/
 * │   └── <task_id>.json                 # Task definition and status
 * ├── context/
 * │   └── <context_id>.json              # Context item
 * └── pipelines/
 *     └── <pipeline_state_id>/
 *         ├── pipeline.json              # Current state + checkpoints
 *         └── .lock                      # Present while a commit is in flight
 * ```
 *
 * Every helper takes the data directory as its last argument and falls back
 * to `getDataDir()`.
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import * as os from 'node:os';

/**
 * Validates an ID string to prevent path traversal attacks.
 *
 * Rejects IDs containing:
 * - `..` (parent directory traversal)
 * - `/` (forward slash - Unix path separator)
 * - `\` (backslash - Windows path separator)
 *
 * @param idName - Name of the ID for error messages (e.g., 'taskId')
 * @throws {Error} If the ID is empty or contains path traversal characters
 */
export function validateIdSecurity(id: string, idName: string): void {
  if (!id || id.trim() === '') {
    throw new Error(`${idName} is required`);
  }
  if (id.includes('..') || id.includes('/') || id.includes('\\')) {
    throw new Error(`${idName} contains invalid characters (path traversal not allowed)`);
  }
}

/**
 * Gets the root data directory for the application.
 *
 * Uses the `STAGECRAFT_DATA_DIR` environment variable if set,
 * otherwise defaults to `~/.stagecraft/`.
 *
 * @example
 * ```typescript
 * process.env.STAGECRAFT_DATA_DIR = '/custom/path';
 * getDataDir(); // '/custom/path'
 * ```
 */
export function getDataDir(): string {
  return resolveDataDir(process.env.STAGECRAFT_DATA_DIR);
}

/**
 * Resolve a configured data directory, expanding a leading `~`.
 */
export function resolveDataDir(configured: string | undefined): string {
  if (configured) {
    if (configured.startsWith('~')) {
      return path.join(os.homedir(), configured.slice(1));
    }
    return path.resolve(configured);
  }

  return path.join(os.homedir(), '.stagecraft');
}

// ============================================
// Tasks
// ============================================

export function getTasksDir(dataDir: string = getDataDir()): string {
  return path.join(dataDir, 'tasks');
}

/**
 * @example
 * ```typescript
 * getTaskPath('0b6f...', '/data'); // '/data/tasks/0b6f....json'
 * ```
 */
export function getTaskPath(taskId: string, dataDir: string = getDataDir()): string {
  validateIdSecurity(taskId, 'taskId');
  return path.join(getTasksDir(dataDir), `${taskId}.json`);
}

// ============================================
// Context Items
// ============================================

export function getContextDir(dataDir: string = getDataDir()): string {
  return path.join(dataDir, 'context');
}

export function getContextItemPath(contextId: string, dataDir: string = getDataDir()): string {
  validateIdSecurity(contextId, 'contextId');
  return path.join(getContextDir(dataDir), `${contextId}.json`);
}

// ============================================
// Pipelines
// ============================================

export function getPipelinesDir(dataDir: string = getDataDir()): string {
  return path.join(dataDir, 'pipelines');
}

/**
 * Gets the directory holding one pipeline's document and lock file.
 */
export function getPipelineDir(pipelineStateId: string, dataDir: string = getDataDir()): string {
  validateIdSecurity(pipelineStateId, 'pipelineStateId');
  return path.join(getPipelinesDir(dataDir), pipelineStateId);
}

export function getPipelineDocumentPath(
  pipelineStateId: string,
  dataDir: string = getDataDir()
): string {
  return path.join(getPipelineDir(pipelineStateId, dataDir), 'pipeline.json');
}

export function getPipelineLockPath(
  pipelineStateId: string,
  dataDir: string = getDataDir()
): string {
  return path.join(getPipelineDir(pipelineStateId, dataDir), '.lock');
}
