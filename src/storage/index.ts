/**
 * Storage Layer
 *
 * File-based and in-memory persistence for tasks and pipeline states.
 * All file writes use the atomic temp file + rename pattern.
 *
 * @module storage
 */

// Ports
export type { CommitRequest, StateStore, StateStoreOptions, TaskRepository } from './store.js';

// Path utilities
export {
  validateIdSecurity,
  getDataDir,
  resolveDataDir,
  getTasksDir,
  getTaskPath,
  getContextDir,
  getContextItemPath,
  getPipelinesDir,
  getPipelineDir,
  getPipelineDocumentPath,
  getPipelineLockPath,
} from './paths.js';

// Atomic operations
export { atomicWriteJson, readJson, readDocument, fileExists, listJsonIds } from './atomic.js';

// Locking
export { acquireLock, releaseLock, withLock, type LockOptions, type LockInfo } from './lock.js';

// Document operations
export { applyCommit, appendCheckpoint, sortCheckpoints } from './document.js';

// Implementations
export { InMemoryStateStore, InMemoryTaskRepository } from './memory.js';
export { FileStateStore, type FileStateStoreOptions } from './pipelines.js';
export { FileTaskRepository } from './tasks.js';
