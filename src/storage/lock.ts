/**
 * File Lock
 *
 * Serializes read-compare-write cycles on a pipeline document across
 * processes. The lock is a file created with the exclusive `wx` flag; a lock
 * older than the timeout is treated as left behind by a dead process and
 * removed.
 *
 * @module storage/lock
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { StorageError } from '../pipeline/errors.js';
import { isErrnoException } from './atomic.js';

/** Lock metadata stored in the lock file */
const LockInfoSchema = z.object({
  /** PID of the process holding the lock */
  pid: z.number().int(),
  /** When the lock was acquired */
  acquiredAt: z.string(),
  /** What operation is being performed */
  operation: z.string(),
});

export type LockInfo = z.infer<typeof LockInfoSchema>;

export interface LockOptions {
  /** Attempts before giving up (default 100) */
  maxRetries?: number;
  /** Wait between attempts in milliseconds (default 25) */
  retryIntervalMs?: number;
  /** Age after which a lock is considered stale (default 30s) */
  staleAfterMs?: number;
}

const DEFAULT_MAX_RETRIES = 100;
const DEFAULT_RETRY_INTERVAL_MS = 25;
const DEFAULT_STALE_AFTER_MS = 30 * 1000;

/**
 * Read the lock file, removing it when it is stale or unreadable.
 *
 * @returns Lock info if a valid lock exists, null otherwise
 */
async function checkLock(lockPath: string, staleAfterMs: number): Promise<LockInfo | null> {
  let content: string;
  try {
    content = await fs.readFile(lockPath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  const parsed = parseLockInfo(content);
  const ageMs = parsed ? Date.now() - Date.parse(parsed.acquiredAt) : Infinity;

  // A lock file that is half-written is younger than any timeout; only
  // treat it as stale once its mtime is old too.
  if (!parsed) {
    const stat = await fs.stat(lockPath).catch(() => null);
    if (stat && Date.now() - stat.mtimeMs < staleAfterMs) {
      return { pid: -1, acquiredAt: stat.mtime.toISOString(), operation: 'unknown' };
    }
  }

  if (ageMs > staleAfterMs) {
    await fs.rm(lockPath, { force: true });
    return null;
  }

  return parsed;
}

function parseLockInfo(content: string): LockInfo | null {
  try {
    const result = LockInfoSchema.safeParse(JSON.parse(content));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}

/**
 * Acquire the lock at `lockPath`.
 *
 * @throws StorageError if the lock cannot be acquired within the retries
 */
export async function acquireLock(
  lockPath: string,
  operation: string,
  options: LockOptions = {}
): Promise<void> {
  const {
    maxRetries = DEFAULT_MAX_RETRIES,
    retryIntervalMs = DEFAULT_RETRY_INTERVAL_MS,
    staleAfterMs = DEFAULT_STALE_AFTER_MS,
  } = options;

  await fs.mkdir(path.dirname(lockPath), { recursive: true });

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    const existing = await checkLock(lockPath, staleAfterMs);

    if (existing) {
      await sleep(retryIntervalMs);
      continue;
    }

    const lockInfo: LockInfo = {
      pid: process.pid,
      acquiredAt: new Date().toISOString(),
      operation,
    };

    try {
      await fs.writeFile(lockPath, JSON.stringify(lockInfo, null, 2), {
        flag: 'wx', // Exclusive create - fails if file exists
      });
      return;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        // Another writer created the file between our check and write
        continue;
      }
      throw new StorageError(`Cannot create lock file ${lockPath}`, lockPath, { cause: error });
    }
  }

  throw new StorageError(
    `Could not acquire lock for "${operation}" after ${maxRetries} attempts`,
    lockPath
  );
}

/**
 * Release the lock at `lockPath`.
 */
export async function releaseLock(lockPath: string): Promise<void> {
  await fs.rm(lockPath, { force: true });
}

/**
 * Execute a function while holding the lock at `lockPath`.
 *
 * The lock is released whether the function resolves or throws.
 */
export async function withLock<T>(
  lockPath: string,
  operation: string,
  fn: () => Promise<T>,
  options: LockOptions = {}
): Promise<T> {
  await acquireLock(lockPath, operation, options);

  try {
    return await fn();
  } finally {
    await releaseLock(lockPath);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
