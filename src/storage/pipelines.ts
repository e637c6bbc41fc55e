/**
 * File-backed State Store
 *
 * Each pipeline is one `pipelines/<id>/pipeline.json` document holding the
 * current state and all of its checkpoints. Every write runs under the
 * pipeline's lock file, so the compare-and-swap on `updatedAt` holds across
 * processes, and lands with an atomic rename.
 *
 * @module storage/pipelines
 */

import * as fs from 'node:fs/promises';
import {
  PipelineDocumentSchema,
  type Checkpoint,
  type PipelineDocument,
  type PipelineState,
} from '../schemas/index.js';
import { NotFoundError } from '../pipeline/errors.js';
import { atomicWriteJson, isErrnoException, readDocument } from './atomic.js';
import { appendCheckpoint, applyCommit, sortCheckpoints } from './document.js';
import { withLock, type LockOptions } from './lock.js';
import {
  getDataDir,
  getPipelineDocumentPath,
  getPipelineLockPath,
  getPipelinesDir,
} from './paths.js';
import type { CommitRequest, StateStore, StateStoreOptions } from './store.js';

export interface FileStateStoreOptions extends StateStoreOptions {
  /** Data directory root (default: `getDataDir()`) */
  dataDir?: string;
  lock?: LockOptions;
}

export class FileStateStore implements StateStore {
  private readonly dataDir: string;

  constructor(private readonly options: FileStateStoreOptions = {}) {
    this.dataDir = options.dataDir ?? getDataDir();
  }

  async load(pipelineStateId: string): Promise<PipelineState> {
    return (await this.requireDocument(pipelineStateId)).state;
  }

  async findLatestByTask(taskId: string): Promise<PipelineState | null> {
    let latest: PipelineState | null = null;

    for (const pipelineStateId of await this.listPipelineIds()) {
      const document = await this.readDocument(pipelineStateId);
      if (!document || document.state.taskId !== taskId) {
        continue;
      }
      if (!latest || document.state.updatedAt > latest.updatedAt) {
        latest = document.state;
      }
    }

    return latest;
  }

  async save(state: PipelineState, expectedUpdatedAt: string | null): Promise<void> {
    await this.commit({ state, expectedUpdatedAt });
  }

  async loadCheckpoints(pipelineStateId: string): Promise<Checkpoint[]> {
    return sortCheckpoints((await this.requireDocument(pipelineStateId)).checkpoints);
  }

  async saveCheckpoint(checkpoint: Checkpoint): Promise<void> {
    await this.update(checkpoint.pipelineStateId, 'save checkpoint', (current) =>
      appendCheckpoint(current, checkpoint)
    );
  }

  async commit(request: CommitRequest): Promise<void> {
    await this.update(request.state.id, 'commit', (current) =>
      applyCommit(current, request, this.options.registry)
    );
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * Read-modify-write the document under the pipeline lock.
   */
  private async update(
    pipelineStateId: string,
    operation: string,
    change: (current: PipelineDocument | undefined) => PipelineDocument
  ): Promise<void> {
    const documentPath = getPipelineDocumentPath(pipelineStateId, this.dataDir);
    const lockPath = getPipelineLockPath(pipelineStateId, this.dataDir);

    await withLock(
      lockPath,
      operation,
      async () => {
        const current = await this.readDocument(pipelineStateId);
        await atomicWriteJson(documentPath, change(current ?? undefined));
      },
      this.options.lock
    );
  }

  private async readDocument(pipelineStateId: string): Promise<PipelineDocument | null> {
    return readDocument(
      getPipelineDocumentPath(pipelineStateId, this.dataDir),
      PipelineDocumentSchema,
      'pipelineDocument'
    );
  }

  private async requireDocument(pipelineStateId: string): Promise<PipelineDocument> {
    const document = await this.readDocument(pipelineStateId);
    if (!document) {
      throw new NotFoundError('pipeline_state', pipelineStateId);
    }
    return document;
  }

  private async listPipelineIds(): Promise<string[]> {
    try {
      const entries = await fs.readdir(getPipelinesDir(this.dataDir), { withFileTypes: true });
      return entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }
}
