/**
 * stagecraft
 *
 * Staged code-generation pipelines with checkpoints, rollback and human
 * feedback between stages.
 *
 * @example
 * ```typescript
 * import { PipelineService, StageRegistry, FileStateStore, FileTaskRepository,
 *   FileContextProvider, createTask } from 'stagecraft';
 *
 * const registry = new StageRegistry([designStage, buildStage]);
 * const tasks = new FileTaskRepository();
 * const service = new PipelineService({
 *   registry,
 *   store: new FileStateStore({ registry }),
 *   tasks,
 *   context: new FileContextProvider(),
 * });
 *
 * const task = createTask({ description: 'Build a queue', requirements: ['FIFO order'] });
 * await tasks.create(task);
 * const outcome = await service.orchestrator.runPipeline(task.id);
 * ```
 *
 * @module stagecraft
 */

export * from './schemas/index.js';
export * from './pipeline/index.js';
export * from './storage/index.js';
export * from './tasks/index.js';
export * from './context/index.js';
export * from './stages/index.js';
export { parseEnv, hasApiKey, requireApiKey, type Config, type ApiKeyName } from './config/index.js';
