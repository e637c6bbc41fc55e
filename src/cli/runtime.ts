/**
 * CLI Runtime
 *
 * Wires the pipeline service over file storage in the data directory and the
 * default LLM-backed stages. The OpenAI client is only created when a stage
 * actually runs, so commands that never execute a stage work without an
 * API key.
 *
 * @module cli/runtime
 */

import { config, requireApiKey, type Config } from '../config/index.js';
import { FileContextProvider } from '../context/provider.js';
import type { StageRegistry } from '../pipeline/registry.js';
import { PipelineService } from '../pipeline/service.js';
import type { Logger } from '../pipeline/types.js';
import {
  OpenAIChatClient,
  createDefaultRegistry,
  type ChatMessage,
  type ChatOptions,
  type ChatResponse,
  type LlmClient,
} from '../stages/index.js';
import type { TaskRepository } from '../storage/store.js';
import { FileStateStore } from '../storage/pipelines.js';
import { FileTaskRepository } from '../storage/tasks.js';

export interface CliRuntime {
  dataDir: string;
  service: PipelineService;
  tasks: TaskRepository;
  context: FileContextProvider;
}

export interface RuntimeOptions {
  dataDir: string;
  /** Stages to run (default: the LLM-backed default stages) */
  registry?: StageRegistry;
  settings?: Config;
  logger?: Logger;
}

/**
 * Chat client that builds the OpenAI client on its first request.
 */
class DeferredOpenAIClient implements LlmClient {
  private client?: OpenAIChatClient;

  constructor(private readonly settings: Config) {}

  async chat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResponse> {
    this.client ??= new OpenAIChatClient({
      apiKey: requireApiKey('openai', this.settings),
      model: this.settings.model,
      timeoutMs: this.settings.stageTimeoutMs,
    });
    return this.client.chat(messages, options);
  }
}

export function createRuntime(options: RuntimeOptions): CliRuntime {
  const settings = options.settings ?? config;
  const registry =
    options.registry ??
    createDefaultRegistry(new DeferredOpenAIClient(settings), {
      timeoutMs: settings.stageTimeoutMs,
    });

  const store = new FileStateStore({ dataDir: options.dataDir, registry });
  const tasks = new FileTaskRepository({ dataDir: options.dataDir });
  const context = new FileContextProvider({ dataDir: options.dataDir });

  const service = new PipelineService({
    registry,
    store,
    tasks,
    context,
    reincorporation: settings.reincorporation,
    safetyCheckpoints: settings.safetyCheckpoints,
    maxStageAttempts: settings.maxStageAttempts,
    logger: options.logger,
  });

  return { dataDir: options.dataDir, service, tasks, context };
}
