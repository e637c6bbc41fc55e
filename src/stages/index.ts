/**
 * Default Pipeline Stages
 *
 * The five LLM-backed stages of the default code-generation pipeline and
 * the helpers that register them.
 *
 * @module stages
 */

import { StageRegistry } from '../pipeline/registry.js';
import { DEFAULT_STAGE_NAMES } from '../pipeline/types.js';
import type { LlmClient } from './llm-client.js';
import { LlmStage } from './llm-stage.js';
import { STAGE_PROMPTS } from './prompts.js';

export interface DefaultStageOptions {
  timeoutMs?: number;
  temperature?: number;
}

/**
 * Build the default stages in execution order.
 */
export function createDefaultStages(
  client: LlmClient,
  options: DefaultStageOptions = {}
): LlmStage[] {
  return DEFAULT_STAGE_NAMES.map(
    (name) =>
      new LlmStage({
        name,
        definition: STAGE_PROMPTS[name],
        client,
        timeoutMs: options.timeoutMs,
        temperature: options.temperature,
      })
  );
}

/**
 * Registry holding the default stages.
 */
export function createDefaultRegistry(
  client: LlmClient,
  options: DefaultStageOptions = {}
): StageRegistry {
  return new StageRegistry(createDefaultStages(client, options));
}

export {
  OpenAIChatClient,
  OpenAIApiError,
  extractJson,
  isRetryableStatus,
  type ChatMessage,
  type ChatOptions,
  type ChatResponse,
  type LlmClient,
  type OpenAIChatClientOptions,
} from './llm-client.js';
export { LlmStage, type LlmStageOptions } from './llm-stage.js';
export {
  STAGE_PROMPTS,
  STAGE_SYSTEM_PROMPT,
  buildStagePrompt,
  buildStageMessages,
  formatContextItems,
  type StagePromptDefinition,
} from './prompts.js';
