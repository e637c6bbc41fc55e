/**
 * LLM-backed Stage
 *
 * Stage capability that asks the chat model for a JSON object and returns it
 * as the stage artifact.
 *
 * @module stages/llm-stage
 */

import { isJsonObject, type JsonObject } from '../schemas/index.js';
import type { StageCapability, StageInput } from '../pipeline/types.js';
import { extractJson, type LlmClient } from './llm-client.js';
import { buildStageMessages, type StagePromptDefinition } from './prompts.js';

export interface LlmStageOptions {
  name: string;
  definition: StagePromptDefinition;
  client: LlmClient;
  /** Per-request timeout passed to the client */
  timeoutMs?: number;
  temperature?: number;
}

export class LlmStage implements StageCapability {
  readonly name: string;
  readonly description: string;
  private readonly definition: StagePromptDefinition;
  private readonly client: LlmClient;
  private readonly timeoutMs?: number;
  private readonly temperature?: number;

  constructor(options: LlmStageOptions) {
    this.name = options.name;
    this.description = options.definition.description;
    this.definition = options.definition;
    this.client = options.client;
    this.timeoutMs = options.timeoutMs;
    this.temperature = options.temperature;
  }

  /**
   * @throws Error if the response is not a JSON object
   */
  async run(input: StageInput): Promise<JsonObject> {
    const response = await this.client.chat(buildStageMessages(this.definition, input), {
      timeoutMs: this.timeoutMs,
      temperature: this.temperature,
      signal: input.signal,
    });

    const parsed = extractJson(response.content);
    if (!isJsonObject(parsed)) {
      throw new Error(`Stage ${this.name} expected a JSON object from the model`);
    }
    return parsed;
  }
}
