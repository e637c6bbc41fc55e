/**
 * OpenAI Chat Client
 *
 * Chat completions client used by the default stages. Handles
 * authentication, timeouts, retries of transient errors and JSON extraction.
 * Stages depend on the `LlmClient` interface so tests can inject a fake.
 *
 * @module stages/llm-client
 */

import OpenAI from 'openai';

// ============================================================================
// Types
// ============================================================================

/**
 * Message in the chat conversation.
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Options for chat completion requests.
 */
export interface ChatOptions {
  /** Temperature for response randomness */
  temperature?: number;
  /** Maximum tokens in response */
  maxTokens?: number;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
  /** Aborts the request, e.g. when a pipeline run is cancelled */
  signal?: AbortSignal;
}

/**
 * Response from the chat completion API.
 */
export interface ChatResponse {
  /** Generated text content */
  content: string;
  /** Token usage statistics */
  usage: {
    inputTokens: number;
    outputTokens: number;
  };
  /** Model that was used */
  model: string;
  /** Finish reason */
  finishReason: string;
}

/**
 * Anything that can answer a chat conversation with JSON text.
 */
export interface LlmClient {
  chat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResponse>;
}

/**
 * OpenAI API error with additional context.
 */
export class OpenAIApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly isRetryable: boolean
  ) {
    super(message);
    this.name = 'OpenAIApiError';
  }
}

// ============================================================================
// Client Implementation
// ============================================================================

export interface OpenAIChatClientOptions {
  apiKey: string;
  /** Model id, e.g. "gpt-4o-mini" */
  model: string;
  /** Default request timeout (default: 120000) */
  timeoutMs?: number;
  /** Retries of transient failures (default: 2) */
  maxRetries?: number;
  /** Base delay for exponential backoff (default: 1000) */
  baseDelayMs?: number;
  /** Pre-built SDK client, mainly for tests */
  client?: OpenAI;
}

const DEFAULT_TIMEOUT_MS = 120_000;
const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_BASE_DELAY_MS = 1000;
const MAX_DELAY_MS = 8000;

export class OpenAIChatClient implements LlmClient {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;

  constructor(options: OpenAIChatClientOptions) {
    // The SDK retries on its own; retries are handled here instead so the
    // timeout applies per attempt.
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey, maxRetries: 0 });
    this.model = options.model;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  }

  /**
   * Send a chat completion request in JSON mode.
   *
   * @throws OpenAIApiError on API errors or timeout
   */
  async chat(messages: ChatMessage[], options: ChatOptions = {}): Promise<ChatResponse> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.request(messages, options);
      } catch (error) {
        const retryable = error instanceof OpenAIApiError && error.isRetryable;
        if (!retryable || attempt >= this.maxRetries || options.signal?.aborted) {
          throw error;
        }
        await sleep(calculateDelay(attempt, this.baseDelayMs, MAX_DELAY_MS));
      }
    }
  }

  private async request(messages: ChatMessage[], options: ChatOptions): Promise<ChatResponse> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;

    // Create abort controller for timeout and caller cancellation
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const onAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: messages.map((m) => ({ role: m.role, content: m.content })),
          temperature: options.temperature ?? 0.2,
          ...(options.maxTokens !== undefined && { max_tokens: options.maxTokens }),
          response_format: { type: 'json_object' },
        },
        { signal: controller.signal }
      );

      const choice = response.choices[0];
      if (!choice?.message?.content) {
        throw new OpenAIApiError('Empty response from OpenAI', 500, true);
      }

      return {
        content: choice.message.content,
        usage: {
          inputTokens: response.usage?.prompt_tokens ?? 0,
          outputTokens: response.usage?.completion_tokens ?? 0,
        },
        model: response.model,
        finishReason: choice.finish_reason ?? 'unknown',
      };
    } catch (error) {
      if (error instanceof OpenAIApiError) {
        throw error;
      }

      if (options.signal?.aborted) {
        throw new OpenAIApiError('Request cancelled', 499, false);
      }

      if (controller.signal.aborted) {
        throw new OpenAIApiError(`Request timed out after ${timeoutMs}ms`, 408, true);
      }

      if (error instanceof OpenAI.APIError) {
        const status = error.status ?? 500;
        throw new OpenAIApiError(error.message, status, isRetryableStatus(status));
      }

      throw new OpenAIApiError(
        error instanceof Error ? error.message : 'Unknown error',
        500,
        true
      );
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Rate limits and server errors are worth retrying.
 */
export function isRetryableStatus(status: number): boolean {
  return status === 429 || status === 500 || status === 502 || status === 503 || status === 504;
}

/**
 * Extract JSON from LLM response text
 *
 * Handles common response formats:
 * - Raw JSON object
 * - JSON wrapped in markdown code blocks (```json ... ```)
 * - JSON embedded in prose text
 *
 * @throws Error if JSON cannot be extracted or parsed
 */
export function extractJson(text: string): unknown {
  let cleanText = text.trim();

  // Handle markdown code blocks (```json ... ``` or ``` ... ```)
  const codeBlockMatch = cleanText.match(/```(?:json)?\s*\n?([\s\S]*?)\n?```/);
  if (codeBlockMatch?.[1] !== undefined) {
    cleanText = codeBlockMatch[1].trim();
  }

  // Try to find JSON object if not already clean
  if (!cleanText.startsWith('{') && !cleanText.startsWith('[')) {
    const jsonMatch = cleanText.match(/(\{[\s\S]*\}|\[[\s\S]*\])/);
    if (jsonMatch?.[1] !== undefined) {
      cleanText = jsonMatch[1];
    }
  }

  try {
    return JSON.parse(cleanText);
  } catch {
    throw new Error(`Failed to parse JSON from LLM response: ${text.substring(0, 200)}`);
  }
}

/**
 * Exponential backoff delay with jitter
 */
function calculateDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponential = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt));
  const jitter = Math.random() * 0.3 * exponential;
  return exponential + jitter;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
