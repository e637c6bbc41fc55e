/**
 * Configuration Module
 *
 * Loads and validates environment variables for stagecraft.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { resolveDataDir } from '../storage/paths.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform((value) => value === 'true' || value === '1');

// Environment schema with optional values and defaults
const envSchema = z.object({
  // API key (required only by the default LLM-backed stages)
  OPENAI_API_KEY: z.string().optional(),

  // Data directory
  STAGECRAFT_DATA_DIR: z.string().optional(),

  // Model used by the default stages
  STAGECRAFT_MODEL: z.string().min(1).default('gpt-4o-mini'),

  // Stage execution
  STAGECRAFT_STAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  STAGECRAFT_MAX_STAGE_ATTEMPTS: z.coerce.number().int().min(1).default(1),

  // Feedback and rollback policy
  STAGECRAFT_REINCORPORATION: z.enum(['reject', 'skip']).default('reject'),
  STAGECRAFT_SAFETY_CHECKPOINTS: booleanFlag,

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

/**
 * Build the configuration object from an environment.
 *
 * @throws Error listing every invalid variable
 */
export function parseEnv(source: NodeJS.ProcessEnv) {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    const issues = parseResult.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid environment variables:\n${issues}`);
  }

  const env = parseResult.data;

  return {
    // Environment
    nodeEnv: env.NODE_ENV,
    isProduction: env.NODE_ENV === 'production',
    isDevelopment: env.NODE_ENV === 'development',
    isTest: env.NODE_ENV === 'test',

    // API Keys
    apiKeys: {
      openai: env.OPENAI_API_KEY,
    },

    // Data directory
    dataDir: resolveDataDir(env.STAGECRAFT_DATA_DIR),

    // Default stages
    model: env.STAGECRAFT_MODEL,
    stageTimeoutMs: env.STAGECRAFT_STAGE_TIMEOUT_MS,
    maxStageAttempts: env.STAGECRAFT_MAX_STAGE_ATTEMPTS,

    // Policies
    reincorporation: env.STAGECRAFT_REINCORPORATION,
    safetyCheckpoints: env.STAGECRAFT_SAFETY_CHECKPOINTS,
  } as const;
}

export type Config = ReturnType<typeof parseEnv>;
export type ApiKeyName = keyof Config['apiKeys'];

function loadConfig(): Config {
  try {
    return Object.freeze(parseEnv(process.env));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

/**
 * Application configuration singleton
 */
export const config: Config = loadConfig();

/**
 * Check if a specific API is configured
 */
export function hasApiKey(api: ApiKeyName, source: Config = config): boolean {
  return !!source.apiKeys[api];
}

/**
 * Get an API key or throw if not configured
 */
export function requireApiKey(api: ApiKeyName, source: Config = config): string {
  const key = source.apiKeys[api];
  if (!key) {
    throw new Error(
      `Missing required API key: ${api.toUpperCase()}_API_KEY. ` +
        `Please set it in your .env file.`
    );
  }
  return key;
}
