/**
 * Tests for configuration module
 *
 * @module config/index.test
 */

import { describe, it, expect } from '@jest/globals';
import * as os from 'node:os';
import * as path from 'node:path';
import { hasApiKey, parseEnv, requireApiKey } from './index.js';

describe('config', () => {
  describe('parseEnv', () => {
    it('should apply defaults to an empty environment', () => {
      const config = parseEnv({});

      expect(config.nodeEnv).toBe('development');
      expect(config.isDevelopment).toBe(true);
      expect(config.dataDir).toBe(path.join(os.homedir(), '.stagecraft'));
      expect(config.model).toBe('gpt-4o-mini');
      expect(config.stageTimeoutMs).toBe(120_000);
      expect(config.maxStageAttempts).toBe(1);
      expect(config.reincorporation).toBe('reject');
      expect(config.safetyCheckpoints).toBe(true);
      expect(config.apiKeys.openai).toBeUndefined();
    });

    it('should use custom data directory when specified', () => {
      expect(parseEnv({ STAGECRAFT_DATA_DIR: '/custom/path' }).dataDir).toBe('/custom/path');
    });

    it('should coerce numeric and boolean settings', () => {
      const config = parseEnv({
        STAGECRAFT_STAGE_TIMEOUT_MS: '5000',
        STAGECRAFT_MAX_STAGE_ATTEMPTS: '3',
        STAGECRAFT_SAFETY_CHECKPOINTS: '0',
        STAGECRAFT_REINCORPORATION: 'skip',
        NODE_ENV: 'test',
      });

      expect(config.stageTimeoutMs).toBe(5000);
      expect(config.maxStageAttempts).toBe(3);
      expect(config.safetyCheckpoints).toBe(false);
      expect(config.reincorporation).toBe('skip');
      expect(config.isTest).toBe(true);
    });

    it('should list every invalid variable', () => {
      expect(() =>
        parseEnv({ STAGECRAFT_MAX_STAGE_ATTEMPTS: '0', STAGECRAFT_REINCORPORATION: 'always' })
      ).toThrow(/STAGECRAFT_MAX_STAGE_ATTEMPTS[\s\S]*STAGECRAFT_REINCORPORATION/);
    });

    it('should reject unknown boolean spellings', () => {
      expect(() => parseEnv({ STAGECRAFT_SAFETY_CHECKPOINTS: 'yes' })).toThrow(
        /Invalid environment variables/
      );
    });
  });

  describe('hasApiKey', () => {
    it('should reflect whether the key is set', () => {
      expect(hasApiKey('openai', parseEnv({ OPENAI_API_KEY: 'test-secret' }))).toBe(true);
      expect(hasApiKey('openai', parseEnv({}))).toBe(false);
    });
  });

  describe('requireApiKey', () => {
    it('should throw for empty keys', () => {
      expect(() => requireApiKey('openai', parseEnv({ OPENAI_API_KEY: '' }))).toThrow(
        /Missing required API key: OPENAI_API_KEY/
      );
    });

    it('should return key when present in config', () => {
      expect(requireApiKey('openai', parseEnv({ OPENAI_API_KEY: 'test-secret' }))).toBe(
        'test-secret'
      );
    });
  });
});
