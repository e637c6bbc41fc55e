/**
 * Tests for the chat client helpers
 */

import { describe, it, expect } from '@jest/globals';
import { extractJson, isRetryableStatus } from './llm-client.js';

describe('extractJson', () => {
  it('parses raw JSON', () => {
    expect(extractJson('  {"files": []} ')).toEqual({ files: [] });
  });

  it('unwraps markdown code blocks', () => {
    const text = 'Here is the plan:\n```json\n{"steps": ["a", "b"]}\n```\nDone.';
    expect(extractJson(text)).toEqual({ steps: ['a', 'b'] });
  });

  it('finds JSON embedded in prose', () => {
    expect(extractJson('The result is {"approved": true} as requested')).toEqual({
      approved: true,
    });
  });

  it('throws with the start of the response when nothing parses', () => {
    expect(() => extractJson('no json here')).toThrow(
      'Failed to parse JSON from LLM response: no json here'
    );
  });
});

describe('isRetryableStatus', () => {
  it('retries rate limits and server errors only', () => {
    expect([429, 500, 502, 503, 504].every(isRetryableStatus)).toBe(true);
    expect([400, 401, 404, 499].some(isRetryableStatus)).toBe(false);
  });
});
