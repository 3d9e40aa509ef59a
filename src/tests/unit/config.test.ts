import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../config/index.js';
import { ConfigError } from '../../utils/errors.js';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    expect(loadConfig({})).toEqual({
      llmClassifierModel: 'claude-3-5-haiku-latest',
      llmResponseModel: 'claude-sonnet-4-5',
      classifierTimeoutMs: 8000,
      responseTimeoutMs: 15000,
      sessionIdleMinutes: 240,
      sessionSweepCron: '*/15 * * * *',
      timezone: 'UTC',
      host: '0.0.0.0',
      port: 5000,
    });
  });

  it('should coerce numbers and treat empty strings as unset', () => {
    const config = loadConfig({ ANTHROPIC_API_KEY: 'test-secret', PORT: '8080', CLASSIFIER_TIMEOUT_MS: '2500', TIMEZONE: '' });
    expect(config.anthropicApiKey).toBe('test-secret');
    expect(config.port).toBe(8080);
    expect(config.classifierTimeoutMs).toBe(2500);
    expect(config.timezone).toBe('UTC');
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(ConfigError);
    expect(() => loadConfig({ CLASSIFIER_TIMEOUT_MS: '-5' })).toThrow(/classifierTimeoutMs/);
  });
});
