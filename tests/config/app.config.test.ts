import { describe, it, expect } from 'vitest';
import { ConfigValidationError, loadEngineConfig, resolveEngineConfig } from '@/config/app.config';

describe('loadEngineConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadEngineConfig({});

    expect(config.autonomy).toEqual({ highThreshold: 0.7, mediumThreshold: 0.4, mediumAction: 'notice', memoryWeight: 0.3 });
    expect(config.retry).toEqual({ maxAttempts: 3, initialDelayMs: 200, maxDelayMs: 5000 });
    expect(config.toolTimeoutMs).toBe(15000);
    expect(config.maxParallelSteps).toBe(4);
    expect(config.memory).toEqual({ recentTurns: 10, maxPatterns: 500, sessionTtlMinutes: 30 });
    expect(config.llm).toEqual({ smallModel: 'gpt-4o-mini', mainModel: 'gpt-4.1-mini' });
  });

  it('reads and coerces environment values', () => {
    const config = loadEngineConfig({
      AUTONOMY_MEDIUM_ACTION: 'confirm',
      AUTONOMY_HIGH_THRESHOLD: '0.8',
      TOOL_MAX_ATTEMPTS: '5',
      REDIS_URL: 'redis://localhost:6379',
      OPENAI_API_KEY: 'test-secret',
    });

    expect(config.autonomy.mediumAction).toBe('confirm');
    expect(config.autonomy.highThreshold).toBe(0.8);
    expect(config.retry.maxAttempts).toBe(5);
    expect(config.memory.redisUrl).toBe('redis://localhost:6379');
    expect(config.llm.apiKey).toBe('test-secret');
  });

  it('treats blank values as unset', () => {
    expect(loadEngineConfig({ OPENAI_API_KEY: '  ', TOOL_TIMEOUT_MS: '' }).toolTimeoutMs).toBe(15000);
  });

  it('reports every invalid value with its variable name', () => {
    try {
      loadEngineConfig({ TOOL_TIMEOUT_MS: 'soon', AUTONOMY_MEDIUM_ACTION: 'ask' });
      expect.unreachable('config should not load');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigValidationError);
      if (err instanceof ConfigValidationError) {
        expect(err.code).toBe('INVALID_CONFIG');
        expect(err.issues.map((i) => i.path).sort()).toEqual(['AUTONOMY_MEDIUM_ACTION', 'TOOL_TIMEOUT_MS']);
      }
    }
  });

  it('requires the high threshold above the medium one', () => {
    expect(() => loadEngineConfig({ AUTONOMY_HIGH_THRESHOLD: '0.3' })).toThrow(
      'AUTONOMY_HIGH_THRESHOLD: AUTONOMY_HIGH_THRESHOLD must be greater than AUTONOMY_MEDIUM_THRESHOLD',
    );
  });
});

describe('resolveEngineConfig', () => {
  const base = loadEngineConfig({});

  it('merges overrides section by section', () => {
    const config = resolveEngineConfig({ autonomy: { mediumAction: 'confirm' }, maxParallelSteps: 1 }, base);

    expect(config.autonomy).toEqual({ ...base.autonomy, mediumAction: 'confirm' });
    expect(config.maxParallelSteps).toBe(1);
    expect(config.retry).toEqual(base.retry);
  });

  it('rejects thresholds in the wrong order', () => {
    expect(() => resolveEngineConfig({ autonomy: { highThreshold: 0.4 } }, base)).toThrow(ConfigValidationError);
  });
});
