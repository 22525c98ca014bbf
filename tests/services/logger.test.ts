import { afterEach, describe, it, expect } from 'vitest';
import { configureLogger, logger } from '@/services/logger';

describe('configureLogger', () => {
  const { minLevel, type } = logger.settings;

  afterEach(() => {
    logger.settings.minLevel = minLevel;
    logger.settings.type = type;
  });

  it('applies the configured level and output type', () => {
    configureLogger({ level: 'warn', type: 'json' });

    expect(logger.settings.minLevel).toBe(4);
    expect(logger.settings.type).toBe('json');
  });

  it('maps the lowest level to zero', () => {
    configureLogger({ level: 'silly', type: 'hidden' });

    expect(logger.settings.minLevel).toBe(0);
  });
});
