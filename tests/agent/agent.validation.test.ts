import { describe, it, expect } from 'vitest';
import { validateRequestContext } from '@/agent/agent.validation';

describe('validateRequestContext', () => {
  it('trims fields and applies the default result limit', () => {
    const result = validateRequestContext({ query: '  Show my tasks  ', userId: ' user-1 ', sessionId: 'session-1' });

    expect(result).toEqual({
      success: true,
      data: { query: 'Show my tasks', userId: 'user-1', sessionId: 'session-1', maxResults: 10 },
    });
    if (result.success) expect(Object.isFrozen(result.data)).toBe(true);
  });

  it('coerces maxResults and keeps the abort signal', () => {
    const controller = new AbortController();
    const result = validateRequestContext({
      query: 'q',
      userId: 'u',
      sessionId: 's',
      maxResults: '25',
      signal: controller.signal,
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.maxResults).toBe(25);
      expect(result.data.signal).toBe(controller.signal);
    }
  });

  it('rejects a blank query', () => {
    const result = validateRequestContext({ query: '   ', userId: 'u', sessionId: 's' });

    expect(result).toEqual({
      success: false,
      error: [{ path: 'query', message: 'Query is required and cannot be empty' }],
    });
  });

  it('rejects an oversized query and out-of-range limits', () => {
    const result = validateRequestContext({ query: 'x'.repeat(2001), userId: 'u', sessionId: 's', maxResults: 0 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.map((e) => e.path)).toEqual(['query', 'maxResults']);
      expect(result.error[0]?.message).toBe('Query is too long');
    }
  });

  it('names missing identifiers', () => {
    const result = validateRequestContext({ query: 'q' });

    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.map((e) => e.path)).toEqual(['userId', 'sessionId']);
  });

  it('rejects a non-object', () => {
    const result = validateRequestContext('Show my tasks');

    expect(result.success).toBe(false);
    if (!result.success) expect(result.error[0]?.path).toBe('root');
  });
});
