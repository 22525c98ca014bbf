import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryMemoryStore } from '@/memory/InMemoryMemoryStore';
import type { ExecutionRecord } from '@/memory/MemoryStore';
import { RedisMemoryStore } from '@/memory/RedisMemoryStore';
import { FakeRedis, makeStep } from '../helpers/fakes';

const DAY = 24 * 60 * 60 * 1000;

function record(requestId: string): ExecutionRecord {
  return {
    requestId,
    sessionId: 'session-1',
    query: 'Find emails about the invoice',
    pattern: 'search_mail_single',
    steps: [makeStep({ status: 'succeeded', attempts: 1, result: [] })],
    plan: { order: ['step_1'], waves: [['step_1']], estimatedDurationMs: 1500 },
    outcome: 'yes',
    durationMs: 12,
    timestamp: 1_000,
  };
}

describe('RedisMemoryStore', () => {
  let clock: number;
  let redis: FakeRedis;
  let fallback: InMemoryMemoryStore;
  let store: RedisMemoryStore;

  beforeEach(() => {
    clock = 10_000;
    redis = new FakeRedis();
    fallback = new InMemoryMemoryStore({ now: () => clock });
    store = new RedisMemoryStore(redis, { recentTurns: 2, maxPatterns: 2, maxHistory: 3, ttlMinutes: 30, now: () => clock }, fallback);
  });

  it('stores turns in a capped list with the session TTL', async () => {
    for (const n of [1, 2, 3]) {
      await store.appendTurn('session-1', { query: `q${n}`, answer: `a${n}`, timestamp: n });
    }

    expect(redis.lists.get('memory:turns:session-1')).toHaveLength(2);
    expect(redis.expirations.get('memory:turns:session-1')).toBe(1800);
    const context = await store.getContext('session-1');
    expect(context.recentTurns.map((t) => t.query)).toEqual(['q2', 'q3']);
  });

  it('skips turns that no longer parse', async () => {
    await redis.rpush('memory:turns:session-1', 'not json', JSON.stringify({ query: 'q', answer: 'a', timestamp: 1 }));

    expect((await store.getContext('session-1')).recentTurns).toEqual([{ query: 'q', answer: 'a', timestamp: 1 }]);
  });

  it('records outcomes in a hash and indexes the pattern by last use', async () => {
    await store.recordOutcome('search_mail_single', 'search', true, ['Filter by sender first.']);
    clock += 5;
    const entry = await store.recordOutcome('search_mail_single', 'search', false);

    expect(entry.successCount).toBe(1);
    expect(entry.failureCount).toBe(1);
    expect(entry.confidence).toBeCloseTo(0.55, 10);
    expect(entry.lessons).toEqual(['Filter by sender first.']);
    expect(redis.zsets.get('memory:patterns')?.get('search_mail_single')).toBe(10_005);
    expect(await store.getEntry('search_mail_single')).toEqual(entry);
  });

  it('returns null for a pattern it never saw', async () => {
    expect(await store.getEntry('delete_single')).toBeNull();
  });

  it('falls back to defaults for unreadable hash fields', async () => {
    await redis.hset('memory:pattern:search_tasks_single', { intent: 'bogus', successCount: 'x', lessons: '{' });

    expect(await store.getEntry('search_tasks_single')).toMatchObject({
      intent: 'search',
      successCount: 0,
      failureCount: 0,
      lessons: [],
    });
  });

  it('returns similar stored patterns', async () => {
    await store.recordOutcome('search_mail_single', 'search', true);
    clock += 1;
    await store.recordOutcome('delete_calendar_single', 'delete', true);

    const context = await store.getContext('session-1', 'search_mail_multi');
    expect(context.patterns.map((p) => p.pattern)).toEqual(['search_mail_single']);
  });

  it('evicts the least recently used pattern beyond capacity', async () => {
    for (const pattern of ['a_single', 'b_single', 'c_single']) {
      await store.recordOutcome(pattern, 'search', true);
      clock += 1;
    }

    expect(redis.zsets.get('memory:patterns')?.has('a_single')).toBe(false);
    expect(redis.hashes.has('memory:pattern:a_single')).toBe(false);
    expect(await store.getEntry('c_single')).not.toBeNull();
  });

  it('archives executions newest first and caps the list', async () => {
    for (const id of ['r1', 'r2', 'r3', 'r4']) await store.archiveExecution(record(id));

    const history = await store.getExecutionHistory();
    expect(history.map((r) => r.requestId)).toEqual(['r4', 'r3', 'r2']);
    expect(history[0]?.steps[0]?.status).toBe('succeeded');
    expect((await store.getExecutionHistory(2)).map((r) => r.requestId)).toEqual(['r4', 'r3']);
  });

  it('prunes old low-confidence patterns', async () => {
    for (let i = 0; i < 3; i++) await store.recordOutcome('delete_tasks_single', 'delete', false);
    await store.recordOutcome('search_tasks_single', 'search', true);
    clock += 8 * DAY;

    expect(await store.pruneStale(7)).toBe(1);
    expect(await store.getEntry('delete_tasks_single')).toBeNull();
    expect(await store.getEntry('search_tasks_single')).not.toBeNull();
  });

  describe('when Redis fails', () => {
    it('serves the call from the fallback store', async () => {
      redis.failWith = new Error('connection reset');

      const entry = await store.recordOutcome('search_mail_single', 'search', true);

      expect(entry.successCount).toBe(1);
      expect(await fallback.getEntry('search_mail_single')).toEqual(entry);
      expect(redis.hashes.size).toBe(0);
    });

    it('keeps turns in the fallback store', async () => {
      redis.failWith = new Error('connection reset');
      await store.appendTurn('session-1', { query: 'q', answer: 'a', timestamp: 1 });

      expect((await store.getContext('session-1')).recentTurns).toHaveLength(1);
    });
  });

  it('uses the fallback store when no Redis client is configured', async () => {
    const offline = new RedisMemoryStore(null, {}, fallback);

    expect(offline.isAvailable()).toBe(false);
    await offline.appendTurn('session-1', { query: 'q', answer: 'a', timestamp: 1 });
    expect((await fallback.getContext('session-1')).recentTurns).toHaveLength(1);
  });
});
