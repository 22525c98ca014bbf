import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryMemoryStore } from '@/memory/InMemoryMemoryStore';
import type { ExecutionRecord } from '@/memory/MemoryStore';

const MINUTE = 60 * 1000;
const DAY = 24 * 60 * MINUTE;

function record(requestId: string): ExecutionRecord {
  return {
    requestId,
    sessionId: 'session-1',
    query: 'Show my tasks',
    pattern: 'search_tasks_single',
    steps: [],
    plan: null,
    outcome: 'yes',
    durationMs: 5,
    timestamp: 0,
  };
}

describe('InMemoryMemoryStore', () => {
  let clock: number;
  let store: InMemoryMemoryStore;

  beforeEach(() => {
    clock = 1_000;
    store = new InMemoryMemoryStore({ ttlMinutes: 30, recentTurns: 2, maxPatterns: 2, maxHistory: 3, now: () => clock });
  });

  describe('conversation turns', () => {
    it('keeps only the most recent turns', async () => {
      for (const n of [1, 2, 3]) {
        await store.appendTurn('session-1', { query: `q${n}`, answer: `a${n}`, timestamp: n });
      }

      const context = await store.getContext('session-1');
      expect(context.recentTurns.map((t) => t.query)).toEqual(['q2', 'q3']);
      expect(context.patterns).toEqual([]);
    });

    it('forgets a session after its TTL', async () => {
      await store.appendTurn('session-1', { query: 'q', answer: 'a', timestamp: 1 });
      clock += 31 * MINUTE;

      expect((await store.getContext('session-1')).recentTurns).toEqual([]);
    });

    it('keeps sessions apart', async () => {
      await store.appendTurn('session-1', { query: 'q', answer: 'a', timestamp: 1 });

      expect((await store.getContext('session-2')).recentTurns).toEqual([]);
    });
  });

  describe('pattern statistics', () => {
    it('counts outcomes and recomputes confidence', async () => {
      await store.recordOutcome('search_mail_single', 'search', true);
      const entry = await store.recordOutcome('search_mail_single', 'search', true, ['Narrow the search by sender.']);

      expect(entry.successCount).toBe(2);
      expect(entry.failureCount).toBe(0);
      expect(entry.confidence).toBeCloseTo(0.775, 10);
      expect(entry.lessons).toEqual(['Narrow the search by sender.']);
      expect(await store.getEntry('search_mail_single')).toEqual(entry);
    });

    it('returns null for an unknown pattern', async () => {
      expect(await store.getEntry('delete_single')).toBeNull();
    });

    it('hands out copies', async () => {
      const entry = await store.recordOutcome('search_mail_single', 'search', false, ['x']);
      entry.lessons.push('tampered');

      expect((await store.getEntry('search_mail_single'))?.lessons).toEqual(['x']);
    });

    it('returns similar patterns most similar first', async () => {
      await store.recordOutcome('search_mail_single', 'search', true);
      await store.recordOutcome('search_mail_multi', 'search', true);

      const context = await store.getContext('session-1', 'search_mail_multi');
      expect(context.patterns.map((p) => p.pattern)).toEqual(['search_mail_multi', 'search_mail_single']);
    });

    it('leaves out patterns that share too little', async () => {
      await store.recordOutcome('delete_calendar_single', 'delete', true);

      expect((await store.getContext('session-1', 'search_mail_multi')).patterns).toEqual([]);
    });

    it('evicts the least recently used pattern beyond capacity', async () => {
      await store.recordOutcome('a_single', 'search', true);
      clock += 1;
      await store.recordOutcome('b_single', 'search', true);
      clock += 1;
      await store.recordOutcome('a_single', 'search', true);
      clock += 1;
      await store.recordOutcome('c_single', 'search', true);

      expect(await store.getEntry('b_single')).toBeNull();
      expect(await store.getEntry('a_single')).not.toBeNull();
      expect(await store.getEntry('c_single')).not.toBeNull();
    });
  });

  describe('pruneStale', () => {
    it('drops old low-confidence patterns only', async () => {
      for (let i = 0; i < 3; i++) await store.recordOutcome('delete_tasks_single', 'delete', false);
      await store.recordOutcome('search_tasks_single', 'search', true);
      clock += 8 * DAY;

      expect(await store.pruneStale(7)).toBe(1);
      expect(await store.getEntry('delete_tasks_single')).toBeNull();
      expect(await store.getEntry('search_tasks_single')).not.toBeNull();
    });

    it('keeps recently used patterns', async () => {
      for (let i = 0; i < 3; i++) await store.recordOutcome('delete_tasks_single', 'delete', false);

      expect(await store.pruneStale(7)).toBe(0);
    });
  });

  describe('execution history', () => {
    it('returns records newest first and caps the archive', async () => {
      for (const id of ['r1', 'r2', 'r3', 'r4']) await store.archiveExecution(record(id));

      expect((await store.getExecutionHistory()).map((r) => r.requestId)).toEqual(['r4', 'r3', 'r2']);
      expect((await store.getExecutionHistory(1)).map((r) => r.requestId)).toEqual(['r4']);
      expect(await store.getExecutionHistory(0)).toEqual([]);
    });
  });

  it('is always available', () => {
    expect(store.isAvailable()).toBe(true);
  });
});
