import type { ConversationTurn, Intent } from '@/types/core';
import { logger } from '@/services/logger';
import {
  MAX_HISTORY_RECORDS,
  MAX_SIMILAR_PATTERNS,
  mergeLessons,
  PRUNE_CONFIDENCE_FLOOR,
  type ExecutionRecord,
  type MemoryContext,
  type MemoryEntry,
  type MemoryStore,
} from './MemoryStore';
import { computeConfidence, PATTERN_SIMILARITY_THRESHOLD, patternSimilarity } from './pattern';

interface SessionEntry {
  turns: ConversationTurn[];
  timestamp: number;
}

export interface InMemoryMemoryStoreOptions {
  ttlMinutes?: number;
  maxSessions?: number;
  recentTurns?: number;
  /** Pattern capacity; least recently used entries are evicted beyond it. */
  maxPatterns?: number;
  maxHistory?: number;
  now?: () => number;
}

/** Process-local store. Expiry is checked on access; nothing runs on a timer. */
export class InMemoryMemoryStore implements MemoryStore {
  private sessions = new Map<string, SessionEntry>();
  private patterns = new Map<string, MemoryEntry>();
  private history: ExecutionRecord[] = [];
  private readonly ttl: number;
  private readonly maxSessions: number;
  private readonly recentTurns: number;
  private readonly maxPatterns: number;
  private readonly maxHistory: number;
  private readonly now: () => number;

  constructor(options: InMemoryMemoryStoreOptions = {}) {
    this.ttl = (options.ttlMinutes ?? 30) * 60 * 1000;
    this.maxSessions = options.maxSessions ?? 1000;
    this.recentTurns = options.recentTurns ?? 10;
    this.maxPatterns = options.maxPatterns ?? 500;
    this.maxHistory = options.maxHistory ?? MAX_HISTORY_RECORDS;
    this.now = options.now ?? Date.now;
  }

  private cleanupExpiredSessions(): void {
    const now = this.now();
    let cleaned = 0;
    for (const [sessionId, entry] of this.sessions) {
      if (now - entry.timestamp > this.ttl) {
        this.sessions.delete(sessionId);
        cleaned++;
      }
    }

    // at capacity: drop the oldest 20%
    if (this.sessions.size >= this.maxSessions) {
      const sorted = [...this.sessions.entries()].sort((a, b) => a[1].timestamp - b[1].timestamp);
      const toRemove = Math.max(1, Math.floor(sorted.length * 0.2));
      for (const [sessionId] of sorted.slice(0, toRemove)) {
        this.sessions.delete(sessionId);
        cleaned++;
      }
    }

    if (cleaned > 0) logger.debug('memory:sessions_cleaned', { cleaned });
  }

  private liveSession(sessionId: string): SessionEntry | null {
    const entry = this.sessions.get(sessionId);
    if (!entry) return null;
    if (this.now() - entry.timestamp > this.ttl) {
      this.sessions.delete(sessionId);
      return null;
    }
    return entry;
  }

  private evictLeastRecentlyUsed(): void {
    while (this.patterns.size > this.maxPatterns) {
      let oldest: MemoryEntry | null = null;
      for (const entry of this.patterns.values()) {
        if (!oldest || entry.lastUsed < oldest.lastUsed) oldest = entry;
      }
      if (!oldest) return;
      this.patterns.delete(oldest.pattern);
      logger.debug('memory:pattern_evicted', { pattern: oldest.pattern });
    }
  }

  async getContext(sessionId: string, pattern?: string): Promise<MemoryContext> {
    const session = this.liveSession(sessionId);
    const recentTurns = session ? session.turns.slice(-this.recentTurns) : [];
    if (!pattern) return { recentTurns, patterns: [] };

    const similar = [...this.patterns.values()]
      .map((entry) => ({ entry, score: patternSimilarity(pattern, entry.pattern) }))
      .filter(({ score }) => score > PATTERN_SIMILARITY_THRESHOLD)
      .sort((a, b) => b.score - a.score || b.entry.confidence - a.entry.confidence)
      .slice(0, MAX_SIMILAR_PATTERNS)
      .map(({ entry }) => ({ ...entry, lessons: [...entry.lessons] }));
    return { recentTurns, patterns: similar };
  }

  async getEntry(pattern: string): Promise<MemoryEntry | null> {
    const entry = this.patterns.get(pattern);
    return entry ? { ...entry, lessons: [...entry.lessons] } : null;
  }

  async recordOutcome(
    pattern: string,
    intent: Intent,
    success: boolean,
    lessons: readonly string[] = [],
  ): Promise<MemoryEntry> {
    const current = this.patterns.get(pattern);
    const successCount = (current?.successCount ?? 0) + (success ? 1 : 0);
    const failureCount = (current?.failureCount ?? 0) + (success ? 0 : 1);
    const entry: MemoryEntry = {
      pattern,
      intent,
      successCount,
      failureCount,
      confidence: computeConfidence(successCount, failureCount),
      lastUsed: this.now(),
      lessons: mergeLessons(current?.lessons ?? [], lessons),
    };
    // re-insert so iteration order tracks recency
    this.patterns.delete(pattern);
    this.patterns.set(pattern, entry);
    this.evictLeastRecentlyUsed();
    return { ...entry, lessons: [...entry.lessons] };
  }

  async appendTurn(sessionId: string, turn: ConversationTurn): Promise<void> {
    const existing = this.liveSession(sessionId);
    if (!existing) this.cleanupExpiredSessions();
    const entry = existing ?? { turns: [], timestamp: this.now() };
    entry.turns.push(turn);
    if (entry.turns.length > this.recentTurns) entry.turns.splice(0, entry.turns.length - this.recentTurns);
    entry.timestamp = this.now();
    this.sessions.set(sessionId, entry);
  }

  async archiveExecution(record: ExecutionRecord): Promise<void> {
    this.history.push(record);
    if (this.history.length > this.maxHistory) this.history.splice(0, this.history.length - this.maxHistory);
  }

  async getExecutionHistory(limit: number = this.maxHistory): Promise<ExecutionRecord[]> {
    if (limit <= 0) return [];
    return this.history.slice(-limit).reverse();
  }

  async pruneStale(maxAgeDays: number): Promise<number> {
    const cutoff = this.now() - maxAgeDays * 24 * 60 * 60 * 1000;
    let removed = 0;
    for (const [pattern, entry] of this.patterns) {
      if (entry.lastUsed < cutoff && entry.confidence < PRUNE_CONFIDENCE_FLOOR) {
        this.patterns.delete(pattern);
        removed++;
      }
    }
    if (removed > 0) logger.info('memory:pruned', { removed, maxAgeDays });
    return removed;
  }

  isAvailable(): boolean {
    return true;
  }
}
