import type { ConversationTurn, Intent } from '@/types/core';
import type { ExecutionPlan, Step } from '@/types/planning';

/** Long-term statistics for one query pattern. */
export interface MemoryEntry {
  pattern: string;
  intent: Intent;
  successCount: number;
  failureCount: number;
  confidence: number;
  lastUsed: number;
  /** Most recent distinct lessons, newest last. */
  lessons: string[];
}

export interface MemoryContext {
  recentTurns: ConversationTurn[];
  /** Stored patterns similar to the requested one, most similar first. */
  patterns: MemoryEntry[];
}

/** Archived request: the step set and plan survive the request that produced them. */
export interface ExecutionRecord {
  requestId: string;
  sessionId: string;
  query: string;
  pattern: string;
  steps: Step[];
  plan: ExecutionPlan | null;
  outcome: 'yes' | 'no' | 'partial' | 'clarification' | 'cancelled';
  durationMs: number;
  timestamp: number;
}

/**
 * The only state shared across requests. Appends and confidence recomputes may
 * interleave between requests; last writer wins on the derived confidence.
 */
export interface MemoryStore {
  getContext(sessionId: string, pattern?: string): Promise<MemoryContext>;
  getEntry(pattern: string): Promise<MemoryEntry | null>;
  recordOutcome(pattern: string, intent: Intent, success: boolean, lessons?: readonly string[]): Promise<MemoryEntry>;
  appendTurn(sessionId: string, turn: ConversationTurn): Promise<void>;
  archiveExecution(record: ExecutionRecord): Promise<void>;
  /** Newest first. */
  getExecutionHistory(limit?: number): Promise<ExecutionRecord[]>;
  /** Drops patterns unused for `maxAgeDays` whose confidence fell below the prune floor. Returns how many. */
  pruneStale(maxAgeDays: number): Promise<number>;
  isAvailable(): boolean;
}

export const MAX_LESSONS_PER_PATTERN = 5;
export const MAX_SIMILAR_PATTERNS = 5;
export const MAX_HISTORY_RECORDS = 500;
/** Only patterns below this confidence are eligible for pruning. */
export const PRUNE_CONFIDENCE_FLOOR = 0.3;

export function mergeLessons(existing: readonly string[], incoming: readonly string[] = []): string[] {
  const merged = [...existing];
  for (const lesson of incoming) {
    const trimmed = lesson.trim();
    if (!trimmed) continue;
    const at = merged.indexOf(trimmed);
    if (at !== -1) merged.splice(at, 1);
    merged.push(trimmed);
  }
  return merged.slice(-MAX_LESSONS_PER_PATTERN);
}
