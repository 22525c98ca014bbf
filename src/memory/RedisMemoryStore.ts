// src/memory/RedisMemoryStore.ts

import Redis from 'ioredis';
import { z } from 'zod';
import { logger } from '@/services/logger';
import { stepActionSchema } from '@/services/intent-patterns';
import type { ConversationTurn, Intent } from '@/types/core';
import { errorMessage } from '@/utils/errors';
import { InMemoryMemoryStore } from './InMemoryMemoryStore';
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

/** The Redis commands this store issues. `ioredisCommands` adapts an ioredis client. */
export interface RedisCommands {
  rpush(key: string, ...values: string[]): Promise<unknown>;
  lpush(key: string, ...values: string[]): Promise<unknown>;
  ltrim(key: string, start: number, stop: number): Promise<unknown>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  expire(key: string, seconds: number): Promise<unknown>;
  hincrby(key: string, field: string, increment: number): Promise<number>;
  hset(key: string, values: Record<string, string | number>): Promise<unknown>;
  hgetall(key: string): Promise<Record<string, string>>;
  zadd(key: string, score: number, member: string): Promise<unknown>;
  zrange(key: string, start: number, stop: number): Promise<string[]>;
  zrangebyscore(key: string, min: number | string, max: number | string): Promise<string[]>;
  zcard(key: string): Promise<number>;
  zrem(key: string, ...members: string[]): Promise<unknown>;
  del(...keys: string[]): Promise<unknown>;
}

export function ioredisCommands(client: Redis): RedisCommands {
  return {
    rpush: (key, ...values) => client.rpush(key, ...values),
    lpush: (key, ...values) => client.lpush(key, ...values),
    ltrim: (key, start, stop) => client.ltrim(key, start, stop),
    lrange: (key, start, stop) => client.lrange(key, start, stop),
    expire: (key, seconds) => client.expire(key, seconds),
    hincrby: (key, field, increment) => client.hincrby(key, field, increment),
    hset: (key, values) => client.hset(key, values),
    hgetall: (key) => client.hgetall(key),
    zadd: (key, score, member) => client.zadd(key, score, member),
    zrange: (key, start, stop) => client.zrange(key, start, stop),
    zrangebyscore: (key, min, max) => client.zrangebyscore(key, min, max),
    zcard: (key) => client.zcard(key),
    zrem: (key, ...members) => client.zrem(key, ...members),
    del: (...keys) => client.del(...keys),
  };
}

const intentSchema = z.enum(['search', 'create', 'update', 'delete', 'analyze', 'clarification_needed']);

const entryHashSchema = z.object({
  intent: intentSchema.catch('search'),
  successCount: z.coerce.number().int().min(0).catch(0),
  failureCount: z.coerce.number().int().min(0).catch(0),
  lastUsed: z.coerce.number().catch(0),
  lessons: z.string().catch('[]'),
});

const lessonsSchema = z.array(z.string());

const turnSchema = z.object({
  query: z.string(),
  answer: z.string(),
  timestamp: z.number(),
});

const stepSchema = z.object({
  id: z.string(),
  toolName: z.string(),
  action: stepActionSchema,
  subQuery: z.string(),
  dependencies: z.array(z.string()),
  status: z.enum(['pending', 'running', 'succeeded', 'failed', 'skipped']),
  result: z.unknown(),
  error: z.string().optional(),
  skipReason: z.string().optional(),
  modifiedByRefinement: z.boolean().optional(),
  insertedBy: z.string().optional(),
  attempts: z.number(),
});

const recordSchema = z.object({
  requestId: z.string(),
  sessionId: z.string(),
  query: z.string(),
  pattern: z.string(),
  steps: z.array(stepSchema),
  plan: z
    .object({
      order: z.array(z.string()),
      waves: z.array(z.array(z.string())),
      estimatedDurationMs: z.number(),
      proposedOrder: z.array(z.string()).optional(),
    })
    .nullable(),
  outcome: z.enum(['yes', 'no', 'partial', 'clarification', 'cancelled']),
  durationMs: z.number(),
  timestamp: z.number(),
});

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

function parseLessons(raw: string | undefined): string[] {
  const parsed = lessonsSchema.safeParse(parseJson(raw ?? '[]'));
  return parsed.success ? parsed.data : [];
}

export interface RedisMemoryStoreOptions {
  ttlMinutes?: number;
  recentTurns?: number;
  maxPatterns?: number;
  maxHistory?: number;
  keyPrefix?: string;
  now?: () => number;
}

/**
 * Redis-backed memory store. Survives restarts and is shared between processes.
 * While Redis is unreachable every call goes to an in-process fallback store.
 */
export class RedisMemoryStore implements MemoryStore {
  private client: Redis | null = null;
  private connected: boolean;
  private readonly ttlSeconds: number;
  private readonly recentTurns: number;
  private readonly maxPatterns: number;
  private readonly maxHistory: number;
  private readonly keyPrefix: string;
  private readonly now: () => number;
  private readonly fallback: MemoryStore;

  constructor(
    private readonly commands: RedisCommands | null,
    options: RedisMemoryStoreOptions = {},
    fallback?: MemoryStore,
  ) {
    this.connected = commands !== null;
    this.ttlSeconds = (options.ttlMinutes ?? 30) * 60;
    this.recentTurns = options.recentTurns ?? 10;
    this.maxPatterns = options.maxPatterns ?? 500;
    this.maxHistory = options.maxHistory ?? MAX_HISTORY_RECORDS;
    this.keyPrefix = options.keyPrefix ?? 'memory:';
    this.now = options.now ?? Date.now;
    this.fallback = fallback ?? new InMemoryMemoryStore(options);
  }

  /** Connects with a bounded retry strategy; falls back to in-process memory if Redis never answers. */
  static async connect(redisUrl: string, options: RedisMemoryStoreOptions = {}): Promise<RedisMemoryStore> {
    const client = new Redis(redisUrl, {
      maxRetriesPerRequest: 3,
      lazyConnect: true,
      retryStrategy(times) {
        if (times > 3) return null;
        return Math.min(times * 200, 2000);
      },
    });
    const store = new RedisMemoryStore(ioredisCommands(client), options);
    store.connected = false;

    client.on('error', (err: Error) => {
      logger.warn('memory:redis_error', { error: err.message });
      store.connected = false;
    });
    client.on('ready', () => {
      store.connected = true;
    });
    client.on('close', () => {
      store.connected = false;
    });

    try {
      await client.connect();
      await client.ping();
      store.client = client;
      store.connected = true;
      logger.info('memory:redis_connected');
    } catch (err) {
      logger.warn('memory:redis_connect_failed', { error: errorMessage(err), fallback: 'in-memory' });
      client.disconnect();
    }
    return store;
  }

  private turnsKey(sessionId: string): string {
    return `${this.keyPrefix}turns:${sessionId}`;
  }

  private patternKey(pattern: string): string {
    return `${this.keyPrefix}pattern:${pattern}`;
  }

  private get indexKey(): string {
    return `${this.keyPrefix}patterns`;
  }

  private get historyKey(): string {
    return `${this.keyPrefix}history`;
  }

  isAvailable(): boolean {
    return this.connected && this.commands !== null;
  }

  private async run<T>(
    operation: string,
    viaRedis: (redis: RedisCommands) => Promise<T>,
    viaFallback: () => Promise<T>,
  ): Promise<T> {
    const redis = this.commands;
    if (!redis || !this.isAvailable()) return viaFallback();
    try {
      return await viaRedis(redis);
    } catch (err) {
      logger.warn('memory:redis_command_failed', { operation, error: errorMessage(err) });
      return viaFallback();
    }
  }

  private async readEntry(redis: RedisCommands, pattern: string): Promise<MemoryEntry | null> {
    const hash = await redis.hgetall(this.patternKey(pattern));
    if (Object.keys(hash).length === 0) return null;
    const fields = entryHashSchema.parse(hash);
    return {
      pattern,
      intent: fields.intent,
      successCount: fields.successCount,
      failureCount: fields.failureCount,
      confidence: computeConfidence(fields.successCount, fields.failureCount),
      lastUsed: fields.lastUsed,
      lessons: parseLessons(fields.lessons),
    };
  }

  async getContext(sessionId: string, pattern?: string): Promise<MemoryContext> {
    return this.run(
      'getContext',
      async (redis) => {
        const rawTurns = await redis.lrange(this.turnsKey(sessionId), -this.recentTurns, -1);
        const recentTurns: ConversationTurn[] = [];
        for (const raw of rawTurns) {
          const turn = turnSchema.safeParse(parseJson(raw));
          if (turn.success) recentTurns.push(turn.data);
        }
        if (!pattern) return { recentTurns, patterns: [] };

        const members = await redis.zrange(this.indexKey, 0, -1);
        const ranked = members
          .map((member) => ({ member, score: patternSimilarity(pattern, member) }))
          .filter(({ score }) => score > PATTERN_SIMILARITY_THRESHOLD)
          .sort((a, b) => b.score - a.score)
          .slice(0, MAX_SIMILAR_PATTERNS);

        const patterns: MemoryEntry[] = [];
        for (const { member } of ranked) {
          const entry = await this.readEntry(redis, member);
          if (entry) patterns.push(entry);
        }
        return { recentTurns, patterns };
      },
      () => this.fallback.getContext(sessionId, pattern),
    );
  }

  async getEntry(pattern: string): Promise<MemoryEntry | null> {
    return this.run(
      'getEntry',
      (redis) => this.readEntry(redis, pattern),
      () => this.fallback.getEntry(pattern),
    );
  }

  async recordOutcome(
    pattern: string,
    intent: Intent,
    success: boolean,
    lessons: readonly string[] = [],
  ): Promise<MemoryEntry> {
    return this.run(
      'recordOutcome',
      async (redis) => {
        const key = this.patternKey(pattern);
        // HINCRBY by 0 reads the other counter atomically
        const successCount = await redis.hincrby(key, 'successCount', success ? 1 : 0);
        const failureCount = await redis.hincrby(key, 'failureCount', success ? 0 : 1);
        const existing = await redis.hgetall(key);
        const merged = mergeLessons(parseLessons(existing.lessons), lessons);
        const confidence = computeConfidence(successCount, failureCount);
        const lastUsed = this.now();

        await redis.hset(key, { intent, confidence, lastUsed, lessons: JSON.stringify(merged) });
        await redis.zadd(this.indexKey, lastUsed, pattern);
        await this.evictLeastRecentlyUsed(redis);

        return { pattern, intent, successCount, failureCount, confidence, lastUsed, lessons: merged };
      },
      () => this.fallback.recordOutcome(pattern, intent, success, lessons),
    );
  }

  private async evictLeastRecentlyUsed(redis: RedisCommands): Promise<void> {
    const size = await redis.zcard(this.indexKey);
    const excess = size - this.maxPatterns;
    if (excess <= 0) return;
    const victims = await redis.zrange(this.indexKey, 0, excess - 1);
    if (victims.length === 0) return;
    await redis.del(...victims.map((p) => this.patternKey(p)));
    await redis.zrem(this.indexKey, ...victims);
    logger.debug('memory:pattern_evicted', { patterns: victims });
  }

  async appendTurn(sessionId: string, turn: ConversationTurn): Promise<void> {
    return this.run(
      'appendTurn',
      async (redis) => {
        const key = this.turnsKey(sessionId);
        await redis.rpush(key, JSON.stringify(turn));
        await redis.ltrim(key, -this.recentTurns, -1);
        await redis.expire(key, this.ttlSeconds);
      },
      () => this.fallback.appendTurn(sessionId, turn),
    );
  }

  async archiveExecution(record: ExecutionRecord): Promise<void> {
    return this.run(
      'archiveExecution',
      async (redis) => {
        await redis.lpush(this.historyKey, JSON.stringify(record));
        await redis.ltrim(this.historyKey, 0, this.maxHistory - 1);
      },
      () => this.fallback.archiveExecution(record),
    );
  }

  async getExecutionHistory(limit: number = this.maxHistory): Promise<ExecutionRecord[]> {
    if (limit <= 0) return [];
    return this.run(
      'getExecutionHistory',
      async (redis) => {
        const rows = await redis.lrange(this.historyKey, 0, limit - 1);
        const records: ExecutionRecord[] = [];
        for (const row of rows) {
          const parsed = recordSchema.safeParse(parseJson(row));
          if (parsed.success) records.push(parsed.data);
        }
        return records;
      },
      () => this.fallback.getExecutionHistory(limit),
    );
  }

  async pruneStale(maxAgeDays: number): Promise<number> {
    return this.run(
      'pruneStale',
      async (redis) => {
        const cutoff = this.now() - maxAgeDays * 24 * 60 * 60 * 1000;
        const candidates = await redis.zrangebyscore(this.indexKey, '-inf', `(${cutoff}`);
        let removed = 0;
        for (const pattern of candidates) {
          const entry = await this.readEntry(redis, pattern);
          if (entry && entry.confidence >= PRUNE_CONFIDENCE_FLOOR) continue;
          await redis.del(this.patternKey(pattern));
          await redis.zrem(this.indexKey, pattern);
          removed++;
        }
        if (removed > 0) logger.info('memory:pruned', { removed, maxAgeDays });
        return removed;
      },
      () => this.fallback.pruneStale(maxAgeDays),
    );
  }

  async destroy(): Promise<void> {
    if (this.client) {
      await this.client.quit();
      this.client = null;
      this.connected = false;
    }
  }
}
