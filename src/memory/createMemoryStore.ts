import type { EngineConfig } from '@/config/app.config';
import { logger } from '@/services/logger';
import { InMemoryMemoryStore } from './InMemoryMemoryStore';
import type { MemoryStore } from './MemoryStore';
import { RedisMemoryStore } from './RedisMemoryStore';

/** Redis when REDIS_URL is configured, otherwise process-local memory. */
export async function createMemoryStore(config: Pick<EngineConfig, 'memory'>): Promise<MemoryStore> {
  const { redisUrl, sessionTtlMinutes, recentTurns, maxPatterns } = config.memory;
  const options = { ttlMinutes: sessionTtlMinutes, recentTurns, maxPatterns };
  if (!redisUrl) {
    logger.info('memory:store', { backend: 'in-memory' });
    return new InMemoryMemoryStore(options);
  }
  const store = await RedisMemoryStore.connect(redisUrl, options);
  logger.info('memory:store', { backend: store.isAvailable() ? 'redis' : 'in-memory-fallback' });
  return store;
}
