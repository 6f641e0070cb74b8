// Picks the session store backend, falling back to memory
import { Redis } from 'ioredis';
import type { AppConfig } from '@/config/app.config';
import { InMemorySessionStore } from '@/memory/InMemorySessionStore';
import { RedisSessionStore, type SessionRedisClient } from '@/memory/RedisSessionStore';
import type { SessionContextStore } from '@/memory/SessionStore';
import { logger } from '@/services/logger';

export type RedisClientFactory = (url: string) => SessionRedisClient;

function createRedisClient(url: string): SessionRedisClient {
  return new Redis(url, {
    retryStrategy: (times) => Math.min(times * 50, 30_000),
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
    lazyConnect: true,
  });
}

export async function createSessionStore(
  config: AppConfig['sessions'],
  createClient: RedisClientFactory = createRedisClient,
): Promise<SessionContextStore> {
  if (config.store === 'memory') {
    return new InMemorySessionStore(config.ttlMinutes, config.maxEntries);
  }

  const client = createClient(config.redisUrl);
  const store = new RedisSessionStore(client, config.ttlMinutes);
  try {
    await store.connect();
    logger.info('sessions:redis_connected', { url: redactUrl(config.redisUrl) });
    return store;
  } catch (err) {
    logger.warn('sessions:redis_unavailable_fallback_to_memory', {
      error: err instanceof Error ? err.message : String(err),
    });
    client.disconnect();
    return new InMemorySessionStore(config.ttlMinutes, config.maxEntries);
  }
}

function redactUrl(url: string): string {
  return url.replace(/\/\/([^@/]*)@/, '//***@');
}
