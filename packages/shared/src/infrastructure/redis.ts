/**
 * Redis Connection
 * Backs idempotency records and health checks
 */

import Redis from 'ioredis';

export interface RedisConfig {
  host: string;
  port: number;
  password?: string;
  db?: number;
  maxRetriesPerRequest: number;
  retryStrategy?: (times: number) => number | null;
}

const DEFAULT_REDIS_URL = 'redis://localhost:6379';

/**
 * Parse a redis:// URL into client options
 */
export function parseRedisUrl(url: string): RedisConfig {
  const parsed = new URL(url);
  const dbSegment = parsed.pathname.slice(1);

  return {
    host: parsed.hostname,
    port: parseInt(parsed.port || '6379', 10),
    password: parsed.password || undefined,
    db: dbSegment ? parseInt(dbSegment, 10) : 0,
    maxRetriesPerRequest: 3,
    retryStrategy: (times: number): number | null => {
      if (times > 10) {
        return null;
      }
      return Math.min(times * 100, 3000);
    },
  };
}

export function createRedisClient(config: RedisConfig): Redis {
  const client = new Redis(config);

  client.on('error', (err) => {
    console.error('Redis client error:', err);
  });

  return client;
}

let redisClient: Redis | null = null;

/**
 * Process-wide client built from REDIS_URL on first use
 */
export function getRedisClient(): Redis {
  if (!redisClient) {
    redisClient = createRedisClient(parseRedisUrl(process.env.REDIS_URL || DEFAULT_REDIS_URL));
  }
  return redisClient;
}

export async function closeRedis(): Promise<void> {
  if (redisClient) {
    await redisClient.quit();
    redisClient = null;
  }
}

export type { Redis };
export type RedisClient = Redis;
