/**
 * Redis Connection Module
 *
 * Shared ioredis connection for BullMQ queues and workers, created on first
 * use.
 */

import { Redis } from 'ioredis';
import { config } from './config';
import { logger } from './logger';

let connection: Redis | null = null;

/**
 * Configuration notes:
 * - maxRetriesPerRequest: null is REQUIRED for BullMQ
 * - rediss:// URLs get TLS from ioredis itself
 */
export function getRedis(): Redis {
  if (connection) return connection;

  if (!config.redisUrl) {
    throw new Error('REDIS_URL environment variable is required');
  }

  const redis = new Redis(config.redisUrl, {
    maxRetriesPerRequest: null, // Required for BullMQ
    enableReadyCheck: false,
    retryStrategy: (times) => {
      const delay = Math.min(times * 50, 2000);
      logger.warn(`Redis connection retry #${times}, waiting ${delay}ms`);
      return delay;
    },
    reconnectOnError: (err: Error) => err.message.includes('READONLY'),
  });

  redis.on('connect', () => {
    logger.info('Connected to Redis');
  });

  redis.on('error', (err: Error) => {
    logger.error({ error: err.message }, 'Redis error');
  });

  redis.on('close', () => {
    logger.warn('Redis connection closed');
  });

  connection = redis;
  return redis;
}

export async function checkRedisHealth(): Promise<boolean> {
  try {
    const result = await getRedis().ping();
    return result === 'PONG';
  } catch {
    return false;
  }
}

export async function closeRedis(): Promise<void> {
  if (!connection) return;
  await connection.quit();
  connection = null;
  logger.info('Redis connection closed');
}
