/**
 * Redis Client Configuration
 *
 * Shared client for the rate limiter store. The event bus keeps its own
 * publisher and subscriber connections.
 */

import Redis from 'ioredis';

import { createServiceLogger } from '../observability/logger';

import { config } from './index';

const log = createServiceLogger('redis');

let redisClient: Redis | null = null;

/**
 * Get or create the shared client. It connects on its first command.
 */
export const getRedisClient = (): Redis => {
  if (!redisClient) {
    redisClient = new Redis({
      host: config.redis.host,
      port: config.redis.port,
      password: config.redis.password,
      maxRetriesPerRequest: 3,
      retryStrategy: (times: number) => {
        if (times > 3) {
          return null;
        }
        return Math.min(times * 100, 3000);
      },
      lazyConnect: true,
    });

    redisClient.on('error', (err) => {
      log.error({ err }, 'Redis client error');
    });

    redisClient.on('connect', () => {
      log.info('Redis client connected');
    });
  }

  return redisClient;
};

export const disconnectRedis = async (): Promise<void> => {
  if (redisClient) {
    await redisClient.quit();
    redisClient = null;
  }
};
