import Redis from 'ioredis';
import { appConfig } from './index';
import { logger } from './logger';

let redisClient: Redis | null = null;

export function getRedisClient(): Redis {
  if (!redisClient) {
    redisClient = new Redis({
      host: appConfig.redis.host,
      port: appConfig.redis.port,
      password: appConfig.redis.password,
      db: appConfig.redis.db,
      retryStrategy: (times) => {
        const delay = Math.min(times * 50, 2000);
        return delay;
      },
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
      lazyConnect: true,
    });

    redisClient.on('connect', () => {
      logger.info({
        message: 'Redis client connected',
        host: appConfig.redis.host,
        port: appConfig.redis.port,
      });
    });

    redisClient.on('error', (error) => {
      logger.error({
        message: 'Redis client error',
        error: error.message,
      });
    });

    redisClient.on('close', () => {
      logger.warn({ message: 'Redis client connection closed' });
    });

    redisClient.on('reconnecting', () => {
      logger.info({ message: 'Redis client reconnecting' });
    });
  }

  return redisClient;
}

export async function connectRedis(): Promise<void> {
  try {
    const client = getRedisClient();
    await client.connect();
    logger.info({ message: 'Redis connected successfully' });
  } catch (error) {
    logger.error({
      message: 'Failed to connect to Redis',
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}

export async function disconnectRedis(): Promise<void> {
  try {
    if (redisClient) {
      await redisClient.quit();
      redisClient = null;
    }
    logger.info({ message: 'Redis disconnected' });
  } catch (error) {
    logger.error({
      message: 'Error disconnecting Redis',
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

export async function testRedisConnection(): Promise<boolean> {
  try {
    const client = getRedisClient();
    await client.ping();
    return true;
  } catch (error) {
    logger.debug({
      message: 'Redis ping failed',
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}
