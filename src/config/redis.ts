import { createClient } from 'redis';
import { env } from './env';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export const redis = createClient({ url: env.REDIS_URL });

redis.on('error', (err: Error) => {
  logger.error('Redis error', { error: err.message });
});

redis.on('connect', () => {
  logger.info('Redis connected');
});

export async function connectRedis(): Promise<void> {
  if (!env.REDIS_URL) {
    logger.info('REDIS_URL not set, conversation history kept in process memory');
    return;
  }

  if (!redis.isOpen) {
    await redis.connect();
  }
}

export async function checkRedisHealth(): Promise<{ status: string; error?: string }> {
  if (!env.REDIS_URL) {
    return { status: 'disabled' };
  }

  try {
    await redis.ping();
    return { status: 'healthy' };
  } catch (error) {
    return { status: 'unhealthy', error: errorMessage(error) };
  }
}
