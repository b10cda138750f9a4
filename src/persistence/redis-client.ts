import { Redis } from 'ioredis';
import { describeError, logger } from '../observability/logger.js';

const CONNECT_TIMEOUT_MS = 5000;
const COMMAND_TIMEOUT_MS = 2000;
const MAX_CONNECT_RETRIES = 3;

export function createRedisClient(url: string): Redis {
  const client = new Redis(url, {
    connectTimeout: CONNECT_TIMEOUT_MS,
    commandTimeout: COMMAND_TIMEOUT_MS,
    retryStrategy: (times: number) => {
      if (times > MAX_CONNECT_RETRIES) {
        logger.error('redis_connection', 'Max retries exceeded, giving up', { times });
        return null;
      }
      const delay = Math.min(times * 200, 2000);
      logger.warn('redis_connection', 'Retrying connection', { times, delay });
      return delay;
    },
    maxRetriesPerRequest: 2,
    enableReadyCheck: true,
    lazyConnect: false,
  });

  client.on('ready', () => {
    logger.info('redis_lifecycle', 'Redis ready');
  });

  client.on('error', (error: Error) => {
    logger.error('redis_lifecycle', 'Redis error', { error: error.message });
  });

  client.on('close', () => {
    logger.warn('redis_lifecycle', 'Redis connection closed');
  });

  client.on('reconnecting', () => {
    logger.info('redis_lifecycle', 'Redis reconnecting');
  });

  return client;
}

export async function shutdownRedis(client: Redis): Promise<void> {
  logger.info('redis_shutdown', 'Shutting down Redis connection');
  try {
    await client.quit();
  } catch (error) {
    logger.error('redis_shutdown', 'Redis quit failed, disconnecting', { error: describeError(error) });
    client.disconnect();
  }
}
