import { createClient } from 'redis';
import type { RedisConfig } from '../config';
import { logger } from '../../utils/logging';
import { errorMessage } from '../../utils/errors';

export type RedisClient = ReturnType<typeof createClient>;

export const createRedisClient = (config: RedisConfig): RedisClient => {
  const client = createClient({
    socket: {
      host: config.host,
      port: config.port,
    },
    ...(config.password ? { password: config.password } : {}),
    database: config.db,
  });

  client.on('error', (err: Error) => {
    logger.error('Redis Client Error', { error: err.message, stack: err.stack });
  });

  return client;
};

/**
 * Connect to Redis
 */
export const connectRedis = async (client: RedisClient): Promise<void> => {
  try {
    if (!client.isOpen) {
      await client.connect();
      logger.info('Redis connected successfully');
    } else {
      logger.info('Redis already connected');
    }
  } catch (err: unknown) {
    logger.error('Failed to connect to Redis:', { error: errorMessage(err) });
    throw err;
  }
};
