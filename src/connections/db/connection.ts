import { Pool } from 'pg';
import type { PoolConfig } from 'pg';
import type { DbConfig } from '../config';
import { logger } from '../../utils/logging';
import { errorMessage } from '../../utils/errors';

const toPoolConfig = (config: DbConfig): PoolConfig =>
  config.connectionString
    ? { connectionString: config.connectionString, max: config.max }
    : {
        host: config.host,
        port: config.port,
        database: config.database,
        user: config.user,
        password: config.password,
        max: config.max,
      };

export const createPool = (config: DbConfig): Pool => {
  const pool = new Pool(toPoolConfig(config));

  // Lỗi của idle client không làm sập process; query kế tiếp sẽ tự báo lỗi
  pool.on('error', (err: Error) => {
    logger.error('Unexpected error on idle client', { error: err.message, stack: err.stack });
  });

  return pool;
};

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Connect to database and verify connection with retry logic
 */
export const connectDatabase = async (
  pool: Pool,
  maxRetries: number = 10,
  retryDelay: number = 2000,
): Promise<void> => {
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      await pool.query('SELECT NOW()');
      logger.info('Database connected successfully');
      return;
    } catch (err: unknown) {
      if (attempt >= maxRetries) {
        logger.error(`Database connection error after ${maxRetries} attempts:`, { error: errorMessage(err) });
        throw err;
      }
      logger.warn(`Database connection attempt ${attempt}/${maxRetries} failed, retrying in ${retryDelay}ms...`, {
        error: errorMessage(err),
      });
      await sleep(retryDelay);
    }
  }
};
