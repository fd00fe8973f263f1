import { PgDataStore, connectDatabase, connectRedis, createRedisClient, loadConfig } from './connections';
import type { RedisClient } from './connections';
import { buildApplication, createDataStore, createJobLock } from './app';
import { configureLogging, logger } from './utils/logging';
import { errorMessage } from './utils/errors';

/**
 * Initialize connections and start the finance scheduler
 */
const start = async () => {
  const config = loadConfig();
  configureLogging(config.log);

  logger.info('Initializing connections...');
  const store = createDataStore(config);
  if (store instanceof PgDataStore) {
    logger.info('Connecting to database...');
    await connectDatabase(store.pool, config.db.connectRetries);
  }

  let redis: RedisClient | null = null;
  if (config.jobLock === 'redis') {
    logger.info('Connecting to Redis...');
    redis = createRedisClient(config.redis);
    await connectRedis(redis);
  }

  const app = buildApplication(config, { store, jobLock: createJobLock(config, redis) });

  if (config.jobs.enabled) {
    app.scheduler.start();
  }
  logger.info(`Environment: ${config.nodeEnv}`);
  logger.info('All services are ready!');

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`${signal} received, shutting down...`);
    app.scheduler.stop();
    await app.store.close();
    if (redis?.isOpen) {
      await redis.quit();
    }
    logger.info('Shutdown complete');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error('Error during shutdown', { error: errorMessage(error) });
        process.exitCode = 1;
      });
    });
  }
};

start().catch((error: unknown) => {
  logger.error('Failed to start application:', { error: errorMessage(error) });
  logger.error('Exiting application...');
  process.exit(1);
});
