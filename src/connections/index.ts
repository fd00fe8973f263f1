// Database
export { createPool, connectDatabase, migrate, rollback, MemoryDataStore, PgDataStore } from './db';
export type { DataStore } from './db';

// Redis
export { createRedisClient, connectRedis } from './redis';
export type { RedisClient } from './redis';

// Config - All configurations in one place
export { loadConfig } from './config';
export type { AppConfig } from './config';
