export { createRedisClient, connectRedis } from './redis.connection';
export type { RedisClient } from './redis.connection';
