import { v4 as uuidv4 } from 'uuid';
import type { RedisClient } from '../../connections/redis';

/**
 * In-flight guard for batch jobs. `acquire` returns an owner token, or null
 * when another run (this process or another one) still holds the lock.
 */
export interface JobLock {
  acquire(key: string, ttlMs: number): Promise<string | null>;
  release(key: string, token: string): Promise<boolean>;
}

// Chỉ xóa khi token vẫn là của mình
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end`;

export class RedisJobLock implements JobLock {
  constructor(private readonly client: RedisClient) {}

  async acquire(key: string, ttlMs: number): Promise<string | null> {
    const token = uuidv4();
    const result = await this.client.set(key, token, { NX: true, PX: ttlMs });
    return result === 'OK' ? token : null;
  }

  async release(key: string, token: string): Promise<boolean> {
    const deleted = await this.client.eval(RELEASE_SCRIPT, { keys: [key], arguments: [token] });
    return deleted === 1;
  }
}

export class MemoryJobLock implements JobLock {
  private readonly held = new Map<string, { token: string; expiresAt: number }>();

  constructor(private readonly now: () => number = Date.now) {}

  async acquire(key: string, ttlMs: number): Promise<string | null> {
    const current = this.held.get(key);
    if (current && current.expiresAt > this.now()) {
      return null;
    }
    const token = uuidv4();
    this.held.set(key, { token, expiresAt: this.now() + ttlMs });
    return token;
  }

  async release(key: string, token: string): Promise<boolean> {
    const current = this.held.get(key);
    if (!current || current.token !== token) {
      return false;
    }
    this.held.delete(key);
    return true;
  }
}
