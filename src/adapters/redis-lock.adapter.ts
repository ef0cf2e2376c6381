import Redis from 'ioredis';
import { LockAdapter } from '../types';

export class RedisLockAdapter implements LockAdapter {
  private readonly lockPrefix = 'simrelay:lock:';
  private readonly defaultTTL = 60000;

  constructor(private readonly redis: Redis) {}

  async acquire(key: string, owner: string, ttl?: number): Promise<boolean> {
    const result = await this.redis.set(this.lockPrefix + key, owner, 'PX', ttl ?? this.defaultTTL, 'NX');
    return result === 'OK';
  }

  async release(key: string): Promise<void> {
    await this.redis.del(this.lockPrefix + key);
  }

  async isLocked(key: string): Promise<boolean> {
    return (await this.redis.exists(this.lockPrefix + key)) === 1;
  }

  async getOwner(key: string): Promise<string | null> {
    return this.redis.get(this.lockPrefix + key);
  }

  async extend(key: string, ttl: number): Promise<boolean> {
    const result = await this.redis.pexpire(this.lockPrefix + key, ttl);
    return result === 1;
  }
}
