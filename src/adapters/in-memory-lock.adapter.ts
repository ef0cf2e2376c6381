import { LockAdapter } from '../types';

interface HeldLock {
  owner: string;
  expiresAt: number;
}

export class InMemoryLockAdapter implements LockAdapter {
  private locks: Map<string, HeldLock> = new Map();

  async acquire(key: string, owner: string, ttl: number = 60000): Promise<boolean> {
    this.cleanExpiredLocks();

    if (this.locks.has(key)) {
      return false;
    }

    this.locks.set(key, { owner, expiresAt: Date.now() + ttl });

    return true;
  }

  async release(key: string): Promise<void> {
    this.locks.delete(key);
  }

  async isLocked(key: string): Promise<boolean> {
    this.cleanExpiredLocks();
    return this.locks.has(key);
  }

  async getOwner(key: string): Promise<string | null> {
    this.cleanExpiredLocks();
    return this.locks.get(key)?.owner ?? null;
  }

  async extend(key: string, ttl: number): Promise<boolean> {
    this.cleanExpiredLocks();
    const lock = this.locks.get(key);

    if (!lock) {
      return false;
    }

    this.locks.set(key, { owner: lock.owner, expiresAt: Date.now() + ttl });

    return true;
  }

  clear(): void {
    this.locks.clear();
  }

  private cleanExpiredLocks(): void {
    const now = Date.now();

    for (const [key, lock] of this.locks.entries()) {
      if (lock.expiresAt <= now) {
        this.locks.delete(key);
      }
    }
  }
}
