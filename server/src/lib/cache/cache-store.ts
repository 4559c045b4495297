/**
 * Fast cache capability used by the cache-aside layer.
 *
 * Values are opaque serialized strings. Implementations may throw on any
 * operation; callers treat failures as a cache miss.
 */

import { CacheUnavailableError } from '../errors/app-errors.js';
import { CacheManager, type Clock } from './cache-manager.js';

export interface CacheStore {
  readonly kind: 'redis' | 'memory';
  get(key: string): Promise<string | null>;
  setWithExpiry(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(...keys: string[]): Promise<void>;
  ping(): Promise<void>;
}

/**
 * The ioredis commands the store uses. An ioredis `Redis` client satisfies it.
 */
export interface RedisCommands {
  readonly status: string;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, expiryMode: 'EX', seconds: number): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  ping(): Promise<string>;
}

/**
 * Redis-backed store. Refuses to queue commands while the client is not ready,
 * so a dead Redis fails fast instead of stalling the request.
 */
export class RedisCacheStore implements CacheStore {
  readonly kind = 'redis';

  constructor(private readonly redis: RedisCommands) {}

  async get(key: string): Promise<string | null> {
    this.assertReady('get');
    return this.redis.get(key);
  }

  async setWithExpiry(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.assertReady('set');
    await this.redis.set(key, value, 'EX', ttlSeconds);
  }

  async delete(...keys: string[]): Promise<void> {
    if (keys.length === 0) return;
    this.assertReady('delete');
    await this.redis.del(...keys);
  }

  async ping(): Promise<void> {
    this.assertReady('ping');
    const reply = await this.redis.ping();
    if (reply !== 'PONG') {
      throw new CacheUnavailableError('ping');
    }
  }

  private assertReady(operation: string): void {
    if (this.redis.status !== 'ready') {
      throw new CacheUnavailableError(`${operation} (redis status: ${this.redis.status})`);
    }
  }
}

/**
 * Single-process stand-in used when REDIS_URL is not configured.
 */
export class MemoryCacheStore implements CacheStore {
  readonly kind = 'memory';
  private readonly entries: CacheManager<string>;

  constructor(maxEntries = 5000, now?: Clock) {
    this.entries = new CacheManager<string>(maxEntries, now);
  }

  async get(key: string): Promise<string | null> {
    return this.entries.get(key);
  }

  async setWithExpiry(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, value, ttlSeconds * 1000);
  }

  async delete(...keys: string[]): Promise<void> {
    for (const key of keys) {
      this.entries.delete(key);
    }
  }

  async ping(): Promise<void> {
    // always reachable
  }
}
