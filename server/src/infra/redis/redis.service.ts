/**
 * Redis Service - owner of the shared ioredis client
 *
 * Connects once at startup, before the HTTP server listens. A Redis that is
 * down at startup does not stop the process: the client keeps reconnecting in
 * the background and the cache layer treats every call as a miss until the
 * client is ready again.
 *
 * Usage:
 * ```typescript
 * const redis = await RedisService.start({ url: REDIS_URL }, logger);
 * const cache = new RedisCacheStore(redis);
 * ```
 */

import { Redis } from 'ioredis';
import type { Logger } from '../../lib/logger/structured-logger.js';
import { errorMessage } from '../../lib/errors/app-errors.js';
import { withTimeout } from '../../lib/reliability/timeout-guard.js';

export interface RedisServiceOptions {
  url: string;
  maxRetriesPerRequest?: number;
  connectTimeout?: number;
  commandTimeout?: number;
  /** Total time allowed for the initial connect + PING. */
  startupTimeout?: number;
}

/**
 * host:port only, never credentials.
 */
export function redisHostPort(url: string): string {
  const match = url.match(/:\/\/([^@]+@)?([^/]+)/);
  return match?.[2] ?? 'unknown';
}

class RedisServiceSingleton {
  private client: Redis | null = null;

  async start(options: RedisServiceOptions, logger: Logger): Promise<Redis> {
    if (this.client) {
      return this.client;
    }

    const {
      url,
      maxRetriesPerRequest = 1,
      connectTimeout = 2000,
      commandTimeout = 1000,
      startupTimeout = 5000
    } = options;
    const hostPort = redisHostPort(url);

    logger.info(
      { event: 'redis_connect_start', redisUrl: hostPort, connectTimeout, startupTimeout },
      '[RedisService] Starting Redis connection'
    );

    const redis = new Redis(url, {
      maxRetriesPerRequest,
      connectTimeout,
      commandTimeout,
      retryStrategy: (times: number) => Math.min(times * 200, 5000),
      lazyConnect: true,
      enableOfflineQueue: false,
      enableReadyCheck: true
    });

    redis.on('error', (err: Error) => {
      logger.warn({ event: 'redis_error', error: err.message }, '[RedisService] Redis error (non-fatal)');
    });
    redis.on('ready', () => {
      logger.info({ event: 'redis_ready' }, '[RedisService] Redis client ready');
    });

    this.client = redis;
    const startTime = Date.now();

    try {
      await withTimeout(
        redis.connect().then(() => redis.ping()),
        startupTimeout,
        'redis startup'
      );
      logger.info(
        { event: 'redis_connect_ok', redisUrl: hostPort, durationMs: Date.now() - startTime },
        '[RedisService] Redis connected'
      );
    } catch (err) {
      logger.warn(
        {
          event: 'redis_connect_degraded',
          redisUrl: hostPort,
          durationMs: Date.now() - startTime,
          error: errorMessage(err)
        },
        '[RedisService] Redis unavailable at startup; cache reads fall through to the database'
      );
    }

    return redis;
  }

  async close(logger: Logger): Promise<void> {
    if (!this.client) return;
    const client = this.client;
    this.client = null;
    if (client.status === 'ready') {
      await client.quit();
    } else {
      client.disconnect();
    }
    logger.info({ event: 'redis_closed' }, '[RedisService] Connection closed');
  }
}

export const RedisService = new RedisServiceSingleton();
