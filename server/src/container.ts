/**
 * Wires the production object graph from configuration.
 */

import type { AppConfig } from './config/env.js';
import type { AppDeps } from './app.js';
import { RedisService } from './infra/redis/redis.service.js';
import { createPgPool } from './infra/postgres/pg.service.js';
import { MemoryCacheStore, RedisCacheStore, type CacheStore } from './lib/cache/cache-store.js';
import type { Logger } from './lib/logger/structured-logger.js';
import { createLLMProvider } from './llm/factory.js';
import { BackendClient } from './services/assistant/backend-client.js';
import { DialogueSessionStore } from './services/assistant/dialogue-session.store.js';
import { createRandomSource } from './services/assistant/random-source.js';
import { RuleEngine } from './services/assistant/rule-engine.js';
import { ChatPipeline } from './services/chat/chat-pipeline.service.js';
import { TenantCacheService } from './services/tenant/tenant-cache.service.js';
import { PgTenantStore } from './store/pg-tenant.store.js';

export interface Container {
  deps: AppDeps;
  close(): Promise<void>;
}

export async function buildContainer(config: AppConfig, logger: Logger): Promise<Container> {
  const pool = createPgPool(config.database, logger);
  const store = new PgTenantStore(pool);

  let cache: CacheStore;
  if (config.cache.redisUrl) {
    cache = new RedisCacheStore(await RedisService.start({ url: config.cache.redisUrl }, logger));
  } else {
    logger.warn({ event: 'cache_memory_fallback' }, '[Container] REDIS_URL not set, using in-process cache');
    cache = new MemoryCacheStore();
  }

  const tenants = new TenantCacheService(store, cache, logger, {
    ttlSeconds: config.cache.ttlSeconds,
    timeoutMs: config.cache.timeoutMs
  });

  const provider = createLLMProvider(config.llm, logger);
  const pipeline = new ChatPipeline({
    tenants,
    store,
    backend: provider ? new BackendClient(provider, logger) : null,
    rules: new RuleEngine(createRandomSource(config.ruleEngineSeed)),
    sessions: new DialogueSessionStore(),
    logger
  });

  return {
    deps: { pipeline, tenants, store, cache, logger, adminApiKey: config.adminApiKey },
    async close() {
      await RedisService.close(logger);
      await pool.end();
    }
  };
}
