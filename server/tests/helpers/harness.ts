import { createApp, type AppDeps } from '../../src/app.js';
import type { LLMProvider } from '../../src/llm/types.js';
import { BackendClient } from '../../src/services/assistant/backend-client.js';
import { DialogueSessionStore } from '../../src/services/assistant/dialogue-session.store.js';
import type { RandomSource } from '../../src/services/assistant/random-source.js';
import { RuleEngine } from '../../src/services/assistant/rule-engine.js';
import { ChatPipeline } from '../../src/services/chat/chat-pipeline.service.js';
import { TenantCacheService } from '../../src/services/tenant/tenant-cache.service.js';
import type { MenuItem, Tenant } from '../../src/store/tenant.types.js';
import { createCaptureLogger } from './capture-logger.js';
import { TENANT_ID, makeTenant, sampleMenu } from './fixtures.js';
import { InMemoryTenantStore } from './in-memory-tenant.store.js';
import { SpyCacheStore } from './spy-cache.store.js';

export interface HarnessOptions {
  tenants?: Tenant[];
  menus?: Map<string, MenuItem[]>;
  provider?: LLMProvider | null;
  random?: RandomSource;
  adminApiKey?: string;
  now?: () => number;
}

/**
 * The production object graph around in-process fakes.
 */
export function buildHarness(options: HarnessOptions = {}) {
  const capture = createCaptureLogger();
  const now = options.now ?? Date.now;
  const store = new InMemoryTenantStore(
    options.tenants ?? [makeTenant()],
    options.menus ?? new Map([[TENANT_ID, sampleMenu()]]),
    now
  );
  const cache = new SpyCacheStore();
  const tenants = new TenantCacheService(store, cache, capture.logger, { ttlSeconds: 3600, timeoutMs: 50 });
  const sessions = new DialogueSessionStore();
  const provider = options.provider ?? null;

  const pipeline = new ChatPipeline({
    tenants,
    store,
    backend: provider ? new BackendClient(provider, capture.logger) : null,
    rules: new RuleEngine(options.random ?? (() => 0)),
    sessions,
    logger: capture.logger,
    now
  });

  const deps: AppDeps = {
    pipeline,
    tenants,
    store,
    cache,
    logger: capture.logger,
    adminApiKey: options.adminApiKey,
    healthTimeoutMs: 50
  };

  return { ...deps, store, cache, capture, sessions, createApp: () => createApp(deps) };
}

/**
 * Let fire-and-forget work scheduled by the last call settle.
 */
export function flushAsync(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}
