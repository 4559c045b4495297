/**
 * Tenant Cache Service (cache-aside)
 *
 * Read path for tenant profiles and menus:
 *   cache hit  -> return cached value, store untouched
 *   cache miss -> read durable store -> write back with TTL -> return
 *
 * Missing tenants and empty menus are never cached. Cache errors, timeouts and
 * undecodable entries are logged and degrade to a store read. Store errors
 * propagate unchanged.
 */

import type { z } from 'zod';
import type { Logger } from '../../lib/logger/structured-logger.js';
import type { CacheStore } from '../../lib/cache/cache-store.js';
import { withTimeout } from '../../lib/reliability/timeout-guard.js';
import { errorMessage } from '../../lib/errors/app-errors.js';
import type { TenantStore } from '../../store/types.js';
import {
  MenuSchema,
  TenantSchema,
  type MenuItem,
  type RoutingScheme,
  type Tenant
} from '../../store/tenant.types.js';

export interface TenantCacheOptions {
  ttlSeconds: number;
  /** Upper bound for a single cache command. */
  timeoutMs: number;
}

export interface InvalidationResult {
  tenantId: string;
  keys: string[];
  cacheCleared: boolean;
}

export function profileCacheKey(scheme: RoutingScheme, identifier: string): string {
  return `profile:${scheme}:${identifier}`;
}

export function menuCacheKey(tenantId: string): string {
  return `menu:${tenantId}`;
}

export class TenantCacheService {
  constructor(
    private readonly store: TenantStore,
    private readonly cache: CacheStore,
    private readonly logger: Logger,
    private readonly options: TenantCacheOptions
  ) {}

  async getProfile(scheme: RoutingScheme, identifier: string): Promise<Tenant | null> {
    return this.readThrough(
      profileCacheKey(scheme, identifier),
      TenantSchema.nullable(),
      () =>
        scheme === 'subdomain'
          ? this.store.findTenantBySubdomain(identifier)
          : this.store.findTenantBySlug(identifier),
      tenant => tenant !== null
    );
  }

  async getMenu(tenantId: string): Promise<MenuItem[]> {
    return this.readThrough(
      menuCacheKey(tenantId),
      MenuSchema,
      () => this.store.listMenuItems(tenantId),
      items => items.length > 0
    );
  }

  /**
   * Drop the cached profile (under every routing key) and menu of a tenant.
   * The next read of either falls through to the durable store.
   */
  async invalidate(tenantId: string): Promise<InvalidationResult> {
    const keys = [menuCacheKey(tenantId), ...(await this.profileKeys(tenantId))];

    try {
      await withTimeout(this.cache.delete(...keys), this.options.timeoutMs, 'cache delete');
      this.logger.info({ event: 'cache_invalidated', tenantId, keys }, '[TenantCache] Tenant cache invalidated');
      return { tenantId, keys, cacheCleared: true };
    } catch (err) {
      this.logger.error(
        { event: 'cache_invalidate_failed', tenantId, keys, error: errorMessage(err) },
        '[TenantCache] Invalidation failed; entries expire with their TTL'
      );
      return { tenantId, keys, cacheCleared: false };
    }
  }

  /**
   * Routing keys the tenant's profile may be cached under. Empty when the
   * store cannot say; those entries then age out with their TTL.
   */
  private async profileKeys(tenantId: string): Promise<string[]> {
    let tenant: Tenant | null;
    try {
      tenant = await this.store.findTenantById(tenantId);
    } catch (err) {
      this.logger.warn(
        { event: 'cache_invalidate_lookup_failed', tenantId, error: errorMessage(err) },
        '[TenantCache] Tenant lookup failed; clearing the menu only'
      );
      return [];
    }

    const keys: string[] = [];
    if (tenant?.subdomain) keys.push(profileCacheKey('subdomain', tenant.subdomain));
    if (tenant?.slug) keys.push(profileCacheKey('slug', tenant.slug));
    return keys;
  }

  private async readThrough<T>(
    key: string,
    schema: z.ZodType<T>,
    load: () => Promise<T>,
    cacheable: (value: T) => boolean
  ): Promise<T> {
    const cached = await this.readCache(key, schema);
    if (cached !== undefined) {
      return cached;
    }

    this.logger.debug({ event: 'cache_miss', key }, '[TenantCache] Miss, reading durable store');
    const value = await load();

    if (cacheable(value)) {
      await this.writeCache(key, value);
    }
    return value;
  }

  /**
   * Cached value, or undefined for miss / error / corrupt entry.
   */
  private async readCache<T>(key: string, schema: z.ZodType<T>): Promise<T | undefined> {
    let raw: string | null;
    try {
      raw = await withTimeout(this.cache.get(key), this.options.timeoutMs, 'cache get');
    } catch (err) {
      this.logger.warn(
        { event: 'cache_error', operation: 'get', key, cache: this.cache.kind, error: errorMessage(err) },
        '[TenantCache] Cache read failed, falling back to durable store'
      );
      return undefined;
    }

    if (raw === null) return undefined;

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      decoded = undefined;
    }
    const parsed = schema.safeParse(decoded);
    if (!parsed.success) {
      this.logger.warn({ event: 'cache_corrupt', key }, '[TenantCache] Discarding undecodable cache entry');
      return undefined;
    }

    this.logger.debug({ event: 'cache_hit', key, cache: this.cache.kind }, '[TenantCache] Hit');
    return parsed.data;
  }

  private async writeCache(key: string, value: unknown): Promise<void> {
    try {
      await withTimeout(
        this.cache.setWithExpiry(key, JSON.stringify(value), this.options.ttlSeconds),
        this.options.timeoutMs,
        'cache set'
      );
      this.logger.debug({ event: 'cache_store', key, ttlSeconds: this.options.ttlSeconds }, '[TenantCache] Stored');
    } catch (err) {
      this.logger.warn(
        { event: 'cache_error', operation: 'set', key, cache: this.cache.kind, error: errorMessage(err) },
        '[TenantCache] Cache write failed (value still served)'
      );
    }
  }
}
