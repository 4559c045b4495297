/**
 * Health Endpoints
 *
 * - /healthz: liveness (process is up), no dependency checks
 * - /health:  readiness, pings the durable store and the fast cache
 *
 * HTTP codes for /health:
 * - 200: both dependencies answered
 * - 503: at least one did not
 */

import type { Request, Response } from 'express';
import type { CacheStore } from '../lib/cache/cache-store.js';
import { errorMessage } from '../lib/errors/app-errors.js';
import { withTimeout } from '../lib/reliability/timeout-guard.js';
import type { TenantStore } from '../store/types.js';

export type ServiceState = 'healthy' | 'unhealthy';

export interface HealthDeps {
  store: TenantStore;
  cache: CacheStore;
  /** Active backend name or "fallback". */
  aiStatus: () => string;
  timeoutMs: number;
}

export function livenessHandler(_req: Request, res: Response): void {
  res.status(200).send('ok');
}

async function probe(check: Promise<void>, timeoutMs: number, name: string): Promise<string | null> {
  try {
    await withTimeout(check, timeoutMs, `${name} ping`);
    return null;
  } catch (err) {
    return `${name}: ${errorMessage(err)}`;
  }
}

export function createHealthHandler(deps: HealthDeps) {
  return async function healthHandler(req: Request, res: Response): Promise<void> {
    const [databaseError, cacheError] = await Promise.all([
      probe(deps.store.ping(), deps.timeoutMs, 'database'),
      probe(deps.cache.ping(), deps.timeoutMs, 'cache')
    ]);

    const services = {
      database: databaseError ? 'unhealthy' : 'healthy',
      cache: cacheError ? 'unhealthy' : 'healthy',
      ai: deps.aiStatus()
    };

    if (databaseError || cacheError) {
      const error = [databaseError, cacheError].filter(Boolean).join('; ');
      req.log.error({ event: 'health_check_failed', services, error }, '[Health] Dependency check failed');
      res.status(503).json({ status: 'unhealthy', services, error });
      return;
    }

    res.status(200).json({ status: 'healthy', services });
  };
}
