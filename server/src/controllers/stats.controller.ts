import type { Request, Response, NextFunction } from 'express';
import { STATS_WINDOW_DAYS } from '../config/index.js';
import { InvalidRequestError } from '../lib/errors/app-errors.js';
import type { TenantStore } from '../store/types.js';
import { TenantIdParamsSchema } from './schemas.js';

export function createStatsController(store: TenantStore) {
    return async function getStats(req: Request, res: Response, next: NextFunction): Promise<void> {
        const params = TenantIdParamsSchema.safeParse(req.params);
        if (!params.success) {
            next(new InvalidRequestError(`tenant id is not a UUID: ${String(req.params.tenantId)}`));
            return;
        }

        try {
            const stats = await store.getTenantStats(params.data.tenantId, STATS_WINDOW_DAYS);
            res.json({ success: true, stats });
        } catch (error) {
            next(error);
        }
    };
}
