import type { Request, Response, NextFunction } from 'express';
import { InvalidRequestError } from '../lib/errors/app-errors.js';
import type { TenantCacheService } from '../services/tenant/tenant-cache.service.js';
import { TenantIdParamsSchema } from './schemas.js';

export function createCacheAdminController(tenants: TenantCacheService) {
    return async function invalidateTenantCache(req: Request, res: Response, next: NextFunction): Promise<void> {
        const params = TenantIdParamsSchema.safeParse(req.params);
        if (!params.success) {
            next(new InvalidRequestError(`tenant id is not a UUID: ${String(req.params.tenantId)}`));
            return;
        }

        try {
            const result = await tenants.invalidate(params.data.tenantId);
            res.json({ success: true, ...result });
        } catch (error) {
            next(error);
        }
    };
}
