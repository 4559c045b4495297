import type { Request, Response, NextFunction } from 'express';
import type { ChatPipeline } from '../services/chat/chat-pipeline.service.js';
import type { TenantCacheService } from '../services/tenant/tenant-cache.service.js';
import { requestAttributes } from './request-attributes.js';

export function createMenuController(pipeline: ChatPipeline, tenants: TenantCacheService) {
    return async function getMenu(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const tenant = await pipeline.resolveProfile(requestAttributes(req));
            const items = await tenants.getMenu(tenant.id);

            res.json({
                success: true,
                restaurant: { id: tenant.id, name: tenant.name },
                items,
                count: items.length
            });
        } catch (error) {
            next(error);
        }
    };
}
