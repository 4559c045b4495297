import type { Request, Response, NextFunction } from 'express';
import { TenantNotFoundError } from '../lib/errors/app-errors.js';
import type { ChatPipeline } from '../services/chat/chat-pipeline.service.js';
import { assistantName } from '../services/assistant/prompt-builder.js';
import { requestAttributes } from './request-attributes.js';

export const LANDING_MESSAGE = 'Welcome! Open a restaurant by its subdomain or at /r/<restaurant>.';

/**
 * Tenant home payload. A request with no routing hint at all gets the
 * landing payload; a hint naming no active tenant is a 404.
 */
export function createHomeController(pipeline: ChatPipeline) {
    return async function getHome(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const tenant = await pipeline.resolveProfile(requestAttributes(req));
            res.json({
                success: true,
                restaurant: {
                    id: tenant.id,
                    name: tenant.name,
                    aiName: assistantName(tenant),
                    slug: tenant.slug,
                    welcomeMessage: tenant.welcomeMessage,
                    themeConfig: tenant.themeConfig
                }
            });
        } catch (error) {
            if (error instanceof TenantNotFoundError && error.identifier === undefined) {
                res.json({ success: true, restaurant: null, message: LANDING_MESSAGE });
                return;
            }
            next(error);
        }
    };
}
