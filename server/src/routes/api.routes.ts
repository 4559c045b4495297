import { Router } from 'express';
import type { AppDeps } from '../app.js';
import { createChatController } from '../controllers/chat.controller.js';
import { createMenuController } from '../controllers/menu.controller.js';
import { createHomeController } from '../controllers/home.controller.js';
import { createStatsController } from '../controllers/stats.controller.js';
import { createCacheAdminController } from '../controllers/cache-admin.controller.js';
import { createHealthHandler, livenessHandler } from '../controllers/health.controller.js';
import { requireAdminKey } from '../middleware/admin-auth.middleware.js';

export function createApiRouter(deps: AppDeps): Router {
    const router = Router();

    const postChat = createChatController(deps.pipeline);
    const getMenu = createMenuController(deps.pipeline, deps.tenants);
    const getHome = createHomeController(deps.pipeline);

    router.get('/', getHome);
    router.get('/r/:slug', getHome);

    router.get('/api/menu', getMenu);
    router.get('/r/:slug/api/menu', getMenu);

    router.post('/api/chat', postChat);
    router.post('/r/:slug/api/chat', postChat);

    router.get('/api/stats/:tenantId', createStatsController(deps.store));
    router.post(
        '/api/tenants/:tenantId/cache/invalidate',
        requireAdminKey(deps.adminApiKey),
        createCacheAdminController(deps.tenants)
    );

    router.get('/health', createHealthHandler({
        store: deps.store,
        cache: deps.cache,
        aiStatus: () => deps.pipeline.responderName,
        timeoutMs: deps.healthTimeoutMs ?? 2000
    }));
    router.get('/healthz', livenessHandler);

    return router;
}
