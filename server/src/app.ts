import express from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import type { CacheStore } from './lib/cache/cache-store.js';
import type { Logger } from './lib/logger/structured-logger.js';
import type { ChatPipeline } from './services/chat/chat-pipeline.service.js';
import type { TenantCacheService } from './services/tenant/tenant-cache.service.js';
import type { TenantStore } from './store/types.js';
import { createApiRouter } from './routes/api.routes.js';
import { createRequestContextMiddleware } from './middleware/requestContext.middleware.js';
import { httpLoggingMiddleware } from './middleware/httpLogging.middleware.js';
import { errorMiddleware } from './middleware/error.middleware.js';

export interface AppDeps {
    pipeline: ChatPipeline;
    tenants: TenantCacheService;
    store: TenantStore;
    cache: CacheStore;
    logger: Logger;
    adminApiKey?: string | undefined;
    healthTimeoutMs?: number | undefined;
}

export function createApp(deps: AppDeps) {
    const app = express();
    app.disable('x-powered-by');
    app.use(helmet());
    app.use(compression());
    app.use(cors());

    // request context & logging before anything that can fail, body parsing included
    app.use(createRequestContextMiddleware(deps.logger));
    app.use(httpLoggingMiddleware);
    app.use(express.json({ limit: '1mb' }));

    app.use(createApiRouter(deps));

    app.use((_req, res) => {
        res.status(404).json({ success: false, error: 'Not found' });
    });
    app.use(errorMiddleware);

    return app;
}
