import type { Request } from 'express';
import type { RequestAttributes } from '../services/tenant/tenant-resolver.js';

/**
 * Routing-relevant parts of an Express request. The path is the full
 * request path, independent of where the router is mounted.
 */
export function requestAttributes(req: Request): RequestAttributes {
    return {
        host: req.headers.host,
        path: req.baseUrl + req.path,
        query: req.query,
        body: req.body
    };
}
