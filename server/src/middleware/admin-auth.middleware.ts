/**
 * Bearer-token guard for management endpoints.
 * Without a configured key the guarded routes do not exist (404).
 */

import { timingSafeEqual } from 'node:crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';

function sameToken(presented: string, expected: string): boolean {
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function requireAdminKey(adminApiKey: string | undefined): RequestHandler {
  return function adminAuth(req: Request, res: Response, next: NextFunction): void {
    if (!adminApiKey) {
      res.status(404).json({ success: false, error: 'Not found' });
      return;
    }

    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      req.log.warn({ event: 'admin_auth_missing', path: req.path }, '[Auth] Missing or invalid Authorization header');
      res.status(401).json({ success: false, error: 'Unauthorized' });
      return;
    }

    if (!sameToken(authHeader.substring(7), adminApiKey)) {
      req.log.warn({ event: 'admin_auth_rejected', path: req.path }, '[Auth] Invalid admin token');
      res.status(401).json({ success: false, error: 'Unauthorized' });
      return;
    }

    next();
  };
}
