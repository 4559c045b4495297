/**
 * Request Context Middleware
 *
 * Every request gets a traceId:
 * - reuses x-trace-id from the client if present
 * - otherwise a fresh uuid v4
 * - attaches req.traceId and req.log (child logger carrying the traceId)
 * - echoes x-trace-id on the response
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { Logger } from '../lib/logger/structured-logger.js';

declare global {
  namespace Express {
    interface Request {
      traceId: string;
      log: Logger;
    }
  }
}

const MAX_TRACE_ID_LENGTH = 128;

function clientTraceId(header: string | string[] | undefined): string | null {
  const value = Array.isArray(header) ? header[0] : header;
  if (!value) return null;
  const trimmed = value.trim();
  return trimmed && trimmed.length <= MAX_TRACE_ID_LENGTH ? trimmed : null;
}

export function createRequestContextMiddleware(logger: Logger): RequestHandler {
  return function requestContextMiddleware(req: Request, res: Response, next: NextFunction): void {
    const traceId = clientTraceId(req.headers['x-trace-id']) ?? uuidv4();

    req.traceId = traceId;
    req.log = logger.child({ traceId });
    res.setHeader('x-trace-id', traceId);

    next();
  };
}
