import type { Request, Response, NextFunction } from 'express';
import { errorMessage, isAppError } from '../lib/errors/app-errors.js';

export const GENERIC_ERROR_MESSAGE = 'Failed to generate response';

/**
 * Terminal error handler. AppErrors answer with their status and public
 * message; anything else is a generic 500. Details stay in the log.
 */
export function errorMiddleware(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  // express.json() rejects malformed bodies with a 400-class error carrying `status`
  const parserStatus = err instanceof Error ? Reflect.get(err, 'status') : undefined;
  if (typeof parserStatus === 'number' && parserStatus >= 400 && parserStatus < 500) {
    req.log.warn({ event: 'request_rejected', status: parserStatus, error: errorMessage(err) }, '[HTTP] Malformed request');
    res.status(400).json({ success: false, error: 'Invalid request' });
    return;
  }

  if (isAppError(err)) {
    const level = err.httpStatus >= 500 ? 'error' : 'warn';
    req.log[level](
      {
        event: 'request_failed',
        code: err.code,
        status: err.httpStatus,
        error: err.message,
        cause: err.cause === undefined ? undefined : errorMessage(err.cause)
      },
      '[HTTP] Request failed'
    );
    res.status(err.httpStatus).json({ success: false, error: err.publicMessage });
    return;
  }

  req.log.error({ event: 'unhandled_error', error: errorMessage(err) }, '[HTTP] Unhandled error');
  res.status(500).json({ success: false, error: GENERIC_ERROR_MESSAGE });
}
