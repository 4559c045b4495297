/**
 * Structured Logger
 *
 * JSON logs via pino. Call sites are object-first:
 *   logger.info({ event: 'cache_hit', tenantId }, '[TenantCache] Profile served from cache');
 *
 * Secrets are redacted by path; per-request child loggers are created by the
 * request context middleware (req.log).
 */

import { pino, type Logger } from 'pino';
import type { LogLevel } from '../../config/env.js';

export type { Logger };

export const REDACT_PATHS = [
  'apiKey',
  '*.apiKey',
  'authorization',
  'headers.authorization',
  'req.headers.authorization',
  'password',
  '*.password',
  'token',
  '*.token'
];

/**
 * The level comes from the validated config (LOG_LEVEL).
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  return pino({
    level,
    base: { service: 'menu-concierge' },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' }
  });
}
